import * as assert from './assert.js';

/** A source of uniformly distributed 32-bit unsigned integers */
export type Generator = () => number;

/**
 * A small, fast seeded generator (mulberry32). Not suitable for
 * cryptographic purposes.
 */
export function PRNGi32(seed = Date.now()): Generator {
  let a = seed >>> 0;

  return () => {
    a = (a + 0x6d2b79f5) >>> 0;

    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);

    return (t ^ (t >>> 14)) >>> 0;
  };
}

/** Uniform distribution in the half-open interval [lo, hi) */
export function uniform(lo: number, hi: number, entropy: Generator): () => number {
  assert.le(lo, hi);
  const range = hi - lo;

  return () => lo + (entropy() / 4294967296) * range;
}

/** Uniform distribution of integers in the closed interval [lo, hi] */
export function uniformi(lo: number, hi: number, entropy: Generator): () => number {
  assert.le(lo, hi);
  const dist = uniform(lo, hi + 1, entropy);

  return () => Math.floor(dist());
}

/** Normal distribution via the Box-Muller transform */
export function gaussian(mu: number, sigma: number, entropy: Generator): () => number {
  const dist = uniform(0, 1, entropy);
  let spare: number | undefined;

  return () => {
    if (spare !== undefined) {
      const z = spare;
      spare = undefined;
      return mu + sigma * z;
    }

    let u = 0;
    while (u === 0) u = dist();
    const v = dist();

    const r = Math.sqrt(-2 * Math.log(u));
    spare = r * Math.sin(2 * Math.PI * v);

    return mu + sigma * r * Math.cos(2 * Math.PI * v);
  };
}
