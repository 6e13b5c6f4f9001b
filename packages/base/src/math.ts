import * as assert from './assert.js';

/**
 * The mean of two values weighted by w1 and w2 respectively. Used to
 * linearly interpolate between v1 and v2, where each weight is the
 * distance to the opposite end of the interval.
 */
export function weightedMean(v1: number, v2: number, w1: number, w2: number) {
  assert.gte(w1, 0);
  assert.gte(w2, 0);
  assert.gt(w1 + w2, 0);

  return (v1 * w1 + v2 * w2) / (w1 + w2);
}
