import { Status, assert, isObject, json, math, numeric } from '@tally/base';
import { Centroid, CentroidBuffer } from './centroids.js';
import * as scale from './scale.js';

/** Tolerance between an encoded sum and the sum recomputed from its centroids */
const SUM_TOLERANCE = 1e-10;

export type DigestJson = {
  compression: number;
  min: number;
  max: number;
  sum: number;
  count: number;
  centroids: [mean: number, weight: number][];
};

/** Encoded aggregates of a digest */
type Totals = Pick<DigestJson, 'min' | 'max' | 'sum' | 'count'>;

/**
 * A merging t-digest. Summarizes a stream of weighted samples in a bounded
 * number of centroids, answering quantile and CDF queries with an error
 * that is smallest near the tails of the distribution.
 *
 * Samples are buffered and folded into the sorted centroids in batches of
 * `4 * maxCentroids`. Queries and serialization merge any buffered samples
 * first.
 *
 * Reference:
 * Dunning & Ertl, "Computing Extremely Accurate Quantiles Using t-Digests"
 * https://arxiv.org/abs/1902.04023
 */
export class TDigest implements json.Serializable<DigestJson> {
  #compression = 0;
  #batchSize = 0;
  #centroids = new CentroidBuffer();

  /** Number of leading centroids which are sorted and compacted */
  #merged = 0;

  /** Number of trailing centroids awaiting the next merge */
  #unmerged = 0;

  #min = Infinity;
  #max = -Infinity;
  #sum = 0;
  #count = 0;

  constructor(compression = 0) {
    this.reset(compression);
  }

  compression() {
    return this.#compression;
  }

  min() {
    return this.#min;
  }

  max() {
    return this.#max;
  }

  sum() {
    return this.#sum;
  }

  /** The total weight of all samples */
  count() {
    return this.#count;
  }

  /** The number of centroids currently stored, merged or not */
  size() {
    return this.#centroids.length;
  }

  /** Approximate memory held by the centroid storage */
  memUsageBytes() {
    return this.#centroids.byteLength();
  }

  /** Clears all samples, and sets the compression of the digest */
  reset(compression: number) {
    assert.gte(compression, 0);

    this.#compression = scale.boundedCompression(compression);

    const maxCentroids = scale.maxCentroids(this.#compression);
    this.#batchSize = 4 * maxCentroids;
    this.#centroids.reserve(maxCentroids + this.#batchSize);
    this.#centroids.clear();

    this.#merged = 0;
    this.#unmerged = 0;
    this.#min = Infinity;
    this.#max = -Infinity;
    this.#sum = 0;
    this.#count = 0;
  }

  /** Add a sample with the given (integer) weight */
  add(value: number, weight = 1) {
    if (weight === 0) return;

    assert.finite(value);
    assert.integer(weight);
    assert.gt(weight, 0);

    // a single sample is discrete
    this.#updateStats(value, value, value * weight, weight);
    this.#addUnmerged(value, weight);
  }

  /**
   * Add all samples of another digest. A digest without a compression takes
   * the compression of the other.
   */
  merge(other: TDigest) {
    if (this.#compression === 0) {
      this.reset(other.#compression);
    }

    const centroids = other === this ? other.#centroids.clone() : other.#centroids;
    this.#updateStats(other.#min, other.#max, other.#sum, other.#count);

    for (const c of centroids) {
      this.#addUnmerged(c.mean, c.weight);
    }
  }

  /** Fold all unmerged centroids in to the sorted, compacted set */
  doMerge() {
    if (this.#unmerged === 0) return;

    const centroids = this.#centroids;
    const compression = this.#compression;
    const totalCount = this.#count;

    assert.gt(centroids.length, 0);
    centroids.sort();

    // The scaled quantile limit of the current centroid,
    // i.e. totalCount * q_limit
    let q0 = 0;
    let qLimit = totalCount * scale.scaleToQuantile(compression, q0 + 1);

    // The sum drifts as centroids are combined, so it is recomputed from the
    // centroids on every merge
    this.#sum = 0;

    let last = 0;
    let mean = centroids.mean(0);
    let weight = centroids.weight(0);
    let mergedCount = weight;

    for (let i = 1; i < centroids.length; i++) {
      const nextMean = centroids.mean(i);
      const nextWeight = centroids.weight(i);

      if (mergedCount + nextWeight <= qLimit) {
        // Welford's method. The weight is updated before the mean.
        weight += nextWeight;
        mean += ((nextMean - mean) * nextWeight) / weight;
        mergedCount += nextWeight;
        continue;
      }

      q0 = scale.quantileToScale(compression, mergedCount / totalCount);
      qLimit = totalCount * scale.scaleToQuantile(compression, q0 + 1);
      mergedCount += nextWeight;

      this.#sum += mean * weight;
      centroids.set(last++, mean, weight);

      mean = nextMean;
      weight = nextWeight;
    }

    this.#sum += mean * weight;
    centroids.set(last, mean, weight);
    centroids.truncate(last + 1);

    // the count runs ahead of the stored weight while merging another digest
    assert.le(mergedCount, totalCount);

    this.#merged = centroids.length;
    this.#unmerged = 0;
    this.#min = Math.min(this.#min, centroids.mean(0));
    this.#max = Math.max(this.#max, centroids.mean(last));

    assert.le(centroids.length, scale.maxCentroids(compression));
  }

  /** The centroids of the digest in ascending order of mean */
  centroids(): IterableIterator<Centroid> {
    this.doMerge();
    return this.#centroids[Symbol.iterator]();
  }

  /*
   * Quantile and Cdf linearly interpolate between the mid points of the
   * centroids, with the points:
   *
   *   (rank, value) = (0, min), (weight[0] / 2, mean[0]), ...
   *                   (weight[0] + ... + weight[i-1] + weight[i] / 2, mean[i]), ...
   *                   (count, max)
   */

  /**
   * The estimated value at the given quantile in [0, 1].
   * @returns NaN when the digest is empty
   */
  quantile(q: number): number {
    assert.inRange(q, 0, 1);

    this.doMerge();

    const centroids = this.#centroids;
    const n = centroids.length;

    if (n === 0) return NaN;
    if (n === 1) return centroids.mean(0);

    const rank = q * this.#count;

    let prevRank = 0;
    let prevValue = this.#min;
    let rankAt = centroids.weight(0) / 2;
    let valueAt = centroids.mean(0);

    for (let i = 0; i < n; i++) {
      if (rank < rankAt) break;

      prevRank = rankAt;
      prevValue = valueAt;

      if (i === n - 1) {
        // between the last centroid and max
        rankAt = this.#count;
        valueAt = this.#max;
      } else {
        rankAt += (centroids.weight(i) + centroids.weight(i + 1)) / 2;
        valueAt = centroids.mean(i + 1);
      }
    }

    return math.weightedMean(prevValue, valueAt, rankAt - rank, rank - prevRank);
  }

  /**
   * The estimated fraction of samples less than or equal to the given value.
   * @returns NaN when the digest is empty
   */
  cdf(value: number): number {
    this.doMerge();

    const centroids = this.#centroids;
    const n = centroids.length;
    const count = this.#count;
    const min = this.#min, max = this.#max;

    if (n === 0) return NaN;
    if (value < min) return 0;

    // when min === max, any value >= max is 1
    if (value >= max) return 1;

    assert.is(min !== max);

    if (n === 1) {
      return (value - min) / (max - min);
    }

    const first = centroids.mean(0);
    if (value < first) {
      return math.weightedMean(0, centroids.weight(0) / count / 2, first - value, value - min);
    }

    const last = centroids.mean(n - 1);
    if (value >= last) {
      return math.weightedMean(
        1 - centroids.weight(n - 1) / count / 2, 1,
        max - value, value - last,
      );
    }

    // rank of the mid point of centroid i
    let rank = centroids.weight(0) / 2;

    for (let i = 0; i < n - 1; i++) {
      const mean = centroids.mean(i);

      if (mean === value) {
        // centroids of the same mean form a single step; take its mid point
        const below = rank - centroids.weight(i) / 2;
        let tied = centroids.weight(i);

        for (let j = i + 1; j < n && centroids.mean(j) === value; j++) {
          tied += centroids.weight(j);
        }

        return (below + tied / 2) / count;
      }

      const next = centroids.mean(i + 1);

      if (value < next) {
        const ratio = (value - mean) / (next - mean);
        const delta = (centroids.weight(i) + centroids.weight(i + 1)) / 2;

        return (rank + delta * ratio) / count;
      }

      rank += (centroids.weight(i) + centroids.weight(i + 1)) / 2;
    }

    assert.is(false, `Cannot measure CDF for: ${value}`);
    return NaN;
  }

  /**
   * Encode the digest as text:
   *
   *  - empty: `<compression>/0/0/0/0`
   *  - a single sample of weight 1: `<compression>/<value>`
   *  - otherwise: `<compression>/<min>/<max>/<sum>/<count>` followed by
   *    `/<mean>:<weight>` for each centroid in ascending order
   */
  toString(): string {
    const centroids = this.#centroids;
    let str = numeric.formatG(this.#compression, 6);

    if (this.#count <= 1) {
      // min and max are encoded as 0 when empty
      if (this.#count === 0) return str + '/0/0/0/0';
      return str + '/' + numeric.formatG(centroids.mean(0), 17);
    }

    this.doMerge();

    str +=
      `/${numeric.formatG(this.#min, 17)}` +
      `/${numeric.formatG(this.#max, 17)}` +
      `/${numeric.formatG(this.#sum, 17)}` +
      `/${this.#count}`;

    for (let i = 0; i < centroids.length; i++) {
      str += `/${numeric.formatG(centroids.mean(i), 17)}:${centroids.weight(i)}`;
    }

    return str;
  }

  /**
   * Replace the contents of this digest with a digest encoded by toString().
   * An empty string is an unset digest with no compression.
   *
   * On failure the digest is left in an unspecified (but valid) state.
   */
  fromString(str: string): Status<TDigest> {
    if (str.length === 0) {
      this.reset(0);
      return Status.value(this);
    }

    const tokens = str.split('/');

    if (tokens[0].length === 0) {
      return Status.err('No compression');
    }

    const [compression] = numeric.parseDouble(tokens[0]);
    if (compression === null || !Number.isFinite(compression) || compression < 0) {
      return Status.err(`Invalid compression: "${tokens[0]}"`);
    }

    this.reset(compression);

    if (tokens.length === 1) {
      return Status.err('Unexpected end of string');
    }

    // single value
    if (tokens.length === 2) {
      const [value] = numeric.parseDouble(tokens[1]);
      if (value === null || !Number.isFinite(value)) {
        return Status.err(`Invalid single value: "${tokens[1]}"`);
      }
      if (this.#compression === 0) {
        return Status.err('Cannot add a value to a digest without compression');
      }

      this.add(value, 1);
      return Status.value(this);
    }

    const [min] = numeric.parseDouble(tokens[1]);
    const [max] = numeric.parseDouble(tokens[2]);
    const [sum] = tokens.length > 3 ? numeric.parseDouble(tokens[3]) : [null];
    const [count] = tokens.length > 4 ? numeric.parseInteger(tokens[4]) : [null];

    if (min === null || max === null || sum === null || count === null) {
      return Status.err('Invalid min, max, sum, or count');
    }

    const centroids: [number, number][] = [];

    for (let i = 5; i < tokens.length; i++) {
      const token = tokens[i];
      const split = token.indexOf(':');
      const [mean] = split < 0 ? [null] : numeric.parseDouble(token.substring(0, split));
      const [weight] = split < 0 ? [null] : numeric.parseInteger(token.substring(split + 1));

      if (mean === null || weight === null || !Number.isFinite(mean) || weight < 0) {
        return Status.err(`Invalid centroid: "${token}"`);
      }

      centroids.push([mean, weight]);
    }

    return this.#restore({ min, max, sum, count }, centroids);
  }

  toJson(): DigestJson {
    this.doMerge();

    if (this.#count === 0) {
      return { compression: this.#compression, min: 0, max: 0, sum: 0, count: 0, centroids: [] };
    }

    const centroids: [number, number][] = [];
    for (const c of this.#centroids) centroids.push([c.mean, c.weight]);

    return {
      compression: this.#compression,
      min: this.#min,
      max: this.#max,
      sum: this.#sum,
      count: this.#count,
      centroids,
    };
  }

  /** Rebuild the digest by replaying the given centroids, then validate the totals */
  #restore(totals: Totals, centroids: [number, number][]): Status<TDigest> {
    if (centroids.length === 0) {
      if (totals.min !== 0 || totals.max !== 0 || totals.sum !== 0 || totals.count !== 0) {
        return Status.err('Empty digest with non-zero min, max, sum, or count');
      }

      return Status.value(this);
    }

    if (this.#compression === 0) {
      return Status.err('Cannot add centroids to a digest without compression');
    }

    if (![totals.min, totals.max, totals.sum].every(Number.isFinite)) {
      return Status.err('Invalid min, max, or sum');
    }

    for (const [mean, weight] of centroids) {
      this.add(mean, weight);
    }

    this.doMerge();
    this.#min = totals.min;
    this.#max = totals.max;

    if (this.#centroids.length === 0) {
      return Status.value(this);
    }

    if (!(Math.abs(totals.sum - this.#sum) <= SUM_TOLERANCE)) {
      return Status.err('Invalid sum value');
    }

    if (totals.count !== this.#count) {
      return Status.err('Invalid count value');
    }

    return Status.value(this);
  }

  #updateStats(min: number, max: number, sum: number, count: number) {
    this.#min = Math.min(this.#min, min);
    this.#max = Math.max(this.#max, max);
    this.#sum += sum;
    this.#count += count;
  }

  #addUnmerged(mean: number, weight: number) {
    assert.gt(this.#batchSize, 0, 'Digest has no compression');
    assert.lt(this.#unmerged, this.#batchSize);

    this.#centroids.push(mean, weight);

    if (++this.#unmerged === this.#batchSize) {
      this.doMerge();
    }
  }

  /** Decode a digest encoded by toString() */
  static parse(str: string): Status<TDigest> {
    return new TDigest().fromString(str);
  }

  /** Decode a digest from the output of toJson(), typically read back with JSON.parse */
  static fromJson(v: unknown): Status<TDigest> {
    if (!isObject(v)) {
      return Status.err('Invalid digest: expected an object');
    }

    const { compression, min, max, sum, count, centroids } = v;

    if (typeof compression !== 'number' || !Number.isFinite(compression) || compression < 0) {
      return Status.err(`Invalid compression: ${String(compression)}`);
    }

    if (typeof min !== 'number' || typeof max !== 'number' || typeof sum !== 'number') {
      return Status.err('Invalid min, max, or sum');
    }

    if (typeof count !== 'number' || !Number.isSafeInteger(count)) {
      return Status.err(`Invalid count: ${String(count)}`);
    }

    if (!Array.isArray(centroids)) {
      return Status.err('Invalid centroids: expected an array');
    }

    const pairs: [number, number][] = [];
    for (const c of centroids) {
      if (!isCentroidPair(c)) {
        return Status.err(`Invalid centroid: ${JSON.stringify(c)}`);
      }

      pairs.push(c);
    }

    const d = new TDigest(compression);
    return d.#restore({ min, max, sum, count }, pairs);
  }

  static fromValues(values: Iterable<number>, compression: number) {
    const d = new TDigest(compression);
    for (const x of values) d.add(x);

    return d;
  }
}

function isCentroidPair(c: unknown): c is [number, number] {
  return Array.isArray(c)
    && c.length === 2
    && typeof c[0] === 'number'
    && Number.isFinite(c[0])
    && typeof c[1] === 'number'
    && Number.isSafeInteger(c[1])
    && c[1] >= 0;
}
