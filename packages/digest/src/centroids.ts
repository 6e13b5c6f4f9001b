import { array, assert } from '@tally/base';

/** Storage of one centroid: its mean, weight and sort index */
export const BYTES_PER_CENTROID =
  2 * Float64Array.BYTES_PER_ELEMENT + Uint32Array.BYTES_PER_ELEMENT;

export interface Centroid {
  readonly mean: number;
  readonly weight: number;
}

/**
 * A fixed-capacity sequence of (mean, weight) pairs stored in parallel
 * typed arrays. Storage is reserved up front and only reallocated by an
 * explicit call to reserve().
 */
export class CentroidBuffer {
  #means: Float64Array;
  #weights: Float64Array;
  #order: Uint32Array;
  #length = 0;

  constructor(capacity = 0) {
    this.#means = new Float64Array(capacity);
    this.#weights = new Float64Array(capacity);
    this.#order = new Uint32Array(capacity);
  }

  get length() {
    return this.#length;
  }

  get capacity() {
    return this.#means.length;
  }

  /** Bytes held by the reserved storage */
  byteLength() {
    return this.capacity * BYTES_PER_CENTROID;
  }

  /** Grow the storage to hold at least the given number of centroids */
  reserve(capacity: number) {
    if (capacity <= this.capacity) return;

    const means = new Float64Array(capacity);
    const weights = new Float64Array(capacity);
    means.set(this.#means.subarray(0, this.#length));
    weights.set(this.#weights.subarray(0, this.#length));

    this.#means = means;
    this.#weights = weights;
    this.#order = new Uint32Array(capacity);
  }

  mean(i: number) {
    assert.inRange(i, 0, this.#length - 1);
    return this.#means[i];
  }

  weight(i: number) {
    assert.inRange(i, 0, this.#length - 1);
    return this.#weights[i];
  }

  set(i: number, mean: number, weight: number) {
    assert.inRange(i, 0, this.#length - 1);
    this.#means[i] = mean;
    this.#weights[i] = weight;
  }

  push(mean: number, weight: number) {
    assert.lt(this.#length, this.capacity, 'Centroid capacity exceeded');

    const i = this.#length++;
    this.#means[i] = mean;
    this.#weights[i] = weight;
  }

  /** Sort all centroids by ascending mean, then weight */
  sort() {
    const n = this.#length;
    const means = this.#means, weights = this.#weights;
    const order = array.iota(this.#order.subarray(0, n), 0);

    order.sort((a, b) => means[a] - means[b] || weights[a] - weights[b]);
    array.permute(order, n, means, weights);

    assert.isSorted(means.subarray(0, n));
  }

  truncate(length: number) {
    assert.inRange(length, 0, this.#length);
    this.#length = length;
  }

  clear() {
    this.#length = 0;
  }

  /** A copy of the contents with capacity equal to the length */
  clone(): CentroidBuffer {
    const copy = new CentroidBuffer(this.#length);
    copy.#means.set(this.#means.subarray(0, this.#length));
    copy.#weights.set(this.#weights.subarray(0, this.#length));
    copy.#length = this.#length;

    return copy;
  }

  *[Symbol.iterator](): IterableIterator<Centroid> {
    for (let i = 0; i < this.#length; i++) {
      yield { mean: this.#means[i], weight: this.#weights[i] };
    }
  }
}
