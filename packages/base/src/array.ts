import * as assert from './assert.js';

/* A mutable view over an array */
export interface ArrayView<T> {
  readonly length: number;
  [n: number]: T;
}

/**
 * Sets all values in arr in increments of 1.
 * See also: c++ std::iota
 */
export function iota<T extends ArrayView<number>>(arr: T, initial: number): T {
  for (let i = 0; i < arr.length; i++) {
    arr[i] = initial++;
  }
  return arr;
}

/**
 * Rearrange each array so that arr[i] becomes the element previously at
 * arr[order[i]], in place. The first n entries of order are reset to the
 * identity permutation on return.
 */
export function permute<T>(order: ArrayView<number>, n: number, ...arrs: ArrayView<T>[]): void {
  assert.le(n, order.length);

  const displaced = new Array<T>(arrs.length);

  for (let i = 0; i < n; i++) {
    if (order[i] === i) continue;

    for (let a = 0; a < arrs.length; a++) displaced[a] = arrs[a][i];

    let j = i;
    for (;;) {
      const k = order[j];
      order[j] = j;

      if (k === i) {
        for (let a = 0; a < arrs.length; a++) arrs[a][j] = displaced[a];
        break;
      }

      for (let a = 0; a < arrs.length; a++) arrs[a][j] = arrs[a][k];
      j = k;
    }
  }
}
