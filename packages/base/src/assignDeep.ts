import { isObject } from './util.js';

const assignDeepImpl = (target: Record<string, unknown>, source: Record<string, unknown>) => {
  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = target[key];

    if (!isObject(value) || !isObject(existing)) {
      target[key] = value;
    } else {
      assignDeepImpl(existing, value);
    }
  }
};

/**
 * Recursively assign the own enumerable properties of each source to target,
 * from left to right. Arrays and primitives replace; plain objects merge.
 */
export const assignDeep = <T extends object>(target: Partial<T>, ...sources: unknown[]): T => {
  for (const source of sources) {
    if (isObject(source) && isObject(target)) {
      assignDeepImpl(target, source);
    }
  }

  return target as T;
};
