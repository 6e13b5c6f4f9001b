type Comparable = number | bigint | string;

const enabled = typeof __DEBUG !== 'undefined' && __DEBUG;

function err(msg: string): never {
  throw new Error('[Failed assertion] ' + msg);
}

export function is(val: unknown, msg?: string): void {
  if (enabled) {
    if (!val) err(msg ?? `Expected ${String(val)} to be truthy`);
  }
}

export function le<T extends Comparable>(a: T, b: T, msg?: string): void {
  if (enabled) {
    if (a > b) err(msg ?? `Expected ${a} to be <= ${b}`);
  }
}

export function lt<T extends Comparable>(a: T, b: T, msg?: string): void {
  if (enabled) {
    if (a >= b) err(msg ?? `Expected ${a} to be < ${b}`);
  }
}

export function gt<T extends Comparable>(a: T, b: T, msg?: string): void {
  if (enabled) {
    if (a <= b) err(msg ?? `Expected ${a} to be > ${b}`);
  }
}

export function gte<T extends Comparable>(a: T, b: T, msg?: string): void {
  if (enabled) {
    if (a < b) err(msg ?? `Expected ${a} to be >= ${b}`);
  }
}

export function inRange<T extends Comparable>(val: T, min: T, max: T, msg?: string): void {
  if (enabled) {
    if (val < min || val > max) err(msg ?? `Expected ${min} <= ${val} <= ${max}`);
  }
}

export function finite(val: number, msg?: string): void {
  if (enabled) {
    if (!Number.isFinite(val)) err(msg ?? `Expected ${val} to be a finite number`);
  }
}

export function integer(val: number, msg?: string): void {
  if (enabled) {
    if (!Number.isSafeInteger(val)) err(msg ?? `Expected ${val} to be an integer`);
  }
}

export function isSorted(arr: ArrayLike<number>, msg?: string): void {
  if (enabled) {
    for (let i = 1; i < arr.length; i++) {
      if (arr[i - 1] > arr[i]) err(msg ?? `Expected element ${i} (${arr[i]}) to be >= ${arr[i - 1]}`);
    }
  }
}
