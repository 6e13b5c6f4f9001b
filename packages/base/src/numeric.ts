import { Status } from './util.js';

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;
const INTEGER = /^[+-]?\d+$/;

function stripTrailingZeros(digits: string): string {
  if (digits.indexOf('.') < 0) return digits;

  let end = digits.length;
  while (digits[end - 1] === '0') end--;
  if (digits[end - 1] === '.') end--;

  return digits.substring(0, end);
}

/**
 * Format a number as printf's `%.<precision>g` conversion does: scientific
 * notation when the decimal exponent is below -4 or at least the precision,
 * fixed notation otherwise, with trailing zeros removed in both cases.
 *
 * ```
 * formatG(0.1, 17); // '0.10000000000000001'
 * formatG(1e6, 6); // '1e+06'
 * formatG(500.5, 17); // '500.5'
 * ```
 */
export function formatG(x: number, precision: number): string {
  if (Number.isNaN(x)) return 'nan';
  if (!Number.isFinite(x)) return x > 0 ? 'inf' : '-inf';
  if (x === 0) return Object.is(x, -0) ? '-0' : '0';

  precision = Math.max(1, precision | 0);

  const exp = x.toExponential(precision - 1);
  const split = exp.indexOf('e');
  const e = Number(exp.substring(split + 1));

  if (e < -4 || e >= precision) {
    const mantissa = stripTrailingZeros(exp.substring(0, split));
    const digits = String(Math.abs(e)).padStart(2, '0');

    return `${mantissa}e${e < 0 ? '-' : '+'}${digits}`;
  }

  return stripTrailingZeros(x.toFixed(precision - 1 - e));
}

/** Parse a decimal floating point token, including inf and nan */
export function parseDouble(token: string): Status<number> {
  if (DECIMAL.test(token)) {
    return Status.value(Number(token));
  }

  const special = SPECIAL.exec(token);
  if (special !== null) {
    const [, sign, kind] = special;
    if (kind.toLowerCase() === 'nan') return Status.value(NaN);

    return Status.value(sign === '-' ? -Infinity : Infinity);
  }

  return Status.err(`Invalid number: "${token}"`);
}

/** Parse a decimal integer token within the safe integer range */
export function parseInteger(token: string): Status<number> {
  if (!INTEGER.test(token)) {
    return Status.err(`Invalid integer: "${token}"`);
  }

  const n = Number(token);
  if (!Number.isSafeInteger(n)) {
    return Status.err(`Integer out of range: "${token}"`);
  }

  return Status.value(n);
}
