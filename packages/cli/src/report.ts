import chalk from 'chalk';
import { numeric } from '@tally/base';
import { TDigest } from '@tally/digest';

const LABEL_WIDTH = 8;

function row(label: string, value: string) {
  return chalk.dim(label.padEnd(LABEL_WIDTH)) + value;
}

/** A label for the quantile as a percentile, e.g. p99.9 */
export function percentileLabel(q: number) {
  return 'p' + numeric.formatG(q * 100, 6);
}

/** Render the totals and the requested quantiles of a digest */
export function summary(digest: TDigest, quantiles: readonly number[], precision: number): string[] {
  const fmt = (x: number) => numeric.formatG(x, precision);
  const count = digest.count();

  if (count === 0) {
    return [row('count', '0')];
  }

  const lines = [
    row('count', String(count)),
    row('min', fmt(digest.min())),
    row('max', fmt(digest.max())),
    row('mean', fmt(digest.sum() / count)),
  ];

  for (const q of quantiles) {
    lines.push(row(percentileLabel(q), chalk.bold(fmt(digest.quantile(q)))));
  }

  return lines;
}
