import chalk from 'chalk';
import { numeric } from '@tally/base';
import { TDigest } from '@tally/digest';

import * as tallyConfig from './config.js';
import { println, tryPanic } from './util.js';

export interface QueryFlags {
  quantile: number[];
  cdf: number[];
}

/** Render the requested quantiles and cdf values of a digest */
export function evaluate(
  digest: TDigest,
  quantiles: readonly number[],
  values: readonly number[],
  precision: number,
): string[] {
  const fmt = (x: number) => numeric.formatG(x, precision);
  const lines: string[] = [];

  for (const q of quantiles) {
    lines.push(`${chalk.dim(`quantile(${q}) =`)} ${fmt(digest.quantile(q))}`);
  }

  for (const x of values) {
    lines.push(`${chalk.dim(`cdf(${x}) =`)} ${fmt(digest.cdf(x))}`);
  }

  return lines;
}

export async function query(encoded: string, flags: QueryFlags): Promise<void> {
  const cfg = tryPanic(await tallyConfig.load(process.cwd()));
  const digest = tryPanic(TDigest.parse(encoded));

  // with nothing requested, report the configured quantiles
  const quantiles = flags.quantile.length + flags.cdf.length === 0
    ? cfg.report.quantiles
    : flags.quantile;

  println(...evaluate(digest, quantiles, flags.cdf, cfg.report.precision));
}
