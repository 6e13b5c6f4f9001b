import { Command, InvalidArgumentError } from 'commander';
import { numeric } from '@tally/base';
import { scale } from '@tally/digest';

import { SummarizeFlags, summarize } from './summarize.js';
import { merge } from './merge.js';
import { QueryFlags, query } from './query.js';

function parseNumber(value: string): number {
  const [x, err] = numeric.parseDouble(value);
  if (x === null || !Number.isFinite(x)) {
    throw new InvalidArgumentError(err?.message ?? `Expected a finite number, got "${value}"`);
  }

  return x;
}

export function parseCompression(value: string): number {
  const c = parseNumber(value);
  if (!(c > 0 && c <= scale.MAX_COMPRESSION)) {
    throw new InvalidArgumentError(`Expected a compression in (0, ${scale.MAX_COMPRESSION}]`);
  }

  return c;
}

export function collectQuantile(value: string, previous: number[]): number[] {
  const q = parseNumber(value);
  if (q < 0 || q > 1) {
    throw new InvalidArgumentError('Expected a quantile in [0, 1]');
  }

  return [...previous, q];
}

export function collectNumber(value: string, previous: number[]): number[] {
  return [...previous, parseNumber(value)];
}

export function program(): Command {
  const program = new Command();

  program.name('tally').description('Streaming quantile summaries').version('0.1.0');

  program
    .command('summarize')
    .description('Summarize samples (value or value:weight) read from files or stdin')
    .argument('[files...]', 'files of whitespace separated samples')
    .option('-c, --compression <number>', 'compression of the digest', parseCompression)
    .option('-s, --serialize', 'print the serialized digest')
    .option('--json', 'print the digest as JSON')
    .action(async (files: string[], flags: SummarizeFlags) => summarize(files, flags));

  program
    .command('merge')
    .description('Merge serialized digests, one per line, read from files or stdin')
    .argument('[files...]', 'files of serialized digests')
    .action(async (files: string[]) => merge(files));

  program
    .command('query')
    .description('Query the quantiles and cdf of a serialized digest')
    .argument('<digest>', 'a serialized digest')
    .option('-q, --quantile <q>', 'a quantile to estimate (repeatable)', collectQuantile, [])
    .option('-c, --cdf <value>', 'a value to estimate the cdf of (repeatable)', collectNumber, [])
    .action(async (digest: string, flags: QueryFlags) => query(digest, flags));

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  await program().parseAsync(argv);
}
