import { debug } from 'node:util';
import { Status } from '@tally/base';
import { TDigest } from '@tally/digest';

import * as tallyConfig from './config.js';
import * as report from './report.js';
import { Input, parseSamples, readInputs } from './samples.js';
import { println, tryPanic } from './util.js';

const dbg = debug('tally:summarize');

export interface SummarizeFlags {
  compression?: number;
  serialize?: boolean;
  json?: boolean;
}

/** Build a digest of all samples in the given inputs */
export function digestOf(inputs: Input[], compression: number): Status<TDigest> {
  const digest = new TDigest(compression);

  for (const input of inputs) {
    const s = parseSamples(input);
    if (Status.isErr(s)) return s;

    dbg('%s: %d samples', input.source, s[0].length);

    for (const [value, weight] of s[0]) {
      digest.add(value, weight);
    }
  }

  return Status.value(digest);
}

export async function summarize(files: string[], flags: SummarizeFlags): Promise<void> {
  const cfg = tryPanic(await tallyConfig.load(process.cwd()));
  const inputs = tryPanic(await readInputs(files));
  const digest = tryPanic(digestOf(inputs, flags.compression ?? cfg.digest.compression));

  if (flags.serialize) {
    println(digest.toString());
  } else if (flags.json) {
    println(JSON.stringify(digest.toJson()));
  } else {
    println(...report.summary(digest, cfg.report.quantiles, cfg.report.precision));
  }
}
