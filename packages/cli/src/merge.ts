import { debug } from 'node:util';
import { Status } from '@tally/base';
import { TDigest } from '@tally/digest';

import { Input, readInputs } from './samples.js';
import { println, tryPanic } from './util.js';

const dbg = debug('tally:merge');

/**
 * Merge every digest in the given inputs, one serialized digest per line.
 * The result takes the compression of the first digest.
 */
export function mergeInputs(inputs: Input[]): Status<TDigest> {
  const merged = new TDigest();

  for (const input of inputs) {
    const lines = input.text.split(/\r?\n/);

    for (let ln = 0; ln < lines.length; ln++) {
      const line = lines[ln].trim();
      if (line.length === 0) continue;

      const s = TDigest.parse(line);
      if (Status.isErr(s)) {
        return Status.err(`${input.source}:${ln + 1}: ${s[1].message}`);
      }

      dbg('%s:%d: %d samples', input.source, ln + 1, s[0].count());
      merged.merge(s[0]);
    }
  }

  return Status.value(merged);
}

export async function merge(files: string[]): Promise<void> {
  const inputs = tryPanic(await readInputs(files));
  const merged = tryPanic(mergeInputs(inputs));

  println(merged.toString());
}
