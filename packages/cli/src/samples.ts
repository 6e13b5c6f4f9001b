import { readFile } from 'node:fs/promises';
import { Status, numeric } from '@tally/base';
import { asError } from './util.js';

/** A named piece of text read from a file or stdin */
export type Input = {
  source: string;
  text: string;
};

export type WeightedSample = [value: number, weight: number];

/**
 * Parse whitespace separated samples, each either `<value>` or
 * `<value>:<weight>` where weight is a non-negative integer.
 */
export function parseSamples(input: Input): Status<WeightedSample[]> {
  const samples: WeightedSample[] = [];
  const lines = input.text.split(/\r?\n/);

  for (let ln = 0; ln < lines.length; ln++) {
    for (const token of lines[ln].split(/\s+/)) {
      if (token.length === 0) continue;

      const split = token.indexOf(':');
      const [value] = numeric.parseDouble(split < 0 ? token : token.substring(0, split));
      const [weight] = split < 0 ? Status.value(1) : numeric.parseInteger(token.substring(split + 1));

      if (value === null || weight === null || !Number.isFinite(value) || weight < 0) {
        return Status.err(`${input.source}:${ln + 1}: Invalid sample "${token}"`);
      }

      samples.push([value, weight]);
    }
  }

  return Status.value(samples);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }

  return Buffer.concat(chunks).toString('utf8');
}

/** Read each of the given files, or stdin when none are given */
export async function readInputs(files: string[]): Promise<Status<Input[]>> {
  try {
    if (files.length === 0) {
      return Status.value([{ source: '<stdin>', text: await readStdin() }]);
    }

    const inputs: Input[] = [];
    for (const source of files) {
      inputs.push({ source, text: await readFile(source, 'utf8') });
    }

    return Status.value(inputs);
  } catch (e) {
    return Status.err(asError(e));
  }
}
