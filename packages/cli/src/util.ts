import * as util from 'node:util';

import chalk from 'chalk';
import { Status } from '@tally/base';

export function println(...lines: string[]): void {
  if (lines.length === 0) {
    process.stdout.write('\n');
  } else {
    for (const line of lines) {
      process.stdout.write(line + '\n');
    }
  }
}

export function eprintf(fmt: string, ...args: unknown[]) {
  process.stderr.write(chalk.red(util.format(fmt, ...args)));
}

/** The status value, or process.exit(1) if given an error status */
export function tryPanic<T>(s: Status<T>): T {
  if (Status.isErr(s)) {
    panic(s[1]);
  }

  return s[0];
}

export function panic(e: Error): never {
  eprintf('%s\n', e.message);
  process.exit(1);
}

/** Convert a caught value to an Error */
export function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

const ansiMatch = [
  '[\\u001B\\u009B][[\\]()#;?]*(?:(?:(?:(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]+)*|[a-zA-Z\\d]+(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]*)*)?\\u0007)',
  '(?:(?:\\d{1,4}(?:;\\d{0,4})*)?[\\dA-PR-TZcf-nq-uy=><~]))',
].join('|');

export function ansiRegex(onlyFirst?: boolean) {
  return new RegExp(ansiMatch, onlyFirst ? undefined : 'g');
}

export function stripAnsi(str: string) {
  return str.replace(ansiRegex(), '');
}
