import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { Status } from '@tally/base';
import { parseSamples, readInputs } from './samples.js';

function errorOf<T>(s: Status<T>) {
  const [, e] = s;
  return e?.message;
}

describe('parseSamples', () => {
  test('values and weighted values', () => {
    const s = parseSamples({ source: 'a', text: '1 2\n3:4\n\n  5.5 \t-1e3\r\n' });

    expect(Status.get(s)).toEqual([[1, 1], [2, 1], [3, 4], [5.5, 1], [-1000, 1]]);
  });

  test('empty input', () => {
    expect(Status.get(parseSamples({ source: 'a', text: '' }))).toEqual([]);
  });

  test.each([
    ['1\n2 x', 'a.txt:2: Invalid sample "x"'],
    ['1:-1', 'a.txt:1: Invalid sample "1:-1"'],
    ['1:', 'a.txt:1: Invalid sample "1:"'],
    ['1:2.5', 'a.txt:1: Invalid sample "1:2.5"'],
    ['nan', 'a.txt:1: Invalid sample "nan"'],
  ])('rejects %s', (text, message) => {
    expect(errorOf(parseSamples({ source: 'a.txt', text }))).toBe(message);
  });
});

describe('readInputs', () => {
  test('reads each file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tally-'));
    const a = path.join(dir, 'a.txt'), b = path.join(dir, 'b.txt');

    await fs.writeFile(a, '1 2 3');
    await fs.writeFile(b, '4');

    const inputs = Status.get(await readInputs([a, b]));

    expect(inputs).toEqual([
      { source: a, text: '1 2 3' },
      { source: b, text: '4' },
    ]);

    await fs.rm(dir, { recursive: true });
  });

  test('missing files are an error', async () => {
    const s = await readInputs([path.join(os.tmpdir(), 'tally-missing', 'none.txt')]);

    expect(Status.isErr(s)).toBe(true);
    expect(errorOf(s)).toContain('ENOENT');
  });
});
