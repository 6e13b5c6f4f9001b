import { TDigest } from '@tally/digest';
import * as report from './report.js';
import { stripAnsi } from './util.js';

describe('summary', () => {
  test('totals and quantiles', () => {
    const d = TDigest.fromValues([1, 2, 3, 4], 100);
    const lines = report.summary(d, [0, 0.5, 1], 6).map(stripAnsi);

    expect(lines).toEqual([
      'count   4',
      'min     1',
      'max     4',
      'mean    2.5',
      'p0      1',
      'p50     2.5',
      'p100    4',
    ]);
  });

  test('precision', () => {
    const d = TDigest.fromValues([1, 2], 100);
    const lines = report.summary(d, [], 2).map(stripAnsi);

    expect(lines).toEqual(['count   2', 'min     1', 'max     2', 'mean    1.5']);
  });

  test('empty digest', () => {
    expect(report.summary(new TDigest(100), [0.5], 6).map(stripAnsi)).toEqual(['count   0']);
  });
});

describe('percentileLabel', () => {
  test('formats quantiles as percentiles', () => {
    expect(report.percentileLabel(0.25)).toBe('p25');
    expect(report.percentileLabel(0.999)).toBe('p99.9');
    expect(report.percentileLabel(1)).toBe('p100');
  });
});
