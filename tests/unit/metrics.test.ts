import { describe, expect, it } from 'vitest';

import { aggregateMetrics, buildHistogram, percentile } from '../../src/metrics/aggregate.js';
import { makeCase, makeRun } from '../support/runs.js';

const OPTIONS = { topN: 10, histogramBins: 10 };

describe('metrics aggregation', () => {
  it('breaks slowest-case ties alphabetically by identity', () => {
    const run = makeRun('run.xml', [
      makeCase('a', 5),
      makeCase('b', 5),
      makeCase('c', 2),
      makeCase('d', 8)
    ]);

    const topTwo = aggregateMetrics([run], { topN: 2, histogramBins: 10 }).combined.slowestCases;
    expect(topTwo.map((entry) => [entry.identity.name, entry.durationSeconds])).toEqual([
      ['d', 8],
      ['a', 5]
    ]);

    const all = aggregateMetrics([run], OPTIONS).combined.slowestCases;
    expect(all.map((entry) => entry.identity.name)).toEqual(['d', 'a', 'b', 'c']);
  });

  it('orders equal identities from different runs by run position', () => {
    const first = makeRun('first.xml', [makeCase('same', 1)]);
    const second = makeRun('second.xml', [makeCase('same', 1)]);

    const slowest = aggregateMetrics([first, second], OPTIONS).combined.slowestCases;
    expect(slowest.map((entry) => entry.sourcePath)).toEqual(['first.xml', 'second.xml']);
  });

  it('pools counts and durations over every run', () => {
    const first = makeRun('first.xml', [makeCase('a', 1), makeCase('b', 2), makeCase('c', 3, 'failed')]);
    const second = makeRun('second.xml', [makeCase('a', 4), makeCase('d', 0, 'skipped')]);

    const metrics = aggregateMetrics([first, second], OPTIONS);

    expect(metrics.runs.map((snapshot) => [snapshot.scope, snapshot.total])).toEqual([
      ['first.xml', 3],
      ['second.xml', 2]
    ]);
    expect(metrics.combined.scope).toBe('combined');
    expect(metrics.combined.runCount).toBe(2);
    expect(metrics.combined.total).toBe(5);
    expect(metrics.combined.counts).toEqual({ passed: 3, failed: 1, error: 0, skipped: 1 });
    expect(metrics.combined.passRate).toBe(0.6);
    expect(metrics.combined.rates.failed).toBe(0.2);
    expect(metrics.combined.totalDurationSeconds).toBe(10);
    expect(metrics.combined.durationPercentiles).toEqual({ p50: 2, p90: 4, p100: 4 });
  });

  it('produces status rates that sum to one over mixed statuses', () => {
    const first = makeRun('first.xml', [makeCase('a', 1), makeCase('b', 1, 'failed'), makeCase('c', 1, 'error')]);
    const second = makeRun('second.xml', [
      makeCase('a', 1),
      makeCase('b', 1),
      makeCase('c', 1, 'skipped'),
      makeCase('d', 1, 'skipped')
    ]);

    const { rates } = aggregateMetrics([first, second], OPTIONS).combined;
    expect(rates.passed).toBeCloseTo(3 / 7, 12);
    expect(rates.skipped).toBeCloseTo(2 / 7, 12);
    expect(rates.passed + rates.failed + rates.error + rates.skipped).toBeCloseTo(1, 12);
  });

  it('produces zero rates for an empty run', () => {
    const metrics = aggregateMetrics([makeRun('empty.xml', [])], OPTIONS);

    expect(metrics.combined.total).toBe(0);
    expect(metrics.combined.rates).toEqual({ passed: 0, failed: 0, error: 0, skipped: 0 });
    expect(metrics.combined.passRate).toBe(0);
    expect(metrics.combined.durationPercentiles).toEqual({ p50: 0, p90: 0, p100: 0 });
    expect(metrics.combined.durationHistogram).toEqual([]);
  });

  it('rolls every classname up with its status counts and ranks classes by total duration', () => {
    const run = makeRun('run.xml', [
      makeCase('a', 1, 'passed', 'suite', 'pkg.Fast'),
      makeCase('b', 2, 'failed', 'suite', 'pkg.Fast'),
      makeCase('c', 4, 'passed', 'suite', 'pkg.Slow'),
      makeCase('d', 3, 'passed', 'suite', 'pkg.Even')
    ]);

    const snapshot = aggregateMetrics([run], { topN: 2, histogramBins: 10 }).combined;
    expect(snapshot.classes.map((entry) => [entry.classname, entry.total, entry.counts, entry.totalDurationSeconds])).toEqual([
      ['pkg.Even', 1, { passed: 1, failed: 0, error: 0, skipped: 0 }, 3],
      ['pkg.Fast', 2, { passed: 1, failed: 1, error: 0, skipped: 0 }, 3],
      ['pkg.Slow', 1, { passed: 1, failed: 0, error: 0, skipped: 0 }, 4]
    ]);
    expect(snapshot.slowestClasses).toEqual([
      { classname: 'pkg.Slow', total: 1, counts: { passed: 1, failed: 0, error: 0, skipped: 0 }, totalDurationSeconds: 4 },
      { classname: 'pkg.Even', total: 1, counts: { passed: 1, failed: 0, error: 0, skipped: 0 }, totalDurationSeconds: 3 }
    ]);
  });

  it('summarizes each suite', () => {
    const run = makeRun('run.xml', [makeCase('a', 1, 'passed', 'one'), makeCase('b', 2, 'failed', 'one')]);

    expect(aggregateMetrics([run], OPTIONS).combined.suites).toEqual([
      {
        name: 'one',
        sourcePath: 'run.xml',
        total: 2,
        counts: { passed: 1, failed: 1, error: 0, skipped: 0 },
        passRate: 0.5,
        totalDurationSeconds: 3
      }
    ]);
  });

  it('lists non-passing cases by status category, then identity', () => {
    const run = makeRun('run.xml', [
      { ...makeCase('z', 1, 'skipped'), skippedMessage: 'not today' },
      { ...makeCase('y', 1, 'error'), failureMessage: 'crash' },
      makeCase('x', 1, 'passed'),
      { ...makeCase('w', 1, 'failed'), failureMessage: 'assertion' }
    ]);

    expect(aggregateMetrics([run], OPTIONS).combined.failures.map((entry) => [entry.identity.name, entry.status, entry.message])).toEqual([
      ['w', 'failed', 'assertion'],
      ['y', 'error', 'crash'],
      ['z', 'skipped', 'not today']
    ]);
  });
});

describe('percentile', () => {
  it('uses the nearest-rank method', () => {
    const sorted = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    expect(percentile(sorted, 50)).toBe(5);
    expect(percentile(sorted, 90)).toBe(9);
    expect(percentile(sorted, 100)).toBe(10);
    expect(percentile([7], 50)).toBe(7);
    expect(percentile([], 50)).toBe(0);
  });
});

describe('duration histogram', () => {
  it('buckets durations into equal-width bins up to the maximum', () => {
    expect(buildHistogram([0, 1, 2, 4], 4)).toEqual([
      { lower: 0, upper: 1, count: 1 },
      { lower: 1, upper: 2, count: 1 },
      { lower: 2, upper: 3, count: 1 },
      { lower: 3, upper: 4, count: 1 }
    ]);
  });

  it('collapses all-zero durations into a single bin', () => {
    expect(buildHistogram([0, 0, 0], 10)).toEqual([{ lower: 0, upper: 0, count: 3 }]);
  });
});
