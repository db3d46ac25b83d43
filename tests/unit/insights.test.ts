import { describe, expect, it } from 'vitest';

import type { TestStatus } from '../../src/core/model.js';
import { detectInsights, detectSlowOutliers } from '../../src/insights/detect.js';
import { makeCase, makeRun } from '../support/runs.js';

const OPTIONS = { outlierK: 3, outlierMinSuiteSize: 2 };

/** One run per status; `undefined` leaves the case out of that run. */
function history(...statuses: (TestStatus | undefined)[]) {
  return statuses.map((status, index) =>
    makeRun(`run-${index + 1}.xml`, status ? [makeCase('t', 1, status), makeCase('anchor', 1)] : [makeCase('anchor', 1)])
  );
}

describe('insight detection', () => {
  it('flags a test that passed and then failed as flaky and regressed', () => {
    const insights = detectInsights(history('passed', 'failed'), OPTIONS);

    expect(insights).toEqual([
      {
        kind: 'flaky',
        identity: { suiteName: 'suite', classname: 'pkg.Case', name: 't' },
        statusesObserved: ['passed', 'failed']
      },
      {
        kind: 'regression',
        identity: { suiteName: 'suite', classname: 'pkg.Case', name: 't' },
        baselineStatus: 'passed',
        currentStatus: 'failed',
        baselineSource: 'run-1.xml',
        currentSource: 'run-2.xml'
      }
    ]);
  });

  it('does not flag a test that passed in both runs', () => {
    expect(detectInsights(history('passed', 'passed'), OPTIONS)).toEqual([]);
  });

  it('never flags from a single run', () => {
    expect(detectInsights(history('failed'), OPTIONS)).toEqual([]);
  });

  it('counts a skipped observation as a distinct status', () => {
    expect(detectInsights(history('passed', 'skipped'), OPTIONS)).toEqual([
      {
        kind: 'flaky',
        identity: { suiteName: 'suite', classname: 'pkg.Case', name: 't' },
        statusesObserved: ['passed', 'skipped']
      }
    ]);
  });

  it('does not flag a test that was skipped in every run', () => {
    expect(detectInsights(history('skipped', 'skipped', 'skipped'), OPTIONS)).toEqual([]);
  });

  it('reports an oscillating test as flaky and as a regression', () => {
    const insights = detectInsights(history('failed', 'passed', 'error'), OPTIONS);

    expect(insights.map((insight) => insight.kind)).toEqual(['flaky', 'regression']);
    expect(insights[0]).toMatchObject({ statusesObserved: ['failed', 'passed', 'error'] });
    expect(insights[1]).toMatchObject({ baselineStatus: 'passed', currentStatus: 'error' });
  });

  it('compares against the previous appearance when the test skipped a run', () => {
    const insights = detectInsights(history('passed', undefined, 'failed'), OPTIONS);
    expect(insights[1]).toMatchObject({ kind: 'regression', baselineSource: 'run-1.xml', currentSource: 'run-3.xml' });
  });

  it('requires the failing appearance to be in the last run', () => {
    const insights = detectInsights(history('passed', 'failed', undefined), OPTIONS);
    expect(insights.map((insight) => insight.kind)).toEqual(['flaky']);
  });

  it('does not report a regression for a test that was already failing', () => {
    const insights = detectInsights(history('failed', 'failed'), OPTIONS);
    expect(insights).toEqual([]);
  });

  it('orders flaky entries by identity', () => {
    const runs = [
      makeRun('one.xml', [makeCase('b', 1, 'passed'), makeCase('a', 1, 'passed')]),
      makeRun('two.xml', [makeCase('b', 1, 'failed'), makeCase('a', 1, 'error')])
    ];

    const flaky = detectInsights(runs, OPTIONS).filter((insight) => insight.kind === 'flaky');
    expect(flaky.map((insight) => insight.identity.name)).toEqual(['a', 'b']);
  });
});

describe('slow outlier detection', () => {
  const run = makeRun('run.xml', [
    makeCase('a', 1),
    makeCase('b', 1),
    makeCase('c', 1),
    makeCase('d', 1),
    makeCase('slow', 10)
  ]);

  it('flags cases above mean + k standard deviations of their suite', () => {
    const outliers = detectSlowOutliers(run, { outlierK: 1, outlierMinSuiteSize: 2 });

    expect(outliers).toHaveLength(1);
    expect(outliers[0]?.identity.name).toBe('slow');
    expect(outliers[0]?.duration).toBe(10);
    expect(outliers[0]?.threshold).toBeCloseTo(6.4, 10);
  });

  it('finds nothing at the default k for a five-case suite', () => {
    expect(detectSlowOutliers(run, OPTIONS)).toEqual([]);
  });

  it('skips suites smaller than the minimum size', () => {
    expect(detectSlowOutliers(run, { outlierK: 1, outlierMinSuiteSize: 6 })).toEqual([]);
  });

  it('never flags a suite of identical durations', () => {
    const uniform = makeRun('uniform.xml', [makeCase('a', 2), makeCase('b', 2), makeCase('c', 2)]);
    expect(detectSlowOutliers(uniform, { outlierK: 0, outlierMinSuiteSize: 2 })).toEqual([]);
  });

  it('is the only detector that applies to a single run', () => {
    const insights = detectInsights([run], { outlierK: 1, outlierMinSuiteSize: 2 });
    expect(insights.map((insight) => insight.kind)).toEqual(['slow-outlier']);
  });
});
