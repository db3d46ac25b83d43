import { log } from '../core/logger.js';
import {
  compareIdentity,
  identityKey,
  toIdentity,
  type TestCaseIdentity,
  type TestRun,
  type TestStatus
} from '../core/model.js';

/** Identity whose status changed across the supplied runs. */
export interface FlakyInsight {
  kind: 'flaky';
  identity: TestCaseIdentity;
  /** Every observed status in run order. */
  statusesObserved: TestStatus[];
}

/** Identity that passed in its previous appearance and fails in the last run. */
export interface RegressionInsight {
  kind: 'regression';
  identity: TestCaseIdentity;
  baselineStatus: TestStatus;
  currentStatus: TestStatus;
  baselineSource: string;
  currentSource: string;
}

/** Case slower than `mean + k·stddev` of its suite in one run. */
export interface SlowOutlierInsight {
  kind: 'slow-outlier';
  identity: TestCaseIdentity;
  sourcePath: string;
  duration: number;
  threshold: number;
}

export type Insight = FlakyInsight | RegressionInsight | SlowOutlierInsight;
export type InsightKind = Insight['kind'];

/** Report order of insight kinds. */
export const INSIGHT_KINDS: readonly InsightKind[] = ['flaky', 'regression', 'slow-outlier'];

export interface DetectOptions {
  /** Standard-deviation multiplier for slow outliers. */
  outlierK: number;
  /** Suites with fewer cases are exempt from outlier detection. */
  outlierMinSuiteSize: number;
}

/** One appearance of an identity in one run. */
export interface Observation {
  runIndex: number;
  status: TestStatus;
}

/** Per-identity status history in run order. */
export interface IdentityHistory {
  identity: TestCaseIdentity;
  observations: Observation[];
}

const FAILING_STATUSES: readonly TestStatus[] = ['failed', 'error'];

/**
 * Detect flaky tests, regressions and slow outliers.
 * Runs are compared in the order given; that order is the caller's contract
 * (oldest first), so no chronological re-sorting happens here.
 */
export function detectInsights(runs: readonly TestRun[], options: DetectOptions): Insight[] {
  const histories = buildHistories(runs);

  const flaky = detectFlaky(histories);
  const regressions = detectRegressions(histories, runs);
  // Stable sort: equal identities keep run order.
  const outliers = runs
    .flatMap((run) => detectSlowOutliers(run, options))
    .sort((left, right) => compareIdentity(left.identity, right.identity));

  log.insights.debug(
    { flaky: flaky.length, regressions: regressions.length, outliers: outliers.length },
    'detected insights'
  );
  return [...flaky, ...regressions, ...outliers];
}

/** Identity-keyed status sequences; each run contributes at most one observation per identity. */
export function buildHistories(runs: readonly TestRun[]): IdentityHistory[] {
  const histories = new Map<string, IdentityHistory>();

  runs.forEach((run, runIndex) => {
    for (const suite of run.suites) {
      for (const testCase of suite.cases) {
        const key = identityKey(testCase);
        let history = histories.get(key);
        if (!history) {
          history = { identity: toIdentity(testCase), observations: [] };
          histories.set(key, history);
        }
        history.observations.push({ runIndex, status: testCase.status });
      }
    }
  });

  return [...histories.values()].sort((left, right) => compareIdentity(left.identity, right.identity));
}

/**
 * Flaky: seen in at least two runs with at least two distinct statuses, unless
 * every observation was `skipped`. A single appearance is never enough evidence.
 */
function detectFlaky(histories: readonly IdentityHistory[]): FlakyInsight[] {
  const insights: FlakyInsight[] = [];

  for (const history of histories) {
    if (history.observations.length < 2) {
      continue;
    }

    const distinct = new Set(history.observations.map((observation) => observation.status));
    if (distinct.size >= 2) {
      insights.push({
        kind: 'flaky',
        identity: history.identity,
        statusesObserved: history.observations.map((observation) => observation.status)
      });
    }
  }

  return insights;
}

/**
 * Regression: failing in the last supplied run while the immediately preceding
 * appearance passed. Only adjacent appearances are compared.
 */
function detectRegressions(histories: readonly IdentityHistory[], runs: readonly TestRun[]): RegressionInsight[] {
  const lastRunIndex = runs.length - 1;
  if (lastRunIndex < 1) {
    return [];
  }

  const insights: RegressionInsight[] = [];
  for (const history of histories) {
    const current = history.observations.at(-1);
    const baseline = history.observations.at(-2);
    if (!current || !baseline || current.runIndex !== lastRunIndex) {
      continue;
    }

    if (baseline.status === 'passed' && FAILING_STATUSES.includes(current.status)) {
      insights.push({
        kind: 'regression',
        identity: history.identity,
        baselineStatus: baseline.status,
        currentStatus: current.status,
        baselineSource: runs[baseline.runIndex]?.sourcePath ?? '',
        currentSource: runs[current.runIndex]?.sourcePath ?? ''
      });
    }
  }

  return insights;
}

/**
 * Slow outliers within each suite of one run, using the population standard
 * deviation of the suite's case durations.
 */
export function detectSlowOutliers(run: TestRun, options: DetectOptions): SlowOutlierInsight[] {
  const insights: SlowOutlierInsight[] = [];

  for (const suite of run.suites) {
    const count = suite.cases.length;
    if (count < Math.max(1, options.outlierMinSuiteSize)) {
      continue;
    }

    const durations = suite.cases.map((testCase) => testCase.durationSeconds);
    const mean = durations.reduce((sum, value) => sum + value, 0) / count;
    const variance = durations.reduce((sum, value) => sum + (value - mean) ** 2, 0) / count;
    const threshold = mean + options.outlierK * Math.sqrt(variance);

    const flagged = suite.cases
      .filter((testCase) => testCase.durationSeconds > threshold)
      .sort(compareIdentity);
    for (const testCase of flagged) {
      insights.push({
        kind: 'slow-outlier',
        identity: toIdentity(testCase),
        sourcePath: run.sourcePath,
        duration: testCase.durationSeconds,
        threshold
      });
    }
  }

  return insights;
}
