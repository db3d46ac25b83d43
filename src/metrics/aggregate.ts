import { log } from '../core/logger.js';
import {
  compareIdentity,
  compareText,
  countStatuses,
  emptyStatusCounts,
  TEST_STATUSES,
  toIdentity,
  type StatusCounts,
  type TestCaseIdentity,
  type TestRun,
  type TestStatus
} from '../core/model.js';

/** Share of cases per status; every rate is 0 when there are no cases. */
export type StatusRates = Record<TestStatus, number>;

/** Nearest-rank duration percentiles in seconds. */
export interface DurationPercentiles {
  p50: number;
  p90: number;
  p100: number;
}

/** One entry of a slowest-cases list. */
export interface RankedCase {
  identity: TestCaseIdentity;
  sourcePath: string;
  status: TestStatus;
  durationSeconds: number;
}

/** Per-suite statistics. */
export interface SuiteMetrics {
  name: string;
  sourcePath: string;
  total: number;
  counts: StatusCounts;
  passRate: number;
  totalDurationSeconds: number;
}

/** Rollup of every case sharing one `classname`. */
export interface ClassMetrics {
  classname: string;
  total: number;
  counts: StatusCounts;
  totalDurationSeconds: number;
}

/** One equal-width duration bucket; `upper` is inclusive only for the last bucket. */
export interface HistogramBin {
  lower: number;
  upper: number;
  count: number;
}

/** Failed, errored or skipped case with the message the report gave for it. */
export interface FailureEntry {
  identity: TestCaseIdentity;
  sourcePath: string;
  status: TestStatus;
  message?: string;
}

/** Derived statistics for one run, or pooled over several. */
export interface MetricsSnapshot {
  /** Source path for a per-run snapshot, `combined` for the pooled one. */
  scope: string;
  runCount: number;
  suiteCount: number;
  total: number;
  counts: StatusCounts;
  rates: StatusRates;
  passRate: number;
  totalDurationSeconds: number;
  durationPercentiles: DurationPercentiles;
  slowestCases: RankedCase[];
  slowestClasses: ClassMetrics[];
  /** Every classname with its status breakdown, ordered by classname. */
  classes: ClassMetrics[];
  durationHistogram: HistogramBin[];
  failures: FailureEntry[];
  suites: SuiteMetrics[];
}

/** Per-run snapshots in input order plus the pooled snapshot. */
export interface AggregatedMetrics {
  runs: MetricsSnapshot[];
  combined: MetricsSnapshot;
}

export interface AggregateOptions {
  /** Length of the slowest-cases and slowest-classes lists. */
  topN: number;
  /** Bucket count of the duration histogram. */
  histogramBins: number;
}

export const COMBINED_SCOPE = 'combined';

/** Ranked case plus the run position used as the final tie-break. */
export interface OrderedCase extends RankedCase {
  runIndex: number;
  message?: string;
}

const DEFAULT_HISTOGRAM_BINS = 10;

/**
 * Compute one snapshot per run and one pooled snapshot. The pooled snapshot sums
 * counts and durations over every case rather than averaging per-run figures.
 */
export function aggregateMetrics(runs: readonly TestRun[], options: AggregateOptions): AggregatedMetrics {
  const perRun = runs.map((run) => computeSnapshot([run], options, run.sourcePath));
  const combined = computeSnapshot(runs, options, COMBINED_SCOPE);

  log.metrics.debug({ runs: runs.length, cases: combined.total }, 'aggregated metrics');
  return { runs: perRun, combined };
}

/** Compute a snapshot over every case of `runs`, pooled. */
export function computeSnapshot(
  runs: readonly TestRun[],
  options: AggregateOptions,
  scope: string
): MetricsSnapshot {
  const cases: OrderedCase[] = [];
  const suites: SuiteMetrics[] = [];

  runs.forEach((run, runIndex) => {
    for (const suite of run.suites) {
      suites.push({
        name: suite.name,
        sourcePath: run.sourcePath,
        total: suite.cases.length,
        counts: { ...suite.statusCounts },
        passRate: ratio(suite.statusCounts.passed, suite.cases.length),
        totalDurationSeconds: suite.totalDurationSeconds
      });

      for (const testCase of suite.cases) {
        cases.push({
          identity: toIdentity(testCase),
          sourcePath: run.sourcePath,
          status: testCase.status,
          durationSeconds: testCase.durationSeconds,
          runIndex,
          message: testCase.status === 'skipped' ? testCase.skippedMessage : testCase.failureMessage
        });
      }
    }
  });

  const counts = countStatuses(cases);
  const total = cases.length;
  const classes = rollupClasses(cases);
  const sortedDurations = cases.map((entry) => entry.durationSeconds).sort((left, right) => left - right);

  return {
    scope,
    runCount: runs.length,
    suiteCount: suites.length,
    total,
    counts,
    rates: computeRates(counts, total),
    passRate: ratio(counts.passed, total),
    totalDurationSeconds: cases.reduce((sum, entry) => sum + entry.durationSeconds, 0),
    durationPercentiles: {
      p50: percentile(sortedDurations, 50),
      p90: percentile(sortedDurations, 90),
      p100: percentile(sortedDurations, 100)
    },
    slowestCases: slowestCases(cases, options.topN),
    slowestClasses: slowestClasses(classes, options.topN),
    classes,
    durationHistogram: buildHistogram(sortedDurations, options.histogramBins),
    failures: collectFailures(cases),
    suites
  };
}

/**
 * Nearest-rank percentile over an ascending list: `sorted[ceil(p·n/100) − 1]`.
 * Returns 0 for an empty list.
 */
export function percentile(sortedAscending: readonly number[], percent: number): number {
  if (sortedAscending.length === 0) {
    return 0;
  }

  const rank = Math.ceil((percent * sortedAscending.length) / 100);
  const index = Math.min(sortedAscending.length - 1, Math.max(0, rank - 1));
  return sortedAscending[index] ?? 0;
}

/** Status shares; all zero when `total` is zero. */
export function computeRates(counts: StatusCounts, total: number): StatusRates {
  const rates = emptyStatusCounts();
  for (const status of TEST_STATUSES) {
    rates[status] = ratio(counts[status], total);
  }
  return rates;
}

/**
 * Top `topN` cases by duration, descending. Ties fall back to identity order and
 * then run order, so the list is reproducible for a given input set.
 */
export function slowestCases(cases: readonly OrderedCase[], topN: number): RankedCase[] {
  return [...cases]
    .sort(
      (left, right) =>
        right.durationSeconds - left.durationSeconds ||
        compareIdentity(left.identity, right.identity) ||
        left.runIndex - right.runIndex
    )
    .slice(0, Math.max(0, topN))
    .map(({ identity, sourcePath, status, durationSeconds }) => ({ identity, sourcePath, status, durationSeconds }));
}

/** One rollup per classname, ordered by classname. */
function rollupClasses(cases: readonly OrderedCase[]): ClassMetrics[] {
  const byClass = new Map<string, ClassMetrics>();

  for (const entry of cases) {
    const classname = entry.identity.classname;
    let rollup = byClass.get(classname);
    if (!rollup) {
      rollup = { classname, total: 0, counts: emptyStatusCounts(), totalDurationSeconds: 0 };
      byClass.set(classname, rollup);
    }

    rollup.total += 1;
    rollup.counts[entry.status] += 1;
    rollup.totalDurationSeconds += entry.durationSeconds;
  }

  return [...byClass.values()].sort((left, right) => compareText(left.classname, right.classname));
}

/** Top `topN` classnames by summed duration, ties by classname. */
function slowestClasses(classes: readonly ClassMetrics[], topN: number): ClassMetrics[] {
  return [...classes]
    .sort(
      (left, right) =>
        right.totalDurationSeconds - left.totalDurationSeconds || compareText(left.classname, right.classname)
    )
    .slice(0, Math.max(0, topN));
}

/**
 * Equal-width buckets over `[0, max]`. When every duration is 0 a single
 * zero-width bucket holds them all.
 */
export function buildHistogram(sortedAscending: readonly number[], requestedBins: number): HistogramBin[] {
  if (sortedAscending.length === 0) {
    return [];
  }

  const max = sortedAscending.at(-1) ?? 0;
  if (max <= 0) {
    return [{ lower: 0, upper: 0, count: sortedAscending.length }];
  }

  const binCount = Number.isInteger(requestedBins) && requestedBins > 0 ? requestedBins : DEFAULT_HISTOGRAM_BINS;
  const width = max / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, index) => ({
    lower: index * width,
    upper: index === binCount - 1 ? max : (index + 1) * width,
    count: 0
  }));

  for (const duration of sortedAscending) {
    const index = Math.min(binCount - 1, Math.floor(duration / width));
    const bin = bins[index];
    if (bin) {
      bin.count += 1;
    }
  }

  return bins;
}

/** Non-passing cases ordered by status category, then identity, then run. */
function collectFailures(cases: readonly OrderedCase[]): FailureEntry[] {
  return cases
    .filter((entry) => entry.status !== 'passed')
    .sort(
      (left, right) =>
        TEST_STATUSES.indexOf(left.status) - TEST_STATUSES.indexOf(right.status) ||
        compareIdentity(left.identity, right.identity) ||
        left.runIndex - right.runIndex
    )
    .map(({ identity, sourcePath, status, message }) =>
      message === undefined ? { identity, sourcePath, status } : { identity, sourcePath, status, message }
    );
}

function ratio(part: number, total: number): number {
  return total === 0 ? 0 : part / total;
}
