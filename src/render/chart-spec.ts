import type { Insight } from '../insights/detect.js';
import { formatIdentity, TEST_STATUSES, type TestStatus } from '../core/model.js';
import type { HistogramBin, MetricsSnapshot } from '../metrics/aggregate.js';

/** Chart kinds in the order they are rendered and written. */
export const CHART_KINDS = [
  'status-distribution',
  'duration-distribution',
  'slowest-cases',
  'slowest-classes',
  'insights',
  'failures'
] as const;

export type ChartKind = (typeof CHART_KINDS)[number];

/** Fill color per status, shared by every chart that encodes status. */
export const STATUS_COLORS: Readonly<Record<TestStatus, string>> = {
  passed: '#2e7d32',
  failed: '#c62828',
  error: '#ef6c00',
  skipped: '#9e9e9e'
};

/** Fill for bars that do not encode a status. */
export const NEUTRAL_COLOR = '#1565c0';

export const NO_DATA_MESSAGE = 'No data';

interface ChartSpecBase {
  kind: ChartKind;
  title: string;
}

/** One bar; `key` is stable across runs and is what tests address bars by. */
export interface BarDatum {
  key: string;
  label: string;
  value: number;
  /** Text drawn next to the bar. */
  valueText: string;
  color: string;
}

export interface BarChartSpec extends ChartSpecBase {
  type: 'bar';
  orientation: 'vertical' | 'horizontal';
  valueLabel: string;
  bars: BarDatum[];
}

export interface HistogramSpec extends ChartSpecBase {
  type: 'histogram';
  valueLabel: string;
  color: string;
  bins: HistogramBin[];
}

export interface TableSpec extends ChartSpecBase {
  type: 'table';
  columns: string[];
  rows: string[][];
  /** Rows left out because of the row cap. */
  omittedRows: number;
}

export interface PlaceholderSpec extends ChartSpecBase {
  type: 'placeholder';
  message: string;
}

export type ChartSpec = BarChartSpec | HistogramSpec | TableSpec | PlaceholderSpec;

export interface ChartSpecOptions {
  /** Listing charts show at most this many rows. */
  maxTableRows?: number;
}

export const DEFAULT_MAX_TABLE_ROWS = 50;

const CHART_TITLES: Readonly<Record<ChartKind, string>> = {
  'status-distribution': 'Test status distribution',
  'duration-distribution': 'Test duration distribution',
  'slowest-cases': 'Slowest test cases',
  'slowest-classes': 'Slowest test classes',
  insights: 'Flaky tests, regressions and slow outliers',
  failures: 'Failed, errored and skipped tests'
};

/**
 * Derive one chart spec per kind, in `CHART_KINDS` order, from the combined
 * snapshot and the detected insights. Empty inputs become placeholders.
 */
export function buildChartSpecs(
  combined: MetricsSnapshot,
  insights: readonly Insight[],
  options: ChartSpecOptions = {}
): ChartSpec[] {
  const maxRows = options.maxTableRows ?? DEFAULT_MAX_TABLE_ROWS;

  return CHART_KINDS.map((kind): ChartSpec => {
    switch (kind) {
      case 'status-distribution':
        return buildStatusChart(combined);
      case 'duration-distribution':
        return buildDurationChart(combined);
      case 'slowest-cases':
        return buildSlowestCasesChart(combined);
      case 'slowest-classes':
        return buildSlowestClassesChart(combined);
      case 'insights':
        return buildInsightsTable(insights, maxRows);
      case 'failures':
        return buildFailuresTable(combined, maxRows);
    }
  });
}

/** Placeholder spec for `kind`; used for empty data and for failed renders. */
export function placeholderSpec(kind: ChartKind, message: string = NO_DATA_MESSAGE): PlaceholderSpec {
  return { kind, title: CHART_TITLES[kind], type: 'placeholder', message };
}

/** Fixed two-decimal seconds, e.g. `1.50s`. */
export function formatSeconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

function buildStatusChart(combined: MetricsSnapshot): ChartSpec {
  const kind = 'status-distribution';
  if (combined.total === 0) {
    return placeholderSpec(kind);
  }

  return {
    kind,
    title: CHART_TITLES[kind],
    type: 'bar',
    orientation: 'vertical',
    valueLabel: 'Test cases',
    bars: TEST_STATUSES.map((status) => ({
      key: status,
      label: status,
      value: combined.counts[status],
      valueText: `${combined.counts[status]} (${(combined.rates[status] * 100).toFixed(1)}%)`,
      color: STATUS_COLORS[status]
    }))
  };
}

function buildDurationChart(combined: MetricsSnapshot): ChartSpec {
  const kind = 'duration-distribution';
  if (combined.durationHistogram.length === 0) {
    return placeholderSpec(kind);
  }

  return {
    kind,
    title: CHART_TITLES[kind],
    type: 'histogram',
    valueLabel: 'Test cases',
    color: NEUTRAL_COLOR,
    bins: combined.durationHistogram.map((bin) => ({ ...bin }))
  };
}

function buildSlowestCasesChart(combined: MetricsSnapshot): ChartSpec {
  const kind = 'slowest-cases';
  if (combined.slowestCases.length === 0) {
    return placeholderSpec(kind);
  }

  return {
    kind,
    title: CHART_TITLES[kind],
    type: 'bar',
    orientation: 'horizontal',
    valueLabel: 'Duration (seconds)',
    bars: combined.slowestCases.map((entry, index) => ({
      key: `${index + 1}`,
      label: formatIdentity(entry.identity),
      value: entry.durationSeconds,
      valueText: formatSeconds(entry.durationSeconds),
      color: STATUS_COLORS[entry.status]
    }))
  };
}

function buildSlowestClassesChart(combined: MetricsSnapshot): ChartSpec {
  const kind = 'slowest-classes';
  if (combined.slowestClasses.length === 0) {
    return placeholderSpec(kind);
  }

  return {
    kind,
    title: CHART_TITLES[kind],
    type: 'bar',
    orientation: 'horizontal',
    valueLabel: 'Total duration (seconds)',
    bars: combined.slowestClasses.map((entry, index) => ({
      key: `${index + 1}`,
      label: formatClassname(entry.classname),
      value: entry.totalDurationSeconds,
      valueText: `${formatSeconds(entry.totalDurationSeconds)} / ${entry.total} cases`,
      color: NEUTRAL_COLOR
    }))
  };
}

function buildInsightsTable(insights: readonly Insight[], maxRows: number): ChartSpec {
  const kind = 'insights';
  if (insights.length === 0) {
    return placeholderSpec(kind);
  }

  const rows = insights.map((insight) => [insight.kind, formatIdentity(insight.identity), describeInsight(insight)]);
  return limitRows(
    {
      kind,
      title: CHART_TITLES[kind],
      type: 'table',
      columns: ['Kind', 'Test', 'Detail'],
      rows,
      omittedRows: 0
    },
    maxRows
  );
}

function buildFailuresTable(combined: MetricsSnapshot, maxRows: number): ChartSpec {
  const kind = 'failures';
  if (combined.failures.length === 0) {
    return placeholderSpec(kind);
  }

  const rows = combined.failures.map((entry) => [
    entry.status,
    formatIdentity(entry.identity),
    entry.message ?? ''
  ]);
  return limitRows(
    {
      kind,
      title: CHART_TITLES[kind],
      type: 'table',
      columns: ['Status', 'Test', 'Message'],
      rows,
      omittedRows: 0
    },
    maxRows
  );
}

/** Display name for a class rollup; cases without a classname share one row. */
export function formatClassname(classname: string): string {
  return classname || '(no classname)';
}

/** One-line explanation of an insight for listings. */
export function describeInsight(insight: Insight): string {
  switch (insight.kind) {
    case 'flaky':
      return `statuses: ${insight.statusesObserved.join(' -> ')}`;
    case 'regression':
      return `${insight.baselineStatus} -> ${insight.currentStatus}`;
    case 'slow-outlier':
      return `${formatSeconds(insight.duration)} > ${formatSeconds(insight.threshold)} in ${insight.sourcePath}`;
  }
}

function limitRows(spec: TableSpec, maxRows: number): TableSpec {
  const limit = Math.max(1, maxRows);
  if (spec.rows.length <= limit) {
    return spec;
  }

  return { ...spec, rows: spec.rows.slice(0, limit), omittedRows: spec.rows.length - limit };
}
