import { buildCodeHistogram, type Diagnostic, type DiagnosticHistogram, type DiagnosticSource } from '../core/diagnostics.js';
import {
  CancelledError,
  NotFoundError,
  ParseError,
  type FileError,
  type FileErrorKind
} from '../core/errors.js';
import { formatIdentity, TEST_STATUSES, type StatusCounts, type TestRun } from '../core/model.js';
import { INSIGHT_KINDS, type Insight } from '../insights/detect.js';
import type { AggregatedMetrics, MetricsSnapshot } from '../metrics/aggregate.js';
import { describeInsight, formatClassname, formatSeconds } from '../render/chart-spec.js';
import type { RenderedChart } from '../render/renderer.js';

/** Pipeline outcome: `partial` when at least one input failed. */
export type PipelineStatus = 'success' | 'partial';

/** Per-file failure as it appears in the summary. */
export interface InputErrorSummary {
  kind: FileErrorKind;
  message: string;
  source?: DiagnosticSource;
}

/** One input file and what became of it. */
export interface InputSummary {
  path: string;
  outcome: 'loaded' | 'failed';
  error?: InputErrorSummary;
  suiteCount: number;
  caseCount: number;
  diagnosticCounts: DiagnosticHistogram;
  diagnostics: readonly Diagnostic[];
}

/** Files written for one chart kind. */
export interface ChartSummary {
  kind: string;
  files: string[];
  /** Render failures that were replaced by the placeholder chart. */
  renderErrors: string[];
}

/** Machine-readable record of one invocation, written as `summary.json`. */
export interface PipelineSummary {
  status: PipelineStatus;
  inputs: InputSummary[];
  metrics: AggregatedMetrics;
  insights: Insight[];
  charts: ChartSummary[];
  /** Every artifact file name, relative to the output directory, in write order. */
  artifacts: string[];
}

/** Per-input result collected by the pipeline: a run, or the error in its place. */
export type InputResult = { path: string; run: TestRun } | { path: string; error: FileError };

export interface SummaryInput {
  inputs: readonly InputResult[];
  metrics: AggregatedMetrics;
  insights: readonly Insight[];
  charts: readonly RenderedChart[];
  artifacts: readonly string[];
}

/** Assemble the summary. Contains no wall-clock values. */
export function buildSummary(input: SummaryInput): PipelineSummary {
  const inputs = input.inputs.map(summarizeInput);
  const chartsByKind = new Map<string, ChartSummary>();
  for (const chart of input.charts) {
    let entry = chartsByKind.get(chart.kind);
    if (!entry) {
      entry = { kind: chart.kind, files: [], renderErrors: [] };
      chartsByKind.set(chart.kind, entry);
    }
    entry.files.push(chart.fileName);
    if (chart.renderError !== undefined) {
      entry.renderErrors.push(`${chart.format}: ${chart.renderError}`);
    }
  }

  return {
    status: inputs.some((entry) => entry.outcome === 'failed') ? 'partial' : 'success',
    inputs,
    metrics: input.metrics,
    insights: [...input.insights],
    charts: [...chartsByKind.values()],
    artifacts: [...input.artifacts]
  };
}

/** Summary as stable, pretty-printed JSON with a trailing newline. */
export function formatSummaryJson(summary: PipelineSummary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}

/** Human-readable companion to `summary.json`. */
export function formatSummaryMarkdown(summary: PipelineSummary): string {
  const combined = summary.metrics.combined;
  const lines: string[] = [];

  lines.push('# Test Report Insights');
  lines.push('');
  lines.push(`Status: ${summary.status}`);
  lines.push(`Inputs: ${summary.inputs.length} (${summary.metrics.runs.length} loaded)`);
  lines.push(`Test cases: ${combined.total}`);
  lines.push(`Pass rate: ${formatPercent(combined.passRate)}`);
  lines.push(`Total duration: ${formatSeconds(combined.totalDurationSeconds)}`);
  lines.push(
    `Duration percentiles: p50 ${formatSeconds(combined.durationPercentiles.p50)}, ` +
      `p90 ${formatSeconds(combined.durationPercentiles.p90)}, ` +
      `max ${formatSeconds(combined.durationPercentiles.p100)}`
  );

  lines.push('');
  lines.push('## Inputs');
  lines.push('');
  lines.push('| File | Outcome | Suites | Cases | Diagnostics |');
  lines.push('|---|---|---|---|---|');
  for (const entry of summary.inputs) {
    const outcome = entry.error ? `${entry.error.kind}: ${entry.error.message}` : entry.outcome;
    lines.push(
      `| ${escapeMarkdownTable(entry.path)} | ${escapeMarkdownTable(outcome)} | ${entry.suiteCount} | ${entry.caseCount} | ${formatHistogram(entry.diagnosticCounts)} |`
    );
  }

  lines.push('');
  lines.push('## Status Counts');
  lines.push('');
  appendStatusTable(lines, [combined, ...summary.metrics.runs]);

  lines.push('');
  lines.push('## Test Suites');
  lines.push('');
  if (combined.suites.length === 0) {
    lines.push('None.');
  } else {
    lines.push(`| Suite | File | Total | ${TEST_STATUSES.join(' | ')} | Pass rate | Duration |`);
    lines.push(`|---|---|---|${TEST_STATUSES.map(() => '---|').join('')}---|---|`);
    for (const suite of combined.suites) {
      lines.push(
        `| ${escapeMarkdownTable(suite.name)} | ${escapeMarkdownTable(suite.sourcePath)} | ${suite.total} | ${formatCounts(suite.counts)} | ${formatPercent(suite.passRate)} | ${formatSeconds(suite.totalDurationSeconds)} |`
      );
    }
  }

  lines.push('');
  lines.push('## Test Classes');
  lines.push('');
  if (combined.classes.length === 0) {
    lines.push('None.');
  } else {
    lines.push(`| Class | Total | ${TEST_STATUSES.join(' | ')} | Duration |`);
    lines.push(`|---|---|${TEST_STATUSES.map(() => '---|').join('')}---|`);
    for (const entry of combined.classes) {
      lines.push(
        `| ${escapeMarkdownTable(formatClassname(entry.classname))} | ${entry.total} | ${formatCounts(entry.counts)} | ${formatSeconds(entry.totalDurationSeconds)} |`
      );
    }
  }

  lines.push('');
  lines.push('## Slowest Test Cases');
  lines.push('');
  if (combined.slowestCases.length === 0) {
    lines.push('None.');
  } else {
    lines.push('| # | Test | Status | Duration |');
    lines.push('|---|---|---|---|');
    combined.slowestCases.forEach((entry, index) => {
      lines.push(
        `| ${index + 1} | ${escapeMarkdownTable(formatIdentity(entry.identity))} | ${entry.status} | ${formatSeconds(entry.durationSeconds)} |`
      );
    });
  }

  lines.push('');
  lines.push('## Insights');
  lines.push('');
  if (summary.insights.length === 0) {
    lines.push('None.');
  }
  for (const kind of INSIGHT_KINDS) {
    const matching = summary.insights.filter((insight) => insight.kind === kind);
    if (matching.length === 0) {
      continue;
    }
    lines.push(`### ${kind} (${matching.length})`);
    lines.push('');
    for (const insight of matching) {
      lines.push(`- ${formatIdentity(insight.identity)}: ${describeInsight(insight)}`);
    }
    lines.push('');
  }

  lines.push('## Artifacts');
  lines.push('');
  for (const artifact of summary.artifacts) {
    lines.push(`- ${artifact}`);
  }
  for (const chart of summary.charts) {
    for (const renderError of chart.renderErrors) {
      lines.push(`- ${chart.kind} rendered as placeholder (${renderError})`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/** Map a per-file failure onto its summary kind. */
export function fileErrorKind(error: FileError): FileErrorKind {
  if (error instanceof NotFoundError) {
    return 'NotFoundError';
  }
  if (error instanceof ParseError) {
    return 'ParseError';
  }
  if (error instanceof CancelledError) {
    return 'CancelledError';
  }
  return 'StructureError';
}

function summarizeInput(result: InputResult): InputSummary {
  if ('error' in result) {
    const error: InputErrorSummary = { kind: fileErrorKind(result.error), message: result.error.message };
    if (result.error instanceof ParseError && result.error.source) {
      error.source = result.error.source;
    }
    return {
      path: result.path,
      outcome: 'failed',
      error,
      suiteCount: 0,
      caseCount: 0,
      diagnosticCounts: {},
      diagnostics: []
    };
  }

  const { run } = result;
  return {
    path: result.path,
    outcome: 'loaded',
    suiteCount: run.suites.length,
    caseCount: run.suites.reduce((sum, suite) => sum + suite.cases.length, 0),
    diagnosticCounts: buildCodeHistogram(run.diagnostics),
    diagnostics: run.diagnostics
  };
}

function appendStatusTable(lines: string[], snapshots: readonly MetricsSnapshot[]): void {
  lines.push(`| Scope | Total | ${TEST_STATUSES.join(' | ')} | Pass rate |`);
  lines.push(`|---|---|${TEST_STATUSES.map(() => '---|').join('')}---|`);
  for (const snapshot of snapshots) {
    lines.push(
      `| ${escapeMarkdownTable(snapshot.scope)} | ${snapshot.total} | ${formatCounts(snapshot.counts)} | ${formatPercent(snapshot.passRate)} |`
    );
  }
}

function formatCounts(counts: StatusCounts): string {
  return TEST_STATUSES.map((status) => `${counts[status]}`).join(' | ');
}

function formatHistogram(histogram: DiagnosticHistogram): string {
  const entries = Object.entries(histogram).sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
  return entries.length === 0 ? '-' : entries.map(([code, count]) => `${code}: ${count}`).join(', ');
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/** Escape markdown table delimiters in free-form text. */
function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|');
}
