import path from 'node:path';

import { resolvePipelineOptions, type PipelineOptions } from '../config/options.js';
import { NoUsableInputError, PipelineCancelledError, StructureError, type FileError } from '../core/errors.js';
import { createTimer, log } from '../core/logger.js';
import type { TestRun } from '../core/model.js';
import { detectInsights } from '../insights/detect.js';
import { loadReports } from '../loader/report-loader.js';
import { aggregateMetrics } from '../metrics/aggregate.js';
import { buildTestRun } from '../model/model-builder.js';
import { buildHtmlReport } from '../output/html-report.js';
import { writeArtifacts, type Artifact } from '../output/output-writer.js';
import {
  buildSummary,
  formatSummaryJson,
  formatSummaryMarkdown,
  type InputResult,
  type PipelineStatus,
  type PipelineSummary
} from '../output/summary.js';
import { buildChartSpecs } from '../render/chart-spec.js';
import { createRenderer, renderChart, type ChartRenderer, type RenderedChart } from '../render/renderer.js';

export const SUMMARY_JSON_FILE = 'summary.json';
export const SUMMARY_MARKDOWN_FILE = 'summary.md';
export const HTML_REPORT_FILE = 'report.html';

/** One pipeline invocation. */
export interface PipelineRequest {
  /** Report files, oldest run first. Duplicates are collapsed. */
  files: readonly string[];
  outputDir: string;
  options?: Partial<PipelineOptions>;
  /** Aborting stops new loads and prevents any output from being written. */
  signal?: AbortSignal;
  /** Chart renderers; defaults to one per configured format. */
  renderers?: readonly ChartRenderer[];
  /** Clock override for run load times. */
  now?: () => Date;
}

export interface PipelineResult {
  status: PipelineStatus;
  /** Written file paths in write order. */
  artifacts: string[];
  summary: PipelineSummary;
}

/**
 * Load → build → aggregate → detect → render → write.
 *
 * Every input is loaded and built before anything downstream runs. Per-file
 * failures are recorded in the summary; the invocation only fails when no run
 * could be built (`NoUsableInputError`), when writing fails (`WriteError`), or
 * when the caller aborts (`PipelineCancelledError`). The first and last leave
 * the output directory untouched.
 */
export async function runPipeline(request: PipelineRequest): Promise<PipelineResult> {
  const options = resolvePipelineOptions(request.options);
  const { signal } = request;
  const files = dedupePaths(request.files);
  const totalTimer = createTimer();

  if (files.length === 0) {
    throw new NoUsableInputError([]);
  }
  throwIfAborted(signal);

  const loadTimer = createTimer();
  const outcomes = await loadReports(files, { concurrency: options.concurrency, signal });
  throwIfAborted(signal);
  log.pipeline.debug({ files: files.length, duration: loadTimer() }, 'load stage complete');

  const inputs: InputResult[] = [];
  const runs: TestRun[] = [];
  const failures: FileError[] = [];
  for (const filePath of files) {
    const outcome = outcomes.get(filePath);
    if (!outcome) {
      continue;
    }

    if (!outcome.ok) {
      inputs.push({ path: filePath, error: outcome.error });
      failures.push(outcome.error);
      continue;
    }

    try {
      const run = buildTestRun(outcome.report.tree, {
        sourcePath: filePath,
        maxDepth: options.maxDepth,
        now: request.now
      });
      inputs.push({ path: filePath, run });
      runs.push(run);
    } catch (error) {
      if (!(error instanceof StructureError)) {
        throw error;
      }
      log.pipeline.warn({ path: filePath, error: error.message }, 'report structure rejected');
      inputs.push({ path: filePath, error });
      failures.push(error);
    }
  }

  if (runs.length === 0) {
    throw new NoUsableInputError(failures);
  }

  const metrics = aggregateMetrics(runs, { topN: options.topN, histogramBins: options.histogramBins });
  const insights = detectInsights(runs, {
    outlierK: options.outlierK,
    outlierMinSuiteSize: options.outlierMinSuiteSize
  });

  const renderTimer = createTimer();
  const renderers = request.renderers ?? options.formats.map(createRenderer);
  const specs = buildChartSpecs(metrics.combined, insights);
  const charts: RenderedChart[] = specs.flatMap((spec) => renderers.map((renderer) => renderChart(renderer, spec)));
  log.pipeline.debug({ charts: charts.length, duration: renderTimer() }, 'render stage complete');

  const summary = buildSummary({
    inputs,
    metrics,
    insights,
    charts,
    artifacts: [...charts.map((chart) => chart.fileName), SUMMARY_JSON_FILE, SUMMARY_MARKDOWN_FILE, HTML_REPORT_FILE]
  });

  const artifacts: Artifact[] = [
    ...charts.map((chart) => ({ fileName: chart.fileName, content: chart.content })),
    { fileName: SUMMARY_JSON_FILE, content: formatSummaryJson(summary) },
    { fileName: SUMMARY_MARKDOWN_FILE, content: formatSummaryMarkdown(summary) },
    { fileName: HTML_REPORT_FILE, content: buildHtmlReport(summary, charts) }
  ];

  throwIfAborted(signal);
  const written = await writeArtifacts(request.outputDir, artifacts);

  log.pipeline.info(
    {
      status: summary.status,
      runs: runs.length,
      failedInputs: failures.length,
      insights: insights.length,
      duration: totalTimer()
    },
    'pipeline complete'
  );
  return { status: summary.status, artifacts: written, summary };
}

/** Drop repeated paths (compared after resolution), keeping the first spelling and position. */
export function dedupePaths(files: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const file of files) {
    const key = path.resolve(file);
    if (seen.has(key)) {
      log.pipeline.warn({ path: file }, 'duplicate input path ignored');
      continue;
    }
    seen.add(key);
    unique.push(file);
  }

  return unique;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
}
