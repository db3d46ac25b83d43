import type { Diagnostic } from '../core/diagnostics.js';
import { describeError, ParseError, StructureError } from '../core/errors.js';
import type { TestRun } from '../core/model.js';
import { parseXmlToAst, XmlParseError, type XmlNode } from '../loader/xml-ast.js';
import { buildTestRun, DEFAULT_MAX_DEPTH } from '../model/model-builder.js';

/** In-memory parse configuration. */
export interface ParseReportOptions {
  sourceName?: string;
  maxDepth?: number;
}

/** Parse return envelope with diagnostics-first reporting. */
export interface ParseReportResult {
  run?: TestRun;
  diagnostics: readonly Diagnostic[];
  error?: ParseError | StructureError;
}

/**
 * Parse report XML already held in memory into a `TestRun`.
 * Malformed XML and unsupported structure come back as `error` rather than throwing.
 */
export function parseReport(xmlText: string, options: ParseReportOptions = {}): ParseReportResult {
  const sourceName = options.sourceName ?? 'input.xml';

  let tree: XmlNode;
  try {
    tree = parseXmlToAst(xmlText, sourceName);
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }
    const source = error.source ? { name: sourceName, ...error.source } : undefined;
    return {
      diagnostics: [{ code: 'XML_NOT_WELL_FORMED', severity: 'error', message: error.message, source }],
      error: new ParseError(sourceName, error.message, source)
    };
  }

  try {
    const run = buildTestRun(tree, { sourcePath: sourceName, maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH });
    return { run, diagnostics: run.diagnostics };
  } catch (error) {
    if (!(error instanceof StructureError)) {
      throw error;
    }
    return {
      diagnostics: [{ code: 'UNSUPPORTED_STRUCTURE', severity: 'error', message: describeError(error) }],
      error
    };
  }
}

export type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export {
  CancelledError,
  ConfigError,
  NoUsableInputError,
  NotFoundError,
  ParseError,
  PipelineCancelledError,
  StructureError,
  WriteError,
  type FileError,
  type FileErrorKind
} from '../core/errors.js';
export {
  TEST_STATUSES,
  compareIdentity,
  formatIdentity,
  type StatusCounts,
  type TestCase,
  type TestCaseIdentity,
  type TestRun,
  type TestStatus,
  type TestSuite
} from '../core/model.js';
export {
  DEFAULT_PIPELINE_OPTIONS,
  loadPipelineConfig,
  resolvePipelineOptions,
  type ChartFormat,
  type PipelineOptions
} from '../config/options.js';
export { loadReport, loadReports, expandReportPaths, type LoadOutcome, type LoadedReport } from '../loader/report-loader.js';
export { buildTestRun, type BuildOptions } from '../model/model-builder.js';
export {
  aggregateMetrics,
  percentile,
  type AggregatedMetrics,
  type MetricsSnapshot,
  type RankedCase
} from '../metrics/aggregate.js';
export {
  detectInsights,
  type FlakyInsight,
  type Insight,
  type RegressionInsight,
  type SlowOutlierInsight
} from '../insights/detect.js';
export { CHART_KINDS, STATUS_COLORS, buildChartSpecs, type ChartKind, type ChartSpec } from '../render/chart-spec.js';
export {
  PngChartRenderer,
  SvgChartRenderer,
  renderChart,
  type ChartRenderer,
  type RenderedChart
} from '../render/renderer.js';
export { writeArtifacts, type Artifact } from '../output/output-writer.js';
export type { PipelineStatus, PipelineSummary } from '../output/summary.js';
export { runPipeline, type PipelineRequest, type PipelineResult } from '../pipeline/pipeline.js';
