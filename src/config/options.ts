import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { ConfigError, describeError } from '../core/errors.js';

/** Chart artifact encodings the renderer can emit. */
export type ChartFormat = 'svg' | 'png';

/** Tunable values for one pipeline invocation. */
export interface PipelineOptions {
  /** Length of the slowest-cases and slowest-classes lists. */
  topN: number;
  /** Standard-deviation multiplier for slow outlier detection. */
  outlierK: number;
  /** Suites with fewer cases are exempt from outlier detection. */
  outlierMinSuiteSize: number;
  /** Deepest allowed suite nesting before a file fails with `StructureError`. */
  maxDepth: number;
  /** Upper bound on concurrent file loads. */
  concurrency: number;
  /** Bucket count of the duration histogram. */
  histogramBins: number;
  formats: ChartFormat[];
}

export const DEFAULT_PIPELINE_OPTIONS: Readonly<PipelineOptions> = {
  topN: 10,
  outlierK: 3,
  outlierMinSuiteSize: 2,
  maxDepth: 64,
  concurrency: 8,
  histogramBins: 10,
  formats: ['svg']
};

/** Merge caller overrides over defaults. `undefined` fields keep the default. */
export function resolvePipelineOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  const defaults = DEFAULT_PIPELINE_OPTIONS;
  return {
    topN: overrides.topN ?? defaults.topN,
    outlierK: overrides.outlierK ?? defaults.outlierK,
    outlierMinSuiteSize: overrides.outlierMinSuiteSize ?? defaults.outlierMinSuiteSize,
    maxDepth: overrides.maxDepth ?? defaults.maxDepth,
    concurrency: overrides.concurrency ?? defaults.concurrency,
    histogramBins: overrides.histogramBins ?? defaults.histogramBins,
    formats: [...(overrides.formats ?? defaults.formats)]
  };
}

/** Load and validate a YAML config file into option overrides. */
export async function loadPipelineConfig(filePath: string): Promise<Partial<PipelineOptions>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(filePath, `cannot read file (${describeError(error)})`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(filePath, `invalid YAML (${describeError(error)})`);
  }

  return parsePipelineConfig(filePath, parsed);
}

/** Validate a parsed config document. Keys are snake_case in the file. */
export function parsePipelineConfig(filePath: string, input: unknown): Partial<PipelineOptions> {
  if (input === null || input === undefined) {
    return {};
  }

  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new ConfigError(filePath, 'config must be a YAML object');
  }

  const obj = input as Record<string, unknown>;
  const config: Partial<PipelineOptions> = {};

  const topN = readOptionalPositiveInteger(filePath, obj, 'top_n');
  const outlierK = readOptionalNonNegativeNumber(filePath, obj, 'outlier_k');
  const outlierMinSuiteSize = readOptionalPositiveInteger(filePath, obj, 'outlier_min_suite_size');
  const maxDepth = readOptionalPositiveInteger(filePath, obj, 'max_depth');
  const concurrency = readOptionalPositiveInteger(filePath, obj, 'concurrency');
  const histogramBins = readOptionalPositiveInteger(filePath, obj, 'histogram_bins');
  const formats = readOptionalFormats(filePath, obj, 'formats');

  if (topN !== undefined) {
    config.topN = topN;
  }
  if (outlierK !== undefined) {
    config.outlierK = outlierK;
  }
  if (outlierMinSuiteSize !== undefined) {
    config.outlierMinSuiteSize = outlierMinSuiteSize;
  }
  if (maxDepth !== undefined) {
    config.maxDepth = maxDepth;
  }
  if (concurrency !== undefined) {
    config.concurrency = concurrency;
  }
  if (histogramBins !== undefined) {
    config.histogramBins = histogramBins;
  }
  if (formats !== undefined) {
    config.formats = formats;
  }

  return config;
}

/** Read an optional finite, non-negative number. */
function readOptionalNonNegativeNumber(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(filePath, `'${key}' must be a non-negative number`);
  }

  return value;
}

/** Read an optional integer greater than zero. */
function readOptionalPositiveInteger(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = readOptionalNonNegativeNumber(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(filePath, `'${key}' must be a positive integer`);
  }

  return value;
}

/** Read an optional non-empty list of chart formats. */
function readOptionalFormats(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): ChartFormat[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(filePath, `'${key}' must be a non-empty array`);
  }

  const formats: ChartFormat[] = [];
  for (const item of value) {
    if (item !== 'svg' && item !== 'png') {
      throw new ConfigError(filePath, `'${key}' entries must be 'svg' or 'png'`);
    }
    if (!formats.includes(item)) {
      formats.push(item);
    }
  }

  return formats;
}
