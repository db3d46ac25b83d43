import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  DEFAULT_PIPELINE_OPTIONS,
  loadPipelineConfig,
  parsePipelineConfig,
  resolvePipelineOptions
} from '../../src/config/options.js';
import { ConfigError } from '../../src/core/errors.js';

describe('pipeline options', () => {
  it('fills unspecified fields with defaults', () => {
    expect(resolvePipelineOptions({ topN: 3 })).toEqual({ ...DEFAULT_PIPELINE_OPTIONS, topN: 3 });
    expect(resolvePipelineOptions()).toEqual({
      topN: 10,
      outlierK: 3,
      outlierMinSuiteSize: 2,
      maxDepth: 64,
      concurrency: 8,
      histogramBins: 10,
      formats: ['svg']
    });
  });

  it('maps snake_case config keys and de-duplicates formats', () => {
    expect(
      parsePipelineConfig('config.yml', {
        top_n: 5,
        outlier_k: 1.5,
        outlier_min_suite_size: 4,
        max_depth: 16,
        concurrency: 2,
        histogram_bins: 20,
        formats: ['svg', 'png', 'svg']
      })
    ).toEqual({
      topN: 5,
      outlierK: 1.5,
      outlierMinSuiteSize: 4,
      maxDepth: 16,
      concurrency: 2,
      histogramBins: 20,
      formats: ['svg', 'png']
    });
  });

  it('treats an empty document as no overrides', () => {
    expect(parsePipelineConfig('config.yml', null)).toEqual({});
  });

  it('rejects invalid values with a ConfigError naming the key', () => {
    expect(() => parsePipelineConfig('config.yml', ['top_n'])).toThrow('Config error in config.yml: config must be a YAML object');
    expect(() => parsePipelineConfig('config.yml', { top_n: 0 })).toThrow("'top_n' must be a positive integer");
    expect(() => parsePipelineConfig('config.yml', { outlier_k: -1 })).toThrow("'outlier_k' must be a non-negative number");
    expect(() => parsePipelineConfig('config.yml', { formats: ['gif'] })).toThrow(ConfigError);
    expect(() => parsePipelineConfig('config.yml', { formats: [] })).toThrow("'formats' must be a non-empty array");
  });
});

describe('config file loading', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'report-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads YAML overrides', async () => {
    const configPath = path.join(tempDir, 'insights.yml');
    await writeFile(configPath, 'top_n: 3\nformats:\n  - png\n', 'utf8');

    expect(await loadPipelineConfig(configPath)).toEqual({ topN: 3, formats: ['png'] });
  });

  it('wraps YAML syntax errors', async () => {
    const configPath = path.join(tempDir, 'broken.yml');
    await writeFile(configPath, 'top_n: [1, 2\n', 'utf8');

    await expect(loadPipelineConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
  });

  it('wraps missing files', async () => {
    await expect(loadPipelineConfig(path.join(tempDir, 'missing.yml'))).rejects.toThrow(/cannot read file/);
  });
});
