import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { NotFoundError, ParseError } from '../../src/core/errors.js';
import { expandReportPaths, loadReport, loadReports } from '../../src/loader/report-loader.js';

const fixture = (name: string): string => path.resolve('fixtures/reports', name);

describe('report loader', () => {
  it('loads a report into an XML tree', async () => {
    const report = await loadReport(fixture('run-1.xml'));

    expect(report.path).toBe(fixture('run-1.xml'));
    expect(report.tree.name).toBe('testsuites');
    expect(report.tree.children.map((child) => child.attributes.name)).toEqual(['api', 'ui']);
  });

  it('fails with NotFoundError for a missing file', async () => {
    await expect(loadReport(fixture('absent.xml'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails with ParseError carrying the source location for malformed XML', async () => {
    const error = await loadReport(fixture('malformed.xml')).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.path).toBe(fixture('malformed.xml'));
      expect(error.source?.name).toBe(fixture('malformed.xml'));
      expect(error.source?.line).toBeGreaterThan(1);
    }
  });

  it('records per-file outcomes in input order without failing the batch', async () => {
    const files = [fixture('run-2.xml'), fixture('absent.xml'), fixture('malformed.xml'), fixture('run-1.xml')];
    const outcomes = await loadReports(files, { concurrency: 2 });

    expect([...outcomes.keys()]).toEqual(files);
    expect([...outcomes.values()].map((outcome) => (outcome.ok ? 'ok' : outcome.error.name))).toEqual([
      'ok',
      'NotFoundError',
      'ParseError',
      'ok'
    ]);
  });

  it('does not start loads once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcomes = await loadReports([fixture('run-1.xml'), fixture('run-2.xml')], { signal: controller.signal });
    expect([...outcomes.values()].map((outcome) => (outcome.ok ? 'ok' : outcome.error.name))).toEqual([
      'CancelledError',
      'CancelledError'
    ]);
  });

  it('expands directories into sorted report files', async () => {
    expect(await expandReportPaths([fixture('nested')])).toEqual([fixture('nested/nested-suites.xml')]);
    expect(await expandReportPaths([path.resolve('fixtures/reports')])).toEqual([
      fixture('attribute-status.xml'),
      fixture('malformed.xml'),
      fixture('nested/nested-suites.xml'),
      fixture('run-1.xml'),
      fixture('run-2.xml')
    ]);
  });

  it('passes files and missing paths through untouched', async () => {
    expect(await expandReportPaths([fixture('run-2.xml'), fixture('absent.xml')])).toEqual([
      fixture('run-2.xml'),
      fixture('absent.xml')
    ]);
  });
});
