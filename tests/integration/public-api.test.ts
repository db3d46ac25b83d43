import { describe, expect, it } from 'vitest';

import {
  aggregateMetrics,
  buildChartSpecs,
  detectInsights,
  ParseError,
  parseReport,
  StructureError,
  type TestRun
} from '../../src/public/index.js';

const BASELINE = `<?xml version="1.0" encoding="UTF-8"?>
<testsuite name="checkout" tests="2">
  <testcase classname="shop.Cart" name="test_add" time="0.2"/>
  <testcase classname="shop.Cart" name="test_remove" time="0.3"/>
</testsuite>`;

const CURRENT = `<?xml version="1.0" encoding="UTF-8"?>
<testsuite name="checkout" tests="2" failures="1">
  <testcase classname="shop.Cart" name="test_add" time="0.2"/>
  <testcase classname="shop.Cart" name="test_remove" time="0.4">
    <failure message="cart still has 1 item"/>
  </testcase>
</testsuite>`;

function parseRun(xml: string, sourceName: string): TestRun {
  const result = parseReport(xml, { sourceName });
  if (!result.run) {
    throw new Error(`expected a run for ${sourceName}`);
  }
  return result.run;
}

describe('public API', () => {
  it('parses in-memory reports and runs the analysis stages', () => {
    const runs = [parseRun(BASELINE, 'baseline.xml'), parseRun(CURRENT, 'current.xml')];

    const metrics = aggregateMetrics(runs, { topN: 3, histogramBins: 4 });
    const insights = detectInsights(runs, { outlierK: 3, outlierMinSuiteSize: 2 });
    const specs = buildChartSpecs(metrics.combined, insights);

    expect(metrics.combined.counts).toEqual({ passed: 3, failed: 1, error: 0, skipped: 0 });
    expect(insights.map((insight) => insight.kind)).toEqual(['flaky', 'regression']);
    expect(insights[1]).toMatchObject({
      identity: { suiteName: 'checkout', classname: 'shop.Cart', name: 'test_remove' },
      baselineSource: 'baseline.xml',
      currentSource: 'current.xml'
    });
    expect(specs.map((spec) => spec.type)).toEqual(['bar', 'histogram', 'bar', 'bar', 'table', 'table']);
  });

  it('returns malformed XML as a ParseError with diagnostics', () => {
    const result = parseReport('<testsuite><testcase></testsuite>', { sourceName: 'broken.xml' });

    expect(result.run).toBeUndefined();
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.diagnostics[0]?.code).toBe('XML_NOT_WELL_FORMED');
    expect(result.diagnostics[0]?.source?.name).toBe('broken.xml');
  });

  it('returns excessive nesting as a StructureError', () => {
    const xml = `${'<testsuite name="s">'.repeat(4)}<testcase name="a"/>${'</testsuite>'.repeat(4)}`;
    const result = parseReport(xml, { maxDepth: 3 });

    expect(result.error).toBeInstanceOf(StructureError);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['UNSUPPORTED_STRUCTURE']);
  });
});
