import { JSDOM } from 'jsdom';

import { formatIdentity, TEST_STATUSES, type StatusCounts } from '../core/model.js';
import { describeInsight, formatClassname, formatSeconds } from '../render/chart-spec.js';
import type { RenderedChart } from '../render/renderer.js';
import type { PipelineSummary } from './summary.js';

const REPORT_STYLE = `
body { font-family: Arial, sans-serif; margin: 24px; color: #212121; }
table { border-collapse: collapse; margin-bottom: 24px; }
th, td { border: 1px solid #e0e0e0; padding: 4px 8px; text-align: left; vertical-align: top; }
th { background: #f5f5f5; }
.chart { margin-bottom: 24px; }
.status-failed { color: #c62828; }
.status-error { color: #ef6c00; }
`;

/**
 * Standalone HTML page with every SVG chart inlined, followed by the input,
 * suite, class, insight and failure listings in full.
 */
export function buildHtmlReport(summary: PipelineSummary, charts: readonly RenderedChart[]): string {
  const dom = new JSDOM('<!doctype html><html><head><meta charset="utf-8"></head><body></body></html>');
  const document = dom.window.document;
  document.title = 'Test Report Insights';

  const style = document.createElement('style');
  style.textContent = REPORT_STYLE;
  document.head.appendChild(style);

  const body = document.body;
  const combined = summary.metrics.combined;
  appendElement(document, body, 'h1', 'Test Report Insights');
  const overview = appendElement(document, body, 'p');
  overview.id = 'overview';
  overview.textContent =
    `Status: ${summary.status}. ${combined.total} test cases from ${summary.metrics.runs.length} ` +
    `of ${summary.inputs.length} input file(s); pass rate ${(combined.passRate * 100).toFixed(1)}%, ` +
    `total duration ${formatSeconds(combined.totalDurationSeconds)}.`;

  appendElement(document, body, 'h2', 'Charts');
  const kinds = [...new Set(charts.map((chart) => chart.kind))];
  for (const kind of kinds) {
    const svg = charts.find((chart) => chart.kind === kind && chart.format === 'svg');
    const png = charts.find((chart) => chart.kind === kind && chart.format === 'png');
    const figure = appendElement(document, body, 'figure');
    figure.className = 'chart';
    figure.setAttribute('data-chart-kind', kind);

    if (svg && typeof svg.content === 'string') {
      figure.innerHTML = svg.content;
    } else if (png) {
      // PNG-only runs link the sibling file written next to the report.
      const image = document.createElement('img');
      image.src = png.fileName;
      image.alt = kind;
      figure.appendChild(image);
    }
  }

  appendElement(document, body, 'h2', 'Inputs');
  appendTable(
    document,
    body,
    'inputs',
    ['File', 'Outcome', 'Suites', 'Cases', 'Diagnostics'],
    summary.inputs.map((entry) => [
      entry.path,
      entry.error ? `${entry.error.kind}: ${entry.error.message}` : entry.outcome,
      `${entry.suiteCount}`,
      `${entry.caseCount}`,
      `${entry.diagnostics.length}`
    ])
  );

  appendElement(document, body, 'h2', 'Test Suites');
  appendTable(
    document,
    body,
    'suites',
    ['Suite', 'Source', 'Total', ...TEST_STATUSES, 'Pass rate', 'Duration'],
    combined.suites.map((suite) => [
      suite.name,
      suite.sourcePath,
      `${suite.total}`,
      ...countCells(suite.counts),
      `${(suite.passRate * 100).toFixed(1)}%`,
      formatSeconds(suite.totalDurationSeconds)
    ])
  );

  appendElement(document, body, 'h2', 'Test Classes');
  appendTable(
    document,
    body,
    'classes',
    ['Class', 'Total', ...TEST_STATUSES, 'Duration'],
    combined.classes.map((entry) => [
      formatClassname(entry.classname),
      `${entry.total}`,
      ...countCells(entry.counts),
      formatSeconds(entry.totalDurationSeconds)
    ])
  );

  appendElement(document, body, 'h2', 'Insights');
  if (summary.insights.length === 0) {
    appendElement(document, body, 'p', 'No flaky tests, regressions or slow outliers detected.');
  } else {
    appendTable(
      document,
      body,
      'insights',
      ['Kind', 'Test', 'Detail'],
      summary.insights.map((insight) => [insight.kind, formatIdentity(insight.identity), describeInsight(insight)])
    );
  }

  appendElement(document, body, 'h2', 'Failures');
  if (combined.failures.length === 0) {
    appendElement(document, body, 'p', 'No failed, errored or skipped tests.');
  } else {
    const table = appendTable(
      document,
      body,
      'failures',
      ['Status', 'Test', 'Source', 'Message'],
      combined.failures.map((entry) => [entry.status, formatIdentity(entry.identity), entry.sourcePath, entry.message ?? ''])
    );
    table.querySelectorAll('tbody tr').forEach((row, index) => {
      const status = combined.failures[index]?.status;
      if (status) {
        row.className = `status-${status}`;
      }
    });
  }

  const html = dom.serialize();
  dom.window.close();
  return `${html}\n`;
}

function countCells(counts: StatusCounts): string[] {
  return TEST_STATUSES.map((status) => `${counts[status]}`);
}

function appendElement(document: Document, parent: Element, tag: string, text?: string): HTMLElement {
  const element = document.createElement(tag);
  if (text !== undefined) {
    element.textContent = text;
  }
  parent.appendChild(element);
  return element;
}

function appendTable(
  document: Document,
  parent: Element,
  id: string,
  columns: readonly string[],
  rows: readonly string[][]
): HTMLElement {
  const table = appendElement(document, parent, 'table');
  table.id = id;

  const headerRow = appendElement(document, appendElement(document, table, 'thead'), 'tr');
  for (const column of columns) {
    appendElement(document, headerRow, 'th', column);
  }

  const tbody = appendElement(document, table, 'tbody');
  for (const row of rows) {
    const tr = appendElement(document, tbody, 'tr');
    for (const cell of row) {
      appendElement(document, tr, 'td', cell);
    }
  }

  return table;
}
