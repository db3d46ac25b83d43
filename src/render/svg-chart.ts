import { JSDOM } from 'jsdom';

import type { BarChartSpec, ChartSpec, HistogramSpec, PlaceholderSpec, TableSpec } from './chart-spec.js';

export const SVG_NS = 'http://www.w3.org/2000/svg';

const CHART_WIDTH = 760;
const TITLE_BASELINE = 28;
const PLOT_TOP = 48;
const FONT_FAMILY = 'Arial, sans-serif';
const TEXT_COLOR = '#212121';
const AXIS_COLOR = '#616161';
const GRID_BACKGROUND = '#f5f5f5';
/** Rough glyph advance at 12px, used to size label truncation. */
const APPROX_CHAR_WIDTH = 6.5;

const VERTICAL_LAYOUT = { left: 64, right: 24, bottom: 72, plotHeight: 240 };
const HORIZONTAL_LAYOUT = { labelWidth: 300, valueWidth: 140, rowHeight: 26, bottom: 24 };
const TABLE_LAYOUT = { left: 16, right: 16, rowHeight: 20, bottom: 16 };

type AttributeValue = string | number;

/** Drawing surface for one chart; owns the jsdom window until `serialize` closes it. */
interface SvgCanvas {
  dom: JSDOM;
  document: Document;
  root: Element;
}

/**
 * Draw a chart spec as a standalone SVG document.
 * Output is a pure function of the spec: no ids, clocks or random values, and
 * every coordinate goes through the same fixed-precision formatting.
 */
export function renderChartSvg(spec: ChartSpec): string {
  switch (spec.type) {
    case 'bar':
      return spec.orientation === 'vertical' ? drawVerticalBars(spec) : drawHorizontalBars(spec);
    case 'histogram':
      return drawHistogram(spec);
    case 'table':
      return drawTable(spec);
    case 'placeholder':
      return drawPlaceholder(spec);
  }
}

function drawVerticalBars(spec: BarChartSpec): string {
  const layout = VERTICAL_LAYOUT;
  const height = PLOT_TOP + layout.plotHeight + layout.bottom;
  const canvas = createCanvas(spec, height);
  const plotWidth = CHART_WIDTH - layout.left - layout.right;
  const baseline = PLOT_TOP + layout.plotHeight;
  const scaleMax = Math.max(0, ...spec.bars.map((bar) => bar.value)) || 1;
  const band = plotWidth / Math.max(1, spec.bars.length);
  const barWidth = band * 0.7;

  drawAxes(canvas, layout.left, baseline, plotWidth, layout.plotHeight, spec.valueLabel);

  spec.bars.forEach((bar, index) => {
    const barHeight = (bar.value / scaleMax) * layout.plotHeight;
    const x = layout.left + index * band + (band - barWidth) / 2;
    const centerX = x + barWidth / 2;

    appendElement(canvas, canvas.root, 'rect', {
      class: 'bar',
      x: formatCoordinate(x),
      y: formatCoordinate(baseline - barHeight),
      width: formatCoordinate(barWidth),
      height: formatCoordinate(barHeight),
      fill: bar.color,
      'data-key': bar.key,
      'data-label': bar.label,
      'data-value': formatValue(bar.value)
    });
    appendText(canvas, centerX, baseline - barHeight - 6, bar.valueText, { class: 'bar-value', 'text-anchor': 'middle' });
    appendText(canvas, centerX, baseline + 18, truncateLabel(bar.label, Math.floor(band / APPROX_CHAR_WIDTH)), {
      class: 'bar-label',
      'text-anchor': 'middle'
    });
  });

  return serialize(canvas);
}

function drawHistogram(spec: HistogramSpec): string {
  const layout = VERTICAL_LAYOUT;
  const height = PLOT_TOP + layout.plotHeight + layout.bottom;
  const canvas = createCanvas(spec, height);
  const plotWidth = CHART_WIDTH - layout.left - layout.right;
  const baseline = PLOT_TOP + layout.plotHeight;
  const scaleMax = Math.max(0, ...spec.bins.map((bin) => bin.count)) || 1;
  const band = plotWidth / Math.max(1, spec.bins.length);

  drawAxes(canvas, layout.left, baseline, plotWidth, layout.plotHeight, spec.valueLabel);

  spec.bins.forEach((bin, index) => {
    const barHeight = (bin.count / scaleMax) * layout.plotHeight;
    const x = layout.left + index * band;
    const range = `${bin.lower.toFixed(2)}-${bin.upper.toFixed(2)}s`;

    appendElement(canvas, canvas.root, 'rect', {
      class: 'bin',
      x: formatCoordinate(x),
      y: formatCoordinate(baseline - barHeight),
      width: formatCoordinate(Math.max(0, band - 1)),
      height: formatCoordinate(barHeight),
      fill: spec.color,
      'data-range': range,
      'data-value': formatValue(bin.count)
    });
    if (bin.count > 0) {
      appendText(canvas, x + band / 2, baseline - barHeight - 6, `${bin.count}`, {
        class: 'bar-value',
        'text-anchor': 'middle'
      });
    }
    // Alternate rows keep adjacent range labels from overlapping.
    appendText(canvas, x + band / 2, baseline + (index % 2 === 0 ? 16 : 30), range, {
      class: 'bin-label',
      'text-anchor': 'middle',
      'font-size': 10
    });
  });

  return serialize(canvas);
}

function drawHorizontalBars(spec: BarChartSpec): string {
  const layout = HORIZONTAL_LAYOUT;
  const height = PLOT_TOP + spec.bars.length * layout.rowHeight + layout.bottom;
  const canvas = createCanvas(spec, height);
  const barLeft = 16 + layout.labelWidth;
  const barSpan = CHART_WIDTH - barLeft - layout.valueWidth;
  const scaleMax = Math.max(0, ...spec.bars.map((bar) => bar.value)) || 1;
  const labelChars = Math.floor(layout.labelWidth / APPROX_CHAR_WIDTH);

  spec.bars.forEach((bar, index) => {
    const rowTop = PLOT_TOP + index * layout.rowHeight;
    const barWidth = (bar.value / scaleMax) * barSpan;

    appendText(canvas, barLeft - 8, rowTop + 17, truncateLabel(bar.label, labelChars), {
      class: 'bar-label',
      'text-anchor': 'end'
    });
    appendElement(canvas, canvas.root, 'rect', {
      class: 'bar',
      x: formatCoordinate(barLeft),
      y: formatCoordinate(rowTop + 4),
      width: formatCoordinate(barWidth),
      height: formatCoordinate(layout.rowHeight - 8),
      fill: bar.color,
      'data-key': bar.key,
      'data-label': bar.label,
      'data-value': formatValue(bar.value)
    });
    appendText(canvas, barLeft + barWidth + 6, rowTop + 17, bar.valueText, { class: 'bar-value' });
  });

  appendText(canvas, barLeft, height - 6, spec.valueLabel, { class: 'axis-label', fill: AXIS_COLOR });
  return serialize(canvas);
}

function drawTable(spec: TableSpec): string {
  const layout = TABLE_LAYOUT;
  const footerRows = spec.omittedRows > 0 ? 1 : 0;
  const height = PLOT_TOP + (spec.rows.length + 1 + footerRows) * layout.rowHeight + layout.bottom;
  const canvas = createCanvas(spec, height);
  const tableWidth = CHART_WIDTH - layout.left - layout.right;
  const columnWidths = tableColumnWidths(spec.columns.length, tableWidth);

  const drawRow = (cells: readonly string[], rowIndex: number, header: boolean): void => {
    const rowTop = PLOT_TOP + rowIndex * layout.rowHeight;
    if (header || rowIndex % 2 === 0) {
      appendElement(canvas, canvas.root, 'rect', {
        x: layout.left,
        y: formatCoordinate(rowTop),
        width: tableWidth,
        height: layout.rowHeight,
        fill: header ? '#e0e0e0' : GRID_BACKGROUND
      });
    }

    const group = appendElement(canvas, canvas.root, 'g', {
      class: header ? 'table-header' : 'table-row',
      ...(header ? {} : { 'data-row': rowIndex - 1 })
    });
    let x = layout.left + 6;
    cells.forEach((cell, columnIndex) => {
      const width = columnWidths[columnIndex] ?? 0;
      const text = appendText(canvas, x, rowTop + 14, truncateLabel(cell, Math.floor((width - 8) / APPROX_CHAR_WIDTH)), {
        class: 'cell',
        ...(header ? { 'font-weight': 'bold' } : {})
      }, group);
      text.setAttribute('data-column', `${columnIndex}`);
      x += width;
    });
  };

  drawRow(spec.columns, 0, true);
  spec.rows.forEach((row, index) => drawRow(row, index + 1, false));

  if (footerRows > 0) {
    const footerTop = PLOT_TOP + (spec.rows.length + 1) * layout.rowHeight;
    appendText(canvas, layout.left + 6, footerTop + 14, `... and ${spec.omittedRows} more`, {
      class: 'table-footer',
      fill: AXIS_COLOR
    });
  }

  return serialize(canvas);
}

function drawPlaceholder(spec: PlaceholderSpec): string {
  const height = 160;
  const canvas = createCanvas(spec, height);
  appendText(canvas, CHART_WIDTH / 2, 96, spec.message, {
    class: 'placeholder-message',
    'text-anchor': 'middle',
    'font-size': 16,
    fill: AXIS_COLOR
  });
  return serialize(canvas);
}

/** First column narrow (kind/status), the rest share the remaining width. */
function tableColumnWidths(count: number, totalWidth: number): number[] {
  if (count <= 1) {
    return [totalWidth];
  }

  const first = Math.min(110, totalWidth / count);
  const rest = (totalWidth - first) / (count - 1);
  return [first, ...Array.from({ length: count - 1 }, () => rest)];
}

function drawAxes(
  canvas: SvgCanvas,
  left: number,
  baseline: number,
  plotWidth: number,
  plotHeight: number,
  valueLabel: string
): void {
  appendElement(canvas, canvas.root, 'line', {
    class: 'axis',
    x1: left,
    y1: baseline,
    x2: left + plotWidth,
    y2: baseline,
    stroke: AXIS_COLOR
  });
  appendElement(canvas, canvas.root, 'line', {
    class: 'axis',
    x1: left,
    y1: baseline - plotHeight,
    x2: left,
    y2: baseline,
    stroke: AXIS_COLOR
  });

  const labelY = baseline - plotHeight / 2;
  appendText(canvas, 20, labelY, valueLabel, {
    class: 'axis-label',
    'text-anchor': 'middle',
    transform: `rotate(-90 20 ${formatCoordinate(labelY)})`,
    fill: AXIS_COLOR
  });
}

function createCanvas(spec: ChartSpec, height: number): SvgCanvas {
  const dom = new JSDOM(`<svg xmlns="${SVG_NS}"></svg>`, { contentType: 'image/svg+xml' });
  const document = dom.window.document;
  const root = document.documentElement;

  root.setAttribute('width', `${CHART_WIDTH}`);
  root.setAttribute('height', `${height}`);
  root.setAttribute('viewBox', `0 0 ${CHART_WIDTH} ${height}`);
  root.setAttribute('role', 'img');
  root.setAttribute('font-family', FONT_FAMILY);
  root.setAttribute('font-size', '12');
  root.setAttribute('data-chart-kind', spec.kind);
  root.setAttribute('data-chart-type', spec.type);

  const canvas: SvgCanvas = { dom, document, root };
  appendElement(canvas, root, 'title', {}, spec.title);
  appendElement(canvas, root, 'rect', { x: 0, y: 0, width: CHART_WIDTH, height, fill: '#ffffff' });
  appendText(canvas, 16, TITLE_BASELINE, spec.title, { class: 'chart-title', 'font-size': 16, 'font-weight': 'bold' });
  return canvas;
}

function appendElement(
  canvas: SvgCanvas,
  parent: Element,
  name: string,
  attributes: Record<string, AttributeValue>,
  text?: string
): Element {
  const element = canvas.document.createElementNS(SVG_NS, name);
  for (const [key, value] of Object.entries(attributes)) {
    element.setAttribute(key, `${value}`);
  }
  if (text !== undefined) {
    element.textContent = text;
  }
  parent.appendChild(element);
  return element;
}

function appendText(
  canvas: SvgCanvas,
  x: number,
  y: number,
  text: string,
  attributes: Record<string, AttributeValue> = {},
  parent: Element = canvas.root
): Element {
  return appendElement(
    canvas,
    parent,
    'text',
    { x: formatCoordinate(x), y: formatCoordinate(y), fill: TEXT_COLOR, ...attributes },
    text
  );
}

function serialize(canvas: SvgCanvas): string {
  // XML documents serialize through the XML serializer, so this is well-formed SVG.
  const markup = canvas.root.outerHTML;
  canvas.dom.window.close();
  return markup;
}

/** Two-decimal precision with trailing zeros dropped (`12.5`, `40`). */
export function formatCoordinate(value: number): string {
  return `${Number(value.toFixed(2))}`;
}

function formatValue(value: number): string {
  return Number.isInteger(value) ? `${value}` : value.toFixed(2);
}

/** Shorten to `maxChars`, ending in `...` when cut. */
export function truncateLabel(label: string, maxChars: number): string {
  const limit = Math.max(4, maxChars);
  return label.length <= limit ? label : `${label.slice(0, limit - 3)}...`;
}
