import { Resvg } from '@resvg/resvg-js';

import type { ChartFormat } from '../config/options.js';
import { describeError } from '../core/errors.js';
import { log } from '../core/logger.js';
import { placeholderSpec, type ChartKind, type ChartSpec } from './chart-spec.js';
import { renderChartSvg, SVG_NS } from './svg-chart.js';

/** Turns a chart spec into file contents for one format. Implementations may throw. */
export interface ChartRenderer {
  readonly format: ChartFormat;
  render(spec: ChartSpec): string | Uint8Array;
}

/** One chart encoded in one format, ready to be written as `fileName`. */
export interface RenderedChart {
  kind: ChartKind;
  format: ChartFormat;
  fileName: string;
  content: string | Uint8Array;
  /** Present when the renderer failed and the placeholder chart was drawn instead. */
  renderError?: string;
}

/** Raster output metadata for one SVG-to-PNG conversion. */
export interface RasterizedSvgResult {
  width: number;
  height: number;
  png: Buffer;
}

export class SvgChartRenderer implements ChartRenderer {
  readonly format: ChartFormat = 'svg';

  render(spec: ChartSpec): string {
    return renderChartSvg(spec);
  }
}

/** Rasterizes the SVG rendition; the SVG side is injectable for tests. */
export class PngChartRenderer implements ChartRenderer {
  readonly format: ChartFormat = 'png';

  constructor(private readonly svgRenderer: ChartRenderer = new SvgChartRenderer()) {}

  render(spec: ChartSpec): Uint8Array {
    const svg = this.svgRenderer.render(spec);
    if (typeof svg !== 'string') {
      throw new Error(`PNG rendering needs SVG markup, got ${this.svgRenderer.format} bytes`);
    }
    return rasterizeSvg(svg).png;
  }
}

/** Default renderer per format. */
export function createRenderer(format: ChartFormat): ChartRenderer {
  return format === 'png' ? new PngChartRenderer() : new SvgChartRenderer();
}

/**
 * Render one chart. A renderer failure is logged and replaced by the placeholder
 * chart carrying the reason; a failure to draw the placeholder propagates.
 */
export function renderChart(renderer: ChartRenderer, spec: ChartSpec): RenderedChart {
  const fileName = `${spec.kind}.${renderer.format}`;

  try {
    return { kind: spec.kind, format: renderer.format, fileName, content: renderer.render(spec) };
  } catch (error) {
    const reason = describeError(error);
    log.render.warn({ kind: spec.kind, format: renderer.format, error: reason }, 'chart render failed; using placeholder');
    return {
      kind: spec.kind,
      format: renderer.format,
      fileName,
      content: renderer.render(placeholderSpec(spec.kind, `Chart could not be rendered: ${reason}`)),
      renderError: reason
    };
  }
}

/** Rasterize SVG markup at its intrinsic size. */
export function rasterizeSvg(svgMarkup: string): RasterizedSvgResult {
  const resvg = new Resvg(ensureSvgNamespace(svgMarkup), {
    fitTo: { mode: 'original' },
    // System fonts keep chart text legible on headless hosts without bundled fonts.
    font: {
      loadSystemFonts: true,
      defaultFontFamily: 'Arial'
    }
  });

  const rendered = resvg.render();
  const png = Buffer.from(rendered.asPng());

  return {
    width: rendered.width,
    height: rendered.height,
    png
  };
}

/** Ensure root SVG tag carries the XML namespace expected by strict rasterizers. */
function ensureSvgNamespace(svgMarkup: string): string {
  if (svgMarkup.includes('xmlns=')) {
    return svgMarkup;
  }

  return svgMarkup.replace('<svg ', `<svg xmlns="${SVG_NS}" `);
}
