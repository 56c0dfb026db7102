import { ZOOM_TO_FIT_MARGIN, DEFAULT_HEIGHT, DEFAULT_WIDTH } from '../core/config.js';
import { error } from '../core/errorBuilder.js';
import { LayoutError, type GraphLoadError } from '../core/errors.js';
import type { Diagnostic, DiagnosticSink, InputFormat } from '../core/types.js';
import { hasDrawingAttributes } from '../dot/read.js';
import type { Graph } from '../scene/graph.js';
import { loadXdot } from '../scene/loader.js';
import { Viewport } from '../viewer/viewport.js';
import type { ILayoutEngine, IRenderer } from './interfaces.js';
import { GraphvizLayoutEngine } from './layout.js';
import { SvgRenderer } from './svg-generator.js';
import { escapeXml } from './utils.js';

export interface RenderOptions {
  /** Width of the SVG in pixels */
  width?: number;
  /** Height of the SVG in pixels */
  height?: number;
  /** Zoom-to-fit margin in pixels */
  margin?: number;
  /** 'auto' lays out only text without drawing attributes */
  format?: InputFormat | 'auto';
  /** Custom layout engine (defaults to GraphvizLayoutEngine running dot) */
  layoutEngine?: ILayoutEngine;
  /** Custom renderer (defaults to SvgRenderer) */
  renderer?: IRenderer;
  diagnostics?: DiagnosticSink;
  signal?: AbortSignal;
}

export type RenderResult =
  | { ok: true; svg: string; graph: Graph; viewport: Viewport; xdot: string; diagnostics: Diagnostic[] }
  | { ok: false; svg: string; error: GraphLoadError; xdot: string | null; diagnostics: Diagnostic[] };

/**
 * Pipeline from graph source to SVG: layout (when needed), read, load, fit, render
 */
export class GraphRenderer {
  private layoutEngine: ILayoutEngine;
  private renderer: IRenderer;

  constructor(layoutEngine?: ILayoutEngine, renderer?: IRenderer) {
    this.layoutEngine = layoutEngine || new GraphvizLayoutEngine();
    this.renderer = renderer || new SvgRenderer();
  }

  async render(text: string, options: RenderOptions = {}): Promise<RenderResult> {
    const layoutEngine = options.layoutEngine || this.layoutEngine;
    const renderer = options.renderer || this.renderer;
    const width = options.width ?? DEFAULT_WIDTH;
    const height = options.height ?? DEFAULT_HEIGHT;

    // Step 1: Layout, unless the text is already laid out
    const format = options.format ?? 'auto';
    let xdot = text;
    if (format === 'dot' || (format === 'auto' && !hasDrawingAttributes(text))) {
      try {
        xdot = await layoutEngine.layout(text, { signal: options.signal });
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        const failure = e instanceof LayoutError ? e : new LayoutError(message, [error('LAYOUT-FAILED', message)]);
        for (const d of failure.diagnostics) options.diagnostics?.(d);
        return { ok: false, svg: errorSvg(failure.message), error: failure, xdot: null, diagnostics: failure.diagnostics };
      }
    }

    // Step 2: Read and build the scene
    const loaded = loadXdot(xdot, { diagnostics: options.diagnostics });
    if (!loaded.ok) {
      return { ok: false, svg: errorSvg(loaded.error.message), error: loaded.error, xdot, diagnostics: loaded.diagnostics };
    }

    // Step 3: Fit and draw
    const viewport = new Viewport(width, height);
    viewport.zoomToFit(loaded.graph, options.margin ?? ZOOM_TO_FIT_MARGIN);
    const svg = renderer.render(loaded.graph, { viewport });
    return { ok: true, svg, graph: loaded.graph, viewport, xdot, diagnostics: loaded.diagnostics };
  }
}

function wrapText(text: string, maxLength: number): string[] {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    if (currentLine.length + word.length + 1 <= maxLength) {
      currentLine += (currentLine ? ' ' : '') + word;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }

  if (currentLine) lines.push(currentLine);
  return lines.slice(0, 3); // Limit to 3 lines
}

export function errorSvg(message: string): string {
  const width = 400;
  const height = 200;

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  <rect width="${width}" height="${height}" fill="#fee" stroke="#c00" stroke-width="2" />
  <text x="${width/2}" y="${height/2 - 20}" text-anchor="middle" font-family="Arial, sans-serif" font-size="16" fill="#c00">
    Render Error
  </text>
  <text x="${width/2}" y="${height/2 + 10}" text-anchor="middle" font-family="Arial, sans-serif" font-size="12" fill="#666">
    ${wrapText(message, 40).map((line, i) =>
      `<tspan x="${width/2}" dy="${i === 0 ? 0 : 15}">${escapeXml(line)}</tspan>`
    ).join('')}
  </text>
</svg>`;
}

// Export main render function for convenience
export function renderGraph(text: string, options: RenderOptions = {}): Promise<RenderResult> {
  const renderer = new GraphRenderer(options.layoutEngine, options.renderer);
  return renderer.render(text, options);
}

// Export interfaces and implementations for pluggability
export type { ILayoutEngine, IRenderer, LayoutRequest, RenderView } from './interfaces.js';
export type { DrawingSurface, FontSpec, TextExtent } from './surface.js';
export { GraphvizLayoutEngine } from './layout.js';
export { SvgRenderer } from './svg-generator.js';
export { SvgSurface } from './svg-surface.js';
export { paintView } from './paint.js';
