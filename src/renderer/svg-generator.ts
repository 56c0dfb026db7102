import type { Graph } from '../scene/graph.js';
import type { IRenderer, RenderView } from './interfaces.js';
import { paintView } from './paint.js';
import { SvgSurface } from './svg-surface.js';

/**
 * Renders a graph, as seen through a viewport, to a standalone SVG document
 */
export class SvgRenderer implements IRenderer {
  render(graph: Graph, view: RenderView): string {
    const { viewport } = view;
    const surface = new SvgSurface(viewport.width, viewport.height);
    paintView(surface, graph, viewport, view.highlight ?? null);
    return surface.toSvg();
  }
}
