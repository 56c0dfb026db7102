import type { HighlightSet } from '../core/types.js';
import type { Graph } from '../scene/graph.js';
import type { Viewport } from '../viewer/viewport.js';

export interface LayoutRequest {
  // Aborting rejects the pending layout with an aborted LayoutError
  signal?: AbortSignal;
}

/**
 * Interface for layout engines that turn graph source into laid-out xdot text
 */
export interface ILayoutEngine {
  /**
   * Lay out a graph
   * @param source DOT source text
   * @returns xdot text carrying positions and drawing attributes
   */
  layout(source: string, request?: LayoutRequest): Promise<string>;
}

export interface RenderView {
  viewport: Viewport;
  highlight?: HighlightSet;
}

/**
 * Interface for renderers that generate output from a loaded graph
 */
export interface IRenderer {
  /**
   * Generate output for a graph seen through a viewport
   * @returns String representation (SVG)
   */
  render(graph: Graph, view: RenderView): string;
}
