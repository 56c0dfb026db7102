import type { HighlightSet, Rgba } from '../core/types.js';
import type { Graph } from '../scene/graph.js';
import type { Viewport } from '../viewer/viewport.js';
import type { DrawingSurface } from './surface.js';

const WHITE: Rgba = [1, 1, 1, 1];
const NO_HIGHLIGHT: HighlightSet = new Set();

/**
 * Paints the viewport's allocation: white background, then the graph under the view transform,
 * then an optional overlay in window space
 */
export function paintView(
  surface: DrawingSurface,
  graph: Graph,
  viewport: Viewport,
  highlight: HighlightSet | null = null,
  overlay?: (surface: DrawingSurface) => void,
): void {
  const { width, height } = viewport;
  surface.save();
  surface.clipRect(0, 0, width, height);
  surface.setSourceRgba(WHITE);
  surface.moveTo(0, 0);
  surface.lineTo(width, 0);
  surface.lineTo(width, height);
  surface.lineTo(0, height);
  surface.closePath();
  surface.fill();

  surface.save();
  viewport.applyTransform(surface);
  graph.draw(surface, highlight ?? NO_HIGHLIGHT);
  surface.restore();

  overlay?.(surface);
  surface.restore();
}
