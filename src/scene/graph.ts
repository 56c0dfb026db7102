import type { ElementHandle, HighlightSet, Point } from '../core/types.js';
import type { DrawingSurface } from '../renderer/surface.js';
import { BLACK } from '../xdot/pen.js';
import { drawShape, type Shape } from '../xdot/shapes.js';
import type { Edge, Jump, Node, Url } from './elements.js';

const NO_HIGHLIGHT: HighlightSet = new Set();

/**
 * A laid-out graph in canvas space: origin top-left, y down
 */
export class Graph {
  private readonly byHandle: Map<ElementHandle, Node | Edge> = new Map();

  constructor(
    readonly width = 1,
    readonly height = 1,
    readonly nodes: readonly Node[] = [],
    readonly edges: readonly Edge[] = [],
    // Graph and cluster decorations, drawn beneath everything else
    readonly shapes: readonly Shape[] = [],
  ) {
    for (const n of nodes) this.byHandle.set(n.handle, n);
    for (const e of edges) this.byHandle.set(e.handle, e);
  }

  getSize(): [number, number] {
    return [this.width, this.height];
  }

  element(handle: ElementHandle): Node | Edge | undefined {
    return this.byHandle.get(handle);
  }

  draw(surface: DrawingSurface, highlight: HighlightSet = NO_HIGHLIGHT): void {
    surface.setSourceRgba(BLACK);
    for (const shape of this.shapes) drawShape(shape, surface);
    for (const edge of this.edges) edge.draw(surface, highlight.has(edge.handle));
    for (const node of this.nodes) node.draw(surface, highlight.has(node.handle));
  }

  getUrl(p: Point): Url | null {
    for (const node of this.nodes) {
      const url = node.getUrl(p);
      if (url) return url;
    }
    return null;
  }

  // Edge ends win over the nodes they touch
  getJump(p: Point): Jump | null {
    for (const edge of this.edges) {
      const jump = edge.getJump(p);
      if (jump) return jump;
    }
    for (const node of this.nodes) {
      const jump = node.getJump(p);
      if (jump) return jump;
    }
    return null;
  }
}
