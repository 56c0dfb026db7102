import type { ElementHandle, HighlightSet, Point } from '../core/types.js';
import type { DrawingSurface } from '../renderer/surface.js';
import { drawShape, type Shape } from '../xdot/shapes.js';

// Hit on a node carrying a link
export interface Url {
  item: ElementHandle;
  url: string;
  highlight: HighlightSet;
}

// Navigation hint: where to move the view and what to highlight meanwhile
export interface Jump {
  item: ElementHandle;
  x: number;
  y: number;
  highlight: HighlightSet;
}

export function makeUrl(item: ElementHandle, url: string, highlight?: HighlightSet): Url {
  return { item, url, highlight: highlight ?? new Set([item]) };
}

export function makeJump(item: ElementHandle, x: number, y: number, highlight?: HighlightSet): Jump {
  return { item, x, y, highlight: highlight ?? new Set([item]) };
}

export function squareDistance(x1: number, y1: number, x2: number, y2: number): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  return dx * dx + dy * dy;
}

/**
 * Base for graph nodes and edges: an ordered list of shapes plus hit-testing hooks
 */
export abstract class Element {
  abstract readonly kind: 'node' | 'edge';

  constructor(readonly handle: ElementHandle, readonly shapes: readonly Shape[]) {}

  getUrl(_p: Point): Url | null {
    return null;
  }

  getJump(_p: Point): Jump | null {
    return null;
  }

  draw(surface: DrawingSurface, highlight = false): void {
    for (const shape of this.shapes) drawShape(shape, surface, highlight);
  }
}

export class Node extends Element {
  readonly kind = 'node';
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;

  constructor(
    handle: ElementHandle,
    readonly name: string,
    readonly x: number,
    readonly y: number,
    w: number,
    h: number,
    shapes: readonly Shape[],
    readonly url?: string,
  ) {
    super(handle, shapes);
    this.x1 = x - 0.5 * w;
    this.y1 = y - 0.5 * h;
    this.x2 = x + 0.5 * w;
    this.y2 = y + 0.5 * h;
  }

  // Bounds are inclusive on every side
  isInside(p: Point): boolean {
    return this.x1 <= p.x && p.x <= this.x2 && this.y1 <= p.y && p.y <= this.y2;
  }

  override getUrl(p: Point): Url | null {
    if (this.url === undefined) return null;
    return this.isInside(p) ? makeUrl(this.handle, this.url) : null;
  }

  override getJump(p: Point): Jump | null {
    return this.isInside(p) ? makeJump(this.handle, this.x, this.y) : null;
  }
}

export class Edge extends Element {
  readonly kind = 'edge';

  // Compared in load-time canvas units, so the on-screen tolerance grows with zoom
  static readonly RADIUS = 10;

  constructor(
    handle: ElementHandle,
    readonly src: Node,
    readonly dst: Node,
    // first is the tail end, last the head end
    readonly points: readonly Point[],
    shapes: readonly Shape[],
  ) {
    super(handle, shapes);
  }

  // Near one end of the edge: jump to the node at the other end
  override getJump(p: Point): Jump | null {
    const r2 = Edge.RADIUS * Edge.RADIUS;
    const first = this.points[0];
    const last = this.points[this.points.length - 1];
    if (first && squareDistance(p.x, p.y, first.x, first.y) <= r2) {
      return makeJump(this.handle, this.dst.x, this.dst.y, new Set([this.handle, this.dst.handle]));
    }
    if (last && squareDistance(p.x, p.y, last.x, last.y) <= r2) {
      return makeJump(this.handle, this.src.x, this.src.y, new Set([this.handle, this.src.handle]));
    }
    return null;
  }
}
