import { ZOOM_TO_FIT_MARGIN } from '../core/config.js';
import type { Point } from '../core/types.js';
import type { DrawingSurface } from '../renderer/surface.js';

export const ZOOM_INCREMENT = 1.25;
// Screen pixels per arrow-key step
export const POS_INCREMENT = 100;

export type PanDirection = 'left' | 'right' | 'up' | 'down';

export interface Extent {
  width: number;
  height: number;
}

/**
 * Focus point and zoom ratio over an allocation of window pixels.
 * The focus (in graph space) is drawn at the centre of the allocation.
 */
export class Viewport {
  x = 0.0;
  y = 0.0;
  zoomRatio = 1.0;

  constructor(public width: number, public height: number) {}

  setAllocation(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  windowToGraph(wx: number, wy: number): Point {
    return {
      x: (wx - 0.5 * this.width) / this.zoomRatio + this.x,
      y: (wy - 0.5 * this.height) / this.zoomRatio + this.y,
    };
  }

  graphToWindow(gx: number, gy: number): Point {
    return {
      x: (gx - this.x) * this.zoomRatio + 0.5 * this.width,
      y: (gy - this.y) * this.zoomRatio + 0.5 * this.height,
    };
  }

  // translate to centre, scale, translate by -focus
  applyTransform(surface: DrawingSurface): void {
    surface.translate(0.5 * this.width, 0.5 * this.height);
    surface.scale(this.zoomRatio, this.zoomRatio);
    surface.translate(-this.x, -this.y);
  }

  // `center` recentres the focus on the graph
  zoomImage(zoomRatio: number, center?: Extent): void {
    if (center) {
      this.x = center.width / 2;
      this.y = center.height / 2;
    }
    this.zoomRatio = zoomRatio;
  }

  zoomToFit(graph: Extent, margin: number = ZOOM_TO_FIT_MARGIN): void {
    const width = Math.max(1, this.width - 2 * margin);
    const height = Math.max(1, this.height - 2 * margin);
    // A graph laid out from nothing has a 0x0 bounding box
    const ratio = Math.min(width / (graph.width || 1), height / (graph.height || 1));
    this.zoomImage(ratio, graph);
  }

  // Corners in graph space
  zoomToArea(p1: Point, p2: Point): void {
    const width = Math.abs(p1.x - p2.x);
    const height = Math.abs(p1.y - p2.y);
    if (width === 0 && height === 0) return;
    if (width === 0) {
      this.zoomRatio = this.height / height;
    } else if (height === 0) {
      this.zoomRatio = this.width / width;
    } else {
      this.zoomRatio = Math.min(this.width / width, this.height / height);
    }
    this.x = (p1.x + p2.x) / 2;
    this.y = (p1.y + p2.y) / 2;
  }

  zoomIn(): void {
    this.zoomImage(this.zoomRatio * ZOOM_INCREMENT);
  }

  zoomOut(): void {
    this.zoomImage(this.zoomRatio / ZOOM_INCREMENT);
  }

  zoom100(): void {
    this.zoomImage(1.0);
  }

  pan(direction: PanDirection): void {
    const step = POS_INCREMENT / this.zoomRatio;
    switch (direction) {
      case 'left': this.x -= step; break;
      case 'right': this.x += step; break;
      case 'up': this.y -= step; break;
      case 'down': this.y += step; break;
    }
  }
}
