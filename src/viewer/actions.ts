import type { HighlightSet, Rgba } from '../core/types.js';
import type { DrawingSurface } from '../renderer/surface.js';
import type { Jump, Url } from '../scene/elements.js';
import type { Viewport } from './viewport.js';

export type Cursor = 'default' | 'pointer' | 'move';

export interface Modifiers {
  control?: boolean;
  shift?: boolean;
}

// Pointer event in window pixels; button 1 is primary, 2 middle, 3 secondary
export interface PointerInput {
  x: number;
  y: number;
  button?: number;
  modifiers?: Modifiers;
}

/**
 * The parts of the viewer a drag action may touch
 */
export interface ActionHost {
  readonly viewport: Viewport;
  queueDraw(): void;
  setCursor(cursor: Cursor): void;
  setHighlight(highlight: HighlightSet | null): void;
  getUrl(wx: number, wy: number): Url | null;
  getJump(wx: number, wy: number): Jump | null;
}

export type DragActionKind = 'null' | 'pan' | 'zoom' | 'zoom-area';

export abstract class DragAction {
  abstract readonly kind: DragActionKind;
  protected startX = 0;
  protected startY = 0;
  protected prevX = 0;
  protected prevY = 0;
  protected stopX = 0;
  protected stopY = 0;

  constructor(protected readonly host: ActionHost) {}

  onButtonPress(event: PointerInput): void {
    this.startX = this.prevX = event.x;
    this.startY = this.prevY = event.y;
    this.start();
  }

  onMotion(event: PointerInput): void {
    const dx = this.prevX - event.x;
    const dy = this.prevY - event.y;
    this.drag(dx, dy);
    this.prevX = event.x;
    this.prevY = event.y;
  }

  onButtonRelease(event: PointerInput): void {
    this.stopX = event.x;
    this.stopY = event.y;
    this.stop();
  }

  // Overlay drawn in window space after the graph
  draw(_surface: DrawingSurface): void {}

  protected start(): void {}

  protected drag(_dx: number, _dy: number): void {}

  protected stop(): void {}

  abort(): void {}
}

// Hover: cursor and highlight follow what is under the pointer
export class NullAction extends DragAction {
  readonly kind = 'null';

  override onMotion(event: PointerInput): void {
    const item = this.host.getUrl(event.x, event.y) ?? this.host.getJump(event.x, event.y);
    if (item) {
      this.host.setCursor('pointer');
      this.host.setHighlight(item.highlight);
    } else {
      this.host.setCursor('default');
      this.host.setHighlight(null);
    }
  }
}

export class PanAction extends DragAction {
  readonly kind = 'pan';

  protected override start(): void {
    this.host.setCursor('move');
  }

  protected override drag(dx: number, dy: number): void {
    const viewport = this.host.viewport;
    viewport.x += dx / viewport.zoomRatio;
    viewport.y += dy / viewport.zoomRatio;
    this.host.queueDraw();
  }

  protected override stop(): void {
    this.host.setCursor('default');
  }

  override abort(): void {
    this.stop();
  }
}

export class ZoomAction extends DragAction {
  readonly kind = 'zoom';

  protected override drag(dx: number, dy: number): void {
    this.host.viewport.zoomRatio *= 1.005 ** (dx + dy);
    this.host.queueDraw();
  }

  protected override stop(): void {
    this.host.queueDraw();
  }
}

const RUBBER_BAND_FILL: Rgba = [0.5, 0.5, 1.0, 0.25];
const RUBBER_BAND_LINE: Rgba = [0.5, 0.5, 1.0, 1.0];

function rectangle(surface: DrawingSurface, x: number, y: number, w: number, h: number) {
  surface.moveTo(x, y);
  surface.lineTo(x + w, y);
  surface.lineTo(x + w, y + h);
  surface.lineTo(x, y + h);
  surface.closePath();
}

export class ZoomAreaAction extends DragAction {
  readonly kind = 'zoom-area';

  protected override drag(): void {
    this.host.queueDraw();
  }

  override draw(surface: DrawingSurface): void {
    const w = this.prevX - this.startX;
    const h = this.prevY - this.startY;
    surface.save();
    surface.setSourceRgba(RUBBER_BAND_FILL);
    rectangle(surface, this.startX, this.startY, w, h);
    surface.fill();
    surface.setSourceRgba(RUBBER_BAND_LINE);
    surface.setLineWidth(1);
    surface.setDash([]);
    rectangle(surface, this.startX - 0.5, this.startY - 0.5, w + 1, h + 1);
    surface.stroke();
    surface.restore();
  }

  protected override stop(): void {
    const viewport = this.host.viewport;
    const p1 = viewport.windowToGraph(this.startX, this.startY);
    const p2 = viewport.windowToGraph(this.stopX, this.stopY);
    viewport.zoomToArea(p1, p2);
    this.host.queueDraw();
  }

  override abort(): void {
    this.host.queueDraw();
  }
}

/**
 * Action for a press. Primary and middle buttons drag: control zooms, shift zooms to an area, otherwise pan.
 */
export function selectDragAction(button: number | undefined, modifiers: Modifiers = {}): DragActionKind {
  if (button === 1 || button === 2) {
    if (modifiers.control) return 'zoom';
    if (modifiers.shift) return 'zoom-area';
    return 'pan';
  }
  return 'null';
}

export function createDragAction(kind: DragActionKind, host: ActionHost): DragAction {
  switch (kind) {
    case 'null': return new NullAction(host);
    case 'pan': return new PanAction(host);
    case 'zoom': return new ZoomAction(host);
    case 'zoom-area': return new ZoomAreaAction(host);
  }
}
