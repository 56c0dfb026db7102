import type { Rgba } from '../core/types.js';
import type { DrawingSurface, FontSpec, TextExtent } from './surface.js';
import { escapeXml, formatNumber, lineHeight, measureText, rgbString } from './utils.js';

interface ClipBox {
  id: string;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

interface SurfaceState {
  // device = user * scale + translation
  sx: number;
  sy: number;
  tx: number;
  ty: number;
  color: Rgba;
  lineWidth: number;
  dash: readonly number[];
  clip: ClipBox | null;
}

const INITIAL_STATE: SurfaceState = {
  sx: 1,
  sy: 1,
  tx: 0,
  ty: 0,
  color: [0, 0, 0, 1],
  lineWidth: 2,
  dash: [],
  clip: null,
};

function n(value: number): string {
  return formatNumber(value);
}

/**
 * DrawingSurface that records what is drawn as SVG elements.
 * Coordinates are resolved to device space as paths are built; fill and stroke consume the path.
 */
export class SvgSurface implements DrawingSurface {
  private state: SurfaceState = { ...INITIAL_STATE };
  private readonly stack: SurfaceState[] = [];
  private path: string[] = [];
  private readonly defs: string[] = [];
  private readonly elements: string[] = [];
  private clipCount = 0;

  constructor(readonly width: number, readonly height: number) {}

  save(): void {
    this.stack.push({ ...this.state });
  }

  restore(): void {
    const previous = this.stack.pop();
    if (previous) this.state = previous;
  }

  translate(x: number, y: number): void {
    this.state.tx += x * this.state.sx;
    this.state.ty += y * this.state.sy;
  }

  scale(sx: number, sy: number): void {
    this.state.sx *= sx;
    this.state.sy *= sy;
  }

  clipRect(x: number, y: number, width: number, height: number): void {
    const [ax, ay] = this.toDevice(x, y);
    const [bx, by] = this.toDevice(x + width, y + height);
    let x1 = Math.min(ax, bx);
    let y1 = Math.min(ay, by);
    let x2 = Math.max(ax, bx);
    let y2 = Math.max(ay, by);
    const outer = this.state.clip;
    if (outer) {
      x1 = Math.max(x1, outer.x1);
      y1 = Math.max(y1, outer.y1);
      x2 = Math.max(x1, Math.min(x2, outer.x2));
      y2 = Math.max(y1, Math.min(y2, outer.y2));
    }
    const id = `clip${++this.clipCount}`;
    this.defs.push(`<clipPath id="${id}"><rect x="${n(x1)}" y="${n(y1)}" width="${n(x2 - x1)}" height="${n(y2 - y1)}"/></clipPath>`);
    this.state.clip = { id, x1, y1, x2, y2 };
  }

  moveTo(x: number, y: number): void {
    const [dx, dy] = this.toDevice(x, y);
    this.path.push(`M${n(dx)},${n(dy)}`);
  }

  lineTo(x: number, y: number): void {
    const [dx, dy] = this.toDevice(x, y);
    this.path.push(`L${n(dx)},${n(dy)}`);
  }

  curveTo(x1: number, y1: number, x2: number, y2: number, x3: number, y3: number): void {
    const [ax, ay] = this.toDevice(x1, y1);
    const [bx, by] = this.toDevice(x2, y2);
    const [cx, cy] = this.toDevice(x3, y3);
    this.path.push(`C${n(ax)},${n(ay)} ${n(bx)},${n(by)} ${n(cx)},${n(cy)}`);
  }

  closePath(): void {
    if (this.path.length > 0) this.path.push('Z');
  }

  setSourceRgba(color: Rgba): void {
    this.state.color = color;
  }

  setLineWidth(width: number): void {
    this.state.lineWidth = width;
  }

  setDash(dash: readonly number[]): void {
    this.state.dash = dash;
  }

  fill(): void {
    const d = this.takePath();
    if (!d) return;
    const [, , , a] = this.state.color;
    const opacity = a < 1 ? ` fill-opacity="${n(a)}"` : '';
    this.elements.push(`<path d="${d}" fill="${rgbString(this.state.color)}"${opacity}${this.clipAttr()}/>`);
  }

  stroke(): void {
    const d = this.takePath();
    if (!d) return;
    const [, , , a] = this.state.color;
    const unit = this.deviceScale();
    let attrs = ` stroke="${rgbString(this.state.color)}" stroke-width="${n(this.state.lineWidth * unit)}"`;
    if (a < 1) attrs += ` stroke-opacity="${n(a)}"`;
    if (this.state.dash.length > 0) {
      attrs += ` stroke-dasharray="${this.state.dash.map((v) => n(v * unit)).join(',')}"`;
    }
    this.elements.push(`<path d="${d}" fill="none"${attrs}${this.clipAttr()}/>`);
  }

  measureText(text: string, font: FontSpec): TextExtent {
    return { width: measureText(text, font.size), height: lineHeight(font.size) };
  }

  showText(text: string, x: number, y: number, font: FontSpec): void {
    const [dx, dy] = this.toDevice(x, y);
    const unit = this.deviceScale();
    const size = font.size * unit;
    const [, , , a] = this.state.color;
    const opacity = a < 1 ? ` fill-opacity="${n(a)}"` : '';
    this.elements.push(
      `<text x="${n(dx)}" y="${n(dy)}" dominant-baseline="text-before-edge" font-family="${escapeXml(font.family)}" font-size="${n(size)}" fill="${rgbString(this.state.color)}"${opacity}${this.clipAttr()}>${escapeXml(text)}</text>`,
    );
  }

  // Drawn elements in order, without the document wrapper
  get body(): readonly string[] {
    return this.elements;
  }

  toSvg(): string {
    const defs = this.defs.length > 0 ? `\n  <defs>${this.defs.join('')}</defs>` : '';
    const body = this.elements.map((e) => `\n  ${e}`).join('');
    return `<svg xmlns="http://www.w3.org/2000/svg" width="${n(this.width)}" height="${n(this.height)}" viewBox="0 0 ${n(this.width)} ${n(this.height)}">${defs}${body}\n</svg>\n`;
  }

  private toDevice(x: number, y: number): [number, number] {
    return [x * this.state.sx + this.state.tx, y * this.state.sy + this.state.ty];
  }

  // Line widths and dashes follow the user-space scale
  private deviceScale(): number {
    return Math.sqrt(Math.abs(this.state.sx * this.state.sy));
  }

  private takePath(): string {
    const d = this.path.join(' ');
    this.path = [];
    return d;
  }

  private clipAttr(): string {
    return this.state.clip ? ` clip-path="url(#${this.state.clip.id})"` : '';
  }
}
