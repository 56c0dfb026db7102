import type { Point } from '../core/types.js';
import type { DrawingSurface } from '../renderer/surface.js';
import { Memo, highlightedPen, type Pen } from './pen.js';

export type TextJustify = 'left' | 'center' | 'right';

export interface TextShape {
  readonly kind: 'text';
  readonly pen: Pen;
  readonly highlightPen: Memo<Pen>;
  readonly x: number;
  readonly y: number;
  readonly justify: TextJustify;
  // width the layout engine reserved for the text
  readonly width: number;
  readonly text: string;
}

export interface EllipseShape {
  readonly kind: 'ellipse';
  readonly pen: Pen;
  readonly highlightPen: Memo<Pen>;
  readonly x0: number;
  readonly y0: number;
  // radii
  readonly w: number;
  readonly h: number;
  readonly filled: boolean;
}

export interface PolygonShape {
  readonly kind: 'polygon';
  readonly pen: Pen;
  readonly highlightPen: Memo<Pen>;
  readonly points: readonly Point[];
  readonly filled: boolean;
}

export interface BezierShape {
  readonly kind: 'bezier';
  readonly pen: Pen;
  readonly highlightPen: Memo<Pen>;
  // 1 + 3k points: start, then (control, control, end) per segment
  readonly points: readonly Point[];
}

export interface CompoundShape {
  readonly kind: 'compound';
  readonly shapes: readonly Shape[];
}

export type Shape = TextShape | EllipseShape | PolygonShape | BezierShape | CompoundShape;

// Fixed descender allowance, scaled with the text
export const TEXT_DESCENT = 2;

// Control-point distance for a quarter-circle cubic approximation
const KAPPA = 0.5522847498307936;

function memoHighlight(pen: Pen): Memo<Pen> {
  return new Memo(() => highlightedPen(pen));
}

export function textShape(pen: Pen, x: number, y: number, justify: TextJustify, width: number, text: string): TextShape {
  return { kind: 'text', pen, highlightPen: memoHighlight(pen), x, y, justify, width, text };
}

export function ellipseShape(pen: Pen, x0: number, y0: number, w: number, h: number, filled = false): EllipseShape {
  return { kind: 'ellipse', pen, highlightPen: memoHighlight(pen), x0, y0, w, h, filled };
}

export function polygonShape(pen: Pen, points: readonly Point[], filled = false): PolygonShape {
  return { kind: 'polygon', pen, highlightPen: memoHighlight(pen), points, filled };
}

export function isBezierPointCount(count: number): boolean {
  return count >= 1 && (count - 1) % 3 === 0;
}

export function bezierShape(pen: Pen, points: readonly Point[]): BezierShape {
  if (!isBezierPointCount(points.length)) {
    throw new RangeError(`Bezier needs 1 + 3k points, got ${points.length}`);
  }
  return { kind: 'bezier', pen, highlightPen: memoHighlight(pen), points };
}

export function compoundShape(shapes: readonly Shape[]): CompoundShape {
  return { kind: 'compound', shapes };
}

export function selectPen(shape: Exclude<Shape, CompoundShape>, highlight: boolean): Pen {
  return highlight ? shape.highlightPen.get() : shape.pen;
}

function fillOrStroke(surface: DrawingSurface, pen: Pen, filled: boolean) {
  if (filled) {
    surface.setSourceRgba(pen.fillcolor);
    surface.fill();
  } else {
    surface.setDash(pen.dash);
    surface.setLineWidth(pen.linewidth);
    surface.setSourceRgba(pen.color);
    surface.stroke();
  }
}

function anchorX(justify: TextJustify, x: number, width: number): number {
  switch (justify) {
    case 'left': return x;
    case 'center': return x - 0.5 * width;
    case 'right': return x - width;
  }
}

function drawText(shape: TextShape, surface: DrawingSurface, highlight: boolean) {
  const pen = selectPen(shape, highlight);
  const extent = surface.measureText(shape.text, { family: pen.fontname, size: pen.fontsize });
  let width = extent.width;
  let height = extent.height;
  let descent = TEXT_DESCENT;
  let f = 1.0;
  // Our fonts need not match the layout engine's metrics; shrink to the reserved width
  if (width > shape.width) {
    f = shape.width / width;
    width = shape.width;
    height *= f;
    descent *= f;
  }

  const x = anchorX(shape.justify, shape.x, width);
  const y = shape.y - height + descent;

  surface.setSourceRgba(pen.color);
  surface.showText(shape.text, x, y, { family: pen.fontname, size: pen.fontsize * f });
}

function drawEllipse(shape: EllipseShape, surface: DrawingSurface, highlight: boolean) {
  const { x0, y0, w, h } = shape;
  const kw = KAPPA * w;
  const kh = KAPPA * h;
  surface.moveTo(x0 + w, y0);
  surface.curveTo(x0 + w, y0 + kh, x0 + kw, y0 + h, x0, y0 + h);
  surface.curveTo(x0 - kw, y0 + h, x0 - w, y0 + kh, x0 - w, y0);
  surface.curveTo(x0 - w, y0 - kh, x0 - kw, y0 - h, x0, y0 - h);
  surface.curveTo(x0 + kw, y0 - h, x0 + w, y0 - kh, x0 + w, y0);
  surface.closePath();
  fillOrStroke(surface, selectPen(shape, highlight), shape.filled);
}

function drawPolygon(shape: PolygonShape, surface: DrawingSurface, highlight: boolean) {
  const last = shape.points[shape.points.length - 1];
  if (!last) return;
  surface.moveTo(last.x, last.y);
  for (const p of shape.points) surface.lineTo(p.x, p.y);
  surface.closePath();
  fillOrStroke(surface, selectPen(shape, highlight), shape.filled);
}

function drawBezier(shape: BezierShape, surface: DrawingSurface, highlight: boolean) {
  const [start, ...rest] = shape.points;
  if (!start) return;
  surface.moveTo(start.x, start.y);
  for (let i = 0; i + 2 < rest.length; i += 3) {
    const c1 = rest[i];
    const c2 = rest[i + 1];
    const end = rest[i + 2];
    if (c1 && c2 && end) surface.curveTo(c1.x, c1.y, c2.x, c2.y, end.x, end.y);
  }
  fillOrStroke(surface, selectPen(shape, highlight), false);
}

export function drawShape(shape: Shape, surface: DrawingSurface, highlight = false): void {
  switch (shape.kind) {
    case 'text': return drawText(shape, surface, highlight);
    case 'ellipse': return drawEllipse(shape, surface, highlight);
    case 'polygon': return drawPolygon(shape, surface, highlight);
    case 'bezier': return drawBezier(shape, surface, highlight);
    case 'compound':
      for (const child of shape.shapes) drawShape(child, surface, highlight);
      return;
  }
}

export function countShapes(shapes: readonly Shape[]): number {
  let n = 0;
  for (const s of shapes) n += s.kind === 'compound' ? countShapes(s.shapes) : 1;
  return n;
}
