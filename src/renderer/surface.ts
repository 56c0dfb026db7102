import type { Rgba } from '../core/types.js';

export interface FontSpec {
  family: string;
  // absolute size in surface units
  size: number;
}

export interface TextExtent {
  width: number;
  height: number;
}

/**
 * Primitive drawing operations shapes render through.
 * Paths are built with moveTo/lineTo/curveTo/closePath and consumed by fill or stroke.
 */
export interface DrawingSurface {
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  scale(sx: number, sy: number): void;
  clipRect(x: number, y: number, width: number, height: number): void;

  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  curveTo(x1: number, y1: number, x2: number, y2: number, x3: number, y3: number): void;
  closePath(): void;

  setSourceRgba(color: Rgba): void;
  setLineWidth(width: number): void;
  setDash(dash: readonly number[]): void;
  // nonzero winding
  fill(): void;
  stroke(): void;

  measureText(text: string, font: FontSpec): TextExtent;
  // (x, y) is the top-left corner of the text's layout box
  showText(text: string, x: number, y: number, font: FontSpec): void;
}
