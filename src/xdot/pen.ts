import type { Rgba } from '../core/types.js';

/**
 * Drawing style snapshot attached to every non-compound shape
 */
export interface Pen {
  readonly color: Rgba;
  readonly fillcolor: Rgba;
  readonly linewidth: number;
  readonly fontsize: number;
  readonly fontname: string;
  // empty means solid
  readonly dash: readonly number[];
}

// The interpreter's running style context; snapshotted into each emitted shape
export type PenState = { -readonly [K in keyof Pen]: Pen[K] };

export const BLACK: Rgba = [0, 0, 0, 1];
export const HIGHLIGHT_COLOR: Rgba = [1, 0, 0, 1];
export const HIGHLIGHT_FILL: Rgba = [1, 0.8, 0.8, 1];

export const DEFAULT_PEN: Pen = Object.freeze({
  color: BLACK,
  fillcolor: BLACK,
  linewidth: 1.0,
  fontsize: 14.0,
  fontname: 'Times-Roman',
  dash: Object.freeze([]),
});

export function createPenState(): PenState {
  return { ...DEFAULT_PEN, dash: [...DEFAULT_PEN.dash] };
}

export function snapshotPen(state: PenState): Pen {
  return Object.freeze({ ...state, dash: Object.freeze([...state.dash]) });
}

export function highlightedPen(pen: Pen): Pen {
  return Object.freeze({ ...pen, color: HIGHLIGHT_COLOR, fillcolor: HIGHLIGHT_FILL });
}

/**
 * Value computed on first access and kept afterwards
 */
export class Memo<T> {
  private cell: { value: T } | undefined;

  constructor(private readonly compute: () => T) {}

  get computed(): boolean {
    return this.cell !== undefined;
  }

  get(): T {
    if (!this.cell) this.cell = { value: this.compute() };
    return this.cell.value;
  }
}
