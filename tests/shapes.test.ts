import { describe, it, expect } from 'vitest';
import { DEFAULT_PEN, HIGHLIGHT_COLOR, HIGHLIGHT_FILL, snapshotPen, createPenState } from '../src/xdot/pen.js';
import {
  bezierShape,
  compoundShape,
  countShapes,
  drawShape,
  ellipseShape,
  polygonShape,
  textShape,
} from '../src/xdot/shapes.js';
import { RecordingSurface } from './helpers/recording-surface.js';

const square = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }];

describe('shape drawing', () => {
  it('strokes an outline polygon starting from its last point', () => {
    const surface = new RecordingSurface();
    drawShape(polygonShape(DEFAULT_PEN, square), surface);
    expect(surface.calls).toEqual([
      { op: 'moveTo', args: [1, 1] },
      { op: 'lineTo', args: [0, 0] },
      { op: 'lineTo', args: [1, 0] },
      { op: 'lineTo', args: [1, 1] },
      { op: 'closePath' },
      { op: 'setDash', dash: [] },
      { op: 'setLineWidth', width: 1 },
      { op: 'setSourceRgba', color: [0, 0, 0, 1] },
      { op: 'stroke' },
    ]);
  });

  it('fills a filled polygon with the fill color', () => {
    const pen = snapshotPen({ ...createPenState(), fillcolor: [0, 1, 0, 1] });
    const surface = new RecordingSurface();
    drawShape(polygonShape(pen, square, true), surface);
    expect(surface.ops().slice(-2)).toEqual(['setSourceRgba', 'fill']);
    expect(surface.calls).toContainEqual({ op: 'setSourceRgba', color: [0, 1, 0, 1] });
  });

  it('traces an ellipse as four curves around its center', () => {
    const surface = new RecordingSurface();
    drawShape(ellipseShape(DEFAULT_PEN, 10, 20, 4, 2), surface);
    expect(surface.ops().slice(0, 6)).toEqual(['moveTo', 'curveTo', 'curveTo', 'curveTo', 'curveTo', 'closePath']);
    expect(surface.calls[0]).toEqual({ op: 'moveTo', args: [14, 20] });
    const ends = surface.calls.flatMap((c) => (c.op === 'curveTo' ? [[c.args[4], c.args[5]]] : []));
    expect(ends).toEqual([[10, 22], [6, 20], [10, 18], [14, 20]]);
  });

  it('strokes a bezier without closing it', () => {
    const surface = new RecordingSurface();
    drawShape(bezierShape(DEFAULT_PEN, [...square, { x: 2, y: 2 }]), surface);
    expect(surface.ops()).toEqual(['moveTo', 'curveTo', 'setDash', 'setLineWidth', 'setSourceRgba', 'stroke']);
    expect(surface.calls[1]).toEqual({ op: 'curveTo', args: [1, 0, 1, 1, 2, 2] });
  });

  it('rejects a bezier with a bad point count', () => {
    expect(() => bezierShape(DEFAULT_PEN, square)).toThrow(RangeError);
  });

  it('centers text on its anchor', () => {
    const surface = new RecordingSurface({ width: 10, height: 10 });
    drawShape(textShape(DEFAULT_PEN, 10, 20, 'center', 30, 'hi'), surface);
    expect(surface.calls).toEqual([
      { op: 'setSourceRgba', color: [0, 0, 0, 1] },
      { op: 'showText', text: 'hi', x: 5, y: 12, font: { family: 'Times-Roman', size: 14 } },
    ]);
  });

  it('right-justifies text', () => {
    const surface = new RecordingSurface({ width: 10, height: 10 });
    drawShape(textShape(DEFAULT_PEN, 10, 20, 'right', 30, 'hi'), surface);
    expect(surface.calls[1]).toMatchObject({ x: 0, y: 12 });
  });

  it('shrinks text wider than its reserved width', () => {
    const surface = new RecordingSurface({ width: 60, height: 20 });
    drawShape(textShape(DEFAULT_PEN, 10, 20, 'left', 30, 'wide'), surface);
    expect(surface.calls[1]).toEqual({
      op: 'showText',
      text: 'wide',
      x: 10,
      y: 11,
      font: { family: 'Times-Roman', size: 7 },
    });
  });

  it('draws highlighted shapes with the highlight pen, computed on demand', () => {
    const shape = polygonShape(DEFAULT_PEN, square, true);
    expect(shape.highlightPen.computed).toBe(false);
    const surface = new RecordingSurface();
    drawShape(shape, surface, true);
    expect(shape.highlightPen.computed).toBe(true);
    expect(surface.calls).toContainEqual({ op: 'setSourceRgba', color: HIGHLIGHT_FILL });
    expect(shape.highlightPen.get().color).toEqual(HIGHLIGHT_COLOR);
    expect(shape.highlightPen.get()).toBe(shape.highlightPen.get());
  });

  it('draws every child of a compound shape', () => {
    const compound = compoundShape([
      ellipseShape(DEFAULT_PEN, 0, 0, 1, 1),
      compoundShape([polygonShape(DEFAULT_PEN, square)]),
    ]);
    const surface = new RecordingSurface();
    drawShape(compound, surface);
    expect(surface.ops().filter((op) => op === 'stroke')).toHaveLength(2);
    expect(countShapes([compound])).toBe(2);
  });
});
