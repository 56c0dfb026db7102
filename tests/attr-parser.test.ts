import { describe, it, expect } from 'vitest';
import type { Diagnostic, Transform } from '../src/core/types.js';
import { parseXdotAttribute, unescapeDirectives } from '../src/xdot/attr-parser.js';
import { BLACK, DEFAULT_PEN } from '../src/xdot/pen.js';
import type { Shape } from '../src/xdot/shapes.js';

const identity: Transform = (x, y) => [x, y];

function run(buf: string, transform: Transform = identity) {
  const diagnostics: Diagnostic[] = [];
  const shapes = parseXdotAttribute(buf, {
    transform,
    diagnostics: (d) => diagnostics.push(d),
    element: 'node "a" _draw_',
  });
  return { shapes, diagnostics };
}

function isKind<K extends Shape['kind']>(kind: K) {
  return (shape: Shape | undefined): shape is Extract<Shape, { kind: K }> => shape?.kind === kind;
}

function only<K extends Shape['kind']>(shapes: Shape[], kind: K): Extract<Shape, { kind: K }> {
  expect(shapes).toHaveLength(1);
  const [shape] = shapes;
  if (!isKind(kind)(shape)) throw new Error(`expected one ${kind} shape`);
  return shape;
}

describe('xdot attribute interpreter', () => {
  it('emits a filled then an outlined ellipse for E', () => {
    const { shapes, diagnostics } = run('E 36 36 20 10');
    expect(diagnostics).toEqual([]);
    expect(shapes).toHaveLength(2);
    const [filled, outline] = shapes;
    if (filled?.kind !== 'ellipse' || outline?.kind !== 'ellipse') throw new Error('expected ellipses');
    expect(filled.filled).toBe(true);
    expect(outline.filled).toBe(false);
    expect([filled.x0, filled.y0, filled.w, filled.h]).toEqual([36, 36, 20, 10]);
    expect([outline.x0, outline.y0, outline.w, outline.h]).toEqual([36, 36, 20, 10]);
    expect(filled.pen).toBe(outline.pen);
  });

  it('emits only an outline for e', () => {
    const shape = only(run('e 36 36 20 10').shapes, 'ellipse');
    expect(shape.filled).toBe(false);
  });

  it('emits a filled then an outlined polygon for P', () => {
    const { shapes } = run('C 7 -#00ff00 P 3 0 0 1 0 1 1');
    expect(shapes.map((s) => s.kind === 'polygon' && s.filled)).toEqual([true, false]);
    const [filled] = shapes;
    if (filled?.kind !== 'polygon') throw new Error('expected polygon');
    expect(filled.points).toEqual([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }]);
    expect(filled.pen.fillcolor).toEqual([0, 1, 0, 1]);
  });

  it('applies the transform to every point', () => {
    const flip: Transform = (x, y) => [x, 100 - y];
    const shape = only(run('p 3 0 0 10 0 10 10', flip).shapes, 'polygon');
    expect(shape.points).toEqual([{ x: 0, y: 100 }, { x: 10, y: 100 }, { x: 10, y: 90 }]);
  });

  it('reads a bezier with 1 + 3k points', () => {
    const shape = only(run('B 4 0 0 1 1 2 1 3 0').shapes, 'bezier');
    expect(shape.points).toHaveLength(4);
  });

  it('reports a bezier with a bad point count and stops', () => {
    const { shapes, diagnostics } = run('e 1 1 1 1 B 3 0 0 1 1 2 2 e 2 2 2 2');
    expect(shapes).toHaveLength(1);
    expect(diagnostics.map((d) => d.code)).toEqual(['XD-BAD-BEZIER']);
  });

  it('reads fonts and text', () => {
    const shape = only(run('F 14 11 -Times-Roman T 10 20 0 30 5 -hello').shapes, 'text');
    expect(shape).toMatchObject({ x: 10, y: 20, justify: 'center', width: 30, text: 'hello' });
    expect(shape.pen.fontsize).toBe(14);
    expect(shape.pen.fontname).toBe('Times-Roman');
  });

  it('maps justification -1 and 1 to left and right', () => {
    expect(only(run('T 0 0 -1 10 1 -x').shapes, 'text').justify).toBe('left');
    expect(only(run('T 0 0 1 10 1 -x').shapes, 'text').justify).toBe('right');
  });

  it('rejects any other justification', () => {
    const { shapes, diagnostics } = run('T 0 0 2 10 1 -x');
    expect(shapes).toEqual([]);
    expect(diagnostics.map((d) => d.code)).toEqual(['XD-MALFORMED-OPERAND']);
  });

  it('counts text lengths in UTF-8 bytes', () => {
    const { shapes, diagnostics } = run('T 0 0 -1 10 2 -é e 1 1 1 1');
    expect(diagnostics).toEqual([]);
    expect(shapes.map((s) => s.kind)).toEqual(['text', 'ellipse']);
    const [text] = shapes;
    expect(text?.kind === 'text' && text.text).toBe('é');
  });

  it('unescapes quotes before reading', () => {
    expect(unescapeDirectives('a\\"b\\nc')).toBe('a"b\nc');
    expect(only(run('T 0 0 1 10 3 -a\\"b').shapes, 'text').text).toBe('a"b');
  });

  it('snapshots the pen into each shape', () => {
    const { shapes } = run('c 7 -#ff0000 e 1 1 1 1 c 7 -#0000ff e 2 2 2 2');
    const [first, second] = shapes;
    if (first?.kind !== 'ellipse' || second?.kind !== 'ellipse') throw new Error('expected ellipses');
    expect(first.pen.color).toEqual([1, 0, 0, 1]);
    expect(second.pen.color).toEqual([0, 0, 1, 1]);
    expect(Object.isFrozen(first.pen)).toBe(true);
  });

  it('starts from the default pen', () => {
    const shape = only(run('e 1 1 1 1').shapes, 'ellipse');
    expect(shape.pen).toEqual(DEFAULT_PEN);
  });

  it('applies line styles', () => {
    expect(only(run('S 6 -dashed e 1 1 1 1').shapes, 'ellipse').pen.dash).toEqual([6]);
    expect(only(run('S 6 -dotted e 1 1 1 1').shapes, 'ellipse').pen.dash).toEqual([2, 6]);
    expect(only(run('S 6 -dashed S 5 -solid e 1 1 1 1').shapes, 'ellipse').pen.dash).toEqual([]);
    expect(only(run('S 15 -setlinewidth(2) e 1 1 1 1').shapes, 'ellipse').pen.linewidth).toBe(2);
  });

  it('ignores styles that carry no stroke information', () => {
    const { shapes, diagnostics } = run('S 4 -bold S 6 -filled e 1 1 1 1');
    expect(diagnostics).toEqual([]);
    expect(only(shapes, 'ellipse').pen.linewidth).toBe(1);
  });

  it('keeps the previous color for an unknown name and reports it once', () => {
    const { shapes, diagnostics } = run('c 9 -notacolor e 1 1 1 1');
    expect(only(shapes, 'ellipse').pen.color).toEqual(BLACK);
    expect(diagnostics).toEqual([
      { severity: 'warning', code: 'XD-UNKNOWN-COLOR', message: "Unknown color 'notacolor'", element: 'node "a" _draw_' },
    ]);
  });

  it('stops at an unknown opcode and keeps what came before', () => {
    const { shapes, diagnostics } = run('e 1 1 1 1 Z 3 e 2 2 2 2');
    expect(shapes).toHaveLength(1);
    expect(diagnostics).toEqual([
      { severity: 'warning', code: 'XD-UNKNOWN-OPCODE', message: "Unknown xdot opcode 'Z'", element: 'node "a" _draw_' },
    ]);
  });

  it('stops at a malformed operand', () => {
    const { shapes, diagnostics } = run('e 1 1 1 1 e 1 x 1 1');
    expect(shapes).toHaveLength(1);
    expect(diagnostics.map((d) => d.code)).toEqual(['XD-MALFORMED-OPERAND']);
  });

  it('stops when a text operand runs past the end', () => {
    const { shapes, diagnostics } = run('T 0 0 0 10 9 -abc');
    expect(shapes).toEqual([]);
    expect(diagnostics.map((d) => d.code)).toEqual(['XD-MALFORMED-OPERAND']);
  });

  it('accepts surrounding whitespace and an empty string', () => {
    expect(run('   e 1 1 1 1   ').shapes).toHaveLength(1);
    expect(run('').shapes).toEqual([]);
  });
});
