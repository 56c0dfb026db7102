import { describe, it, expect } from 'vitest';
import { hasDrawingAttributes, readDot } from '../src/dot/read.js';
import type { AnnotatedLayout } from '../src/dot/types.js';
import { readFixture } from './helpers/fixtures.js';

function read(text: string): AnnotatedLayout {
  const out = readDot(text);
  expect(out.diagnostics).toEqual([]);
  if (!out.value) throw new Error('expected a layout');
  return out.value;
}

describe('DOT reader', () => {
  it('reads the layout engine output', () => {
    const layout = read(readFixture('two-nodes.xdot'));
    expect(layout.name).toBe('G');
    expect(layout.directed).toBe(true);
    expect(layout.strict).toBe(false);
    expect(layout.bb).toBe('0,0,62,116');
    expect(layout.drawAttributes).toHaveLength(1);
    expect(layout.nodes.map((n) => n.name)).toEqual(['a', 'b']);
    expect(layout.nodes[0]).toMatchObject({ pos: '27,98', width: '0.75', height: '0.5', url: 'http://example.com/a' });
    expect(layout.edges).toHaveLength(1);
    expect(layout.edges[0]).toMatchObject({ tail: 'a', head: 'b', pos: 'e,27,44.1 27,79.7 27,71.98 27,62.71 27,54.11' });
    expect(layout.edges[0]?.hdraw).toBe('S 5 -solid c 7 -#000000 C 7 -#000000 P 3 30.5 54.1 27 44.1 23.5 54.1 ');
  });

  it('reads undirected and strict graphs', () => {
    const layout = read('strict graph { a -- b }');
    expect(layout.directed).toBe(false);
    expect(layout.strict).toBe(true);
    expect(layout.name).toBeUndefined();
    expect(layout.edges.map((e) => [e.tail, e.head])).toEqual([['a', 'b']]);
  });

  it('applies node defaults when a node is first seen', () => {
    const layout = read('digraph { node [width=2]; a; node [width=3]; b; a [height=1] }');
    expect(layout.nodes.map((n) => [n.name, n.width, n.height])).toEqual([
      ['a', '2', '1'],
      ['b', '3', undefined],
    ]);
  });

  it('keeps subgraph defaults inside the subgraph', () => {
    const layout = read('digraph { subgraph s { node [width=2]; a } b }');
    expect(layout.nodes.map((n) => n.width)).toEqual(['2', undefined]);
  });

  it('expands edge chains over subgraph operands', () => {
    const layout = read('digraph { a -> {b c} -> d [color=red] }');
    expect(layout.edges.map((e) => `${e.tail}${e.head}`)).toEqual(['ab', 'ac', 'bd', 'cd']);
    expect(layout.edges.every((e) => e.attributes.color === 'red')).toBe(true);
  });

  it('applies edge defaults', () => {
    const layout = read('digraph { edge [pos="1,1"]; a -> b; a -> c [pos="2,2"] }');
    expect(layout.edges.map((e) => e.pos)).toEqual(['1,1', '2,2']);
  });

  it('ignores ports on edge endpoints', () => {
    const layout = read('digraph { a:p1:n -> b:s }');
    expect(layout.edges.map((e) => [e.tail, e.head])).toEqual([['a', 'b']]);
  });

  it('reads quoted names with escapes and concatenation', () => {
    const layout = read('digraph { "say \\"hi\\"" ; "a" + "b"; c [URL="x\\"y"] }');
    expect(layout.nodes.map((n) => n.name)).toEqual(['say "hi"', 'ab', 'c']);
    expect(layout.nodes[2]?.url).toBe('x"y');
  });

  it('joins backslash-newline continuations in quoted values', () => {
    const layout = read('digraph { a [_draw_="e 1 1 \\\n1 1"] }');
    expect(layout.nodes[0]?.draw).toBe('e 1 1 1 1');
  });

  it('falls back to href for the node link', () => {
    const layout = read('digraph { a [href="http://example.com/h"] }');
    expect(layout.nodes[0]?.url).toBe('http://example.com/h');
  });

  it('reads HTML labels and numerals as ids', () => {
    const layout = read('digraph { 1 -> 2.5; a [label=<<b>x</b>>] }');
    expect(layout.nodes.map((n) => n.name)).toEqual(['1', '2.5', 'a']);
    expect(layout.nodes[2]?.attributes.label).toBe('<<b>x</b>>');
  });

  it('skips comments and preprocessor lines', () => {
    const layout = read('# 1 "file.dot"\ndigraph { // note\n a /* b */ }');
    expect(layout.nodes.map((n) => n.name)).toEqual(['a']);
  });

  it('orders drawing attributes root first, then subgraphs as they open', () => {
    const layout = read(
      'digraph { _draw_="root"; subgraph outer { graph [_draw_="outer", _ldraw_="outer label"]; subgraph inner { _draw_="inner" } } }'
    );
    expect(layout.drawAttributes).toEqual(['root', 'outer', 'outer label', 'inner']);
  });

  it('keeps subgraph attributes out of the root graph', () => {
    const layout = read('digraph { subgraph s { bb="1,2,3,4" } }');
    expect(layout.bb).toBeUndefined();
  });

  it('reports an unexpected character', () => {
    const out = readDot('digraph { a -> b @ }');
    expect(out.value).toBeNull();
    expect(out.diagnostics).toHaveLength(1);
    expect(out.diagnostics[0]).toMatchObject({ severity: 'error', code: 'DOT-LEXER', line: 1, column: 18 });
  });

  it('reports a dangling edge operator', () => {
    const out = readDot('digraph {\n  a -> \n}');
    expect(out.value).toBeNull();
    expect(out.diagnostics[0]).toMatchObject({ severity: 'error', code: 'DOT-PARSER', line: 3, column: 1 });
  });

  it('reports an unclosed graph body at the end of the text', () => {
    const out = readDot('digraph {\n  a');
    expect(out.value).toBeNull();
    expect(out.diagnostics[0]).toMatchObject({ code: 'DOT-PARSER', line: 2, column: 4 });
  });

  it('tells layout output from hand-written DOT', () => {
    expect(hasDrawingAttributes(readFixture('two-nodes.xdot'))).toBe(true);
    expect(hasDrawingAttributes('digraph { a -> b }')).toBe(false);
  });
});
