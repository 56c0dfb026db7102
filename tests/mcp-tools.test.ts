import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { hitTestTool, renderGraphTool } from '../src/mcp-tools.js';
import { readFixture } from './helpers/fixtures.js';
import { StaticLayoutEngine } from './helpers/fakes.js';

const FIXTURE = readFixture('two-nodes.xdot');

describe('render_graph tool', () => {
  it('returns the SVG and a scene summary', async () => {
    const out = await renderGraphTool({ text: 'digraph { a -> b }', width: 400 }, { layoutEngine: new StaticLayoutEngine(FIXTURE) });
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.svg).toContain('width="400" height="600"');
    expect(out.scene.nodes.map((n) => n.name)).toEqual(['a', 'b']);
    expect(out.scene.edges).toEqual([{ handle: 2, tail: 'a', head: 'b', points: 4, shapes: 3 }]);
    expect(out.errorCount).toBe(0);
    expect(out.warningCount).toBe(0);
  });

  it('reports a layout it cannot load', async () => {
    const out = await renderGraphTool({ text: 'digraph { a }', inputFormat: 'xdot' });
    expect(out).toMatchObject({
      ok: false,
      error: { kind: 'structure', message: 'The graph has no bounding box; was it laid out?' },
      errorCount: 1,
      warningCount: 0,
    });
  });

  it('validates its arguments', async () => {
    await expect(renderGraphTool({ width: 10 })).rejects.toBeInstanceOf(ZodError);
  });
});

describe('hit_test tool', () => {
  const deps = { layoutEngine: new StaticLayoutEngine(FIXTURE) };

  it('finds the link and jump of a node', async () => {
    const out = await hitTestTool({ text: FIXTURE, x: 27, y: 18 }, deps);
    expect(out).toEqual({
      ok: true,
      url: { item: 'a', url: 'http://example.com/a' },
      jump: { item: 'a', x: 27, y: 18, highlight: ['a'] },
    });
  });

  it('follows an edge end to the far node', async () => {
    const out = await hitTestTool({ text: FIXTURE, x: 27, y: 34 }, deps);
    expect(out).toEqual({
      ok: true,
      url: { item: 'a', url: 'http://example.com/a' },
      jump: { item: 'a -> b', x: 27, y: 98, highlight: ['a -> b', 'b'] },
    });
  });

  it('finds nothing on empty canvas', async () => {
    const out = await hitTestTool({ text: FIXTURE, x: 60, y: 60 }, deps);
    expect(out).toEqual({ ok: true, url: null, jump: null });
  });
});
