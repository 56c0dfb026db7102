import { z } from 'zod';
import { ViewerConfigSchema } from './core/config.js';
import type { Diagnostic } from './core/types.js';
import type { ILayoutEngine } from './renderer/interfaces.js';
import { GraphvizLayoutEngine, renderGraph } from './renderer/index.js';
import { summarizeGraph } from './scene/summary.js';

/**
 * Tool handlers behind the MCP server, kept free of transport concerns
 */

const SourceFields = {
  text: z.string().describe('Graphviz DOT source, or xdot output that already carries drawing attributes'),
  program: ViewerConfigSchema.shape.program,
  inputFormat: ViewerConfigSchema.shape.inputFormat,
};

// Input schemas using Zod
export const RenderGraphSchema = z.object({
  ...SourceFields,
  width: ViewerConfigSchema.shape.width,
  height: ViewerConfigSchema.shape.height,
  margin: ViewerConfigSchema.shape.margin,
});

export const HitTestSchema = z.object({
  ...SourceFields,
  x: z.number().describe('X in graph space (points from the left edge of the bounding box)'),
  y: z.number().describe('Y in graph space (points down from the top edge of the bounding box)'),
});

export interface ToolDeps {
  // Replaces the Graphviz engine, e.g. in tests
  layoutEngine?: ILayoutEngine;
}

function engineFor(program: string, deps: ToolDeps): ILayoutEngine {
  return deps.layoutEngine ?? new GraphvizLayoutEngine({ program });
}

function counts(diagnostics: Diagnostic[]) {
  return {
    errorCount: diagnostics.filter((d) => d.severity === 'error').length,
    warningCount: diagnostics.filter((d) => d.severity === 'warning').length,
  };
}

export async function renderGraphTool(args: unknown, deps: ToolDeps = {}) {
  const parsed = RenderGraphSchema.parse(args);
  const result = await renderGraph(parsed.text, {
    width: parsed.width,
    height: parsed.height,
    margin: parsed.margin,
    format: parsed.inputFormat,
    layoutEngine: engineFor(parsed.program, deps),
  });
  if (!result.ok) {
    return {
      ok: false as const,
      error: { kind: result.error.kind, message: result.error.message },
      ...counts(result.diagnostics),
      diagnostics: result.diagnostics,
    };
  }
  return {
    ok: true as const,
    svg: result.svg,
    scene: summarizeGraph(result.graph),
    ...counts(result.diagnostics),
    diagnostics: result.diagnostics,
  };
}

export async function hitTestTool(args: unknown, deps: ToolDeps = {}) {
  const parsed = HitTestSchema.parse(args);
  const result = await renderGraph(parsed.text, {
    format: parsed.inputFormat,
    layoutEngine: engineFor(parsed.program, deps),
  });
  if (!result.ok) {
    return { ok: false as const, error: { kind: result.error.kind, message: result.error.message }, diagnostics: result.diagnostics };
  }
  const { graph } = result;
  const p = { x: parsed.x, y: parsed.y };
  const url = graph.getUrl(p);
  const jump = graph.getJump(p);
  const nameOf = (handle: number) => {
    const element = graph.element(handle);
    if (!element) return null;
    return element.kind === 'node' ? element.name : `${element.src.name} -> ${element.dst.name}`;
  };
  return {
    ok: true as const,
    url: url ? { item: nameOf(url.item), url: url.url } : null,
    jump: jump ? { item: nameOf(jump.item), x: jump.x, y: jump.y, highlight: [...jump.highlight].map(nameOf) } : null,
  };
}
