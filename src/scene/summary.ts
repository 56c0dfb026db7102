import type { ElementHandle } from '../core/types.js';
import { countShapes } from '../xdot/shapes.js';
import type { Graph } from './graph.js';

export interface NodeSummary {
  handle: ElementHandle;
  name: string;
  x: number;
  y: number;
  url?: string;
  shapes: number;
}

export interface EdgeSummary {
  handle: ElementHandle;
  tail: string;
  head: string;
  points: number;
  shapes: number;
}

export interface SceneSummary {
  width: number;
  height: number;
  background: number;
  nodes: NodeSummary[];
  edges: EdgeSummary[];
}

// Plain-data view of a loaded graph, for JSON output
export function summarizeGraph(graph: Graph): SceneSummary {
  return {
    width: graph.width,
    height: graph.height,
    background: countShapes(graph.shapes),
    nodes: graph.nodes.map((n) => ({
      handle: n.handle,
      name: n.name,
      x: n.x,
      y: n.y,
      ...(n.url !== undefined ? { url: n.url } : {}),
      shapes: countShapes(n.shapes),
    })),
    edges: graph.edges.map((e) => ({
      handle: e.handle,
      tail: e.src.name,
      head: e.dst.name,
      points: e.points.length,
      shapes: countShapes(e.shapes),
    })),
  };
}
