import type { Diagnostic, DiagnosticSink, ElementHandle, Point } from '../core/types.js';
import { collectDiagnostics } from '../core/diagnostics.js';
import { error, warning } from '../core/errorBuilder.js';
import { GraphLoadError, GraphParseError, InconsistentLayoutError } from '../core/errors.js';
import type { AnnotatedLayout, LayoutEdgeRecord, LayoutNodeRecord } from '../dot/types.js';
import { readDot } from '../dot/read.js';
import { parseXdotAttribute } from '../xdot/attr-parser.js';
import type { Shape } from '../xdot/shapes.js';
import { Edge, Node } from './elements.js';
import { Graph } from './graph.js';

export interface LoadOptions {
  // Receives non-fatal diagnostics as they happen
  diagnostics?: DiagnosticSink;
}

export type LoadResult =
  | { ok: true; graph: Graph; layout: AnnotatedLayout; diagnostics: Diagnostic[] }
  | { ok: false; error: GraphLoadError; diagnostics: Diagnostic[] };

// Points per inch; node sizes are given in inches
const POINTS_PER_INCH = 72;

const NODE_DRAW_ATTRS = ['draw', 'ldraw'] as const;
const EDGE_DRAW_ATTRS = ['draw', 'ldraw', 'hdraw', 'tdraw', 'hldraw', 'tldraw'] as const;

function quoteName(name: string): string {
  return `"${name}"`;
}

/**
 * Turns an AnnotatedLayout into a Graph in canvas space.
 * One instance per load: the coordinate transform is fixed by the layout's bounding box.
 */
export class SceneBuilder {
  private xoffset = 0;
  private yoffset = 0;
  private xscale = 1.0;
  private yscale = -1.0;
  private nextHandle: ElementHandle = 0;

  constructor(private readonly sink: DiagnosticSink) {}

  build(layout: AnnotatedLayout): Graph {
    if (layout.bb === undefined) {
      throw new GraphParseError('The graph has no bounding box; was it laid out?', [
        error('LAYOUT-MISSING-BB', 'Missing "bb" attribute on the graph', { hint: 'Run the graph through a Graphviz program with -Txdot first.' }),
      ]);
    }
    const [xmin, ymin, xmax, ymax] = this.parseBoundingBox(layout.bb);

    // Flip the engine's y-up space into y-down canvas space with the box's top-left at the origin
    this.xoffset = -xmin;
    this.yoffset = -ymax;
    this.xscale = 1.0;
    this.yscale = -1.0;

    const width = xmax - xmin;
    const height = ymax - ymin;

    const background: Shape[] = [];
    for (const attr of layout.drawAttributes) {
      background.push(...this.interpret(attr, 'graph _draw_'));
    }

    const nodes: Node[] = [];
    const nodeByName = new Map<string, Node>();
    for (const record of layout.nodes) {
      const node = this.buildNode(record);
      if (!node) continue;
      nodeByName.set(record.name, node);
      if (node.shapes.length > 0) nodes.push(node);
    }

    const edges: Edge[] = [];
    for (const record of layout.edges) {
      const edge = this.buildEdge(record, nodeByName);
      if (edge) edges.push(edge);
    }

    return new Graph(width, height, nodes, edges, background);
  }

  transform = (x: number, y: number): [number, number] => {
    return [(x + this.xoffset) * this.xscale, (y + this.yoffset) * this.yscale];
  };

  private parseBoundingBox(bb: string): [number, number, number, number] {
    const parts = bb.split(',').map((s) => parseFloat(s));
    const [xmin, ymin, xmax, ymax] = parts;
    if (
      parts.length !== 4
      || xmin === undefined || ymin === undefined || xmax === undefined || ymax === undefined
      || parts.some((n) => !Number.isFinite(n))
    ) {
      throw new GraphParseError(`Malformed bounding box "${bb}"`, [
        error('LAYOUT-BAD-BB', `Malformed "bb" attribute "${bb}"`, { hint: 'Expected four numbers: xmin,ymin,xmax,ymax' }),
      ]);
    }
    return [xmin, ymin, xmax, ymax];
  }

  private interpret(attr: string, element: string): Shape[] {
    return parseXdotAttribute(attr, { transform: this.transform, diagnostics: this.sink, element });
  }

  private buildNode(record: LayoutNodeRecord): Node | null {
    if (record.pos === undefined) return null;
    const pos = this.parseNodePos(record.pos);
    if (!pos) {
      this.sink(warning('LAYOUT-BAD-POS', `Malformed node position "${record.pos}"`, { element: `node ${quoteName(record.name)}` }));
      return null;
    }
    const w = parseFloat(record.width ?? '0') * POINTS_PER_INCH;
    const h = parseFloat(record.height ?? '0') * POINTS_PER_INCH;

    const shapes: Shape[] = [];
    for (const key of NODE_DRAW_ATTRS) {
      const attr = record[key];
      if (attr !== undefined) shapes.push(...this.interpret(attr, `node ${quoteName(record.name)} _${key}_`));
    }
    return new Node(
      this.nextHandle++,
      record.name,
      pos.x,
      pos.y,
      Number.isFinite(w) ? w : 0,
      Number.isFinite(h) ? h : 0,
      shapes,
      record.url,
    );
  }

  private buildEdge(record: LayoutEdgeRecord, nodeByName: Map<string, Node>): Edge | null {
    if (record.pos === undefined) return null;
    const label = `edge ${quoteName(record.tail)} -> ${quoteName(record.head)}`;
    const points = this.parseEdgePos(record.pos);

    const shapes: Shape[] = [];
    for (const key of EDGE_DRAW_ATTRS) {
      const attr = record[key];
      if (attr !== undefined) shapes.push(...this.interpret(attr, `${label} _${key}_`));
    }
    if (shapes.length === 0) return null;

    const src = nodeByName.get(record.tail);
    const dst = nodeByName.get(record.head);
    if (!src || !dst) {
      const missing = src ? record.head : record.tail;
      throw new InconsistentLayoutError(`Edge refers to node ${quoteName(missing)}, which the layout did not position`, [
        error('LAYOUT-UNKNOWN-NODE', `Unknown node ${quoteName(missing)}`, { element: label }),
      ]);
    }
    return new Edge(this.nextHandle++, src, dst, points, shapes);
  }

  private parseNodePos(pos: string): Point | null {
    // a trailing "!" marks a pinned position
    const [xs, ys] = pos.split(',');
    const x = parseFloat(xs ?? '');
    const y = parseFloat(ys ?? '');
    if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
    const [cx, cy] = this.transform(x, y);
    return { x: cx, y: cy };
  }

  // "e,x,y" and "s,x,y" entries mark arrow tips and are skipped
  private parseEdgePos(pos: string): Point[] {
    const points: Point[] = [];
    for (const entry of pos.trim().split(/\s+/)) {
      const fields = entry.split(',');
      if (fields.length !== 2) continue;
      const x = parseFloat(fields[0] ?? '');
      const y = parseFloat(fields[1] ?? '');
      if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
      const [cx, cy] = this.transform(x, y);
      points.push({ x: cx, y: cy });
    }
    return points;
  }
}

export function loadLayout(layout: AnnotatedLayout, options: LoadOptions = {}): LoadResult {
  const { sink, diagnostics } = collectDiagnostics(options.diagnostics);
  try {
    const graph = new SceneBuilder(sink).build(layout);
    return { ok: true, graph, layout, diagnostics };
  } catch (e) {
    if (e instanceof GraphLoadError) {
      for (const d of e.diagnostics) sink(d);
      return { ok: false, error: e, diagnostics };
    }
    throw e;
  }
}

/**
 * Reads the layout engine's xdot output and builds the Graph it describes
 */
export function loadXdot(text: string, options: LoadOptions = {}): LoadResult {
  const read = readDot(text);
  if (!read.value) {
    const { sink, diagnostics } = collectDiagnostics(options.diagnostics);
    for (const d of read.diagnostics) sink(d);
    const first = read.diagnostics[0];
    const message = first ? `Could not read the graph: ${first.message}` : 'Could not read the graph';
    return { ok: false, error: new GraphParseError(message, read.diagnostics, 'syntax'), diagnostics };
  }
  return loadLayout(read.value, options);
}
