export interface Diagnostic {
  severity: 'error' | 'warning';
  code: string;
  message: string;
  // 1-based position in the DOT source, when the problem has one
  line?: number;
  column?: number;
  // e.g. `node "a" _draw_`
  element?: string;
  hint?: string;
  length?: number;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export type Point = { x: number; y: number };

// Graph-space → canvas-space transform used while reading xdot
export type Transform = (x: number, y: number) => [number, number];

export type Rgba = readonly [number, number, number, number];

// Identifies a node or edge within one Graph
export type ElementHandle = number;

export type HighlightSet = ReadonlySet<ElementHandle>;

export type InputFormat = 'dot' | 'xdot';
