// Public SDK surface for programmatic use
// Re-export core types
export type {
  Diagnostic,
  DiagnosticSink,
  ElementHandle,
  HighlightSet,
  InputFormat,
  Point,
  Rgba,
  Transform,
} from './core/types.js';

// Errors, diagnostics and configuration
export { GraphLoadError, GraphParseError, InconsistentLayoutError, LayoutError } from './core/errors.js';
export type { LoadErrorKind } from './core/errors.js';
export { collectDiagnostics } from './core/diagnostics.js';
export { renderReport, textReport, toJsonResult } from './core/format.js';
export { ViewerConfigSchema, resolveConfig } from './core/config.js';
export type { ViewerConfig, ViewerConfigInput } from './core/config.js';

// DOT reading
export { readDot, hasDrawingAttributes } from './dot/read.js';
export type { AnnotatedLayout, LayoutEdgeRecord, LayoutNodeRecord } from './dot/types.js';

// xdot drawing directives
export { parseXdotAttribute, XDotAttrParser } from './xdot/attr-parser.js';
export { resolveColor } from './xdot/colors.js';
export { DEFAULT_PEN, type Pen } from './xdot/pen.js';
export { drawShape, type Shape } from './xdot/shapes.js';

// Scene
export { Edge, Element, Node, type Jump, type Url } from './scene/elements.js';
export { Graph } from './scene/graph.js';
export { loadLayout, loadXdot, SceneBuilder, type LoadOptions, type LoadResult } from './scene/loader.js';
export { summarizeGraph, type SceneSummary } from './scene/summary.js';

// Interactive viewer
export { DotViewer, type ViewerHost, type ViewerOptions, type LoadRequest, type ClickedListener } from './viewer/viewer.js';
export { Viewport } from './viewer/viewport.js';
export { selectDragAction, type Cursor, type Modifiers, type PointerInput } from './viewer/actions.js';
export { intervalScheduler, systemClock, type Clock, type Scheduler } from './viewer/animation.js';

// Rendering
export * from './renderer/index.js';
