import type { Diagnostic } from './types.js';

export type LoadErrorKind = 'syntax' | 'structure' | 'inconsistent-layout' | 'layout';

/**
 * Fatal failure of a graph load. No graph is produced; the caller keeps whatever it showed before.
 */
export class GraphLoadError extends Error {
  readonly kind: LoadErrorKind;
  readonly diagnostics: Diagnostic[];

  constructor(kind: LoadErrorKind, message: string, diagnostics: Diagnostic[]) {
    super(message);
    this.name = 'GraphLoadError';
    this.kind = kind;
    this.diagnostics = diagnostics;
  }
}

// The DOT text could not be read, or the layout carries no bounding box
export class GraphParseError extends GraphLoadError {
  constructor(message: string, diagnostics: Diagnostic[], kind: 'syntax' | 'structure' = 'structure') {
    super(kind, message, diagnostics);
    this.name = 'GraphParseError';
  }
}

// An edge names a node the layout never positioned
export class InconsistentLayoutError extends GraphLoadError {
  constructor(message: string, diagnostics: Diagnostic[]) {
    super('inconsistent-layout', message, diagnostics);
    this.name = 'InconsistentLayoutError';
  }
}

// The layout engine failed or was aborted
export class LayoutError extends GraphLoadError {
  readonly aborted: boolean;

  constructor(message: string, diagnostics: Diagnostic[], aborted = false) {
    super('layout', message, diagnostics);
    this.name = 'LayoutError';
    this.aborted = aborted;
  }
}
