import type { DiagnosticSink, HighlightSet, InputFormat } from '../core/types.js';
import { error } from '../core/errorBuilder.js';
import { GraphLoadError, LayoutError } from '../core/errors.js';
import { ZOOM_TO_FIT_MARGIN } from '../core/config.js';
import { hasDrawingAttributes } from '../dot/read.js';
import type { ILayoutEngine } from '../renderer/interfaces.js';
import { GraphvizLayoutEngine } from '../renderer/layout.js';
import { paintView } from '../renderer/paint.js';
import type { DrawingSurface } from '../renderer/surface.js';
import type { Jump, Url } from '../scene/elements.js';
import { Graph } from '../scene/graph.js';
import { loadXdot, type LoadResult } from '../scene/loader.js';
import {
  createDragAction,
  NullAction,
  selectDragAction,
  type ActionHost,
  type Cursor,
  type DragAction,
  type PointerInput,
} from './actions.js';
import {
  intervalScheduler,
  NoAnimation,
  systemClock,
  ZoomToAnimation,
  type Animation,
  type AnimationHost,
  type AnimationTiming,
  type Clock,
  type Scheduler,
} from './animation.js';
import { Viewport } from './viewport.js';

/**
 * What the viewer needs from the window it lives in
 */
export interface ViewerHost {
  // allocation in pixels
  readonly width: number;
  readonly height: number;
  queueDraw(): void;
  setCursor(cursor: Cursor): void;
  showError?(message: string): void;
}

export interface ViewerOptions {
  layoutEngine?: ILayoutEngine;
  scheduler?: Scheduler;
  clock?: Clock;
  margin?: number;
  diagnostics?: DiagnosticSink;
}

export interface LoadRequest {
  // 'auto' skips layout when the text already carries drawing attributes
  format?: InputFormat | 'auto';
  // used in error messages
  filename?: string;
}

export type ClickedListener = (url: string, event: PointerInput) => void;

export type ScrollDirection = 'up' | 'down';

// Pixels the pointer may travel between press and release for a click
export const CLICK_FUZZ = 4;
// Seconds
export const CLICK_TIMEOUT = 1.0;

function sameHighlight(a: HighlightSet | null, b: HighlightSet | null): boolean {
  if (a === b) return true;
  if (!a || !b || a.size !== b.size) return false;
  for (const h of a) if (!b.has(h)) return false;
  return true;
}

function superseded(): LoadResult {
  const failure = new LayoutError('Load superseded by a newer one', [error('LAYOUT-ABORTED', 'Load superseded by a newer one')], true);
  return { ok: false, error: failure, diagnostics: failure.diagnostics };
}

/**
 * Interactive view of one graph: pointer and key handling, animation, and drawing onto a surface
 */
export class DotViewer implements AnimationHost, ActionHost {
  graph: Graph = new Graph();
  readonly viewport: Viewport;
  animation: Animation;
  highlight: HighlightSet | null = null;

  private dragAction: DragAction;
  private pressTime: number | null = null;
  private pressX = 0;
  private pressY = 0;
  private loading: AbortController | null = null;
  private readonly clickedListeners: ClickedListener[] = [];
  private readonly timing: AnimationTiming;
  private readonly layoutEngine: ILayoutEngine;
  private readonly margin: number;

  constructor(private readonly host: ViewerHost, private readonly options: ViewerOptions = {}) {
    this.viewport = new Viewport(host.width, host.height);
    this.timing = { scheduler: options.scheduler ?? intervalScheduler, clock: options.clock ?? systemClock };
    this.layoutEngine = options.layoutEngine ?? new GraphvizLayoutEngine();
    this.margin = options.margin ?? ZOOM_TO_FIT_MARGIN;
    this.animation = new NoAnimation(this, this.timing);
    this.dragAction = new NullAction(this);
  }

  get dragActionKind(): DragAction['kind'] {
    return this.dragAction.kind;
  }

  onClicked(listener: ClickedListener): () => void {
    this.clickedListeners.push(listener);
    return () => {
      const i = this.clickedListeners.indexOf(listener);
      if (i >= 0) this.clickedListeners.splice(i, 1);
    };
  }

  /**
   * Lays out (unless the text is already xdot) and shows a graph.
   * A newer load supersedes this one; a failed load keeps the current graph.
   */
  async load(source: string, request: LoadRequest = {}): Promise<LoadResult> {
    this.loading?.abort();
    const controller = new AbortController();
    this.loading = controller;
    this.animation.stop();

    const format = request.format ?? 'auto';
    const isXdot = format === 'xdot' || (format === 'auto' && hasDrawingAttributes(source));
    let xdot = source;
    if (!isXdot) {
      try {
        xdot = await this.layoutEngine.layout(source, { signal: controller.signal });
      } catch (e) {
        if (controller.signal.aborted) return superseded();
        const message = e instanceof Error ? e.message : String(e);
        const failure = e instanceof LayoutError ? e : new LayoutError(message, [error('LAYOUT-FAILED', message)]);
        this.loading = null;
        this.reportFailure(failure, request.filename);
        return { ok: false, error: failure, diagnostics: failure.diagnostics };
      }
    }
    if (controller.signal.aborted) return superseded();
    this.loading = null;
    return this.applyXdot(xdot, request.filename);
  }

  // Shows already laid-out xdot text
  setXdotCode(xdot: string, filename?: string): LoadResult {
    this.loading?.abort();
    this.loading = null;
    this.animation.stop();
    return this.applyXdot(xdot, filename);
  }

  setGraph(graph: Graph): void {
    this.graph = graph;
    this.highlight = null;
    this.dragAction.abort();
    this.dragAction = new NullAction(this);
    this.zoomToFit();
  }

  // ActionHost

  queueDraw(): void {
    this.host.queueDraw();
  }

  setCursor(cursor: Cursor): void {
    this.host.setCursor(cursor);
  }

  setHighlight(highlight: HighlightSet | null): void {
    if (!sameHighlight(this.highlight, highlight)) {
      this.highlight = highlight;
      this.queueDraw();
    }
  }

  getUrl(wx: number, wy: number): Url | null {
    this.syncAllocation();
    return this.graph.getUrl(this.viewport.windowToGraph(wx, wy));
  }

  getJump(wx: number, wy: number): Jump | null {
    this.syncAllocation();
    return this.graph.getJump(this.viewport.windowToGraph(wx, wy));
  }

  // View commands

  zoomToFit(): void {
    this.syncAllocation();
    this.viewport.zoomToFit(this.graph, this.margin);
    this.queueDraw();
  }

  zoomIn(): void {
    this.viewport.zoomIn();
    this.queueDraw();
  }

  zoomOut(): void {
    this.viewport.zoomOut();
    this.queueDraw();
  }

  zoom100(): void {
    this.viewport.zoom100();
    this.queueDraw();
  }

  animateTo(x: number, y: number): void {
    this.syncAllocation();
    this.animation.stop();
    this.animation = new ZoomToAnimation(this, this.timing, x, y);
    this.animation.start();
  }

  // Events

  onButtonPress(event: PointerInput): void {
    this.syncAllocation();
    this.animation.stop();
    this.dragAction.abort();
    this.dragAction = createDragAction(selectDragAction(event.button, event.modifiers), this);
    this.dragAction.onButtonPress(event);
    this.pressTime = this.timing.clock();
    this.pressX = event.x;
    this.pressY = event.y;
  }

  onMotion(event: PointerInput): void {
    this.syncAllocation();
    this.dragAction.onMotion(event);
  }

  // Returns whether the event was handled
  onButtonRelease(event: PointerInput): boolean {
    this.syncAllocation();
    this.dragAction.onButtonRelease(event);
    this.dragAction = new NullAction(this);
    if (event.button === 1 && this.isClick(event)) {
      const url = this.getUrl(event.x, event.y);
      if (url) {
        for (const listener of [...this.clickedListeners]) listener(url.url, event);
      } else {
        const jump = this.getJump(event.x, event.y);
        if (jump) {
          this.setHighlight(jump.highlight);
          this.animateTo(jump.x, jump.y);
        }
      }
      return true;
    }
    return event.button === 1 || event.button === 2;
  }

  isClick(event: PointerInput, fuzz = CLICK_FUZZ, timeout = CLICK_TIMEOUT): boolean {
    // release without a press
    if (this.pressTime === null) return false;
    const dx = this.pressX - event.x;
    const dy = this.pressY - event.y;
    return this.timing.clock() < this.pressTime + timeout && Math.hypot(dx, dy) < fuzz;
  }

  onScroll(direction: ScrollDirection): boolean {
    if (direction === 'up') this.zoomIn();
    else this.zoomOut();
    return true;
  }

  // Key names as in KeyboardEvent.key
  onKeyPress(key: string): boolean {
    this.syncAllocation();
    switch (key) {
      case 'ArrowLeft': this.viewport.pan('left'); break;
      case 'ArrowRight': this.viewport.pan('right'); break;
      case 'ArrowUp': this.viewport.pan('up'); break;
      case 'ArrowDown': this.viewport.pan('down'); break;
      case 'PageUp':
      case '+':
        this.viewport.zoomIn();
        break;
      case 'PageDown':
      case '-':
        this.viewport.zoomOut();
        break;
      case '1': this.viewport.zoom100(); break;
      case 'f':
        this.zoomToFit();
        return true;
      case 'Escape':
        this.dragAction.abort();
        this.dragAction = new NullAction(this);
        return true;
      default:
        return false;
    }
    this.queueDraw();
    return true;
  }

  draw(surface: DrawingSurface): void {
    this.syncAllocation();
    paintView(surface, this.graph, this.viewport, this.highlight, (overlay) => this.dragAction.draw(overlay));
  }

  private applyXdot(xdot: string, filename?: string): LoadResult {
    const result = loadXdot(xdot, { diagnostics: this.options.diagnostics });
    if (result.ok) {
      this.setGraph(result.graph);
    } else {
      this.reportFailure(result.error, filename);
    }
    return result;
  }

  private reportFailure(failure: GraphLoadError, filename = '<stdin>'): void {
    const message = failure.kind === 'layout'
      ? `Could not lay out ${filename}: ${failure.message}`
      : `Could not parse ${filename}, is it a valid dot file? ${failure.message}`;
    this.host.showError?.(message);
  }

  private syncAllocation(): void {
    this.viewport.setAllocation(this.host.width, this.host.height);
  }
}
