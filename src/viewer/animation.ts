import type { Viewport } from './viewport.js';

// Seconds between ticks
export const ANIMATION_STEP = 0.03;

export type CancelTimer = () => void;

/**
 * Repeating timer. The callback runs every `intervalMs` until the returned function is called.
 */
export interface Scheduler {
  every(intervalMs: number, callback: () => void): CancelTimer;
}

// Monotonic time in seconds
export type Clock = () => number;

export const intervalScheduler: Scheduler = {
  every(intervalMs, callback) {
    const timer = setInterval(callback, intervalMs);
    return () => clearInterval(timer);
  },
};

export const systemClock: Clock = () => performance.now() / 1000;

export interface AnimationTiming {
  scheduler: Scheduler;
  clock: Clock;
}

/**
 * What an animation drives. Holds the single active animation.
 */
export interface AnimationHost {
  readonly viewport: Viewport;
  animation: Animation;
  queueDraw(): void;
}

export abstract class Animation {
  private cancel: CancelTimer | null = null;

  constructor(protected readonly host: AnimationHost, protected readonly timing: AnimationTiming) {}

  get running(): boolean {
    return this.cancel !== null;
  }

  start(): void {
    this.cancel = this.timing.scheduler.every(ANIMATION_STEP * 1000, () => {
      if (!this.tick()) this.stop();
    });
  }

  stop(): void {
    this.host.animation = new NoAnimation(this.host, this.timing);
    if (this.cancel) {
      this.cancel();
      this.cancel = null;
    }
  }

  // false ends the animation
  abstract tick(): boolean;
}

export class NoAnimation extends Animation {
  override start(): void {}

  override stop(): void {}

  tick(): boolean {
    return false;
  }
}

export abstract class LinearAnimation extends Animation {
  static readonly DURATION = 0.6;
  private started = 0;

  override start(): void {
    this.started = this.timing.clock();
    super.start();
  }

  tick(): boolean {
    const t = (this.timing.clock() - this.started) / LinearAnimation.DURATION;
    this.animate(Math.max(0, Math.min(t, 1)));
    return t < 1;
  }

  protected abstract animate(t: number): void;
}

export class MoveToAnimation extends LinearAnimation {
  readonly sourceX: number;
  readonly sourceY: number;

  constructor(host: AnimationHost, timing: AnimationTiming, readonly targetX: number, readonly targetY: number) {
    super(host, timing);
    this.sourceX = host.viewport.x;
    this.sourceY = host.viewport.y;
  }

  protected animate(t: number): void {
    const viewport = this.host.viewport;
    viewport.x = this.targetX * t + this.sourceX * (1 - t);
    viewport.y = this.targetY * t + this.sourceY * (1 - t);
    this.host.queueDraw();
  }
}

/**
 * Moves the focus to a target, zooming out half-way when the target is far off-screen
 */
export class ZoomToAnimation extends MoveToAnimation {
  readonly sourceZoom: number;
  readonly targetZoom: number;
  readonly extraZoom: number;

  constructor(host: AnimationHost, timing: AnimationTiming, targetX: number, targetY: number) {
    super(host, timing, targetX, targetY);
    const viewport = host.viewport;
    this.sourceZoom = viewport.zoomRatio;
    this.targetZoom = this.sourceZoom;

    const middleZoom = 0.5 * (this.sourceZoom + this.targetZoom);
    const distance = Math.hypot(this.sourceX - targetX, this.sourceY - targetY);
    const visible = 0.9 * Math.min(viewport.width, viewport.height) / viewport.zoomRatio;
    if (distance > 0) {
      const desiredMiddleZoom = visible / distance;
      this.extraZoom = Math.min(0, 4 * (desiredMiddleZoom - middleZoom));
    } else {
      this.extraZoom = 0;
    }
  }

  zoomAt(t: number): number {
    return this.targetZoom * t + this.extraZoom * t * (1 - t) + this.sourceZoom * (1 - t);
  }

  protected override animate(t: number): void {
    this.host.viewport.zoomRatio = this.zoomAt(t);
    super.animate(t);
  }
}
