import type { ILayoutEngine, LayoutRequest } from '../../src/renderer/interfaces.js';
import type { Cursor } from '../../src/viewer/actions.js';
import type { CancelTimer, Clock, Scheduler } from '../../src/viewer/animation.js';
import type { ViewerHost } from '../../src/viewer/viewer.js';

export class FakeClock {
  now = 0;
  readonly clock: Clock = () => this.now;
}

interface Timer {
  intervalMs: number;
  callback: () => void;
  cancelled: boolean;
}

// Timers fire only when the test says so
export class FakeScheduler implements Scheduler {
  readonly timers: Timer[] = [];

  every(intervalMs: number, callback: () => void): CancelTimer {
    const timer: Timer = { intervalMs, callback, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  get active(): Timer[] {
    return this.timers.filter((t) => !t.cancelled);
  }

  fire(): void {
    for (const t of this.active) t.callback();
  }
}

export class FakeHost implements ViewerHost {
  draws = 0;
  cursor: Cursor = 'default';
  errors: string[] = [];

  constructor(public width = 800, public height = 600) {}

  queueDraw(): void {
    this.draws++;
  }

  setCursor(cursor: Cursor): void {
    this.cursor = cursor;
  }

  showError(message: string): void {
    this.errors.push(message);
  }
}

interface PendingLayout {
  source: string;
  request: LayoutRequest;
  resolve: (xdot: string) => void;
  reject: (e: unknown) => void;
}

// Layout engine whose results the test hands out
export class DeferredLayoutEngine implements ILayoutEngine {
  readonly pending: PendingLayout[] = [];

  layout(source: string, request: LayoutRequest = {}): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      this.pending.push({ source, request, resolve, reject });
    });
  }
}

export class StaticLayoutEngine implements ILayoutEngine {
  readonly sources: string[] = [];

  constructor(private readonly xdot: string) {}

  layout(source: string): Promise<string> {
    this.sources.push(source);
    return Promise.resolve(this.xdot);
  }
}
