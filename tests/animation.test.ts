import { describe, it, expect } from 'vitest';
import {
  MoveToAnimation,
  NoAnimation,
  ZoomToAnimation,
  type Animation,
  type AnimationHost,
  type AnimationTiming,
} from '../src/viewer/animation.js';
import { Viewport } from '../src/viewer/viewport.js';
import { FakeClock, FakeScheduler } from './helpers/fakes.js';

class TestHost implements AnimationHost {
  readonly viewport = new Viewport(800, 600);
  animation: Animation;
  draws = 0;

  constructor(timing: AnimationTiming) {
    this.animation = new NoAnimation(this, timing);
  }

  queueDraw(): void {
    this.draws++;
  }
}

function setup() {
  const clock = new FakeClock();
  const scheduler = new FakeScheduler();
  const timing: AnimationTiming = { scheduler, clock: clock.clock };
  const host = new TestHost(timing);
  return { clock, scheduler, timing, host };
}

describe('animations', () => {
  it('moves the focus linearly and stops at the target', () => {
    const { clock, scheduler, timing, host } = setup();
    const move = new MoveToAnimation(host, timing, 100, 40);
    host.animation = move;
    move.start();
    expect(scheduler.active).toHaveLength(1);
    expect(scheduler.active[0]?.intervalMs).toBeCloseTo(30);
    expect(move.running).toBe(true);

    clock.now = 0.3;
    scheduler.fire();
    expect([host.viewport.x, host.viewport.y]).toEqual([50, 20]);
    expect(host.draws).toBe(1);

    clock.now = 0.6;
    scheduler.fire();
    expect([host.viewport.x, host.viewport.y]).toEqual([100, 40]);
    expect(scheduler.active).toHaveLength(0);
    expect(move.running).toBe(false);
    expect(host.animation).toBeInstanceOf(NoAnimation);
  });

  it('clamps late ticks to the target', () => {
    const { clock, scheduler, timing, host } = setup();
    const move = new MoveToAnimation(host, timing, 100, 0);
    move.start();
    clock.now = 5;
    scheduler.fire();
    expect(host.viewport.x).toBe(100);
    expect(scheduler.active).toHaveLength(0);
  });

  it('stop disarms the timer and leaves a no-op animation', () => {
    const { scheduler, timing, host } = setup();
    const move = new MoveToAnimation(host, timing, 100, 0);
    host.animation = move;
    move.start();
    move.stop();
    expect(scheduler.active).toHaveLength(0);
    expect(host.animation).toBeInstanceOf(NoAnimation);
    expect(host.animation.running).toBe(false);
  });

  it('zooms out half-way toward a far target', () => {
    const { timing, host } = setup();
    const zoom = new ZoomToAnimation(host, timing, 1000, 0);
    // visible = 0.9 * 600 / 1 = 540; desired middle = 0.54
    expect(zoom.extraZoom).toBeCloseTo(-1.84, 10);
    expect(zoom.zoomAt(0)).toBe(1);
    expect(zoom.zoomAt(0.5)).toBeCloseTo(0.54, 10);
    expect(zoom.zoomAt(1)).toBe(1);
  });

  it('never zooms in toward a near target', () => {
    const { timing, host } = setup();
    const zoom = new ZoomToAnimation(host, timing, 100, 0);
    expect(zoom.extraZoom).toBe(0);
  });

  it('holds still when the target is the current focus', () => {
    const { clock, scheduler, timing, host } = setup();
    host.viewport.x = 7;
    host.viewport.y = 9;
    host.viewport.zoomRatio = 3;
    const zoom = new ZoomToAnimation(host, timing, 7, 9);
    expect(zoom.extraZoom).toBe(0);
    zoom.start();
    for (const t of [0.1, 0.25, 0.45, 0.6]) {
      clock.now = t;
      scheduler.fire();
      expect(host.viewport.zoomRatio).toBeCloseTo(3, 12);
      expect(host.viewport.x).toBeCloseTo(7, 12);
      expect(host.viewport.y).toBeCloseTo(9, 12);
    }
    expect(scheduler.active).toHaveLength(0);
  });
});
