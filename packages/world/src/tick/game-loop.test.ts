import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GameLoop, type TickContext } from './game-loop.js';

describe('GameLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs one tick per interval through every phase in order', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const order: string[] = [];
    loop.onPreTick((ctx) => order.push(`pre${ctx.tick}`));
    loop.onTick((ctx) => order.push(`tick${ctx.tick}`));
    loop.onPostTick((ctx) => order.push(`post${ctx.tick}`));

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    expect(order).toEqual(['pre0', 'tick0', 'post0', 'pre1', 'tick1', 'post1']);
    expect(loop.getStats()).toEqual({ tick: 2, tickRate: 10, running: false, paused: false });
  });

  it('passes the fixed step as delta time', () => {
    const loop = new GameLoop({ tickRate: 20 });
    const deltas: number[] = [];
    loop.onTick((ctx: TickContext) => deltas.push(ctx.deltaTime));

    loop.start();
    vi.advanceTimersByTime(100);
    loop.stop();

    expect(deltas).toEqual([50, 50]);
  });

  it('reports a throwing handler and keeps running', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const errors: Array<{ tick: number; error: unknown }> = [];
    const after = vi.fn();
    loop.on('tickError', (payload: { tick: number; error: unknown }) => errors.push(payload));
    loop.onTick((ctx) => {
      if (ctx.tick === 0) throw new Error('boom');
    });
    loop.onPostTick(after);

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    expect(errors).toHaveLength(1);
    expect(errors[0]?.tick).toBe(0);
    expect(after).toHaveBeenCalledTimes(1);
    expect(loop.getStats().tick).toBe(2);
  });

  it('stops from inside a handler without running further ticks', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const ticks: number[] = [];
    loop.onTick((ctx) => {
      ticks.push(ctx.tick);
      loop.stop();
    });

    loop.start();
    vi.advanceTimersByTime(500);

    expect(ticks).toEqual([0]);
    expect(loop.isRunning()).toBe(false);
  });

  it('ignores repeated start and stop calls', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const ticks: number[] = [];
    loop.onTick((ctx) => ticks.push(ctx.tick));

    loop.start();
    vi.advanceTimersByTime(100);
    loop.start();
    vi.advanceTimersByTime(100);
    loop.stop();
    loop.stop();

    expect(ticks).toEqual([0, 1]);
    expect(loop.isRunning()).toBe(false);
  });

  it('reports every finished tick with its duration', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const completed: Array<{ tick: number; duration: number }> = [];
    loop.on('tickComplete', (payload: { tick: number; duration: number }) => completed.push(payload));

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    expect(completed).toEqual([
      { tick: 0, duration: 0 },
      { tick: 1, duration: 0 },
    ]);
  });

  it('flags a tick that used most of its budget', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const slow: Array<{ tick: number; duration: number; budget: number }> = [];
    loop.on('tickSlow', (payload: { tick: number; duration: number; budget: number }) => slow.push(payload));
    loop.onTick((ctx) => {
      if (ctx.tick === 0) vi.setSystemTime(Date.now() + 90);
    });

    loop.start();
    vi.advanceTimersByTime(100);
    loop.stop();

    expect(slow).toEqual([{ tick: 0, duration: 90, budget: 100 }]);
  });

  it('runs no ticks while paused and does not catch up afterwards', () => {
    const loop = new GameLoop({ tickRate: 10 });
    const ticks: number[] = [];
    const lag = vi.fn();
    loop.on('lagWarning', lag);
    loop.onTick((ctx) => ticks.push(ctx.tick));

    loop.start();
    vi.advanceTimersByTime(100);
    loop.pause();
    expect(loop.getStats()).toMatchObject({ running: true, paused: true });
    vi.advanceTimersByTime(1000);
    expect(ticks).toEqual([0]);

    loop.resume();
    vi.advanceTimersByTime(100);
    loop.stop();

    expect(ticks).toEqual([0, 1]);
    expect(lag).not.toHaveBeenCalled();
  });

  it('ignores pause and resume while stopped', () => {
    const loop = new GameLoop();

    loop.pause();
    expect(loop.isPaused()).toBe(false);

    loop.start();
    loop.pause();
    loop.stop();
    expect(loop.isPaused()).toBe(false);
    loop.resume();
    expect(loop.isRunning()).toBe(false);
  });

  it('rejects a non-positive tick rate', () => {
    expect(() => new GameLoop({ tickRate: 0 })).toThrow(RangeError);
  });
});
