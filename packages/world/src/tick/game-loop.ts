import { EventEmitter } from 'events';
import { CATCH_UP_LIMIT, DEFAULT_TICK_RATE, MAX_DELTA_TIME } from '@tilecrawl/protocol';

/**
 * Game loop configuration
 */
export interface GameLoopConfig {
  tickRate: number;      // Target ticks per second
  maxDeltaTime: number;  // Maximum delta time (ms)
  catchUpLimit: number;  // Maximum ticks to catch up
}

/**
 * Context passed to tick handlers
 */
export interface TickContext {
  tick: number;
  deltaTime: number; // ms, always the fixed step
  timestamp: number;
  lag: number;
}

export type TickHandler = (ctx: TickContext) => void;

/**
 * Fixed timestep game loop with lag compensation.
 * Handlers run synchronously; a throwing handler aborts the rest of that
 * tick and is reported as 'tickError'. Every finished tick is reported as
 * 'tickComplete', and as 'tickSlow' when it used most of its budget.
 */
export class GameLoop extends EventEmitter {
  private config: GameLoopConfig;
  private running: boolean = false;
  private paused: boolean = false;
  private tick: number = 0;
  private lastTime: number = 0;
  private accumulator: number = 0;
  private tickInterval: number;
  private timer: NodeJS.Timeout | null = null;

  private preTickHandlers: TickHandler[] = [];
  private tickHandlers: TickHandler[] = [];
  private postTickHandlers: TickHandler[] = [];

  constructor(config: Partial<GameLoopConfig> = {}) {
    super();
    this.config = {
      tickRate: DEFAULT_TICK_RATE,
      maxDeltaTime: MAX_DELTA_TIME,
      catchUpLimit: CATCH_UP_LIMIT,
      ...config,
    };
    if (this.config.tickRate <= 0) {
      throw new RangeError(`Tick rate must be positive, got ${this.config.tickRate}`);
    }
    this.tickInterval = 1000 / this.config.tickRate;
  }

  /**
   * Register handler for pre-tick phase (input gathering)
   */
  onPreTick(handler: TickHandler): void {
    this.preTickHandlers.push(handler);
  }

  /**
   * Register handler for tick phase (game logic)
   */
  onTick(handler: TickHandler): void {
    this.tickHandlers.push(handler);
  }

  /**
   * Register handler for post-tick phase (drawing)
   */
  onPostTick(handler: TickHandler): void {
    this.postTickHandlers.push(handler);
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.paused = false;
    this.lastTime = Date.now();
    this.accumulator = 0;
    this.tick = 0;

    this.scheduleNextFrame();
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    this.paused = false;
    this.cancelFrame();
  }

  /**
   * Stop scheduling ticks without ending the run
   */
  pause(): void {
    if (!this.running || this.paused) return;

    this.paused = true;
    this.cancelFrame();
  }

  /**
   * Continue after pause(). Time spent paused is not caught up.
   */
  resume(): void {
    if (!this.running || !this.paused) return;

    this.paused = false;
    this.lastTime = Date.now();
    this.accumulator = 0;
    this.scheduleNextFrame();
  }

  private cancelFrame(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private scheduleNextFrame(): void {
    if (!this.running || this.paused) return;

    const elapsed = Date.now() - this.lastTime;
    const nextTickIn = Math.max(0, this.tickInterval - elapsed);

    this.timer = setTimeout(() => this.frame(), nextTickIn);
  }

  /**
   * Execute one frame (may contain multiple ticks)
   */
  private frame(): void {
    if (!this.running || this.paused) return;

    const now = Date.now();
    const deltaTime = Math.min(now - this.lastTime, this.config.maxDeltaTime);
    this.lastTime = now;
    this.accumulator += deltaTime;

    let ticksProcessed = 0;
    while (
      this.running &&
      !this.paused &&
      this.accumulator >= this.tickInterval &&
      ticksProcessed < this.config.catchUpLimit
    ) {
      this.processTick({
        tick: this.tick,
        deltaTime: this.tickInterval,
        timestamp: now,
        lag: this.accumulator,
      });

      this.accumulator -= this.tickInterval;
      this.tick++;
      ticksProcessed++;
    }

    // Drop accumulated time if we hit catch-up limit
    if (this.running && !this.paused && this.accumulator >= this.tickInterval) {
      this.emit('lagWarning', { droppedTime: this.accumulator - this.tickInterval });
      this.accumulator = this.accumulator % this.tickInterval;
    }

    this.scheduleNextFrame();
  }

  private processTick(ctx: TickContext): void {
    const startTime = Date.now();

    try {
      for (const handler of this.preTickHandlers) handler(ctx);
      for (const handler of this.tickHandlers) handler(ctx);
      for (const handler of this.postTickHandlers) handler(ctx);

      const tickTime = Date.now() - startTime;
      this.emit('tickComplete', { tick: ctx.tick, duration: tickTime });

      if (tickTime > this.tickInterval * 0.8) {
        this.emit('tickSlow', {
          tick: ctx.tick,
          duration: tickTime,
          budget: this.tickInterval,
        });
      }
    } catch (error) {
      this.emit('tickError', { tick: ctx.tick, error });
    }
  }

  getStats(): { tick: number; tickRate: number; running: boolean; paused: boolean } {
    return {
      tick: this.tick,
      tickRate: this.config.tickRate,
      running: this.running,
      paused: this.paused,
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }
}
