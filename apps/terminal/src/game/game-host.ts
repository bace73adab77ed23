import { EventEmitter } from 'events';
import {
  DEFAULT_TERMINAL_COLS,
  DEFAULT_TERMINAL_ROWS,
  SILENT_DIAGNOSTICS,
  type Diagnostics,
  type GameEvent,
} from '@tilecrawl/protocol';
import {
  GameLoop,
  InvariantViolationError,
  generateLevel,
  type WorldSession,
} from '@tilecrawl/world';
import { InputHandler, TerminalGridRenderer, type InputAction } from '@tilecrawl/render';
import type { GameConfig } from '../config.js';
import { FrameStats } from './frame-stats.js';

/**
 * Keyboard side of a terminal (process.stdin in a TTY)
 */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Screen side of a terminal (process.stdout in a TTY)
 */
export interface TerminalOutput extends NodeJS.WritableStream {
  columns?: number;
  rows?: number;
}

export type StopReason = 'quit' | 'fatal' | 'signal';

export interface GameHostOptions {
  config: GameConfig;
  input: TerminalInput;
  output: TerminalOutput;
  diagnostics?: Diagnostics;
  reportError?: (error: unknown) => void;
  // Millisecond clock for the debug counters
  clock?: () => number;
}

/**
 * Runs one game in a terminal: decodes keys into pending moves, steps the
 * session on the game loop and draws after every tick.
 */
export class GameHost extends EventEmitter {
  private config: GameConfig;
  private input: TerminalInput;
  private output: TerminalOutput;
  private diagnostics: Diagnostics;
  private reportError: (error: unknown) => void;

  private session: WorldSession;
  private renderer: TerminalGridRenderer;
  private inputHandler: InputHandler;
  private loop: GameLoop;
  private frameStats: FrameStats;
  private running: boolean = false;
  private lastBlocked: string = '';

  private readonly onData = (data: Buffer | string): void => {
    this.inputHandler.process(typeof data === 'string' ? Buffer.from(data) : data);
  };

  private readonly onResize = (): void => {
    this.resize(
      this.output.columns ?? DEFAULT_TERMINAL_COLS,
      this.output.rows ?? DEFAULT_TERMINAL_ROWS
    );
  };

  constructor(options: GameHostOptions) {
    super();
    this.config = options.config;
    this.input = options.input;
    this.output = options.output;
    this.diagnostics = options.diagnostics ?? SILENT_DIAGNOSTICS;
    this.reportError = options.reportError ?? (() => {});
    this.frameStats = new FrameStats(options.clock ?? (() => performance.now()));

    this.renderer = new TerminalGridRenderer({
      cols: this.output.columns ?? DEFAULT_TERMINAL_COLS,
      rows: this.output.rows ?? DEFAULT_TERMINAL_ROWS,
      tileWidth: this.config.tileWidth,
      tileHeight: this.config.tileHeight,
    });

    this.session = generateLevel({
      ...this.config.level,
      tileWidth: this.config.tileWidth,
      tileHeight: this.config.tileHeight,
      hooks: this.renderer,
      diagnostics: this.diagnostics,
    });
    const view = this.renderer.getViewSize();
    this.session.resize(view.width, view.height);
    this.session.onGameEvent((event) => this.handleGameEvent(event));

    this.inputHandler = new InputHandler();
    this.inputHandler.onAction((action) => this.handleAction(action));

    this.loop = new GameLoop({ tickRate: this.config.tickRate });
    this.loop.onTick((ctx) => this.session.update(ctx.deltaTime));
    this.loop.onPostTick(() => this.draw());
    this.loop.on('tickError', ({ tick, error }: { tick: number; error: unknown }) => {
      this.handleTickError(tick, error);
    });
    this.loop.on('tickComplete', () => this.frameStats.recordTick());
    this.loop.on('tickSlow', ({ tick, duration, budget }: { tick: number; duration: number; budget: number }) => {
      this.diagnostics.debug('Tick %d took %dms of its %dms budget', tick, duration, Math.round(budget));
    });
    this.loop.on('lagWarning', ({ droppedTime }: { droppedTime: number }) => {
      this.diagnostics.warn('Dropped %dms of simulation time', Math.round(droppedTime));
    });
  }

  /**
   * Take over the terminal and start ticking
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('data', this.onData);
    this.input.resume();
    this.output.on('resize', this.onResize);

    this.renderer.attachStream(this.output);
    this.renderer.initialize();
    this.draw();

    this.loop.start();
    this.diagnostics.info('Game started at %d ticks per second', this.config.tickRate);
    this.emit('start');
  }

  /**
   * Stop ticking and give the terminal back
   */
  stop(reason: StopReason = 'quit'): void {
    if (!this.running) return;
    this.running = false;

    this.loop.stop();
    this.inputHandler.dispose();
    this.input.removeListener('data', this.onData);
    this.output.removeListener('resize', this.onResize);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.renderer.cleanup();

    this.diagnostics.info('Game stopped (%s) after %d ticks', reason, this.session.getStats().tick);
    this.emit('stop', reason);
  }

  /**
   * Advance the session by one tick and draw, without the loop's timer
   */
  step(deltaTime: number = 1000 / this.config.tickRate): void {
    this.session.update(deltaTime);
    this.draw();
    this.frameStats.recordTick();
  }

  /**
   * Feed raw terminal bytes, as if typed
   */
  handleInput(data: Buffer | string): void {
    this.onData(data);
  }

  /**
   * Handle terminal resize
   */
  resize(cols: number, rows: number): void {
    this.renderer.resize(cols, rows);
    const view = this.renderer.getViewSize();
    this.session.resize(view.width, view.height);
    this.draw();
  }

  getSession(): WorldSession {
    return this.session;
  }

  getRenderer(): TerminalGridRenderer {
    return this.renderer;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Ticking is suspended while the terminal is out of focus
   */
  isPaused(): boolean {
    return this.loop.isPaused();
  }

  /**
   * One-line summary shown above the map
   */
  statusLine(): string {
    const player = this.session.getPlayer();
    const position = player?.position;
    const where = position ? `(${position.col},${position.row})` : '(-,-)';
    const stats = this.session.getStats();
    const parts = [where, `tick ${stats.tick}`, `${stats.entities} entities`];
    if (this.config.logLevel === 'debug') parts.push(this.frameStats.text());
    if (this.lastBlocked) parts.push(this.lastBlocked);
    parts.push('q quits');
    return parts.join('  ');
  }

  private draw(): void {
    this.frameStats.measureDraw(() => this.renderer.draw(this.statusLine()));
  }

  private handleAction(action: InputAction): void {
    switch (action.type) {
      case 'move': {
        const player = this.session.getPlayer();
        if (player) {
          this.session.setPendingMove(player.id, action.direction, action.token);
        }
        break;
      }
      case 'redraw':
        this.renderer.invalidate();
        break;
      case 'quit':
        this.stop('quit');
        break;
      case 'focus':
        this.setFocused(action.focused);
        break;
    }
  }

  private setFocused(focused: boolean): void {
    if (!this.running) return;

    if (focused && this.loop.isPaused()) {
      this.loop.resume();
      this.diagnostics.debug('Terminal focused, resuming');
    } else if (!focused && !this.loop.isPaused()) {
      this.loop.pause();
      this.diagnostics.debug('Terminal lost focus, pausing');
    }
  }

  private handleGameEvent(event: GameEvent): void {
    const player = this.session.getPlayer();
    if (!player) return;

    if (event.type === 'moveBlocked' && event.entityId === player.id) {
      this.lastBlocked = event.reason === 'out_of_bounds' ? 'edge of the map' : 'blocked';
    } else if (event.type === 'entityMoved' && event.entityId === player.id) {
      this.lastBlocked = '';
    }
  }

  private handleTickError(tick: number, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.diagnostics.error('Tick %d failed: %s', tick, message);
    this.reportError(error);

    // Occupancy can no longer be trusted
    if (error instanceof InvariantViolationError) {
      this.stop('fatal');
    }
  }
}
