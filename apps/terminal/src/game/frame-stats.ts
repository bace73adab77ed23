export const FRAME_STATS_INTERVAL = 500;

/**
 * Debug counters for the status line: ticks per second and the average
 * time spent drawing, both refreshed every interval.
 */
export class FrameStats {
  private clock: () => number;
  private interval: number;
  private windowStart: number;
  private ticks: number = 0;
  private draws: number = 0;
  private drawTime: number = 0;
  private updatesPerSecond: number = 0;
  private msPerDraw: number = 0;

  constructor(clock: () => number, interval: number = FRAME_STATS_INTERVAL) {
    this.clock = clock;
    this.interval = interval;
    this.windowStart = clock();
  }

  /**
   * Run a draw and add its duration to the current interval
   */
  measureDraw(draw: () => void): void {
    const start = this.clock();
    try {
      draw();
    } finally {
      this.drawTime += this.clock() - start;
      this.draws++;
    }
  }

  recordTick(): void {
    this.ticks++;

    const now = this.clock();
    const elapsed = now - this.windowStart;
    if (elapsed < this.interval) return;

    this.updatesPerSecond = (this.ticks * 1000) / elapsed;
    // Keep the last figure through an interval without draws
    if (this.draws > 0) {
      this.msPerDraw = this.drawTime / this.draws;
    }
    this.ticks = 0;
    this.draws = 0;
    this.drawTime = 0;
    this.windowStart = now;
  }

  text(): string {
    return `${this.updatesPerSecond.toFixed(2)} updates/s  ${this.msPerDraw.toFixed(2)} ms/draw`;
  }
}
