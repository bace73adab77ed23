import { describe, it, expect } from 'vitest';
import { FrameStats } from './frame-stats.js';

function setup() {
  let now = 1000;
  const stats = new FrameStats(() => now);
  const advance = (ms: number) => {
    now += ms;
  };
  return { stats, advance };
}

describe('FrameStats', () => {
  it('starts at zero', () => {
    expect(setup().stats.text()).toBe('0.00 updates/s  0.00 ms/draw');
  });

  it('reports ticks per second and draw time once an interval has passed', () => {
    const { stats, advance } = setup();

    for (let i = 0; i < 4; i++) {
      stats.measureDraw(() => advance(3));
      advance(97);
      stats.recordTick();
    }
    expect(stats.text()).toBe('0.00 updates/s  0.00 ms/draw');

    stats.measureDraw(() => advance(8));
    advance(92);
    stats.recordTick();

    // 5 ticks in 500ms, draws of 3, 3, 3, 3 and 8ms
    expect(stats.text()).toBe('10.00 updates/s  4.00 ms/draw');
  });

  it('keeps the last draw time through an interval without draws', () => {
    const { stats, advance } = setup();
    stats.measureDraw(() => advance(2));
    advance(498);
    stats.recordTick();

    advance(1000);
    stats.recordTick();

    expect(stats.text()).toBe('1.00 updates/s  2.00 ms/draw');
  });

  it('counts a draw that throws', () => {
    const { stats, advance } = setup();

    expect(() =>
      stats.measureDraw(() => {
        advance(6);
        throw new Error('closed');
      })
    ).toThrow('closed');
    advance(494);
    stats.recordTick();

    expect(stats.text()).toBe('2.00 updates/s  6.00 ms/draw');
  });
});
