import { describe, it, expect } from 'vitest';
import {
  DIRECTIONS,
  DIRECTION_VECTORS,
  OPPOSITE_DIRECTION,
  isDirection,
  stepCoord,
} from './position.js';

describe('direction table', () => {
  it('has eight distinct unit steps', () => {
    const keys = DIRECTIONS.map((direction) => {
      const { dx, dy } = DIRECTION_VECTORS[direction];
      return `${dx},${dy}`;
    });

    expect(DIRECTIONS).toHaveLength(8);
    expect(new Set(keys).size).toBe(8);
    expect(keys).not.toContain('0,0');
  });

  it('pairs every direction with its opposite', () => {
    for (const direction of DIRECTIONS) {
      const forward = DIRECTION_VECTORS[direction];
      const back = DIRECTION_VECTORS[OPPOSITE_DIRECTION[direction]];
      expect(forward.dx + back.dx).toBe(0);
      expect(forward.dy + back.dy).toBe(0);
    }
  });

  it('treats up as increasing row', () => {
    expect(stepCoord({ col: 4, row: 4 }, 'up')).toEqual({ col: 4, row: 5 });
    expect(stepCoord({ col: 4, row: 4 }, 'left_down')).toEqual({ col: 3, row: 3 });
    expect(stepCoord({ col: 0, row: 0 }, 'left')).toEqual({ col: -1, row: 0 });
  });

  it('recognises direction names', () => {
    expect(isDirection('right_up')).toBe(true);
    expect(isDirection('north')).toBe(false);
    expect(isDirection(3)).toBe(false);
  });
});
