/**
 * Grid coordinates (column/row index into the level grid)
 */
export interface GridCoord {
  col: number;
  row: number;
}

/**
 * Screen coordinates in layout space (pixels, origin bottom-left)
 */
export interface ScreenCoord {
  x: number;
  y: number;
}

/**
 * Inclusive rectangular range of grid indices
 */
export interface GridWindow {
  minCol: number;
  maxCol: number;
  minRow: number;
  maxRow: number;
}

/**
 * Compass directions (rows grow upward, so 'up' is +1)
 */
export type Direction =
  | 'left'
  | 'left_up'
  | 'up'
  | 'right_up'
  | 'right'
  | 'right_down'
  | 'down'
  | 'left_down';

/**
 * Unit step applied to grid coordinates
 */
export interface DirectionDelta {
  dx: -1 | 0 | 1;
  dy: -1 | 0 | 1;
}

/**
 * All directions, counter-clockwise from 'left'
 */
export const DIRECTIONS: readonly Direction[] = [
  'left',
  'left_up',
  'up',
  'right_up',
  'right',
  'right_down',
  'down',
  'left_down',
];

/**
 * Direction vectors for movement
 */
export const DIRECTION_VECTORS: Record<Direction, DirectionDelta> = {
  left: { dx: -1, dy: 0 },
  left_up: { dx: -1, dy: 1 },
  up: { dx: 0, dy: 1 },
  right_up: { dx: 1, dy: 1 },
  right: { dx: 1, dy: 0 },
  right_down: { dx: 1, dy: -1 },
  down: { dx: 0, dy: -1 },
  left_down: { dx: -1, dy: -1 },
};

export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
  left: 'right',
  left_up: 'right_down',
  up: 'down',
  right_up: 'left_down',
  right: 'left',
  right_down: 'left_up',
  down: 'up',
  left_down: 'right_up',
};

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.some((direction) => direction === value);
}

/**
 * Coordinate one step away in the given direction (may be off-grid)
 */
export function stepCoord(from: GridCoord, direction: Direction): GridCoord {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return { col: from.col + dx, row: from.row + dy };
}
