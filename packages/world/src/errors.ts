import type { EntityId, TileId } from '@tilecrawl/protocol';

export type GridErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'CELL_OCCUPIED'
  | 'ALREADY_PLACED'
  | 'UNKNOWN_ENTITY'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for caller-facing grid failures
 */
export class GridError extends Error {
  readonly code: GridErrorCode;

  constructor(code: GridErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class OutOfBoundsError extends GridError {
  constructor(
    readonly col: number,
    readonly row: number,
    cols: number,
    rows: number
  ) {
    super('OUT_OF_BOUNDS', `(${col},${row}) is outside the ${cols}x${rows} grid`);
  }
}

export class CellOccupiedError extends GridError {
  constructor(
    readonly tileId: TileId,
    readonly occupant: EntityId
  ) {
    super('CELL_OCCUPIED', `Tile ${tileId} is already occupied by '${occupant}'`);
  }
}

export class AlreadyPlacedError extends GridError {
  constructor(
    readonly entityId: EntityId,
    readonly tileId: TileId
  ) {
    super('ALREADY_PLACED', `Entity '${entityId}' already occupies tile ${tileId}`);
  }
}

export class UnknownEntityError extends GridError {
  constructor(readonly entityId: EntityId) {
    super('UNKNOWN_ENTITY', `No entity with id '${entityId}'`);
  }
}

/**
 * Occupancy back-references disagree. Never expected; treat as fatal.
 */
export class InvariantViolationError extends GridError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
  }
}

export function isGridError(value: unknown): value is GridError {
  return value instanceof GridError;
}
