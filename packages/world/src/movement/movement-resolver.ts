import {
  SILENT_DIAGNOSTICS,
  stepCoord,
  type Diagnostics,
  type Direction,
  type GridCoord,
  type InputToken,
  type MoveBlockReason,
} from '@tilecrawl/protocol';
import type { Grid } from '../grid/grid.js';
import type { Entity } from '../entity/entity.js';
import { InvariantViolationError } from '../errors.js';

export type MoveResult =
  | { moved: true; direction: Direction; from: GridCoord; to: GridCoord }
  | { moved: false; direction: Direction; target: GridCoord; reason: MoveBlockReason };

/**
 * Idle -> MoveRequested. A newer intent replaces the old one (last key wins).
 */
export function setPendingMove(entity: Entity, direction: Direction, token: InputToken): void {
  entity.pendingMove = { direction, token };
}

/**
 * MoveRequested -> Idle on release of the input that set the move.
 * Releasing some other key leaves the pending move alone.
 */
export function clearPendingMove(entity: Entity, token: InputToken): boolean {
  if (!entity.pendingMove || entity.pendingMove.token !== token) {
    return false;
  }
  entity.pendingMove = null;
  return true;
}

/**
 * Validates and applies one pending move per call
 */
export class MovementResolver {
  private grid: Grid;
  private diagnostics: Diagnostics;

  constructor(grid: Grid, diagnostics: Diagnostics = SILENT_DIAGNOSTICS) {
    this.grid = grid;
    this.diagnostics = diagnostics;
  }

  /**
   * Resolve the entity's pending move, if any. The pending move is always
   * consumed; a blocked move needs a fresh input to be tried again.
   */
  resolve(entity: Entity): MoveResult | null {
    const pending = entity.pendingMove;
    if (!pending) return null;
    entity.pendingMove = null;

    if (entity.occupiedTile === null) {
      throw new InvariantViolationError(`Entity '${entity.id}' has a pending move but no tile`);
    }

    const from = this.grid.coordOf(entity.occupiedTile);
    const target = stepCoord(from, pending.direction);
    const reason = this.blockReason(target);

    if (reason) {
      this.diagnostics.debug(
        "Cannot move entity '%s' to (%d,%d): %s",
        entity.name,
        target.col,
        target.row,
        reason
      );
      return { moved: false, direction: pending.direction, target, reason };
    }

    this.grid.relocate(entity, target.col, target.row);
    return { moved: true, direction: pending.direction, from, to: target };
  }

  private blockReason(target: GridCoord): MoveBlockReason | null {
    if (!this.grid.inBounds(target.col, target.row)) {
      return 'out_of_bounds';
    }

    const tile = this.grid.tileAt(target.col, target.row);
    if (tile.isOccupied()) {
      return 'occupied';
    }
    if (!tile.walkable) {
      return 'blocked';
    }
    return null;
  }
}
