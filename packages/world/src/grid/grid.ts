import type { EntityId, GridCoord, GridWindow, TileId } from '@tilecrawl/protocol';
import { Tile } from './tile.js';
import type { Entity } from '../entity/entity.js';
import {
  AlreadyPlacedError,
  CellOccupiedError,
  InvariantViolationError,
  OutOfBoundsError,
} from '../errors.js';

/**
 * Fixed-size arena of tiles. Owns both sides of every occupancy link:
 * `Tile.occupant` and `Entity.occupiedTile` are only written here.
 */
export class Grid {
  readonly cols: number;
  readonly rows: number;
  private tiles: Tile[];

  constructor(cols: number, rows: number) {
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols < 1 || rows < 1) {
      throw new RangeError(`Invalid grid size ${cols}x${rows}`);
    }
    this.cols = cols;
    this.rows = rows;
    this.tiles = [];
    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        this.tiles.push(new Tile(this.tileIdOf(col, row), col, row));
      }
    }
  }

  inBounds(col: number, row: number): boolean {
    return (
      Number.isInteger(col) &&
      Number.isInteger(row) &&
      col >= 0 &&
      col < this.cols &&
      row >= 0 &&
      row < this.rows
    );
  }

  tileIdOf(col: number, row: number): TileId {
    return row * this.cols + col;
  }

  tileAt(col: number, row: number): Tile {
    if (!this.inBounds(col, row)) {
      throw new OutOfBoundsError(col, row, this.cols, this.rows);
    }
    return this.requireTile(this.tileIdOf(col, row), col, row);
  }

  tileById(id: TileId): Tile {
    const col = id % this.cols;
    const row = Math.floor(id / this.cols);
    return this.tileAt(col, row);
  }

  coordOf(id: TileId): GridCoord {
    const tile = this.tileById(id);
    return { col: tile.col, row: tile.row };
  }

  /**
   * Put an unplaced entity on a free tile, setting both sides of the link
   */
  place(entity: Entity, col: number, row: number): Tile {
    const tile = this.tileAt(col, row);
    if (entity.occupiedTile !== null) {
      throw new AlreadyPlacedError(entity.id, entity.occupiedTile);
    }
    if (tile.occupant !== null) {
      throw new CellOccupiedError(tile.id, tile.occupant);
    }

    tile.occupant = entity.id;
    entity.occupiedTile = tile.id;
    return tile;
  }

  /**
   * Clear a tile's occupant without looking at who it was.
   * The caller owns clearing the entity side in the same step.
   */
  vacate(tile: Tile): EntityId | null {
    const previous = tile.occupant;
    tile.occupant = null;
    return previous;
  }

  /**
   * Take an entity off the grid, clearing both sides
   */
  remove(entity: Entity): Tile | null {
    if (entity.occupiedTile === null) return null;

    const tile = this.tileById(entity.occupiedTile);
    if (tile.occupant !== entity.id) {
      throw new InvariantViolationError(
        `Entity '${entity.id}' points at tile ${tile.id} but the tile holds '${tile.occupant ?? 'nothing'}'`
      );
    }

    this.vacate(tile);
    entity.occupiedTile = null;
    return tile;
  }

  /**
   * Move a placed entity to another tile. The target is validated before
   * anything is mutated, so a thrown error leaves both sides untouched.
   */
  relocate(entity: Entity, col: number, row: number): { from: Tile; to: Tile } {
    const target = this.tileAt(col, row);
    if (entity.occupiedTile === null) {
      throw new InvariantViolationError(`Entity '${entity.id}' is not on the grid`);
    }
    if (target.occupant !== null) {
      throw new CellOccupiedError(target.id, target.occupant);
    }

    const source = this.tileById(entity.occupiedTile);
    if (source.occupant !== entity.id) {
      throw new InvariantViolationError(
        `Entity '${entity.id}' points at tile ${source.id} but the tile holds '${source.occupant ?? 'nothing'}'`
      );
    }

    this.vacate(source);
    target.occupant = entity.id;
    entity.occupiedTile = target.id;
    return { from: source, to: target };
  }

  /**
   * Iterate tiles inside an inclusive window, row by row from the bottom
   */
  *tilesIn(window: GridWindow): IterableIterator<Tile> {
    const minCol = Math.max(0, window.minCol);
    const maxCol = Math.min(this.cols - 1, window.maxCol);
    const minRow = Math.max(0, window.minRow);
    const maxRow = Math.min(this.rows - 1, window.maxRow);

    for (let row = minRow; row <= maxRow; row++) {
      for (let col = minCol; col <= maxCol; col++) {
        yield this.requireTile(this.tileIdOf(col, row), col, row);
      }
    }
  }

  allTiles(): readonly Tile[] {
    return this.tiles;
  }

  countOccupied(): number {
    let count = 0;
    for (const tile of this.tiles) {
      if (tile.isOccupied()) count++;
    }
    return count;
  }

  /**
   * Check the dual-pointer invariant across every tile and entity
   */
  verifyOccupancy(entities: Iterable<Entity>): void {
    const byId = new Map<EntityId, Entity>();
    for (const entity of entities) {
      byId.set(entity.id, entity);
      if (entity.occupiedTile === null) continue;

      const tile = this.tileById(entity.occupiedTile);
      if (tile.occupant !== entity.id) {
        throw new InvariantViolationError(
          `Entity '${entity.id}' points at tile ${tile.id} but the tile holds '${tile.occupant ?? 'nothing'}'`
        );
      }
    }

    for (const tile of this.tiles) {
      if (tile.occupant === null) continue;

      const entity = byId.get(tile.occupant);
      if (!entity || entity.occupiedTile !== tile.id) {
        throw new InvariantViolationError(
          `Tile ${tile.id} holds '${tile.occupant}' but that entity does not point back`
        );
      }
    }
  }

  private requireTile(id: TileId, col: number, row: number): Tile {
    const tile = this.tiles[id];
    if (!tile) {
      throw new OutOfBoundsError(col, row, this.cols, this.rows);
    }
    return tile;
  }
}
