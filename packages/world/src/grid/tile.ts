import type { EntityId, ScreenCoord, TileId, TileView } from '@tilecrawl/protocol';

/**
 * Single grid cell. Occupancy is held as an entity handle, never a reference.
 */
export class Tile {
  readonly id: TileId;
  readonly col: number;
  readonly row: number;
  occupant: EntityId | null = null;
  walkable: boolean = true;
  // Inside the visible viewport window
  active: boolean = false;
  // Set only while active
  screenPosition: ScreenCoord | null = null;

  constructor(id: TileId, col: number, row: number) {
    this.id = id;
    this.col = col;
    this.row = row;
  }

  isOccupied(): boolean {
    return this.occupant !== null;
  }

  toView(): TileView {
    return {
      id: this.id,
      col: this.col,
      row: this.row,
      occupant: this.occupant,
      walkable: this.walkable,
      active: this.active,
      screenPosition: this.screenPosition ? { ...this.screenPosition } : null,
    };
  }
}
