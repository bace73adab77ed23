import type {
  EntityId,
  EntityKind,
  EntityView,
  GridCoord,
  PendingMove,
  RGB,
  TileId,
} from '@tilecrawl/protocol';

export interface EntityInit {
  id: EntityId;
  name: string;
  kind: EntityKind;
  color: RGB;
}

/**
 * Mobile occupant of the grid. `occupiedTile` mirrors `Tile.occupant`;
 * only the Grid writes either side.
 */
export class Entity {
  readonly id: EntityId;
  readonly name: string;
  readonly kind: EntityKind;
  readonly color: RGB;
  occupiedTile: TileId | null = null;
  pendingMove: PendingMove | null = null;

  constructor(init: EntityInit) {
    this.id = init.id;
    this.name = init.name;
    this.kind = init.kind;
    this.color = init.color;
  }

  toView(position: GridCoord | null): EntityView {
    return {
      id: this.id,
      name: this.name,
      kind: this.kind,
      color: [...this.color],
      position,
    };
  }
}
