import type { EntityId, RenderHooks, ScreenCoord, TileId } from '@tilecrawl/protocol';

/**
 * Render hooks that mirror what a renderer would hold, for assertions
 */
export function createRecordingHooks() {
  const activeTiles = new Map<TileId, ScreenCoord>();
  const entities = new Map<EntityId, ScreenCoord>();
  const calls: string[] = [];
  let camera: ScreenCoord | null = null;

  const hooks: RenderHooks = {
    onTileActivated: (tile, x, y) => {
      activeTiles.set(tile.id, { x, y });
      calls.push(`+${tile.col},${tile.row}`);
    },
    onTileDeactivated: (tile) => {
      activeTiles.delete(tile.id);
      calls.push(`-${tile.col},${tile.row}`);
    },
    onEntityMoved: (entity, x, y) => {
      entities.set(entity.id, { x, y });
    },
    onEntityRemoved: (entity) => {
      entities.delete(entity.id);
    },
    onCameraMoved: (x, y) => {
      camera = { x, y };
    },
  };

  return {
    hooks,
    activeTiles,
    entities,
    calls,
    camera: (): ScreenCoord | null => camera,
  };
}
