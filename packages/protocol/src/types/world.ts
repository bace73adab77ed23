import type { Direction, GridCoord, ScreenCoord } from './position.js';
import type { RGB } from './render.js';

/**
 * Stable handle of a tile inside the grid arena (row * cols + col)
 */
export type TileId = number;

/**
 * Stable handle of an entity inside the entity arena
 */
export type EntityId = string;

export type EntityKind = 'player' | 'npc';

/**
 * Opaque token identifying the input that requested a move (usually a key name)
 */
export type InputToken = string | number;

/**
 * Stored directional intent awaiting resolution on the next tick
 */
export interface PendingMove {
  direction: Direction;
  token: InputToken;
}

/**
 * Read-only view of a tile handed to the environment
 */
export interface TileView {
  id: TileId;
  col: number;
  row: number;
  occupant: EntityId | null;
  walkable: boolean;
  active: boolean;
  screenPosition: ScreenCoord | null;
}

/**
 * Read-only view of an entity handed to the environment
 */
export interface EntityView {
  id: EntityId;
  name: string;
  kind: EntityKind;
  color: RGB;
  position: GridCoord | null;
}

/**
 * Callbacks the core issues to whatever draws the world.
 * Coordinates are layout-space pixels; the camera offset maps them to the screen.
 */
export interface RenderHooks {
  onTileActivated(tile: TileView, screenX: number, screenY: number): void;
  onTileDeactivated(tile: TileView): void;
  onEntityMoved(entity: EntityView, screenX: number, screenY: number): void;
  onEntityRemoved(entity: EntityView): void;
  onCameraMoved(offsetX: number, offsetY: number): void;
}

/**
 * Hooks that ignore everything (headless sessions)
 */
export const NOOP_RENDER_HOOKS: RenderHooks = {
  onTileActivated: () => {},
  onTileDeactivated: () => {},
  onEntityMoved: () => {},
  onEntityRemoved: () => {},
  onCameraMoved: () => {},
};

/**
 * Level configuration
 */
export interface LevelConfig {
  cols: number;
  rows: number;
  npcCount: number;
  seed: bigint;
  playerStart?: GridCoord;
}
