import type { Direction, GridCoord, GridWindow } from '../types/position.js';
import type { EntityId } from '../types/world.js';

/**
 * Base event interface
 */
export interface BaseEvent {
  type: string;
  tick: number;
}

/**
 * Entity moved event
 */
export interface EntityMovedEvent extends BaseEvent {
  type: 'entityMoved';
  entityId: EntityId;
  direction: Direction;
  from: GridCoord;
  to: GridCoord;
}

export type MoveBlockReason = 'out_of_bounds' | 'occupied' | 'blocked';

/**
 * A pending move that could not be applied (wall, another entity)
 */
export interface MoveBlockedEvent extends BaseEvent {
  type: 'moveBlocked';
  entityId: EntityId;
  direction: Direction;
  target: GridCoord;
  reason: MoveBlockReason;
}

/**
 * Viewport window changed (move or resize)
 */
export interface ViewportChangedEvent extends BaseEvent {
  type: 'viewportChanged';
  window: GridWindow;
  activated: number;
  deactivated: number;
  fullRefresh: boolean;
}

/**
 * Union of game events
 */
export type GameEvent = EntityMovedEvent | MoveBlockedEvent | ViewportChangedEvent;
