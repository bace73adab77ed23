// Errors
export {
  GridError,
  OutOfBoundsError,
  CellOccupiedError,
  AlreadyPlacedError,
  UnknownEntityError,
  InvariantViolationError,
  isGridError,
  type GridErrorCode,
} from './errors.js';

// Grid and entities
export { Grid } from './grid/grid.js';
export { Tile } from './grid/tile.js';
export { Entity, type EntityInit } from './entity/entity.js';
export { EntityRegistry } from './entity/entity-registry.js';

// Movement
export {
  MovementResolver,
  setPendingMove,
  clearPendingMove,
  type MoveResult,
} from './movement/movement-resolver.js';

// Viewport
export { Viewport, type ViewportConfig, type ViewportChange } from './viewport/viewport.js';
export {
  computeVisibleTiles,
  computeAxisRange,
  rectDifference,
  windowContains,
  windowsEqual,
  windowArea,
  type AxisRange,
} from './viewport/window.js';

// Session
export {
  WorldSession,
  type WorldSessionConfig,
  type WorldSessionStats,
  type SpawnSpec,
} from './session/world-session.js';
export { generateLevel, type GenerateLevelOptions } from './generation/level-generator.js';

// Game loop
export { GameLoop, type TickContext, type TickHandler, type GameLoopConfig } from './tick/game-loop.js';

// Support
export { SeededRandom } from './random/seeded-random.js';
export {
  createConsoleDiagnostics,
  type ConsoleDiagnosticsOptions,
  type LogTarget,
} from './diagnostics/console-diagnostics.js';
