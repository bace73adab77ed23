import {
  SILENT_DIAGNOSTICS,
  type Diagnostics,
  type GridCoord,
  type LevelConfig,
  type RenderHooks,
  type ScreenCoord,
} from '@tilecrawl/protocol';
import { SeededRandom } from '../random/seeded-random.js';
import { WorldSession } from '../session/world-session.js';

export interface GenerateLevelOptions extends LevelConfig {
  tileWidth: number;
  tileHeight: number;
  origin?: ScreenCoord;
  hooks?: RenderHooks;
  diagnostics?: Diagnostics;
}

/**
 * Build a session over a uniform walkable floor with the player and
 * `npcCount` NPCs on distinct random tiles.
 */
export function generateLevel(options: GenerateLevelOptions): WorldSession {
  const diagnostics = options.diagnostics ?? SILENT_DIAGNOSTICS;
  const startedAt = Date.now();
  diagnostics.debug('Initializing %dx%d grid', options.cols, options.rows);

  const session = new WorldSession({
    cols: options.cols,
    rows: options.rows,
    tileWidth: options.tileWidth,
    tileHeight: options.tileHeight,
    origin: options.origin,
    hooks: options.hooks,
    diagnostics,
  });

  const start: GridCoord = options.playerStart ?? {
    col: Math.floor(options.cols / 2),
    row: Math.floor(options.rows / 2),
  };
  session.spawn({ kind: 'player', col: start.col, row: start.row });

  const free = session.grid
    .allTiles()
    .filter((tile) => !tile.isOccupied() && tile.walkable)
    .map((tile) => tile.id);

  if (options.npcCount > free.length) {
    throw new Error(`Cannot place ${options.npcCount} NPCs on ${free.length} free tiles`);
  }

  const rng = new SeededRandom(options.seed);
  for (let i = 0; i < options.npcCount; i++) {
    // Swap-remove a random free tile so every NPC lands somewhere distinct
    const index = rng.below(free.length);
    const tileId = free[index];
    const last = free.pop();
    if (tileId === undefined || last === undefined) break;
    if (index < free.length) {
      free[index] = last;
    }

    const { col, row } = session.grid.coordOf(tileId);
    session.spawn({ kind: 'npc', id: `npc${i}`, col, row, color: rng.randomRgb() });
  }

  diagnostics.info(
    'Level ready: %dx%d, %d entities, took %dms',
    options.cols,
    options.rows,
    options.npcCount + 1,
    Date.now() - startedAt
  );
  return session;
}
