import { z } from 'zod';
import {
  DEFAULT_GRID_COLS,
  DEFAULT_GRID_ROWS,
  DEFAULT_NPC_COUNT,
  DEFAULT_TICK_RATE,
  DEFAULT_TILE_HEIGHT,
  DEFAULT_TILE_WIDTH,
  type LevelConfig,
  type LogLevel,
} from '@tilecrawl/protocol';
import { SeededRandom } from '@tilecrawl/world';

// Unset and empty variables both fall back to the default
const fromEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const positiveInt = (fallback: number) => fromEnv(z.coerce.number().int().positive().default(fallback));
const optionalIndex = () => fromEnv(z.coerce.number().int().nonnegative().optional());

/**
 * Environment variables read by the terminal host
 */
export const EnvSchema = z
  .object({
    GRID_COLS: positiveInt(DEFAULT_GRID_COLS),
    GRID_ROWS: positiveInt(DEFAULT_GRID_ROWS),
    NPC_COUNT: fromEnv(z.coerce.number().int().nonnegative().default(DEFAULT_NPC_COUNT)),
    WORLD_SEED: fromEnv(
      z
        .string()
        .regex(/^\d+$/, 'must be a non-negative integer')
        .transform((value) => BigInt(value))
        .optional()
    ),
    TICK_RATE: fromEnv(z.coerce.number().positive().max(1000).default(DEFAULT_TICK_RATE)),
    TILE_WIDTH: positiveInt(DEFAULT_TILE_WIDTH),
    TILE_HEIGHT: positiveInt(DEFAULT_TILE_HEIGHT),
    PLAYER_COL: optionalIndex(),
    PLAYER_ROW: optionalIndex(),
    LOG_LEVEL: fromEnv(z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')),
  })
  .superRefine((env, ctx) => {
    if ((env.PLAYER_COL === undefined) !== (env.PLAYER_ROW === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.PLAYER_COL === undefined ? 'PLAYER_COL' : 'PLAYER_ROW'],
        message: 'PLAYER_COL and PLAYER_ROW must be set together',
      });
    }
    if (env.PLAYER_COL !== undefined && env.PLAYER_COL >= env.GRID_COLS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PLAYER_COL'], message: 'must be inside the grid' });
    }
    if (env.PLAYER_ROW !== undefined && env.PLAYER_ROW >= env.GRID_ROWS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PLAYER_ROW'], message: 'must be inside the grid' });
    }
    if (env.NPC_COUNT > env.GRID_COLS * env.GRID_ROWS - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['NPC_COUNT'],
        message: `at most ${env.GRID_COLS * env.GRID_ROWS - 1} NPCs fit on a ${env.GRID_COLS}x${env.GRID_ROWS} grid`,
      });
    }
  });

export interface GameConfig {
  level: LevelConfig;
  tickRate: number;
  tileWidth: number;
  tileHeight: number;
  logLevel: LogLevel | 'silent';
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the environment into a game configuration.
 * Without WORLD_SEED a random seed is drawn.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const parsed = result.data;
  const level: LevelConfig = {
    cols: parsed.GRID_COLS,
    rows: parsed.GRID_ROWS,
    npcCount: parsed.NPC_COUNT,
    seed: parsed.WORLD_SEED ?? SeededRandom.randomSeed(),
  };
  if (parsed.PLAYER_COL !== undefined && parsed.PLAYER_ROW !== undefined) {
    level.playerStart = { col: parsed.PLAYER_COL, row: parsed.PLAYER_ROW };
  }

  return {
    level,
    tickRate: parsed.TICK_RATE,
    tileWidth: parsed.TILE_WIDTH,
    tileHeight: parsed.TILE_HEIGHT,
    logLevel: parsed.LOG_LEVEL,
  };
}
