// Level defaults
export const DEFAULT_GRID_COLS = 100;
export const DEFAULT_GRID_ROWS = 100;
export const DEFAULT_NPC_COUNT = 10;

// Loop
export const DEFAULT_TICK_RATE = 60;
export const MAX_DELTA_TIME = 250; // ms
export const CATCH_UP_LIMIT = 5;

// Tile size in screen units (terminal cells)
export const DEFAULT_TILE_WIDTH = 2;
export const DEFAULT_TILE_HEIGHT = 1;

// Terminal defaults
export const DEFAULT_TERMINAL_COLS = 80;
export const DEFAULT_TERMINAL_ROWS = 24;
export const STATUS_LINE_HEIGHT = 1;

// Glyphs
export const FLOOR_GLYPH = '.';
export const WALL_GLYPH = '#';
export const ENTITY_GLYPH = '@';

export const PLAYER_NAME = 'player';
export const PLAYER_COLOR: [number, number, number] = [255, 215, 0];
