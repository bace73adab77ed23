export * from './constants.js';
export * from './types/position.js';
export * from './types/world.js';
export * from './types/render.js';
export * from './types/diagnostics.js';
export * from './events/game.js';
