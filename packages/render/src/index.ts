// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';

// Buffer system
export { ScreenBuffer } from './buffer/screen-buffer.js';
export { createCell, cellsEqual, sameStyle } from './buffer/cell.js';

// Renderer
export { TerminalGridRenderer, type TerminalGridRendererConfig } from './renderer/grid-renderer.js';

// Input
export { KeyParser, type ParsedKey } from './input/key-parser.js';
export {
  InputHandler,
  DEFAULT_ESCAPE_TIMEOUT,
  type InputAction,
  type InputCallback,
  type InputHandlerOptions,
  type KeyBinding,
} from './input/input-handler.js';
