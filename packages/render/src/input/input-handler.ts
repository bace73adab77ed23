import { KeyParser, type ParsedKey } from './key-parser.js';
import type { Direction } from '@tilecrawl/protocol';

/**
 * What a key press asks the game to do
 */
export type InputAction =
  | { type: 'move'; direction: Direction; token: string }
  | { type: 'quit' }
  | { type: 'redraw' }
  | { type: 'focus'; focused: boolean };

type BoundAction = Exclude<InputAction, { type: 'move' }> | { type: 'move'; direction: Direction };

/**
 * Key binding definition
 */
export interface KeyBinding {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
  action: BoundAction;
}

export type InputCallback = (action: InputAction, event: ParsedKey) => void;

export interface InputHandlerOptions {
  // How long a lone ESC waits for the rest of a sequence before it counts as Escape
  escapeTimeout?: number;
}

export const DEFAULT_ESCAPE_TIMEOUT = 50;

const move = (direction: Direction): BoundAction => ({ type: 'move', direction });

/**
 * Default movement keys: arrows, keypad (both modes), digit row and vi keys.
 * Keypad 5 is left unbound.
 */
const MOVEMENT_KEYS: Array<[string[], Direction]> = [
  [['ArrowLeft', 'Numpad4', '4', 'h'], 'left'],
  [['Home', 'Numpad7', '7', 'y'], 'left_up'],
  [['ArrowUp', 'Numpad8', '8', 'k'], 'up'],
  [['PageUp', 'Numpad9', '9', 'u'], 'right_up'],
  [['ArrowRight', 'Numpad6', '6', 'l'], 'right'],
  [['PageDown', 'Numpad3', '3', 'n'], 'right_down'],
  [['ArrowDown', 'Numpad2', '2', 'j'], 'down'],
  [['End', 'Numpad1', '1', 'b'], 'left_down'],
];

/**
 * Handles terminal input and dispatches actions
 */
export class InputHandler {
  private parser: KeyParser;
  private bindings: KeyBinding[] = [];
  private callback: InputCallback | null = null;
  private escapeTimeout: number;
  private escapeTimer: NodeJS.Timeout | null = null;

  constructor(options: InputHandlerOptions = {}) {
    this.parser = new KeyParser();
    this.escapeTimeout = options.escapeTimeout ?? DEFAULT_ESCAPE_TIMEOUT;
    this.setupDefaultBindings();
  }

  private setupDefaultBindings(): void {
    for (const [keys, direction] of MOVEMENT_KEYS) {
      for (const key of keys) {
        this.bindings.push({ key, ctrl: false, alt: false, action: move(direction) });
      }
    }

    this.bindings.push(
      { key: 'q', action: { type: 'quit' } },
      { key: 'Q', action: { type: 'quit' } },
      { key: 'Escape', action: { type: 'quit' } },
      { key: 'Ctrl-C', action: { type: 'quit' } },
      { key: 'Ctrl-L', action: { type: 'redraw' } },
      { key: 'FocusIn', action: { type: 'focus', focused: true } },
      { key: 'FocusOut', action: { type: 'focus', focused: false } }
    );
  }

  /**
   * Set callback for actions
   */
  onAction(callback: InputCallback): void {
    this.callback = callback;
  }

  /**
   * Process incoming input data
   */
  process(data: Buffer): void {
    this.cancelEscapeTimer();
    this.dispatch(this.parser.parse(data));

    if (this.parser.hasPending()) {
      this.escapeTimer = setTimeout(() => this.flushPending(), this.escapeTimeout);
    }
  }

  /**
   * Stop waiting for the rest of a sequence and dispatch what is buffered
   */
  flushPending(): void {
    this.cancelEscapeTimer();
    this.dispatch(this.parser.flush());
  }

  /**
   * Drop buffered input and any pending timer
   */
  dispose(): void {
    this.cancelEscapeTimer();
    this.parser.clear();
  }

  private dispatch(events: ParsedKey[]): void {
    for (const event of events) {
      if (event.type === 'key') {
        this.handleKeyEvent(event);
      }
    }
  }

  private cancelEscapeTimer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
  }

  /**
   * Resolve a parsed key against the bindings
   */
  resolve(event: ParsedKey): InputAction | null {
    const key = event.key;
    if (key === undefined) return null;

    const binding = this.bindings.find(
      (b) =>
        b.key === key &&
        (b.ctrl === undefined || b.ctrl === event.ctrl) &&
        (b.alt === undefined || b.alt === event.alt) &&
        (b.shift === undefined || b.shift === event.shift)
    );
    if (!binding) return null;

    if (binding.action.type === 'move') {
      return { type: 'move', direction: binding.action.direction, token: key };
    }
    return binding.action;
  }

  private handleKeyEvent(event: ParsedKey): void {
    const action = this.resolve(event);
    if (action && this.callback) {
      this.callback(action, event);
    }
  }

  /**
   * Add custom binding (takes precedence over the defaults)
   */
  addBinding(binding: KeyBinding): void {
    this.bindings.unshift(binding);
  }

  /**
   * Remove every binding for a key
   */
  removeBinding(key: string): void {
    this.bindings = this.bindings.filter((b) => b.key !== key);
  }
}
