import { CURSOR, FOCUS, KEYPAD, SCREEN, STYLE } from './codes.js';
import { fgColor } from './colors.js';
import { sameStyle } from '../buffer/cell.js';
import type { Color, Cell } from '@tilecrawl/protocol';

/**
 * Fluent ANSI escape sequence builder
 */
export class ANSIBuilder {
  private output: string = '';

  // Cursor movement
  moveTo(x: number, y: number): this {
    this.output += CURSOR.moveTo(y + 1, x + 1); // Convert 0-indexed to 1-indexed
    return this;
  }

  hideCursor(): this {
    this.output += CURSOR.hide;
    return this;
  }

  showCursor(): this {
    this.output += CURSOR.show;
    return this;
  }

  // Screen control
  clearScreen(): this {
    this.output += SCREEN.clear;
    return this;
  }

  enterAlternateScreen(): this {
    this.output += SCREEN.enterAlt;
    return this;
  }

  exitAlternateScreen(): this {
    this.output += SCREEN.exitAlt;
    return this;
  }

  disableLineWrap(): this {
    this.output += SCREEN.disableWrap;
    return this;
  }

  enableLineWrap(): this {
    this.output += SCREEN.enableWrap;
    return this;
  }

  applicationKeypad(): this {
    this.output += KEYPAD.application;
    return this;
  }

  numericKeypad(): this {
    this.output += KEYPAD.numeric;
    return this;
  }

  enableFocusReporting(): this {
    this.output += FOCUS.enable;
    return this;
  }

  disableFocusReporting(): this {
    this.output += FOCUS.disable;
    return this;
  }

  // Styling
  setForeground(color: Color): this {
    this.output += fgColor(color);
    return this;
  }

  bold(): this {
    this.output += STYLE.bold;
    return this;
  }

  resetAttributes(): this {
    this.output += STYLE.reset;
    return this;
  }

  write(text: string): this {
    this.output += text;
    return this;
  }

  /**
   * Write a run of cells from (startX, y), emitting style codes only when they change
   */
  writeCells(cells: Cell[], startX: number, y: number): this {
    if (cells.length === 0) return this;

    this.moveTo(startX, y);

    let last: Cell | null = null;
    for (const cell of cells) {
      if (!last || !sameStyle(last, cell)) {
        this.resetAttributes();
        this.setForeground(cell.fg);
        if (cell.bold) this.bold();
        last = cell;
      }
      this.write(cell.char);
    }

    return this;
  }

  // Build and clear
  build(): string {
    const result = this.output;
    this.output = '';
    return result;
  }

  get length(): number {
    return this.output.length;
  }
}
