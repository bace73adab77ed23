import type { Cell } from '@tilecrawl/protocol';
import { colorsEqual, DEFAULT_COLOR } from '../ansi/colors.js';

export function createCell(partial?: Partial<Cell>): Cell {
  return {
    char: partial?.char ?? ' ',
    fg: partial?.fg ?? DEFAULT_COLOR,
    bold: partial?.bold ?? false,
  };
}

/**
 * Same color and weight, whatever the character
 */
export function sameStyle(a: Cell, b: Cell): boolean {
  return a.bold === b.bold && colorsEqual(a.fg, b.fg);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && sameStyle(a, b);
}
