/**
 * RGB triple (0-255 per channel)
 */
export type RGB = [number, number, number];

/**
 * Foreground color of a terminal cell
 */
export type Color =
  | { type: 'default' }
  | { type: '16'; value: number }
  | { type: 'rgb'; value: RGB };

/**
 * Single terminal cell
 */
export interface Cell {
  char: string;
  fg: Color;
  bold: boolean;
}
