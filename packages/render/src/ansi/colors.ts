import { CSI } from './codes.js';
import type { Color, RGB } from '@tilecrawl/protocol';

export const DEFAULT_COLOR: Color = { type: 'default' };

/**
 * Foreground color code
 */
export function fgColor(color: Color): string {
  switch (color.type) {
    case 'default':
      return `${CSI}39m`;
    case '16':
      return color.value < 8 ? `${CSI}${30 + color.value}m` : `${CSI}${90 + color.value - 8}m`;
    case 'rgb': {
      const [r, g, b] = color.value;
      return `${CSI}38;2;${r};${g};${b}m`;
    }
  }
}

export function rgb(value: RGB): Color {
  return { type: 'rgb', value: [value[0], value[1], value[2]] };
}

/**
 * Palette color by index: 0-7 normal, 8-15 bright
 */
export function color16(value: number): Color {
  return { type: '16', value };
}

export function colorsEqual(a: Color, b: Color): boolean {
  switch (a.type) {
    case 'default':
      return b.type === 'default';
    case '16':
      return b.type === '16' && b.value === a.value;
    case 'rgb':
      return (
        b.type === 'rgb' && a.value[0] === b.value[0] && a.value[1] === b.value[1] && a.value[2] === b.value[2]
      );
  }
}
