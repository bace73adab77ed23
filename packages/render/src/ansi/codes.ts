/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * Cursor control
 */
export const CURSOR = {
  /** Move cursor to (row, col) - 1-indexed */
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
} as const;

/**
 * Screen control
 */
export const SCREEN = {
  clear: `${CSI}2J`,
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
  enableWrap: `${CSI}?7h`,
  disableWrap: `${CSI}?7l`,
} as const;

/**
 * Focus reporting: the terminal sends CSI I on focus and CSI O on blur
 */
export const FOCUS = {
  enable: `${CSI}?1004h`,
  disable: `${CSI}?1004l`,
} as const;

/**
 * Keypad modes. In application mode the numeric keypad sends SS3 sequences
 * (ESC O q .. ESC O y for 1..9) so it can be told apart from the digit row.
 */
export const KEYPAD = {
  application: `${ESC}=`,
  numeric: `${ESC}>`,
} as const;

/**
 * Text styling
 */
export const STYLE = {
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
} as const;
