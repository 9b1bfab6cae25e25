/**
 * ANSI Escape Code Constants and Utilities
 *
 * Provides the VT100-family sequences the editor emits.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  // Pushes the cursor as far right/down as the terminal allows
  toBottomRight: `${CSI}999C${CSI}999B`,
  // Device Status Report: terminal answers with ESC [ row ; col R
  requestPosition: `${CSI}6n`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  clearToEnd: `${CSI}K`,
};

// Text styles
export const STYLE = {
  reset: `${CSI}m`,
  inverse: `${CSI}7m`,
};

/**
 * SGR foreground colour codes (30-37, 39 = default)
 */
export const FG_CODE = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  default: 39,
} as const;

export type ForegroundColor = keyof typeof FG_CODE;

/**
 * Foreground colour sequence from a numeric SGR code
 */
export function fgCode(code: number): string {
  return `${CSI}${code}m`;
}

/**
 * Style text and reset after
 */
export function styled(text: string, ...codes: string[]): string {
  return `${codes.join('')}${text}${STYLE.reset}`;
}

