/**
 * ANSI Escape Code Constants
 *
 * The terminal primitives the renderer and terminal-mode setup need.
 * Rows and columns passed to these helpers are 1-indexed.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  clearLine: `${CSI}2K`,
  // Alternate screen buffer (for fullscreen apps)
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
  // Scroll region
  setScrollRegion: (top: number, bottom: number) => `${CSI}${top};${bottom}r`,
  resetScrollRegion: `${CSI}r`,
  // Shift the scroll region contents; blank lines appear at the exposed edge
  scrollUp: (n: number = 1) => `${CSI}${n}S`,
  scrollDown: (n: number = 1) => `${CSI}${n}T`,
};

// Text styles
export const STYLE = {
  reset: `${CSI}0m`,
  inverse: `${CSI}7m`,
  noInverse: `${CSI}27m`,
};

/**
 * Style text and reset after
 */
export function styled(text: string, ...codes: string[]): string {
  return `${codes.join('')}${text}${STYLE.reset}`;
}
