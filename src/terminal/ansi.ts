/**
 * ANSI control sequence builders
 *
 * Every builder is a pure string producer of the form
 * `ESC [ <args> <final byte>`; arguments default to the values the
 * terminal itself assumes (one row, one column, ...).
 */

export const ESC = "\x1b";
export const CSI_PREFIX = `${ESC}[`;

/** A CSI builder taking numeric arguments */
export type CsiBuilder = (...args: number[]) => string;

/**
 * Create a CSI builder for `code`; calling it without arguments uses
 * `defaults` (which may be empty, giving a bare `ESC [ code`).
 */
export function csi(code: string, ...defaults: number[]): CsiBuilder {
  return (...args: number[]) => `${CSI_PREFIX}${(args.length ? args : defaults).join(";")}${code}`;
}

// ============================================================================
// Cursor Movement
// ============================================================================

/** Absolute position, 1-based: `cursorPosition(row, column)` */
export const cursorPosition = csi("H", 1, 1);
export const cursorUp = csi("A", 1);
export const cursorDown = csi("B", 1);
export const cursorRight = csi("C", 1);
export const cursorLeft = csi("D", 1);
export const nextLine = csi("E", 1);
export const previousLine = csi("F", 1);
export const column = csi("G", 1);

export const SAVE_CURSOR = `${CSI_PREFIX}s`;
export const RESTORE_CURSOR = `${CSI_PREFIX}u`;
export const HIDE_CURSOR = `${CSI_PREFIX}?25l`;
export const SHOW_CURSOR = `${CSI_PREFIX}?25h`;

/** Device status report 6: the terminal answers `ESC [ row ; col R` */
export const CURSOR_POSITION_REQUEST = `${CSI_PREFIX}6n`;

// ============================================================================
// Clearing and Scrolling
// ============================================================================

/** 0: cursor to end, 1: start to cursor, 2: whole screen, 3: plus scrollback */
export const clearScreen = csi("J", 0);
export const CLEAR_SCREEN_TILL_END = `${CSI_PREFIX}0J`;
export const CLEAR_SCREEN_TILL_START = `${CSI_PREFIX}1J`;
export const CLEAR_SCREEN_ALL = `${CSI_PREFIX}2J`;
export const CLEAR_SCREEN_ALL_AND_HISTORY = `${CSI_PREFIX}3J`;

export const CLEAR_LINE_ALL = `${CSI_PREFIX}K`;
export const CLEAR_LINE_RIGHT = `${CSI_PREFIX}0K`;
export const CLEAR_LINE_LEFT = `${CSI_PREFIX}1K`;
export const CLEAR_LINE = `${CSI_PREFIX}2K`;

export const scrollUp = csi("S");
export const scrollDown = csi("T");

// ============================================================================
// Select Graphic Rendition
// ============================================================================

/**
 * A style that is switched on by `start` and off by `end`
 */
export class Sgr {
  constructor(
    readonly start: number,
    readonly end: number
  ) {}

  get startSequence(): string {
    return `${CSI_PREFIX}${this.start}m`;
  }

  get endSequence(): string {
    return `${CSI_PREFIX}${this.end}m`;
  }

  apply(text: string): string {
    return this.startSequence + text + this.endSequence;
  }
}

export const bold = new Sgr(1, 22);
export const faint = new Sgr(2, 22);
export const italic = new Sgr(3, 23);
export const underline = new Sgr(4, 24);
export const slowBlink = new Sgr(5, 25);
export const fastBlink = new Sgr(6, 25);
export const inverse = new Sgr(7, 27);
export const strikeThrough = new Sgr(9, 29);
export const gothic = new Sgr(20, 10);
export const doubleUnderline = new Sgr(21, 24);
export const framed = new Sgr(51, 54);
export const encircled = new Sgr(52, 54);
export const overline = new Sgr(53, 55);
