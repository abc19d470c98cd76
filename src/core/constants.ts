/**
 * Centralized Constants - Library-wide default values
 *
 * Single source of truth for intervals, widths and environment
 * variable names used throughout termbar.
 */

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULTS = {
  /** Absolute floor for the redraw interval, in seconds */
  minimumUpdateInterval: 0.05,

  /** Terminal width when nothing better is known */
  termWidth: 80,

  /** Min value of a fresh bar */
  minValue: 0,

  /** Whether exceeding max value is an error */
  maxError: true,

  /** Left-justify the line (pad on the right) */
  leftJustify: true,

  /** Alpha for the smoothing algorithms */
  smoothingAlpha: 0.5,

  /** String written after the final redraw */
  finishEnd: "\n",
} as const;

// ============================================================================
// Environment Variables
// ============================================================================

export const ENV_VARS = {
  /** Raises the minimum redraw interval (seconds) */
  minimumUpdateInterval: "PROGRESSBAR_MINIMUM_UPDATE_INTERVAL",

  /** Explicitly enables colors */
  enableColors: "PROGRESSBAR_ENABLE_COLORS",

  /** Generic force-color flag shared with other tools */
  forceColor: "FORCE_COLOR",

  /** Forces newline-per-redraw output on or off */
  lineBreaks: "PROGRESSBAR_LINE_BREAKS",

  /** Fallback terminal width */
  columns: "COLUMNS",

  /** Any of these marks a notebook front end */
  notebook: ["JUPYTER_COLUMNS", "JUPYTER_LINES", "JPY_PARENT_PID"],
} as const;
