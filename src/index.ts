/**
 * termbar - throttled, widget-based terminal progress bars
 *
 * @example
 * ```typescript
 * import { progressbar } from "termbar";
 *
 * for (const file of progressbar(files)) {
 *   await compress(file);
 * }
 * ```
 */

// Progress
export {
  ProgressBar,
  NullBar,
  type ProgressBarOptions,
  type ProgressStream,
  type OutputOptions,
  type ResizeOptions,
  type RedirectOptions,
  type UpdateOptions,
  type StartOptions,
  type FinishOptions,
} from "./progress/bar.js";
export { withProgressBar, progressbar, progressbarAsync } from "./progress/iterate.js";
export {
  UnknownLength,
  type MaxValue,
  type ProgressData,
  type Widget,
  type WidgetContext,
  type WidgetItem,
} from "./progress/types.js";
export * as widgets from "./progress/widgets.js";
export { blocks, spinners, type SpinnerName } from "./progress/glyphs.js";
export {
  ExponentialMovingAverage,
  DoubleExponentialMovingAverage,
  type SmoothingAlgorithm,
} from "./progress/smoothing.js";
export { StreamRedirect, type RedirectTarget } from "./progress/redirect.js";

// Terminal
export * as ansi from "./terminal/ansi.js";
export {
  CapabilityLevel,
  colorSupportFromEnvironment,
  isAnsiCapable,
  isTerminal,
  resolveColorEnable,
  type ColorRequest,
  type TerminalLike,
} from "./terminal/capability.js";
export {
  Color,
  ColorGradient,
  ColorTable,
  WINDOWS_COLORS,
  hslFromRgb,
  interpolate,
  nearestWindowsColor,
  rgb,
  type ColorSpec,
  type HSL,
  type Interpolator,
  type RGB,
  type WindowsColor,
} from "./terminal/colors.js";
export { createDefaultColorTable } from "./terminal/palette.js";
export { applyColors, type ApplyColorsOptions } from "./terminal/apply.js";
export {
  parseCursorResponse,
  queryCursorPosition,
  type CursorPosition,
  type CursorQueryStreams,
} from "./terminal/cursor.js";

// Core
export * from "./core/errors.js";
export { Logger, LogLevel, configureLogger, createLogger, resetLoggerConfig } from "./core/logger.js";
export { envFlag, loadEnvironmentConfig, type EnvironmentConfig } from "./core/config.js";
export { DEFAULTS, ENV_VARS } from "./core/constants.js";
export { formatClock, stripAnsi, stripColors, visualLength } from "./utils/text.js";
export type { Duration, IntervalInput } from "./utils/duration.js";
