/**
 * Text helpers that understand embedded ANSI sequences
 */

// eslint-disable-next-line no-control-regex
const CSI_PATTERN = /\x1B\[[0-9;?]*[a-zA-Z]/g;
// eslint-disable-next-line no-control-regex
const SGR_PATTERN = /\x1B\[[0-9;]*m/g;

/**
 * Remove every CSI sequence (styles and cursor movement)
 */
export function stripAnsi(str: string): string {
  return str.replace(CSI_PATTERN, "");
}

/**
 * Remove only SGR (color and style) sequences
 */
export function stripColors(str: string): string {
  return str.replace(SGR_PATTERN, "");
}

/**
 * Visible width of a string: code points outside escape sequences
 */
export function visualLength(str: string): number {
  return Array.from(stripAnsi(str)).length;
}

/**
 * Pad on the left until `measure(str)` reaches `width`
 */
export function padStartVisual(
  str: string,
  width: number,
  measure: (text: string) => number = visualLength
): string {
  const padding = width - measure(str);
  return padding > 0 ? " ".repeat(padding) + str : str;
}

/**
 * Format a number of seconds as H:MM:SS (hours are not wrapped)
 */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}
