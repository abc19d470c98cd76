/**
 * CLI Theme - Shared styling constants for CLI output
 */

import chalk from "chalk";

// ============================================================================
// Colors
// ============================================================================

export const PRIMARY = chalk.hex("#5FAFFF");
export const SUCCESS = chalk.green;
export const ERROR = chalk.red;
export const WARNING = chalk.yellow;
export const INFO = chalk.cyan;
export const MUTED = chalk.gray;

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Bold section title followed by a rule
 */
export function heading(title: string): string {
  return `${chalk.bold(title)}\n${MUTED("─".repeat(Math.max(title.length, 20)))}`;
}

/**
 * `label   value` with the label padded to a column
 */
export function formatField(label: string, value: string, width = 18): string {
  return `  ${MUTED(`${label}:`.padEnd(width))} ${value}`;
}

/**
 * Colored yes/no
 */
export function formatFlag(value: boolean): string {
  return value ? SUCCESS("yes") : WARNING("no");
}
