/**
 * Shared progress types - state snapshots and the widget protocol
 */

import type { CapabilityLevel } from "../terminal/capability.js";

/** Max value of a bar whose length is not known */
export const UnknownLength: unique symbol = Symbol("UnknownLength");
export type MaxValue = number | typeof UnknownLength;

/**
 * Read-only view of a bar handed to widgets on every redraw
 */
export interface ProgressData {
  minValue: number;
  maxValue: MaxValue;
  value: number;
  previousValue: number | null;
  startTime: Date | null;
  lastUpdateTime: Date | null;
  endTime: Date | null;
  /** Number of redraws so far */
  updates: number;
  totalSecondsElapsed: number;
  /** Seconds component, 0-59 */
  secondsElapsed: number;
  /** Minutes component, 0-59 */
  minutesElapsed: number;
  /** Hours component, 0-23 */
  hoursElapsed: number;
  daysElapsed: number;
  /** 0-100, or null while the max value is unknown */
  percentage: number | null;
  variables: Readonly<Record<string, unknown>>;
}

export interface WidgetContext {
  /** Color depth of the output stream */
  colors: CapabilityLevel;
  /** Visible width of a string */
  measure: (text: string) => number;
  /** Columns available: the whole line, or an expanding widget's share */
  width: number;
}

export interface Widget {
  render(data: ProgressData, context: WidgetContext): string;
  /** Expanding widgets split whatever width the rest of the line leaves */
  readonly expands?: boolean;
  /** User variable this widget displays; registered on the bar */
  readonly variableName?: string;
}

/** Plain strings are rendered verbatim */
export type WidgetItem = Widget | string;
