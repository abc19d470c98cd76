/**
 * Widgets - the fragments a progress line is built from
 *
 * Every factory returns a fresh widget; widgets with state (the ETA's
 * smoothing) must not be shared between bars.
 */

import { applyColors } from "../terminal/apply.js";
import type { Color, ColorSpec } from "../terminal/colors.js";
import { formatClock, padStartVisual } from "../utils/text.js";
import { blocks, spinners } from "./glyphs.js";
import type { SmoothingAlgorithm } from "./smoothing.js";
import { UnknownLength, type MaxValue, type ProgressData, type Widget, type WidgetItem } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface WidgetColorOptions {
  fg?: ColorSpec;
  bg?: ColorSpec;
  /** Used instead of fg/bg while the percentage is unknown */
  fgNone?: Color | null;
  bgNone?: Color | null;
}

export interface BarOptions extends WidgetColorOptions {
  marker?: string;
  fill?: string;
  left?: string;
  right?: string;
}

export interface SimpleProgressOptions {
  /** `{value}` and `{max}` are substituted */
  format?: string;
}

export interface EtaOptions {
  smoothing?: SmoothingAlgorithm;
}

export interface SpinnerOptions {
  frames?: readonly string[];
}

export interface VariableOptions {
  /** Minimum width of the value, padded on the right */
  width?: number;
}

// ============================================================================
// Widgets
// ============================================================================

/**
 * Whole percent in three columns, e.g. ` 42%`; `N/A%` when unknown
 */
export function percentage(options: WidgetColorOptions = {}): Widget {
  return {
    render(data, context) {
      const text =
        data.percentage === null ? "N/A%" : `${padStartVisual(String(Math.floor(data.percentage)), 3)}%`;
      return applyColors(text, data.percentage, { ...options, level: context.colors });
    },
  };
}

/**
 * `5 of 10`; an unknown max shows as `?`
 */
export function simpleProgress(options: SimpleProgressOptions = {}): Widget {
  const format = options.format ?? "{value} of {max}";
  return {
    render(data) {
      const max = data.maxValue === UnknownLength ? "?" : String(data.maxValue);
      return format.replace("{value}", String(data.value)).replace("{max}", max);
    },
  };
}

export function counter(): Widget {
  return {
    render(data) {
      return String(data.value);
    },
  };
}

/**
 * Expanding bar `|####    |`. Markers are colored with the percentage;
 * a bar of unknown length only shows its fill.
 */
export function bar(options: BarOptions = {}): Widget {
  const { marker = "#", fill = " ", left = "|", right = "|" } = options;
  return {
    expands: true,
    render(data, context) {
      const inner = Math.max(0, context.width - context.measure(left) - context.measure(right));
      if (data.percentage === null) {
        return left + fill.repeat(inner) + right;
      }

      const filled = Math.min(inner, Math.max(0, Math.floor((data.percentage / 100) * inner)));
      const markers = applyColors(marker.repeat(filled), data.percentage, {
        ...options,
        level: context.colors,
      });
      return left + markers + fill.repeat(inner - filled) + right;
    },
  };
}

/**
 * Block-character bar: `█████░░░░░`
 */
export function blockBar(options: WidgetColorOptions = {}): Widget {
  return bar({ ...options, marker: blocks.full, fill: blocks.quarter, left: "", right: "" });
}

export function elapsed(): Widget {
  return {
    render(data) {
      return `Elapsed Time: ${formatClock(data.totalSecondsElapsed)}`;
    },
  };
}

/**
 * Remaining time from the average rate since start, optionally smoothed.
 * Shows the total time once the bar has finished.
 */
export function eta(options: EtaOptions = {}): Widget {
  const { smoothing } = options;
  return {
    render(data) {
      const total = data.totalSecondsElapsed;
      if (data.endTime !== null) {
        return `Time: ${formatClock(total)}`;
      }

      const done = data.value - data.minValue;
      if (data.maxValue === UnknownLength || done <= 0 || total <= 0) {
        return "ETA:  --:--:--";
      }

      const rawRate = done / total;
      const rate = smoothing ? smoothing.update(rawRate, total) : rawRate;
      if (rate <= 0) {
        return "ETA:  --:--:--";
      }
      return `ETA:  ${formatClock((data.maxValue - data.value) / rate)}`;
    },
  };
}

/**
 * One frame per redraw
 */
export function spinner(options: SpinnerOptions = {}): Widget {
  const frames = options.frames && options.frames.length > 0 ? options.frames : spinners.ascii;
  return {
    render(data) {
      return frames[data.updates % frames.length];
    },
  };
}

/**
 * `name: value`, or `name: -` while unset
 */
export function variable(name: string, options: VariableOptions = {}): Widget {
  return {
    variableName: name,
    render(data) {
      const value = data.variables[name];
      const text = value === undefined || value === null ? "-" : String(value);
      return `${name}: ${text.padEnd(options.width ?? 0)}`;
    },
  };
}

/**
 * Widgets used when a bar is given none
 */
export function defaultWidgets(maxValue: MaxValue): WidgetItem[] {
  if (maxValue === UnknownLength) {
    return [spinner(), " ", counter(), " ", elapsed()];
  }
  return [percentage(), " ", "(", simpleProgress(), ")", " ", bar(), " ", elapsed(), " ", eta()];
}
