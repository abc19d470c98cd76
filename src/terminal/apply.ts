/**
 * Percentage-driven coloring of text
 */

import { CapabilityLevel } from "./capability.js";
import { Color, ColorGradient, type ColorSpec } from "./colors.js";

export interface ApplyColorsOptions {
  /** Foreground while the percentage is known */
  fg?: ColorSpec;
  /** Background while the percentage is known */
  bg?: ColorSpec;
  /** Foreground when the percentage is unknown */
  fgNone?: Color | null;
  /** Background when the percentage is unknown */
  bgNone?: Color | null;
  level: CapabilityLevel;
}

function resolve(color: ColorSpec, percentage: number): Color | null {
  if (color instanceof ColorGradient) {
    return color.at(percentage / 100);
  }
  return color ?? null;
}

/**
 * Paint `text` for a 0-100 `percentage` (or `null` when unknown).
 * Gradients are sampled at `percentage / 100`; foreground is applied
 * before background and empty slots leave the text alone.
 */
export function applyColors(text: string, percentage: number | null, options: ApplyColorsOptions): string {
  const fg = percentage === null ? options.fgNone ?? null : resolve(options.fg, percentage);
  const bg = percentage === null ? options.bgNone ?? null : resolve(options.bg, percentage);

  let result = text;
  if (fg) {
    result = fg.fg(result, options.level);
  }
  if (bg) {
    result = bg.bg(result, options.level);
  }
  return result;
}
