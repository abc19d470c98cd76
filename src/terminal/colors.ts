/**
 * Color model - RGB/HSL colors, the named color table and gradients
 *
 * Colors are immutable. A color knows how to paint text for every
 * capability level; chalk produces the actual escape sequences.
 */

import chalk from "chalk";
import { ValidationError } from "../core/errors.js";
import { CapabilityLevel } from "./capability.js";

// ============================================================================
// Types
// ============================================================================

export interface RGB {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

/** Hue in degrees [0, 360), saturation and lightness in percent [0, 100] */
export interface HSL {
  readonly hue: number;
  readonly saturation: number;
  readonly lightness: number;
}

export function rgb(red: number, green: number, blue: number): RGB {
  return { red, green, blue };
}

export function rgbKey(value: RGB): string {
  return `${value.red},${value.green},${value.blue}`;
}

/**
 * Standard RGB to HLS conversion, scaled to degrees and percent
 */
export function hslFromRgb(value: RGB): HSL {
  const r = value.red / 255;
  const g = value.green / 255;
  const b = value.blue / 255;

  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const lightness = (max + min) / 2;

  if (max === min) {
    return { hue: 0, saturation: 0, lightness: lightness * 100 };
  }

  const delta = max - min;
  const saturation = lightness <= 0.5 ? delta / (max + min) : delta / (2 - max - min);

  const rc = (max - r) / delta;
  const gc = (max - g) / delta;
  const bc = (max - b) / delta;
  let hue: number;
  if (r === max) {
    hue = bc - gc;
  } else if (g === max) {
    hue = 2 + rc - bc;
  } else {
    hue = 4 + gc - rc;
  }
  hue = (((hue / 6) % 1) + 1) % 1;

  return { hue: hue * 360, saturation: saturation * 100, lightness: lightness * 100 };
}

// ============================================================================
// Color
// ============================================================================

const CHALK_LEVELS: Record<CapabilityLevel, chalk.Level> = {
  [CapabilityLevel.NONE]: 0,
  [CapabilityLevel.XTERM]: 1,
  [CapabilityLevel.XTERM_256]: 2,
  [CapabilityLevel.TRUECOLOR]: 3,
};

const chalkInstances = new Map<CapabilityLevel, chalk.Chalk>();

function chalkFor(level: CapabilityLevel): chalk.Chalk {
  let instance = chalkInstances.get(level);
  if (!instance) {
    instance = new chalk.Instance({ level: CHALK_LEVELS[level] });
    chalkInstances.set(level, instance);
  }
  return instance;
}

export class Color {
  readonly rgb: RGB;
  readonly hls: HSL;
  readonly name: string;
  /** xterm 256-color palette index */
  readonly index: number;

  constructor(value: RGB, hls: HSL | undefined, name: string, index: number) {
    this.rgb = Object.freeze({ ...value });
    this.hls = Object.freeze({ ...(hls ?? hslFromRgb(value)) });
    this.name = name;
    this.index = index;
    Object.freeze(this);
  }

  /** Paint the foreground */
  fg(text: string, level: CapabilityLevel): string {
    const { red, green, blue } = this.rgb;
    switch (level) {
      case CapabilityLevel.NONE:
        return text;
      case CapabilityLevel.XTERM_256:
        return chalkFor(level).ansi256(this.index)(text);
      default:
        return chalkFor(level).rgb(red, green, blue)(text);
    }
  }

  /** Paint the background */
  bg(text: string, level: CapabilityLevel): string {
    const { red, green, blue } = this.rgb;
    switch (level) {
      case CapabilityLevel.NONE:
        return text;
      case CapabilityLevel.XTERM_256:
        return chalkFor(level).bgAnsi256(this.index)(text);
      default:
        return chalkFor(level).bgRgb(red, green, blue)(text);
    }
  }

  equals(other: Color): boolean {
    return (
      rgbKey(this.rgb) === rgbKey(other.rgb) &&
      this.hls.hue === other.hls.hue &&
      this.hls.saturation === other.hls.saturation &&
      this.hls.lightness === other.hls.lightness &&
      this.name === other.name &&
      this.index === other.index
    );
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Blend two colors. RGB channels are truncated to integers; HSL channels
 * are interpolated independently. Name and index follow whichever end
 * the value is closer to.
 */
export function interpolate(from: Color, to: Color, value: number): Color {
  if (value <= 0) return from;
  if (value >= 1) return to;

  const mix = (a: number, b: number) => a + (b - a) * value;

  const blended = rgb(
    Math.trunc(mix(from.rgb.red, to.rgb.red)),
    Math.trunc(mix(from.rgb.green, to.rgb.green)),
    Math.trunc(mix(from.rgb.blue, to.rgb.blue))
  );
  const hls: HSL = {
    hue: mix(from.hls.hue, to.hls.hue),
    saturation: mix(from.hls.saturation, to.hls.saturation),
    lightness: mix(from.hls.lightness, to.hls.lightness),
  };

  const nearer = value < 0.5 ? from : to;
  return new Color(blended, hls, nearer.name, nearer.index);
}

export type Interpolator = (from: Color, to: Color, value: number) => Color;

/**
 * Maps [0, 1] onto a sequence of color stops spaced evenly
 */
export class ColorGradient {
  readonly colors: readonly Color[];
  private readonly interpolator: Interpolator;

  constructor(colors: readonly Color[], interpolator: Interpolator = interpolate) {
    if (colors.length === 0) {
      throw new ValidationError("A gradient needs at least one color", { field: "colors" });
    }
    this.colors = Object.freeze([...colors]);
    this.interpolator = interpolator;
  }

  at(value: number): Color {
    const colors = this.colors;
    if (value <= 0 || colors.length === 1) return colors[0];
    if (value >= 1) return colors[colors.length - 1];

    const segmentSize = 1 / (colors.length - 1);
    const segment = Math.min(Math.floor(value / segmentSize), colors.length - 2);
    const segmentValue = (value - segment * segmentSize) / segmentSize;

    return this.interpolator(colors[segment], colors[segment + 1], segmentValue);
  }
}

/** A color slot: nothing, a fixed color or a gradient over the percentage */
export type ColorSpec = Color | ColorGradient | null | undefined;

// ============================================================================
// Color Table
// ============================================================================

/**
 * Named color registry. Several colors may share a name or an RGB value;
 * lookups by those return every registration in order.
 */
export class ColorTable {
  private readonly names = new Map<string, Color[]>();
  private readonly lowerNames = new Map<string, Color[]>();
  private readonly rgbs = new Map<string, Color[]>();
  private readonly indexes = new Map<number, Color>();

  register(value: RGB, hls: HSL | undefined, name: string, index: number): Color {
    const color = new Color(value, hls, name, index);
    append(this.names, name, color);
    append(this.lowerNames, name.toLowerCase(), color);
    append(this.rgbs, rgbKey(value), color);
    this.indexes.set(index, color);
    return color;
  }

  byName(name: string): readonly Color[] {
    return this.names.get(name) ?? [];
  }

  byLowerName(name: string): readonly Color[] {
    return this.lowerNames.get(name.toLowerCase()) ?? [];
  }

  byRgb(value: RGB): readonly Color[] {
    return this.rgbs.get(rgbKey(value)) ?? [];
  }

  byIndex(index: number): Color | undefined {
    return this.indexes.get(index);
  }

  /**
   * First color registered under `name`, falling back to a
   * case-insensitive match
   */
  get(name: string): Color {
    const color = this.byName(name)[0] ?? this.byLowerName(name)[0];
    if (!color) {
      throw new ValidationError(`Unknown color: ${name}`, { field: "name", value: name });
    }
    return color;
  }

  get size(): number {
    return this.indexes.size;
  }
}

function append<K>(map: Map<K, Color[]>, key: K, color: Color): void {
  const list = map.get(key);
  if (list) {
    list.push(color);
  } else {
    map.set(key, [color]);
  }
}

// ============================================================================
// Windows Console Palette
// ============================================================================

export interface WindowsColor {
  readonly name: string;
  readonly rgb: RGB;
}

export const WINDOWS_COLORS: readonly WindowsColor[] = [
  { name: "BLACK", rgb: rgb(0, 0, 0) },
  { name: "BLUE", rgb: rgb(0, 0, 128) },
  { name: "GREEN", rgb: rgb(0, 128, 0) },
  { name: "CYAN", rgb: rgb(0, 128, 128) },
  { name: "RED", rgb: rgb(128, 0, 0) },
  { name: "MAGENTA", rgb: rgb(128, 0, 128) },
  { name: "YELLOW", rgb: rgb(128, 128, 0) },
  { name: "GREY", rgb: rgb(192, 192, 192) },
  { name: "INTENSE_BLACK", rgb: rgb(128, 128, 128) },
  { name: "INTENSE_BLUE", rgb: rgb(0, 0, 255) },
  { name: "INTENSE_GREEN", rgb: rgb(0, 255, 0) },
  { name: "INTENSE_CYAN", rgb: rgb(0, 255, 255) },
  { name: "INTENSE_RED", rgb: rgb(255, 0, 0) },
  { name: "INTENSE_MAGENTA", rgb: rgb(255, 0, 255) },
  { name: "INTENSE_YELLOW", rgb: rgb(255, 255, 0) },
  { name: "INTENSE_WHITE", rgb: rgb(255, 255, 255) },
];

/**
 * Closest palette entry by Euclidean RGB distance; ties keep the
 * earlier entry
 */
export function nearestWindowsColor(value: RGB): WindowsColor {
  let closest = WINDOWS_COLORS[0];
  let minDistance = Infinity;

  for (const candidate of WINDOWS_COLORS) {
    const distance = Math.hypot(
      value.red - candidate.rgb.red,
      value.green - candidate.rgb.green,
      value.blue - candidate.rgb.blue
    );
    if (distance < minDistance) {
      minDistance = distance;
      closest = candidate;
    }
  }

  return closest;
}
