/**
 * The xterm 256-color palette as a color table
 */

import { ColorTable, rgb, type RGB } from "./colors.js";

const SYSTEM_COLORS: ReadonlyArray<readonly [string, RGB]> = [
  ["black", rgb(0, 0, 0)],
  ["maroon", rgb(128, 0, 0)],
  ["green", rgb(0, 128, 0)],
  ["olive", rgb(128, 128, 0)],
  ["navy", rgb(0, 0, 128)],
  ["purple", rgb(128, 0, 128)],
  ["teal", rgb(0, 128, 128)],
  ["silver", rgb(192, 192, 192)],
  ["grey", rgb(128, 128, 128)],
  ["red", rgb(255, 0, 0)],
  ["lime", rgb(0, 255, 0)],
  ["yellow", rgb(255, 255, 0)],
  ["blue", rgb(0, 0, 255)],
  ["fuchsia", rgb(255, 0, 255)],
  ["aqua", rgb(0, 255, 255)],
  ["white", rgb(255, 255, 255)],
];

export const CUBE_LEVELS = [0, 95, 135, 175, 215, 255] as const;

/**
 * Palette index of a 6x6x6 cube position (each coordinate 0-5)
 */
export function cubeIndex(r: number, g: number, b: number): number {
  return 16 + 36 * r + 6 * g + b;
}

/**
 * Build a fresh table holding all 256 xterm colors: the sixteen system
 * colors by name, then the color cube and the grey ramp named by index.
 */
export function createDefaultColorTable(): ColorTable {
  const table = new ColorTable();

  SYSTEM_COLORS.forEach(([name, value], index) => {
    table.register(value, undefined, name, index);
  });

  for (let r = 0; r < 6; r++) {
    for (let g = 0; g < 6; g++) {
      for (let b = 0; b < 6; b++) {
        const index = cubeIndex(r, g, b);
        table.register(rgb(CUBE_LEVELS[r], CUBE_LEVELS[g], CUBE_LEVELS[b]), undefined, `color${index}`, index);
      }
    }
  }

  for (let step = 0; step < 24; step++) {
    const level = 8 + 10 * step;
    table.register(rgb(level, level, level), undefined, `grey${step}`, 232 + step);
  }

  return table;
}
