/**
 * Shared option parsers for commander
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import type { ColorRequest } from "../../terminal/capability.js";

const ColorsOptionSchema = z.enum(["auto", "on", "off"]);

/**
 * `--colors auto|on|off`
 */
export function parseColorsOption(value: string): ColorRequest {
  const parsed = ColorsOptionSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError("Expected one of: auto, on, off.");
  }
  switch (parsed.data) {
    case "on":
      return true;
    case "off":
      return false;
    default:
      return "auto";
  }
}

/**
 * Non-negative integer option
 */
export function parseIntegerOption(value: string): number {
  const parsed = z.coerce.number().int().nonnegative().safeParse(value);
  if (!parsed.success || value.trim() === "") {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed.data;
}
