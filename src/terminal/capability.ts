/**
 * Terminal capability detection
 *
 * Decides whether a stream is a terminal, whether it understands ANSI
 * sequences and how many colors it can show. The result is resolved once
 * per bar and never renegotiated.
 */

import { z } from "zod";
import { envFlag, isNotebook } from "../core/config.js";
import { ENV_VARS } from "../core/constants.js";
import { InvalidColorConfigurationError } from "../core/errors.js";

export enum CapabilityLevel {
  NONE = 0,
  XTERM = 16,
  XTERM_256 = 256,
  TRUECOLOR = 16777216,
}

/** What a caller may ask for: auto-detect, on, off or an explicit level */
export type ColorRequest = "auto" | boolean | CapabilityLevel | null | undefined;

/** Anything with an optional terminal flag, e.g. `process.stderr` */
export interface TerminalLike {
  isTTY?: boolean;
}

const ANSI_TERMS = [
  "([xe]|bv)term",
  "(sco)?ansi",
  "cygwin",
  "konsole",
  "linux",
  "rxvt",
  "screen",
  "tmux",
  "vt(10[02]|220|320)",
];
const ANSI_TERM_RE = new RegExp(`^(${ANSI_TERMS.join("|")})`, "i");

/**
 * `override` wins when given; otherwise the stream's own TTY flag.
 * Streams that cannot tell are not terminals.
 */
export function isTerminal(stream: TerminalLike | null | undefined, override?: boolean | null): boolean {
  if (override !== undefined && override !== null) {
    return override;
  }
  try {
    return stream?.isTTY === true;
  } catch {
    return false;
  }
}

/**
 * A terminal whose TERM matches a known ANSI family
 */
export function isAnsiCapable(
  stream: TerminalLike | null | undefined,
  env: NodeJS.ProcessEnv = process.env,
  override?: boolean | null
): boolean {
  if (!isTerminal(stream, override)) {
    return false;
  }
  return ANSI_TERM_RE.test(env.TERM ?? "");
}

/**
 * Color depth advertised by the environment.
 *
 * Notebooks always get truecolor. Otherwise TERM, COLORTERM and COLOR are
 * checked in that order and the first one matching any rule decides:
 * `24bit`/`truecolor`, then `256`, then `xterm`.
 */
export function colorSupportFromEnvironment(env: NodeJS.ProcessEnv = process.env): CapabilityLevel {
  if (isNotebook(env)) {
    return CapabilityLevel.TRUECOLOR;
  }

  for (const name of ["TERM", "COLORTERM", "COLOR"]) {
    const value = (env[name] ?? "").toLowerCase();
    if (value.includes("24bit") || value.includes("truecolor")) {
      return CapabilityLevel.TRUECOLOR;
    }
    if (value.includes("256")) {
      return CapabilityLevel.XTERM_256;
    }
    if (value.includes("xterm")) {
      return CapabilityLevel.XTERM;
    }
  }

  return CapabilityLevel.NONE;
}

const ColorRequestSchema = z.union([
  z.literal("auto"),
  z.boolean(),
  z.nativeEnum(CapabilityLevel),
  z.null(),
  z.undefined(),
]);

export interface ResolveColorOptions {
  env?: NodeJS.ProcessEnv;
  ansiCapable: boolean;
}

/**
 * Turn a color request into a concrete level.
 *
 * Input is validated at runtime as well since it often comes from
 * untyped configuration.
 */
export function resolveColorEnable(requested: unknown, options: ResolveColorOptions): CapabilityLevel {
  const parsed = ColorRequestSchema.safeParse(requested);
  if (!parsed.success) {
    throw new InvalidColorConfigurationError(requested);
  }

  const request = parsed.data;
  const env = options.env ?? process.env;

  if (request === "auto" || request === null || request === undefined) {
    if (envFlag(ENV_VARS.enableColors, env)) {
      return CapabilityLevel.XTERM_256;
    }
    if (envFlag(ENV_VARS.forceColor, env)) {
      return CapabilityLevel.XTERM_256;
    }
    return options.ansiCapable ? colorSupportFromEnvironment(env) : CapabilityLevel.NONE;
  }

  if (request === true) {
    return CapabilityLevel.XTERM_256;
  }
  if (request === false) {
    return CapabilityLevel.NONE;
  }
  return request;
}
