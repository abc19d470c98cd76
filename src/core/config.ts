/**
 * Configuration loading and validation
 *
 * Environment variables read by termbar (all optional):
 * - PROGRESSBAR_MINIMUM_UPDATE_INTERVAL: raises the redraw floor (seconds)
 * - PROGRESSBAR_ENABLE_COLORS: y/n flag, enables colors
 * - FORCE_COLOR: y/n flag, enables colors
 * - PROGRESSBAR_LINE_BREAKS: y/n flag, one line per redraw instead of "\r"
 * - COLUMNS: terminal width fallback
 * - JUPYTER_COLUMNS / JUPYTER_LINES / JPY_PARENT_PID: notebook front end
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { ENV_VARS } from "./constants.js";

const TRUE_FLAGS = new Set(["y", "yes", "1", "true", "on"]);
const FALSE_FLAGS = new Set(["n", "no", "0", "false", "off"]);

/**
 * Read a y/n, yes/no, 1/0, true/false, on/off environment variable.
 * Missing or unrecognized values give `fallback`.
 */
export function envFlag(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  fallback?: boolean
): boolean | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return fallback;
  }

  const value = raw.trim().toLowerCase();
  if (TRUE_FLAGS.has(value)) return true;
  if (FALSE_FLAGS.has(value)) return false;
  return fallback;
}

/**
 * Whether a notebook front end is driving the process
 */
export function isNotebook(env: NodeJS.ProcessEnv = process.env): boolean {
  return ENV_VARS.notebook.some((name) => Boolean(env[name]));
}

// ============================================================================
// Schema
// ============================================================================

const optionalNumber = (label: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return undefined;
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a number` });
        return z.NEVER;
      }
      return parsed;
    });

export const EnvironmentConfigSchema = z.object({
  minimumUpdateInterval: optionalNumber(ENV_VARS.minimumUpdateInterval).pipe(
    z.number().nonnegative().optional()
  ),
  // non-numeric or non-positive widths are dropped
  columns: z
    .string()
    .optional()
    .transform((value) => {
      const parsed = Number.parseInt(value ?? "", 10);
      return parsed > 0 ? parsed : undefined;
    }),
  enableColors: z.boolean().optional(),
  forceColor: z.boolean().optional(),
  lineBreaks: z.boolean().optional(),
  notebook: z.boolean(),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const rawConfig = {
    minimumUpdateInterval: env[ENV_VARS.minimumUpdateInterval],
    columns: env[ENV_VARS.columns],
    enableColors: envFlag(ENV_VARS.enableColors, env),
    forceColor: envFlag(ENV_VARS.forceColor, env),
    lineBreaks: envFlag(ENV_VARS.lineBreaks, env),
    notebook: isNotebook(env),
  };

  try {
    return EnvironmentConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
      throw new ConfigError(`Invalid configuration:\n${issues.join("\n")}`, {
        issues: error.issues.map((i) => i.path.join(".")),
      });
    }
    throw error;
  }
}
