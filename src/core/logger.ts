/**
 * Structured Logging System for termbar
 *
 * Component-tagged logging for the bar engine, the terminal layer and
 * the CLI. Quiet by default (warn and above) so diagnostics never land in
 * the middle of a drawn bar unless asked for:
 * - PROGRESSBAR_LOG_LEVEL: debug | info | warn | error | silent
 * - PROGRESSBAR_LOG_FORMAT=json: one JSON object per line
 * - PROGRESSBAR_LOG_TIMESTAMPS=false: drop the time column
 */

import chalk from "chalk";

// ============================================================================
// Types
// ============================================================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  meta?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/** Receives one fully formatted line, without the trailing newline */
export type LogSink = (line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  jsonOutput: boolean;
  includeTimestamp: boolean;
  includeStack: boolean;
  sink: LogSink;
}

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.SILENT]: "SILENT",
};

const LOG_LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.cyan,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.SILENT]: (text) => text,
};

// stderr keeps logs out of piped stdout; the bar redirect wraps it too
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function parseLogLevel(value: string | undefined, fallback = LogLevel.WARN): LogLevel {
  if (!value) return fallback;
  return LOG_LEVEL_MAP[value.trim().toLowerCase()] ?? fallback;
}

/**
 * Get default configuration from environment
 */
function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: parseLogLevel(env.PROGRESSBAR_LOG_LEVEL),
    jsonOutput: env.PROGRESSBAR_LOG_FORMAT === "json",
    includeTimestamp: env.PROGRESSBAR_LOG_TIMESTAMPS !== "false",
    includeStack: env.PROGRESSBAR_LOG_STACK !== "false",
    sink: stderrSink,
  };
}

// Global configuration
let globalConfig: LoggerConfig = getDefaultConfig();

/**
 * Update global logger configuration
 *
 * Loggers read the global configuration on every call, so this also
 * reaches loggers created at module load.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Restore the environment-derived configuration
 */
export function resetLoggerConfig(env: NodeJS.ProcessEnv = process.env): void {
  globalConfig = getDefaultConfig(env);
}

// ============================================================================
// Logger Class
// ============================================================================

/**
 * Structured logger with component tagging
 *
 * @example
 * ```typescript
 * const logger = new Logger("ProgressBar");
 * logger.debug("Started", { maxValue: 100 });
 * logger.error("Redraw failed", error, { value: 42 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly overrides: Partial<LoggerConfig>;

  constructor(component: string, overrides: Partial<LoggerConfig> = {}) {
    this.component = component;
    this.overrides = overrides;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.level && level !== LogLevel.SILENT;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, undefined, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, undefined, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, undefined, meta);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, error, meta);
  }

  /**
   * Create a child logger with additional context
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}:${subComponent}`, this.overrides);
  }

  private log(level: LogLevel, message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      component: this.component,
      message,
    };

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = meta;
    }

    if (error !== undefined) {
      entry.error =
        error instanceof Error
          ? {
              name: error.name,
              message: error.message,
              stack: config.includeStack ? error.stack : undefined,
            }
          : { name: "UnknownError", message: String(error) };
    }

    if (config.jsonOutput) {
      config.sink(JSON.stringify(entry));
    } else {
      config.sink(this.formatPretty(level, entry, config));
    }
  }

  private formatPretty(level: LogLevel, entry: LogEntry, config: LoggerConfig): string {
    const parts: string[] = [];

    if (config.includeTimestamp) {
      parts.push(chalk.dim(entry.timestamp.slice(11, 19)));
    }

    parts.push(LOG_LEVEL_COLORS[level](LOG_LEVEL_NAMES[level].padEnd(5)));
    parts.push(chalk.dim(`[${this.component}]`));
    parts.push(entry.message);

    if (entry.meta) {
      const metaStr = Object.entries(entry.meta)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(chalk.dim(metaStr));
    }

    let output = parts.join(" ");
    if (entry.error) {
      output += ` ${chalk.dim(`(${entry.error.name}: ${entry.error.message})`)}`;
      if (entry.error.stack) {
        output += `\n${chalk.dim(entry.error.stack)}`;
      }
    }
    return output;
  }
}

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string): Logger {
  return new Logger(component);
}

export default Logger;
