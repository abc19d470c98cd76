/**
 * Error Utilities - Centralized error handling for termbar
 *
 * Custom error classes and utilities for consistent error handling
 * across the progress bar, terminal and CLI layers.
 */

import chalk from "chalk";

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * Base error class for all termbar errors
 */
export class TermbarError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly originalCause?: Error;

  constructor(
    message: string,
    options: {
      code?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = "TermbarError";
    this.code = options.code || "UNKNOWN_ERROR";
    this.context = options.context;
    this.originalCause = options.cause;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends TermbarError {
  constructor(message: string, context?: Record<string, unknown>, code = "CONFIG_ERROR") {
    super(message, { code, context });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors
 */
export class ValidationError extends TermbarError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    options: {
      field?: string;
      value?: unknown;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: options.context,
    });
    this.name = "ValidationError";
    this.field = options.field;
    this.value = options.value;
  }
}

/**
 * Bounds where the maximum lies below the minimum
 */
export class InvalidRangeError extends TermbarError {
  public readonly minValue: number;
  public readonly maxValue: number;

  constructor(minValue: number, maxValue: number) {
    super(`Max value ${maxValue} needs to be at least the min value ${minValue}`, {
      code: "INVALID_RANGE",
      context: { minValue, maxValue },
    });
    this.name = "InvalidRangeError";
    this.minValue = minValue;
    this.maxValue = maxValue;
  }
}

/**
 * An update went past a concrete max value while maxError is enabled
 */
export class ValueExceedsMaximumError extends TermbarError {
  public readonly value: number;
  public readonly maxValue: number;

  constructor(value: number, minValue: number, maxValue: number) {
    super(`Value ${value} is too large. Should be between ${minValue} and ${maxValue}`, {
      code: "VALUE_EXCEEDS_MAXIMUM",
      context: { value, minValue, maxValue },
    });
    this.name = "ValueExceedsMaximumError";
    this.value = value;
    this.maxValue = maxValue;
  }
}

/**
 * An update went below the min value
 */
export class ValueBelowMinimumError extends TermbarError {
  public readonly value: number;
  public readonly minValue: number;

  constructor(value: number, minValue: number, maxValue: number) {
    super(`Value ${value} is too small. Should be between ${minValue} and ${maxValue}`, {
      code: "VALUE_BELOW_MINIMUM",
      context: { value, minValue, maxValue },
    });
    this.name = "ValueBelowMinimumError";
    this.value = value;
    this.minValue = minValue;
  }
}

/**
 * enableColors was neither auto, a boolean nor a capability level
 */
export class InvalidColorConfigurationError extends ConfigError {
  public readonly requested: unknown;

  constructor(requested: unknown) {
    super(
      `Invalid value for enableColors: ${String(requested)}`,
      { requested },
      "INVALID_COLOR_CONFIGURATION"
    );
    this.name = "InvalidColorConfigurationError";
    this.requested = requested;
  }
}

/**
 * update() named a variable the bar does not know
 */
export class UnknownVariableError extends TermbarError {
  public readonly variable: string;

  constructor(variable: string) {
    super(`update() got an unexpected variable name: ${variable}`, {
      code: "UNKNOWN_VARIABLE",
      context: { variable },
    });
    this.name = "UnknownVariableError";
    this.variable = variable;
  }
}

/**
 * The terminal answered a query with something we cannot parse
 */
export class TerminalQueryError extends TermbarError {
  public readonly response: string;

  constructor(message: string, response: string) {
    super(message, {
      code: "TERMINAL_QUERY_ERROR",
      context: { response },
    });
    this.name = "TerminalQueryError";
    this.response = response;
  }
}

// ============================================================================
// Error Formatting Utilities
// ============================================================================

/**
 * Format an error for display in the terminal
 */
export function formatError(error: unknown): string {
  if (error instanceof TermbarError) {
    let msg = `${chalk.red("Error:")} ${error.message}`;
    if (error.code !== "UNKNOWN_ERROR") {
      msg += chalk.gray(` [${error.code}]`);
    }
    return msg;
  }

  if (error instanceof Error) {
    return `${chalk.red("Error:")} ${error.message}`;
  }

  return `${chalk.red("Error:")} ${String(error)}`;
}

/**
 * Format an error with full details (for debugging)
 */
export function formatErrorVerbose(error: unknown): string {
  if (error instanceof TermbarError) {
    const lines = [
      chalk.red(`[${error.name}] ${error.message}`),
      chalk.gray(`  Code: ${error.code}`),
    ];

    if (error.context) {
      lines.push(chalk.gray(`  Context: ${JSON.stringify(error.context)}`));
    }

    if (error.originalCause) {
      lines.push(chalk.gray(`  Caused by: ${error.originalCause.message}`));
    }

    if (error.stack) {
      lines.push(chalk.gray("\nStack trace:"));
      lines.push(chalk.gray(error.stack));
    }

    return lines.join("\n");
  }

  if (error instanceof Error) {
    return `${chalk.red(error.name)}: ${error.message}\n${chalk.gray(error.stack || "")}`;
  }

  return `${chalk.red("Unknown error:")} ${String(error)}`;
}

/**
 * Log an error to console with appropriate formatting
 */
export function logError(error: unknown, verbose = false): void {
  if (verbose) {
    console.error(formatErrorVerbose(error));
  } else {
    console.error(formatError(error));
  }
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isTermbarError(error: unknown): error is TermbarError {
  return error instanceof TermbarError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
