/**
 * CLI Module - Entry Point
 *
 * Composes all command modules into a unified CLI program.
 * Each command group is in its own module for maintainability.
 */

import { Command } from "commander";
import {
  registerCountCommands,
  registerCursorCommands,
  registerDemoCommands,
  registerEnvCommands,
} from "./commands/index.js";

// Re-export theme for use by other modules
export * from "./theme.js";

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("termbar")
    .description("Terminal progress bars with color gradients and capability detection")
    .version("0.1.0");

  registerDemoCommands(program);
  registerCountCommands(program);
  registerEnvCommands(program);
  registerCursorCommands(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync([...argv]);
}
