/**
 * Cursor Command - Ask the terminal for the cursor position
 */

import { Command } from "commander";
import { logError, TerminalQueryError } from "../../core/errors.js";
import { queryCursorPosition, type CursorPosition, type CursorQueryStreams } from "../../terminal/cursor.js";
import { formatField, heading, INFO, WARNING } from "../theme.js";
import { parseIntegerOption } from "./options.js";

interface CursorOptions {
  timeout: number;
}

/**
 * Query the cursor, giving up after `timeoutMs`
 */
export async function queryWithTimeout(streams: CursorQueryStreams, timeoutMs: number): Promise<CursorPosition> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new TerminalQueryError(`No reply from the terminal within ${timeoutMs}ms`, "")),
      timeoutMs
    );
  });

  try {
    return await Promise.race([queryCursorPosition(streams), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Register cursor commands on the program
 */
export function registerCursorCommands(program: Command): void {
  program
    .command("cursor")
    .description("Print the cursor position reported by the terminal")
    .option("-t, --timeout <ms>", "Give up after this long", parseIntegerOption, 1000)
    .action(async (options: CursorOptions) => {
      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        console.log(WARNING("The cursor position needs an interactive terminal"));
        process.exit(1);
      }

      try {
        const position = await queryWithTimeout({ input: process.stdin, output: process.stdout }, options.timeout);
        console.log(heading("Cursor"));
        console.log(formatField("Row", INFO(String(position.row))));
        console.log(formatField("Column", INFO(String(position.column))));
      } catch (error) {
        logError(error);
        process.exit(1);
      }
    });
}
