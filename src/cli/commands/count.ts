/**
 * Count Command - Count stdin lines with a bar on stderr
 */

import { Command } from "commander";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { logError } from "../../core/errors.js";
import { ProgressBar, type ProgressStream } from "../../progress/bar.js";
import { UnknownLength } from "../../progress/types.js";
import { parseIntegerOption } from "./options.js";

interface CountOptions {
  max?: number;
}

export interface CountStreams {
  input: Readable;
  progress?: ProgressStream;
}

/**
 * Count the lines of `input`, drawing progress to `progress`
 */
export async function countLines(streams: CountStreams, options: CountOptions = {}): Promise<number> {
  const bar = new ProgressBar({
    maxValue: options.max ?? UnknownLength,
    maxError: false,
    output: { stream: streams.progress },
  });
  const lines = createInterface({ input: streams.input, crlfDelay: Infinity });

  let count = 0;
  for await (const _line of bar.iterateAsync(lines)) {
    count += 1;
  }
  return count;
}

/**
 * Register count commands on the program
 */
export function registerCountCommands(program: Command): void {
  program
    .command("count")
    .description("Count lines read from stdin, showing progress on stderr")
    .option("-m, --max <n>", "Expected number of lines", parseIntegerOption)
    .action(async (options: CountOptions) => {
      try {
        const count = await countLines({ input: process.stdin }, options);
        console.log(count);
      } catch (error) {
        logError(error);
        process.exit(1);
      }
    });
}
