/**
 * Iteration helpers and the scoped bar guard
 */

import { createLogger } from "../core/logger.js";
import { ProgressBar, type ProgressBarOptions } from "./bar.js";

const logger = createLogger("ProgressBar:scope");

/**
 * Run `fn` with a started bar. Success finishes the bar; a failure
 * finishes it dirty and rethrows the original error.
 *
 * @example
 * ```typescript
 * await withProgressBar({ maxValue: urls.length }, async (bar) => {
 *   for (const url of urls) {
 *     await download(url);
 *     bar.increment();
 *   }
 * });
 * ```
 */
export async function withProgressBar<T>(
  barOrOptions: ProgressBar | ProgressBarOptions,
  fn: (bar: ProgressBar) => Promise<T> | T
): Promise<T> {
  const bar = barOrOptions instanceof ProgressBar ? barOrOptions : new ProgressBar(barOrOptions);
  bar.start();

  let result: T;
  try {
    result = await fn(bar);
  } catch (error) {
    try {
      bar.finish({ dirty: true });
    } catch (cleanupError) {
      logger.debug("Finishing after a failure failed", {
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
    throw error;
  }

  bar.finish();
  return result;
}

/**
 * Wrap an iterable in a fresh bar
 *
 * @example
 * ```typescript
 * for (const row of progressbar(rows)) {
 *   process(row);
 * }
 * ```
 */
export function progressbar<T>(
  iterable: Iterable<T>,
  options: ProgressBarOptions = {}
): Generator<T, void, undefined> {
  return new ProgressBar(options).iterate(iterable);
}

export function progressbarAsync<T>(
  iterable: AsyncIterable<T> | Iterable<T>,
  options: ProgressBarOptions = {}
): AsyncGenerator<T, void, undefined> {
  return new ProgressBar(options).iterateAsync(iterable);
}
