/**
 * Cursor position query (device status report)
 *
 * Writes `ESC [ 6 n` and reads the terminal's `ESC [ row ; col R` reply
 * from the input stream. Concurrent queries on the same output stream are
 * serialized, since each read loop consumes whatever bytes arrive.
 *
 * There is no timeout: a terminal that never answers leaves the promise
 * pending forever. Callers that need a bound must race it against their
 * own timer.
 */

import { createLogger } from "../core/logger.js";
import { TerminalQueryError } from "../core/errors.js";
import { KeyedLock } from "../utils/lock.js";
import { CSI_PREFIX, CURSOR_POSITION_REQUEST } from "./ansi.js";

const logger = createLogger("cursor");

type DataListener = (chunk: Buffer | string) => void;

/** The readable side, e.g. `process.stdin` */
export interface CursorQueryInput {
  on(event: "data", listener: DataListener): unknown;
  removeListener(event: "data", listener: DataListener): unknown;
  resume?(): unknown;
  pause?(): unknown;
  readableFlowing?: boolean | null;
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/** The writable side, e.g. `process.stdout` */
export interface CursorQueryOutput {
  write(chunk: string): unknown;
  flush?(): void;
}

export interface CursorQueryStreams {
  input: CursorQueryInput;
  output: CursorQueryOutput;
}

export interface CursorPosition {
  row: number;
  column: number;
}

const TERMINATOR = "R";
const queryLock = new KeyedLock<CursorQueryOutput>();

/**
 * Parse a `ESC [ row ; col R` reply. Bytes before the last `ESC [` are
 * ignored.
 */
export function parseCursorResponse(response: string): CursorPosition {
  const start = response.lastIndexOf(CSI_PREFIX);
  if (start === -1 || !response.endsWith(TERMINATOR)) {
    throw new TerminalQueryError("Malformed cursor position response", response);
  }

  const fields = response.slice(start + CSI_PREFIX.length, -TERMINATOR.length).split(";");
  if (fields.length !== 2 || !fields.every((field) => /^\d+$/.test(field))) {
    throw new TerminalQueryError("Cursor position response is not two integers", response);
  }

  return { row: Number(fields[0]), column: Number(fields[1]) };
}

/**
 * Ask the terminal where the cursor is
 */
export function queryCursorPosition(streams: CursorQueryStreams): Promise<CursorPosition> {
  return queryLock.run(streams.output, () => readCursorPosition(streams));
}

function readCursorPosition({ input, output }: CursorQueryStreams): Promise<CursorPosition> {
  return new Promise<CursorPosition>((resolve, reject) => {
    let response = "";
    const wasFlowing = input.readableFlowing === true;
    const toggleRaw = input.isTTY === true && input.isRaw !== true && typeof input.setRawMode === "function";

    const finish = () => {
      input.removeListener("data", onData);
      if (toggleRaw) input.setRawMode?.(false);
      if (!wasFlowing) input.pause?.();
    };

    const onData: DataListener = (chunk) => {
      response += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const end = response.indexOf(TERMINATOR);
      if (end === -1) {
        return;
      }

      finish();
      const reply = response.slice(0, end + 1);
      logger.debug("Cursor position reply", { reply: JSON.stringify(reply) });
      try {
        resolve(parseCursorResponse(reply));
      } catch (error) {
        reject(error);
      }
    };

    if (toggleRaw) input.setRawMode?.(true);
    input.on("data", onData);
    input.resume?.();
    try {
      output.write(CURSOR_POSITION_REQUEST);
      output.flush?.();
    } catch (error) {
      finish();
      reject(error);
    }
  });
}
