/**
 * Stream redirection - hold text printed while a bar is drawn
 *
 * The target's `write` is swapped for a buffering one. The bar flushes
 * the buffer through the original `write` right before each redraw, so
 * printed text lands above the bar instead of inside it.
 */

export type WriteCallback = (error?: Error | null) => void;

/** Anything shaped like `process.stdout` */
export interface RedirectTarget {
  write(
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean;
}

export class StreamRedirect {
  readonly target: RedirectTarget;
  // both set only while active
  private originalWrite: RedirectTarget["write"] | null = null;
  private bufferingWrite: RedirectTarget["write"] | null = null;
  private buffer = "";
  private active = false;

  constructor(target: RedirectTarget) {
    this.target = target;
  }

  get isActive(): boolean {
    return this.active;
  }

  get pending(): string {
    return this.buffer;
  }

  wraps(stream: object): boolean {
    return this.target === stream;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    const original = this.target.write;
    const buffering: RedirectTarget["write"] = (chunk, encodingOrCallback, callback) => {
      // a retired buffering write that was put back by someone else passes through
      if (this.bufferingWrite !== buffering) {
        return original.call(this.target, chunk, encodingOrCallback, callback);
      }
      this.buffer += typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
      const done = typeof encodingOrCallback === "function" ? encodingOrCallback : callback;
      if (done) {
        process.nextTick(done);
      }
      return true;
    };
    this.originalWrite = original;
    this.bufferingWrite = buffering;
    this.target.write = buffering;
  }

  /**
   * Write any buffered text through; returns whether there was any
   */
  flush(): boolean {
    if (!this.buffer) {
      return false;
    }
    const text = this.buffer;
    this.buffer = "";
    this.writeThrough(text);
    return true;
  }

  /** Bypass the buffer */
  writeThrough(text: string): void {
    (this.originalWrite ?? this.target.write).call(this.target, text);
  }

  /**
   * Flush and put the original `write` back
   */
  stop(): void {
    if (!this.active) {
      return;
    }
    this.flush();
    if (this.originalWrite) {
      this.target.write = this.originalWrite;
    }
    this.originalWrite = null;
    this.bufferingWrite = null;
    this.active = false;
  }
}
