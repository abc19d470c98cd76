/**
 * ProgressBar - the update/redraw engine
 *
 * States: unstarted -> running -> finished, with an orthogonal paused
 * flag. Everything runs synchronously inside start/update/finish on the
 * caller's stack; there are no timers. Redraws are gated by comparing a
 * monotonic clock against the poll intervals on every update.
 *
 * @example
 * ```typescript
 * const bar = new ProgressBar({ maxValue: files.length }).start();
 * for (const file of files) {
 *   await upload(file);
 *   bar.increment();
 * }
 * bar.finish();
 * ```
 */

import { z } from "zod";
import { loadEnvironmentConfig } from "../core/config.js";
import { DEFAULTS } from "../core/constants.js";
import {
  ConfigError,
  InvalidRangeError,
  UnknownVariableError,
  ValueBelowMinimumError,
  ValueExceedsMaximumError,
} from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { cursorDown, cursorUp, CLEAR_LINE_ALL } from "../terminal/ansi.js";
import {
  CapabilityLevel,
  isAnsiCapable,
  isTerminal,
  resolveColorEnable,
  type ColorRequest,
} from "../terminal/capability.js";
import { toSeconds, type IntervalInput } from "../utils/duration.js";
import { stripColors, visualLength } from "../utils/text.js";
import { StreamRedirect, type RedirectTarget } from "./redirect.js";
import {
  UnknownLength,
  type MaxValue,
  type ProgressData,
  type Widget,
  type WidgetContext,
  type WidgetItem,
} from "./types.js";
import { defaultWidgets } from "./widgets.js";

const logger = createLogger("ProgressBar");

// ============================================================================
// Types
// ============================================================================

/** Where the bar is drawn; `process.stderr` satisfies it */
export interface ProgressStream {
  write(chunk: string): unknown;
  flush?(): void;
  isTTY?: boolean;
  columns?: number;
  on?(event: "resize", listener: () => void): unknown;
  removeListener?(event: "resize", listener: () => void): unknown;
}

export interface OutputOptions {
  /** Defaults to `process.stderr` */
  stream?: ProgressStream;
  /** Overrides the stream's own TTY flag */
  isTerminal?: boolean | null;
  /** One line per redraw instead of rewriting in place */
  lineBreaks?: boolean | null;
  enableColors?: ColorRequest;
  /** Draw this many rows above the cursor */
  lineOffset?: number;
}

export interface ResizeOptions {
  /** Fixed width; disables size polling */
  termWidth?: number;
}

export interface RedirectOptions {
  /** `true` wraps `process.stdout` */
  stdout?: boolean | RedirectTarget;
  /** `true` wraps `process.stderr` */
  stderr?: boolean | RedirectTarget;
}

export interface ProgressBarOptions {
  minValue?: number;
  /** Omit (or pass `UnknownLength`) when the length is not known */
  maxValue?: MaxValue | null;
  initialValue?: number;
  /** Defaults to `defaultWidgets(maxValue)` at start */
  widgets?: readonly WidgetItem[];
  leftJustify?: boolean;
  /** Redraw no more often than this (seconds or a duration) */
  pollInterval?: IntervalInput | null;
  /** Hard floor for redraws; never below 0.05s or the environment override */
  minPollInterval?: IntervalInput | null;
  /** Width function for lines with wide characters */
  customLength?: (text: string) => number;
  /** Throw when a value passes the max instead of raising the max */
  maxError?: boolean;
  prefix?: string;
  suffix?: string;
  variables?: Record<string, unknown>;
  /** Reported start time; defaults to the moment `start()` runs */
  startTime?: Date;
  output?: OutputOptions;
  resize?: ResizeOptions;
  redirect?: RedirectOptions;
  /** Monotonic clock in milliseconds */
  timer?: () => number;
  /** Wall clock */
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

export interface UpdateOptions {
  force?: boolean;
  variables?: Record<string, unknown>;
}

export interface StartOptions {
  maxValue?: MaxValue;
  /** Reset counters first; turn off to resume a previous run */
  init?: boolean;
}

export interface FinishOptions {
  end?: string;
  /** Keep the current value instead of jumping to the max */
  dirty?: boolean;
}

// ============================================================================
// Option Validation
// ============================================================================

const DurationSchema = z
  .object({
    days: z.number().nonnegative().optional(),
    hours: z.number().nonnegative().optional(),
    minutes: z.number().nonnegative().optional(),
    seconds: z.number().nonnegative().optional(),
    milliseconds: z.number().nonnegative().optional(),
  })
  .strict();

const IntervalSchema = z.union([z.number().nonnegative(), DurationSchema]).nullish();

const NumericOptionsSchema = z.object({
  minValue: z.number().finite().optional(),
  maxValue: z.union([z.number().finite(), z.literal(UnknownLength)]).nullish(),
  initialValue: z.number().finite().optional(),
  pollInterval: IntervalSchema,
  minPollInterval: IntervalSchema,
  lineOffset: z.number().int().nonnegative().optional(),
  termWidth: z.number().int().positive().optional(),
});

function validateOptions(options: ProgressBarOptions): void {
  const result = NumericOptionsSchema.safeParse({
    minValue: options.minValue,
    maxValue: options.maxValue,
    initialValue: options.initialValue,
    pollInterval: options.pollInterval,
    minPollInterval: options.minPollInterval,
    lineOffset: options.output?.lineOffset,
    termWidth: options.resize?.termWidth,
  });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid progress bar options:\n${issues.join("\n")}`, {
      issues: result.error.issues.map((i) => i.path.join(".")),
    });
  }
}

function lengthOf(iterable: unknown): number | undefined {
  if (Array.isArray(iterable) || typeof iterable === "string") {
    return iterable.length;
  }
  if (iterable instanceof Set || iterable instanceof Map) {
    return iterable.size;
  }
  return undefined;
}

// ============================================================================
// Progress Bar
// ============================================================================

export class ProgressBar {
  readonly minValue: number;
  readonly maxError: boolean;
  readonly leftJustify: boolean;
  readonly prefix: string;
  readonly suffix: string;
  readonly pollInterval: number | undefined;
  readonly minPollInterval: number;
  readonly lineBreaks: boolean;
  readonly lineOffset: number;
  readonly colorLevel: CapabilityLevel;
  readonly isTerminal: boolean;

  protected readonly stream: ProgressStream;
  private readonly measure: (text: string) => number;
  private readonly fixedWidth: number | undefined;
  private readonly fallbackWidth: number;
  private readonly initialStartTime: Date | undefined;
  private readonly timer: () => number;
  private readonly now: () => Date;
  private readonly redirects: StreamRedirect[] = [];

  private _maxValue: MaxValue;
  private widgets: WidgetItem[] | undefined;
  private readonly variableValues: Map<string, unknown>;
  private width: number;
  private resizePending = false;
  private readonly onResize = () => {
    this.resizePending = true;
  };

  private _value: number;
  private _previousValue: number | null = null;
  private _started = false;
  private _finished = false;
  private _paused = false;
  private _updates = 0;
  private startTime: Date | null = null;
  private endTime: Date | null = null;
  private lastUpdateTime: Date | null = null;
  private lastRedrawAt: number | null = null;

  constructor(options: ProgressBarOptions = {}) {
    validateOptions(options);
    const env = options.env ?? process.env;
    const envConfig = loadEnvironmentConfig(env);
    const output = options.output ?? {};

    this.minValue = options.minValue ?? DEFAULTS.minValue;
    this._maxValue = options.maxValue ?? UnknownLength;
    if (this._maxValue !== UnknownLength && this._maxValue < this.minValue) {
      throw new InvalidRangeError(this.minValue, this._maxValue);
    }
    this._value = options.initialValue ?? this.minValue;
    this.maxError = options.maxError ?? DEFAULTS.maxError;
    this.leftJustify = options.leftJustify ?? DEFAULTS.leftJustify;
    this.prefix = options.prefix ?? "";
    this.suffix = options.suffix ?? "";
    this.measure = options.customLength ?? visualLength;
    this.initialStartTime = options.startTime;
    this.timer = options.timer ?? (() => performance.now());
    this.now = options.now ?? (() => new Date());

    this.pollInterval = toSeconds(options.pollInterval);
    this.minPollInterval = Math.max(
      toSeconds(options.minPollInterval) ?? DEFAULTS.minimumUpdateInterval,
      DEFAULTS.minimumUpdateInterval,
      envConfig.minimumUpdateInterval ?? 0
    );

    this.stream = output.stream ?? process.stderr;
    this.isTerminal = isTerminal(this.stream, output.isTerminal);
    this.lineBreaks = output.lineBreaks ?? envConfig.lineBreaks ?? !this.isTerminal;
    this.lineOffset = output.lineOffset ?? 0;
    this.colorLevel = resolveColorEnable(output.enableColors, {
      env,
      ansiCapable: isAnsiCapable(this.stream, env, output.isTerminal),
    });

    this.fixedWidth = options.resize?.termWidth;
    this.fallbackWidth = envConfig.columns ?? DEFAULTS.termWidth;
    this.width = this.readTerminalWidth();

    this.variableValues = new Map(Object.entries(options.variables ?? {}));
    if (options.widgets) {
      this.setWidgets([...options.widgets]);
    }

    this.addRedirect(options.redirect?.stdout, process.stdout);
    this.addRedirect(options.redirect?.stderr, process.stderr);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get value(): number {
    return this._value;
  }

  get previousValue(): number | null {
    return this._previousValue;
  }

  get maxValue(): MaxValue {
    return this._maxValue;
  }

  set maxValue(maxValue: MaxValue) {
    if (maxValue !== UnknownLength && maxValue < this.minValue) {
      throw new InvalidRangeError(this.minValue, maxValue);
    }
    this._maxValue = maxValue;
  }

  get started(): boolean {
    return this._started;
  }

  get finished(): boolean {
    return this._finished;
  }

  get paused(): boolean {
    return this._paused;
  }

  /** Redraws so far */
  get updates(): number {
    return this._updates;
  }

  get termWidth(): number {
    return this.width;
  }

  get variables(): Readonly<Record<string, unknown>> {
    return Object.fromEntries(this.variableValues);
  }

  /**
   * 0-100, 100 for an empty range, null while the max is unknown
   */
  get percentage(): number | null {
    if (this._maxValue === UnknownLength) {
      return null;
    }
    const range = this._maxValue - this.minValue;
    if (range === 0) {
      return 100;
    }
    return ((this._value - this.minValue) / range) * 100;
  }

  data(): ProgressData {
    const reference = this.endTime ?? this.now();
    const totalSeconds = this.startTime ? Math.max(0, (reference.getTime() - this.startTime.getTime()) / 1000) : 0;

    return {
      minValue: this.minValue,
      maxValue: this._maxValue,
      value: this._value,
      previousValue: this._previousValue,
      startTime: this.startTime,
      lastUpdateTime: this.lastUpdateTime,
      endTime: this.endTime,
      updates: this._updates,
      totalSecondsElapsed: totalSeconds,
      secondsElapsed: Math.floor(totalSeconds % 60),
      minutesElapsed: Math.floor(totalSeconds / 60) % 60,
      hoursElapsed: Math.floor(totalSeconds / 3600) % 24,
      daysElapsed: Math.floor(totalSeconds / 86400),
      percentage: this.percentage,
      variables: Object.fromEntries(this.variableValues),
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Reset to the unstarted state so the bar can be run again
   */
  init(): this {
    this._started = false;
    this._finished = false;
    this._paused = false;
    this._previousValue = null;
    this._value = this.minValue;
    this._updates = 0;
    this.startTime = null;
    this.endTime = null;
    this.lastUpdateTime = null;
    this.lastRedrawAt = null;
    return this;
  }

  /**
   * Start timing and draw the bar at the min value
   */
  start(options: StartOptions = {}): this {
    if (options.init ?? true) {
      this.init();
    }
    if (this._started) {
      return this;
    }
    if (options.maxValue !== undefined) {
      this.maxValue = options.maxValue;
    }
    if (!this.widgets) {
      this.setWidgets(defaultWidgets(this._maxValue));
    }

    this._started = true;
    this.attachTerminal();
    this.startTime = this.initialStartTime ?? this.now();
    logger.debug("Started", {
      maxValue: this._maxValue === UnknownLength ? null : this._maxValue,
      termWidth: this.width,
      colors: this.colorLevel,
    });

    this.applyUpdate(this.minValue, { force: true });
    return this;
  }

  /**
   * Record a new value and/or variables, redrawing when due.
   * Starts the bar if needed; ignored once finished.
   */
  update(value?: number, options: UpdateOptions = {}): this {
    if (this._finished) {
      return this;
    }
    if (!this._started) {
      this.start();
    }
    this.applyUpdate(value, options);
    return this;
  }

  increment(delta = 1, options: UpdateOptions = {}): this {
    return this.update(this._value + delta, options);
  }

  /**
   * Stop redrawing; updates are still recorded
   */
  pause(): this {
    this._paused = true;
    return this;
  }

  /**
   * Redraw right away and resume normal updates
   */
  resume(): this {
    this._paused = false;
    if (this._started && !this._finished) {
      this.redraw();
    }
    return this;
  }

  /**
   * Draw the final state, write `end` and release the terminal.
   * A second call does nothing.
   */
  finish(options: FinishOptions = {}): this {
    if (this._finished) {
      return this;
    }
    const { end = DEFAULTS.finishEnd, dirty = false } = options;
    this._paused = false;

    if (!dirty) {
      if (!this._started) {
        this.start();
      }
      this.endTime = this.now();
      this.applyUpdate(this._maxValue === UnknownLength ? undefined : this._maxValue, { force: true });
    }

    this.flushRedirects();
    if (end && !this.lineBreaks) {
      this.writeOut(end);
    }
    this.stream.flush?.();
    this.detachTerminal();
    this._finished = true;
    logger.debug("Finished", { value: this._value, dirty, updates: this._updates });
    return this;
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  /**
   * Yield every item, starting on the first and updating on each further
   * one. Exhaustion finishes the bar; leaving early finishes it dirty.
   */
  *iterate<T>(iterable: Iterable<T>, maxValue?: MaxValue): Generator<T, void, undefined> {
    this.prepareIteration(iterable, maxValue);
    let exhausted = false;
    try {
      for (const item of iterable) {
        this.step();
        yield item;
      }
      exhausted = true;
    } finally {
      if (exhausted && !this._started) {
        this.start();
      }
      this.finish({ dirty: !exhausted });
    }
  }

  async *iterateAsync<T>(iterable: AsyncIterable<T> | Iterable<T>, maxValue?: MaxValue): AsyncGenerator<T, void, undefined> {
    this.prepareIteration(iterable, maxValue);
    let exhausted = false;
    try {
      for await (const item of iterable) {
        this.step();
        yield item;
      }
      exhausted = true;
    } finally {
      if (exhausted && !this._started) {
        this.start();
      }
      this.finish({ dirty: !exhausted });
    }
  }

  private prepareIteration(iterable: unknown, maxValue: MaxValue | undefined): void {
    if (maxValue !== undefined) {
      this.maxValue = maxValue;
    } else if (this._maxValue === UnknownLength) {
      this.maxValue = lengthOf(iterable) ?? UnknownLength;
    }
  }

  private step(): void {
    if (!this._started) {
      this.start();
    } else {
      this.update(this._value + 1);
    }
  }

  // ==========================================================================
  // Update Engine
  // ==========================================================================

  private applyUpdate(value: number | undefined, options: UpdateOptions): void {
    if (this.resizePending) {
      this.pollTerminalSize();
    }

    const variableUpdates = options.variables ?? {};
    for (const name of Object.keys(variableUpdates)) {
      if (!this.variableValues.has(name)) {
        throw new UnknownVariableError(name);
      }
    }

    if (value !== undefined) {
      if (this._maxValue !== UnknownLength) {
        if (value < this.minValue && this.maxError) {
          throw new ValueBelowMinimumError(value, this.minValue, this._maxValue);
        }
        if (value > this._maxValue) {
          if (this.maxError) {
            throw new ValueExceedsMaximumError(value, this.minValue, this._maxValue);
          }
          this._maxValue = value;
        }
      }
      this._previousValue = this._value;
      this._value = value;
    }

    let variablesChanged = false;
    for (const [name, newValue] of Object.entries(variableUpdates)) {
      if (!Object.is(this.variableValues.get(name), newValue)) {
        this.variableValues.set(name, newValue);
        variablesChanged = true;
      }
    }

    if (this._paused) {
      return;
    }
    if (options.force || variablesChanged || this.needsRedraw()) {
      this.redraw();
    }
  }

  private needsRedraw(): boolean {
    if (this.lastRedrawAt === null) {
      return true;
    }
    if (this._maxValue !== UnknownLength && this._value >= this._maxValue) {
      return true;
    }
    const elapsedSeconds = (this.timer() - this.lastRedrawAt) / 1000;
    return elapsedSeconds >= Math.max(this.pollInterval ?? 0, this.minPollInterval);
  }

  private redraw(): void {
    this._updates += 1;
    this.lastUpdateTime = this.now();
    this.lastRedrawAt = this.timer();

    let line = this.formatLine();
    if (this.colorLevel === CapabilityLevel.NONE) {
      line = stripColors(line);
    }

    let output: string;
    if (this.lineBreaks) {
      output = `${line.trimEnd()}\n`;
    } else {
      output = `\r${line}`;
      if (this.lineOffset > 0) {
        output = cursorUp(this.lineOffset) + output + cursorDown(this.lineOffset);
      }
    }

    this.flushRedirects();
    this.writeOut(output);
  }

  /**
   * Render the widgets, wrap them in prefix and suffix and pad to the
   * terminal width
   */
  formatLine(): string {
    const data = this.data();
    const widgets = this.widgets ?? [];
    const context: WidgetContext = { colors: this.colorLevel, measure: this.measure, width: this.width };

    const parts: string[] = [];
    const expanding: Array<[number, Widget]> = [];
    let remaining = this.width - this.measure(this.prefix) - this.measure(this.suffix);

    widgets.forEach((widget, index) => {
      if (typeof widget === "string") {
        parts.push(widget);
        remaining -= this.measure(widget);
      } else if (widget.expands) {
        parts.push("");
        expanding.push([index, widget]);
      } else {
        const rendered = widget.render(data, context);
        parts.push(rendered);
        remaining -= this.measure(rendered);
      }
    });

    // right to left, so rounding leaves the leftmost widget the smallest share
    let count = expanding.length;
    for (const [index, widget] of [...expanding].reverse()) {
      const portion = Math.max(Math.ceil(remaining / count), 0);
      count -= 1;
      const rendered = widget.render(data, { ...context, width: portion });
      parts[index] = rendered;
      remaining -= this.measure(rendered);
    }

    const line = this.prefix + parts.join("") + this.suffix;
    const padding = Math.max(0, this.width - this.measure(line));
    if (padding === 0) {
      return line;
    }
    return this.leftJustify ? line + " ".repeat(padding) : " ".repeat(padding) + line;
  }

  private setWidgets(widgets: WidgetItem[]): void {
    this.widgets = widgets;
    for (const widget of widgets) {
      if (typeof widget !== "string" && widget.variableName && !this.variableValues.has(widget.variableName)) {
        this.variableValues.set(widget.variableName, null);
      }
    }
  }

  // ==========================================================================
  // Terminal
  // ==========================================================================

  /**
   * Re-read the terminal width. Safe to call at any time.
   */
  pollTerminalSize(): number {
    this.resizePending = false;
    this.width = this.readTerminalWidth();
    return this.width;
  }

  private readTerminalWidth(): number {
    if (this.fixedWidth !== undefined) {
      return this.fixedWidth;
    }
    const columns = this.stream.columns;
    return typeof columns === "number" && columns > 0 ? columns : this.fallbackWidth;
  }

  protected attachTerminal(): void {
    if (this.fixedWidth === undefined) {
      this.stream.on?.("resize", this.onResize);
    }
    for (const redirect of this.redirects) {
      redirect.start();
    }
  }

  protected detachTerminal(): void {
    this.stream.removeListener?.("resize", this.onResize);
    for (const redirect of this.redirects) {
      redirect.stop();
    }
  }

  private addRedirect(target: boolean | RedirectTarget | undefined, fallback: RedirectTarget): void {
    if (!target) {
      return;
    }
    const resolved = target === true ? fallback : target;
    if (!this.redirects.some((redirect) => redirect.wraps(resolved))) {
      this.redirects.push(new StreamRedirect(resolved));
    }
  }

  private flushRedirects(): void {
    const pending = this.redirects.filter((redirect) => redirect.pending.length > 0);
    if (pending.length === 0) {
      return;
    }
    if (!this.lineBreaks) {
      this.writeOut(`\r${CLEAR_LINE_ALL}`);
    }
    for (const redirect of pending) {
      redirect.flush();
    }
  }

  /**
   * The single point where bytes reach the output stream
   */
  protected writeOut(text: string): void {
    const redirect = this.redirects.find((candidate) => candidate.isActive && candidate.wraps(this.stream));
    if (redirect) {
      redirect.writeThrough(text);
    } else {
      this.stream.write(text);
    }
  }
}

/**
 * A bar that keeps its state but never writes anything
 */
export class NullBar extends ProgressBar {
  protected override attachTerminal(): void {}

  protected override detachTerminal(): void {}

  protected override writeOut(_text: string): void {}
}
