/**
 * Tests for the progress bar update engine
 */

import { EventEmitter } from "events";
import {
  ConfigError,
  InvalidRangeError,
  UnknownVariableError,
  ValueBelowMinimumError,
  ValueExceedsMaximumError,
} from "../../core/errors.js";
import { NullBar, ProgressBar, type ProgressBarOptions } from "../../progress/bar.js";
import { UnknownLength, type Widget } from "../../progress/types.js";
import { bar as barWidget, counter, variable } from "../../progress/widgets.js";
import { CapabilityLevel } from "../../terminal/capability.js";

class FakeStream extends EventEmitter {
  writes: string[] = [];
  isTTY?: boolean;
  columns?: number;

  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }
}

interface Harness {
  stream: FakeStream;
  clock: { ms: number };
  create(options?: ProgressBarOptions): ProgressBar;
}

/**
 * Bars writing to a fake stream with frozen clocks and an empty environment
 */
function harness(): Harness {
  const stream = new FakeStream();
  const clock = { ms: 0 };
  return {
    stream,
    clock,
    create(options: ProgressBarOptions = {}) {
      return new ProgressBar({
        env: {},
        timer: () => clock.ms,
        now: () => new Date(clock.ms),
        resize: { termWidth: 80 },
        ...options,
        output: { stream, enableColors: false, ...options.output },
      });
    },
  };
}

describe("ProgressBar", () => {
  describe("end to end with default widgets", () => {
    it("should draw start, a forced update and the finished line", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10 });

      bar.start();
      bar.update(5, { force: true });
      bar.finish();

      expect(stream.writes).toEqual([
        `  0% (0 of 10) |${" ".repeat(26)}| Elapsed Time: 0:00:00 ETA:  --:--:--\n`,
        ` 50% (5 of 10) |${"#".repeat(13)}${" ".repeat(13)}| Elapsed Time: 0:00:00 ETA:  --:--:--\n`,
        `100% (10 of 10) |${"#".repeat(26)}| Elapsed Time: 0:00:00 Time: 0:00:00\n`,
      ]);
      expect(bar.value).toBe(10);
      expect(bar.finished).toBe(true);
    });

    it("should keep the current value when finished dirty", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10 });

      bar.start();
      bar.update(5, { force: true });
      bar.finish({ dirty: true });

      expect(stream.writes).toHaveLength(2);
      expect(stream.writes[1]).toContain("(5 of 10)");
      expect(bar.value).toBe(5);
    });

    it("should draw a spinner layout for an unknown length", () => {
      const { stream, create } = harness();
      create().start();
      expect(stream.writes).toEqual(["/ 0 Elapsed Time: 0:00:00\n"]);
    });
  });

  describe("redraw scheduling", () => {
    it("should hold redraws until the minimum interval has passed", () => {
      const { stream, clock, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()], minPollInterval: 0.1 });

      bar.start();
      bar.update(1);
      clock.ms = 50;
      bar.update(2);
      clock.ms = 100;
      bar.update(3);

      expect(stream.writes).toEqual(["0\n", "3\n"]);
      expect(bar.updates).toBe(2);
    });

    it("should always draw the final value", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()] });

      bar.start();
      bar.update(4);
      bar.update(10);

      expect(stream.writes).toEqual(["0\n", "10\n"]);
    });

    it("should use the larger of the poll intervals", () => {
      const { stream, clock, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()], pollInterval: { seconds: 1 } });

      bar.start();
      clock.ms = 999;
      bar.update(1);
      clock.ms = 1000;
      bar.update(2);

      expect(stream.writes).toEqual(["0\n", "2\n"]);
    });

    it("should never go below the floor", () => {
      const { create } = harness();
      expect(create({ minPollInterval: 0.01 }).minPollInterval).toBe(0.05);
      expect(create({ minPollInterval: { milliseconds: 300 } }).minPollInterval).toBe(0.3);
      expect(create({ env: { PROGRESSBAR_MINIMUM_UPDATE_INTERVAL: "0.2" } }).minPollInterval).toBe(0.2);
    });
  });

  describe("values and ranges", () => {
    it("should compute the percentage", () => {
      const { create } = harness();
      const bar = create({ maxValue: 4 });
      bar.start();
      bar.update(1);
      expect(bar.percentage).toBe(25);
      expect(create({ minValue: 10, maxValue: 10 }).percentage).toBe(100);
      expect(create().percentage).toBeNull();
    });

    it("should reject values past the max", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10 }).start();
      expect(() => bar.update(11)).toThrow(ValueExceedsMaximumError);
    });

    it("should raise the max instead when maxError is off", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10, maxError: false }).start();
      bar.update(15);
      expect(bar.maxValue).toBe(15);
    });

    it("should reject values below the min", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10 }).start();
      expect(() => bar.update(-1)).toThrow(ValueBelowMinimumError);
    });

    it("should accept values below the min when max errors are off", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10, maxError: false }).start();
      bar.update(-1);
      expect(bar.value).toBe(-1);
      expect(bar.percentage).toBe(-10);
    });

    it("should accept any value while the length is unknown", () => {
      const { create } = harness();
      const bar = create().start();
      bar.update(1_000);
      expect(bar.value).toBe(1_000);
    });

    it("should reject an inverted range", () => {
      const { create } = harness();
      expect(() => create({ minValue: 5, maxValue: 2 })).toThrow(InvalidRangeError);
      expect(() => create().start({ maxValue: -1 })).toThrow(InvalidRangeError);
    });

    it("should reject invalid numeric options", () => {
      const { create } = harness();
      expect(() => create({ resize: { termWidth: 0 } })).toThrow(ConfigError);
      expect(() => create({ output: { lineOffset: -1 } })).toThrow(ConfigError);
      expect(() => create({ pollInterval: -2 })).toThrow(ConfigError);
    });

    it("should increment", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10 }).start();
      bar.increment().increment(3);
      expect(bar.value).toBe(4);
      expect(bar.previousValue).toBe(1);
    });
  });

  describe("variables", () => {
    it("should register variables shown by widgets", () => {
      const { create } = harness();
      expect(create({ widgets: [variable("task")] }).variables).toEqual({ task: null });
    });

    it("should redraw when a variable changes", () => {
      const { stream, create } = harness();
      const bar = create({ widgets: [variable("task")] }).start();

      bar.update(undefined, { variables: { task: "fetch" } });
      bar.update(undefined, { variables: { task: "fetch" } });

      expect(stream.writes).toEqual(["task: -\n", "task: fetch\n"]);
    });

    it("should reject unknown variables", () => {
      const { create } = harness();
      const bar = create({ variables: { speed: 0 } }).start();
      expect(() => bar.update(1, { variables: { sped: 2 } })).toThrow(UnknownVariableError);
      expect(bar.value).toBe(0);
    });

    it("should not treat object builtins as declared variables", () => {
      const { create } = harness();
      const bar = create({ variables: { speed: 0 } }).start();
      expect(() => bar.update(1, { variables: { toString: 5 } })).toThrow(UnknownVariableError);
      expect(() => bar.update(1, { variables: Object.fromEntries([["__proto__", 5]]) })).toThrow(UnknownVariableError);
      expect(bar.variables).toEqual({ speed: 0 });
    });
  });

  describe("pause and resume", () => {
    it("should record updates without drawing while paused", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()] }).start();

      bar.pause();
      bar.update(5, { force: true });
      expect(stream.writes).toEqual(["0\n"]);
      expect(bar.value).toBe(5);

      bar.resume();
      expect(stream.writes).toEqual(["0\n", "5\n"]);
    });

    it("should still draw on finish", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()] }).start();
      bar.pause();
      bar.finish();
      expect(stream.writes).toEqual(["0\n", "10\n"]);
    });
  });

  describe("line formatting", () => {
    it("should rewrite in place on a terminal and end with a newline", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 5, widgets: [counter()], resize: { termWidth: 5 }, output: { isTerminal: true } });

      bar.start();
      bar.finish();

      expect(bar.lineBreaks).toBe(false);
      expect(stream.writes).toEqual(["\r0    ", "\r5    ", "\n"]);
    });

    it("should honor the line-breaks environment flag", () => {
      const { create } = harness();
      expect(create({ env: { PROGRESSBAR_LINE_BREAKS: "1" }, output: { isTerminal: true } }).lineBreaks).toBe(true);
      expect(create({ env: { PROGRESSBAR_LINE_BREAKS: "no" } }).lineBreaks).toBe(false);
    });

    it("should draw above the cursor with a line offset", () => {
      const { stream, create } = harness();
      create({ widgets: [counter()], resize: { termWidth: 3 }, output: { isTerminal: true, lineOffset: 2 } }).start();
      expect(stream.writes).toEqual(["\x1b[2A\r0  \x1b[2B"]);
    });

    it("should right-justify when asked", () => {
      const { stream, create } = harness();
      create({ widgets: [counter()], leftJustify: false, resize: { termWidth: 4 }, output: { isTerminal: true } }).start();
      expect(stream.writes).toEqual(["\r   0"]);
    });

    it("should wrap the widgets in prefix and suffix", () => {
      const { stream, create } = harness();
      create({ widgets: [counter()], prefix: "[", suffix: "]", resize: { termWidth: 6 }, output: { isTerminal: true } }).start();
      expect(stream.writes).toEqual(["\r[0]   "]);
    });

    it("should share the width between expanding widgets from the right", () => {
      const { stream, create } = harness();
      create({
        maxValue: 10,
        widgets: [barWidget({ left: "", right: "", fill: "a" }), barWidget({ left: "", right: "", fill: "b" })],
        resize: { termWidth: 5 },
      }).start();
      expect(stream.writes).toEqual(["aabbb\n"]);
    });

    it("should strip colors when the stream has none", () => {
      const { stream, create } = harness();
      const colored: Widget = { render: () => "\x1b[31mX\x1b[39m" };
      create({ widgets: [colored], resize: { termWidth: 1 } }).start();
      expect(stream.writes).toEqual(["X\n"]);
    });

    it("should keep colors when enabled", () => {
      const { stream, create } = harness();
      const colored: Widget = { render: () => "\x1b[31mX\x1b[39m" };
      const bar = create({
        widgets: [colored],
        resize: { termWidth: 1 },
        output: { enableColors: CapabilityLevel.XTERM_256 },
      });
      bar.start();
      expect(bar.colorLevel).toBe(CapabilityLevel.XTERM_256);
      expect(stream.writes).toEqual(["\x1b[31mX\x1b[39m\n"]);
    });

    it("should pass a custom width function to the layout", () => {
      const { stream, create } = harness();
      create({
        widgets: ["ab", counter()],
        customLength: (text) => text.length * 2,
        resize: { termWidth: 10 },
        output: { isTerminal: true },
      }).start();
      expect(stream.writes).toEqual(["\rab0    "]);
    });
  });

  describe("terminal width", () => {
    it("should fall back from the stream to COLUMNS to 80", () => {
      const stream = new FakeStream();
      stream.columns = 42;
      expect(new ProgressBar({ env: {}, output: { stream } }).termWidth).toBe(42);
      expect(new ProgressBar({ env: { COLUMNS: "33" }, output: { stream: new FakeStream() } }).termWidth).toBe(33);
      expect(new ProgressBar({ env: {}, output: { stream: new FakeStream() } }).termWidth).toBe(80);
    });

    it("should prefer a fixed width", () => {
      const stream = new FakeStream();
      stream.columns = 42;
      expect(new ProgressBar({ env: {}, output: { stream }, resize: { termWidth: 20 } }).termWidth).toBe(20);
    });

    it("should pick up a resize on the next update", () => {
      const stream = new FakeStream();
      stream.columns = 6;
      const bar = new ProgressBar({
        env: {},
        maxValue: 10,
        widgets: [counter()],
        timer: () => 0,
        output: { stream, isTerminal: true, enableColors: false },
      });

      bar.start();
      stream.columns = 3;
      stream.emit("resize");
      expect(bar.termWidth).toBe(6);

      bar.update(1, { force: true });
      expect(bar.termWidth).toBe(3);
      expect(stream.writes).toEqual(["\r0     ", "\r1  "]);

      bar.finish();
      expect(stream.listenerCount("resize")).toBe(0);
    });
  });

  describe("redirection", () => {
    function createTarget(): { out: string[]; write(chunk: string | Uint8Array): boolean } {
      return {
        out: [],
        write(chunk: string | Uint8Array) {
          this.out.push(String(chunk));
          return true;
        },
      };
    }

    it("should hold redirected output until the next redraw", () => {
      const { stream, create } = harness();
      const target = createTarget();
      const bar = create({ maxValue: 10, widgets: [counter()], redirect: { stdout: target } }).start();

      target.write("hello\n");
      expect(target.out).toEqual([]);

      bar.update(1, { force: true });
      expect(target.out).toEqual(["hello\n"]);
      expect(stream.writes).toEqual(["0\n", "1\n"]);

      bar.finish();
      target.write("after\n");
      expect(target.out).toEqual(["hello\n", "after\n"]);
    });

    it("should clear the bar line before flushing on a terminal", () => {
      const { stream, create } = harness();
      const target = createTarget();
      const bar = create({
        maxValue: 10,
        widgets: [counter()],
        resize: { termWidth: 2 },
        output: { isTerminal: true },
        redirect: { stdout: target },
      }).start();

      target.write("log\n");
      bar.update(1, { force: true });

      expect(stream.writes).toEqual(["\r0 ", "\r\x1b[K", "\r1 "]);
      expect(target.out).toEqual(["log\n"]);
    });

    it("should restore the real write for a bar built while another one runs", () => {
      const { create } = harness();
      const target = createTarget();
      const first = create({ maxValue: 10, widgets: [counter()], redirect: { stdout: target } }).start();
      const second = create({ maxValue: 10, widgets: [counter()], redirect: { stdout: target } });

      first.finish();
      second.start();
      second.finish();
      target.write("after both bars\n");

      expect(target.out).toEqual(["after both bars\n"]);
    });

    it("should write the bar itself past the buffer when its stream is redirected", () => {
      const target = createTarget();
      const bar = new ProgressBar({
        env: {},
        maxValue: 10,
        widgets: [counter()],
        resize: { termWidth: 2 },
        output: { stream: target, enableColors: false },
        redirect: { stderr: target },
      });

      bar.start();
      expect(target.out).toEqual(["0\n"]);
      bar.finish();
    });
  });

  describe("data", () => {
    it("should split the elapsed time", () => {
      const { clock, create } = harness();
      const bar = create({ maxValue: 10, variables: { task: "x" } }).start();
      clock.ms = 90_061_000;

      const data = bar.data();
      expect(data.totalSecondsElapsed).toBe(90_061);
      expect(data.daysElapsed).toBe(1);
      expect(data.hoursElapsed).toBe(1);
      expect(data.minutesElapsed).toBe(1);
      expect(data.secondsElapsed).toBe(1);
      expect(data.variables).toEqual({ task: "x" });
      expect(data.startTime).toEqual(new Date(0));
    });

    it("should freeze the elapsed time once finished", () => {
      const { clock, create } = harness();
      const bar = create({ maxValue: 10 }).start();
      clock.ms = 5_000;
      bar.finish();
      clock.ms = 9_000;
      expect(bar.data().totalSecondsElapsed).toBe(5);
    });
  });

  describe("lifecycle", () => {
    it("should start on the first update", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()] });
      bar.update(3, { force: true });
      expect(bar.started).toBe(true);
      expect(stream.writes).toEqual(["0\n", "3\n"]);
    });

    it("should ignore updates and a second finish once finished", () => {
      const { stream, create } = harness();
      const bar = create({ maxValue: 10, widgets: [counter()] }).start();
      bar.finish();
      bar.update(2);
      bar.finish();
      expect(stream.writes).toEqual(["0\n", "10\n"]);
    });

    it("should call flush on finish when the stream has one", () => {
      const stream = new FakeStream();
      const flush = jest.fn();
      const bar = new ProgressBar({ env: {}, output: { stream: Object.assign(stream, { flush }) } });
      bar.start().finish();
      expect(flush).toHaveBeenCalledTimes(1);
    });

    it("should reset on a restart", () => {
      const { create } = harness();
      const bar = create({ maxValue: 10 }).start();
      bar.update(7);
      bar.finish();
      bar.start();
      expect(bar.value).toBe(0);
      expect(bar.finished).toBe(false);
      expect(bar.updates).toBe(1);
    });
  });
});

describe("NullBar", () => {
  it("should keep state without writing", () => {
    const stream = new FakeStream();
    const bar = new NullBar({ env: {}, maxValue: 3, output: { stream } });

    bar.start();
    bar.update(2, { force: true });
    bar.finish();

    expect(stream.writes).toEqual([]);
    expect(bar.value).toBe(3);
    expect(bar.maxValue).toBe(3);
  });

  it("should accept an unknown length", () => {
    const bar = new NullBar({ env: {}, maxValue: UnknownLength, output: { stream: new FakeStream() } });
    expect(bar.start().percentage).toBeNull();
  });
});
