/**
 * Tests for ANSI-aware text helpers
 */

import { formatClock, padStartVisual, stripAnsi, stripColors, visualLength } from "../../utils/text.js";

describe("stripAnsi", () => {
  it("should remove styles and cursor movement", () => {
    expect(stripAnsi("\x1b[31mred\x1b[39m \x1b[2Aup\x1b[?25l")).toBe("red up");
  });
});

describe("stripColors", () => {
  it("should remove only SGR sequences", () => {
    expect(stripColors("\x1b[1A\x1b[38;5;196mX\x1b[39m")).toBe("\x1b[1AX");
  });
});

describe("visualLength", () => {
  it("should count code points outside escape sequences", () => {
    expect(visualLength("\x1b[32m██░\x1b[39m")).toBe(3);
    expect(visualLength("a😀")).toBe(2);
  });
});

describe("padStartVisual", () => {
  it("should pad to the visible width", () => {
    expect(padStartVisual("\x1b[1mab\x1b[22m", 4)).toBe("  \x1b[1mab\x1b[22m");
    expect(padStartVisual("abcdef", 4)).toBe("abcdef");
  });
});

describe("formatClock", () => {
  it("should format hours, minutes and seconds", () => {
    expect(formatClock(5)).toBe("0:00:05");
    expect(formatClock(3723.9)).toBe("1:02:03");
    expect(formatClock(90000)).toBe("25:00:00");
  });

  it("should clamp negative values", () => {
    expect(formatClock(-3)).toBe("0:00:00");
  });
});
