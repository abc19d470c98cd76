/**
 * Tests for the built-in widgets
 */

import { ExponentialMovingAverage } from "../../progress/smoothing.js";
import { UnknownLength, type ProgressData, type WidgetContext } from "../../progress/types.js";
import {
  bar,
  blockBar,
  counter,
  defaultWidgets,
  elapsed,
  eta,
  percentage,
  simpleProgress,
  spinner,
  variable,
} from "../../progress/widgets.js";
import { CapabilityLevel } from "../../terminal/capability.js";
import { Color, rgb } from "../../terminal/colors.js";
import { visualLength } from "../../utils/text.js";

function makeData(overrides: Partial<ProgressData> = {}): ProgressData {
  return {
    minValue: 0,
    maxValue: 10,
    value: 5,
    previousValue: 4,
    startTime: new Date(0),
    lastUpdateTime: null,
    endTime: null,
    updates: 0,
    totalSecondsElapsed: 10,
    secondsElapsed: 10,
    minutesElapsed: 0,
    hoursElapsed: 0,
    daysElapsed: 0,
    percentage: 50,
    variables: {},
    ...overrides,
  };
}

function makeContext(width = 80, colors = CapabilityLevel.NONE): WidgetContext {
  return { colors, measure: visualLength, width };
}

describe("percentage", () => {
  it("should right-align whole percents", () => {
    const widget = percentage();
    expect(widget.render(makeData({ percentage: 42.7 }), makeContext())).toBe(" 42%");
    expect(widget.render(makeData({ percentage: 100 }), makeContext())).toBe("100%");
    expect(widget.render(makeData({ percentage: 0 }), makeContext())).toBe("  0%");
    expect(widget.render(makeData({ percentage: -5 }), makeContext())).toBe(" -5%");
  });

  it("should show N/A% when unknown", () => {
    expect(percentage().render(makeData({ percentage: null }), makeContext())).toBe("N/A%");
  });

  it("should color the text for the stream's level", () => {
    const red = new Color(rgb(255, 0, 0), undefined, "red", 9);
    const widget = percentage({ fg: red });
    expect(widget.render(makeData(), makeContext(80, CapabilityLevel.XTERM_256))).toBe("\x1b[38;5;9m 50%\x1b[39m");
  });
});

describe("simpleProgress and counter", () => {
  it("should show value of max", () => {
    expect(simpleProgress().render(makeData({ value: 3 }), makeContext())).toBe("3 of 10");
  });

  it("should show ? for an unknown max", () => {
    expect(simpleProgress().render(makeData({ maxValue: UnknownLength }), makeContext())).toBe("5 of ?");
  });

  it("should accept a custom format", () => {
    expect(simpleProgress({ format: "{value}/{max}" }).render(makeData(), makeContext())).toBe("5/10");
  });

  it("should show the raw value", () => {
    expect(counter().render(makeData({ value: 17 }), makeContext())).toBe("17");
  });
});

describe("bar", () => {
  it("should expand", () => {
    expect(bar().expands).toBe(true);
  });

  it("should fill in proportion to the percentage", () => {
    expect(bar().render(makeData(), makeContext(12))).toBe("|#####     |");
    expect(bar().render(makeData({ percentage: 100 }), makeContext(6))).toBe("|####|");
  });

  it("should round the marker count down", () => {
    expect(bar({ left: "", right: "" }).render(makeData({ percentage: 99 }), makeContext(10))).toBe("######### ");
  });

  it("should draw only the fill for an unknown length", () => {
    expect(bar({ fill: "." }).render(makeData({ percentage: null }), makeContext(6))).toBe("|....|");
  });

  it("should survive a width smaller than its borders", () => {
    expect(bar().render(makeData(), makeContext(1))).toBe("||");
  });

  it("should draw block characters", () => {
    expect(blockBar().render(makeData(), makeContext(4))).toBe("██░░");
  });
});

describe("elapsed and eta", () => {
  it("should format elapsed time", () => {
    expect(elapsed().render(makeData({ totalSecondsElapsed: 65 }), makeContext())).toBe("Elapsed Time: 0:01:05");
  });

  it("should project the remaining time from the average rate", () => {
    expect(eta().render(makeData(), makeContext())).toBe("ETA:  0:00:10");
  });

  it("should show placeholders before any progress", () => {
    expect(eta().render(makeData({ value: 0 }), makeContext())).toBe("ETA:  --:--:--");
    expect(eta().render(makeData({ totalSecondsElapsed: 0 }), makeContext())).toBe("ETA:  --:--:--");
    expect(eta().render(makeData({ maxValue: UnknownLength }), makeContext())).toBe("ETA:  --:--:--");
  });

  it("should show the total time once finished", () => {
    expect(eta().render(makeData({ endTime: new Date(10_000) }), makeContext())).toBe("Time: 0:00:10");
  });

  it("should smooth the rate when asked", () => {
    const widget = eta({ smoothing: new ExponentialMovingAverage(0.5) });
    expect(widget.render(makeData(), makeContext())).toBe("ETA:  0:00:20");
  });
});

describe("spinner and variable", () => {
  it("should advance one frame per redraw", () => {
    const widget = spinner({ frames: ["a", "b", "c"] });
    expect(widget.render(makeData({ updates: 4 }), makeContext())).toBe("b");
    expect(spinner().render(makeData({ updates: 0 }), makeContext())).toBe("|");
  });

  it("should show a variable or a dash", () => {
    const widget = variable("task", { width: 3 });
    expect(widget.variableName).toBe("task");
    expect(widget.render(makeData(), makeContext())).toBe("task: -  ");
    expect(widget.render(makeData({ variables: { task: "io" } }), makeContext())).toBe("task: io ");
  });
});

describe("defaultWidgets", () => {
  it("should pick the layout by length", () => {
    expect(defaultWidgets(10)).toHaveLength(11);
    expect(defaultWidgets(UnknownLength)).toHaveLength(5);
  });
});
