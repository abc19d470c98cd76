/**
 * Demo Command - Simulated job drawn with a gradient colored bar
 */

import { Command } from "commander";
import { logError } from "../../core/errors.js";
import type { ProgressStream } from "../../progress/bar.js";
import { withProgressBar } from "../../progress/iterate.js";
import { ExponentialMovingAverage } from "../../progress/smoothing.js";
import * as widgets from "../../progress/widgets.js";
import type { ColorRequest } from "../../terminal/capability.js";
import { ColorGradient } from "../../terminal/colors.js";
import { createDefaultColorTable } from "../../terminal/palette.js";
import { MUTED, SUCCESS } from "../theme.js";
import { parseColorsOption, parseIntegerOption } from "./options.js";

export interface DemoOptions {
  max: number;
  delay: number;
  colors: ColorRequest;
  /** Defaults to stderr */
  stream?: ProgressStream;
}

const TASKS = ["fetch", "parse", "index", "write"];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run the simulated job; resolves with the number of steps done
 */
export async function runDemo(options: DemoOptions): Promise<number> {
  const table = createDefaultColorTable();
  const gradient = new ColorGradient([table.get("red"), table.get("yellow"), table.get("lime")]);

  return withProgressBar(
    {
      maxValue: options.max,
      widgets: [
        widgets.percentage({ fg: gradient }),
        " ",
        widgets.bar({ fg: gradient, marker: "━", fill: " " }),
        " ",
        widgets.variable("task", { width: 5 }),
        " ",
        widgets.eta({ smoothing: new ExponentialMovingAverage() }),
      ],
      output: { stream: options.stream, enableColors: options.colors },
    },
    async (bar) => {
      for (let step = 1; step <= options.max; step++) {
        await sleep(options.delay);
        bar.update(step, { variables: { task: TASKS[step % TASKS.length] } });
      }
      return options.max;
    }
  );
}

/**
 * Register demo commands on the program
 */
export function registerDemoCommands(program: Command): void {
  program
    .command("demo")
    .description("Run a simulated job with a gradient colored bar")
    .option("-m, --max <n>", "Number of steps", parseIntegerOption, 50)
    .option("-d, --delay <ms>", "Delay between steps", parseIntegerOption, 40)
    .option("-c, --colors <mode>", "Colors: auto, on or off", parseColorsOption, "auto")
    .action(async (options: DemoOptions) => {
      try {
        const steps = await runDemo(options);
        console.log(SUCCESS(`Done: ${steps} steps`) + MUTED(` (${options.delay}ms each)`));
      } catch (error) {
        logError(error);
        process.exit(1);
      }
    });
}
