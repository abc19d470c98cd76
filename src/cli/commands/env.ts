/**
 * Env Command - Report what termbar detects about the terminal
 */

import { Command } from "commander";
import { loadEnvironmentConfig } from "../../core/config.js";
import { DEFAULTS } from "../../core/constants.js";
import { logError } from "../../core/errors.js";
import {
  CapabilityLevel,
  colorSupportFromEnvironment,
  isAnsiCapable,
  isTerminal,
  resolveColorEnable,
  type TerminalLike,
} from "../../terminal/capability.js";
import { formatField, formatFlag, heading, INFO } from "../theme.js";

export interface TerminalReport {
  isTerminal: boolean;
  ansiCapable: boolean;
  environmentColors: CapabilityLevel;
  colorLevel: CapabilityLevel;
  lineBreaks: boolean;
  notebook: boolean;
  width: number;
}

/**
 * Capabilities of `stream` as a bar drawing to it would resolve them
 */
export function inspectTerminal(
  stream: TerminalLike & { columns?: number },
  env: NodeJS.ProcessEnv = process.env
): TerminalReport {
  const config = loadEnvironmentConfig(env);
  const terminal = isTerminal(stream);
  const ansiCapable = isAnsiCapable(stream, env);
  const columns = stream.columns;

  return {
    isTerminal: terminal,
    ansiCapable,
    environmentColors: colorSupportFromEnvironment(env),
    colorLevel: resolveColorEnable("auto", { env, ansiCapable }),
    lineBreaks: config.lineBreaks ?? !terminal,
    notebook: config.notebook,
    width: columns !== undefined && columns > 0 ? columns : (config.columns ?? DEFAULTS.termWidth),
  };
}

export function formatTerminalReport(report: TerminalReport): string {
  return [
    heading("Terminal"),
    formatField("Terminal", formatFlag(report.isTerminal)),
    formatField("ANSI capable", formatFlag(report.ansiCapable)),
    formatField("Notebook", formatFlag(report.notebook)),
    formatField("Line breaks", formatFlag(report.lineBreaks)),
    formatField("Width", INFO(String(report.width))),
    formatField("Env colors", INFO(CapabilityLevel[report.environmentColors])),
    formatField("Color level", INFO(CapabilityLevel[report.colorLevel])),
  ].join("\n");
}

/**
 * Register env commands on the program
 */
export function registerEnvCommands(program: Command): void {
  program
    .command("env")
    .description("Show terminal, ANSI and color detection results for stderr")
    .action(() => {
      try {
        console.log(formatTerminalReport(inspectTerminal(process.stderr)));
      } catch (error) {
        logError(error);
        process.exit(1);
      }
    });
}
