/**
 * CLI Commands - Export all command registration functions
 */

export { registerDemoCommands } from "./demo.js";
export { registerCountCommands } from "./count.js";
export { registerEnvCommands } from "./env.js";
export { registerCursorCommands } from "./cursor.js";
export { parseColorsOption, parseIntegerOption } from "./options.js";
