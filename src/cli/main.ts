#!/usr/bin/env node
/**
 * termbar executable
 */

import { config as dotenvConfig } from "dotenv";
import { logError } from "../core/errors.js";
import { runCLI } from "./index.js";

// Load environment variables
dotenvConfig();

runCLI().catch((error: unknown) => {
  logError(error, process.env.PROGRESSBAR_LOG_LEVEL === "debug");
  process.exit(1);
});
