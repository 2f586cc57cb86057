#!/usr/bin/env node
// Main entry point for the Bug Sleuth CLI.
// Loads .env once, builds the configuration, and hands the command line
// to the CLI. Any error that reaches this point is fatal.
// Limitations: Exit status is 1 for every failure; there is no
//   per-error exit code.

import { config as dotenvConfig } from "dotenv";

import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { setLogLevel } from "./logger.js";

async function main(): Promise<void> {
  try {
    dotenvConfig();
    const config = loadConfig();
    setLogLevel(config.logLevel);
    await runCli(process.argv.slice(2), config);
  } catch (error) {
    console.error(`[FATAL] ${errorMessage(error)}`);
    process.exit(1);
  }
}

void main();
