#!/usr/bin/env node

/**
 * CLI entry point
 */

import { createProgram } from "./program";

const program = createProgram();

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
