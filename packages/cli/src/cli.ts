#!/usr/bin/env node

/**
 * patchdb CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { colorize } from "./lib/render.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

const SILENT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

// Top-level error handler
async function main(): Promise<void> {
  // Set once commander has printed a parse error itself
  let reported = false;
  const program = createProgram({
    writeErr: (str) => {
      reported = true;
      process.stderr.write(colorize(str, "red", process.stderr));
    },
  });

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError && (reported || SILENT_CODES.has(err.code))) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<{ verbose?: boolean }>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
