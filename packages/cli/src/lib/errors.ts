/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { PatchDbError } from "@patchdb/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/conflict/IO/unknown error
 * - 2: document or collection not found
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // CliError and commander's own errors carry their exit code
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  // Input, conflict, constraint and store errors
  if (error instanceof PatchDbError) {
    return 1;
  }

  // Default to exit code 1 for unknown errors
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
