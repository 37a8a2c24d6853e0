/**
 * Database adapter for CLI
 * Opens an SDK database for one command and closes it afterwards
 */

import { openDatabase, type Database, type LogLevel } from "@patchdb/sdk";

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Pick the SDK log level for the CLI's verbosity flags
 */
export function cliLogLevel(opts: GlobalOptions): LogLevel | undefined {
  if (opts.quiet) return "error";
  if (opts.verbose) return "info";
  return undefined;
}

/**
 * Open a file-backed database for the CLI
 */
export function openCliDatabase(root: string, opts: GlobalOptions = {}): Database {
  return openDatabase({ root, logLevel: cliLogLevel(opts) });
}

/**
 * Run a command body against an open database
 */
export async function withDatabase<T>(
  root: string,
  opts: GlobalOptions,
  fn: (db: Database) => Promise<T>
): Promise<T> {
  const db = openCliDatabase(root, opts);
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}
