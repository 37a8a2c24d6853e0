/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }
  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }
  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the data root directory
 * Priority: CLI option > PATCHDB_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.PATCHDB_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Check if timing metrics are enabled
 */
export function isVerbose(): boolean {
  return process.env.PATCHDB_CLI_DEBUG === "1";
}
