/**
 * Per-command timing lines on stderr, enabled by PATCHDB_CLI_DEBUG=1
 *
 * Each line reads `metric <command> [collection=<name>] duration_ms=<n> success=<bool>`.
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

export type MetricFields = Record<string, string | number | boolean | undefined>;

// Collection names cannot hold whitespace, but --root paths and error text can
function metricToken(part: string | number | boolean): string {
  return String(part).replace(/\s+/g, "_");
}

/**
 * Write one metric line; fields left undefined are omitted
 */
export function emitMetric(command: string, fields: MetricFields): void {
  if (!isVerbose()) return;

  const parts = [`metric ${metricToken(command)}`];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${metricToken(key)}=${metricToken(value)}`);
  }
  writeStderr(parts.join(" ") + "\n");
}

/**
 * Run a command body and report how long it took and whether it threw
 */
export async function withTiming<T>(
  command: string,
  fields: MetricFields,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(command, { ...fields, duration_ms: Date.now() - start, success });
  }
}
