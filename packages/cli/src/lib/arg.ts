/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { PatchDbError, validateCollectionName } from "@patchdb/sdk";

const BOM = 0xfeff;

/**
 * Parse JSON from --data, --file or stdin
 * @param source - Where the text came from, named in the error ("--data", "stdin", ...)
 * @throws {InvalidArgumentError} If the text is not valid JSON
 */
export function parseJson(value: string, source: string): unknown {
  const cleaned = value.charCodeAt(0) === BOM ? value.slice(1) : value;
  if (cleaned.trim() === "") {
    throw new InvalidArgumentError(`Invalid JSON in ${source}: input is empty`);
  }

  try {
    const parsed: unknown = JSON.parse(cleaned);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Commander parser for a `<collection>` argument
 *
 * Rejects names the SDK would refuse before any database is opened.
 */
export function parseCollectionName(value: string): string {
  try {
    validateCollectionName(value);
  } catch (err) {
    if (err instanceof PatchDbError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
  return value;
}
