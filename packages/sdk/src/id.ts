/**
 * Document identifier generation
 */

import { randomBytes } from "node:crypto";
import { IdGenerationError } from "./errors.js";

/** Random bytes per identifier; hex encoding doubles the length */
export const ID_BYTES = 12;

/**
 * Generate a random document identifier
 * @returns 24 lowercase hex characters
 * @throws {IdGenerationError} If the random source is unavailable
 */
export function generateId(): string {
  try {
    return randomBytes(ID_BYTES).toString("hex");
  } catch (err) {
    throw new IdGenerationError("Random source unavailable for document _id", { cause: err });
  }
}

/**
 * Call an identifier generator and check it produced a usable id
 * @throws {IdGenerationError} If the generator throws or returns an empty or non-string value
 */
export function nextId(generate: () => string): string {
  let id: unknown;
  try {
    id = generate();
  } catch (err) {
    if (err instanceof IdGenerationError) throw err;
    throw new IdGenerationError("Identifier generator failed", { cause: err });
  }

  if (typeof id !== "string" || id.length === 0) {
    throw new IdGenerationError(`Identifier generator returned an unusable value: ${String(id)}`);
  }
  return id;
}
