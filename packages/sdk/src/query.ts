/**
 * Containment query evaluation
 *
 * A document matches a query when the query's structure is present in it:
 * objects by key, arrays by element membership, scalars by strict equality.
 */

import type { Document, JsonObject, JsonTypeName, JsonValue } from "./types.js";

/**
 * Check whether a value is a JSON object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check whether a value is a stored document (a JSON object with a string `_id`)
 */
export function isDocument(value: unknown): value is Document {
  return isJsonObject(value) && typeof value._id === "string";
}

/**
 * Get the JSON type name of a value
 * @example jsonTypeOf([1]) // "array"
 */
export function jsonTypeOf(value: JsonValue): JsonTypeName {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

/**
 * Test whether `doc` contains `query`
 * @param doc - Value to test (usually a whole document)
 * @param query - Structure that must be present in `doc`
 * @returns true if every part of `query` is found in `doc`
 *
 * @example
 * ```typescript
 * matches({ tags: ["a", "b", "c"] }, { tags: ["b"] });      // true
 * matches({ tags: ["a", "b", "c"] }, { tags: ["b", "z"] }); // false
 * matches({ a: { b: 1, c: 2 } }, { a: { b: 1 } });          // true
 * ```
 */
export function matches(doc: JsonValue, query: JsonValue): boolean {
  if (Array.isArray(query)) {
    if (!Array.isArray(doc)) return false;
    // Each query element needs some document element that contains it
    return query.every((wanted) => doc.some((candidate) => matches(candidate, wanted)));
  }

  if (isJsonObject(query)) {
    if (!isJsonObject(doc)) return false;
    for (const [key, wanted] of Object.entries(query)) {
      if (!Object.hasOwn(doc, key)) return false;
      const actual = doc[key];
      if (actual === undefined || !matches(actual, wanted)) return false;
    }
    return true;
  }

  return doc === query;
}
