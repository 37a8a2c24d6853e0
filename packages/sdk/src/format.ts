/**
 * Deterministic JSON formatting utilities
 */

import type { JsonObject, JsonValue } from "./types.js";

/**
 * Key order for stored documents: `_id` first, the rest alphabetical
 */
export const DOCUMENT_KEY_ORDER: readonly string[] = ["_id"];

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit array (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(
  obj: JsonValue,
  indent = 2,
  order: "alpha" | readonly string[] = "alpha"
): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    // If both in order array, use their positions
    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    // If only a is in order, it comes first
    if (aIndex !== -1) return -1;
    // If only b is in order, it comes first
    if (bIndex !== -1) return 1;
    // Both not in order array, fallback to code-point order
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (value: JsonValue): JsonValue => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    // Detect cycles
    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      // Objects: sort keys and normalize values
      const out: JsonObject = {};
      for (const k of Object.keys(value).sort(sorter)) {
        const item = value[k];
        if (item === undefined) continue;
        if (k === "__proto__") {
          Object.defineProperty(out, k, {
            value: normalize(item),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        } else {
          out[k] = normalize(item);
        }
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}
