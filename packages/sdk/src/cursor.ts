/**
 * Lazy query results
 */

import type { Cursor } from "./types.js";

/**
 * Restartable cursor over a source that is re-run on every iteration
 *
 * @example
 * ```typescript
 * for await (const doc of db.find("users", { role: "admin" })) {
 *   console.log(doc._id);
 * }
 * ```
 */
export class QueryCursor<T> implements Cursor<T> {
  #source: () => AsyncIterable<T>;

  constructor(source: () => AsyncIterable<T>) {
    this.#source = source;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.#source()[Symbol.asyncIterator]();
  }

  async toArray(): Promise<T[]> {
    const results: T[] = [];
    for await (const item of this.#source()) {
      results.push(item);
    }
    return results;
  }

  async first(): Promise<T | null> {
    for await (const item of this.#source()) {
      return item;
    }
    return null;
  }
}
