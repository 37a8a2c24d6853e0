/**
 * In-process storage backend
 *
 * Documents are cloned on the way in and out, so callers never share
 * references with stored state.
 */

import { DuplicateIdError } from "../errors.js";
import { KeyedMutex } from "../lock.js";
import { matches } from "../query.js";
import type { Constraint, Document, Query, StorageBackend, StoredCheck } from "../types.js";

interface MemoryCollection {
  docs: Map<string, Document>;
  checks: Map<string, Constraint>;
}

export class MemoryBackend implements StorageBackend {
  #collections = new Map<string, MemoryCollection>();
  #mutex = new KeyedMutex();

  async exists(collection: string): Promise<boolean> {
    return this.#collections.has(collection);
  }

  async createIfAbsent(collection: string): Promise<boolean> {
    if (this.#collections.has(collection)) {
      return false;
    }
    this.#collections.set(collection, { docs: new Map(), checks: new Map() });
    return true;
  }

  async drop(collection: string): Promise<boolean> {
    return this.#collections.delete(collection);
  }

  async listCollections(): Promise<string[]> {
    return Array.from(this.#collections.keys()).sort();
  }

  async put(collection: string, id: string, doc: Document): Promise<void> {
    const docs = this.#require(collection).docs;
    if (docs.has(id)) {
      throw new DuplicateIdError(collection, id);
    }
    docs.set(id, structuredClone(doc));
  }

  async get(collection: string, id: string): Promise<Document | null> {
    const doc = this.#collections.get(collection)?.docs.get(id);
    return doc ? structuredClone(doc) : null;
  }

  async replace(collection: string, id: string, doc: Document): Promise<boolean> {
    const docs = this.#collections.get(collection)?.docs;
    if (!docs?.has(id)) {
      return false;
    }
    docs.set(id, structuredClone(doc));
    return true;
  }

  async *scanMatching(collection: string, query: Query): AsyncIterable<Document> {
    const docs = this.#collections.get(collection)?.docs;
    if (!docs) return;

    // Snapshot so writes during iteration don't disturb the scan
    for (const doc of Array.from(docs.values())) {
      if (matches(doc, query)) {
        yield structuredClone(doc);
      }
    }
  }

  async deleteMatching(collection: string, query: Query, limit = Infinity): Promise<Document[]> {
    const docs = this.#collections.get(collection)?.docs;
    const deleted: Document[] = [];
    if (!docs) return deleted;

    for (const [id, doc] of Array.from(docs.entries())) {
      if (deleted.length >= limit) break;
      if (matches(doc, query)) {
        docs.delete(id);
        deleted.push(doc);
      }
    }
    return deleted;
  }

  async deleteById(collection: string, id: string): Promise<boolean> {
    return this.#collections.get(collection)?.docs.delete(id) ?? false;
  }

  async addCheck(collection: string, name: string, constraint: Constraint): Promise<boolean> {
    const checks = this.#require(collection).checks;
    if (checks.has(name)) {
      return false;
    }
    checks.set(name, { ...constraint });
    return true;
  }

  async dropCheck(collection: string, name: string): Promise<boolean> {
    return this.#collections.get(collection)?.checks.delete(name) ?? false;
  }

  async listChecks(collection: string): Promise<StoredCheck[]> {
    const checks = this.#collections.get(collection)?.checks;
    if (!checks) return [];
    return Array.from(checks, ([name, constraint]) => ({ name, constraint: { ...constraint } }));
  }

  withCollectionLock<T>(collection: string, fn: () => Promise<T>): Promise<T> {
    return this.#mutex.run(collection, fn);
  }

  async close(): Promise<void> {
    this.#collections.clear();
  }

  #require(collection: string): MemoryCollection {
    const entry = this.#collections.get(collection);
    if (!entry) {
      throw new Error(`Collection "${collection}" does not exist`);
    }
    return entry;
  }
}
