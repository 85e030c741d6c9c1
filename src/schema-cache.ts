/**
 * Per-process table schema cache.
 *
 * Entries are never overwritten, expired or invalidated: a schema change on
 * the server is not seen until restart. Two concurrent misses on the same
 * key may both compute; whichever stores first wins and both callers get
 * that entry.
 */

import type { SchemaCacheEntry } from "./types.js";

export class SchemaCache {
  // database -> table -> entry; nested so no name can collide
  private readonly entries = new Map<string, Map<string, SchemaCacheEntry>>();

  get(database: string, table: string): SchemaCacheEntry | undefined {
    return this.entries.get(database)?.get(table);
  }

  /**
   * Return the cached entry, or compute, store and return it. A rejected
   * `compute` stores nothing.
   */
  async getOrCompute(
    database: string,
    table: string,
    compute: () => Promise<SchemaCacheEntry>
  ): Promise<SchemaCacheEntry> {
    const hit = this.get(database, table);
    if (hit) return hit;

    const computed = await compute();

    let tables = this.entries.get(database);
    if (!tables) {
      tables = new Map();
      this.entries.set(database, tables);
    }
    const stored = tables.get(table);
    if (stored) return stored;

    tables.set(table, computed);
    return computed;
  }
}
