// src/core/pools.ts
import type { GeneratedRow, JunctionRow, KeyValue } from "../types/data.js";

/**
 * Key pools per `table.column`. Pools are handed out by reference so keys
 * appended while a table generates are visible to every relation at once.
 */
export class KeyPools {
  private readonly pools = new Map<string, KeyValue[]>();

  static key(table: string, column: string): string {
    return `${table}.${column}`;
  }

  /** Pool for `table.column`; empty when nothing was registered. */
  get(table: string, column: string): readonly KeyValue[] {
    return this.pools.get(KeyPools.key(table, column)) ?? [];
  }

  /** Register (or reuse) the pool array for `table.column`. */
  ensure(table: string, column: string): KeyValue[] {
    const key = KeyPools.key(table, column);
    let pool = this.pools.get(key);
    if (!pool) {
      pool = [];
      this.pools.set(key, pool);
    }
    return pool;
  }

  set(table: string, column: string, keys: readonly KeyValue[]): void {
    const pool = this.ensure(table, column);
    pool.length = 0;
    pool.push(...keys);
  }

  /** Append the non-null values of the given columns from `row`. */
  collect(table: string, row: GeneratedRow, columns: Iterable<string>): void {
    for (const column of columns) {
      const value = row[column];
      if (value != null) this.ensure(table, column).push(value);
    }
  }
}

/**
 * Collects junction rows emitted by many-to-many relations, per junction table.
 */
export class JunctionCollector {
  private readonly rows = new Map<string, JunctionRow[]>();

  add(junctionTable: string, row: JunctionRow): void {
    const rows = this.rows.get(junctionTable) ?? [];
    rows.push(row);
    this.rows.set(junctionTable, rows);
  }

  get(junctionTable: string): readonly JunctionRow[] {
    return this.rows.get(junctionTable) ?? [];
  }

  toMap(): Map<string, JunctionRow[]> {
    return new Map(this.rows);
  }
}
