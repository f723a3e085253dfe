// src/types/data.ts

export type KeyValue = string | number | boolean | Date;

export type ColumnValue = KeyValue | null;

/** One generated row; key order follows column declaration order. */
export type GeneratedRow = Record<string, ColumnValue>;

/** One pairing emitted for a many-to-many junction table. */
export type JunctionRow = Record<string, KeyValue>;

export type GeneratedData = Map<string, GeneratedRow[]>;
