// src/models/schema.ts
import { z } from "zod";

export const ColumnSchema = z.object({
  name: z.string().min(1),
  /** Declared SQL type as written in DDL, e.g. `varchar(50)` or `numeric(10,2)`. */
  dbType: z.string().min(1),
  isNullable: z.boolean().default(true),
  defaultExpr: z.string().nullable().default(null),
  isPrimaryKey: z.boolean().default(false),
  maxLength: z.number().int().nonnegative().nullable().optional(),
  numericPrecision: z.number().int().positive().nullable().optional(),
  numericScale: z.number().int().nonnegative().nullable().optional(),
  /** Explicit value range, when the schema source knows one. */
  min: z.number().optional(),
  max: z.number().optional(),
  enumValues: z.array(z.string()).min(1).optional(),
});

/** Patterns that indicate a DB-generated default (sequences, UUIDs) */
const DB_GENERATED_PATTERNS = [
  /^nextval\(/i,
  /^gen_random_uuid\(\)/i,
  /^uuid_generate_v[14]\(\)/i,
];

/** Check if a column's default is DB-generated (serial, identity, UUID generation) */
export function isDbGeneratedDefault(col: {
  defaultExpr?: string | null;
}): boolean {
  const expr = col.defaultExpr;
  if (!expr) return false;
  return DB_GENERATED_PATTERNS.some((pattern) => pattern.test(expr));
}

export const ForeignKeySchema = z.object({
  constraintName: z.string(),
  columns: z.array(z.string()).min(1),
  refTable: z.string(),
  refColumns: z.array(z.string()).min(1),
});

export const CheckSchema = z.object({
  name: z.string(),
  expression: z.string(), // The check constraint expression
});

export const TableSchema = z.object({
  name: z.string().min(1),
  columns: z.record(z.string(), ColumnSchema),
  primaryKey: z.array(z.string()).default([]),
  foreignKeys: z.array(ForeignKeySchema).default([]),
  checks: z.array(CheckSchema).default([]),
});

export const SchemaModelSchema = z.object({
  dialect: z.enum(["postgres", "mysql", "sqlite", "generic"]).default("postgres"),
  tables: z.record(z.string(), TableSchema),
});
