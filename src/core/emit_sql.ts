// src/core/emit_sql.ts
import type { ColumnValue, GeneratedRow } from "../types/data.js";
import { quoteIdent } from "../util/helper.js";
import type { GeneratedDataset } from "./generate_rows.js";

const ROWS_PER_INSERT = 100;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Render a dataset as INSERT statements: tables in generation order, then
 * junction tables.
 */
export function emitSql(dataset: GeneratedDataset): string {
  const lines: string[] = [
    `-- Generated test data (seed: ${dataset.seed})`,
    "BEGIN;",
    "",
  ];

  for (const table of dataset.tableOrder) {
    lines.push(...insertStatements(table, dataset.tables.get(table) ?? []));
  }
  for (const [table, rows] of dataset.junctions) {
    lines.push(...insertStatements(table, rows));
  }

  lines.push("COMMIT;", "");
  return lines.join("\n");
}

/**
 * Render a dataset as a JSON document.
 */
export function emitJson(dataset: GeneratedDataset): string {
  return JSON.stringify(
    {
      seed: dataset.seed,
      tables: Object.fromEntries(dataset.tableOrder.map((t) => [t, dataset.tables.get(t) ?? []])),
      junctions: Object.fromEntries(dataset.junctions),
    },
    null,
    2,
  );
}

function insertStatements(table: string, rows: readonly GeneratedRow[]): string[] {
  const first = rows[0];
  if (!first) return [];

  const columns = Object.keys(first);
  const header = `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(", ")}) VALUES`;
  const statements: string[] = [];

  for (let i = 0; i < rows.length; i += ROWS_PER_INSERT) {
    const values = rows
      .slice(i, i + ROWS_PER_INSERT)
      .map((row) => `  (${columns.map((c) => sqlLiteral(row[c] ?? null)).join(", ")})`);
    statements.push(`${header}\n${values.join(",\n")};`, "");
  }

  return statements;
}

export function sqlLiteral(value: ColumnValue): string {
  if (value === null) return "NULL";
  if (typeof value === "number") return String(value);
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (value instanceof Date) {
    // Midnight UTC values come from date columns
    const iso = value.toISOString();
    return value.getTime() % MS_PER_DAY === 0 ? `'${iso.slice(0, 10)}'` : `'${iso}'`;
  }
  return `'${value.replace(/'/g, "''")}'`;
}
