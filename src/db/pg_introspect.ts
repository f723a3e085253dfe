// src/db/pg_introspect.ts
import pg from "pg";
import type { SchemaModel, TableSchema } from "../types/schema.js";

const { Client } = pg;

export type PgColumnRow = {
  table_name: string;
  column_name: string;
  data_type: string;
  udt_name: string;
  is_nullable: "YES" | "NO";
  column_default: string | null;
  character_maximum_length: number | null;
  numeric_precision: number | null;
  numeric_scale: number | null;
};

export type PgKeyRow = {
  table_name: string;
  constraint_name: string;
  column_name: string;
  ordinal_position: number;
};

export type PgForeignKeyRow = PgKeyRow & {
  foreign_table_name: string;
  foreign_column_name: string;
};

export type PgCheckRow = {
  table_name: string;
  constraint_name: string;
  definition: string;
};

export type PgEnumRow = {
  enum_type: string;
  enum_value: string;
};

/** Raw catalog rows, one array per query. */
export type PgCatalogRows = {
  tables: string[];
  columns: PgColumnRow[];
  primaryKeys: PgKeyRow[];
  foreignKeys: PgForeignKeyRow[];
  checks: PgCheckRow[];
  enums: PgEnumRow[];
};

export async function introspectPostgres(
  connectionString: string,
): Promise<SchemaModel> {
  const client = new Client({ connectionString });
  await client.connect();

  try {
    // 1) Tables (public schema)
    const tablesRes = await client.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_type = 'BASE TABLE'
      ORDER BY table_name;
    `);

    // 2) Columns (+ lengths and numeric precision)
    const colsRes = await client.query<PgColumnRow>(`
      SELECT
        c.table_name,
        c.column_name,
        c.data_type,
        c.udt_name,
        c.is_nullable,
        c.column_default,
        c.character_maximum_length,
        c.numeric_precision,
        c.numeric_scale
      FROM information_schema.columns c
      WHERE c.table_schema = 'public'
      ORDER BY c.table_name, c.ordinal_position;
    `);

    // 3) Primary keys (composite-safe)
    const pkRes = await client.query<PgKeyRow>(`
      SELECT
        tc.table_name,
        tc.constraint_name,
        kcu.column_name,
        kcu.ordinal_position
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      WHERE tc.table_schema = 'public'
        AND tc.constraint_type = 'PRIMARY KEY'
      ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
    `);

    // 4) Foreign keys (composite-safe)
    const fkRes = await client.query<PgForeignKeyRow>(`
      SELECT
        tc.constraint_name,
        tc.table_name,
        kcu.column_name,
        kcu2.table_name AS foreign_table_name,
        kcu2.column_name AS foreign_column_name,
        kcu.ordinal_position
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      JOIN information_schema.referential_constraints rc
        ON tc.constraint_name = rc.constraint_name
       AND tc.table_schema = rc.constraint_schema
      JOIN information_schema.key_column_usage kcu2
        ON rc.unique_constraint_name = kcu2.constraint_name
       AND kcu.ordinal_position = kcu2.ordinal_position
      WHERE tc.table_schema = 'public'
        AND tc.constraint_type = 'FOREIGN KEY'
      ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
    `);

    // 5) Check constraints
    const checkRes = await client.query<PgCheckRow>(`
      SELECT
        rel.relname AS table_name,
        con.conname AS constraint_name,
        pg_get_constraintdef(con.oid) AS definition
      FROM pg_constraint con
      JOIN pg_class rel ON rel.oid = con.conrelid
      JOIN pg_namespace ns ON ns.oid = rel.relnamespace
      WHERE ns.nspname = 'public'
        AND con.contype = 'c'
      ORDER BY rel.relname, con.conname;
    `);

    // 6) Enum values (native PG enums)
    const enumRes = await client.query<PgEnumRow>(`
      SELECT
        t.typname AS enum_type,
        e.enumlabel AS enum_value
      FROM pg_type t
      JOIN pg_enum e ON t.oid = e.enumtypid
      ORDER BY t.typname, e.enumsortorder;
    `);

    return assembleSchema({
      tables: tablesRes.rows.map((r) => r.table_name),
      columns: colsRes.rows,
      primaryKeys: pkRes.rows,
      foreignKeys: fkRes.rows,
      checks: checkRes.rows,
      enums: enumRes.rows,
    });
  } finally {
    await client.end();
  }
}

/**
 * Build a SchemaModel from catalog rows. Rows naming tables outside
 * `rows.tables` are ignored.
 */
export function assembleSchema(rows: PgCatalogRows): SchemaModel {
  const enumMap = new Map<string, string[]>();
  for (const r of rows.enums) {
    const arr = enumMap.get(r.enum_type) ?? [];
    arr.push(r.enum_value);
    enumMap.set(r.enum_type, arr);
  }

  const tables: Record<string, TableSchema> = {};
  for (const name of rows.tables) {
    tables[name] = {
      name,
      columns: {},
      primaryKey: [],
      foreignKeys: [],
      checks: [],
    };
  }

  for (const r of rows.columns) {
    const table = tables[r.table_name];
    if (!table) continue;

    // udt_name is more precise than data_type (e.g. "int4" vs "integer", enum names, etc.)
    const enumValues = enumMap.get(r.udt_name);

    table.columns[r.column_name] = {
      name: r.column_name,
      dbType: r.udt_name,
      isNullable: r.is_nullable === "YES",
      defaultExpr: r.column_default ?? null,
      isPrimaryKey: false,
      ...(r.character_maximum_length != null ? { maxLength: r.character_maximum_length } : {}),
      ...(r.numeric_precision != null && r.udt_name === "numeric"
        ? { numericPrecision: r.numeric_precision, numericScale: r.numeric_scale ?? 0 }
        : {}),
      ...(enumValues ? { enumValues } : {}),
    };
  }

  for (const r of orderByPosition(rows.primaryKeys)) {
    const table = tables[r.table_name];
    if (!table) continue;
    table.primaryKey.push(r.column_name);
    const column = table.columns[r.column_name];
    if (column) column.isPrimaryKey = true;
  }

  // composite foreign keys arrive as one row per column
  const fkGroups = new Map<string, TableSchema["foreignKeys"][number]>();
  for (const r of orderByPosition(rows.foreignKeys)) {
    const table = tables[r.table_name];
    if (!table) continue;
    const key = `${r.table_name}::${r.constraint_name}`;
    let fk = fkGroups.get(key);
    if (!fk) {
      fk = {
        constraintName: r.constraint_name,
        columns: [],
        refTable: r.foreign_table_name,
        refColumns: [],
      };
      fkGroups.set(key, fk);
      table.foreignKeys.push(fk);
    }
    fk.columns.push(r.column_name);
    fk.refColumns.push(r.foreign_column_name);
  }

  for (const r of rows.checks) {
    const table = tables[r.table_name];
    if (!table) continue;
    table.checks.push({ name: r.constraint_name, expression: stripCheckKeyword(r.definition) });
  }

  return { dialect: "postgres", tables };
}

/** `CHECK ((age >= 18))` -> `((age >= 18))` */
export function stripCheckKeyword(definition: string): string {
  return definition
    .trim()
    .replace(/^check\s*/i, "")
    .replace(/\s+not valid$/i, "")
    .trim();
}

function orderByPosition<T extends PgKeyRow>(rows: readonly T[]): T[] {
  return [...rows].sort(
    (a, b) =>
      a.table_name.localeCompare(b.table_name) ||
      a.constraint_name.localeCompare(b.constraint_name) ||
      a.ordinal_position - b.ordinal_position,
  );
}
