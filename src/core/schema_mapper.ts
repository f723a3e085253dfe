// src/core/schema_mapper.ts
import type { SchemaColumnMetadata, SchemaModel, TableSchema } from "../types/schema.js";
import type { ColumnOverride, GenerationConfig, RelationOverride } from "../types/config.js";
import { isDbGeneratedDefault } from "../models/schema.js";
import { applyRangeBounds, parseCheckConstraint } from "../util/constraints.js";
import { Column, type ColumnOptions } from "./column.js";
import {
  choiceGenerator,
  fakerGenerator,
  fixedGenerator,
  sequenceGenerator,
  type NamePart,
} from "./generators.js";
import {
  ManyToManyRelation,
  OneToManyRelation,
  RelationConfig,
  type AnyRelation,
} from "./relation.js";
import { DeclaredTableModel } from "./table_model.js";
import { ModelRegistry } from "./registry.js";
import {
  ConfigurationError,
  UnsupportedTypeError,
  type ErrorContext,
} from "./errors.js";

export type MapperOptions = {
  /** Anchor for default datetime spans. */
  referenceDate?: Date;
  /** Per-table column and relation overrides, as read from the config file. */
  overrides?: GenerationConfig["tables"];
};

type TypeFamily =
  | "smallint"
  | "tinyint"
  | "integer"
  | "bigint"
  | "serial"
  | "decimal"
  | "float"
  | "string"
  | "char"
  | "text"
  | "boolean"
  | "datetime"
  | "date"
  | "uuid"
  | "enum";

/**
 * Declared base type -> family. A type missing here is
 * reported, never guessed.
 */
const TYPE_FAMILIES: Readonly<Record<string, TypeFamily>> = {
  smallint: "smallint",
  int2: "smallint",
  tinyint: "tinyint",
  int: "integer",
  integer: "integer",
  int4: "integer",
  mediumint: "integer",
  bigint: "bigint",
  int8: "bigint",
  serial: "serial",
  serial4: "serial",
  smallserial: "serial",
  serial2: "serial",
  bigserial: "serial",
  serial8: "serial",
  numeric: "decimal",
  decimal: "decimal",
  real: "float",
  float: "float",
  float4: "float",
  float8: "float",
  double: "float",
  "double precision": "float",
  varchar: "string",
  "character varying": "string",
  nvarchar: "string",
  char: "char",
  character: "char",
  nchar: "char",
  bpchar: "char",
  text: "text",
  tinytext: "text",
  mediumtext: "text",
  longtext: "text",
  clob: "text",
  boolean: "boolean",
  bool: "boolean",
  bit: "boolean",
  timestamp: "datetime",
  timestamptz: "datetime",
  "timestamp with time zone": "datetime",
  "timestamp without time zone": "datetime",
  datetime: "datetime",
  time: "datetime",
  timetz: "datetime",
  "time with time zone": "datetime",
  "time without time zone": "datetime",
  date: "date",
  uuid: "uuid",
  enum: "enum",
};

const SMALLINT_MAX = 32767;
const TINYINT_MAX = 127;
const INT_MAX = 2147483647;
const DEFAULT_VARCHAR_LENGTH = 255;
const DEFAULT_TEXT_LENGTH = 500;
const DEFAULT_PRECISION = 10;
const DEFAULT_SCALE = 2;
const MS_PER_YEAR = 365 * 24 * 60 * 60 * 1000;

const INTEGER_RANGES: Record<string, { min: number; max: number }> = {
  smallint: { min: 1, max: SMALLINT_MAX },
  tinyint: { min: 0, max: TINYINT_MAX },
  integer: { min: 1, max: INT_MAX },
  bigint: { min: 1, max: Number.MAX_SAFE_INTEGER },
};

const SERIAL_MAX: Record<string, number> = {
  smallserial: SMALLINT_MAX,
  serial2: SMALLINT_MAX,
  bigserial: Number.MAX_SAFE_INTEGER,
  serial8: Number.MAX_SAFE_INTEGER,
};

const TEXT_KINDS: ReadonlySet<ColumnOptions["kind"]> = new Set([
  "string",
  "name",
  "email",
  "phone",
]);

const NAME_HINTS: Array<[RegExp, NamePart]> = [
  [/(^|_)first_?name$|^fname$|given_?name/, "first"],
  [/(^|_)last_?name$|^lname$|surname|family_?name/, "last"],
  [/^(full_?)?name$/, "full"],
];

const TEXT_HINTS: Array<[RegExp, string]> = [
  [/(user_?name|login|handle)/, "internet.username"],
  [/(address|addr)/, "location.streetAddress"],
  [/(city|town)/, "location.city"],
  [/(country|nation)/, "location.country"],
  [/(zip|postal|postcode)/, "location.zipCode"],
  [/(url|website|link|href)/, "internet.url"],
  [/(company|organisation|organization|employer)/, "company.name"],
  [/(description|desc|bio|about|summary|comment|notes?)$/, "lorem.sentence"],
  [/(currency|ccy)/, "finance.currencyCode"],
];

type ParsedType = {
  base: string;
  args: number[];
  enumValues?: string[];
};

/**
 * Split a declared SQL type into its base name and numeric arguments:
 * `character varying(50)` -> `{ base: "character varying", args: [50] }`.
 */
export function parseSqlType(sqlType: string): ParsedType {
  const normalized = sqlType.trim().toLowerCase();

  const enumMatch = sqlType.trim().match(/^enum\s*\((.*)\)$/is);
  if (enumMatch) {
    const values = [...enumMatch[1]!.matchAll(/'((?:[^']|'')*)'/g)].map((m) =>
      m[1]!.replace(/''/g, "'"),
    );
    return { base: "enum", args: [], enumValues: values };
  }

  const args: number[] = [];
  const argMatch = normalized.match(/\(([^)]*)\)/);
  if (argMatch) {
    for (const part of argMatch[1]!.split(",")) {
      const value = Number(part.trim());
      if (part.trim() !== "" && Number.isFinite(value)) args.push(value);
    }
  }

  const base = normalized
    .replace(/\([^)]*\)/g, " ")
    .replace(/\b(unsigned|zerofill)\b/g, " ")
    .replace(/\s+/g, " ")
    .trim();

  return { base, args };
}

/**
 * Map one column's schema metadata to a Column: SQL type family first, then
 * explicit metadata (ranges, checks, lengths, enum values), then name hints,
 * then any config override.
 */
export function mapColumn(
  metadata: SchemaColumnMetadata,
  options: MapperOptions = {},
  override?: ColumnOverride,
): Column {
  const context: ErrorContext = { table: metadata.table, column: metadata.name };
  return withContext(context, () =>
    new Column(columnOptions(metadata, options, override, context)),
  );
}

function columnOptions(
  metadata: SchemaColumnMetadata,
  options: MapperOptions,
  override: ColumnOverride | undefined,
  context: ErrorContext,
): ColumnOptions {
  const parsed = parseSqlType(metadata.dbType);
  const enumValues = metadata.enumValues ?? parsed.enumValues;
  const family: TypeFamily | undefined =
    enumValues && enumValues.length > 0 ? "enum" : TYPE_FAMILIES[parsed.base];
  if (!family) {
    throw new UnsupportedTypeError(metadata.dbType, context);
  }

  const name = metadata.name.toLowerCase();
  const reference = options.referenceDate ?? new Date();
  const primaryKey = metadata.isPrimaryKey ?? false;
  const nullable = override?.nullable ?? ((metadata.isNullable ?? true) && !primaryKey);
  const checks = (metadata.checks ?? []).map(parseCheckConstraint);
  const ranges = checks
    .flatMap((c) => c.ranges)
    .map((r) => ({ ...r, column: r.column.toLowerCase() }));
  const allowed = checks
    .flatMap((c) => c.allowed)
    .find((a) => a.column.toLowerCase() === name);

  const base: ColumnOptions = {
    kind: "string",
    nullable,
    primaryKey,
    referenceDate: reference,
    ...(override?.nullRate != null ? { nullRate: override.nullRate } : {}),
  };

  switch (family) {
    case "smallint":
    case "tinyint":
    case "integer":
    case "bigint":
    case "serial": {
      const width =
        family === "serial"
          ? { min: 1, max: SERIAL_MAX[parsed.base] ?? INT_MAX }
          : INTEGER_RANGES[family] ?? { min: 1, max: INT_MAX };
      const sequential =
        family === "serial" ||
        isDbGeneratedDefault(metadata) ||
        (primaryKey && !hasExplicitRange(metadata));
      if (sequential) {
        return applyOverride(
          {
            ...base,
            kind: "integer",
            min: width.min,
            max: width.max,
            generator: sequenceGenerator({ start: width.min }),
          },
          override,
        );
      }
      const range = explicitRange(metadata, ranges, name, integerHint(name) ?? width, 1);
      return applyOverride(
        { ...base, kind: "integer", min: Math.ceil(range.min), max: Math.floor(range.max) },
        override,
      );
    }

    case "decimal":
    case "float": {
      const precision = metadata.numericPrecision ?? parsed.args[0] ?? DEFAULT_PRECISION;
      const scale = Math.min(
        10,
        metadata.numericScale ?? parsed.args[1] ?? (family === "float" ? 2 : DEFAULT_SCALE),
      );
      const step = 10 ** -scale;
      const width =
        family === "float"
          ? { min: 0, max: 10000 }
          : { min: 0, max: roundTo(10 ** Math.max(0, precision - scale) - step, scale) };
      const range = explicitRange(metadata, ranges, name, integerHint(name) ?? width, step);
      return applyOverride(
        { ...base, kind: "decimal", min: range.min, max: range.max, fractionDigits: scale },
        override,
      );
    }

    case "string":
    case "char":
    case "text": {
      const maxLength =
        metadata.maxLength ??
        parsed.args[0] ??
        (family === "text" ? DEFAULT_TEXT_LENGTH : family === "char" ? 1 : DEFAULT_VARCHAR_LENGTH);
      return applyOverride(textColumn(base, name, maxLength, allowed?.values), override);
    }

    case "boolean":
      return applyOverride({ ...base, kind: "boolean" }, override);

    case "datetime":
    case "date": {
      const span = dateHint(name, reference) ?? {
        min: new Date(reference.getTime() - 10 * MS_PER_YEAR),
        max: reference,
      };
      return applyOverride({ ...base, kind: family, min: span.min, max: span.max }, override);
    }

    case "uuid":
      return applyOverride({ ...base, kind: "uuid" }, override);

    case "enum":
      return applyOverride({ ...base, kind: "choice", choices: enumValues ?? [] }, override);
  }
}

function textColumn(
  base: ColumnOptions,
  name: string,
  maxLength: number,
  allowed: string[] | undefined,
): ColumnOptions {
  if (allowed && allowed.length > 0) {
    return { ...base, kind: "choice", choices: allowed, maxLength };
  }

  for (const [pattern, part] of NAME_HINTS) {
    if (pattern.test(name)) return { ...base, kind: "name", namePart: part, maxLength };
  }
  if (/email/.test(name)) return { ...base, kind: "email", maxLength };
  if (/(phone|mobile|cell|tel)/.test(name)) return { ...base, kind: "phone", maxLength };
  if (/gender|sex/.test(name) && maxLength === 1) {
    return { ...base, kind: "choice", choices: ["M", "F"], maxLength };
  }
  for (const [pattern, path] of TEXT_HINTS) {
    if (pattern.test(name)) {
      return {
        ...base,
        kind: "string",
        maxLength,
        generator: fakerGenerator(path, { maxLength }),
      };
    }
  }
  return { ...base, kind: "string", maxLength };
}

function integerHint(name: string): { min: number; max: number } | undefined {
  if (/(^|_)age$/.test(name)) return { min: 18, max: 100 };
  if (/salary|wage/.test(name)) return { min: 30000, max: 150000 };
  return undefined;
}

function dateHint(name: string, reference: Date): { min: Date; max: Date } | undefined {
  const yearsAgo = (years: number) => new Date(reference.getTime() - years * MS_PER_YEAR);
  if (/birth|dob/.test(name)) return { min: yearsAgo(60), max: yearsAgo(20) };
  if (/hire|start_date|joined/.test(name)) return { min: yearsAgo(10), max: reference };
  return undefined;
}

function hasExplicitRange(metadata: SchemaColumnMetadata): boolean {
  return metadata.min != null || metadata.max != null;
}

/** Metadata range wins over check constraints, which win over `fallback`. */
function explicitRange(
  metadata: SchemaColumnMetadata,
  ranges: ReturnType<typeof parseCheckConstraint>["ranges"],
  name: string,
  fallback: { min: number; max: number },
  step: number,
): { min: number; max: number } {
  const checked = applyRangeBounds(name, ranges, fallback.min, fallback.max, step);
  const min = metadata.min ?? checked.min;
  const max = metadata.max ?? checked.max;
  // A one-sided bound keeps the other side consistent with it
  if (metadata.min != null && metadata.max == null && max < min) return { min, max: min };
  if (metadata.max != null && metadata.min == null && min > max) return { min: max, max };
  return { min, max };
}

function applyOverride(
  options: ColumnOptions,
  override: ColumnOverride | undefined,
): ColumnOptions {
  if (!override) return options;
  const result: ColumnOptions = { ...options };
  const temporal = options.kind === "datetime" || options.kind === "date";

  if (override.min != null) result.min = toBound(override.min, temporal);
  if (override.max != null) result.max = toBound(override.max, temporal);
  if (override.maxLength != null) result.maxLength = override.maxLength;

  if (override.oneOf) {
    result.kind = "choice";
    result.choices = override.oneOf;
    result.weights = override.weights;
    result.generator = choiceGenerator({ values: override.oneOf, weights: override.weights });
    delete result.min;
    delete result.max;
  } else if (override.faker) {
    if (!TEXT_KINDS.has(result.kind)) {
      throw new ConfigurationError(`faker overrides apply to text columns, not ${result.kind}`);
    }
    result.kind = "string";
    result.generator = fakerGenerator(override.faker, { maxLength: result.maxLength });
  } else if (override.fixed != null) {
    const fixed = override.fixed;
    result.generator = fixedGenerator(
      temporal && typeof fixed === "string" ? new Date(fixed) : fixed,
    );
  } else if (result.generator && (override.min != null || override.max != null)) {
    // New bounds replace a sequence generator with the kind's default
    delete result.generator;
  } else if (result.generator?.label.startsWith("faker:") && override.maxLength != null) {
    result.generator = fakerGenerator(result.generator.label.slice("faker:".length), {
      maxLength: override.maxLength,
    });
  }

  return result;
}

function toBound(value: number | string, temporal: boolean): number | Date {
  if (typeof value === "number") {
    if (temporal) throw new ConfigurationError("Datetime bounds must be ISO date strings");
    return value;
  }
  if (!temporal) throw new ConfigurationError(`Numeric bound expected, got "${value}"`);
  return new Date(value);
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Map a table's columns and turn its single-column foreign keys into
 * one-to-many relations.
 */
export function mapTable(
  table: TableSchema,
  options: MapperOptions = {},
  extraRelations: readonly AnyRelation[] = [],
): DeclaredTableModel {
  const tableOverrides = options.overrides?.[table.name];
  const checks = table.checks.map((c) => c.expression);
  const columns: Array<[string, Column]> = [];

  for (const [name, column] of Object.entries(table.columns)) {
    const metadata: SchemaColumnMetadata = {
      ...column,
      name,
      table: table.name,
      isPrimaryKey: column.isPrimaryKey || table.primaryKey.includes(name),
      checks,
    };
    columns.push([name, mapColumn(metadata, options, tableOverrides?.columns?.[name])]);
  }

  const relations: AnyRelation[] = table.foreignKeys.map((fk) => {
    const [fromColumn, toColumn] = singleColumnFk(table.name, fk);
    const column = columns.find(([name]) => name === fromColumn)?.[1];
    return withContext({ table: table.name, column: fromColumn }, () =>
      new OneToManyRelation({
        fromTable: table.name,
        fromColumn,
        toTable: fk.refTable,
        toColumn,
        nullable: column?.nullable ?? false,
        config: relationConfig(tableOverrides?.relations?.[fromColumn]),
      }),
    );
  });

  return new DeclaredTableModel({
    name: table.name,
    columns,
    relations: [...relations, ...extraRelations],
  });
}

/**
 * A junction table holds only foreign-key columns: exactly two single-column
 * foreign keys into two different tables.
 */
export function isJunctionTable(table: TableSchema): boolean {
  const fks = table.foreignKeys;
  if (fks.length !== 2) return false;
  const [left, right] = fks;
  if (!left || !right || left.refTable === right.refTable) return false;
  if (left.columns.length !== 1 || right.columns.length !== 1) return false;
  const fkColumns = new Set([...left.columns, ...right.columns]);
  return Object.keys(table.columns).every((column) => fkColumns.has(column));
}

/**
 * Map every table of a schema into a registry. Junction tables become
 * many-to-many relations declared on their first referenced table.
 */
export function mapSchema(schema: SchemaModel, options: MapperOptions = {}): ModelRegistry {
  const registry = new ModelRegistry();
  const junctionRelations = new Map<string, AnyRelation[]>();

  for (const table of Object.values(schema.tables)) {
    if (!isJunctionTable(table)) continue;
    const [left, right] = table.foreignKeys;
    if (!left || !right) continue;
    const [leftColumn, leftRef] = singleColumnFk(table.name, left);
    const [rightColumn, rightRef] = singleColumnFk(table.name, right);

    const relation = withContext({ table: table.name }, () =>
      new ManyToManyRelation({
        fromTable: left.refTable,
        fromColumn: leftRef,
        toTable: right.refTable,
        toColumn: rightRef,
        junctionTable: table.name,
        junctionFromColumn: leftColumn,
        junctionToColumn: rightColumn,
        config: relationConfig(options.overrides?.[left.refTable]?.relations?.[table.name]),
      }),
    );
    const list = junctionRelations.get(left.refTable) ?? [];
    list.push(relation);
    junctionRelations.set(left.refTable, list);
  }

  for (const table of Object.values(schema.tables)) {
    if (isJunctionTable(table)) continue;
    registry.register(mapTable(table, options, junctionRelations.get(table.name) ?? []));
  }

  for (const [tableName] of junctionRelations) {
    if (!registry.has(tableName)) {
      throw new ConfigurationError("Junction table references an unknown table", {
        table: tableName,
      });
    }
  }

  return registry;
}

function singleColumnFk(
  table: string,
  fk: TableSchema["foreignKeys"][number],
): [string, string] {
  const [fromColumn] = fk.columns;
  const [toColumn] = fk.refColumns;
  if (fk.columns.length !== 1 || fk.refColumns.length !== 1 || !fromColumn || !toColumn) {
    throw new ConfigurationError(
      `Composite foreign key ${fk.constraintName} is not supported`,
      { table },
    );
  }
  return [fromColumn, toColumn];
}

function relationConfig(override: RelationOverride | undefined): RelationConfig {
  if (!override) return new RelationConfig();
  // A raised maximum pulls the default pool size along with it
  const poolSize =
    override.poolSize ??
    (override.maxRelated != null
      ? Math.max(override.maxRelated, RelationConfig.DEFAULTS.poolSize)
      : undefined);
  return new RelationConfig({ ...override, ...(poolSize != null ? { poolSize } : {}) });
}

function withContext<T>(context: ErrorContext, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (
      error instanceof ConfigurationError &&
      !error.context.table &&
      !error.context.column
    ) {
      throw new ConfigurationError(error.message, context);
    }
    throw error;
  }
}
