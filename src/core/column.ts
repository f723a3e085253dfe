// src/core/column.ts
import type { RandomSource } from "../types/rng.js";
import type { ColumnValue, KeyValue } from "../types/data.js";
import { randomBool } from "../util/rng.js";
import {
  booleanGenerator,
  choiceGenerator,
  datetimeGenerator,
  decimalGenerator,
  emailGenerator,
  integerGenerator,
  nameGenerator,
  phoneGenerator,
  stringGenerator,
  uuidGenerator,
  type NamePart,
  type ValueGenerator,
} from "./generators.js";
import {
  ConfigurationError,
  GeneratorContractError,
  type ErrorContext,
} from "./errors.js";

export type ColumnKind =
  | "integer"
  | "decimal"
  | "boolean"
  | "string"
  | "name"
  | "email"
  | "phone"
  | "uuid"
  | "datetime"
  | "date"
  | "choice";

export type Bound = number | Date;

export type ColumnOptions = {
  kind: ColumnKind;
  nullable?: boolean;
  /** Probability of null for nullable columns. Defaults to 0: never null. */
  nullRate?: number;
  min?: Bound;
  max?: Bound;
  maxLength?: number;
  fractionDigits?: number;
  choices?: readonly KeyValue[];
  weights?: readonly number[];
  namePart?: NamePart;
  primaryKey?: boolean;
  /** Replaces the kind's default generator. Its output is still checked. */
  generator?: ValueGenerator;
  /** Anchor for default datetime spans. */
  referenceDate?: Date;
};

export type ColumnDescription = {
  kind: ColumnKind;
  nullable: boolean;
  nullRate: number;
  primaryKey: boolean;
  generator: string;
  min?: number | string;
  max?: number | string;
  maxLength?: number;
  choices?: KeyValue[];
};

const NUMERIC_KINDS: ReadonlySet<ColumnKind> = new Set(["integer", "decimal"]);
const TEMPORAL_KINDS: ReadonlySet<ColumnKind> = new Set(["datetime", "date"]);
const TEXT_KINDS: ReadonlySet<ColumnKind> = new Set([
  "string",
  "name",
  "email",
  "phone",
  "uuid",
]);

const DEFAULT_INT_RANGE = { min: 1, max: 1000 };
const DEFAULT_DECIMAL_RANGE = { min: 0, max: 1000 };
const DEFAULT_STRING_LENGTH = 50;
const UUID_LENGTH = 36;
const DEFAULT_SPAN_DAYS = 3650;

/**
 * Generation contract for one table attribute. Immutable once built.
 */
export class Column {
  readonly kind: ColumnKind;
  readonly nullable: boolean;
  readonly nullRate: number;
  readonly primaryKey: boolean;
  readonly min?: Bound;
  readonly max?: Bound;
  readonly maxLength?: number;
  readonly choices?: readonly KeyValue[];
  readonly generator: ValueGenerator;

  constructor(options: ColumnOptions) {
    const { kind } = options;
    this.kind = kind;
    this.nullable = options.nullable ?? false;
    this.nullRate = options.nullRate ?? 0;
    this.primaryKey = options.primaryKey ?? false;

    if (!(this.nullRate >= 0 && this.nullRate <= 1)) {
      throw new ConfigurationError(`Null rate must be within [0, 1] (got ${this.nullRate})`);
    }
    if (options.maxLength != null && !(options.maxLength >= 0)) {
      throw new ConfigurationError(`Max length must be >= 0 (got ${options.maxLength})`);
    }
    validateBounds(kind, options.min, options.max);
    if (options.choices?.length === 0) {
      throw new ConfigurationError("Choices must not be empty");
    }

    if (options.generator) {
      this.generator = options.generator;
      this.min = options.min;
      this.max = options.max;
      this.maxLength = options.maxLength;
      this.choices = options.choices;
    } else {
      const defaults = defaultConstraints(options);
      this.min = defaults.min;
      this.max = defaults.max;
      this.maxLength = defaults.maxLength;
      this.choices = options.choices;
      this.generator = defaultGenerator(options, defaults);
    }

    for (const value of this.generator.values ?? []) {
      const violation = this.contractViolation(value);
      if (violation) {
        throw new ConfigurationError(`Generator "${this.generator.label}" can produce ${violation}`);
      }
    }
  }

  /**
   * Produce one value. Nullable columns draw the null decision first; every
   * other value is checked against this column's constraints.
   */
  generateValue(
    source: RandomSource,
    options: { rowIndex?: number; context?: ErrorContext } = {},
  ): ColumnValue {
    if (this.nullable && this.nullRate > 0 && randomBool(source.rng, this.nullRate)) {
      return null;
    }

    const value = this.generator.generate({ source, rowIndex: options.rowIndex ?? 0 });
    this.assertContract(value, options.context ?? {});
    return value;
  }

  describe(): ColumnDescription {
    const description: ColumnDescription = {
      kind: this.kind,
      nullable: this.nullable,
      nullRate: this.nullRate,
      primaryKey: this.primaryKey,
      generator: this.generator.label,
    };
    if (this.min != null) description.min = describeBound(this.min);
    if (this.max != null) description.max = describeBound(this.max);
    if (this.maxLength != null) description.maxLength = this.maxLength;
    if (this.choices) description.choices = [...this.choices];
    return description;
  }

  private assertContract(value: unknown, context: ErrorContext): void {
    const violation = this.contractViolation(value);
    if (violation) {
      throw new GeneratorContractError(
        `Generator "${this.generator.label}" produced ${violation}`,
        context,
      );
    }
  }

  /** Describes how `value` breaks this column's constraints, if it does. */
  private contractViolation(value: unknown): string | undefined {
    if (value == null) return "no value";
    if (!matchesKind(this.kind, value)) {
      return `${describeValue(value)}, which is not a valid ${this.kind} value`;
    }

    if (typeof value === "string") {
      if (value.length === 0) return "an empty string";
      if (this.maxLength != null && value.length > this.maxLength) {
        return `${value.length} characters, more than ${this.maxLength}`;
      }
    }

    if (typeof value === "number" || value instanceof Date) {
      const n = value instanceof Date ? value.getTime() : value;
      if (this.min != null && n < boundValue(this.min)) {
        return `${describeValue(value)}, below min ${describeBound(this.min)}`;
      }
      if (this.max != null && n > boundValue(this.max)) {
        return `${describeValue(value)}, above max ${describeBound(this.max)}`;
      }
    }

    if (this.choices && !this.choices.some((choice) => sameValue(choice, value))) {
      return `${describeValue(value)}, which is not one of the allowed choices`;
    }
    return undefined;
  }
}

function validateBounds(kind: ColumnKind, min?: Bound, max?: Bound): void {
  for (const bound of [min, max]) {
    if (bound == null) continue;
    if (NUMERIC_KINDS.has(kind) && typeof bound !== "number") {
      throw new ConfigurationError(`${kind} bounds must be numbers`);
    }
    if (TEMPORAL_KINDS.has(kind) && !(bound instanceof Date)) {
      throw new ConfigurationError(`${kind} bounds must be dates`);
    }
    if (!NUMERIC_KINDS.has(kind) && !TEMPORAL_KINDS.has(kind)) {
      throw new ConfigurationError(`${kind} columns do not take min/max bounds`);
    }
    if (Number.isNaN(boundValue(bound))) {
      throw new ConfigurationError("Bounds must not be NaN or invalid dates");
    }
  }
  if (min != null && max != null && boundValue(min) > boundValue(max)) {
    throw new ConfigurationError(
      `min (${describeBound(min)}) is greater than max (${describeBound(max)})`,
    );
  }
}

type Constraints = { min?: Bound; max?: Bound; maxLength?: number };

function defaultConstraints(options: ColumnOptions): Constraints {
  const { kind } = options;
  switch (kind) {
    case "integer":
      return {
        min: options.min ?? clampDefault(DEFAULT_INT_RANGE.min, options.max, "min"),
        max: options.max ?? clampDefault(DEFAULT_INT_RANGE.max, options.min, "max"),
      };
    case "decimal":
      return {
        min: options.min ?? clampDefault(DEFAULT_DECIMAL_RANGE.min, options.max, "min"),
        max: options.max ?? clampDefault(DEFAULT_DECIMAL_RANGE.max, options.min, "max"),
      };
    case "datetime":
    case "date": {
      const reference = options.referenceDate ?? new Date();
      const max =
        options.max ??
        (options.min != null && boundValue(options.min) > reference.getTime()
          ? options.min
          : reference);
      const min =
        options.min ?? new Date(boundValue(max) - DEFAULT_SPAN_DAYS * 24 * 60 * 60 * 1000);
      return { min, max };
    }
    case "string":
      return { maxLength: options.maxLength ?? DEFAULT_STRING_LENGTH };
    case "uuid":
      return { maxLength: options.maxLength ?? UUID_LENGTH };
    default:
      return { maxLength: options.maxLength };
  }
}

/** Keep a one-sided default on the right side of the bound the caller gave. */
function clampDefault(value: number, other: Bound | undefined, side: "min" | "max"): number {
  if (typeof other !== "number") return value;
  return side === "min" ? Math.min(value, other) : Math.max(value, other);
}

function defaultGenerator(options: ColumnOptions, c: Constraints): ValueGenerator {
  switch (options.kind) {
    case "integer":
      return integerGenerator({ min: numberBound(c.min), max: numberBound(c.max) });
    case "decimal":
      return decimalGenerator({
        min: numberBound(c.min),
        max: numberBound(c.max),
        fractionDigits: options.fractionDigits,
      });
    case "boolean":
      return booleanGenerator();
    case "string":
      return stringGenerator({ maxLength: c.maxLength ?? DEFAULT_STRING_LENGTH });
    case "name":
      return nameGenerator({ part: options.namePart, maxLength: c.maxLength });
    case "email":
      return emailGenerator({ maxLength: c.maxLength });
    case "phone":
      return phoneGenerator({ maxLength: c.maxLength });
    case "uuid":
      if ((c.maxLength ?? UUID_LENGTH) < UUID_LENGTH) {
        throw new ConfigurationError(`uuid columns need a max length of at least ${UUID_LENGTH}`);
      }
      return uuidGenerator();
    case "datetime":
    case "date":
      return datetimeGenerator({
        min: dateBound(c.min),
        max: dateBound(c.max),
        precision: options.kind,
      });
    case "choice":
      if (!options.choices) {
        throw new ConfigurationError("choice columns need a list of choices");
      }
      return choiceGenerator({ values: options.choices, weights: options.weights });
  }
}

function matchesKind(kind: ColumnKind, value: unknown): boolean {
  switch (kind) {
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "decimal":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "datetime":
    case "date":
      return value instanceof Date && !Number.isNaN(value.getTime());
    case "choice":
      return (
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean" ||
        value instanceof Date
      );
    default:
      return TEXT_KINDS.has(kind) && typeof value === "string";
  }
}

function sameValue(a: KeyValue, b: unknown): boolean {
  if (a instanceof Date) return b instanceof Date && a.getTime() === b.getTime();
  return a === b;
}

function boundValue(bound: Bound): number {
  return bound instanceof Date ? bound.getTime() : bound;
}

function numberBound(bound: Bound | undefined): number {
  if (typeof bound !== "number") {
    throw new ConfigurationError("Numeric bound missing");
  }
  return bound;
}

function dateBound(bound: Bound | undefined): Date {
  if (!(bound instanceof Date)) {
    throw new ConfigurationError("Date bound missing");
  }
  return bound;
}

function describeBound(bound: Bound): number | string {
  return bound instanceof Date ? bound.toISOString() : bound;
}

function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "an invalid date" : value.toISOString();
  }
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}
