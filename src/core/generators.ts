// src/core/generators.ts
import { faker as referenceFaker, type Faker } from "@faker-js/faker";
import type { RandomSource } from "../types/rng.js";
import type { KeyValue } from "../types/data.js";
import { randomBool, randomInt, randomPick, weightedPick } from "../util/rng.js";
import { ConfigurationError } from "./errors.js";

export type GenerationContext = {
  source: RandomSource;
  rowIndex: number;
};

/**
 * Produces one random value per call. Constraints are fixed when the generator
 * is built; the only state it touches is the random source in the context.
 */
export interface ValueGenerator<T extends KeyValue = KeyValue> {
  /** Short label used in table descriptions, e.g. `integer` or `faker:location.city`. */
  readonly label: string;
  /** Every value the generator can return, when that set is known up front. */
  readonly values?: readonly T[];
  generate(context: GenerationContext): T;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const SHORT_CODE_LENGTH = 4;

export function integerGenerator(opts: {
  min: number;
  max: number;
}): ValueGenerator<number> {
  const { min, max } = opts;
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new ConfigurationError(
      `Integer bounds must be safe integers (got ${min}, ${max})`,
    );
  }
  assertOrdered(min, max);

  return {
    label: "integer",
    generate: ({ source }) => randomInt(source.rng, min, max),
  };
}

/** `start + rowIndex * step`; used for surrogate keys. */
export function sequenceGenerator(
  opts: { start?: number; step?: number } = {},
): ValueGenerator<number> {
  const start = opts.start ?? 1;
  const step = opts.step ?? 1;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(step) || step === 0) {
    throw new ConfigurationError(
      `Sequence start and step must be integers, step non-zero (got ${start}, ${step})`,
    );
  }

  return {
    label: "sequence",
    generate: ({ rowIndex }) => start + rowIndex * step,
  };
}

/**
 * Uniform decimal rounded to `fractionDigits`. Works in scaled integer units so
 * rounding never leaves [min, max].
 */
export function decimalGenerator(opts: {
  min: number;
  max: number;
  fractionDigits?: number;
}): ValueGenerator<number> {
  const { min, max } = opts;
  const digits = opts.fractionDigits ?? 2;
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new ConfigurationError(`Decimal bounds must be finite (got ${min}, ${max})`);
  }
  if (!Number.isInteger(digits) || digits < 0 || digits > 10) {
    throw new ConfigurationError(`Fraction digits must be 0..10 (got ${digits})`);
  }
  assertOrdered(min, max);

  const factor = 10 ** digits;
  const lo = Math.ceil(min * factor);
  const hi = Math.floor(max * factor);
  if (lo > hi) {
    throw new ConfigurationError(
      `No value with ${digits} fraction digit(s) lies within [${min}, ${max}]`,
    );
  }

  return {
    label: "decimal",
    generate: ({ source }) => randomInt(source.rng, lo, hi) / factor,
  };
}

/** Plain text of 1..maxLength characters. */
export function stringGenerator(opts: { maxLength: number }): ValueGenerator<string> {
  const { maxLength } = opts;
  assertMaxLength(maxLength);

  return {
    label: "string",
    generate: ({ source }) => {
      if (maxLength <= SHORT_CODE_LENGTH) {
        return source.faker.string.alpha({ length: maxLength, casing: "upper" });
      }
      const wordBudget = Math.min(60, Math.max(1, Math.floor(maxLength / 8)));
      const words = source.faker.lorem.words(randomInt(source.rng, 1, wordBudget));
      return clampString(words, maxLength);
    },
  };
}

export type NamePart = "first" | "last" | "full";

export function nameGenerator(opts: {
  part?: NamePart;
  maxLength?: number;
}): ValueGenerator<string> {
  const part = opts.part ?? "full";
  const producers: Record<NamePart, (f: Faker) => string> = {
    first: (f) => f.person.firstName(),
    last: (f) => f.person.lastName(),
    full: (f) => f.person.fullName(),
  };
  return producerGenerator(`name:${part}`, producers[part], opts.maxLength);
}

export function emailGenerator(opts: { maxLength?: number } = {}): ValueGenerator<string> {
  return producerGenerator("email", (f) => f.internet.email(), opts.maxLength);
}

export function phoneGenerator(opts: { maxLength?: number } = {}): ValueGenerator<string> {
  return producerGenerator("phone", (f) => f.phone.number(), opts.maxLength);
}

export function uuidGenerator(): ValueGenerator<string> {
  return {
    label: "uuid",
    generate: ({ source }) => source.faker.string.uuid(),
  };
}

/**
 * Call a faker method by path (`"location.city"`) on the context's faker.
 * The path is checked against faker's module layout when the generator is built.
 */
export function fakerGenerator(
  path: string,
  opts: { maxLength?: number } = {},
): ValueGenerator<string> {
  const reference = resolveFakerMethod(referenceFaker, path);
  if (!reference) {
    throw new ConfigurationError(`Invalid faker method: ${path}`);
  }
  let sample: unknown;
  try {
    sample = reference.fn();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Faker method ${path} cannot be called without arguments: ${reason}`,
    );
  }
  if (typeof sample !== "string" && typeof sample !== "number" && typeof sample !== "boolean") {
    throw new ConfigurationError(
      `Faker method ${path} returns ${describeSample(sample)}, not text, a number or a boolean`,
    );
  }

  return producerGenerator(
    `faker:${path}`,
    (f) => {
      const method = resolveFakerMethod(f, path);
      const value = method?.fn();
      if (typeof value === "string") return value;
      if (typeof value === "number" || typeof value === "boolean") return String(value);
      return "";
    },
    opts.maxLength,
  );
}

export function datetimeGenerator(opts: {
  min: Date;
  max: Date;
  precision?: "datetime" | "date";
}): ValueGenerator<Date> {
  const start = opts.min.getTime();
  const end = opts.max.getTime();
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new ConfigurationError("Datetime bounds must be valid dates");
  }
  assertOrdered(start, end, (ms) => new Date(ms).toISOString());

  if (opts.precision === "date") {
    const firstDay = Math.ceil(start / MS_PER_DAY);
    const lastDay = Math.floor(end / MS_PER_DAY);
    if (firstDay > lastDay) {
      throw new ConfigurationError(
        `No calendar date lies within [${opts.min.toISOString()}, ${opts.max.toISOString()}]`,
      );
    }
    return {
      label: "date",
      generate: ({ source }) =>
        new Date(randomInt(source.rng, firstDay, lastDay) * MS_PER_DAY),
    };
  }

  return {
    label: "datetime",
    generate: ({ source }) => new Date(randomInt(source.rng, start, end)),
  };
}

export function choiceGenerator<T extends KeyValue>(opts: {
  values: readonly T[];
  weights?: readonly number[];
}): ValueGenerator<T> {
  const { values, weights } = opts;
  if (values.length === 0) {
    throw new ConfigurationError("Choice generator needs at least one value");
  }
  if (weights) {
    if (weights.length !== values.length) {
      throw new ConfigurationError(
        `Expected ${values.length} weight(s), got ${weights.length}`,
      );
    }
    if (weights.some((w) => !(w >= 0)) || !weights.some((w) => w > 0)) {
      throw new ConfigurationError("Weights must be >= 0 with at least one > 0");
    }
  }

  return {
    label: "choice",
    values,
    generate: ({ source }) =>
      weights
        ? weightedPick(source.rng, values, weights)
        : randomPick(source.rng, values),
  };
}

export function booleanGenerator(opts: { probability?: number } = {}): ValueGenerator<boolean> {
  const probability = opts.probability ?? 0.5;
  if (!(probability >= 0 && probability <= 1)) {
    throw new ConfigurationError(`Probability must be within [0, 1] (got ${probability})`);
  }
  return {
    label: "boolean",
    generate: ({ source }) => randomBool(source.rng, probability),
  };
}

export function fixedGenerator<T extends KeyValue>(value: T): ValueGenerator<T> {
  return {
    label: "fixed",
    values: [value],
    generate: () => value,
  };
}

export function clampString(value: string, maxLength: number | undefined): string {
  if (maxLength == null || value.length <= maxLength) return value;
  const clamped = value.slice(0, Math.max(1, maxLength)).trimEnd();
  return clamped.length > 0 ? clamped : value.slice(0, Math.max(1, maxLength));
}

function producerGenerator(
  label: string,
  produce: (f: Faker) => string,
  maxLength: number | undefined,
): ValueGenerator<string> {
  if (maxLength != null) assertMaxLength(maxLength);

  return {
    label,
    generate: ({ source }) => {
      const value = produce(source.faker);
      if (maxLength != null && maxLength <= SHORT_CODE_LENGTH && value.length > maxLength) {
        return source.faker.string.alpha({ length: maxLength, casing: "upper" });
      }
      return clampString(value, maxLength);
    },
  };
}

function resolveFakerMethod(
  f: Faker,
  path: string,
): { fn: (...args: unknown[]) => unknown } | undefined {
  const segments = path.split(".").filter(Boolean);
  let owner: object | undefined;
  let current: unknown = f;
  for (const segment of segments) {
    if (!current || typeof current !== "object" || !(segment in current)) {
      return undefined;
    }
    owner = current;
    current = Reflect.get(current, segment);
  }
  if (!owner || typeof current !== "function") return undefined;
  const fn = current;
  const bound = owner;
  return { fn: (...args: unknown[]): unknown => Reflect.apply(fn, bound, args) };
}

function describeSample(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "a Date";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : typeof value;
}

function assertOrdered(
  min: number,
  max: number,
  format: (v: number) => string = String,
): void {
  if (min > max) {
    throw new ConfigurationError(`min (${format(min)}) is greater than max (${format(max)})`);
  }
}

function assertMaxLength(maxLength: number): void {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new ConfigurationError(`Max length must be an integer >= 1 (got ${maxLength})`);
  }
}
