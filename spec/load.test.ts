import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadConfig, loadSchema, parseWith } from "../src/util/load.js";
import { GenerationConfigSchema } from "../src/models/config.js";
import { mapSchema } from "../src/core/schema_mapper.js";
import { buildPlan } from "../src/core/plan.js";
import { generateRows } from "../src/core/generate_rows.js";
import { ConfigurationError } from "../src/core/errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("GenerationConfigSchema", () => {
  it("fills defaults for an empty config", () => {
    expect(GenerationConfigSchema.parse({})).toEqual({ defaultCount: 10, tables: {} });
  });

  it("rejects more than one generator override", () => {
    expect(() =>
      parseWith("config", GenerationConfigSchema, {
        tables: { t: { columns: { c: { fixed: 1, oneOf: [1] } } } },
      }),
    ).toThrow("Invalid config: tables.t.columns.c: Choose only one of: fixed, oneOf, faker");
  });

  it("requires weights to match oneOf", () => {
    expect(() =>
      parseWith("config", GenerationConfigSchema, {
        tables: { t: { columns: { c: { oneOf: ["a", "b"], weights: [1] } } } },
      }),
    ).toThrow("Invalid config: tables.t.columns.c.weights: weights must match oneOf in length");
  });
});

describe("loadSchema and loadConfig", () => {
  it("loads and validates the files", async () => {
    const schema = await loadSchema(fixture("library.schema.json"));
    const config = await loadConfig(fixture("library.config.json"));

    expect(Object.keys(schema.tables)).toEqual(["author", "book"]);
    expect(schema.tables.book?.columns.pages?.isPrimaryKey).toBe(false);
    expect(config.defaultCount).toBe(3);
    expect(config.tables.book?.count).toBe(8);
  });

  it("returns defaults without a config file", async () => {
    expect(await loadConfig()).toEqual({ defaultCount: 10, tables: {} });
  });

  it("reports invalid schema files as configuration errors", async () => {
    await expect(loadSchema(fixture("library.config.json"))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it("drives a full run from the loaded files", async () => {
    const schema = await loadSchema(fixture("library.schema.json"));
    const config = await loadConfig(fixture("library.config.json"));
    const registry = mapSchema(schema, {
      referenceDate: config.referenceDate ? new Date(config.referenceDate) : undefined,
      overrides: config.tables,
    });
    const plan = buildPlan(registry, {
      seed: config.seed,
      defaultCount: config.defaultCount,
      counts: { book: config.tables.book?.count },
    });
    const dataset = generateRows(registry, plan);

    expect(dataset.tables.get("author")).toHaveLength(3);
    const books = dataset.tables.get("book") ?? [];
    expect(books).toHaveLength(8);
    const minPublished = new Date("2000-01-01").getTime();
    for (const book of books) {
      expect([1, 2, 3]).toContain(book.author_id);
      expect(book.pages).toBeGreaterThanOrEqual(10);
      expect(book.pages).toBeLessThanOrEqual(900);
      if (book.published_on !== null) {
        expect(book.published_on).toBeInstanceOf(Date);
        if (book.published_on instanceof Date) {
          expect(book.published_on.getTime()).toBeGreaterThanOrEqual(minPublished);
        }
      }
    }
  });
});
