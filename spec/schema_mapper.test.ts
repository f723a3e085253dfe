import { describe, it, expect } from "vitest";
import {
  isJunctionTable,
  mapColumn,
  mapSchema,
  parseSqlType,
} from "../src/core/schema_mapper.js";
import { ManyToManyRelation, OneToManyRelation } from "../src/core/relation.js";
import { SchemaModelSchema } from "../src/models/schema.js";
import { ConfigurationError, UnsupportedTypeError } from "../src/core/errors.js";
import { createRandomSource } from "../src/util/rng.js";

const MS_PER_YEAR = 365 * 24 * 60 * 60 * 1000;

describe("parseSqlType", () => {
  it("splits base type and arguments", () => {
    expect(parseSqlType("character varying(50)")).toEqual({
      base: "character varying",
      args: [50],
    });
    expect(parseSqlType("NUMERIC(10, 2)")).toEqual({ base: "numeric", args: [10, 2] });
    expect(parseSqlType("INT(11) UNSIGNED")).toEqual({ base: "int", args: [11] });
  });

  it("reads enum literals", () => {
    expect(parseSqlType("enum('draft','it''s live')")).toEqual({
      base: "enum",
      args: [],
      enumValues: ["draft", "it's live"],
    });
  });
});

describe("mapColumn", () => {
  it("reports unknown types with table and column", () => {
    try {
      mapColumn({ table: "places", name: "shape", dbType: "GEOMETRY" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedTypeError);
      if (error instanceof UnsupportedTypeError) {
        expect(error.message).toBe('places.shape: Unsupported SQL type "GEOMETRY"');
        expect(error.context).toEqual({ table: "places", column: "shape" });
      }
    }
  });

  it("takes the max length from varchar(n)", () => {
    const column = mapColumn({ table: "post", name: "title", dbType: "varchar(20)" });
    expect(column.kind).toBe("string");
    expect(column.maxLength).toBe(20);
    expect(column.nullable).toBe(true);
  });

  it("maps enums to choices", () => {
    const column = mapColumn({ table: "post", name: "state", dbType: "enum('a','b')" });
    expect(column.kind).toBe("choice");
    expect(column.choices).toEqual(["a", "b"]);

    const native = mapColumn({
      table: "post",
      name: "state",
      dbType: "post_state",
      enumValues: ["open", "closed"],
    });
    expect(native.choices).toEqual(["open", "closed"]);
  });

  it("narrows integer ranges by check constraints", () => {
    const column = mapColumn({
      table: "person",
      name: "age",
      dbType: "integer",
      checks: ["age >= 21 AND age <= 30"],
    });
    expect([column.min, column.max]).toEqual([21, 30]);
  });

  it("moves exclusive decimal bounds by one unit of scale", () => {
    const column = mapColumn({
      table: "product",
      name: "price",
      dbType: "numeric(6,2)",
      checks: ["(price > 0)"],
    });
    expect(column.kind).toBe("decimal");
    expect([column.min, column.max]).toEqual([0.01, 9999.99]);
  });

  it("keeps integer columns inside fractional exclusive bounds", () => {
    const column = mapColumn({
      table: "stock",
      name: "qty",
      dbType: "integer",
      checks: ["((qty > 0.5) AND (qty < 9.5))"],
    });
    expect([column.min, column.max]).toEqual([1, 9]);
  });

  it("reads check constraints as PostgreSQL renders them", () => {
    const price = mapColumn({
      table: "product",
      name: "price",
      dbType: "numeric(6,2)",
      checks: ["(price > (0)::numeric)"],
    });
    expect([price.min, price.max]).toEqual([0.01, 9999.99]);
  });

  it("uses name hints when nothing else constrains the column", () => {
    const age = mapColumn({ table: "person", name: "age", dbType: "smallint" });
    expect([age.min, age.max]).toEqual([18, 100]);
    expect(mapColumn({ table: "person", name: "email", dbType: "varchar(100)" }).kind).toBe(
      "email",
    );
    const gender = mapColumn({ table: "person", name: "gender", dbType: "char(1)" });
    expect(gender.kind).toBe("choice");
    expect(gender.choices).toEqual(["M", "F"]);
    const city = mapColumn({ table: "person", name: "city", dbType: "varchar(30)" });
    expect(city.generator.label).toBe("faker:location.city");
  });

  it("numbers primary keys with a sequence", () => {
    const column = mapColumn({ table: "t", name: "id", dbType: "int4", isPrimaryKey: true });
    expect(column.generator.label).toBe("sequence");
    expect(column.nullable).toBe(false);
    expect([column.min, column.max]).toEqual([1, 2147483647]);
  });

  it("spans birth dates 20 to 60 years before the reference date", () => {
    const referenceDate = new Date("2024-06-01T00:00:00.000Z");
    const column = mapColumn(
      { table: "person", name: "birth_date", dbType: "date" },
      { referenceDate },
    );
    expect(column.kind).toBe("date");
    expect(column.min).toEqual(new Date(referenceDate.getTime() - 60 * MS_PER_YEAR));
    expect(column.max).toEqual(new Date(referenceDate.getTime() - 20 * MS_PER_YEAR));
  });

  it("applies overrides", () => {
    const status = mapColumn(
      { table: "t", name: "status", dbType: "varchar(10)" },
      {},
      { oneOf: ["x", "y"] },
    );
    expect(status.kind).toBe("choice");
    expect(status.choices).toEqual(["x", "y"]);

    const id = mapColumn(
      { table: "t", name: "id", dbType: "integer", isPrimaryKey: true },
      {},
      { min: 500, max: 600 },
    );
    expect(id.generator.label).toBe("integer");
    expect([id.min, id.max]).toEqual([500, 600]);

    expect(() =>
      mapColumn({ table: "t", name: "qty", dbType: "integer" }, {}, { faker: "person.jobTitle" }),
    ).toThrow("t.qty: faker overrides apply to text columns, not integer");
  });

  it("rejects override values that break the column contract when mapping", () => {
    const qty = { table: "t", name: "qty", dbType: "integer", isNullable: false };
    expect(() => mapColumn(qty, {}, { fixed: "abc" })).toThrow(ConfigurationError);
    expect(() => mapColumn(qty, {}, { fixed: "abc" })).toThrow(
      't.qty: Generator "fixed" can produce "abc", which is not a valid integer value',
    );
    expect(() =>
      mapColumn({ table: "t", name: "code", dbType: "varchar(5)" }, {}, { fixed: "toolong" }),
    ).toThrow('t.code: Generator "fixed" can produce 7 characters, more than 5');
    expect(() =>
      mapColumn({ table: "t", name: "status", dbType: "varchar(3)" }, {}, { oneOf: ["new", "open"] }),
    ).toThrow('t.status: Generator "choice" can produce 4 characters, more than 3');
  });

  it("rejects faker methods that do not return text, numbers or booleans", () => {
    expect(() =>
      mapColumn({ table: "t", name: "note", dbType: "text" }, {}, { faker: "date.past" }),
    ).toThrow("t.note: Faker method date.past returns a Date, not text, a number or a boolean");

    const words = mapColumn({ table: "t", name: "note", dbType: "text" }, {}, { faker: "lorem.word" });
    expect(words.generator.label).toBe("faker:lorem.word");
  });

  it("reads fixed datetime overrides as dates", () => {
    const column = mapColumn(
      { table: "t", name: "created_at", dbType: "timestamp" },
      { referenceDate: new Date("2024-06-01T00:00:00.000Z") },
      { fixed: "2020-05-01T00:00:00.000Z" },
    );
    expect(column.generateValue(createRandomSource("test-seed"))).toEqual(
      new Date("2020-05-01T00:00:00.000Z"),
    );
  });
});

const blogSchema = SchemaModelSchema.parse({
  tables: {
    post: {
      name: "post",
      columns: {
        id: { name: "id", dbType: "serial", isNullable: false },
        title: { name: "title", dbType: "varchar(80)", isNullable: false },
        author_id: { name: "author_id", dbType: "integer", isNullable: true },
      },
      primaryKey: ["id"],
      foreignKeys: [
        { constraintName: "post_author_fk", columns: ["author_id"], refTable: "author", refColumns: ["id"] },
      ],
    },
    author: {
      name: "author",
      columns: { id: { name: "id", dbType: "serial", isNullable: false } },
      primaryKey: ["id"],
    },
    tag: {
      name: "tag",
      columns: {
        id: { name: "id", dbType: "serial", isNullable: false },
        label: { name: "label", dbType: "varchar(20)", isNullable: false },
      },
      primaryKey: ["id"],
    },
    post_tag: {
      name: "post_tag",
      columns: {
        post_id: { name: "post_id", dbType: "integer", isNullable: false },
        tag_id: { name: "tag_id", dbType: "integer", isNullable: false },
      },
      primaryKey: ["post_id", "tag_id"],
      foreignKeys: [
        { constraintName: "post_tag_post_fk", columns: ["post_id"], refTable: "post", refColumns: ["id"] },
        { constraintName: "post_tag_tag_fk", columns: ["tag_id"], refTable: "tag", refColumns: ["id"] },
      ],
    },
  },
});

describe("mapSchema", () => {
  it("detects junction tables", () => {
    expect(isJunctionTable(blogSchema.tables.post_tag!)).toBe(true);
    expect(isJunctionTable(blogSchema.tables.post!)).toBe(false);
  });

  it("registers regular tables and turns junctions into many-to-many relations", () => {
    const registry = mapSchema(blogSchema, {
      overrides: { post: { relations: { post_tag: { minRelated: 2, maxRelated: 3 } } } },
    });
    expect(registry.names()).toEqual(["post", "author", "tag"]);

    const [authorRef, tags] = registry.get("post").relations;
    expect(authorRef).toBeInstanceOf(OneToManyRelation);
    expect(authorRef?.nullable).toBe(true);
    expect(tags).toBeInstanceOf(ManyToManyRelation);
    expect(tags?.describe()).toEqual({
      kind: "many-to-many",
      fromTable: "post",
      fromColumn: "id",
      toTable: "tag",
      toColumn: "id",
      nullable: false,
      minRelated: 2,
      maxRelated: 3,
      poolSize: 10,
      junctionTable: "post_tag",
      junctionFromColumn: "post_id",
      junctionToColumn: "tag_id",
    });
  });

  it("rejects composite foreign keys", () => {
    const schema = SchemaModelSchema.parse({
      tables: {
        line: {
          name: "line",
          columns: {
            order_id: { name: "order_id", dbType: "integer" },
            order_rev: { name: "order_rev", dbType: "integer" },
          },
          foreignKeys: [
            {
              constraintName: "line_order_fk",
              columns: ["order_id", "order_rev"],
              refTable: "order",
              refColumns: ["id", "rev"],
            },
          ],
        },
      },
    });
    expect(() => mapSchema(schema)).toThrow(ConfigurationError);
    expect(() => mapSchema(schema)).toThrow("line: Composite foreign key line_order_fk is not supported");
  });
});
