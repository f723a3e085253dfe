import { describe, it, expect } from "vitest";
import { SchemaModelSchema } from "../src/models/schema.js";
import { mapSchema } from "../src/core/schema_mapper.js";
import { buildPlan } from "../src/core/plan.js";
import { generateRows } from "../src/core/generate_rows.js";
import {
  ConfigurationError,
  CyclicDependencyError,
  InvalidArgumentError,
} from "../src/core/errors.js";

const shopSchema = SchemaModelSchema.parse({
  tables: {
    orders: {
      name: "orders",
      columns: {
        id: { name: "id", dbType: "serial", isNullable: false },
        customer_id: { name: "customer_id", dbType: "integer", isNullable: false },
        placed_at: { name: "placed_at", dbType: "timestamptz", isNullable: false },
      },
      primaryKey: ["id"],
      foreignKeys: [
        { constraintName: "orders_customer_fk", columns: ["customer_id"], refTable: "customer", refColumns: ["id"] },
      ],
    },
    customer: {
      name: "customer",
      columns: {
        id: { name: "id", dbType: "serial", isNullable: false },
        email: { name: "email", dbType: "varchar(120)", isNullable: false },
      },
      primaryKey: ["id"],
    },
  },
});

const options = { referenceDate: new Date("2024-06-01T00:00:00.000Z") };

describe("buildPlan", () => {
  it("orders referenced tables first and fixes row counts", () => {
    const registry = mapSchema(shopSchema, options);
    const plan = buildPlan(registry, { seed: 42, defaultCount: 4, counts: { customer: 3 } });

    expect(plan.seed).toBe("42");
    expect(plan.tableOrder).toEqual(["customer", "orders"]);
    expect(plan.tablePlans.get("customer")).toEqual({
      table: "customer",
      rowCount: 3,
      dependsOn: [],
      junctions: [],
    });
    expect(plan.tablePlans.get("orders")?.rowCount).toBe(4);
    expect(plan.tablePlans.get("orders")?.dependsOn).toEqual(["customer"]);
  });

  it("rejects counts for unknown tables and negative counts", () => {
    const registry = mapSchema(shopSchema, options);
    expect(() => buildPlan(registry, { counts: { invoice: 2 } })).toThrow(
      'Row count given for unknown table "invoice"',
    );
    expect(() => buildPlan(registry, { counts: { orders: -1 } })).toThrow(InvalidArgumentError);
  });

  it("rejects relations to tables outside the registry", () => {
    const schema = SchemaModelSchema.parse({
      tables: {
        orders: {
          name: "orders",
          columns: { customer_id: { name: "customer_id", dbType: "integer" } },
          foreignKeys: [
            { constraintName: "fk", columns: ["customer_id"], refTable: "customer", refColumns: ["id"] },
          ],
        },
      },
    });
    expect(() => buildPlan(mapSchema(schema))).toThrow(ConfigurationError);
  });

  it("detects dependency cycles", () => {
    const schema = SchemaModelSchema.parse({
      tables: {
        a: {
          name: "a",
          columns: {
            id: { name: "id", dbType: "serial", isNullable: false },
            b_id: { name: "b_id", dbType: "integer" },
          },
          primaryKey: ["id"],
          foreignKeys: [{ constraintName: "a_b", columns: ["b_id"], refTable: "b", refColumns: ["id"] }],
        },
        b: {
          name: "b",
          columns: {
            id: { name: "id", dbType: "serial", isNullable: false },
            a_id: { name: "a_id", dbType: "integer" },
          },
          primaryKey: ["id"],
          foreignKeys: [{ constraintName: "b_a", columns: ["a_id"], refTable: "a", refColumns: ["id"] }],
        },
      },
    });
    expect(() => buildPlan(mapSchema(schema))).toThrow(CyclicDependencyError);
  });
});

describe("generateRows", () => {
  it("draws foreign keys from rows generated earlier", () => {
    const registry = mapSchema(shopSchema, options);
    const plan = buildPlan(registry, { seed: "test-seed", counts: { customer: 3, orders: 10 } });
    const dataset = generateRows(registry, plan);

    const customers = dataset.tables.get("customer") ?? [];
    const orders = dataset.tables.get("orders") ?? [];
    expect(customers.map((row) => row.id)).toEqual([1, 2, 3]);
    expect(orders).toHaveLength(10);
    for (const order of orders) {
      expect([1, 2, 3]).toContain(order.customer_id);
      expect(order.placed_at).toBeInstanceOf(Date);
    }
    expect(dataset.junctions.size).toBe(0);
  });

  it("is reproducible for a seed", () => {
    const registry = mapSchema(shopSchema, options);
    const first = generateRows(registry, buildPlan(registry, { seed: "test-seed" }));
    const second = generateRows(registry, buildPlan(registry, { seed: "test-seed" }));
    expect(second.tables).toEqual(first.tables);
  });

  it("lets nullable self-references point at earlier rows", () => {
    const schema = SchemaModelSchema.parse({
      tables: {
        employee: {
          name: "employee",
          columns: {
            id: { name: "id", dbType: "serial", isNullable: false },
            manager_id: { name: "manager_id", dbType: "integer", isNullable: true },
          },
          primaryKey: ["id"],
          foreignKeys: [
            { constraintName: "employee_manager_fk", columns: ["manager_id"], refTable: "employee", refColumns: ["id"] },
          ],
        },
      },
    });
    const registry = mapSchema(schema);
    const dataset = generateRows(registry, buildPlan(registry, { seed: "test-seed", defaultCount: 5 }));
    const rows = dataset.tables.get("employee") ?? [];

    expect(rows[0]?.manager_id).toBeNull();
    expect(rows[1]?.manager_id).toBe(1);
    rows.forEach((row, i) => {
      if (i > 0) expect(row.manager_id).toBeLessThanOrEqual(i);
    });
  });

  it("fills junction tables for many-to-many relations", () => {
    const schema = SchemaModelSchema.parse({
      tables: {
        post: {
          name: "post",
          columns: { id: { name: "id", dbType: "serial", isNullable: false } },
          primaryKey: ["id"],
        },
        tag: {
          name: "tag",
          columns: { id: { name: "id", dbType: "serial", isNullable: false } },
          primaryKey: ["id"],
        },
        post_tag: {
          name: "post_tag",
          columns: {
            post_id: { name: "post_id", dbType: "integer", isNullable: false },
            tag_id: { name: "tag_id", dbType: "integer", isNullable: false },
          },
          foreignKeys: [
            { constraintName: "pt_post", columns: ["post_id"], refTable: "post", refColumns: ["id"] },
            { constraintName: "pt_tag", columns: ["tag_id"], refTable: "tag", refColumns: ["id"] },
          ],
        },
      },
    });
    const registry = mapSchema(schema, {
      overrides: { post: { relations: { post_tag: { minRelated: 1, maxRelated: 2 } } } },
    });
    const plan = buildPlan(registry, { seed: "test-seed", counts: { post: 4, tag: 6 } });
    expect(plan.tableOrder).toEqual(["tag", "post"]);
    expect(plan.tablePlans.get("post")?.junctions).toEqual(["post_tag"]);

    const dataset = generateRows(registry, plan);
    const pairs = dataset.junctions.get("post_tag") ?? [];
    for (const postId of [1, 2, 3, 4]) {
      const tags = pairs.filter((pair) => pair.post_id === postId).map((pair) => pair.tag_id);
      expect(tags.length).toBeGreaterThanOrEqual(1);
      expect(tags.length).toBeLessThanOrEqual(2);
      expect(new Set(tags).size).toBe(tags.length);
      for (const tag of tags) expect([1, 2, 3, 4, 5, 6]).toContain(tag);
    }
  });
});
