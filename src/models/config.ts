// src/models/config.ts
import { z } from "zod";

/**
 * Bound accepted in config files: a number, or an ISO date string for
 * datetime/date columns.
 */
const BoundValue = z.union([z.number(), z.string().datetime({ offset: true }), z.string().date()]);

/**
 * Column overrides: the recognised per-column options. At most one of
 * `fixed`, `oneOf` and `faker` replaces the generator.
 */
export const ColumnOverride = z
  .object({
    nullable: z.boolean().optional(),
    nullRate: z.number().min(0).max(1).optional(),
    min: BoundValue.optional(),
    max: BoundValue.optional(),
    maxLength: z.number().int().nonnegative().optional(),
    fixed: z.union([z.string(), z.number(), z.boolean()]).optional(),
    oneOf: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1).optional(),
    weights: z.array(z.number().min(0)).optional(),
    faker: z.string().min(1).optional(),
  })
  .refine(
    (v) =>
      [v.fixed != null, v.oneOf != null, v.faker != null].filter(Boolean).length <= 1,
    { message: "Choose only one of: fixed, oneOf, faker" },
  )
  .refine((v) => v.weights == null || v.oneOf != null, {
    message: "weights require oneOf",
    path: ["weights"],
  })
  .refine((v) => v.weights == null || v.weights.length === v.oneOf?.length, {
    message: "weights must match oneOf in length",
    path: ["weights"],
  });

/**
 * Relation cardinality, keyed by the relation's from-column (or, for
 * many-to-many, by the junction table name).
 */
export const RelationOverride = z
  .object({
    minRelated: z.number().int().nonnegative().optional(),
    maxRelated: z.number().int().nonnegative().optional(),
    poolSize: z.number().int().nonnegative().optional(),
  })
  .refine(
    (v) => v.minRelated == null || v.maxRelated == null || v.maxRelated >= v.minRelated,
    { message: "maxRelated must be >= minRelated", path: ["maxRelated"] },
  );

export const TableConfig = z.object({
  count: z.number().int().nonnegative().optional(),

  // columnName -> override
  columns: z.record(z.string(), ColumnOverride).optional(),

  // fromColumn | junction table -> cardinality
  relations: z.record(z.string(), RelationOverride).optional(),
});

export const GenerationConfigSchema = z.object({
  seed: z.union([z.number().int(), z.string()]).optional(),

  /** Anchor for default datetime spans; defaults to the current time. */
  referenceDate: z.string().datetime({ offset: true }).optional(),

  defaultCount: z.number().int().nonnegative().default(10),

  // tableName -> TableConfig
  tables: z.record(z.string(), TableConfig).default({}),
});
