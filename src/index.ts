// src/index.ts
export * from "./core/errors.js";
export * from "./core/generators.js";
export { Column, type ColumnKind, type ColumnOptions, type ColumnDescription } from "./core/column.js";
export * from "./core/relation.js";
export { KeyPools, JunctionCollector } from "./core/pools.js";
export * from "./core/table_model.js";
export { ModelRegistry } from "./core/registry.js";
export {
  mapColumn,
  mapTable,
  mapSchema,
  isJunctionTable,
  parseSqlType,
  type MapperOptions,
} from "./core/schema_mapper.js";
export { buildPlan, type PlanOptions } from "./core/plan.js";
export { generateRows, type GeneratedDataset } from "./core/generate_rows.js";
export { emitSql, emitJson } from "./core/emit_sql.js";
export { createRandomSource } from "./util/rng.js";
export { loadSchema, loadConfig } from "./util/load.js";
export { SchemaModelSchema } from "./models/schema.js";
export { GenerationConfigSchema } from "./models/config.js";
export type * from "./types/data.js";
export type * from "./types/rng.js";
export type * from "./types/schema.js";
export type * from "./types/config.js";
export type * from "./types/plan.js";
