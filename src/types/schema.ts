// src/types/schema.ts
import { z } from "zod";
import {
  SchemaModelSchema,
  TableSchema as TableSchemaVal,
  ColumnSchema as ColumnSchemaVal,
  ForeignKeySchema,
} from "../models/schema.js";

export type SchemaModel = z.infer<typeof SchemaModelSchema>;
export type TableSchema = z.infer<typeof TableSchemaVal>;
export type ColumnSchema = z.infer<typeof ColumnSchemaVal>;
export type ForeignKey = z.infer<typeof ForeignKeySchema>;

/** Raw facts about one column, as handed to the schema mapper. */
export type SchemaColumnMetadata = z.input<typeof ColumnSchemaVal> & {
  table: string;
  /** Check constraint expressions of the owning table. */
  checks?: string[];
};
