// src/types/config.ts
import { z } from "zod";
import {
  GenerationConfigSchema,
  TableConfig as TableConfigVal,
  ColumnOverride as ColumnOverrideVal,
  RelationOverride as RelationOverrideVal,
} from "../models/config.js";

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type TableConfig = z.infer<typeof TableConfigVal>;
export type ColumnOverride = z.infer<typeof ColumnOverrideVal>;
export type RelationOverride = z.infer<typeof RelationOverrideVal>;
