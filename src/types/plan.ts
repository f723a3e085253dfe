// src/types/plan.ts
import type { RandomSource } from "./rng.js";

export type TablePlan = {
  table: string;
  rowCount: number;
  // Tables this one draws keys from
  dependsOn: string[];
  // Junction tables filled while this table generates
  junctions: string[];
};

export type GenerationPlan = {
  seed: string;
  tableOrder: string[];
  tablePlans: Map<string, TablePlan>;
  source: RandomSource;
};
