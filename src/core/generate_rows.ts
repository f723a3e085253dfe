// src/core/generate_rows.ts
import type { GenerationPlan } from "../types/plan.js";
import type { GeneratedData, GeneratedRow, JunctionRow } from "../types/data.js";
import type { ModelRegistry } from "./registry.js";
import { JunctionCollector, KeyPools } from "./pools.js";

export type GeneratedDataset = {
  seed: string;
  tableOrder: string[];
  tables: GeneratedData;
  junctions: Map<string, JunctionRow[]>;
};

/**
 * Generate all rows based on the plan. Each table's referenced key pools are
 * registered before it generates and filled as its rows are produced, so
 * later tables (and nullable self-references) draw from real keys.
 */
export function generateRows(
  registry: ModelRegistry,
  plan: GenerationPlan,
): GeneratedDataset {
  const data: GeneratedData = new Map();
  const pools = new KeyPools();
  const junctions = new JunctionCollector();

  // Columns other tables reference, per table
  const referenced = new Map<string, Set<string>>();
  for (const model of registry.all()) {
    for (const relation of model.relations) {
      const columns = referenced.get(relation.toTable) ?? new Set<string>();
      columns.add(relation.toColumn);
      referenced.set(relation.toTable, columns);
    }
  }

  for (const tableName of plan.tableOrder) {
    const tablePlan = plan.tablePlans.get(tableName);
    if (!tablePlan) continue;

    const model = registry.get(tableName);
    const keyColumns = referenced.get(tableName) ?? new Set<string>();
    for (const column of keyColumns) pools.ensure(tableName, column);

    const rows: GeneratedRow[] = [];
    for (const row of model.generateRows(tablePlan.rowCount, plan.source, {
      pools,
      junctions,
    })) {
      rows.push(row);
      pools.collect(tableName, row, keyColumns);
    }

    data.set(tableName, rows);
  }

  return {
    seed: plan.seed,
    tableOrder: plan.tableOrder,
    tables: data,
    junctions: junctions.toMap(),
  };
}
