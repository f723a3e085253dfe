// src/core/plan.ts
import type { TablePlan, GenerationPlan } from "../types/plan.js";
import { toposort } from "../util/toposort.js";
import { createRandomSource } from "../util/rng.js";
import { ManyToManyRelation } from "./relation.js";
import type { ModelRegistry } from "./registry.js";
import { ConfigurationError, InvalidArgumentError } from "./errors.js";

export type PlanOptions = {
  seed?: number | string;
  defaultCount?: number;
  counts?: Record<string, number | undefined>;
};

const DEFAULT_COUNT = 10;

/**
 * Build a generation plan: validate relation targets, order tables so that
 * referenced tables come first, and fix each table's row count.
 */
export function buildPlan(
  registry: ModelRegistry,
  options: PlanOptions = {},
): GenerationPlan {
  const source = createRandomSource(options.seed ?? Date.now());
  const tables = registry.names();
  const edges: Array<{ from: string; to: string }> = [];

  for (const model of registry.all()) {
    for (const relation of model.relations) {
      if (!registry.has(relation.toTable)) {
        throw new ConfigurationError(`Relation targets unknown table "${relation.toTable}"`, {
          table: model.name,
          relation: relation.name,
        });
      }
      if (!registry.get(relation.toTable).columns.has(relation.toColumn)) {
        throw new ConfigurationError(
          `Relation targets unknown column "${relation.toTable}.${relation.toColumn}"`,
          { table: model.name, relation: relation.name },
        );
      }
      edges.push({ from: model.name, to: relation.toTable });
    }
  }

  for (const [table, count] of Object.entries(options.counts ?? {})) {
    if (!registry.has(table)) {
      throw new ConfigurationError(`Row count given for unknown table "${table}"`);
    }
    assertCount(table, count);
  }

  const tableOrder = toposort(tables, edges);
  const tablePlans = new Map<string, TablePlan>();

  for (const table of tableOrder) {
    const model = registry.get(table);
    const rowCount = options.counts?.[table] ?? options.defaultCount ?? DEFAULT_COUNT;
    assertCount(table, rowCount);

    tablePlans.set(table, {
      table,
      rowCount,
      dependsOn: [...new Set(model.relations.map((r) => r.toTable))],
      junctions: model.relations
        .filter((r): r is ManyToManyRelation => r instanceof ManyToManyRelation)
        .map((r) => r.junctionTable),
    });
  }

  return {
    seed: source.seed,
    tableOrder,
    tablePlans,
    source,
  };
}

function assertCount(table: string, count: number | undefined): void {
  if (count != null && (!Number.isInteger(count) || count < 0)) {
    throw new InvalidArgumentError(`Row count must be a non-negative integer (got ${count})`, {
      table,
    });
  }
}
