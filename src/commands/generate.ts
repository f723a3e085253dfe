// src/commands/generate.ts
import { Command, Option } from "commander";
import { writeFile } from "../util/fs.js";
import { loadConfig, loadSchema } from "../util/load.js";
import { mapSchema } from "../core/schema_mapper.js";
import { buildPlan } from "../core/plan.js";
import { generateRows } from "../core/generate_rows.js";
import { emitJson, emitSql } from "../core/emit_sql.js";
import { errorMessage, prefixPath } from "../util/helper.js";
import type { GenerationConfig } from "../types/config.js";
import type { GenerateOptions } from "../types/commands/generate.type.js";

export function generateCmd(): Command {
  const cmd = new Command("generate");

  cmd
    .description("Generate test data from a schema file and an optional config file")
    .requiredOption("-s, --schema <file>", "Path to schema JSON file")
    .option("-c, --config <file>", "Path to generation config JSON file")
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["sql", "json"])
        .default("sql")
    )
    .option(
      "-o, --output <file>",
      "Output file path (defaults to stdout, auto-prefixes output/ for relative paths)"
    )
    .option("--seed <seed>", "Seed for the random source (overrides the config seed)")
    .option("--dry-run", "Show plan without generating data")
    .action(async (options: GenerateOptions) => {
      try {
        await runGenerate(options);
      } catch (error) {
        console.error("❌ Generation failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}

async function runGenerate(options: GenerateOptions): Promise<void> {
  const output = prefixPath("output", options.output);

  console.error("📄 Loading schema...");
  const schema = await loadSchema(options.schema);
  console.error(`✅ Schema loaded (${Object.keys(schema.tables).length} tables)`);

  console.error("📄 Loading config...");
  const config = await loadConfig(options.config);
  console.error(options.config ? "✅ Config loaded" : "✅ Using default config");

  console.error("🔧 Building generation plan...");
  const registry = mapSchema(schema, {
    referenceDate: config.referenceDate ? new Date(config.referenceDate) : undefined,
    overrides: config.tables,
  });
  const plan = buildPlan(registry, {
    seed: options.seed ?? config.seed,
    defaultCount: config.defaultCount,
    counts: tableCounts(config),
  });

  console.error("");
  console.error("📋 Generation Plan:");
  console.error(`   Seed: ${plan.seed}`);
  console.error(`   Table order: ${plan.tableOrder.join(" → ")}`);
  console.error("");
  for (const tableName of plan.tableOrder) {
    const tablePlan = plan.tablePlans.get(tableName);
    if (!tablePlan) continue;
    const junctions =
      tablePlan.junctions.length > 0 ? ` (+ ${tablePlan.junctions.join(", ")})` : "";
    console.error(`   ${tableName}: ${tablePlan.rowCount} rows${junctions}`);
  }
  console.error("");

  if (options.dryRun) {
    console.error("🚫 Dry run - skipping generation");
    return;
  }

  console.error("🎲 Generating data...");
  const dataset = generateRows(registry, plan);

  console.error(`📝 Emitting ${options.format.toUpperCase()}...`);
  const rendered = options.format === "json" ? emitJson(dataset) : emitSql(dataset);

  if (output) {
    await writeFile(output, rendered);
    console.error(`✅ Output written to ${output}`);
  } else {
    console.log(rendered);
  }

  let totalRows = 0;
  for (const rows of dataset.tables.values()) totalRows += rows.length;
  let junctionRows = 0;
  for (const rows of dataset.junctions.values()) junctionRows += rows.length;
  console.error(
    `\n✅ Generated ${totalRows} rows across ${dataset.tables.size} tables` +
      (junctionRows > 0 ? ` and ${junctionRows} junction rows` : "")
  );
}

function tableCounts(config: GenerationConfig): Record<string, number | undefined> {
  return Object.fromEntries(
    Object.entries(config.tables).map(([table, tableConfig]) => [table, tableConfig.count])
  );
}
