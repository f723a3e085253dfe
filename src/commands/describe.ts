// src/commands/describe.ts
import { Command } from "commander";
import { loadConfig, loadSchema } from "../util/load.js";
import { mapSchema } from "../core/schema_mapper.js";
import { errorMessage } from "../util/helper.js";
import type { DescribeOptions } from "../types/commands/generate.type.js";

export function describeCmd(): Command {
  const cmd = new Command("describe");

  cmd
    .description("Print the table models mapped from a schema file")
    .requiredOption("-s, --schema <file>", "Path to schema JSON file")
    .option("-c, --config <file>", "Path to generation config JSON file")
    .action(async (options: DescribeOptions) => {
      try {
        const schema = await loadSchema(options.schema);
        const config = await loadConfig(options.config);
        const registry = mapSchema(schema, {
          referenceDate: config.referenceDate ? new Date(config.referenceDate) : undefined,
          overrides: config.tables,
        });

        const descriptions = registry.all().map((model) => model.describe());
        console.log(JSON.stringify(descriptions, null, 2));
      } catch (error) {
        console.error("❌ Describe failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}
