// src/util/load.ts
import type { ZodType, ZodTypeDef } from "zod";
import { SchemaModelSchema } from "../models/schema.js";
import { GenerationConfigSchema } from "../models/config.js";
import type { SchemaModel } from "../types/schema.js";
import type { GenerationConfig } from "../types/config.js";
import { ConfigurationError } from "../core/errors.js";
import { readJsonFile } from "./fs.js";

export async function loadSchema(filePath: string): Promise<SchemaModel> {
  return parseFile(filePath, "schema", SchemaModelSchema);
}

/** Config file is optional; without one every table gets the defaults. */
export async function loadConfig(filePath?: string): Promise<GenerationConfig> {
  if (!filePath) return GenerationConfigSchema.parse({});
  return parseFile(filePath, "config", GenerationConfigSchema);
}

/**
 * Validate already-parsed JSON, turning zod issues into a ConfigurationError.
 */
export function parseWith<T>(
  label: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  raw: unknown,
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${label}: ${issues}`);
  }
  return result.data;
}

async function parseFile<T>(
  filePath: string,
  label: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid ${label} file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return parseWith(`${label} file ${filePath}`, schema, raw);
}
