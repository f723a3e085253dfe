// src/core/registry.ts
import type { TableModel } from "./table_model.js";
import { ConfigurationError } from "./errors.js";

/**
 * Table models by name. Registering configures the model.
 */
export class ModelRegistry {
  private readonly models = new Map<string, TableModel>();

  register(model: TableModel): this {
    if (this.models.has(model.name)) {
      throw new ConfigurationError("Table model registered twice", { table: model.name });
    }
    this.models.set(model.name, model.configure());
    return this;
  }

  get(name: string): TableModel {
    const model = this.models.get(name);
    if (!model) {
      throw new ConfigurationError(`Model for table "${name}" not found in registry`);
    }
    return model;
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  names(): string[] {
    return [...this.models.keys()];
  }

  all(): TableModel[] {
    return [...this.models.values()];
  }
}
