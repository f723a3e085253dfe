// src/core/errors.ts

export type ErrorContext = {
  table?: string;
  column?: string;
  relation?: string;
};

/**
 * Base class for every error the generator raises. None of them are transient:
 * they describe a setup or schema problem and are never retried.
 */
export class RowforgeError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(withContext(message, context));
    this.name = new.target.name;
    this.context = context;
  }
}

/** Invalid constraints or options at construction time. */
export class ConfigurationError extends RowforgeError {}

/** The schema mapper met a SQL type family it does not know. */
export class UnsupportedTypeError extends RowforgeError {
  readonly sqlType: string;

  constructor(sqlType: string, context: ErrorContext = {}) {
    super(`Unsupported SQL type "${sqlType}"`, context);
    this.sqlType = sqlType;
  }
}

/** A non-nullable relation had no target keys to reference. */
export class EmptyPoolError extends RowforgeError {}

/** A many-to-many relation cannot reach its minimum fan-out. */
export class InsufficientPoolError extends RowforgeError {
  readonly available: number;
  readonly required: number;

  constructor(available: number, required: number, context: ErrorContext = {}) {
    super(
      `Key pool holds ${available} candidate(s) but at least ${required} are required`,
      context,
    );
    this.available = available;
    this.required = required;
  }
}

/** Generation was requested before the table model was configured. */
export class NotConfiguredError extends RowforgeError {}

/** A value generator produced a value outside its column's constraints. */
export class GeneratorContractError extends RowforgeError {}

export class InvalidArgumentError extends RowforgeError {}

export class CyclicDependencyError extends RowforgeError {
  readonly tables: string[];

  constructor(tables: string[]) {
    super(`Circular dependency detected involving tables: ${tables.join(", ")}`);
    this.tables = tables;
  }
}

function withContext(message: string, context: ErrorContext): string {
  const parts: string[] = [];
  if (context.table) {
    parts.push(context.column ? `${context.table}.${context.column}` : context.table);
  } else if (context.column) {
    parts.push(context.column);
  }
  if (context.relation) parts.push(`relation ${context.relation}`);
  return parts.length > 0 ? `${parts.join(", ")}: ${message}` : message;
}
