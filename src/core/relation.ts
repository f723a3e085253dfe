// src/core/relation.ts
import type { RandomSource } from "../types/rng.js";
import type { KeyValue } from "../types/data.js";
import { pickNRandom, randomInt } from "../util/rng.js";
import {
  ConfigurationError,
  EmptyPoolError,
  InsufficientPoolError,
  type ErrorContext,
} from "./errors.js";

export type RelationConfigOptions = {
  minRelated?: number;
  maxRelated?: number;
  poolSize?: number;
};

/**
 * Cardinality bounds for a relation. `poolSize` is the number of target keys
 * a relation draws from; it must cover the maximum fan-out.
 */
export class RelationConfig {
  static readonly DEFAULTS = { minRelated: 1, maxRelated: 5, poolSize: 10 } as const;

  readonly minRelated: number;
  readonly maxRelated: number;
  readonly poolSize: number;

  constructor(options: RelationConfigOptions = {}) {
    this.minRelated = options.minRelated ?? RelationConfig.DEFAULTS.minRelated;
    this.maxRelated = options.maxRelated ?? RelationConfig.DEFAULTS.maxRelated;
    this.poolSize = options.poolSize ?? RelationConfig.DEFAULTS.poolSize;

    for (const [name, value] of Object.entries({
      minRelated: this.minRelated,
      maxRelated: this.maxRelated,
      poolSize: this.poolSize,
    })) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative integer (got ${value})`);
      }
    }
    if (this.minRelated > this.maxRelated) {
      throw new ConfigurationError(
        `minRelated (${this.minRelated}) is greater than maxRelated (${this.maxRelated})`,
      );
    }
    if (this.poolSize < this.maxRelated) {
      throw new ConfigurationError(
        `poolSize (${this.poolSize}) is smaller than maxRelated (${this.maxRelated})`,
      );
    }
  }
}

export type RelationKind = "one-to-many" | "many-to-many";

export type RelationDescription = {
  kind: RelationKind;
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
  nullable: boolean;
  minRelated: number;
  maxRelated: number;
  poolSize: number;
  junctionTable?: string;
  junctionFromColumn?: string;
  junctionToColumn?: string;
};

type RelationOptions = {
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
  config?: RelationConfig | RelationConfigOptions;
};

/**
 * Directed link from `fromTable.fromColumn` to `toTable.toColumn`. Relations
 * hold no state; the key pool they draw from belongs to the caller.
 */
export abstract class Relation {
  abstract readonly kind: RelationKind;
  readonly fromTable: string;
  readonly fromColumn: string;
  readonly toTable: string;
  readonly toColumn: string;
  readonly config: RelationConfig;

  protected constructor(options: RelationOptions) {
    this.fromTable = options.fromTable;
    this.fromColumn = options.fromColumn;
    this.toTable = options.toTable;
    this.toColumn = options.toColumn;
    this.config =
      options.config instanceof RelationConfig
        ? options.config
        : new RelationConfig(options.config);
  }

  /** e.g. `order.customer_id -> customer.id` */
  get name(): string {
    return `${this.fromTable}.${this.fromColumn} -> ${this.toTable}.${this.toColumn}`;
  }

  get nullable(): boolean {
    return false;
  }

  describe(): RelationDescription {
    return {
      kind: this.kind,
      fromTable: this.fromTable,
      fromColumn: this.fromColumn,
      toTable: this.toTable,
      toColumn: this.toColumn,
      nullable: this.nullable,
      minRelated: this.config.minRelated,
      maxRelated: this.config.maxRelated,
      poolSize: this.config.poolSize,
    };
  }

  /** Number of pool entries this relation may draw from. */
  protected available(pool: readonly KeyValue[]): number {
    return Math.min(pool.length, this.config.poolSize);
  }

  protected errorContext(): ErrorContext {
    return { table: this.fromTable, column: this.fromColumn, relation: this.name };
  }
}

/**
 * Foreign-key style reference: every from-row points at one target key.
 */
export class OneToManyRelation extends Relation {
  readonly kind = "one-to-many" as const;
  private readonly optional: boolean;

  constructor(options: RelationOptions & { nullable?: boolean }) {
    super(options);
    this.optional = options.nullable ?? false;
  }

  override get nullable(): boolean {
    return this.optional;
  }

  /**
   * Pick one key uniformly from the first `poolSize` keys of `pool`.
   * An empty pool yields null for nullable relations.
   */
  resolve(source: RandomSource, pool: readonly KeyValue[]): KeyValue | null {
    const available = this.available(pool);
    if (available === 0) {
      if (this.optional) return null;
      throw new EmptyPoolError(
        `No ${this.toTable}.${this.toColumn} keys available to reference`,
        this.errorContext(),
      );
    }
    return pool[randomInt(source.rng, 0, available - 1)]!;
  }
}

export type ManyToManyOptions = RelationOptions & {
  junctionTable: string;
  junctionFromColumn?: string;
  junctionToColumn?: string;
};

/**
 * Pairs each from-row with several distinct target keys through a junction table.
 */
export class ManyToManyRelation extends Relation {
  readonly kind = "many-to-many" as const;
  readonly junctionTable: string;
  readonly junctionFromColumn: string;
  readonly junctionToColumn: string;

  constructor(options: ManyToManyOptions) {
    super(options);
    this.junctionTable = options.junctionTable;
    this.junctionFromColumn =
      options.junctionFromColumn ?? `${options.fromTable}_${options.fromColumn}`;
    this.junctionToColumn =
      options.junctionToColumn ?? `${options.toTable}_${options.toColumn}`;

    if (this.junctionFromColumn === this.junctionToColumn) {
      throw new ConfigurationError(
        `Junction columns must differ (both are "${this.junctionFromColumn}")`,
        { table: this.junctionTable },
      );
    }
  }

  /**
   * Draw between `minRelated` and `maxRelated` distinct keys. The upper bound
   * is capped to the available pool; falling short of the lower bound is an error.
   */
  resolve(source: RandomSource, pool: readonly KeyValue[]): KeyValue[] {
    const available = this.available(pool);
    const { minRelated, maxRelated } = this.config;
    if (available < minRelated) {
      throw new InsufficientPoolError(available, minRelated, this.errorContext());
    }
    const count = randomInt(source.rng, minRelated, Math.min(maxRelated, available));
    return pickNRandom(source.rng, pool, count, available);
  }

  override describe(): RelationDescription {
    return {
      ...super.describe(),
      junctionTable: this.junctionTable,
      junctionFromColumn: this.junctionFromColumn,
      junctionToColumn: this.junctionToColumn,
    };
  }
}

export type AnyRelation = OneToManyRelation | ManyToManyRelation;
