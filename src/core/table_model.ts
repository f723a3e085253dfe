// src/core/table_model.ts
import type { RandomSource } from "../types/rng.js";
import type { GeneratedRow } from "../types/data.js";
import { Column, type ColumnDescription, type ColumnOptions } from "./column.js";
import {
  ManyToManyRelation,
  type AnyRelation,
  type RelationDescription,
} from "./relation.js";
import { JunctionCollector, KeyPools } from "./pools.js";
import {
  ConfigurationError,
  GeneratorContractError,
  InvalidArgumentError,
  NotConfiguredError,
} from "./errors.js";

export type RowOptions = {
  /** Target key pools for relation resolution. */
  pools?: KeyPools;
  /** Receives junction rows from many-to-many relations; dropped when omitted. */
  junctions?: JunctionCollector;
  /** Index of the (first) row, fed to sequence generators. */
  rowIndex?: number;
};

export type TableDescription = {
  name: string;
  columns: Array<{ name: string } & ColumnDescription>;
  relations: RelationDescription[];
};

type TableState = "unconfigured" | "ready";

/**
 * Generation contract for one table. Concrete models declare their columns
 * and relations in `setupColumns` / `setupRelations`; `configure()` runs both
 * once and moves the model to `ready`.
 *
 * ```ts
 * class ProductTable extends TableModel {
 *   constructor() { super("product"); }
 *   protected setupColumns() {
 *     this.addColumn("id", { kind: "integer", min: 1, max: 1000 });
 *     this.addColumn("name", { kind: "string", maxLength: 50 });
 *   }
 * }
 * const rows = [...new ProductTable().configure().generateRows(5, source)];
 * ```
 */
export abstract class TableModel {
  readonly name: string;
  private readonly columnMap = new Map<string, Column>();
  private readonly relationList: AnyRelation[] = [];
  private state: TableState = "unconfigured";

  protected constructor(name: string) {
    if (!name) throw new ConfigurationError("Table name must not be empty");
    this.name = name;
  }

  protected abstract setupColumns(): void;

  protected setupRelations(): void {}

  get isConfigured(): boolean {
    return this.state === "ready";
  }

  get columns(): ReadonlyMap<string, Column> {
    return this.columnMap;
  }

  get relations(): readonly AnyRelation[] {
    return this.relationList;
  }

  protected addColumn(name: string, column: Column | ColumnOptions): this {
    this.assertMutable();
    if (this.columnMap.has(name)) {
      throw new ConfigurationError("Column declared twice", { table: this.name, column: name });
    }
    try {
      this.columnMap.set(name, column instanceof Column ? column : new Column(column));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(error.message, { table: this.name, column: name });
      }
      throw error;
    }
    return this;
  }

  protected addRelation(relation: AnyRelation): this {
    this.assertMutable();
    this.relationList.push(relation);
    return this;
  }

  configure(): this {
    if (this.state === "ready") return this;

    this.setupColumns();
    this.setupRelations();
    for (const relation of this.relationList) {
      this.validateRelation(relation);
    }

    this.state = "ready";
    return this;
  }

  /**
   * Generate one row: every column in declaration order, then every relation.
   * One-to-many relations overwrite their from-column with a key from the
   * target pool; many-to-many relations emit junction rows instead.
   */
  generateRow(source: RandomSource, options: RowOptions = {}): GeneratedRow {
    this.assertReady();
    const rowIndex = options.rowIndex ?? 0;
    const pools = options.pools ?? new KeyPools();

    const row: GeneratedRow = {};
    for (const [name, column] of this.columnMap) {
      row[name] = column.generateValue(source, {
        rowIndex,
        context: { table: this.name, column: name },
      });
    }

    for (const relation of this.relationList) {
      const pool = pools.get(relation.toTable, relation.toColumn);

      if (relation instanceof ManyToManyRelation) {
        const fromKey = row[relation.fromColumn];
        if (fromKey == null) {
          throw new GeneratorContractError("Many-to-many source key is null", {
            table: this.name,
            column: relation.fromColumn,
            relation: relation.name,
          });
        }
        for (const toKey of relation.resolve(source, pool)) {
          options.junctions?.add(relation.junctionTable, {
            [relation.junctionFromColumn]: fromKey,
            [relation.junctionToColumn]: toKey,
          });
        }
        continue;
      }

      // A nullable reference that already drew null stays null
      if (relation.nullable && row[relation.fromColumn] === null) continue;
      row[relation.fromColumn] = relation.resolve(source, pool);
    }

    return row;
  }

  /**
   * Lazily generate `n` rows. Arguments and state are checked on the call,
   * not on first iteration. Re-running with a source seeded the same way
   * reproduces the rows.
   */
  generateRows(
    n: number,
    source: RandomSource,
    options: RowOptions = {},
  ): IterableIterator<GeneratedRow> {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError(`Row count must be a non-negative integer (got ${n})`, {
        table: this.name,
      });
    }
    this.assertReady();
    return this.iterateRows(n, source, options);
  }

  describe(): TableDescription {
    return {
      name: this.name,
      columns: [...this.columnMap.entries()].map(([name, column]) => ({
        name,
        ...column.describe(),
      })),
      relations: this.relationList.map((relation) => relation.describe()),
    };
  }

  private *iterateRows(
    n: number,
    source: RandomSource,
    options: RowOptions,
  ): IterableIterator<GeneratedRow> {
    const start = options.rowIndex ?? 0;
    for (let i = 0; i < n; i++) {
      yield this.generateRow(source, { ...options, rowIndex: start + i });
    }
  }

  private validateRelation(relation: AnyRelation): void {
    const context = { table: this.name, relation: relation.name };
    if (relation.fromTable !== this.name) {
      throw new ConfigurationError(
        `Relation starts at table "${relation.fromTable}", not here`,
        context,
      );
    }
    const column = this.columnMap.get(relation.fromColumn);
    if (!column) {
      throw new ConfigurationError(`Unknown column "${relation.fromColumn}"`, context);
    }
    if (relation instanceof ManyToManyRelation && column.nullable) {
      throw new ConfigurationError(
        `Many-to-many source column "${relation.fromColumn}" must not be nullable`,
        context,
      );
    }
  }

  private assertMutable(): void {
    if (this.state === "ready") {
      throw new ConfigurationError("Table model is already configured", { table: this.name });
    }
  }

  private assertReady(): void {
    if (this.state !== "ready") {
      throw new NotConfiguredError("Call configure() before generating rows", {
        table: this.name,
      });
    }
  }
}

export type TableDeclaration = {
  name: string;
  columns: Iterable<[string, Column | ColumnOptions]> | Record<string, Column | ColumnOptions>;
  relations?: readonly AnyRelation[];
};

/**
 * Table model built from a plain declaration, as produced by the schema mapper.
 */
export class DeclaredTableModel extends TableModel {
  private readonly declaration: TableDeclaration;

  constructor(declaration: TableDeclaration) {
    super(declaration.name);
    this.declaration = declaration;
  }

  protected setupColumns(): void {
    const { columns } = this.declaration;
    const entries = isIterable(columns) ? columns : Object.entries(columns);
    for (const [name, column] of entries) {
      this.addColumn(name, column);
    }
  }

  protected override setupRelations(): void {
    for (const relation of this.declaration.relations ?? []) {
      this.addRelation(relation);
    }
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
