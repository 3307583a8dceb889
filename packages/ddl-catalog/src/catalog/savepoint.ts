/**
 * Statement Savepoints
 *
 * A savepoint is an undo journal for one statement. Before an object is
 * changed the builder records it; the first record of each object captures
 * its state. Rolling back puts every recorded object back in place, so
 * Schema, Table, Column and constraint references held by readers stay
 * valid and keep following the live catalog.
 *
 * Objects created under the savepoint need no record: rolling back their
 * parent's membership drops them.
 */

import type { Catalog, CatalogState, Schema, SchemaState, Table, TableState } from './catalog.js';

export class Savepoint {
  /** Savepoint name, for logging */
  readonly name: string;
  /** Timestamp when savepoint was created */
  readonly timestamp: number;

  private readonly catalog: Catalog;
  private catalogState?: CatalogState;
  private readonly schemaStates = new Map<Schema, SchemaState>();
  private readonly tableStates = new Map<Table, TableState>();

  constructor(catalog: Catalog, name: string) {
    this.catalog = catalog;
    this.name = name;
    this.timestamp = Date.now();
  }

  /**
   * Record the catalog's schema membership
   */
  recordCatalog(): void {
    this.catalogState ??= this.catalog.captureState();
  }

  /**
   * Record a schema's tables, types and comment
   */
  recordSchema(schema: Schema): void {
    if (!this.schemaStates.has(schema)) {
      this.schemaStates.set(schema, schema.captureState());
    }
  }

  /**
   * Record a table's name, columns, constraints and indexes
   */
  recordTable(table: Table): void {
    if (!this.tableStates.has(table)) {
      this.tableStates.set(table, table.captureState());
    }
  }

  /**
   * Number of objects recorded so far
   */
  get size(): number {
    return this.tableStates.size + this.schemaStates.size + (this.catalogState ? 1 : 0);
  }

  rollback(): void {
    for (const [table, state] of this.tableStates) {
      table.restoreState(state);
    }
    for (const [schema, state] of this.schemaStates) {
      schema.restoreState(state);
    }
    if (this.catalogState) {
      this.catalog.restoreState(this.catalogState);
    }
  }
}

export function createSavepoint(catalog: Catalog, name: string): Savepoint {
  return new Savepoint(catalog, name);
}

export function rollbackToSavepoint(savepoint: Savepoint): void {
  savepoint.rollback();
}

/**
 * Run `fn` under a fresh savepoint; if it throws, roll back and rethrow
 */
export function executeWithSavepoint<T>(catalog: Catalog, name: string, fn: (savepoint: Savepoint) => T): T {
  const savepoint = createSavepoint(catalog, name);
  try {
    return fn(savepoint);
  } catch (error) {
    rollbackToSavepoint(savepoint);
    throw error;
  }
}
