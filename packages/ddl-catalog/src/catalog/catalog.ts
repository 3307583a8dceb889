/**
 * Catalog Model
 *
 * Catalog → Schema → Table → Column tree with map-backed lookups that
 * iterate in declaration order. Foreign keys name their target tables and
 * are resolved against the catalog on use, so mutually referencing tables
 * never own each other.
 *
 * Mutating methods are for the catalog builder; consumers only read.
 *
 * @packageDocumentation
 */

import type {
  AnyConstraint,
  ForeignKeyConstraint,
  PrimaryKeyConstraint,
  UniqueConstraint,
} from '../constraints/types.js';
import {
  isForeignKeyConstraint,
  isPrimaryKeyConstraint,
  isUniqueConstraint,
  uniqueConstraintName,
} from '../constraints/types.js';
import type {
  CatalogSnapshot,
  Column,
  IndexDefinition,
  IndexKey,
  SchemaSnapshot,
  TableSnapshot,
  UserType,
} from './types.js';

/**
 * Rebuild a map with one key renamed in place
 */
function renameKey<V>(map: Map<string, V>, from: string, to: string, value: V): Map<string, V> {
  const result = new Map<string, V>();
  for (const [key, existing] of map) {
    if (key === from) {
      result.set(to, value);
    } else {
      result.set(key, existing);
    }
  }
  return result;
}

/**
 * Live object paired with a copy of its state at savepoint time
 */
export interface Recorded<T, C = T> {
  value: T;
  copy: C;
}

function record<T>(value: T): Recorded<T> {
  return { value, copy: structuredClone(value) };
}

export interface TableOptions {
  temporary?: boolean;
  comment?: string;
  /** Column, constraint and index names compare without regard to case */
  caseInsensitive?: boolean;
}

/**
 * Table state captured by a savepoint
 */
export interface TableState {
  schema: string;
  name: string;
  temporary: boolean;
  comment?: string;
  columns: Recorded<Column>[];
  constraints: Recorded<AnyConstraint>[];
  indexes: Recorded<Index, IndexDefinition>[];
}

/**
 * Schema state captured by a savepoint
 */
export interface SchemaState {
  comment?: string;
  tables: ReadonlyMap<string, Table>;
  types: Recorded<UserType>[];
}

/**
 * Catalog state captured by a savepoint
 */
export interface CatalogState {
  schemas: ReadonlyMap<string, Schema>;
}

/**
 * Put `copy`'s fields back onto `target`, keeping `target`'s identity
 */
function restoreInPlace<T extends object>(target: T, copy: T): T {
  for (const key of Object.keys(target)) {
    if (!Object.hasOwn(copy, key)) Reflect.deleteProperty(target, key);
  }
  return Object.assign(target, copy);
}

/**
 * Map key for a name: the name itself, or its lower-case form where names
 * compare without regard to case
 */
export function nameKey(name: string, caseInsensitive: boolean): string {
  return caseInsensitive ? name.toLowerCase() : name;
}

/**
 * Qualified `schema.name`, or the bare name in an unnamed schema
 */
export function qualifyName(schema: string, name: string): string {
  return schema ? `${schema}.${name}` : name;
}

// =============================================================================
// INDEX
// =============================================================================

/**
 * Index on a table
 */
export class Index {
  name: string;
  implicitName: boolean;
  tableName: string;
  keys: IndexKey[];
  unique: boolean;
  method?: string;
  where?: string;

  constructor(definition: IndexDefinition) {
    const copy = structuredClone(definition);
    this.name = copy.name;
    this.implicitName = copy.implicitName;
    this.tableName = copy.tableName;
    this.keys = copy.keys;
    this.unique = copy.unique;
    this.method = copy.method;
    this.where = copy.where;
  }

  /**
   * Column names of plain column keys, in index order
   */
  get columns(): string[] {
    return this.keys.flatMap((key) => (key.column === undefined ? [] : [key.column]));
  }

  /**
   * Whether any key of the index is `column`
   */
  contains(column: string): boolean {
    return this.keys.some((key) => key.column === column);
  }

  /**
   * Whether the index enforces uniqueness of `column` alone
   */
  isUniqueOn(column: string): boolean {
    return this.unique && this.where === undefined &&
      this.keys.length === 1 && this.keys[0].column === column;
  }

  /**
   * Reset every field to `definition`'s
   */
  restore(definition: IndexDefinition): void {
    this.name = definition.name;
    this.implicitName = definition.implicitName;
    this.tableName = definition.tableName;
    this.keys = definition.keys;
    this.unique = definition.unique;
    this.method = definition.method;
    this.where = definition.where;
  }

  toJSON(): IndexDefinition {
    const definition: IndexDefinition = {
      name: this.name,
      implicitName: this.implicitName,
      tableName: this.tableName,
      keys: structuredClone(this.keys),
      unique: this.unique,
    };
    if (this.method !== undefined) definition.method = this.method;
    if (this.where !== undefined) definition.where = this.where;
    return definition;
  }
}

// =============================================================================
// TABLE
// =============================================================================

/**
 * Table with ordered columns, constraints and indexes
 */
export class Table {
  schema: string;
  name: string;
  temporary: boolean;
  comment?: string;

  /** Column, constraint and index names compare without regard to case */
  readonly caseInsensitive: boolean;

  private columnMap = new Map<string, Column>();
  private constraintList: AnyConstraint[] = [];
  private indexList: Index[] = [];

  constructor(schema: string, name: string, options: TableOptions = {}) {
    this.schema = schema;
    this.name = name;
    this.temporary = options.temporary ?? false;
    this.comment = options.comment;
    this.caseInsensitive = options.caseInsensitive ?? false;
  }

  private key(name: string): string {
    return nameKey(name, this.caseInsensitive);
  }

  /**
   * Whether `a` and `b` name the same column, constraint or index
   */
  sameName(a: string, b: string): boolean {
    return this.key(a) === this.key(b);
  }

  /**
   * `schema.table`, or the bare table name in an unnamed schema
   */
  get qualifiedName(): string {
    return qualifyName(this.schema, this.name);
  }

  /**
   * Columns in declaration order
   */
  get columns(): readonly Column[] {
    return [...this.columnMap.values()];
  }

  /**
   * Column names in declaration order
   */
  get columnNames(): string[] {
    return this.columns.map((column) => column.name);
  }

  column(name: string): Column | undefined {
    return this.columnMap.get(this.key(name));
  }

  hasColumn(name: string): boolean {
    return this.columnMap.has(this.key(name));
  }

  /**
   * Constraints in the order they were added
   */
  get constraints(): readonly AnyConstraint[] {
    return this.constraintList;
  }

  constraint(name: string): AnyConstraint | undefined {
    return this.constraintList.find((constraint) => this.sameName(constraint.name, name));
  }

  get primaryKey(): PrimaryKeyConstraint | undefined {
    return this.constraintList.find(isPrimaryKeyConstraint);
  }

  hasPrimaryKey(): boolean {
    return this.primaryKey !== undefined;
  }

  get foreignKeys(): ForeignKeyConstraint[] {
    return this.constraintList.filter(isForeignKeyConstraint);
  }

  get uniqueConstraints(): UniqueConstraint[] {
    return this.constraintList.filter(isUniqueConstraint);
  }

  get indexes(): readonly Index[] {
    return this.indexList;
  }

  index(name: string): Index | undefined {
    return this.indexList.find((index) => this.sameName(index.name, name));
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  addColumn(column: Column): void {
    this.columnMap.set(this.key(column.name), column);
  }

  removeColumn(name: string): void {
    this.columnMap.delete(this.key(name));
  }

  /**
   * Rename a column in place, keeping its position
   */
  renameColumn(from: string, to: string): void {
    const column = this.column(from);
    if (!column) return;
    column.name = to;
    this.columnMap = renameKey(this.columnMap, this.key(from), this.key(to), column);
  }

  /**
   * Add a constraint; a generated name that is taken gets a numeric suffix
   *
   * @returns false when a declared name is already taken
   */
  addConstraint(constraint: AnyConstraint): boolean {
    if (this.constraint(constraint.name)) {
      if (!constraint.implicitName) return false;
      constraint.name = uniqueConstraintName(constraint.name, (name) => this.constraint(name) !== undefined);
    }
    this.constraintList.push(constraint);
    return true;
  }

  removeConstraints(predicate: (constraint: AnyConstraint) => boolean): AnyConstraint[] {
    const removed = this.constraintList.filter(predicate);
    this.constraintList = this.constraintList.filter((constraint) => !predicate(constraint));
    return removed;
  }

  addIndex(index: Index): void {
    this.indexList.push(index);
  }

  removeIndexes(predicate: (index: Index) => boolean): Index[] {
    const removed = this.indexList.filter(predicate);
    this.indexList = this.indexList.filter((index) => !predicate(index));
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Savepoint state
  // ---------------------------------------------------------------------------

  captureState(): TableState {
    return {
      schema: this.schema,
      name: this.name,
      temporary: this.temporary,
      comment: this.comment,
      columns: this.columns.map(record),
      constraints: this.constraintList.map(record),
      indexes: this.indexList.map((index) => ({ value: index, copy: index.toJSON() })),
    };
  }

  /**
   * Return to a captured state; columns, constraints and indexes that
   * existed then are the same objects again
   */
  restoreState(state: TableState): void {
    this.schema = state.schema;
    this.name = state.name;
    this.temporary = state.temporary;
    this.comment = state.comment;
    this.columnMap = new Map(
      state.columns.map(({ value, copy }): [string, Column] => [this.key(copy.name), restoreInPlace(value, copy)])
    );
    this.constraintList = state.constraints.map(({ value, copy }) => restoreInPlace(value, copy));
    this.indexList = state.indexes.map(({ value, copy }) => {
      value.restore(copy);
      return value;
    });
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  toJSON(): TableSnapshot {
    const snapshot: TableSnapshot = {
      schema: this.schema,
      name: this.name,
      temporary: this.temporary,
      columns: structuredClone([...this.columnMap.values()]),
      constraints: structuredClone(this.constraintList),
      indexes: this.indexList.map((index) => index.toJSON()),
    };
    if (this.comment !== undefined) snapshot.comment = this.comment;
    return snapshot;
  }

  static fromSnapshot(snapshot: TableSnapshot, caseInsensitive = false): Table {
    const table = new Table(snapshot.schema, snapshot.name, {
      temporary: snapshot.temporary,
      comment: snapshot.comment,
      caseInsensitive,
    });
    for (const column of structuredClone(snapshot.columns)) {
      table.addColumn(column);
    }
    table.constraintList = structuredClone(snapshot.constraints);
    table.indexList = snapshot.indexes.map((index) => new Index(index));
    return table;
  }
}

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * Named collection of tables and user types
 */
export class Schema {
  readonly name: string;
  comment?: string;
  /** Table and type names compare without regard to case */
  readonly caseInsensitive: boolean;

  private tableMap = new Map<string, Table>();
  private readonly typeMap = new Map<string, UserType>();

  constructor(name: string, options: { comment?: string; caseInsensitive?: boolean } = {}) {
    this.name = name;
    this.comment = options.comment;
    this.caseInsensitive = options.caseInsensitive ?? false;
  }

  private key(name: string): string {
    return nameKey(name, this.caseInsensitive);
  }

  /**
   * Tables in creation order
   */
  get tables(): readonly Table[] {
    return [...this.tableMap.values()];
  }

  table(name: string): Table | undefined {
    return this.tableMap.get(this.key(name));
  }

  hasTable(name: string): boolean {
    return this.tableMap.has(this.key(name));
  }

  /**
   * User types in creation order
   */
  get types(): readonly UserType[] {
    return [...this.typeMap.values()];
  }

  type(name: string): UserType | undefined {
    return this.typeMap.get(this.key(name));
  }

  /**
   * Find an index by name in any table of the schema
   */
  index(name: string): { table: Table; index: Index } | undefined {
    for (const table of this.tableMap.values()) {
      const index = table.index(name);
      if (index) return { table, index };
    }
    return undefined;
  }

  get isEmpty(): boolean {
    return this.tableMap.size === 0 && this.typeMap.size === 0;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  addTable(table: Table): void {
    table.schema = this.name;
    this.tableMap.set(this.key(table.name), table);
  }

  removeTable(name: string): void {
    this.tableMap.delete(this.key(name));
  }

  /**
   * Rename a table in place, keeping its position
   */
  renameTable(from: string, to: string): void {
    const table = this.table(from);
    if (!table) return;
    table.name = to;
    this.tableMap = renameKey(this.tableMap, this.key(from), this.key(to), table);
  }

  addType(type: UserType): void {
    this.typeMap.set(this.key(type.name), type);
  }

  removeType(name: string): void {
    this.typeMap.delete(this.key(name));
  }

  // ---------------------------------------------------------------------------
  // Savepoint state
  // ---------------------------------------------------------------------------

  captureState(): SchemaState {
    return {
      comment: this.comment,
      tables: new Map(this.tableMap),
      types: this.types.map(record),
    };
  }

  /**
   * Return to a captured state; tables and types that existed then are the
   * same objects again
   */
  restoreState(state: SchemaState): void {
    this.comment = state.comment;
    this.tableMap = new Map(state.tables);
    this.typeMap.clear();
    for (const { value, copy } of state.types) {
      this.typeMap.set(this.key(copy.name), restoreInPlace(value, copy));
    }
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  toJSON(): SchemaSnapshot {
    const snapshot: SchemaSnapshot = {
      name: this.name,
      tables: this.tables.map((table) => table.toJSON()),
      types: structuredClone([...this.typeMap.values()]),
    };
    if (this.comment !== undefined) snapshot.comment = this.comment;
    return snapshot;
  }

  static fromSnapshot(snapshot: SchemaSnapshot, caseInsensitive = false): Schema {
    const schema = new Schema(snapshot.name, { comment: snapshot.comment, caseInsensitive });
    for (const table of snapshot.tables) {
      schema.addTable(Table.fromSnapshot(table, caseInsensitive));
    }
    for (const type of structuredClone(snapshot.types)) {
      schema.addType(type);
    }
    return schema;
  }
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Foreign key together with the table that declares it
 */
export interface ForeignKeyReference {
  table: Table;
  constraint: ForeignKeyConstraint;
}

/**
 * Whether `constraint` points at `schema.table`, or at `column` of it
 *
 * A foreign key without referenced columns points at the target's
 * primary key, which `primaryKey` supplies.
 */
export function foreignKeyReferences(
  constraint: ForeignKeyConstraint,
  schema: string,
  table: string,
  column?: string,
  primaryKey?: readonly string[],
  caseInsensitive = false
): boolean {
  const key = (name: string): string => nameKey(name, caseInsensitive);
  const { referencedTable } = constraint;
  if (key(referencedTable.schema) !== key(schema) || key(referencedTable.name) !== key(table)) {
    return false;
  }
  if (column === undefined) return true;
  const columns = constraint.referencedColumns.length > 0
    ? constraint.referencedColumns
    : primaryKey ?? [];
  return columns.some((name) => key(name) === key(column));
}

/**
 * In-memory description of every schema built so far
 */
export class Catalog {
  readonly name: string;
  readonly defaultSchema: string;
  /** Every name in the catalog compares without regard to case */
  readonly caseInsensitive: boolean;

  private schemaMap = new Map<string, Schema>();

  constructor(name: string, defaultSchema: string, options: { caseInsensitive?: boolean } = {}) {
    this.name = name;
    this.defaultSchema = defaultSchema;
    this.caseInsensitive = options.caseInsensitive ?? false;
  }

  private key(name: string): string {
    return nameKey(name, this.caseInsensitive);
  }

  /**
   * Schemas in creation order
   */
  get schemas(): readonly Schema[] {
    return [...this.schemaMap.values()];
  }

  schema(name: string): Schema | undefined {
    return this.schemaMap.get(this.key(name));
  }

  hasSchema(name: string): boolean {
    return this.schemaMap.has(this.key(name));
  }

  /**
   * Look up a table in the default schema, or in the named schema
   */
  table(name: string): Table | undefined;
  table(schema: string, name: string): Table | undefined;
  table(schemaOrName: string, name?: string): Table | undefined {
    if (name === undefined) {
      return this.schema(this.defaultSchema)?.table(schemaOrName);
    }
    return this.schema(schemaOrName)?.table(name);
  }

  /**
   * Every table in every schema, in creation order
   */
  get tables(): Table[] {
    return this.schemas.flatMap((schema) => [...schema.tables]);
  }

  /**
   * Foreign keys anywhere in the catalog that point at `schema.table`
   * (or at `column` of it)
   */
  referencingForeignKeys(schema: string, table: string, column?: string): ForeignKeyReference[] {
    const target = this.table(schema, table);
    const primaryKey = target?.primaryKey?.columns;
    const references: ForeignKeyReference[] = [];

    for (const owner of this.tables) {
      for (const constraint of owner.foreignKeys) {
        if (foreignKeyReferences(constraint, schema, table, column, primaryKey, this.caseInsensitive)) {
          references.push({ table: owner, constraint });
        }
      }
    }
    return references;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  addSchema(schema: Schema): void {
    this.schemaMap.set(this.key(schema.name), schema);
  }

  removeSchema(name: string): void {
    this.schemaMap.delete(this.key(name));
  }

  captureState(): CatalogState {
    return { schemas: new Map(this.schemaMap) };
  }

  restoreState(state: CatalogState): void {
    this.schemaMap = new Map(state.schemas);
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  toJSON(): CatalogSnapshot {
    const snapshot: CatalogSnapshot = {
      name: this.name,
      defaultSchema: this.defaultSchema,
      schemas: this.schemas.map((schema) => schema.toJSON()),
    };
    if (this.caseInsensitive) snapshot.caseInsensitive = true;
    return snapshot;
  }

  static fromSnapshot(snapshot: CatalogSnapshot): Catalog {
    const caseInsensitive = snapshot.caseInsensitive ?? false;
    const catalog = new Catalog(snapshot.name, snapshot.defaultSchema, { caseInsensitive });
    for (const schema of snapshot.schemas) {
      catalog.addSchema(Schema.fromSnapshot(schema, caseInsensitive));
    }
    return catalog;
  }
}
