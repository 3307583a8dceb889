/**
 * Catalog Builder
 *
 * Applies DDL statements, in order, to one in-memory catalog. Every
 * statement runs under a savepoint: it commits fully or leaves the catalog
 * exactly as it found it. The first failing statement stops the input;
 * statements before it stay applied.
 *
 * @example
 * ```typescript
 * const builder = new CatalogBuilder({ dialect: 'postgresql' });
 * const result = builder.apply(`
 *   CREATE TABLE users (id SERIAL PRIMARY KEY, email TEXT UNIQUE);
 *   CREATE TABLE posts (id SERIAL PRIMARY KEY, user_id INT REFERENCES users);
 * `);
 * if (result.success) {
 *   builder.catalog.table('public', 'posts')?.foreignKeys[0].referencedColumns; // ['id']
 * }
 * ```
 *
 * @packageDocumentation
 */

import type { AnyConstraint, TableRef } from '../constraints/types.js';
import {
  constraintContains,
  isKeyConstraint,
  isUniqueConstraint,
  sameColumnSet,
  uniqueConstraintName,
} from '../constraints/types.js';
import {
  extractColumns,
  extractTable,
  extractTableConstraint,
  toTypeReference,
  type ExtractionContext,
} from '../constraints/extractor.js';
import { resolveOptions, type CatalogOptions, type ResolvedCatalogOptions } from '../config.js';
import { getDialect, type DialectRules } from '../dialects/index.js';
import {
  CatalogError,
  InternalCatalogError,
  createErrorFromException,
  type ErrorContext,
} from '../errors/base.js';
import { SemanticError, type SemanticErrorKind } from '../errors/semantic-errors.js';
import type { StructuredLogger } from '../logging/index.js';
import {
  parseStatements,
  type AlterColumnAction,
  type AlterTableOperation,
  type AlterTableStatement,
  type CommentStatement,
  type CreateIndexStatement,
  type CreateSchemaStatement,
  type CreateTableStatement,
  type CreateTypeStatement,
  type DDLStatement,
  type DropIndexStatement,
  type DropSchemaStatement,
  type DropTableStatement,
  type DropTypeStatement,
  type IndexColumn,
  type ParserOptions,
  type TableIndexDefinition,
  type QualifiedName,
} from '../parser/ddl.js';
import type { SourceSpan } from '../parser/shared/types.js';
import { Catalog, Index, Schema, Table, nameKey, qualifyName, type ForeignKeyReference } from './catalog.js';
import { executeWithSavepoint, type Savepoint } from './savepoint.js';
import type { CatalogSnapshot, IndexKey, TypeAttributeDefinition, TypeReference } from './types.js';
import {
  assertConstraintColumns,
  resolveTypeReference,
  validateForeignKey,
  validateForeignKeys,
} from './validator.js';

// =============================================================================
// RESULT TYPES
// =============================================================================

/**
 * Outcome of applying SQL or a snapshot
 *
 * `applied` and `skipped` count the statements (or merged objects) that
 * committed before the outcome was decided.
 */
export type ApplyResult =
  | { success: true; applied: number; skipped: number }
  | { success: false; error: CatalogError; applied: number; skipped: number };

/**
 * Outcome of re-checking the catalog
 */
export type ValidationResult =
  | { success: true }
  | { success: false; error: CatalogError };

type Outcome = 'applied' | 'skipped';

/**
 * Index to add to a table, from CREATE INDEX or a table entry
 */
interface IndexRequest {
  name?: string;
  columns: IndexColumn[];
  unique: boolean;
  method?: string;
  where?: string;
  ifNotExists: boolean;
  span: SourceSpan;
}

function semantic(
  kind: SemanticErrorKind,
  message: string,
  span?: SourceSpan,
  context?: ErrorContext
): SemanticError {
  return new SemanticError(kind, message, { span, context });
}

function toIndexKey(column: IndexColumn): IndexKey {
  const key: IndexKey = {};
  if (column.name !== undefined) key.column = column.name;
  if (column.expression !== undefined) key.expression = column.expression;
  if (column.order !== undefined) key.order = column.order;
  if (column.collation !== undefined) key.collation = column.collation;
  return key;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// =============================================================================
// CATALOG BUILDER
// =============================================================================

/**
 * Incrementally builds a catalog from DDL
 */
export class CatalogBuilder {
  private readonly options: ResolvedCatalogOptions;
  private readonly rules: DialectRules;
  private readonly logger: StructuredLogger;
  private readonly state: Catalog;
  /** Journal of the statement being applied */
  private savepoint?: Savepoint;

  /**
   * @throws ConfigurationError if the options are invalid
   */
  constructor(options: CatalogOptions = {}) {
    this.options = resolveOptions(options);
    this.rules = getDialect(this.options.dialect);
    this.logger = this.options.logger.child({
      component: 'CatalogBuilder',
      dialect: this.options.dialect,
    });
    this.state = new Catalog(this.options.catalogName, this.options.defaultSchema, {
      caseInsensitive: this.rules.caseInsensitiveNames,
    });
  }

  /**
   * Live read surface of the catalog
   */
  get catalog(): Catalog {
    return this.state;
  }

  /**
   * Options with every default applied
   */
  get resolvedOptions(): Readonly<ResolvedCatalogOptions> {
    return this.options;
  }

  // ---------------------------------------------------------------------------
  // Public operations
  // ---------------------------------------------------------------------------

  /**
   * Parse and apply every statement of `sql` in order
   */
  apply(sql: string): ApplyResult {
    let applied = 0;
    let skipped = 0;

    try {
      for (const statement of parseStatements(sql, this.parserOptions())) {
        if (this.run(statement, sql) === 'applied') {
          applied++;
        } else {
          skipped++;
        }
      }
    } catch (error) {
      return this.failure(error, sql, applied, skipped);
    }

    return { success: true, applied, skipped };
  }

  /**
   * Apply one already-parsed statement
   */
  applyStatement(statement: DDLStatement): ApplyResult {
    try {
      const outcome = this.run(statement);
      return {
        success: true,
        applied: outcome === 'applied' ? 1 : 0,
        skipped: outcome === 'skipped' ? 1 : 0,
      };
    } catch (error) {
      return this.failure(error, undefined, 0, 0);
    }
  }

  /**
   * Merge another catalog's schemas, tables and types
   *
   * Objects already present win; the merge commits as a whole or not at all.
   */
  merge(snapshot: CatalogSnapshot): ApplyResult {
    let applied = 0;
    let skipped = 0;

    try {
      this.journaled('merge', () => {
        const added: Table[] = [];

        for (const incoming of snapshot.schemas) {
          let schema = this.state.schema(incoming.name);
          if (!schema) {
            this.recordCatalog();
            schema = this.newSchema(incoming.name, incoming.comment);
            this.state.addSchema(schema);
          }
          this.recordSchema(schema);

          for (const type of incoming.types) {
            if (schema.type(type.name)) {
              skipped++;
            } else {
              schema.addType(structuredClone(type));
              applied++;
            }
          }

          for (const table of incoming.tables) {
            if (schema.hasTable(table.name)) {
              skipped++;
            } else {
              const copy = Table.fromSnapshot(table, this.rules.caseInsensitiveNames);
              schema.addTable(copy);
              added.push(copy);
              applied++;
            }
          }
        }

        if (this.options.foreignKeyChecks === 'immediate') {
          for (const table of added) {
            for (const constraint of table.foreignKeys) {
              validateForeignKey(this.state, constraint);
            }
          }
        }
      });
    } catch (error) {
      return this.failure(error, undefined, 0, 0);
    }

    this.logger.info('Merged catalog {catalogName}', {
      catalogName: snapshot.name,
      applied,
      skipped,
    });
    return { success: true, applied, skipped };
  }

  /**
   * Re-check every foreign key, resolving omitted referenced columns
   */
  validate(): ValidationResult {
    try {
      this.journaled('validate', () => {
        for (const table of this.state.tables) {
          if (table.foreignKeys.length > 0) this.recordTable(table);
        }
        validateForeignKeys(this.state);
      });
      return { success: true };
    } catch (error) {
      return { success: false, error: createErrorFromException(error) };
    }
  }

  /**
   * Immutable snapshot of the catalog
   */
  build(): CatalogSnapshot {
    return deepFreeze(this.state.toJSON());
  }

  // ---------------------------------------------------------------------------
  // Statement dispatch
  // ---------------------------------------------------------------------------

  private parserOptions(): ParserOptions {
    return {
      dialect: this.options.dialect,
      identifierCase: this.options.identifierCase,
      unknownStatements: this.options.unknownStatements,
    };
  }

  private run(statement: DDLStatement, source?: string): Outcome {
    let outcome: Outcome;
    try {
      outcome = this.journaled(statement.type, () => this.dispatch(statement));
    } catch (error) {
      if (error instanceof CatalogError) {
        error.withSpan(statement.span, source).withContext({ statement: statement.text });
      }
      throw error;
    }

    if (outcome === 'skipped') {
      this.logger.info('Skipped {statementType} at line {line}', {
        statementType: statement.type === 'UNKNOWN' ? statement.keyword : statement.type,
        span: statement.span,
      });
    } else {
      this.logger.debug('Applied {statementType} at line {line}', {
        statementType: statement.type,
        span: statement.span,
      });
    }
    return outcome;
  }

  private failure(error: unknown, source: string | undefined, applied: number, skipped: number): ApplyResult {
    const catalogError = createErrorFromException(error, source);
    this.logger.warn('Statement failed with {code}: {detail}', {
      code: catalogError.code,
      detail: catalogError.message,
      span: catalogError.span,
      applied,
      skipped,
    });
    return { success: false, error: catalogError, applied, skipped };
  }

  private dispatch(statement: DDLStatement): Outcome {
    switch (statement.type) {
      case 'CREATE TABLE':
        return this.createTable(statement);
      case 'ALTER TABLE':
        return this.alterTable(statement);
      case 'DROP TABLE':
        return this.dropTable(statement);
      case 'CREATE INDEX':
        return this.createIndex(statement);
      case 'DROP INDEX':
        return this.dropIndex(statement);
      case 'CREATE SCHEMA':
        return this.createSchema(statement);
      case 'DROP SCHEMA':
        return this.dropSchema(statement);
      case 'CREATE TYPE':
        return this.createType(statement);
      case 'DROP TYPE':
        return this.dropType(statement);
      case 'COMMENT ON':
        return this.comment(statement);
      case 'UNKNOWN':
        return 'skipped';
    }
  }

  // ---------------------------------------------------------------------------
  // Savepoint journal
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` under a savepoint that the record methods write to
   */
  private journaled<T>(name: string, fn: () => T): T {
    return executeWithSavepoint(this.state, name, (savepoint) => {
      this.savepoint = savepoint;
      try {
        return fn();
      } finally {
        this.savepoint = undefined;
      }
    });
  }

  private recordCatalog(): void {
    this.savepoint?.recordCatalog();
  }

  private recordSchema(schema: Schema): Schema {
    this.savepoint?.recordSchema(schema);
    return schema;
  }

  private recordTable(table: Table): Table {
    this.savepoint?.recordTable(table);
    return table;
  }

  private newSchema(name: string, comment?: string): Schema {
    return new Schema(name, { comment, caseInsensitive: this.rules.caseInsensitiveNames });
  }

  // ---------------------------------------------------------------------------
  // Name resolution
  // ---------------------------------------------------------------------------

  private sameName(a: string, b: string): boolean {
    return nameKey(a, this.state.caseInsensitive) === nameKey(b, this.state.caseInsensitive);
  }

  private schemaName(name: string | undefined): string {
    return name ?? this.state.defaultSchema;
  }

  private ensureSchema(name: string, span?: SourceSpan): Schema {
    const existing = this.state.schema(name);
    if (existing) return existing;

    if (!this.options.implicitSchemas && name !== this.state.defaultSchema) {
      throw semantic('UndefinedSchema', `Schema '${name}' does not exist`, span, { schema: name });
    }

    const schema = this.newSchema(name);
    this.recordCatalog();
    this.state.addSchema(schema);
    return schema;
  }

  private schemaOf(table: Table): Schema {
    const schema = this.state.schema(table.schema);
    if (!schema) {
      throw new InternalCatalogError(`Table '${table.qualifiedName}' has no schema in the catalog`);
    }
    return schema;
  }

  private findTable(name: QualifiedName): Table | undefined {
    return this.state.table(this.schemaName(name.schema), name.name);
  }

  private requireTable(name: QualifiedName): Table {
    const table = this.findTable(name);
    if (!table) {
      const schema = this.schemaName(name.schema);
      throw semantic('UndefinedTable', `Table '${qualifyName(schema, name.name)}' does not exist`, name.span, {
        schema,
        table: name.name,
      });
    }
    return table;
  }

  /**
   * Unqualified targets resolve to the owning schema when the table is there
   * (or is the table being created), then to the default schema
   */
  private extractionContext(schema: string, table: string): ExtractionContext {
    return {
      table,
      rules: this.rules,
      resolveTable: (name: QualifiedName): TableRef => {
        const found = (owner: string): TableRef | undefined => {
          const target = this.state.table(owner, name.name);
          return target ? { schema: target.schema, name: target.name } : undefined;
        };

        if (name.schema !== undefined) {
          return found(name.schema) ?? { schema: name.schema, name: name.name };
        }
        if (this.sameName(name.name, table)) {
          return { schema, name: table };
        }
        return found(schema) ?? found(this.state.defaultSchema) ?? { schema, name: name.name };
      },
    };
  }

  private resolveType(type: TypeReference, schema: string, span: SourceSpan | undefined, context: ErrorContext): void {
    resolveTypeReference(type, this.state, schema, { span, context });
  }

  // ---------------------------------------------------------------------------
  // Constraint bookkeeping
  // ---------------------------------------------------------------------------

  private addConstraint(table: Table, constraint: AnyConstraint, span?: SourceSpan): void {
    this.recordTable(table);
    if (constraint.type === 'PRIMARY_KEY') {
      const existing = table.primaryKey;
      if (existing && existing !== constraint) {
        throw semantic(
          'ConstraintConflict',
          `Table '${table.qualifiedName}' already has primary key '${existing.name}'`,
          span,
          { table: table.name, constraint: constraint.name }
        );
      }
    }

    if (!table.addConstraint(constraint)) {
      throw semantic(
        'DuplicateConstraint',
        `Constraint '${constraint.name}' already exists on table '${table.qualifiedName}'`,
        span,
        { table: table.name, constraint: constraint.name }
      );
    }
  }

  /**
   * Validate constraints against the current table state
   */
  private checkConstraints(table: Table, constraints: readonly AnyConstraint[], span?: SourceSpan): void {
    this.recordTable(table);
    for (const constraint of constraints) {
      if (!table.constraints.includes(constraint)) continue;

      assertConstraintColumns(table, constraint, span);
      constraint.columns = constraint.columns.map((name) => table.column(name)?.name ?? name);

      if (constraint.type === 'PRIMARY_KEY') {
        for (const name of constraint.columns) {
          const column = table.column(name);
          if (column) column.nullable = false;
        }
      }

      if (constraint.type === 'FOREIGN_KEY' && this.options.foreignKeyChecks === 'immediate') {
        validateForeignKey(this.state, constraint, span);
      }
    }
  }

  /**
   * Foreign keys that would lose their target key if `columns` stopped
   * being keyed on `table`
   */
  private keyDependents(
    table: Table,
    columns: readonly string[],
    removedConstraint?: AnyConstraint,
    removedIndex?: Index
  ): ForeignKeyReference[] {
    const stillKeyed =
      table.constraints.some((c) => c !== removedConstraint && isKeyConstraint(c) && sameColumnSet(c.columns, columns)) ||
      table.indexes.some((index) =>
        index !== removedIndex &&
        index.unique &&
        index.where === undefined &&
        index.columns.length === index.keys.length &&
        sameColumnSet(index.columns, columns)
      );
    if (stillKeyed) return [];

    const primaryKey = table.primaryKey?.columns ?? [];
    return this.state.referencingForeignKeys(table.schema, table.name).filter((ref) => {
      const referenced = ref.constraint.referencedColumns.length > 0
        ? ref.constraint.referencedColumns
        : primaryKey;
      return sameColumnSet(referenced, columns);
    });
  }

  /**
   * Drop dependent foreign keys, or refuse when CASCADE is required
   */
  private dropDependents(
    dependents: readonly ForeignKeyReference[],
    cascade: boolean,
    what: string,
    span?: SourceSpan
  ): void {
    if (dependents.length === 0) return;

    if (!cascade && this.options.requireCascade) {
      const [first] = dependents;
      throw semantic(
        'DependentObjects',
        `Cannot drop ${what} because foreign key '${first.constraint.name}' on table '${first.table.qualifiedName}' depends on it`,
        span,
        { table: first.table.name, constraint: first.constraint.name }
      );
    }

    for (const { table, constraint } of dependents) {
      this.recordTable(table).removeConstraints((c) => c === constraint);
      this.logger.info('Dropped dependent foreign key {constraint} on {table}', {
        constraint: constraint.name,
        table: table.qualifiedName,
      });
    }
  }

  private dropConstraint(table: Table, constraint: AnyConstraint, cascade: boolean, span?: SourceSpan): void {
    this.recordTable(table);
    const index = isUniqueConstraint(constraint) && constraint.fromIndex
      ? table.index(constraint.name)
      : undefined;

    if (isKeyConstraint(constraint)) {
      this.dropDependents(
        this.keyDependents(table, constraint.columns, constraint, index),
        cascade,
        `constraint '${constraint.name}'`,
        span
      );
    }

    table.removeConstraints((c) => c === constraint);
    if (index) {
      table.removeIndexes((i) => i === index);
    }

    const [name] = constraint.columns;
    const column = name === undefined ? undefined : table.column(name);
    if (constraint.type === 'NOT_NULL' && column && !table.primaryKey?.columns.includes(column.name)) {
      column.nullable = true;
    }
    if (constraint.type === 'DEFAULT' && column) {
      delete column.defaultExpression;
    }
  }

  private dropColumn(table: Table, column: string, cascade: boolean, span?: SourceSpan): void {
    this.recordTable(table);
    const dependents = this.state
      .referencingForeignKeys(table.schema, table.name, column)
      .filter((ref) => !(ref.table === table && constraintContains(ref.constraint, column)));
    this.dropDependents(dependents, cascade, `column '${table.qualifiedName}.${column}'`, span);

    table.removeConstraints((c) => constraintContains(c, column));
    table.removeIndexes((index) => index.contains(column));
    table.removeColumn(column);
  }

  // ---------------------------------------------------------------------------
  // CREATE TABLE
  // ---------------------------------------------------------------------------

  private createTable(statement: CreateTableStatement): Outcome {
    const schemaName = this.schemaName(statement.table.schema);
    const name = statement.table.name;

    if (statement.unsupported) {
      throw semantic(
        'UnsupportedConstruct',
        `CREATE TABLE ... ${statement.unsupported.construct} is not supported`,
        statement.unsupported.span,
        { schema: schemaName, table: name }
      );
    }

    if (this.state.table(schemaName, name)) {
      if (statement.ifNotExists) return 'skipped';
      throw semantic('DuplicateTable', `Table '${qualifyName(schemaName, name)}' already exists`, statement.table.span, {
        schema: schemaName,
        table: name,
      });
    }

    const schema = this.ensureSchema(schemaName, statement.table.span);
    const { columns, constraints } = extractTable(statement, this.extractionContext(schemaName, name));
    const table = new Table(schemaName, name, {
      temporary: statement.temporary,
      comment: statement.comment,
      caseInsensitive: this.rules.caseInsensitiveNames,
    });

    columns.forEach((column, i) => {
      const span = statement.columns[i].span;
      if (table.hasColumn(column.name)) {
        throw semantic('DuplicateColumn', `Column '${column.name}' is declared more than once in table '${table.qualifiedName}'`, span, {
          table: name,
          column: column.name,
        });
      }
      this.resolveType(column.type, schemaName, statement.columns[i].dataType?.span ?? span, {
        table: name,
        column: column.name,
      });
      table.addColumn(column);
    });

    this.recordSchema(schema).addTable(table);
    for (const constraint of constraints) {
      this.addConstraint(table, constraint);
    }
    this.checkConstraints(table, constraints);

    for (const index of statement.indexes) {
      this.addIndex(table, this.tableIndexRequest(index));
    }

    return 'applied';
  }

  // ---------------------------------------------------------------------------
  // ALTER TABLE
  // ---------------------------------------------------------------------------

  private alterTable(statement: AlterTableStatement): Outcome {
    const existing = this.findTable(statement.table);
    if (!existing && statement.ifExists) return 'skipped';
    const table = this.recordTable(existing ?? this.requireTable(statement.table));

    const pending: AnyConstraint[] = [];
    for (const operation of statement.operations) {
      const added = this.alterOperation(table, operation);
      if (this.options.constraintTiming === 'operation') {
        this.checkConstraints(table, added, operation.span);
      } else {
        pending.push(...added);
      }
    }
    this.checkConstraints(table, pending);

    return 'applied';
  }

  /**
   * @returns constraints the operation added, for validation
   */
  private alterOperation(table: Table, operation: AlterTableOperation): AnyConstraint[] {
    const context: ErrorContext = { schema: table.schema, table: table.name };

    switch (operation.operation) {
      case 'ADD COLUMN': {
        if (table.hasColumn(operation.column.name)) {
          if (operation.ifNotExists) return [];
          throw semantic('DuplicateColumn', `Column '${operation.column.name}' already exists in table '${table.qualifiedName}'`, operation.span, {
            ...context,
            column: operation.column.name,
          });
        }
        const { columns, constraints } = extractColumns(
          [operation.column],
          this.extractionContext(table.schema, table.name)
        );
        for (const column of columns) {
          this.resolveType(column.type, table.schema, operation.column.dataType?.span ?? operation.span, {
            ...context,
            column: column.name,
          });
          table.addColumn(column);
        }
        for (const constraint of constraints) {
          this.addConstraint(table, constraint, operation.span);
        }
        return constraints;
      }

      case 'DROP COLUMN': {
        const column = table.column(operation.column);
        if (!column) {
          if (operation.ifExists) return [];
          throw semantic('UndefinedColumn', `Column '${operation.column}' does not exist in table '${table.qualifiedName}'`, operation.span, {
            ...context,
            column: operation.column,
          });
        }
        this.dropColumn(table, column.name, operation.cascade, operation.span);
        return [];
      }

      case 'ADD CONSTRAINT': {
        const constraint = extractTableConstraint(
          operation.constraint,
          this.extractionContext(table.schema, table.name)
        );
        this.addConstraint(table, constraint, operation.span);
        return [constraint];
      }

      case 'DROP CONSTRAINT': {
        const constraint = table.constraint(operation.name);
        if (!constraint) {
          if (operation.ifExists) return [];
          throw semantic('UndefinedConstraint', `Constraint '${operation.name}' does not exist on table '${table.qualifiedName}'`, operation.span, {
            ...context,
            constraint: operation.name,
          });
        }
        this.dropConstraint(table, constraint, operation.cascade, operation.span);
        return [];
      }

      case 'DROP PRIMARY KEY': {
        const primaryKey = table.primaryKey;
        if (!primaryKey) {
          throw semantic('UndefinedConstraint', `Table '${table.qualifiedName}' has no primary key`, operation.span, context);
        }
        this.dropConstraint(table, primaryKey, false, operation.span);
        return [];
      }

      case 'ADD INDEX':
        this.addIndex(table, this.tableIndexRequest(operation.index));
        return [];

      case 'DROP INDEX': {
        const index = table.index(operation.name);
        if (!index) {
          throw semantic('UndefinedIndex', `Index '${operation.name}' does not exist on table '${table.qualifiedName}'`, operation.span, {
            ...context,
            constraint: operation.name,
          });
        }
        this.removeIndex(table, index, false, operation.span);
        return [];
      }

      case 'RENAME TO':
        this.renameTable(table, operation.newName, operation.span);
        return [];

      case 'RENAME COLUMN':
        this.renameColumn(table, operation.oldName, operation.newName, operation.span);
        return [];

      case 'RENAME CONSTRAINT': {
        const constraint = table.constraint(operation.oldName);
        if (!constraint) {
          throw semantic('UndefinedConstraint', `Constraint '${operation.oldName}' does not exist on table '${table.qualifiedName}'`, operation.span, {
            ...context,
            constraint: operation.oldName,
          });
        }
        const clash = table.constraint(operation.newName);
        if (clash && clash !== constraint) {
          throw semantic('DuplicateConstraint', `Constraint '${operation.newName}' already exists on table '${table.qualifiedName}'`, operation.span, {
            ...context,
            constraint: operation.newName,
          });
        }
        if (isUniqueConstraint(constraint) && constraint.fromIndex) {
          const index = table.index(constraint.name);
          if (index) index.name = operation.newName;
        }
        constraint.name = operation.newName;
        constraint.implicitName = false;
        return [];
      }

      case 'ALTER COLUMN':
        this.alterColumn(table, operation.column, operation.action, operation.span);
        return [];

      case 'SET SCHEMA':
        this.moveTable(table, operation.schema, operation.span);
        return [];

      case 'IGNORED':
        this.logger.debug('Ignored ALTER TABLE action {action} on {table}', {
          action: operation.action,
          table: table.qualifiedName,
        });
        return [];

      case 'UNSUPPORTED':
        throw semantic('UnsupportedConstruct', `ALTER TABLE ... ${operation.action} is not supported`, operation.span, context);
    }
  }

  private renameTable(table: Table, newName: string, span: SourceSpan): void {
    const schema = this.recordSchema(this.schemaOf(table));
    const clash = schema.table(newName);
    if (clash && clash !== table) {
      throw semantic('DuplicateTable', `Table '${qualifyName(table.schema, newName)}' already exists`, span, {
        schema: table.schema,
        table: newName,
      });
    }

    const references = this.state.referencingForeignKeys(table.schema, table.name);
    schema.renameTable(table.name, newName);

    for (const constraint of table.constraints) {
      constraint.tableName = newName;
    }
    for (const index of table.indexes) {
      index.tableName = newName;
    }
    for (const { table: owner, constraint } of references) {
      this.recordTable(owner);
      constraint.referencedTable.name = newName;
    }
  }

  private renameColumn(table: Table, oldName: string, newName: string, span: SourceSpan): void {
    const column = table.column(oldName);
    if (!column) {
      throw semantic('UndefinedColumn', `Column '${oldName}' does not exist in table '${table.qualifiedName}'`, span, {
        table: table.name,
        column: oldName,
      });
    }
    const clash = table.column(newName);
    if (clash && clash !== column) {
      throw semantic('DuplicateColumn', `Column '${newName}' already exists in table '${table.qualifiedName}'`, span, {
        table: table.name,
        column: newName,
      });
    }

    const from = column.name;
    const rename = (name: string): string => (name === from ? newName : name);
    const references = this.state
      .referencingForeignKeys(table.schema, table.name, from)
      .filter((ref) => ref.constraint.referencedColumns.length > 0);

    table.renameColumn(from, newName);
    for (const constraint of table.constraints) {
      constraint.columns = constraint.columns.map(rename);
    }
    for (const index of table.indexes) {
      for (const key of index.keys) {
        if (key.column !== undefined) key.column = rename(key.column);
      }
    }
    for (const { table: owner, constraint } of references) {
      this.recordTable(owner);
      constraint.referencedColumns = constraint.referencedColumns.map(rename);
    }
  }

  private alterColumn(table: Table, name: string, action: AlterColumnAction, span: SourceSpan): void {
    const column = table.column(name);
    if (!column) {
      throw semantic('UndefinedColumn', `Column '${name}' does not exist in table '${table.qualifiedName}'`, span, {
        table: table.name,
        column: name,
      });
    }
    const ownRecord = (type: AnyConstraint['type']) =>
      (c: AnyConstraint): boolean => c.type === type && c.columns.length === 1 && c.columns[0] === column.name;

    switch (action.type) {
      case 'SET NOT NULL':
        column.nullable = false;
        break;

      case 'DROP NOT NULL':
        if (table.primaryKey?.columns.includes(column.name)) {
          throw semantic('ConstraintConflict', `Column '${name}' is in the primary key of table '${table.qualifiedName}'`, span, {
            table: table.name,
            column: name,
          });
        }
        column.nullable = true;
        table.removeConstraints(ownRecord('NOT_NULL'));
        break;

      case 'SET DEFAULT':
        column.defaultExpression = action.expression;
        for (const constraint of table.constraints) {
          if (constraint.type === 'DEFAULT' && ownRecord('DEFAULT')(constraint)) {
            constraint.expression = action.expression;
          }
        }
        break;

      case 'DROP DEFAULT':
        delete column.defaultExpression;
        table.removeConstraints(ownRecord('DEFAULT'));
        break;

      case 'SET DATA TYPE': {
        const type = toTypeReference(action.dataType, this.rules);
        this.resolveType(type, table.schema, action.dataType.span, { table: table.name, column: name });
        column.type = type;
        if (action.collation !== undefined) column.collation = action.collation;
        break;
      }
    }
  }

  private moveTable(table: Table, target: string, span: SourceSpan): void {
    const destination = this.state.schema(target);
    if (!destination) {
      throw semantic('UndefinedSchema', `Schema '${target}' does not exist`, span, { schema: target });
    }
    const source = this.schemaOf(table);
    if (destination === source) return;
    if (destination.hasTable(table.name)) {
      throw semantic('DuplicateTable', `Table '${qualifyName(target, table.name)}' already exists`, span, {
        schema: target,
        table: table.name,
      });
    }

    const references = this.state.referencingForeignKeys(table.schema, table.name);
    this.recordSchema(source).removeTable(table.name);
    this.recordSchema(destination).addTable(table);
    for (const { table: owner, constraint } of references) {
      this.recordTable(owner);
      constraint.referencedTable.schema = destination.name;
    }
  }

  // ---------------------------------------------------------------------------
  // DROP TABLE
  // ---------------------------------------------------------------------------

  private dropTable(statement: DropTableStatement): Outcome {
    const targets: Table[] = [];
    for (const name of statement.tables) {
      const table = this.findTable(name);
      if (table) {
        targets.push(table);
      } else if (!statement.ifExists) {
        this.requireTable(name);
      }
    }
    if (targets.length === 0) return 'skipped';

    for (const table of targets) {
      const dependents = this.state
        .referencingForeignKeys(table.schema, table.name)
        .filter((ref) => !targets.includes(ref.table));
      this.dropDependents(dependents, statement.cascade, `table '${table.qualifiedName}'`);
    }
    for (const table of targets) {
      this.recordSchema(this.schemaOf(table)).removeTable(table.name);
    }

    return 'applied';
  }

  // ---------------------------------------------------------------------------
  // INDEXES
  // ---------------------------------------------------------------------------

  private indexTaken(schema: Schema, table: Table, name: string): boolean {
    return this.rules.indexScope === 'table'
      ? table.index(name) !== undefined
      : schema.index(name) !== undefined;
  }

  private createIndex(statement: CreateIndexStatement): Outcome {
    return this.addIndex(this.requireTable(statement.table), {
      name: statement.name,
      columns: statement.columns,
      unique: statement.unique,
      method: statement.method,
      where: statement.where,
      ifNotExists: statement.ifNotExists,
      span: statement.span,
    });
  }

  private tableIndexRequest(index: TableIndexDefinition): IndexRequest {
    return {
      name: index.name,
      columns: index.columns,
      unique: false,
      method: index.method,
      ifNotExists: false,
      span: index.span,
    };
  }

  private addIndex(table: Table, request: IndexRequest): Outcome {
    const schema = this.schemaOf(table);

    const keys = request.columns.map((column) => {
      const key = toIndexKey(column);
      if (column.name === undefined) return key;

      const target = table.column(column.name);
      if (!target) {
        throw semantic('UndefinedColumn', `Column '${column.name}' does not exist in table '${table.qualifiedName}'`, column.span, {
          table: table.name,
          column: column.name,
        });
      }
      key.column = target.name;
      return key;
    });

    let name = request.name;
    if (name === undefined) {
      const base = [table.name, ...keys.map((key) => key.column ?? 'expr'), 'idx'].join('_');
      name = uniqueConstraintName(base, (candidate) => this.indexTaken(schema, table, candidate));
    } else if (this.indexTaken(schema, table, name)) {
      if (request.ifNotExists) return 'skipped';
      throw semantic('DuplicateIndex', `Index '${name}' already exists`, request.span, {
        schema: table.schema,
        table: table.name,
        constraint: name,
      });
    }

    const index = new Index({
      name,
      implicitName: request.name === undefined,
      tableName: table.name,
      keys,
      unique: request.unique,
      method: request.method,
      where: request.where,
    });
    this.recordTable(table).addIndex(index);

    if (
      index.unique &&
      this.options.surfaceUniqueIndexes &&
      index.where === undefined &&
      index.columns.length === index.keys.length
    ) {
      this.addConstraint(table, {
        type: 'UNIQUE',
        name,
        implicitName: false,
        tableName: table.name,
        columns: index.columns,
        fromIndex: true,
      }, request.span);
    }

    return 'applied';
  }

  private dropIndex(statement: DropIndexStatement): Outcome {
    let dropped = 0;

    for (const name of statement.indexes) {
      const found = statement.table
        ? this.lookupIndexOn(this.requireTable(statement.table), name.name)
        : this.state.schema(this.schemaName(name.schema))?.index(name.name);

      if (!found) {
        if (statement.ifExists) continue;
        throw semantic('UndefinedIndex', `Index '${name.name}' does not exist`, name.span, {
          schema: this.schemaName(name.schema),
          constraint: name.name,
        });
      }

      this.removeIndex(found.table, found.index, statement.cascade, name.span);
      dropped++;
    }

    return dropped > 0 ? 'applied' : 'skipped';
  }

  /**
   * Remove an index with the unique constraint it surfaced, if any
   */
  private removeIndex(table: Table, index: Index, cascade: boolean, span: SourceSpan): void {
    this.recordTable(table);
    const surfaced = table.uniqueConstraints.find((c) => c.fromIndex && c.name === index.name);
    if (surfaced) {
      this.dropConstraint(table, surfaced, cascade, span);
      return;
    }

    if (index.unique) {
      this.dropDependents(
        this.keyDependents(table, index.columns, undefined, index),
        cascade,
        `index '${index.name}'`,
        span
      );
    }
    table.removeIndexes((i) => i === index);
  }

  private lookupIndexOn(table: Table, name: string): { table: Table; index: Index } | undefined {
    const index = table.index(name);
    return index ? { table, index } : undefined;
  }

  // ---------------------------------------------------------------------------
  // SCHEMAS
  // ---------------------------------------------------------------------------

  private createSchema(statement: CreateSchemaStatement): Outcome {
    if (this.state.hasSchema(statement.name)) {
      if (statement.ifNotExists) return 'skipped';
      throw semantic('DuplicateSchema', `Schema '${statement.name}' already exists`, statement.span, {
        schema: statement.name,
      });
    }
    this.recordCatalog();
    this.state.addSchema(this.newSchema(statement.name));
    return 'applied';
  }

  private dropSchema(statement: DropSchemaStatement): Outcome {
    let dropped = 0;

    for (const requested of statement.names) {
      const schema = this.state.schema(requested);
      if (!schema) {
        if (statement.ifExists) continue;
        throw semantic('UndefinedSchema', `Schema '${requested}' does not exist`, statement.span, { schema: requested });
      }

      const { name } = schema;
      if (!schema.isEmpty && !statement.cascade && this.options.requireCascade) {
        throw semantic('DependentObjects', `Cannot drop schema '${name}' because it is not empty`, statement.span, {
          schema: name,
        });
      }

      const referencesSchema = (c: AnyConstraint): boolean =>
        c.type === 'FOREIGN_KEY' && c.referencedTable.schema === name;
      for (const owner of this.state.tables) {
        if (owner.schema === name || !owner.constraints.some(referencesSchema)) continue;
        this.recordTable(owner).removeConstraints(referencesSchema);
      }
      for (const type of schema.types) {
        this.removeTypeUsers(name, type.name, statement.span, (table) => table.schema !== name);
      }

      this.recordCatalog();
      this.state.removeSchema(name);
      dropped++;
    }

    return dropped > 0 ? 'applied' : 'skipped';
  }

  // ---------------------------------------------------------------------------
  // USER TYPES
  // ---------------------------------------------------------------------------

  private createType(statement: CreateTypeStatement): Outcome {
    const schemaName = this.schemaName(statement.name.schema);
    const name = statement.name.name;
    const schema = this.ensureSchema(schemaName, statement.name.span);

    this.recordSchema(schema);
    if (schema.type(name)) {
      throw semantic('DuplicateType', `Type '${qualifyName(schemaName, name)}' already exists`, statement.name.span, {
        schema: schemaName,
      });
    }

    const { definition } = statement;
    if (definition.kind === 'enum') {
      schema.addType({ kind: 'enum', name, values: [...definition.values] });
      return 'applied';
    }

    const attributes: TypeAttributeDefinition[] = [];
    for (const attribute of definition.attributes) {
      if (attributes.some((a) => a.name === attribute.name)) {
        throw semantic('DuplicateColumn', `Attribute '${attribute.name}' is declared more than once in type '${name}'`, attribute.span, {
          schema: schemaName,
          column: attribute.name,
        });
      }
      const type = toTypeReference(attribute.dataType, this.rules);
      this.resolveType(type, schemaName, attribute.dataType.span, { column: attribute.name });
      const resolved: TypeAttributeDefinition = { name: attribute.name, type };
      if (attribute.collation !== undefined) resolved.collation = attribute.collation;
      attributes.push(resolved);
    }
    schema.addType({ kind: 'composite', name, attributes });
    return 'applied';
  }

  /**
   * Columns and composite attributes whose type is `schema.name`
   */
  private typeUsers(schema: string, name: string): {
    columns: { table: Table; column: string }[];
    attributes: { schema: Schema; type: string; attribute: string }[];
  } {
    const uses = (type: TypeReference): boolean =>
      !type.builtin && type.schema === schema && this.sameName(type.name, name);

    const columns = this.state.tables.flatMap((table) =>
      table.columns.filter((column) => uses(column.type)).map((column) => ({ table, column: column.name }))
    );
    const attributes = this.state.schemas.flatMap((owner) =>
      owner.types.flatMap((type) =>
        type.kind === 'composite'
          ? type.attributes.filter((a) => uses(a.type)).map((a) => ({ schema: owner, type: type.name, attribute: a.name }))
          : []
      )
    );
    return { columns, attributes };
  }

  private removeTypeUsers(
    schema: string,
    name: string,
    span: SourceSpan,
    include: (table: Table) => boolean = () => true
  ): void {
    const users = this.typeUsers(schema, name);
    for (const { table, column } of users.columns) {
      if (include(table)) this.dropColumn(table, column, true, span);
    }
    for (const user of users.attributes) {
      const type = this.recordSchema(user.schema).type(user.type);
      if (type?.kind === 'composite') {
        type.attributes = type.attributes.filter((a) => a.name !== user.attribute);
      }
    }
  }

  private dropType(statement: DropTypeStatement): Outcome {
    let dropped = 0;

    for (const name of statement.names) {
      const schemaName = this.schemaName(name.schema);
      const schema = this.state.schema(schemaName);
      const type = schema?.type(name.name);
      if (!schema || !type) {
        if (statement.ifExists) continue;
        throw semantic('UnknownType', `Type '${qualifyName(schemaName, name.name)}' does not exist`, name.span, {
          schema: schemaName,
        });
      }

      const users = this.typeUsers(schema.name, type.name);
      const [firstColumn] = users.columns;
      const [firstAttribute] = users.attributes;
      if ((firstColumn || firstAttribute) && !statement.cascade && this.options.requireCascade) {
        const user = firstColumn
          ? `column '${firstColumn.table.qualifiedName}.${firstColumn.column}'`
          : `attribute '${firstAttribute.type}.${firstAttribute.attribute}'`;
        throw semantic(
          'DependentObjects',
          `Cannot drop type '${qualifyName(schemaName, name.name)}' because ${user} depends on it`,
          name.span,
          { schema: schemaName, table: firstColumn?.table.name, column: firstColumn?.column }
        );
      }

      this.removeTypeUsers(schema.name, type.name, name.span);
      this.recordSchema(schema).removeType(type.name);
      dropped++;
    }

    return dropped > 0 ? 'applied' : 'skipped';
  }

  // ---------------------------------------------------------------------------
  // COMMENT ON
  // ---------------------------------------------------------------------------

  private comment(statement: CommentStatement): Outcome {
    const { target, comment } = statement;

    switch (target.kind) {
      case 'SCHEMA': {
        const schema = this.state.schema(target.name);
        if (!schema) {
          throw semantic('UndefinedSchema', `Schema '${target.name}' does not exist`, statement.span, {
            schema: target.name,
          });
        }
        this.recordSchema(schema).comment = comment ?? undefined;
        break;
      }

      case 'TABLE':
        this.recordTable(this.requireTable(target.table)).comment = comment ?? undefined;
        break;

      case 'COLUMN': {
        const table = this.recordTable(this.requireTable(target.table));
        const column = table.column(target.column);
        if (!column) {
          throw semantic('UndefinedColumn', `Column '${target.column}' does not exist in table '${table.qualifiedName}'`, target.span, {
            table: table.name,
            column: target.column,
          });
        }
        if (comment === null) {
          delete column.comment;
        } else {
          column.comment = comment;
        }
        break;
      }
    }

    return 'applied';
  }
}

