/**
 * Catalog Validator
 *
 * Checks that run against the evolving catalog:
 * - Column types resolve to a built-in or a declared user type
 * - Constraint columns exist in their table
 * - Foreign key targets exist and are keyed
 */

import type { AnyConstraint, ForeignKeyConstraint } from '../constraints/types.js';
import { isKeyConstraint, sameColumnSet } from '../constraints/types.js';
import type { ErrorContext } from '../errors/base.js';
import { SemanticError } from '../errors/semantic-errors.js';
import type { SourceSpan } from '../parser/shared/types.js';
import { qualifyName, type Catalog, type Table } from './catalog.js';
import type { TypeReference } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Resolve a user type reference, recording the schema and spelling it was
 * found under
 *
 * An unqualified name is looked up in `schema`, then in the catalog's
 * default schema.
 *
 * @throws SemanticError `UnknownType`
 */
export function resolveTypeReference(
  type: TypeReference,
  catalog: Catalog,
  schema: string,
  options: { span?: SourceSpan; context?: ErrorContext } = {}
): void {
  if (type.builtin) return;

  const candidates = type.schema !== undefined
    ? [type.schema]
    : [...new Set([schema, catalog.defaultSchema])];

  for (const candidate of candidates) {
    const owner = catalog.schema(candidate);
    const found = owner?.type(type.name);
    if (owner && found) {
      type.schema = owner.name;
      type.name = found.name;
      return;
    }
  }

  const name = type.schema !== undefined ? qualifyName(type.schema, type.name) : type.name;
  throw new SemanticError('UnknownType', `Type '${name}' does not exist`, {
    span: options.span,
    context: { ...options.context, schema },
  });
}

// =============================================================================
// CONSTRAINTS
// =============================================================================

/**
 * Every column a constraint names must exist in its table
 *
 * @throws SemanticError `UndefinedColumn`
 */
export function assertConstraintColumns(table: Table, constraint: AnyConstraint, span?: SourceSpan): void {
  for (const column of constraint.columns) {
    if (!table.hasColumn(column)) {
      throw new SemanticError(
        'UndefinedColumn',
        `Column '${column}' named in constraint '${constraint.name}' does not exist in table '${table.qualifiedName}'`,
        {
          span,
          context: { schema: table.schema, table: table.name, column, constraint: constraint.name },
        }
      );
    }
  }
}

/**
 * Whether `table` has a primary key, unique constraint or full unique
 * index over exactly `columns`
 */
export function isKeyedBy(table: Table, columns: readonly string[]): boolean {
  if (table.constraints.some((c) => isKeyConstraint(c) && sameColumnSet(c.columns, columns))) {
    return true;
  }
  return table.indexes.some((index) =>
    index.unique &&
    index.where === undefined &&
    index.columns.length === index.keys.length &&
    sameColumnSet(index.columns, columns)
  );
}

/**
 * Check a foreign key against its target table
 *
 * Referenced columns left out of the declaration resolve to the target's
 * primary key and are filled in. The reference is rewritten to the target's
 * own spelling of its names.
 *
 * @throws SemanticError `DanglingForeignKey`
 */
export function validateForeignKey(
  catalog: Catalog,
  constraint: ForeignKeyConstraint,
  span?: SourceSpan
): void {
  const { schema, name } = constraint.referencedTable;
  const target = catalog.table(schema, name);
  const dangling = (message: string, column?: string): SemanticError =>
    new SemanticError('DanglingForeignKey', `Foreign key '${constraint.name}' ${message}`, {
      span,
      context: { table: constraint.tableName, constraint: constraint.name, column },
    });

  if (!target) {
    throw dangling(`references missing table '${qualifyName(schema, name)}'`);
  }

  if (constraint.referencedColumns.length === 0) {
    const primaryKey = target.primaryKey;
    if (!primaryKey) {
      throw dangling(`references table '${target.qualifiedName}', which has no primary key`);
    }
    constraint.referencedColumns = [...primaryKey.columns];
  }

  const referenced: string[] = [];
  for (const column of constraint.referencedColumns) {
    const found = target.column(column);
    if (!found) {
      throw dangling(`references missing column '${column}' of table '${target.qualifiedName}'`, column);
    }
    referenced.push(found.name);
  }
  constraint.referencedTable = { schema: target.schema, name: target.name };
  constraint.referencedColumns = referenced;

  if (constraint.columns.length !== constraint.referencedColumns.length) {
    throw dangling(
      `has ${constraint.columns.length} column(s) but references ${constraint.referencedColumns.length}`
    );
  }

  if (!isKeyedBy(target, constraint.referencedColumns)) {
    throw dangling(
      `references (${constraint.referencedColumns.join(', ')}) of table '${target.qualifiedName}', ` +
      'which is not covered by a primary key or unique constraint'
    );
  }
}

/**
 * Check every foreign key in the catalog
 *
 * @throws SemanticError `DanglingForeignKey` for the first failing key
 */
export function validateForeignKeys(catalog: Catalog): void {
  for (const table of catalog.tables) {
    for (const constraint of table.foreignKeys) {
      validateForeignKey(catalog, constraint);
    }
  }
}
