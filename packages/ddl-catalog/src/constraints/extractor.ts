/**
 * Constraint Extractor
 *
 * Normalizes column definitions and inline (column-level) or out-of-line
 * (table-level) constraint syntax into catalog columns and one uniform
 * constraint representation.
 *
 * Inline NOT NULL and DEFAULT fold into the column itself; they are kept as
 * constraint records only when declared with a name, so that DROP
 * CONSTRAINT can target them.
 */

import type {
  ColumnDefinition,
  ColumnDataType,
  CreateTableStatement,
  KeyColumn,
  QualifiedName,
  ReferencesClause,
  TableConstraint,
} from '../parser/ddl-types.js';
import type { SourceSpan } from '../parser/shared/types.js';
import type { Column, TypeReference } from '../catalog/types.js';
import type {
  AnyConstraint,
  ConstraintType,
  ForeignKeyConstraint,
  PrimaryKeyConstraint,
  TableRef,
} from './types.js';
import {
  generateConstraintName,
  isPrimaryKeyConstraint,
  parseDeferrableState,
  parseReferentialAction,
} from './types.js';
import { isBuiltinType, type DialectRules } from '../dialects/index.js';
import { SemanticError } from '../errors/semantic-errors.js';

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * What the extractor needs to know about the statement being extracted
 */
export interface ExtractionContext {
  /** Owning table name */
  table: string;
  /** Dialect of the source */
  rules: DialectRules;
  /** Qualify a referenced table name against the catalog */
  resolveTable(name: QualifiedName): TableRef;
}

/**
 * Normalized columns and the constraints they declare
 */
export interface ExtractedColumns {
  columns: Column[];
  constraints: AnyConstraint[];
}

// =============================================================================
// TYPES
// =============================================================================

/**
 * Resolve a parsed data type to a type reference
 *
 * Unquoted, unqualified names that the dialect builds in are canonicalized
 * to upper case; anything else is taken to name a user type.
 */
export function toTypeReference(dataType: ColumnDataType, rules: DialectRules): TypeReference {
  const builtin = !dataType.quoted &&
    dataType.schema === undefined &&
    isBuiltinType(rules, dataType.name);

  const type: TypeReference = {
    name: builtin ? dataType.name.toUpperCase() : dataType.name,
    parameters: [...dataType.parameters],
    arrayDimensions: dataType.arrayDimensions,
    unsigned: dataType.unsigned,
    builtin,
  };
  if (dataType.schema !== undefined) type.schema = dataType.schema;
  if (dataType.values !== undefined) type.values = [...dataType.values];
  return type;
}

/**
 * Type of a column declared without one (SQLite)
 */
function untypedReference(): TypeReference {
  return { name: 'ANY', parameters: [], arrayDimensions: 0, unsigned: false, builtin: true };
}

// =============================================================================
// HELPERS
// =============================================================================

function conflict(message: string, span: SourceSpan | undefined, context: ExtractionContext, column?: string): SemanticError {
  return new SemanticError('ConstraintConflict', message, {
    span,
    context: { table: context.table, column },
  });
}

function naming(
  name: string | undefined,
  type: ConstraintType,
  columns: string[],
  context: ExtractionContext
): { name: string; implicitName: boolean } {
  if (name !== undefined) {
    return { name, implicitName: false };
  }
  return {
    name: generateConstraintName(context.table, type, columns, context.rules.constraintNaming),
    implicitName: true,
  };
}

function keyColumnNames(columns: KeyColumn[]): string[] {
  return columns.map((column) => column.name);
}

function foreignKey(
  name: string | undefined,
  columns: string[],
  references: ReferencesClause,
  context: ExtractionContext
): ForeignKeyConstraint {
  return {
    type: 'FOREIGN_KEY',
    ...naming(name, 'FOREIGN_KEY', columns, context),
    tableName: context.table,
    columns,
    referencedTable: context.resolveTable(references.table),
    referencedColumns: references.columns ? keyColumnNames(references.columns) : [],
    onDelete: parseReferentialAction(references.onDelete),
    onUpdate: parseReferentialAction(references.onUpdate),
    matchType: references.match,
    deferrable: parseDeferrableState(references.deferrable),
  };
}

/**
 * At most one primary key among `constraints`
 */
function assertSinglePrimaryKey(
  constraints: readonly AnyConstraint[],
  spans: ReadonlyMap<AnyConstraint, SourceSpan>,
  context: ExtractionContext
): void {
  const keys = constraints.filter(isPrimaryKeyConstraint);
  if (keys.length > 1) {
    throw conflict(
      `Multiple primary keys for table '${context.table}' are not allowed`,
      spans.get(keys[1]),
      context
    );
  }
}

// =============================================================================
// COLUMN EXTRACTION
// =============================================================================

/**
 * Normalize one column definition and its inline constraints
 */
function extractColumn(
  spec: ColumnDefinition,
  context: ExtractionContext,
  spans: Map<AnyConstraint, SourceSpan>
): ExtractedColumns {
  const type = spec.dataType ? toTypeReference(spec.dataType, context.rules) : untypedReference();
  const column: Column = {
    name: spec.name,
    type,
    nullable: true,
    autoIncrement: type.builtin && context.rules.autoIncrementTypes.has(type.name),
  };
  const constraints: AnyConstraint[] = [];
  const add = (constraint: AnyConstraint, span: SourceSpan): void => {
    constraints.push(constraint);
    spans.set(constraint, span);
  };

  let primaryKey: PrimaryKeyConstraint | undefined;
  let explicitNull: SourceSpan | undefined;
  let notNull = false;

  for (const constraint of spec.constraints) {
    switch (constraint.type) {
      case 'PRIMARY KEY':
        if (primaryKey) {
          throw conflict(`Column '${spec.name}' declares PRIMARY KEY twice`, constraint.span, context, spec.name);
        }
        primaryKey = {
          type: 'PRIMARY_KEY',
          ...naming(constraint.name, 'PRIMARY_KEY', [spec.name], context),
          tableName: context.table,
          columns: [spec.name],
          autoIncrement: constraint.autoincrement,
        };
        if (constraint.autoincrement) column.autoIncrement = true;
        add(primaryKey, constraint.span);
        break;

      case 'NOT NULL':
        notNull = true;
        if (constraint.name !== undefined) {
          add({
            type: 'NOT_NULL',
            name: constraint.name,
            implicitName: false,
            tableName: context.table,
            columns: [spec.name],
          }, constraint.span);
        }
        break;

      case 'NULL':
        explicitNull = constraint.span;
        break;

      case 'UNIQUE':
        add({
          type: 'UNIQUE',
          ...naming(constraint.name, 'UNIQUE', [spec.name], context),
          tableName: context.table,
          columns: [spec.name],
          fromIndex: false,
        }, constraint.span);
        break;

      case 'CHECK':
        add({
          type: 'CHECK',
          ...naming(constraint.name, 'CHECK', [spec.name], context),
          tableName: context.table,
          columns: [spec.name],
          expression: constraint.expression,
        }, constraint.span);
        break;

      case 'DEFAULT':
        column.defaultExpression = constraint.expression;
        if (constraint.name !== undefined) {
          add({
            type: 'DEFAULT',
            name: constraint.name,
            implicitName: false,
            tableName: context.table,
            columns: [spec.name],
            expression: constraint.expression,
          }, constraint.span);
        }
        break;

      case 'COLLATE':
        column.collation = constraint.collation;
        break;

      case 'REFERENCES':
        add(foreignKey(constraint.name, [spec.name], constraint, context), constraint.span);
        break;

      case 'GENERATED':
        if (constraint.identity) {
          column.autoIncrement = true;
        } else if (constraint.expression !== undefined) {
          column.generated = {
            expression: constraint.expression,
            storage: constraint.storage ?? 'VIRTUAL',
          };
        }
        break;

      case 'AUTO_INCREMENT':
        column.autoIncrement = true;
        break;

      case 'COMMENT':
        column.comment = constraint.text;
        break;
    }
  }

  if (explicitNull && (notNull || primaryKey)) {
    throw conflict(
      `Column '${spec.name}' is declared both NULL and ${primaryKey ? 'PRIMARY KEY' : 'NOT NULL'}`,
      explicitNull,
      context,
      spec.name
    );
  }

  if (notNull || primaryKey || column.autoIncrement) {
    column.nullable = false;
  }
  if (primaryKey && column.autoIncrement) {
    primaryKey.autoIncrement = true;
  }

  return { columns: [column], constraints };
}

function collectColumns(
  specs: readonly ColumnDefinition[],
  context: ExtractionContext,
  spans: Map<AnyConstraint, SourceSpan>
): ExtractedColumns {
  const result: ExtractedColumns = { columns: [], constraints: [] };
  for (const spec of specs) {
    const extracted = extractColumn(spec, context, spans);
    result.columns.push(...extracted.columns);
    result.constraints.push(...extracted.constraints);
  }
  return result;
}

/**
 * Normalize column definitions into columns and constraints
 *
 * @throws SemanticError `ConstraintConflict` for NULL combined with NOT NULL
 * or PRIMARY KEY, and for more than one primary key
 */
export function extractColumns(
  specs: readonly ColumnDefinition[],
  context: ExtractionContext
): ExtractedColumns {
  const spans = new Map<AnyConstraint, SourceSpan>();
  const result = collectColumns(specs, context, spans);
  assertSinglePrimaryKey(result.constraints, spans, context);
  return result;
}

// =============================================================================
// TABLE CONSTRAINT EXTRACTION
// =============================================================================

/**
 * Normalize a table-level constraint
 *
 * @throws SemanticError `ConstraintConflict` when a key lists a column twice
 */
export function extractTableConstraint(
  spec: TableConstraint,
  context: ExtractionContext
): AnyConstraint {
  const columns = 'columns' in spec ? keyColumnNames(spec.columns) : [];

  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw conflict(
        `Column '${column}' appears more than once in ${spec.type} constraint`,
        spec.span,
        context,
        column
      );
    }
    seen.add(column);
  }

  switch (spec.type) {
    case 'PRIMARY KEY':
      return {
        type: 'PRIMARY_KEY',
        ...naming(spec.name, 'PRIMARY_KEY', columns, context),
        tableName: context.table,
        columns,
        autoIncrement: false,
      };
    case 'UNIQUE':
      return {
        type: 'UNIQUE',
        ...naming(spec.name, 'UNIQUE', columns, context),
        tableName: context.table,
        columns,
        fromIndex: false,
      };
    case 'FOREIGN KEY':
      return foreignKey(spec.name, columns, spec.references, context);
    case 'CHECK':
      return {
        type: 'CHECK',
        ...naming(spec.name, 'CHECK', [], context),
        tableName: context.table,
        columns: [],
        expression: spec.expression,
      };
  }
}

/**
 * Extract the columns and every constraint of a CREATE TABLE statement
 *
 * Primary key columns become NOT NULL; a single-column primary key over an
 * auto-increment column is itself auto-increment.
 */
export function extractTable(
  statement: CreateTableStatement,
  context: ExtractionContext
): ExtractedColumns {
  const spans = new Map<AnyConstraint, SourceSpan>();
  const { columns, constraints } = collectColumns(statement.columns, context, spans);

  for (const spec of statement.constraints) {
    const constraint = extractTableConstraint(spec, context);
    spans.set(constraint, spec.span);
    constraints.push(constraint);
  }

  assertSinglePrimaryKey(constraints, spans, context);

  const primaryKey = constraints.find(isPrimaryKeyConstraint);
  if (primaryKey) {
    for (const column of columns) {
      if (primaryKey.columns.includes(column.name)) {
        column.nullable = false;
      }
    }
    const [only] = primaryKey.columns;
    if (primaryKey.columns.length === 1 && columns.some((c) => c.name === only && c.autoIncrement)) {
      primaryKey.autoIncrement = true;
    }
  }

  return { columns, constraints };
}
