/**
 * Semantic Error Classes
 *
 * Errors for statements that parse cleanly but cannot be applied to the
 * current catalog state.
 *
 * @packageDocumentation
 */

import { CatalogError, ErrorCategory, type ErrorContext } from './base.js';
import { SemanticErrorCode } from './codes.js';
import type { SourceSpan } from '../parser/shared/types.js';

// =============================================================================
// Error Kinds
// =============================================================================

/**
 * Named subkinds of semantic failure
 */
export type SemanticErrorKind =
  | 'DuplicateTable'
  | 'DuplicateColumn'
  | 'DuplicateConstraint'
  | 'DuplicateIndex'
  | 'DuplicateSchema'
  | 'DuplicateType'
  | 'UnknownType'
  | 'UndefinedTable'
  | 'UndefinedColumn'
  | 'UndefinedConstraint'
  | 'UndefinedIndex'
  | 'UndefinedSchema'
  | 'DanglingForeignKey'
  | 'ConstraintConflict'
  | 'DependentObjects'
  | 'UnsupportedConstruct';

const KIND_CODES: Record<SemanticErrorKind, SemanticErrorCode> = {
  DuplicateTable: SemanticErrorCode.DUPLICATE_TABLE,
  DuplicateColumn: SemanticErrorCode.DUPLICATE_COLUMN,
  DuplicateConstraint: SemanticErrorCode.DUPLICATE_CONSTRAINT,
  DuplicateIndex: SemanticErrorCode.DUPLICATE_INDEX,
  DuplicateSchema: SemanticErrorCode.DUPLICATE_SCHEMA,
  DuplicateType: SemanticErrorCode.DUPLICATE_TYPE,
  UnknownType: SemanticErrorCode.UNKNOWN_TYPE,
  UndefinedTable: SemanticErrorCode.UNDEFINED_TABLE,
  UndefinedColumn: SemanticErrorCode.UNDEFINED_COLUMN,
  UndefinedConstraint: SemanticErrorCode.UNDEFINED_CONSTRAINT,
  UndefinedIndex: SemanticErrorCode.UNDEFINED_INDEX,
  UndefinedSchema: SemanticErrorCode.UNDEFINED_SCHEMA,
  DanglingForeignKey: SemanticErrorCode.DANGLING_FOREIGN_KEY,
  ConstraintConflict: SemanticErrorCode.CONSTRAINT_CONFLICT,
  DependentObjects: SemanticErrorCode.DEPENDENT_OBJECTS,
  UnsupportedConstruct: SemanticErrorCode.UNSUPPORTED_CONSTRUCT,
};

const RECOVERY_HINTS: Partial<Record<SemanticErrorKind, string>> = {
  DuplicateTable: 'Use CREATE TABLE IF NOT EXISTS or choose a different table name',
  DuplicateIndex: 'Use CREATE INDEX IF NOT EXISTS or choose a different index name',
  DuplicateSchema: 'Use CREATE SCHEMA IF NOT EXISTS',
  UnknownType: 'Declare the type with CREATE TYPE before it is used',
  UndefinedTable: 'Check the table name and schema, or create the table first',
  UndefinedColumn: 'Check the column name against the table definition',
  DanglingForeignKey: 'Reference a primary key or unique constraint of an existing table',
  DependentObjects: 'Add CASCADE to drop the dependent foreign keys as well',
};

// =============================================================================
// Semantic Error
// =============================================================================

/**
 * Statement is well-formed but invalid against the catalog
 *
 * @example
 * ```typescript
 * const result = builder.apply('CREATE TABLE t (x INT); CREATE TABLE t (y INT)');
 * if (!result.success && result.error instanceof SemanticError) {
 *   console.log(result.error.kind); // 'DuplicateTable'
 * }
 * ```
 */
export class SemanticError extends CatalogError {
  readonly code: SemanticErrorCode;
  readonly category = ErrorCategory.SEMANTIC;

  /** Semantic failure subkind */
  readonly kind: SemanticErrorKind;

  constructor(
    kind: SemanticErrorKind,
    message: string,
    options?: { cause?: Error; context?: ErrorContext; span?: SourceSpan }
  ) {
    super(message, options);
    this.name = 'SemanticError';
    this.kind = kind;
    this.code = KIND_CODES[kind];
    this.recoveryHint = RECOVERY_HINTS[kind];
  }
}

/**
 * Check if an unknown value is a semantic error of the given kind
 */
export function isSemanticError(error: unknown, kind?: SemanticErrorKind): error is SemanticError {
  return error instanceof SemanticError && (kind === undefined || error.kind === kind);
}
