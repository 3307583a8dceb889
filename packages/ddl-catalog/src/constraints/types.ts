/**
 * Constraint Types
 *
 * Normalized constraint representation shared by column-level and
 * table-level syntax. Every variant carries its name, whether that name was
 * generated, the owning table and the constrained columns in declared order.
 */

import type { ReferenceAction, DeferrableClause } from '../parser/ddl-types.js';

// =============================================================================
// CONSTRAINT TYPES
// =============================================================================

/**
 * Constraint type enumeration
 */
export type ConstraintType =
  | 'PRIMARY_KEY'
  | 'FOREIGN_KEY'
  | 'UNIQUE'
  | 'NOT_NULL'
  | 'CHECK'
  | 'DEFAULT';

/**
 * Foreign key referential actions
 */
export type ReferentialAction =
  | 'CASCADE'
  | 'SET_NULL'
  | 'SET_DEFAULT'
  | 'RESTRICT'
  | 'NO_ACTION';

/**
 * Constraint deferrable state
 */
export type DeferrableState =
  | 'NOT_DEFERRABLE'
  | 'DEFERRABLE_INITIALLY_IMMEDIATE'
  | 'DEFERRABLE_INITIALLY_DEFERRED';

/**
 * Implicit constraint naming convention
 */
export type ConstraintNaming = 'suffix' | 'prefix';

/**
 * Name-based reference to a table; resolved against the catalog on use
 */
export interface TableRef {
  schema: string;
  name: string;
}

// =============================================================================
// BASE CONSTRAINT INTERFACE
// =============================================================================

/**
 * Base constraint interface
 */
export interface Constraint {
  /** Constraint name (generated if not specified) */
  name: string;
  /** Name was generated rather than declared */
  implicitName: boolean;
  /** Constraint type */
  type: ConstraintType;
  /** Table the constraint belongs to */
  tableName: string;
  /** Columns involved in the constraint, in declared order */
  columns: string[];
}

/**
 * Primary key constraint
 * Can be single column or composite
 */
export interface PrimaryKeyConstraint extends Constraint {
  type: 'PRIMARY_KEY';
  /** Whether this is an auto-increment primary key */
  autoIncrement: boolean;
}

/**
 * Foreign key constraint definition
 */
export interface ForeignKeyConstraint extends Constraint {
  type: 'FOREIGN_KEY';
  /** Referenced table */
  referencedTable: TableRef;
  /**
   * Referenced columns in the foreign table; empty until resolved to the
   * referenced primary key when the declaration omitted them
   */
  referencedColumns: string[];
  /** Action on DELETE of referenced row */
  onDelete: ReferentialAction;
  /** Action on UPDATE of referenced row */
  onUpdate: ReferentialAction;
  /** Match type (FULL, PARTIAL, SIMPLE) */
  matchType?: 'FULL' | 'PARTIAL' | 'SIMPLE';
  /** Deferrable state */
  deferrable: DeferrableState;
}

/**
 * Unique constraint
 * Can be single column or composite
 */
export interface UniqueConstraint extends Constraint {
  type: 'UNIQUE';
  /** Surfaced from a unique index of the same name */
  fromIndex: boolean;
}

/**
 * Not null constraint (only recorded when declared with a name)
 */
export interface NotNullConstraint extends Constraint {
  type: 'NOT_NULL';
}

/**
 * Check constraint with SQL expression
 *
 * Column-level checks list their column; table-level checks list none.
 */
export interface CheckConstraint extends Constraint {
  type: 'CHECK';
  /** SQL expression text, not evaluated */
  expression: string;
}

/**
 * Default value constraint (only recorded when declared with a name)
 */
export interface DefaultConstraint extends Constraint {
  type: 'DEFAULT';
  /** Default expression text, not evaluated */
  expression: string;
}

/**
 * Any constraint type
 */
export type AnyConstraint =
  | PrimaryKeyConstraint
  | ForeignKeyConstraint
  | UniqueConstraint
  | NotNullConstraint
  | CheckConstraint
  | DefaultConstraint;

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if constraint is a primary key
 */
export function isPrimaryKeyConstraint(
  constraint: AnyConstraint
): constraint is PrimaryKeyConstraint {
  return constraint.type === 'PRIMARY_KEY';
}

/**
 * Check if constraint is a foreign key
 */
export function isForeignKeyConstraint(
  constraint: AnyConstraint
): constraint is ForeignKeyConstraint {
  return constraint.type === 'FOREIGN_KEY';
}

/**
 * Check if constraint is a unique constraint
 */
export function isUniqueConstraint(
  constraint: AnyConstraint
): constraint is UniqueConstraint {
  return constraint.type === 'UNIQUE';
}

/**
 * Primary key or unique constraint
 */
export function isKeyConstraint(
  constraint: AnyConstraint
): constraint is PrimaryKeyConstraint | UniqueConstraint {
  return constraint.type === 'PRIMARY_KEY' || constraint.type === 'UNIQUE';
}

// =============================================================================
// CONSTRAINT NAMING
// =============================================================================

const PREFIXES: Record<ConstraintType, string> = {
  PRIMARY_KEY: 'pk',
  FOREIGN_KEY: 'fk',
  UNIQUE: 'uq',
  NOT_NULL: 'nn',
  CHECK: 'ck',
  DEFAULT: 'df',
};

const SUFFIXES: Record<ConstraintType, string> = {
  PRIMARY_KEY: 'pkey',
  FOREIGN_KEY: 'fkey',
  UNIQUE: 'key',
  NOT_NULL: 'not_null',
  CHECK: 'check',
  DEFAULT: 'default',
};

/**
 * Generate a constraint name if not provided
 *
 * `suffix` follows PostgreSQL (`users_pkey`, `posts_user_id_fkey`,
 * `users_email_key`, `users_check`); `prefix` gives `pk_users_id`,
 * `fk_posts_user_id`, `uq_users_email`, `ck_users`.
 */
export function generateConstraintName(
  tableName: string,
  type: ConstraintType,
  columns: string[],
  naming: ConstraintNaming = 'prefix'
): string {
  if (naming === 'suffix') {
    // PostgreSQL never lists primary key columns in the name
    const parts = type === 'PRIMARY_KEY' ? [tableName] : [tableName, ...columns];
    return [...parts, SUFFIXES[type]].join('_');
  }

  return [PREFIXES[type], tableName, ...columns].join('_');
}

/**
 * Append the smallest counter that makes `name` unused (`users_check1`)
 */
export function uniqueConstraintName(name: string, isTaken: (candidate: string) => boolean): string {
  if (!isTaken(name)) return name;

  let counter = 1;
  while (isTaken(`${name}${counter}`)) {
    counter++;
  }
  return `${name}${counter}`;
}

// =============================================================================
// REFERENTIAL ACTION HELPERS
// =============================================================================

/**
 * Parse referential action from string
 */
export function parseReferentialAction(action: ReferenceAction | string | undefined): ReferentialAction {
  const normalized = (action ?? '').toUpperCase().replace(/\s+/g, '_');
  switch (normalized) {
    case 'CASCADE':
      return 'CASCADE';
    case 'SET_NULL':
      return 'SET_NULL';
    case 'SET_DEFAULT':
      return 'SET_DEFAULT';
    case 'RESTRICT':
      return 'RESTRICT';
    case 'NO_ACTION':
    default:
      return 'NO_ACTION';
  }
}

/**
 * Map a parsed deferrable clause to its state
 */
export function parseDeferrableState(clause: DeferrableClause | undefined): DeferrableState {
  switch (clause) {
    case 'DEFERRABLE':
    case 'DEFERRABLE INITIALLY IMMEDIATE':
      return 'DEFERRABLE_INITIALLY_IMMEDIATE';
    case 'DEFERRABLE INITIALLY DEFERRED':
      return 'DEFERRABLE_INITIALLY_DEFERRED';
    case 'NOT DEFERRABLE':
    case undefined:
      return 'NOT_DEFERRABLE';
  }
}

// =============================================================================
// COLUMN HELPERS
// =============================================================================

/**
 * Whether a constraint covers `column`
 */
export function constraintContains(constraint: AnyConstraint, column: string): boolean {
  return constraint.columns.includes(column);
}

/**
 * Order-insensitive equality of two column lists of the same arity
 */
export function sameColumnSet(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return set.size === a.length && b.every((column) => set.has(column));
}
