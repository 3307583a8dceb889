/**
 * Catalog Types
 *
 * Plain data describing columns, indexes and user types, and the snapshot
 * shapes handed to code generators.
 *
 * @packageDocumentation
 */

import type { AnyConstraint } from '../constraints/types.js';

// =============================================================================
// COLUMNS
// =============================================================================

/**
 * Resolved column type
 */
export interface TypeReference {
  /**
   * Canonical upper-case name for built-ins (`VARCHAR`, `DOUBLE PRECISION`);
   * the folded or quoted name for user types
   */
  name: string;
  /** Schema of a user type */
  schema?: string;
  /** Length, precision and scale */
  parameters: number[];
  arrayDimensions: number;
  unsigned: boolean;
  /** Members of inline ENUM(...) / SET(...) types */
  values?: string[];
  /** Built into the dialect rather than declared by CREATE TYPE */
  builtin: boolean;
}

/**
 * Generated (computed) column
 */
export interface GeneratedColumn {
  expression: string;
  storage: 'STORED' | 'VIRTUAL';
}

/**
 * Table column
 */
export interface Column {
  name: string;
  type: TypeReference;
  /** Nullable unless NOT NULL or PRIMARY KEY applies */
  nullable: boolean;
  /** Default expression text, not evaluated */
  defaultExpression?: string;
  collation?: string;
  generated?: GeneratedColumn;
  /** SERIAL type, AUTOINCREMENT, AUTO_INCREMENT or identity column */
  autoIncrement: boolean;
  comment?: string;
}

// =============================================================================
// INDEXES
// =============================================================================

/**
 * Indexed column or expression
 */
export interface IndexKey {
  /** Column name; absent for expressions */
  column?: string;
  /** Expression text */
  expression?: string;
  order?: 'ASC' | 'DESC';
  collation?: string;
}

/**
 * Index definition
 */
export interface IndexDefinition {
  name: string;
  /** Name was generated rather than declared */
  implicitName: boolean;
  /** Owning table */
  tableName: string;
  keys: IndexKey[];
  unique: boolean;
  /** USING method */
  method?: string;
  /** Partial index predicate text */
  where?: string;
}

// =============================================================================
// USER TYPES
// =============================================================================

/**
 * Attribute of a composite type
 */
export interface TypeAttributeDefinition {
  name: string;
  type: TypeReference;
  collation?: string;
}

/**
 * Type declared by CREATE TYPE
 */
export type UserType =
  | { kind: 'enum'; name: string; values: string[] }
  | { kind: 'composite'; name: string; attributes: TypeAttributeDefinition[] };

// =============================================================================
// SNAPSHOTS
// =============================================================================

/**
 * Immutable table description
 */
export interface TableSnapshot {
  schema: string;
  name: string;
  temporary: boolean;
  comment?: string;
  /** Declaration order */
  columns: Column[];
  constraints: AnyConstraint[];
  indexes: IndexDefinition[];
}

/**
 * Immutable schema description
 */
export interface SchemaSnapshot {
  name: string;
  comment?: string;
  tables: TableSnapshot[];
  types: UserType[];
}

/**
 * Immutable catalog description
 *
 * Plain data with deterministic ordering: schemas, tables, columns,
 * constraints and indexes appear in the order they were created.
 */
export interface CatalogSnapshot {
  name: string;
  defaultSchema: string;
  /** Present when names compare without regard to case */
  caseInsensitive?: boolean;
  schemas: SchemaSnapshot[];
}
