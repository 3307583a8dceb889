/**
 * DDL (Data Definition Language) AST Types
 *
 * TypeScript types for representing DDL statements as an Abstract Syntax Tree.
 * Supports:
 * - CREATE TABLE / ALTER TABLE / DROP TABLE
 * - CREATE INDEX / CREATE UNIQUE INDEX / DROP INDEX
 * - CREATE SCHEMA / DROP SCHEMA
 * - CREATE TYPE (enum and composite) / DROP TYPE
 * - COMMENT ON TABLE / COLUMN / SCHEMA
 *
 * Identifiers are already case-folded by the parser. Expression text
 * (DEFAULT, CHECK, WHERE, generated columns) is kept verbatim from the source.
 */

import type { SourceSpan } from './shared/types.js';
import type { CatalogError } from '../errors/base.js';

// =============================================================================
// BASE TYPES
// =============================================================================

/**
 * Possibly schema-qualified object name
 */
export interface QualifiedName {
  /** Schema/database name (optional) */
  schema?: string;
  /** Object name */
  name: string;
  span: SourceSpan;
}

/**
 * Column type with optional parameters
 */
export interface ColumnDataType {
  /**
   * Type name: the case-folded identifier for single words, upper-cased
   * words for multi-word built-ins (`DOUBLE PRECISION`), verbatim text
   * for quoted names
   */
  name: string;
  /** Schema of a qualified user type */
  schema?: string;
  /** Name was written as a quoted identifier */
  quoted: boolean;
  /** Length, precision and scale (e.g., VARCHAR(255), DECIMAL(10,2)) */
  parameters: number[];
  /** Number of `[]` suffixes or ARRAY keywords */
  arrayDimensions: number;
  /** UNSIGNED modifier (MySQL) */
  unsigned: boolean;
  /** Member literals of inline ENUM(...) / SET(...) types */
  values?: string[];
  /** CHARACTER SET / CHARSET clause */
  charset?: string;
  span: SourceSpan;
}

// =============================================================================
// COLUMN CONSTRAINTS
// =============================================================================

/**
 * Reference actions for foreign keys
 */
export type ReferenceAction =
  | 'NO ACTION'
  | 'RESTRICT'
  | 'SET NULL'
  | 'SET DEFAULT'
  | 'CASCADE';

/**
 * Foreign key MATCH clause
 */
export type MatchType = 'SIMPLE' | 'PARTIAL' | 'FULL';

/**
 * Foreign key deferrable clause
 */
export type DeferrableClause =
  | 'DEFERRABLE'
  | 'NOT DEFERRABLE'
  | 'DEFERRABLE INITIALLY DEFERRED'
  | 'DEFERRABLE INITIALLY IMMEDIATE';

/**
 * Target of a REFERENCES clause
 */
export interface ReferencesClause {
  /** Referenced table */
  table: QualifiedName;
  /** Referenced columns; the referenced primary key when omitted */
  columns?: KeyColumn[];
  /** ON DELETE action */
  onDelete?: ReferenceAction;
  /** ON UPDATE action */
  onUpdate?: ReferenceAction;
  /** MATCH clause */
  match?: MatchType;
  /** Deferrable clause */
  deferrable?: DeferrableClause;
}

/**
 * Column-level PRIMARY KEY constraint
 */
export interface PrimaryKeyColumnConstraint {
  type: 'PRIMARY KEY';
  /** Optional constraint name */
  name?: string;
  /** Sort order for the primary key */
  order?: 'ASC' | 'DESC';
  /** AUTOINCREMENT keyword (SQLite-specific) */
  autoincrement: boolean;
  span: SourceSpan;
}

/**
 * Column-level NOT NULL constraint
 */
export interface NotNullColumnConstraint {
  type: 'NOT NULL';
  /** Optional constraint name */
  name?: string;
  span: SourceSpan;
}

/**
 * Column-level explicit NULL
 */
export interface NullColumnConstraint {
  type: 'NULL';
  name?: string;
  span: SourceSpan;
}

/**
 * Column-level UNIQUE constraint
 */
export interface UniqueColumnConstraint {
  type: 'UNIQUE';
  /** Optional constraint name */
  name?: string;
  span: SourceSpan;
}

/**
 * Column-level CHECK constraint
 */
export interface CheckColumnConstraint {
  type: 'CHECK';
  /** Optional constraint name */
  name?: string;
  /** The CHECK expression text, without the enclosing parentheses */
  expression: string;
  span: SourceSpan;
}

/**
 * Column-level DEFAULT constraint
 */
export interface DefaultColumnConstraint {
  type: 'DEFAULT';
  /** Optional constraint name */
  name?: string;
  /** The default expression text */
  expression: string;
  span: SourceSpan;
}

/**
 * Column-level COLLATE constraint
 */
export interface CollateColumnConstraint {
  type: 'COLLATE';
  /** Collation name (e.g., NOCASE, "C", utf8mb4_bin) */
  collation: string;
  span: SourceSpan;
}

/**
 * Column-level REFERENCES (foreign key) constraint
 */
export interface ReferencesColumnConstraint extends ReferencesClause {
  type: 'REFERENCES';
  /** Optional constraint name */
  name?: string;
  span: SourceSpan;
}

/**
 * Computed column or identity column
 */
export interface GeneratedColumnConstraint {
  type: 'GENERATED';
  /** The expression that generates the value; absent for identity columns */
  expression?: string;
  /** Storage type: STORED (materialized) or VIRTUAL (computed on read) */
  storage?: 'STORED' | 'VIRTUAL';
  /** GENERATED ... AS IDENTITY */
  identity: boolean;
  span: SourceSpan;
}

/**
 * AUTO_INCREMENT / AUTOINCREMENT / IDENTITY marker
 */
export interface AutoIncrementColumnConstraint {
  type: 'AUTO_INCREMENT';
  span: SourceSpan;
}

/**
 * Inline column comment (MySQL `COMMENT '...'`)
 */
export interface CommentColumnConstraint {
  type: 'COMMENT';
  text: string;
  span: SourceSpan;
}

/**
 * Union of all column-level constraints
 */
export type ColumnConstraint =
  | PrimaryKeyColumnConstraint
  | NotNullColumnConstraint
  | NullColumnConstraint
  | UniqueColumnConstraint
  | CheckColumnConstraint
  | DefaultColumnConstraint
  | CollateColumnConstraint
  | ReferencesColumnConstraint
  | GeneratedColumnConstraint
  | AutoIncrementColumnConstraint
  | CommentColumnConstraint;

// =============================================================================
// COLUMN DEFINITION
// =============================================================================

/**
 * Complete column definition
 */
export interface ColumnDefinition {
  /** Column name */
  name: string;
  /** Column data type; absent for typeless SQLite columns */
  dataType?: ColumnDataType;
  /** Column constraints in declaration order */
  constraints: ColumnConstraint[];
  span: SourceSpan;
}

// =============================================================================
// TABLE CONSTRAINTS
// =============================================================================

/**
 * Column named in a key or index column list
 */
export interface KeyColumn {
  name: string;
  order?: 'ASC' | 'DESC';
  collation?: string;
  span: SourceSpan;
}

/**
 * Table-level PRIMARY KEY constraint
 */
export interface PrimaryKeyTableConstraint {
  type: 'PRIMARY KEY';
  /** Optional constraint name */
  name?: string;
  /** Columns included in the primary key */
  columns: KeyColumn[];
  span: SourceSpan;
}

/**
 * Table-level UNIQUE constraint
 */
export interface UniqueTableConstraint {
  type: 'UNIQUE';
  /** Optional constraint name */
  name?: string;
  /** Columns included in the unique constraint */
  columns: KeyColumn[];
  span: SourceSpan;
}

/**
 * Table-level FOREIGN KEY constraint
 */
export interface ForeignKeyTableConstraint {
  type: 'FOREIGN KEY';
  /** Optional constraint name */
  name?: string;
  /** Local columns */
  columns: KeyColumn[];
  /** Referenced table and columns */
  references: ReferencesClause;
  span: SourceSpan;
}

/**
 * Table-level CHECK constraint
 */
export interface CheckTableConstraint {
  type: 'CHECK';
  /** Optional constraint name */
  name?: string;
  /** The CHECK expression text, without the enclosing parentheses */
  expression: string;
  span: SourceSpan;
}

/**
 * Union of all table-level constraints
 */
export type TableConstraint =
  | PrimaryKeyTableConstraint
  | UniqueTableConstraint
  | ForeignKeyTableConstraint
  | CheckTableConstraint;

// =============================================================================
// DDL STATEMENTS
// =============================================================================

/**
 * Fields shared by every statement node
 */
export interface StatementBase {
  /** Source range from the first token to the last */
  span: SourceSpan;
  /** Raw statement text, without the terminating `;` */
  text: string;
}

/**
 * CREATE TABLE forms recognized but not applied to the catalog
 */
export type UnsupportedTableSource = 'AS SELECT' | 'LIKE' | 'INHERITS' | 'PARTITION OF';

/**
 * CREATE TABLE statement
 */
export interface CreateTableStatement extends StatementBase {
  type: 'CREATE TABLE';
  /** Table name */
  table: QualifiedName;
  /** IF NOT EXISTS clause */
  ifNotExists: boolean;
  /** TEMPORARY or TEMP keyword */
  temporary: boolean;
  /** Column definitions */
  columns: ColumnDefinition[];
  /** Table-level constraints */
  constraints: TableConstraint[];
  /** MySQL `KEY` / `INDEX` / `FULLTEXT` / `SPATIAL` entries */
  indexes: TableIndexDefinition[];
  /** Table comment from a `COMMENT = '...'` table option */
  comment?: string;
  /** Unsupported table source clause, when present */
  unsupported?: { construct: UnsupportedTableSource; span: SourceSpan };
}

/**
 * Index column specification
 */
export interface IndexColumn {
  /** Column name; absent for expressions */
  name?: string;
  /** Expression text for expression indexes */
  expression?: string;
  /** Sort order */
  order?: 'ASC' | 'DESC';
  /** Collation */
  collation?: string;
  span: SourceSpan;
}

/**
 * Non-unique index declared as a table entry:
 * `KEY idx (a, b) USING BTREE`, `FULLTEXT KEY ft (body)`
 */
export interface TableIndexDefinition {
  /** Index name; generated when omitted */
  name?: string;
  /** `FULLTEXT` or `SPATIAL`, otherwise the `USING` method when given */
  method?: string;
  columns: IndexColumn[];
  span: SourceSpan;
}

/**
 * CREATE INDEX statement
 */
export interface CreateIndexStatement extends StatementBase {
  type: 'CREATE INDEX';
  /** Index name; generated when omitted */
  name?: string;
  /** Schema named on the index itself */
  schema?: string;
  /** IF NOT EXISTS clause */
  ifNotExists: boolean;
  /** UNIQUE index */
  unique: boolean;
  /** Indexed table */
  table: QualifiedName;
  /** Indexed columns or expressions */
  columns: IndexColumn[];
  /** USING method */
  method?: string;
  /** WHERE clause for partial index */
  where?: string;
}

/**
 * ALTER TABLE ADD COLUMN operation
 */
export interface AlterTableAddColumn {
  operation: 'ADD COLUMN';
  /** Column definition to add */
  column: ColumnDefinition;
  ifNotExists: boolean;
  span: SourceSpan;
}

/**
 * ALTER TABLE DROP COLUMN operation
 */
export interface AlterTableDropColumn {
  operation: 'DROP COLUMN';
  /** Column name to drop */
  column: string;
  ifExists: boolean;
  cascade: boolean;
  span: SourceSpan;
}

/**
 * ALTER TABLE ADD CONSTRAINT operation
 */
export interface AlterTableAddConstraint {
  operation: 'ADD CONSTRAINT';
  constraint: TableConstraint;
  span: SourceSpan;
}

/**
 * ALTER TABLE DROP CONSTRAINT operation
 */
export interface AlterTableDropConstraint {
  operation: 'DROP CONSTRAINT';
  name: string;
  ifExists: boolean;
  cascade: boolean;
  span: SourceSpan;
}

/**
 * ALTER TABLE DROP PRIMARY KEY operation (MySQL)
 */
export interface AlterTableDropPrimaryKey {
  operation: 'DROP PRIMARY KEY';
  span: SourceSpan;
}

/**
 * ALTER TABLE RENAME TO operation
 */
export interface AlterTableRenameTo {
  operation: 'RENAME TO';
  /** New table name */
  newName: string;
  span: SourceSpan;
}

/**
 * ALTER TABLE RENAME COLUMN operation
 */
export interface AlterTableRenameColumn {
  operation: 'RENAME COLUMN';
  /** Old column name */
  oldName: string;
  /** New column name */
  newName: string;
  span: SourceSpan;
}

/**
 * ALTER TABLE RENAME CONSTRAINT operation
 */
export interface AlterTableRenameConstraint {
  operation: 'RENAME CONSTRAINT';
  oldName: string;
  newName: string;
  span: SourceSpan;
}

/**
 * Column change inside ALTER [COLUMN]
 */
export type AlterColumnAction =
  | { type: 'SET NOT NULL' }
  | { type: 'DROP NOT NULL' }
  | { type: 'SET DEFAULT'; expression: string }
  | { type: 'DROP DEFAULT' }
  | { type: 'SET DATA TYPE'; dataType: ColumnDataType; collation?: string };

/**
 * ALTER TABLE ALTER [COLUMN] operation
 */
export interface AlterTableAlterColumn {
  operation: 'ALTER COLUMN';
  column: string;
  action: AlterColumnAction;
  span: SourceSpan;
}

/**
 * ALTER TABLE SET SCHEMA operation (PostgreSQL)
 */
export interface AlterTableSetSchema {
  operation: 'SET SCHEMA';
  schema: string;
  span: SourceSpan;
}

/**
 * Action that leaves the catalog unchanged (OWNER TO, ENABLE TRIGGER, ...)
 */
export interface AlterTableIgnored {
  operation: 'IGNORED';
  /** Leading keywords of the action */
  action: string;
  span: SourceSpan;
}

/**
 * Recognized action the catalog does not model (MODIFY, CHANGE, ...)
 */
export interface AlterTableUnsupported {
  operation: 'UNSUPPORTED';
  action: string;
  span: SourceSpan;
}

/**
 * ALTER TABLE ADD INDEX / ADD KEY operation (MySQL)
 */
export interface AlterTableAddIndex {
  operation: 'ADD INDEX';
  index: TableIndexDefinition;
  span: SourceSpan;
}

/**
 * ALTER TABLE DROP INDEX / DROP KEY operation (MySQL)
 */
export interface AlterTableDropIndex {
  operation: 'DROP INDEX';
  name: string;
  span: SourceSpan;
}

/**
 * Union of ALTER TABLE operations
 */
export type AlterTableOperation =
  | AlterTableAddColumn
  | AlterTableDropColumn
  | AlterTableAddConstraint
  | AlterTableDropConstraint
  | AlterTableDropPrimaryKey
  | AlterTableAddIndex
  | AlterTableDropIndex
  | AlterTableRenameTo
  | AlterTableRenameColumn
  | AlterTableRenameConstraint
  | AlterTableAlterColumn
  | AlterTableSetSchema
  | AlterTableIgnored
  | AlterTableUnsupported;

/**
 * ALTER TABLE statement
 */
export interface AlterTableStatement extends StatementBase {
  type: 'ALTER TABLE';
  /** Table name */
  table: QualifiedName;
  /** IF EXISTS clause */
  ifExists: boolean;
  /** Operations in source order */
  operations: AlterTableOperation[];
}

/**
 * DROP TABLE statement
 */
export interface DropTableStatement extends StatementBase {
  type: 'DROP TABLE';
  /** Tables to drop */
  tables: QualifiedName[];
  /** IF EXISTS clause */
  ifExists: boolean;
  /** CASCADE clause */
  cascade: boolean;
}

/**
 * DROP INDEX statement
 */
export interface DropIndexStatement extends StatementBase {
  type: 'DROP INDEX';
  /** Indexes to drop */
  indexes: QualifiedName[];
  /** Owning table (MySQL `DROP INDEX i ON t`) */
  table?: QualifiedName;
  /** IF EXISTS clause */
  ifExists: boolean;
  cascade: boolean;
}

/**
 * CREATE SCHEMA statement
 */
export interface CreateSchemaStatement extends StatementBase {
  type: 'CREATE SCHEMA';
  name: string;
  ifNotExists: boolean;
  /** AUTHORIZATION role */
  authorization?: string;
}

/**
 * DROP SCHEMA statement
 */
export interface DropSchemaStatement extends StatementBase {
  type: 'DROP SCHEMA';
  names: string[];
  ifExists: boolean;
  cascade: boolean;
}

/**
 * Attribute of a composite type
 */
export interface TypeAttribute {
  name: string;
  dataType: ColumnDataType;
  collation?: string;
  span: SourceSpan;
}

/**
 * Body of a CREATE TYPE statement
 */
export type TypeDefinition =
  | { kind: 'enum'; values: string[] }
  | { kind: 'composite'; attributes: TypeAttribute[] };

/**
 * CREATE TYPE statement
 */
export interface CreateTypeStatement extends StatementBase {
  type: 'CREATE TYPE';
  name: QualifiedName;
  definition: TypeDefinition;
}

/**
 * DROP TYPE statement
 */
export interface DropTypeStatement extends StatementBase {
  type: 'DROP TYPE';
  names: QualifiedName[];
  ifExists: boolean;
  cascade: boolean;
}

/**
 * Object a COMMENT ON statement targets
 */
export type CommentTarget =
  | { kind: 'TABLE'; table: QualifiedName }
  | { kind: 'COLUMN'; table: QualifiedName; column: string; span: SourceSpan }
  | { kind: 'SCHEMA'; name: string };

/**
 * COMMENT ON statement
 */
export interface CommentStatement extends StatementBase {
  type: 'COMMENT ON';
  target: CommentTarget;
  /** Comment text; null removes the comment */
  comment: string | null;
}

/**
 * Statement of a kind the parser does not model
 */
export interface UnknownStatement extends StatementBase {
  type: 'UNKNOWN';
  /** Leading keywords, e.g. `CREATE FUNCTION` */
  keyword: string;
}

/**
 * Union of all DDL statements
 */
export type DDLStatement =
  | CreateTableStatement
  | CreateIndexStatement
  | AlterTableStatement
  | DropTableStatement
  | DropIndexStatement
  | CreateSchemaStatement
  | DropSchemaStatement
  | CreateTypeStatement
  | DropTypeStatement
  | CommentStatement
  | UnknownStatement;

// =============================================================================
// PARSE RESULT
// =============================================================================

/**
 * Successful parse result
 */
export interface ParseSuccess<T extends DDLStatement> {
  success: true;
  statement: T;
}

/**
 * Parse error
 */
export interface ParseError {
  success: false;
  error: CatalogError;
}

/**
 * Parse result union
 */
export type ParseResult<T extends DDLStatement = DDLStatement> =
  | ParseSuccess<T>
  | ParseError;

/**
 * Result of parsing a whole script
 */
export type ScriptParseResult =
  | { success: true; statements: DDLStatement[] }
  | { success: false; error: CatalogError; statements: DDLStatement[] };

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if a statement is CREATE TABLE
 */
export function isCreateTableStatement(
  stmt: DDLStatement
): stmt is CreateTableStatement {
  return stmt.type === 'CREATE TABLE';
}

/**
 * Check if a statement is CREATE INDEX
 */
export function isCreateIndexStatement(
  stmt: DDLStatement
): stmt is CreateIndexStatement {
  return stmt.type === 'CREATE INDEX';
}

/**
 * Check if a statement is ALTER TABLE
 */
export function isAlterTableStatement(
  stmt: DDLStatement
): stmt is AlterTableStatement {
  return stmt.type === 'ALTER TABLE';
}

/**
 * Check if a statement is DROP TABLE
 */
export function isDropTableStatement(
  stmt: DDLStatement
): stmt is DropTableStatement {
  return stmt.type === 'DROP TABLE';
}

/**
 * Check if a statement was not recognized
 */
export function isUnknownStatement(
  stmt: DDLStatement
): stmt is UnknownStatement {
  return stmt.type === 'UNKNOWN';
}

/**
 * Check if parse result is successful
 */
export function isParseSuccess<T extends DDLStatement>(
  result: ParseResult<T>
): result is ParseSuccess<T> {
  return result.success === true;
}

/**
 * Check if parse result is an error
 */
export function isParseError(result: ParseResult): result is ParseError {
  return result.success === false;
}
