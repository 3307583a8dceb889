/**
 * Catalog Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

// =============================================================================
// Lexical Error Codes
// =============================================================================

/**
 * Error codes raised while tokenizing SQL text
 */
export enum LexErrorCode {
  /** String literal has no closing quote */
  UNTERMINATED_STRING = 'LEX_UNTERMINATED_STRING',
  /** Quoted identifier has no closing quote */
  UNTERMINATED_IDENTIFIER = 'LEX_UNTERMINATED_IDENTIFIER',
  /** Dollar-quoted string has no closing tag */
  UNTERMINATED_DOLLAR_STRING = 'LEX_UNTERMINATED_DOLLAR_STRING',
  /** Block comment has no closing marker */
  UNTERMINATED_COMMENT = 'LEX_UNTERMINATED_COMMENT',
  /** Character that cannot start any token */
  INVALID_CHARACTER = 'LEX_INVALID_CHARACTER',
}

// =============================================================================
// Syntax Error Codes
// =============================================================================

/**
 * Error codes for SQL syntax errors
 */
export enum SyntaxErrorCode {
  /** Unexpected token encountered */
  UNEXPECTED_TOKEN = 'SYNTAX_UNEXPECTED_TOKEN',
  /** Unexpected end of input */
  UNEXPECTED_EOF = 'SYNTAX_UNEXPECTED_EOF',
  /** Statement kind is not recognized */
  UNKNOWN_STATEMENT = 'SYNTAX_UNKNOWN_STATEMENT',
  /** Invalid numeric literal */
  INVALID_LITERAL = 'SYNTAX_INVALID_LITERAL',
  /** General syntax error */
  GENERAL = 'SYNTAX_ERROR',
}

// =============================================================================
// Semantic Error Codes
// =============================================================================

/**
 * Error codes for statements that are invalid against the catalog
 */
export enum SemanticErrorCode {
  DUPLICATE_TABLE = 'SEMANTIC_DUPLICATE_TABLE',
  DUPLICATE_COLUMN = 'SEMANTIC_DUPLICATE_COLUMN',
  DUPLICATE_CONSTRAINT = 'SEMANTIC_DUPLICATE_CONSTRAINT',
  DUPLICATE_INDEX = 'SEMANTIC_DUPLICATE_INDEX',
  DUPLICATE_SCHEMA = 'SEMANTIC_DUPLICATE_SCHEMA',
  DUPLICATE_TYPE = 'SEMANTIC_DUPLICATE_TYPE',
  UNKNOWN_TYPE = 'SEMANTIC_UNKNOWN_TYPE',
  UNDEFINED_TABLE = 'SEMANTIC_UNDEFINED_TABLE',
  UNDEFINED_COLUMN = 'SEMANTIC_UNDEFINED_COLUMN',
  UNDEFINED_CONSTRAINT = 'SEMANTIC_UNDEFINED_CONSTRAINT',
  UNDEFINED_INDEX = 'SEMANTIC_UNDEFINED_INDEX',
  UNDEFINED_SCHEMA = 'SEMANTIC_UNDEFINED_SCHEMA',
  /** Referenced table or columns absent, or not uniquely keyed */
  DANGLING_FOREIGN_KEY = 'SEMANTIC_DANGLING_FOREIGN_KEY',
  /** e.g. two primary keys on one table */
  CONSTRAINT_CONFLICT = 'SEMANTIC_CONSTRAINT_CONFLICT',
  /** Drop target still referenced by other objects */
  DEPENDENT_OBJECTS = 'SEMANTIC_DEPENDENT_OBJECTS',
  /** Recognized but deliberately unhandled dialect feature */
  UNSUPPORTED_CONSTRUCT = 'SEMANTIC_UNSUPPORTED_CONSTRUCT',
}

// =============================================================================
// Configuration Error Codes
// =============================================================================

/**
 * Error codes for builder options
 */
export enum ConfigErrorCode {
  /** Options failed schema validation */
  INVALID_OPTIONS = 'CONFIG_INVALID_OPTIONS',
}

// =============================================================================
// Combined Types
// =============================================================================

/**
 * Union of all catalog error codes
 */
export type CatalogErrorCode =
  | LexErrorCode
  | SyntaxErrorCode
  | SemanticErrorCode
  | ConfigErrorCode
  | 'INTERNAL';

/**
 * Get the category prefix of an error code
 */
export function getErrorCodeCategory(code: string): string {
  const underscoreIndex = code.indexOf('_');
  return underscoreIndex === -1 ? code : code.slice(0, underscoreIndex);
}

/**
 * Check if an error code belongs to a category prefix
 */
export function isErrorCodeInCategory(code: string, category: string): boolean {
  return getErrorCodeCategory(code) === category;
}
