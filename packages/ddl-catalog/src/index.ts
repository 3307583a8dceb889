/**
 * ddl-catalog
 *
 * Parses SQL DDL scripts and assembles them into an in-memory catalog of
 * schemas, tables, columns, types, indexes and constraints.
 *
 * @packageDocumentation
 */

// =============================================================================
// CATALOG
// =============================================================================

export * from './catalog/index.js';

// =============================================================================
// PARSER
// =============================================================================

export * from './parser/ddl.js';
export {
  Lexer,
  Tokenizer,
  TokenStream,
  tokenize,
  isKeyword,
  SQL_KEYWORDS,
  type LexerOptions,
  type Token,
  type TokenType,
  type SourceLocation,
  type SourceSpan,
} from './parser/shared/index.js';

// =============================================================================
// CONSTRAINTS
// =============================================================================

export * from './constraints/index.js';

// =============================================================================
// DIALECTS & CONFIGURATION
// =============================================================================

export {
  getDialect,
  isBuiltinType,
  DIALECTS,
  type Dialect,
  type DialectRules,
  type IdentifierCase,
} from './dialects/index.js';

export {
  catalogOptionsSchema,
  resolveOptions,
  DialectSchema,
  type CatalogOptions,
  type ResolvedCatalogOptions,
} from './config.js';

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export * from './errors/index.js';
export * from './logging/index.js';
