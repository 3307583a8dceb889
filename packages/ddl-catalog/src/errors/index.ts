/**
 * Catalog Error Module
 *
 * @packageDocumentation
 */

// Base classes and types
export {
  CatalogError,
  InternalCatalogError,
  ErrorCategory,
  createErrorFromException,
  formatErrorSnippet,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './base.js';

// Error codes
export {
  LexErrorCode,
  SyntaxErrorCode,
  SemanticErrorCode,
  ConfigErrorCode,
  getErrorCodeCategory,
  isErrorCodeInCategory,
  type CatalogErrorCode,
} from './codes.js';

// Lexical and syntax errors
export {
  LexError,
  SQLSyntaxError,
  UnexpectedTokenError,
  UnexpectedEOFError,
} from './syntax-errors.js';

// Semantic errors
export {
  SemanticError,
  isSemanticError,
  type SemanticErrorKind,
} from './semantic-errors.js';

// Configuration errors
export { ConfigurationError } from './config-errors.js';
