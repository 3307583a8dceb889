/**
 * Shared Parser Types
 *
 * Source positions and tokens shared by the lexer, the DDL parser and the
 * error classes.
 *
 * @packageDocumentation
 */

// =============================================================================
// SOURCE LOCATION
// =============================================================================

/**
 * Location information for error reporting and AST node tracking
 */
export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
  /** 0-based character offset (UTF-16 code units) */
  offset: number;
}

/**
 * Half-open range of source text: `start` is the first character,
 * `end` the position just past the last one
 */
export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

// =============================================================================
// TOKEN TYPES
// =============================================================================

/**
 * Token types recognized by the SQL lexer
 */
export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'operator'
  | 'punctuation'
  | 'comment'
  | 'eof';

/**
 * A single token from the lexer
 */
export interface Token {
  /** Token type classification */
  type: TokenType;
  /**
   * Token value: upper-cased for keywords, unescaped text for strings and
   * quoted identifiers, raw text otherwise
   */
  value: string;
  /** Source range of the token, quotes included */
  span: SourceSpan;
}
