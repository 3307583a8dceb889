/**
 * Lexical and Syntax Error Classes
 *
 * Errors raised while turning SQL text into statement nodes. Both carry the
 * offending source span.
 *
 * @packageDocumentation
 */

import { CatalogError, ErrorCategory, type ErrorContext } from './base.js';
import { LexErrorCode, SyntaxErrorCode } from './codes.js';
import type { SourceSpan } from '../parser/shared/types.js';

function withLocation(message: string, span?: SourceSpan): string {
  return span
    ? `${message} at line ${span.start.line}, column ${span.start.column}`
    : message;
}

// =============================================================================
// Lex Error
// =============================================================================

/**
 * Malformed token: unterminated literal or comment, or an invalid character
 *
 * @example
 * ```typescript
 * try {
 *   [...new Lexer("SELECT 'abc")];
 * } catch (error) {
 *   if (error instanceof LexError) {
 *     console.log(error.code); // 'LEX_UNTERMINATED_STRING'
 *     console.log(error.span); // { start: { line: 1, column: 8, offset: 7 }, end: ... }
 *   }
 * }
 * ```
 */
export class LexError extends CatalogError {
  readonly code: LexErrorCode;
  readonly category = ErrorCategory.LEXICAL;

  constructor(code: LexErrorCode, message: string, span: SourceSpan, source?: string) {
    super(withLocation(message, span), { span, source });
    this.name = 'LexError';
    this.code = code;
    this.recoveryHint = code === LexErrorCode.INVALID_CHARACTER
      ? 'Remove the character or quote it inside a string literal'
      : 'Add the missing closing delimiter';
  }
}

// =============================================================================
// SQL Syntax Error
// =============================================================================

/**
 * SQL Syntax Error with location information
 *
 * @example
 * ```typescript
 * const result = parseDDL('CREATE TABLE (id INT)');
 * if (!result.success) {
 *   console.log(result.error.code);     // 'SYNTAX_UNEXPECTED_TOKEN'
 *   console.log(result.error.expected); // 'table name'
 * }
 * ```
 */
export class SQLSyntaxError extends CatalogError {
  readonly code: SyntaxErrorCode;
  readonly category = ErrorCategory.SYNTAX;

  /** Expected construct at the error position */
  expected?: string;

  constructor(
    code: SyntaxErrorCode,
    message: string,
    span?: SourceSpan,
    source?: string,
    options?: { cause?: Error; context?: ErrorContext; expected?: string }
  ) {
    super(withLocation(message, span), { ...options, span, source });
    this.name = 'SQLSyntaxError';
    this.code = code;
    this.expected = options?.expected;
    this.recoveryHint = 'Check the SQL syntax near the indicated location';
  }

  /**
   * Get the problematic portion of SQL near the error
   */
  getNearbyContext(contextLength = 20): string | undefined {
    if (!this.source || !this.span) return undefined;

    const offset = this.span.start.offset;
    const start = Math.max(0, offset - contextLength);
    const end = Math.min(this.source.length, offset + contextLength);

    let context = this.source.slice(start, end);
    if (start > 0) context = '...' + context;
    if (end < this.source.length) context = context + '...';

    return context;
  }
}

/**
 * Unexpected token error
 */
export class UnexpectedTokenError extends SQLSyntaxError {
  /** The unexpected token value */
  readonly token: string;

  constructor(token: string, expected: string | undefined, span: SourceSpan, source?: string) {
    const message = expected
      ? `Unexpected token '${token}', expected ${expected}`
      : `Unexpected token '${token}'`;
    super(SyntaxErrorCode.UNEXPECTED_TOKEN, message, span, source, { expected });
    this.name = 'UnexpectedTokenError';
    this.token = token;
  }
}

/**
 * Unexpected end of input error
 */
export class UnexpectedEOFError extends SQLSyntaxError {
  constructor(expected: string | undefined, span: SourceSpan, source?: string) {
    const message = expected
      ? `Unexpected end of input, expected ${expected}`
      : 'Unexpected end of input';
    super(SyntaxErrorCode.UNEXPECTED_EOF, message, span, source, { expected });
    this.name = 'UnexpectedEOFError';
  }
}
