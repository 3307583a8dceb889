/**
 * Catalog Error Tests
 *
 * Codes, serialization, source snippets and normalization of caught values.
 */

import { describe, it, expect } from 'vitest';
import {
  CatalogError,
  ConfigurationError,
  ErrorCategory,
  InternalCatalogError,
  LexError,
  LexErrorCode,
  SemanticError,
  SemanticErrorCode,
  UnexpectedEOFError,
  UnexpectedTokenError,
  createErrorFromException,
  formatErrorSnippet,
  getErrorCodeCategory,
  isErrorCodeInCategory,
  isSemanticError,
} from '../index.js';
import type { SourceSpan } from '../../parser/shared/types.js';

function span(line: number, column: number, offset: number, length: number): SourceSpan {
  return {
    start: { line, column, offset },
    end: { line, column: column + length, offset: offset + length },
  };
}

const SOURCE = 'CREATE TABLE (id INT)';

// =============================================================================
// Syntax errors
// =============================================================================

describe('UnexpectedTokenError', () => {
  const error = new UnexpectedTokenError('(', 'table name', span(1, 14, 13, 1), SOURCE);

  it('should carry code, category and location', () => {
    expect(error).toBeInstanceOf(CatalogError);
    expect(error.code).toBe('SYNTAX_UNEXPECTED_TOKEN');
    expect(error.category).toBe(ErrorCategory.SYNTAX);
    expect(error.message).toBe("Unexpected token '(', expected table name at line 1, column 14");
    expect(error.location).toEqual({ line: 1, column: 14, offset: 13 });
    expect(error.expected).toBe('table name');
    expect(error.token).toBe('(');
  });

  it('should format the source line with a caret', () => {
    expect(error.format()).toBe([
      "Unexpected token '(', expected table name at line 1, column 14",
      '  1 | CREATE TABLE (id INT)',
      '    | ' + ' '.repeat(13) + '^',
      '  Hint: Check the SQL syntax near the indicated location',
    ].join('\n'));
  });

  it('should show nearby source', () => {
    expect(error.getNearbyContext(5)).toBe('...ABLE (id I...');
  });

  it('should serialize for the host', () => {
    expect(error.toJSON()).toEqual({
      name: 'UnexpectedTokenError',
      code: 'SYNTAX_UNEXPECTED_TOKEN',
      category: 'SYNTAX',
      message: "Unexpected token '(', expected table name at line 1, column 14",
      timestamp: error.timestamp,
      span: span(1, 14, 13, 1),
      recoveryHint: 'Check the SQL syntax near the indicated location',
    });
  });
});

describe('UnexpectedEOFError', () => {
  it('should name what was expected', () => {
    const error = new UnexpectedEOFError("')'", span(1, 22, 21, 0));

    expect(error.code).toBe('SYNTAX_UNEXPECTED_EOF');
    expect(error.message).toBe("Unexpected end of input, expected ')' at line 1, column 22");
  });
});

describe('LexError', () => {
  it('should hint at the missing delimiter', () => {
    const error = new LexError(LexErrorCode.UNTERMINATED_STRING, 'Unterminated string literal', span(1, 8, 7, 4));

    expect(error.category).toBe(ErrorCategory.LEXICAL);
    expect(error.recoveryHint).toBe('Add the missing closing delimiter');
  });

  it('should hint at stray characters', () => {
    const error = new LexError(LexErrorCode.INVALID_CHARACTER, "Unexpected character '{'", span(1, 8, 7, 1));

    expect(error.recoveryHint).toBe('Remove the character or quote it inside a string literal');
  });
});

// =============================================================================
// Semantic errors
// =============================================================================

describe('SemanticError', () => {
  it('should map its kind to a code and hint', () => {
    const error = new SemanticError('DuplicateTable', "Table 'users' already exists", {
      context: { table: 'users' },
    });

    expect(error.code).toBe(SemanticErrorCode.DUPLICATE_TABLE);
    expect(error.kind).toBe('DuplicateTable');
    expect(error.recoveryHint).toBe('Use CREATE TABLE IF NOT EXISTS or choose a different table name');
    expect(isSemanticError(error, 'DuplicateTable')).toBe(true);
    expect(isSemanticError(error, 'UndefinedTable')).toBe(false);
    expect(isSemanticError(new Error('x'))).toBe(false);
  });

  it('should keep the first span and merge context', () => {
    const error = new SemanticError('UndefinedColumn', "Column 'x' does not exist in table 't'", {
      span: span(2, 5, 30, 1),
      context: { table: 't' },
    });

    error.withSpan(span(1, 1, 0, 6), 'ignored for span').withContext({ column: 'x' });

    expect(error.location).toEqual({ line: 2, column: 5, offset: 30 });
    expect(error.source).toBe('ignored for span');
    expect(error.context).toEqual({ table: 't', column: 'x' });
  });

  it('should format without a snippet when no source is attached', () => {
    const error = new SemanticError('ConstraintConflict', "Table 't' already has primary key 'pk_t'");

    expect(error.format()).toBe("Table 't' already has primary key 'pk_t'");
  });

  it('should describe itself as a log entry', () => {
    const error = new SemanticError('UndefinedTable', "Table 'q' does not exist", {
      span: span(3, 13, 40, 1),
      context: { table: 'q' },
    });

    expect(error.toLogEntry()).toMatchObject({
      level: 'error',
      error: { name: 'SemanticError', code: 'SEMANTIC_UNDEFINED_TABLE', message: "Table 'q' does not exist" },
      metadata: { category: 'SEMANTIC', line: 3, column: 13, table: 'q' },
    });
  });
});

// =============================================================================
// Normalization
// =============================================================================

describe('createErrorFromException', () => {
  it('should pass catalog errors through and attach the source', () => {
    const error = new SemanticError('UndefinedTable', "Table 'q' does not exist");

    const result = createErrorFromException(error, 'DROP TABLE q');

    expect(result).toBe(error);
    expect(result.source).toBe('DROP TABLE q');
  });

  it('should wrap other errors as internal errors', () => {
    const cause = new TypeError('boom');
    const result = createErrorFromException(cause);

    expect(result).toBeInstanceOf(InternalCatalogError);
    expect(result.code).toBe('INTERNAL');
    expect(result.message).toBe('boom');
    expect(result.toJSON().cause).toMatchObject({
      name: 'TypeError',
      code: 'UNKNOWN',
      category: 'INTERNAL',
      message: 'boom',
    });
  });

  it('should wrap thrown non-errors', () => {
    expect(createErrorFromException('plain').message).toBe('plain');
  });
});

describe('ConfigurationError', () => {
  it('should fall back to the message without zod details', () => {
    const error = new ConfigurationError('Invalid catalog options: dialect: bad');

    expect(error.code).toBe('CONFIG_INVALID_OPTIONS');
    expect(error.category).toBe(ErrorCategory.CONFIGURATION);
    expect(error.getErrorDetails()).toBe('Invalid catalog options: dialect: bad');
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe('error helpers', () => {
  it('should split code categories', () => {
    expect(getErrorCodeCategory('SEMANTIC_DUPLICATE_TABLE')).toBe('SEMANTIC');
    expect(getErrorCodeCategory('INTERNAL')).toBe('INTERNAL');
    expect(isErrorCodeInCategory('LEX_INVALID_CHARACTER', 'LEX')).toBe(true);
    expect(isErrorCodeInCategory('LEX_INVALID_CHARACTER', 'SYNTAX')).toBe(false);
  });

  it('should underline the span up to the end of its first line', () => {
    const source = 'ALTER TABLE t\n  ADD COLUMN x INT';
    const multiLine: SourceSpan = {
      start: { line: 1, column: 7, offset: 6 },
      end: { line: 2, column: 5, offset: 18 },
    };

    expect(formatErrorSnippet(source, multiLine)).toBe([
      '  1 | ALTER TABLE t',
      '    | ' + ' '.repeat(6) + '^'.repeat(7),
    ].join('\n'));
  });

  it('should return nothing for a line outside the source', () => {
    expect(formatErrorSnippet('x', span(4, 1, 10, 1))).toBeUndefined();
  });
});
