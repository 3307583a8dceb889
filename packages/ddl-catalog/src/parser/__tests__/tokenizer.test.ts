/**
 * Tokenizer Tests
 *
 * Token classification, source spans, dialect-specific lexical rules and
 * lexical errors.
 */

import { describe, it, expect } from 'vitest';
import { Lexer, tokenize, isKeyword } from '../shared/tokenizer.js';
import { TokenStream } from '../shared/token-stream.js';
import { LexError } from '../../errors/syntax-errors.js';
import { LexErrorCode } from '../../errors/codes.js';
import type { Token } from '../shared/types.js';

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => `${t.type}:${t.value}`);
}

function lexError(fn: () => unknown): LexError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LexError) return error;
    throw error;
  }
  throw new Error('expected a LexError');
}

// =============================================================================
// Classification
// =============================================================================

describe('Tokenizer', () => {
  describe('classification', () => {
    it('should classify keywords, identifiers and punctuation', () => {
      const tokens = tokenize('CREATE TABLE users (id INT);');

      expect(kinds(tokens)).toEqual([
        'keyword:CREATE',
        'keyword:TABLE',
        'identifier:users',
        'punctuation:(',
        'identifier:id',
        'identifier:INT',
        'punctuation:)',
        'punctuation:;',
        'eof:',
      ]);
    });

    it('should upper-case keywords and keep identifier text as written', () => {
      const tokens = tokenize('create Table Users');

      expect(kinds(tokens)).toEqual(['keyword:CREATE', 'keyword:TABLE', 'identifier:Users', 'eof:']);
    });

    it('should end with exactly one eof token', () => {
      const tokens = tokenize('');

      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe('eof');
    });

    it('should recognize numbers in integer, decimal and exponent forms', () => {
      const tokens = tokenize('42 3.14 1e10 .5 2E-3');

      expect(kinds(tokens)).toEqual([
        'number:42',
        'number:3.14',
        'number:1e10',
        'number:.5',
        'number:2E-3',
        'eof:',
      ]);
    });

    it('should prefer the longest operator', () => {
      const tokens = tokenize("a::text ->> 'k' <= b", { dialect: 'postgresql' });

      expect(kinds(tokens)).toEqual([
        'identifier:a',
        'operator:::',
        'identifier:text',
        'operator:->>',
        'string:k',
        'operator:<=',
        'identifier:b',
        'eof:',
      ]);
    });

    it('should expose the keyword set', () => {
      expect(isKeyword('references')).toBe(true);
      expect(isKeyword('users')).toBe(false);
    });
  });

  // ===========================================================================
  // Literals and quoted identifiers
  // ===========================================================================

  describe('literals', () => {
    it('should unescape doubled quotes in strings', () => {
      const [token] = tokenize("'it''s'");

      expect(token).toMatchObject({ type: 'string', value: "it's" });
    });

    it('should unescape doubled quotes in quoted identifiers', () => {
      const [token] = tokenize('"My ""Table"""');

      expect(token).toMatchObject({ type: 'quoted_identifier', value: 'My "Table"' });
    });

    it('should keep quoted identifier case', () => {
      const [token] = tokenize('"CamelCase"');

      expect(token).toMatchObject({ type: 'quoted_identifier', value: 'CamelCase' });
    });

    it('should read E-strings with backslash escapes', () => {
      const [token] = tokenize("E'a\\nb'", { dialect: 'postgresql' });

      expect(token).toMatchObject({ type: 'string', value: 'a\nb' });
    });

    it('should read dollar-quoted strings verbatim', () => {
      const tokens = tokenize('$body$ x; y $body$ z', { dialect: 'postgresql' });

      expect(kinds(tokens)).toEqual(['string: x; y ', 'identifier:z', 'eof:']);
    });

    it('should read backtick identifiers and double-quoted strings in mysql', () => {
      const tokens = tokenize('`order` "text" \'it\\\'s\'', { dialect: 'mysql' });

      expect(kinds(tokens)).toEqual([
        'quoted_identifier:order',
        'string:text',
        "string:it's",
        'eof:',
      ]);
    });

    it('should read bracket identifiers in sqlite', () => {
      const [token] = tokenize('[order items]', { dialect: 'sqlite' });

      expect(token).toMatchObject({ type: 'quoted_identifier', value: 'order items' });
    });

    it('should keep array brackets as punctuation', () => {
      const tokens = tokenize('INT[]', { dialect: 'postgresql' });

      expect(kinds(tokens)).toEqual(['identifier:INT', 'punctuation:[', 'punctuation:]', 'eof:']);
    });
  });

  // ===========================================================================
  // Comments
  // ===========================================================================

  describe('comments', () => {
    it('should skip comments by default', () => {
      const tokens = tokenize('-- note\nCREATE /* block */ TABLE');

      expect(kinds(tokens)).toEqual(['keyword:CREATE', 'keyword:TABLE', 'eof:']);
    });

    it('should emit comments when asked', () => {
      const tokens = tokenize('-- note\nCREATE', { includeComments: true });

      expect(kinds(tokens)).toEqual(['comment:note', 'keyword:CREATE', 'eof:']);
    });

    it('should nest block comments in postgresql', () => {
      const tokens = tokenize('/* a /* b */ c */ x', { dialect: 'postgresql' });

      expect(kinds(tokens)).toEqual(['identifier:x', 'eof:']);
    });

    it('should treat # as a comment in mysql', () => {
      const tokens = tokenize('# note\nDROP', { dialect: 'mysql' });

      expect(kinds(tokens)).toEqual(['keyword:DROP', 'eof:']);
    });
  });

  // ===========================================================================
  // Spans
  // ===========================================================================

  describe('spans', () => {
    it('should record 1-based lines and columns with 0-based offsets', () => {
      const [create, table] = tokenize('CREATE\n  TABLE');

      expect(create.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 7, offset: 6 },
      });
      expect(table.span).toEqual({
        start: { line: 2, column: 3, offset: 9 },
        end: { line: 2, column: 8, offset: 14 },
      });
    });

    it('should include quotes in the span of a string', () => {
      const [token] = tokenize("'ab'");

      expect(token.span.end.offset - token.span.start.offset).toBe(4);
    });

    it('should place eof at the end of input', () => {
      const tokens = tokenize('a\nb');
      const eof = tokens[tokens.length - 1];

      expect(eof.span.start).toEqual({ line: 2, column: 2, offset: 3 });
      expect(eof.span.end).toEqual(eof.span.start);
    });
  });

  // ===========================================================================
  // Laziness
  // ===========================================================================

  describe('laziness', () => {
    it('should produce the same tokens on every iteration', () => {
      const lexer = new Lexer('DROP TABLE a, b');

      expect([...lexer]).toEqual([...lexer]);
    });

    it('should surface a lexical error only when iteration reaches it', () => {
      const iterator = new Lexer("CREATE TABLE 'abc")[Symbol.iterator]();

      expect(iterator.next().value).toMatchObject({ type: 'keyword', value: 'CREATE' });
      expect(iterator.next().value).toMatchObject({ type: 'keyword', value: 'TABLE' });
      expect(() => iterator.next()).toThrow(LexError);
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe('errors', () => {
    it('should report unterminated strings at the opening quote', () => {
      const error = lexError(() => tokenize("SELECT 'abc"));

      expect(error.code).toBe(LexErrorCode.UNTERMINATED_STRING);
      expect(error.span?.start).toEqual({ line: 1, column: 8, offset: 7 });
      expect(error.message).toBe('Unterminated string literal at line 1, column 8');
    });

    it('should report unterminated quoted identifiers', () => {
      const error = lexError(() => tokenize('"abc'));

      expect(error.code).toBe(LexErrorCode.UNTERMINATED_IDENTIFIER);
    });

    it('should report unterminated block comments', () => {
      const error = lexError(() => tokenize('/* x'));

      expect(error.code).toBe(LexErrorCode.UNTERMINATED_COMMENT);
    });

    it('should report unterminated dollar strings', () => {
      const error = lexError(() => tokenize('$$ x', { dialect: 'postgresql' }));

      expect(error.code).toBe(LexErrorCode.UNTERMINATED_DOLLAR_STRING);
    });

    it('should report characters that start no token', () => {
      const error = lexError(() => tokenize('SELECT {'));

      expect(error.code).toBe(LexErrorCode.INVALID_CHARACTER);
      expect(error.message).toBe("Unexpected character '{' at line 1, column 8");
    });
  });
});

// =============================================================================
// Token Stream
// =============================================================================

describe('TokenStream', () => {
  it('should look ahead without consuming', () => {
    const stream = new TokenStream(new Lexer('a b c'));

    expect(stream.peek(2).value).toBe('c');
    expect(stream.next().value).toBe('a');
    expect(stream.peek().value).toBe('b');
  });

  it('should remember the previous token', () => {
    const stream = new TokenStream(new Lexer('a b'));

    expect(stream.previous).toBeUndefined();
    stream.next();
    expect(stream.previous?.value).toBe('a');
  });

  it('should keep returning eof after the end', () => {
    const stream = new TokenStream(new Lexer('a'));

    stream.next();
    expect(stream.next().type).toBe('eof');
    expect(stream.next().type).toBe('eof');
    expect(stream.peek(5).type).toBe('eof');
  });

  it('should synthesize eof for sequences that lack one', () => {
    const tokens: Token[] = [
      {
        type: 'identifier',
        value: 'x',
        span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 2, offset: 1 } },
      },
    ];
    const stream = new TokenStream(tokens);

    stream.next();
    const eof = stream.next();
    expect(eof.type).toBe('eof');
    expect(eof.span.start).toEqual({ line: 1, column: 2, offset: 1 });
  });
});
