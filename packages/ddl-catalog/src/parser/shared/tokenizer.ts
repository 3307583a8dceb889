/**
 * SQL Tokenizer
 *
 * Lazy, restartable lexer for DDL text. Handles keywords, identifiers,
 * quoted identifiers, strings, numbers, operators and comments following
 * the lexical rules of the selected dialect.
 *
 * @packageDocumentation
 */

import type { Token, TokenType, SourceLocation, SourceSpan } from './types.js';
import keywordList from './keywords.json' with { type: 'json' };
import { LexError } from '../../errors/syntax-errors.js';
import { LexErrorCode } from '../../errors/codes.js';
import { getDialect, type Dialect, type DialectRules } from '../../dialects/index.js';

// =============================================================================
// SQL KEYWORDS
// =============================================================================

/**
 * Upper-case words the tokenizer classifies as keywords
 */
export const SQL_KEYWORDS: ReadonlySet<string> = new Set(keywordList);

/**
 * Check if a string is a SQL keyword
 */
export function isKeyword(value: string): boolean {
  return SQL_KEYWORDS.has(value.toUpperCase());
}

const IDENTIFIER_START = /[\p{L}_]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;

const THREE_CHAR_OPERATORS = ['->>', '#>>'];
const TWO_CHAR_OPERATORS = ['<=', '>=', '<>', '!=', '||', '::', '->', '=>', '<<', '>>', '#>', '@>', '<@'];
const SINGLE_CHAR_OPERATORS = '=<>+-*/%&|~^!@#?:';
const PUNCTUATION = '(),;.[]';

/**
 * Options accepted by the lexer
 */
export interface LexerOptions {
  /** Dialect whose lexical rules apply (default `generic`) */
  dialect?: Dialect;
  /** Emit comment tokens instead of skipping them */
  includeComments?: boolean;
}

// =============================================================================
// LEXER
// =============================================================================

/**
 * Token sequence over SQL text
 *
 * Every iteration lexes from the start of the source, so the same Lexer can
 * be iterated any number of times. Tokens are produced on demand; a lexical
 * error surfaces when iteration reaches the malformed token. The sequence
 * always ends with a single `eof` token.
 *
 * @example
 * ```typescript
 * const lexer = new Lexer('CREATE TABLE "Users" (id INT)', { dialect: 'postgresql' });
 * for (const token of lexer) {
 *   console.log(token.type, token.value);
 * }
 * ```
 */
export class Lexer implements Iterable<Token> {
  readonly source: string;
  private readonly rules: DialectRules;
  private readonly includeComments: boolean;

  constructor(source: string, options: LexerOptions = {}) {
    this.source = source;
    this.rules = getDialect(options.dialect ?? 'generic');
    this.includeComments = options.includeComments ?? false;
  }

  [Symbol.iterator](): Iterator<Token> {
    return new Tokenizer(this.source, this.rules).tokens(this.includeComments);
  }
}

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

/**
 * Single pass of the lexer over the source
 */
export class Tokenizer {
  private readonly sql: string;
  private readonly rules: DialectRules;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(sql: string, rules: DialectRules) {
    this.sql = sql;
    this.rules = rules;
  }

  /**
   * Yield tokens until the end of input, then one `eof` token
   */
  *tokens(includeComments = false): Generator<Token, void, undefined> {
    while (this.pos < this.sql.length) {
      const token = this.readToken();
      if (!token) continue;
      if (token.type === 'comment' && !includeComments) continue;
      yield token;
    }

    const end = this.location();
    yield { type: 'eof', value: '', span: { start: end, end } };
  }

  /**
   * Get current source location
   */
  private location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private spanFrom(start: SourceLocation): SourceSpan {
    return { start, end: this.location() };
  }

  private token(type: TokenType, value: string, start: SourceLocation): Token {
    return { type, value, span: this.spanFrom(start) };
  }

  private fail(code: LexErrorCode, message: string, start: SourceLocation): never {
    throw new LexError(code, message, this.spanFrom(start), this.sql);
  }

  /**
   * Advance position by one character
   */
  private advance(): string {
    const char = this.sql.charAt(this.pos);
    this.pos++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  /**
   * Peek at character at offset from current position
   */
  private peek(offset = 0): string {
    return this.sql.charAt(this.pos + offset);
  }

  private atEnd(): boolean {
    return this.pos >= this.sql.length;
  }

  /**
   * Read next token from input; whitespace yields null
   */
  private readToken(): Token | null {
    const loc = this.location();
    const char = this.peek();

    if (/\s/.test(char)) {
      this.advance();
      return null;
    }

    if ((char === '-' && this.peek(1) === '-') || (char === '#' && this.rules.hashComments)) {
      return this.readLineComment(loc);
    }

    if (char === '/' && this.peek(1) === '*') {
      return this.readBlockComment(loc);
    }

    if (char === "'") {
      return this.readString(loc, "'", this.rules.backslashEscapes);
    }

    // E'..', N'..', X'..', B'..' prefixed literals
    if (/[EeNnXxBb]/.test(char) && this.peek(1) === "'") {
      const escapes = char === 'E' || char === 'e' || this.rules.backslashEscapes;
      this.advance();
      return this.readString(loc, "'", escapes);
    }

    if (char === '"') {
      return this.rules.doubleQuotedStrings
        ? this.readString(loc, '"', this.rules.backslashEscapes)
        : this.readQuotedIdentifier(loc, '"', '"');
    }

    if (char === '`' && this.rules.backtickIdentifiers) {
      return this.readQuotedIdentifier(loc, '`', '`');
    }

    // `[name]` quotes an identifier; `[]` and `[3]` stay punctuation for array types
    if (char === '[' && this.rules.bracketIdentifiers && IDENTIFIER_START.test(this.peek(1))) {
      return this.readQuotedIdentifier(loc, '[', ']');
    }

    if (char === '$' && this.rules.dollarQuotedStrings) {
      const tag = /^\$(?:[\p{L}_][\p{L}\p{N}_]*)?\$/u.exec(this.sql.slice(this.pos));
      if (tag) {
        return this.readDollarString(loc, tag[0]);
      }
    }

    if (DIGIT.test(char) || (char === '.' && DIGIT.test(this.peek(1)))) {
      return this.readNumber(loc);
    }

    if (IDENTIFIER_START.test(char)) {
      return this.readIdentifier(loc);
    }

    const threeChar = this.sql.slice(this.pos, this.pos + 3);
    if (THREE_CHAR_OPERATORS.includes(threeChar)) {
      this.advance();
      this.advance();
      this.advance();
      return this.token('operator', threeChar, loc);
    }

    const twoChar = char + this.peek(1);
    if (TWO_CHAR_OPERATORS.includes(twoChar)) {
      this.advance();
      this.advance();
      return this.token('operator', twoChar, loc);
    }

    if (SINGLE_CHAR_OPERATORS.includes(char)) {
      this.advance();
      return this.token('operator', char, loc);
    }

    if (PUNCTUATION.includes(char)) {
      this.advance();
      return this.token('punctuation', char, loc);
    }

    this.advance();
    return this.fail(LexErrorCode.INVALID_CHARACTER, `Unexpected character '${char}'`, loc);
  }

  /**
   * Read single-line comment (-- ... or # ...)
   */
  private readLineComment(loc: SourceLocation): Token {
    const marker = this.advance();
    if (marker === '-') this.advance();

    let value = '';
    while (!this.atEnd() && this.peek() !== '\n') {
      value += this.advance();
    }
    return this.token('comment', value.trim(), loc);
  }

  /**
   * Read block comment; nests where the dialect allows it
   */
  private readBlockComment(loc: SourceLocation): Token {
    this.advance(); // /
    this.advance(); // *

    let depth = 1;
    let value = '';
    while (!this.atEnd()) {
      if (this.peek() === '*' && this.peek(1) === '/') {
        this.advance();
        this.advance();
        depth--;
        if (depth === 0) {
          return this.token('comment', value.trim(), loc);
        }
        value += '*/';
      } else if (this.rules.nestedComments && this.peek() === '/' && this.peek(1) === '*') {
        value += this.advance() + this.advance();
        depth++;
      } else {
        value += this.advance();
      }
    }

    return this.fail(LexErrorCode.UNTERMINATED_COMMENT, 'Unterminated block comment', loc);
  }

  /**
   * Read string literal; a doubled quote is an escaped quote
   */
  private readString(loc: SourceLocation, quote: string, backslashEscapes: boolean): Token {
    let value = '';
    this.advance(); // opening quote

    while (!this.atEnd()) {
      const char = this.peek();

      if (char === quote) {
        if (this.peek(1) === quote) {
          value += quote;
          this.advance();
          this.advance();
        } else {
          this.advance(); // closing quote
          return this.token('string', value, loc);
        }
      } else if (char === '\\' && backslashEscapes) {
        this.advance();
        if (this.atEnd()) break;
        const escaped = this.advance();
        switch (escaped) {
          case 'n': value += '\n'; break;
          case 't': value += '\t'; break;
          case 'r': value += '\r'; break;
          case '0': value += '\0'; break;
          default: value += escaped;
        }
      } else {
        value += this.advance();
      }
    }

    return this.fail(LexErrorCode.UNTERMINATED_STRING, 'Unterminated string literal', loc);
  }

  /**
   * Read quoted identifier; a doubled closing quote is an escaped quote
   */
  private readQuotedIdentifier(loc: SourceLocation, open: string, close: string): Token {
    let value = '';
    this.advance(); // opening quote

    while (!this.atEnd()) {
      const char = this.peek();
      if (char === close) {
        if (this.peek(1) === close) {
          value += close;
          this.advance();
          this.advance();
        } else {
          this.advance(); // closing quote
          return this.token('quoted_identifier', value, loc);
        }
      } else {
        value += this.advance();
      }
    }

    return this.fail(
      LexErrorCode.UNTERMINATED_IDENTIFIER,
      `Unterminated quoted identifier (missing ${close})`,
      loc
    );
  }

  /**
   * Read `$tag$ ... $tag$` string body verbatim
   */
  private readDollarString(loc: SourceLocation, tag: string): Token {
    for (let i = 0; i < tag.length; i++) this.advance();

    const close = this.sql.indexOf(tag, this.pos);
    if (close === -1) {
      while (!this.atEnd()) this.advance();
      return this.fail(
        LexErrorCode.UNTERMINATED_DOLLAR_STRING,
        `Unterminated dollar-quoted string (missing ${tag})`,
        loc
      );
    }

    let value = '';
    while (this.pos < close) {
      value += this.advance();
    }
    for (let i = 0; i < tag.length; i++) this.advance();

    return this.token('string', value, loc);
  }

  /**
   * Read numeric literal
   */
  private readNumber(loc: SourceLocation): Token {
    let value = '';

    // Integer part
    while (DIGIT.test(this.peek())) {
      value += this.advance();
    }

    // Decimal part
    if (this.peek() === '.' && DIGIT.test(this.peek(1))) {
      value += this.advance(); // .
      while (DIGIT.test(this.peek())) {
        value += this.advance();
      }
    }

    // Scientific notation
    const sign = this.peek(1);
    if (
      (this.peek() === 'e' || this.peek() === 'E') &&
      (DIGIT.test(sign) || ((sign === '+' || sign === '-') && DIGIT.test(this.peek(2))))
    ) {
      value += this.advance(); // e/E
      if (this.peek() === '+' || this.peek() === '-') {
        value += this.advance();
      }
      while (DIGIT.test(this.peek())) {
        value += this.advance();
      }
    }

    return this.token('number', value, loc);
  }

  /**
   * Read identifier or keyword
   */
  private readIdentifier(loc: SourceLocation): Token {
    let value = '';

    while (!this.atEnd() && IDENTIFIER_PART.test(this.peek())) {
      value += this.advance();
    }

    const upper = value.toUpperCase();
    return SQL_KEYWORDS.has(upper)
      ? this.token('keyword', upper, loc)
      : this.token('identifier', value, loc);
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Tokenize a SQL string eagerly
 *
 * @returns Array of tokens ending with `eof`
 */
export function tokenize(sql: string, options: LexerOptions = {}): Token[] {
  return [...new Lexer(sql, options)];
}
