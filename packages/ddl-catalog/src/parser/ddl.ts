/**
 * DDL (Data Definition Language) Parser
 *
 * Parses DDL scripts into an Abstract Syntax Tree, one statement at a time.
 * Supports:
 * - CREATE TABLE with column definitions and constraints
 * - CREATE INDEX / CREATE UNIQUE INDEX
 * - ALTER TABLE ADD / DROP / RENAME / ALTER COLUMN
 * - DROP TABLE / DROP INDEX / DROP SCHEMA / DROP TYPE
 * - CREATE SCHEMA / CREATE TYPE
 * - COMMENT ON
 *
 * Statements of any other kind become `UNKNOWN` nodes, or syntax errors when
 * `unknownStatements` is `reject`.
 */

import type {
  DDLStatement,
  CreateTableStatement,
  CreateIndexStatement,
  AlterTableStatement,
  DropTableStatement,
  DropIndexStatement,
  CreateSchemaStatement,
  DropSchemaStatement,
  CreateTypeStatement,
  DropTypeStatement,
  CommentStatement,
  CommentTarget,
  UnknownStatement,
  UnsupportedTableSource,
  ColumnDefinition,
  ColumnDataType,
  ColumnConstraint,
  TableConstraint,
  ReferencesClause,
  ReferenceAction,
  DeferrableClause,
  MatchType,
  KeyColumn,
  IndexColumn,
  TableIndexDefinition,
  AlterTableOperation,
  AlterColumnAction,
  TypeAttribute,
  QualifiedName,
  ParseResult,
  ScriptParseResult,
} from './ddl-types.js';
import type { Token, SourceSpan } from './shared/types.js';
import { Lexer } from './shared/tokenizer.js';
import { TokenStream } from './shared/token-stream.js';
import {
  SQLSyntaxError,
  UnexpectedTokenError,
  UnexpectedEOFError,
} from '../errors/syntax-errors.js';
import { SyntaxErrorCode } from '../errors/codes.js';
import { createErrorFromException } from '../errors/base.js';
import { getDialect, type Dialect, type DialectRules, type IdentifierCase } from '../dialects/index.js';

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options accepted by the parser
 */
export interface ParserOptions {
  /** SQL dialect (default `generic`) */
  dialect?: Dialect;
  /** Folding of unquoted identifiers (default: the dialect's) */
  identifierCase?: IdentifierCase;
  /** Yield `UNKNOWN` nodes or fail on unrecognized statements (default `skip`) */
  unknownStatements?: 'skip' | 'reject';
}

/**
 * Apply a case-folding policy to an unquoted identifier
 */
export function foldIdentifier(value: string, identifierCase: IdentifierCase): string {
  switch (identifierCase) {
    case 'lower':
      return value.toLowerCase();
    case 'upper':
      return value.toUpperCase();
    case 'preserve':
      return value;
  }
}

// =============================================================================
// GRAMMAR TABLES
// =============================================================================

/**
 * Keywords that never stand for a bare identifier
 */
const RESERVED = new Set([
  'ALL', 'ALTER', 'AND', 'AS', 'CHECK', 'COLLATE', 'CONSTRAINT', 'CREATE',
  'DEFAULT', 'DROP', 'FOREIGN', 'FROM', 'NOT', 'NULL', 'ON', 'OR', 'PRIMARY',
  'REFERENCES', 'SELECT', 'TABLE', 'UNIQUE', 'WHERE',
]);

/**
 * Words that end a DEFAULT expression or start the next column constraint
 */
const COLUMN_CONSTRAINT_START = new Set([
  'CONSTRAINT', 'PRIMARY', 'NOT', 'NULL', 'UNIQUE', 'CHECK', 'DEFAULT',
  'REFERENCES', 'COLLATE', 'GENERATED', 'AUTOINCREMENT', 'AUTO_INCREMENT',
  'IDENTITY', 'COMMENT', 'ON', 'AS',
]);

const TABLE_CONSTRAINT_START = new Set(['CONSTRAINT', 'PRIMARY', 'FOREIGN', 'UNIQUE', 'CHECK']);

/**
 * ALTER TABLE actions that leave the catalog unchanged
 */
const IGNORED_ALTER_ACTIONS = new Set([
  'OWNER', 'ENABLE', 'DISABLE', 'CLUSTER', 'REPLICA', 'INHERIT', 'NO',
  'FORCE', 'RESET', 'ENGINE', 'AUTO_INCREMENT', 'ALGORITHM', 'LOCK',
]);

const TEMPORARY_WORDS = new Set(['TEMP', 'TEMPORARY', 'GLOBAL', 'LOCAL', 'UNLOGGED']);

// =============================================================================
// PARSER
// =============================================================================

/**
 * Recursive-descent DDL parser over a lazy token stream
 */
class Parser {
  private readonly source: string;
  private readonly stream: TokenStream;
  private readonly rules: DialectRules;
  private readonly identifierCase: IdentifierCase;
  private readonly unknownStatements: 'skip' | 'reject';

  constructor(sql: string, options: ParserOptions = {}) {
    const dialect = options.dialect ?? 'generic';
    this.source = sql;
    this.stream = new TokenStream(new Lexer(sql, { dialect }));
    this.rules = getDialect(dialect);
    this.identifierCase = options.identifierCase ?? this.rules.identifierCase;
    this.unknownStatements = options.unknownStatements ?? 'skip';
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  /**
   * Get current token
   */
  private current(): Token {
    return this.stream.peek();
  }

  /**
   * Peek at a token ahead
   */
  private peek(offset = 1): Token {
    return this.stream.peek(offset);
  }

  /**
   * Advance to next token
   */
  private advance(): Token {
    return this.stream.next();
  }

  /**
   * Source text of a token, quotes included
   */
  private raw(token: Token): string {
    return this.source.slice(token.span.start.offset, token.span.end.offset);
  }

  /**
   * Check whether the token at `offset` is the unquoted word `word`
   */
  private isWord(word: string, offset = 0): boolean {
    const token = this.stream.peek(offset);
    return (token.type === 'keyword' || token.type === 'identifier') &&
      token.value.toUpperCase() === word;
  }

  private isPunct(value: string, offset = 0): boolean {
    const token = this.stream.peek(offset);
    return token.type === 'punctuation' && token.value === value;
  }

  private isOperator(value: string, offset = 0): boolean {
    const token = this.stream.peek(offset);
    return token.type === 'operator' && token.value === value;
  }

  /**
   * Token ends the current statement
   */
  private atStatementEnd(offset = 0): boolean {
    return this.stream.peek(offset).type === 'eof' || this.isPunct(';', offset);
  }

  /**
   * Consume a word if it matches
   */
  private consumeWord(word: string): boolean {
    if (this.isWord(word)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consumeWords(...words: string[]): boolean {
    if (!words.every((word, i) => this.isWord(word, i))) return false;
    for (let i = 0; i < words.length; i++) this.advance();
    return true;
  }

  private consumePunct(value: string): boolean {
    if (this.isPunct(value)) {
      this.advance();
      return true;
    }
    return false;
  }

  /**
   * Expect a word or throw error
   */
  private expectWord(word: string): Token {
    if (!this.isWord(word)) throw this.unexpected(word);
    return this.advance();
  }

  private expectPunct(value: string): Token {
    if (!this.isPunct(value)) throw this.unexpected(`'${value}'`);
    return this.advance();
  }

  private unexpected(expected: string): SQLSyntaxError {
    const token = this.current();
    if (token.type === 'eof') {
      return new UnexpectedEOFError(expected, token.span, this.source);
    }
    return new UnexpectedTokenError(this.raw(token), expected, token.span, this.source);
  }

  /**
   * Span from `start` to the end of the last consumed token
   */
  private spanFrom(start: Token): SourceSpan {
    const end = this.stream.previous ?? start;
    return { start: start.span.start, end: end.span.end };
  }

  private textOf(span: SourceSpan): string {
    return this.source.slice(span.start.offset, span.end.offset);
  }

  private parseIfExists(): boolean {
    return this.consumeWords('IF', 'EXISTS');
  }

  private parseIfNotExists(): boolean {
    return this.consumeWords('IF', 'NOT', 'EXISTS');
  }

  /**
   * Parse CASCADE / RESTRICT; returns whether CASCADE was given
   */
  private parseDropBehavior(): boolean {
    if (this.consumeWord('CASCADE')) return true;
    this.consumeWord('RESTRICT');
    return false;
  }

  // ---------------------------------------------------------------------------
  // Identifiers and names
  // ---------------------------------------------------------------------------

  private isIdentifierToken(offset = 0): boolean {
    const token = this.stream.peek(offset);
    return token.type === 'identifier' ||
      token.type === 'quoted_identifier' ||
      (token.type === 'keyword' && !RESERVED.has(token.value));
  }

  /**
   * Parse an identifier (column name, table name, etc.), folded per options
   */
  private parseIdentifier(expected = 'identifier'): string {
    const token = this.current();
    if (!this.isIdentifierToken()) throw this.unexpected(expected);
    this.advance();
    return token.type === 'quoted_identifier'
      ? token.value
      : foldIdentifier(this.raw(token), this.identifierCase);
  }

  /**
   * Parse optional schema-qualified name (schema.name or just name)
   */
  private parseQualifiedName(expected = 'name'): QualifiedName {
    const start = this.current();
    const first = this.parseIdentifier(expected);
    if (this.isPunct('.') && this.isIdentifierToken(1)) {
      this.advance();
      const second = this.parseIdentifier(expected);
      return { schema: first, name: second, span: this.spanFrom(start) };
    }
    return { name: first, span: this.spanFrom(start) };
  }

  private parseQualifiedNameList(expected: string): QualifiedName[] {
    const names = [this.parseQualifiedName(expected)];
    while (this.consumePunct(',')) {
      names.push(this.parseQualifiedName(expected));
    }
    return names;
  }

  private parseStringLiteral(expected = 'string literal'): string {
    const token = this.current();
    if (token.type !== 'string') throw this.unexpected(expected);
    this.advance();
    return token.value;
  }

  // ---------------------------------------------------------------------------
  // Expressions (kept as source text)
  // ---------------------------------------------------------------------------

  /**
   * Consume tokens until `stop` matches at parenthesis depth 0 or the
   * statement ends; returns the consumed source text
   */
  private parseExpressionText(stop: () => boolean, expected = 'expression'): string {
    const start = this.current();
    let depth = 0;
    let consumed = 0;

    while (!this.atStatementEnd()) {
      if (depth === 0 && consumed > 0 && stop()) break;
      if (depth === 0 && this.isPunct(')')) break;
      if (depth === 0 && this.isPunct(',') && consumed > 0) break;
      if (this.isPunct('(')) depth++;
      if (this.isPunct(')')) depth--;
      this.advance();
      consumed++;
    }

    if (depth > 0) throw this.unexpected(`')'`);
    if (consumed === 0) throw this.unexpected(expected);
    return this.textOf(this.spanFrom(start));
  }

  /**
   * Parse a parenthesized expression (for CHECK, generated columns, etc.)
   * and return the text between the parentheses
   */
  private parseParenthesizedExpression(): string {
    const open = this.expectPunct('(');
    let depth = 1;

    while (depth > 0) {
      if (this.current().type === 'eof') throw this.unexpected(`')'`);
      if (this.isPunct('(')) depth++;
      if (this.isPunct(')')) depth--;
      if (depth > 0) this.advance();
    }

    const close = this.expectPunct(')');
    return this.source.slice(open.span.end.offset, close.span.start.offset).trim();
  }

  /**
   * Skip a balanced parenthesized group
   */
  private skipParenthesized(): void {
    this.parseParenthesizedExpression();
  }

  /**
   * Skip tokens up to the next `,` at depth 0 or the end of the statement
   */
  private skipToCommaOrEnd(): void {
    let depth = 0;
    while (!this.atStatementEnd()) {
      if (depth === 0 && this.isPunct(',')) return;
      if (this.isPunct('(')) depth++;
      if (this.isPunct(')')) depth--;
      this.advance();
    }
  }

  /**
   * Skip tokens up to the end of the statement
   */
  private skipToEnd(): void {
    let depth = 0;
    while (this.current().type !== 'eof' && !(depth === 0 && this.isPunct(';'))) {
      if (this.isPunct('(')) depth++;
      if (this.isPunct(')')) depth = Math.max(0, depth - 1);
      this.advance();
    }
  }

  // ---------------------------------------------------------------------------
  // Data types
  // ---------------------------------------------------------------------------

  /**
   * Consume the longest multi-word tail that follows a type's first word
   */
  private parseTypeTail(head: string): string[] {
    const tails = this.rules.multiWordTypes.get(head) ?? [];
    for (const tail of tails) {
      if (tail.every((word, i) => this.isWord(word, i))) {
        for (let i = 0; i < tail.length; i++) this.advance();
        return [...tail];
      }
    }
    return [];
  }

  private parseTypeParameters(type: ColumnDataType): void {
    this.expectPunct('(');

    if (this.current().type === 'string') {
      type.values = [this.parseStringLiteral()];
      while (this.consumePunct(',')) {
        type.values.push(this.parseStringLiteral());
      }
      this.expectPunct(')');
      return;
    }

    do {
      const sign = this.isOperator('-') ? this.advance() : undefined;
      const token = this.current();
      if (token.type !== 'number') throw this.unexpected('type parameter');
      this.advance();
      const value = Number(token.value) * (sign ? -1 : 1);
      if (!Number.isInteger(value)) {
        throw new SQLSyntaxError(
          SyntaxErrorCode.INVALID_LITERAL,
          `Type parameter must be an integer, got '${token.value}'`,
          token.span,
          this.source
        );
      }
      type.parameters.push(value);
      // Oracle/MySQL length semantics: VARCHAR2(10 CHAR)
      if (!this.consumeWord('CHAR')) this.consumeWord('BYTE');
    } while (this.consumePunct(','));

    this.expectPunct(')');
  }

  /**
   * Parse a data type
   */
  private parseDataType(): ColumnDataType {
    const start = this.current();
    if (!this.isIdentifierToken()) {
      throw this.unexpected('data type');
    }

    const type: ColumnDataType = {
      name: '',
      quoted: false,
      parameters: [],
      arrayDimensions: 0,
      unsigned: false,
      span: start.span,
    };

    if (start.type === 'quoted_identifier' || (this.isPunct('.', 1) && this.isIdentifierToken(2))) {
      const name = this.parseQualifiedName('data type');
      type.name = name.name;
      type.schema = name.schema;
      type.quoted = start.type === 'quoted_identifier';
    } else {
      this.advance();
      const head = this.raw(start).toUpperCase();
      let tail = this.parseTypeTail(head);
      if (this.isPunct('(')) {
        this.parseTypeParameters(type);
        if (tail.length === 0) tail = this.parseTypeTail(head);
      }
      type.name = tail.length > 0
        ? [head, ...tail].join(' ')
        : foldIdentifier(this.raw(start), this.identifierCase);
    }

    if (type.parameters.length === 0 && type.values === undefined && this.isPunct('(')) {
      this.parseTypeParameters(type);
    }

    // Modifiers and array suffixes
    for (;;) {
      if (this.consumeWord('UNSIGNED')) {
        type.unsigned = true;
      } else if (this.consumeWord('SIGNED') || this.consumeWord('ZEROFILL')) {
        // no catalog effect
      } else if (this.isWord('CHARACTER') && this.isWord('SET', 1)) {
        this.advance();
        this.advance();
        type.charset = this.parseIdentifier('character set');
      } else if (this.consumeWord('CHARSET')) {
        type.charset = this.parseIdentifier('character set');
      } else if (this.isPunct('[')) {
        this.advance();
        if (this.current().type === 'number') this.advance();
        this.expectPunct(']');
        type.arrayDimensions++;
      } else if (this.consumeWord('ARRAY')) {
        if (this.consumePunct('[')) {
          if (this.current().type === 'number') this.advance();
          this.expectPunct(']');
        }
        type.arrayDimensions++;
      } else {
        break;
      }
    }

    type.span = this.spanFrom(start);
    return type;
  }

  // ---------------------------------------------------------------------------
  // Constraints
  // ---------------------------------------------------------------------------

  /**
   * Parse a reference action (ON DELETE/UPDATE ...)
   */
  private parseReferenceAction(): ReferenceAction {
    if (this.consumeWords('NO', 'ACTION')) return 'NO ACTION';
    if (this.consumeWord('RESTRICT')) return 'RESTRICT';
    if (this.consumeWord('CASCADE')) return 'CASCADE';
    if (this.consumeWords('SET', 'NULL')) return 'SET NULL';
    if (this.consumeWords('SET', 'DEFAULT')) return 'SET DEFAULT';
    throw this.unexpected('referential action');
  }

  /**
   * Parse deferrable clause
   */
  private parseDeferrableClause(): DeferrableClause | undefined {
    if (this.isWord('NOT') && this.isWord('DEFERRABLE', 1)) {
      this.advance();
      this.advance();
      this.parseInitially();
      return 'NOT DEFERRABLE';
    }
    const deferrable = this.consumeWord('DEFERRABLE');
    const initially = this.parseInitially();
    if (initially === 'DEFERRED') return 'DEFERRABLE INITIALLY DEFERRED';
    if (initially === 'IMMEDIATE') return 'DEFERRABLE INITIALLY IMMEDIATE';
    return deferrable ? 'DEFERRABLE' : undefined;
  }

  private parseInitially(): 'DEFERRED' | 'IMMEDIATE' | undefined {
    if (!this.consumeWord('INITIALLY')) return undefined;
    if (this.consumeWord('DEFERRED')) return 'DEFERRED';
    this.expectWord('IMMEDIATE');
    return 'IMMEDIATE';
  }

  /**
   * Parse SQLite `ON CONFLICT <resolution>`, which has no catalog effect
   */
  private skipConflictClause(): void {
    if (this.isWord('ON') && this.isWord('CONFLICT', 1)) {
      this.advance();
      this.advance();
      this.parseIdentifier('conflict resolution');
    }
  }

  /**
   * Parse a parenthesized key column list
   */
  private parseKeyColumns(): KeyColumn[] {
    this.expectPunct('(');
    const columns: KeyColumn[] = [];

    do {
      const start = this.current();
      const column: KeyColumn = { name: this.parseIdentifier('column name'), span: start.span };

      // MySQL prefix length: col(10)
      if (this.isPunct('(') && this.peek().type === 'number' && this.isPunct(')', 2)) {
        this.advance();
        this.advance();
        this.advance();
      }
      if (this.consumeWord('COLLATE')) {
        column.collation = this.parseIdentifier('collation');
      }
      if (this.consumeWord('ASC')) column.order = 'ASC';
      else if (this.consumeWord('DESC')) column.order = 'DESC';

      column.span = this.spanFrom(start);
      columns.push(column);
    } while (this.consumePunct(','));

    this.expectPunct(')');
    return columns;
  }

  /**
   * Parse the target and actions of a REFERENCES clause
   */
  private parseReferences(): ReferencesClause {
    const clause: ReferencesClause = { table: this.parseQualifiedName('referenced table') };

    if (this.isPunct('(')) {
      clause.columns = this.parseKeyColumns();
    }

    for (;;) {
      if (this.isWord('ON') && this.isWord('DELETE', 1)) {
        this.advance();
        this.advance();
        clause.onDelete = this.parseReferenceAction();
      } else if (this.isWord('ON') && this.isWord('UPDATE', 1)) {
        this.advance();
        this.advance();
        clause.onUpdate = this.parseReferenceAction();
      } else if (this.consumeWord('MATCH')) {
        clause.match = this.parseMatchType();
      } else {
        const deferrable = this.parseDeferrableClause();
        if (!deferrable) break;
        clause.deferrable = deferrable;
      }
    }

    return clause;
  }

  private parseMatchType(): MatchType {
    if (this.consumeWord('SIMPLE')) return 'SIMPLE';
    if (this.consumeWord('PARTIAL')) return 'PARTIAL';
    if (this.consumeWord('FULL')) return 'FULL';
    throw this.unexpected('SIMPLE, PARTIAL, or FULL');
  }

  /**
   * Parse column constraints
   */
  private parseColumnConstraints(): ColumnConstraint[] {
    const constraints: ColumnConstraint[] = [];

    for (;;) {
      const start = this.current();
      let constraintName: string | undefined;

      // Optional CONSTRAINT name
      if (this.consumeWord('CONSTRAINT')) {
        constraintName = this.parseIdentifier('constraint name');
      }

      // PRIMARY KEY
      if (this.consumeWord('PRIMARY')) {
        this.expectWord('KEY');
        let order: 'ASC' | 'DESC' | undefined;
        if (this.consumeWord('ASC')) order = 'ASC';
        else if (this.consumeWord('DESC')) order = 'DESC';
        this.skipConflictClause();
        const autoincrement = this.consumeWord('AUTOINCREMENT');

        constraints.push({
          type: 'PRIMARY KEY',
          name: constraintName,
          order,
          autoincrement,
          span: this.spanFrom(start),
        });
        continue;
      }

      // NOT NULL
      if (this.isWord('NOT') && this.isWord('NULL', 1)) {
        this.advance();
        this.advance();
        this.skipConflictClause();
        constraints.push({ type: 'NOT NULL', name: constraintName, span: this.spanFrom(start) });
        continue;
      }

      // NULL
      if (this.consumeWord('NULL')) {
        constraints.push({ type: 'NULL', name: constraintName, span: this.spanFrom(start) });
        continue;
      }

      // UNIQUE
      if (this.consumeWord('UNIQUE')) {
        this.consumeWord('KEY');
        this.skipConflictClause();
        constraints.push({ type: 'UNIQUE', name: constraintName, span: this.spanFrom(start) });
        continue;
      }

      // CHECK
      if (this.consumeWord('CHECK')) {
        const expression = this.parseParenthesizedExpression();
        constraints.push({
          type: 'CHECK',
          name: constraintName,
          expression,
          span: this.spanFrom(start),
        });
        continue;
      }

      // DEFAULT
      if (this.consumeWord('DEFAULT')) {
        const expression = this.parseExpressionText(
          () => {
            const token = this.current();
            return token.type === 'keyword' && COLUMN_CONSTRAINT_START.has(token.value);
          },
          'default value'
        );
        constraints.push({
          type: 'DEFAULT',
          name: constraintName,
          expression,
          span: this.spanFrom(start),
        });
        continue;
      }

      // COLLATE
      if (this.consumeWord('COLLATE')) {
        const collation = this.parseIdentifier('collation');
        constraints.push({ type: 'COLLATE', collation, span: this.spanFrom(start) });
        continue;
      }

      // REFERENCES
      if (this.consumeWord('REFERENCES')) {
        const references = this.parseReferences();
        constraints.push({
          type: 'REFERENCES',
          name: constraintName,
          ...references,
          span: this.spanFrom(start),
        });
        continue;
      }

      // GENERATED ALWAYS AS (expr) | GENERATED {ALWAYS | BY DEFAULT} AS IDENTITY
      if (this.consumeWord('GENERATED')) {
        if (!this.consumeWord('ALWAYS')) {
          this.expectWord('BY');
          this.expectWord('DEFAULT');
        }
        this.expectWord('AS');
        if (this.consumeWord('IDENTITY')) {
          if (this.isPunct('(')) this.skipParenthesized();
          constraints.push({ type: 'GENERATED', identity: true, span: this.spanFrom(start) });
          continue;
        }
        constraints.push(this.parseGeneratedExpression(start));
        continue;
      }

      // AS (expr) shorthand for generated columns
      if (this.isWord('AS') && this.isPunct('(', 1)) {
        this.advance();
        constraints.push(this.parseGeneratedExpression(start));
        continue;
      }

      // AUTOINCREMENT / AUTO_INCREMENT / IDENTITY[(seed, step)]
      if (this.consumeWord('AUTOINCREMENT') || this.consumeWord('AUTO_INCREMENT')) {
        constraints.push({ type: 'AUTO_INCREMENT', span: this.spanFrom(start) });
        continue;
      }
      if (this.consumeWord('IDENTITY')) {
        if (this.isPunct('(')) this.skipParenthesized();
        constraints.push({ type: 'AUTO_INCREMENT', span: this.spanFrom(start) });
        continue;
      }

      // COMMENT 'text'
      if (this.isWord('COMMENT') && this.peek().type === 'string') {
        this.advance();
        const text = this.parseStringLiteral();
        constraints.push({ type: 'COMMENT', text, span: this.spanFrom(start) });
        continue;
      }

      // MySQL ON UPDATE <expr> has no catalog effect
      if (this.isWord('ON') && this.isWord('UPDATE', 1)) {
        this.advance();
        this.advance();
        this.parseExpressionText(() => {
          const token = this.current();
          return token.type === 'keyword' && COLUMN_CONSTRAINT_START.has(token.value);
        });
        continue;
      }

      if (constraintName !== undefined) {
        throw this.unexpected('constraint definition');
      }

      // No more constraints
      break;
    }

    return constraints;
  }

  private parseGeneratedExpression(start: Token): ColumnConstraint {
    const expression = this.parseParenthesizedExpression();
    let storage: 'STORED' | 'VIRTUAL' | undefined;
    if (this.consumeWord('STORED')) storage = 'STORED';
    else if (this.consumeWord('VIRTUAL')) storage = 'VIRTUAL';
    return { type: 'GENERATED', expression, storage, identity: false, span: this.spanFrom(start) };
  }

  /**
   * Column without a type (SQLite) is followed directly by a constraint,
   * a comma or the closing parenthesis
   */
  private atTypelessColumnEnd(): boolean {
    const token = this.current();
    if (token.type === 'punctuation' && (token.value === ',' || token.value === ')')) return true;
    if (this.atStatementEnd()) return true;
    return token.type === 'keyword' && COLUMN_CONSTRAINT_START.has(token.value);
  }

  /**
   * Parse a column definition
   */
  private parseColumnDefinition(): ColumnDefinition {
    const start = this.current();
    const name = this.parseIdentifier('column name');
    const dataType = this.rules.typelessColumns && this.atTypelessColumnEnd()
      ? undefined
      : this.parseDataType();
    const constraints = this.parseColumnConstraints();

    return { name, dataType, constraints, span: this.spanFrom(start) };
  }

  /**
   * Parse one table-level constraint
   */
  private parseTableConstraint(): TableConstraint {
    const start = this.current();
    let name: string | undefined;

    // Check for CONSTRAINT keyword
    if (this.consumeWord('CONSTRAINT')) {
      name = this.parseIdentifier('constraint name');
    }

    let constraint: TableConstraint;

    if (this.consumeWord('PRIMARY')) {
      this.expectWord('KEY');
      this.parseIndexMethod();
      const columns = this.parseKeyColumns();
      constraint = { type: 'PRIMARY KEY', name, columns, span: start.span };
    } else if (this.consumeWord('UNIQUE')) {
      if (!this.consumeWord('KEY')) this.consumeWord('INDEX');
      // MySQL: UNIQUE KEY name (cols)
      if (!this.isPunct('(') && !this.isWord('USING')) {
        const indexName = this.parseIdentifier('index name');
        name ??= indexName;
      }
      this.parseIndexMethod();
      const columns = this.parseKeyColumns();
      constraint = { type: 'UNIQUE', name, columns, span: start.span };
    } else if (this.consumeWord('FOREIGN')) {
      this.expectWord('KEY');
      // MySQL: FOREIGN KEY name (cols)
      if (!this.isPunct('(')) {
        const indexName = this.parseIdentifier('index name');
        name ??= indexName;
      }
      const columns = this.parseKeyColumns();
      this.expectWord('REFERENCES');
      const references = this.parseReferences();
      constraint = { type: 'FOREIGN KEY', name, columns, references, span: start.span };
    } else if (this.consumeWord('CHECK')) {
      const expression = this.parseParenthesizedExpression();
      constraint = { type: 'CHECK', name, expression, span: start.span };
    } else {
      throw this.unexpected('PRIMARY KEY, UNIQUE, FOREIGN KEY or CHECK');
    }

    // Trailing clauses with no catalog effect
    for (;;) {
      if (this.parseDeferrableClause()) continue;
      if (this.isWord('ON') && this.isWord('CONFLICT', 1)) {
        this.skipConflictClause();
        continue;
      }
      if (this.isWord('NOT') && this.isWord('ENFORCED', 1)) {
        this.advance();
        this.advance();
        continue;
      }
      if (this.consumeWord('ENFORCED')) continue;
      if (this.isWord('USING') && this.isWord('INDEX', 1)) {
        this.advance();
        this.advance();
        if (this.consumeWord('TABLESPACE')) this.parseIdentifier('tablespace');
        continue;
      }
      if (this.parseIndexMethod() !== undefined) continue;
      if (this.rules.name === 'mysql' && this.skipMySQLIndexOption()) continue;
      break;
    }

    constraint.span = this.spanFrom(start);
    return constraint;
  }

  /**
   * `USING BTREE` / `USING HASH`
   */
  private parseIndexMethod(): string | undefined {
    if (!this.isWord('USING') || this.isWord('INDEX', 1)) return undefined;
    this.advance();
    return this.parseIdentifier('index method');
  }

  /**
   * MySQL index options with no catalog effect:
   * `COMMENT '...'`, `KEY_BLOCK_SIZE [=] n`, `WITH PARSER p`, `VISIBLE`, `INVISIBLE`
   */
  private skipMySQLIndexOption(): boolean {
    if (this.consumeWord('COMMENT')) {
      this.parseStringLiteral('index comment');
      return true;
    }
    if (this.consumeWord('KEY_BLOCK_SIZE')) {
      if (this.isOperator('=')) this.advance();
      this.advance();
      return true;
    }
    if (this.consumeWords('WITH', 'PARSER')) {
      this.parseIdentifier('parser name');
      return true;
    }
    return this.consumeWord('VISIBLE') || this.consumeWord('INVISIBLE');
  }

  /**
   * Whether a MySQL `KEY`, `INDEX`, `FULLTEXT` or `SPATIAL` entry starts here
   */
  private atTableIndex(): boolean {
    if (this.rules.name !== 'mysql') return false;
    if (this.isWord('KEY') || this.isWord('INDEX')) return true;
    return (this.isWord('FULLTEXT') || this.isWord('SPATIAL')) &&
      (this.isWord('KEY', 1) || this.isWord('INDEX', 1) || this.isPunct('(', 1));
  }

  /**
   * Parse `[FULLTEXT|SPATIAL] {KEY|INDEX} [name] [USING m] (cols) [options]`
   */
  private parseTableIndex(): TableIndexDefinition {
    const start = this.current();
    let method: string | undefined;

    if (this.isWord('FULLTEXT') || this.isWord('SPATIAL')) {
      method = this.advance().value.toUpperCase();
      if (!this.consumeWord('KEY')) this.consumeWord('INDEX');
    } else if (!this.consumeWord('KEY')) {
      this.expectWord('INDEX');
    }

    let name: string | undefined;
    if (!this.isPunct('(') && !this.isWord('USING')) {
      name = this.parseIdentifier('index name');
    }
    method = this.parseIndexMethod() ?? method;
    const columns = this.parseIndexColumns();

    for (;;) {
      const trailing = this.parseIndexMethod();
      if (trailing !== undefined) {
        method = trailing;
        continue;
      }
      if (!this.skipMySQLIndexOption()) break;
    }

    return { name, method, columns, span: this.spanFrom(start) };
  }

  // ---------------------------------------------------------------------------
  // CREATE TABLE
  // ---------------------------------------------------------------------------

  /**
   * Parse CREATE TABLE statement (after CREATE)
   */
  private parseCreateTable(start: Token): CreateTableStatement {
    let temporary = false;
    while (TEMPORARY_WORDS.has(this.current().value.toUpperCase()) && !this.isWord('TABLE')) {
      const word = this.advance().value.toUpperCase();
      if (word === 'TEMP' || word === 'TEMPORARY') temporary = true;
    }
    this.expectWord('TABLE');

    const ifNotExists = this.parseIfNotExists();
    const table = this.parseQualifiedName('table name');

    const statement: CreateTableStatement = {
      type: 'CREATE TABLE',
      table,
      ifNotExists,
      temporary,
      columns: [],
      constraints: [],
      indexes: [],
      span: start.span,
      text: '',
    };

    const unsupportedAt = (construct: UnsupportedTableSource): void => {
      const token = this.current();
      this.skipToEnd();
      statement.unsupported = { construct, span: this.spanFrom(token) };
    };

    if (this.isWord('AS')) {
      unsupportedAt('AS SELECT');
    } else if (this.isWord('LIKE')) {
      unsupportedAt('LIKE');
    } else if (this.isWord('PARTITION') && this.isWord('OF', 1)) {
      unsupportedAt('PARTITION OF');
    } else {
      this.expectPunct('(');

      if (this.isWord('LIKE')) {
        unsupportedAt('LIKE');
        return this.finishStatement(statement, start);
      }

      if (!this.isPunct(')')) {
        do {
          if (TABLE_CONSTRAINT_START.has(this.current().value) && this.current().type === 'keyword') {
            statement.constraints.push(this.parseTableConstraint());
          } else if (this.atTableIndex()) {
            statement.indexes.push(this.parseTableIndex());
          } else {
            statement.columns.push(this.parseColumnDefinition());
          }
        } while (this.consumePunct(','));
      }

      this.expectPunct(')');
      this.parseTableOptions(statement, unsupportedAt);
    }

    return this.finishStatement(statement, start);
  }

  /**
   * Parse trailing table options: INHERITS, AS SELECT and COMMENT are
   * recorded, everything else (ENGINE=, WITHOUT ROWID, STRICT, WITH (...),
   * PARTITION BY ...) has no catalog effect
   */
  private parseTableOptions(
    statement: CreateTableStatement,
    unsupportedAt: (construct: UnsupportedTableSource) => void
  ): void {
    while (!this.atStatementEnd()) {
      if (this.isWord('INHERITS')) {
        unsupportedAt('INHERITS');
        return;
      }
      if (this.isWord('AS')) {
        unsupportedAt('AS SELECT');
        return;
      }
      if (this.consumeWord('COMMENT')) {
        if (this.isOperator('=')) this.advance();
        statement.comment = this.parseStringLiteral('table comment');
        continue;
      }
      if (this.isPunct('(')) {
        this.skipParenthesized();
        continue;
      }
      this.advance();
    }
  }

  // ---------------------------------------------------------------------------
  // CREATE INDEX
  // ---------------------------------------------------------------------------

  private parseIndexColumns(): IndexColumn[] {
    this.expectPunct('(');
    const columns: IndexColumn[] = [];

    const atItemEnd = (offset: number): boolean =>
      this.isPunct(',', offset) || this.isPunct(')', offset) ||
      this.isWord('ASC', offset) || this.isWord('DESC', offset) ||
      this.isWord('COLLATE', offset) || this.isWord('NULLS', offset);

    do {
      const start = this.current();
      const column: IndexColumn = { span: start.span };

      if (this.isIdentifierToken() && (atItemEnd(1) || (this.isIdentifierToken(1) && atItemEnd(2)))) {
        column.name = this.parseIdentifier('column name');
      } else if (
        this.rules.name === 'mysql' && this.isIdentifierToken() &&
        this.isPunct('(', 1) && this.peek(2).type === 'number' && this.isPunct(')', 3)
      ) {
        // MySQL prefix length: col(10)
        column.name = this.parseIdentifier('column name');
        this.advance();
        this.advance();
        this.advance();
      } else {
        column.expression = this.parseExpressionText(
          () => atItemEnd(0),
          'index column or expression'
        );
      }

      if (this.consumeWord('COLLATE')) {
        column.collation = this.parseIdentifier('collation');
      }
      // PostgreSQL operator class
      if (this.isIdentifierToken() && !atItemEnd(0)) {
        this.parseIdentifier('operator class');
      }
      if (this.consumeWord('ASC')) column.order = 'ASC';
      else if (this.consumeWord('DESC')) column.order = 'DESC';
      if (this.consumeWord('NULLS')) {
        if (!this.consumeWord('FIRST')) this.expectWord('LAST');
      }

      column.span = this.spanFrom(start);
      columns.push(column);
    } while (this.consumePunct(','));

    this.expectPunct(')');
    return columns;
  }

  /**
   * Parse CREATE INDEX statement (after CREATE)
   */
  private parseCreateIndex(start: Token): CreateIndexStatement {
    const unique = this.consumeWord('UNIQUE');
    this.expectWord('INDEX');
    this.consumeWord('CONCURRENTLY');
    const ifNotExists = this.parseIfNotExists();

    let name: QualifiedName | undefined;
    if (!this.isWord('ON') && !this.isWord('USING')) {
      name = this.parseQualifiedName('index name');
    }

    // MySQL: CREATE INDEX i USING BTREE ON t (...)
    if (this.consumeWord('USING')) this.parseIdentifier('index method');

    this.expectWord('ON');
    this.consumeWord('ONLY');
    const table = this.parseQualifiedName('table name');

    let method: string | undefined;
    if (this.consumeWord('USING')) {
      method = this.parseIdentifier('index method');
    }

    const columns = this.parseIndexColumns();
    let where: string | undefined;

    while (!this.atStatementEnd()) {
      if (this.consumeWord('WHERE')) {
        where = this.parseExpressionText(() => false, 'predicate');
        continue;
      }
      if (this.isPunct('(')) {
        this.skipParenthesized();
        continue;
      }
      this.advance();
    }

    return this.finishStatement({
      type: 'CREATE INDEX',
      name: name?.name,
      schema: name?.schema,
      ifNotExists,
      unique,
      table,
      columns,
      method,
      where,
      span: start.span,
      text: '',
    }, start);
  }

  // ---------------------------------------------------------------------------
  // ALTER TABLE
  // ---------------------------------------------------------------------------

  private parseAlterColumnAction(): AlterColumnAction | undefined {
    if (this.consumeWords('SET', 'NOT', 'NULL')) return { type: 'SET NOT NULL' };
    if (this.consumeWords('DROP', 'NOT', 'NULL')) return { type: 'DROP NOT NULL' };
    if (this.consumeWords('SET', 'DEFAULT')) {
      const expression = this.parseExpressionText(() => false, 'default value');
      return { type: 'SET DEFAULT', expression };
    }
    if (this.consumeWords('DROP', 'DEFAULT')) return { type: 'DROP DEFAULT' };
    if (this.consumeWords('SET', 'DATA', 'TYPE') || this.consumeWord('TYPE')) {
      const dataType = this.parseDataType();
      let collation: string | undefined;
      if (this.consumeWord('COLLATE')) {
        collation = this.parseIdentifier('collation');
      }
      if (this.consumeWord('USING')) {
        this.parseExpressionText(() => false, 'conversion expression');
      }
      return { type: 'SET DATA TYPE', dataType, collation };
    }
    return undefined;
  }

  /**
   * Parse one ALTER TABLE action
   */
  private parseAlterOperation(): AlterTableOperation {
    const start = this.current();

    if (this.consumeWord('ADD')) {
      const token = this.current();
      if (token.type === 'keyword' && TABLE_CONSTRAINT_START.has(token.value)) {
        const constraint = this.parseTableConstraint();
        return { operation: 'ADD CONSTRAINT', constraint, span: this.spanFrom(start) };
      }
      if (this.atTableIndex()) {
        const index = this.parseTableIndex();
        return { operation: 'ADD INDEX', index, span: this.spanFrom(start) };
      }
      if (this.isWord('INDEX') || this.isWord('KEY') || this.isWord('FULLTEXT') || this.isWord('SPATIAL')) {
        this.skipToCommaOrEnd();
        return { operation: 'UNSUPPORTED', action: 'ADD INDEX', span: this.spanFrom(start) };
      }
      this.consumeWord('COLUMN');
      const ifNotExists = this.parseIfNotExists();
      const column = this.parseColumnDefinition();
      return { operation: 'ADD COLUMN', column, ifNotExists, span: this.spanFrom(start) };
    }

    if (this.consumeWord('DROP')) {
      if (this.consumeWord('CONSTRAINT')) {
        const ifExists = this.parseIfExists();
        const name = this.parseIdentifier('constraint name');
        const cascade = this.parseDropBehavior();
        return { operation: 'DROP CONSTRAINT', name, ifExists, cascade, span: this.spanFrom(start) };
      }
      if (this.consumeWords('PRIMARY', 'KEY')) {
        return { operation: 'DROP PRIMARY KEY', span: this.spanFrom(start) };
      }
      if (this.consumeWords('FOREIGN', 'KEY')) {
        const name = this.parseIdentifier('constraint name');
        return { operation: 'DROP CONSTRAINT', name, ifExists: false, cascade: false, span: this.spanFrom(start) };
      }
      if (this.rules.name === 'mysql' && (this.consumeWord('INDEX') || this.consumeWord('KEY'))) {
        const name = this.parseIdentifier('index name');
        return { operation: 'DROP INDEX', name, span: this.spanFrom(start) };
      }
      if (this.isWord('INDEX') || this.isWord('KEY')) {
        this.skipToCommaOrEnd();
        return { operation: 'UNSUPPORTED', action: 'DROP INDEX', span: this.spanFrom(start) };
      }
      this.consumeWord('COLUMN');
      const ifExists = this.parseIfExists();
      const column = this.parseIdentifier('column name');
      const cascade = this.parseDropBehavior();
      return { operation: 'DROP COLUMN', column, ifExists, cascade, span: this.spanFrom(start) };
    }

    if (this.consumeWord('RENAME')) {
      if (this.consumeWord('TO') || this.consumeWord('AS')) {
        const newName = this.parseIdentifier('table name');
        return { operation: 'RENAME TO', newName, span: this.spanFrom(start) };
      }
      if (this.consumeWord('CONSTRAINT')) {
        const oldName = this.parseIdentifier('constraint name');
        this.expectWord('TO');
        const newName = this.parseIdentifier('constraint name');
        return { operation: 'RENAME CONSTRAINT', oldName, newName, span: this.spanFrom(start) };
      }
      if (this.isWord('INDEX') || this.isWord('KEY')) {
        this.skipToCommaOrEnd();
        return { operation: 'UNSUPPORTED', action: 'RENAME INDEX', span: this.spanFrom(start) };
      }
      // RENAME [COLUMN] old_name TO new_name
      if (this.isWord('COLUMN') && !this.isWord('TO', 1)) this.advance();
      const oldName = this.parseIdentifier('column name');
      this.expectWord('TO');
      const newName = this.parseIdentifier('column name');
      return { operation: 'RENAME COLUMN', oldName, newName, span: this.spanFrom(start) };
    }

    if (this.isWord('ALTER') && !this.isWord('CONSTRAINT', 1)) {
      this.advance();
      if (this.isWord('COLUMN') && this.isIdentifierToken(1)) this.advance();
      const column = this.parseIdentifier('column name');
      const action = this.parseAlterColumnAction();
      if (action) {
        return { operation: 'ALTER COLUMN', column, action, span: this.spanFrom(start) };
      }
      this.skipToCommaOrEnd();
      return { operation: 'UNSUPPORTED', action: 'ALTER COLUMN', span: this.spanFrom(start) };
    }

    if (this.consumeWords('SET', 'SCHEMA')) {
      const schema = this.parseIdentifier('schema name');
      return { operation: 'SET SCHEMA', schema, span: this.spanFrom(start) };
    }

    const head = this.current();
    if (head.type === 'eof' || this.isPunct(';') || this.isPunct(',')) {
      throw this.unexpected('ALTER TABLE action');
    }

    const action = head.value.toUpperCase();
    // SET SCHEMA was handled above; any other SET only changes storage
    const ignored = IGNORED_ALTER_ACTIONS.has(action) || action === 'SET';
    this.skipToCommaOrEnd();

    return ignored
      ? { operation: 'IGNORED', action, span: this.spanFrom(start) }
      : { operation: 'UNSUPPORTED', action, span: this.spanFrom(start) };
  }

  /**
   * Parse ALTER TABLE statement (after ALTER)
   */
  private parseAlterTable(start: Token): AlterTableStatement {
    this.expectWord('TABLE');
    const ifExists = this.parseIfExists();
    this.consumeWord('ONLY');
    const table = this.parseQualifiedName('table name');

    const operations: AlterTableOperation[] = [];
    do {
      operations.push(this.parseAlterOperation());
    } while (this.consumePunct(','));

    return this.finishStatement({
      type: 'ALTER TABLE',
      table,
      ifExists,
      operations,
      span: start.span,
      text: '',
    }, start);
  }

  // ---------------------------------------------------------------------------
  // DROP
  // ---------------------------------------------------------------------------

  private parseDropTable(start: Token): DropTableStatement {
    this.expectWord('TABLE');
    const ifExists = this.parseIfExists();
    const tables = this.parseQualifiedNameList('table name');
    const cascade = this.parseDropBehavior();

    return this.finishStatement({
      type: 'DROP TABLE',
      tables,
      ifExists,
      cascade,
      span: start.span,
      text: '',
    }, start);
  }

  private parseDropIndex(start: Token): DropIndexStatement {
    this.expectWord('INDEX');
    this.consumeWord('CONCURRENTLY');
    const ifExists = this.parseIfExists();
    const indexes = this.parseQualifiedNameList('index name');

    let table: QualifiedName | undefined;
    if (this.consumeWord('ON')) {
      table = this.parseQualifiedName('table name');
    }
    const cascade = this.parseDropBehavior();

    return this.finishStatement({
      type: 'DROP INDEX',
      indexes,
      table,
      ifExists,
      cascade,
      span: start.span,
      text: '',
    }, start);
  }

  private parseDropSchema(start: Token): DropSchemaStatement {
    this.expectWord('SCHEMA');
    const ifExists = this.parseIfExists();
    const names = [this.parseIdentifier('schema name')];
    while (this.consumePunct(',')) {
      names.push(this.parseIdentifier('schema name'));
    }
    const cascade = this.parseDropBehavior();

    return this.finishStatement({
      type: 'DROP SCHEMA',
      names,
      ifExists,
      cascade,
      span: start.span,
      text: '',
    }, start);
  }

  private parseDropType(start: Token): DropTypeStatement {
    this.expectWord('TYPE');
    const ifExists = this.parseIfExists();
    const names = this.parseQualifiedNameList('type name');
    const cascade = this.parseDropBehavior();

    return this.finishStatement({
      type: 'DROP TYPE',
      names,
      ifExists,
      cascade,
      span: start.span,
      text: '',
    }, start);
  }

  // ---------------------------------------------------------------------------
  // CREATE SCHEMA / CREATE TYPE / COMMENT ON
  // ---------------------------------------------------------------------------

  private parseCreateSchema(start: Token): CreateSchemaStatement {
    this.expectWord('SCHEMA');
    const ifNotExists = this.parseIfNotExists();

    let name: string;
    let authorization: string | undefined;
    if (this.consumeWord('AUTHORIZATION')) {
      authorization = this.parseIdentifier('role name');
      name = authorization;
    } else {
      name = this.parseIdentifier('schema name');
      if (this.consumeWord('AUTHORIZATION')) {
        authorization = this.parseIdentifier('role name');
      }
    }

    return this.finishStatement({
      type: 'CREATE SCHEMA',
      name,
      ifNotExists,
      authorization,
      span: start.span,
      text: '',
    }, start);
  }

  /**
   * Whether CREATE TYPE at the cursor has an ENUM or composite body
   */
  private isSupportedCreateType(): boolean {
    let offset = 2;
    if (!this.isIdentifierToken(offset)) return false;
    if (this.isPunct('.', offset + 1)) offset += 2;
    offset++;
    return this.isWord('AS', offset) &&
      (this.isWord('ENUM', offset + 1) || this.isPunct('(', offset + 1));
  }

  private parseCreateType(start: Token): CreateTypeStatement {
    this.expectWord('TYPE');
    const name = this.parseQualifiedName('type name');
    this.expectWord('AS');

    if (this.consumeWord('ENUM')) {
      this.expectPunct('(');
      const values: string[] = [];
      if (!this.isPunct(')')) {
        do {
          values.push(this.parseStringLiteral('enum label'));
        } while (this.consumePunct(','));
      }
      this.expectPunct(')');
      return this.finishStatement({
        type: 'CREATE TYPE',
        name,
        definition: { kind: 'enum', values },
        span: start.span,
        text: '',
      }, start);
    }

    this.expectPunct('(');
    const attributes: TypeAttribute[] = [];
    if (!this.isPunct(')')) {
      do {
        const attrStart = this.current();
        const attrName = this.parseIdentifier('attribute name');
        const dataType = this.parseDataType();
        let collation: string | undefined;
        if (this.consumeWord('COLLATE')) {
          collation = this.parseIdentifier('collation');
        }
        attributes.push({ name: attrName, dataType, collation, span: this.spanFrom(attrStart) });
      } while (this.consumePunct(','));
    }
    this.expectPunct(')');

    return this.finishStatement({
      type: 'CREATE TYPE',
      name,
      definition: { kind: 'composite', attributes },
      span: start.span,
      text: '',
    }, start);
  }

  private parseComment(start: Token): CommentStatement {
    this.expectWord('ON');

    let target: CommentTarget;
    if (this.consumeWord('TABLE')) {
      target = { kind: 'TABLE', table: this.parseQualifiedName('table name') };
    } else if (this.consumeWord('SCHEMA')) {
      target = { kind: 'SCHEMA', name: this.parseIdentifier('schema name') };
    } else {
      this.expectWord('COLUMN');
      const pathStart = this.current();
      const parts = [this.parseIdentifier('table name')];
      while (this.consumePunct('.')) {
        parts.push(this.parseIdentifier('column name'));
      }
      if (parts.length < 2 || parts.length > 3) {
        throw new UnexpectedTokenError(
          this.textOf(this.spanFrom(pathStart)),
          'table.column or schema.table.column',
          this.spanFrom(pathStart),
          this.source
        );
      }
      const span = this.spanFrom(pathStart);
      const column = parts[parts.length - 1];
      const table: QualifiedName = parts.length === 3
        ? { schema: parts[0], name: parts[1], span }
        : { name: parts[0], span };
      target = { kind: 'COLUMN', table, column, span };
    }

    this.expectWord('IS');
    const comment = this.consumeWord('NULL') ? null : this.parseStringLiteral('comment text');

    return this.finishStatement({
      type: 'COMMENT ON',
      target,
      comment,
      span: start.span,
      text: '',
    }, start);
  }

  // ---------------------------------------------------------------------------
  // Unknown statements
  // ---------------------------------------------------------------------------

  /**
   * Leading keywords of a statement, e.g. `CREATE FUNCTION`
   */
  private describeStatement(): string {
    const first = this.current().value.toUpperCase();
    if (!['CREATE', 'DROP', 'ALTER', 'COMMENT'].includes(first)) return first;

    let offset = 1;
    while (['OR', 'REPLACE', 'ON'].includes(this.peek(offset).value.toUpperCase())) {
      offset++;
    }
    const next = this.peek(offset);
    return next.type === 'keyword' || next.type === 'identifier'
      ? `${first} ${next.value.toUpperCase()}`
      : first;
  }

  /**
   * Skip an unrecognized statement. Parentheses and BEGIN ... END bodies
   * nest, so a `;` inside a trigger or procedure body does not end it.
   */
  private parseUnknown(start: Token): UnknownStatement {
    const keyword = this.describeStatement();

    if (this.unknownStatements === 'reject') {
      throw new SQLSyntaxError(
        SyntaxErrorCode.UNKNOWN_STATEMENT,
        `Unrecognized statement '${keyword}'`,
        start.span,
        this.source,
        { expected: 'DDL statement' }
      );
    }

    let parens = 0;
    let blocks = 0;
    let first = true;

    while (this.current().type !== 'eof') {
      if (parens === 0 && blocks === 0 && this.isPunct(';')) break;

      if (this.isPunct('(')) parens++;
      else if (this.isPunct(')')) parens = Math.max(0, parens - 1);
      else if (!first && (this.isWord('BEGIN') || this.isWord('CASE'))) blocks++;
      else if (this.isWord('END') && blocks > 0) {
        // END IF / END LOOP / END WHILE close constructs that were not counted
        if (['IF', 'LOOP', 'WHILE', 'REPEAT', 'FOR'].some((word) => this.isWord(word, 1))) {
          this.advance();
        } else {
          blocks--;
          if (this.isWord('CASE', 1)) this.advance();
        }
      }

      this.advance();
      first = false;
    }

    return this.finishStatement({
      type: 'UNKNOWN',
      keyword,
      span: start.span,
      text: '',
    }, start);
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  /**
   * Fill in span and raw text once the statement's last token is consumed
   */
  private finishStatement<T extends DDLStatement>(statement: T, start: Token): T {
    statement.span = this.spanFrom(start);
    statement.text = this.textOf(statement.span);
    return statement;
  }

  /**
   * Parse any DDL statement at the cursor
   */
  parseStatement(): DDLStatement {
    const start = this.current();

    if (this.isWord('CREATE')) {
      let offset = 1;
      while (TEMPORARY_WORDS.has(this.peek(offset).value.toUpperCase())) offset++;

      if (this.isWord('TABLE', offset)) {
        this.advance();
        return this.parseCreateTable(start);
      }
      if (offset === 1 && (this.isWord('INDEX', 1) || (this.isWord('UNIQUE', 1) && this.isWord('INDEX', 2)))) {
        this.advance();
        return this.parseCreateIndex(start);
      }
      if (offset === 1 && this.isWord('SCHEMA', 1)) {
        this.advance();
        return this.parseCreateSchema(start);
      }
      if (offset === 1 && this.isWord('TYPE', 1) && this.isSupportedCreateType()) {
        this.advance();
        return this.parseCreateType(start);
      }
      return this.parseUnknown(start);
    }

    if (this.isWord('ALTER') && this.isWord('TABLE', 1)) {
      this.advance();
      return this.parseAlterTable(start);
    }

    if (this.isWord('DROP')) {
      if (this.isWord('TABLE', 1)) {
        this.advance();
        return this.parseDropTable(start);
      }
      if (this.isWord('INDEX', 1)) {
        this.advance();
        return this.parseDropIndex(start);
      }
      if (this.isWord('SCHEMA', 1)) {
        this.advance();
        return this.parseDropSchema(start);
      }
      if (this.isWord('TYPE', 1)) {
        this.advance();
        return this.parseDropType(start);
      }
      return this.parseUnknown(start);
    }

    if (
      this.isWord('COMMENT') && this.isWord('ON', 1) &&
      (this.isWord('TABLE', 2) || this.isWord('COLUMN', 2) || this.isWord('SCHEMA', 2))
    ) {
      this.advance();
      return this.parseComment(start);
    }

    return this.parseUnknown(start);
  }

  /**
   * Require the statement to end at the cursor
   */
  private expectStatementEnd(): void {
    if (!this.atStatementEnd()) {
      throw this.unexpected("';' or end of input");
    }
  }

  /**
   * Yield statements one at a time; `;` separators and empty statements
   * are skipped, and the final `;` is optional
   */
  *statements(): Generator<DDLStatement, void, undefined> {
    for (;;) {
      while (this.consumePunct(';')) {
        // empty statement
      }
      if (this.current().type === 'eof') return;

      const statement = this.parseStatement();
      this.expectStatementEnd();
      yield statement;
    }
  }

  /**
   * Parse exactly one statement
   */
  parseSingle(): DDLStatement {
    while (this.consumePunct(';')) {
      // leading separators
    }
    if (this.current().type === 'eof') throw this.unexpected('statement');

    const statement = this.parseStatement();
    this.expectStatementEnd();
    while (this.consumePunct(';')) {
      // trailing separators
    }
    if (this.current().type !== 'eof') throw this.unexpected('end of input');
    return statement;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Lazily parse a DDL script into statements
 *
 * Lexical and syntax errors are thrown from the generator when iteration
 * reaches the failing statement; every statement before it has already been
 * yielded.
 *
 * @example
 * ```typescript
 * for (const statement of parseStatements(sql, { dialect: 'postgresql' })) {
 *   console.log(statement.type, statement.text);
 * }
 * ```
 */
export function* parseStatements(
  sql: string,
  options: ParserOptions = {}
): Generator<DDLStatement, void, undefined> {
  yield* new Parser(sql, options).statements();
}

/**
 * Parse a single DDL statement
 *
 * @param sql - The DDL SQL string to parse
 * @returns ParseResult with the parsed statement or an error
 */
export function parseDDL(sql: string, options: ParserOptions = {}): ParseResult {
  try {
    const statement = new Parser(sql, options).parseSingle();
    return { success: true, statement };
  } catch (error) {
    return { success: false, error: createErrorFromException(error, sql) };
  }
}

/**
 * Parse every statement of a DDL script
 *
 * @returns the statements, or the first error together with the statements
 * parsed before it
 */
export function parseScript(sql: string, options: ParserOptions = {}): ScriptParseResult {
  const statements: DDLStatement[] = [];
  try {
    for (const statement of parseStatements(sql, options)) {
      statements.push(statement);
    }
    return { success: true, statements };
  } catch (error) {
    return { success: false, error: createErrorFromException(error, sql), statements };
  }
}

// Re-export types for convenience
export * from './ddl-types.js';
