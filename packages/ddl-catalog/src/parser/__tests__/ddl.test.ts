/**
 * DDL Parser Tests
 *
 * Statement shapes for every supported statement kind, dialect handling,
 * skipping of unrecognized statements and syntax error reporting.
 */

import { describe, it, expect } from 'vitest';
import { parseDDL, parseScript, parseStatements, type ParserOptions } from '../ddl.js';
import type { DDLStatement } from '../ddl-types.js';
import { isParseError, isUnknownStatement } from '../ddl-types.js';
import { UnexpectedTokenError } from '../../errors/syntax-errors.js';
import { SyntaxErrorCode } from '../../errors/codes.js';

type StatementOf<K extends DDLStatement['type']> = Extract<DDLStatement, { type: K }>;

function isStatementType<K extends DDLStatement['type']>(
  statement: DDLStatement,
  type: K
): statement is StatementOf<K> {
  return statement.type === type;
}

function parseAs<K extends DDLStatement['type']>(
  type: K,
  sql: string,
  options?: ParserOptions
): StatementOf<K> {
  const result = parseDDL(sql, options);
  if (!result.success) throw result.error;
  if (!isStatementType(result.statement, type)) {
    throw new Error(`expected ${type}, got ${result.statement.type}`);
  }
  return result.statement;
}

// =============================================================================
// CREATE TABLE
// =============================================================================

describe('CREATE TABLE', () => {
  it('should parse columns with inline constraints', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE users (id INTEGER PRIMARY KEY, email VARCHAR(255) NOT NULL UNIQUE, age INT CHECK (age >= 0) DEFAULT 18)'
    );

    expect(stmt.table.name).toBe('users');
    expect(stmt.table.schema).toBeUndefined();
    expect(stmt.columns.map((c) => c.name)).toEqual(['id', 'email', 'age']);

    expect(stmt.columns[0].constraints[0]).toMatchObject({ type: 'PRIMARY KEY', autoincrement: false });
    expect(stmt.columns[1].dataType).toMatchObject({ name: 'VARCHAR', parameters: [255] });
    expect(stmt.columns[1].constraints.map((c) => c.type)).toEqual(['NOT NULL', 'UNIQUE']);
    expect(stmt.columns[2].constraints).toMatchObject([
      { type: 'CHECK', expression: 'age >= 0' },
      { type: 'DEFAULT', expression: '18' },
    ]);
  });

  it('should parse named column constraints', () => {
    const stmt = parseAs('CREATE TABLE', 'CREATE TABLE t (email TEXT CONSTRAINT uq_email UNIQUE)');

    expect(stmt.columns[0].constraints[0]).toMatchObject({ type: 'UNIQUE', name: 'uq_email' });
  });

  it('should stop a DEFAULT expression at the next constraint keyword', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      "CREATE TABLE t (status TEXT DEFAULT 'active' NOT NULL, created_at TIMESTAMP DEFAULT now())"
    );

    expect(stmt.columns[0].constraints).toMatchObject([
      { type: 'DEFAULT', expression: "'active'" },
      { type: 'NOT NULL' },
    ]);
    expect(stmt.columns[1].constraints[0]).toMatchObject({ type: 'DEFAULT', expression: 'now()' });
  });

  it('should parse inline REFERENCES with actions', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE posts (user_id INT REFERENCES users (id) ON DELETE CASCADE)'
    );

    expect(stmt.columns[0].constraints[0]).toMatchObject({
      type: 'REFERENCES',
      table: { name: 'users' },
      columns: [{ name: 'id' }],
      onDelete: 'CASCADE',
    });
  });

  it('should parse table-level constraints', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE posts (id INT, user_id INT, ' +
        'CONSTRAINT fk_author FOREIGN KEY (user_id) REFERENCES users (id) ' +
        'ON DELETE CASCADE ON UPDATE SET NULL DEFERRABLE INITIALLY DEFERRED, ' +
        'PRIMARY KEY (id))'
    );

    expect(stmt.constraints).toHaveLength(2);
    expect(stmt.constraints[0]).toMatchObject({
      type: 'FOREIGN KEY',
      name: 'fk_author',
      columns: [{ name: 'user_id' }],
      references: {
        table: { name: 'users' },
        columns: [{ name: 'id' }],
        onDelete: 'CASCADE',
        onUpdate: 'SET NULL',
        deferrable: 'DEFERRABLE INITIALLY DEFERRED',
      },
    });
    expect(stmt.constraints[1]).toMatchObject({ type: 'PRIMARY KEY', columns: [{ name: 'id' }] });
  });

  it('should parse generated columns', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE items (price INT, qty INT, total INT GENERATED ALWAYS AS (price * qty) STORED)'
    );

    expect(stmt.columns[2].constraints[0]).toEqual(expect.objectContaining({
      type: 'GENERATED',
      expression: 'price * qty',
      storage: 'STORED',
      identity: false,
    }));
  });

  it('should parse schema-qualified names, IF NOT EXISTS and TEMP', () => {
    const stmt = parseAs('CREATE TABLE', 'CREATE TEMP TABLE IF NOT EXISTS app.jobs (id INT)');

    expect(stmt.table).toMatchObject({ schema: 'app', name: 'jobs' });
    expect(stmt.ifNotExists).toBe(true);
    expect(stmt.temporary).toBe(true);
  });

  it('should record CREATE TABLE AS SELECT as unsupported', () => {
    const stmt = parseAs('CREATE TABLE', 'CREATE TABLE t2 AS SELECT * FROM t1');

    expect(stmt.unsupported?.construct).toBe('AS SELECT');
    expect(stmt.columns).toEqual([]);
  });

  it('should keep the statement text without the separator', () => {
    const result = parseScript('CREATE TABLE a (x INT);');

    expect(result.success).toBe(true);
    expect(result.statements[0].text).toBe('CREATE TABLE a (x INT)');
  });
});

// =============================================================================
// Dialects
// =============================================================================

describe('dialect handling', () => {
  it('should fold unquoted identifiers to lower case in postgresql', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE "Users" (Id INT, "Email" TEXT)',
      { dialect: 'postgresql' }
    );

    expect(stmt.table.name).toBe('Users');
    expect(stmt.columns.map((c) => c.name)).toEqual(['id', 'Email']);
    expect(stmt.columns[0].dataType?.name).toBe('int');
  });

  it('should apply an explicit identifier case', () => {
    const stmt = parseAs('CREATE TABLE', 'create table t (a int)', { identifierCase: 'upper' });

    expect(stmt.table.name).toBe('T');
    expect(stmt.columns[0].name).toBe('A');
    expect(stmt.columns[0].dataType?.name).toBe('INT');
  });

  it('should parse multi-word, parameterized and array types', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE t (a DOUBLE PRECISION, b TIMESTAMP WITH TIME ZONE, ' +
        'c CHARACTER VARYING(20), d INT[], e NUMERIC(10,2))',
      { dialect: 'postgresql' }
    );

    expect(stmt.columns.map((c) => c.dataType?.name)).toEqual([
      'DOUBLE PRECISION',
      'TIMESTAMP WITH TIME ZONE',
      'CHARACTER VARYING',
      'int',
      'numeric',
    ]);
    expect(stmt.columns[2].dataType?.parameters).toEqual([20]);
    expect(stmt.columns[3].dataType?.arrayDimensions).toBe(1);
    expect(stmt.columns[4].dataType?.parameters).toEqual([10, 2]);
  });

  it('should parse mysql column modifiers, inline keys and table options', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      "CREATE TABLE t (id INT UNSIGNED AUTO_INCREMENT PRIMARY KEY, status ENUM('a','b') NOT NULL, " +
        "UNIQUE KEY uk_status (status)) ENGINE=InnoDB COMMENT='demo'",
      { dialect: 'mysql' }
    );

    expect(stmt.columns[0].dataType?.unsigned).toBe(true);
    expect(stmt.columns[0].constraints.map((c) => c.type)).toEqual(['AUTO_INCREMENT', 'PRIMARY KEY']);
    expect(stmt.columns[1].dataType).toMatchObject({ name: 'ENUM', values: ['a', 'b'] });
    expect(stmt.constraints[0]).toMatchObject({ type: 'UNIQUE', name: 'uk_status', columns: [{ name: 'status' }] });
    expect(stmt.comment).toBe('demo');
  });

  it('should parse mysql index entries in the column list', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE t (id INT NOT NULL, name VARCHAR(10), body TEXT, PRIMARY KEY (id), ' +
        "KEY idx_name (name(4)) COMMENT 'lookup', INDEX (name, id), FULLTEXT KEY ft_body (body)) ENGINE=InnoDB",
      { dialect: 'mysql' }
    );

    expect(stmt.columns.map((c) => c.name)).toEqual(['id', 'name', 'body']);
    expect(stmt.constraints).toHaveLength(1);
    expect(stmt.indexes).toMatchObject([
      { name: 'idx_name', columns: [{ name: 'name' }] },
      { name: undefined, columns: [{ name: 'name' }, { name: 'id' }] },
      { name: 'ft_body', method: 'FULLTEXT', columns: [{ name: 'body' }] },
    ]);
    expect(stmt.indexes[0].method).toBeUndefined();
  });

  it('should accept index methods around mysql key lists', () => {
    const stmt = parseAs(
      'CREATE TABLE',
      'CREATE TABLE t (id INT NOT NULL, code INT, PRIMARY KEY (id) USING BTREE, ' +
        'UNIQUE KEY uq_code USING HASH (code), KEY idx_code USING BTREE (code))',
      { dialect: 'mysql' }
    );

    expect(stmt.constraints).toMatchObject([
      { type: 'PRIMARY KEY', columns: [{ name: 'id' }] },
      { type: 'UNIQUE', name: 'uq_code', columns: [{ name: 'code' }] },
    ]);
    expect(stmt.indexes).toMatchObject([{ name: 'idx_code', method: 'BTREE' }]);
  });

  it('should keep a mysql column named like an index kind', () => {
    const stmt = parseAs('CREATE TABLE', 'CREATE TABLE t (spatial INT, fulltext TEXT)', { dialect: 'mysql' });

    expect(stmt.columns.map((c) => c.name)).toEqual(['spatial', 'fulltext']);
    expect(stmt.indexes).toEqual([]);
  });

  it('should accept typeless columns in sqlite', () => {
    const stmt = parseAs('CREATE TABLE', 'CREATE TABLE t (a, b PRIMARY KEY)', { dialect: 'sqlite' });

    expect(stmt.columns[0].dataType).toBeUndefined();
    expect(stmt.columns[1].dataType).toBeUndefined();
    expect(stmt.columns[1].constraints[0].type).toBe('PRIMARY KEY');
  });
});

// =============================================================================
// CREATE INDEX / DROP INDEX
// =============================================================================

describe('indexes', () => {
  it('should parse unique, partial and expression indexes', () => {
    const stmt = parseAs(
      'CREATE INDEX',
      'CREATE UNIQUE INDEX IF NOT EXISTS idx_email ON users USING btree ' +
        '(lower(email), created_at DESC) WHERE deleted_at IS NULL',
      { dialect: 'postgresql' }
    );

    expect(stmt).toMatchObject({
      name: 'idx_email',
      unique: true,
      ifNotExists: true,
      method: 'btree',
      table: { name: 'users' },
      where: 'deleted_at IS NULL',
    });
    expect(stmt.columns[0].expression).toBe('lower(email)');
    expect(stmt.columns[0].name).toBeUndefined();
    expect(stmt.columns[1]).toMatchObject({ name: 'created_at', order: 'DESC' });
  });

  it('should parse unnamed indexes', () => {
    const stmt = parseAs('CREATE INDEX', 'CREATE INDEX ON users (email)');

    expect(stmt.name).toBeUndefined();
    expect(stmt.unique).toBe(false);
  });

  it('should parse DROP INDEX with a table', () => {
    const stmt = parseAs('DROP INDEX', 'DROP INDEX IF EXISTS idx_a, idx_b ON users CASCADE');

    expect(stmt.indexes.map((i) => i.name)).toEqual(['idx_a', 'idx_b']);
    expect(stmt.table?.name).toBe('users');
    expect(stmt.ifExists).toBe(true);
    expect(stmt.cascade).toBe(true);
  });
});

// =============================================================================
// ALTER TABLE
// =============================================================================

describe('ALTER TABLE', () => {
  it('should parse several comma-separated actions', () => {
    const stmt = parseAs(
      'ALTER TABLE',
      'ALTER TABLE users ADD COLUMN bio TEXT, DROP COLUMN IF EXISTS age CASCADE, ' +
        "RENAME COLUMN email TO email_address, ALTER COLUMN bio SET DEFAULT 'none', OWNER TO admin",
      { dialect: 'postgresql' }
    );

    expect(stmt.operations.map((op) => op.operation)).toEqual([
      'ADD COLUMN',
      'DROP COLUMN',
      'RENAME COLUMN',
      'ALTER COLUMN',
      'IGNORED',
    ]);
    expect(stmt.operations[1]).toMatchObject({ column: 'age', ifExists: true, cascade: true });
    expect(stmt.operations[2]).toMatchObject({ oldName: 'email', newName: 'email_address' });
    expect(stmt.operations[3]).toMatchObject({
      column: 'bio',
      action: { type: 'SET DEFAULT', expression: "'none'" },
    });
    expect(stmt.operations[4]).toMatchObject({ action: 'OWNER' });
  });

  it('should parse constraint actions', () => {
    const stmt = parseAs(
      'ALTER TABLE',
      'ALTER TABLE posts ADD CONSTRAINT fk_user FOREIGN KEY (user_id) REFERENCES users, ' +
        'DROP CONSTRAINT IF EXISTS ck_old, RENAME CONSTRAINT a TO b, DROP PRIMARY KEY'
    );

    expect(stmt.operations.map((op) => op.operation)).toEqual([
      'ADD CONSTRAINT',
      'DROP CONSTRAINT',
      'RENAME CONSTRAINT',
      'DROP PRIMARY KEY',
    ]);
    expect(stmt.operations[0]).toMatchObject({
      constraint: { type: 'FOREIGN KEY', name: 'fk_user', references: { table: { name: 'users' } } },
    });
    expect(stmt.operations[1]).toMatchObject({ name: 'ck_old', ifExists: true, cascade: false });
  });

  it('should parse RENAME TO, SET SCHEMA and column type changes', () => {
    const stmt = parseAs(
      'ALTER TABLE',
      'ALTER TABLE IF EXISTS t RENAME TO u, SET SCHEMA archive, ALTER COLUMN a TYPE BIGINT, ' +
        'ALTER a DROP NOT NULL'
    );

    expect(stmt.ifExists).toBe(true);
    expect(stmt.operations).toMatchObject([
      { operation: 'RENAME TO', newName: 'u' },
      { operation: 'SET SCHEMA', schema: 'archive' },
      { operation: 'ALTER COLUMN', column: 'a', action: { type: 'SET DATA TYPE', dataType: { name: 'BIGINT' } } },
      { operation: 'ALTER COLUMN', column: 'a', action: { type: 'DROP NOT NULL' } },
    ]);
  });

  it('should mark unmodelled actions as unsupported', () => {
    const stmt = parseAs('ALTER TABLE', 'ALTER TABLE t MODIFY a INT, RENAME INDEX i TO j', { dialect: 'mysql' });

    expect(stmt.operations).toMatchObject([
      { operation: 'UNSUPPORTED', action: 'MODIFY' },
      { operation: 'UNSUPPORTED', action: 'RENAME INDEX' },
    ]);
  });

  it('should parse mysql ADD INDEX and DROP KEY', () => {
    const stmt = parseAs(
      'ALTER TABLE',
      'ALTER TABLE t ADD INDEX idx_a (a) USING HASH, ADD FULLTEXT KEY ft (body), DROP KEY old_idx',
      { dialect: 'mysql' }
    );

    expect(stmt.operations).toMatchObject([
      { operation: 'ADD INDEX', index: { name: 'idx_a', method: 'HASH', columns: [{ name: 'a' }] } },
      { operation: 'ADD INDEX', index: { name: 'ft', method: 'FULLTEXT', columns: [{ name: 'body' }] } },
      { operation: 'DROP INDEX', name: 'old_idx' },
    ]);
  });

  it('should leave ADD INDEX unsupported outside mysql', () => {
    const stmt = parseAs('ALTER TABLE', 'ALTER TABLE t ADD INDEX idx (a)');

    expect(stmt.operations).toMatchObject([{ operation: 'UNSUPPORTED', action: 'ADD INDEX' }]);
  });
});

// =============================================================================
// Schemas, types, comments, DROP TABLE
// =============================================================================

describe('other statements', () => {
  it('should parse CREATE SCHEMA with AUTHORIZATION', () => {
    const stmt = parseAs('CREATE SCHEMA', 'CREATE SCHEMA IF NOT EXISTS app AUTHORIZATION admin');

    expect(stmt).toMatchObject({ name: 'app', ifNotExists: true, authorization: 'admin' });
  });

  it('should parse enum types', () => {
    const stmt = parseAs('CREATE TYPE', "CREATE TYPE mood AS ENUM ('sad', 'happy')");

    expect(stmt.name.name).toBe('mood');
    expect(stmt.definition).toEqual({ kind: 'enum', values: ['sad', 'happy'] });
  });

  it('should parse composite types', () => {
    const stmt = parseAs('CREATE TYPE', 'CREATE TYPE app.address AS (street TEXT, zip VARCHAR(10))');

    expect(stmt.name).toMatchObject({ schema: 'app', name: 'address' });
    expect(stmt.definition.kind).toBe('composite');
    if (stmt.definition.kind !== 'composite') return;
    expect(stmt.definition.attributes.map((a) => a.name)).toEqual(['street', 'zip']);
    expect(stmt.definition.attributes[1].dataType.parameters).toEqual([10]);
  });

  it('should treat other CREATE TYPE forms as unknown', () => {
    const stmt = parseAs('UNKNOWN', 'CREATE TYPE range_t AS RANGE (subtype = int4)');

    expect(stmt.keyword).toBe('CREATE TYPE');
  });

  it('should parse COMMENT ON COLUMN and COMMENT ON TABLE ... IS NULL', () => {
    const column = parseAs('COMMENT ON', "COMMENT ON COLUMN users.email IS 'Login address'");
    const table = parseAs('COMMENT ON', 'COMMENT ON TABLE users IS NULL');

    expect(column.target).toMatchObject({ kind: 'COLUMN', table: { name: 'users' }, column: 'email' });
    expect(column.comment).toBe('Login address');
    expect(table.target).toMatchObject({ kind: 'TABLE', table: { name: 'users' } });
    expect(table.comment).toBeNull();
  });

  it('should parse DROP TABLE lists with CASCADE', () => {
    const result = parseScript('CREATE SCHEMA app;\nDROP TABLE IF EXISTS a, b CASCADE;');

    expect(result.success).toBe(true);
    const [schema, drop] = result.statements;
    expect(schema.text).toBe('CREATE SCHEMA app');
    expect(drop.span.start).toEqual({ line: 2, column: 1, offset: 19 });
    if (!isStatementType(drop, 'DROP TABLE')) throw new Error('expected DROP TABLE');
    expect(drop.tables.map((t) => t.name)).toEqual(['a', 'b']);
    expect(drop.ifExists).toBe(true);
    expect(drop.cascade).toBe(true);
  });

  it('should parse DROP SCHEMA and DROP TYPE', () => {
    const schema = parseAs('DROP SCHEMA', 'DROP SCHEMA IF EXISTS a, b RESTRICT');
    const type = parseAs('DROP TYPE', 'DROP TYPE mood CASCADE');

    expect(schema).toMatchObject({ names: ['a', 'b'], ifExists: true, cascade: false });
    expect(type.names[0].name).toBe('mood');
    expect(type.cascade).toBe(true);
  });
});

// =============================================================================
// Unrecognized statements
// =============================================================================

describe('unrecognized statements', () => {
  it('should skip a trigger body with semicolons inside BEGIN ... END', () => {
    const result = parseScript(
      'CREATE TRIGGER trg AFTER INSERT ON t BEGIN UPDATE t SET a = 1; DELETE FROM u; END; ' +
        'CREATE TABLE x (a INT)'
    );

    expect(result.success).toBe(true);
    expect(result.statements.map((s) => s.type)).toEqual(['UNKNOWN', 'CREATE TABLE']);
    const [trigger] = result.statements;
    if (!isUnknownStatement(trigger)) throw new Error('expected UNKNOWN');
    expect(trigger.keyword).toBe('CREATE TRIGGER');
    expect(trigger.text).toBe('CREATE TRIGGER trg AFTER INSERT ON t BEGIN UPDATE t SET a = 1; DELETE FROM u; END');
  });

  it('should skip dollar-quoted function bodies', () => {
    const result = parseScript(
      'CREATE OR REPLACE FUNCTION f() RETURNS trigger AS $$ BEGIN RETURN NEW; END; $$ LANGUAGE plpgsql; ' +
        'CREATE SCHEMA s',
      { dialect: 'postgresql' }
    );

    expect(result.success).toBe(true);
    expect(result.statements.map((s) => s.type)).toEqual(['UNKNOWN', 'CREATE SCHEMA']);
    const [fn] = result.statements;
    if (!isUnknownStatement(fn)) throw new Error('expected UNKNOWN');
    expect(fn.keyword).toBe('CREATE FUNCTION');
  });

  it('should reject unrecognized statements when asked', () => {
    const result = parseScript('CREATE VIEW v AS SELECT 1', { unknownStatements: 'reject' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(SyntaxErrorCode.UNKNOWN_STATEMENT);
    expect(result.error.message).toBe("Unrecognized statement 'CREATE VIEW' at line 1, column 1");
    expect(result.statements).toEqual([]);
  });

  it('should ignore empty statements', () => {
    const result = parseScript(';;  ;');

    expect(result).toEqual({ success: true, statements: [] });
  });
});

// =============================================================================
// Errors
// =============================================================================

describe('syntax errors', () => {
  it('should report the unexpected token and what was expected', () => {
    const result = parseDDL('CREATE TABLE (id INT)');

    expect(isParseError(result)).toBe(true);
    if (!isParseError(result)) return;
    expect(result.error).toBeInstanceOf(UnexpectedTokenError);
    expect(result.error.code).toBe(SyntaxErrorCode.UNEXPECTED_TOKEN);
    expect(result.error.message).toBe("Unexpected token '(', expected table name at line 1, column 14");
    expect(result.error.span?.start).toEqual({ line: 1, column: 14, offset: 13 });
  });

  it('should report unexpected end of input', () => {
    const result = parseDDL('CREATE TABLE users (id INT');

    expect(isParseError(result)).toBe(true);
    if (!isParseError(result)) return;
    expect(result.error.code).toBe(SyntaxErrorCode.UNEXPECTED_EOF);
    expect(result.error.message).toBe("Unexpected end of input, expected ')' at line 1, column 27");
  });

  it('should reject a second statement in parseDDL', () => {
    const result = parseDDL('CREATE SCHEMA a; CREATE SCHEMA b');

    expect(isParseError(result)).toBe(true);
    if (!isParseError(result)) return;
    expect(result.error.message).toBe("Unexpected token 'CREATE', expected end of input at line 1, column 18");
  });

  it('should surface lexical errors as parse errors', () => {
    const result = parseDDL("CREATE TABLE t (a TEXT DEFAULT 'x)");

    expect(isParseError(result)).toBe(true);
    if (!isParseError(result)) return;
    expect(result.error.code).toBe('LEX_UNTERMINATED_STRING');
  });

  it('should yield statements before the failing one', () => {
    const iterator = parseStatements('CREATE TABLE a (x INT); CREATE TABLE (');

    expect(iterator.next().value).toMatchObject({ type: 'CREATE TABLE', table: { name: 'a' } });
    expect(() => iterator.next()).toThrow(UnexpectedTokenError);
  });

  it('should return the statements parsed before an error', () => {
    const result = parseScript('CREATE SCHEMA a; CREATE TABLE b (');

    expect(result.success).toBe(false);
    expect(result.statements.map((s) => s.type)).toEqual(['CREATE SCHEMA']);
  });
});
