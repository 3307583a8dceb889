/**
 * SQL Dialects
 *
 * Per-dialect lexical rules, naming conventions and built-in type names.
 * The `generic` dialect accepts the union of every dialect's built-in types
 * and both bracket and backtick identifier quoting.
 *
 * @packageDocumentation
 */

import builtinTypes from './builtin-types.json' with { type: 'json' };

// =============================================================================
// TYPES
// =============================================================================

/**
 * Supported SQL dialects
 */
export type Dialect = 'generic' | 'postgresql' | 'mysql' | 'sqlite';

/**
 * All dialect names, in declaration order
 */
export const DIALECTS = ['generic', 'postgresql', 'mysql', 'sqlite'] as const satisfies readonly Dialect[];

/**
 * Case-folding policy for unquoted identifiers
 */
export type IdentifierCase = 'lower' | 'upper' | 'preserve';

/**
 * Lexical and catalog conventions of one dialect
 */
export interface DialectRules {
  readonly name: Dialect;
  /** `"..."` is a string literal rather than a quoted identifier */
  readonly doubleQuotedStrings: boolean;
  readonly backtickIdentifiers: boolean;
  readonly bracketIdentifiers: boolean;
  /** `$tag$ ... $tag$` string bodies */
  readonly dollarQuotedStrings: boolean;
  /** Backslash escapes inside single-quoted strings */
  readonly backslashEscapes: boolean;
  /** `#` starts a line comment */
  readonly hashComments: boolean;
  /** Block comments may nest */
  readonly nestedComments: boolean;
  /** Default folding of unquoted identifiers */
  readonly identifierCase: IdentifierCase;
  /** Catalog lookups ignore case; stored names keep their declared spelling */
  readonly caseInsensitiveNames: boolean;
  /** Schema that unqualified names resolve to */
  readonly defaultSchema: string;
  /**
   * Implicit constraint naming: `suffix` gives `users_pkey`,
   * `prefix` gives `pk_users_id`
   */
  readonly constraintNaming: 'suffix' | 'prefix';
  /** Index names are unique per schema or per table */
  readonly indexScope: 'schema' | 'table';
  /** Columns may be declared without a type */
  readonly typelessColumns: boolean;
  /** Upper-case built-in type names, multi-word names joined by one space */
  readonly builtinTypes: ReadonlySet<string>;
  /** Built-in types that imply an auto-increment column */
  readonly autoIncrementTypes: ReadonlySet<string>;
  /**
   * Word tails of multi-word type names keyed by their first word,
   * longest tail first (`DOUBLE` → `[['PRECISION']]`)
   */
  readonly multiWordTypes: ReadonlyMap<string, readonly (readonly string[])[]>;
}

// =============================================================================
// BUILT-IN TYPES
// =============================================================================

function indexMultiWordTypes(types: Iterable<string>): Map<string, string[][]> {
  const index = new Map<string, string[][]>();
  for (const type of types) {
    const [head, ...tail] = type.split(' ');
    if (tail.length === 0) continue;
    const tails = index.get(head) ?? [];
    tails.push(tail);
    index.set(head, tails);
  }
  for (const tails of index.values()) {
    tails.sort((a, b) => b.length - a.length);
  }
  return index;
}

const genericTypes = new Set([
  ...builtinTypes.postgresql.types,
  ...builtinTypes.mysql.types,
  ...builtinTypes.sqlite.types,
]);

const genericAutoIncrementTypes = new Set<string>([
  ...builtinTypes.postgresql.autoIncrementTypes,
  ...builtinTypes.mysql.autoIncrementTypes,
]);

function typeRules(types: readonly string[], autoIncrementTypes: readonly string[]): Pick<
  DialectRules,
  'builtinTypes' | 'autoIncrementTypes' | 'multiWordTypes'
> {
  return {
    builtinTypes: new Set(types),
    autoIncrementTypes: new Set(autoIncrementTypes),
    multiWordTypes: indexMultiWordTypes(types),
  };
}

// =============================================================================
// DIALECT TABLE
// =============================================================================

const DIALECT_RULES: Record<Dialect, DialectRules> = {
  generic: {
    name: 'generic',
    doubleQuotedStrings: false,
    backtickIdentifiers: true,
    bracketIdentifiers: true,
    dollarQuotedStrings: false,
    backslashEscapes: false,
    hashComments: false,
    nestedComments: false,
    identifierCase: 'preserve',
    caseInsensitiveNames: false,
    defaultSchema: '',
    constraintNaming: 'prefix',
    indexScope: 'schema',
    typelessColumns: false,
    ...typeRules([...genericTypes], [...genericAutoIncrementTypes]),
  },
  postgresql: {
    name: 'postgresql',
    doubleQuotedStrings: false,
    backtickIdentifiers: false,
    bracketIdentifiers: false,
    dollarQuotedStrings: true,
    backslashEscapes: false,
    hashComments: false,
    nestedComments: true,
    identifierCase: 'lower',
    caseInsensitiveNames: false,
    defaultSchema: 'public',
    constraintNaming: 'suffix',
    indexScope: 'schema',
    typelessColumns: false,
    ...typeRules(builtinTypes.postgresql.types, builtinTypes.postgresql.autoIncrementTypes),
  },
  mysql: {
    name: 'mysql',
    doubleQuotedStrings: true,
    backtickIdentifiers: true,
    bracketIdentifiers: false,
    dollarQuotedStrings: false,
    backslashEscapes: true,
    hashComments: true,
    nestedComments: false,
    identifierCase: 'preserve',
    caseInsensitiveNames: true,
    defaultSchema: '',
    constraintNaming: 'prefix',
    indexScope: 'table',
    typelessColumns: false,
    ...typeRules(builtinTypes.mysql.types, builtinTypes.mysql.autoIncrementTypes),
  },
  sqlite: {
    name: 'sqlite',
    doubleQuotedStrings: false,
    backtickIdentifiers: true,
    bracketIdentifiers: true,
    dollarQuotedStrings: false,
    backslashEscapes: false,
    hashComments: false,
    nestedComments: false,
    identifierCase: 'preserve',
    caseInsensitiveNames: true,
    defaultSchema: 'main',
    constraintNaming: 'prefix',
    indexScope: 'schema',
    typelessColumns: true,
    ...typeRules(builtinTypes.sqlite.types, builtinTypes.sqlite.autoIncrementTypes),
  },
};

/**
 * Look up the rules of a dialect
 */
export function getDialect(dialect: Dialect): DialectRules {
  return DIALECT_RULES[dialect];
}

/**
 * Check whether an upper-case type name is built into the dialect
 */
export function isBuiltinType(rules: DialectRules, name: string): boolean {
  return rules.builtinTypes.has(name.toUpperCase());
}
