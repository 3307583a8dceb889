/**
 * Catalog Builder Configuration
 *
 * Zod schema for builder options and their resolution against the
 * dialect's defaults.
 */

import { z } from 'zod';
import { getDialect, type Dialect, type IdentifierCase } from './dialects/index.js';
import { ConfigurationError } from './errors/config-errors.js';
import { createLogger, type StructuredLogger } from './logging/index.js';

// =============================================================================
// Schemas
// =============================================================================

/**
 * Dialect names; `postgres` is accepted for `postgresql`
 */
export const DialectSchema = z
  .enum(['generic', 'postgresql', 'postgres', 'mysql', 'sqlite'])
  .transform((dialect): Dialect => (dialect === 'postgres' ? 'postgresql' : dialect));

function isStructuredLogger(value: unknown): value is StructuredLogger {
  return typeof value === 'object' && value !== null &&
    'debug' in value && typeof value.debug === 'function' &&
    'info' in value && typeof value.info === 'function' &&
    'warn' in value && typeof value.warn === 'function' &&
    'child' in value && typeof value.child === 'function';
}

/**
 * Catalog builder options schema
 */
export const catalogOptionsSchema = z.object({
  /** SQL dialect of the input */
  dialect: DialectSchema.optional(),
  /** Folding of unquoted identifiers (default: the dialect's) */
  identifierCase: z.enum(['lower', 'upper', 'preserve']).optional(),
  /** Skip or reject statements the parser does not model */
  unknownStatements: z.enum(['skip', 'reject']).optional(),
  /** DROP of objects referenced by foreign keys needs CASCADE */
  requireCascade: z.boolean().optional(),
  /** Schema for unqualified names (default: the dialect's) */
  defaultSchema: z.string().optional(),
  /** Create schemas on first reference */
  implicitSchemas: z.boolean().optional(),
  /** Report unique indexes as unique constraints as well */
  surfaceUniqueIndexes: z.boolean().optional(),
  /** Validate ALTER TABLE constraints after the whole statement or after each action */
  constraintTiming: z.enum(['statement', 'operation']).optional(),
  /** Check foreign key targets when declared, or only in validate() */
  foreignKeyChecks: z.enum(['immediate', 'deferred']).optional(),
  /** Catalog name reported in snapshots */
  catalogName: z.string().min(1).optional(),
  /** Logger for statement-level events */
  logger: z.custom<StructuredLogger>(isStructuredLogger, { message: 'Expected a structured logger' }).optional(),
}).strict();

/**
 * Options accepted by the catalog builder
 */
export type CatalogOptions = z.input<typeof catalogOptionsSchema>;

/**
 * Options with every default applied
 */
export interface ResolvedCatalogOptions {
  dialect: Dialect;
  identifierCase: IdentifierCase;
  unknownStatements: 'skip' | 'reject';
  requireCascade: boolean;
  defaultSchema: string;
  implicitSchemas: boolean;
  surfaceUniqueIndexes: boolean;
  constraintTiming: 'statement' | 'operation';
  foreignKeyChecks: 'immediate' | 'deferred';
  catalogName: string;
  logger: StructuredLogger;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validate options and fill in defaults
 *
 * @throws ConfigurationError if the options do not match the schema
 */
export function resolveOptions(options: unknown = {}): ResolvedCatalogOptions {
  const result = catalogOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid catalog options: ${result.error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
        .join(', ')}`,
      result.error
    );
  }

  const parsed = result.data;
  const dialect = parsed.dialect ?? 'generic';
  const rules = getDialect(dialect);

  return {
    dialect,
    identifierCase: parsed.identifierCase ?? rules.identifierCase,
    unknownStatements: parsed.unknownStatements ?? 'skip',
    requireCascade: parsed.requireCascade ?? true,
    defaultSchema: parsed.defaultSchema ?? rules.defaultSchema,
    implicitSchemas: parsed.implicitSchemas ?? true,
    surfaceUniqueIndexes: parsed.surfaceUniqueIndexes ?? true,
    constraintTiming: parsed.constraintTiming ?? 'statement',
    foreignKeyChecks: parsed.foreignKeyChecks ?? 'immediate',
    catalogName: parsed.catalogName ?? 'catalog',
    logger: parsed.logger ?? createLogger({ fields: { component: 'ddl-catalog' } }),
  };
}
