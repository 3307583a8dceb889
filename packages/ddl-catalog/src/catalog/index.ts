/**
 * Catalog Module
 *
 * In-memory catalog, its builder and snapshot types.
 */

export * from './types.js';

export {
  Catalog,
  Schema,
  Table,
  Index,
  qualifyName,
  foreignKeyReferences,
  type ForeignKeyReference,
} from './catalog.js';

export {
  CatalogBuilder,
  type ApplyResult,
  type ValidationResult,
} from './builder.js';

export {
  createSavepoint,
  rollbackToSavepoint,
  executeWithSavepoint,
  Savepoint,
} from './savepoint.js';

export {
  resolveTypeReference,
  assertConstraintColumns,
  isKeyedBy,
  validateForeignKey,
  validateForeignKeys,
} from './validator.js';
