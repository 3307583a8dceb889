/**
 * Constraints Module
 *
 * Normalized constraint model and extraction from column and table syntax.
 */

// Types
export * from './types.js';

// Extractor
export {
  extractColumns,
  extractTable,
  extractTableConstraint,
  toTypeReference,
  type ExtractionContext,
  type ExtractedColumns,
} from './extractor.js';
