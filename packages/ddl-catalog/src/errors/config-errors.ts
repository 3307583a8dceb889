/**
 * Configuration Error
 *
 * @packageDocumentation
 */

import type { ZodError } from 'zod';
import { CatalogError, ErrorCategory } from './base.js';
import { ConfigErrorCode } from './codes.js';

/**
 * Builder options failed validation
 */
export class ConfigurationError extends CatalogError {
  readonly code = ConfigErrorCode.INVALID_OPTIONS;
  readonly category = ErrorCategory.CONFIGURATION;

  public readonly zodError: ZodError | null;

  constructor(message: string, zodError?: ZodError | null) {
    super(message);
    this.name = 'ConfigurationError';
    this.zodError = zodError ?? null;
    this.recoveryHint = 'Check the option names and values passed to the builder';
  }

  /**
   * Get a human-readable description of validation errors
   */
  getErrorDetails(): string {
    if (!this.zodError) {
      return this.message;
    }
    return this.zodError.issues
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
  }
}
