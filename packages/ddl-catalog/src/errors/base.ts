/**
 * Catalog Error Hierarchy
 *
 * All errors raised while lexing, parsing or applying DDL extend CatalogError,
 * which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation (statement text, schema, table, column)
 * - Source spans for precise diagnostics
 * - Serialization for the generation host
 * - Structured logging support
 *
 * @packageDocumentation
 */

import type { SourceLocation, SourceSpan } from '../parser/shared/types.js';

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Text of the statement that caused the error */
  statement?: string;
  /** Schema involved */
  schema?: string;
  /** Table name involved */
  table?: string;
  /** Column name involved */
  column?: string;
  /** Constraint or index name involved */
  constraint?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format handed to the generation host
 */
export interface SerializedError {
  /** Error class name */
  name: string;
  /** Machine-readable error code */
  code: string;
  /** Error category */
  category: ErrorCategory;
  /** Human-readable error message */
  message: string;
  /** Timestamp when error occurred */
  timestamp: number;
  /** Offending source span */
  span?: SourceSpan;
  /** Error context */
  context?: ErrorContext;
  /** Recovery hint */
  recoveryHint?: string;
  /** Serialized cause error */
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  level: 'error' | 'warn';
  timestamp: string;
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** Malformed tokens */
  LEXICAL = 'LEXICAL',
  /** Token sequence does not match the grammar */
  SYNTAX = 'SYNTAX',
  /** Statement is well-formed but invalid against the catalog */
  SEMANTIC = 'SEMANTIC',
  /** Invalid builder options */
  CONFIGURATION = 'CONFIGURATION',
  /** Internal errors (bugs, unexpected states) */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// Base Catalog Error
// =============================================================================

/**
 * Base error class for all catalog errors
 *
 * @example
 * ```typescript
 * const result = builder.apply('ALTER TABLE missing ADD COLUMN x INT');
 * if (!result.success) {
 *   console.log(result.error.code);     // 'SEMANTIC_UNDEFINED_TABLE'
 *   console.log(result.error.format()); // message, source line and caret
 *   host.report(result.error.toJSON());
 * }
 * ```
 */
export abstract class CatalogError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Offending source span */
  span?: SourceSpan;

  /** Full SQL source the span points into */
  source?: string;

  /** Error context */
  context?: ErrorContext;

  /** Recovery hint for developers */
  recoveryHint?: string;

  constructor(
    message: string,
    options?: { cause?: Error; context?: ErrorContext; span?: SourceSpan; source?: string }
  ) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;
    this.span = options?.span;
    this.source = options?.source;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Start of the offending span
   */
  get location(): SourceLocation | undefined {
    return this.span?.start;
  }

  /**
   * Serialize error for the generation host
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.span) {
      result.span = this.span;
    }

    if (this.context) {
      result.context = this.context;
    }

    if (this.recoveryHint) {
      result.recoveryHint = this.recoveryHint;
    }

    if (this.cause instanceof CatalogError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        category: ErrorCategory.INTERNAL,
        message: this.cause.message,
        timestamp: this.timestamp,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        recoveryHint: this.recoveryHint,
        line: this.span?.start.line,
        column: this.span?.start.column,
        ...this.context,
      },
    };
  }

  /**
   * Format error with the offending source line and a caret under the span
   */
  format(): string {
    const parts: string[] = [this.message];
    const snippet = this.source && this.span
      ? formatErrorSnippet(this.source, this.span)
      : undefined;

    if (snippet) {
      parts.push(snippet);
    }

    if (this.recoveryHint) {
      parts.push(`  Hint: ${this.recoveryHint}`);
    }

    return parts.join('\n');
  }

  /**
   * Attach the span and source text if none was recorded yet
   */
  withSpan(span: SourceSpan | undefined, source?: string): this {
    this.span ??= span;
    this.source ??= source;
    return this;
  }

  /**
   * Create error with additional context
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  /**
   * Set recovery hint
   */
  withRecoveryHint(hint: string): this {
    this.recoveryHint = hint;
    return this;
  }
}

// =============================================================================
// Internal Error
// =============================================================================

/**
 * Wraps an unexpected exception raised while building the catalog
 */
export class InternalCatalogError extends CatalogError {
  readonly code = 'INTERNAL';
  readonly category = ErrorCategory.INTERNAL;

  constructor(message: string, options?: { cause?: Error; context?: ErrorContext; span?: SourceSpan }) {
    super(message, options);
    this.name = 'InternalCatalogError';
  }
}

/**
 * Normalize anything caught at an API boundary into a CatalogError
 */
export function createErrorFromException(error: unknown, source?: string): CatalogError {
  if (error instanceof CatalogError) {
    return error.withSpan(undefined, source);
  }

  if (error instanceof Error) {
    return new InternalCatalogError(error.message, { cause: error });
  }

  return new InternalCatalogError(String(error));
}

// =============================================================================
// Snippet formatting
// =============================================================================

/**
 * Render the source line containing `span.start` with a caret marker beneath
 * the spanned characters (clipped to that line).
 */
export function formatErrorSnippet(source: string, span: SourceSpan): string | undefined {
  const lines = source.split('\n');
  const line = lines[span.start.line - 1];
  if (line === undefined) return undefined;

  const startColumn = span.start.column;
  const endColumn = span.end.line === span.start.line ? span.end.column : line.length + 1;
  const width = Math.max(1, endColumn - startColumn);

  return [
    `  ${span.start.line} | ${line}`,
    `  ${' '.repeat(String(span.start.line).length)} | ${' '.repeat(startColumn - 1)}${'^'.repeat(width)}`,
  ].join('\n');
}
