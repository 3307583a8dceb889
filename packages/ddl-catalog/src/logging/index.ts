/**
 * Build Logging
 *
 * Structured entries for catalog builds: each entry names the statement it
 * concerns and where that statement sits in the input, plus the catalog
 * objects involved. Entries go to a sink; the console sink writes one JSON
 * line per entry to stderr.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { SourceSpan } from '../parser/shared/types.js';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Domain fields an entry may carry
 *
 * Every field can also be referenced from the message as `{field}`;
 * `{line}` and `{column}` read the start of `span`.
 */
export interface LogFields {
  component?: string;
  dialect?: string;
  /** Statement keyword, such as `CREATE TABLE` */
  statementType?: string;
  /** Where the statement sits in the input */
  span?: SourceSpan;
  schema?: string;
  table?: string;
  constraint?: string;
  /** ALTER TABLE action name */
  action?: string;
  /** Error code of a failed statement */
  code?: string;
  /** Error message of a failed statement */
  detail?: string;
  catalogName?: string;
  applied?: number;
  skipped?: number;
}

export interface LogEntry extends LogFields {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Correlates the entries of one builder */
  sessionId: string;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Minimum level written (default `warn`) */
  level?: LogLevel;
  /** Destination (default {@link ConsoleSink}) */
  sink?: LogSink;
  /** Fields added to every entry */
  fields?: LogFields;
  sessionId?: string;
  /** Include stack traces in error entries (default true) */
  includeStackTraces?: boolean;
}

type Message = string | (() => string);

export interface StructuredLogger {
  debug(message: Message, fields?: LogFields): void;
  info(message: Message, fields?: LogFields): void;
  warn(message: Message, fields?: LogFields): void;
  error(message: Message, error?: Error, fields?: LogFields): void;

  /** Logger writing to the same sink with `fields` added to every entry */
  child(fields: LogFields): StructuredLogger;

  getSessionId(): string;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
}

// =============================================================================
// Formatting
// =============================================================================

function formatMessage(template: string, fields: LogFields): string {
  const values: Record<string, unknown> = {
    ...fields,
    line: fields.span?.start.line,
    column: fields.span?.start.column,
  };

  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    const value = values[key];
    return value === undefined || typeof value === 'object' ? match : String(value);
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly fields: LogFields;
  private readonly sessionId: string;
  private readonly includeStackTraces: boolean;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'warn';
    this.sink = config.sink ?? new ConsoleSink();
    this.fields = config.fields ?? {};
    this.sessionId = config.sessionId ?? randomUUID();
    this.includeStackTraces = config.includeStackTraces ?? true;
  }

  private log(level: LogLevel, message: Message, fields?: LogFields, error?: Error): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.level]) {
      return;
    }

    const merged: LogFields = { ...this.fields, ...fields };
    const template = typeof message === 'function' ? message() : message;

    const entry: LogEntry = {
      ...merged,
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(template, merged),
      sessionId: this.sessionId,
    };

    if (error) {
      entry.error = { name: error.name, message: error.message };
      const code = errorCode(error);
      if (code) entry.error.code = code;
      if (this.includeStackTraces && error.stack) entry.error.stack = error.stack;
    }

    this.sink.write(entry);
  }

  debug(message: Message, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: Message, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: Message, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: Message, error?: Error, fields?: LogFields): void {
    this.log('error', message, fields, error);
  }

  child(fields: LogFields): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fields: { ...this.fields, ...fields },
      sessionId: this.sessionId,
      includeStackTraces: this.includeStackTraces,
    });
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * One JSON line per entry on stderr; stdout stays free for generated output
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    console.error(JSON.stringify(entry));
  }
}

/**
 * Keeps entries in memory
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export class NoOpSink implements LogSink {
  write(): void {
    // discard
  }
}
