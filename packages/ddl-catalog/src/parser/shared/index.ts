/**
 * Shared Parser Utilities
 *
 * Source positions, tokens and the lexer used by the DDL parser.
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './tokenizer.js';
export * from './token-stream.js';
