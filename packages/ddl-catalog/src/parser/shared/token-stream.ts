/**
 * Token Stream
 *
 * Pull-based cursor over a lazy token sequence with arbitrary lookahead.
 * Tokens are lexed only as far as the parser has looked.
 *
 * @packageDocumentation
 */

import type { Token } from './types.js';

/**
 * Lookahead buffer over an `Iterable<Token>`
 *
 * Once the underlying sequence yields `eof` (or ends), every further
 * `peek` and `next` returns that same `eof` token.
 */
export class TokenStream {
  private readonly iterator: Iterator<Token>;
  private readonly buffer: Token[] = [];
  private eof?: Token;
  private last?: Token;

  constructor(tokens: Iterable<Token>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  /**
   * Token `offset` positions ahead of the cursor, without consuming it
   */
  peek(offset = 0): Token {
    while (this.buffer.length <= offset) {
      this.buffer.push(this.pull());
    }
    return this.buffer[offset];
  }

  /**
   * Consume and return the token under the cursor
   */
  next(): Token {
    const token = this.peek();
    this.buffer.shift();
    this.last = token;
    return token;
  }

  /**
   * Most recently consumed token
   */
  get previous(): Token | undefined {
    return this.last;
  }

  private pull(): Token {
    if (this.eof) return this.eof;

    const result = this.iterator.next();
    if (!result.done && result.value.type !== 'eof') {
      return result.value;
    }

    this.eof = result.done ? this.syntheticEof() : result.value;
    return this.eof;
  }

  private syntheticEof(): Token {
    const end = this.buffer[this.buffer.length - 1]?.span.end
      ?? this.last?.span.end
      ?? { line: 1, column: 1, offset: 0 };
    return { type: 'eof', value: '', span: { start: end, end } };
  }
}
