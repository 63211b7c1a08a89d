/**
 * Token Stream
 * A rewindable cursor over a token array. Block-opening tokens (functions and
 * brackets) are returned as a single token; their contents are skipped unless
 * the caller descends with `parseNestedBlock` right after reading them.
 */

import { CssParseError, type CssParseErrorKind, type SourceLocation } from './errors.js';
import { blockCloser, isVarFunction, LineIndex, tokenize, type Token } from './tokenizer.js';

interface SharedSource {
  text: string;
  tokens: Token[];
  /** For each block opener, the index of its closing token (or `tokens.length` when unclosed) */
  closers: number[];
  lines: LineIndex;
}

export interface StreamState {
  readonly index: number;
  readonly openBlock: number | null;
}

function matchBlocks(tokens: Token[]): number[] {
  const closers = new Array<number>(tokens.length).fill(-1);
  const stack: Array<{ index: number; closer: string }> = [];
  tokens.forEach((token, index) => {
    const closer = blockCloser(token);
    if (closer) {
      stack.push({ index, closer });
      return;
    }
    const top = stack[stack.length - 1];
    if (top && top.closer === token.type) {
      closers[top.index] = index;
      stack.pop();
    }
  });
  for (const open of stack) {
    closers[open.index] = tokens.length;
  }
  return closers;
}

export class TokenStream {
  private index: number;
  /** Index of the last returned block opener whose contents have not been skipped yet */
  private openBlock: number | null = null;

  private constructor(
    private readonly shared: SharedSource,
    start: number,
    private readonly limit: number,
  ) {
    this.index = start;
  }

  static fromSource(text: string): TokenStream {
    const tokens = tokenize(text);
    const shared: SharedSource = { text, tokens, closers: matchBlocks(tokens), lines: new LineIndex(text) };
    return new TokenStream(shared, 0, tokens.length);
  }

  get source(): string {
    return this.shared.text;
  }

  // ---------- Position ----------

  private settle(): void {
    if (this.openBlock !== null) {
      this.index = Math.min(this.shared.closers[this.openBlock] + 1, this.limit);
      this.openBlock = null;
    }
  }

  state(): StreamState {
    return { index: this.index, openBlock: this.openBlock };
  }

  reset(state: StreamState): void {
    this.index = state.index;
    this.openBlock = state.openBlock;
  }

  /** Source offset of the next unread token (or the end of this stream's region). */
  position(): number {
    this.settle();
    if (this.index < this.limit) return this.shared.tokens[this.index].start;
    return this.regionEnd();
  }

  private regionEnd(): number {
    const { tokens, text } = this.shared;
    return this.limit < tokens.length ? tokens[this.limit].start : text.length;
  }

  sliceFrom(start: number): string {
    return this.shared.text.slice(start, this.position());
  }

  currentLocation(): SourceLocation {
    return this.shared.lines.locate(this.position());
  }

  locationOf(offset: number): SourceLocation {
    return this.shared.lines.locate(offset);
  }

  // ---------- Reading ----------

  private advance(skip: (token: Token) => boolean): Token {
    this.settle();
    while (this.index < this.limit) {
      const token = this.shared.tokens[this.index];
      this.index++;
      if (skip(token)) continue;
      if (blockCloser(token)) this.openBlock = this.index - 1;
      return token;
    }
    throw this.error('syntax', 'Unexpected end of input');
  }

  /** Next token, skipping whitespace and comments. Throws at the end of input. */
  next(): Token {
    return this.advance((t) => t.type === 'whitespace' || t.type === 'comment');
  }

  nextIncludingWhitespace(): Token {
    return this.advance((t) => t.type === 'comment');
  }

  nextIncludingWhitespaceAndComments(): Token {
    return this.advance(() => false);
  }

  skipWhitespace(): void {
    this.settle();
    while (this.index < this.limit) {
      const type = this.shared.tokens[this.index].type;
      if (type !== 'whitespace' && type !== 'comment') break;
      this.index++;
    }
  }

  /** True when only whitespace and comments remain. */
  isExhausted(): boolean {
    const saved = this.state();
    this.skipWhitespace();
    const exhausted = this.index >= this.limit;
    this.reset(saved);
    return exhausted;
  }

  /** Peek at the next non-whitespace token without consuming it. */
  peek(): Token | undefined {
    const saved = this.state();
    this.skipWhitespace();
    const token = this.index < this.limit ? this.shared.tokens[this.index] : undefined;
    this.reset(saved);
    return token;
  }

  // ---------- Combinators ----------

  /** Run `parse`; on a parse error, rewind and return undefined. */
  tryParse<T>(parse: (stream: TokenStream) => T): T | undefined {
    const saved = this.state();
    try {
      return parse(this);
    } catch (error) {
      if (!(error instanceof CssParseError)) throw error;
      this.reset(saved);
      return undefined;
    }
  }

  /** Like `tryParse`, but a `var()` signal still propagates. */
  tryParseOrDefer<T>(parse: (stream: TokenStream) => T): T | undefined {
    const saved = this.state();
    try {
      return parse(this);
    } catch (error) {
      if (!(error instanceof CssParseError) || error.kind === 'var-function') throw error;
      this.reset(saved);
      return undefined;
    }
  }

  /**
   * Descend into the block opened by the token just returned. `parse` must
   * consume the whole block; afterwards the stream sits after the closing token.
   */
  parseNestedBlock<T>(parse: (stream: TokenStream) => T): T {
    const open = this.openBlock;
    if (open === null) {
      throw this.error('syntax', 'Expected a block');
    }
    const close = Math.min(this.shared.closers[open], this.limit);
    const inner = new TokenStream(this.shared, open + 1, close);
    this.openBlock = null;
    const result = parse(inner);
    inner.expectExhausted();
    this.index = Math.min(close + 1, this.limit);
    return result;
  }

  /** Run `parse` on the tokens up to (not including) the next top-level token matching `stop`. */
  parseUntilBefore<T>(stop: (token: Token) => boolean, parse: (stream: TokenStream) => T): T {
    this.settle();
    const { tokens, closers } = this.shared;
    let end = this.index;
    while (end < this.limit && !stop(tokens[end])) {
      end = blockCloser(tokens[end]) ? Math.min(closers[end] + 1, this.limit) : end + 1;
    }
    const inner = new TokenStream(this.shared, this.index, end);
    const result = parse(inner);
    inner.expectExhausted();
    this.index = end;
    return result;
  }

  parseCommaSeparated<T>(parse: (stream: TokenStream) => T): T[] {
    const results: T[] = [];
    for (;;) {
      results.push(this.parseUntilBefore((t) => t.type === 'comma', parse));
      if (this.index >= this.limit) return results;
      this.next();
    }
  }

  // ---------- Expectations ----------

  expectExhausted(): void {
    const token = this.peek();
    if (token) {
      throw this.unexpected(token);
    }
  }

  expectIdent(): string {
    const token = this.next();
    if (token.type === 'ident') return token.value;
    throw this.unexpected(token);
  }

  expectIdentMatching(keyword: string): void {
    const token = this.next();
    if (token.type === 'ident' && token.value.toLowerCase() === keyword) return;
    throw this.unexpected(token);
  }

  expectComma(): void {
    const token = this.next();
    if (token.type !== 'comma') throw this.unexpected(token);
  }

  expectColon(): void {
    const token = this.next();
    if (token.type !== 'colon') throw this.unexpected(token);
  }

  expectPercentage(): number {
    const token = this.next();
    if (token.type === 'percentage') return token.unitValue;
    throw this.unexpected(token);
  }

  // ---------- Errors ----------

  error(kind: CssParseErrorKind, message: string): CssParseError {
    return new CssParseError(kind, message, this.currentLocation());
  }

  /** Error for a token that does not fit the grammar. A `var(` token yields the defer signal. */
  unexpected(token: Token): CssParseError {
    const location = this.shared.lines.locate(token.start);
    if (isVarFunction(token)) {
      return new CssParseError('var-function', 'var() reference', location);
    }
    const text = this.shared.text.slice(token.start, token.end);
    return new CssParseError('syntax', text ? `Unexpected token \`${text}\`` : 'Unexpected token', location);
  }
}
