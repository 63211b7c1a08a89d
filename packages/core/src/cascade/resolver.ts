/**
 * Custom-Property Resolver
 * Substitutes `var()` references in a deferred value, one pass at a time,
 * until a pass finds nothing left to substitute. Each pass can splice in text
 * that itself contains `var()`, so the passes are capped.
 */

import { blockCloser, CssParseError, isVarFunction, TokenStream, type SourceLocation, type Token } from '../syntax/index.js';
import type { VariableContext } from './variables.js';

export const MAX_RESOLVE_PASSES = 8;

export type VarResolveErrorKind = 'unresolved-no-fallback' | 'depth-exceeded' | 'parse-failed';

const MESSAGES: Record<VarResolveErrorKind, string> = {
  'unresolved-no-fallback': 'Unresolved var() reference (no fallback)',
  'depth-exceeded': 'var() expansion limit exceeded (possible cycle)',
  'parse-failed': 'Invalid value after var() expansion',
};

export class VarResolveError extends Error {
  readonly kind: VarResolveErrorKind;
  /** The deferred text as written in the stylesheet */
  readonly raw: string;
  readonly location: SourceLocation;

  constructor(kind: VarResolveErrorKind, raw: string, location: SourceLocation) {
    super(`${MESSAGES[kind]}: \`${raw}\``);
    this.name = 'VarResolveError';
    this.kind = kind;
    this.raw = raw;
    this.location = location;
  }
}

export interface Resolution {
  text: string;
  /** Number of passes that substituted something */
  passes: number;
}

const isStrayCloser = (token: Token) => token.type === ')' || token.type === ']' || token.type === '}';

/** A single substitution pass over `input`. */
class SubstitutionPass {
  private readonly out: string[] = [];
  private lastFlush = 0;
  private wrote = false;

  constructor(
    private readonly input: string,
    private readonly variables: VariableContext,
    private readonly fail: (kind: VarResolveErrorKind) => VarResolveError,
  ) {}

  /** The substituted text, or `null` when the input holds no `var()`. */
  run(): string | null {
    const stream = TokenStream.fromSource(this.input);
    this.walk(stream);
    if (!this.wrote) return null;
    this.out.push(this.input.slice(this.lastFlush));
    return this.out.join('');
  }

  private walk(stream: TokenStream): void {
    while (!stream.isExhausted()) {
      const token = stream.nextIncludingWhitespaceAndComments();
      if (isVarFunction(token)) {
        const replacement = stream.parseNestedBlock((inner) => this.readReference(inner));
        this.splice(token.start, stream.position(), replacement);
      } else if (isStrayCloser(token)) {
        throw this.fail('parse-failed');
      } else if (blockCloser(token)) {
        stream.parseNestedBlock((inner) => this.walk(inner));
      }
    }
  }

  /** Skip the rest of a block, checking that it is balanced. */
  private consumeToEnd(stream: TokenStream): void {
    while (!stream.isExhausted()) {
      const token = stream.nextIncludingWhitespaceAndComments();
      if (isStrayCloser(token)) throw this.fail('parse-failed');
      if (blockCloser(token)) {
        stream.parseNestedBlock((inner) => this.consumeToEnd(inner));
      }
    }
  }

  /** Contents of `var(...)`: a name and an optional fallback after a comma. */
  private readReference(stream: TokenStream): string {
    stream.skipWhitespace();
    const value = this.variables.lookup(stream.expectIdent());
    const hasComma =
      stream.tryParse((s) => {
        s.expectComma();
        return true;
      }) ?? false;

    if (value !== undefined) {
      if (hasComma) this.consumeToEnd(stream);
      return value;
    }
    if (!hasComma) throw this.fail('unresolved-no-fallback');

    stream.skipWhitespace();
    const start = stream.position();
    this.consumeToEnd(stream);
    return stream.sliceFrom(start);
  }

  private splice(start: number, end: number, replacement: string): void {
    this.out.push(this.input.slice(this.lastFlush, start), replacement);
    this.lastFlush = end;
    this.wrote = true;
  }
}

/**
 * Substitute every `var()` in `raw`. Text without references comes back
 * unchanged after zero passes.
 */
export function resolveVariables(raw: string, location: SourceLocation, variables: VariableContext): Resolution {
  const fail = (kind: VarResolveErrorKind) => new VarResolveError(kind, raw, location);
  let text = raw;

  for (let passes = 0; passes < MAX_RESOLVE_PASSES; passes++) {
    let next: string | null;
    try {
      next = new SubstitutionPass(text, variables, fail).run();
    } catch (error) {
      if (error instanceof CssParseError) throw fail('parse-failed');
      throw error;
    }
    if (next === null) return { text, passes };
    text = next;
  }

  throw fail('depth-exceeded');
}
