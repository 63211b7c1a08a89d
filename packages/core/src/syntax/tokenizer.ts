/**
 * CSS Tokenizer
 * Wraps css-tree's CSS Syntax Level 3 tokenizer. css-tree reports each token as
 * a type and an offset range; values are read back from the source slice so
 * later stages can slice raw text and report line/column positions.
 */

import { ident, string, tokenize as scan, tokenTypes } from 'css-tree';
import { shiftDecimal } from './decimal.js';
import type { SourceLocation } from './errors.js';

interface TokenSpan {
  /** Offset of the first character */
  start: number;
  /** Offset just past the last character */
  end: number;
}

export type Token = TokenSpan &
  (
    | { type: 'ident'; value: string }
    | { type: 'function'; name: string }
    | { type: 'at-keyword'; value: string }
    | { type: 'hash'; value: string }
    | { type: 'string'; value: string }
    | { type: 'bad-string' }
    | { type: 'url' }
    | { type: 'bad-url' }
    | { type: 'delim'; value: string }
    | { type: 'number'; value: number; isInteger: boolean }
    /** `unitValue` is `value / 100`, read from the text without rounding */
    | { type: 'percentage'; value: number; unitValue: number }
    | { type: 'dimension'; value: number; unit: string; isInteger: boolean }
    | { type: 'whitespace' }
    | { type: 'comment' }
    | { type: 'colon' }
    | { type: 'semicolon' }
    | { type: 'comma' }
    | { type: 'cdo' }
    | { type: 'cdc' }
    | { type: '(' }
    | { type: ')' }
    | { type: '[' }
    | { type: ']' }
    | { type: '{' }
    | { type: '}' }
  );

export type TokenType = Token['type'];

/** Tokens that open a nested block. A function token opens a `(` block. */
export function blockCloser(token: Token): ')' | ']' | '}' | null {
  switch (token.type) {
    case 'function':
    case '(':
      return ')';
    case '[':
      return ']';
    case '{':
      return '}';
    default:
      return null;
  }
}

export function isVarFunction(token: Token): boolean {
  return token.type === 'function' && token.name.toLowerCase() === 'var';
}

/** Maps offsets to 1-based line/column pairs. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(source: string) {
    for (let i = 0; i < source.length; i++) {
      const ch = source.charCodeAt(i);
      if (ch === 0x0d && source.charCodeAt(i + 1) === 0x0a) {
        i++;
        this.starts.push(i + 1);
      } else if (ch === 0x0a || ch === 0x0d || ch === 0x0c) {
        this.starts.push(i + 1);
      }
    }
  }

  locate(offset: number): SourceLocation {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.starts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.starts[low] + 1 };
  }
}

const NUMERIC_PREFIX = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?/;

function splitNumeric(text: string): { value: number; isInteger: boolean; rest: string } {
  const numeric = NUMERIC_PREFIX.exec(text)?.[0] ?? text;
  return {
    value: Number(numeric),
    isInteger: !/[.eE]/.test(numeric),
    rest: text.slice(numeric.length),
  };
}

function toToken(source: string, type: number, start: number, end: number): Token {
  const text = source.slice(start, end);
  switch (type) {
    case tokenTypes.Ident:
      return { type: 'ident', value: ident.decode(text), start, end };
    case tokenTypes.Function:
      return { type: 'function', name: ident.decode(text.slice(0, -1)), start, end };
    case tokenTypes.AtKeyword:
      return { type: 'at-keyword', value: ident.decode(text.slice(1)), start, end };
    case tokenTypes.Hash:
      return { type: 'hash', value: ident.decode(text.slice(1)), start, end };
    case tokenTypes.String:
      return { type: 'string', value: string.decode(text), start, end };
    case tokenTypes.BadString:
      return { type: 'bad-string', start, end };
    case tokenTypes.Url:
      return { type: 'url', start, end };
    case tokenTypes.BadUrl:
      return { type: 'bad-url', start, end };
    case tokenTypes.Number: {
      const { value, isInteger } = splitNumeric(text);
      return { type: 'number', value, isInteger, start, end };
    }
    case tokenTypes.Percentage: {
      const numeric = text.slice(0, -1);
      return { type: 'percentage', value: Number(numeric), unitValue: Number(shiftDecimal(numeric, -2)), start, end };
    }
    case tokenTypes.Dimension: {
      const { value, isInteger, rest } = splitNumeric(text);
      return { type: 'dimension', value, unit: ident.decode(rest), isInteger, start, end };
    }
    case tokenTypes.WhiteSpace:
      return { type: 'whitespace', start, end };
    case tokenTypes.Comment:
      return { type: 'comment', start, end };
    case tokenTypes.Colon:
      return { type: 'colon', start, end };
    case tokenTypes.Semicolon:
      return { type: 'semicolon', start, end };
    case tokenTypes.Comma:
      return { type: 'comma', start, end };
    case tokenTypes.CDO:
      return { type: 'cdo', start, end };
    case tokenTypes.CDC:
      return { type: 'cdc', start, end };
    case tokenTypes.LeftParenthesis:
      return { type: '(', start, end };
    case tokenTypes.RightParenthesis:
      return { type: ')', start, end };
    case tokenTypes.LeftSquareBracket:
      return { type: '[', start, end };
    case tokenTypes.RightSquareBracket:
      return { type: ']', start, end };
    case tokenTypes.LeftCurlyBracket:
      return { type: '{', start, end };
    case tokenTypes.RightCurlyBracket:
      return { type: '}', start, end };
    default:
      return { type: 'delim', value: text, start, end };
  }
}

/**
 * Tokenize stylesheet text. Never fails: malformed input becomes
 * `bad-string`, `bad-url` or `delim` tokens for the parsers to reject.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  scan(source, (type: number, start: number, end: number) => {
    tokens.push(toToken(source, type, start, end));
  });
  return tokens;
}
