import { describe, it, expect } from 'vitest';
import { CssParseError, TokenStream } from '../../syntax/index.js';
import type { Affine } from '../../values/index.js';
import { parseTransform } from './transform.js';

function matrix(text: string): Affine {
  const value = parseTransform(TokenStream.fromSource(text));
  if (value.kind !== 'exact') throw new Error('expected an exact value');
  return value.value;
}

function errorKind(text: string): string {
  try {
    parseTransform(TokenStream.fromSource(text));
  } catch (error) {
    if (error instanceof CssParseError) return error.kind;
    throw error;
  }
  return 'none';
}

function expectClose(actual: Affine, expected: Affine): void {
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], 10));
}

describe('parseTransform', () => {
  it('treats none as the identity', () => {
    expect(matrix('none')).toEqual([1, 0, 0, 1, 0, 0]);
  });

  it('translates with one or two offsets', () => {
    expect(matrix('translate(5px)')).toEqual([1, 0, 0, 1, 5, 0]);
    expect(matrix('translate(5px, 0)')).toEqual([1, 0, 0, 1, 5, 0]);
  });

  it('scales with optional commas', () => {
    expect(matrix('scale(2 3)')).toEqual([2, 0, 0, 3, 0, 0]);
    expect(matrix('scale(2)')).toEqual([2, 0, 0, 2, 0, 0]);
  });

  it('takes a matrix as given', () => {
    expect(matrix('matrix(1, 2, 3, 4, 5, 6)')).toEqual([1, 2, 3, 4, 5, 6]);
    expect(matrix('matrix(1 2 3 4 5 6)')).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('rotates and skews', () => {
    expectClose(matrix('rotate(90deg)'), [0, 1, -1, 0, 0, 0]);
    expectClose(matrix('rotate(0.25turn)'), [0, 1, -1, 0, 0, 0]);
    expectClose(matrix('skew(45deg)'), [1, 0, 1, 1, 0, 0]);
  });

  it('applies later functions on the outside', () => {
    expect(matrix('translate(10px, 20px) scale(2)')).toEqual([2, 0, 0, 2, 20, 40]);
    expectClose(matrix('translate(10px) rotate(90deg)'), [0, 1, -1, 0, 0, 10]);
    expectClose(matrix('rotate(90deg) translate(10px)'), [0, 1, -1, 0, 10, 0]);
  });

  it('reports unsupported units and functions', () => {
    expect(errorKind('translate(50%)')).toBe('unsupported-value');
    expect(errorKind('translate(2em)')).toBe('unsupported-value');
    expect(errorKind('perspective(10px)')).toBe('unsupported-value');
    expect(errorKind('rotate(1foo)')).toBe('unsupported-value');
  });

  it('rejects malformed lists', () => {
    expect(errorKind('none translate(1px)')).toBe('syntax');
    expect(errorKind('rotate(45)')).toBe('syntax');
    expect(errorKind('scale(1, 2, 3)')).toBe('syntax');
  });

  it('signals var() inside arguments', () => {
    expect(errorKind('scale(var(--s))')).toBe('var-function');
  });
});
