import { describe, it, expect } from 'vitest';
import { resolveVariables, VarResolveError } from './resolver.js';
import { VariableContext } from './variables.js';

const LOCATION = { line: 3, column: 7 };

function resolve(raw: string, vars: Array<[string, string]> = []) {
  return resolveVariables(raw, LOCATION, VariableContext.from(vars));
}

function resolveError(raw: string, vars: Array<[string, string]> = []): VarResolveError {
  try {
    resolve(raw, vars);
  } catch (error) {
    if (error instanceof VarResolveError) return error;
    throw error;
  }
  throw new Error(`expected ${raw} to fail`);
}

describe('resolveVariables', () => {
  it('returns text without references unchanged after zero passes', () => {
    expect(resolve('1px solid red')).toEqual({ text: '1px solid red', passes: 0 });
  });

  it('splices in variable values', () => {
    expect(resolve('var(--w) solid', [['--w', '2px']])).toEqual({ text: '2px solid', passes: 1 });
  });

  it('substitutes references inside functions', () => {
    expect(resolve('rgb(var(--r) 0 0)', [['--r', '255']]).text).toBe('rgb(255 0 0)');
  });

  it('uses the fallback only when the variable is missing', () => {
    expect(resolve('var(--missing,  1px 2px)').text).toBe('1px 2px');
    expect(resolve('var(--w, red)', [['--w', '3px']]).text).toBe('3px');
  });

  it('resolves references introduced by a previous pass', () => {
    const vars: Array<[string, string]> = [
      ['--a', 'var(--b)'],
      ['--b', 'red'],
    ];
    expect(resolve('var(--a)', vars)).toEqual({ text: 'red', passes: 2 });
    expect(resolve('var(--missing, var(--b))', vars)).toEqual({ text: 'red', passes: 2 });
  });

  it('reports a missing variable without a fallback', () => {
    const error = resolveError('var(--x)');
    expect(error.kind).toBe('unresolved-no-fallback');
    expect(error.message).toBe('Unresolved var() reference (no fallback): `var(--x)`');
    expect(error.location).toEqual(LOCATION);
  });

  it('stops a reference cycle', () => {
    const error = resolveError('var(--a)', [
      ['--a', 'var(--b)'],
      ['--b', 'var(--a)'],
    ]);
    expect(error.kind).toBe('depth-exceeded');
    expect(error.message).toBe('var() expansion limit exceeded (possible cycle): `var(--a)`');
  });

  it('rejects unbalanced text and malformed references', () => {
    expect(resolveError('var(--w) )', [['--w', '1px']]).kind).toBe('parse-failed');
    expect(resolveError('var(1px)').kind).toBe('parse-failed');
    expect(resolveError('var(--w red)', [['--w', '1px']]).kind).toBe('parse-failed');
  });
});

describe('VariableContext', () => {
  it('looks up the nearest scope first', () => {
    const outer = VariableContext.from([
      ['--a', '1'],
      ['--b', '2'],
    ]);
    const inner = outer.child([['--a', '3']]);
    expect(inner.lookup('--a')).toBe('3');
    expect(inner.lookup('--b')).toBe('2');
    expect(outer.lookup('--a')).toBe('1');
    expect(inner.lookup('--c')).toBeUndefined();
    expect([...inner.entries()]).toEqual([
      ['--a', '3'],
      ['--b', '2'],
    ]);
  });

  it('reuses the scope when nothing is declared', () => {
    const scope = VariableContext.from([['--a', '1']]);
    expect(scope.child([])).toBe(scope);
  });

  it('keeps empty values', () => {
    expect(VariableContext.from([['--empty', '']]).lookup('--empty')).toBe('');
  });
});
