import { describe, it, expect } from 'vitest';
import { createDiagnosticCollector, silentSink, type DiagnosticSink } from '../diagnostics/index.js';
import { parseStylesheet, ruleMatches } from '../stylesheet/index.js';
import { computeStyle } from './cascade.js';
import { defaultStyle, type Style } from './style.js';
import { VariableContext } from './variables.js';

interface ComputeOptions {
  classes?: string[];
  parent?: Style;
  variables?: VariableContext;
  sink?: DiagnosticSink;
}

function compute(css: string, options: ComputeOptions = {}) {
  const element = { classes: options.classes ?? ['a'] };
  const sheet = parseStylesheet(css, { sink: silentSink });
  return computeStyle({
    rules: sheet.rules.filter((rule) => ruleMatches(rule, element)),
    parent: options.parent,
    variables: options.variables,
    sink: options.sink ?? silentSink,
  });
}

const RED = { r: 255, g: 0, b: 0, a: 255 };
const BLUE = { r: 0, g: 0, b: 255, a: 255 };
const BLACK = { r: 0, g: 0, b: 0, a: 255 };
const px = (value: number) => ({ unit: 'px', value });

describe('computeStyle', () => {
  describe('ordering', () => {
    it('lets the later of two equally specific rules win', () => {
      expect(compute('.a { color: red } .a { color: blue }').style.color).toEqual(BLUE);
    });

    it('lets the more specific rule win regardless of source order', () => {
      const { style } = compute('.a.b { color: red } .b { color: blue }', { classes: ['a', 'b'] });
      expect(style.color).toEqual(RED);
    });

    it('resolves currentcolor against the final color in either order', () => {
      expect(compute('.a { outline-color: currentcolor; color: red }').style.outlineColor).toEqual(RED);
      expect(compute('.a { color: red; outline-color: currentcolor }').style.outlineColor).toEqual(RED);
    });

    it('resolves currentcolor in color against the inherited color', () => {
      const parent = { ...defaultStyle(), color: BLUE };
      expect(compute('.a { color: currentcolor }', { parent }).style.color).toEqual(BLUE);
    });
  });

  describe('keywords', () => {
    it('copies inherited fields from the parent', () => {
      const parent: Style = { ...defaultStyle(), color: RED, fontSize: 20, width: { unit: 'percent', value: 0.5 } };
      const { style } = compute('', { parent });
      expect(style.color).toEqual(RED);
      expect(style.fontSize).toBe(20);
      expect(style.width).toEqual({ unit: 'stretch', value: 1 });
    });

    it('inherits a non-inherited field on request', () => {
      const parent: Style = { ...defaultStyle(), width: { unit: 'percent', value: 0.5 } };
      expect(compute('.a { width: inherit }', { parent }).style.width).toEqual({ unit: 'percent', value: 0.5 });
    });

    it('falls back to the default when inheriting at the root', () => {
      expect(compute('.a { color: red } .a { color: inherit }').style.color).toEqual(BLACK);
    });

    it('resets to the default on initial', () => {
      const parent: Style = { ...defaultStyle(), fontSize: 20 };
      expect(compute('.a { font-size: initial }', { parent }).style.fontSize).toBe(16);
    });
  });

  describe('fields', () => {
    it('expands quad shorthands onto four fields', () => {
      const { style } = compute('.a { margin: 1px 2px }');
      expect([style.top, style.right, style.bottom, style.left]).toEqual([px(1), px(2), px(1), px(2)]);
    });

    it('maps auto spacing to null', () => {
      const { style } = compute('.a { letter-spacing: auto; word-spacing: 2px }');
      expect(style.letterSpacing).toBeNull();
      expect(style.wordSpacing).toEqual(px(2));
    });

    it('sets optional fields', () => {
      const { style } = compute('.a { max-width: 10em; font-family: serif; display: none }');
      expect(style.maxWidth).toEqual({ unit: 'em', value: 10 });
      expect(style.fontFamily).toBe('serif');
      expect(style.display).toBeNull();
    });

    it('keeps shadow colors unresolved', () => {
      const { style } = compute('.a { color: red; box-shadow: 1px 1px currentcolor }');
      expect(style.boxShadow).toEqual([
        { offsetX: px(1), offsetY: px(1), blur: px(0), spread: px(0), color: null, inset: false },
      ]);
    });
  });

  describe('layout tagging', () => {
    it('is false when only paint properties apply', () => {
      expect(compute('.a { color: red; opacity: 0.5 }').affectsLayout).toBe(false);
    });

    it('is true when any layout property applies', () => {
      expect(compute('.a { color: red; width: 10px }').affectsLayout).toBe(true);
    });
  });

  describe('custom properties', () => {
    it('substitutes variables declared by the matched rules', () => {
      expect(compute('.a { --w: 10px; width: var(--w) }').style.width).toEqual(px(10));
    });

    it('reads variables from the ancestor scope', () => {
      const variables = VariableContext.from([['--c', 'blue']]);
      expect(compute('.a { color: var(--c) }', { variables }).style.color).toEqual(BLUE);
    });

    it('merges variables in cascade order', () => {
      expect(compute('.a { --c: red } .a { --c: blue; color: var(--c) }').style.color).toEqual(BLUE);
      const { style } = compute('.a.b { --c: red } .b { --c: blue; color: var(--c) }', { classes: ['a', 'b'] });
      expect(style.color).toEqual(RED);
    });

    it('returns the node scope for children', () => {
      const { variables } = compute('.a { --gap: 4px }');
      expect(variables.lookup('--gap')).toBe('4px');
    });

    it('expands a deferred shorthand after substitution', () => {
      const { style } = compute('.a { --b: 1px solid red; border: var(--b) }');
      expect(style.borderTopWidth).toEqual(px(1));
      expect(style.borderLeftColor).toEqual(RED);
    });

    it('leaves the field untouched when a reference is missing', () => {
      const sink = createDiagnosticCollector();
      const result = compute('.a { width: 10px } .a { width: var(--nope) }', { sink });
      expect(result.style.width).toEqual(px(10));
      expect(result.errors.map((error) => error.kind)).toEqual(['unresolved-no-fallback']);
      expect(sink.diagnostics).toEqual([
        {
          code: 'unresolved-var',
          severity: 'error',
          message: 'Unresolved var() reference (no fallback): `var(--nope)`',
          location: { line: 1, column: 32 },
        },
      ]);
    });

    it('reports a cycle', () => {
      const sink = createDiagnosticCollector();
      const result = compute('.a { --x: var(--y); --y: var(--x); color: var(--x) }', { sink });
      expect(result.style.color).toEqual(BLACK);
      expect(result.errors.map((error) => error.kind)).toEqual(['depth-exceeded']);
      expect(sink.diagnostics.map((d) => d.code)).toEqual(['var-depth-exceeded']);
    });

    it('reports a value the grammar rejects after substitution', () => {
      const sink = createDiagnosticCollector();
      const result = compute('.a { --w: red; width: var(--w) }', { sink });
      expect(result.errors.map((error) => error.message)).toEqual(['Invalid value after var() expansion: `var(--w)`']);
      expect(sink.diagnostics.map((d) => d.code)).toEqual(['var-parse-failed']);
    });

    it('does not count a failed property toward layout', () => {
      expect(compute('.a { color: red; width: var(--nope) }').affectsLayout).toBe(false);
    });
  });
});
