import { describe, it, expect } from 'vitest';
import { createDiagnosticCollector } from '../diagnostics/index.js';
import { parseRules } from './parser.js';

function parse(text: string) {
  const sink = createDiagnosticCollector();
  const rules = parseRules(text, { sink, fileName: 'app.css' });
  return { rules, diagnostics: sink.diagnostics };
}

const RED = { r: 255, g: 0, b: 0, a: 255 };

describe('parseRules', () => {
  describe('selectors', () => {
    it('reads combinators between class atoms', () => {
      const { rules } = parse('.a .b > .c { color: red }');
      expect(rules).toHaveLength(1);
      expect(rules[0].selectors).toEqual([
        { kind: 'class', name: 'a' },
        { kind: 'descendant' },
        { kind: 'class', name: 'b' },
        { kind: 'child' },
        { kind: 'class', name: 'c' },
      ]);
      expect(rules[0].specificity).toBe(30);
      expect(rules[0].hasPseudos).toBe(false);
    });

    it('emits one rule per chain sharing the property list', () => {
      const { rules } = parse('.a, .d:HOVER { color: red }');
      expect(rules.map((rule) => rule.selectors)).toEqual([
        [{ kind: 'class', name: 'a' }],
        [{ kind: 'class', name: 'd' }, { kind: 'hover' }],
      ]);
      expect(rules[1].specificity).toBe(20);
      expect(rules[1].hasPseudos).toBe(true);
      expect(rules[0].properties).toBe(rules[1].properties);
    });

    it('shares the custom property list between chains', () => {
      const { rules } = parse('.a, .b { --gap: 4px }');
      expect(rules[0].variables).toEqual([['--gap', '4px']]);
      expect(rules[0].variables).toBe(rules[1].variables);
      expect(Object.isFrozen(rules[1].variables)).toBe(true);
    });

    it('gives the wildcard no specificity', () => {
      const { rules } = parse('* {} .a.b {} *:disabled {}');
      expect(rules.map((rule) => rule.specificity)).toEqual([0, 20, 10]);
      expect(rules[1].selectors).toEqual([
        { kind: 'class', name: 'a' },
        { kind: 'class', name: 'b' },
      ]);
    });

    it('drops a rule with an unknown pseudo-class', () => {
      const { rules, diagnostics } = parse('.a:visited { color: red }\n.b { color: red }');
      expect(rules).toHaveLength(1);
      expect(diagnostics).toEqual([
        {
          code: 'malformed-rule',
          severity: 'error',
          message: 'Failed to parse CSS rule: `.a:visited { color: red }`',
          location: { line: 1, column: 4 },
          file: 'app.css',
        },
      ]);
    });

    it('rejects a chain ending in a child combinator', () => {
      const { rules, diagnostics } = parse('.a > { color: red }');
      expect(rules).toEqual([]);
      expect(diagnostics.map((d) => d.code)).toEqual(['malformed-rule']);
    });

    it('rejects id selectors and empty chains', () => {
      expect(parse('#main { color: red }').rules).toEqual([]);
      expect(parse('.a, { color: red }').rules).toEqual([]);
    });

    it('reports a prelude with no block', () => {
      const { rules, diagnostics } = parse('.a { color: red }\n.b');
      expect(rules).toHaveLength(1);
      expect(diagnostics.map((d) => d.message)).toEqual(['Failed to parse CSS rule: `.b`']);
    });
  });

  describe('declaration blocks', () => {
    it('skips bad declarations and keeps the rest', () => {
      const { rules, diagnostics } = parse('.a { color: red; width: -5px; border: 2px dashed red; height: 10px }');
      expect(rules[0].properties).toEqual([
        { name: 'color', value: { kind: 'exact', value: RED } },
        { name: 'height', value: { kind: 'exact', value: { unit: 'px', value: 10 } } },
      ]);
      expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
        ['malformed-declaration', 'Failed to parse CSS property: `width: -5px`'],
        ['unsupported-value', 'Unsupported CSS value: `border: 2px dashed red`'],
      ]);
      expect(diagnostics[1].severity).toBe('warning');
    });

    it('reports unknown properties', () => {
      const { diagnostics } = parse('.a {\n  colour: red;\n}');
      expect(diagnostics).toEqual([
        {
          code: 'malformed-declaration',
          severity: 'error',
          message: 'Failed to parse CSS property: `colour: red`',
          location: { line: 2, column: 10 },
          file: 'app.css',
        },
      ]);
    });

    it('collects custom properties in order', () => {
      const { rules } = parse('.a { --gap: 4px; --Gap: var(--gap); ; color: var(--fg, red) }');
      expect(rules[0].variables).toEqual([
        ['--gap', '4px'],
        ['--Gap', 'var(--gap)'],
      ]);
      expect(rules[0].properties).toEqual([
        { name: 'color', value: { kind: 'deferred', raw: 'var(--fg, red)', location: { line: 1, column: 46 } } },
      ]);
    });

    it('closes an unterminated block at the end of input', () => {
      const { rules, diagnostics } = parse('.a { color: red');
      expect(rules[0].properties).toEqual([{ name: 'color', value: { kind: 'exact', value: RED } }]);
      expect(diagnostics).toEqual([]);
    });
  });

  it('skips at-rules', () => {
    const { rules, diagnostics } = parse('@import "x.css";\n@media screen { .a { color: red } }\n.b { color: red }');
    expect(rules.map((rule) => rule.selectors)).toEqual([[{ kind: 'class', name: 'b' }]]);
    expect(diagnostics.map((d) => [d.message, d.location])).toEqual([
      ['Failed to parse CSS rule: `@import "x.css";`', { line: 1, column: 1 }],
      ['Failed to parse CSS rule: `@media screen { .a { color: red } }`', { line: 2, column: 1 }],
    ]);
  });

  it('freezes rules', () => {
    const { rules } = parse('.a { color: red }');
    expect(Object.isFrozen(rules[0])).toBe(true);
    expect(Object.isFrozen(rules[0].properties)).toBe(true);
  });
});
