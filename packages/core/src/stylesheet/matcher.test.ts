import { describe, it, expect } from 'vitest';
import { silentSink } from '../diagnostics/index.js';
import { ruleMatches, type ElementState, type MatchTarget } from './matcher.js';
import { parseRules } from './parser.js';

function rule(selector: string) {
  const [parsed] = parseRules(`${selector} {}`, { sink: silentSink });
  return parsed;
}

function element(classes: string[], parent: MatchTarget | null = null, state?: ElementState): MatchTarget {
  return { classes, parent, state };
}

describe('ruleMatches', () => {
  const root = element(['app']);
  const panel = element(['panel'], root);
  const button = element(['button', 'primary'], panel);

  it('matches a single class', () => {
    expect(ruleMatches(rule('.button'), button)).toBe(true);
    expect(ruleMatches(rule('.panel'), button)).toBe(false);
  });

  it('requires every atom of a compound on the same element', () => {
    expect(ruleMatches(rule('.button.primary'), button)).toBe(true);
    expect(ruleMatches(rule('.button.secondary'), button)).toBe(false);
    expect(ruleMatches(rule('*.primary'), button)).toBe(true);
  });

  it('matches descendants at any depth', () => {
    expect(ruleMatches(rule('.app .button'), button)).toBe(true);
    expect(ruleMatches(rule('.panel .app'), root)).toBe(false);
  });

  it('matches children only one level up', () => {
    expect(ruleMatches(rule('.panel > .button'), button)).toBe(true);
    expect(ruleMatches(rule('.app > .button'), button)).toBe(false);
    expect(ruleMatches(rule('.app > * > .button'), button)).toBe(true);
  });

  it('backtracks through ancestors for a descendant combinator', () => {
    const top = element(['a']);
    const outer = element(['b'], top);
    const inner = element(['b'], outer);
    const leaf = element(['c'], inner);
    expect(ruleMatches(rule('.a > .b .c'), leaf)).toBe(true);
    expect(ruleMatches(rule('.a > .b > .c'), leaf)).toBe(false);
  });

  it('reads pseudo-classes from element state', () => {
    const hovered = element(['button'], panel, { hover: true });
    expect(ruleMatches(rule('.button:hover'), hovered)).toBe(true);
    expect(ruleMatches(rule('.button:hover'), button)).toBe(false);
    expect(ruleMatches(rule('.button:focus'), hovered)).toBe(false);
  });

  it('treats elements as enabled unless disabled', () => {
    const disabled = element(['button'], panel, { disabled: true });
    expect(ruleMatches(rule(':enabled'), button)).toBe(true);
    expect(ruleMatches(rule(':enabled'), disabled)).toBe(false);
    expect(ruleMatches(rule('.button:disabled'), disabled)).toBe(true);
  });

  it('applies pseudo-classes to ancestors', () => {
    const activePanel = element(['panel'], root, { active: true });
    const child = element(['button'], activePanel);
    expect(ruleMatches(rule('.panel:active .button'), child)).toBe(true);
    expect(ruleMatches(rule('.panel:active .button'), button)).toBe(false);
  });
});
