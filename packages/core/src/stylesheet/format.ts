import { formatProperty } from '../properties/index.js';
import type { Rule } from './parser.js';
import { formatSelectors } from './selector.js';
import type { Stylesheet } from './stylesheet.js';

/** One rule per chain, custom properties first, two-space indent. */
export function formatRule(rule: Rule): string {
  const lines = [
    ...rule.variables.map(([name, raw]) => `  ${name}: ${raw};`),
    ...rule.properties.map((property) => `  ${formatProperty(property)};`),
  ];
  const selectors = formatSelectors(rule.selectors);
  return lines.length === 0 ? `${selectors} {}` : `${selectors} {\n${lines.join('\n')}\n}`;
}

/** Rules in cascade order. Parsing the output yields the same rules. */
export function formatStylesheet(sheet: Stylesheet): string {
  if (sheet.rules.length === 0) return '';
  return `${sheet.rules.map(formatRule).join('\n\n')}\n`;
}
