/**
 * Stylesheet
 * An immutable snapshot of parsed rules, stable-sorted by specificity and
 * indexed by the class of each rule's rightmost compound.
 */

import { parseRules, type ParseOptions, type Rule } from './parser.js';
import { indexKey } from './selector.js';

export interface Stylesheet {
  readonly fileName?: string;
  /** Ascending specificity; source order within equal specificity */
  readonly rules: readonly Rule[];
  /** Positions in `rules` of rules with no class key */
  readonly wildcard: readonly number[];
  /** Class name → positions in `rules` */
  readonly index: ReadonlyMap<string, readonly number[]>;
}

export function createStylesheet(rules: readonly Rule[], fileName?: string): Stylesheet {
  // Array.prototype.sort is stable
  const sorted = Object.freeze([...rules].sort((a, b) => a.specificity - b.specificity));
  const wildcard: number[] = [];
  const index = new Map<string, number[]>();

  sorted.forEach((rule, position) => {
    const key = indexKey(rule.selectors);
    if (key === null) {
      wildcard.push(position);
      return;
    }
    const bucket = index.get(key);
    if (bucket) bucket.push(position);
    else index.set(key, [position]);
  });

  const sheet: Stylesheet = { rules: sorted, wildcard: Object.freeze(wildcard), index };
  return Object.freeze(fileName === undefined ? sheet : { ...sheet, fileName });
}

export const EMPTY_STYLESHEET: Stylesheet = createStylesheet([]);

export function parseStylesheet(text: string, options: ParseOptions = {}): Stylesheet {
  return createStylesheet(parseRules(text, options), options.fileName);
}

/**
 * Rules that could match an element with these classes, in cascade order.
 * Every rule that can match is returned; the caller still runs the matcher.
 */
export function candidateRules(sheet: Stylesheet, classes: Iterable<string>): Rule[] {
  const positions = new Set(sheet.wildcard);
  for (const name of classes) {
    for (const position of sheet.index.get(name) ?? []) positions.add(position);
  }
  return [...positions].sort((a, b) => a - b).map((position) => sheet.rules[position]);
}

// ============================================================================
// Store
// ============================================================================

export type StylesheetListener = (next: Stylesheet, previous: Stylesheet) => void;

/**
 * Holds the current snapshot. `publish` swaps it in one assignment, so a
 * reader that took `current` keeps a consistent view across a reload.
 */
export class StylesheetStore {
  private snapshot: Stylesheet;
  private readonly listeners = new Set<StylesheetListener>();

  constructor(initial: Stylesheet = EMPTY_STYLESHEET) {
    this.snapshot = initial;
  }

  get current(): Stylesheet {
    return this.snapshot;
  }

  publish(next: Stylesheet): void {
    const previous = this.snapshot;
    if (next === previous) return;
    this.snapshot = next;
    for (const listener of this.listeners) listener(next, previous);
  }

  /** Parse `text` and publish the result. */
  reload(text: string, options: ParseOptions = {}): Stylesheet {
    const sheet = parseStylesheet(text, options);
    this.publish(sheet);
    return sheet;
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: StylesheetListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
