/**
 * Selector matching against an element and its ancestor chain.
 */

import type { Rule } from './parser.js';
import { isCombinator, type Combinator, type Selector } from './selector.js';

/** Interaction state read by pseudo-classes. Absent flags are false. */
export interface ElementState {
  hover?: boolean;
  focus?: boolean;
  active?: boolean;
  disabled?: boolean;
}

export interface MatchTarget {
  readonly classes: readonly string[];
  readonly state?: ElementState;
  readonly parent?: MatchTarget | null;
}

interface SplitChain {
  /** Left to right */
  compounds: Selector[][];
  /** `combinators[i]` sits between `compounds[i]` and `compounds[i + 1]` */
  combinators: Combinator[];
}

function splitChain(selectors: readonly Selector[]): SplitChain {
  const compounds: Selector[][] = [[]];
  const combinators: Combinator[] = [];
  for (const selector of selectors) {
    if (isCombinator(selector)) {
      combinators.push(selector);
      compounds.push([]);
    } else {
      compounds[compounds.length - 1].push(selector);
    }
  }
  return { compounds, combinators };
}

function atomMatches(selector: Selector, element: MatchTarget): boolean {
  const state = element.state ?? {};
  switch (selector.kind) {
    case 'class':
      return element.classes.includes(selector.name);
    case 'wildcard':
      return true;
    case 'hover':
      return state.hover === true;
    case 'focus':
      return state.focus === true;
    case 'active':
      return state.active === true;
    case 'disabled':
      return state.disabled === true;
    case 'enabled':
      return state.disabled !== true;
    case 'child':
    case 'descendant':
      return false;
  }
}

function matchesFrom(chain: SplitChain, position: number, element: MatchTarget): boolean {
  if (!chain.compounds[position].every((atom) => atomMatches(atom, element))) return false;
  if (position === 0) return true;

  const combinator = chain.combinators[position - 1];
  if (combinator.kind === 'child') {
    return element.parent ? matchesFrom(chain, position - 1, element.parent) : false;
  }
  for (let ancestor = element.parent; ancestor; ancestor = ancestor.parent) {
    if (matchesFrom(chain, position - 1, ancestor)) return true;
  }
  return false;
}

export function selectorsMatch(selectors: readonly Selector[], element: MatchTarget): boolean {
  const chain = splitChain(selectors);
  return matchesFrom(chain, chain.compounds.length - 1, element);
}

export function ruleMatches(rule: Rule, element: MatchTarget): boolean {
  return selectorsMatch(rule.selectors, element);
}
