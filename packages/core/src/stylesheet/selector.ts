/**
 * Selectors
 * A rule's selector chain is a flat array of atoms with the combinators kept
 * as explicit entries. Atoms with no combinator between them form a compound
 * that must match a single element.
 */

export const PSEUDO_CLASSES = ['focus', 'hover', 'active', 'enabled', 'disabled'] as const;

export type PseudoClass = (typeof PSEUDO_CLASSES)[number];

export type Selector =
  | { kind: 'class'; name: string }
  | { kind: 'wildcard' }
  | { kind: 'child' }
  | { kind: 'descendant' }
  | { kind: PseudoClass };

export type Combinator = Extract<Selector, { kind: 'child' | 'descendant' }>;

export const WILDCARD: Selector = { kind: 'wildcard' };
export const CHILD: Combinator = { kind: 'child' };
export const DESCENDANT: Combinator = { kind: 'descendant' };

const PSEUDOS: ReadonlySet<string> = new Set(PSEUDO_CLASSES);

export function isPseudoClass(name: string): name is PseudoClass {
  return PSEUDOS.has(name);
}

export function isCombinator(selector: Selector): selector is Combinator {
  return selector.kind === 'child' || selector.kind === 'descendant';
}

export function isPseudoSelector(selector: Selector): selector is { kind: PseudoClass } {
  return isPseudoClass(selector.kind);
}

/** 10 per class or pseudo-class atom. */
export function specificityOf(selectors: readonly Selector[]): number {
  let specificity = 0;
  for (const selector of selectors) {
    if (selector.kind === 'class' || isPseudoSelector(selector)) specificity += 10;
  }
  return specificity;
}

export function hasPseudos(selectors: readonly Selector[]): boolean {
  return selectors.some(isPseudoSelector);
}

/**
 * Key used to index a rule: the class of the rightmost compound, skipping
 * pseudo-classes. `null` means the rule must be tried on every element.
 */
export function indexKey(selectors: readonly Selector[]): string | null {
  for (let i = selectors.length - 1; i >= 0; i--) {
    const selector = selectors[i];
    if (isPseudoSelector(selector)) continue;
    return selector.kind === 'class' ? selector.name : null;
  }
  return null;
}

export function formatSelector(selector: Selector): string {
  switch (selector.kind) {
    case 'class':
      return `.${selector.name}`;
    case 'wildcard':
      return '*';
    case 'child':
      return ' > ';
    case 'descendant':
      return ' ';
    case 'focus':
    case 'hover':
    case 'active':
    case 'enabled':
    case 'disabled':
      return `:${selector.kind}`;
  }
}

export function formatSelectors(selectors: readonly Selector[]): string {
  return selectors.map(formatSelector).join('');
}
