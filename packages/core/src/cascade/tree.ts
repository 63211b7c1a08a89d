/**
 * Style Tree
 * Computes every node's style top-down: each node starts from its parent's
 * style and variable scope, then cascades the rules that match it.
 */

import { consoleSink, type DiagnosticSink } from '../diagnostics/index.js';
import { candidateRules, ruleMatches, type ElementState, type MatchTarget, type Stylesheet } from '../stylesheet/index.js';
import { computeStyle } from './cascade.js';
import type { VarResolveError } from './resolver.js';
import type { Style } from './style.js';
import { VariableContext } from './variables.js';

export interface StyleNode {
  classes: readonly string[];
  state?: ElementState;
  children?: readonly StyleNode[];
}

export interface StyledNode {
  node: StyleNode;
  style: Style;
  affectsLayout: boolean;
  errors: VarResolveError[];
  variables: VariableContext;
  children: StyledNode[];
}

export interface TreeStyleOptions {
  sink?: DiagnosticSink;
  /** Scope visible to the root */
  variables?: VariableContext;
}

export function computeTreeStyles(sheet: Stylesheet, root: StyleNode, options: TreeStyleOptions = {}): StyledNode {
  const sink = options.sink ?? consoleSink;

  const visit = (
    node: StyleNode,
    parentTarget: MatchTarget | null,
    parentStyle: Style | null,
    scope: VariableContext,
  ): StyledNode => {
    const target: MatchTarget = { classes: node.classes, state: node.state, parent: parentTarget };
    const rules = candidateRules(sheet, node.classes).filter((rule) => ruleMatches(rule, target));
    const computed = computeStyle({
      rules,
      parent: parentStyle,
      variables: scope,
      sink,
      fileName: sheet.fileName,
    });

    return {
      node,
      ...computed,
      children: (node.children ?? []).map((child) => visit(child, target, computed.style, computed.variables)),
    };
  };

  return visit(root, null, null, options.variables ?? VariableContext.EMPTY);
}

/** Depth-first, parents before children. */
export function* walkStyledTree(root: StyledNode): Generator<StyledNode> {
  yield root;
  for (const child of root.children) yield* walkStyledTree(child);
}
