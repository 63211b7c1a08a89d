/**
 * Cascade
 * Computes one node's style from the rules that matched it. Rules apply in
 * ascending specificity, source order breaking ties. `color` goes first so
 * that `currentcolor` in any other property sees the node's final color.
 */

import { consoleSink, type DiagnosticCode, type DiagnosticSink } from '../diagnostics/index.js';
import { affectsLayout, type Property } from '../properties/index.js';
import type { Rule } from '../stylesheet/index.js';
import { applyProperty, type ApplyContext } from './apply.js';
import type { VarResolveError, VarResolveErrorKind } from './resolver.js';
import { createStyle, type Style } from './style.js';
import { VariableContext } from './variables.js';

export interface ComputeStyleInput {
  /** Rules that matched the node, in any order */
  rules: readonly Rule[];
  parent?: Readonly<Style> | null;
  /** Scope inherited from the ancestors */
  variables?: VariableContext;
  sink?: DiagnosticSink;
  /** Reported with resolution errors */
  fileName?: string;
}

export interface ComputedStyle {
  style: Style;
  /** Whether any applied property can change layout */
  affectsLayout: boolean;
  errors: VarResolveError[];
  /** The node's own scope, for its children */
  variables: VariableContext;
}

const ERROR_CODES: Record<VarResolveErrorKind, DiagnosticCode> = {
  'unresolved-no-fallback': 'unresolved-var',
  'depth-exceeded': 'var-depth-exceeded',
  'parse-failed': 'var-parse-failed',
};

export function cascadeOrder(rules: readonly Rule[]): Rule[] {
  return [...rules].sort((a, b) => a.specificity - b.specificity);
}

/** Every variable the rules declare, later rules overwriting earlier ones. */
export function mergeVariables(rules: readonly Rule[]): Map<string, string> {
  const merged = new Map<string, string>();
  for (const rule of rules) {
    for (const [name, raw] of rule.variables) merged.set(name, raw);
  }
  return merged;
}

const isColor = (property: Property) => property.name === 'color';
const isNotColor = (property: Property) => property.name !== 'color';

export function computeStyle(input: ComputeStyleInput): ComputedStyle {
  const rules = cascadeOrder(input.rules);
  const parent = input.parent ?? null;
  const variables = (input.variables ?? VariableContext.EMPTY).child(mergeVariables(rules));
  const sink = input.sink ?? consoleSink;

  const context: ApplyContext = { style: createStyle(parent), parent, variables };
  const errors: VarResolveError[] = [];
  let layout = false;

  const applyPhase = (include: (property: Property) => boolean) => {
    for (const rule of rules) {
      for (const property of rule.properties) {
        if (!include(property)) continue;
        const error = applyProperty(property, context);
        if (error) {
          errors.push(error);
          sink.log(error.message, error.location, input.fileName, ERROR_CODES[error.kind]);
        } else if (affectsLayout(property.name)) {
          layout = true;
        }
      }
    }
  };

  applyPhase(isColor);
  applyPhase(isNotColor);

  return { style: context.style, affectsLayout: layout, errors, variables };
}
