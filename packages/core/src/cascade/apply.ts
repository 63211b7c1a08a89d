/**
 * Apply
 * Writes one property into a Style. Exact values set the field, `inherit`
 * copies the parent's field, `initial` resets it. Deferred values are
 * resolved against the variable scope and the substituted text is parsed
 * again with the grammar that deferred it.
 */

import {
  isColorProperty,
  isLengthProperty,
  isLimitProperty,
  isNumberProperty,
  isShorthandProperty,
  isUnitProperty,
  reparseProperty,
  type Property,
  type PropertyName,
  type PropertyValue,
  type ShorthandName,
} from '../properties/index.js';
import { CssParseError } from '../syntax/index.js';
import type { ColorValue, Rgba, Unit } from '../values/index.js';
import { resolveVariables, VarResolveError } from './resolver.js';
import { DEFAULT_STYLE, type Style } from './style.js';
import type { VariableContext } from './variables.js';

type CamelCase<S extends string> = S extends `${infer Head}-${infer Tail}` ? `${Head}${Capitalize<CamelCase<Tail>>}` : S;

export type LonghandName = Exclude<PropertyName, ShorthandName>;

/** Property name → Style field. */
export const STYLE_FIELDS: { readonly [N in LonghandName]: CamelCase<N> } = {
  'background-color': 'backgroundColor',
  'border-top-color': 'borderTopColor',
  'border-right-color': 'borderRightColor',
  'border-bottom-color': 'borderBottomColor',
  'border-left-color': 'borderLeftColor',
  color: 'color',
  'outline-color': 'outlineColor',
  'selection-background': 'selectionBackground',
  'selection-color': 'selectionColor',
  'border-top-left-radius': 'borderTopLeftRadius',
  'border-top-right-radius': 'borderTopRightRadius',
  'border-bottom-right-radius': 'borderBottomRightRadius',
  'border-bottom-left-radius': 'borderBottomLeftRadius',
  'border-top-width': 'borderTopWidth',
  'border-right-width': 'borderRightWidth',
  'border-bottom-width': 'borderBottomWidth',
  'border-left-width': 'borderLeftWidth',
  'flex-basis': 'flexBasis',
  'outline-offset': 'outlineOffset',
  'outline-width': 'outlineWidth',
  'max-top': 'maxTop',
  'max-right': 'maxRight',
  'max-bottom': 'maxBottom',
  'max-left': 'maxLeft',
  'max-child-top': 'maxChildTop',
  'max-child-right': 'maxChildRight',
  'max-child-bottom': 'maxChildBottom',
  'max-child-left': 'maxChildLeft',
  'max-child-between': 'maxChildBetween',
  'max-width': 'maxWidth',
  'max-height': 'maxHeight',
  'min-top': 'minTop',
  'min-right': 'minRight',
  'min-bottom': 'minBottom',
  'min-left': 'minLeft',
  'min-child-top': 'minChildTop',
  'min-child-right': 'minChildRight',
  'min-child-bottom': 'minChildBottom',
  'min-child-left': 'minChildLeft',
  'min-child-between': 'minChildBetween',
  'min-width': 'minWidth',
  'min-height': 'minHeight',
  top: 'top',
  right: 'right',
  bottom: 'bottom',
  left: 'left',
  'child-top': 'childTop',
  'child-right': 'childRight',
  'child-bottom': 'childBottom',
  'child-left': 'childLeft',
  'child-between': 'childBetween',
  width: 'width',
  height: 'height',
  'line-height': 'lineHeight',
  'letter-spacing': 'letterSpacing',
  'word-spacing': 'wordSpacing',
  'font-size': 'fontSize',
  'font-weight': 'fontWeight',
  'font-width': 'fontWidth',
  opacity: 'opacity',
  'z-index': 'zIndex',
  'background-image': 'backgroundImage',
  'box-shadow': 'boxShadow',
  'text-shadow': 'textShadow',
  display: 'display',
  'font-family': 'fontFamily',
  'font-style': 'fontStyle',
  position: 'position',
  'text-align': 'textAlign',
  transform: 'transform',
};

export interface ApplyContext {
  style: Style;
  parent: Readonly<Style> | null;
  variables: VariableContext;
}

function assign<K extends keyof Style, T>(
  context: ApplyContext,
  key: K,
  value: PropertyValue<T>,
  convert: (value: T) => Style[K],
): void {
  switch (value.kind) {
    case 'exact':
      context.style[key] = convert(value.value);
      return;
    case 'inherit':
      context.style[key] = (context.parent ?? DEFAULT_STYLE)[key];
      return;
    case 'initial':
      context.style[key] = DEFAULT_STYLE[key];
      return;
    case 'deferred':
      return;
  }
}

const same = <T>(value: T): T => value;

export function resolveColor(color: ColorValue, current: Rgba): Rgba {
  return color === 'currentcolor' ? current : color;
}

/** `auto` spacing means "use the font's own spacing". */
const spacingOf = (unit: Unit): Unit | null => (unit.unit === 'auto' ? null : unit);

/** Apply a property whose value is not deferred. */
export function applyResolved(property: Property, context: ApplyContext): void {
  if (isShorthandProperty(property)) return;

  if (isColorProperty(property)) {
    const current = context.style.color;
    assign(context, STYLE_FIELDS[property.name], property.value, (color) => resolveColor(color, current));
    return;
  }
  if (isLengthProperty(property)) {
    assign(context, STYLE_FIELDS[property.name], property.value, same);
    return;
  }
  if (isLimitProperty(property)) {
    assign(context, STYLE_FIELDS[property.name], property.value, same);
    return;
  }
  if (isUnitProperty(property)) {
    const spacing = property.name === 'letter-spacing' || property.name === 'word-spacing';
    assign(context, STYLE_FIELDS[property.name], property.value, spacing ? spacingOf : same);
    return;
  }
  if (isNumberProperty(property)) {
    assign(context, STYLE_FIELDS[property.name], property.value, same);
    return;
  }

  switch (property.name) {
    case 'background-image':
      return assign(context, 'backgroundImage', property.value, same);
    case 'box-shadow':
      return assign(context, 'boxShadow', property.value, same);
    case 'text-shadow':
      return assign(context, 'textShadow', property.value, same);
    case 'display':
      return assign(context, 'display', property.value, same);
    case 'font-family':
      return assign(context, 'fontFamily', property.value, same);
    case 'font-style':
      return assign(context, 'fontStyle', property.value, same);
    case 'position':
      return assign(context, 'position', property.value, same);
    case 'text-align':
      return assign(context, 'textAlign', property.value, same);
    case 'transform':
      return assign(context, 'transform', property.value, same);
  }
}

/**
 * Apply a property, resolving it first when deferred. A resolution failure
 * leaves the style untouched and is returned.
 */
export function applyProperty(property: Property, context: ApplyContext): VarResolveError | null {
  if (property.value.kind !== 'deferred') {
    applyResolved(property, context);
    return null;
  }

  const { raw, location } = property.value;
  let resolved: Property[];
  try {
    const { text } = resolveVariables(raw, location, context.variables);
    resolved = reparseProperty(property.name, text);
  } catch (error) {
    if (error instanceof VarResolveError) return error;
    if (error instanceof CssParseError) return new VarResolveError('parse-failed', raw, location);
    throw error;
  }

  for (const longhand of resolved) applyResolved(longhand, context);
  return null;
}
