/**
 * Property Model
 * Every declaration the parser understands becomes a `Property`: a property
 * name paired with a `PropertyValue` of that name's value type. Names are
 * grouped by value type so handlers, the cascade and the formatter can switch
 * over them exhaustively.
 */

import type { SourceLocation } from '../syntax/index.js';
import type {
  Affine,
  BoxShadow,
  ColorValue,
  Direction,
  FontStyle,
  Length,
  LinearGradient,
  Position,
  TextAlign,
  TextShadow,
  Unit,
} from '../values/index.js';

/** A value containing a `var()` reference, resolved and reparsed during the cascade. */
export interface DeferredValue {
  kind: 'deferred';
  raw: string;
  location: SourceLocation;
}

export type PropertyValue<T> = { kind: 'initial' } | { kind: 'inherit' } | { kind: 'exact'; value: T } | DeferredValue;

export const INITIAL = { kind: 'initial' } as const;
export const INHERIT = { kind: 'inherit' } as const;

export function exact<T>(value: T): PropertyValue<T> {
  return { kind: 'exact', value };
}

// ---------- Name groups ----------

export const COLOR_PROPERTIES = [
  'background-color',
  'border-top-color',
  'border-right-color',
  'border-bottom-color',
  'border-left-color',
  'color',
  'outline-color',
  'selection-background',
  'selection-color',
] as const;

export const LENGTH_PROPERTIES = [
  'border-top-left-radius',
  'border-top-right-radius',
  'border-bottom-right-radius',
  'border-bottom-left-radius',
  'border-top-width',
  'border-right-width',
  'border-bottom-width',
  'border-left-width',
  'flex-basis',
  'outline-offset',
  'outline-width',
] as const;

/** Min/max constraints: non-negative lengths that default to "no limit". */
export const LIMIT_PROPERTIES = [
  'max-top',
  'max-right',
  'max-bottom',
  'max-left',
  'max-child-top',
  'max-child-right',
  'max-child-bottom',
  'max-child-left',
  'max-child-between',
  'max-width',
  'max-height',
  'min-top',
  'min-right',
  'min-bottom',
  'min-left',
  'min-child-top',
  'min-child-right',
  'min-child-bottom',
  'min-child-left',
  'min-child-between',
  'min-width',
  'min-height',
] as const;

export const UNIT_PROPERTIES = [
  'top',
  'right',
  'bottom',
  'left',
  'child-top',
  'child-right',
  'child-bottom',
  'child-left',
  'child-between',
  'width',
  'height',
  'line-height',
  'letter-spacing',
  'word-spacing',
] as const;

export const NUMBER_PROPERTIES = ['font-size', 'font-weight', 'font-width', 'opacity', 'z-index'] as const;

export const SHORTHAND_PROPERTIES = [
  'border',
  'border-top',
  'border-right',
  'border-bottom',
  'border-left',
  'border-color',
  'border-width',
  'border-radius',
  'outline',
  'space',
  'margin',
  'child-space',
  'padding',
  'font',
] as const;

export type ColorPropertyName = (typeof COLOR_PROPERTIES)[number];
export type LengthPropertyName = (typeof LENGTH_PROPERTIES)[number];
export type LimitPropertyName = (typeof LIMIT_PROPERTIES)[number];
export type UnitPropertyName = (typeof UNIT_PROPERTIES)[number];
export type NumberPropertyName = (typeof NUMBER_PROPERTIES)[number];
export type ShorthandName = (typeof SHORTHAND_PROPERTIES)[number];

/** Value type carried by each property name. Shorthands never hold an exact value. */
export interface PropertyValueTypes
  extends Record<ColorPropertyName, ColorValue>,
    Record<LengthPropertyName, Length>,
    Record<LimitPropertyName, Length>,
    Record<UnitPropertyName, Unit>,
    Record<NumberPropertyName, number>,
    Record<ShorthandName, never> {
  'background-image': readonly LinearGradient[];
  'box-shadow': readonly BoxShadow[];
  'text-shadow': readonly TextShadow[];
  display: Direction | null;
  'font-family': string;
  'font-style': FontStyle;
  position: Position;
  'text-align': TextAlign;
  transform: Affine;
}

export type PropertyName = keyof PropertyValueTypes;

export type PropertyOf<N extends PropertyName> = {
  readonly name: N;
  readonly value: PropertyValue<PropertyValueTypes[N]>;
};

export type Property =
  | PropertyOf<ColorPropertyName>
  | PropertyOf<LengthPropertyName>
  | PropertyOf<LimitPropertyName>
  | PropertyOf<UnitPropertyName>
  | PropertyOf<NumberPropertyName>
  | PropertyOf<ShorthandName>
  | PropertyOf<'background-image'>
  | PropertyOf<'box-shadow'>
  | PropertyOf<'text-shadow'>
  | PropertyOf<'display'>
  | PropertyOf<'font-family'>
  | PropertyOf<'font-style'>
  | PropertyOf<'position'>
  | PropertyOf<'text-align'>
  | PropertyOf<'transform'>;

const SHORTHANDS: ReadonlySet<string> = new Set(SHORTHAND_PROPERTIES);
const COLORS: ReadonlySet<string> = new Set(COLOR_PROPERTIES);
const LENGTHS: ReadonlySet<string> = new Set(LENGTH_PROPERTIES);
const LIMITS: ReadonlySet<string> = new Set(LIMIT_PROPERTIES);
const UNITS: ReadonlySet<string> = new Set(UNIT_PROPERTIES);
const NUMBERS: ReadonlySet<string> = new Set(NUMBER_PROPERTIES);

export function isShorthand(name: PropertyName): name is ShorthandName {
  return SHORTHANDS.has(name);
}

export const isShorthandProperty = (p: Property): p is PropertyOf<ShorthandName> => SHORTHANDS.has(p.name);
export const isColorProperty = (p: Property): p is PropertyOf<ColorPropertyName> => COLORS.has(p.name);
export const isLengthProperty = (p: Property): p is PropertyOf<LengthPropertyName> => LENGTHS.has(p.name);
export const isLimitProperty = (p: Property): p is PropertyOf<LimitPropertyName> => LIMITS.has(p.name);
export const isUnitProperty = (p: Property): p is PropertyOf<UnitPropertyName> => UNITS.has(p.name);
export const isNumberProperty = (p: Property): p is PropertyOf<NumberPropertyName> => NUMBERS.has(p.name);

// ---------- Layout tagging ----------

const PAINT_ONLY: ReadonlySet<PropertyName> = new Set<PropertyName>([
  'background-color',
  'background-image',
  'border-top-color',
  'border-right-color',
  'border-bottom-color',
  'border-left-color',
  'border-color',
  'box-shadow',
  'color',
  'opacity',
  'outline',
  'outline-color',
  'outline-offset',
  'outline-width',
  'selection-background',
  'selection-color',
  'text-shadow',
  'transform',
  'z-index',
]);

/** Whether applying this property can change layout, as opposed to paint only. */
export function affectsLayout(name: PropertyName): boolean {
  return !PAINT_ONLY.has(name);
}
