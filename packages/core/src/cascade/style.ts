/**
 * Style
 * The computed, fully concrete style of one node: a flat record with one
 * field per longhand property, in camelCase.
 */

import {
  IDENTITY,
  type Affine,
  type BoxShadow,
  type Direction,
  type FontStyle,
  type Length,
  type LinearGradient,
  type Position,
  type Rgba,
  type TextAlign,
  type TextShadow,
  type Unit,
} from '../values/index.js';

export interface Style {
  // Colors
  backgroundColor: Rgba;
  borderTopColor: Rgba;
  borderRightColor: Rgba;
  borderBottomColor: Rgba;
  borderLeftColor: Rgba;
  color: Rgba;
  outlineColor: Rgba;
  selectionBackground: Rgba;
  /** `null` keeps the text color */
  selectionColor: Rgba | null;

  // Images and shadows
  backgroundImage: readonly LinearGradient[] | null;
  boxShadow: readonly BoxShadow[] | null;
  textShadow: readonly TextShadow[] | null;

  // Border geometry
  borderTopLeftRadius: Length;
  borderTopRightRadius: Length;
  borderBottomRightRadius: Length;
  borderBottomLeftRadius: Length;
  borderTopWidth: Length;
  borderRightWidth: Length;
  borderBottomWidth: Length;
  borderLeftWidth: Length;

  // Position offsets and child spacing
  top: Unit;
  right: Unit;
  bottom: Unit;
  left: Unit;
  childTop: Unit;
  childRight: Unit;
  childBottom: Unit;
  childLeft: Unit;
  childBetween: Unit;

  // Size limits; `null` is unconstrained
  maxTop: Length | null;
  maxRight: Length | null;
  maxBottom: Length | null;
  maxLeft: Length | null;
  maxChildTop: Length | null;
  maxChildRight: Length | null;
  maxChildBottom: Length | null;
  maxChildLeft: Length | null;
  maxChildBetween: Length | null;
  maxWidth: Length | null;
  maxHeight: Length | null;
  minTop: Length | null;
  minRight: Length | null;
  minBottom: Length | null;
  minLeft: Length | null;
  minChildTop: Length | null;
  minChildRight: Length | null;
  minChildBottom: Length | null;
  minChildLeft: Length | null;
  minChildBetween: Length | null;
  minWidth: Length | null;
  minHeight: Length | null;

  // Layout
  /** `null` is `display: none` */
  display: Direction | null;
  flexBasis: Length;
  width: Unit;
  height: Unit;
  position: Position;
  visibility: boolean;
  zIndex: number;

  // Text
  fontFamily: string | null;
  fontSize: number;
  fontStyle: FontStyle;
  fontWeight: number;
  fontWidth: number;
  lineHeight: Unit;
  letterSpacing: Unit | null;
  wordSpacing: Unit | null;
  textAlign: TextAlign;

  // Visual effects
  opacity: number;
  outlineOffset: Length;
  outlineWidth: Length;
  transform: Affine;
}

const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 255 };
const PX_ZERO: Length = { unit: 'px', value: 0 };
const AUTO: Unit = { unit: 'auto' };
const STRETCH_ONE: Unit = { unit: 'stretch', value: 1 };

const DEFAULTS: Style = {
  backgroundColor: { r: 0, g: 0, b: 0, a: 0 },
  borderTopColor: BLACK,
  borderRightColor: BLACK,
  borderBottomColor: BLACK,
  borderLeftColor: BLACK,
  color: BLACK,
  outlineColor: BLACK,
  selectionBackground: { r: 4, g: 101, b: 175, a: 128 },
  selectionColor: null,

  backgroundImage: null,
  boxShadow: null,
  textShadow: null,

  borderTopLeftRadius: PX_ZERO,
  borderTopRightRadius: PX_ZERO,
  borderBottomRightRadius: PX_ZERO,
  borderBottomLeftRadius: PX_ZERO,
  borderTopWidth: PX_ZERO,
  borderRightWidth: PX_ZERO,
  borderBottomWidth: PX_ZERO,
  borderLeftWidth: PX_ZERO,

  top: AUTO,
  right: AUTO,
  bottom: AUTO,
  left: AUTO,
  childTop: AUTO,
  childRight: AUTO,
  childBottom: AUTO,
  childLeft: AUTO,
  childBetween: AUTO,

  maxTop: null,
  maxRight: null,
  maxBottom: null,
  maxLeft: null,
  maxChildTop: null,
  maxChildRight: null,
  maxChildBottom: null,
  maxChildLeft: null,
  maxChildBetween: null,
  maxWidth: null,
  maxHeight: null,
  minTop: null,
  minRight: null,
  minBottom: null,
  minLeft: null,
  minChildTop: null,
  minChildRight: null,
  minChildBottom: null,
  minChildLeft: null,
  minChildBetween: null,
  minWidth: null,
  minHeight: null,

  display: 'column',
  flexBasis: PX_ZERO,
  width: STRETCH_ONE,
  height: STRETCH_ONE,
  position: 'parent-directed',
  visibility: true,
  zIndex: 0,

  fontFamily: null,
  fontSize: 16,
  fontStyle: { style: 'normal' },
  fontWeight: 400,
  fontWidth: 1,
  lineHeight: { unit: 'stretch', value: 1.2 },
  letterSpacing: null,
  wordSpacing: null,
  textAlign: 'start',

  opacity: 1,
  outlineOffset: PX_ZERO,
  outlineWidth: PX_ZERO,
  transform: IDENTITY,
};

export const DEFAULT_STYLE: Readonly<Style> = Object.freeze(DEFAULTS);

/** Fields a child copies from its parent when its style is created. */
export const INHERITED_FIELDS = [
  'color',
  'fontWidth',
  'fontSize',
  'fontStyle',
  'fontFamily',
  'fontWeight',
  'textShadow',
  'letterSpacing',
  'wordSpacing',
  'lineHeight',
] as const satisfies ReadonlyArray<keyof Style>;

export function defaultStyle(): Style {
  return { ...DEFAULT_STYLE };
}

function copyField<K extends keyof Style>(target: Style, source: Readonly<Style>, key: K): void {
  target[key] = source[key];
}

/** Starting point for a node: defaults, plus the inherited fields of `parent`. */
export function createStyle(parent: Readonly<Style> | null): Style {
  const style = defaultStyle();
  if (parent) {
    for (const key of INHERITED_FIELDS) copyField(style, parent, key);
  }
  return style;
}
