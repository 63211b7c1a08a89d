/**
 * Shorthand Grammars
 * A shorthand never produces a value of its own. It either expands to its
 * longhands (`expand`, used for `initial` and `inherit`) or parses a grammar
 * that yields longhand properties (`parse`).
 */

import type { TokenStream } from '../../syntax/index.js';
import { parseColor, type ColorValue, type FontStyle, type Length, type Unit } from '../../values/index.js';
import {
  exact,
  INHERIT,
  INITIAL,
  type ColorPropertyName,
  type LengthPropertyName,
  type Property,
  type PropertyValue,
  type ShorthandName,
  type UnitPropertyName,
} from '../property.js';
import { readNonNegativeLength, readNonNegativeUnit, readStrokeWidth, readUnit } from './leaf.js';
import { parseFontFamily, parseFontSize, parseFontStyle, parseFontWeight, parseFontWidth } from './simple.js';

export type CssWideKeyword = typeof INITIAL | typeof INHERIT;

export interface ShorthandGrammar {
  expand(value: CssWideKeyword): Property[];
  parse(stream: TokenStream): Property[];
}

type Quad<T> = readonly [T, T, T, T];

const colors = (names: readonly ColorPropertyName[], value: PropertyValue<ColorValue>): Property[] =>
  names.map((name) => ({ name, value }));

const lengths = (names: readonly LengthPropertyName[], value: PropertyValue<Length>): Property[] =>
  names.map((name) => ({ name, value }));

const units = (names: readonly UnitPropertyName[], value: PropertyValue<Unit>): Property[] =>
  names.map((name) => ({ name, value }));

// ---------- Quad values ----------

/** 1–4 values in top, right, bottom, left order, with the usual CSS repetition. */
function readQuad<T>(stream: TokenStream, read: (stream: TokenStream) => T): Quad<T> {
  const a = read(stream);
  if (stream.isExhausted()) return [a, a, a, a];
  const b = read(stream);
  if (stream.isExhausted()) return [a, b, a, b];
  const c = read(stream);
  if (stream.isExhausted()) return [a, b, c, b];
  const d = read(stream);
  stream.expectExhausted();
  return [a, b, c, d];
}

const BORDER_COLORS: Quad<ColorPropertyName> = [
  'border-top-color',
  'border-right-color',
  'border-bottom-color',
  'border-left-color',
];

const BORDER_WIDTHS: Quad<LengthPropertyName> = [
  'border-top-width',
  'border-right-width',
  'border-bottom-width',
  'border-left-width',
];

/** top-left, top-right, bottom-right, bottom-left */
const BORDER_RADII: Quad<LengthPropertyName> = [
  'border-top-left-radius',
  'border-top-right-radius',
  'border-bottom-right-radius',
  'border-bottom-left-radius',
];

const SPACE: Quad<UnitPropertyName> = ['top', 'right', 'bottom', 'left'];

const CHILD_SPACE: Quad<UnitPropertyName> = ['child-top', 'child-right', 'child-bottom', 'child-left'];

const colorQuad: ShorthandGrammar = {
  expand: (value) => colors(BORDER_COLORS, value),
  parse: (stream) => {
    const values = readQuad(stream, parseColor);
    return BORDER_COLORS.flatMap((name, i) => colors([name], exact(values[i])));
  },
};

function lengthQuad(names: Quad<LengthPropertyName>, read: (stream: TokenStream) => Length): ShorthandGrammar {
  return {
    expand: (value) => lengths(names, value),
    parse: (stream) => {
      const values = readQuad(stream, read);
      return names.flatMap((name, i) => lengths([name], exact(values[i])));
    },
  };
}

function unitQuad(names: Quad<UnitPropertyName>, read: (stream: TokenStream) => Unit): ShorthandGrammar {
  return {
    expand: (value) => units(names, value),
    parse: (stream) => {
      const values = readQuad(stream, read);
      return names.flatMap((name, i) => units([name], exact(values[i])));
    },
  };
}

// ---------- Strokes ----------

interface Stroke {
  color: ColorValue | undefined;
  width: Length | undefined;
}

const UNSUPPORTED_STYLES = new Set(['dotted', 'dashed', 'double', 'groove', 'ridge', 'inset', 'outset']);

/** An unordered mix of at most one color, one width and the style `solid`. */
function readStroke(stream: TokenStream): Stroke {
  const stroke: Stroke = { color: undefined, width: undefined };
  let solid = false;

  while (!stream.isExhausted()) {
    const color = stream.tryParseOrDefer(parseColor);
    if (color !== undefined) {
      if (stroke.color !== undefined) throw stream.error('syntax', 'Duplicate color');
      stroke.color = color;
      continue;
    }

    const width = stream.tryParse(readStrokeWidth);
    if (width !== undefined) {
      if (stroke.width !== undefined) throw stream.error('syntax', 'Duplicate width');
      stroke.width = width;
      continue;
    }

    const token = stream.next();
    if (token.type === 'ident') {
      const style = token.value.toLowerCase();
      if (style === 'solid') {
        if (solid) throw stream.error('syntax', 'Duplicate style');
        solid = true;
        continue;
      }
      if (UNSUPPORTED_STYLES.has(style)) {
        throw stream.error('unsupported-value', `Unsupported line style \`${token.value}\``);
      }
    }
    throw stream.unexpected(token);
  }

  return stroke;
}

function strokeGrammar(
  colorNames: readonly ColorPropertyName[],
  widthNames: readonly LengthPropertyName[],
): ShorthandGrammar {
  return {
    expand: (value) => [...colors(colorNames, value), ...lengths(widthNames, value)],
    parse: (stream) => {
      const { color, width } = readStroke(stream);
      return [
        ...(color === undefined ? [] : colors(colorNames, exact(color))),
        ...(width === undefined ? [] : lengths(widthNames, exact(width))),
      ];
    },
  };
}

// ---------- Font ----------

const font: ShorthandGrammar = {
  expand: (value) => [
    { name: 'font-family', value },
    { name: 'font-style', value },
    { name: 'font-weight', value },
    { name: 'font-width', value },
    { name: 'font-size', value },
    { name: 'line-height', value },
  ],
  parse: (stream) => {
    let style: PropertyValue<FontStyle> | undefined;
    let weight: PropertyValue<number> | undefined;
    let width: PropertyValue<number> | undefined;

    // Style, weight and width in any order, each at most once
    for (;;) {
      if (style === undefined) {
        style = stream.tryParse(parseFontStyle);
        if (style !== undefined) continue;
      }
      if (weight === undefined) {
        weight = stream.tryParse(parseFontWeight);
        if (weight !== undefined) continue;
      }
      if (width === undefined) {
        width = stream.tryParse(parseFontWidth);
        if (width !== undefined) continue;
      }
      break;
    }

    const size = parseFontSize(stream);

    let lineHeight: PropertyValue<Unit> = INITIAL;
    const slash = stream.peek();
    if (slash?.type === 'delim' && slash.value === '/') {
      stream.next();
      const normal = stream.tryParse((s) => {
        s.expectIdentMatching('normal');
        return true;
      });
      if (!normal) lineHeight = exact(readNonNegativeUnit(stream));
    }

    const family = parseFontFamily(stream);

    return [
      { name: 'font-style', value: style ?? INITIAL },
      { name: 'font-weight', value: weight ?? INITIAL },
      { name: 'font-width', value: width ?? INITIAL },
      { name: 'font-size', value: size },
      { name: 'line-height', value: lineHeight },
      { name: 'font-family', value: family },
    ];
  },
};

// ---------- Table ----------

export const SHORTHAND_GRAMMARS: ReadonlyMap<ShorthandName, ShorthandGrammar> = new Map<ShorthandName, ShorthandGrammar>([
  ['border', strokeGrammar(BORDER_COLORS, BORDER_WIDTHS)],
  ['border-top', strokeGrammar([BORDER_COLORS[0]], [BORDER_WIDTHS[0]])],
  ['border-right', strokeGrammar([BORDER_COLORS[1]], [BORDER_WIDTHS[1]])],
  ['border-bottom', strokeGrammar([BORDER_COLORS[2]], [BORDER_WIDTHS[2]])],
  ['border-left', strokeGrammar([BORDER_COLORS[3]], [BORDER_WIDTHS[3]])],
  ['border-color', colorQuad],
  ['border-width', lengthQuad(BORDER_WIDTHS, readStrokeWidth)],
  ['border-radius', lengthQuad(BORDER_RADII, readNonNegativeLength)],
  ['outline', strokeGrammar(['outline-color'], ['outline-width'])],
  ['space', unitQuad(SPACE, readUnit)],
  ['margin', unitQuad(SPACE, readUnit)],
  ['child-space', unitQuad(CHILD_SPACE, readNonNegativeUnit)],
  ['padding', unitQuad(CHILD_SPACE, readNonNegativeUnit)],
  ['font', font],
]);
