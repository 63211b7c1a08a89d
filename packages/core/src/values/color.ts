/**
 * Color Parsing
 * Reads a CSS color from a token stream: hex notation, named colors,
 * `transparent`, `currentcolor`, the functional notations and `color()`.
 * Every color is converted to 8-bit sRGB, clipping out-of-gamut channels.
 */

import type { Token, TokenStream } from '../syntax/index.js';
import { hslToSrgb, hwbToSrgb, rgbaFromSrgb, toSrgb, type Channels } from './color-space.js';
import type { ColorSpace, ColorValue, Rgba } from './types.js';
import namedColorTable from './named-colors.json' with { type: 'json' };

const NAMED_COLORS: ReadonlyMap<string, string> = new Map(Object.entries(namedColorTable));

/**
 * Parse hex digits (without `#`) into a color. Accepts 3, 4, 6 or 8 digits.
 */
export function hexToRgba(hex: string): Rgba | null {
  if (!/^[0-9a-f]+$/i.test(hex)) return null;

  // Handle 3 and 4 digit shorthand
  if (hex.length === 3 || hex.length === 4) {
    const [r, g, b, a = 255] = hex.split('').map((c) => parseInt(c + c, 16));
    return { r, g, b, a };
  }

  if (hex.length === 6 || hex.length === 8) {
    const r = parseInt(hex.substring(0, 2), 16);
    const g = parseInt(hex.substring(2, 4), 16);
    const b = parseInt(hex.substring(4, 6), 16);
    const a = hex.length === 8 ? parseInt(hex.substring(6, 8), 16) : 255;
    return { r, g, b, a };
  }

  return null;
}

export function namedColor(name: string): Rgba | null {
  const lower = name.toLowerCase();
  if (lower === 'transparent') return { r: 0, g: 0, b: 0, a: 0 };
  const hex = NAMED_COLORS.get(lower);
  return hex === undefined ? null : hexToRgba(hex);
}

// ---------- Functional notation ----------

type Component =
  | { kind: 'number'; value: number }
  | { kind: 'percentage'; value: number }
  | { kind: 'angle'; degrees: number }
  | { kind: 'none' };

interface ColorArguments {
  channels: Component[];
  alpha: Component | null;
}

const DEGREES_PER_UNIT = new Map([
  ['deg', 1],
  ['rad', 180 / Math.PI],
  ['grad', 0.9],
  ['turn', 360],
]);

function readComponent(stream: TokenStream, token: Token): Component {
  switch (token.type) {
    case 'number':
      return { kind: 'number', value: token.value };
    case 'percentage':
      return { kind: 'percentage', value: token.unitValue };
    case 'dimension': {
      const factor = DEGREES_PER_UNIT.get(token.unit.toLowerCase());
      if (factor !== undefined) return { kind: 'angle', degrees: token.value * factor };
      break;
    }
    case 'ident':
      if (token.value.toLowerCase() === 'none') return { kind: 'none' };
      break;
  }
  throw stream.unexpected(token);
}

/** Reads `a, b, c[, alpha]` or `a b c [/ alpha]`. */
function readArguments(stream: TokenStream): ColorArguments {
  const channels = [readComponent(stream, stream.next())];
  const legacy = stream.peek()?.type === 'comma';

  while (channels.length < 3) {
    if (legacy) stream.expectComma();
    channels.push(readComponent(stream, stream.next()));
  }

  if (stream.isExhausted()) return { channels, alpha: null };

  const separator = stream.next();
  const isSeparator = legacy ? separator.type === 'comma' : separator.type === 'delim' && separator.value === '/';
  if (!isSeparator) throw stream.unexpected(separator);
  return { channels, alpha: readComponent(stream, stream.next()) };
}

/** Number, percentage (scaled by `percentScale`) or `none` as 0. */
function scalar(stream: TokenStream, component: Component, percentScale: number): number {
  switch (component.kind) {
    case 'number':
      return component.value;
    case 'percentage':
      return component.value * percentScale;
    case 'none':
      return 0;
    case 'angle':
      throw stream.error('syntax', 'Unexpected angle in color');
  }
}

function hue(stream: TokenStream, component: Component): number {
  switch (component.kind) {
    case 'number':
      return component.value;
    case 'angle':
      return component.degrees;
    case 'none':
      return 0;
    case 'percentage':
      throw stream.error('syntax', 'Unexpected percentage for hue');
  }
}

function alphaOf(stream: TokenStream, args: ColorArguments): number {
  if (!args.alpha) return 1;
  return Math.min(1, Math.max(0, scalar(stream, args.alpha, 1)));
}

const PREDEFINED_SPACES = new Map<string, ColorSpace>([
  ['srgb', 'srgb'],
  ['srgb-linear', 'srgb-linear'],
  ['display-p3', 'display-p3'],
  ['a98-rgb', 'a98-rgb'],
  ['prophoto-rgb', 'prophoto-rgb'],
  ['rec2020', 'rec2020'],
  ['xyz', 'xyz-d65'],
  ['xyz-d50', 'xyz-d50'],
  ['xyz-d65', 'xyz-d65'],
]);

function readPredefined(stream: TokenStream): Rgba {
  const name = stream.expectIdent().toLowerCase();
  const space = PREDEFINED_SPACES.get(name);
  if (!space) {
    throw stream.error('unsupported-value', `Unsupported color space \`${name}\``);
  }
  const args = readArguments(stream);
  const channels: Channels = [
    scalar(stream, args.channels[0], 1),
    scalar(stream, args.channels[1], 1),
    scalar(stream, args.channels[2], 1),
  ];
  return rgbaFromSrgb(toSrgb(space, channels), alphaOf(stream, args));
}

function readFunction(stream: TokenStream, name: string): Rgba {
  if (name === 'color') return readPredefined(stream);

  const args = readArguments(stream);
  const [c0, c1, c2] = args.channels;
  const alpha = alphaOf(stream, args);

  switch (name) {
    case 'rgb':
    case 'rgba': {
      const channel = (c: Component) => scalar(stream, c, 255) / 255;
      return rgbaFromSrgb([channel(c0), channel(c1), channel(c2)], alpha);
    }
    case 'hsl':
    case 'hsla': {
      // Bare numbers are percentages in the modern syntax
      const fraction = (c: Component) => Math.max(0, scalar(stream, c, 100) / 100);
      return rgbaFromSrgb(hslToSrgb([hue(stream, c0), fraction(c1), fraction(c2)]), alpha);
    }
    case 'hwb': {
      const fraction = (c: Component) => Math.max(0, scalar(stream, c, 100) / 100);
      return rgbaFromSrgb(hwbToSrgb([hue(stream, c0), fraction(c1), fraction(c2)]), alpha);
    }
    case 'lab':
      return rgbaFromSrgb(
        toSrgb('lab', [Math.max(0, scalar(stream, c0, 100)), scalar(stream, c1, 125), scalar(stream, c2, 125)]),
        alpha,
      );
    case 'lch':
      return rgbaFromSrgb(
        toSrgb('lch', [Math.max(0, scalar(stream, c0, 100)), Math.max(0, scalar(stream, c1, 150)), hue(stream, c2)]),
        alpha,
      );
    case 'oklab':
      return rgbaFromSrgb(
        toSrgb('oklab', [Math.max(0, scalar(stream, c0, 1)), scalar(stream, c1, 0.4), scalar(stream, c2, 0.4)]),
        alpha,
      );
    case 'oklch':
      return rgbaFromSrgb(
        toSrgb('oklch', [Math.max(0, scalar(stream, c0, 1)), Math.max(0, scalar(stream, c1, 0.4)), hue(stream, c2)]),
        alpha,
      );
    default:
      throw stream.error('syntax', `Unknown color function \`${name}()\``);
  }
}

const COLOR_FUNCTIONS = new Set(['rgb', 'rgba', 'hsl', 'hsla', 'hwb', 'lab', 'lch', 'oklab', 'oklch', 'color']);

/**
 * Read one color. A `var(` token raises the var-function signal.
 */
export function parseColor(stream: TokenStream): ColorValue {
  const token = stream.next();

  if (token.type === 'hash') {
    const color = hexToRgba(token.value);
    if (color) return color;
    throw stream.unexpected(token);
  }

  if (token.type === 'ident') {
    if (token.value.toLowerCase() === 'currentcolor') return 'currentcolor';
    const color = namedColor(token.value);
    if (color) return color;
    throw stream.unexpected(token);
  }

  if (token.type === 'function') {
    const name = token.name.toLowerCase();
    if (COLOR_FUNCTIONS.has(name)) {
      return stream.parseNestedBlock((inner) => readFunction(inner, name));
    }
  }

  throw stream.unexpected(token);
}
