/**
 * Keyword and number grammars for the single-valued properties.
 */

import type { TokenStream } from '../../syntax/index.js';
import type { Direction, FontStyle, Position, TextAlign } from '../../values/index.js';
import { exact, type PropertyValue } from '../property.js';

/** Read one identifier and look it up (case-insensitively) in `table`. */
function keyword<T>(stream: TokenStream, table: ReadonlyMap<string, T>): T {
  const token = stream.next();
  if (token.type === 'ident') {
    const value = table.get(token.value.toLowerCase());
    if (value !== undefined) return value;
  }
  throw stream.unexpected(token);
}

const DISPLAY = new Map<string, Direction | 'none'>([
  ['row', 'row'],
  ['row-reverse', 'row-reverse'],
  ['column', 'column'],
  ['column-reverse', 'column-reverse'],
  ['none', 'none'],
]);

export function parseDisplay(stream: TokenStream): PropertyValue<Direction | null> {
  const display = keyword(stream, DISPLAY);
  return exact(display === 'none' ? null : display);
}

const POSITIONS = new Map<string, Position>([
  ['parent-directed', 'parent-directed'],
  ['self-directed', 'self-directed'],
  ['fixed', 'fixed'],
]);

export function parsePosition(stream: TokenStream): PropertyValue<Position> {
  return exact(keyword(stream, POSITIONS));
}

const TEXT_ALIGN = new Map<string, TextAlign>([
  ['start', 'start'],
  ['end', 'end'],
  ['left', 'left'],
  ['right', 'right'],
  ['center', 'center'],
  ['justify', 'justify'],
]);

export function parseTextAlign(stream: TokenStream): PropertyValue<TextAlign> {
  return exact(keyword(stream, TEXT_ALIGN));
}

export function parseOpacity(stream: TokenStream): PropertyValue<number> {
  const token = stream.next();
  const clamp = (v: number) => Math.min(1, Math.max(0, v));
  if (token.type === 'number') return exact(clamp(token.value));
  if (token.type === 'percentage') return exact(clamp(token.unitValue));
  throw stream.unexpected(token);
}

export function parseZIndex(stream: TokenStream): PropertyValue<number> {
  const token = stream.next();
  if (token.type === 'number' && token.isInteger) return exact(token.value);
  throw stream.unexpected(token);
}

// ---------- Fonts ----------

export function parseFontSize(stream: TokenStream): PropertyValue<number> {
  const token = stream.next();
  if (token.type === 'number' || (token.type === 'dimension' && token.unit.toLowerCase() === 'px')) {
    if (token.value < 0) throw stream.error('invalid-value', 'Font size must not be negative');
    return exact(token.value);
  }
  if (token.type === 'dimension') {
    throw stream.error('unsupported-value', `Unsupported font size unit \`${token.unit}\``);
  }
  throw stream.unexpected(token);
}

export function parseFontStyle(stream: TokenStream): PropertyValue<FontStyle> {
  const token = stream.next();
  if (token.type === 'ident') {
    switch (token.value.toLowerCase()) {
      case 'normal':
        return exact<FontStyle>({ style: 'normal' });
      case 'italic':
        return exact<FontStyle>({ style: 'italic' });
      case 'oblique': {
        const angle = stream.tryParse((s) => {
          const next = s.next();
          if (next.type === 'dimension' && next.unit.toLowerCase() === 'deg') return next.value;
          if (next.type === 'dimension') throw s.error('unsupported-value', 'Oblique angle must be in degrees');
          throw s.unexpected(next);
        });
        return exact<FontStyle>(angle === undefined ? { style: 'oblique' } : { style: 'oblique', angle });
      }
    }
  }
  throw stream.unexpected(token);
}

export function parseFontWeight(stream: TokenStream): PropertyValue<number> {
  const token = stream.next();
  if (token.type === 'number') return exact(Math.min(1000, Math.max(1, token.value)));
  if (token.type === 'ident') {
    switch (token.value.toLowerCase()) {
      case 'normal':
        return exact(400);
      case 'bold':
        return exact(700);
      case 'bolder':
      case 'lighter':
        throw stream.error('unsupported-value', `Unsupported font weight \`${token.value}\``);
    }
  }
  throw stream.unexpected(token);
}

const FONT_WIDTHS = new Map<string, number>([
  ['ultra-condensed', 0.5],
  ['extra-condensed', 0.625],
  ['condensed', 0.75],
  ['semi-condensed', 0.875],
  ['normal', 1],
  ['semi-expanded', 1.125],
  ['expanded', 1.25],
  ['extra-expanded', 1.5],
  ['ultra-expanded', 2],
]);

export function parseFontWidth(stream: TokenStream): PropertyValue<number> {
  const token = stream.next();
  if (token.type === 'percentage') {
    if (token.unitValue < 0) throw stream.error('invalid-value', 'Font width must not be negative');
    return exact(token.unitValue);
  }
  if (token.type === 'ident') {
    const width = FONT_WIDTHS.get(token.value.toLowerCase());
    if (width !== undefined) return exact(width);
  }
  throw stream.unexpected(token);
}

/**
 * One or more comma-separated families, each a quoted string or a run of
 * identifiers. The value is the trimmed source text.
 */
export function parseFontFamily(stream: TokenStream): PropertyValue<string> {
  stream.skipWhitespace();
  const start = stream.position();
  let families = 0;

  while (!stream.isExhausted()) {
    if (families > 0) {
      stream.expectComma();
      if (stream.isExhausted()) throw stream.error('syntax', 'Expected a font family after `,`');
    }

    const token = stream.next();
    if (token.type === 'ident') {
      // Multi-word family name
      while (stream.peek()?.type === 'ident') stream.next();
      const after = stream.peek();
      if (after && after.type !== 'comma') throw stream.unexpected(stream.next());
    } else if (token.type !== 'string') {
      throw stream.unexpected(token);
    }
    families++;
  }

  if (families === 0) throw stream.error('syntax', 'Expected a font family');
  return exact(stream.sliceFrom(start).trim());
}
