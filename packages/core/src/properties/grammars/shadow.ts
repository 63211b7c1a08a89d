/**
 * Shadow Lists
 * `box-shadow` and `text-shadow` share one reader: comma-separated components,
 * each an unordered mix of an optional color and 2–4 lengths (plus `inset`
 * for box shadows).
 */

import type { TokenStream } from '../../syntax/index.js';
import { parseColor, type BoxShadow, type ColorValue, type Length, type TextShadow } from '../../values/index.js';
import { exact, INITIAL, type PropertyValue } from '../property.js';
import { isKeywordExhausted, readLength } from './leaf.js';

interface ShadowParts {
  color: ColorValue | undefined;
  lengths: Length[];
  inset: boolean;
}

const ZERO: Length = { unit: 'px', value: 0 };

function readShadowParts(stream: TokenStream, allowInset: boolean): ShadowParts[] {
  const shadows: ShadowParts[] = [];
  let current: ShadowParts = { color: undefined, lengths: [], inset: false };

  const finish = () => {
    const { lengths } = current;
    if (lengths.length < 2) throw stream.error('syntax', 'A shadow needs at least two lengths');
    if (lengths.length > 2 && lengths[2].value < 0) {
      throw stream.error('invalid-value', 'Shadow blur must not be negative');
    }
    shadows.push(current);
    current = { color: undefined, lengths: [], inset: false };
  };

  while (!stream.isExhausted()) {
    const color = stream.tryParseOrDefer(parseColor);
    if (color !== undefined) {
      if (current.color !== undefined) throw stream.error('syntax', 'A shadow takes one color');
      current.color = color;
      continue;
    }

    const length = stream.tryParse(readLength);
    if (length !== undefined) {
      if (current.lengths.length === 4) throw stream.error('syntax', 'A shadow takes at most four lengths');
      current.lengths.push(length);
      continue;
    }

    const token = stream.next();
    if (token.type === 'comma') {
      finish();
    } else if (allowInset && token.type === 'ident' && token.value.toLowerCase() === 'inset') {
      if (current.inset) throw stream.error('syntax', 'Duplicate `inset`');
      current.inset = true;
    } else {
      throw stream.unexpected(token);
    }
  }

  finish();
  return shadows;
}

const colorOf = (color: ColorValue | undefined) => (color === undefined || color === 'currentcolor' ? null : color);

export function parseBoxShadow(stream: TokenStream): PropertyValue<readonly BoxShadow[]> {
  if (isKeywordExhausted(stream, 'none')) return INITIAL;

  return exact(
    readShadowParts(stream, true).map(({ color, lengths, inset }): BoxShadow => ({
      offsetX: lengths[0],
      offsetY: lengths[1],
      blur: lengths[2] ?? ZERO,
      spread: lengths[3] ?? ZERO,
      color: colorOf(color),
      inset,
    })),
  );
}

export function parseTextShadow(stream: TokenStream): PropertyValue<readonly TextShadow[]> {
  if (isKeywordExhausted(stream, 'none')) return INITIAL;

  const parts = readShadowParts(stream, false);
  if (parts.some((part) => part.lengths.length > 3)) {
    throw stream.error('syntax', 'text-shadow does not take a spread radius');
  }
  return exact(
    parts.map(({ color, lengths }): TextShadow => ({
      offsetX: lengths[0],
      offsetY: lengths[1],
      blur: lengths[2] ?? ZERO,
      color: colorOf(color),
    })),
  );
}
