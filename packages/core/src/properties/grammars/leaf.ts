// Single-token readers shared by the property grammars

import type { TokenStream } from '../../syntax/index.js';
import { degreesToRadians, type Length, type Unit } from '../../values/index.js';

/** True (and consumed) when the whole remaining input is exactly `keyword`. */
export function isKeywordExhausted(stream: TokenStream, keyword: string): boolean {
  const matched = stream.tryParse((s) => {
    s.expectIdentMatching(keyword);
    s.expectExhausted();
    return true;
  });
  return matched === true;
}

export function optionalComma(stream: TokenStream): void {
  stream.tryParse((s) => s.expectComma());
}

export function readNumber(stream: TokenStream): number {
  const token = stream.next();
  if (token.type === 'number') return token.value;
  throw stream.unexpected(token);
}

export function readInteger(stream: TokenStream): number {
  const token = stream.next();
  if (token.type === 'number' && token.isInteger) return token.value;
  throw stream.unexpected(token);
}

/** `px` or `em`; a bare `0` is `0px`. */
export function readLength(stream: TokenStream): Length {
  const token = stream.next();
  if (token.type === 'dimension') {
    const unit = token.unit.toLowerCase();
    if (unit === 'px' || unit === 'em') return { unit, value: token.value };
  } else if (token.type === 'number' && token.value === 0) {
    return { unit: 'px', value: 0 };
  }
  throw stream.unexpected(token);
}

export function readNonNegativeLength(stream: TokenStream): Length {
  const length = readLength(stream);
  if (length.value < 0) {
    throw stream.error('invalid-value', 'Length must not be negative');
  }
  return length;
}

const STROKE_WIDTHS = new Map([
  ['thin', 2],
  ['medium', 4],
  ['thick', 6],
]);

/** A non-negative length or one of `thin`, `medium`, `thick`. */
export function readStrokeWidth(stream: TokenStream): Length {
  const keyword = stream.tryParse((s) => s.expectIdent().toLowerCase());
  if (keyword !== undefined) {
    const px = STROKE_WIDTHS.get(keyword);
    if (px === undefined) throw stream.error('syntax', `Unknown width \`${keyword}\``);
    return { unit: 'px', value: px };
  }
  return readNonNegativeLength(stream);
}

/** Angle in radians. A bare `0` is accepted; other unitless numbers are not. */
export function readAngle(stream: TokenStream): number {
  const token = stream.next();
  if (token.type === 'number' && token.value === 0) return 0;
  if (token.type === 'dimension') {
    switch (token.unit.toLowerCase()) {
      case 'rad':
        return token.value;
      case 'deg':
        return degreesToRadians(token.value);
      case 'grad':
        return degreesToRadians(token.value * 0.9);
      case 'turn':
        return token.value * 2 * Math.PI;
      default:
        throw stream.error('unsupported-value', `Unsupported angle unit \`${token.unit}\``);
    }
  }
  throw stream.unexpected(token);
}

export function readUnit(stream: TokenStream): Unit {
  const token = stream.next();
  switch (token.type) {
    case 'number':
      return { unit: 'stretch', value: token.value };
    case 'percentage':
      return { unit: 'percent', value: token.unitValue };
    case 'dimension':
      switch (token.unit.toLowerCase()) {
        case 's':
          return { unit: 'stretch', value: token.value };
        case 'px':
          return { unit: 'px', value: token.value };
        case 'em':
          return { unit: 'em', value: token.value };
      }
      break;
    case 'ident':
      if (token.value.toLowerCase() === 'auto') return { unit: 'auto' };
      break;
  }
  throw stream.unexpected(token);
}

export function readNonNegativeUnit(stream: TokenStream): Unit {
  const unit = readUnit(stream);
  if (unit.unit !== 'auto' && unit.value < 0) {
    throw stream.error('invalid-value', 'Value must not be negative');
  }
  return unit;
}
