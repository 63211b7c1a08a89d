// Serializers for primitive values. Output parses back to the same value.

import { shiftDecimal } from '../syntax/decimal.js';
import { degreesToRadians, isIdentity } from './affine.js';
import type { Affine, ColorValue, FontStyle, Length, Rgba, Unit } from './types.js';

/** Shortest decimal that reads back as `value`, never in exponent form. */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : shiftDecimal(String(value), 0);
}

/** A fraction as a percentage. The digits are shifted, not multiplied, so `50%` reads back to the same fraction. */
export function formatPercent(fraction: number): string {
  return Object.is(fraction, -0) ? '0%' : `${shiftDecimal(String(fraction), 2)}%`;
}

export function formatLength(length: Length): string {
  return `${formatNumber(length.value)}${length.unit}`;
}

export function formatUnit(unit: Unit): string {
  switch (unit.unit) {
    case 'auto':
      return 'auto';
    case 'px':
    case 'em':
      return `${formatNumber(unit.value)}${unit.unit}`;
    case 'percent':
      return formatPercent(unit.value);
    case 'stretch':
      return `${formatNumber(unit.value)}s`;
  }
}

const hexByte = (v: number) => v.toString(16).padStart(2, '0');

export function formatRgba(color: Rgba): string {
  const rgb = `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
  return color.a === 255 ? rgb : `${rgb}${hexByte(color.a)}`;
}

export function formatColor(color: ColorValue): string {
  return color === 'currentcolor' ? 'currentcolor' : formatRgba(color);
}

/** Degrees at the fewest digits that convert back to `radians`; radians when none do. */
export function formatAngle(radians: number): string {
  const degrees = (radians * 180) / Math.PI;
  for (let precision = 1; precision <= 17; precision++) {
    const candidate = Number(degrees.toPrecision(precision));
    if (degreesToRadians(candidate) === radians) return `${formatNumber(candidate)}deg`;
  }
  return `${formatNumber(radians)}rad`;
}

export function formatAffine(matrix: Affine): string {
  if (isIdentity(matrix)) return 'none';
  return `matrix(${matrix.map(formatNumber).join(', ')})`;
}

export function formatFontStyle(fontStyle: FontStyle): string {
  if (fontStyle.style === 'oblique' && fontStyle.angle !== undefined) {
    return `oblique ${formatNumber(fontStyle.angle)}deg`;
  }
  return fontStyle.style;
}
