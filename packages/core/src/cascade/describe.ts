/**
 * Describe
 * Renders a computed Style as `property: value` pairs, for inspection tools.
 */

import {
  COLOR_PROPERTIES,
  formatBoxShadow,
  formatGradient,
  formatTextShadow,
  LENGTH_PROPERTIES,
  LIMIT_PROPERTIES,
  NUMBER_PROPERTIES,
  UNIT_PROPERTIES,
} from '../properties/index.js';
import { formatAffine, formatFontStyle, formatLength, formatNumber, formatRgba, formatUnit } from '../values/index.js';
import { STYLE_FIELDS, type LonghandName } from './apply.js';
import { DEFAULT_STYLE, type Style } from './style.js';

export interface DescribeOptions {
  /** Include fields still at their default value */
  all?: boolean;
}

function describeAll(style: Readonly<Style>): Array<[LonghandName, string]> {
  const entries: Array<[LonghandName, string]> = [];

  for (const name of COLOR_PROPERTIES) {
    const color = style[STYLE_FIELDS[name]];
    // A null selection color follows the text color
    entries.push([name, color ? formatRgba(color) : 'currentcolor']);
  }
  for (const name of LENGTH_PROPERTIES) entries.push([name, formatLength(style[STYLE_FIELDS[name]])]);
  for (const name of LIMIT_PROPERTIES) {
    const limit = style[STYLE_FIELDS[name]];
    entries.push([name, limit ? formatLength(limit) : 'none']);
  }
  for (const name of UNIT_PROPERTIES) {
    const unit = style[STYLE_FIELDS[name]];
    entries.push([name, unit ? formatUnit(unit) : 'auto']);
  }
  for (const name of NUMBER_PROPERTIES) {
    const value = style[STYLE_FIELDS[name]];
    entries.push([name, name === 'font-width' ? formatUnit({ unit: 'percent', value }) : formatNumber(value)]);
  }

  entries.push(
    ['background-image', style.backgroundImage ? style.backgroundImage.map(formatGradient).join(', ') : 'none'],
    ['box-shadow', style.boxShadow ? style.boxShadow.map(formatBoxShadow).join(', ') : 'none'],
    ['text-shadow', style.textShadow ? style.textShadow.map(formatTextShadow).join(', ') : 'none'],
    ['display', style.display ?? 'none'],
    ['font-family', style.fontFamily ?? 'none'],
    ['font-style', formatFontStyle(style.fontStyle)],
    ['position', style.position],
    ['text-align', style.textAlign],
    ['transform', formatAffine(style.transform)],
  );
  return entries;
}

const DEFAULT_ENTRIES = new Map(describeAll(DEFAULT_STYLE));

/** Every longhand and its value, or only those that differ from the defaults. */
export function describeStyle(style: Readonly<Style>, options: DescribeOptions = {}): Array<[LonghandName, string]> {
  const entries = describeAll(style);
  if (options.all) return entries;
  return entries.filter(([name, value]) => DEFAULT_ENTRIES.get(name) !== value);
}
