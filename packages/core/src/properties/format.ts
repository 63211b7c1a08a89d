// Serializes properties back to declaration text that parses to the same value

import {
  formatAffine,
  formatAngle,
  formatColor,
  formatFontStyle,
  formatLength,
  formatNumber,
  formatPercent,
  formatUnit,
  type BoxShadow,
  type Length,
  type LinearGradient,
  type Rgba,
  type TextShadow,
} from '../values/index.js';
import {
  isColorProperty,
  isLengthProperty,
  isLimitProperty,
  isNumberProperty,
  isShorthandProperty,
  isUnitProperty,
  type Property,
  type PropertyValue,
} from './property.js';

export function formatValue<T>(value: PropertyValue<T>, format: (value: T) => string): string {
  switch (value.kind) {
    case 'initial':
      return 'initial';
    case 'inherit':
      return 'inherit';
    case 'exact':
      return format(value.value);
    case 'deferred':
      return value.raw;
  }
}

export function formatGradient(gradient: LinearGradient): string {
  const prelude: string[] = [];
  prelude.push(gradient.angle.kind === 'side' ? gradient.angle.side : formatAngle(gradient.angle.radians));
  if (gradient.colorSpace !== 'srgb' || gradient.hueDirection !== 'shorter') {
    prelude.push(`in ${gradient.colorSpace} ${gradient.hueDirection} hue`);
  }
  const stops = gradient.stops.map(([position, color]) => `${formatColor(color)} ${formatPercent(position)}`);
  return `linear-gradient(${[prelude.join(' '), ...stops].join(', ')})`;
}

function formatShadowParts(lengths: Length[], color: Rgba | null): string {
  const parts = lengths.map(formatLength);
  if (color) parts.push(formatColor(color));
  return parts.join(' ');
}

export const formatBoxShadow = (shadow: BoxShadow) => {
  const geometry = formatShadowParts([shadow.offsetX, shadow.offsetY, shadow.blur, shadow.spread], shadow.color);
  return shadow.inset ? `inset ${geometry}` : geometry;
};

export const formatTextShadow = (shadow: TextShadow) =>
  formatShadowParts([shadow.offsetX, shadow.offsetY, shadow.blur], shadow.color);

/** The value text of a property, as it would appear after the colon. */
export function formatPropertyValue(property: Property): string {
  if (isShorthandProperty(property)) return formatValue(property.value, () => '');
  if (isColorProperty(property)) return formatValue(property.value, formatColor);
  if (isLengthProperty(property) || isLimitProperty(property)) return formatValue(property.value, formatLength);
  if (isUnitProperty(property)) return formatValue(property.value, formatUnit);
  if (isNumberProperty(property)) {
    return formatValue(property.value, property.name === 'font-width' ? formatPercent : formatNumber);
  }

  switch (property.name) {
    case 'background-image':
      return formatValue(property.value, (gradients) => gradients.map(formatGradient).join(', '));
    case 'box-shadow':
      return formatValue(property.value, (shadows) => shadows.map(formatBoxShadow).join(', '));
    case 'text-shadow':
      return formatValue(property.value, (shadows) => shadows.map(formatTextShadow).join(', '));
    case 'display':
      return formatValue(property.value, (direction) => direction ?? 'none');
    case 'font-family':
      return formatValue(property.value, (family) => family);
    case 'font-style':
      return formatValue(property.value, formatFontStyle);
    case 'position':
    case 'text-align':
      return formatValue<string>(property.value, (keyword) => keyword);
    case 'transform':
      return formatValue(property.value, formatAffine);
  }
}

export function formatProperty(property: Property): string {
  return `${property.name}: ${formatPropertyValue(property)}`;
}
