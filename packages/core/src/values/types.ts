// Concrete value types carried by properties and styles

export type Length = { unit: 'px'; value: number } | { unit: 'em'; value: number };

/**
 * A size or offset. `percent` holds a fraction (50% is 0.5); `stretch` is a
 * flex weight written as `2s` or a bare number.
 */
export type Unit =
  | { unit: 'auto' }
  | { unit: 'px'; value: number }
  | { unit: 'em'; value: number }
  | { unit: 'percent'; value: number }
  | { unit: 'stretch'; value: number };

/** An sRGB color with 8-bit channels, alpha included. */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type ColorValue = 'currentcolor' | Rgba;

/** 2×3 affine matrix `[a, b, c, d, e, f]`, mapping (x, y) to (ax + cy + e, bx + dy + f). */
export type Affine = readonly [number, number, number, number, number, number];

export type Direction = 'row' | 'row-reverse' | 'column' | 'column-reverse';

export type Position = 'parent-directed' | 'self-directed' | 'fixed';

export type TextAlign = 'start' | 'end' | 'left' | 'right' | 'center' | 'justify';

/** `oblique` carries an optional slant angle in degrees. */
export type FontStyle = { style: 'normal' } | { style: 'italic' } | { style: 'oblique'; angle?: number };

export interface BoxShadow {
  offsetX: Length;
  offsetY: Length;
  blur: Length;
  spread: Length;
  /** `null` means currentcolor */
  color: Rgba | null;
  inset: boolean;
}

export interface TextShadow {
  offsetX: Length;
  offsetY: Length;
  blur: Length;
  /** `null` means currentcolor */
  color: Rgba | null;
}

export type SideOrCorner =
  | 'to top'
  | 'to right'
  | 'to bottom'
  | 'to left'
  | 'to top right'
  | 'to top left'
  | 'to bottom right'
  | 'to bottom left';

export type GradientAngle = { kind: 'side'; side: SideOrCorner } | { kind: 'angle'; radians: number };

export const COLOR_SPACES = [
  'srgb',
  'srgb-linear',
  'display-p3',
  'a98-rgb',
  'prophoto-rgb',
  'rec2020',
  'lab',
  'lch',
  'hsl',
  'hwb',
  'oklab',
  'oklch',
  'xyz-d50',
  'xyz-d65',
  'acescg',
  'aces2065-1',
] as const;

export type ColorSpace = (typeof COLOR_SPACES)[number];

export type HueDirection = 'shorter' | 'longer' | 'increasing' | 'decreasing';

export type GradientStop = readonly [position: number, color: ColorValue];

export interface LinearGradient {
  angle: GradientAngle;
  stops: readonly GradientStop[];
  colorSpace: ColorSpace;
  hueDirection: HueDirection;
}
