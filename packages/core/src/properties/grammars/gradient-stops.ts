/**
 * Gradient Stop Normalizer
 * Turns the stop list as written (colors with optional positions, and bare
 * percentage hints) into a monotonic list of `[position, color]` stops.
 *
 * - The first and last colors default to 0 and 1.
 * - A position smaller than an earlier one is raised to it.
 * - Colors without a position are spaced evenly between their neighbours.
 * - A hint becomes a stop whose color is interpolated between the colors
 *   around it, in the gradient's color space.
 */

import { interpolate, type ColorSpace, type ColorValue, type GradientStop, type HueDirection } from '../../values/index.js';

export type StopPiece =
  | { kind: 'color'; color: ColorValue; position: number | null }
  | { kind: 'hint'; position: number };

export type NormalizeResult = { ok: true; stops: GradientStop[] } | { ok: false; reason: string };

/** Single-precision epsilon; segments shorter than this use the midpoint. */
const EPSILON = 1.1920929e-7;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

function hintColor(
  position: number,
  prev: GradientStop,
  next: GradientStop,
  space: ColorSpace,
  hue: HueDirection,
): ColorValue {
  const [prevPosition, prevColor] = prev;
  const [nextPosition, nextColor] = next;
  if (prevColor === 'currentcolor' || nextColor === 'currentcolor') return 'currentcolor';

  const span = nextPosition - prevPosition;
  const t = Math.abs(span) <= EPSILON ? 0.5 : clamp((position - prevPosition) / span, 0, 1);
  return interpolate(prevColor, nextColor, space, hue, t);
}

export function normalizeColorStops(
  pieces: readonly StopPiece[],
  space: ColorSpace,
  hue: HueDirection,
): NormalizeResult {
  const colorIndices: number[] = [];
  pieces.forEach((piece, index) => {
    if (piece.kind === 'color') colorIndices.push(index);
  });

  if (colorIndices.length < 2) return { ok: false, reason: 'A gradient needs at least two color stops' };
  if (pieces[0].kind === 'hint') return { ok: false, reason: 'A transition hint must follow a color stop' };
  if (pieces[pieces.length - 1].kind === 'hint') {
    return { ok: false, reason: 'A transition hint must be followed by a color stop' };
  }
  for (let i = 1; i < pieces.length; i++) {
    if (pieces[i].kind === 'hint' && pieces[i - 1].kind === 'hint') {
      return { ok: false, reason: 'Two transition hints in a row' };
    }
  }

  // Resolve every color position, one segment between known positions at a time
  const positions: number[] = new Array<number>(colorIndices.length).fill(0);
  const colorAt = (k: number) => {
    const piece = pieces[colorIndices[k]];
    return piece.kind === 'color' ? piece : null;
  };
  const last = colorIndices.length - 1;

  let lastKnown = 0;
  let lastPosition = colorAt(0)?.position ?? 0;
  positions[0] = lastPosition;

  for (let k = 1; k <= last; k++) {
    const declared = colorAt(k)?.position ?? null;
    const position = declared ?? (k === last ? 1 : null);
    if (position === null) continue;

    const end = Math.max(position, lastPosition);
    const step = (end - lastPosition) / (k - lastKnown);
    for (let j = lastKnown + 1; j < k; j++) {
      positions[j] = lastPosition + step * (j - lastKnown);
    }
    positions[k] = end;
    lastPosition = end;
    lastKnown = k;
  }

  // Emit colors, turning each hint into a stop between its neighbours
  const stops: GradientStop[] = [];
  let colorCount = 0;
  for (const piece of pieces) {
    if (piece.kind === 'color') {
      stops.push([positions[colorCount], piece.color]);
      colorCount++;
      continue;
    }
    const prev = stops[stops.length - 1];
    const nextPiece = colorAt(colorCount);
    if (!nextPiece) return { ok: false, reason: 'A transition hint must be followed by a color stop' };
    const next: GradientStop = [positions[colorCount], nextPiece.color];
    const position = clamp(piece.position, prev[0], next[0]);
    stops.push([position, hintColor(position, prev, next, space, hue)]);
  }

  return { ok: true, stops };
}
