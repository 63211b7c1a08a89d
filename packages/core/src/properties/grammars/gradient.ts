/**
 * background-image: `none` or a comma-separated list of `linear-gradient()`s.
 *
 * linear-gradient( [<angle> | to <side> [<side>]]? [in <space> [<hue> hue]?]? , <stops> )
 *
 * Stops interpolate in sRGB unless a color space is given.
 */

import type { TokenStream } from '../../syntax/index.js';
import {
  parseColor,
  type ColorSpace,
  type GradientAngle,
  type HueDirection,
  type LinearGradient,
  type SideOrCorner,
} from '../../values/index.js';
import { exact, INITIAL, type PropertyValue } from '../property.js';
import { normalizeColorStops, type StopPiece } from './gradient-stops.js';
import { isKeywordExhausted, readAngle } from './leaf.js';

const TOP = 1;
const RIGHT = 2;
const BOTTOM = 4;
const LEFT = 8;

const SIDE_BITS = new Map([
  ['top', TOP],
  ['right', RIGHT],
  ['bottom', BOTTOM],
  ['left', LEFT],
]);

const SIDES_BY_MASK = new Map<number, SideOrCorner>([
  [TOP, 'to top'],
  [RIGHT, 'to right'],
  [BOTTOM, 'to bottom'],
  [LEFT, 'to left'],
  [TOP | RIGHT, 'to top right'],
  [TOP | LEFT, 'to top left'],
  [BOTTOM | RIGHT, 'to bottom right'],
  [BOTTOM | LEFT, 'to bottom left'],
]);

function readSide(stream: TokenStream): number {
  const side = SIDE_BITS.get(stream.expectIdent().toLowerCase());
  if (side === undefined) throw stream.error('syntax', 'Expected top, right, bottom or left');
  return side;
}

function readDirection(stream: TokenStream): GradientAngle {
  const radians = stream.tryParseOrDefer(readAngle);
  if (radians !== undefined) return { kind: 'angle', radians };

  stream.expectIdentMatching('to');
  const first = readSide(stream);
  const second = stream.tryParseOrDefer(readSide) ?? 0;
  if (first === second) throw stream.error('syntax', 'Duplicate gradient side');

  const side = SIDES_BY_MASK.get(first | second);
  if (side === undefined) throw stream.error('syntax', 'Opposite gradient sides');
  return { kind: 'side', side };
}

const SPACES = new Map<string, ColorSpace>([
  ['srgb', 'srgb'],
  ['srgb-linear', 'srgb-linear'],
  ['linear-srgb', 'srgb-linear'],
  ['display-p3', 'display-p3'],
  ['a98-rgb', 'a98-rgb'],
  ['prophoto-rgb', 'prophoto-rgb'],
  ['rec2020', 'rec2020'],
  ['lab', 'lab'],
  ['lch', 'lch'],
  ['hsl', 'hsl'],
  ['hwb', 'hwb'],
  ['oklab', 'oklab'],
  ['oklch', 'oklch'],
  ['xyz-d50', 'xyz-d50'],
  ['xyz-d65', 'xyz-d65'],
  ['xyz', 'xyz-d65'],
  ['acescg', 'acescg'],
  ['aces-cg', 'acescg'],
  ['aces2065-1', 'aces2065-1'],
]);

const HUE_DIRECTIONS = new Map<string, HueDirection>([
  ['shorter', 'shorter'],
  ['longer', 'longer'],
  ['increasing', 'increasing'],
  ['decreasing', 'decreasing'],
]);

interface Interpolation {
  colorSpace: ColorSpace;
  hueDirection: HueDirection;
}

function readInterpolation(stream: TokenStream): Interpolation {
  stream.expectIdentMatching('in');
  const name = stream.expectIdent().toLowerCase();
  const colorSpace = SPACES.get(name);
  if (!colorSpace) throw stream.error('syntax', `Unknown color space \`${name}\``);

  const hueDirection = stream.tryParseOrDefer((s) => {
    const direction = HUE_DIRECTIONS.get(s.expectIdent().toLowerCase());
    if (!direction) throw s.error('syntax', 'Expected a hue interpolation method');
    s.expectIdentMatching('hue');
    return direction;
  });
  return { colorSpace, hueDirection: hueDirection ?? 'shorter' };
}

/** A color with up to two positions, or a bare percentage hint. */
function readStopPieces(stream: TokenStream, pieces: StopPiece[]): void {
  const hint = stream.tryParse((s) => s.expectPercentage());
  if (hint !== undefined) {
    pieces.push({ kind: 'hint', position: hint });
    return;
  }

  const color = parseColor(stream);
  const first = stream.tryParse((s) => s.expectPercentage());
  pieces.push({ kind: 'color', color, position: first ?? null });
  if (first === undefined) return;

  const second = stream.tryParse((s) => s.expectPercentage());
  if (second !== undefined) pieces.push({ kind: 'color', color, position: second });
}

function readLinearGradient(stream: TokenStream): LinearGradient {
  const angle = stream.tryParseOrDefer(readDirection);
  const interpolation = stream.tryParseOrDefer(readInterpolation);
  if (angle || interpolation) stream.expectComma();

  const pieces: StopPiece[] = [];
  for (;;) {
    readStopPieces(stream, pieces);
    if (stream.peek()?.type !== 'comma') break;
    stream.next();
  }

  const colorSpace = interpolation?.colorSpace ?? 'srgb';
  const hueDirection = interpolation?.hueDirection ?? 'shorter';
  const result = normalizeColorStops(pieces, colorSpace, hueDirection);
  if (!result.ok) throw stream.error('syntax', result.reason);

  return {
    angle: angle ?? { kind: 'side', side: 'to bottom' },
    stops: result.stops,
    colorSpace,
    hueDirection,
  };
}

export function parseBackgroundImage(stream: TokenStream): PropertyValue<readonly LinearGradient[]> {
  if (isKeywordExhausted(stream, 'none')) return INITIAL;

  const gradients: LinearGradient[] = [];
  do {
    if (gradients.length > 0) stream.expectComma();
    const token = stream.next();
    if (token.type !== 'function' || token.name.toLowerCase() !== 'linear-gradient') {
      throw stream.unexpected(token);
    }
    gradients.push(stream.parseNestedBlock(readLinearGradient));
  } while (!stream.isExhausted());

  return exact(gradients);
}
