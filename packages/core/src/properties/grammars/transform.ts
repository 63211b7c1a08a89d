import type { TokenStream } from '../../syntax/index.js';
import { IDENTITY, multiplyAffine, type Affine } from '../../values/index.js';
import { exact, type PropertyValue } from '../property.js';
import { isKeywordExhausted, optionalComma, readAngle, readNumber } from './leaf.js';

/** A translation distance: px or a bare `0`. */
function readOffset(stream: TokenStream): number {
  const token = stream.next();
  if (token.type === 'number' && token.value === 0) return 0;
  if (token.type === 'dimension') {
    if (token.unit.toLowerCase() === 'px') return token.value;
    throw stream.error('unsupported-value', `Unsupported translate unit \`${token.unit}\``);
  }
  if (token.type === 'percentage') {
    throw stream.error('unsupported-value', 'Percentages are not supported in translate()');
  }
  throw stream.unexpected(token);
}

/** Reads `first`, then an optional second argument (with optional comma) or `fallback`. */
function pair<T>(stream: TokenStream, read: (stream: TokenStream) => T, fallback: (first: T) => T): [T, T] {
  const first = read(stream);
  if (stream.isExhausted()) return [first, fallback(first)];
  optionalComma(stream);
  return [first, read(stream)];
}

function readTransformFunction(stream: TokenStream, name: string): Affine {
  switch (name) {
    case 'translate': {
      const [tx, ty] = pair(stream, readOffset, () => 0);
      return [1, 0, 0, 1, tx, ty];
    }
    case 'rotate': {
      const angle = readAngle(stream);
      const cos = Math.cos(angle);
      const sin = Math.sin(angle);
      return [cos, sin, -sin, cos, 0, 0];
    }
    case 'scale': {
      const [sx, sy] = pair(stream, readNumber, (x) => x);
      return [sx, 0, 0, sy, 0, 0];
    }
    case 'skew': {
      const [ax, ay] = pair(stream, readAngle, () => 0);
      return [1, Math.tan(ay), Math.tan(ax), 1, 0, 0];
    }
    case 'matrix': {
      const a = readNumber(stream);
      const rest: number[] = [];
      while (rest.length < 5) {
        optionalComma(stream);
        rest.push(readNumber(stream));
      }
      const [b, c, d, e, f] = rest;
      return [a, b, c, d, e, f];
    }
    default:
      throw stream.error('unsupported-value', `Unsupported transform function \`${name}()\``);
  }
}

/**
 * A list of transform functions. Each function is applied after the ones
 * before it, so its matrix multiplies on the outside.
 */
export function parseTransform(stream: TokenStream): PropertyValue<Affine> {
  if (isKeywordExhausted(stream, 'none')) return exact(IDENTITY);

  let matrix = IDENTITY;
  do {
    const token = stream.next();
    if (token.type !== 'function' || token.name.toLowerCase() === 'var') {
      throw stream.unexpected(token);
    }
    const name = token.name.toLowerCase();
    const step = stream.parseNestedBlock((inner) => readTransformFunction(inner, name));
    matrix = multiplyAffine(step, matrix);
  } while (!stream.isExhausted());

  return exact(matrix);
}
