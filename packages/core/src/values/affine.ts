import type { Affine } from './types.js';

export const degreesToRadians = (degrees: number) => (degrees * Math.PI) / 180;

export const IDENTITY: Affine = [1, 0, 0, 1, 0, 0];

/** `outer × inner`: the result applies `inner` first, then `outer`. */
export function multiplyAffine(outer: Affine, inner: Affine): Affine {
  const [a1, b1, c1, d1, e1, f1] = outer;
  const [a2, b2, c2, d2, e2, f2] = inner;
  return [
    a1 * a2 + c1 * b2,
    b1 * a2 + d1 * b2,
    a1 * c2 + c1 * d2,
    b1 * c2 + d1 * d2,
    a1 * e2 + c1 * f2 + e1,
    b1 * e2 + d1 * f2 + f1,
  ];
}

export function isIdentity(m: Affine): boolean {
  return m.every((v, i) => v === IDENTITY[i]);
}
