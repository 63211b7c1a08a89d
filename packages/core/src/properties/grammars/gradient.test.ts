import { describe, it, expect } from 'vitest';
import { CssParseError, TokenStream } from '../../syntax/index.js';
import type { LinearGradient } from '../../values/index.js';
import { parseBackgroundImage } from './gradient.js';

const RED = { r: 255, g: 0, b: 0, a: 255 };
const GREEN = { r: 0, g: 128, b: 0, a: 255 };
const BLUE = { r: 0, g: 0, b: 255, a: 255 };

function gradients(text: string): readonly LinearGradient[] {
  const value = parseBackgroundImage(TokenStream.fromSource(text));
  if (value.kind !== 'exact') throw new Error('expected an exact value');
  return value.value;
}

function errorKind(text: string): string {
  try {
    parseBackgroundImage(TokenStream.fromSource(text));
  } catch (error) {
    if (error instanceof CssParseError) return error.kind;
    throw error;
  }
  return 'none';
}

describe('parseBackgroundImage', () => {
  it('normalizes stops and applies defaults', () => {
    expect(gradients('linear-gradient(red, green 20%, blue)')).toEqual([
      {
        angle: { kind: 'side', side: 'to bottom' },
        stops: [
          [0, RED],
          [0.2, GREEN],
          [1, BLUE],
        ],
        colorSpace: 'srgb',
        hueDirection: 'shorter',
      },
    ]);
  });

  it('reads side and corner directions in either order', () => {
    expect(gradients('linear-gradient(to left top, red, blue)')[0].angle).toEqual({ kind: 'side', side: 'to top left' });
    expect(gradients('linear-gradient(to right, red, blue)')[0].angle).toEqual({ kind: 'side', side: 'to right' });
  });

  it('reads angles and interpolation methods', () => {
    const [gradient] = gradients('linear-gradient(0.5turn in hsl longer hue, red, blue)');
    expect(gradient.angle).toEqual({ kind: 'angle', radians: Math.PI });
    expect(gradient.colorSpace).toBe('hsl');
    expect(gradient.hueDirection).toBe('longer');
  });

  it('resolves color space aliases', () => {
    expect(gradients('linear-gradient(in linear-srgb, red, blue)')[0].colorSpace).toBe('srgb-linear');
    expect(gradients('linear-gradient(in aces-cg, red, blue)')[0].colorSpace).toBe('acescg');
  });

  it('expands a color with two positions into two stops', () => {
    expect(gradients('linear-gradient(red 10% 30%, blue)')[0].stops).toEqual([
      [0.1, RED],
      [0.3, RED],
      [1, BLUE],
    ]);
  });

  it('reads a list of gradients', () => {
    expect(gradients('linear-gradient(red, blue), linear-gradient(to top, blue, red)')).toHaveLength(2);
  });

  it('treats none as initial', () => {
    expect(parseBackgroundImage(TokenStream.fromSource('none'))).toEqual({ kind: 'initial' });
  });

  it('rejects other images and malformed directions', () => {
    expect(errorKind('radial-gradient(red, blue)')).toBe('syntax');
    expect(errorKind('linear-gradient(to left right, red, blue)')).toBe('syntax');
    expect(errorKind('linear-gradient(to top to bottom, red, blue)')).toBe('syntax');
    expect(errorKind('linear-gradient(to bottom red, blue)')).toBe('syntax');
    expect(errorKind('linear-gradient(red)')).toBe('syntax');
  });

  it('signals var() in the prelude and in stops', () => {
    expect(errorKind('linear-gradient(var(--angle), red, blue)')).toBe('var-function');
    expect(errorKind('linear-gradient(red, var(--end))')).toBe('var-function');
  });
});
