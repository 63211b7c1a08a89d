import { describe, it, expect } from 'vitest';
import { CssParseError, TokenStream } from '../../syntax/index.js';
import { parseDeclaration } from '../declarations.js';
import type { Property } from '../property.js';

function parse(name: string, value: string): Property[] {
  const result = parseDeclaration(name, TokenStream.fromSource(value));
  if (result.kind !== 'properties') throw new Error(`expected properties for ${name}`);
  return result.properties;
}

function parseError(name: string, value: string): CssParseError {
  try {
    parse(name, value);
  } catch (error) {
    if (error instanceof CssParseError) return error;
    throw error;
  }
  throw new Error(`expected ${name}: ${value} to fail`);
}

const px = (value: number) => ({ kind: 'exact', value: { unit: 'px', value } });
const RED = { kind: 'exact', value: { r: 255, g: 0, b: 0, a: 255 } };

describe('quad shorthands', () => {
  it('repeats one value on every side', () => {
    expect(parse('space', '3px')).toEqual([
      { name: 'top', value: px(3) },
      { name: 'right', value: px(3) },
      { name: 'bottom', value: px(3) },
      { name: 'left', value: px(3) },
    ]);
  });

  it('maps two values to vertical and horizontal sides', () => {
    expect(parse('margin', '1px 2px')).toEqual([
      { name: 'top', value: px(1) },
      { name: 'right', value: px(2) },
      { name: 'bottom', value: px(1) },
      { name: 'left', value: px(2) },
    ]);
  });

  it('maps three values to top, horizontal and bottom', () => {
    expect(parse('padding', '1px 2px 3px')).toEqual([
      { name: 'child-top', value: px(1) },
      { name: 'child-right', value: px(2) },
      { name: 'child-bottom', value: px(3) },
      { name: 'child-left', value: px(2) },
    ]);
  });

  it('maps radii clockwise from the top left corner', () => {
    expect(parse('border-radius', '1px 2px 3px 4px')).toEqual([
      { name: 'border-top-left-radius', value: px(1) },
      { name: 'border-top-right-radius', value: px(2) },
      { name: 'border-bottom-right-radius', value: px(3) },
      { name: 'border-bottom-left-radius', value: px(4) },
    ]);
  });

  it('rejects more than four values', () => {
    expect(parseError('margin', '1px 2px 3px 4px 5px').kind).toBe('syntax');
  });

  it('rejects negative child space', () => {
    expect(parseError('child-space', '-1px').kind).toBe('invalid-value');
  });

  it('accepts width keywords in border-width', () => {
    expect(parse('border-width', 'thin thick')).toEqual([
      { name: 'border-top-width', value: px(2) },
      { name: 'border-right-width', value: px(6) },
      { name: 'border-bottom-width', value: px(2) },
      { name: 'border-left-width', value: px(6) },
    ]);
  });

  it('expands initial to every longhand', () => {
    expect(parse('border-color', 'initial').map((p) => p.name)).toEqual([
      'border-top-color',
      'border-right-color',
      'border-bottom-color',
      'border-left-color',
    ]);
  });
});

describe('stroke shorthands', () => {
  it('fans border out to all four sides, colors first', () => {
    const properties = parse('border', '1px solid red');
    expect(properties).toHaveLength(8);
    expect(properties[0]).toEqual({ name: 'border-top-color', value: RED });
    expect(properties[3]).toEqual({ name: 'border-left-color', value: RED });
    expect(properties[4]).toEqual({ name: 'border-top-width', value: px(1) });
    expect(properties[7]).toEqual({ name: 'border-left-width', value: px(1) });
  });

  it('accepts components in any order', () => {
    expect(parse('border-top', 'red solid 2px')).toEqual([
      { name: 'border-top-color', value: RED },
      { name: 'border-top-width', value: px(2) },
    ]);
  });

  it('emits only the components present', () => {
    expect(parse('border-bottom', 'thick')).toEqual([{ name: 'border-bottom-width', value: px(6) }]);
    expect(parse('outline', 'blue')).toEqual([
      { name: 'outline-color', value: { kind: 'exact', value: { r: 0, g: 0, b: 255, a: 255 } } },
    ]);
  });

  it('reports other line styles as unsupported', () => {
    expect(parseError('border', '2px dashed red').kind).toBe('unsupported-value');
    expect(parseError('outline', 'dotted').kind).toBe('unsupported-value');
  });

  it('rejects repeated components', () => {
    expect(parseError('border', '1px 2px').message).toBe('Duplicate width');
    expect(parseError('border', 'red blue').message).toBe('Duplicate color');
    expect(parseError('border', 'solid solid').message).toBe('Duplicate style');
  });

  it('expands inherit to colors and widths', () => {
    const properties = parse('border', 'inherit');
    expect(properties).toHaveLength(8);
    expect(properties.every((p) => p.value.kind === 'inherit')).toBe(true);
  });
});

describe('font shorthand', () => {
  it('reads style, weight, size, line height and family', () => {
    expect(parse('font', 'italic bold 12px/1.5 "Fira Sans", serif')).toEqual([
      { name: 'font-style', value: { kind: 'exact', value: { style: 'italic' } } },
      { name: 'font-weight', value: { kind: 'exact', value: 700 } },
      { name: 'font-width', value: { kind: 'initial' } },
      { name: 'font-size', value: { kind: 'exact', value: 12 } },
      { name: 'line-height', value: { kind: 'exact', value: { unit: 'stretch', value: 1.5 } } },
      { name: 'font-family', value: { kind: 'exact', value: '"Fira Sans", serif' } },
    ]);
  });

  it('accepts the optional parts in any order', () => {
    const properties = parse('font', 'condensed 300 italic 10px sans-serif');
    expect(properties.slice(0, 3)).toEqual([
      { name: 'font-style', value: { kind: 'exact', value: { style: 'italic' } } },
      { name: 'font-weight', value: { kind: 'exact', value: 300 } },
      { name: 'font-width', value: { kind: 'exact', value: 0.75 } },
    ]);
  });

  it('treats a normal line height as initial', () => {
    const properties = parse('font', '14px/normal serif');
    expect(properties[4]).toEqual({ name: 'line-height', value: { kind: 'initial' } });
  });

  it('requires a size and a family', () => {
    expect(parseError('font', 'bold serif').kind).toBe('syntax');
    expect(() => parse('font', '12px')).toThrow(CssParseError);
  });

  it('expands initial to all six longhands', () => {
    expect(parse('font', 'initial').map((p) => p.name)).toEqual([
      'font-family',
      'font-style',
      'font-weight',
      'font-width',
      'font-size',
      'line-height',
    ]);
  });
});
