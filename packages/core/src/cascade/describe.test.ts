import { describe, it, expect } from 'vitest';
import { describeStyle } from './describe.js';
import { defaultStyle } from './style.js';

describe('describeStyle', () => {
  it('lists nothing for the default style', () => {
    expect(describeStyle(defaultStyle())).toEqual([]);
  });

  it('lists changed fields in property order', () => {
    const style = {
      ...defaultStyle(),
      width: { unit: 'px', value: 10 } as const,
      color: { r: 255, g: 0, b: 0, a: 255 },
      maxHeight: { unit: 'em', value: 2 } as const,
      fontWidth: 0.75,
      display: null,
    };
    expect(describeStyle(style)).toEqual([
      ['color', '#ff0000'],
      ['max-height', '2em'],
      ['width', '10px'],
      ['font-width', '75%'],
      ['display', 'none'],
    ]);
  });

  it('lists every longhand on request', () => {
    const entries = describeStyle(defaultStyle(), { all: true });
    expect(entries).toHaveLength(70);
    expect(entries).toContainEqual(['selection-color', 'currentcolor']);
    expect(entries).toContainEqual(['line-height', '1.2s']);
    expect(entries).toContainEqual(['letter-spacing', 'auto']);
    expect(entries).toContainEqual(['transform', 'none']);
  });
});
