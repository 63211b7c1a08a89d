export * from './types.js';
export * from './color.js';
export * from './color-space.js';
export * from './affine.js';
export * from './format.js';
