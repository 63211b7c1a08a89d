export * from './leaf.js';
export * from './simple.js';
export * from './shadow.js';
export * from './transform.js';
export * from './gradient.js';
export * from './gradient-stops.js';
export * from './shorthands.js';
