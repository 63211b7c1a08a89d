export * from './style.js';
export * from './variables.js';
export * from './resolver.js';
export * from './apply.js';
export * from './cascade.js';
export * from './tree.js';
export * from './describe.js';
