export * from './property.js';
export * from './declarations.js';
export * from './format.js';
export * from './grammars/index.js';
