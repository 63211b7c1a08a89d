export * from './selector.js';
export * from './parser.js';
export * from './stylesheet.js';
export * from './matcher.js';
export * from './format.js';
