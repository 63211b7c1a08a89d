export * from './decimal.js';
export * from './errors.js';
export * from './tokenizer.js';
export * from './token-stream.js';
