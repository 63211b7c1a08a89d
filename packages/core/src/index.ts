// Tokenizer and token stream
export * from './syntax/index.js';

// Value types, color parsing and serializers
export * from './values/index.js';

// Property grammars and declarations
export * from './properties/index.js';

// Diagnostics
export * from './diagnostics/index.js';

// Rules, selectors and stylesheets
export * from './stylesheet/index.js';

// Cascade and computed styles
export * from './cascade/index.js';
