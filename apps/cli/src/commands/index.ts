export { createCheckCommand } from './check.js';
export { createComputeCommand } from './compute.js';
export { createFormatCommand } from './format.js';
