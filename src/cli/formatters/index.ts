export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { CompactFormatter, formatFinding } from './compact.js';
