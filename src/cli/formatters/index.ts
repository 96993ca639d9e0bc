/**
 * Output formatters barrel file.
 */
export * from './types.js';
export * from './json.js';
export * from './human.js';
