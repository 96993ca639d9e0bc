/**
 * Language parser exports barrel file.
 */
export * from './interface.types.js';
export * from './parser-registry.js';
export * from './typescript.js';
export * from './python.js';
export * from './go.js';
export { createParserRegistry } from './register.js';
