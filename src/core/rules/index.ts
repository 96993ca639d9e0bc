/**
 * Rules barrel file.
 */
export * from './types.js';
export * from './base.js';
export * from './registry.js';
export * from './engine.js';
export * from './layer-direction.js';
export * from './io-isolation.js';
export * from './module-boundary.js';
export * from './error-handling.js';
export * from './circular-dependency.js';
export * from './parse-failure.js';
export * from './unclassified-module.js';
export * from './ambiguous-import.js';
