export * from './types.js';
export * from './call-patterns.js';
export * from './ingestor.js';
export * from './pool.js';
