/**
 * Strata: architecture-conformance analyzer.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Pipeline
export * from './core/analyzer.js';
export * from './core/deadline.js';
export * from './core/ingest/index.js';
export * from './core/graph/index.js';
export * from './core/layers/index.js';
export * from './core/rules/index.js';
export * from './core/report/index.js';

// Parsers
export * from './parsers/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
