/**
 * docmeta - doc-comment annotations expanded into class descriptors.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Directive parsing, validation and the registry
export * from './core/annotation/index.js';

// Built-in annotation kinds
export * from './core/annotations/index.js';

// Descriptors
export * from './core/descriptor/index.js';

// Expansion
export * from './core/expansion/index.js';
export { TypeScriptReflector } from './core/reflection/typescript.js';

// Utilities
export * from './utils/errors.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';
