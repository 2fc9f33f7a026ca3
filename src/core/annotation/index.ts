/**
 * Annotation barrel file.
 */
export * from './types.js';
export * from './parser.js';
export * from './evaluator.js';
export * from './base.js';
export * from './hierarchy.js';
export * from './registry.js';
export * from './pipeline.js';
