/**
 * Expansion barrel file.
 */
export * from './types.js';
export * from './expander.js';
export * from './project.js';
