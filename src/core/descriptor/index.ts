/**
 * Descriptor barrel file.
 */
export * from './types.js';
export * from './descriptor.js';
