/**
 * CSV input for vendor track exports
 */

export * from './types.js';
export * from './read.js';
