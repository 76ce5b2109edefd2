/**
 * Normalizers for converting vendor CSV rows to CanonicalRecord format
 *
 * Detection and renaming are driven by static schema tables, so supporting
 * another vendor means adding one entry to SOURCE_SCHEMAS.
 */

// Types
export * from './types.js';

// Mapping tables
export * from './mappings.js';

// Utility functions
export * from './utils.js';

// Normalizer
export * from './normalize.js';
