/**
 * Track Conversion
 *
 * Main exports for converting vendor GPS CSV exports into GPX tracks.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Vendor schema normalization
export * from '../normalizers/index.js';

// CSV input and GPX output
export * from '../formats/index.js';

// Track building
export * from './track-builder.js';

// Configuration and batch conversion
export * from './errors.js';
export * from './config.js';
export * from './convert.js';
