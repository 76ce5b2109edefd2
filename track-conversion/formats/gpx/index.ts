/**
 * GPX output for converted tracks
 */

export * from './format.js';
export * from './serialize.js';
