/**
 * File formats read and written by the converter
 *
 * - csv: vendor track exports (input)
 * - gpx: GPX 1.1 tracks (output)
 */

export * from './csv/index.js';
export * from './gpx/index.js';
