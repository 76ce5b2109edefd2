/**
 * Column mapping tables for each vendor schema
 *
 * These tables document and enforce the mapping from vendor CSV columns to
 * canonical record fields. Detection walks SOURCE_SCHEMAS in order, so
 * earlier entries win when a file would satisfy several.
 */

import type { CanonicalField, SourceFormat } from '../schemas/index.js';
import type { ColumnMappingEntry, SourceSchema } from './types.js';
import { trimColumnName } from './utils.js';

/**
 * Variflight flight-tracking exports
 */
export const VARIFLIGHT_COLUMN_MAPPINGS: ColumnMappingEntry[] = [
  { source: 'Time', target: 'timestamp', required: true },
  { source: 'Latitude', target: 'lat', required: true },
  { source: 'Longitude', target: 'lon', required: true },
  { source: 'Height', target: 'ele', required: false },
];

/**
 * Footprint (life-logging app) exports
 */
export const FOOTPRINT_COLUMN_MAPPINGS: ColumnMappingEntry[] = [
  { source: 'dataTime', target: 'timestamp', required: true },
  { source: 'latitude', target: 'lat', required: true },
  { source: 'longitude', target: 'lon', required: true },
  { source: 'altitude', target: 'ele', required: false },
];

/**
 * All vendor schemas, in detection priority order
 */
export const SOURCE_SCHEMAS: readonly SourceSchema[] = [
  { format: 'variflight', label: 'Variflight', columns: VARIFLIGHT_COLUMN_MAPPINGS },
  { format: 'footprint', label: 'Footprint', columns: FOOTPRINT_COLUMN_MAPPINGS },
];

/**
 * Get the schema entry for a format
 */
export function getSourceSchema(format: SourceFormat): SourceSchema | null {
  return SOURCE_SCHEMAS.find((s) => s.format === format) ?? null;
}

/**
 * Find the first schema whose required columns are all present
 *
 * Column names are trimmed before comparison; extra columns are ignored.
 */
export function detectSourceSchema(columns: readonly string[]): SourceSchema | null {
  const present = new Set(columns.map(trimColumnName));

  return (
    SOURCE_SCHEMAS.find((schema) =>
      schema.columns.filter((c) => c.required).every((c) => present.has(c.source))
    ) ?? null
  );
}

/**
 * Get the vendor column that fills a canonical field in a schema
 */
export function getSourceColumn(schema: SourceSchema, field: CanonicalField): string | null {
  return schema.columns.find((c) => c.target === field)?.source ?? null;
}
