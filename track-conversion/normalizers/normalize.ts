/**
 * Schema normalizer: vendor CSV rows -> canonical records
 */

import type { CanonicalField, CanonicalRecord, RawRecord } from '../schemas/index.js';
import type { NormalizeResult, SourceSchema } from './types.js';
import { detectSourceSchema, getSourceColumn } from './mappings.js';
import { coerceNumber, indexColumns, trimColumnName } from './utils.js';

/**
 * Resolve the original (untrimmed) header that fills a canonical field
 */
function resolveColumn(
  schema: SourceSchema,
  field: CanonicalField,
  index: Map<string, string>
): string | null {
  const source = getSourceColumn(schema, field);
  if (!source) {
    return null;
  }
  return index.get(source) ?? null;
}

/**
 * Map a single raw row onto the canonical field set
 *
 * A blank or non-numeric elevation cell falls back to 0 like a missing column.
 */
function normalizeRecord(
  raw: RawRecord,
  columns: Record<CanonicalField, string | null>
): CanonicalRecord {
  const read = (column: string | null): number => (column ? coerceNumber(raw[column]) : NaN);
  const ele = columns.ele ? read(columns.ele) : 0;

  return {
    timestamp: read(columns.timestamp),
    lat: read(columns.lat),
    lon: read(columns.lon),
    ele: Number.isNaN(ele) ? 0 : ele,
  };
}

/**
 * Detect the vendor schema of a CSV file and map its rows to canonical records
 *
 * Never throws: when no schema matches, returns `recognized: false` with the
 * trimmed column names so the caller can report and skip the file.
 *
 * @param records - Data rows keyed by the file's header cells
 * @param columns - Header cells in file order
 */
export function normalizeRecords(
  records: readonly RawRecord[],
  columns: readonly string[]
): NormalizeResult {
  const schema = detectSourceSchema(columns);
  if (!schema) {
    return { recognized: false, columns: columns.map(trimColumnName) };
  }

  const index = indexColumns(columns);
  const resolved: Record<CanonicalField, string | null> = {
    timestamp: resolveColumn(schema, 'timestamp', index),
    lat: resolveColumn(schema, 'lat', index),
    lon: resolveColumn(schema, 'lon', index),
    ele: resolveColumn(schema, 'ele', index),
  };

  return {
    recognized: true,
    format: schema.format,
    label: schema.label,
    records: records.map((raw) => normalizeRecord(raw, resolved)),
  };
}
