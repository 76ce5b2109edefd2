/**
 * Vendor-agnostic normalization types and interfaces
 */

import type { CanonicalField, CanonicalRecord, SourceFormat } from '../schemas/index.js';

/**
 * Column mapping entry: vendor column -> canonical field
 */
export interface ColumnMappingEntry {
  /** Vendor column name (compared after trimming) */
  source: string;
  /** Canonical field it fills */
  target: CanonicalField;
  /** Whether the column must be present for the schema to match */
  required: boolean;
}

/**
 * Vendor schema table entry
 */
export interface SourceSchema {
  format: SourceFormat;
  /** Human-readable vendor name for logs */
  label: string;
  columns: ColumnMappingEntry[];
}

/**
 * Records mapped onto the canonical field set
 */
export interface RecognizedSource {
  recognized: true;
  format: SourceFormat;
  label: string;
  records: CanonicalRecord[];
}

/**
 * Columns matched no known schema; the file should be skipped
 */
export interface UnrecognizedSource {
  recognized: false;
  /** Trimmed column names found in the file */
  columns: string[];
}

export type NormalizeResult = RecognizedSource | UnrecognizedSource;
