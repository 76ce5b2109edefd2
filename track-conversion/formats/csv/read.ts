/**
 * CSV reader implementation
 *
 * Parses vendor exports with csv-parse and keys each data row by the
 * header cells exactly as they appear in the file.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawRecord } from '../../schemas/index.js';
import { FileReadError } from '../../src/errors.js';
import type { CsvTable } from './types.js';

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Run csv-parse and check it produced rows of string cells
 */
function parseRows(content: string): string[][] {
  const output: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return CsvRowsSchema.parse(output);
}

/**
 * Build a record from a data row
 *
 * Short rows are padded with empty cells, surplus cells are dropped, and a
 * repeated header keeps its first column.
 */
function toRecord(header: readonly string[], row: readonly string[]): RawRecord {
  const record: Record<string, string> = {};
  header.forEach((column, i) => {
    if (!Object.hasOwn(record, column)) {
      record[column] = row[i] ?? '';
    }
  });
  return record;
}

/**
 * Parse CSV text into header columns and keyed records
 *
 * @param content - CSV text, header row first
 * @param fileName - Name used in error messages
 * @throws FileReadError if the text is not valid CSV or has no header row
 */
export function parseCsv(content: string, fileName: string = '<input>'): CsvTable {
  let rows: string[][];
  try {
    rows = parseRows(content);
  } catch (error) {
    throw new FileReadError(fileName, error);
  }

  const [header, ...body] = rows;
  if (!header) {
    throw new FileReadError(fileName, new Error('file has no header row'));
  }

  return {
    columns: header,
    records: body.map((row) => toRecord(header, row)),
  };
}

/**
 * Read and parse a CSV file from disk
 *
 * @throws FileReadError if the file cannot be read or parsed
 */
export async function readCsvFile(filePath: string): Promise<CsvTable> {
  const fileName = path.basename(filePath);

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileReadError(fileName, error);
  }

  return parseCsv(content, fileName);
}
