/**
 * Batch conversion of a directory of vendor CSV exports into GPX files
 *
 * Files are processed one at a time. A failure in one file is reported and
 * never stops the batch.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import type { ConversionConfig, SourceFormat } from '../schemas/index.js';
import { normalizeRecords } from '../normalizers/index.js';
import { readCsvFile } from '../formats/csv/index.js';
import { serializeGpx } from '../formats/gpx/index.js';
import { buildTrack } from './track-builder.js';
import { UnrecognizedSchemaError, errorMessage } from './errors.js';

/**
 * Sink for progress and diagnostics; `console` in the CLI
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface ConvertedFile {
  status: 'converted';
  /** Input file name */
  file: string;
  format: SourceFormat;
  label: string;
  outputPath: string;
  generatedCount: number;
  pointCount: number;
  segmentCount: number;
}

export interface SkippedFile {
  status: 'skipped';
  file: string;
  /** Trimmed header cells that matched no schema */
  columns: string[];
}

export interface FailedFile {
  status: 'failed';
  file: string;
  error: string;
}

export type FileConversionResult = ConvertedFile | SkippedFile | FailedFile;

export type BatchSummary =
  | { status: 'empty'; inputDir: string }
  | { status: 'completed'; results: FileConversionResult[] };

/**
 * Create the input and output directories when absent
 *
 * @returns The directories that were created
 */
export async function ensureDirectories(
  config: Pick<ConversionConfig, 'inputDir' | 'outputDir'>,
  logger: Logger = console
): Promise<string[]> {
  const created: string[] = [];

  for (const dir of [config.inputDir, config.outputDir]) {
    const first = await mkdir(dir, { recursive: true });
    if (first !== undefined) {
      created.push(dir);
      logger.log(`Created directory: ${dir}`);
    }
  }

  return created;
}

/**
 * List `*.csv` files directly inside a directory, sorted by name
 */
export async function findCsvFiles(inputDir: string): Promise<string[]> {
  const names = await fg('*.csv', { cwd: inputDir, onlyFiles: true });
  return names.sort().map((name) => path.join(inputDir, name));
}

/**
 * Convert one CSV file and write `<basename>.gpx` to the output directory
 *
 * @throws UnrecognizedSchemaError if the columns match no vendor schema
 * @throws FileReadError if the file cannot be read or parsed
 */
export async function convertFile(
  inputPath: string,
  config: ConversionConfig
): Promise<ConvertedFile> {
  const file = path.basename(inputPath);
  const table = await readCsvFile(inputPath);

  const normalized = normalizeRecords(table.records, table.columns);
  if (!normalized.recognized) {
    throw new UnrecognizedSchemaError(file, normalized.columns);
  }

  const name = path.parse(file).name;
  const { track, generatedCount, pointCount } = buildTrack(normalized.records, name, {
    maxGapSeconds: config.maxGapSeconds,
    interpolationStep: config.interpolationStep,
  });

  const outputPath = path.join(config.outputDir, `${name}.gpx`);
  await writeFile(outputPath, serializeGpx(track, { creator: config.creator }), 'utf-8');

  return {
    status: 'converted',
    file,
    format: normalized.format,
    label: normalized.label,
    outputPath,
    generatedCount,
    pointCount,
    segmentCount: track.segments.length,
  };
}

/**
 * Convert one file, turning any failure into a reported result
 */
async function convertOne(
  inputPath: string,
  config: ConversionConfig,
  logger: Logger
): Promise<FileConversionResult> {
  const file = path.basename(inputPath);
  logger.log(`[${file}] Processing`);

  try {
    const result = await convertFile(inputPath, config);
    logger.log(`[${file}] Detected ${result.label} format`);
    if (result.pointCount === 0) {
      logger.warn(`[${file}] No rows with a valid time and position; wrote an empty track`);
    }
    logger.log(`[${file}] Converted: ${result.generatedCount} track points generated`);
    logger.log(`[${file}] Saved to: ${result.outputPath}`);
    return result;
  } catch (error) {
    if (error instanceof UnrecognizedSchemaError) {
      logger.warn(`[${file}] Unrecognized column layout, skipping`);
      logger.warn(`[${file}] Columns: ${error.columns.join(', ')}`);
      return { status: 'skipped', file, columns: error.columns };
    }

    const message = errorMessage(error);
    logger.error(`[${file}] Error: ${message}`);
    return { status: 'failed', file, error: message };
  }
}

/**
 * Convert every CSV file in the input directory
 *
 * Creates missing directories first. Returns `empty` when there is nothing
 * to convert.
 */
export async function convertDirectory(
  config: ConversionConfig,
  logger: Logger = console
): Promise<BatchSummary> {
  await ensureDirectories(config, logger);

  const files = await findCsvFiles(config.inputDir);
  if (files.length === 0) {
    logger.warn(`No CSV files found in ${config.inputDir}. Add CSV files and run again.`);
    return { status: 'empty', inputDir: config.inputDir };
  }

  logger.log(`Found ${files.length} CSV file(s)`);

  const results: FileConversionResult[] = [];
  for (const inputPath of files) {
    results.push(await convertOne(inputPath, config, logger));
  }

  const count = (status: FileConversionResult['status']): number =>
    results.filter((r) => r.status === status).length;
  logger.log(
    `Finished: ${count('converted')} converted, ${count('skipped')} skipped, ${count('failed')} failed`
  );

  return { status: 'completed', results };
}
