/**
 * Zod schemas for runtime validation of conversion settings and output values
 * These schemas enforce the data contracts at runtime and turn invalid
 * configuration into readable messages.
 */

import { z } from 'zod';

/**
 * Vendor schema identifiers
 */
export const SourceFormatSchema = z.enum(['variflight', 'footprint']);

/**
 * GPX timestamp pattern: second precision, always UTC
 * Matches: 2024-01-15T10:30:00Z
 */
const GPX_TIME_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const GpxTimeSchema = z.string().regex(GPX_TIME_REGEX, {
  message: 'Time must be UTC with second precision (e.g., 2024-01-15T10:30:00Z)',
});

const SecondsSchema = z.number().finite().positive();

/**
 * Interpolated points advance one whole second each, so a finer step would
 * stamp them past the record that follows
 */
const StepSchema = z.number().finite().gte(1, 'Interpolation step must be at least 1 second');

/**
 * Conversion settings, with the defaults of a bare run filled in
 */
export const ConversionConfigSchema = z.object({
  /** Directory scanned for `*.csv` files */
  inputDir: z.string().min(1, 'Input directory is required').default('input'),
  /** Directory receiving `.gpx` files */
  outputDir: z.string().min(1, 'Output directory is required').default('output'),
  /** Gaps above this many seconds split the track */
  maxGapSeconds: SecondsSchema.default(300),
  /** Interpolation resolution in seconds */
  interpolationStep: StepSchema.default(1),
  /** GPX creator attribute */
  creator: z.string().min(1, 'Creator is required').default('track-conversion'),
});

/**
 * Shape of a JSON config file: every setting optional, unknown keys rejected
 */
export const ConfigFileSchema = z
  .object({
    inputDir: z.string().min(1),
    outputDir: z.string().min(1),
    maxGapSeconds: SecondsSchema,
    interpolationStep: StepSchema,
    creator: z.string().min(1),
  })
  .partial()
  .strict();

export type ValidatedConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type ValidatedConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validate conversion settings, applying defaults for omitted fields
 * @throws ZodError if validation fails
 */
export function validateConversionConfig(data: unknown): ValidatedConversionConfig {
  return ConversionConfigSchema.parse(data);
}

/**
 * Validate conversion settings safely (returns result object)
 */
export function safeValidateConversionConfig(
  data: unknown
): z.SafeParseReturnType<unknown, ValidatedConversionConfig> {
  return ConversionConfigSchema.safeParse(data);
}

/**
 * Validate the parsed contents of a config file safely
 */
export function safeValidateConfigFile(data: unknown): z.SafeParseReturnType<unknown, ValidatedConfigFile> {
  return ConfigFileSchema.safeParse(data);
}

/**
 * Format Zod errors into one `path: message` line each
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
