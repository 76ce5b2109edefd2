/**
 * Vendor schemas recognized by the normalizer
 *
 * - variflight: `Time, Latitude, Longitude[, Height]`
 * - footprint: `dataTime, latitude, longitude[, altitude]`
 */
export type SourceFormat = 'variflight' | 'footprint';

/**
 * Canonical field names every vendor schema is mapped onto
 */
export type CanonicalField = 'timestamp' | 'lat' | 'lon' | 'ele';

/**
 * One CSV data row keyed by its (untrimmed) vendor column names
 */
export type RawRecord = Readonly<Record<string, string>>;

/**
 * Vendor-independent record produced by the normalizer
 */
export interface CanonicalRecord {
  /** Seconds since the Unix epoch; NaN when missing or non-numeric */
  readonly timestamp: number;
  /** Latitude in decimal degrees; NaN when missing or non-numeric */
  readonly lat: number;
  /** Longitude in decimal degrees; NaN when missing or non-numeric */
  readonly lon: number;
  /** Elevation in meters, 0 when the source has none */
  readonly ele: number;
}

/**
 * A single point of the output track, copied from a record or interpolated
 */
export interface TrackPoint {
  readonly lat: number;
  readonly lon: number;
  readonly ele: number;
  /** Seconds since the Unix epoch (rendered with second precision) */
  readonly time: number;
}

/**
 * Chronological run of points with no internal gap above the max gap
 */
export type TrackSegment = readonly TrackPoint[];

/**
 * Converted output for one input file
 */
export interface Track {
  /** Input file basename without extension */
  name: string;
  segments: TrackSegment[];
}

/**
 * Tunables for the interpolation and segmentation pass
 */
export interface TrackBuildOptions {
  /** Gaps strictly above this many seconds start a new segment (default: 300) */
  maxGapSeconds?: number;
  /** Gaps at or below this many seconds are not interpolated (default: 1) */
  interpolationStep?: number;
}

/**
 * Settings for a conversion run
 */
export interface ConversionConfig {
  /** Directory scanned (non-recursively) for `*.csv` files */
  inputDir: string;
  /** Directory receiving one `.gpx` file per converted input */
  outputDir: string;
  maxGapSeconds: number;
  interpolationStep: number;
  /** Value of the GPX `creator` attribute */
  creator: string;
}
