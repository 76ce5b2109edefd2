/**
 * Value formatting for GPX output
 *
 * Every formatter is idempotent: parsing its output and formatting again
 * yields the same string.
 */

import { GpxTimeSchema } from '../../schemas/index.js';

/** 0000-01-01T00:00:00Z */
const MIN_EPOCH_SECONDS = -62167219200;
/** 9999-12-31T23:59:59Z */
const MAX_EPOCH_SECONDS = 253402300799;

/**
 * Fixed-point rendering without a sign on zero ("-0.00" -> "0.00")
 */
function toFixedUnsignedZero(value: number, digits: number): string {
  const text = value.toFixed(digits);
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Latitude or longitude with 6 decimal digits
 */
export function formatCoordinate(value: number): string {
  return toFixedUnsignedZero(value, 6);
}

/**
 * Elevation with 2 decimal digits
 */
export function formatElevation(value: number): string {
  return toFixedUnsignedZero(value, 2);
}

/**
 * Whether epoch seconds fall in the four-digit-year range `formatTime` renders
 */
export function isRepresentableTime(epochSeconds: number): boolean {
  return (
    Number.isFinite(epochSeconds) &&
    epochSeconds >= MIN_EPOCH_SECONDS &&
    Math.floor(epochSeconds) <= MAX_EPOCH_SECONDS
  );
}

/**
 * Render epoch seconds as `YYYY-MM-DDTHH:MM:SSZ`
 *
 * Fractional seconds are truncated toward the earlier second.
 *
 * @throws RangeError if the instant is outside years 0000-9999
 */
export function formatTime(epochSeconds: number): string {
  if (!isRepresentableTime(epochSeconds)) {
    throw new RangeError(`Timestamp out of range: ${epochSeconds}`);
  }

  const iso = new Date(Math.floor(epochSeconds) * 1000).toISOString();
  return `${iso.slice(0, 19)}Z`;
}

/**
 * Parse a `formatTime` string back to epoch seconds
 *
 * @throws ZodError if the string is not in GPX time format
 */
export function parseTime(value: string): number {
  const time = GpxTimeSchema.parse(value);
  return Date.parse(time) / 1000;
}
