/**
 * Track building for CanonicalRecord sequences
 *
 * Sorts records chronologically, splits on connectivity gaps and fills
 * shorter gaps with linearly interpolated points.
 */

import type {
  CanonicalRecord,
  Track,
  TrackBuildOptions,
  TrackPoint,
  TrackSegment,
} from '../schemas/index.js';
import { isRepresentableTime } from '../formats/gpx/format.js';

export const DEFAULT_MAX_GAP_SECONDS = 300;
export const DEFAULT_INTERPOLATION_STEP = 1;

/**
 * Result of building one track
 */
export interface TrackBuildResult {
  track: Track;
  /**
   * Points emitted by the copy and interpolation branches. Points written at
   * a segment split and the trailing point are not included.
   */
  generatedCount: number;
  /** Every point in the track */
  pointCount: number;
}

/**
 * Whether a record can be placed on the timeline
 */
function isPlottable(record: CanonicalRecord): boolean {
  return (
    !Number.isNaN(record.lat) &&
    !Number.isNaN(record.lon) &&
    isRepresentableTime(record.timestamp)
  );
}

function toPoint(record: CanonicalRecord): TrackPoint {
  return { lat: record.lat, lon: record.lon, ele: record.ele, time: record.timestamp };
}

/**
 * Linear interpolation between two records
 *
 * Position follows `fraction`; time advances by whole seconds from `from`.
 */
export function interpolatePoint(
  from: CanonicalRecord,
  to: CanonicalRecord,
  fraction: number,
  offsetSeconds: number
): TrackPoint {
  return {
    lat: from.lat + (to.lat - from.lat) * fraction,
    lon: from.lon + (to.lon - from.lon) * fraction,
    ele: from.ele + (to.ele - from.ele) * fraction,
    time: from.timestamp + offsetSeconds,
  };
}

/**
 * Drop unplottable records and sort the rest by timestamp
 *
 * Array.prototype.sort is stable, so equal timestamps keep input order.
 */
export function prepareRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  return records.filter(isPlottable).sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Build a segmented, interpolated track from canonical records
 *
 * For each consecutive pair of records:
 * - gap > maxGapSeconds: the earlier point closes the current segment
 * - gap <= interpolationStep: the earlier point is copied as is
 * - otherwise: floor(gap / step) points are interpolated from the earlier
 *   record, timestamps advancing one second per point
 *
 * The last record is always appended. Records with a missing timestamp,
 * latitude or longitude are ignored; with none left the track is empty.
 *
 * @param records - Canonical records in any order
 * @param name - Track name (input basename)
 * @param options - Gap and step thresholds
 */
export function buildTrack(
  records: readonly CanonicalRecord[],
  name: string,
  options: TrackBuildOptions = {}
): TrackBuildResult {
  const {
    maxGapSeconds = DEFAULT_MAX_GAP_SECONDS,
    interpolationStep = DEFAULT_INTERPOLATION_STEP,
  } = options;

  const sorted = prepareRecords(records);
  const last = sorted.at(-1);
  if (!last) {
    return { track: { name, segments: [] }, generatedCount: 0, pointCount: 0 };
  }

  let current: TrackPoint[] = [];
  const segments: TrackSegment[] = [current];
  let generatedCount = 0;

  for (let i = 0; i < sorted.length - 1; i++) {
    const curr = sorted[i];
    const next = sorted[i + 1];
    const gap = next.timestamp - curr.timestamp;

    if (gap > maxGapSeconds) {
      current.push(toPoint(curr));
      current = [];
      segments.push(current);
      continue;
    }

    if (gap <= interpolationStep) {
      current.push(toPoint(curr));
      generatedCount++;
      continue;
    }

    const steps = Math.floor(gap / interpolationStep);
    for (let step = 0; step < steps; step++) {
      current.push(interpolatePoint(curr, next, step / steps, step));
      generatedCount++;
    }
  }

  current.push(toPoint(last));

  const pointCount = segments.reduce((sum, segment) => sum + segment.length, 0);
  return { track: { name, segments }, generatedCount, pointCount };
}
