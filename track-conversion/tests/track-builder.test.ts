import { describe, it, expect } from 'vitest';
import {
  buildTrack,
  interpolatePoint,
  prepareRecords,
  DEFAULT_MAX_GAP_SECONDS,
  DEFAULT_INTERPOLATION_STEP,
} from '../src/track-builder.js';
import type { CanonicalRecord, TrackPoint } from '../schemas/index.js';

const T0 = 1700000000;

function record(
  offset: number,
  lat: number = 30,
  lon: number = 120,
  ele: number = 0
): CanonicalRecord {
  return { timestamp: T0 + offset, lat, lon, ele };
}

function times(points: readonly TrackPoint[]): number[] {
  return points.map((p) => p.time - T0);
}

/**
 * Deterministic pseudo-random record stream (LCG) for property checks
 */
function generateRecords(count: number, seed: number): CanonicalRecord[] {
  let state = seed;
  const next = (): number => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };

  const records: CanonicalRecord[] = [];
  let offset = 0;
  for (let i = 0; i < count; i++) {
    // Mostly short gaps, occasionally a long one
    offset += next() < 0.1 ? 300 + next() * 1000 : next() * 40;
    records.push(record(offset, 30 + next(), 120 + next(), next() * 100));
  }
  // Shuffle so the builder has to sort
  return records.reverse();
}

describe('Track Builder', () => {
  it('should default to a 300s max gap and 1s step', () => {
    expect(DEFAULT_MAX_GAP_SECONDS).toBe(300);
    expect(DEFAULT_INTERPOLATION_STEP).toBe(1);
  });

  describe('interpolatePoint', () => {
    it('should interpolate position and elevation linearly', () => {
      const point = interpolatePoint(record(0, 10, 20, 100), record(10, 12, 24, 200), 0.5, 5);

      expect(point).toEqual({ lat: 11, lon: 22, ele: 150, time: T0 + 5 });
    });

    it('should return the start position at fraction 0', () => {
      const point = interpolatePoint(record(0, 10, 20, 100), record(10, 12, 24, 200), 0, 0);

      expect(point).toEqual({ lat: 10, lon: 20, ele: 100, time: T0 });
    });
  });

  describe('prepareRecords', () => {
    it('should drop records with NaN timestamp, latitude or longitude', () => {
      const kept = record(5);
      const result = prepareRecords([
        { timestamp: NaN, lat: 1, lon: 2, ele: 0 },
        { timestamp: T0, lat: NaN, lon: 2, ele: 0 },
        { timestamp: T0, lat: 1, lon: NaN, ele: 0 },
        kept,
      ]);

      expect(result).toEqual([kept]);
    });

    it('should drop timestamps outside four-digit years', () => {
      const result = prepareRecords([
        { timestamp: 1e12, lat: 1, lon: 2, ele: 0 },
        { timestamp: -1e12, lat: 1, lon: 2, ele: 0 },
      ]);

      expect(result).toEqual([]);
    });

    it('should sort ascending and keep input order on ties', () => {
      const a = record(5, 1);
      const b = record(5, 2);
      const c = record(1, 3);

      expect(prepareRecords([a, b, c])).toEqual([c, a, b]);
    });
  });

  describe('buildTrack', () => {
    it('should interpolate one point per second between records 10s apart', () => {
      const result = buildTrack([record(0, 10, 20, 100), record(10, 11, 21, 200)], 'flight');

      expect(result.track.name).toBe('flight');
      expect(result.track.segments).toHaveLength(1);

      const [segment] = result.track.segments;
      expect(segment).toHaveLength(11);
      expect(times(segment)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(segment[3].lat).toBeCloseTo(10.3, 10);
      expect(segment[3].lon).toBeCloseTo(20.3, 10);
      expect(segment[3].ele).toBeCloseTo(130, 10);
      expect(segment[10]).toEqual({ lat: 11, lon: 21, ele: 200, time: T0 + 10 });

      expect(result.generatedCount).toBe(10);
      expect(result.pointCount).toBe(11);
    });

    it('should split into two segments across a gap above the threshold', () => {
      const result = buildTrack([record(0, 1, 1), record(400, 2, 2)], 'walk');

      expect(result.track.segments).toEqual([
        [{ lat: 1, lon: 1, ele: 0, time: T0 }],
        [{ lat: 2, lon: 2, ele: 0, time: T0 + 400 }],
      ]);
      expect(result.generatedCount).toBe(0);
      expect(result.pointCount).toBe(2);
    });

    it('should interpolate a gap exactly equal to the threshold', () => {
      const result = buildTrack([record(0), record(300)], 'edge');

      expect(result.track.segments).toHaveLength(1);
      expect(result.track.segments[0]).toHaveLength(301);
      expect(result.generatedCount).toBe(300);
    });

    it('should copy points that are at most one step apart', () => {
      const result = buildTrack([record(0, 1), record(1, 2), record(1.5, 3)], 'dense');

      expect(result.track.segments).toEqual([
        [
          { lat: 1, lon: 120, ele: 0, time: T0 },
          { lat: 2, lon: 120, ele: 0, time: T0 + 1 },
          { lat: 3, lon: 120, ele: 0, time: T0 + 1.5 },
        ],
      ]);
      expect(result.generatedCount).toBe(2);
    });

    it('should emit floor(gap / step) points for a fractional gap', () => {
      const result = buildTrack([record(0, 0), record(2.5, 5)], 'fraction');

      const [segment] = result.track.segments;
      expect(segment).toEqual([
        { lat: 0, lon: 120, ele: 0, time: T0 },
        { lat: 2.5, lon: 120, ele: 0, time: T0 + 1 },
        { lat: 5, lon: 120, ele: 0, time: T0 + 2.5 },
      ]);
      expect(result.generatedCount).toBe(2);
    });

    it('should advance interpolated times by whole seconds regardless of step', () => {
      const result = buildTrack([record(0, 0), record(10, 10)], 'coarse', {
        interpolationStep: 2,
      });

      const [segment] = result.track.segments;
      expect(times(segment)).toEqual([0, 1, 2, 3, 4, 10]);
      expect(segment.map((p) => p.lat)).toEqual([0, 2, 4, 6, 8, 10]);
      expect(result.generatedCount).toBe(5);
    });

    it('should honor a custom max gap', () => {
      const result = buildTrack([record(0), record(61)], 'short-gap', { maxGapSeconds: 60 });

      expect(result.track.segments).toHaveLength(2);
    });

    it('should exclude split and trailing points from the generated count', () => {
      const result = buildTrack(
        [record(0, 0), record(3, 3), record(400, 4), record(401, 5)],
        'mixed'
      );

      expect(result.track.segments.map(times)).toEqual([
        [0, 1, 2, 3],
        [400, 401],
      ]);
      expect(result.generatedCount).toBe(4);
      expect(result.pointCount).toBe(6);
    });

    it('should start a new segment when the last gap is a split', () => {
      const result = buildTrack([record(0), record(1), record(500)], 'tail');

      expect(result.track.segments.map(times)).toEqual([[0, 1], [500]]);
    });

    it('should sort records before building', () => {
      const result = buildTrack([record(2, 2), record(0, 0), record(1, 1)], 'unordered');

      expect(times(result.track.segments[0])).toEqual([0, 1, 2]);
      expect(result.track.segments[0].map((p) => p.lat)).toEqual([0, 1, 2]);
    });

    it('should keep both points of a duplicated timestamp in input order', () => {
      const result = buildTrack([record(0, 1), record(0, 2)], 'dupes');

      expect(result.track.segments[0].map((p) => p.lat)).toEqual([1, 2]);
      expect(result.generatedCount).toBe(1);
    });

    it('should ignore records with a missing timestamp', () => {
      const result = buildTrack(
        [record(0, 1), { timestamp: NaN, lat: 9, lon: 9, ele: 9 }, record(1, 2)],
        'gappy'
      );

      expect(result.track.segments[0].map((p) => p.lat)).toEqual([1, 2]);
    });

    it('should emit a single point for a single record', () => {
      const result = buildTrack([record(0, 1, 2, 3)], 'one');

      expect(result.track.segments).toEqual([[{ lat: 1, lon: 2, ele: 3, time: T0 }]]);
      expect(result.generatedCount).toBe(0);
      expect(result.pointCount).toBe(1);
    });

    it('should return an empty track when no record is plottable', () => {
      const result = buildTrack([{ timestamp: NaN, lat: 1, lon: 2, ele: 0 }], 'nothing');

      expect(result).toEqual({
        track: { name: 'nothing', segments: [] },
        generatedCount: 0,
        pointCount: 0,
      });
      expect(buildTrack([], 'empty').pointCount).toBe(0);
    });
  });

  describe('properties', () => {
    const seeds = [1, 7, 42, 2024];

    it.each(seeds)('should keep time non-decreasing across the track (seed %i)', (seed) => {
      const { track } = buildTrack(generateRecords(60, seed), 'prop');
      const all = track.segments.flat().map((p) => p.time);

      for (let i = 1; i < all.length; i++) {
        expect(all[i]).toBeGreaterThanOrEqual(all[i - 1]);
      }
    });

    it.each(seeds)('should keep adjacent points within a segment under the max gap (seed %i)', (seed) => {
      const { track } = buildTrack(generateRecords(60, seed), 'prop');

      for (const segment of track.segments) {
        for (let i = 1; i < segment.length; i++) {
          expect(segment[i].time - segment[i - 1].time).toBeLessThanOrEqual(DEFAULT_MAX_GAP_SECONDS);
        }
      }
    });

    it.each(seeds)('should start a new segment at every gap above the max (seed %i)', (seed) => {
      const records = generateRecords(60, seed);
      const sorted = prepareRecords(records);
      let splits = 0;
      for (let i = 1; i < sorted.length; i++) {
        if (sorted[i].timestamp - sorted[i - 1].timestamp > DEFAULT_MAX_GAP_SECONDS) {
          splits++;
        }
      }

      expect(buildTrack(records, 'prop').track.segments).toHaveLength(splits + 1);
    });

    it.each([2, 7, 59.5, 299.9, 300])(
      'should interpolate floor(gap) points before the trailing record (gap %f)',
      (gap) => {
        const result = buildTrack([record(0), record(gap)], 'gap');

        expect(result.track.segments[0]).toHaveLength(Math.floor(gap) + 1);
        expect(result.generatedCount).toBe(Math.floor(gap));
      }
    );
  });
});
