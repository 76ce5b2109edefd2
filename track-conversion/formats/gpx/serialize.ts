/**
 * GPX 1.1 document rendering
 */

import type { Track, TrackPoint, TrackSegment } from '../../schemas/index.js';
import { formatCoordinate, formatElevation, formatTime } from './format.js';

export const GPX_NAMESPACE = 'http://www.topografix.com/GPX/1/1';
export const DEFAULT_GPX_CREATOR = 'track-conversion';

export interface GpxSerializeOptions {
  /** Value of the root `creator` attribute (default: track-conversion) */
  creator?: string;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * Escape text for use in XML character data or a quoted attribute
 */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

function renderPoint(point: TrackPoint): string[] {
  return [
    `      <trkpt lat="${formatCoordinate(point.lat)}" lon="${formatCoordinate(point.lon)}">`,
    `        <ele>${formatElevation(point.ele)}</ele>`,
    `        <time>${formatTime(point.time)}</time>`,
    '      </trkpt>',
  ];
}

function renderSegment(segment: TrackSegment): string[] {
  return ['    <trkseg>', ...segment.flatMap(renderPoint), '    </trkseg>'];
}

/**
 * Render a track as a GPX 1.1 document
 *
 * One `trk` named after the track, one `trkseg` per segment.
 */
export function serializeGpx(track: Track, options: GpxSerializeOptions = {}): string {
  const { creator = DEFAULT_GPX_CREATOR } = options;

  const lines = [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<gpx version="1.1" creator="${escapeXml(creator)}" xmlns="${GPX_NAMESPACE}">`,
    '  <trk>',
    `    <name>${escapeXml(track.name)}</name>`,
    ...track.segments.flatMap(renderSegment),
    '  </trk>',
    '</gpx>',
  ];

  return `${lines.join('\n')}\n`;
}
