import path from 'node:path';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import type { RecordingSegment } from '../types.js';

/**
 * Largest gap between one segment's end and the next one's start for the two
 * to count as a single recording. Exported chunks usually abut to the second.
 */
export const DEFAULT_TOLERANCE_MS = 1000;

const STAMP_PATTERN = String.raw`(\d{4})-(\d{2})-(\d{2}) - (\d{2})\.(\d{2})\.(\d{2})([+-]\d{4})?`;

// "<camera> - <start> - <end>.<ext>", e.g. "Front Door - 2026-03-01 - 14.05.00+0100 - 2026-03-01 - 14.06.00+0100.mp4"
const SEGMENT_NAME = new RegExp(`^(.+?) - ${STAMP_PATTERN} - ${STAMP_PATTERN}\\.([A-Za-z0-9]+)$`);

const NAME_STAMP_FORMAT = "yyyy-MM-dd' - 'HH.mm.ssxx";

export type SegmentParseOptions = {
  /** Zone used for stamps that carry no offset. */
  timeZone?: string;
  directory?: string;
};

export type SegmentGroup = {
  camera: string;
  extension: string;
  start: Date;
  end: Date;
  segments: RecordingSegment[];
};

function parseStamp(match: RegExpExecArray, first: number, timeZone: string): Date | null {
  const [year, month, day, hour, minute, second] = match.slice(first, first + 6);
  const offset = match[first + 6];
  if (!year || !month || !day || !hour || !minute || !second) {
    return null;
  }
  const local = `${year}-${month}-${day}T${hour}:${minute}:${second}`;

  let date: Date;
  if (offset) {
    const sign = offset.startsWith('-') ? -1 : 1;
    const offsetMinutes = sign * (Number(offset.slice(1, 3)) * 60 + Number(offset.slice(3, 5)));
    const utc = Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second)
    );
    date = new Date(utc - offsetMinutes * 60_000);
  } else {
    date = fromZonedTime(local, timeZone);
  }

  return Number.isNaN(date.getTime()) ? null : date;
}

export function parseSegmentFileName(
  fileName: string,
  options: SegmentParseOptions = {}
): RecordingSegment | null {
  const match = SEGMENT_NAME.exec(fileName);
  if (!match) {
    return null;
  }

  const timeZone = options.timeZone ?? 'UTC';
  const camera = match[1]?.trim() ?? '';
  const extension = match[16] ?? '';
  const start = parseStamp(match, 2, timeZone);
  const end = parseStamp(match, 9, timeZone);
  if (!camera || !extension || !start || !end || end.getTime() < start.getTime()) {
    return null;
  }

  return {
    path: options.directory ? path.join(options.directory, fileName) : fileName,
    fileName,
    camera,
    start,
    end,
    extension
  };
}

export function formatSegmentFileName(
  camera: string,
  start: Date,
  end: Date,
  extension: string,
  timeZone = 'UTC'
): string {
  const from = formatInTimeZone(start, timeZone, NAME_STAMP_FORMAT);
  const to = formatInTimeZone(end, timeZone, NAME_STAMP_FORMAT);
  return `${camera} - ${from} - ${to}.${extension}`;
}

/**
 * Splits segments into runs of back-to-back recordings per camera and
 * container. Overlapping segments join the run they overlap.
 */
export function groupContiguousSegments(
  segments: readonly RecordingSegment[],
  toleranceMs = DEFAULT_TOLERANCE_MS
): SegmentGroup[] {
  const byCamera = new Map<string, RecordingSegment[]>();
  for (const segment of segments) {
    const key = `${segment.camera}\u0000${segment.extension.toLowerCase()}`;
    const list = byCamera.get(key);
    if (list) {
      list.push(segment);
    } else {
      byCamera.set(key, [segment]);
    }
  }

  const groups: SegmentGroup[] = [];
  const keys = Array.from(byCamera.keys()).sort();
  for (const key of keys) {
    const list = [...(byCamera.get(key) ?? [])].sort(
      (a, b) => a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime()
    );

    let current: SegmentGroup | null = null;
    for (const segment of list) {
      if (current && segment.start.getTime() - current.end.getTime() <= toleranceMs) {
        current.segments.push(segment);
        if (segment.end.getTime() > current.end.getTime()) {
          current.end = segment.end;
        }
        continue;
      }

      current = {
        camera: segment.camera,
        extension: segment.extension,
        start: segment.start,
        end: segment.end,
        segments: [segment]
      };
      groups.push(current);
    }
  }

  return groups;
}

/**
 * Separates segments whose time range lies inside another segment of the same
 * run, such as the split files next to an earlier merge. For equal ranges the
 * first in start order is kept.
 */
export function dropCoveredSegments(segments: readonly RecordingSegment[]): {
  kept: RecordingSegment[];
  covered: RecordingSegment[];
} {
  const ordered = [...segments].sort(
    (a, b) =>
      a.start.getTime() - b.start.getTime() ||
      b.end.getTime() - a.end.getTime() ||
      a.fileName.localeCompare(b.fileName)
  );

  const kept: RecordingSegment[] = [];
  const covered: RecordingSegment[] = [];
  let reach = Number.NEGATIVE_INFINITY;
  for (const segment of ordered) {
    if (segment.end.getTime() <= reach) {
      covered.push(segment);
      continue;
    }
    kept.push(segment);
    reach = segment.end.getTime();
  }
  return { kept, covered };
}
