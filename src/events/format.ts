import { formatInTimeZone } from 'date-fns-tz';
import type { EventSnapshot } from '../types.js';

/** `2026-03-01 14:05:00+0100`, the layout the export command expects. */
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ssxx';

export function formatTimestamp(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, TIMESTAMP_FORMAT);
}

export function describeCameras(cameras: readonly string[]): string {
  return cameras.length === 0 ? 'all' : cameras.join(',');
}

export type EventView = {
  start_time: string;
  end_time: string;
  remaining_time_seconds: number;
  cameras: string[];
  status: EventSnapshot['status'];
};

export function toEventView(snapshot: EventSnapshot, timeZone: string): EventView {
  return {
    start_time: formatTimestamp(snapshot.startTime, timeZone),
    end_time: formatTimestamp(snapshot.endTime, timeZone),
    remaining_time_seconds: snapshot.remainingMs / 1000,
    cameras: [...snapshot.cameras],
    status: snapshot.status
  };
}
