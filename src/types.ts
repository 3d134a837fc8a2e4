export type EventStatus = 'pending' | 'exporting' | 'completed' | 'failed' | 'canceled';

export type ActiveEventStatus = Extract<EventStatus, 'pending' | 'exporting'>;

export interface ExportEvent {
  id: string;
  startTime: Date;
  endTime: Date;
  /** Empty means every camera. */
  cameras: string[];
  status: ActiveEventStatus;
  createdAt: Date;
  updatedAt: Date;
  extensions: number;
}

export interface EventSnapshot {
  id: string;
  startTime: Date;
  endTime: Date;
  cameras: string[];
  status: ActiveEventStatus;
  createdAt: Date;
  updatedAt: Date;
  extensions: number;
  remainingMs: number;
}

export interface StartEventRequest {
  id?: string;
  pastMinutes?: number;
  futureMinutes?: number;
  cameras?: string[] | null;
}

export interface StartEventResult {
  event: EventSnapshot;
  created: boolean;
  message: string;
}

export interface ExportJob {
  eventId: string;
  startTime: Date;
  endTime: Date;
  cameras: string[];
  outputDir: string;
}

export type ExportFailureReason = 'exit' | 'timeout' | 'spawn-error';

export type ExportAttemptResult =
  | {
      ok: true;
      exitCode: 0;
      durationMs: number;
    }
  | {
      ok: false;
      reason: ExportFailureReason;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      durationMs: number;
      diagnostics: string[];
    };

export type EventOutcome = Extract<EventStatus, 'completed' | 'failed' | 'canceled'>;

export interface RecordingSegment {
  path: string;
  fileName: string;
  camera: string;
  start: Date;
  end: Date;
  extension: string;
}
