import loggerModule from '../logger.js';
import { describeCameras, formatTimestamp } from '../events/format.js';
import type { EventSnapshot } from '../types.js';

type StatusLogger = Pick<typeof loggerModule, 'info'>;

export interface StatusReporterOptions {
  /** Read-only view of the active events. */
  source: { status(): EventSnapshot[] };
  intervalMs: number;
  timeZone?: string;
  logger?: StatusLogger;
}

export type StatusLine = {
  event: string;
  start: string;
  end: string;
  remainingSeconds: number;
  cameras: string;
  status: EventSnapshot['status'];
};

export class StatusReporter {
  private readonly options: StatusReporterOptions;
  private readonly logger: StatusLogger;
  private timer: NodeJS.Timeout | null = null;
  private active = false;

  constructor(options: StatusReporterOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
  }

  get running() {
    return this.active;
  }

  start() {
    if (this.active || this.options.intervalMs <= 0) {
      return;
    }
    this.active = true;
    this.scheduleNext();
  }

  stop() {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  runOnce(): StatusLine[] {
    const events = this.options.source.status();
    if (events.length === 0) {
      return [];
    }

    const timeZone = this.options.timeZone ?? 'UTC';
    const lines = events.map(event => ({
      event: event.id,
      start: formatTimestamp(event.startTime, timeZone),
      end: formatTimestamp(event.endTime, timeZone),
      remainingSeconds: Math.round(event.remainingMs / 10) / 100,
      cameras: describeCameras(event.cameras),
      status: event.status
    }));

    this.logger.info({ count: lines.length }, 'Active events');
    for (const line of lines) {
      this.logger.info(
        line,
        `Event ${line.event} | Start: ${line.start}, End: ${line.end}, Remaining: ${line.remainingSeconds.toFixed(2)} seconds, Cameras: ${line.cameras}`
      );
    }
    return lines;
  }

  private scheduleNext() {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce();
      if (this.active) {
        this.scheduleNext();
      }
    }, this.options.intervalMs);
    this.timer.unref?.();
  }
}

export default StatusReporter;
