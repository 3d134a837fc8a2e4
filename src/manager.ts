import { randomUUID } from 'node:crypto';
import loggerModule, { type ComponentLogger } from './logger.js';
import metricsModule, { MetricsRegistry } from './metrics/index.js';
import { EventRegistry, type RemovedEvent } from './events/registry.js';
import { EventScheduler } from './events/scheduler.js';
import { describeCameras } from './events/format.js';
import type { ExportRunner, PipelineResult } from './export/pipeline.js';
import type { EventSnapshot, StartEventRequest, StartEventResult } from './types.js';

export type EventDefaults = {
  pastMinutes: number;
  futureMinutes: number;
};

export interface EventManagerOptions {
  pipeline: ExportRunner;
  defaults?: Partial<EventDefaults>;
  registry?: EventRegistry;
  scheduler?: EventScheduler;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  generateId?: () => string;
}

const DEFAULT_PAST_MINUTES = 5;
const DEFAULT_FUTURE_MINUTES = 5;

/**
 * Entry point for start/extend, cancel and status. Arms one export per event
 * and drops the event once its export pipeline settles, whatever the outcome.
 */
export class EventManager {
  readonly registry: EventRegistry;
  private readonly scheduler: EventScheduler;
  private readonly pipeline: ExportRunner;
  private readonly defaults: EventDefaults;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly generateId: () => string;
  private readonly inFlight = new Set<Promise<void>>();
  private stopped = false;

  constructor(options: EventManagerOptions) {
    this.pipeline = options.pipeline;
    this.registry = options.registry ?? new EventRegistry();
    this.scheduler = options.scheduler ?? new EventScheduler();
    this.defaults = {
      pastMinutes: options.defaults?.pastMinutes ?? DEFAULT_PAST_MINUTES,
      futureMinutes: options.defaults?.futureMinutes ?? DEFAULT_FUTURE_MINUTES
    };
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.generateId = options.generateId ?? randomUUID;

    this.registry.on('created', this.handleCreated);
    this.registry.on('extended', this.handleExtended);
    this.registry.on('exporting', this.handleExporting);
    this.registry.on('removed', this.handleRemoved);
  }

  get activeExports() {
    return this.inFlight.size;
  }

  startOrExtend(request: StartEventRequest = {}): StartEventResult {
    if (this.stopped) {
      throw new Error('Event manager is stopped');
    }

    const id = request.id ?? this.generateId();
    const outcome = this.registry.startOrExtend(id, {
      pastMinutes: request.pastMinutes ?? this.defaults.pastMinutes,
      futureMinutes: request.futureMinutes ?? this.defaults.futureMinutes,
      cameras: request.cameras
    });

    const { event, generation } = outcome;
    this.scheduler.arm(event.id, event.endTime, () => this.fire(event.id, generation));
    this.logger.info(
      { event: event.id, delayMs: event.remainingMs, endTime: event.endTime.toISOString() },
      'Export scheduled'
    );

    const message = outcome.created
      ? outcome.superseded
        ? `New event ${event.id} started while the previous export is still running`
        : `New event ${event.id} started`
      : `Event ${event.id} extended`;

    return { event, created: outcome.created, message };
  }

  /** False when nothing is pending under the id, including once its export has started. */
  cancel(identifier: string): boolean {
    const id = identifier.trim();
    const event = this.registry.get(id);
    if (!event || event.status !== 'pending') {
      this.logger.warn({ event: id, status: event?.status ?? null }, 'No pending event to cancel');
      return false;
    }

    this.scheduler.cancel(id);
    return this.registry.cancel(id);
  }

  status(): EventSnapshot[];
  status(identifier: string): EventSnapshot | null;
  status(identifier?: string): EventSnapshot | EventSnapshot[] | null {
    if (identifier === undefined) {
      return this.registry.list();
    }
    return this.registry.get(identifier);
  }

  /** Resolves once every export that has started has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  /** Tears down pending timers. Pending events are dropped without exporting. */
  stop() {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.scheduler.clear();
    for (const event of this.registry.list()) {
      if (event.status === 'pending') {
        this.registry.cancel(event.id);
      }
    }
  }

  private fire(id: string, generation: number) {
    const event = this.registry.markExporting(id, generation);
    if (!event) {
      this.logger.info({ event: id }, 'Event was canceled or replaced before export');
      return;
    }

    this.logger.info(
      {
        event: id,
        start: event.startTime.toISOString(),
        end: event.endTime.toISOString(),
        cameras: describeCameras(event.cameras)
      },
      'Starting export'
    );

    const task = this.pipeline
      .run({ eventId: id, startTime: event.startTime, endTime: event.endTime, cameras: event.cameras })
      .then(
        (result: PipelineResult) => {
          this.registry.complete(id, generation, result.ok ? 'completed' : 'failed');
        },
        (error: unknown) => {
          this.logger.error({ event: id, err: error }, 'Export pipeline crashed');
          this.registry.complete(id, generation, 'failed');
        }
      );

    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  private readonly handleCreated = (event: EventSnapshot) => {
    this.metrics.recordEventTransition('created', this.registry.size);
    this.logger.info(
      {
        event: event.id,
        start: event.startTime.toISOString(),
        end: event.endTime.toISOString(),
        cameras: describeCameras(event.cameras)
      },
      'Event started'
    );
  };

  private readonly handleExtended = (event: EventSnapshot) => {
    this.metrics.recordEventTransition('extended', this.registry.size);
    this.logger.info(
      { event: event.id, end: event.endTime.toISOString(), extensions: event.extensions },
      'Event extended'
    );
  };

  private readonly handleExporting = () => {
    this.metrics.recordEventTransition('exporting', this.registry.size);
  };

  private readonly handleRemoved = ({ event, outcome }: RemovedEvent) => {
    this.metrics.recordEventTransition(outcome, this.registry.size);
    this.logger.info({ event: event.id, outcome }, 'Event removed');
  };
}

export default EventManager;
