import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../../logger.js';
import metricsModule, { MetricsRegistry } from '../../metrics/index.js';
import { isValidationError, ValidationError } from '../../errors.js';
import { normalizeIdentifier, normalizeMinutes } from '../../events/registry.js';
import { toEventView, type EventView } from '../../events/format.js';
import type { EventManager } from '../../manager.js';
import type { StartEventRequest } from '../../types.js';

const MAX_BODY_BYTES = 64 * 1024;

type EventsRouterManager = Pick<EventManager, 'startOrExtend' | 'cancel' | 'status' | 'activeExports'>;

export interface EventsRouterOptions {
  manager: EventsRouterManager;
  timeZone?: string;
  metrics?: MetricsRegistry;
  startedAt?: number;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type StatusEntry = EventView | { status: 'no_event' };

type StatusPayload = {
  events: Record<string, StatusEntry>;
};

export class EventsRouter {
  private readonly manager: EventsRouterManager;
  private readonly timeZone: string;
  private readonly metrics: MetricsRegistry;
  private readonly startedAt: number;
  private readonly handlers: Handler[];

  constructor(options: EventsRouterOptions) {
    this.manager = options.manager;
    this.timeZone = options.timeZone ?? 'UTC';
    this.metrics = options.metrics ?? metricsModule;
    this.startedAt = options.startedAt ?? Date.now();
    this.handlers = [
      (req, res, url) => this.handleStart(req, res, url),
      (req, res, url) => this.handleCancel(req, res, url),
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  private handleStart(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/start') {
      return false;
    }
    if (req.method !== 'POST') {
      sendMethodNotAllowed(res, 'POST');
      return true;
    }

    respondAsync(res, 'start', async () => {
      const body = await readJsonBody(req);
      const request = parseStartRequest(body);
      const result = this.manager.startOrExtend(request);
      const status = this.buildStatus(result.event.id);
      return { statusCode: 200, payload: { message: result.message, ...status } };
    });
    return true;
  }

  private handleCancel(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/cancel') {
      return false;
    }
    if (req.method !== 'POST') {
      sendMethodNotAllowed(res, 'POST');
      return true;
    }

    respondAsync(res, 'cancel', async () => {
      const body = await readJsonBody(req);
      const identifier = normalizeIdentifier(pick(body, 'identifier'));
      const canceled = this.manager.cancel(identifier);
      return {
        statusCode: canceled ? 200 : 404,
        payload: { identifier, status: canceled ? 'cancelled' : 'not_found' }
      };
    });
    return true;
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/status') {
      return false;
    }
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendMethodNotAllowed(res, 'GET');
      return true;
    }

    const identifier = url.searchParams.get('identifier');
    try {
      const payload = identifier ? this.buildStatus(normalizeIdentifier(identifier)) : this.buildStatus();
      sendJson(res, 200, payload);
    } catch (error) {
      sendError(res, 'status', error);
    }
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/health' || req.method !== 'GET') {
      return false;
    }

    const events = this.manager.status();
    sendJson(res, 200, {
      status: 'ok',
      uptimeSeconds: Math.max(0, Math.round((Date.now() - this.startedAt) / 1000)),
      activeEvents: events.length,
      exporting: this.manager.activeExports
    });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/metrics' || req.method !== 'GET') {
      return false;
    }

    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4; charset=utf-8' });
    res.end(this.metrics.exportForPrometheus());
    return true;
  }

  private buildStatus(identifier?: string): StatusPayload {
    if (identifier !== undefined) {
      const event = this.manager.status(identifier);
      return {
        events: {
          [identifier]: event ? toEventView(event, this.timeZone) : { status: 'no_event' }
        }
      };
    }

    const events: Record<string, StatusEntry> = {};
    for (const event of this.manager.status()) {
      events[event.id] = toEventView(event, this.timeZone);
    }
    return { events };
  }
}

type RouteResult = {
  statusCode: number;
  payload: unknown;
};

function respondAsync(res: ServerResponse, route: string, work: () => Promise<RouteResult>) {
  work().then(
    result => {
      sendJson(res, result.statusCode, result.payload);
    },
    (error: unknown) => {
      sendError(res, route, error);
    }
  );
}

function sendError(res: ServerResponse, route: string, error: unknown) {
  if (isValidationError(error)) {
    logger.warn({ route, field: error.field, message: error.message }, 'Rejected invalid request');
    sendJson(res, 400, { error: error.message });
    return;
  }
  logger.error({ route, err: error }, 'Request failed');
  sendJson(res, 500, { error: 'Internal server error' });
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown) {
  if (res.headersSent) {
    res.end();
    return;
  }
  const body = JSON.stringify(payload);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(body)
  });
  res.end(body);
}

function sendMethodNotAllowed(res: ServerResponse, allowed: string) {
  res.setHeader('Allow', allowed);
  sendJson(res, 405, { error: 'Method not allowed' });
}

function readJsonBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) {
        return;
      }
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        rejected = true;
        reject(new ValidationError(`request body exceeds ${MAX_BODY_BYTES} bytes`));
        return;
      }
      chunks.push(chunk);
    });

    req.on('error', reject);

    req.on('end', () => {
      if (rejected) {
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf-8').trim();
      if (raw.length === 0) {
        resolve({});
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        reject(new ValidationError('request body must be valid JSON'));
        return;
      }
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        reject(new ValidationError('request body must be a JSON object'));
        return;
      }
      resolve(toRecord(parsed));
    });
  });
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function pick(body: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(body, key) ? body[key] : undefined;
}

function optionalMinutes(body: Record<string, unknown>, key: string): number | undefined {
  const value = pick(body, key);
  if (value === undefined || value === null) {
    return undefined;
  }
  return normalizeMinutes(value, key);
}

function parseCameras(value: unknown): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return [];
  }
  if (typeof value === 'string') {
    return value.split(',');
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new ValidationError('cameras must be an array of camera identifiers', 'cameras');
}

export function parseStartRequest(body: Record<string, unknown>): StartEventRequest {
  const rawIdentifier = pick(body, 'identifier');
  const request: StartEventRequest = {
    pastMinutes: optionalMinutes(body, 'past_minutes'),
    futureMinutes: optionalMinutes(body, 'future_minutes'),
    cameras: parseCameras(pick(body, 'cameras'))
  };
  if (rawIdentifier !== undefined && rawIdentifier !== null && rawIdentifier !== '') {
    request.id = normalizeIdentifier(rawIdentifier);
  }
  return request;
}

export function createEventsRouter(options: EventsRouterOptions) {
  return new EventsRouter(options);
}
