import { EventEmitter } from 'node:events';
import { ValidationError } from '../errors.js';
import type { EventOutcome, EventSnapshot, ExportEvent } from '../types.js';

const MAX_IDENTIFIER_LENGTH = 200;
const MINUTE_MS = 60_000;

export type StartOrExtendInput = {
  pastMinutes: number;
  futureMinutes: number;
  /** `undefined` keeps the current set on extension; empty means all cameras. */
  cameras?: readonly string[] | null;
};

export type StartOrExtendOutcome = {
  event: EventSnapshot;
  generation: number;
  created: boolean;
  /** Set when a new event replaced one whose export is still running. */
  superseded: boolean;
};

export type RemovedEvent = {
  event: EventSnapshot;
  outcome: EventOutcome;
};

type RegistryEntry = ExportEvent & { generation: number };

export interface EventRegistryOptions {
  now?: () => number;
}

export function normalizeIdentifier(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('identifier must be a string', 'identifier');
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('identifier must not be empty', 'identifier');
  }
  if (trimmed.length > MAX_IDENTIFIER_LENGTH) {
    throw new ValidationError(
      `identifier must be at most ${MAX_IDENTIFIER_LENGTH} characters`,
      'identifier'
    );
  }
  if (/\p{Cc}/u.test(trimmed)) {
    throw new ValidationError('identifier must not contain control characters', 'identifier');
  }
  return trimmed;
}

export function normalizeMinutes(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
  if (value < 0) {
    throw new ValidationError(`${field} must not be negative`, field);
  }
  return value;
}

/** Trims, drops blanks and duplicates. An empty result means every camera. */
export function normalizeCameras(value: unknown): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('cameras must be an array of camera identifiers', 'cameras');
  }
  const cameras: string[] = [];
  for (const camera of value) {
    if (typeof camera !== 'string') {
      throw new ValidationError('cameras must only contain strings', 'cameras');
    }
    const trimmed = camera.trim();
    if (trimmed.length > 0 && !cameras.includes(trimmed)) {
      cameras.push(trimmed);
    }
  }
  return cameras;
}

/**
 * Owns the active events. Every mutation is synchronous, so calls arriving on
 * the event loop are applied one at a time and readers only ever see copies.
 */
export class EventRegistry extends EventEmitter {
  private readonly events = new Map<string, RegistryEntry>();
  private readonly now: () => number;
  private nextGeneration = 1;

  constructor(options: EventRegistryOptions = {}) {
    super();
    this.now = options.now ?? Date.now;
  }

  get size() {
    return this.events.size;
  }

  startOrExtend(identifier: string, input: StartOrExtendInput): StartOrExtendOutcome {
    const id = normalizeIdentifier(identifier);
    const pastMinutes = normalizeMinutes(input.pastMinutes, 'pastMinutes');
    const futureMinutes = normalizeMinutes(input.futureMinutes, 'futureMinutes');
    const cameras = input.cameras === undefined ? undefined : normalizeCameras(input.cameras);

    const nowMs = this.now();
    const requestedEnd = nowMs + futureMinutes * MINUTE_MS;
    const existing = this.events.get(id);

    if (existing && existing.status === 'pending') {
      if (requestedEnd > existing.endTime.getTime()) {
        existing.endTime = new Date(requestedEnd);
      }
      if (cameras !== undefined) {
        existing.cameras = cameras;
      }
      existing.updatedAt = new Date(nowMs);
      existing.extensions += 1;
      const event = this.toSnapshot(existing, nowMs);
      this.emit('extended', event);
      return { event, generation: existing.generation, created: false, superseded: false };
    }

    const entry: RegistryEntry = {
      id,
      startTime: new Date(nowMs - pastMinutes * MINUTE_MS),
      endTime: new Date(requestedEnd),
      cameras: cameras ?? [],
      status: 'pending',
      createdAt: new Date(nowMs),
      updatedAt: new Date(nowMs),
      extensions: 0,
      generation: this.nextGeneration
    };
    this.nextGeneration += 1;
    this.events.set(id, entry);

    const event = this.toSnapshot(entry, nowMs);
    this.emit('created', event);
    return { event, generation: entry.generation, created: true, superseded: existing !== undefined };
  }

  /** Removes a pending event. Events already exporting are left alone. */
  cancel(identifier: string): boolean {
    const id = identifier.trim();
    const entry = this.events.get(id);
    if (!entry || entry.status !== 'pending') {
      return false;
    }
    this.events.delete(id);
    const event = this.toSnapshot(entry, this.now());
    this.emit('canceled', event);
    this.emit('removed', { event, outcome: 'canceled' } satisfies RemovedEvent);
    return true;
  }

  /**
   * Moves a pending event to `exporting` if it is still the same generation
   * that was scheduled. Returns null when the event was canceled or replaced.
   */
  markExporting(identifier: string, generation: number): EventSnapshot | null {
    const entry = this.events.get(identifier);
    if (!entry || entry.generation !== generation || entry.status !== 'pending') {
      return null;
    }
    const nowMs = this.now();
    entry.status = 'exporting';
    entry.updatedAt = new Date(nowMs);
    const event = this.toSnapshot(entry, nowMs);
    this.emit('exporting', event);
    return event;
  }

  /** Drops an exporting event once its pipeline settled. */
  complete(identifier: string, generation: number, outcome: EventOutcome): boolean {
    const entry = this.events.get(identifier);
    if (!entry || entry.generation !== generation) {
      return false;
    }
    this.events.delete(identifier);
    const event = this.toSnapshot(entry, this.now());
    this.emit('removed', { event, outcome } satisfies RemovedEvent);
    return true;
  }

  get(identifier: string): EventSnapshot | null {
    const entry = this.events.get(identifier.trim());
    return entry ? this.toSnapshot(entry, this.now()) : null;
  }

  generationOf(identifier: string): number | null {
    return this.events.get(identifier)?.generation ?? null;
  }

  list(): EventSnapshot[] {
    const nowMs = this.now();
    return Array.from(this.events.values(), entry => this.toSnapshot(entry, nowMs));
  }

  clear() {
    this.events.clear();
  }

  private toSnapshot(entry: RegistryEntry, nowMs: number): EventSnapshot {
    return {
      id: entry.id,
      startTime: new Date(entry.startTime.getTime()),
      endTime: new Date(entry.endTime.getTime()),
      cameras: [...entry.cameras],
      status: entry.status,
      createdAt: new Date(entry.createdAt.getTime()),
      updatedAt: new Date(entry.updatedAt.getTime()),
      extensions: entry.extensions,
      remainingMs: Math.max(0, entry.endTime.getTime() - nowMs)
    };
  }
}

export default EventRegistry;
