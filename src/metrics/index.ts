import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { EventOutcome, ExportAttemptResult } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type EventTransition = 'created' | 'extended' | 'canceled' | 'exporting' | EventOutcome;

export type CombineGroupOutcome = 'merged' | 'skipped' | 'failed';

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    levelChanges: CounterMap;
  };
  events: {
    transitions: CounterMap;
    active: number;
    lastTransitionAt: string | null;
  };
  exports: {
    attempts: number;
    byOutcome: CounterMap;
    retries: number;
    jobs: CounterMap;
    lastFailure: { eventId: string; reason: string; at: string } | null;
  };
  combine: {
    groups: CounterMap;
    filesRemoved: number;
    lastFailure: { path: string; reason: string; at: string } | null;
  };
  latencies: Record<string, LatencyStats>;
};

export type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

export type PrometheusLogLevelOptions = PrometheusOptions & {
  levelMetricName?: string;
  levelHelp?: string;
};

type PrometheusSample = {
  value: number;
  labels?: Record<string, string>;
};

type PrometheusMetricOptions = {
  metricName: string;
  help?: string;
  type: 'counter' | 'gauge';
  labels?: Record<string, string>;
};

const DEFAULT_PREFIX = 'clipwarden';

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly eventTransitions = new Map<string, number>();
  private lastTransitionAt: number | null = null;
  private activeEvents = 0;
  private exportAttempts = 0;
  private exportRetries = 0;
  private readonly exportOutcomes = new Map<string, number>();
  private readonly exportJobs = new Map<string, number>();
  private lastExportFailure: { eventId: string; reason: string; at: number } | null = null;
  private readonly combineGroups = new Map<string, number>();
  private combineFilesRemoved = 0;
  private lastCombineFailure: { path: string; reason: string; at: number } | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.eventTransitions.clear();
    this.lastTransitionAt = null;
    this.activeEvents = 0;
    this.exportAttempts = 0;
    this.exportRetries = 0;
    this.exportOutcomes.clear();
    this.exportJobs.clear();
    this.lastExportFailure = null;
    this.combineGroups.clear();
    this.combineFilesRemoved = 0;
    this.lastCombineFailure = null;
    this.latencyStats.clear();
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevelCounters, normalized);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      increment(this.logLevelChangeCounters, normalized);
    }
  }

  recordEventTransition(transition: EventTransition, activeEvents: number) {
    increment(this.eventTransitions, transition);
    this.lastTransitionAt = Date.now();
    this.activeEvents = Math.max(0, activeEvents);
  }

  recordExportAttempt(eventId: string, attempt: number, result: ExportAttemptResult) {
    this.exportAttempts += 1;
    if (attempt > 1) {
      this.exportRetries += 1;
    }
    const outcome = result.ok ? 'success' : result.reason;
    increment(this.exportOutcomes, outcome);
    this.observeLatency('export.attempt', result.durationMs);
    if (!result.ok) {
      this.lastExportFailure = { eventId, reason: result.reason, at: Date.now() };
    }
  }

  recordExportJob(ok: boolean) {
    increment(this.exportJobs, ok ? 'succeeded' : 'failed');
  }

  recordCombineGroup(outcome: CombineGroupOutcome, context: { path?: string; reason?: string } = {}) {
    increment(this.combineGroups, outcome);
    if (outcome === 'failed') {
      this.lastCombineFailure = {
        path: context.path ?? 'unknown',
        reason: context.reason ?? 'unknown',
        at: Date.now()
      };
    }
  }

  recordCombineRemovedFiles(count: number) {
    if (Number.isFinite(count) && count > 0) {
      this.combineFilesRemoved += count;
    }
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      currentLevel: this.currentLogLevel,
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const prefix = options.prefix ?? DEFAULT_PREFIX;
    const samples = Object.entries(mapLogLevelCounters(this.logLevelCounters)).map(([level, value]) => ({
      value,
      labels: { level }
    }));
    return formatPrometheusMetric(samples, {
      metricName: options.levelMetricName ?? `${prefix}_log_level_total`,
      help: options.levelHelp ?? 'Total log lines grouped by pino level',
      type: 'counter',
      labels: options.labels
    });
  }

  exportForPrometheus(options: PrometheusOptions = {}): string {
    const prefix = options.prefix ?? DEFAULT_PREFIX;
    const labels = options.labels;
    const blocks = [
      this.exportLogLevelCountersForPrometheus(options),
      formatPrometheusMetric(
        Array.from(this.eventTransitions.entries()).map(([transition, value]) => ({
          value,
          labels: { transition }
        })),
        {
          metricName: `${prefix}_event_transitions_total`,
          help: 'Event lifecycle transitions',
          type: 'counter',
          labels
        }
      ),
      formatPrometheusMetric([{ value: this.activeEvents }], {
        metricName: `${prefix}_events_active`,
        help: 'Events currently pending or exporting',
        type: 'gauge',
        labels
      }),
      formatPrometheusMetric(
        Array.from(this.exportOutcomes.entries()).map(([outcome, value]) => ({
          value,
          labels: { outcome }
        })),
        {
          metricName: `${prefix}_export_attempts_total`,
          help: 'Export command attempts grouped by outcome',
          type: 'counter',
          labels
        }
      ),
      formatPrometheusMetric(
        Array.from(this.combineGroups.entries()).map(([outcome, value]) => ({
          value,
          labels: { outcome }
        })),
        {
          metricName: `${prefix}_combine_groups_total`,
          help: 'Segment groups processed by the combiner',
          type: 'counter',
          labels
        }
      )
    ];

    const text = blocks.filter(block => block.length > 0).join('\n');
    return text.length > 0 ? `${text}\n` : '';
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      events: {
        transitions: mapFrom(this.eventTransitions),
        active: this.activeEvents,
        lastTransitionAt: toIso(this.lastTransitionAt)
      },
      exports: {
        attempts: this.exportAttempts,
        byOutcome: mapFrom(this.exportOutcomes),
        retries: this.exportRetries,
        jobs: mapFrom(this.exportJobs),
        lastFailure: this.lastExportFailure
          ? { ...this.lastExportFailure, at: new Date(this.lastExportFailure.at).toISOString() }
          : null
      },
      combine: {
        groups: mapFrom(this.combineGroups),
        filesRemoved: this.combineFilesRemoved,
        lastFailure: this.lastCombineFailure
          ? { ...this.lastCombineFailure, at: new Date(this.lastCombineFailure.at).toISOString() }
          : null
      },
      latencies: mapLatencies(this.latencyStats)
    };
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function mapFrom(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [key, value] of Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b))) {
    result[key] = value;
  }
  return result;
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const entries = Array.from(source.entries());
  entries.sort(([a], [b]) => levelWeight(a) - levelWeight(b) || a.localeCompare(b));
  const result: CounterMap = {};
  for (const [level, value] of entries) {
    result[level] = value;
  }
  return result;
}

function levelWeight(level: string) {
  const value = pino.levels.values[level];
  return typeof value === 'number' ? value : Number.MAX_SAFE_INTEGER;
}

function mapLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [metric, stats] of source) {
    result[metric] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.count > 0 ? stats.minMs : 0,
      maxMs: stats.maxMs,
      averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
    };
  }
  return result;
}

function formatPrometheusMetric(samples: PrometheusSample[], options: PrometheusMetricOptions): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(options.metricName);
  const baseLabels = options.labels ?? {};
  const rendered = filtered
    .map(sample => ({
      value: sample.value,
      labelString: formatPrometheusLabels({ ...baseLabels, ...(sample.labels ?? {}) })
    }))
    .sort((a, b) => a.labelString.localeCompare(b.labelString));

  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} ${options.type}`);
  for (const sample of rendered) {
    lines.push(`${metricName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return `${DEFAULT_PREFIX}_metric`;
  }
  if (/^[0-9]/.test(lower)) {
    return `${DEFAULT_PREFIX}_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_').replace(/_{2,}/g, '_');
  const lower = sanitized.replace(/^_+|_+$/g, '').toLowerCase();
  if (!lower) {
    return 'label';
  }
  return /^[0-9]/.test(lower) ? `_${lower}` : lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  if (entries.length === 0) {
    return '';
  }
  entries.sort(([a], [b]) => a.localeCompare(b));
  return `{${entries.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`).join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
