import { afterEach, describe, expect, it, vi } from 'vitest';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';
import { getLogLevel, onLogLevelChange, setLogLevel } from '../src/logger.js';

describe('MetricsRegistry', () => {
  it('counts export attempts, retries and outcomes', () => {
    const registry = new MetricsRegistry();

    registry.recordExportAttempt('door', 1, {
      ok: false,
      reason: 'timeout',
      exitCode: null,
      signal: 'SIGTERM',
      durationMs: 300,
      diagnostics: []
    });
    registry.recordExportAttempt('door', 2, { ok: true, exitCode: 0, durationMs: 100 });
    registry.recordExportJob(true);

    const snapshot = registry.snapshot();
    expect(snapshot.exports.attempts).toBe(2);
    expect(snapshot.exports.retries).toBe(1);
    expect(snapshot.exports.byOutcome).toEqual({ success: 1, timeout: 1 });
    expect(snapshot.exports.jobs).toEqual({ succeeded: 1 });
    expect(snapshot.exports.lastFailure).toMatchObject({ eventId: 'door', reason: 'timeout' });
    expect(snapshot.latencies['export.attempt']).toEqual({
      count: 2,
      totalMs: 400,
      minMs: 100,
      maxMs: 300,
      averageMs: 200
    });
  });

  it('tracks event transitions and the active gauge', () => {
    const registry = new MetricsRegistry();

    registry.recordEventTransition('created', 1);
    registry.recordEventTransition('created', 2);
    registry.recordEventTransition('canceled', 1);

    const snapshot = registry.snapshot();
    expect(snapshot.events.transitions).toEqual({ canceled: 1, created: 2 });
    expect(snapshot.events.active).toBe(1);
  });

  it('renders Prometheus text for the recorded series', () => {
    const registry = new MetricsRegistry();
    registry.recordEventTransition('created', 1);

    expect(registry.exportForPrometheus()).toBe(
      [
        '# HELP clipwarden_event_transitions_total Event lifecycle transitions',
        '# TYPE clipwarden_event_transitions_total counter',
        'clipwarden_event_transitions_total{transition="created"} 1',
        '# HELP clipwarden_events_active Events currently pending or exporting',
        '# TYPE clipwarden_events_active gauge',
        'clipwarden_events_active 1',
        ''
      ].join('\n')
    );
  });

  it('applies a prefix and shared labels', () => {
    const registry = new MetricsRegistry();
    registry.recordCombineGroup('merged');

    const lines = registry.exportForPrometheus({ prefix: 'archive', labels: { site: 'north' } }).split('\n');

    expect(lines).toContain('archive_combine_groups_total{outcome="merged",site="north"} 1');
    expect(lines).toContain('archive_events_active{site="north"} 0');
  });

  it('counts log lines per level and remembers the last error', () => {
    const registry = new MetricsRegistry();

    registry.incrementLogLevel('info');
    registry.incrementLogLevel('ERROR', { message: 'export failed' });

    const logs = registry.snapshot().logs;
    expect(logs.byLevel).toEqual({ info: 1, error: 1 });
    expect(logs.lastErrorMessage).toBe('export failed');
    expect(registry.exportLogLevelCountersForPrometheus().split('\n')).toContain(
      'clipwarden_log_level_total{level="error"} 1'
    );
  });

  it('clears everything on reset', () => {
    const registry = new MetricsRegistry();
    const listener = vi.fn();
    registry.onReset(listener);
    registry.recordCombineGroup('failed', { path: '/exports/door', reason: 'disk full' });
    registry.recordCombineRemovedFiles(3);

    registry.reset();

    const snapshot = registry.snapshot();
    expect(snapshot.combine).toEqual({ groups: {}, filesRemoved: 0, lastFailure: null });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('measures the duration of timed work', async () => {
    const registry = new MetricsRegistry();

    await expect(registry.time('startup', async () => 'ready')).resolves.toBe('ready');
    await expect(
      registry.time('shutdown', async () => {
        throw new Error('hook failed');
      })
    ).rejects.toThrow('hook failed');

    expect(registry.snapshot().latencies.startup?.count).toBe(1);
    expect(registry.snapshot().latencies.shutdown?.count).toBe(1);
  });
});

describe('LogLevelControl', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('changes the level and notifies listeners', () => {
    const listener = vi.fn();
    const dispose = onLogLevelChange(listener);

    expect(setLogLevel(' DEBUG ')).toBe('debug');
    expect(getLogLevel()).toBe('debug');
    expect(listener).toHaveBeenCalledWith('debug', initial);
    expect(metrics.snapshot().logs.currentLevel).toBe('debug');

    dispose();
  });

  it('rejects unknown levels', () => {
    expect(() => setLogLevel('loud')).toThrow(/^Unknown log level "loud"/);
    expect(getLogLevel()).toBe(initial);
  });
});
