import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ExportPipeline, type ExportRequest } from '../src/export/pipeline.js';
import type { ExporterInvoker } from '../src/export/invoker.js';
import type { CombineReport } from '../src/combine/combiner.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { ExportAttemptResult, ExportJob } from '../src/types.js';

const success: ExportAttemptResult = { ok: true, exitCode: 0, durationMs: 10 };
const failure: ExportAttemptResult = {
  ok: false,
  reason: 'exit',
  exitCode: 1,
  signal: null,
  durationMs: 10,
  diagnostics: ['connection refused']
};

const request: ExportRequest = {
  eventId: 'door',
  startTime: new Date('2026-03-01T11:55:00.000Z'),
  endTime: new Date('2026-03-01T12:05:00.000Z'),
  cameras: ['cam-a']
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function scriptedInvoker(...results: ExportAttemptResult[]) {
  const run = vi.fn(async (_job: ExportJob, context?: { attempt: number }) => {
    const attempt = context?.attempt ?? 1;
    return results[attempt - 1] ?? results[results.length - 1] ?? failure;
  });
  const invoker: ExporterInvoker = { run };
  return { invoker, run };
}

function emptyReport(directory: string): CombineReport {
  return { directory, scanned: 0, ignored: [], untouched: [], covered: [], combined: [], failed: [] };
}

describe('ExportPipeline', () => {
  let downloadsDir: string;

  beforeEach(async () => {
    downloadsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-test-'));
  });

  afterEach(async () => {
    await fs.rm(downloadsDir, { recursive: true, force: true });
  });

  it('retries until the export succeeds and then combines the folder', async () => {
    const { invoker, run } = scriptedInvoker(failure, success);
    const combineDirectory = vi.fn(async (directory: string) => emptyReport(directory));
    const metrics = new MetricsRegistry();
    const pipeline = new ExportPipeline({
      invoker,
      downloadsDir,
      combiner: { combineDirectory },
      maxRetries: 3,
      retryDelayMs: 0,
      logger: createLogger(),
      metrics
    });

    const result = await pipeline.run(request);
    const outputDir = path.join(downloadsDir, 'door');

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(2);
    expect(result.job).toEqual({ ...request, outputDir });
    expect(run).toHaveBeenCalledTimes(2);
    expect(run.mock.calls[1]?.[1]).toEqual({ attempt: 2 });
    expect(combineDirectory).toHaveBeenCalledWith(outputDir);
    expect(result.combine).toEqual(emptyReport(outputDir));
    expect((await fs.stat(outputDir)).isDirectory()).toBe(true);

    const snapshot = metrics.snapshot();
    expect(snapshot.exports.attempts).toBe(2);
    expect(snapshot.exports.retries).toBe(1);
    expect(snapshot.exports.byOutcome).toEqual({ exit: 1, success: 1 });
    expect(snapshot.exports.jobs).toEqual({ succeeded: 1 });
  });

  it('gives up after the maximum attempts without combining', async () => {
    const { invoker, run } = scriptedInvoker(failure);
    const combineDirectory = vi.fn(async (directory: string) => emptyReport(directory));
    const pipeline = new ExportPipeline({
      invoker,
      downloadsDir,
      combiner: { combineDirectory },
      maxRetries: 3,
      retryDelayMs: 0,
      logger: createLogger(),
      metrics: new MetricsRegistry()
    });

    const result = await pipeline.run(request);

    expect(run).toHaveBeenCalledTimes(3);
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.error).toBe('export exited with code 1');
    expect(result.lastAttempt).toEqual(failure);
    expect(combineDirectory).not.toHaveBeenCalled();
  });

  it('describes a timeout as the failure reason', async () => {
    const { invoker } = scriptedInvoker({ ...failure, reason: 'timeout', exitCode: null, signal: 'SIGTERM' });
    const pipeline = new ExportPipeline({
      invoker,
      downloadsDir,
      maxRetries: 1,
      retryDelayMs: 0,
      logger: createLogger(),
      metrics: new MetricsRegistry()
    });

    const result = await pipeline.run(request);

    expect(result.error).toBe('export timed out');
  });

  it('treats a combiner failure as non-fatal', async () => {
    const { invoker } = scriptedInvoker(success);
    const logger = createLogger();
    const pipeline = new ExportPipeline({
      invoker,
      downloadsDir,
      combiner: {
        combineDirectory: async () => {
          throw new Error('disk full');
        }
      },
      retryDelayMs: 0,
      logger,
      metrics: new MetricsRegistry()
    });

    const result = await pipeline.run(request);

    expect(result.ok).toBe(true);
    expect(result.combine).toBeNull();
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'door', err: new Error('disk full') }),
      'Combining exported segments failed'
    );
  });

  it('runs exports for the same folder one after another', async () => {
    const releases: Array<() => void> = [];
    const run = vi.fn(
      (_job: ExportJob) =>
        new Promise<ExportAttemptResult>(resolve => {
          releases.push(() => resolve(success));
        })
    );
    const pipeline = new ExportPipeline({
      invoker: { run },
      downloadsDir,
      retryDelayMs: 0,
      logger: createLogger(),
      metrics: new MetricsRegistry()
    });

    const first = pipeline.run(request);
    const second = pipeline.run({ ...request, startTime: new Date('2026-03-01T12:06:00.000Z') });
    const other = pipeline.run({ ...request, eventId: 'gate' });

    await vi.waitFor(() => {
      expect(run).toHaveBeenCalledTimes(2);
    });
    expect(pipeline.busyFolders).toBe(2);
    expect(run.mock.calls.map(call => call[0].eventId)).toEqual(['door', 'gate']);

    releases[0]?.();
    await first;
    await vi.waitFor(() => {
      expect(run).toHaveBeenCalledTimes(3);
    });

    releases[1]?.();
    releases[2]?.();
    await Promise.all([second, other]);
    await vi.waitFor(() => {
      expect(pipeline.busyFolders).toBe(0);
    });
  });

  it('stops retrying after abort', async () => {
    const { invoker, run } = scriptedInvoker(failure);
    const pipeline = new ExportPipeline({
      invoker,
      downloadsDir,
      maxRetries: 5,
      retryDelayMs: 60_000,
      logger: createLogger(),
      metrics: new MetricsRegistry()
    });

    const pending = pipeline.run(request);
    await vi.waitFor(() => {
      expect(run).toHaveBeenCalledTimes(1);
    });
    pipeline.abort();

    const result = await pending;
    expect(result.ok).toBe(false);
    expect(result.error).toBe('export aborted');
    expect(run).toHaveBeenCalledTimes(1);
  });
});
