import fs from 'node:fs/promises';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { toError } from '../errors.js';
import type { CombineReport, FileCombiner } from '../combine/combiner.js';
import type { ExportAttemptResult, ExportJob } from '../types.js';
import { resolveOutputDir, type ExporterInvoker } from './invoker.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS, runWithRetry } from './retry.js';

export type ExportRequest = {
  eventId: string;
  startTime: Date;
  endTime: Date;
  cameras: string[];
};

export type PipelineResult = {
  ok: boolean;
  job: ExportJob;
  attempts: number;
  lastAttempt: ExportAttemptResult | null;
  error: string | null;
  combine: CombineReport | null;
};

/** What the event manager needs from an export pipeline. */
export interface ExportRunner {
  run(request: ExportRequest): Promise<PipelineResult>;
}

export interface ExportPipelineOptions {
  invoker: ExporterInvoker;
  downloadsDir: string;
  combiner?: Pick<FileCombiner, 'combineDirectory'> | null;
  maxRetries?: number;
  retryDelayMs?: number;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
}

/**
 * Retry policy around the exporter followed by the combiner. Runs that share
 * an output folder are queued behind each other.
 */
export class ExportPipeline implements ExportRunner {
  private readonly options: ExportPipelineOptions;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly abortController = new AbortController();

  constructor(options: ExportPipelineOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  /** Number of output folders with a run queued or in flight. */
  get busyFolders() {
    return this.queues.size;
  }

  run(request: ExportRequest): Promise<PipelineResult> {
    const job: ExportJob = {
      ...request,
      cameras: [...request.cameras],
      outputDir: resolveOutputDir(this.options.downloadsDir, request.eventId)
    };

    const previous = this.queues.get(job.outputDir);
    if (previous) {
      this.logger.info(
        { event: job.eventId, outputDir: job.outputDir },
        'Export queued behind a running export for the same folder'
      );
    }

    const current = (previous ?? Promise.resolve()).then(() => this.execute(job));
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(job.outputDir, settled);
    void settled.then(() => {
      if (this.queues.get(job.outputDir) === settled) {
        this.queues.delete(job.outputDir);
      }
    });

    return current;
  }

  /** Stops further retry attempts; a running command finishes or times out on its own. */
  abort() {
    this.abortController.abort();
  }

  private async execute(job: ExportJob): Promise<PipelineResult> {
    const log = { event: job.eventId };
    try {
      await fs.mkdir(job.outputDir, { recursive: true });
    } catch (error) {
      const err = toError(error);
      this.logger.error({ ...log, err, outputDir: job.outputDir }, 'Could not create export folder');
      this.metrics.recordExportJob(false);
      return { ok: false, job, attempts: 0, lastAttempt: null, error: err.message, combine: null };
    }

    const retry = await runWithRetry(attempt => this.options.invoker.run(job, { attempt }), {
      maxRetries: this.options.maxRetries ?? DEFAULT_MAX_RETRIES,
      retryDelayMs: this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      signal: this.abortController.signal,
      onAttempt: (attempt, outcome) => {
        if (outcome.value) {
          this.metrics.recordExportAttempt(job.eventId, attempt, outcome.value);
        } else if ('error' in outcome && outcome.error) {
          this.logger.error({ ...log, attempt, err: outcome.error }, 'Export attempt threw');
        }
      },
      onRetry: (nextAttempt, delayMs) => {
        this.logger.info(
          { ...log, attempt: nextAttempt, maxRetries: this.options.maxRetries ?? DEFAULT_MAX_RETRIES, delayMs },
          'Retrying export'
        );
      }
    });

    this.metrics.recordExportJob(retry.ok);

    if (!retry.ok) {
      const error = retry.aborted
        ? 'export aborted'
        : retry.error?.message ?? describeFailure(retry.value);
      this.logger.error({ ...log, attempts: retry.attempts, error }, 'Export failed, giving up');
      return { ok: false, job, attempts: retry.attempts, lastAttempt: retry.value, error, combine: null };
    }

    this.logger.info({ ...log, attempts: retry.attempts, outputDir: job.outputDir }, 'Export finished');

    let combine: CombineReport | null = null;
    const combiner = this.options.combiner;
    if (combiner) {
      try {
        combine = await combiner.combineDirectory(job.outputDir);
      } catch (error) {
        this.logger.error({ ...log, err: error, outputDir: job.outputDir }, 'Combining exported segments failed');
      }
    }

    return { ok: true, job, attempts: retry.attempts, lastAttempt: retry.value, error: null, combine };
  }
}

function describeFailure(result: ExportAttemptResult | null): string {
  if (!result || result.ok) {
    return 'export failed';
  }
  if (result.reason === 'timeout') {
    return 'export timed out';
  }
  if (result.reason === 'spawn-error') {
    return result.diagnostics.at(-1) ?? 'export command could not be started';
  }
  return `export exited with code ${result.exitCode ?? 'null'}${result.signal ? ` (${result.signal})` : ''}`;
}

export default ExportPipeline;
