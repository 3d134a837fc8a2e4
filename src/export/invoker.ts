import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import readline from 'node:readline';
import loggerModule, { type ComponentLogger } from '../logger.js';
import { describeCameras, formatTimestamp } from '../events/format.js';
import type { ExportAttemptResult, ExportJob } from '../types.js';

export const DEFAULT_EXPORT_TIMEOUT_MS = 300_000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 5000;
const DIAGNOSTIC_LINE_LIMIT = 20;
const REDACTED = '***';

export type ExportContext = {
  attempt: number;
};

/** The boundary to the external export executable. */
export interface ExporterInvoker {
  run(job: ExportJob, context?: ExportContext): Promise<ExportAttemptResult>;
}

/** The parts of a child process the exporter relies on. */
export interface ExportChildProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ExportChildProcess;

export type ExporterCredentials = {
  address: string;
  username: string;
  password: string;
};

export interface ProcessExporterOptions {
  command: string;
  /** Leading arguments such as the subcommand. */
  args?: string[];
  /** Flags appended before the output folder. */
  extraArgs?: string[];
  credentials: ExporterCredentials;
  timeZone?: string;
  timeoutMs?: number;
  forceKillTimeoutMs?: number;
  logger?: ComponentLogger;
  spawn?: SpawnProcess;
}

export function buildExportArgs(
  job: ExportJob,
  options: Pick<ProcessExporterOptions, 'args' | 'extraArgs' | 'credentials' | 'timeZone'>
): string[] {
  const timeZone = options.timeZone ?? 'UTC';
  return [
    ...(options.args ?? []),
    '--address',
    options.credentials.address,
    '--username',
    options.credentials.username,
    '--password',
    options.credentials.password,
    '--start',
    formatTimestamp(job.startTime, timeZone),
    '--end',
    formatTimestamp(job.endTime, timeZone),
    `--cameras=${describeCameras(job.cameras)}`,
    ...(options.extraArgs ?? []),
    job.outputDir
  ];
}

export function redactArgs(args: readonly string[], secret: string): string[] {
  return args.map(arg => (secret.length > 0 && arg === secret ? REDACTED : arg));
}

/** Output folder for an event; stable for the same identifier. */
export function resolveOutputDir(downloadsDir: string, eventId: string): string {
  const safe = eventId
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^\.+/, '_');
  return path.resolve(downloadsDir, safe.length > 0 ? safe : '_');
}

export class ProcessExporter implements ExporterInvoker {
  private readonly options: ProcessExporterOptions;
  private readonly logger: ComponentLogger;
  private readonly spawnProcess: SpawnProcess;

  constructor(options: ProcessExporterOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
    this.spawnProcess = options.spawn ?? spawn;
  }

  run(job: ExportJob, context: ExportContext = { attempt: 1 }): Promise<ExportAttemptResult> {
    const args = buildExportArgs(job, this.options);
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_EXPORT_TIMEOUT_MS;
    const forceKillTimeoutMs = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    const log = { event: job.eventId, attempt: context.attempt };

    this.logger.info(
      {
        ...log,
        command: this.options.command,
        args: redactArgs(args, this.options.credentials.password)
      },
      'Running export command'
    );

    const startedAt = performance.now();
    const diagnostics: string[] = [];
    const remember = (line: string) => {
      diagnostics.push(line);
      if (diagnostics.length > DIAGNOSTIC_LINE_LIMIT) {
        diagnostics.shift();
      }
    };

    return new Promise<ExportAttemptResult>(resolve => {
      let settled = false;
      let timedOut = false;
      let timeoutTimer: NodeJS.Timeout | null = null;
      let killTimer: NodeJS.Timeout | null = null;
      let abandonTimer: NodeJS.Timeout | null = null;

      const clearTimers = () => {
        if (timeoutTimer) {
          clearTimeout(timeoutTimer);
          timeoutTimer = null;
        }
        if (killTimer) {
          clearTimeout(killTimer);
          killTimer = null;
        }
        if (abandonTimer) {
          clearTimeout(abandonTimer);
          abandonTimer = null;
        }
      };

      const finish = (result: ExportAttemptResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimers();
        resolve(result);
      };

      let child: ExportChildProcess;
      try {
        child = this.spawnProcess(this.options.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error({ ...log, err: error }, 'Export command could not be started');
        finish({
          ok: false,
          reason: 'spawn-error',
          exitCode: null,
          signal: null,
          durationMs: performance.now() - startedAt,
          diagnostics: [message]
        });
        return;
      }

      if (child.stdout) {
        readline.createInterface({ input: child.stdout }).on('line', line => {
          const trimmed = line.trim();
          if (trimmed) {
            remember(trimmed);
            this.logger.info({ ...log, stream: 'stdout' }, trimmed);
          }
        });
      }
      if (child.stderr) {
        readline.createInterface({ input: child.stderr }).on('line', line => {
          const trimmed = line.trim();
          if (trimmed) {
            remember(trimmed);
            this.logger.warn({ ...log, stream: 'stderr' }, trimmed);
          }
        });
      }

      const settleExit = (code: number | null, signal: NodeJS.Signals | null) => {
        const durationMs = performance.now() - startedAt;
        if (!timedOut && code === 0) {
          this.logger.info({ ...log, durationMs }, 'Export command completed');
          finish({ ok: true, exitCode: 0, durationMs });
          return;
        }

        const reason = timedOut ? 'timeout' : 'exit';
        this.logger.error({ ...log, exitCode: code, signal, reason, durationMs }, 'Export command failed');
        finish({
          ok: false,
          reason,
          exitCode: code,
          signal,
          durationMs,
          diagnostics: [...diagnostics]
        });
      };

      // Output pipes can outlive the process when a descendant inherited them.
      const abandonAfter = (delayMs: number) => {
        if (settled || abandonTimer) {
          return;
        }
        abandonTimer = setTimeout(() => {
          abandonTimer = null;
          if (settled) {
            return;
          }
          this.logger.warn({ ...log }, 'Export output still open after exit, detaching');
          child.stdout?.destroy();
          child.stderr?.destroy();
          settleExit(child.exitCode, child.signalCode);
        }, delayMs);
      };

      if (timeoutMs > 0) {
        timeoutTimer = setTimeout(() => {
          timeoutTimer = null;
          timedOut = true;
          this.logger.warn({ ...log, timeoutMs }, 'Export command timed out, terminating');
          child.kill('SIGTERM');
          if (settled) {
            return;
          }
          killTimer = setTimeout(() => {
            killTimer = null;
            if (child.exitCode === null && child.signalCode === null) {
              this.logger.warn({ ...log }, 'Export command ignored SIGTERM, killing');
              child.kill('SIGKILL');
            }
            abandonAfter(forceKillTimeoutMs);
          }, forceKillTimeoutMs);
        }, timeoutMs);
      }

      child.once('error', (error: Error) => {
        this.logger.error({ ...log, err: error }, 'Export command failed to run');
        remember(error.message);
        finish({
          ok: false,
          reason: 'spawn-error',
          exitCode: null,
          signal: null,
          durationMs: performance.now() - startedAt,
          diagnostics: [...diagnostics]
        });
      });

      child.once('exit', () => {
        abandonAfter(forceKillTimeoutMs);
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settleExit(code, signal);
      });
    });
  }
}

export default ProcessExporter;
