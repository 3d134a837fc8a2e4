import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { assertExporterCredentials, loadConfig, type ClipwardenConfig } from './config/index.js';
import { ProcessExporter, type SpawnProcess } from './export/invoker.js';
import { ExportPipeline } from './export/pipeline.js';
import { FileCombiner, type ConcatSegments } from './combine/combiner.js';
import { createFfmpegConcat } from './combine/ffmpegConcat.js';
import { EventManager } from './manager.js';
import { StatusReporter } from './tasks/statusReporter.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, hook: entry.name }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

export interface BootstrapOptions {
  config?: ClipwardenConfig;
  spawn?: SpawnProcess;
  concat?: ConcatSegments;
}

export type AppRuntime = {
  config: ClipwardenConfig;
  manager: EventManager;
  pipeline: ExportPipeline;
  reporter: StatusReporter;
  http: HttpServerRuntime;
  stop: () => Promise<void>;
};

export async function bootstrap(options: BootstrapOptions = {}): Promise<AppRuntime> {
  const appConfig = options.config ?? loadConfig();
  assertExporterCredentials(appConfig);
  setLogLevel(appConfig.logging.level);

  logger.info({ name: appConfig.app.name, timeZone: appConfig.app.timeZone }, 'Bootstrap starting');

  const timeZone = appConfig.app.timeZone;
  const downloadsDir = path.resolve(appConfig.export.downloadsDir);

  const invoker = new ProcessExporter({
    command: appConfig.export.command,
    args: appConfig.export.args,
    extraArgs: appConfig.export.extraArgs,
    credentials: appConfig.protect,
    timeZone,
    timeoutMs: appConfig.export.timeoutSeconds * 1000,
    forceKillTimeoutMs: appConfig.export.forceKillTimeoutMs,
    spawn: options.spawn
  });

  const combiner = appConfig.combine.enabled
    ? new FileCombiner({
        concat: options.concat ?? createFfmpegConcat({ ffmpegPath: appConfig.combine.ffmpegPath }),
        keepSplitFiles: appConfig.combine.keepSplitFiles,
        toleranceMs: appConfig.combine.toleranceMs,
        timeZone
      })
    : null;

  const pipeline = new ExportPipeline({
    invoker,
    downloadsDir,
    combiner,
    maxRetries: appConfig.export.maxRetries,
    retryDelayMs: appConfig.export.retryDelaySeconds * 1000
  });

  const manager = new EventManager({
    pipeline,
    defaults: {
      pastMinutes: appConfig.events.defaultPastMinutes,
      futureMinutes: appConfig.events.defaultFutureMinutes
    }
  });

  const reporter = new StatusReporter({
    source: manager,
    intervalMs: appConfig.status.logIntervalSeconds * 1000,
    timeZone
  });
  reporter.start();

  let http: HttpServerRuntime;
  try {
    http = await startHttpServer({
      port: appConfig.server.port,
      host: appConfig.server.host,
      manager,
      timeZone,
      metrics
    });
  } catch (error) {
    reporter.stop();
    manager.stop();
    throw error;
  }

  const unregister = [
    registerShutdownHook('http-server', () => http.close()),
    registerShutdownHook('status-reporter', () => {
      reporter.stop();
    }),
    registerShutdownHook('event-manager', async () => {
      manager.stop();
      pipeline.abort();
      await manager.drain();
    })
  ];

  logger.info({ port: http.port, downloadsDir }, 'Bootstrap completed');

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = runShutdownHooks({ reason: 'runtime-stop' }).then(results => {
        for (const dispose of unregister) {
          dispose();
        }
        const failed = results.find(result => result.status === 'error');
        if (failed?.error) {
          throw failed.error;
        }
      });
    }
    return stopping;
  };

  return { config: appConfig, manager, pipeline, reporter, http, stop };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
