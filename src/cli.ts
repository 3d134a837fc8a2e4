#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { bootstrap } from './app.js';
import { loadConfig, type ClipwardenConfig } from './config/index.js';
import { FileCombiner, type CombineReport, type ConcatSegments } from './combine/combiner.js';
import { createFfmpegConcat } from './combine/ffmpegConcat.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

/** What `start` needs from a booted service. */
export type ServiceRuntime = {
  config: Pick<ClipwardenConfig, 'server'>;
  http: { port: number };
  stop: () => Promise<void>;
};

export type CliDeps = {
  loadConfig?: () => ClipwardenConfig;
  bootstrap?: () => Promise<ServiceRuntime>;
  concat?: ConcatSegments;
  /** Resolves when the running service should shut down; defaults to SIGTERM/SIGINT. */
  waitForShutdown?: () => Promise<NodeJS.Signals | undefined>;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Clipwarden CLI',
  '',
  'Usage:',
  '  clipwarden start                 Run the HTTP service and export scheduler',
  '  clipwarden combine <dir> [options]  Merge contiguous recording segments in a folder',
  '  clipwarden log-level             Get or set the active log level',
  '  clipwarden help                  Show this help message'
];

const COMBINE_USAGE = [
  'Clipwarden combine command',
  '',
  'Usage:',
  '  clipwarden combine <dir> [--delete-split] [--tolerance-ms <ms>]',
  '',
  'Options:',
  '  --delete-split        Remove the split files after a successful merge',
  '  --tolerance-ms <ms>   Largest gap between segments that still counts as contiguous',
  '  -h, --help            Show this help message'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Clipwarden log level',
  '',
  'Usage:',
  '  clipwarden log-level              Show the current log level',
  '  clipwarden log-level get          Show the current log level',
  '  clipwarden log-level set <level>  Change the active log level',
  '  clipwarden log-level <level>      Shortcut for set'
].join('\n');

type CombineArgs = {
  directory?: string;
  deleteSplit: boolean;
  toleranceMs?: number;
  help: boolean;
  errors: string[];
};

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDeps = {}
): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return startService(io, deps);
    }
    case 'combine': {
      return runCombineCommand(argv.slice(1), io, deps);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

export function parseCombineArgs(args: string[]): CombineArgs {
  const parsed: CombineArgs = { deleteSplit: false, help: false, errors: [] };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    switch (arg) {
      case '--delete-split': {
        parsed.deleteSplit = true;
        break;
      }
      case '--tolerance-ms': {
        const value = args[index + 1];
        index += 1;
        const numeric = value === undefined ? Number.NaN : Number(value);
        if (!Number.isFinite(numeric) || numeric < 0) {
          parsed.errors.push('--tolerance-ms expects a non-negative number');
        } else {
          parsed.toleranceMs = numeric;
        }
        break;
      }
      case '-h':
      case '--help': {
        parsed.help = true;
        break;
      }
      default: {
        if (arg.startsWith('-')) {
          parsed.errors.push(`Unknown option: ${arg}`);
        } else if (parsed.directory === undefined) {
          parsed.directory = arg;
        } else {
          parsed.errors.push(`Unexpected argument: ${arg}`);
        }
      }
    }
  }

  if (!parsed.help && parsed.directory === undefined) {
    parsed.errors.push('Missing directory to combine');
  }

  return parsed;
}

async function runCombineCommand(args: string[], io: CliIo, deps: CliDeps): Promise<number> {
  const parsed = parseCombineArgs(args);
  if (parsed.help) {
    io.stdout.write(`${COMBINE_USAGE}\n`);
    return 0;
  }
  if (parsed.errors.length > 0 || parsed.directory === undefined) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    io.stderr.write(`${COMBINE_USAGE}\n`);
    return 1;
  }

  let appConfig: ClipwardenConfig;
  try {
    appConfig = (deps.loadConfig ?? loadConfig)();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }

  const combiner = new FileCombiner({
    concat: deps.concat ?? createFfmpegConcat({ ffmpegPath: appConfig.combine.ffmpegPath }),
    keepSplitFiles: !parsed.deleteSplit,
    toleranceMs: parsed.toleranceMs ?? appConfig.combine.toleranceMs,
    timeZone: appConfig.app.timeZone
  });

  let report: CombineReport;
  try {
    report = await combiner.combineDirectory(path.resolve(parsed.directory));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Combine failed: ${message}\n`);
    return 1;
  }

  io.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  return report.failed.length > 0 ? 1 : 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

async function startService(io: CliIo, deps: CliDeps): Promise<number> {
  let runtime: ServiceRuntime;
  try {
    runtime = await metrics.time('service.startup.ms', () => (deps.bootstrap ?? bootstrap)());
  } catch (error) {
    logger.error({ err: error }, 'Clipwarden failed to start');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Clipwarden failed to start: ${message}\n`);
    return 1;
  }

  io.stdout.write(`Clipwarden listening on ${runtime.config.server.host}:${runtime.http.port}\n`);

  const signal = await (deps.waitForShutdown ?? waitForSignal)();
  logger.info({ signal }, 'Clipwarden shutting down');

  try {
    await metrics.time('service.shutdown.ms', () => runtime.stop());
  } catch (error) {
    logger.error({ err: error }, 'Error during shutdown');
    io.stderr.write('Clipwarden encountered an error while stopping. Check logs for details.\n');
    return 1;
  }

  io.stdout.write('Clipwarden stopped\n');
  return 0;
}

function waitForSignal(): Promise<NodeJS.Signals | undefined> {
  return new Promise(resolve => {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
    const handleSignal = (signal: NodeJS.Signals) => {
      for (const other of signals) {
        process.off(other, handleSignal);
      }
      resolve(signal);
    };
    for (const signal of signals) {
      process.once(signal, handleSignal);
    }
  });
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Clipwarden CLI failed');
      process.exit(1);
    }
  );
}
