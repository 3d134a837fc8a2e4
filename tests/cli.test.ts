import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Writable } from 'node:stream';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseCombineArgs, runCli, type ServiceRuntime } from '../src/cli.js';
import { getLogLevel } from '../src/logger.js';
import { loadConfig, type ClipwardenConfig } from '../src/config/index.js';
import type { ConcatSegments } from '../src/combine/combiner.js';

type TestIo = {
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream };
  stdout: () => string;
  stderr: () => string;
};

function createTestIo(): TestIo {
  let stdout = '';
  let stderr = '';

  const makeWritable = (append: (value: string) => void) =>
    new Writable({
      write(chunk, _enc, callback) {
        append(typeof chunk === 'string' ? chunk : String(chunk));
        callback();
      }
    });

  return {
    io: {
      stdout: makeWritable(value => {
        stdout += value;
      }),
      stderr: makeWritable(value => {
        stderr += value;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

function utcConfig(): ClipwardenConfig {
  const config = loadConfig();
  return { ...config, app: { ...config.app, timeZone: 'UTC' } };
}

const FIRST = 'Cam - 2026-03-01 - 10.00.00+0000 - 2026-03-01 - 10.10.00+0000.mp4';
const SECOND = 'Cam - 2026-03-01 - 10.10.00+0000 - 2026-03-01 - 10.20.00+0000.mp4';
const MERGED = 'Cam - 2026-03-01 - 10.00.00+0000 - 2026-03-01 - 10.20.00+0000.mp4';

const concatenate: ConcatSegments = async (inputs, outputPath) => {
  const parts = await Promise.all(inputs.map(input => fs.readFile(input, 'utf-8')));
  await fs.writeFile(outputPath, parts.join(''));
};

describe('CliCommands', () => {
  it('prints usage for help', async () => {
    const { io, stdout } = createTestIo();

    await expect(runCli(['help'], io)).resolves.toBe(0);

    expect(stdout().split('\n')[0]).toBe('Clipwarden CLI');
  });

  it('rejects unknown commands', async () => {
    const { io, stderr } = createTestIo();

    await expect(runCli(['explode'], io)).resolves.toBe(1);

    expect(stderr().split('\n')[0]).toBe('Unknown command: explode');
  });
});

describe('CliLogLevel', () => {
  const initial = getLogLevel();

  afterEach(async () => {
    await runCli(['log-level', 'set', initial], createTestIo().io);
  });

  it('shows the current level', async () => {
    const { io, stdout } = createTestIo();

    await expect(runCli(['log-level'], io)).resolves.toBe(0);

    expect(stdout()).toBe(`${initial}\n`);
  });

  it('changes the level', async () => {
    const { io, stdout } = createTestIo();

    await expect(runCli(['log-level', 'set', 'warn'], io)).resolves.toBe(0);

    expect(stdout()).toBe('Log level set to warn\n');
    expect(getLogLevel()).toBe('warn');
  });

  it('refuses unknown levels and missing values', async () => {
    const unknown = createTestIo();
    await expect(runCli(['log-level', 'loud'], unknown.io)).resolves.toBe(1);
    expect(unknown.stderr().startsWith('Unknown log level "loud" (available: ')).toBe(true);

    const missing = createTestIo();
    await expect(runCli(['log-level', 'set'], missing.io)).resolves.toBe(1);
    expect(missing.stderr().split('\n')[0]).toBe('Missing value for log level');

    expect(getLogLevel()).toBe(initial);
  });
});

describe('CliCombine', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-combine-'));
    await fs.writeFile(path.join(directory, FIRST), 'a');
    await fs.writeFile(path.join(directory, SECOND), 'b');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('merges a folder and prints the report', async () => {
    const { io, stdout } = createTestIo();

    const code = await runCli(['combine', directory, '--delete-split'], io, {
      loadConfig: utcConfig,
      concat: concatenate
    });

    expect(code).toBe(0);
    const report: { combined: Array<{ output: string; removed: string[] }> } = JSON.parse(stdout());
    expect(report.combined).toHaveLength(1);
    expect(report.combined[0]?.output).toBe(MERGED);
    expect(report.combined[0]?.removed).toEqual([FIRST, SECOND]);
    expect(await fs.readdir(directory)).toEqual([MERGED]);
  });

  it('fails when a group cannot be merged', async () => {
    const { io } = createTestIo();

    const code = await runCli(['combine', directory], io, {
      loadConfig: utcConfig,
      concat: async () => {
        throw new Error('ffmpeg exited with code 1');
      }
    });

    expect(code).toBe(1);
    expect((await fs.readdir(directory)).sort()).toEqual([FIRST, SECOND].sort());
  });

  it('reports configuration errors', async () => {
    const { io, stderr } = createTestIo();

    const code = await runCli(['combine', directory], io, {
      loadConfig: () => {
        throw new Error('config.combine is required');
      }
    });

    expect(code).toBe(1);
    expect(stderr()).toBe('config.combine is required\n');
  });

  it('parses combine arguments', () => {
    expect(parseCombineArgs(['/exports/door', '--tolerance-ms', '250', '--delete-split'])).toEqual({
      directory: '/exports/door',
      deleteSplit: true,
      toleranceMs: 250,
      help: false,
      errors: []
    });
    expect(parseCombineArgs(['--tolerance-ms', '-5', '--force', 'a', 'b']).errors).toEqual([
      '--tolerance-ms expects a non-negative number',
      'Unknown option: --force',
      'Unexpected argument: b'
    ]);
    expect(parseCombineArgs([]).errors).toEqual(['Missing directory to combine']);
    expect(parseCombineArgs(['--help']).errors).toEqual([]);
  });
});

describe('CliStart', () => {
  function fakeRuntime(stop: () => Promise<void>): ServiceRuntime {
    return { config: { server: { host: '127.0.0.1', port: 0 } }, http: { port: 4321 }, stop };
  }

  it('runs until a shutdown signal and then stops the service', async () => {
    const { io, stdout } = createTestIo();
    const stop = vi.fn(async () => {});

    const code = await runCli(['start'], io, {
      bootstrap: async () => fakeRuntime(stop),
      waitForShutdown: async () => 'SIGTERM'
    });

    expect(code).toBe(0);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(stdout()).toBe('Clipwarden listening on 127.0.0.1:4321\nClipwarden stopped\n');
  });

  it('reports a failed startup', async () => {
    const { io, stderr } = createTestIo();
    const waitForShutdown = vi.fn(async () => undefined);

    const code = await runCli(['start'], io, {
      bootstrap: async () => {
        throw new Error('Missing exporter credentials: config.protect.password');
      },
      waitForShutdown
    });

    expect(code).toBe(1);
    expect(stderr()).toBe('Clipwarden failed to start: Missing exporter credentials: config.protect.password\n');
    expect(waitForShutdown).not.toHaveBeenCalled();
  });

  it('returns an error code when stopping fails', async () => {
    const { io, stdout } = createTestIo();

    const code = await runCli(['start'], io, {
      bootstrap: async () =>
        fakeRuntime(async () => {
          throw new Error('server close failed');
        }),
      waitForShutdown: async () => 'SIGINT'
    });

    expect(code).toBe(1);
    expect(stdout()).toBe('Clipwarden listening on 127.0.0.1:4321\n');
  });
});
