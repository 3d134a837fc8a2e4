import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  assertExporterCredentials,
  checkConfig,
  loadConfig,
  loadConfigFromFile,
  parseConfig,
  type ClipwardenConfig
} from '../src/config/index.js';

function baseConfig(): ClipwardenConfig {
  return {
    app: { name: 'Clipwarden', timeZone: 'Europe/Berlin' },
    logging: { level: 'info' },
    server: { host: '0.0.0.0', port: 8888 },
    events: { defaultPastMinutes: 5, defaultFutureMinutes: 5 },
    status: { logIntervalSeconds: 10 },
    protect: { address: '127.0.0.1', username: 'test-user', password: 'test-secret' },
    export: {
      command: 'protect-archiver',
      args: ['download'],
      downloadsDir: 'downloads',
      maxRetries: 3,
      retryDelaySeconds: 5,
      timeoutSeconds: 300
    },
    combine: { enabled: true, keepSplitFiles: true, toleranceMs: 1000 }
  };
}

describe('ConfigValidation', () => {
  it('accepts a complete configuration', () => {
    const config = baseConfig();
    expect(checkConfig(config)).toBe(config);
  });

  it('lists every schema violation', () => {
    const config = {
      ...baseConfig(),
      server: { host: '0.0.0.0', port: 70000 },
      export: { ...baseConfig().export, maxRetries: 1.5 },
      extra: true
    };

    expect(() => checkConfig(config)).toThrow(
      'config.extra is not allowed; config.server.port must be <= 65535; config.export.maxRetries must be an integer'
    );
  });

  it('reports missing sections', () => {
    const { combine: _combine, ...rest } = baseConfig();
    expect(() => checkConfig(rest)).toThrow('config.combine is required');
  });

  it('rejects unknown time zones and blank commands', () => {
    const config = baseConfig();
    config.app.timeZone = 'Mars/Olympus';
    config.export.command = '  ';

    expect(() => checkConfig(config)).toThrow(
      'config.app.timeZone "Mars/Olympus" is not a known IANA time zone; config.export.command must be a non-empty string'
    );
  });

  it('requires exporter credentials before starting', () => {
    const config = baseConfig();
    config.protect.username = '';
    config.protect.password = '';

    expect(() => assertExporterCredentials(config)).toThrow(
      'Missing exporter credentials: config.protect.username, config.protect.password'
    );
    expect(() => assertExporterCredentials(baseConfig())).not.toThrow();
  });

  it('reports unparsable JSON', () => {
    expect(() => parseConfig('{')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('ConfigLoading', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('reads a configuration file', () => {
    const file = path.join(directory, 'config.json');
    fs.writeFileSync(file, JSON.stringify(baseConfig()));

    expect(loadConfigFromFile(file).app.timeZone).toBe('Europe/Berlin');
  });

  it('layers the test overrides over the defaults', () => {
    const config = loadConfig();

    expect(config.server).toEqual({ host: '127.0.0.1', port: 0 });
    expect(config.protect).toEqual({ address: '127.0.0.1', username: 'test-user', password: 'test-secret' });
    expect(config.export.maxRetries).toBe(3);
    expect(config.export.retryDelaySeconds).toBe(5);
    expect(config.events).toEqual({ defaultPastMinutes: 5, defaultFutureMinutes: 5 });
    expect(config.logging.level).toBe('silent');
  });
});
