import path from 'node:path';
import process from 'node:process';
import { loadConfigFromFile, loadConfig, type ClipwardenConfig } from '../src/config/index.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export type HealthcheckDeps = {
  fetch?: FetchLike;
  loadConfig?: () => ClipwardenConfig;
  timeoutMs?: number;
};

function printUsage(target: Writable) {
  target.write(
    [
      'Clipwarden healthcheck helper',
      '',
      'Usage:',
      '  tsx scripts/healthcheck.ts [--url <url>] [--pretty]',
      '',
      'Options:',
      '  --url <url>          Health endpoint to query (default: http://<server.host>:<server.port>/health)',
      '  --pretty             Pretty-print JSON output with indentation',
      '  -c, --config <path>  Read server address from an alternate configuration file',
      '  -h, --help           Show this help message'
    ].join('\n') + '\n'
  );
}

type ParsedArgs = {
  url: string | null;
  pretty: boolean;
  help: boolean;
  errors: string[];
  configPath: string | null;
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { url: null, pretty: false, help: false, errors: [], configPath: null };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === '--config' || token === '-c' || token === '--url') {
      const next = argv[index + 1];
      if (!next) {
        parsed.errors.push(`Missing value for ${token}`);
      } else if (token === '--url') {
        parsed.url = next;
      } else {
        parsed.configPath = next;
      }
      index += 1;
      continue;
    }

    switch (token) {
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return parsed;
}

export function resolveHealthUrl(config: Pick<ClipwardenConfig, 'server'>): string {
  const host = config.server.host === '0.0.0.0' || config.server.host === '::' ? '127.0.0.1' : config.server.host;
  const formattedHost = host.includes(':') ? `[${host}]` : host;
  return `http://${formattedHost}:${config.server.port}/health`;
}

export async function runHealthcheck(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  deps: HealthcheckDeps = {}
): Promise<number> {
  const args = parseArgs(argv);
  if (args.errors.length > 0) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stdout);
    return 1;
  }
  if (args.help) {
    printUsage(streams.stdout);
    return 0;
  }

  let url = args.url;
  if (!url) {
    try {
      const configPath = args.configPath;
      const appConfig = configPath ? loadConfigFromFile(configPath) : (deps.loadConfig ?? loadConfig)();
      url = resolveHealthUrl(appConfig);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      streams.stderr.write(`Failed to load configuration: ${message}\n`);
      return 1;
    }
  }

  const fetchImpl: FetchLike = deps.fetch ?? fetch;
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(deps.timeoutMs ?? 5000) });
    const body = await response.text();
    if (!response.ok) {
      streams.stderr.write(`Health endpoint returned ${response.status}\n`);
      return 1;
    }
    const payload: unknown = JSON.parse(body);
    const output = args.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
    streams.stdout.write(`${output}\n`);
    return isHealthy(payload) ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    streams.stderr.write(`Healthcheck failed: ${message}\n`);
    return 1;
  }
}

function isHealthy(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'status' in payload && payload.status === 'ok';
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'healthcheck.ts' || scriptName === 'healthcheck.js') {
  runHealthcheck(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    process.stderr.write(`Healthcheck failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
