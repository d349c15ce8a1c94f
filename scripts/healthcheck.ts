#!/usr/bin/env tsx
import path from 'node:path';
import process from 'node:process';
import { loadRuntimeConfig, type ServerConfig } from '../src/config/index.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  status: number;
  json(): Promise<unknown>;
}>;

export type HealthcheckOptions = {
  fetch?: FetchLike;
  loadServerConfig?: () => ServerConfig;
  timeoutMs?: number;
};

type ParsedArgs = {
  url: string | null;
  pretty: boolean;
  help: boolean;
  errors: string[];
};

function printUsage(target: Writable) {
  target.write(
    [
      'vendorcat healthcheck helper',
      '',
      'Usage:',
      '  tsx scripts/healthcheck.ts [--url <url>] [--pretty]',
      '',
      'Options:',
      '  --url <url>    Probe this URL instead of the configured health endpoint',
      '  --pretty       Pretty-print JSON output with indentation',
      '  -h, --help     Show this help message',
      '',
      'Exit codes: 0 healthy, 1 degraded or unreachable'
    ].join('\n') + '\n'
  );
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { url: null, pretty: false, help: false, errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--url') {
      const next = argv[index + 1];
      if (!next) {
        parsed.errors.push('Missing value for --url');
      } else {
        parsed.url = next;
        index += 1;
      }
      continue;
    }

    if (token.startsWith('--url=')) {
      const value = token.slice('--url='.length);
      if (value) {
        parsed.url = value;
      } else {
        parsed.errors.push('Missing value for --url');
      }
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

export function resolveHealthUrl(server: Pick<ServerConfig, 'host' | 'port' | 'healthPath'>): string {
  const host = server.host === '0.0.0.0' || server.host === '::' ? '127.0.0.1' : server.host;
  return `http://${host}:${server.port}${server.healthPath}`;
}

function readStatus(payload: unknown): string | null {
  if (payload && typeof payload === 'object' && 'status' in payload && typeof payload.status === 'string') {
    return payload.status;
  }
  return null;
}

export async function runHealthcheck(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  options: HealthcheckOptions = {}
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

  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const url = args.url ?? resolveHealthUrl((options.loadServerConfig ?? (() => loadRuntimeConfig().server))());

  let payload: unknown;
  let status: number;
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs ?? 5000) });
    status = response.status;
    payload = await response.json();
  } catch (error) {
    streams.stderr.write(`Health endpoint unreachable (${url}): ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  const output = args.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
  streams.stdout.write(`${output}\n`);
  return status === 200 && readStatus(payload) === 'ok' ? 0 : 1;
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
