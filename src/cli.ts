#!/usr/bin/env node
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config/index.js';
import { bootstrap, runShutdownHooks, type AppRuntime, type BootstrapOptions } from './app.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  loadConfig: () => RuntimeConfig;
  bootstrap: (options: BootstrapOptions) => Promise<AppRuntime>;
  waitForShutdown: () => Promise<NodeJS.Signals>;
};

type ParsedArgs = {
  command: string;
  logLevel: string | null;
  port: number | null;
  host: string | null;
  pretty: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'vendorcat observability CLI',
  '',
  'Usage:',
  '  vendorcat-observability <command> [options]',
  '',
  'Commands:',
  '  serve          Start the instrumented HTTP server',
  '  config         Print the resolved runtime configuration as JSON',
  '  help           Show this help message',
  '',
  'Options:',
  '  --log-level <level>  Override the configured log level',
  '  --port <port>        Override the listen port (serve)',
  '  --host <host>        Override the listen host (serve)',
  '  --pretty             Indent JSON output (config)'
];

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const handler = (signal: NodeJS.Signals) => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
      resolve(signal);
    };
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  });
}

const DEFAULT_DEPENDENCIES: CliDependencies = {
  loadConfig: loadRuntimeConfig,
  bootstrap,
  waitForShutdown: waitForSignal
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: '', logLevel: null, port: null, host: null, pretty: false, errors: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    const readValue = (flag: string): string | null => {
      const next = argv[index + 1];
      if (!next || next.startsWith('--')) {
        parsed.errors.push(`Missing value for ${flag}`);
        return null;
      }
      index += 1;
      return next;
    };

    switch (token) {
      case '--log-level':
        parsed.logLevel = readValue(token);
        break;
      case '--port': {
        const value = readValue(token);
        if (value !== null) {
          const port = Number(value);
          if (Number.isInteger(port) && port >= 0 && port <= 65535) {
            parsed.port = port;
          } else {
            parsed.errors.push(`Invalid port: ${value}`);
          }
        }
        break;
      }
      case '--host':
        parsed.host = readValue(token);
        break;
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.command = 'help';
        break;
      default:
        if (token.startsWith('-')) {
          parsed.errors.push(`Unknown option: ${token}`);
        } else if (!parsed.command) {
          parsed.command = token;
        } else {
          parsed.errors.push(`Unexpected argument: ${token}`);
        }
        break;
    }
  }

  if (!parsed.command) {
    parsed.command = 'help';
  }
  return parsed;
}

export function maskRuntimeConfig(config: RuntimeConfig): RuntimeConfig {
  return {
    ...config,
    server: {
      ...config.server,
      metricsAuthToken: config.server.metricsAuthToken ? '***' : ''
    }
  };
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = DEFAULT_DEPENDENCIES
): Promise<number> {
  const args = parseArgs(argv);
  if (args.errors.length > 0) {
    for (const message of args.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  if (args.logLevel !== null) {
    try {
      setLogLevel(args.logLevel);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.stderr.write(`${message}\n`);
      return 1;
    }
  }

  switch (args.command) {
    case 'serve':
      return serve(args, io, dependencies);
    case 'config': {
      const resolved = maskRuntimeConfig(dependencies.loadConfig());
      io.stdout.write(`${JSON.stringify(resolved, null, args.pretty ? 2 : undefined)}\n`);
      return 0;
    }
    case 'help':
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      io.stdout.write(`\nLog levels: ${getAvailableLogLevels().join(', ')}\n`);
      return 0;
    default:
      io.stderr.write(`Unknown command: ${args.command}\n`);
      return 1;
  }
}

async function serve(args: ParsedArgs, io: CliIo, dependencies: CliDependencies): Promise<number> {
  const loaded = dependencies.loadConfig();
  const config: RuntimeConfig = {
    ...loaded,
    logging: { level: args.logLevel ?? loaded.logging.level },
    server: {
      ...loaded.server,
      port: args.port ?? loaded.server.port,
      host: args.host ?? loaded.server.host
    }
  };

  let runtime: AppRuntime;
  try {
    runtime = await dependencies.bootstrap({ config });
  } catch (error) {
    logger.error({ err: error }, 'Server failed to start');
    io.stderr.write('Server failed to start. Check logs for details.\n');
    return 1;
  }

  io.stdout.write(`Listening on ${config.server.host}:${runtime.http.port}\n`);

  const signal = await dependencies.waitForShutdown();
  const results = await runShutdownHooks({ reason: 'signal', signal });
  const failed = results.filter(result => result.status === 'error');
  for (const result of failed) {
    io.stderr.write(`Shutdown hook ${result.name} failed: ${result.error?.message ?? 'unknown error'}\n`);
  }
  io.stdout.write(`Stopped (${signal})\n`);
  return failed.length > 0 ? 1 : 0;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runCli()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error({ err: error }, 'CLI failed');
      process.exitCode = 1;
    });
}
