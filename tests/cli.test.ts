import http from 'node:http';
import { Writable } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { maskRuntimeConfig, runCli, type CliDependencies } from '../src/cli.js';
import { resolveRuntimeConfig, type RuntimeConfig } from '../src/config/index.js';
import { ObservabilityManager } from '../src/observability.js';
import type { AppRuntime, BootstrapOptions } from '../src/app.js';

function createStream() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, text: () => chunks.join('') };
}

function createIo() {
  const stdout = createStream();
  const stderr = createStream();
  return { io: { stdout: stdout.stream, stderr: stderr.stream }, stdout, stderr };
}

const baseConfig = resolveRuntimeConfig({
  logging: { level: 'silent' },
  server: { metricsAuthToken: 'test-secret' }
});

function createDependencies(overrides: Partial<CliDependencies> = {}): CliDependencies {
  return {
    loadConfig: () => baseConfig,
    bootstrap: vi.fn(async (options: BootstrapOptions): Promise<AppRuntime> => {
      const config = options.config ?? baseConfig;
      return {
        config,
        observability: new ObservabilityManager(config.observability),
        http: { server: http.createServer(), port: config.server.port, close: async () => {} }
      };
    }),
    waitForShutdown: async () => 'SIGTERM',
    ...overrides
  };
}

describe('CLI', () => {
  it('prints usage and log levels', async () => {
    const { io, stdout } = createIo();
    const code = await runCli(['help'], io, createDependencies());

    expect(code).toBe(0);
    expect(stdout.text().startsWith('vendorcat observability CLI\n')).toBe(true);
    expect(stdout.text().endsWith('\nLog levels: debug, error, fatal, info, silent, trace, warn\n')).toBe(true);
  });

  it('defaults to help without a command', async () => {
    const { io, stdout } = createIo();
    expect(await runCli([], io, createDependencies())).toBe(0);
    expect(stdout.text()).toContain('Commands:');
  });

  it('prints the configuration with the token masked', async () => {
    const { io, stdout } = createIo();
    const code = await runCli(['config'], io, createDependencies());

    expect(code).toBe(0);
    const printed: RuntimeConfig = JSON.parse(stdout.text());
    expect(printed.server.metricsAuthToken).toBe('***');
    expect(printed.observability.prometheusPath).toBe('/api/metrics');
  });

  it('indents configuration output with --pretty', async () => {
    const { io, stdout } = createIo();
    await runCli(['config', '--pretty'], io, createDependencies());
    expect(stdout.text().startsWith('{\n  "app": {\n    "name": "vendorcat"\n  },')).toBe(true);
  });

  it('leaves an empty token empty when masking', () => {
    const masked = maskRuntimeConfig(resolveRuntimeConfig({}));
    expect(masked.server.metricsAuthToken).toBe('');
  });

  it('rejects unknown commands and options', async () => {
    const first = createIo();
    expect(await runCli(['bogus'], first.io, createDependencies())).toBe(1);
    expect(first.stderr.text()).toBe('Unknown command: bogus\n');

    const second = createIo();
    expect(await runCli(['serve', '--nope'], second.io, createDependencies())).toBe(1);
    expect(second.stderr.text()).toBe('Unknown option: --nope\n');

    const third = createIo();
    expect(await runCli(['serve', '--port', 'abc'], third.io, createDependencies())).toBe(1);
    expect(third.stderr.text()).toBe('Invalid port: abc\n');
  });

  it('rejects unknown log levels', async () => {
    const { io, stderr } = createIo();
    expect(await runCli(['help', '--log-level', 'loud'], io, createDependencies())).toBe(1);
    expect(stderr.text()).toBe(
      'Unknown log level "loud" (available: debug, error, fatal, info, silent, trace, warn)\n'
    );
  });

  it('serves with overrides until a shutdown signal arrives', async () => {
    const { io, stdout } = createIo();
    const dependencies = createDependencies();
    const code = await runCli(
      ['serve', '--host', '127.0.0.1', '--port', '4321', '--log-level', 'silent'],
      io,
      dependencies
    );

    expect(code).toBe(0);
    expect(stdout.text()).toBe('Listening on 127.0.0.1:4321\nStopped (SIGTERM)\n');
    expect(dependencies.bootstrap).toHaveBeenCalledWith({
      config: expect.objectContaining({
        logging: { level: 'silent' },
        server: expect.objectContaining({ host: '127.0.0.1', port: 4321 })
      })
    });
  });

  it('reports startup failures', async () => {
    const { io, stderr } = createIo();
    const dependencies = createDependencies({
      bootstrap: async () => {
        throw new Error('EADDRINUSE');
      }
    });

    expect(await runCli(['serve'], io, dependencies)).toBe(1);
    expect(stderr.text()).toBe('Server failed to start. Check logs for details.\n');
  });
});
