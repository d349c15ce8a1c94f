import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config/index.js';
import { ObservabilityManager, type ObservabilityManagerOptions } from './observability.js';
import { startHttpServer, type AppRoute, type HttpServerRuntime } from './server/http.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

export type BootstrapOptions = {
  config?: RuntimeConfig;
  routes?: AppRoute[];
  observability?: ObservabilityManagerOptions;
};

export type AppRuntime = {
  config: RuntimeConfig;
  observability: ObservabilityManager;
  http: HttpServerRuntime;
};

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

export async function runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
  const results: ShutdownHookResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err, hook: entry.name }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

/**
 * Composition root: the single ObservabilityManager for the process is built
 * here and handed to the HTTP server.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppRuntime> {
  const runtimeConfig = options.config ?? loadRuntimeConfig();
  setLogLevel(runtimeConfig.logging.level);
  logger.info({ app: runtimeConfig.app.name }, 'Bootstrap starting');

  const observability = new ObservabilityManager(runtimeConfig.observability, options.observability);
  let http: HttpServerRuntime;
  try {
    http = await startHttpServer({
      port: runtimeConfig.server.port,
      host: runtimeConfig.server.host,
      observability,
      settings: runtimeConfig.server,
      routes: options.routes
    });
  } catch (error) {
    observability.close();
    throw error;
  }

  registerShutdownHook('observability', () => {
    observability.close();
  });
  registerShutdownHook('http', () => http.close());

  logger.info(
    {
      port: http.port,
      prometheusPath: observability.prometheusEnabled ? observability.prometheusPath : null,
      healthPath: runtimeConfig.server.healthPath
    },
    'Bootstrap completed'
  );

  return { config: runtimeConfig, observability, http };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
