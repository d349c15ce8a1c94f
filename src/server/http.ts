import http, { IncomingMessage, ServerResponse } from 'node:http';
import { randomBytes } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { URL } from 'node:url';
import type { Logger } from 'pino';
import { httpLogger, perfLogger } from '../logger.js';
import type { ObservabilityManager } from '../observability.js';
import type { ServerConfig } from '../config/index.js';
import { createObservabilityRouter } from './routes/observability.js';
import {
  createRequestPerfContext,
  runWithRequestPerfContext,
  type RequestPerfContext
} from './requestContext.js';

export type RouteParams = Record<string, string>;

export type RouteContext = {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  params: RouteParams;
};

export interface AppRoute {
  method: string;
  /** Path with `:name` segments, also used as the metrics path label. */
  pattern: string;
  handle: (context: RouteContext) => void | Promise<void>;
}

export type HttpServerSettings = Pick<
  ServerConfig,
  | 'healthPath'
  | 'metricsAllowUnauthenticated'
  | 'metricsAuthToken'
  | 'perfLogEnabled'
  | 'requestIdHeaderEnabled'
  | 'slowQueryMs'
>;

export interface HttpServerOptions {
  port?: number;
  host?: string;
  observability: ObservabilityManager;
  settings?: Partial<HttpServerSettings>;
  routes?: AppRoute[];
  logger?: Logger;
  perfLogger?: Logger;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

const DEFAULT_SETTINGS: HttpServerSettings = {
  healthPath: '/api/health',
  metricsAllowUnauthenticated: true,
  metricsAuthToken: '',
  perfLogEnabled: false,
  requestIdHeaderEnabled: true,
  slowQueryMs: 750
};

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function matchRoutePattern(pattern: string, pathname: string): RouteParams | null {
  const patternSegments = pattern.split('/').filter(Boolean);
  const pathSegments = pathname.split('/').filter(Boolean);
  if (patternSegments.length !== pathSegments.length) {
    return null;
  }

  const params: RouteParams = {};
  for (let index = 0; index < patternSegments.length; index += 1) {
    const expected = patternSegments[index];
    const actual = pathSegments[index];
    if (expected.startsWith(':')) {
      try {
        params[expected.slice(1)] = decodeURIComponent(actual);
      } catch {
        return null;
      }
      continue;
    }
    if (expected !== actual) {
      return null;
    }
  }
  return params;
}

export function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim();
  if (candidate && REQUEST_ID_PATTERN.test(candidate)) {
    return candidate;
  }
  return randomBytes(6).toString('hex');
}

export function parseRequestUrl(raw: string | undefined): URL {
  try {
    return new URL(raw ?? '/', 'http://localhost');
  } catch {
    // request targets such as `//` are not valid relative URLs
    return new URL('http://localhost/');
  }
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8000;
  const host = options.host ?? '0.0.0.0';
  const settings: HttpServerSettings = { ...DEFAULT_SETTINGS, ...options.settings };
  const observability = options.observability;
  const routes = options.routes ?? [];
  const log = options.logger ?? httpLogger;
  const perfLog = options.perfLogger ?? perfLogger;

  const observabilityRouter = createObservabilityRouter({
    observability,
    healthPath: settings.healthPath,
    metricsAllowUnauthenticated: settings.metricsAllowUnauthenticated,
    metricsAuthToken: settings.metricsAuthToken
  });

  function finishRequest(
    req: IncomingMessage,
    res: ServerResponse,
    context: RequestPerfContext,
    routeLabel: string,
    startedAt: number
  ) {
    const elapsedMs = performance.now() - startedAt;
    // client went away before any response was started
    const statusCode = res.writableFinished || res.headersSent ? res.statusCode : 499;
    observability.recordRequest({
      method: req.method ?? '',
      path: routeLabel,
      statusCode,
      elapsedMs,
      dbCalls: context.dbCalls,
      dbTotalMs: context.dbTotalMs,
      dbCacheHits: context.dbCacheHits,
      dbErrors: context.dbErrors
    });

    if (!settings.perfLogEnabled) {
      return;
    }
    perfLog.info(
      {
        event: 'request_perf',
        requestId: context.requestId,
        method: req.method,
        path: routeLabel,
        statusCode,
        totalMs: round2(elapsedMs),
        dbCalls: context.dbCalls,
        dbMs: round2(context.dbTotalMs),
        dbMaxMs: round2(context.dbMaxMs),
        dbCacheHits: context.dbCacheHits,
        dbErrors: context.dbErrors
      },
      'request_perf'
    );
    for (const call of context.slowCalls) {
      perfLog.warn({ event: 'request_slow_sql', requestId: context.requestId, ...call }, 'request_slow_sql');
    }
  }

  function sendError(res: ServerResponse, error: unknown) {
    log.error({ err: error }, 'HTTP request failed');
    if (!res.headersSent) {
      res.statusCode = 500;
      res.setHeader('Content-Type', 'application/json');
    }
    if (!res.writableEnded) {
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  }

  function dispatch(req: IncomingMessage, res: ServerResponse, url: URL): string {
    const ownRoute = observabilityRouter.match(req, url);
    if (ownRoute && observabilityRouter.handle(req, res, url)) {
      return ownRoute.pattern;
    }

    for (const route of routes) {
      if (route.method.toUpperCase() !== req.method) {
        continue;
      }
      const params = matchRoutePattern(route.pattern, url.pathname);
      if (!params) {
        continue;
      }
      Promise.resolve()
        .then(() => route.handle({ req, res, url, params }))
        .catch(error => sendError(res, error));
      return route.pattern;
    }

    res.statusCode = 404;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify({ error: 'Not found' }));
    return url.pathname;
  }

  const server = http.createServer((req, res) => {
    const startedAt = performance.now();
    const requestId = resolveRequestId(req.headers['x-request-id']);
    const url = parseRequestUrl(req.url);
    const context = createRequestPerfContext({
      requestId,
      method: req.method ?? '',
      path: url.pathname,
      slowQueryMs: settings.slowQueryMs
    });

    if (settings.requestIdHeaderEnabled) {
      res.setHeader('X-Request-ID', requestId);
    }

    let routeLabel = url.pathname;
    let recorded = false;
    const record = () => {
      if (recorded) {
        return;
      }
      recorded = true;
      finishRequest(req, res, context, routeLabel, startedAt);
    };
    res.once('finish', record);
    res.once('close', record);

    runWithRequestPerfContext(context, () => {
      try {
        routeLabel = dispatch(req, res, url);
      } catch (error) {
        sendError(res, error);
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  log.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export default startHttpServer;
