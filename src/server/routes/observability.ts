import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { URL } from 'node:url';
import type { ObservabilityManager } from '../../observability.js';
import { PROMETHEUS_CONTENT_TYPE } from '../../metrics/prometheus.js';

export const METRICS_TOKEN_HEADER = 'x-tvendor-metrics-token';

export interface ObservabilityRouterOptions {
  observability: ObservabilityManager;
  healthPath: string;
  metricsAllowUnauthenticated: boolean;
  metricsAuthToken: string;
}

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

export type RouteMatch = {
  pattern: string;
};

export class ObservabilityRouter {
  private readonly observability: ObservabilityManager;
  private readonly healthPath: string;
  private readonly allowUnauthenticated: boolean;
  private readonly authToken: string;
  private readonly handlers: Handler[];

  constructor(options: ObservabilityRouterOptions) {
    this.observability = options.observability;
    this.healthPath = options.healthPath;
    this.allowUnauthenticated = options.metricsAllowUnauthenticated;
    this.authToken = options.metricsAuthToken.trim();
    this.handlers = [(req, res, url) => this.handleHealth(req, res, url)];
    if (this.observability.prometheusEnabled) {
      this.handlers.push((req, res, url) => this.handleMetrics(req, res, url));
    }
  }

  /** Route pattern served for this request, or null when the router does not own it. */
  match(req: IncomingMessage, url: URL): RouteMatch | null {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      return null;
    }
    const { pathname } = url;
    if (pathname === this.healthPath) {
      return { pattern: this.healthPath };
    }
    if (this.observability.prometheusEnabled && pathname === this.observability.prometheusPath) {
      return { pattern: this.observability.prometheusPath };
    }
    return null;
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== this.healthPath || (req.method !== 'GET' && req.method !== 'HEAD')) {
      return false;
    }

    const snapshot = this.observability.healthSnapshot();
    const payload = {
      status: snapshot.activeAlertCount > 0 ? 'degraded' : 'ok',
      observability: snapshot
    };
    res.statusCode = 200;
    res.setHeader('Content-Type', 'application/json; charset=utf-8');
    res.end(req.method === 'HEAD' ? undefined : JSON.stringify(payload));
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== this.observability.prometheusPath || (req.method !== 'GET' && req.method !== 'HEAD')) {
      return false;
    }

    if (!this.allowUnauthenticated && !this.isAuthorized(req)) {
      res.statusCode = 404;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end('Not found.');
      return true;
    }

    const body = this.observability.renderPrometheus();
    res.statusCode = 200;
    res.setHeader('Content-Type', PROMETHEUS_CONTENT_TYPE);
    res.end(req.method === 'HEAD' ? undefined : body);
    return true;
  }

  private isAuthorized(req: IncomingMessage): boolean {
    if (!this.authToken) {
      return false;
    }
    const headerValue = firstHeader(req.headers[METRICS_TOKEN_HEADER]).trim();
    if (headerValue && tokensMatch(headerValue, this.authToken)) {
      return true;
    }
    const authorization = firstHeader(req.headers.authorization).trim();
    if (authorization.toLowerCase().startsWith('bearer ')) {
      const bearer = authorization.slice(7).trim();
      return bearer.length > 0 && tokensMatch(bearer, this.authToken);
    }
    return false;
  }
}

function firstHeader(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

function tokensMatch(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

export function createObservabilityRouter(options: ObservabilityRouterOptions) {
  return new ObservabilityRouter(options);
}
