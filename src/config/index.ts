import config from 'config';

export type AlertThresholdsConfig = {
  requestP95Ms: number;
  errorRatePct: number;
  dbAvgMs: number;
};

export type StatsdConfig = {
  enabled: boolean;
  host: string;
  port: number;
  prefix: string;
};

export type ObservabilityConfig = {
  metricsEnabled: boolean;
  prometheusEnabled: boolean;
  prometheusPath: string;
  alertsEnabled: boolean;
  alertWindowSec: number;
  alertMinRequests: number;
  alertCooldownSec: number;
  thresholds: AlertThresholdsConfig;
  statsd: StatsdConfig;
};

export type ServerConfig = {
  host: string;
  port: number;
  healthPath: string;
  metricsAllowUnauthenticated: boolean;
  metricsAuthToken: string;
  perfLogEnabled: boolean;
  requestIdHeaderEnabled: boolean;
  slowQueryMs: number;
};

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type RuntimeConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  server: ServerConfig;
  observability: ObservabilityConfig;
};

type RawTree = Record<string, unknown>;

type NumberBounds = {
  min?: number;
  max?: number;
  integer?: boolean;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on', 'y']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', 'n']);

export const DEFAULT_PROMETHEUS_PATH = '/api/metrics';
export const DEFAULT_HEALTH_PATH = '/api/health';
export const DEFAULT_STATSD_PREFIX = 'tvendor';

function asTree(value: unknown): RawTree {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function readBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
  }
  return fallback;
}

export function readNumber(value: unknown, fallback: number, bounds: NumberBounds = {}): number {
  let parsed = fallback;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = value;
  } else if (typeof value === 'string' && value.trim().length > 0) {
    const candidate = Number(value.trim());
    if (Number.isFinite(candidate)) {
      parsed = candidate;
    }
  }

  if (bounds.integer) {
    parsed = Math.trunc(parsed);
  }
  if (typeof bounds.min === 'number') {
    parsed = Math.max(bounds.min, parsed);
  }
  if (typeof bounds.max === 'number') {
    parsed = Math.min(bounds.max, parsed);
  }
  return parsed;
}

export function readString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : fallback;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return fallback;
}

export function normalizeRoutePath(value: unknown, fallback: string): string {
  const raw = readString(value, fallback);
  return raw.startsWith('/') ? raw : `/${raw}`;
}

export function sanitizeStatsdPrefix(value: unknown): string {
  const raw = typeof value === 'string' ? value : '';
  const sanitized = raw.replace(/[^A-Za-z0-9_.-]+/g, '_').replace(/^\.+|\.+$/g, '');
  return sanitized || DEFAULT_STATSD_PREFIX;
}

export function resolveObservabilityConfig(raw: unknown): ObservabilityConfig {
  const tree = asTree(raw);
  const thresholds = asTree(tree.thresholds);
  const statsd = asTree(tree.statsd);

  const metricsEnabled = readBoolean(tree.metricsEnabled, true);

  return Object.freeze({
    metricsEnabled,
    prometheusEnabled: metricsEnabled && readBoolean(tree.prometheusEnabled, true),
    prometheusPath: normalizeRoutePath(tree.prometheusPath, DEFAULT_PROMETHEUS_PATH),
    alertsEnabled: readBoolean(tree.alertsEnabled, true),
    alertWindowSec: readNumber(tree.alertWindowSec, 300, { min: 10, integer: true }),
    alertMinRequests: readNumber(tree.alertMinRequests, 20, { min: 1, integer: true }),
    alertCooldownSec: readNumber(tree.alertCooldownSec, 300, { min: 10, integer: true }),
    thresholds: Object.freeze({
      requestP95Ms: readNumber(thresholds.requestP95Ms, 0, { min: 0 }),
      errorRatePct: readNumber(thresholds.errorRatePct, 0, { min: 0 }),
      dbAvgMs: readNumber(thresholds.dbAvgMs, 0, { min: 0 })
    }),
    statsd: Object.freeze({
      enabled: readBoolean(statsd.enabled, false),
      host: readString(statsd.host, '127.0.0.1'),
      port: readNumber(statsd.port, 8125, { min: 1, max: 65535, integer: true }),
      prefix: sanitizeStatsdPrefix(statsd.prefix)
    })
  });
}

export function resolveServerConfig(raw: unknown): ServerConfig {
  const tree = asTree(raw);
  return Object.freeze({
    host: readString(tree.host, '0.0.0.0'),
    port: readNumber(tree.port, 8000, { min: 0, max: 65535, integer: true }),
    healthPath: normalizeRoutePath(tree.healthPath, DEFAULT_HEALTH_PATH),
    metricsAllowUnauthenticated: readBoolean(tree.metricsAllowUnauthenticated, true),
    metricsAuthToken: typeof tree.metricsAuthToken === 'string' ? tree.metricsAuthToken.trim() : '',
    perfLogEnabled: readBoolean(tree.perfLogEnabled, false),
    requestIdHeaderEnabled: readBoolean(tree.requestIdHeaderEnabled, true),
    slowQueryMs: readNumber(tree.slowQueryMs, 750, { min: 1 })
  });
}

export function resolveRuntimeConfig(raw: unknown): RuntimeConfig {
  const tree = asTree(raw);
  const app = asTree(tree.app);
  const logging = asTree(tree.logging);
  return {
    app: { name: readString(app.name, 'vendorcat') },
    logging: { level: readString(logging.level, 'info') },
    server: resolveServerConfig(tree.server),
    observability: resolveObservabilityConfig(tree.observability)
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  const loaded: unknown = config.util.toObject(config);
  return resolveRuntimeConfig(loaded);
}
