import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { metricsLogger } from './logger.js';
import {
  resolveObservabilityConfig,
  type AlertThresholdsConfig,
  type ObservabilityConfig
} from './config/index.js';
import { AlertWindow } from './alerts/window.js';
import {
  ALERT_DB_AVG_MS,
  ALERT_ERROR_RATE_PCT,
  ALERT_NAMES,
  ALERT_REQUEST_P95_MS,
  AlertEvaluator,
  type AlertName
} from './alerts/evaluator.js';
import { DB_DURATION_BUCKETS_MS, MetricsStore, REQUEST_DURATION_BUCKETS_MS } from './metrics/store.js';
import { formatCounterFamily, formatGaugeFamily, formatHistogramFamily } from './metrics/prometheus.js';
import { UdpStatsSink, type DatagramSocket } from './metrics/statsd.js';
import {
  methodLabel,
  nonNegativeCount,
  nonNegativeNumber,
  parseStatusCode,
  pathLabel,
  statusClass
} from './metrics/labels.js';

export type RequestObservation = {
  method: string;
  path: string;
  statusCode: number | string;
  elapsedMs: number;
  dbCalls?: number;
  dbTotalMs?: number;
  dbCacheHits?: number;
  dbErrors?: number;
};

export type ObservabilityHealthSnapshot = {
  metricsEnabled: boolean;
  prometheusEnabled: boolean;
  prometheusPath: string | null;
  statsdEnabled: boolean;
  alertsEnabled: boolean;
  alertWindowSec: number;
  alertMinRequests: number;
  alertCooldownSec: number;
  alertThresholds: Record<AlertName, number>;
  activeAlertCount: number;
  activeAlerts: AlertName[];
  alertBreachesTotal: Record<AlertName, number>;
  windowSampleSize: number;
  uptimeSeconds: number;
};

export type ObservabilityManagerOptions = {
  /** Monotonic milliseconds used for the alert window and cooldowns. */
  now?: () => number;
  /** Epoch milliseconds used for uptime. */
  wallClock?: () => number;
  logger?: Logger;
  alertLogger?: Logger;
  createSocket?: () => DatagramSocket;
};

const METRIC = {
  requestsTotal: 'tvendor_http_requests_total',
  requestErrorsTotal: 'tvendor_http_request_errors_total',
  requestDuration: 'tvendor_http_request_duration_ms',
  dbCallsTotal: 'tvendor_db_calls_total',
  dbCacheHitsTotal: 'tvendor_db_cache_hits_total',
  dbErrorsTotal: 'tvendor_db_errors_total',
  dbDuration: 'tvendor_db_duration_ms'
} as const;

const ROUTE_LABELS = ['method', 'path'] as const;

function thresholdsByAlert(thresholds: AlertThresholdsConfig): Record<AlertName, number> {
  return {
    [ALERT_REQUEST_P95_MS]: thresholds.requestP95Ms,
    [ALERT_ERROR_RATE_PCT]: thresholds.errorRatePct,
    [ALERT_DB_AVG_MS]: thresholds.dbAvgMs
  };
}

export class ObservabilityManager {
  readonly config: ObservabilityConfig;
  private readonly store = new MetricsStore();
  private readonly window = new AlertWindow();
  private readonly evaluator: AlertEvaluator;
  private readonly statsd: UdpStatsSink;
  private readonly now: () => number;
  private readonly wallClock: () => number;
  private readonly startedAt: number;
  private readonly log: Logger;

  constructor(config: ObservabilityConfig = resolveObservabilityConfig({}), options: ObservabilityManagerOptions = {}) {
    this.config = config;
    this.now = options.now ?? (() => performance.now());
    this.wallClock = options.wallClock ?? (() => Date.now());
    this.startedAt = this.wallClock();
    this.log = options.logger ?? metricsLogger;
    this.evaluator = new AlertEvaluator({
      thresholds: thresholdsByAlert(config.thresholds),
      minRequests: config.alertMinRequests,
      cooldownSec: config.alertCooldownSec,
      windowSec: config.alertWindowSec,
      logger: options.alertLogger
    });
    this.statsd = new UdpStatsSink({
      ...config.statsd,
      logger: this.log,
      createSocket: options.createSocket,
      now: this.now
    });
  }

  get prometheusEnabled(): boolean {
    return this.config.prometheusEnabled;
  }

  get prometheusPath(): string {
    return this.config.prometheusPath;
  }

  recordRequest(observation: RequestObservation) {
    try {
      this.recordRequestUnsafe(observation);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to record request metrics');
    }
  }

  renderPrometheus(): string {
    if (!this.config.prometheusEnabled) {
      return '';
    }

    const snapshot = this.store.snapshot();
    const alerts = this.evaluator.snapshot();
    const uptimeSeconds = this.uptimeSeconds();

    const counters = (metric: string) => snapshot.counters[metric] ?? [];
    const histograms = (metric: string) => snapshot.histograms[metric] ?? [];
    const alertSamples = (pick: (name: AlertName) => number) =>
      ALERT_NAMES.map(name => ({ key: [name], value: pick(name) }));

    const lines: string[] = [
      ...formatCounterFamily(
        {
          metricName: METRIC.requestsTotal,
          help: 'Total HTTP requests.',
          labelNames: ['method', 'path', 'status_class']
        },
        counters(METRIC.requestsTotal)
      ),
      ...formatCounterFamily(
        { metricName: METRIC.requestErrorsTotal, help: 'Total HTTP 5xx requests.', labelNames: ROUTE_LABELS },
        counters(METRIC.requestErrorsTotal)
      ),
      ...formatHistogramFamily(
        {
          metricName: METRIC.requestDuration,
          help: 'HTTP request duration in milliseconds.',
          labelNames: ROUTE_LABELS
        },
        histograms(METRIC.requestDuration)
      ),
      ...formatCounterFamily(
        { metricName: METRIC.dbCallsTotal, help: 'Total DB calls per request path.', labelNames: ROUTE_LABELS },
        counters(METRIC.dbCallsTotal)
      ),
      ...formatCounterFamily(
        {
          metricName: METRIC.dbCacheHitsTotal,
          help: 'Total DB cache hits per request path.',
          labelNames: ROUTE_LABELS
        },
        counters(METRIC.dbCacheHitsTotal)
      ),
      ...formatCounterFamily(
        { metricName: METRIC.dbErrorsTotal, help: 'Total DB errors per request path.', labelNames: ROUTE_LABELS },
        counters(METRIC.dbErrorsTotal)
      ),
      ...formatHistogramFamily(
        {
          metricName: METRIC.dbDuration,
          help: 'Total DB duration in milliseconds per request.',
          labelNames: ROUTE_LABELS
        },
        histograms(METRIC.dbDuration)
      ),
      ...formatCounterFamily(
        {
          metricName: 'tvendor_alert_breaches_total',
          help: 'Total number of alert threshold breaches.',
          labelNames: ['alert']
        },
        alertSamples(name => alerts[name].breachCount)
      ),
      ...formatGaugeFamily(
        {
          metricName: 'tvendor_alert_active',
          help: 'Alert active state (1 active, 0 inactive).',
          labelNames: ['alert']
        },
        alertSamples(name => alerts[name].active)
      ),
      ...formatGaugeFamily(
        { metricName: 'tvendor_uptime_seconds', help: 'Process uptime in seconds.', labelNames: [] },
        [{ key: [], value: uptimeSeconds }]
      ),
      ''
    ];

    return lines.join('\n');
  }

  healthSnapshot(): ObservabilityHealthSnapshot {
    const alerts = this.evaluator.snapshot();
    const activeAlerts = this.evaluator.activeAlerts();
    const windowSampleSize = this.window.size;

    const alertBreachesTotal = {
      [ALERT_REQUEST_P95_MS]: alerts[ALERT_REQUEST_P95_MS].breachCount,
      [ALERT_ERROR_RATE_PCT]: alerts[ALERT_ERROR_RATE_PCT].breachCount,
      [ALERT_DB_AVG_MS]: alerts[ALERT_DB_AVG_MS].breachCount
    };

    return {
      metricsEnabled: this.config.metricsEnabled,
      prometheusEnabled: this.config.prometheusEnabled,
      prometheusPath: this.config.prometheusEnabled ? this.config.prometheusPath : null,
      statsdEnabled: this.statsd.enabled,
      alertsEnabled: this.config.alertsEnabled,
      alertWindowSec: this.config.alertWindowSec,
      alertMinRequests: this.config.alertMinRequests,
      alertCooldownSec: this.config.alertCooldownSec,
      alertThresholds: thresholdsByAlert(this.config.thresholds),
      activeAlertCount: activeAlerts.length,
      activeAlerts,
      alertBreachesTotal,
      windowSampleSize,
      uptimeSeconds: this.uptimeSeconds()
    };
  }

  close() {
    this.statsd.close();
  }

  private recordRequestUnsafe(observation: RequestObservation) {
    const { metricsEnabled, alertsEnabled } = this.config;
    const method = methodLabel(observation.method);
    const path = pathLabel(observation.path);
    const statusClassLabel = statusClass(observation.statusCode);
    const totalMs = nonNegativeNumber(observation.elapsedMs);
    const dbCalls = nonNegativeCount(observation.dbCalls);
    const dbTotalMs = nonNegativeNumber(observation.dbTotalMs);
    const dbCacheHits = nonNegativeCount(observation.dbCacheHits);
    const dbErrors = nonNegativeCount(observation.dbErrors);
    const isError = (parseStatusCode(observation.statusCode) ?? 0) >= 500;
    const routeKey = [method, path];

    if (metricsEnabled) {
      this.store.incrementCounter(METRIC.requestsTotal, [method, path, statusClassLabel]);
      this.store.observeHistogram(METRIC.requestDuration, routeKey, totalMs, REQUEST_DURATION_BUCKETS_MS);
      if (isError) {
        this.store.incrementCounter(METRIC.requestErrorsTotal, routeKey);
      }
      if (dbCalls > 0) {
        this.store.incrementCounter(METRIC.dbCallsTotal, routeKey, dbCalls);
        if (dbTotalMs > 0) {
          this.store.observeHistogram(METRIC.dbDuration, routeKey, dbTotalMs, DB_DURATION_BUCKETS_MS);
        }
      }
      if (dbCacheHits > 0) {
        this.store.incrementCounter(METRIC.dbCacheHitsTotal, routeKey, dbCacheHits);
      }
      if (dbErrors > 0) {
        this.store.incrementCounter(METRIC.dbErrorsTotal, routeKey, dbErrors);
      }
    }

    if (alertsEnabled) {
      const now = this.now();
      this.window.append({ timestamp: now, requestMs: totalMs, isError, dbMs: dbTotalMs });
      this.window.evictBefore(now - this.config.alertWindowSec * 1000);
      this.evaluator.evaluate(this.window.samples(), now);
    }

    if (metricsEnabled && this.statsd.enabled) {
      this.statsd.counter('http.requests_total', 1);
      this.statsd.counter(`http.status_${statusClassLabel}`, 1);
      this.statsd.timing('http.request_duration_ms', totalMs);
      if (isError) {
        this.statsd.counter('http.request_errors_total', 1);
      }
      if (dbCalls > 0) {
        this.statsd.counter('db.calls_total', dbCalls);
        if (dbTotalMs > 0) {
          this.statsd.timing('db.duration_ms', dbTotalMs);
        }
      }
      if (dbCacheHits > 0) {
        this.statsd.counter('db.cache_hits_total', dbCacheHits);
      }
      if (dbErrors > 0) {
        this.statsd.counter('db.errors_total', dbErrors);
      }
    }
  }

  private uptimeSeconds(): number {
    return Math.max(0, Math.floor((this.wallClock() - this.startedAt) / 1000));
  }
}

export default ObservabilityManager;
