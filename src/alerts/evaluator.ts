import type { Logger } from 'pino';
import { alertLogger } from '../logger.js';
import type { WindowSample } from './window.js';

export const ALERT_REQUEST_P95_MS = 'request_p95_ms';
export const ALERT_ERROR_RATE_PCT = 'error_rate_pct';
export const ALERT_DB_AVG_MS = 'db_avg_ms';

export const ALERT_NAMES = [ALERT_REQUEST_P95_MS, ALERT_ERROR_RATE_PCT, ALERT_DB_AVG_MS] as const;

export type AlertName = (typeof ALERT_NAMES)[number];

export type AlertThresholds = Record<AlertName, number>;

export type AlertState = {
  breached: boolean;
  active: 0 | 1;
  breachCount: number;
  lastBreachLogAt: number | null;
};

export type WindowAggregates = {
  sampleSize: number;
  requestP95Ms: number;
  errorRatePct: number;
  dbAvgMs: number;
};

export type AlertEvaluatorOptions = {
  thresholds: AlertThresholds;
  minRequests: number;
  cooldownSec: number;
  windowSec: number;
  logger?: Logger;
};

export type AlertStateSnapshot = Record<AlertName, AlertState>;

type AlertObservation = {
  breached: boolean;
  observed: number | null;
  threshold: number | null;
};

export function nearestRankP95(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil(sorted.length * 0.95) - 1;
  const index = Math.max(0, Math.min(sorted.length - 1, rank));
  return sorted[index];
}

export function computeWindowAggregates(samples: readonly WindowSample[]): WindowAggregates {
  const sampleSize = samples.length;
  if (sampleSize === 0) {
    return { sampleSize, requestP95Ms: 0, errorRatePct: 0, dbAvgMs: 0 };
  }

  let errors = 0;
  let dbTotal = 0;
  for (const sample of samples) {
    if (sample.isError) {
      errors += 1;
    }
    dbTotal += sample.dbMs;
  }

  return {
    sampleSize,
    requestP95Ms: nearestRankP95(samples.map(sample => sample.requestMs)),
    errorRatePct: (errors * 100) / sampleSize,
    dbAvgMs: dbTotal / sampleSize
  };
}

function formatForLog(value: number | null): number {
  if (value === null || !Number.isFinite(value)) {
    return 0;
  }
  return Math.round(value * 100) / 100;
}

export class AlertEvaluator {
  private readonly thresholds: AlertThresholds;
  private readonly minRequests: number;
  private readonly cooldownMs: number;
  private readonly windowSec: number;
  private readonly log: Logger;
  private readonly states = new Map<AlertName, AlertState>();

  constructor(options: AlertEvaluatorOptions) {
    this.thresholds = { ...options.thresholds };
    this.minRequests = options.minRequests;
    this.cooldownMs = options.cooldownSec * 1000;
    this.windowSec = options.windowSec;
    this.log = options.logger ?? alertLogger;
    for (const name of ALERT_NAMES) {
      this.states.set(name, { breached: false, active: 0, breachCount: 0, lastBreachLogAt: null });
    }
  }

  evaluate(samples: readonly WindowSample[], now: number) {
    const sampleSize = samples.length;
    if (sampleSize < this.minRequests) {
      for (const name of ALERT_NAMES) {
        this.updateState(name, { breached: false, observed: null, threshold: null }, sampleSize, now);
      }
      return;
    }

    const aggregates = computeWindowAggregates(samples);
    const observedByAlert: Record<AlertName, number> = {
      [ALERT_REQUEST_P95_MS]: aggregates.requestP95Ms,
      [ALERT_ERROR_RATE_PCT]: aggregates.errorRatePct,
      [ALERT_DB_AVG_MS]: aggregates.dbAvgMs
    };

    for (const name of ALERT_NAMES) {
      const observed = observedByAlert[name];
      const threshold = this.thresholds[name];
      const breached = threshold > 0 && observed > threshold;
      this.updateState(name, { breached, observed, threshold }, sampleSize, now);
    }
  }

  isActive(name: AlertName): boolean {
    return this.getState(name).active === 1;
  }

  activeAlerts(): AlertName[] {
    return ALERT_NAMES.filter(name => this.isActive(name)).sort();
  }

  snapshot(): AlertStateSnapshot {
    const copy = (name: AlertName): AlertState => ({ ...this.getState(name) });
    return {
      [ALERT_REQUEST_P95_MS]: copy(ALERT_REQUEST_P95_MS),
      [ALERT_ERROR_RATE_PCT]: copy(ALERT_ERROR_RATE_PCT),
      [ALERT_DB_AVG_MS]: copy(ALERT_DB_AVG_MS)
    };
  }

  private getState(name: AlertName): AlertState {
    const existing = this.states.get(name);
    if (existing) {
      return existing;
    }
    const created: AlertState = { breached: false, active: 0, breachCount: 0, lastBreachLogAt: null };
    this.states.set(name, created);
    return created;
  }

  private updateState(name: AlertName, observation: AlertObservation, sampleSize: number, now: number) {
    const state = this.getState(name);
    const wasActive = state.breached;
    state.breached = observation.breached;
    state.active = observation.breached ? 1 : 0;

    if (observation.breached) {
      const cooldownElapsed = state.lastBreachLogAt === null || now - state.lastBreachLogAt >= this.cooldownMs;
      if (!wasActive || cooldownElapsed) {
        state.lastBreachLogAt = now;
        state.breachCount += 1;
        this.log.warn(
          {
            event: 'performance_alert',
            alert: name,
            observed: formatForLog(observation.observed),
            threshold: formatForLog(observation.threshold),
            windowSec: this.windowSec,
            sampleSize
          },
          'Performance alert breached'
        );
      }
      return;
    }

    if (wasActive) {
      this.log.info(
        {
          event: 'performance_alert_recovered',
          alert: name,
          observed: formatForLog(observation.observed),
          threshold: formatForLog(observation.threshold),
          sampleSize
        },
        'Performance alert recovered'
      );
    }
  }
}
