import { describe, expect, it } from 'vitest';
import { AlertWindow, type WindowSample } from '../src/alerts/window.js';
import { AlertEvaluator, computeWindowAggregates, nearestRankP95 } from '../src/alerts/evaluator.js';
import { createCapturingLogger, LEVEL_INFO, LEVEL_WARN } from './helpers/logCapture.js';

function sample(timestamp: number, requestMs: number, overrides: Partial<WindowSample> = {}): WindowSample {
  return { timestamp, requestMs, isError: false, dbMs: 0, ...overrides };
}

function createEvaluator(overrides: { requestP95Ms?: number; errorRatePct?: number; dbAvgMs?: number; minRequests?: number } = {}) {
  const { logger, entries } = createCapturingLogger();
  const evaluator = new AlertEvaluator({
    thresholds: {
      request_p95_ms: overrides.requestP95Ms ?? 0,
      error_rate_pct: overrides.errorRatePct ?? 0,
      db_avg_ms: overrides.dbAvgMs ?? 0
    },
    minRequests: overrides.minRequests ?? 1,
    cooldownSec: 300,
    windowSec: 300,
    logger
  });
  return { evaluator, entries };
}

describe('AlertWindow', () => {
  it('evicts samples strictly older than the cutoff', () => {
    const window = new AlertWindow();
    window.append(sample(1000, 10));
    window.append(sample(2000, 20));
    window.append(sample(3000, 30));

    expect(window.evictBefore(2000)).toBe(1);
    expect(window.size).toBe(2);
    expect(window.samples().map(item => item.timestamp)).toEqual([2000, 3000]);

    expect(window.evictBefore(10_000)).toBe(2);
    expect(window.size).toBe(0);
    expect(window.samples()).toEqual([]);
  });

  it('keeps appending after compaction', () => {
    const window = new AlertWindow();
    for (let i = 0; i < 10; i += 1) {
      window.append(sample(i, i));
    }
    window.evictBefore(8);
    window.append(sample(10, 10));
    expect(window.samples().map(item => item.timestamp)).toEqual([8, 9, 10]);
  });
});

describe('window aggregates', () => {
  it('uses the nearest-rank p95', () => {
    const durations = [100, 30, 10, 90, 20, 80, 40, 70, 50, 60];
    // ceil(0.95 * 10) - 1 = 9
    expect(nearestRankP95(durations)).toBe(100);
    expect(nearestRankP95([7])).toBe(7);
    expect(nearestRankP95([])).toBe(0);

    const twenty = Array.from({ length: 20 }, (_, index) => (index + 1) * 10);
    // ceil(0.95 * 20) - 1 = 18
    expect(nearestRankP95(twenty)).toBe(190);
  });

  it('averages db time over every sample including zeros', () => {
    const aggregates = computeWindowAggregates([
      sample(1, 10, { dbMs: 30 }),
      sample(2, 10, { isError: true }),
      sample(3, 10),
      sample(4, 10, { dbMs: 10 })
    ]);
    expect(aggregates).toEqual({ sampleSize: 4, requestP95Ms: 10, errorRatePct: 25, dbAvgMs: 10 });
  });
});

describe('AlertEvaluator', () => {
  it('never breaches below the minimum request count', () => {
    const { evaluator, entries } = createEvaluator({ requestP95Ms: 100, minRequests: 20 });
    const samples = Array.from({ length: 19 }, (_, index) => sample(index, 5000));

    evaluator.evaluate(samples, 19);

    expect(evaluator.isActive('request_p95_ms')).toBe(false);
    expect(evaluator.snapshot().request_p95_ms.breachCount).toBe(0);
    expect(entries).toHaveLength(0);
  });

  it('breaches once and stays quiet until the cooldown elapses', () => {
    const { evaluator, entries } = createEvaluator({ requestP95Ms: 100 });
    const slow = [sample(0, 500)];

    evaluator.evaluate(slow, 0);
    expect(evaluator.isActive('request_p95_ms')).toBe(true);
    expect(evaluator.snapshot().request_p95_ms.breachCount).toBe(1);

    for (let second = 1; second < 300; second += 1) {
      evaluator.evaluate(slow, second * 1000);
    }
    expect(evaluator.snapshot().request_p95_ms.breachCount).toBe(1);

    evaluator.evaluate(slow, 300_000);
    expect(evaluator.snapshot().request_p95_ms.breachCount).toBe(2);

    const warnings = entries.filter(entry => entry.level === LEVEL_WARN);
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toMatchObject({
      event: 'performance_alert',
      alert: 'request_p95_ms',
      observed: 500,
      threshold: 100,
      windowSec: 300,
      sampleSize: 1,
      msg: 'Performance alert breached'
    });
  });

  it('recovers on the first evaluation under the threshold', () => {
    const { evaluator, entries } = createEvaluator({ errorRatePct: 10 });

    evaluator.evaluate([sample(0, 5, { isError: true }), sample(1, 5)], 1);
    expect(evaluator.activeAlerts()).toEqual(['error_rate_pct']);

    evaluator.evaluate([sample(0, 5, { isError: true }), ...Array.from({ length: 10 }, (_, i) => sample(i + 1, 5))], 2);
    expect(evaluator.activeAlerts()).toEqual([]);
    expect(evaluator.snapshot().error_rate_pct).toEqual({
      breached: false,
      active: 0,
      breachCount: 1,
      lastBreachLogAt: 1
    });

    const recovery = entries.find(entry => entry.level === LEVEL_INFO);
    expect(recovery).toMatchObject({
      event: 'performance_alert_recovered',
      alert: 'error_rate_pct',
      observed: 9.09,
      threshold: 10,
      sampleSize: 11
    });
  });

  it('counts a fresh breach after recovery even inside the cooldown', () => {
    const { evaluator } = createEvaluator({ dbAvgMs: 50 });

    evaluator.evaluate([sample(0, 5, { dbMs: 80 })], 0);
    evaluator.evaluate([sample(0, 5, { dbMs: 10 })], 1000);
    evaluator.evaluate([sample(0, 5, { dbMs: 90 })], 2000);

    expect(evaluator.snapshot().db_avg_ms.breachCount).toBe(2);
    expect(evaluator.isActive('db_avg_ms')).toBe(true);
  });

  it('recovers with zeroed values once the window drops below the minimum', () => {
    const { evaluator, entries } = createEvaluator({ requestP95Ms: 100, minRequests: 2 });

    evaluator.evaluate([sample(0, 500), sample(1, 500)], 1);
    evaluator.evaluate([sample(1, 500)], 2);

    expect(evaluator.isActive('request_p95_ms')).toBe(false);
    expect(entries.at(-1)).toMatchObject({
      event: 'performance_alert_recovered',
      observed: 0,
      threshold: 0,
      sampleSize: 1
    });
  });

  it('treats a zero threshold as disabled', () => {
    const { evaluator, entries } = createEvaluator();
    evaluator.evaluate([sample(0, 100_000, { isError: true, dbMs: 100_000 })], 0);

    expect(evaluator.activeAlerts()).toEqual([]);
    expect(entries).toHaveLength(0);
  });

  it('lists active alerts in name order', () => {
    const { evaluator } = createEvaluator({ requestP95Ms: 1, errorRatePct: 1, dbAvgMs: 1 });
    evaluator.evaluate([sample(0, 50, { isError: true, dbMs: 50 })], 0);
    expect(evaluator.activeAlerts()).toEqual(['db_avg_ms', 'error_rate_pct', 'request_p95_ms']);
  });
});
