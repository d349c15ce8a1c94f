import { describe, expect, it } from 'vitest';
import {
  MAX_SLOW_CALLS_PER_REQUEST,
  createRequestPerfContext,
  getRequestPerfContext,
  recordDownstreamCall,
  runWithRequestPerfContext
} from '../src/server/requestContext.js';

function createContext() {
  return createRequestPerfContext({ requestId: 'req-1', method: 'GET', path: '/api/vendors', slowQueryMs: 100 });
}

describe('request perf context', () => {
  it('is absent outside a request scope', () => {
    expect(getRequestPerfContext()).toBeNull();
    expect(() => recordDownstreamCall({ operation: 'SELECT 1', elapsedMs: 5 })).not.toThrow();
  });

  it('aggregates downstream calls for the active request', () => {
    const context = createContext();
    runWithRequestPerfContext(context, () => {
      recordDownstreamCall({ operation: 'SELECT vendors', elapsedMs: 12 });
      recordDownstreamCall({ operation: 'SELECT offerings', elapsedMs: 30, cached: true });
      recordDownstreamCall({ operation: 'UPDATE vendors', elapsedMs: 8, error: true });
    });

    expect(context).toMatchObject({
      dbCalls: 3,
      dbTotalMs: 50,
      dbMaxMs: 30,
      dbCacheHits: 1,
      dbErrors: 1,
      slowCalls: []
    });
  });

  it('keeps the context across awaits', async () => {
    const context = createContext();
    await runWithRequestPerfContext(context, async () => {
      await new Promise(resolve => setTimeout(resolve, 1));
      recordDownstreamCall({ operation: 'SELECT 1', elapsedMs: 4 });
      expect(getRequestPerfContext()).toBe(context);
    });
    expect(context.dbCalls).toBe(1);
  });

  it('captures slow calls up to the per-request cap', () => {
    const context = createContext();
    runWithRequestPerfContext(context, () => {
      recordDownstreamCall({ operation: 'SELECT fast', elapsedMs: 99.99 });
      recordDownstreamCall({ operation: 'SELECT edge', elapsedMs: 100, rows: 4 });
      for (let i = 0; i < 20; i += 1) {
        recordDownstreamCall({ operation: `SELECT slow ${i}`, elapsedMs: 250.456 });
      }
    });

    expect(context.dbCalls).toBe(22);
    expect(context.slowCalls).toHaveLength(MAX_SLOW_CALLS_PER_REQUEST);
    expect(context.slowCalls[0]).toEqual({
      operation: 'SELECT edge',
      elapsedMs: 100,
      cached: false,
      rows: 4,
      error: false
    });
    expect(context.slowCalls[1]).toMatchObject({ operation: 'SELECT slow 0', elapsedMs: 250.46, rows: null });
  });

  it('treats invalid durations as zero', () => {
    const context = createContext();
    runWithRequestPerfContext(context, () => {
      recordDownstreamCall({ operation: 'SELECT 1', elapsedMs: Number.NaN });
      recordDownstreamCall({ operation: 'SELECT 2', elapsedMs: -10 });
    });
    expect(context).toMatchObject({ dbCalls: 2, dbTotalMs: 0, dbMaxMs: 0 });
  });
});
