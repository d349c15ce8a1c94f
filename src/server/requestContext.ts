import { AsyncLocalStorage } from 'node:async_hooks';

export const MAX_SLOW_CALLS_PER_REQUEST = 10;

export type SlowDownstreamCall = {
  operation: string;
  elapsedMs: number;
  cached: boolean;
  rows: number | null;
  error: boolean;
};

export type RequestPerfContext = {
  requestId: string;
  method: string;
  path: string;
  slowQueryMs: number;
  dbCalls: number;
  dbTotalMs: number;
  dbMaxMs: number;
  dbCacheHits: number;
  dbErrors: number;
  slowCalls: SlowDownstreamCall[];
};

export type RequestPerfContextInit = Pick<RequestPerfContext, 'requestId' | 'method' | 'path' | 'slowQueryMs'>;

export type DownstreamCall = {
  operation: string;
  elapsedMs: number;
  cached?: boolean;
  error?: boolean;
  rows?: number | null;
};

const storage = new AsyncLocalStorage<RequestPerfContext>();

export function createRequestPerfContext(init: RequestPerfContextInit): RequestPerfContext {
  return {
    ...init,
    dbCalls: 0,
    dbTotalMs: 0,
    dbMaxMs: 0,
    dbCacheHits: 0,
    dbErrors: 0,
    slowCalls: []
  };
}

export function runWithRequestPerfContext<T>(context: RequestPerfContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRequestPerfContext(): RequestPerfContext | null {
  return storage.getStore() ?? null;
}

/**
 * Adds one downstream call (typically a DB query) to the active request.
 * Outside a request scope this does nothing.
 */
export function recordDownstreamCall(call: DownstreamCall) {
  const context = storage.getStore();
  if (!context) {
    return;
  }

  const elapsedMs = Number.isFinite(call.elapsedMs) ? Math.max(0, call.elapsedMs) : 0;
  const cached = call.cached ?? false;
  const error = call.error ?? false;

  context.dbCalls += 1;
  context.dbTotalMs += elapsedMs;
  context.dbMaxMs = Math.max(context.dbMaxMs, elapsedMs);
  if (cached) {
    context.dbCacheHits += 1;
  }
  if (error) {
    context.dbErrors += 1;
  }

  if (elapsedMs >= context.slowQueryMs && context.slowCalls.length < MAX_SLOW_CALLS_PER_REQUEST) {
    context.slowCalls.push({
      operation: call.operation,
      elapsedMs: Math.round(elapsedMs * 100) / 100,
      cached,
      rows: call.rows ?? null,
      error
    });
  }
}
