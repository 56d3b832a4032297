/**
 * Database query monitoring: wraps pg Pool.query() with timing
 * and logs slow queries via console.warn (captured by Pino as structured JSON).
 */

const DEFAULT_SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);

export interface InstrumentPoolOptions {
  poolName?: string;
  slowQueryThresholdMs?: number;
  warn?: (message: string) => void;
  error?: (message: string) => void;
}

/** Anything shaped like a pg Pool for the purpose of query timing. */
type QueryablePool = { query: (...args: never[]) => unknown };

function extractSql(args: unknown[]): string {
  const first = args[0];
  let raw: unknown = '';
  if (typeof first === 'string') {
    raw = first;
  } else if (first && typeof first === 'object' && 'text' in first) {
    raw = first.text;
  }
  return String(raw).replace(/\s+/g, ' ').trim().slice(0, 200);
}

export function instrumentPool<P extends QueryablePool | null | undefined>(pool: P, options: InstrumentPoolOptions = {}): P {
  if (!pool || typeof pool.query !== 'function') return pool;
  const {
    poolName = 'market',
    slowQueryThresholdMs = DEFAULT_SLOW_QUERY_THRESHOLD_MS,
    warn = (message: string) => console.warn(message),
    error = (message: string) => console.error(message),
  } = options;

  const originalQuery = pool.query.bind(pool) as (...a: unknown[]) => Promise<unknown>;

  // pg's Pool.query is not redefinable through the public interface; monkey-patching is the
  // standard approach for transparent query instrumentation without a proxy layer.
  (pool as unknown as { query: (...args: unknown[]) => Promise<unknown> }).query = async function monitoredQuery(
    ...args: unknown[]
  ) {
    const start = performance.now();
    try {
      const result = await originalQuery(...args);
      const durationMs = performance.now() - start;
      if (durationMs >= slowQueryThresholdMs) {
        warn(`[slow-query] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)}`);
      }
      return result;
    } catch (err: unknown) {
      const durationMs = performance.now() - start;
      error(
        `[query-error] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)} error=${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }
  };

  return pool;
}
