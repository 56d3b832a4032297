import client from 'prom-client';

/** Run-scoped registry; the entry point dumps it when a run finishes. */
export const metricsRegistry = new client.Registry();
metricsRegistry.setDefaultLabels({ app: 'market-sync-engine' });

export const providerRequestsTotal = new client.Counter({
  name: 'market_provider_requests_total',
  help: 'Upstream market-data calls by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [metricsRegistry],
});

export const barsInsertedTotal = new client.Counter({
  name: 'market_store_bars_inserted_total',
  help: 'Daily bars newly inserted into the store',
  registers: [metricsRegistry],
});

export const tickerRunsTotal = new client.Counter({
  name: 'market_sync_ticker_runs_total',
  help: 'Tickers processed per run by status',
  labelNames: ['status'] as const,
  registers: [metricsRegistry],
});

export const syncDurationSeconds = new client.Histogram({
  name: 'market_sync_duration_seconds',
  help: 'Time spent syncing one ticker, by where the series came from',
  labelNames: ['source'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [metricsRegistry],
});
