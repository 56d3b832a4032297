import * as fs from 'fs/promises';
import * as path from 'path';
import logger from './server/logger.js';
import { BRIEFING_OUTPUT_PATH, validateStartupEnvironment } from './server/config.js';
import type { MarketStore } from './server/data/marketStore.js';
import { openMarketStore } from './server/db.js';
import { describeError } from './server/lib/errors.js';
import { metricsRegistry } from './server/metrics.js';
import { runBriefing } from './server/orchestrators/briefingOrchestrator.js';
import { FundamentalsCache } from './server/services/fundamentalsCache.js';
import { YahooMarketDataProvider } from './server/services/marketDataProvider.js';
import { MarketSynchronizer } from './server/services/marketSync.js';
import { loadWatchlist } from './server/services/watchlist.js';

async function writeBriefingOutput(filePath: string, payload: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
  console.log(`[briefing] wrote output to ${filePath}`);
}

async function main(): Promise<number> {
  validateStartupEnvironment();

  const tickers = await loadWatchlist();
  if (tickers.length === 0) {
    console.error('[briefing] No tickers found in watchlist.');
    return 1;
  }

  let store: MarketStore | null;
  try {
    store = await openMarketStore();
  } catch (err: unknown) {
    console.error('Fatal: market store initialization failed, exiting.', err);
    return 1;
  }

  try {
    const provider = new YahooMarketDataProvider();
    const fundamentals = new FundamentalsCache({ provider });
    await fundamentals.open();

    const synchronizer = new MarketSynchronizer({ store, provider });
    const result = await runBriefing({ tickers, store, synchronizer, fundamentals, provider });

    await fundamentals.flush();
    if (BRIEFING_OUTPUT_PATH) {
      await writeBriefingOutput(BRIEFING_OUTPUT_PATH, result);
    }
    if (logger.isLevelEnabled('debug')) {
      logger.debug(await metricsRegistry.metrics());
    }
    return result.summary.succeeded.length > 0 ? 0 : 1;
  } finally {
    if (store) {
      await store.close().catch((err: unknown) => {
        console.warn(`[store] close failed: ${describeError(err)}`);
      });
    }
  }
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
});

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal: briefing run failed.', err);
    process.exitCode = 1;
  },
);
