import {
  DATABASE_URL,
  DB_SSL_REJECT_UNAUTHORIZED,
  LOCAL_DB_PATH,
  STORE_STRICT,
  STORE_UPSERT_BATCH_SIZE,
} from './config.js';
import {
  PostgresMarketStore,
  LocalMarketStore,
  type MarketStore,
  type SqlBackedMarketStore,
} from './data/marketStore.js';
import { runMigrations } from './db/migrate.js';
import { StoreConnectError, describeError } from './lib/errors.js';

export interface OpenMarketStoreOptions {
  databaseUrl?: string;
  localDbPath?: string;
  /** Throw instead of falling back when a backend cannot be opened. */
  strict?: boolean;
  batchSize?: number;
  sslRejectUnauthorized?: boolean;
  connectRemote?: (url: string) => Promise<SqlBackedMarketStore>;
  openLocal?: (dataDir: string) => Promise<SqlBackedMarketStore>;
}

/**
 * Connection policy:
 * - DATABASE_URL set → remote PostgreSQL store.
 * - remote missing or unreachable → local PGlite data directory (unless strict).
 * - local unusable → null (unless strict); callers fetch directly without persistence.
 *
 * Schema migrations run before the store is returned; a migration failure is
 * always thrown.
 */
export async function openMarketStore(options: OpenMarketStoreOptions = {}): Promise<MarketStore | null> {
  const {
    databaseUrl = DATABASE_URL,
    localDbPath = LOCAL_DB_PATH,
    strict = STORE_STRICT,
    batchSize = STORE_UPSERT_BATCH_SIZE,
    sslRejectUnauthorized = DB_SSL_REJECT_UNAUTHORIZED,
    connectRemote = (url: string) => PostgresMarketStore.connect(url, { batchSize, sslRejectUnauthorized }),
    openLocal = (dataDir: string) => LocalMarketStore.open(dataDir, { batchSize }),
  } = options;

  let store: SqlBackedMarketStore | null = null;

  if (databaseUrl) {
    try {
      store = await connectRemote(databaseUrl);
      console.log('[store] Connected to remote market store');
    } catch (err: unknown) {
      if (strict) {
        throw err instanceof StoreConnectError ? err : new StoreConnectError('remote', describeError(err), { cause: err });
      }
      console.error(`[store] ${describeError(err)}. Falling back to local store.`);
    }
  } else if (strict) {
    throw new StoreConnectError('remote', 'DATABASE_URL is not set and strict mode is enabled');
  } else {
    console.log(`[store] No DATABASE_URL configured. Using local store at ${localDbPath}`);
  }

  if (!store) {
    try {
      store = await openLocal(localDbPath);
      console.log(`[store] Opened local market store at ${localDbPath}`);
    } catch (err: unknown) {
      if (strict) {
        throw err instanceof StoreConnectError ? err : new StoreConnectError('local', describeError(err), { cause: err });
      }
      console.error(`[store] ${describeError(err)}. Continuing without persistence.`);
      return null;
    }
  }

  try {
    await runMigrations(store.db);
  } catch (err: unknown) {
    await store.close().catch((closeErr: unknown) => {
      console.warn(`[store] Failed to close store after migration failure: ${describeError(closeErr)}`);
    });
    throw err;
  }
  return store;
}
