/**
 * Error taxonomy for the sync engine plus pure classification predicates.
 *
 * Per-ticker errors (provider, store write, no data) are isolated by the
 * orchestrator; StoreConnectError and migration failures end the run.
 */

/** Upstream market-data call failed (network, 5xx, open circuit, bad payload). */
export class ProviderFetchError extends Error {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super(`Provider fetch failed for ${ticker}: ${message}`, options);
    this.name = 'ProviderFetchError';
    this.ticker = ticker;
  }
}

/** The configured store could not be reached or opened. */
export class StoreConnectError extends Error {
  readonly backend: 'remote' | 'local';

  constructor(backend: 'remote' | 'local', message: string, options?: { cause?: unknown }) {
    super(`Could not connect to ${backend} store: ${message}`, options);
    this.name = 'StoreConnectError';
    this.backend = backend;
  }
}

/** A write batch was rejected; nothing from the batch was committed. */
export class StoreWriteError extends Error {
  readonly ticker: string | null;

  constructor(ticker: string | null, message: string, options?: { cause?: unknown }) {
    super(ticker ? `Store write failed for ${ticker}: ${message}` : `Store write failed: ${message}`, options);
    this.name = 'StoreWriteError';
    this.ticker = ticker;
  }
}

/** Neither the store nor the provider produced any bars for the ticker. */
export class NoDataError extends Error {
  readonly ticker: string;

  constructor(ticker: string) {
    super(`No data for ${ticker}`);
    this.name = 'NoDataError';
    this.ticker = ticker;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const name = String(e.name || '');
  const message = String(e.message || err || '');
  return name === 'AbortError' || Number(e.httpStatus) === 499 || /aborted|aborterror/i.test(message);
}

/**
 * Infrastructure failures (timeouts, 5xx, connection errors) count towards
 * opening the provider circuit; "not found" style answers do not.
 */
export function isInfrastructureError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return true;
  if (isAbortError(err)) return false;
  const e = err as Record<string, unknown>;
  const status = Number(e.httpStatus ?? e.statusCode ?? e.status);
  if (Number.isFinite(status) && status > 0) {
    return status >= 500 || status === 429;
  }
  const code = e.code;
  if (typeof code === 'string' && /^(ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|ENETUNREACH|EAI_AGAIN|UND_ERR_CONNECT_TIMEOUT)$/i.test(code)) {
    return true;
  }
  const msg = String(e.message || '');
  if (/timed?\s*out|fetch failed|socket hang up/i.test(msg)) return true;
  return false;
}
