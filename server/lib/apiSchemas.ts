/**
 * Zod schemas for upstream market-data payloads.
 *
 * These validate the shape of provider responses at the system boundary
 * before they propagate into the rest of the application, catching upstream
 * contract changes early with clear diagnostics.
 */

import { z } from 'zod';

const nullableNumber = z.number().nullable().optional();

// ---------------------------------------------------------------------------
// Daily history (chart endpoint)
// ---------------------------------------------------------------------------

/** A single daily row as returned by the chart endpoint. */
const ChartQuoteSchema = z
  .object({
    date: z.union([z.date(), z.string(), z.number()]),
    open: nullableNumber,
    high: nullableNumber,
    low: nullableNumber,
    close: nullableNumber,
    volume: nullableNumber,
    adjclose: nullableNumber,
  })
  .passthrough();

export const ChartResponseSchema = z
  .object({
    quotes: z.array(ChartQuoteSchema),
  })
  .passthrough();

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

// ---------------------------------------------------------------------------
// Quote (last price)
// ---------------------------------------------------------------------------

export const QuoteResponseSchema = z
  .object({
    symbol: z.string().optional(),
    regularMarketPrice: nullableNumber,
    postMarketPrice: nullableNumber,
    preMarketPrice: nullableNumber,
  })
  .passthrough();

export type QuoteResponse = z.infer<typeof QuoteResponseSchema>;

// ---------------------------------------------------------------------------
// Quote summary (fundamentals)
// ---------------------------------------------------------------------------

export const QuoteSummaryResponseSchema = z
  .object({
    price: z
      .object({
        marketCap: nullableNumber,
        shortName: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
    summaryDetail: z
      .object({
        marketCap: nullableNumber,
        trailingPE: nullableNumber,
        forwardPE: nullableNumber,
        dividendYield: nullableNumber,
      })
      .passthrough()
      .optional(),
    defaultKeyStatistics: z
      .object({
        forwardPE: nullableNumber,
        profitMargins: nullableNumber,
      })
      .passthrough()
      .optional(),
    financialData: z
      .object({
        profitMargins: nullableNumber,
        revenueGrowth: nullableNumber,
      })
      .passthrough()
      .optional(),
    assetProfile: z
      .object({
        sector: z.string().nullable().optional(),
        industry: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type QuoteSummaryResponse = z.infer<typeof QuoteSummaryResponseSchema>;

// ---------------------------------------------------------------------------
// Local files
// ---------------------------------------------------------------------------

export const FundamentalsSnapshotSchema = z.object({
  marketCap: z.number().nullable(),
  trailingPE: z.number().nullable(),
  forwardPE: z.number().nullable(),
  dividendYield: z.number().nullable(),
  profitMargins: z.number().nullable(),
  revenueGrowth: z.number().nullable(),
  shortName: z.string(),
  sector: z.string(),
  industry: z.string(),
  last_fetched: z.number().nullable(),
});

export const FundamentalsCacheFileSchema = z.record(z.string(), FundamentalsSnapshotSchema);

export const WatchlistFileSchema = z.object({
  watchlist: z.array(z.string()),
});

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a payload against a Zod schema.
 * Returns the validated data on success, or `null` on failure (with a
 * console warning naming the first few issues).
 */
export function validateApiResponse<S extends z.ZodTypeAny>(schema: S, payload: unknown, label: string): z.infer<S> | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  console.warn(`[Zod] ${label}: payload failed validation:`, result.error.issues.slice(0, 3));
  return null;
}
