/**
 * Dashboard-level settings shared by the service, the adapters and the views.
 */
export interface MarketDataSettings {
  /** Symbols quoted for the screeners, in display order */
  readonly watchlist: readonly string[];
  readonly cacheTtlMs: number;
  /** Max rows per screener table and articles per news list */
  readonly tickerLimit: number;
  readonly pollingIntervalSeconds: number;
}

export interface FinnhubClientSettings {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
  readonly minIntervalMs: number;
}
