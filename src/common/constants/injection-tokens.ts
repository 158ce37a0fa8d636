/**
 * Injection tokens for dependency injection across the application.
 * Used for interface-based dependencies and multi-implementation providers.
 */
export const INJECTION_TOKENS = {
  // Time
  CLOCK: Symbol('CLOCK'),

  // Caches (one per value type)
  SCREENER_CACHE: Symbol('SCREENER_CACHE'),
  PROFILE_CACHE: Symbol('PROFILE_CACHE'),
  NEWS_CACHE: Symbol('NEWS_CACHE'),

  // Market data
  MARKET_DATA_PROVIDER: Symbol('MARKET_DATA_PROVIDER'),
  MARKET_DATA_SETTINGS: Symbol('MARKET_DATA_SETTINGS'),
  FINNHUB_CLIENT_SETTINGS: Symbol('FINNHUB_CLIENT_SETTINGS'),
  FINNHUB_HTTP_CLIENT: Symbol('FINNHUB_HTTP_CLIENT'),
  FINNHUB_RATE_LIMITER: Symbol('FINNHUB_RATE_LIMITER'),

  // Logging
  LOG_ROTATION_POLICY: Symbol('LOG_ROTATION_POLICY'),
  LOG_OUTPUT_SETTINGS: Symbol('LOG_OUTPUT_SETTINGS'),
};
