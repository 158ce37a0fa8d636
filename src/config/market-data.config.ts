import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';

import { RateLimiter } from '../common/rate-limit/rate-limiter';
import {
  FinnhubClientSettings,
  MarketDataSettings,
} from '../modules/market-data/domain/models/market-data-settings.model';
import { EnvVars } from './config.schema';

export const getMarketDataSettings = (
  config: ConfigService<EnvVars, true>,
): MarketDataSettings => ({
  watchlist: config
    .get('WATCHLIST', { infer: true })
    .split(',')
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => symbol.length > 0),
  cacheTtlMs: config.get('CACHE_TTL_SECONDS', { infer: true }) * 1000,
  tickerLimit: config.get('TICKER_LIMIT', { infer: true }),
  pollingIntervalSeconds: config.get('POLLING_INTERVAL_SECONDS', { infer: true }),
});

export const getFinnhubClientSettings = (
  config: ConfigService<EnvVars, true>,
): FinnhubClientSettings => ({
  baseUrl: config.get('FINNHUB_BASE_URL', { infer: true }),
  apiKey: config.get('FINNHUB_API_KEY', { infer: true }),
  timeoutMs: config.get('FINNHUB_TIMEOUT_MS', { infer: true }),
  minIntervalMs: config.get('FINNHUB_MIN_INTERVAL_MS', { infer: true }),
});

export const createFinnhubHttpClient = (
  settings: FinnhubClientSettings,
): AxiosInstance =>
  axios.create({
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    headers: {
      'X-Finnhub-Token': settings.apiKey,
    },
  });

/**
 * Finnhub's free tier allows 60 calls per minute; one limiter is shared by
 * every outbound call.
 */
export const createFinnhubRateLimiter = (
  settings: FinnhubClientSettings,
): RateLimiter => new RateLimiter({ intervalMs: settings.minIntervalMs });
