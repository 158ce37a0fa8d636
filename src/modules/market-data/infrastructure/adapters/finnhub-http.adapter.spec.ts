import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import axios, {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { MarketDataSettings } from '../../domain/models/market-data-settings.model';
import { FinnhubHttpAdapter } from './finnhub-http.adapter';

type Route = (config: InternalAxiosRequestConfig) => AxiosResponse;

describe('FinnhubHttpAdapter', () => {
  let adapter: FinnhubHttpAdapter;
  let rateLimiter: { wait: jest.Mock };
  let requests: { url?: string; params: unknown }[];
  let route: Route;

  const settings: MarketDataSettings = {
    watchlist: ['AAPL', 'MSFT', 'TSLA'],
    cacheTtlMs: 60_000,
    tickerLimit: 5,
    pollingIntervalSeconds: 30,
  };

  const reply = (config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse => ({
    data,
    status,
    statusText: 'OK',
    headers: {},
    config,
  });

  const quotes: Readonly<Record<string, unknown>> = {
    AAPL: { c: 172.28, h: 173.05, l: 170.12, dp: -0.54, t: 1760880000 },
    MSFT: { c: 370.95, h: 372.1, l: 368.45, dp: 1.23, t: 1760880000 },
    TSLA: { c: 234.86, h: 238.9, l: 232.5, dp: 2.5, t: 1760880000 },
  };

  beforeEach(async () => {
    requests = [];
    route = (config) => reply(config, {});
    rateLimiter = { wait: jest.fn().mockResolvedValue(undefined) };

    const httpClient = axios.create({
      baseURL: 'https://finnhub.test/api/v1',
      adapter: async (config) => {
        requests.push({ url: config.url, params: config.params });
        return route(config);
      },
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FinnhubHttpAdapter,
        { provide: INJECTION_TOKENS.FINNHUB_HTTP_CLIENT, useValue: httpClient },
        { provide: INJECTION_TOKENS.FINNHUB_RATE_LIMITER, useValue: rateLimiter },
        { provide: INJECTION_TOKENS.MARKET_DATA_SETTINGS, useValue: settings },
      ],
    }).compile();

    adapter = module.get<FinnhubHttpAdapter>(FinnhubHttpAdapter);

    jest.spyOn(Logger.prototype, 'error').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fetchScreener', () => {
    beforeEach(() => {
      route = (config) => {
        const symbol = String(config.params.symbol);
        return reply(config, quotes[symbol] ?? { c: 0, h: 0, l: 0, dp: null, t: 0 });
      };
    });

    it('should quote every watchlist symbol behind the rate limiter', async () => {
      await adapter.fetchScreener('gainers', 5);

      expect(requests).toEqual([
        { url: '/quote', params: { symbol: 'AAPL' } },
        { url: '/quote', params: { symbol: 'MSFT' } },
        { url: '/quote', params: { symbol: 'TSLA' } },
      ]);
      expect(rateLimiter.wait).toHaveBeenCalledTimes(3);
    });

    it('should rank gainers by percent change', async () => {
      const result = await adapter.fetchScreener('gainers', 2);

      expect(result.getValue()).toEqual([
        { ticker: 'TSLA', name: 'TSLA', price: 234.86, high: 238.9, low: 232.5, volume: 0, change: 2.5 },
        { ticker: 'MSFT', name: 'MSFT', price: 370.95, high: 372.1, low: 368.45, volume: 0, change: 1.23 },
      ]);
    });

    it('should rank losers with the biggest drop first', async () => {
      const result = await adapter.fetchScreener('losers', 5);

      expect(result.getValue().map((row) => row.ticker)).toEqual(['AAPL', 'MSFT', 'TSLA']);
    });

    it('should skip symbols Finnhub does not know', async () => {
      route = (config) => {
        const symbol = String(config.params.symbol);
        return symbol === 'TSLA'
          ? reply(config, { c: 0, h: 0, l: 0, dp: null, t: 0 })
          : reply(config, quotes[symbol]);
      };

      const result = await adapter.fetchScreener('most_active', 5);

      expect(result.getValue().map((row) => row.ticker)).toEqual(['MSFT', 'AAPL']);
    });

    it('should fail with the upstream status when a quote is rejected', async () => {
      route = (config) => {
        throw new AxiosError(
          'Request failed with status code 429',
          'ERR_BAD_REQUEST',
          config,
          null,
          reply(config, { error: 'API limit reached' }, 429),
        );
      };

      const result = await adapter.fetchScreener('gainers', 5);

      expect(result.isFailure).toBe(true);
      expect(result.getError().statusCode).toBe(429);
      expect(result.getError().message).toBe(
        'Finnhub quote for AAPL failed (429): API limit reached',
      );
      expect(requests).toHaveLength(1);
    });
  });

  describe('fetchCompanyProfile', () => {
    it('should map the profile2 payload', async () => {
      route = (config) =>
        reply(config, {
          name: 'Apple Inc',
          ticker: 'AAPL',
          exchange: 'NASDAQ NMS - GLOBAL MARKET',
          finnhubIndustry: 'Technology',
          weburl: 'https://www.apple.com/',
          logo: 'https://static.finnhub.io/logo/apple.png',
        });

      const result = await adapter.fetchCompanyProfile('AAPL');

      expect(requests).toEqual([{ url: '/stock/profile2', params: { symbol: 'AAPL' } }]);
      expect(result.getValue()).toEqual({
        ticker: 'AAPL',
        name: 'Apple Inc',
        industry: 'Technology',
        webUrl: 'https://www.apple.com/',
        logo: 'https://static.finnhub.io/logo/apple.png',
        exchange: 'NASDAQ NMS - GLOBAL MARKET',
      });
    });

    it('should derive the exchange when Finnhub leaves it out', async () => {
      route = (config) => reply(config, { name: 'Tesla Inc', ticker: 'TSLA' });

      const result = await adapter.fetchCompanyProfile('TSLA');

      expect(result.getValue().exchange).toBe('NASDAQ');
      expect(result.getValue().industry).toBe('Unknown');
    });

    it('should report an unknown symbol as not found', async () => {
      route = (config) => reply(config, {});

      const result = await adapter.fetchCompanyProfile('ZZZZ');

      expect(result.getError().statusCode).toBe(404);
      expect(result.getError().message).toBe('No company profile found for ZZZZ');
    });

    it('should reject a payload of the wrong shape', async () => {
      route = (config) => reply(config, { name: 42 });

      const result = await adapter.fetchCompanyProfile('AAPL');

      expect(result.getError().statusCode).toBe(502);
      expect(result.getError().message).toBe(
        'Finnhub profile for AAPL returned an unexpected payload',
      );
    });
  });

  describe('fetchNews', () => {
    it('should return the newest valid articles up to the limit', async () => {
      route = (config) =>
        reply(config, [
          { headline: 'Older', url: 'https://news.test/1', source: 'Wire', datetime: 1000, summary: '' },
          { headline: 'Newest', url: 'https://news.test/2', source: 'Desk', datetime: 3000, summary: 'Lead' },
          { headline: 'Broken', datetime: 2500 },
          { headline: 'Middle', url: 'https://news.test/3', source: 'Wire', datetime: 2000 },
        ]);

      const result = await adapter.fetchNews('general', 2);

      expect(requests).toEqual([{ url: '/news', params: { category: 'general' } }]);
      expect(result.getValue()).toEqual([
        { headline: 'Newest', url: 'https://news.test/2', source: 'Desk', publishedAt: 3_000_000, summary: 'Lead' },
        { headline: 'Middle', url: 'https://news.test/3', source: 'Wire', publishedAt: 2_000_000, summary: undefined },
      ]);
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'Dropped 1 malformed general news item(s)',
      );
    });

    it('should map a network failure to 503', async () => {
      route = (config) => {
        throw new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED', config);
      };

      const result = await adapter.fetchNews('crypto', 5);

      expect(result.getError().statusCode).toBe(503);
      expect(result.getError().message).toBe(
        'Finnhub crypto news failed (503): timeout of 5000ms exceeded',
      );
    });
  });
});
