import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { TtlCache } from '../../../common/cache/ttl-cache';
import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { Result } from '../../../common/types/result.type';
import { CompanyProfile } from '../domain/models/company-profile.model';
import { MarketDataSettings } from '../domain/models/market-data-settings.model';
import { NewsArticle } from '../domain/models/news-article.model';
import { ScreenerRow } from '../domain/models/screener.model';
import { MarketDataError } from '../domain/ports/market-data-provider.port';
import { MarketDataService } from './market-data.service';

describe('MarketDataService', () => {
  let service: MarketDataService;
  let now: number;
  let provider: {
    fetchScreener: jest.Mock;
    fetchCompanyProfile: jest.Mock;
    fetchNews: jest.Mock;
  };
  let screenerCache: TtlCache<ScreenerRow[]>;
  let profileCache: TtlCache<CompanyProfile>;

  const settings: MarketDataSettings = {
    watchlist: ['AAPL', 'TSLA'],
    cacheTtlMs: 60_000,
    tickerLimit: 5,
    pollingIntervalSeconds: 30,
  };

  const rows: ScreenerRow[] = [
    { ticker: 'TSLA', name: 'Tesla, Inc.', price: 234.86, high: 238.9, low: 232.5, volume: 60, change: 2.5 },
  ];

  const profile: CompanyProfile = {
    ticker: 'AAPL',
    name: 'Apple Inc.',
    industry: 'Technology',
    webUrl: 'https://www.apple.com',
    logo: 'https://logo.clearbit.com/apple.com',
    exchange: 'NYSE',
  };

  const articles: NewsArticle[] = [
    { headline: 'Markets rally', url: 'https://news.test/1', source: 'Wire', publishedAt: 0 },
  ];

  beforeEach(async () => {
    now = 1_000_000;
    const clock = { now: () => now };
    screenerCache = new TtlCache<ScreenerRow[]>(clock);
    profileCache = new TtlCache<CompanyProfile>(clock);

    provider = {
      fetchScreener: jest.fn().mockResolvedValue(Result.ok(rows)),
      fetchCompanyProfile: jest.fn().mockResolvedValue(Result.ok(profile)),
      fetchNews: jest.fn().mockResolvedValue(Result.ok(articles)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MarketDataService,
        { provide: INJECTION_TOKENS.MARKET_DATA_PROVIDER, useValue: provider },
        { provide: INJECTION_TOKENS.SCREENER_CACHE, useValue: screenerCache },
        { provide: INJECTION_TOKENS.PROFILE_CACHE, useValue: profileCache },
        { provide: INJECTION_TOKENS.NEWS_CACHE, useValue: new TtlCache<NewsArticle[]>(clock) },
        { provide: INJECTION_TOKENS.MARKET_DATA_SETTINGS, useValue: settings },
      ],
    }).compile();

    service = module.get<MarketDataService>(MarketDataService);

    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getScreener', () => {
    it('should fetch on a miss and cache under the snapshot key', async () => {
      const result = await service.getScreener('gainers');

      expect(result.getValue()).toEqual(rows);
      expect(provider.fetchScreener).toHaveBeenCalledWith('gainers', 5);
      expect(screenerCache.get('gainers_snapshot')).toEqual({ found: true, value: rows });
    });

    it('should serve from cache within the TTL', async () => {
      await service.getScreener('losers');
      now += 60_000;

      await service.getScreener('losers');

      expect(provider.fetchScreener).toHaveBeenCalledTimes(1);
    });

    it('should fetch again once the TTL has passed', async () => {
      await service.getScreener('losers');
      now += 60_001;

      await service.getScreener('losers');

      expect(provider.fetchScreener).toHaveBeenCalledTimes(2);
    });

    it('should keep each signal in its own entry', async () => {
      await service.getScreener('gainers');
      await service.getScreener('most_active');

      expect(provider.fetchScreener).toHaveBeenCalledTimes(2);
      expect(screenerCache.size).toBe(2);
    });

    it('should pass failures through without caching them', async () => {
      provider.fetchScreener.mockResolvedValueOnce(
        Result.fail(new MarketDataError(429, 'API limit reached')),
      );

      const result = await service.getScreener('gainers');

      expect(result.getError().statusCode).toBe(429);
      expect(screenerCache.get('gainers_snapshot')).toEqual({ found: false });
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        'Failed to fetch gainers data: API limit reached',
      );
    });
  });

  describe('getCompanyProfile', () => {
    it('should normalise the symbol for the provider and the cache key', async () => {
      await service.getCompanyProfile(' aapl ');

      expect(provider.fetchCompanyProfile).toHaveBeenCalledWith('AAPL');
      expect(profileCache.get('profile_AAPL').found).toBe(true);
    });

    it('should default to AAPL', async () => {
      await service.getCompanyProfile();
      await service.getCompanyProfile('');

      expect(provider.fetchCompanyProfile).toHaveBeenCalledTimes(1);
      expect(provider.fetchCompanyProfile).toHaveBeenCalledWith('AAPL');
    });
  });

  describe('getNews', () => {
    it('should fetch the requested category', async () => {
      const result = await service.getNews('crypto');

      expect(provider.fetchNews).toHaveBeenCalledWith('crypto', 5);
      expect(result.getValue()).toEqual({ category: 'crypto', articles });
    });

    it('should serve unknown categories as general from one cache entry', async () => {
      const unknown = await service.getNews('sports');
      await service.getNews();
      await service.getNews('general');

      expect(unknown.getValue().category).toBe('general');
      expect(provider.fetchNews).toHaveBeenCalledTimes(1);
      expect(provider.fetchNews).toHaveBeenCalledWith('general', 5);
    });
  });
});
