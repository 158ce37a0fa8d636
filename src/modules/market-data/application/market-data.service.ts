import { Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { ICacheStore } from '../../../common/interfaces/cache.interface';
import { Result } from '../../../common/types/result.type';
import { CompanyProfile } from '../domain/models/company-profile.model';
import { MarketDataSettings } from '../domain/models/market-data-settings.model';
import {
  NewsArticle,
  NewsCategory,
  resolveNewsCategory,
} from '../domain/models/news-article.model';
import { ScreenerRow, ScreenerSignal } from '../domain/models/screener.model';
import {
  IMarketDataProvider,
  MarketDataError,
} from '../domain/ports/market-data-provider.port';

export const DEFAULT_PROFILE_SYMBOL = 'AAPL';

interface CacheAsideRequest<T> {
  cache: ICacheStore<T>;
  key: string;
  label: string;
  fetch: () => Promise<Result<T, MarketDataError>>;
  describe: (value: T) => string;
}

/**
 * Cache-aside access to market data. Every feed is cached for the configured
 * TTL; provider failures are passed through and nothing is cached for them.
 */
@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    @Inject(INJECTION_TOKENS.MARKET_DATA_PROVIDER)
    private readonly provider: IMarketDataProvider,
    @Inject(INJECTION_TOKENS.SCREENER_CACHE)
    private readonly screenerCache: ICacheStore<ScreenerRow[]>,
    @Inject(INJECTION_TOKENS.PROFILE_CACHE)
    private readonly profileCache: ICacheStore<CompanyProfile>,
    @Inject(INJECTION_TOKENS.NEWS_CACHE)
    private readonly newsCache: ICacheStore<NewsArticle[]>,
    @Inject(INJECTION_TOKENS.MARKET_DATA_SETTINGS)
    private readonly settings: MarketDataSettings,
  ) {}

  getScreener(signal: ScreenerSignal): Promise<Result<ScreenerRow[], MarketDataError>> {
    return this.cacheAside({
      cache: this.screenerCache,
      key: `${signal}_snapshot`,
      label: signal,
      fetch: () => this.provider.fetchScreener(signal, this.settings.tickerLimit),
      describe: (rows) => `${rows.length} items`,
    });
  }

  getCompanyProfile(
    symbol: string = DEFAULT_PROFILE_SYMBOL,
  ): Promise<Result<CompanyProfile, MarketDataError>> {
    const ticker = symbol.trim().toUpperCase() || DEFAULT_PROFILE_SYMBOL;
    return this.cacheAside({
      cache: this.profileCache,
      key: `profile_${ticker}`,
      label: `company profile ${ticker}`,
      fetch: () => this.provider.fetchCompanyProfile(ticker),
      describe: (profile) => profile.name,
    });
  }

  /**
   * Unknown categories are served, and cached, as `general`.
   */
  getNews(
    category?: string,
  ): Promise<Result<{ category: NewsCategory; articles: NewsArticle[] }, MarketDataError>> {
    const resolved = resolveNewsCategory(category);
    return this.cacheAside({
      cache: this.newsCache,
      key: `news_${resolved}`,
      label: `${resolved} news`,
      fetch: () => this.provider.fetchNews(resolved, this.settings.tickerLimit),
      describe: (articles) => `${articles.length} articles`,
    }).then((result) => result.map((articles) => ({ category: resolved, articles })));
  }

  private async cacheAside<T>(
    request: CacheAsideRequest<T>,
  ): Promise<Result<T, MarketDataError>> {
    const { cache, key, label, fetch, describe } = request;

    const cached = cache.get(key);
    if (cached.found) {
      this.logger.log(`Using cached data for ${label} (${describe(cached.value)})`);
      return Result.ok(cached.value);
    }

    this.logger.log(`Fetching fresh data for ${label}`);
    const result = await fetch();
    if (result.isFailure) {
      this.logger.error(`Failed to fetch ${label} data: ${result.getError().message}`);
      return result;
    }

    const value = result.getValue();
    cache.set(key, value, this.settings.cacheTtlMs);
    this.logger.log(
      `Fetched ${describe(value)} for ${label}, cached for ${this.settings.cacheTtlMs / 1000} seconds`,
    );
    return result;
  }
}
