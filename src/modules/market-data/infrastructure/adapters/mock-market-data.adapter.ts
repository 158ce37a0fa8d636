import { Inject, Injectable, Optional } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { Clock, systemClock } from '../../../../common/time/clock';
import { Result } from '../../../../common/types/result.type';
import {
  CompanyProfile,
  exchangeForSymbol,
} from '../../domain/models/company-profile.model';
import {
  DEFAULT_NEWS_CATEGORY,
  NewsArticle,
  NewsCategory,
} from '../../domain/models/news-article.model';
import {
  rankScreenerRows,
  ScreenerRow,
  ScreenerSignal,
} from '../../domain/models/screener.model';
import {
  IMarketDataProvider,
  MarketDataError,
} from '../../domain/ports/market-data-provider.port';
import mockMarketData from '../data/mock-market-data.json';

interface MockProfile {
  name: string;
  industry: string;
  webUrl: string;
  logo: string;
}

interface MockArticle {
  headline: string;
  url: string;
  source: string;
  minutesAgo: number;
  summary?: string;
}

interface MockMarketData {
  screener: ScreenerRow[];
  profiles: Record<string, MockProfile>;
  news: Record<string, MockArticle[]>;
}

const MOCK_DATA: MockMarketData = mockMarketData;
const MINUTE_MS = 60 * 1000;

/**
 * Offline market data served from a bundled fixture. Used in development and
 * whenever no Finnhub key should be spent.
 */
@Injectable()
export class MockMarketDataAdapter implements IMarketDataProvider {
  private readonly clock: Clock;

  constructor(@Optional() @Inject(INJECTION_TOKENS.CLOCK) clock?: Clock) {
    this.clock = clock ?? systemClock;
  }

  async fetchScreener(
    signal: ScreenerSignal,
    limit: number,
  ): Promise<Result<ScreenerRow[], MarketDataError>> {
    return Result.ok(rankScreenerRows(MOCK_DATA.screener, signal, limit));
  }

  /**
   * Symbols missing from the fixture get a generated profile.
   */
  async fetchCompanyProfile(
    symbol: string,
  ): Promise<Result<CompanyProfile, MarketDataError>> {
    const ticker = symbol.toUpperCase();
    const domain = `${ticker.toLowerCase()}.com`;
    const known = MOCK_DATA.profiles[ticker];

    const profile: MockProfile = known ?? {
      name: `${ticker} Corporation`,
      industry: 'Technology',
      webUrl: `https://www.${domain}`,
      logo: `https://logo.clearbit.com/${domain}`,
    };

    return Result.ok({ ticker, exchange: exchangeForSymbol(ticker), ...profile });
  }

  async fetchNews(
    category: NewsCategory,
    limit: number,
  ): Promise<Result<NewsArticle[], MarketDataError>> {
    const now = this.clock.now();
    const items = MOCK_DATA.news[category] ?? MOCK_DATA.news[DEFAULT_NEWS_CATEGORY] ?? [];

    return Result.ok(
      items.slice(0, Math.max(0, limit)).map(
        ({ minutesAgo, ...article }): NewsArticle => ({
          ...article,
          publishedAt: now - minutesAgo * MINUTE_MS,
        }),
      ),
    );
  }
}
