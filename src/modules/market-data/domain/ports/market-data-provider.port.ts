import { Result } from '../../../../common/types/result.type';
import { CompanyProfile } from '../models/company-profile.model';
import { NewsArticle, NewsCategory } from '../models/news-article.model';
import { ScreenerRow, ScreenerSignal } from '../models/screener.model';

/**
 * Market data operation error
 */
export class MarketDataError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'MarketDataError';
  }
}

/**
 * Port (interface) for market data sources.
 */
export interface IMarketDataProvider {
  /**
   * Rows for a screener, already ranked and cut to `limit`
   */
  fetchScreener(
    signal: ScreenerSignal,
    limit: number,
  ): Promise<Result<ScreenerRow[], MarketDataError>>;

  fetchCompanyProfile(symbol: string): Promise<Result<CompanyProfile, MarketDataError>>;

  /**
   * Latest articles of a category, newest first
   */
  fetchNews(
    category: NewsCategory,
    limit: number,
  ): Promise<Result<NewsArticle[], MarketDataError>>;
}
