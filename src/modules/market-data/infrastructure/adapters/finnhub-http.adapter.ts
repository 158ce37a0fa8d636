import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { RateLimiter } from '../../../../common/rate-limit/rate-limiter';
import { Result } from '../../../../common/types/result.type';
import {
  CompanyProfile,
  exchangeForSymbol,
} from '../../domain/models/company-profile.model';
import { MarketDataSettings } from '../../domain/models/market-data-settings.model';
import { NewsArticle, NewsCategory } from '../../domain/models/news-article.model';
import {
  rankScreenerRows,
  ScreenerRow,
  ScreenerSignal,
} from '../../domain/models/screener.model';
import {
  IMarketDataProvider,
  MarketDataError,
} from '../../domain/ports/market-data-provider.port';

/** GET /quote */
interface FinnhubQuote {
  c: number;
  h: number;
  l: number;
  dp: number | null;
  t: number;
}

/** GET /stock/profile2; `{}` for unknown symbols */
interface FinnhubProfile {
  name?: string;
  ticker?: string;
  exchange?: string;
  finnhubIndustry?: string;
  weburl?: string;
  logo?: string;
}

/** One item of GET /news */
interface FinnhubNewsItem {
  headline: string;
  url: string;
  source: string;
  datetime: number;
  summary?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isQuote(data: unknown): data is FinnhubQuote {
  return (
    isRecord(data) &&
    typeof data.c === 'number' &&
    typeof data.h === 'number' &&
    typeof data.l === 'number' &&
    typeof data.t === 'number' &&
    (typeof data.dp === 'number' || data.dp === null)
  );
}

function isProfile(data: unknown): data is FinnhubProfile {
  return (
    isRecord(data) &&
    ['name', 'ticker', 'exchange', 'finnhubIndustry', 'weburl', 'logo'].every(
      (key) => isOptionalString(data[key]),
    )
  );
}

function isNewsItem(data: unknown): data is FinnhubNewsItem {
  return (
    isRecord(data) &&
    typeof data.headline === 'string' &&
    typeof data.url === 'string' &&
    typeof data.source === 'string' &&
    typeof data.datetime === 'number' &&
    isOptionalString(data.summary)
  );
}

function isNewsList(data: unknown): data is unknown[] {
  return Array.isArray(data);
}

/**
 * HTTP adapter for the Finnhub REST API using axios.
 * Implements IMarketDataProvider with Result pattern error handling; every
 * request first waits on the shared rate limiter.
 */
@Injectable()
export class FinnhubHttpAdapter implements IMarketDataProvider {
  private readonly logger = new Logger(FinnhubHttpAdapter.name);

  constructor(
    @Inject(INJECTION_TOKENS.FINNHUB_HTTP_CLIENT)
    private readonly httpClient: AxiosInstance,
    @Inject(INJECTION_TOKENS.FINNHUB_RATE_LIMITER)
    private readonly rateLimiter: RateLimiter,
    @Inject(INJECTION_TOKENS.MARKET_DATA_SETTINGS)
    private readonly settings: MarketDataSettings,
  ) {}

  /**
   * Finnhub has no screener endpoint on the free tier, so the watchlist is
   * quoted symbol by symbol and ranked locally. `/quote` carries no volume.
   */
  async fetchScreener(
    signal: ScreenerSignal,
    limit: number,
  ): Promise<Result<ScreenerRow[], MarketDataError>> {
    const rows: ScreenerRow[] = [];

    for (const symbol of this.settings.watchlist) {
      const quote = await this.get('/quote', { symbol }, isQuote, `quote for ${symbol}`);
      if (quote.isFailure) {
        return Result.fail(quote.getError());
      }

      const { c, h, l, dp, t } = quote.getValue();
      // Unknown symbols come back as an all-zero quote
      if (t === 0) {
        this.logger.warn(`No quote available for ${symbol}, skipping`);
        continue;
      }
      rows.push({
        ticker: symbol,
        name: symbol,
        price: c,
        high: h,
        low: l,
        volume: 0,
        change: dp ?? 0,
      });
    }

    return Result.ok(rankScreenerRows(rows, signal, limit));
  }

  async fetchCompanyProfile(
    symbol: string,
  ): Promise<Result<CompanyProfile, MarketDataError>> {
    const result = await this.get(
      '/stock/profile2',
      { symbol },
      isProfile,
      `profile for ${symbol}`,
    );
    if (result.isFailure) {
      return Result.fail(result.getError());
    }

    const profile = result.getValue();
    if (!profile.name) {
      return Result.fail(new MarketDataError(404, `No company profile found for ${symbol}`));
    }

    return Result.ok({
      ticker: profile.ticker || symbol,
      name: profile.name,
      industry: profile.finnhubIndustry || 'Unknown',
      webUrl: profile.weburl ?? '',
      logo: profile.logo ?? '',
      exchange: profile.exchange || exchangeForSymbol(symbol),
    });
  }

  async fetchNews(
    category: NewsCategory,
    limit: number,
  ): Promise<Result<NewsArticle[], MarketDataError>> {
    const result = await this.get('/news', { category }, isNewsList, `${category} news`);
    if (result.isFailure) {
      return Result.fail(result.getError());
    }

    const items = result.getValue();
    const articles = items.filter(isNewsItem).map(
      (item): NewsArticle => ({
        headline: item.headline,
        url: item.url,
        source: item.source,
        publishedAt: item.datetime * 1000,
        summary: item.summary || undefined,
      }),
    );
    if (articles.length < items.length) {
      this.logger.warn(
        `Dropped ${items.length - articles.length} malformed ${category} news item(s)`,
      );
    }

    articles.sort((a, b) => b.publishedAt - a.publishedAt);
    return Result.ok(articles.slice(0, Math.max(0, limit)));
  }

  private async get<T>(
    path: string,
    params: Record<string, string>,
    guard: (data: unknown) => data is T,
    what: string,
  ): Promise<Result<T, MarketDataError>> {
    await this.rateLimiter.wait();

    try {
      const response = await this.httpClient.get<unknown>(path, { params });
      if (!guard(response.data)) {
        const message = `Finnhub ${what} returned an unexpected payload`;
        this.logger.error(message);
        return Result.fail(new MarketDataError(502, message));
      }
      return Result.ok(response.data);
    } catch (error) {
      return Result.fail(this.handleError(error, what));
    }
  }

  private handleError(error: unknown, what: string): MarketDataError {
    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status ?? 503;

      const responseData: unknown = error.response?.data;
      let reason = error.message;
      if (isRecord(responseData) && typeof responseData.error === 'string') {
        reason = responseData.error;
      }

      const message = `Finnhub ${what} failed (${statusCode}): ${reason}`;
      this.logger.error(message);
      return new MarketDataError(statusCode, message);
    }

    const message = `Finnhub ${what} failed: ${error instanceof Error ? error.message : String(error)}`;
    this.logger.error(message);
    return new MarketDataError(500, message);
  }
}
