export const NEWS_CATEGORIES = ['general', 'forex', 'crypto', 'merger'] as const;
export type NewsCategory = (typeof NEWS_CATEGORIES)[number];

export const DEFAULT_NEWS_CATEGORY: NewsCategory = 'general';

export interface NewsArticle {
  headline: string;
  url: string;
  source: string;
  /** Epoch milliseconds */
  publishedAt: number;
  summary?: string;
}

function isNewsCategory(value: string): value is NewsCategory {
  return NEWS_CATEGORIES.some((category) => category === value);
}

/**
 * Unknown categories fall back to `general`.
 */
export function resolveNewsCategory(category: string | undefined): NewsCategory {
  const normalized = (category ?? '').trim().toLowerCase();
  return isNewsCategory(normalized) ? normalized : DEFAULT_NEWS_CATEGORY;
}
