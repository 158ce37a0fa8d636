export const SCREENER_SIGNALS = ['most_active', 'gainers', 'losers'] as const;
export type ScreenerSignal = (typeof SCREENER_SIGNALS)[number];

/**
 * One row of a screener table: quote plus daily change in percent.
 */
export interface ScreenerRow {
  ticker: string;
  name: string;
  price: number;
  high: number;
  low: number;
  /** Shares traded today; 0 when the source does not report volume */
  volume: number;
  change: number;
}

const SCREENER_ORDER: Record<ScreenerSignal, (a: ScreenerRow, b: ScreenerRow) => number> = {
  gainers: (a, b) => b.change - a.change,
  losers: (a, b) => a.change - b.change,
  most_active: (a, b) =>
    b.volume - a.volume || Math.abs(b.change) - Math.abs(a.change),
};

/**
 * Orders rows for a screener and keeps the first `limit`. Ties keep the input
 * order, so the watchlist order decides.
 */
export function rankScreenerRows(
  rows: readonly ScreenerRow[],
  signal: ScreenerSignal,
  limit: number,
): ScreenerRow[] {
  return [...rows].sort(SCREENER_ORDER[signal]).slice(0, Math.max(0, limit));
}

export function screenerLabel(signal: ScreenerSignal): string {
  switch (signal) {
    case 'most_active':
      return 'most active';
    case 'gainers':
      return 'gainers';
    case 'losers':
      return 'losers';
  }
}
