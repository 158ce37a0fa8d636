export interface CompanyProfile {
  ticker: string;
  name: string;
  industry: string;
  webUrl: string;
  logo: string;
  exchange: string;
}

/**
 * Listing used when the source gives no exchange: tickers starting with A-M
 * are shown as NYSE, everything else as NASDAQ.
 */
export function exchangeForSymbol(symbol: string): 'NYSE' | 'NASDAQ' {
  const first = symbol.charAt(0).toUpperCase();
  return first >= 'A' && first <= 'M' ? 'NYSE' : 'NASDAQ';
}
