export interface CryptoQuote {
  price: number;
  /** Percent change over 24h, when the provider reports it. */
  change24h: number | null;
  volume24h: number | null;
}

export interface StockQuote {
  symbol: string;
  /** Company or index name. */
  name: string | null;
  exchange: string | null;
  currency: string;
  price: number;
  previousClose: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
}

/** Upstream market-data provider used by the price/FX cache. */
export interface MarketDataSource {
  fetchPrice(symbol: string, quoteCurrency: string, signal?: AbortSignal): Promise<CryptoQuote>;
  fetchFx(base: string, quote: string, signal?: AbortSignal): Promise<number>;
  /** Equity and index quotes; sources without one answer stock questions as unavailable. */
  fetchStock?(symbol: string, signal?: AbortSignal): Promise<StockQuote>;
}

export interface PriceCacheEntry<V> {
  value: V;
  fetchedAt: number;
  ttlMs: number;
}

export interface CacheLookup<V> {
  value: V;
  fetchedAt: number;
  /** True only when serve-stale-on-error returned an expired entry. */
  stale: boolean;
}

export interface CurrencyTables {
  fiatSymbols: Record<string, string>;
  /** Currencies whose symbol is written before the amount. */
  prefixSymbolCurrencies: string[];
  commonFiat: string[];
  fiatNames: Record<string, string>;
  /** Ticker → CoinGecko / CoinCap asset id. */
  cryptoIds: Record<string, string>;
  /** Lower-case coin name → ticker. */
  cryptoNames: Record<string, string>;
}

/** What the shared price/FX cache stores, tagged by the key's namespace. */
export type MarketValue =
  | { kind: 'crypto'; quote: CryptoQuote }
  | { kind: 'fx'; rate: number }
  | { kind: 'stock'; quote: StockQuote };
