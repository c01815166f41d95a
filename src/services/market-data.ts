import { loadCurrencyTables } from '../config/data-tables.js';
import { UpstreamUnavailableError } from '../types/errors.js';
import type { CryptoQuote, CurrencyTables, MarketDataSource, MarketValue, StockQuote } from '../types/market.js';
import { fetchJson, isRecord, toFiniteNumber } from '../utils/http.js';
import { logThought } from '../utils/logger.js';
import type { PriceCache } from './price-cache.js';

export interface MarketDataEndpoints {
  coinGeckoUrl: string;
  coinCapUrl: string;
  frankfurterUrl: string;
  exchangeRateUrl: string;
  yahooFinanceUrl: string;
}

const DEFAULT_ENDPOINTS: MarketDataEndpoints = {
  coinGeckoUrl: 'https://api.coingecko.com/api/v3',
  coinCapUrl: 'https://api.coincap.io/v2',
  frankfurterUrl: 'https://api.frankfurter.app',
  exchangeRateUrl: 'https://api.exchangerate-api.com/v4',
  yahooFinanceUrl: 'https://query1.finance.yahoo.com',
};

/** Tickers: letters first, then letters, digits, dots or dashes. Indices start with `^`. */
const TICKER_PATTERN = /^\^?[A-Z][A-Z0-9.-]{0,9}$/;

export function isTicker(symbol: string): boolean {
  return TICKER_PATTERN.test(symbol.toUpperCase());
}

/**
 * Public market-data APIs. Crypto quotes come from CoinGecko, falling back to
 * CoinCap (USD-denominated, converted when another quote currency is asked).
 * FX rates come from Frankfurter, falling back to ExchangeRate-API. Stock and
 * index quotes come from Yahoo Finance's chart endpoint.
 */
export class HttpMarketDataSource implements MarketDataSource {
  readonly #endpoints: MarketDataEndpoints;
  readonly #tables: CurrencyTables;

  constructor(endpoints: Partial<MarketDataEndpoints> = {}, tables: CurrencyTables = loadCurrencyTables()) {
    this.#endpoints = { ...DEFAULT_ENDPOINTS, ...endpoints };
    this.#tables = tables;
  }

  async fetchPrice(symbol: string, quoteCurrency: string, signal?: AbortSignal): Promise<CryptoQuote> {
    const assetId = this.#tables.cryptoIds[symbol.toUpperCase()];
    if (!assetId) {
      throw new UpstreamUnavailableError('market-data', new Error(`unknown asset ${symbol}`));
    }

    try {
      return await this.#coinGecko(assetId, quoteCurrency.toLowerCase(), signal);
    } catch (primaryErr) {
      const reason = primaryErr instanceof Error ? primaryErr.message : String(primaryErr);
      void logThought(`[MarketData] CoinGecko failed for ${symbol}/${quoteCurrency}: ${reason}. Trying CoinCap.`);
    }

    try {
      const usdQuote = await this.#coinCap(assetId, signal);
      if (quoteCurrency.toUpperCase() === 'USD') return usdQuote;
      const rate = await this.fetchFx('USD', quoteCurrency, signal);
      return {
        price: usdQuote.price * rate,
        change24h: usdQuote.change24h,
        volume24h: usdQuote.volume24h === null ? null : usdQuote.volume24h * rate,
      };
    } catch (fallbackErr) {
      throw new UpstreamUnavailableError('market-data', fallbackErr);
    }
  }

  async fetchFx(base: string, quote: string, signal?: AbortSignal): Promise<number> {
    const from = base.toUpperCase();
    const to = quote.toUpperCase();
    if (from === to) return 1;

    try {
      return await this.#frankfurter(from, to, signal);
    } catch (primaryErr) {
      const reason = primaryErr instanceof Error ? primaryErr.message : String(primaryErr);
      void logThought(`[MarketData] Frankfurter failed for ${from}/${to}: ${reason}. Trying ExchangeRate-API.`);
    }

    try {
      return await this.#exchangeRateApi(from, to, signal);
    } catch (fallbackErr) {
      throw new UpstreamUnavailableError('fx-rates', fallbackErr);
    }
  }

  async fetchStock(symbol: string, signal?: AbortSignal): Promise<StockQuote> {
    const ticker = symbol.toUpperCase();
    if (!isTicker(ticker)) {
      throw new UpstreamUnavailableError('stock-data', new Error(`invalid ticker ${symbol}`));
    }

    let body: unknown;
    try {
      const params = new URLSearchParams({ range: '1d', interval: '1d' });
      body = await fetchJson(
        `${this.#endpoints.yahooFinanceUrl}/v8/finance/chart/${encodeURIComponent(ticker)}?${params.toString()}`,
        { signal },
      );
    } catch (err) {
      throw new UpstreamUnavailableError('stock-data', err);
    }

    const chart = isRecord(body) ? body.chart : undefined;
    const results = isRecord(chart) ? chart.result : undefined;
    const first: unknown = Array.isArray(results) ? results[0] : undefined;
    const meta = isRecord(first) ? first.meta : undefined;
    const price = isRecord(meta) ? toFiniteNumber(meta.regularMarketPrice) : null;
    if (!isRecord(meta) || price === null) {
      throw new UpstreamUnavailableError('stock-data', new Error(`no quote for ${ticker}`));
    }

    const text = (value: unknown): string | null => (typeof value === 'string' && value.trim() ? value : null);
    return {
      symbol: text(meta.symbol) ?? ticker,
      name: text(meta.longName) ?? text(meta.shortName),
      exchange: text(meta.fullExchangeName) ?? text(meta.exchangeName),
      currency: text(meta.currency)?.toUpperCase() ?? 'USD',
      price,
      previousClose: toFiniteNumber(meta.chartPreviousClose) ?? toFiniteNumber(meta.previousClose),
      dayHigh: toFiniteNumber(meta.regularMarketDayHigh),
      dayLow: toFiniteNumber(meta.regularMarketDayLow),
      volume: toFiniteNumber(meta.regularMarketVolume),
    };
  }

  async #coinGecko(assetId: string, vs: string, signal?: AbortSignal): Promise<CryptoQuote> {
    const params = new URLSearchParams({
      ids: assetId,
      vs_currencies: vs,
      include_24hr_change: 'true',
      include_24hr_vol: 'true',
    });
    const body = await fetchJson(`${this.#endpoints.coinGeckoUrl}/simple/price?${params.toString()}`, { signal });
    const asset = isRecord(body) ? body[assetId] : undefined;
    const price = isRecord(asset) ? toFiniteNumber(asset[vs]) : null;
    if (!isRecord(asset) || price === null) {
      throw new Error(`no ${vs} price for ${assetId}`);
    }
    return {
      price,
      change24h: toFiniteNumber(asset[`${vs}_24h_change`]),
      volume24h: toFiniteNumber(asset[`${vs}_24h_vol`]),
    };
  }

  async #coinCap(assetId: string, signal?: AbortSignal): Promise<CryptoQuote> {
    const body = await fetchJson(`${this.#endpoints.coinCapUrl}/assets/${encodeURIComponent(assetId)}`, { signal });
    const data = isRecord(body) ? body.data : undefined;
    const price = isRecord(data) ? toFiniteNumber(data.priceUsd) : null;
    if (!isRecord(data) || price === null) {
      throw new Error(`no USD price for ${assetId}`);
    }
    return {
      price,
      change24h: toFiniteNumber(data.changePercent24Hr),
      volume24h: toFiniteNumber(data.volumeUsd24Hr),
    };
  }

  async #frankfurter(from: string, to: string, signal?: AbortSignal): Promise<number> {
    const params = new URLSearchParams({ from, to });
    const body = await fetchJson(`${this.#endpoints.frankfurterUrl}/latest?${params.toString()}`, { signal });
    return readRate(body, to);
  }

  async #exchangeRateApi(from: string, to: string, signal?: AbortSignal): Promise<number> {
    const body = await fetchJson(`${this.#endpoints.exchangeRateUrl}/latest/${encodeURIComponent(from)}`, { signal });
    return readRate(body, to);
  }
}

function readRate(body: unknown, to: string): number {
  const rates = isRecord(body) ? body.rates : undefined;
  const rate = isRecord(rates) ? toFiniteNumber(rates[to]) : null;
  if (rate === null) throw new Error(`no rate for ${to}`);
  return rate;
}

export interface PriceLookup {
  quote: CryptoQuote;
  fetchedAt: number;
  stale: boolean;
}

export interface StockLookup {
  quote: StockQuote;
  fetchedAt: number;
  stale: boolean;
}

export interface RateLookup {
  rate: number;
  fetchedAt: number;
  stale: boolean;
}

export function cryptoCacheKey(symbol: string, quoteCurrency: string): string {
  return `crypto:${symbol.toUpperCase()}:${quoteCurrency.toUpperCase()}`;
}

export function fxCacheKey(base: string, quote: string): string {
  return `fx:${base.toUpperCase()}:${quote.toUpperCase()}`;
}

export function stockCacheKey(symbol: string): string {
  return `stock:${symbol.toUpperCase()}`;
}

/** Typed reads through the shared price/FX cache. */
export class MarketQuotes {
  readonly #source: MarketDataSource;
  readonly #cache: PriceCache<MarketValue>;

  constructor(source: MarketDataSource, cache: PriceCache<MarketValue>) {
    this.#source = source;
    this.#cache = cache;
  }

  async price(symbol: string, quoteCurrency: string): Promise<PriceLookup> {
    const lookup = await this.#cache.getOrFetch(cryptoCacheKey(symbol, quoteCurrency), async (signal) => ({
      kind: 'crypto',
      quote: await this.#source.fetchPrice(symbol, quoteCurrency, signal),
    }));
    const { value } = lookup;
    if (value.kind !== 'crypto') throw new Error(`[MarketQuotes] Cache entry for ${symbol} is not a crypto quote.`);
    return { quote: value.quote, fetchedAt: lookup.fetchedAt, stale: lookup.stale };
  }

  async rate(base: string, quote: string): Promise<RateLookup> {
    const lookup = await this.#cache.getOrFetch(fxCacheKey(base, quote), async (signal) => ({
      kind: 'fx',
      rate: await this.#source.fetchFx(base, quote, signal),
    }));
    const { value } = lookup;
    if (value.kind !== 'fx') throw new Error(`[MarketQuotes] Cache entry for ${base}/${quote} is not an FX rate.`);
    return { rate: value.rate, fetchedAt: lookup.fetchedAt, stale: lookup.stale };
  }

  async stock(symbol: string): Promise<StockLookup> {
    const source = this.#source;
    if (!source.fetchStock) {
      throw new UpstreamUnavailableError('stock-data', new Error('no stock quote source configured'));
    }
    const fetchStock = source.fetchStock.bind(source);
    const lookup = await this.#cache.getOrFetch(stockCacheKey(symbol), async (signal) => ({
      kind: 'stock',
      quote: await fetchStock(symbol, signal),
    }));
    const { value } = lookup;
    if (value.kind !== 'stock') throw new Error(`[MarketQuotes] Cache entry for ${symbol} is not a stock quote.`);
    return { quote: value.quote, fetchedAt: lookup.fetchedAt, stale: lookup.stale };
  }

  pruneCache(): number {
    return this.#cache.prune();
  }
}
