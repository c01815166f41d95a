import type { ContextSummary } from '../types/context.js';
import type { HelpTopic } from '../types/intent.js';
import type { CryptoQuote, CurrencyTables, StockQuote } from '../types/market.js';
import type { TrendHint } from '../types/messaging.js';
import type { StatsSnapshot } from '../services/stats-tracker.js';
import type { ClockReading } from '../services/world-clock.js';

type SymbolTables = Pick<CurrencyTables, 'fiatSymbols' | 'prefixSymbolCurrencies'>;

/** Fewer decimals as the amount grows: sub-cent values keep six, big ones none. */
export function priceDecimals(value: number): number {
  const magnitude = Math.abs(value);
  if (magnitude < 0.01) return 6;
  if (magnitude < 1) return 4;
  if (magnitude < 100) return 2;
  return 0;
}

function withSymbol(amount: string, currency: string, tables: SymbolTables): string {
  const code = currency.toUpperCase();
  const symbol = tables.fiatSymbols[code];
  if (symbol && tables.prefixSymbolCurrencies.includes(code)) return `${symbol}${amount}`;
  if (symbol) return `${amount} ${symbol}`;
  return `${amount} ${code}`;
}

/** `formatPrice(67000.4, 'USD')` → `$67,000`; `formatPrice(0.5, 'JPY')` → `0.5000 ¥`. */
export function formatPrice(value: number, currency: string, tables: SymbolTables): string {
  const decimals = priceDecimals(value);
  const amount = value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
  return withSymbol(amount, currency, tables);
}

/** Two decimals always, as share prices are quoted. */
export function formatMoney(value: number, currency: string, tables: SymbolTables): string {
  const amount = value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return withSymbol(amount, currency, tables);
}

/** Share counts: `52.30M`, `1.20K`, `950`. */
export function formatVolume(volume: number): string {
  if (volume >= 1e9) return `${(volume / 1e9).toFixed(2)}B`;
  if (volume >= 1e6) return `${(volume / 1e6).toFixed(2)}M`;
  if (volume >= 1e3) return `${(volume / 1e3).toFixed(2)}K`;
  return String(Math.round(volume));
}

export function formatCompact(value: number, currency: string, tables: SymbolTables): string {
  const units: Array<[number, string]> = [
    [1e12, 'T'],
    [1e9, 'B'],
    [1e6, 'M'],
    [1e3, 'K'],
  ];
  const unit = units.find(([size]) => Math.abs(value) >= size);
  const amount = unit ? `${(value / unit[0]).toFixed(2)}${unit[1]}` : value.toFixed(2);
  return withSymbol(amount, currency, tables);
}

export interface FormattedChange {
  text: string;
  trend: TrendHint;
}

export function formatPercentage(change: number | null): FormattedChange {
  if (change === null) return { text: 'N/A', trend: 'flat' };
  const rounded = Math.round(change * 100) / 100;
  if (rounded > 0) return { text: `📈 +${rounded.toFixed(2)}%`, trend: 'gain' };
  if (rounded < 0) return { text: `📉 ${rounded.toFixed(2)}%`, trend: 'loss' };
  return { text: '➡️ 0.00%', trend: 'flat' };
}

export function formatDuration(ms: number): string {
  const totalMinutes = Math.floor(Math.max(0, ms) / 60_000);
  if (totalMinutes < 1) return 'less than a minute';
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;
  return [days ? `${days}d` : '', hours ? `${hours}h` : '', minutes ? `${minutes}m` : '']
    .filter(Boolean)
    .join(' ');
}

export function displayName(botName: string): string {
  return botName ? botName.charAt(0).toUpperCase() + botName.slice(1) : 'Bot';
}

export function renderPriceReply(
  symbol: string,
  quoteCurrency: string,
  quote: CryptoQuote,
  tables: SymbolTables,
): { text: string; trend: TrendHint } {
  const change = formatPercentage(quote.change24h);
  const lines = [
    `💰 **${symbol} Price**`,
    `Price: ${formatPrice(quote.price, quoteCurrency, tables)}`,
    `24h Change: ${change.text}`,
  ];
  if (quote.volume24h !== null) {
    lines.push(`24h Volume: ${formatCompact(quote.volume24h, quoteCurrency, tables)}`);
  }
  return { text: lines.join('\n'), trend: change.trend };
}

export function renderStockReply(quote: StockQuote, tables: SymbolTables): { text: string; trend: TrendHint } {
  const money = (value: number) => formatMoney(value, quote.currency, tables);
  const heading = quote.name ? `${quote.name} (${quote.symbol})` : quote.symbol;
  const lines = [`📊 **${heading}**`];
  if (quote.exchange) lines.push(`🏢 ${quote.exchange} | ${quote.currency}`);
  lines.push(`💵 Price: ${money(quote.price)}`);

  let trend: TrendHint = 'flat';
  if (quote.previousClose !== null && quote.previousClose !== 0) {
    const change = quote.price - quote.previousClose;
    const percent = formatPercentage((change / quote.previousClose) * 100);
    trend = percent.trend;
    lines.push(`${percent.text} (${money(Math.abs(change))})`);
    lines.push(`Prev Close: ${money(quote.previousClose)}`);
  }
  if (quote.dayLow !== null && quote.dayHigh !== null) {
    lines.push(`Day Range: ${money(quote.dayLow)} - ${money(quote.dayHigh)}`);
  }
  if (quote.volume !== null) lines.push(`Volume: ${formatVolume(quote.volume)}`);
  return { text: lines.join('\n'), trend };
}

export interface ClockMiss {
  location: string;
  suggestions: string[];
}

function renderReading(reading: ClockReading): string {
  return [
    `🕐 **${reading.label}**`,
    `Time: ${reading.time}`,
    `Date: ${reading.date}`,
    `Timezone: ${reading.zoneName} (UTC${reading.utcOffset})`,
  ].join('\n');
}

export function renderClock(readings: ClockReading[], misses: ClockMiss[]): string {
  const blocks = readings.map(renderReading);
  const problems = misses.map((miss) =>
    miss.suggestions.length > 0
      ? `Location '${miss.location}' not found. Did you mean: ${miss.suggestions.join(', ')}?`
      : `Couldn't find a timezone for '${miss.location}'. Try a major city or country name.`,
  );
  if (problems.length > 0) blocks.push(`⚠️ ${problems.join('\n')}`);
  return blocks.join('\n\n');
}

export function renderFxReply(
  base: string,
  quote: string,
  amount: number,
  rate: number,
  tables: SymbolTables,
): string {
  const lines = [
    '💱 **Exchange Rate**',
    `${formatPrice(amount, base, tables)} = ${formatPrice(amount * rate, quote, tables)}`,
  ];
  if (amount !== 1) {
    lines.push(`Rate: ${formatPrice(1, base, tables)} = ${formatPrice(rate, quote, tables)}`);
  }
  return lines.join('\n');
}

export function renderSummary(summary: ContextSummary, now: number): string {
  const topics = summary.topTopics.map((entry) => entry.topic);
  const lines = [
    '📋 **Room Summary**',
    `Messages since last reset: ${summary.messageCount}`,
    `People: ${summary.participants.length > 0 ? summary.participants.join(', ') : 'nobody yet'}`,
    `Hot topics: ${topics.length > 0 ? topics.join(', ') : 'nothing yet'}`,
  ];
  if (summary.oldestAt !== null && summary.newestAt !== null) {
    lines.push(`Window: ${formatDuration(summary.newestAt - summary.oldestAt)} of chat`);
  }
  lines.push(`Last reset: ${summary.lastResetAt === null ? 'never' : `${formatDuration(now - summary.lastResetAt)} ago`}`);
  return lines.join('\n');
}

function renderCounts(entries: Array<{ name: string; count: number }>, limit: number): string {
  if (entries.length === 0) return 'none yet';
  return entries
    .slice(0, limit)
    .map((entry) => `${entry.name} (${entry.count})`)
    .join(', ');
}

export function renderStats(stats: StatsSnapshot): string {
  return [
    '📊 **Bot Stats**',
    `Uptime: ${formatDuration(stats.uptimeMs)}`,
    `Messages: ${stats.received} received, ${stats.sent} sent, ${stats.dropped} dropped`,
    `Rooms: ${stats.rooms}`,
    `Top commands: ${renderCounts(stats.commands, 5)}`,
    `Top features: ${renderCounts(stats.features, 5)}`,
  ].join('\n');
}

export function renderHelp(botName: string, prefix: string, topic?: HelpTopic): string {
  switch (topic) {
    case 'meme':
      return `🎨 Usage: ${prefix}meme <topic>\nExample: ${prefix}meme monday mornings`;
    case 'search':
      return `🔍 Usage: ${prefix}search <query>\nExample: ${prefix}search best linux distro for laptops`;
    case 'price':
      return (
        `💰 Usage: ${prefix}price <coin> [currency]\n` +
        `Examples: ${prefix}price btc, ${prefix}price eth eur, "100 usd to eur"`
      );
    case 'stock':
      return `📊 Usage: ${prefix}stonks <ticker>\nExamples: ${prefix}stonks aapl, ${prefix}stonks ^gspc`;
    case 'time':
      return (
        `🕐 Usage: ${prefix}time [city or country, ...]\n` +
        `Examples: ${prefix}time tokyo, ${prefix}time new york, london\nWith no place I'll tell you UTC.`
      );
    default:
      return [
        `👋 Hey, I'm ${displayName(botName)}! Mention me, reply to me, or use a command:`,
        `${prefix}price <coin> [currency] - crypto prices and currency conversion`,
        `${prefix}stonks <ticker> - stock quotes`,
        `${prefix}time [place] - world clock`,
        `${prefix}meme <topic> - make a meme`,
        `${prefix}search <query> - search the web`,
        `${prefix}summary - recap this room`,
        `${prefix}reset - clear my memory of this room`,
        `${prefix}stats - usage stats`,
        `Paste a link and I'll read it for you.`,
      ].join('\n');
  }
}

const WORD_CHAR = /[\p{L}\p{N}]/u;

/** Mask filtered words in outgoing text, keeping their length. */
export function scrubFilteredWords(text: string, filteredWords: string[]): string {
  let scrubbed = text;
  for (const word of filteredWords) {
    const needle = word.trim().toLowerCase();
    if (!needle) continue;
    let from = 0;
    let lower = scrubbed.toLowerCase();
    let index = lower.indexOf(needle, from);
    while (index !== -1) {
      const before = index > 0 ? scrubbed.charAt(index - 1) : '';
      const after = scrubbed.charAt(index + needle.length);
      if (!WORD_CHAR.test(before) && !WORD_CHAR.test(after)) {
        scrubbed = scrubbed.slice(0, index) + '*'.repeat(needle.length) + scrubbed.slice(index + needle.length);
        lower = scrubbed.toLowerCase();
      }
      from = index + needle.length;
      index = lower.indexOf(needle, from);
    }
  }
  return scrubbed;
}
