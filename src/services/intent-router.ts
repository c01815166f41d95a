import { loadCurrencyTables } from '../config/data-tables.js';
import type { ConversationContext } from '../types/context.js';
import type { HelpTopic, Intent } from '../types/intent.js';
import type { CurrencyTables } from '../types/market.js';
import type { InboundMessage } from '../types/messaging.js';
import { extractKeywords } from './keywords.js';
import { isTicker } from './market-data.js';

export interface IntentRouterOptions {
  botName: string;
  commandPrefixes: string[];
  tables?: CurrencyTables;
  keywordExtractor?: (text: string) => string[];
}

const RESET_COMMANDS = new Set(['reset', 'clear']);
const SUMMARY_COMMANDS = new Set(['summary', 'summarize', 'recap', 'tldr']);
const SUMMARY_PHRASES = new Set([...SUMMARY_COMMANDS, 'catch me up']);
const HELP_COMMANDS = new Set(['help', 'start']);
const HELP_TOPICS: readonly HelpTopic[] = ['meme', 'search', 'price', 'stock', 'time'];
const STOCK_COMMANDS = new Set(['stonks', 'stock', 'stocks']);
const CLOCK_COMMANDS = new Set(['time', 'clock']);
const MAX_CLOCK_LOCATIONS = 5;
const PRICE_KEYWORDS = new Set(['price', 'prices', 'worth', 'convert', 'rate', 'rates', 'exchange']);
const TARGET_WORDS = new Set(['to', 'in']);
const AMBIGUOUS_CODES = new Set(['TRY', 'PHP', 'COP', 'PEN']);
const AMBIGUOUS_TICKERS = new Set(['LINK', 'DOT', 'UNI', 'SOL', 'ATOM', 'ADA']);
const FILLER_WORDS = new Set(['of', 'the', 'for']);

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/gi;
const TRAILING_URL_PUNCTUATION = /[.,!?;]+$/;
const DISCORD_MENTION = /<@!?\d+>/g;

/** Well-formed http(s) URLs in order of appearance, trailing punctuation removed. */
export function extractUrls(text: string): string[] {
  const urls: string[] = [];
  for (const match of text.match(URL_PATTERN) ?? []) {
    const url = match.replace(TRAILING_URL_PUNCTUATION, '');
    if (URL.canParse(url) && !urls.includes(url)) urls.push(url);
  }
  return urls;
}

/** A price keyword directly before or after `index`, looking past words like "of the". */
function nearPriceKeyword(tokens: readonly string[], index: number): boolean {
  const after = tokens[index + 1]?.toLowerCase();
  if (after !== undefined && PRICE_KEYWORDS.has(after)) return true;
  for (let i = index - 1; i >= 0; i--) {
    const before = (tokens[i] ?? '').toLowerCase();
    if (PRICE_KEYWORDS.has(before)) return true;
    if (!FILLER_WORDS.has(before)) return false;
  }
  return false;
}

interface ParsedCommand {
  name: string;
  args: string;
}

/**
 * Maps a normalized message plus a context snapshot to exactly one Intent.
 * Synchronous and side-effect free; the first matching rule wins.
 */
export class IntentRouter {
  readonly #botName: string;
  readonly #commandPrefixes: string[];
  readonly #tables: CurrencyTables;
  readonly #fiatCodes: Set<string>;
  readonly #extract: (text: string) => string[];
  readonly #mentionPattern: RegExp | null;

  constructor(options: IntentRouterOptions) {
    this.#botName = options.botName.trim().toLowerCase();
    this.#commandPrefixes = options.commandPrefixes.filter((prefix) => prefix.length > 0);
    this.#tables = options.tables ?? loadCurrencyTables();
    this.#fiatCodes = new Set(this.#tables.commonFiat);
    this.#extract = options.keywordExtractor ?? ((text) => extractKeywords(text));
    this.#mentionPattern = this.#botName
      ? new RegExp(`@?${this.#botName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b[,:]?`, 'gi')
      : null;
  }

  classify(message: InboundMessage, context: Readonly<ConversationContext>): Intent {
    if (message.rejected) return { kind: 'rejected' };

    const cleaned = this.#stripMentions(message.text);
    const command = this.#parseCommand(cleaned);
    const bare = cleaned.toLowerCase().replace(/[.!?,;:]+$/, '').trim();

    if ((command && RESET_COMMANDS.has(command.name)) || bare === 'reset') {
      return { kind: 'reset' };
    }

    if ((command && SUMMARY_COMMANDS.has(command.name)) || SUMMARY_PHRASES.has(bare)) {
      return { kind: 'summary' };
    }

    if (command && HELP_COMMANDS.has(command.name)) {
      const requested = command.args.toLowerCase().split(/\s+/)[0] ?? '';
      const topic = HELP_TOPICS.find((candidate) => candidate === requested);
      return topic ? { kind: 'help', topic } : { kind: 'help' };
    }

    if (command?.name === 'stats') {
      return { kind: 'stats' };
    }

    if (command && CLOCK_COMMANDS.has(command.name)) {
      const locations = command.args
        .split(',')
        .map((location) => location.trim())
        .filter((location) => location.length > 0);
      return { kind: 'clock', locations: locations.slice(0, MAX_CLOCK_LOCATIONS) };
    }

    if (command && STOCK_COMMANDS.has(command.name)) {
      const symbol = (command.args.split(/\s+/)[0] ?? '').replace(/^\$/, '').toUpperCase();
      return isTicker(symbol) ? { kind: 'stock', symbol } : { kind: 'help', topic: 'stock' };
    }

    const urls = extractUrls(cleaned);
    if (urls.length > 0) {
      let instruction = cleaned;
      for (const match of cleaned.match(URL_PATTERN) ?? []) {
        instruction = instruction.replace(match, ' ');
      }
      if (command) instruction = instruction.replace(/^\s*\S+/, ' ');
      return { kind: 'url-analysis', urls, instruction: instruction.replace(/\s+/g, ' ').trim() };
    }

    const market = this.#parseMarketQuery(command ? command.args : cleaned, command?.name === 'price');
    if (market) return market;
    if (command?.name === 'price') return { kind: 'help', topic: 'price' };

    if (command?.name === 'meme') {
      const topic = command.args.trim();
      return topic ? { kind: 'meme', topic } : { kind: 'help', topic: 'meme' };
    }

    if (command?.name === 'search') {
      const query = command.args.trim();
      return query ? { kind: 'search', query } : { kind: 'help', topic: 'search' };
    }

    const keywords = this.#extract(cleaned);
    const novelTopic = keywords.some((keyword) => !Object.hasOwn(context.topics, keyword));
    return { kind: 'chat', text: message.text, novelTopic, keywords };
  }

  #stripMentions(text: string): string {
    let stripped = text.replace(DISCORD_MENTION, ' ');
    if (this.#mentionPattern) stripped = stripped.replace(this.#mentionPattern, ' ');
    return stripped.replace(/\s+/g, ' ').trim();
  }

  #parseCommand(text: string): ParsedCommand | null {
    const prefix = this.#commandPrefixes.find((candidate) => text.startsWith(candidate));
    if (prefix === undefined) return null;

    const match = /^(\p{L}[\p{L}\p{N}_]*)(?:@\S+)?\s*([\s\S]*)$/u.exec(text.slice(prefix.length));
    if (!match) return null;
    const [, name = '', args = ''] = match;
    return { name: name.toLowerCase(), args: args.trim() };
  }

  /** Crypto price or fiat conversion, when a currency co-occurs with a price keyword. */
  #parseMarketQuery(text: string, forced: boolean): Intent | null {
    const tokens = text.replace(/(\d),(?=\d{3}\b)/g, '$1').match(/\$?[A-Za-z]+|\d+(?:\.\d+)?/g) ?? [];

    let asset: string | null = null;
    const fiats: string[] = [];
    let amount: number | null = null;
    let hasKeyword = forced;
    let previous = '';

    for (const [index, raw] of tokens.entries()) {
      const token = raw.replace(/^\$/, '');
      const lower = token.toLowerCase();
      if (/^\d/.test(token)) {
        amount ??= Number(token);
        previous = lower;
        continue;
      }
      if (PRICE_KEYWORDS.has(lower)) hasKeyword = true;

      const cryptoSymbol = this.#cryptoSymbol(token, raw !== token || forced || nearPriceKeyword(tokens, index));
      const fiat = this.#fiatCode(token);
      if (cryptoSymbol && !asset) asset = cryptoSymbol;
      if (fiat && !fiats.includes(fiat)) fiats.push(fiat);
      if ((cryptoSymbol || fiat) && TARGET_WORDS.has(previous)) hasKeyword = true;
      previous = lower;
    }

    if (!hasKeyword) return null;

    if (asset) {
      return { kind: 'price', symbol: asset, quoteCurrency: fiats[0] ?? 'USD' };
    }

    const base = fiats[0];
    if (base === undefined) return null;
    return {
      kind: 'fx',
      base,
      quote: fiats[1] ?? (base === 'USD' ? 'EUR' : 'USD'),
      amount: amount !== null && Number.isFinite(amount) && amount > 0 ? amount : 1,
    };
  }

  /**
   * Tickers that are also English words (link, dot, sol) need capitals, a `$`
   * prefix or a price keyword right beside them.
   */
  #cryptoSymbol(token: string, marked: boolean): string | null {
    const upper = token.toUpperCase();
    const lower = token.toLowerCase();
    if (Object.hasOwn(this.#tables.cryptoIds, upper)) {
      if (!AMBIGUOUS_TICKERS.has(upper) || token === upper || marked) return upper;
    }
    return Object.hasOwn(this.#tables.cryptoNames, lower) ? this.#tables.cryptoNames[lower] ?? null : null;
  }

  /** Codes that double as English words only count when written in capitals. */
  #fiatCode(token: string): string | null {
    const upper = token.toUpperCase();
    if (this.#fiatCodes.has(upper) && (token === upper || !AMBIGUOUS_CODES.has(upper))) return upper;
    const lower = token.toLowerCase();
    return Object.hasOwn(this.#tables.fiatNames, lower) ? this.#tables.fiatNames[lower] ?? null : null;
  }
}
