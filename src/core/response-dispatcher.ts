import { loadCurrencyTables } from '../config/data-tables.js';
import type { ContextStore } from '../services/context-store.js';
import type { ChatMessage, LanguageModel } from '../services/llm-client.js';
import type { MarketQuotes } from '../services/market-data.js';
import type { MemeBackend } from '../services/meme-service.js';
import type { SearchBackend } from '../services/search-client.js';
import type { StatsTracker } from '../services/stats-tracker.js';
import { WorldClock, type ClockReading } from '../services/world-clock.js';
import type { ConversationContext } from '../types/context.js';
import { DeadlineExceededError, UpstreamUnavailableError } from '../types/errors.js';
import type { Intent } from '../types/intent.js';
import type { CurrencyTables } from '../types/market.js';
import type { FormatHints, InboundMessage, OutboundMessage } from '../types/messaging.js';
import { DeadlineBudget, withDeadline } from '../utils/deadline.js';
import { logThought } from '../utils/logger.js';
import {
  displayName,
  renderFxReply,
  renderClock,
  renderHelp,
  renderPriceReply,
  renderStats,
  renderStockReply,
  renderSummary,
  scrubFilteredWords,
  type ClockMiss,
} from './formatting.js';
import { buildChatMessages, buildMemeCaptionMessages } from './prompt.js';

export const TIMEOUT_FALLBACK = 'Yo, the AI servers are being slow af rn. Try again in a sec? 🔧';
export const ERROR_FALLBACK = 'Oops, something went wrong! Try again maybe? 🤷';
export const REJECTED_REPLY = "🚫 That message has filtered content in it, so I'm sitting this one out.";

export interface ResponseDispatcherDeps {
  contextStore: ContextStore;
  marketQuotes: MarketQuotes;
  llm: LanguageModel;
  search?: SearchBackend;
  meme?: MemeBackend;
  stats?: StatsTracker;
  tables?: CurrencyTables;
  clock?: WorldClock;
}

export interface ResponseDispatcherOptions {
  botName: string;
  personality: string;
  /** Prefix shown in help texts. @default '!' */
  helpPrefix?: string;
  filteredWords?: string[];
  searchEnabled?: boolean;
  /** Allowance for all upstream calls one message makes (search, model, renderer). @default 30000 */
  llmTimeoutMs?: number;
  /** Cap for a single search or page read within that allowance. @default 10000 */
  searchTimeoutMs?: number;
  /** @default 2000 */
  operationTimeoutMs?: number;
  /** URLs read per message. @default 3 */
  maxUrls?: number;
  now?: () => number;
}

const DEFAULTS = {
  helpPrefix: '!',
  searchEnabled: false,
  llmTimeoutMs: 30_000,
  searchTimeoutMs: 10_000,
  operationTimeoutMs: 2_000,
  maxUrls: 3,
};

interface Reply {
  text: string;
  formatHints?: FormatHints;
  attachments?: string[];
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Produces exactly one OutboundMessage per classified message. Every
 * downstream call runs under a deadline, and the upstream calls for one
 * message share a single allowance of `llmTimeoutMs`; timeouts and upstream
 * failures turn into fallback text instead of errors.
 */
export class ResponseDispatcher {
  readonly #store: ContextStore;
  readonly #quotes: MarketQuotes;
  readonly #llm: LanguageModel;
  readonly #search?: SearchBackend;
  readonly #meme?: MemeBackend;
  readonly #stats?: StatsTracker;
  readonly #tables: CurrencyTables;
  readonly #clock: WorldClock;

  readonly #botName: string;
  readonly #personality: string;
  readonly #helpPrefix: string;
  readonly #filteredWords: string[];
  readonly #searchEnabled: boolean;
  readonly #llmTimeoutMs: number;
  readonly #searchTimeoutMs: number;
  readonly #operationTimeoutMs: number;
  readonly #maxUrls: number;
  readonly #now: () => number;

  constructor(deps: ResponseDispatcherDeps, options: ResponseDispatcherOptions) {
    this.#store = deps.contextStore;
    this.#quotes = deps.marketQuotes;
    this.#llm = deps.llm;
    this.#search = deps.search;
    this.#meme = deps.meme;
    this.#stats = deps.stats;
    this.#tables = deps.tables ?? loadCurrencyTables();
    this.#clock = deps.clock ?? new WorldClock();

    this.#botName = options.botName;
    this.#personality = options.personality;
    this.#helpPrefix = options.helpPrefix ?? DEFAULTS.helpPrefix;
    this.#filteredWords = options.filteredWords ?? [];
    this.#searchEnabled = options.searchEnabled ?? DEFAULTS.searchEnabled;
    this.#llmTimeoutMs = options.llmTimeoutMs ?? DEFAULTS.llmTimeoutMs;
    this.#searchTimeoutMs = options.searchTimeoutMs ?? DEFAULTS.searchTimeoutMs;
    this.#operationTimeoutMs = options.operationTimeoutMs ?? DEFAULTS.operationTimeoutMs;
    this.#maxUrls = options.maxUrls ?? DEFAULTS.maxUrls;
    this.#now = options.now ?? Date.now;
  }

  async dispatch(
    message: InboundMessage,
    intent: Intent,
    context: Readonly<ConversationContext>,
  ): Promise<OutboundMessage> {
    let reply: Reply;
    try {
      reply = await this.#reply(message, intent, context, new DeadlineBudget(this.#llmTimeoutMs));
    } catch (err) {
      console.error(`[ResponseDispatcher] ${intent.kind} failed for ${message.conversationId}:`, reason(err));
      void logThought(`[ResponseDispatcher] ${intent.kind} failed for ${message.conversationId}: ${reason(err)}`);
      reply = { text: ERROR_FALLBACK };
    }

    this.#recordIntent(intent);
    if (intent.kind !== 'reset') {
      await this.#remember(message, reply.text);
    }

    return {
      conversationId: message.conversationId,
      platform: message.platform,
      chatId: message.chatId,
      text: reply.text,
      formatHints: reply.formatHints ?? {},
      inReplyTo: message.messageId,
      attachments: reply.attachments ?? [],
    };
  }

  async #reply(
    message: InboundMessage,
    intent: Intent,
    context: Readonly<ConversationContext>,
    budget: DeadlineBudget,
  ): Promise<Reply> {
    switch (intent.kind) {
      case 'rejected':
        return { text: REJECTED_REPLY };
      case 'reset':
        return this.#reset(message);
      case 'summary':
        return this.#summary(message);
      case 'help':
        return { text: renderHelp(this.#botName, this.#helpPrefix, intent.topic), formatHints: { markdown: true } };
      case 'stats':
        return this.#statsReply();
      case 'price':
        return this.#price(intent.symbol, intent.quoteCurrency);
      case 'fx':
        return this.#fx(intent.base, intent.quote, intent.amount);
      case 'stock':
        return this.#stock(intent.symbol);
      case 'clock':
        return this.#clockReply(intent.locations);
      case 'meme':
        return this.#memeReply(intent.topic, budget);
      case 'search':
        return this.#searchReply(message, intent.query, context, budget);
      case 'url-analysis':
        return this.#urlAnalysis(message, intent.urls, intent.instruction, context, budget);
      case 'chat':
        return this.#chat(message, intent.novelTopic, context, budget);
    }
  }

  async #reset(message: InboundMessage): Promise<Reply> {
    try {
      await this.#contextOp('reset', () => this.#store.reset(message.conversationId));
    } catch (err) {
      void logThought(`[ResponseDispatcher] Reset failed for ${message.conversationId}: ${reason(err)}`);
      return { text: ERROR_FALLBACK };
    }
    return { text: `✨ ${displayName(this.#botName)}'s context cleared! Fresh start! 🧹` };
  }

  async #summary(message: InboundMessage): Promise<Reply> {
    try {
      const summary = await this.#contextOp('summarize', () => this.#store.summarize(message.conversationId));
      return { text: renderSummary(summary, this.#now()), formatHints: { markdown: true } };
    } catch (err) {
      void logThought(`[ResponseDispatcher] Summary failed for ${message.conversationId}: ${reason(err)}`);
      return { text: ERROR_FALLBACK };
    }
  }

  #statsReply(): Reply {
    if (!this.#stats) return { text: "📊 Stats aren't being tracked right now." };
    return { text: renderStats(this.#stats.snapshot()), formatHints: { markdown: true } };
  }

  async #price(symbol: string, quoteCurrency: string): Promise<Reply> {
    try {
      const lookup = await this.#quotes.price(symbol, quoteCurrency);
      const rendered = renderPriceReply(symbol, quoteCurrency, lookup.quote, this.#tables);
      return {
        text: lookup.stale ? `${rendered.text}\n_(cached, live data unavailable)_` : rendered.text,
        formatHints: { markdown: true, trend: rendered.trend },
      };
    } catch (err) {
      if (!(err instanceof UpstreamUnavailableError)) throw err;
      void logThought(`[ResponseDispatcher] Price lookup for ${symbol}/${quoteCurrency} failed: ${err.message}`);
      return { text: `❌ Couldn't fetch the ${symbol} price right now. Try again in a bit!` };
    }
  }

  async #fx(base: string, quote: string, amount: number): Promise<Reply> {
    try {
      const lookup = await this.#quotes.rate(base, quote);
      const text = renderFxReply(base, quote, amount, lookup.rate, this.#tables);
      return {
        text: lookup.stale ? `${text}\n_(cached, live data unavailable)_` : text,
        formatHints: { markdown: true },
      };
    } catch (err) {
      if (!(err instanceof UpstreamUnavailableError)) throw err;
      void logThought(`[ResponseDispatcher] FX lookup for ${base}/${quote} failed: ${err.message}`);
      return { text: `❌ Couldn't fetch the ${base}/${quote} exchange rate right now. Try again in a bit!` };
    }
  }

  async #stock(symbol: string): Promise<Reply> {
    try {
      const lookup = await this.#quotes.stock(symbol);
      const rendered = renderStockReply(lookup.quote, this.#tables);
      return {
        text: lookup.stale ? `${rendered.text}\n_(cached, live data unavailable)_` : rendered.text,
        formatHints: { markdown: true, trend: rendered.trend },
      };
    } catch (err) {
      if (!(err instanceof UpstreamUnavailableError)) throw err;
      void logThought(`[ResponseDispatcher] Stock lookup for ${symbol} failed: ${err.message}`);
      return { text: `❌ Couldn't find stock data for '${symbol}'. Check the ticker and try again.` };
    }
  }

  #clockReply(locations: string[]): Reply {
    const at = this.#now();
    if (locations.length === 0) {
      const utc = renderClock([this.#clock.read('UTC', 'Current UTC Time', at)], []);
      return {
        text: `${utc}\n\n💡 Try ${this.#helpPrefix}time <city or country>, e.g. ${this.#helpPrefix}time tokyo`,
        formatHints: { markdown: true },
      };
    }

    const readings: ClockReading[] = [];
    const misses: ClockMiss[] = [];
    for (const location of locations) {
      const lookup = this.#clock.lookup(location, at);
      if (lookup.ok) readings.push(lookup.reading);
      else misses.push({ location: lookup.location, suggestions: lookup.suggestions });
    }
    return { text: renderClock(readings, misses), formatHints: { markdown: true } };
  }

  async #memeReply(topic: string, budget: DeadlineBudget): Promise<Reply> {
    const meme = this.#meme;
    if (!meme) return { text: "🎨 Meme generation isn't set up here." };

    let caption: string;
    try {
      caption = await this.#generate('meme-caption', buildMemeCaptionMessages(topic), budget);
    } catch (err) {
      return { text: this.#fallbackFor('meme-caption', err) };
    }

    try {
      const imageUrl = await budget.run('meme:render', this.#searchTimeoutMs, (signal) =>
        meme.render(topic, caption, signal),
      );
      return { text: `🎨 ${topic}`, attachments: [imageUrl], formatHints: { reaction: '😂' } };
    } catch (err) {
      void logThought(`[ResponseDispatcher] Meme render for "${topic}" failed: ${reason(err)}`);
      return { text: "❌ Couldn't make that meme right now. Try again later!" };
    }
  }

  async #searchReply(
    message: InboundMessage,
    query: string,
    context: Readonly<ConversationContext>,
    budget: DeadlineBudget,
  ): Promise<Reply> {
    const search = this.#search;
    if (!search || !this.#searchEnabled) return { text: "🔍 Web search isn't enabled here." };

    let results: string;
    try {
      results = await budget.run('search', this.#searchTimeoutMs, (signal) => search.fetchAndSummarize(query, signal));
    } catch (err) {
      void logThought(`[ResponseDispatcher] Search for "${query}" failed: ${reason(err)}`);
      return { text: `❌ Couldn't search for "${query}" right now.` };
    }

    try {
      const answer = await this.#generate(
        'search',
        buildChatMessages(this.#personality, context, message, {
          reference: { label: `Web results for "${query}"`, content: results },
          instruction: `Answer using the web results: ${query}`,
        }),
        budget,
      );
      return { text: this.#clean(answer), formatHints: { markdown: true } };
    } catch (err) {
      void logThought(`[ResponseDispatcher] LLM failed after search, sending raw results: ${reason(err)}`);
      return { text: this.#clean(`🔍 Results for "${query}":\n\n${results.slice(0, 1500)}`) };
    }
  }

  async #urlAnalysis(
    message: InboundMessage,
    urls: string[],
    instruction: string,
    context: Readonly<ConversationContext>,
    budget: DeadlineBudget,
  ): Promise<Reply> {
    const search = this.#search;
    if (!search) return { text: "🔗 I can't read links here." };

    const targets = urls.slice(0, this.#maxUrls);
    const pages = await Promise.allSettled(
      targets.map((url) =>
        budget.run(`read:${url}`, this.#searchTimeoutMs, (signal) => search.fetchAndSummarize(url, signal)),
      ),
    );

    const readable: string[] = [];
    pages.forEach((page, index) => {
      const url = targets[index] ?? '';
      if (page.status === 'fulfilled') {
        readable.push(`[${url}]\n${page.value}`);
      } else {
        void logThought(`[ResponseDispatcher] Could not read ${url}: ${reason(page.reason)}`);
      }
    });
    if (readable.length === 0) {
      return { text: `❌ Couldn't read ${targets.length === 1 ? 'that link' : 'those links'} right now.` };
    }

    try {
      const answer = await this.#generate(
        'url-analysis',
        buildChatMessages(this.#personality, context, message, {
          reference: { label: 'Linked page content', content: readable.join('\n\n') },
          instruction: instruction || 'Summarize the linked page(s) in a few sentences.',
        }),
        budget,
      );
      return { text: this.#clean(answer), formatHints: { markdown: true } };
    } catch (err) {
      return { text: this.#fallbackFor('url-analysis', err) };
    }
  }

  async #chat(
    message: InboundMessage,
    novelTopic: boolean,
    context: Readonly<ConversationContext>,
    budget: DeadlineBudget,
  ): Promise<Reply> {
    let reference: { label: string; content: string } | undefined;
    const search = this.#search;
    if (novelTopic && this.#searchEnabled && search) {
      try {
        const results = await budget.run('chat-search', this.#searchTimeoutMs, (signal) =>
          search.fetchAndSummarize(message.text, signal),
        );
        reference = { label: 'Web results that may help', content: results };
      } catch (err) {
        void logThought(`[ResponseDispatcher] Background search failed, answering without it: ${reason(err)}`);
      }
    }

    try {
      const answer = await this.#generate(
        'chat',
        buildChatMessages(this.#personality, context, message, { reference }),
        budget,
      );
      return { text: this.#clean(answer), formatHints: { markdown: true } };
    } catch (err) {
      return { text: this.#fallbackFor('chat', err) };
    }
  }

  #generate(label: string, messages: ChatMessage[], budget: DeadlineBudget): Promise<string> {
    return budget.run(`llm:${label}`, this.#llmTimeoutMs, (signal) =>
      this.#llm.generate({ messages }, { timeoutMs: budget.remainingMs(), signal }),
    );
  }

  #contextOp<T>(label: string, op: () => Promise<T>): Promise<T> {
    return withDeadline(`context:${label}`, this.#operationTimeoutMs, op);
  }

  #fallbackFor(label: string, err: unknown): string {
    void logThought(`[ResponseDispatcher] LLM ${label} failed via ${this.#llm.name}: ${reason(err)}`);
    return err instanceof DeadlineExceededError ? TIMEOUT_FALLBACK : ERROR_FALLBACK;
  }

  #clean(text: string): string {
    return scrubFilteredWords(text, this.#filteredWords);
  }

  #recordIntent(intent: Intent): void {
    try {
      this.#stats?.recordIntent(intent.kind);
    } catch (err) {
      void logThought(`[ResponseDispatcher] Stats update failed: ${reason(err)}`);
    }
  }

  /** User turn, then reply. A store failure is logged and the reply still goes out. */
  async #remember(message: InboundMessage, replyText: string): Promise<void> {
    try {
      await this.#contextOp('append', () =>
        this.#store.append(message.conversationId, {
          role: 'user',
          senderId: message.senderId,
          senderName: message.senderName,
          text: message.text,
          timestamp: message.receivedAt,
        }),
      );
      await this.#contextOp('append', () =>
        this.#store.append(message.conversationId, {
          role: 'assistant',
          senderId: this.#botName,
          senderName: displayName(this.#botName),
          text: replyText,
          timestamp: this.#now(),
        }),
      );
    } catch (err) {
      void logThought(`[ResponseDispatcher] Could not record turns for ${message.conversationId}: ${reason(err)}`);
    }
  }
}
