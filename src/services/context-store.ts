import { StoreUnavailableError } from '../types/errors.js';
import type {
  ContextBackend,
  ContextSummary,
  ConversationContext,
  ConversationTurn,
  TopicScore,
} from '../types/context.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logThought } from '../utils/logger.js';
import { extractKeywords } from './keywords.js';

export interface ContextStoreOptions {
  backend?: ContextBackend;
  /** Turns kept per conversation. @default 20 */
  historyLimit?: number;
  /** Factor applied to every topic score on each user turn. @default 0.95 */
  topicDecay?: number;
  /** Topics returned by `summarize`. @default 5 */
  topTopics?: number;
  /** Contexts idle this long are treated as absent. @default 86400000 */
  idleTtlMs?: number;
  now?: () => number;
  keywordExtractor?: (text: string) => string[];
}

const DEFAULTS = {
  historyLimit: 20,
  topicDecay: 0.95,
  topTopics: 5,
  idleTtlMs: 86_400_000,
};

/** Scores below this are forgotten. */
export const MIN_TOPIC_SCORE = 0.05;
export const MAX_TRACKED_TOPICS = 64;

/** Default backend: contexts live in process memory and are copied in and out. */
export class InMemoryContextBackend implements ContextBackend {
  readonly #contexts: Map<string, ConversationContext> = new Map();

  async get(conversationId: string): Promise<ConversationContext | undefined> {
    const context = this.#contexts.get(conversationId);
    return context ? structuredClone(context) : undefined;
  }

  async set(context: ConversationContext): Promise<void> {
    this.#contexts.set(context.conversationId, structuredClone(context));
  }

  async delete(conversationId: string): Promise<void> {
    this.#contexts.delete(conversationId);
  }

  async keys(): Promise<string[]> {
    return [...this.#contexts.keys()];
  }
}

export function createEmptyContext(conversationId: string, now: number): ConversationContext {
  return {
    conversationId,
    history: [],
    topics: {},
    participants: {},
    messageCount: 0,
    lastResetAt: null,
    createdAt: now,
    lastActivityAt: now,
  };
}

/**
 * Per-room memory: a bounded turn window, decaying topic scores and the list
 * of people who spoke. Operations on one conversation run one at a time;
 * different conversations never wait for each other.
 */
export class ContextStore {
  readonly #backend: ContextBackend;
  readonly #mutex = new KeyedMutex();
  readonly #historyLimit: number;
  readonly #topicDecay: number;
  readonly #topTopics: number;
  readonly #idleTtlMs: number;
  readonly #now: () => number;
  readonly #extract: (text: string) => string[];

  constructor(options: ContextStoreOptions = {}) {
    this.#backend = options.backend ?? new InMemoryContextBackend();
    this.#historyLimit = Math.max(1, options.historyLimit ?? DEFAULTS.historyLimit);
    this.#topicDecay = options.topicDecay ?? DEFAULTS.topicDecay;
    this.#topTopics = options.topTopics ?? DEFAULTS.topTopics;
    this.#idleTtlMs = options.idleTtlMs ?? DEFAULTS.idleTtlMs;
    this.#now = options.now ?? Date.now;
    this.#extract = options.keywordExtractor ?? ((text) => extractKeywords(text));
  }

  get historyLimit(): number {
    return this.#historyLimit;
  }

  /**
   * Add a turn. The oldest turn falls out past the history limit. User turns
   * also decay every topic score and then add 1 per extracted keyword.
   */
  async append(conversationId: string, turn: ConversationTurn): Promise<void> {
    await this.#mutex.runExclusive(conversationId, async () => {
      const now = this.#now();
      const context = (await this.#load(conversationId, 'append')) ?? createEmptyContext(conversationId, now);

      context.history.push({ ...turn });
      if (context.history.length > this.#historyLimit) {
        context.history.splice(0, context.history.length - this.#historyLimit);
      }

      if (turn.role === 'user') {
        this.#updateTopics(context, this.#extract(turn.text));
        context.participants[turn.senderId] = { name: turn.senderName, lastSeenAt: turn.timestamp };
      }

      context.messageCount += 1;
      context.lastActivityAt = now;
      await this.#save(context, 'append');
    });
  }

  /** Forget everything about the room except that it was reset. Missing contexts stay missing. */
  async reset(conversationId: string): Promise<void> {
    await this.#mutex.runExclusive(conversationId, async () => {
      const context = await this.#load(conversationId, 'reset');
      if (!context) return;

      const now = this.#now();
      context.history = [];
      context.topics = {};
      context.participants = {};
      context.messageCount = 0;
      context.lastResetAt = now;
      context.lastActivityAt = now;
      await this.#save(context, 'reset');
    });
  }

  async summarize(conversationId: string): Promise<ContextSummary> {
    return this.#mutex.runExclusive(conversationId, async () => {
      const context =
        (await this.#load(conversationId, 'summarize')) ?? createEmptyContext(conversationId, this.#now());
      return summarizeContext(context, this.#topTopics);
    });
  }

  /** Independent copy of the room's context; an empty one when none exists. */
  async snapshot(conversationId: string): Promise<Readonly<ConversationContext>> {
    return this.#mutex.runExclusive(conversationId, async () => {
      const context = await this.#load(conversationId, 'snapshot');
      return context ? structuredClone(context) : createEmptyContext(conversationId, this.#now());
    });
  }

  /** Delete contexts idle past the TTL. Returns the number removed. */
  async sweepIdle(): Promise<number> {
    let ids: string[];
    try {
      ids = await this.#backend.keys();
    } catch (err) {
      throw new StoreUnavailableError('sweep', err);
    }

    let removed = 0;
    for (const id of ids) {
      const deleted = await this.#mutex.runExclusive(id, async () => {
        const context = await this.#read(id, 'sweep');
        if (!context || !this.#isIdle(context)) return false;
        await this.#remove(id, 'sweep');
        return true;
      });
      if (deleted) removed++;
    }

    if (removed > 0) {
      void logThought(`[ContextStore] Swept ${removed} idle conversation(s).`);
    }
    return removed;
  }

  #updateTopics(context: ConversationContext, keywords: string[]): void {
    // Keywords such as `constructor` collide with Object.prototype on a plain record.
    const topics = new Map<string, number>();
    for (const [topic, score] of Object.entries(context.topics)) {
      topics.set(topic, score * this.#topicDecay);
    }
    for (const keyword of keywords) {
      topics.set(keyword, (topics.get(keyword) ?? 0) + 1);
    }

    const kept = [...topics]
      .filter(([, score]) => score >= MIN_TOPIC_SCORE)
      .sort(([a, scoreA], [b, scoreB]) => scoreB - scoreA || a.localeCompare(b))
      .slice(0, MAX_TRACKED_TOPICS);
    context.topics = Object.fromEntries(kept);
  }

  #isIdle(context: ConversationContext): boolean {
    return this.#now() - context.lastActivityAt >= this.#idleTtlMs;
  }

  async #read(conversationId: string, operation: string): Promise<ConversationContext | undefined> {
    try {
      return await this.#backend.get(conversationId);
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }

  /** Read through lazy expiry: an idle context is deleted and reported absent. */
  async #load(conversationId: string, operation: string): Promise<ConversationContext | undefined> {
    const context = await this.#read(conversationId, operation);
    if (context && this.#isIdle(context)) {
      await this.#remove(conversationId, operation);
      return undefined;
    }
    return context;
  }

  async #save(context: ConversationContext, operation: string): Promise<void> {
    try {
      await this.#backend.set(context);
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }

  async #remove(conversationId: string, operation: string): Promise<void> {
    try {
      await this.#backend.delete(conversationId);
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}

export function topTopics(context: Pick<ConversationContext, 'topics'>, limit: number): TopicScore[] {
  return Object.entries(context.topics)
    .map(([topic, score]) => ({ topic, score }))
    .sort((a, b) => b.score - a.score || a.topic.localeCompare(b.topic))
    .slice(0, limit);
}

export function summarizeContext(context: ConversationContext, topicLimit: number): ContextSummary {
  const participants = Object.values(context.participants)
    .sort((a, b) => b.lastSeenAt - a.lastSeenAt || a.name.localeCompare(b.name))
    .map((participant) => participant.name);

  return {
    conversationId: context.conversationId,
    topTopics: topTopics(context, topicLimit),
    participants,
    messageCount: context.messageCount,
    oldestAt: context.history[0]?.timestamp ?? null,
    newestAt: context.history[context.history.length - 1]?.timestamp ?? null,
    lastResetAt: context.lastResetAt,
  };
}
