import type { GatewayHandler } from '../core/gateway.js';
import type { ContextStore } from '../services/context-store.js';
import { ConversationScheduler, type EnqueueOutcome } from '../services/conversation-scheduler.js';
import type { Normalizer } from '../services/normalizer.js';
import type { ReactionPicker } from '../services/reactions.js';
import type { StatsTracker } from '../services/stats-tracker.js';
import { MalformedEventError } from '../types/errors.js';
import type {
  DeliveryStep,
  InboundMessage,
  MessagingAdapter,
  OutboundMessage,
  Platform,
  PlatformEvent,
} from '../types/messaging.js';
import { withDeadline } from '../utils/deadline.js';
import { HttpStatusError } from '../utils/http.js';
import { logDrop, logThought } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

export interface InterfaceDispatcherDeps {
  normalizer: Normalizer;
  gateway: GatewayHandler;
  contextStore: ContextStore;
  stats?: StatsTracker;
  /** Emoji reactions to trigger words, on platforms whose adapter can react. */
  reactions?: ReactionPicker;
}

export interface InterfaceDispatcherOptions {
  maxQueueSize?: number;
  maxConcurrentWorkers?: number;
  /** Deadline for the passive context append. @default 2000 */
  operationTimeoutMs?: number;
  /** Send attempts per outbound message. @default 3 */
  deliveryMaxAttempts?: number;
  /** @default 1000 */
  deliveryBaseDelayMs?: number;
}

export type EventOutcome = 'ignored' | 'malformed' | 'observed' | EnqueueOutcome;

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status carried by a platform client error, if it has one. */
function statusOf(err: unknown): number | undefined {
  if (err instanceof HttpStatusError) return err.status;
  if (typeof err !== 'object' || err === null) return undefined;
  // discord.js DiscordAPIError
  if ('status' in err && typeof err.status === 'number') return err.status;
  // node-telegram-bot-api TelegramError
  if ('response' in err && typeof err.response === 'object' && err.response !== null) {
    const response = err.response;
    if ('statusCode' in response && typeof response.statusCode === 'number') return response.statusCode;
  }
  return undefined;
}

/** Network errors, rate limits and server errors heal; other client errors do not. */
export function isRetryableDelivery(err: unknown): boolean {
  const status = statusOf(err);
  return status === undefined || status === 429 || status >= 500;
}

class DeliveryFailedError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = 'DeliveryFailedError';
    this.attempts = attempts;
  }
}

/**
 * Connects platform adapters to the pipeline.
 *
 * Each adapter event is normalized. Messages that do not address the bot only
 * feed the room's context; triggered ones are queued per conversation and
 * answered through the gateway. Replies go back through the adapter that
 * owns the platform, with bounded retry.
 */
export class InterfaceDispatcher {
  readonly #adapters: Map<Platform, MessagingAdapter> = new Map();
  readonly #normalizer: Normalizer;
  readonly #gateway: GatewayHandler;
  readonly #store: ContextStore;
  readonly #stats?: StatsTracker;
  readonly #reactions?: ReactionPicker;
  readonly #scheduler: ConversationScheduler;
  readonly #operationTimeoutMs: number;
  readonly #deliveryMaxAttempts: number;
  readonly #deliveryBaseDelayMs: number;

  constructor(adapters: MessagingAdapter[], deps: InterfaceDispatcherDeps, options: InterfaceDispatcherOptions = {}) {
    this.#normalizer = deps.normalizer;
    this.#gateway = deps.gateway;
    this.#store = deps.contextStore;
    this.#stats = deps.stats;
    this.#reactions = deps.reactions;
    this.#operationTimeoutMs = options.operationTimeoutMs ?? 2_000;
    this.#deliveryMaxAttempts = options.deliveryMaxAttempts ?? 3;
    this.#deliveryBaseDelayMs = options.deliveryBaseDelayMs ?? 1_000;

    this.#scheduler = new ConversationScheduler((message) => this.#process(message), {
      maxQueueSize: options.maxQueueSize,
      maxConcurrentWorkers: options.maxConcurrentWorkers,
      onDrop: () => this.#stats?.recordDropped(),
    });

    for (const adapter of adapters) {
      for (const platform of adapter.platforms) {
        this.#adapters.set(platform, adapter);
      }
      adapter.onEvent = async (event) => {
        await this.handleEvent(event);
      };
    }
  }

  get scheduler(): ConversationScheduler {
    return this.#scheduler;
  }

  async start(): Promise<void> {
    for (const adapter of new Set(this.#adapters.values())) {
      await adapter.start();
    }
  }

  /** Stop taking messages, let running workers finish, then stop the adapters. */
  async shutdown(): Promise<void> {
    await this.#scheduler.stop();
    for (const adapter of new Set(this.#adapters.values())) {
      try {
        await adapter.stop();
      } catch (err) {
        console.warn('[Dispatcher] Adapter failed to stop cleanly:', reason(err));
      }
    }
  }

  /** Entry point for adapters; never throws. */
  async handleEvent(event: PlatformEvent): Promise<EventOutcome> {
    let message: InboundMessage;
    try {
      const result = this.#normalizer.normalize(event);
      if (result.status === 'ignored') {
        if (result.reason === 'known-bot') {
          void logDrop(`${event.platform}:${String(event.chatId)}`, 'sender is a known bot');
        }
        return 'ignored';
      }
      message = result.message;
    } catch (err) {
      if (err instanceof MalformedEventError) {
        void logDrop(`${event.platform}:${String(event.chatId)}`, err.message);
        return 'malformed';
      }
      console.error('[Dispatcher] Unexpected error normalizing event:', reason(err));
      void logThought(`[Dispatcher] Unexpected error normalizing event: ${reason(err)}`);
      return 'malformed';
    }

    this.#record(() => this.#stats?.recordReceived(message.conversationId));
    await this.#maybeReact(message);

    if (!message.triggered) {
      await this.#observe(message);
      return 'observed';
    }
    return this.#scheduler.enqueue(message.conversationId, message);
  }

  /** Room chatter: remembered for context, never queued or answered. */
  async #observe(message: InboundMessage): Promise<void> {
    if (message.rejected) {
      void logDrop(message.conversationId, 'filtered content in passive message');
      return;
    }
    try {
      await withDeadline('context:observe', this.#operationTimeoutMs, () =>
        this.#store.append(message.conversationId, {
          role: 'user',
          senderId: message.senderId,
          senderName: message.senderName,
          text: message.text,
          timestamp: message.receivedAt,
        }),
      );
    } catch (err) {
      void logThought(`[Dispatcher] Passive append failed for ${message.conversationId}: ${reason(err)}`);
    }
  }

  async #maybeReact(message: InboundMessage): Promise<void> {
    const adapter = this.#adapters.get(message.platform);
    if (!this.#reactions || !adapter?.react || message.rejected) return;

    const emoji = this.#reactions.pick(message.text);
    if (!emoji) return;
    try {
      await adapter.react(
        { platform: message.platform, chatId: message.chatId, messageId: message.messageId },
        emoji,
      );
    } catch (err) {
      void logThought(`[Dispatcher] Reaction ${emoji} on ${message.conversationId} failed: ${reason(err)}`);
    }
  }

  async #process(message: InboundMessage): Promise<void> {
    const outbound = await this.#gateway.processMessage(message);
    await this.#deliver(outbound);
  }

  async #deliver(outbound: OutboundMessage): Promise<void> {
    const adapter = this.#adapters.get(outbound.platform);
    if (!adapter) {
      void logThought(`[Dispatcher] No adapter for ${outbound.platform}; reply to ${outbound.conversationId} lost.`);
      return;
    }

    const attempt: DeliveryStep = async (label, step) => {
      const result = await withRetry(step, {
        maxAttempts: this.#deliveryMaxAttempts,
        baseDelayMs: this.#deliveryBaseDelayMs,
        label: `${outbound.platform}:send ${label}`,
        shouldRetry: isRetryableDelivery,
      });
      if (!result.ok) throw new DeliveryFailedError(result.error, result.attempts);
      return result.value;
    };

    try {
      await adapter.send(outbound, attempt);
    } catch (err) {
      const attempts = err instanceof DeliveryFailedError ? err.attempts : 1;
      console.error(`[Dispatcher] Delivery to ${outbound.conversationId} failed: ${reason(err)}`);
      void logThought(
        `[Dispatcher] Delivery to ${outbound.conversationId} failed after ${attempts} attempt(s): ${reason(err)}`,
      );
      return;
    }
    this.#record(() => this.#stats?.recordSent());
  }

  #record(update: () => void): void {
    try {
      update();
    } catch (err) {
      void logThought(`[Dispatcher] Stats update failed: ${reason(err)}`);
    }
  }
}
