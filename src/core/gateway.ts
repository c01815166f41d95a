import { createEmptyContext, type ContextStore } from '../services/context-store.js';
import type { IntentRouter } from '../services/intent-router.js';
import type { ConversationContext } from '../types/context.js';
import type { InboundMessage, OutboundMessage } from '../types/messaging.js';
import { withDeadline } from '../utils/deadline.js';
import { logThought } from '../utils/logger.js';
import type { ResponseDispatcher } from './response-dispatcher.js';

export interface GatewayHandler {
  processMessage(message: InboundMessage): Promise<OutboundMessage>;
}

export interface GatewayOptions {
  /** Deadline for the context snapshot. @default 2000 */
  operationTimeoutMs?: number;
  now?: () => number;
}

/**
 * What a conversation worker runs for one triggered message: snapshot the
 * room, classify, dispatch. A context store that is down or slow does not
 * block the reply; the message is answered with an empty context instead.
 */
export class Gateway implements GatewayHandler {
  readonly #store: ContextStore;
  readonly #router: IntentRouter;
  readonly #dispatcher: ResponseDispatcher;
  readonly #operationTimeoutMs: number;
  readonly #now: () => number;

  constructor(store: ContextStore, router: IntentRouter, dispatcher: ResponseDispatcher, options: GatewayOptions = {}) {
    this.#store = store;
    this.#router = router;
    this.#dispatcher = dispatcher;
    this.#operationTimeoutMs = options.operationTimeoutMs ?? 2_000;
    this.#now = options.now ?? Date.now;
  }

  async processMessage(message: InboundMessage): Promise<OutboundMessage> {
    const context = await this.#snapshot(message.conversationId);
    const intent = this.#router.classify(message, context);
    void logThought(`[Gateway] ${message.conversationId} #${message.messageId} classified as ${intent.kind}.`);
    return this.#dispatcher.dispatch(message, intent, context);
  }

  async #snapshot(conversationId: string): Promise<Readonly<ConversationContext>> {
    try {
      return await withDeadline('context:snapshot', this.#operationTimeoutMs, () =>
        this.#store.snapshot(conversationId),
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Gateway] Proceeding without context for ${conversationId}: ${reason}`);
      void logThought(`[Gateway] Proceeding without context for ${conversationId}: ${reason}`);
      return createEmptyContext(conversationId, this.#now());
    }
  }
}
