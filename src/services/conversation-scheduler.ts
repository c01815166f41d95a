import { QueueOverflowError } from '../types/errors.js';
import type { InboundMessage } from '../types/messaging.js';
import { logDrop, logThought } from '../utils/logger.js';

export type MessageHandler = (message: InboundMessage) => Promise<void>;
export type EnqueueOutcome = 'accepted' | 'dropped';

export interface ConversationSchedulerOptions {
    /** Pending messages per conversation; the one being processed is not counted. @default 5 */
    maxQueueSize?: number;
    /** Conversations processed at the same time. @default 4 */
    maxConcurrentWorkers?: number;
    /** Called for every message refused at capacity or after `stop()`. */
    onDrop?: (error: QueueOverflowError, message: InboundMessage) => void;
}

const DEFAULTS = {
    maxQueueSize: 5,
    maxConcurrentWorkers: 4,
};

/**
 * Per-conversation FIFO queues drained by at most one worker per
 * conversation, with a global cap on workers.
 *
 * Hand-off to workers happens on a microtask, so a burst enqueued in one tick
 * sees the whole capacity before anything is dequeued. Conversations waiting
 * for a free slot are served round-robin.
 */
export class ConversationScheduler {
    readonly #handler: MessageHandler;
    readonly #maxQueueSize: number;
    readonly #maxConcurrentWorkers: number;
    readonly #onDrop?: (error: QueueOverflowError, message: InboundMessage) => void;

    readonly #queues: Map<string, InboundMessage[]> = new Map();
    readonly #active: Set<string> = new Set();
    /** Conversations with pending messages and no worker, in hand-off order. */
    #ready: string[] = [];
    #dispatchScheduled = false;
    #stopped = false;
    #idleWaiters: Array<() => void> = [];

    constructor(handler: MessageHandler, options: ConversationSchedulerOptions = {}) {
        this.#handler = handler;
        this.#maxQueueSize = Math.max(1, options.maxQueueSize ?? DEFAULTS.maxQueueSize);
        this.#maxConcurrentWorkers = Math.max(1, options.maxConcurrentWorkers ?? DEFAULTS.maxConcurrentWorkers);
        this.#onDrop = options.onDrop;
    }

    /** Queue a message behind its conversation's earlier messages, or drop it when full. */
    enqueue(conversationId: string, message: InboundMessage): EnqueueOutcome {
        const queue = this.#queues.get(conversationId) ?? [];
        if (this.#stopped || queue.length >= this.#maxQueueSize) {
            this.#drop(conversationId, message);
            return 'dropped';
        }

        queue.push(message);
        this.#queues.set(conversationId, queue);
        if (!this.#active.has(conversationId) && !this.#ready.includes(conversationId)) {
            this.#ready.push(conversationId);
        }
        this.#scheduleDispatch();
        return 'accepted';
    }

    queueLength(conversationId: string): number {
        return this.#queues.get(conversationId)?.length ?? 0;
    }

    get activeCount(): number {
        return this.#active.size;
    }

    get pendingCount(): number {
        let total = 0;
        for (const queue of this.#queues.values()) total += queue.length;
        return total;
    }

    /** Resolves once no message is queued or being processed. */
    onIdle(): Promise<void> {
        if (this.#isIdle()) return Promise.resolve();
        return new Promise((resolve) => {
            this.#idleWaiters.push(resolve);
        });
    }

    /**
     * Refuse new messages, drop everything still pending and wait for the
     * running workers to finish.
     */
    async stop(): Promise<void> {
        this.#stopped = true;
        let discarded = 0;
        for (const queue of this.#queues.values()) discarded += queue.length;
        this.#queues.clear();
        this.#ready = [];
        if (discarded > 0) {
            void logThought(`[ConversationScheduler] Stopped with ${discarded} pending message(s) discarded.`);
        }
        this.#notifyIdle();
        await this.onIdle();
    }

    #drop(conversationId: string, message: InboundMessage): void {
        const error = new QueueOverflowError(conversationId, this.#stopped ? 0 : this.#maxQueueSize);
        void logDrop(conversationId, this.#stopped ? 'scheduler stopped' : error.message);
        this.#onDrop?.(error, message);
    }

    #scheduleDispatch(): void {
        if (this.#dispatchScheduled) return;
        this.#dispatchScheduled = true;
        queueMicrotask(() => {
            this.#dispatchScheduled = false;
            this.#dispatch();
        });
    }

    #dispatch(): void {
        while (!this.#stopped && this.#active.size < this.#maxConcurrentWorkers) {
            const conversationId = this.#ready.shift();
            if (conversationId === undefined) break;

            const queue = this.#queues.get(conversationId);
            const next = queue?.shift();
            if (!queue || !next) {
                this.#queues.delete(conversationId);
                continue;
            }
            if (queue.length === 0) this.#queues.delete(conversationId);

            this.#active.add(conversationId);
            void this.#run(conversationId, next);
        }
        this.#notifyIdle();
    }

    async #run(conversationId: string, message: InboundMessage): Promise<void> {
        try {
            await this.#handler(message);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            console.error(`[ConversationScheduler] Handler failed for ${conversationId}:`, reason);
            void logThought(`[ConversationScheduler] Handler failed for ${conversationId}: ${reason}`);
        } finally {
            this.#active.delete(conversationId);
            // Back of the line, so other rooms waiting for a slot get a turn.
            if (this.queueLength(conversationId) > 0) this.#ready.push(conversationId);
            this.#dispatch();
        }
    }

    #isIdle(): boolean {
        return this.#active.size === 0 && this.pendingCount === 0;
    }

    #notifyIdle(): void {
        if (!this.#isIdle()) return;
        const waiters = this.#idleWaiters;
        this.#idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}
