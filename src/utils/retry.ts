import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Return false to stop retrying on errors that will not heal. */
    shouldRetry?: (err: unknown) => boolean;
    sleep?: (ms: number) => Promise<void>;
}

/** Result of a retried operation. */
export type RetryResult<T> =
    | { ok: true; value: T; attempts: number; totalDurationMs: number }
    | { ok: false; error: string; attempts: number; totalDurationMs: number };

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 * Used for outbound delivery, one platform call at a time.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => bot.sendMessage(chatId, chunk),
 *   { maxAttempts: 3, label: 'telegram:send chunk 1/2', shouldRetry: isRetryableDelivery },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const sleep = options.sleep ?? defaultSleep;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            if (attempt > 1) {
                void logThought(`[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts}.`);
            }
            return { ok: true, value, attempts: attempt, totalDurationMs: Date.now() - start };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
            if (!retryable || attempt === maxAttempts) {
                void logThought(`[Retry] ${label} gave up after ${attempt} attempt(s). Last error: ${lastError}.`);
                return { ok: false, error: lastError, attempts: attempt, totalDurationMs: Date.now() - start };
            }

            const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
            void logThought(
                `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
            );
            await sleep(delay);
        }
    }

    return { ok: false, error: lastError, attempts: maxAttempts, totalDurationMs: Date.now() - start };
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
