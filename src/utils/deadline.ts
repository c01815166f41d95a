import { DeadlineExceededError } from '../types/errors.js';

/**
 * Run `task` under a deadline. On expiry the task's signal is aborted and the
 * returned promise rejects with DeadlineExceededError; whatever the task
 * resolves to afterwards is discarded.
 */
export function withDeadline<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(label, timeoutMs));
    }, timeoutMs);
  });

  const run = async (): Promise<T> => {
    try {
      // A task that throws synchronously still rejects through the race below.
      return await Promise.race([task(controller.signal), expiry]);
    } finally {
      clearTimeout(timer);
    }
  };
  return run();
}

/**
 * One wall-clock allowance shared by consecutive calls, so a chain such as
 * search-then-model never outlives the allowance as a whole. Each call gets
 * its own cap or whatever is left, whichever is smaller.
 */
export class DeadlineBudget {
  readonly #endsAt: number;
  readonly #totalMs: number;
  readonly #clock: () => number;

  constructor(totalMs: number, clock: () => number = Date.now) {
    this.#clock = clock;
    this.#totalMs = totalMs;
    this.#endsAt = clock() + totalMs;
  }

  remainingMs(): number {
    return Math.max(0, this.#endsAt - this.#clock());
  }

  run<T>(label: string, capMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const allowed = Math.min(capMs, this.remainingMs());
    if (allowed <= 0) {
      return Promise.reject(new DeadlineExceededError(label, this.#totalMs));
    }
    return withDeadline(label, allowed, task);
  }
}
