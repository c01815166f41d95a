/**
 * Per-key promise chain. Tasks sharing a key run one after another in call
 * order; tasks on different keys never wait for each other.
 */
export class KeyedMutex {
  readonly #tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    // The tail only orders the next task; `run` still carries the error.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.#tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  /** Keys with a task running or waiting. */
  get activeKeys(): number {
    return this.#tails.size;
  }
}
