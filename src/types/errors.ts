export type ErrorKind =
  | 'MalformedEvent'
  | 'StoreUnavailable'
  | 'UpstreamUnavailable'
  | 'QueueOverflow';

/** Base class for every failure the pipeline classifies. */
export class AssistantError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistantError';
    this.kind = kind;
  }
}

export class MalformedEventError extends AssistantError {
  readonly field: string;

  constructor(field: string, detail: string) {
    super('MalformedEvent', `Malformed platform event: ${field} ${detail}.`);
    this.name = 'MalformedEventError';
    this.field = field;
  }
}

export class StoreUnavailableError extends AssistantError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super('StoreUnavailable', `Context store unavailable during ${operation}: ${detail}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export class UpstreamUnavailableError extends AssistantError {
  readonly upstream: string;

  constructor(upstream: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'no data');
    super('UpstreamUnavailable', `${upstream} unavailable: ${detail}`, { cause });
    this.name = 'UpstreamUnavailableError';
    this.upstream = upstream;
  }
}

/** A downstream call outlived its deadline; its late result is discarded. */
export class DeadlineExceededError extends UpstreamUnavailableError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(label, new Error(`timed out after ${timeoutMs}ms`));
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export class QueueOverflowError extends AssistantError {
  readonly conversationId: string;

  constructor(conversationId: string, capacity: number) {
    super('QueueOverflow', `Queue for ${conversationId} is full (${capacity}); message dropped.`);
    this.name = 'QueueOverflowError';
    this.conversationId = conversationId;
  }
}
