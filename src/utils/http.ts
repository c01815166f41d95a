import { UpstreamUnavailableError } from '../types/errors.js';
import { scrubSensitiveText } from './logger.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Numbers arrive as JSON numbers from some providers and as strings from others. */
export function toFiniteNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/** Thrown for non-2xx answers so callers can tell rate limits from outages. */
export class HttpStatusError extends Error {
    readonly status: number;

    constructor(status: number, body: string) {
        super(`HTTP ${status}: ${body.slice(0, 200)}`);
        this.name = 'HttpStatusError';
        this.status = status;
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | URLSearchParams;
    signal?: AbortSignal;
}

/**
 * `fetch` that throws HttpStatusError on a non-2xx status and returns the
 * response body as text. Error bodies are scrubbed before they can reach a log.
 */
export async function fetchText(url: string, init: HttpRequestOptions = {}): Promise<string> {
    const response = await fetch(url, init);
    const body = await response.text();
    if (!response.ok) {
        throw new HttpStatusError(response.status, scrubSensitiveText(body));
    }
    return body;
}

export async function fetchJson(url: string, init: HttpRequestOptions = {}): Promise<unknown> {
    const body = await fetchText(url, { ...init, headers: { Accept: 'application/json', ...init.headers } });
    try {
        return JSON.parse(body);
    } catch {
        throw new Error(`Invalid JSON from ${new URL(url).host}`);
    }
}

/** Rate limits and server errors are worth trying elsewhere; client errors are not. */
export function isTransientHttpError(err: unknown): boolean {
    if (err instanceof HttpStatusError) return err.status === 429 || err.status >= 500;
    return err instanceof UpstreamUnavailableError || err instanceof TypeError;
}
