import { UpstreamUnavailableError } from '../types/errors.js';
import { fetchText } from '../utils/http.js';

export interface SearchBackend {
  /** Readable text for a URL, or search results for a free-text query. */
  fetchAndSummarize(urlOrQuery: string, signal?: AbortSignal): Promise<string>;
}

export interface JinaSearchOptions {
  apiKey?: string;
  readerUrl?: string;
  searchUrl?: string;
  /** Longer pages are cut here before they reach a prompt. @default 4000 */
  maxChars?: number;
}

const DEFAULTS = {
  readerUrl: 'https://r.jina.ai',
  searchUrl: 'https://s.jina.ai',
  maxChars: 4000,
};

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value) && URL.canParse(value);
}

/** Jina Reader for pages, Jina Search for queries; both return plain text. */
export class JinaSearchBackend implements SearchBackend {
  readonly #apiKey: string;
  readonly #readerUrl: string;
  readonly #searchUrl: string;
  readonly #maxChars: number;

  constructor(options: JinaSearchOptions = {}) {
    this.#apiKey = options.apiKey ?? '';
    this.#readerUrl = options.readerUrl ?? DEFAULTS.readerUrl;
    this.#searchUrl = options.searchUrl ?? DEFAULTS.searchUrl;
    this.#maxChars = options.maxChars ?? DEFAULTS.maxChars;
  }

  async fetchAndSummarize(urlOrQuery: string, signal?: AbortSignal): Promise<string> {
    const target = urlOrQuery.trim();
    const endpoint = isUrl(target)
      ? `${this.#readerUrl}/${target}`
      : `${this.#searchUrl}/${encodeURIComponent(target)}`;

    const headers: Record<string, string> = { Accept: 'text/plain', 'X-Return-Format': 'text' };
    if (this.#apiKey) headers.Authorization = `Bearer ${this.#apiKey}`;

    let text: string;
    try {
      text = await fetchText(endpoint, { headers, signal });
    } catch (err) {
      throw new UpstreamUnavailableError('search', err);
    }

    const trimmed = text.trim();
    if (!trimmed) throw new UpstreamUnavailableError('search', new Error(`nothing found for ${target}`));
    return trimmed.length > this.#maxChars ? `${trimmed.slice(0, this.#maxChars)}…` : trimmed;
  }
}
