import type { AssistantConfig } from '../config/json-config.js';
import { UpstreamUnavailableError } from '../types/errors.js';
import { fetchJson, isRecord, isTransientHttpError } from '../utils/http.js';
import { logThought } from '../utils/logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerateRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface GenerateOptions {
  /** Upper bound on the request; the HTTP call is aborted once it passes. */
  timeoutMs: number;
  signal?: AbortSignal;
}

/** The caller's signal, if any, combined with a timer for `timeoutMs`. */
export function requestSignal(options: GenerateOptions): AbortSignal {
  const timeout = AbortSignal.timeout(Math.max(1, options.timeoutMs));
  return options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
}

export interface LanguageModel {
  readonly name: string;
  generate(request: GenerateRequest, options: GenerateOptions): Promise<string>;
}

export interface OpenRouterOptions {
  apiKey: string;
  url: string;
  model: string;
  /** Tried once when the primary model is rate limited, failing or unreachable. */
  fallbackModel?: string;
  temperature: number;
  maxTokens: number;
  title?: string;
}

/** OpenAI-compatible chat completions on OpenRouter. */
export class OpenRouterModel implements LanguageModel {
  readonly name = 'openrouter';
  readonly #options: OpenRouterOptions;

  constructor(options: OpenRouterOptions) {
    this.#options = options;
  }

  async generate(request: GenerateRequest, options: GenerateOptions): Promise<string> {
    if (!this.#options.apiKey) {
      throw new UpstreamUnavailableError('openrouter', new Error('API key is not configured'));
    }

    const signal = requestSignal(options);
    try {
      return await this.#complete(this.#options.model, request, signal);
    } catch (primaryErr) {
      const fallback = this.#options.fallbackModel;
      if (!fallback || fallback === this.#options.model || signal.aborted || !isTransientHttpError(primaryErr)) {
        throw new UpstreamUnavailableError('openrouter', primaryErr);
      }
      const reason = primaryErr instanceof Error ? primaryErr.message : String(primaryErr);
      void logThought(`[LLM] ${this.#options.model} failed (${reason}); retrying with ${fallback}.`);
      try {
        return await this.#complete(fallback, request, signal);
      } catch (fallbackErr) {
        throw new UpstreamUnavailableError('openrouter', fallbackErr);
      }
    }
  }

  async #complete(model: string, request: GenerateRequest, signal: AbortSignal): Promise<string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.#options.apiKey}`,
    };
    if (this.#options.title) headers['X-Title'] = this.#options.title;

    const body = await fetchJson(this.#options.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model,
        messages: request.messages,
        temperature: request.temperature ?? this.#options.temperature,
        max_tokens: request.maxTokens ?? this.#options.maxTokens,
      }),
      signal,
    });

    const choices = isRecord(body) ? body.choices : undefined;
    const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== 'string' || content.trim() === '') {
      throw new UpstreamUnavailableError(model, new Error('empty choices payload'));
    }
    return content.trim();
  }
}

export interface OllamaOptions {
  url: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Local models through Ollama's non-streaming generate endpoint. */
export class OllamaModel implements LanguageModel {
  readonly name = 'ollama';
  readonly #options: OllamaOptions;

  constructor(options: OllamaOptions) {
    this.#options = options;
  }

  async generate(request: GenerateRequest, options: GenerateOptions): Promise<string> {
    const system = request.messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const prompt = request.messages
      .filter((message) => message.role !== 'system')
      .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
      .concat('Assistant:')
      .join('\n');

    let body: unknown;
    try {
      body = await fetchJson(`${this.#options.url.replace(/\/+$/, '')}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.#options.model,
          system,
          prompt,
          stream: false,
          options: {
            temperature: request.temperature ?? this.#options.temperature,
            num_predict: request.maxTokens ?? this.#options.maxTokens,
          },
        }),
        signal: requestSignal(options),
      });
    } catch (err) {
      throw new UpstreamUnavailableError('ollama', err);
    }

    const response = isRecord(body) ? body.response : undefined;
    if (typeof response !== 'string' || response.trim() === '') {
      throw new UpstreamUnavailableError('ollama', new Error('empty response'));
    }
    return response.trim();
  }
}

export function createLanguageModel(config: AssistantConfig): LanguageModel {
  const { llm } = config;
  if (llm.provider === 'ollama') {
    return new OllamaModel({
      url: llm.ollamaUrl,
      model: llm.ollamaModel,
      temperature: llm.temperature,
      maxTokens: llm.maxTokens,
    });
  }
  return new OpenRouterModel({
    apiKey: llm.openRouterApiKey,
    url: llm.openRouterUrl,
    model: llm.model,
    fallbackModel: llm.fallbackModel || undefined,
    temperature: llm.temperature,
    maxTokens: llm.maxTokens,
    title: config.bot.name,
  });
}
