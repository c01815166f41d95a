import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/json-config.js';
import {
  OllamaModel,
  OpenRouterModel,
  createLanguageModel,
  requestSignal,
} from '../../src/services/llm-client.js';
import { UpstreamUnavailableError } from '../../src/types/errors.js';

interface Call {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  signal?: AbortSignal;
}

function stubFetch(...responses: Response[]): Call[] {
  const calls: Call[] = [];
  vi.stubGlobal(
    'fetch',
    vi.fn(async (url: string, init: { headers?: Record<string, string>; body?: string; signal?: AbortSignal } = {}) => {
      calls.push({ url, headers: init.headers ?? {}, body: JSON.parse(init.body ?? '{}'), signal: init.signal });
      return responses.shift() ?? new Response('no more responses', { status: 500 });
    }),
  );
  return calls;
}

const completion = (content: string) => new Response(JSON.stringify({ choices: [{ message: { content } }] }));

const OPENROUTER = {
  apiKey: 'test-key',
  url: 'https://llm.test/v1/chat/completions',
  model: 'primary-model',
  temperature: 0.5,
  maxTokens: 200,
};

const request = { messages: [{ role: 'user' as const, content: 'hi' }] };

describe('OpenRouterModel', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a chat completion and returns the trimmed reply', async () => {
    const calls = stubFetch(completion('  hello there \n'));
    const model = new OpenRouterModel({ ...OPENROUTER, title: 'roomwise' });

    await expect(model.generate(request, { timeoutMs: 1_000 })).resolves.toBe('hello there');

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://llm.test/v1/chat/completions');
    expect(calls[0]?.headers).toMatchObject({ Authorization: 'Bearer test-key', 'X-Title': 'roomwise' });
    expect(calls[0]?.body).toEqual({
      model: 'primary-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.5,
      max_tokens: 200,
    });
  });

  it('retries once on the fallback model when the primary is rate limited', async () => {
    const calls = stubFetch(new Response('slow down', { status: 429 }), completion('from fallback'));
    const model = new OpenRouterModel({ ...OPENROUTER, fallbackModel: 'backup-model' });

    await expect(model.generate(request, { timeoutMs: 1_000 })).resolves.toBe('from fallback');
    expect(calls.map((call) => call.body.model)).toEqual(['primary-model', 'backup-model']);
  });

  it('does not fall back on a client error', async () => {
    const calls = stubFetch(new Response('bad request', { status: 400 }));
    const model = new OpenRouterModel({ ...OPENROUTER, fallbackModel: 'backup-model' });

    await expect(model.generate(request, { timeoutMs: 1_000 })).rejects.toThrow(
      'openrouter unavailable: HTTP 400: bad request',
    );
    expect(calls).toHaveLength(1);
  });

  it('treats an empty completion as unavailable', async () => {
    stubFetch(completion('   '));
    const model = new OpenRouterModel(OPENROUTER);

    await expect(model.generate(request, { timeoutMs: 1_000 })).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('hands the request an abort signal even when the caller passes none', async () => {
    const calls = stubFetch(completion('ok'));
    const model = new OpenRouterModel(OPENROUTER);

    await model.generate(request, { timeoutMs: 1_000 });

    expect(calls[0]?.signal).toBeInstanceOf(AbortSignal);
    expect(calls[0]?.signal?.aborted).toBe(false);
  });

  it('fails without calling out when no API key is set', async () => {
    const calls = stubFetch();
    const model = new OpenRouterModel({ ...OPENROUTER, apiKey: '' });

    await expect(model.generate(request, { timeoutMs: 1_000 })).rejects.toThrow(
      'openrouter unavailable: API key is not configured',
    );
    expect(calls).toEqual([]);
  });
});

describe('OllamaModel', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('flattens the conversation into a prompt with a separate system text', async () => {
    const calls = stubFetch(new Response(JSON.stringify({ response: ' sure \n' })));
    const model = new OllamaModel({ url: 'http://ollama.test/', model: 'llama3', temperature: 0.7, maxTokens: 100 });

    const reply = await model.generate(
      {
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'help?' },
        ],
        maxTokens: 50,
      },
      { timeoutMs: 1_000 },
    );

    expect(reply).toBe('sure');
    expect(calls[0]?.url).toBe('http://ollama.test/api/generate');
    expect(calls[0]?.body).toEqual({
      model: 'llama3',
      system: 'Be brief.',
      prompt: 'User: hi\nAssistant: hello\nUser: help?\nAssistant:',
      stream: false,
      options: { temperature: 0.7, num_predict: 50 },
    });
  });

  it('wraps transport failures', async () => {
    stubFetch(new Response('down', { status: 503 }));
    const model = new OllamaModel({ url: 'http://ollama.test', model: 'llama3', temperature: 0.7, maxTokens: 100 });

    await expect(model.generate(request, { timeoutMs: 1_000 })).rejects.toThrow('ollama unavailable: HTTP 503: down');
  });
});

describe('requestSignal', () => {
  it('aborts when the caller aborts', () => {
    const controller = new AbortController();
    const signal = requestSignal({ timeoutMs: 60_000, signal: controller.signal });

    expect(signal.aborted).toBe(false);
    controller.abort();
    expect(signal.aborted).toBe(true);
  });

  it('aborts on its own once the timeout passes', async () => {
    const signal = requestSignal({ timeoutMs: 5 });

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toMatchObject({ name: 'TimeoutError' });
  });
});

describe('createLanguageModel', () => {
  it('picks the provider named in the config', () => {
    expect(createLanguageModel(DEFAULT_CONFIG).name).toBe('openrouter');
    expect(createLanguageModel({ ...DEFAULT_CONFIG, llm: { ...DEFAULT_CONFIG.llm, provider: 'ollama' } }).name).toBe(
      'ollama',
    );
  });
});
