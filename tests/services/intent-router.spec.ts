import { describe, expect, it } from 'vitest';
import { createEmptyContext } from '../../src/services/context-store.js';
import { IntentRouter, extractUrls } from '../../src/services/intent-router.js';
import type { ConversationContext } from '../../src/types/context.js';
import type { InboundMessage } from '../../src/types/messaging.js';

const router = new IntentRouter({ botName: 'roomwise', commandPrefixes: ['!', '/'] });
const empty = createEmptyContext('telegram:1', 0);

function message(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    conversationId: 'telegram:1',
    platform: 'telegram',
    chatId: '1',
    messageId: '10',
    senderId: '5',
    senderName: 'alice',
    text,
    receivedAt: 1_000,
    isCommand: text.startsWith('!') || text.startsWith('/'),
    triggered: true,
    rejected: false,
    attachments: [],
    ...overrides,
  };
}

function classify(text: string, context: ConversationContext = empty) {
  return router.classify(message(text), context);
}

describe('IntentRouter', () => {
  it('classifies rejected messages before anything else', () => {
    expect(router.classify(message('!reset', { rejected: true }), empty)).toEqual({ kind: 'rejected' });
  });

  it('recognizes reset and summary commands and phrases', () => {
    expect(classify('!reset')).toEqual({ kind: 'reset' });
    expect(classify('/clear')).toEqual({ kind: 'reset' });
    expect(classify('roomwise reset!')).toEqual({ kind: 'reset' });
    expect(classify('!tldr')).toEqual({ kind: 'summary' });
    expect(classify('roomwise, catch me up')).toEqual({ kind: 'summary' });
  });

  it('parses help with an optional topic, and stats', () => {
    expect(classify('!help')).toEqual({ kind: 'help' });
    expect(classify('/start')).toEqual({ kind: 'help' });
    expect(classify('!help meme')).toEqual({ kind: 'help', topic: 'meme' });
    expect(classify('!help@roomwise_bot price')).toEqual({ kind: 'help', topic: 'price' });
    expect(classify('!help time')).toEqual({ kind: 'help', topic: 'time' });
    expect(classify('!stats')).toEqual({ kind: 'stats' });
  });

  it('routes crypto price questions', () => {
    expect(classify('btc price')).toEqual({ kind: 'price', symbol: 'BTC', quoteCurrency: 'USD' });
    expect(classify('<@123> what is ethereum worth in euros?')).toEqual({
      kind: 'price',
      symbol: 'ETH',
      quoteCurrency: 'EUR',
    });
    expect(classify('!price sol in gbp')).toEqual({ kind: 'price', symbol: 'SOL', quoteCurrency: 'GBP' });
  });

  it('routes fiat conversions with amounts', () => {
    expect(classify('convert 100 usd to eur')).toEqual({ kind: 'fx', base: 'USD', quote: 'EUR', amount: 100 });
    expect(classify('how much is 1,500 yen in dollars')).toEqual({
      kind: 'fx',
      base: 'JPY',
      quote: 'USD',
      amount: 1500,
    });
    expect(classify('exchange rate for TRY')).toEqual({ kind: 'fx', base: 'TRY', quote: 'USD', amount: 1 });
    expect(classify('usd rate')).toEqual({ kind: 'fx', base: 'USD', quote: 'EUR', amount: 1 });
  });

  it('does not read ordinary words as currency codes', () => {
    expect(classify('try this rate of pizza').kind).toBe('chat');
    expect(classify('the price is right').kind).toBe('chat');
  });

  it('needs a marker before reading a word-like ticker as crypto', () => {
    expect(classify("i'm going to link it").kind).toBe('chat');
    expect(classify('connect the dot to the sol').kind).toBe('chat');
    expect(classify('what is the price of this link').kind).toBe('chat');

    expect(classify('LINK to eur')).toEqual({ kind: 'price', symbol: 'LINK', quoteCurrency: 'EUR' });
    expect(classify('$sol to usd')).toEqual({ kind: 'price', symbol: 'SOL', quoteCurrency: 'USD' });
    expect(classify('link price')).toEqual({ kind: 'price', symbol: 'LINK', quoteCurrency: 'USD' });
    expect(classify('price of the dot')).toEqual({ kind: 'price', symbol: 'DOT', quoteCurrency: 'USD' });
  });

  it('asks for an asset when !price has none', () => {
    expect(classify('!price')).toEqual({ kind: 'help', topic: 'price' });
  });

  it('extracts URLs and the instruction around them', () => {
    expect(classify('roomwise what do you think of https://example.com/article.')).toEqual({
      kind: 'url-analysis',
      urls: ['https://example.com/article'],
      instruction: 'what do you think of',
    });
    expect(classify('https://a.example/x https://a.example/x')).toEqual({
      kind: 'url-analysis',
      urls: ['https://a.example/x'],
      instruction: '',
    });
  });

  it('routes meme and search commands, or explains them when empty', () => {
    expect(classify('!meme cats at work')).toEqual({ kind: 'meme', topic: 'cats at work' });
    expect(classify('!meme')).toEqual({ kind: 'help', topic: 'meme' });
    expect(classify('/search rust async')).toEqual({ kind: 'search', query: 'rust async' });
    expect(classify('!search')).toEqual({ kind: 'help', topic: 'search' });
  });

  it('routes stock lookups by ticker', () => {
    expect(classify('!stonks aapl')).toEqual({ kind: 'stock', symbol: 'AAPL' });
    expect(classify('/stock $tsla please')).toEqual({ kind: 'stock', symbol: 'TSLA' });
    expect(classify('!stonks')).toEqual({ kind: 'help', topic: 'stock' });
    expect(classify('!stonks 42')).toEqual({ kind: 'help', topic: 'stock' });
  });

  it('splits world clock places on commas', () => {
    expect(classify('!time tokyo, new york,')).toEqual({ kind: 'clock', locations: ['tokyo', 'new york'] });
    expect(classify('!clock')).toEqual({ kind: 'clock', locations: [] });
    expect(classify('!time a, b, c, d, e, f')).toEqual({ kind: 'clock', locations: ['a', 'b', 'c', 'd', 'e'] });
  });

  it('falls back to chat and flags topics the room has not discussed', () => {
    const context: ConversationContext = { ...empty, topics: { pizza: 1 } };

    expect(router.classify(message('roomwise, pizza again'), context)).toEqual({
      kind: 'chat',
      text: 'roomwise, pizza again',
      novelTopic: false,
      keywords: ['pizza'],
    });
    expect(router.classify(message('tell me about pizza'), context)).toEqual({
      kind: 'chat',
      text: 'tell me about pizza',
      novelTopic: true,
      keywords: ['tell', 'pizza'],
    });
  });
});

describe('extractUrls', () => {
  it('keeps well-formed http(s) URLs without trailing punctuation', () => {
    expect(extractUrls('see https://example.com/a?b=1, and http://test.example!')).toEqual([
      'https://example.com/a?b=1',
      'http://test.example',
    ]);
    expect(extractUrls('ftp://example.com and example.com')).toEqual([]);
  });
});
