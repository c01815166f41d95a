import { afterEach, describe, expect, it, vi } from 'vitest';
import TelegramBot from 'node-telegram-bot-api';
import { TelegramAdapter, toTelegramEvent, toTelegramMarkdown } from '../../src/interfaces/telegram_handler.js';
import type { DeliveryStep, OutboundMessage } from '../../src/types/messaging.js';

const sentMessage: TelegramBot.Message = { message_id: 1, date: 0, chat: { id: -100, type: 'supergroup' } };

function outbound(overrides: Partial<OutboundMessage> = {}): OutboundMessage {
  return {
    conversationId: 'telegram:-100',
    platform: 'telegram',
    chatId: '-100',
    text: 'hello',
    formatHints: {},
    inReplyTo: '5',
    attachments: [],
    ...overrides,
  };
}

describe('toTelegramMarkdown', () => {
  it('turns double-asterisk bold into Telegram bold', () => {
    expect(toTelegramMarkdown('💰 **BTC Price**\nPrice: $1')).toBe('💰 *BTC Price*\nPrice: $1');
  });
});

describe('toTelegramEvent', () => {
  it('maps sender, timestamps and replies to the bot', () => {
    const event = toTelegramEvent(
      {
        message_id: 10,
        date: 1_700_000_000,
        chat: { id: -100, type: 'supergroup' },
        from: { id: 7, is_bot: false, first_name: 'Alice', username: 'alice' },
        text: 'what do you mean?',
        reply_to_message: {
          message_id: 9,
          date: 1_699_999_990,
          chat: { id: -100, type: 'supergroup' },
          from: { id: 99, is_bot: true, first_name: 'Roomwise', username: 'RoomwiseBot' },
          text: 'earlier answer',
        },
      },
      { id: 1, username: 'roomwisebot' },
    );

    expect(event).toEqual({
      platform: 'telegram',
      chatId: -100,
      chatType: 'supergroup',
      messageId: 10,
      timestamp: 1_700_000_000_000,
      text: 'what do you mean?',
      from: { id: 7, username: 'alice', firstName: 'Alice', isBot: false, isSelf: false },
      replyTo: { messageId: 9, fromSelf: true, text: 'earlier answer' },
    });
  });

  it('recognizes its own messages by user id', () => {
    const event = toTelegramEvent(
      { message_id: 12, date: 1, chat: { id: -100, type: 'group' }, from: { id: 1, is_bot: true, first_name: 'Roomwise' } },
      { id: 1, username: 'roomwisebot' },
    );

    expect(event.from?.isSelf).toBe(true);
  });

  it('uses the caption when there is no text', () => {
    const event = toTelegramEvent(
      { message_id: 11, date: 1, chat: { id: 5, type: 'private' }, caption: 'look at this' },
      null,
    );

    expect(event.text).toBe('look at this');
    expect(event.from).toBeUndefined();
    expect(event.replyTo).toBeUndefined();
  });
});

describe('TelegramAdapter.send', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createAdapter() {
    const bot = new TelegramBot('test-token', { polling: false });
    const sendMessage = vi.spyOn(bot, 'sendMessage').mockResolvedValue(sentMessage);
    const sendPhoto = vi.spyOn(bot, 'sendPhoto').mockResolvedValue(sentMessage);
    return { adapter: new TelegramAdapter('test-token', {}, bot), sendMessage, sendPhoto };
  }

  it('replies to the triggering message', async () => {
    const { adapter, sendMessage } = createAdapter();

    await adapter.send(outbound());

    expect(sendMessage).toHaveBeenCalledWith('-100', 'hello', { reply_to_message_id: 5 });
  });

  it('sends photos before the caption text', async () => {
    const { adapter, sendMessage, sendPhoto } = createAdapter();

    await adapter.send(outbound({ text: '🎨 mondays', attachments: ['https://memes.test/1.jpg'] }));

    expect(sendPhoto).toHaveBeenCalledWith('-100', 'https://memes.test/1.jpg', { reply_to_message_id: 5 });
    expect(sendMessage).toHaveBeenCalledWith('-100', '🎨 mondays', { reply_to_message_id: 5 });
  });

  it('retries as plain text when Telegram rejects the markup', async () => {
    const { adapter, sendMessage } = createAdapter();
    sendMessage.mockRejectedValueOnce(new Error("can't parse entities"));

    await adapter.send(outbound({ text: '**bold** and_broken', formatHints: { markdown: true } }));

    expect(sendMessage.mock.calls).toEqual([
      ['-100', '*bold* and_broken', { reply_to_message_id: 5, parse_mode: 'Markdown' }],
      ['-100', '**bold** and_broken', { reply_to_message_id: 5 }],
    ]);
  });

  it('repeats only the chunk that failed when a step is retried', async () => {
    const { adapter, sendMessage } = createAdapter();
    const first = 'A'.repeat(4096);
    const second = 'B'.repeat(100);
    sendMessage.mockResolvedValueOnce(sentMessage).mockRejectedValueOnce(new Error('ETIMEDOUT'));
    const retryOnce: DeliveryStep = async (_label, step) => {
      try {
        return await step();
      } catch {
        return step();
      }
    };

    await adapter.send(outbound({ text: `${first} ${second}` }), retryOnce);

    expect(sendMessage.mock.calls.map(([, text]) => text)).toEqual([first, second, second]);
  });
});
