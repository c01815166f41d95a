import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { GatewayHandler } from '../../src/core/gateway.js';
import {
  InterfaceDispatcher,
  isRetryableDelivery,
  type InterfaceDispatcherOptions,
} from '../../src/interfaces/dispatcher.js';
import { ContextStore, InMemoryContextBackend } from '../../src/services/context-store.js';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { Normalizer } from '../../src/services/normalizer.js';
import { ReactionPicker } from '../../src/services/reactions.js';
import { StatsTracker } from '../../src/services/stats-tracker.js';
import { HttpStatusError } from '../../src/utils/http.js';
import {
  sendOnce,
  type DeliveryStep,
  type InboundMessage,
  type MessagingAdapter,
  type OutboundMessage,
  type Platform,
  type PlatformEvent,
  type ReactionTarget,
  type TelegramEvent,
} from '../../src/types/messaging.js';
import { deferred, flush } from '../helpers/messages.js';

/** Sends each line of a reply as its own platform call. */
class FakeAdapter implements MessagingAdapter {
  readonly platforms: readonly Platform[];
  readonly sent: OutboundMessage[] = [];
  readonly parts: string[] = [];
  /** Calls that fail before any part goes out. */
  failures = 0;
  /** Part text → calls that fail for it. */
  readonly flaky = new Map<string, number>();
  failure: () => Error = () => new Error('network blip');
  starts = 0;
  stops = 0;
  onEvent?: (event: PlatformEvent) => Promise<void>;

  constructor(platforms: readonly Platform[] = ['telegram']) {
    this.platforms = platforms;
  }

  async start(): Promise<void> {
    this.starts++;
  }

  async stop(): Promise<void> {
    this.stops++;
  }

  async send(message: OutboundMessage, attempt: DeliveryStep = sendOnce): Promise<void> {
    for (const part of message.text.split('\n')) {
      await attempt('part', async () => {
        const flaky = this.flaky.get(part) ?? 0;
        if (this.failures > 0 || flaky > 0) {
          if (flaky > 0) this.flaky.set(part, flaky - 1);
          else this.failures--;
          throw this.failure();
        }
        this.parts.push(part);
      });
    }
    this.sent.push(message);
  }
}

class ReactingAdapter extends FakeAdapter {
  readonly reactions: Array<[ReactionTarget, string]> = [];
  reactFailure: Error | null = null;

  async react(target: ReactionTarget, emoji: string): Promise<void> {
    if (this.reactFailure) throw this.reactFailure;
    this.reactions.push([target, emoji]);
  }
}

function telegramEvent(text: unknown, overrides: Partial<TelegramEvent> = {}): TelegramEvent {
  return {
    platform: 'telegram',
    chatId: -100,
    chatType: 'supergroup',
    messageId: 1,
    timestamp: 1_000,
    text,
    from: { id: 7, username: 'alice', isBot: false },
    ...overrides,
  };
}

function reply(message: InboundMessage, text = `re: ${message.text}`): OutboundMessage {
  return {
    conversationId: message.conversationId,
    platform: message.platform,
    chatId: message.chatId,
    text,
    formatHints: {},
    inReplyTo: message.messageId,
    attachments: [],
  };
}

describe('InterfaceDispatcher', () => {
  let db: SqliteDatabase;
  let stats: StatsTracker;
  let store: ContextStore;
  let adapter: FakeAdapter;

  beforeEach(() => {
    db = openDatabase(':memory:');
    stats = new StatsTracker(db);
    store = new ContextStore({ backend: new InMemoryContextBackend() });
    adapter = new FakeAdapter();
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  function create(
    gateway: GatewayHandler,
    options: InterfaceDispatcherOptions = {},
    reactions?: ReactionPicker,
  ): InterfaceDispatcher {
    return new InterfaceDispatcher(
      [adapter],
      {
        normalizer: new Normalizer({
          botName: 'roomwise',
          commandPrefixes: ['!'],
          knownBots: ['otherbot'],
          filteredWords: ['darn'],
        }),
        gateway,
        contextStore: store,
        stats,
        reactions,
      },
      { deliveryBaseDelayMs: 1, ...options },
    );
  }

  const echo: GatewayHandler = { processMessage: async (message) => reply(message) };

  it('answers a triggered message through the adapter it came from', async () => {
    const dispatcher = create(echo);

    await adapter.onEvent?.(telegramEvent('roomwise hi'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.sent).toEqual([
      {
        conversationId: 'telegram:-100',
        platform: 'telegram',
        chatId: '-100',
        text: 're: roomwise hi',
        formatHints: {},
        inReplyTo: '1',
        attachments: [],
      },
    ]);
    expect(stats.snapshot()).toMatchObject({ received: 1, sent: 1, dropped: 0 });
  });

  it('remembers room chatter without answering it', async () => {
    const processMessage = vi.fn(echo.processMessage);
    const dispatcher = create({ processMessage });

    await expect(dispatcher.handleEvent(telegramEvent('anyone up for lunch?'))).resolves.toBe('observed');

    const context = await store.snapshot('telegram:-100');
    expect(context.history.map((turn) => [turn.senderName, turn.text])).toEqual([['alice', 'anyone up for lunch?']]);
    expect(processMessage).not.toHaveBeenCalled();
    expect(adapter.sent).toEqual([]);
  });

  it('skips filtered chatter entirely', async () => {
    const dispatcher = create(echo);

    await expect(dispatcher.handleEvent(telegramEvent('darn this weather'))).resolves.toBe('observed');

    expect((await store.snapshot('telegram:-100')).history).toEqual([]);
  });

  it('drops malformed events and ignores known bots', async () => {
    const dispatcher = create(echo);

    await expect(dispatcher.handleEvent(telegramEvent(42))).resolves.toBe('malformed');
    await expect(
      dispatcher.handleEvent(telegramEvent('roomwise hi', { from: { id: 9, username: 'OtherBot_v2', isBot: false } })),
    ).resolves.toBe('ignored');
    expect(stats.snapshot().received).toBe(0);
  });

  it('retries a failed delivery', async () => {
    adapter.failures = 1;
    const dispatcher = create(echo);

    await dispatcher.handleEvent(telegramEvent('!help'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.sent.map((message) => message.text)).toEqual(['re: !help']);
    expect(stats.snapshot().sent).toBe(1);
  });

  it('gives up after the configured attempts', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    adapter.failures = 5;
    const dispatcher = create(echo, { deliveryMaxAttempts: 2 });

    await dispatcher.handleEvent(telegramEvent('!help'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.sent).toEqual([]);
    expect(adapter.failures).toBe(3);
    expect(stats.snapshot().sent).toBe(0);
    expect(error).toHaveBeenCalledWith('[Dispatcher] Delivery to telegram:-100 failed: network blip');
  });

  it('resumes a multi-part reply at the part that failed', async () => {
    adapter.flaky.set('part two', 1);
    const dispatcher = create({ processMessage: async (message) => reply(message, 'part one\npart two\npart three') });

    await dispatcher.handleEvent(telegramEvent('!help'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.parts).toEqual(['part one', 'part two', 'part three']);
    expect(stats.snapshot().sent).toBe(1);
  });

  it('does not retry a send the platform refused outright', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    adapter.failures = 2;
    adapter.failure = () => new HttpStatusError(400, 'chat not found');
    const dispatcher = create(echo);

    await dispatcher.handleEvent(telegramEvent('!help'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.failures).toBe(1);
    expect(adapter.parts).toEqual([]);
    expect(stats.snapshot().sent).toBe(0);
  });

  it('drops triggered messages beyond the queue limit, not counting the one in flight', async () => {
    const gate = deferred();
    const dispatcher = create(
      {
        processMessage: async (message) => {
          await gate.promise;
          return reply(message);
        },
      },
      { maxQueueSize: 1 },
    );

    const first = await dispatcher.handleEvent(telegramEvent('roomwise one', { messageId: 1 }));
    await flush();
    const second = await dispatcher.handleEvent(telegramEvent('roomwise two', { messageId: 2 }));
    const third = await dispatcher.handleEvent(telegramEvent('roomwise three', { messageId: 3 }));

    expect([first, second, third]).toEqual(['accepted', 'accepted', 'dropped']);
    gate.resolve();
    await dispatcher.scheduler.onIdle();
    expect(adapter.sent.map((message) => message.text)).toEqual(['re: roomwise one', 're: roomwise two']);
    expect(stats.snapshot()).toMatchObject({ received: 3, sent: 2, dropped: 1 });
  });

  describe('reactions', () => {
    const picker = (): ReactionPicker =>
      new ReactionPicker({ triggers: [{ phrase: 'thanks', emojis: ['🙏'], chance: 1 }], random: () => 0 });

    it('reacts to a trigger word in room chatter', async () => {
      const reacting = new ReactingAdapter();
      adapter = reacting;
      const dispatcher = create(echo, {}, picker());

      await expect(dispatcher.handleEvent(telegramEvent('thanks everyone', { messageId: 42 }))).resolves.toBe('observed');

      expect(reacting.reactions).toEqual([[{ platform: 'telegram', chatId: '-100', messageId: '42' }, '🙏']]);
      expect(reacting.sent).toEqual([]);
    });

    it('leaves filtered messages alone', async () => {
      const reacting = new ReactingAdapter();
      adapter = reacting;
      const dispatcher = create(echo, {}, picker());

      await dispatcher.handleEvent(telegramEvent('darn, thanks'));

      expect(reacting.reactions).toEqual([]);
    });

    it('keeps handling the message when the reaction fails', async () => {
      const reacting = new ReactingAdapter();
      reacting.reactFailure = new Error('forbidden');
      adapter = reacting;
      const dispatcher = create(echo, {}, picker());

      await expect(dispatcher.handleEvent(telegramEvent('thanks everyone'))).resolves.toBe('observed');
      expect((await store.snapshot('telegram:-100')).history.map((entry) => entry.text)).toEqual(['thanks everyone']);
    });

    it('skips adapters that cannot react', async () => {
      const dispatcher = create(echo, {}, picker());
      await expect(dispatcher.handleEvent(telegramEvent('thanks everyone'))).resolves.toBe('observed');
    });
  });

  it('starts and stops each adapter once', async () => {
    adapter = new FakeAdapter(['whatsapp', 'messenger']);
    const dispatcher = create(echo);

    await dispatcher.start();
    await dispatcher.shutdown();

    expect([adapter.starts, adapter.stops]).toEqual([1, 1]);
  });

  it('loses a reply for a platform without an adapter without throwing', async () => {
    const dispatcher = create({
      processMessage: async (message) => ({ ...reply(message), platform: 'discord' }),
    });

    await dispatcher.handleEvent(telegramEvent('!help'));
    await dispatcher.scheduler.onIdle();

    expect(adapter.sent).toEqual([]);
    expect(stats.snapshot().sent).toBe(0);
  });
});

describe('isRetryableDelivery', () => {
  it('retries network errors, rate limits and server errors only', () => {
    expect(
      [
        new Error('socket hang up'),
        new HttpStatusError(429, 'slow down'),
        new HttpStatusError(503, 'down'),
        new HttpStatusError(403, 'forbidden'),
        Object.assign(new Error('Missing Access'), { status: 403 }),
        Object.assign(new Error('ETELEGRAM: 400 Bad Request'), { response: { statusCode: 400 } }),
      ].map(isRetryableDelivery),
    ).toEqual([true, true, true, false, false, false]);
  });
});
