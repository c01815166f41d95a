import TelegramBot from 'node-telegram-bot-api';
import {
  sendOnce,
  type DeliveryStep,
  type MessagingAdapter,
  type OutboundMessage,
  type PlatformEvent,
  type TelegramEvent,
} from '../types/messaging.js';
import { logThought } from '../utils/logger.js';
import { splitMessage } from '../utils/message-split.js';

/** Telegram's hard limit for one text message. */
export const TELEGRAM_MAX_CHARS = 4096;

export interface TelegramAdapterOptions {
  /** Chat IDs the bot answers in. Empty means every chat. */
  allowedChats?: readonly string[];
}

interface BotIdentity {
  id: number;
  username?: string;
}

/** Legacy Telegram Markdown marks bold with single asterisks. */
export function toTelegramMarkdown(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, '*$1*');
}

/** Map a Bot API message onto the platform event the normalizer reads. */
export function toTelegramEvent(msg: TelegramBot.Message, self: BotIdentity | null): TelegramEvent {
  const reply = msg.reply_to_message;
  const replyFrom = reply?.from;
  const fromSelf =
    replyFrom !== undefined &&
    self !== null &&
    (replyFrom.id === self.id ||
      (self.username !== undefined && replyFrom.username?.toLowerCase() === self.username.toLowerCase()));

  return {
    platform: 'telegram',
    chatId: msg.chat.id,
    chatType: msg.chat.type,
    messageId: msg.message_id,
    timestamp: msg.date * 1000,
    text: msg.text ?? msg.caption,
    from: msg.from
      ? {
          id: msg.from.id,
          username: msg.from.username,
          firstName: msg.from.first_name,
          isBot: msg.from.is_bot,
          isSelf: self !== null && msg.from.id === self.id,
        }
      : undefined,
    replyTo: reply
      ? {
          messageId: reply.message_id,
          fromSelf,
          text: reply.text ?? reply.caption,
        }
      : undefined,
  };
}

/**
 * Wraps the Telegram Bot API:
 *   - Long polling, started and stopped with the adapter
 *   - Inbound messages mapped to platform events for the dispatcher
 *   - Replies split to Telegram's size limit, photos for rendered memes
 */
export class TelegramAdapter implements MessagingAdapter {
  readonly platforms = ['telegram'] as const;
  readonly #bot: TelegramBot;
  readonly #allowedChats: ReadonlySet<string>;
  #self: BotIdentity | null = null;

  /** Callback invoked by the dispatcher for every message from an allowed chat. */
  onEvent?: (event: PlatformEvent) => Promise<void>;

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string, options: TelegramAdapterOptions = {}, bot?: TelegramBot) {
    this.#bot = bot ?? new TelegramBot(token, { polling: false });
    this.#allowedChats = new Set(options.allowedChats ?? []);
    this.#registerListeners();
  }

  async start(): Promise<void> {
    const me = await this.#bot.getMe();
    this.#self = { id: me.id, username: me.username };
    await this.#bot.startPolling();
    console.log(`[TelegramAdapter] Polling as @${me.username ?? me.id}.`);
  }

  async stop(): Promise<void> {
    await this.#bot.stopPolling();
  }

  async send(message: OutboundMessage, attempt: DeliveryStep = sendOnce): Promise<void> {
    const chatId = message.chatId;
    const replyTo = message.inReplyTo !== undefined ? Number(message.inReplyTo) : undefined;
    const replyOptions = replyTo !== undefined && Number.isInteger(replyTo) ? { reply_to_message_id: replyTo } : {};

    for (const url of message.attachments) {
      await attempt('photo', () => this.#bot.sendPhoto(chatId, url, replyOptions));
    }

    const chunks = splitMessage(message.text, TELEGRAM_MAX_CHARS);
    for (const [index, chunk] of chunks.entries()) {
      const options = index === 0 ? replyOptions : {};
      await attempt(`chunk ${index + 1}/${chunks.length}`, () =>
        message.formatHints.markdown ? this.#sendMarkdown(chatId, chunk, options) : this.#bot.sendMessage(chatId, chunk, options),
      );
    }
  }

  // ── Private Helpers ──────────────────────────────────────────────────────────

  async #sendMarkdown(
    chatId: string,
    chunk: string,
    options: TelegramBot.SendMessageOptions,
  ): Promise<TelegramBot.Message> {
    try {
      return await this.#bot.sendMessage(chatId, toTelegramMarkdown(chunk), { ...options, parse_mode: 'Markdown' });
    } catch (err) {
      // Unbalanced markup is rejected by the API; the plain text still goes out.
      void logThought(
        `[TelegramAdapter] Markdown send to ${chatId} failed, retrying as plain text: ${err instanceof Error ? err.message : String(err)}`,
      );
      return this.#bot.sendMessage(chatId, chunk, options);
    }
  }

  #registerListeners(): void {
    this.#bot.on('message', (msg) => {
      if (this.#allowedChats.size > 0 && !this.#allowedChats.has(String(msg.chat.id))) return;
      void this.#forward(toTelegramEvent(msg, this.#self));
    });

    this.#bot.on('polling_error', (err) => {
      console.error('[TelegramAdapter] Polling error:', err.message);
    });
  }

  async #forward(event: TelegramEvent): Promise<void> {
    try {
      await this.onEvent?.(event);
    } catch (err) {
      console.error('[TelegramAdapter] Failed to hand off message:', err instanceof Error ? err.message : String(err));
    }
  }
}
