import { Client, Events, GatewayIntentBits, Partials, type Message, type MessageCreateOptions } from 'discord.js';
import {
  sendOnce,
  type DeliveryStep,
  type DiscordEvent,
  type MessagingAdapter,
  type OutboundMessage,
  type PlatformEvent,
  type ReactionTarget,
} from '../types/messaging.js';
import { logThought } from '../utils/logger.js';
import { splitMessage } from '../utils/message-split.js';

/** Discord's limit for one message's content. */
export const DISCORD_MAX_CHARS = 2000;

/** Inbound messages kept so reactions can be attached to them later. */
const RECENT_MESSAGE_LIMIT = 200;

export interface DiscordAdapterOptions {
  /** Guild IDs the bot answers in. Empty means every guild. DMs are always allowed. */
  allowedGuilds?: readonly string[];
}

/** Plain facts read off a discord.js `Message`. */
export interface DiscordMessageFacts {
  id: string;
  channelId: string;
  guildId: string | null;
  content: string;
  createdTimestamp: number;
  authorId: string;
  authorIsBot: boolean;
  displayName: string;
  mentionedUserIds: string[];
  repliedUserId: string | null;
  referencedMessageId: string | null;
  attachmentUrls: string[];
}

interface SendableChannel {
  send(options: string | MessageCreateOptions): Promise<unknown>;
}

export function toDiscordEvent(facts: DiscordMessageFacts, selfId: string | null): DiscordEvent {
  return {
    platform: 'discord',
    chatId: facts.channelId,
    messageId: facts.id,
    timestamp: facts.createdTimestamp,
    text: facts.content,
    attachments: facts.attachmentUrls,
    isDirect: facts.guildId === null,
    author: {
      id: facts.authorId,
      displayName: facts.displayName,
      isBot: facts.authorIsBot,
      isSelf: selfId !== null && facts.authorId === selfId,
    },
    mentionsSelf: selfId !== null && facts.mentionedUserIds.includes(selfId),
    replyTo: facts.referencedMessageId
      ? {
          messageId: facts.referencedMessageId,
          fromSelf: selfId !== null && facts.repliedUserId === selfId,
        }
      : undefined,
  };
}

function readFacts(message: Message): DiscordMessageFacts {
  return {
    id: message.id,
    channelId: message.channelId,
    guildId: message.guildId,
    content: message.content,
    createdTimestamp: message.createdTimestamp,
    authorId: message.author.id,
    authorIsBot: message.author.bot,
    displayName: message.member?.displayName ?? message.author.globalName ?? message.author.username,
    mentionedUserIds: message.mentions.users.map((user) => user.id),
    repliedUserId: message.mentions.repliedUser?.id ?? null,
    referencedMessageId: message.reference?.messageId ?? null,
    attachmentUrls: message.attachments.map((attachment) => attachment.url),
  };
}

/**
 * discord.js gateway client for guild channels and DMs. Needs the
 * Message Content privileged intent enabled for the application.
 */
export class DiscordAdapter implements MessagingAdapter {
  readonly platforms = ['discord'] as const;
  readonly #client: Client;
  readonly #token: string;
  readonly #allowedGuilds: ReadonlySet<string>;
  readonly #recent: Map<string, Message> = new Map();

  onEvent?: (event: PlatformEvent) => Promise<void>;

  constructor(token: string, options: DiscordAdapterOptions = {}) {
    this.#token = token;
    this.#allowedGuilds = new Set(options.allowedGuilds ?? []);
    this.#client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      partials: [Partials.Channel],
    });
    this.#registerListeners();
  }

  async start(): Promise<void> {
    await this.#client.login(this.#token);
  }

  async stop(): Promise<void> {
    this.#recent.clear();
    await this.#client.destroy();
  }

  async send(message: OutboundMessage, attempt: DeliveryStep = sendOnce): Promise<void> {
    const channel = await attempt('channel', () => this.#channel(message.chatId));
    const chunks = splitMessage(message.text, DISCORD_MAX_CHARS);

    for (const [index, chunk] of chunks.entries()) {
      const first = index === 0;
      await attempt(`chunk ${index + 1}/${chunks.length}`, () =>
        channel.send({
          content: chunk,
          files: first ? message.attachments : undefined,
          reply:
            first && message.inReplyTo !== undefined
              ? { messageReference: message.inReplyTo, failIfNotExists: false }
              : undefined,
        }),
      );
    }

    if (message.formatHints.reaction && message.inReplyTo !== undefined) {
      await this.#react(message.inReplyTo, message.formatHints.reaction);
    }
  }

  async react(target: ReactionTarget, emoji: string): Promise<void> {
    await this.#react(target.messageId, emoji);
  }

  // ── Private Helpers ──────────────────────────────────────────────────────────

  #registerListeners(): void {
    this.#client.once(Events.ClientReady, (client) => {
      console.log(`[DiscordAdapter] Logged in as ${client.user.tag}.`);
    });

    this.#client.on(Events.MessageCreate, (message) => {
      if (message.guildId !== null && this.#allowedGuilds.size > 0 && !this.#allowedGuilds.has(message.guildId)) {
        return;
      }
      this.#remember(message);
      void this.#forward(toDiscordEvent(readFacts(message), this.#client.user?.id ?? null));
    });

    this.#client.on(Events.Error, (err) => {
      console.error('[DiscordAdapter] Client error:', err.message);
    });
  }

  #remember(message: Message): void {
    this.#recent.set(message.id, message);
    if (this.#recent.size > RECENT_MESSAGE_LIMIT) {
      const oldest = this.#recent.keys().next();
      if (!oldest.done) this.#recent.delete(oldest.value);
    }
  }

  async #channel(chatId: string): Promise<SendableChannel> {
    const channel = await this.#client.channels.fetch(chatId);
    if (channel && channel.isTextBased() && 'send' in channel) return channel;
    throw new Error(`Discord channel ${chatId} cannot receive messages`);
  }

  async #react(messageId: string, emoji: string): Promise<void> {
    const target = this.#recent.get(messageId);
    if (!target) return;
    try {
      await target.react(emoji);
    } catch (err) {
      void logThought(`[DiscordAdapter] Reaction on ${messageId} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async #forward(event: DiscordEvent): Promise<void> {
    try {
      await this.onEvent?.(event);
    } catch (err) {
      console.error('[DiscordAdapter] Failed to hand off message:', err instanceof Error ? err.message : String(err));
    }
  }
}
