import { MalformedEventError } from '../types/errors.js';
import type {
  DiscordEvent,
  InboundMessage,
  NormalizeResult,
  Platform,
  PlatformEvent,
  ReplyReference,
  TelegramEvent,
  TwilioEvent,
} from '../types/messaging.js';

/** Replaces the text of a message that tripped the content filter. */
export const REJECTION_MARKER = '[message withheld]';

export interface NormalizerOptions {
  /** Lower-case bot name; mentioning it in text triggers a reply. */
  botName: string;
  commandPrefixes: string[];
  /** Sender-name prefixes of other bots to ignore (case-insensitive). */
  knownBots: string[];
  filteredWords: string[];
}

/** Sender details extracted per platform before the shared checks run. */
interface SenderFacts {
  platform: Platform;
  senderId: string;
  senderName: string;
  /** Lower-case handles compared against the known-bot list. */
  handles: string[];
  /** Set only from the platform's own identity for the bot, never from names. */
  isSelf: boolean;
  isBot: boolean;
  isDirect: boolean;
  mentionsSelf: boolean;
  replyTo?: ReplyReference;
  repliesToSelf: boolean;
}

function requireId(value: unknown, field: string): string {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  throw new MalformedEventError(field, 'is missing');
}

function requireText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new MalformedEventError('text', `must be a string, got ${typeof value}`);
  }
  return value;
}

function requireTimestamp(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new MalformedEventError('timestamp', 'is invalid');
  }
  return value;
}

function telegramFacts(event: TelegramEvent): SenderFacts {
  if (!event.from) throw new MalformedEventError('senderId', 'is missing');
  const senderId = requireId(event.from.id, 'senderId');
  const username = event.from.username?.trim();
  return {
    platform: 'telegram',
    senderId,
    senderName: username || event.from.firstName?.trim() || senderId,
    handles: [username, event.from.firstName].filter((h): h is string => Boolean(h)).map((h) => h.toLowerCase()),
    isSelf: event.from.isSelf ?? false,
    isBot: event.from.isBot,
    isDirect: event.chatType === 'private',
    mentionsSelf: false,
    replyTo: event.replyTo
      ? { messageId: requireId(event.replyTo.messageId, 'replyTo.messageId'), text: event.replyTo.text }
      : undefined,
    repliesToSelf: event.replyTo?.fromSelf ?? false,
  };
}

function discordFacts(event: DiscordEvent): SenderFacts {
  if (!event.author) throw new MalformedEventError('senderId', 'is missing');
  const senderId = requireId(event.author.id, 'senderId');
  const displayName = event.author.displayName.trim();
  return {
    platform: 'discord',
    senderId,
    senderName: displayName || senderId,
    handles: displayName ? [displayName.toLowerCase()] : [],
    isSelf: event.author.isSelf,
    isBot: event.author.isBot,
    isDirect: event.isDirect,
    mentionsSelf: event.mentionsSelf,
    replyTo: event.replyTo ? { messageId: event.replyTo.messageId, text: event.replyTo.text } : undefined,
    repliesToSelf: event.replyTo?.fromSelf ?? false,
  };
}

function twilioFacts(event: TwilioEvent): SenderFacts {
  const senderId = requireId(event.from, 'senderId');
  const profileName = event.profileName?.trim();
  return {
    platform: event.channel,
    senderId,
    senderName: profileName || senderId,
    handles: profileName ? [profileName.toLowerCase()] : [],
    isSelf: event.fromSelf ?? false,
    isBot: false,
    // Twilio-bridged channels are one-to-one conversations.
    isDirect: true,
    mentionsSelf: false,
    repliesToSelf: false,
  };
}

function senderFacts(event: PlatformEvent): SenderFacts {
  switch (event.platform) {
    case 'telegram':
      return telegramFacts(event);
    case 'discord':
      return discordFacts(event);
    case 'twilio':
      return twilioFacts(event);
  }
}

/**
 * Turns adapter-built platform events into `InboundMessage`s. Pure: the same
 * event always yields the same result, and nothing outside is touched.
 */
export class Normalizer {
  readonly #botName: string;
  readonly #commandPrefixes: string[];
  readonly #knownBots: string[];
  readonly #filteredWords: RegExp[];

  constructor(options: NormalizerOptions) {
    this.#botName = options.botName.trim().toLowerCase();
    this.#commandPrefixes = options.commandPrefixes.filter((prefix) => prefix.length > 0);
    this.#knownBots = options.knownBots.map((name) => name.trim().toLowerCase()).filter((name) => name.length > 0);
    this.#filteredWords = options.filteredWords
      .map((word) => word.trim().toLowerCase())
      .filter((word) => word.length > 0)
      .map((word) => new RegExp(`(^|[^\\p{L}\\p{N}])${word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}($|[^\\p{L}\\p{N}])`, 'u'));
  }

  /** @throws MalformedEventError when ids, text or timestamp are unusable. */
  normalize(event: PlatformEvent): NormalizeResult {
    const chatId = requireId(event.chatId, 'chatId');
    const messageId = requireId(event.messageId, 'messageId');
    const receivedAt = requireTimestamp(event.timestamp);
    const rawText = requireText(event.text);
    const facts = senderFacts(event);

    if (facts.isSelf) {
      return { status: 'ignored', reason: 'self' };
    }
    if (facts.isBot) {
      return { status: 'ignored', reason: 'bot' };
    }
    if (facts.handles.some((handle) => this.#knownBots.some((bot) => handle.startsWith(bot)))) {
      return { status: 'ignored', reason: 'known-bot' };
    }

    const text = rawText.trim();
    if (text.length === 0) {
      return { status: 'ignored', reason: 'empty' };
    }

    const lower = text.toLowerCase();
    const isCommand = this.isCommand(text);
    const mentioned = this.#botName.length > 0 && lower.includes(this.#botName);
    const triggered = isCommand || mentioned || facts.mentionsSelf || facts.repliesToSelf || facts.isDirect;
    const rejected = this.#filteredWords.some((pattern) => pattern.test(lower));

    const message: InboundMessage = {
      conversationId: `${facts.platform}:${chatId}`,
      platform: facts.platform,
      chatId,
      messageId,
      senderId: facts.senderId,
      senderName: facts.senderName,
      text: rejected ? REJECTION_MARKER : text,
      receivedAt,
      isCommand,
      triggered,
      rejected,
      replyTo: facts.replyTo,
      attachments: [...(event.attachments ?? [])],
    };
    return { status: 'accepted', message };
  }

  /** A command is a configured prefix directly followed by a letter (`!reset`, `/help`). */
  isCommand(text: string): boolean {
    const trimmed = text.trimStart();
    return this.#commandPrefixes.some(
      (prefix) => trimmed.startsWith(prefix) && /^\p{L}/u.test(trimmed.slice(prefix.length)),
    );
  }
}
