/** Supported messaging platforms. Twilio-bridged channels share one adapter. */
export type Platform = 'telegram' | 'discord' | 'whatsapp' | 'messenger' | 'instagram';

/** Reference to the message an inbound message replies to. */
export interface ReplyReference {
  messageId: string;
  /** Text of the replied-to message, when the platform delivers it. */
  text?: string;
}

/** A normalized inbound message from any supported platform. */
export type InboundMessage = Readonly<{
  /** Composite key `<platform>:<chatId>`; one conversation per room/chat/DM. */
  conversationId: string;
  platform: Platform;
  /** The destination chat/channel ID used for reply routing. */
  chatId: string;
  messageId: string;
  senderId: string;
  senderName: string;
  text: string;
  /** Epoch milliseconds. */
  receivedAt: number;
  isCommand: boolean;
  /** True when the bot was addressed (name, reply, command prefix or DM). */
  triggered: boolean;
  /** True when content filtering replaced `text` with the rejection marker. */
  rejected: boolean;
  replyTo?: ReplyReference;
  attachments: readonly string[];
}>;

export type TrendHint = 'gain' | 'loss' | 'flat';

export interface FormatHints {
  markdown?: boolean;
  codeBlock?: boolean;
  /** Emoji the adapter may attach as a reaction to the inbound message. */
  reaction?: string;
  trend?: TrendHint;
}

/** A normalized outbound response to be sent back to the originating platform. */
export interface OutboundMessage {
  conversationId: string;
  platform: Platform;
  chatId: string;
  text: string;
  formatHints: FormatHints;
  inReplyTo?: string;
  /** Image URLs (rendered memes). */
  attachments: string[];
}

// ── Platform events ───────────────────────────────────────────────────────────
// Adapters translate SDK payloads into one of these shapes; the normalizer
// never inspects SDK objects.

interface PlatformEventBase {
  chatId: string | number;
  messageId: string | number;
  /** Epoch milliseconds as reported by the platform. */
  timestamp: number;
  text?: unknown;
  attachments?: string[];
}

export interface TelegramEvent extends PlatformEventBase {
  platform: 'telegram';
  chatType: 'private' | 'group' | 'supergroup' | 'channel';
  from?: {
    id: number | string;
    username?: string;
    firstName?: string;
    isBot: boolean;
    /** Sender id equals the bot's own user id. */
    isSelf?: boolean;
  };
  replyTo?: {
    messageId: number | string;
    fromSelf: boolean;
    text?: string;
  };
}

export interface DiscordEvent extends PlatformEventBase {
  platform: 'discord';
  isDirect: boolean;
  author?: {
    id: string;
    displayName: string;
    isBot: boolean;
    isSelf: boolean;
  };
  mentionsSelf: boolean;
  replyTo?: {
    messageId: string;
    fromSelf: boolean;
    text?: string;
  };
}

/** Twilio webhook payloads for WhatsApp, Messenger and Instagram. */
export interface TwilioEvent extends PlatformEventBase {
  platform: 'twilio';
  channel: 'whatsapp' | 'messenger' | 'instagram';
  from?: string;
  profileName?: string;
  /** Sent from one of the bot's own Twilio addresses. */
  fromSelf?: boolean;
}

export type PlatformEvent = TelegramEvent | DiscordEvent | TwilioEvent;

export type IgnoreReason = 'self' | 'bot' | 'known-bot' | 'empty';

export type NormalizeResult =
  | { status: 'accepted'; message: InboundMessage }
  | { status: 'ignored'; reason: IgnoreReason };

/**
 * Runs one platform call of a reply (a text chunk, a photo). The dispatcher
 * supplies one that retries the call, so a failure part way through a
 * multi-part reply never repeats the parts already delivered.
 */
export type DeliveryStep = <T>(label: string, step: () => Promise<T>) => Promise<T>;

/** The inbound message a reaction is attached to. */
export interface ReactionTarget {
  platform: Platform;
  chatId: string;
  messageId: string;
}

/**
 * Contract implemented by every platform adapter. The interface dispatcher
 * assigns `onEvent` and later hands replies back through `send`, which runs
 * each platform call through `attempt` (once each when omitted).
 */
export interface MessagingAdapter {
  readonly platforms: readonly Platform[];
  onEvent?: (event: PlatformEvent) => Promise<void>;
  start(): Promise<void>;
  send(message: OutboundMessage, attempt?: DeliveryStep): Promise<void>;
  /** Platforms without emoji reactions leave this out. */
  react?(target: ReactionTarget, emoji: string): Promise<void>;
  stop(): Promise<void>;
}

/** Default step runner: one try, errors propagate. */
export const sendOnce: DeliveryStep = (_label, step) => step();
