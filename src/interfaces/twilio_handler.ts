import express, { type Request, type Response, type Router } from 'express';
import {
    sendOnce,
    type DeliveryStep,
    type MessagingAdapter,
    type OutboundMessage,
    type Platform,
    type PlatformEvent,
    type TwilioEvent,
} from '../types/messaging.js';
import { fetchText, isRecord } from '../utils/http.js';
import { logThought } from '../utils/logger.js';
import { splitMessage } from '../utils/message-split.js';

/** Twilio's limit for one message body. */
export const TWILIO_MAX_CHARS = 1600;

export const TWILIO_WEBHOOK_PATH = '/webhooks/twilio';

const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response></Response>';

type TwilioChannel = TwilioEvent['channel'];

const CHANNELS: readonly TwilioChannel[] = ['whatsapp', 'messenger', 'instagram'];

export interface TwilioAdapterOptions {
    accountSid: string;
    authToken: string;
    /** Sender number for WhatsApp, e.g. `+14155238886`. */
    whatsappNumber?: string;
    messengerPageId?: string;
    instagramAccountId?: string;
    /** @default 'https://api.twilio.com/2010-04-01' */
    apiUrl?: string;
    now?: () => number;
}

/** `whatsapp:+1555…` → `whatsapp`. Plain SMS numbers have no channel prefix. */
export function channelOf(address: string): TwilioChannel | null {
    const prefix = address.split(':', 1)[0]?.toLowerCase();
    return CHANNELS.find((channel) => channel === prefix) ?? null;
}

function field(body: Record<string, unknown>, name: string): string | undefined {
    const value = body[name];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Build an event from a Twilio inbound-message webhook form. */
export function toTwilioEvent(
    body: Record<string, unknown>,
    channel: TwilioChannel,
    receivedAt: number,
    ownAddresses: readonly string[] = [],
): TwilioEvent {
    const from = field(body, 'From');
    const mediaCount = Number(field(body, 'NumMedia') ?? '0');
    const attachments: string[] = [];
    for (let index = 0; index < (Number.isInteger(mediaCount) ? mediaCount : 0); index++) {
        const url = field(body, `MediaUrl${index}`);
        if (url) attachments.push(url);
    }

    return {
        platform: 'twilio',
        channel,
        chatId: from ?? '',
        messageId: field(body, 'MessageSid') ?? '',
        timestamp: receivedAt,
        text: field(body, 'Body') ?? '',
        from,
        profileName: field(body, 'ProfileName'),
        fromSelf: from !== undefined && ownAddresses.some((address) => address.toLowerCase() === from.toLowerCase()),
        attachments,
    };
}

/**
 * WhatsApp, Messenger and Instagram through Twilio. Inbound messages arrive
 * on an express router the host mounts; replies go out through the Twilio
 * REST API rather than the webhook response, so slow replies never hold the
 * webhook open.
 */
export class TwilioAdapter implements MessagingAdapter {
    readonly platforms: readonly Platform[];
    readonly router: Router;
    readonly #accountSid: string;
    readonly #authToken: string;
    readonly #senders: Partial<Record<TwilioChannel, string>>;
    readonly #apiUrl: string;
    readonly #now: () => number;

    onEvent?: (event: PlatformEvent) => Promise<void>;

    constructor(options: TwilioAdapterOptions) {
        this.#accountSid = options.accountSid;
        this.#authToken = options.authToken;
        this.#apiUrl = (options.apiUrl ?? 'https://api.twilio.com/2010-04-01').replace(/\/+$/, '');
        this.#now = options.now ?? Date.now;

        const senders: Partial<Record<TwilioChannel, string>> = {};
        if (options.whatsappNumber) senders.whatsapp = `whatsapp:${options.whatsappNumber}`;
        if (options.messengerPageId) senders.messenger = `messenger:${options.messengerPageId}`;
        if (options.instagramAccountId) senders.instagram = `instagram:${options.instagramAccountId}`;
        this.#senders = senders;
        this.platforms = CHANNELS.filter((channel) => senders[channel] !== undefined);

        this.router = express.Router();
        this.router.post(TWILIO_WEBHOOK_PATH, express.urlencoded({ extended: false }), (req, res) => {
            this.#handleWebhook(req, res);
        });
    }

    /** The host's HTTP server owns the listener; nothing to open here. */
    async start(): Promise<void> {
        console.log(`[TwilioAdapter] Accepting ${this.platforms.join(', ') || 'no channels'} on ${TWILIO_WEBHOOK_PATH}.`);
    }

    async stop(): Promise<void> {
        console.log('[TwilioAdapter] Stopped.');
    }

    async send(message: OutboundMessage, attempt: DeliveryStep = sendOnce): Promise<void> {
        const channel = channelOf(message.chatId);
        const sender = channel ? this.#senders[channel] : undefined;
        if (!sender) {
            throw new Error(`No Twilio sender configured for ${message.chatId}`);
        }

        const chunks = splitMessage(message.text, TWILIO_MAX_CHARS);
        for (const [index, chunk] of chunks.entries()) {
            const form = new URLSearchParams({ From: sender, To: message.chatId, Body: chunk });
            if (index === 0) {
                for (const url of message.attachments) form.append('MediaUrl', url);
            }
            await attempt(`chunk ${index + 1}/${chunks.length}`, () =>
                fetchText(`${this.#apiUrl}/Accounts/${encodeURIComponent(this.#accountSid)}/Messages.json`, {
                    method: 'POST',
                    headers: {
                        Authorization: `Basic ${Buffer.from(`${this.#accountSid}:${this.#authToken}`).toString('base64')}`,
                    },
                    body: form,
                }),
            );
        }
    }

    #handleWebhook(req: Request, res: Response): void {
        const body: unknown = req.body;
        const from = isRecord(body) ? field(body, 'From') : undefined;
        const channel = from ? channelOf(from) : null;

        if (!isRecord(body) || !channel) {
            void logThought(`[TwilioAdapter] Ignored webhook from unsupported address ${from ?? '(none)'}.`);
        } else {
            void this.#forward(toTwilioEvent(body, channel, this.#now(), this.#ownAddresses()));
        }
        res.type('text/xml').send(EMPTY_TWIML);
    }

    #ownAddresses(): string[] {
        return Object.values(this.#senders).filter((address): address is string => address !== undefined);
    }

    async #forward(event: TwilioEvent): Promise<void> {
        try {
            await this.onEvent?.(event);
        } catch (err) {
            console.error('[TwilioAdapter] Failed to hand off message:', err instanceof Error ? err.message : String(err));
        }
    }
}
