import { afterEach, describe, expect, it, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
    TWILIO_WEBHOOK_PATH,
    TwilioAdapter,
    channelOf,
    toTwilioEvent,
} from '../../src/interfaces/twilio_handler.js';
import type { OutboundMessage, PlatformEvent } from '../../src/types/messaging.js';

const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response></Response>';

function createAdapter(): TwilioAdapter {
    return new TwilioAdapter({
        accountSid: 'AC123',
        authToken: 'test-token',
        whatsappNumber: '+14155550100',
        instagramAccountId: '1784',
        now: () => 42_000,
    });
}

function outbound(chatId: string, text: string, attachments: string[] = []): OutboundMessage {
    return {
        conversationId: `whatsapp:${chatId}`,
        platform: 'whatsapp',
        chatId,
        text,
        formatHints: {},
        attachments,
    };
}

describe('channelOf', () => {
    it('reads the channel prefix of a Twilio address', () => {
        expect(channelOf('whatsapp:+15551234567')).toBe('whatsapp');
        expect(channelOf('Messenger:12345')).toBe('messenger');
        expect(channelOf('+15551234567')).toBeNull();
    });
});

describe('toTwilioEvent', () => {
    it('collects media URLs up to NumMedia', () => {
        const event = toTwilioEvent(
            {
                From: 'whatsapp:+15551234567',
                Body: 'look',
                MessageSid: 'SM1',
                NumMedia: '2',
                MediaUrl0: 'https://media.test/0.jpg',
                MediaUrl1: 'https://media.test/1.jpg',
                MediaUrl2: 'https://media.test/ignored.jpg',
            },
            'whatsapp',
            7,
        );

        expect(event).toEqual({
            platform: 'twilio',
            channel: 'whatsapp',
            chatId: 'whatsapp:+15551234567',
            messageId: 'SM1',
            timestamp: 7,
            text: 'look',
            from: 'whatsapp:+15551234567',
            profileName: undefined,
            fromSelf: false,
            attachments: ['https://media.test/0.jpg', 'https://media.test/1.jpg'],
        });
    });
});

describe('toTwilioEvent self detection', () => {
    it('marks messages sent from the bot\'s own address', () => {
        const body = { From: 'whatsapp:+14155550100', Body: 'echo', MessageSid: 'SM3' };
        expect(toTwilioEvent(body, 'whatsapp', 1, ['whatsapp:+14155550100']).fromSelf).toBe(true);
        expect(toTwilioEvent(body, 'whatsapp', 1, ['instagram:1784']).fromSelf).toBe(false);
    });
});

describe('TwilioAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('serves only channels with a configured sender', () => {
        expect(createAdapter().platforms).toEqual(['whatsapp', 'instagram']);
    });

    it('hands webhook messages to the dispatcher and answers with empty TwiML', async () => {
        const adapter = createAdapter();
        const events: PlatformEvent[] = [];
        adapter.onEvent = async (event) => {
            events.push(event);
        };
        const app = express().use(adapter.router);

        const res = await request(app)
            .post(TWILIO_WEBHOOK_PATH)
            .type('form')
            .send({ From: 'whatsapp:+15551234567', Body: 'hello', MessageSid: 'SM9', ProfileName: 'Alice', NumMedia: '0' });

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toContain('text/xml');
        expect(res.text).toBe(EMPTY_TWIML);
        expect(events).toEqual([
            {
                platform: 'twilio',
                channel: 'whatsapp',
                chatId: 'whatsapp:+15551234567',
                messageId: 'SM9',
                timestamp: 42_000,
                text: 'hello',
                from: 'whatsapp:+15551234567',
                profileName: 'Alice',
                fromSelf: false,
                attachments: [],
            },
        ]);
    });

    it('acknowledges but ignores plain SMS senders', async () => {
        const adapter = createAdapter();
        const onEvent = vi.fn(async () => undefined);
        adapter.onEvent = onEvent;

        const res = await request(express().use(adapter.router))
            .post(TWILIO_WEBHOOK_PATH)
            .type('form')
            .send({ From: '+15551234567', Body: 'hello' });

        expect(res.status).toBe(200);
        expect(res.text).toBe(EMPTY_TWIML);
        expect(onEvent).not.toHaveBeenCalled();
    });

    it('sends replies through the Messages API with the media on the first message', async () => {
        const calls: Array<{ url: string; headers: Record<string, string>; body: URLSearchParams }> = [];
        vi.stubGlobal(
            'fetch',
            vi.fn(async (url: string, init: { headers?: Record<string, string>; body?: URLSearchParams } = {}) => {
                calls.push({ url, headers: init.headers ?? {}, body: init.body ?? new URLSearchParams() });
                return new Response('{"sid":"SM2"}', { status: 201 });
            }),
        );

        await createAdapter().send(outbound('whatsapp:+15551234567', 'here you go', ['https://memes.test/1.jpg']));

        expect(calls).toHaveLength(1);
        expect(calls[0]?.url).toBe('https://api.twilio.com/2010-04-01/Accounts/AC123/Messages.json');
        expect(calls[0]?.headers.Authorization).toBe(`Basic ${Buffer.from('AC123:test-token').toString('base64')}`);
        const form = calls[0]?.body;
        expect(form ? Object.fromEntries(form) : {}).toEqual({
            From: 'whatsapp:+14155550100',
            To: 'whatsapp:+15551234567',
            Body: 'here you go',
            MediaUrl: 'https://memes.test/1.jpg',
        });
    });

    it('refuses channels it has no sender for', async () => {
        await expect(createAdapter().send(outbound('messenger:999', 'hi'))).rejects.toThrow(
            'No Twilio sender configured for messenger:999',
        );
    });
});
