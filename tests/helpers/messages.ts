import type { InboundMessage } from '../../src/types/messaging.js';

/** A triggered Telegram group message; override whatever a test cares about. */
export function inbound(overrides: Partial<InboundMessage> = {}): InboundMessage {
    return {
        conversationId: 'telegram:-100',
        platform: 'telegram',
        chatId: '-100',
        messageId: '1',
        senderId: '7',
        senderName: 'alice',
        text: 'hello',
        receivedAt: 1_000,
        isCommand: false,
        triggered: true,
        rejected: false,
        attachments: [],
        ...overrides,
    };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

/** Let queued microtasks and promise callbacks run. */
export function flush(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 0));
}
