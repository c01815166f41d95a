import { describe, expect, it, vi } from 'vitest';
import { ConversationScheduler } from '../../src/services/conversation-scheduler.js';
import { QueueOverflowError } from '../../src/types/errors.js';
import type { InboundMessage } from '../../src/types/messaging.js';
import { deferred, flush, inbound } from '../helpers/messages.js';

function msg(conversationId: string, messageId: string): InboundMessage {
    return inbound({ conversationId, messageId });
}

describe('ConversationScheduler', () => {
    it('drops exactly one message when a burst exceeds the queue by one', async () => {
        const handled: string[] = [];
        const onDrop = vi.fn();
        const scheduler = new ConversationScheduler(
            async (message) => {
                handled.push(message.messageId);
            },
            { maxQueueSize: 5, onDrop },
        );

        const outcomes = ['1', '2', '3', '4', '5', '6'].map((id) => scheduler.enqueue('room', msg('room', id)));
        await scheduler.onIdle();

        expect(outcomes).toEqual(['accepted', 'accepted', 'accepted', 'accepted', 'accepted', 'dropped']);
        expect(handled).toEqual(['1', '2', '3', '4', '5']);
        expect(onDrop).toHaveBeenCalledTimes(1);
        const [error, dropped] = onDrop.mock.calls[0] ?? [];
        expect(error).toBeInstanceOf(QueueOverflowError);
        expect(dropped).toMatchObject({ messageId: '6' });
    });

    it('does not count the message being processed against capacity', async () => {
        const gate = deferred();
        const scheduler = new ConversationScheduler(() => gate.promise, { maxQueueSize: 2 });

        expect(scheduler.enqueue('room', msg('room', '1'))).toBe('accepted');
        await flush();
        expect(scheduler.activeCount).toBe(1);

        expect(scheduler.enqueue('room', msg('room', '2'))).toBe('accepted');
        expect(scheduler.enqueue('room', msg('room', '3'))).toBe('accepted');
        expect(scheduler.enqueue('room', msg('room', '4'))).toBe('dropped');
        expect(scheduler.queueLength('room')).toBe(2);

        gate.resolve();
        await scheduler.onIdle();
    });

    it('processes one conversation strictly in order while others run in parallel', async () => {
        const events: string[] = [];
        const gates = new Map([
            ['a1', deferred()],
            ['b1', deferred()],
        ]);
        const scheduler = new ConversationScheduler(
            async (message) => {
                events.push(`start ${message.messageId}`);
                await gates.get(message.messageId)?.promise;
                events.push(`end ${message.messageId}`);
            },
            { maxConcurrentWorkers: 4 },
        );

        scheduler.enqueue('a', msg('a', 'a1'));
        scheduler.enqueue('a', msg('a', 'a2'));
        scheduler.enqueue('b', msg('b', 'b1'));
        await flush();

        expect(events).toEqual(['start a1', 'start b1']);

        gates.get('b1')?.resolve();
        await flush();
        expect(events).toEqual(['start a1', 'start b1', 'end b1']);

        gates.get('a1')?.resolve();
        await scheduler.onIdle();
        expect(events).toEqual(['start a1', 'start b1', 'end b1', 'end a1', 'start a2', 'end a2']);
    });

    it('caps workers globally and hands freed slots to waiting conversations', async () => {
        const gates = new Map(['a', 'b', 'c'].map((id) => [id, deferred()]));
        const started: string[] = [];
        const scheduler = new ConversationScheduler(
            async (message) => {
                started.push(message.conversationId);
                await gates.get(message.conversationId)?.promise;
            },
            { maxConcurrentWorkers: 2 },
        );

        for (const id of ['a', 'b', 'c']) scheduler.enqueue(id, msg(id, `${id}1`));
        await flush();
        expect(started).toEqual(['a', 'b']);
        expect(scheduler.activeCount).toBe(2);
        expect(scheduler.pendingCount).toBe(1);

        gates.get('a')?.resolve();
        await flush();
        expect(started).toEqual(['a', 'b', 'c']);

        gates.get('b')?.resolve();
        gates.get('c')?.resolve();
        await scheduler.onIdle();
        expect(scheduler.activeCount).toBe(0);
    });

    it('keeps draining a conversation after its handler throws', async () => {
        const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const handled: string[] = [];
        const scheduler = new ConversationScheduler(async (message) => {
            handled.push(message.messageId);
            if (message.messageId === '1') throw new Error('boom');
        });

        scheduler.enqueue('room', msg('room', '1'));
        scheduler.enqueue('room', msg('room', '2'));
        await scheduler.onIdle();

        expect(handled).toEqual(['1', '2']);
        expect(errors).toHaveBeenCalledWith('[ConversationScheduler] Handler failed for room:', 'boom');
        errors.mockRestore();
    });

    it('discards pending work on stop and refuses new messages', async () => {
        const gate = deferred();
        const handled: string[] = [];
        const onDrop = vi.fn();
        const scheduler = new ConversationScheduler(
            async (message) => {
                handled.push(message.messageId);
                await gate.promise;
            },
            { onDrop },
        );

        scheduler.enqueue('room', msg('room', '1'));
        scheduler.enqueue('room', msg('room', '2'));
        await flush();

        const stopped = scheduler.stop();
        gate.resolve();
        await stopped;

        expect(handled).toEqual(['1']);
        expect(scheduler.enqueue('room', msg('room', '3'))).toBe('dropped');
        expect(onDrop).toHaveBeenCalledTimes(1);
    });
});
