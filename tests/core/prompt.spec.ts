import { describe, expect, it } from 'vitest';
import { buildChatMessages, buildMemeCaptionMessages } from '../../src/core/prompt.js';
import { createEmptyContext } from '../../src/services/context-store.js';
import type { ConversationContext } from '../../src/types/context.js';
import { inbound } from '../helpers/messages.js';

function busyRoom(): ConversationContext {
  return {
    ...createEmptyContext('telegram:-100', 0),
    topics: { rust: 1, pizza: 2.5 },
    participants: {
      '7': { name: 'alice', lastSeenAt: 2 },
      '8': { name: 'bob', lastSeenAt: 1 },
    },
    history: [
      { role: 'user', senderId: '8', senderName: 'bob', text: 'pizza tonight?', timestamp: 1 },
      { role: 'assistant', senderId: 'roomwise', senderName: 'Roomwise', text: 'Always.', timestamp: 2 },
    ],
  };
}

describe('buildChatMessages', () => {
  it('puts room topics and people in the system prompt, then the history', () => {
    const messages = buildChatMessages('Be fun.', busyRoom(), inbound({ text: 'which place?' }));

    expect(messages).toEqual([
      {
        role: 'system',
        content:
          'Be fun.\n\nThe room has lately been talking about: pizza, rust.\n\nPeople in this room: alice, bob.',
      },
      { role: 'user', content: 'bob: pizza tonight?' },
      { role: 'assistant', content: 'Always.' },
      { role: 'user', content: 'alice: which place?' },
    ]);
  });

  it('appends reference material and swaps in the instruction', () => {
    const messages = buildChatMessages('Be fun.', createEmptyContext('telegram:-100', 0), inbound(), {
      reference: { label: 'Web results', content: 'one\ntwo' },
      instruction: 'Answer briefly',
    });

    expect(messages).toEqual([
      { role: 'system', content: 'Be fun.\n\nWeb results:\none\ntwo' },
      { role: 'user', content: 'alice: Answer briefly' },
    ]);
  });
});

describe('buildMemeCaptionMessages', () => {
  it('asks for two caption lines about the topic', () => {
    const messages = buildMemeCaptionMessages('mondays');
    expect(messages).toHaveLength(2);
    expect(messages[1]).toEqual({ role: 'user', content: 'Meme topic: mondays' });
  });
});
