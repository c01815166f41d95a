import type { ChatMessage } from '../services/llm-client.js';
import { topTopics } from '../services/context-store.js';
import type { ConversationContext } from '../types/context.js';
import type { InboundMessage } from '../types/messaging.js';

export interface PromptExtras {
  /** Extra material appended to the system prompt, e.g. web results or page text. */
  reference?: { label: string; content: string };
  /** Replaces the user's text as the final prompt line. */
  instruction?: string;
}

function systemPrompt(personality: string, context: Readonly<ConversationContext>, extras: PromptExtras): string {
  const sections = [personality];

  const topics = topTopics(context, 5).map((entry) => entry.topic);
  if (topics.length > 0) {
    sections.push(`The room has lately been talking about: ${topics.join(', ')}.`);
  }

  const people = Object.values(context.participants).map((participant) => participant.name);
  if (people.length > 0) {
    sections.push(`People in this room: ${people.join(', ')}.`);
  }

  if (extras.reference) {
    sections.push(`${extras.reference.label}:\n${extras.reference.content}`);
  }
  return sections.join('\n\n');
}

/**
 * System prompt, then the room's recent turns, then the new message. User
 * turns carry the sender's name so the model can tell people apart.
 */
export function buildChatMessages(
  personality: string,
  context: Readonly<ConversationContext>,
  message: InboundMessage,
  extras: PromptExtras = {},
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt(personality, context, extras) }];

  for (const turn of context.history) {
    messages.push(
      turn.role === 'user'
        ? { role: 'user', content: `${turn.senderName}: ${turn.text}` }
        : { role: 'assistant', content: turn.text },
    );
  }

  messages.push({ role: 'user', content: `${message.senderName}: ${extras.instruction ?? message.text}` });
  return messages;
}

export function buildMemeCaptionMessages(topic: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You write captions for image memes. Reply with exactly two short lines: the top text, then the bottom text. ' +
        'No numbering, no quotes, no explanations.',
    },
    { role: 'user', content: `Meme topic: ${topic}` },
  ];
}
