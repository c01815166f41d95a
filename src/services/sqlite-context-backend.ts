import type { ContextBackend, ConversationContext, ConversationTurn, ParticipantInfo } from '../types/context.js';
import type { SqliteDatabase } from './db.js';

interface ContextRow {
  payload: string;
}

interface KeyRow {
  conversation_id: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isContextRow(value: unknown): value is ContextRow {
  return isRecord(value) && typeof value.payload === 'string';
}

function isKeyRow(value: unknown): value is KeyRow {
  return isRecord(value) && typeof value.conversation_id === 'string';
}

function parseTurn(value: unknown): ConversationTurn | null {
  if (!isRecord(value)) return null;
  const { role, senderId, senderName, text, timestamp } = value;
  if ((role !== 'user' && role !== 'assistant') || typeof senderId !== 'string' || typeof senderName !== 'string') {
    return null;
  }
  if (typeof text !== 'string' || typeof timestamp !== 'number') return null;
  return { role, senderId, senderName, text, timestamp };
}

function parseParticipant(value: unknown): ParticipantInfo | null {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.lastSeenAt !== 'number') return null;
  return { name: value.name, lastSeenAt: value.lastSeenAt };
}

/** Rebuild a context from its stored JSON; malformed rows are rejected. */
export function parseStoredContext(payload: string): ConversationContext {
  const raw: unknown = JSON.parse(payload);
  if (!isRecord(raw) || typeof raw.conversationId !== 'string') {
    throw new Error('Stored context is not an object with a conversationId.');
  }

  const history = Array.isArray(raw.history)
    ? raw.history.map(parseTurn).filter((turn): turn is ConversationTurn => turn !== null)
    : [];

  const topics: Record<string, number> = {};
  if (isRecord(raw.topics)) {
    for (const [topic, score] of Object.entries(raw.topics)) {
      if (typeof score === 'number' && Number.isFinite(score)) topics[topic] = score;
    }
  }

  const participants: Record<string, ParticipantInfo> = {};
  if (isRecord(raw.participants)) {
    for (const [senderId, entry] of Object.entries(raw.participants)) {
      const participant = parseParticipant(entry);
      if (participant) participants[senderId] = participant;
    }
  }

  const numberOr = (value: unknown, fallback: number): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : fallback;

  return {
    conversationId: raw.conversationId,
    history,
    topics,
    participants,
    messageCount: numberOr(raw.messageCount, history.length),
    lastResetAt: typeof raw.lastResetAt === 'number' ? raw.lastResetAt : null,
    createdAt: numberOr(raw.createdAt, 0),
    lastActivityAt: numberOr(raw.lastActivityAt, 0),
  };
}

/** Persists contexts as JSON rows so rooms survive a restart. */
export class SqliteContextBackend implements ContextBackend {
  readonly #db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.#db = db;
  }

  async get(conversationId: string): Promise<ConversationContext | undefined> {
    const row: unknown = this.#db
      .prepare('SELECT payload FROM conversation_contexts WHERE conversation_id = ?')
      .get(conversationId);
    return isContextRow(row) ? parseStoredContext(row.payload) : undefined;
  }

  async set(context: ConversationContext): Promise<void> {
    this.#db
      .prepare(`
        INSERT INTO conversation_contexts (conversation_id, payload, last_activity_at)
        VALUES (?, ?, ?)
        ON CONFLICT(conversation_id) DO UPDATE SET
          payload = excluded.payload,
          last_activity_at = excluded.last_activity_at
      `)
      .run(context.conversationId, JSON.stringify(context), context.lastActivityAt);
  }

  async delete(conversationId: string): Promise<void> {
    this.#db.prepare('DELETE FROM conversation_contexts WHERE conversation_id = ?').run(conversationId);
  }

  async keys(): Promise<string[]> {
    const rows: unknown[] = this.#db.prepare('SELECT conversation_id FROM conversation_contexts').all();
    return rows.filter(isKeyRow).map((row) => row.conversation_id);
  }
}
