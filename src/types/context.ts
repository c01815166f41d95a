export type TurnRole = 'user' | 'assistant';

/** One sender + text + timestamp unit in a conversation's history. */
export interface ConversationTurn {
  role: TurnRole;
  senderId: string;
  senderName: string;
  text: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface ParticipantInfo {
  name: string;
  lastSeenAt: number;
}

export interface ConversationContext {
  conversationId: string;
  /** Oldest first. Never longer than the configured history limit. */
  history: ConversationTurn[];
  /** Keyword → recency-weighted score. */
  topics: Record<string, number>;
  participants: Record<string, ParticipantInfo>;
  /** Turns appended since the last reset (not capped by the history window). */
  messageCount: number;
  lastResetAt: number | null;
  createdAt: number;
  lastActivityAt: number;
}

export interface TopicScore {
  topic: string;
  score: number;
}

export interface ContextSummary {
  conversationId: string;
  topTopics: TopicScore[];
  participants: string[];
  messageCount: number;
  oldestAt: number | null;
  newestAt: number | null;
  lastResetAt: number | null;
}

/**
 * Storage seam for conversation contexts. Implementations may live outside
 * the process; any failure must reject so the store can report it as
 * StoreUnavailable.
 */
export interface ContextBackend {
  get(conversationId: string): Promise<ConversationContext | undefined>;
  set(context: ConversationContext): Promise<void>;
  delete(conversationId: string): Promise<void>;
  keys(): Promise<string[]>;
}
