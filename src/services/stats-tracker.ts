import type { IntentKind } from '../types/intent.js';
import type { SqliteDatabase } from './db.js';

type CounterCategory = 'messages' | 'room' | 'command' | 'feature';

export interface NamedCount {
  name: string;
  count: number;
}

export interface StatsSnapshot {
  received: number;
  sent: number;
  dropped: number;
  rooms: number;
  topRooms: NamedCount[];
  commands: NamedCount[];
  features: NamedCount[];
  startedAt: number;
  uptimeMs: number;
}

interface CounterRow {
  category: string;
  name: string;
  count: number;
}

function isCounterRow(value: unknown): value is CounterRow {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'category' in value &&
    typeof value.category === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'count' in value &&
    typeof value.count === 'number'
  );
}

const COMMAND_INTENTS: ReadonlySet<IntentKind> = new Set([
  'reset',
  'summary',
  'help',
  'stats',
  'meme',
  'search',
  'stock',
  'clock',
]);

/** Usage counters persisted in SQLite; uptime is per process. */
export class StatsTracker {
  readonly #db: SqliteDatabase;
  readonly #now: () => number;
  readonly #startedAt: number;

  constructor(db: SqliteDatabase, now: () => number = Date.now) {
    this.#db = db;
    this.#now = now;
    this.#startedAt = now();
  }

  recordReceived(conversationId: string): void {
    this.#increment('messages', 'received');
    this.#increment('room', conversationId);
  }

  recordSent(): void {
    this.#increment('messages', 'sent');
  }

  recordDropped(): void {
    this.#increment('messages', 'dropped');
  }

  /** Count the handled intent as a feature use, and as a command where it is one. */
  recordIntent(kind: IntentKind): void {
    this.#increment('feature', kind);
    if (COMMAND_INTENTS.has(kind)) this.#increment('command', kind);
  }

  snapshot(limit = 5): StatsSnapshot {
    const rows: unknown[] = this.#db.prepare('SELECT category, name, count FROM stats_counters').all();
    const counters = rows.filter(isCounterRow);

    const byCategory = (category: CounterCategory): NamedCount[] =>
      counters
        .filter((row) => row.category === category)
        .map((row) => ({ name: row.name, count: row.count }))
        .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));
    const message = (name: string): number =>
      counters.find((row) => row.category === 'messages' && row.name === name)?.count ?? 0;

    const rooms = byCategory('room');
    const now = this.#now();
    return {
      received: message('received'),
      sent: message('sent'),
      dropped: message('dropped'),
      rooms: rooms.length,
      topRooms: rooms.slice(0, limit),
      commands: byCategory('command'),
      features: byCategory('feature'),
      startedAt: this.#startedAt,
      uptimeMs: now - this.#startedAt,
    };
  }

  #increment(category: CounterCategory, name: string): void {
    this.#db
      .prepare(`
        INSERT INTO stats_counters (category, name, count, updated_at)
        VALUES (?, ?, 1, ?)
        ON CONFLICT(category, name) DO UPDATE SET
          count = count + 1,
          updated_at = excluded.updated_at
      `)
      .run(category, name, this.#now());
  }
}
