import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { StatsTracker } from '../../src/services/stats-tracker.js';

describe('StatsTracker', () => {
  let db: SqliteDatabase;
  let now: number;
  let stats: StatsTracker;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = 1_000;
    stats = new StatsTracker(db, () => now);
  });

  afterEach(() => {
    db.close();
  });

  it('starts empty', () => {
    expect(stats.snapshot()).toEqual({
      received: 0,
      sent: 0,
      dropped: 0,
      rooms: 0,
      topRooms: [],
      commands: [],
      features: [],
      startedAt: 1_000,
      uptimeMs: 0,
    });
  });

  it('counts messages per room and overall', () => {
    stats.recordReceived('telegram:-100');
    stats.recordReceived('discord:42');
    stats.recordReceived('telegram:-100');
    stats.recordSent();
    stats.recordDropped();
    now = 61_000;

    const snapshot = stats.snapshot();
    expect(snapshot.received).toBe(3);
    expect(snapshot.sent).toBe(1);
    expect(snapshot.dropped).toBe(1);
    expect(snapshot.rooms).toBe(2);
    expect(snapshot.topRooms).toEqual([
      { name: 'telegram:-100', count: 2 },
      { name: 'discord:42', count: 1 },
    ]);
    expect(snapshot.uptimeMs).toBe(60_000);
  });

  it('counts command intents separately from features', () => {
    stats.recordIntent('price');
    stats.recordIntent('help');
    stats.recordIntent('chat');
    stats.recordIntent('price');

    const snapshot = stats.snapshot();
    expect(snapshot.features).toEqual([
      { name: 'price', count: 2 },
      { name: 'chat', count: 1 },
      { name: 'help', count: 1 },
    ]);
    expect(snapshot.commands).toEqual([{ name: 'help', count: 1 }]);
  });

  it('limits the room list but still counts every room', () => {
    for (const room of ['a', 'b', 'c']) stats.recordReceived(room);

    const snapshot = stats.snapshot(2);
    expect(snapshot.rooms).toBe(3);
    expect(snapshot.topRooms.map((room) => room.name)).toEqual(['a', 'b']);
  });

  it('persists counters across tracker instances', () => {
    stats.recordSent();
    const reopened = new StatsTracker(db, () => now);
    expect(reopened.snapshot().sent).toBe(1);
  });
});
