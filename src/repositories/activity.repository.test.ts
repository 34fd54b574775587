import { describe, it, expect } from 'vitest';
import { ActivityRepository, FEED_LIMIT } from './activity.repository';
import { MemoryKvCache } from '../utils/memory-kv';
import { FixedClock } from '../utils/time';

function repository() {
  return new ActivityRepository(new MemoryKvCache(), new FixedClock('2026-03-02T09:00:00.000Z'));
}

describe('ActivityRepository', () => {
  it('lists the newest entries first', async () => {
    const activity = repository();
    await activity.append('user_1', 'session_started', { sessionId: 'session_1' });
    await activity.append('user_1', 'session_ended', { sessionId: 'session_1' });

    const recent = await activity.listRecent('user_1');
    expect(recent.map(entry => entry.type)).toEqual(['session_ended', 'session_started']);
    expect(recent[0].entryId).toMatch(/^activity_/);
  });

  it('drops the oldest entries past the feed limit', async () => {
    const activity = repository();
    const batch = Array.from({ length: FEED_LIMIT }, (_, i) => ({
      type: 'break_completed' as const,
      data: { sequence: i },
    }));
    await activity.appendMany('user_1', batch);
    await activity.append('user_1', 'level_up', { level: 2 });

    const all = await activity.listRecent('user_1', FEED_LIMIT + 10);
    expect(all).toHaveLength(FEED_LIMIT);
    expect(all[0].type).toBe('level_up');
    expect(all[FEED_LIMIT - 1].data).toEqual({ sequence: 1 });
  });
});
