// src/repositories/activity.repository.ts
import { BaseRepository } from './base';
import { ActivityFeedEntry, ActivityType } from '../models/activity.model';

export type NewActivity = Pick<ActivityFeedEntry, 'type' | 'data'>;

// Feeds keep the newest FEED_LIMIT entries
export const FEED_LIMIT = 200;

export class ActivityRepository extends BaseRepository {
  private readonly FEED_PREFIX = 'activity_feed:';

  async append(userId: string, type: ActivityType, data: ActivityFeedEntry['data']): Promise<ActivityFeedEntry> {
    const [entry] = await this.appendMany(userId, [{ type, data }]);
    return entry;
  }

  /**
   * Append several entries in one write
   */
  async appendMany(userId: string, activities: NewActivity[]): Promise<ActivityFeedEntry[]> {
    const createdAt = this.now();
    const entries = activities.map(activity => ({
      entryId: this.generateId('activity'),
      userId,
      type: activity.type,
      data: activity.data,
      createdAt,
    }));
    await this.kv.appendToList(`${this.FEED_PREFIX}${userId}`, entries, FEED_LIMIT);
    return entries;
  }

  /**
   * Most recent entries first
   */
  async listRecent(userId: string, limit = 20): Promise<ActivityFeedEntry[]> {
    const entries = await this.kv.getList<ActivityFeedEntry>(`${this.FEED_PREFIX}${userId}`);
    return entries.slice(-limit).reverse();
  }
}
