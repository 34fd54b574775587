// src/repositories/break.repository.ts
import { BaseRepository } from './base';
import { BreakRecord } from '../models/break.model';
import { NotFoundError } from '../utils/errors';

// Breaks:
// ├── break:{breakId}
// ├── interval_breaks:{intervalId}:{breakId}
// ├── session_breaks:{sessionId}:{breakId}
// └── user_breaks:{userId}:{startedAt}:{breakId}

export class BreakRepository extends BaseRepository {
  private readonly BREAK_PREFIX = 'break:';
  private readonly INTERVAL_BREAKS_PREFIX = 'interval_breaks:';
  private readonly SESSION_BREAKS_PREFIX = 'session_breaks:';
  private readonly USER_BREAKS_PREFIX = 'user_breaks:';

  newBreakId(): string {
    return this.generateId('break');
  }

  async create(record: BreakRecord): Promise<BreakRecord> {
    await this.kv.setJSON(`${this.BREAK_PREFIX}${record.breakId}`, record);
    await this.kv.put(`${this.INTERVAL_BREAKS_PREFIX}${record.intervalId}:${record.breakId}`, record.breakId);
    await this.kv.put(`${this.SESSION_BREAKS_PREFIX}${record.sessionId}:${record.breakId}`, record.breakId);
    await this.kv.put(
      `${this.USER_BREAKS_PREFIX}${record.userId}:${record.startedAt}:${record.breakId}`,
      record.breakId
    );
    return record;
  }

  async save(record: BreakRecord): Promise<BreakRecord> {
    await this.kv.setJSON(`${this.BREAK_PREFIX}${record.breakId}`, record);
    return record;
  }

  /**
   * Get a break that belongs to the user
   */
  async getOwned(userId: string, breakId: string): Promise<BreakRecord> {
    const record = await this.kv.getJSON<BreakRecord>(`${this.BREAK_PREFIX}${breakId}`);
    if (!record || record.userId !== userId) {
      throw new NotFoundError('Break not found', 'BREAK_NOT_FOUND');
    }
    return record;
  }

  async listByInterval(intervalId: string): Promise<BreakRecord[]> {
    return this.listByIndex(`${this.INTERVAL_BREAKS_PREFIX}${intervalId}:`);
  }

  async listBySession(sessionId: string): Promise<BreakRecord[]> {
    return this.listByIndex(`${this.SESSION_BREAKS_PREFIX}${sessionId}:`);
  }

  /**
   * All of a user's breaks, oldest first
   */
  async listByUser(userId: string): Promise<BreakRecord[]> {
    const records = await this.listByIndex(`${this.USER_BREAKS_PREFIX}${userId}:`);
    return records.sort((a, b) => a.startedAt.localeCompare(b.startedAt));
  }

  private async listByIndex(prefix: string): Promise<BreakRecord[]> {
    const keys = await this.kv.listKeys(prefix);
    const ids = keys.map(key => key.split(':').pop() || '');
    const records = await this.kv.getMany<BreakRecord>(ids.map(id => `${this.BREAK_PREFIX}${id}`));
    return records.filter((r): r is BreakRecord => r !== null);
  }
}
