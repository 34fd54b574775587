// src/repositories/session.repository.ts
import { BaseRepository } from './base';
import { Session, Interval } from '../models/session.model';
import { NotFoundError } from '../utils/errors';

// Sessions:
// ├── session:{sessionId}
// ├── user_sessions:{userId}:{startedAt}:{sessionId}
// ├── active_session:{userId}            -> sessionId
// ├── interval:{intervalId}
// └── session_intervals:{sessionId}:{sequence}  -> intervalId

export class SessionRepository extends BaseRepository {
  private readonly SESSION_PREFIX = 'session:';
  private readonly USER_SESSIONS_PREFIX = 'user_sessions:';
  private readonly ACTIVE_SESSION_PREFIX = 'active_session:';
  private readonly INTERVAL_PREFIX = 'interval:';
  private readonly SESSION_INTERVALS_PREFIX = 'session_intervals:';

  newSessionId(): string {
    return this.generateId('session');
  }

  newIntervalId(): string {
    return this.generateId('interval');
  }

  /**
   * Store a new session and mark it as the user's active one
   */
  async create(session: Session): Promise<Session> {
    await this.kv.setJSON(`${this.SESSION_PREFIX}${session.sessionId}`, session);
    await this.kv.put(
      `${this.USER_SESSIONS_PREFIX}${session.userId}:${session.startedAt}:${session.sessionId}`,
      session.sessionId
    );
    await this.kv.put(`${this.ACTIVE_SESSION_PREFIX}${session.userId}`, session.sessionId);
    return session;
  }

  async save(session: Session): Promise<Session> {
    await this.kv.setJSON(`${this.SESSION_PREFIX}${session.sessionId}`, session);
    if (session.status === 'ended') {
      const activeKey = `${this.ACTIVE_SESSION_PREFIX}${session.userId}`;
      const activeId = await this.kv.get(activeKey);
      if (activeId === session.sessionId) {
        await this.kv.delete(activeKey);
      }
    }
    return session;
  }

  async findById(sessionId: string): Promise<Session | null> {
    return this.kv.getJSON<Session>(`${this.SESSION_PREFIX}${sessionId}`);
  }

  /**
   * Get a session that belongs to the user
   */
  async getOwned(userId: string, sessionId: string): Promise<Session> {
    const session = await this.findById(sessionId);
    if (!session || session.userId !== userId) {
      throw new NotFoundError('Session not found', 'SESSION_NOT_FOUND');
    }
    return session;
  }

  /**
   * Get the user's active session, if any
   */
  async getActiveSession(userId: string): Promise<Session | null> {
    const activeKey = `${this.ACTIVE_SESSION_PREFIX}${userId}`;
    const sessionId = await this.kv.get(activeKey);
    if (!sessionId) {
      return null;
    }

    const session = await this.findById(sessionId);
    if (!session || session.status !== 'active') {
      // Clean up stale index
      await this.kv.delete(activeKey);
      return null;
    }
    return session;
  }

  /**
   * All active sessions, for the inactivity sweep
   */
  async listActive(): Promise<Session[]> {
    const keys = await this.kv.listKeys(this.ACTIVE_SESSION_PREFIX);
    const sessions: Session[] = [];
    for (const key of keys) {
      const userId = key.slice(this.ACTIVE_SESSION_PREFIX.length);
      const session = await this.getActiveSession(userId);
      if (session) {
        sessions.push(session);
      }
    }
    return sessions;
  }

  /**
   * List sessions by user, oldest first
   */
  async listByUser(userId: string, options?: { limit?: number }): Promise<Session[]> {
    const keys = await this.kv.listKeys(`${this.USER_SESSIONS_PREFIX}${userId}:`);
    const sessionIds = keys.map(key => key.split(':').pop() || '');
    const sessions = await this.kv.getMany<Session>(
      sessionIds.map(id => `${this.SESSION_PREFIX}${id}`)
    );

    const found = sessions.filter((s): s is Session => s !== null);
    if (options?.limit) {
      return found.slice(-options.limit);
    }
    return found;
  }

  // Intervals

  async saveInterval(interval: Interval): Promise<Interval> {
    await this.kv.setJSON(`${this.INTERVAL_PREFIX}${interval.intervalId}`, interval);
    await this.kv.put(
      `${this.SESSION_INTERVALS_PREFIX}${interval.sessionId}:${this.sequenceKey(interval.sequence)}`,
      interval.intervalId
    );
    return interval;
  }

  async getOwnedInterval(userId: string, intervalId: string): Promise<Interval> {
    const interval = await this.kv.getJSON<Interval>(`${this.INTERVAL_PREFIX}${intervalId}`);
    if (!interval || interval.userId !== userId) {
      throw new NotFoundError('Interval not found', 'INTERVAL_NOT_FOUND');
    }
    return interval;
  }

  /**
   * Intervals of a session in sequence order
   */
  async listIntervals(sessionId: string): Promise<Interval[]> {
    const keys = await this.kv.listKeys(`${this.SESSION_INTERVALS_PREFIX}${sessionId}:`);
    const ids = await Promise.all(keys.map(key => this.kv.get(key)));
    const intervals = await this.kv.getMany<Interval>(
      ids.filter((id): id is string => id !== null).map(id => `${this.INTERVAL_PREFIX}${id}`)
    );
    return intervals
      .filter((i): i is Interval => i !== null)
      .sort((a, b) => a.sequence - b.sequence);
  }

  // Zero-padded so lexicographic key order matches numeric order
  private sequenceKey(sequence: number): string {
    return sequence.toString().padStart(6, '0');
  }
}
