import { SessionRepository } from '../repositories/session.repository';
import { BreakRepository } from '../repositories/break.repository';
import { UserRepository } from '../repositories/user.repository';
import { ActivityRepository } from '../repositories/activity.repository';
import { ComplianceEvaluator } from '../compliance/compliance-evaluator';
import { RecomputeQueue } from '../compliance/recompute-queue';
import { ProgressionEngine } from '../progression/progression-engine';
import {
  Interval,
  Session,
  SessionEndReason,
  SessionEndResult,
  SessionSyncState,
} from '../models/session.model';
import { BreakCompletionResult, BreakRecord, CompleteBreakInput } from '../models/break.model';
import { User, UserTier } from '../models/user.model';
import { EXPERIENCE } from '../models/progression.model';
import { complianceRate } from '../models/stats.model';
import { EventBus } from '../utils/events';
import { UserLockRegistry, userLockKey } from '../utils/user-lock';
import { AppConfig } from '../utils/config';
import { Clock, getDayKey, secondsBetween } from '../utils/time';
import {
  BreakAlreadyCompletedError,
  BreakStateError,
  DailyLimitExceededError,
  IntervalStateError,
  SessionAlreadyActiveError,
  SessionNotActiveError,
  ValidationError,
} from '../utils/errors';

export interface IntervalTransition {
  interval: Interval;
  nextInterval: Interval;
}

export interface SessionDetail {
  session: Session;
  intervals: Interval[];
  breaks: BreakRecord[];
}

export interface SessionTracker {
  startSession(userId: string): Promise<{ session: Session; interval: Interval }>;
  beginInterval(userId: string, sessionId: string): Promise<Interval>;
  completeInterval(userId: string, intervalId: string): Promise<IntervalTransition>;
  skipInterval(userId: string, intervalId: string): Promise<IntervalTransition>;
  startBreak(userId: string, sessionId: string, intervalId: string): Promise<BreakRecord>;
  completeBreak(userId: string, breakId: string, input: CompleteBreakInput): Promise<BreakCompletionResult>;
  skipBreak(userId: string, breakId: string): Promise<BreakRecord>;
  endSession(userId: string, sessionId: string, reason?: SessionEndReason): Promise<SessionEndResult>;
  syncState(userId: string, sessionId: string, clientElapsedSeconds?: number): Promise<SessionSyncState>;
  getActiveSession(userId: string): Promise<Session | null>;
  listSessions(userId: string, options?: { limit?: number }): Promise<Session[]>;
  getSessionDetail(userId: string, sessionId: string): Promise<SessionDetail>;
  sweepInactiveSessions(): Promise<Session[]>;
}

export interface SessionTrackerDeps {
  users: UserRepository;
  sessions: SessionRepository;
  breaks: BreakRepository;
  activity: ActivityRepository;
  evaluator: ComplianceEvaluator;
  progression: ProgressionEngine;
  recompute: RecomputeQueue;
  events: EventBus;
  locks: UserLockRegistry;
  config: AppConfig;
  clock: Clock;
}

/**
 * Session lifecycle: work intervals and the breaks between them. Every
 * operation runs under the acting user's lock, and a precondition failure
 * is raised before anything is written.
 */
export class DefaultSessionTracker implements SessionTracker {
  constructor(private deps: SessionTrackerDeps) {}

  async startSession(userId: string): Promise<{ session: Session; interval: Interval }> {
    const { users, sessions, activity } = this.deps;

    return this.withUser(userId, async () => {
      const user = await users.getById(userId);

      const active = await sessions.getActiveSession(userId);
      if (active) {
        if (!this.isIdle(active)) {
          throw new SessionAlreadyActiveError(active.sessionId);
        }
        await this.finalize(active, 'timeout');
      }

      await this.settleStreak(user);
      await this.assertWithinDailyLimit(user);

      const now = this.nowIso();
      const session: Session = {
        sessionId: sessions.newSessionId(),
        userId,
        startedAt: now,
        lastActivityAt: now,
        status: 'active',
        workIntervalMinutes: user.settings.workIntervalMinutes,
        breakDurationSeconds: user.settings.breakDurationSeconds,
        completedIntervals: 0,
        totalBreaks: 0,
        totalWorkMinutes: 0,
        createdAt: now,
        updatedAt: now,
      };
      await sessions.create(session);
      const interval = await this.createPendingInterval(session, 1);

      await activity.append(userId, 'session_started', {
        sessionId: session.sessionId,
        workIntervalMinutes: session.workIntervalMinutes,
      });

      return { session, interval };
    });
  }

  async beginInterval(userId: string, sessionId: string): Promise<Interval> {
    const { users, sessions } = this.deps;

    return this.withUser(userId, async () => {
      const session = await this.getLiveSession(userId, sessionId);
      const intervals = await sessions.listIntervals(sessionId);

      if (intervals.some(interval => interval.status === 'active')) {
        throw new IntervalStateError('Another interval is already running');
      }
      const pending = intervals.find(interval => interval.status === 'pending');
      if (!pending) {
        throw new IntervalStateError('No pending interval to begin');
      }

      await this.assertWithinDailyLimit(await users.getById(userId));

      const now = this.nowIso();
      const started: Interval = { ...pending, status: 'active', startedAt: now };
      await sessions.saveInterval(started);
      await this.touch(session);
      return started;
    });
  }

  async completeInterval(userId: string, intervalId: string): Promise<IntervalTransition> {
    const { sessions } = this.deps;

    return this.withUser(userId, async () => {
      const interval = await sessions.getOwnedInterval(userId, intervalId);
      const session = await this.getLiveSession(userId, interval.sessionId);
      if (interval.status !== 'active') {
        throw new IntervalStateError(`Interval is ${interval.status}, expected active`);
      }

      const completed: Interval = { ...interval, status: 'completed', endedAt: this.nowIso() };
      await sessions.saveInterval(completed);
      const nextInterval = await this.createPendingInterval(session, interval.sequence + 1);
      await this.touch({ ...session, completedIntervals: session.completedIntervals + 1 });

      return { interval: completed, nextInterval };
    });
  }

  async skipInterval(userId: string, intervalId: string): Promise<IntervalTransition> {
    const { sessions } = this.deps;

    return this.withUser(userId, async () => {
      const interval = await sessions.getOwnedInterval(userId, intervalId);
      const session = await this.getLiveSession(userId, interval.sessionId);
      if (interval.status !== 'pending' && interval.status !== 'active') {
        throw new IntervalStateError(`Interval is ${interval.status} and cannot be skipped`);
      }

      const skipped: Interval = { ...interval, status: 'skipped', endedAt: this.nowIso() };
      await sessions.saveInterval(skipped);
      const nextInterval = await this.createPendingInterval(session, interval.sequence + 1);
      await this.touch(session);

      return { interval: skipped, nextInterval };
    });
  }

  /**
   * Open the break that follows a completed interval. Calling it again for
   * the same interval resumes the break already in progress.
   */
  async startBreak(userId: string, sessionId: string, intervalId: string): Promise<BreakRecord> {
    const { sessions, breaks } = this.deps;

    return this.withUser(userId, async () => {
      const session = await this.getLiveSession(userId, sessionId);
      const interval = await sessions.getOwnedInterval(userId, intervalId);
      if (interval.sessionId !== sessionId) {
        throw new IntervalStateError('Interval does not belong to this session');
      }
      if (interval.status !== 'completed') {
        throw new IntervalStateError('A break can only follow a completed interval');
      }

      const existing = await breaks.listByInterval(intervalId);
      const done = existing.find(record => record.status === 'completed');
      if (done) {
        throw new BreakAlreadyCompletedError(done.breakId);
      }
      const open = existing.find(record => record.status === 'started');
      if (open) {
        return open;
      }

      const now = this.nowIso();
      const record: BreakRecord = {
        breakId: breaks.newBreakId(),
        sessionId,
        intervalId,
        userId,
        startedAt: now,
        durationSeconds: 0,
        lookedAtDistance: false,
        status: 'started',
        completed: false,
        createdAt: now,
      };
      await breaks.create(record);
      await this.touch({ ...session, totalBreaks: session.totalBreaks + 1 });
      return record;
    });
  }

  /**
   * Finish a break. The recorded duration is the client's measurement,
   * capped at the time the server saw pass since the break started.
   */
  async completeBreak(
    userId: string,
    breakId: string,
    input: CompleteBreakInput
  ): Promise<BreakCompletionResult> {
    if (!Number.isFinite(input.elapsedSeconds) || input.elapsedSeconds < 0) {
      throw new ValidationError('elapsedSeconds must be a non-negative number');
    }
    const { sessions, breaks, activity, evaluator, progression } = this.deps;

    return this.withUser(userId, async () => {
      const record = await breaks.getOwned(userId, breakId);
      if (record.status === 'completed') {
        throw new BreakAlreadyCompletedError(breakId);
      }
      if (record.status === 'abandoned') {
        throw new BreakStateError(`Break ${breakId} was abandoned`);
      }

      const session = await sessions.findById(record.sessionId);
      if (session && session.status === 'active' && this.isIdle(session)) {
        await this.finalize(session, 'timeout');
        throw new BreakStateError(`Break ${breakId} was abandoned when its session timed out`);
      }

      const now = this.nowIso();
      const serverElapsed = secondsBetween(record.startedAt, now);
      const completed: BreakRecord = {
        ...record,
        endedAt: now,
        durationSeconds: Math.min(Math.floor(input.elapsedSeconds), serverElapsed),
        lookedAtDistance: input.lookedAtDistance,
        status: 'completed',
        completed: true,
      };
      await breaks.save(completed);

      if (session && session.status === 'active') {
        await this.touch(session);
      }

      const isCompliant = evaluator.isCompliant(completed);
      await activity.append(userId, 'break_completed', {
        breakId,
        sessionId: record.sessionId,
        durationSeconds: completed.durationSeconds,
        isCompliant,
      });

      let experienceGained = 0;
      let badgesEarned: string[] = [];
      if (isCompliant) {
        await progression.awardExperience(userId, EXPERIENCE.compliantBreak);
        await progression.recordMetric(userId, 'compliant_breaks', 1);
        const badges = await progression.evaluateBadges(userId);
        experienceGained = EXPERIENCE.compliantBreak + badges.experienceGained;
        badgesEarned = badges.awarded.map(award => award.badgeId);
      }

      await this.enqueueRecompute(userId, record.startedAt);
      return { breakRecord: completed, isCompliant, experienceGained, badgesEarned };
    });
  }

  async skipBreak(userId: string, breakId: string): Promise<BreakRecord> {
    const { sessions, breaks } = this.deps;

    return this.withUser(userId, async () => {
      const record = await breaks.getOwned(userId, breakId);
      if (record.status === 'completed') {
        throw new BreakAlreadyCompletedError(breakId);
      }
      if (record.status === 'abandoned') {
        return record;
      }

      // Timing out the idle session abandons its open break
      const session = await sessions.findById(record.sessionId);
      if (session && session.status === 'active' && this.isIdle(session)) {
        await this.finalize(session, 'timeout');
        return breaks.getOwned(userId, breakId);
      }

      const abandoned: BreakRecord = { ...record, status: 'abandoned', endedAt: this.nowIso() };
      await breaks.save(abandoned);
      await this.enqueueRecompute(userId, record.startedAt);
      return abandoned;
    });
  }

  /**
   * End a session. Ending one that has already ended returns it unchanged.
   */
  async endSession(
    userId: string,
    sessionId: string,
    reason: SessionEndReason = 'user'
  ): Promise<SessionEndResult> {
    const { sessions } = this.deps;

    return this.withUser(userId, async () => {
      const session = await sessions.getOwned(userId, sessionId);
      if (session.status === 'ended') {
        return { session, alreadyEnded: true, experienceGained: 0, badgesEarned: [] };
      }
      return this.finalize(session, reason);
    });
  }

  /**
   * Server-side view of the running session, used by clients to correct
   * their local timers.
   */
  async syncState(
    userId: string,
    sessionId: string,
    clientElapsedSeconds?: number
  ): Promise<SessionSyncState> {
    if (clientElapsedSeconds !== undefined && !Number.isFinite(clientElapsedSeconds)) {
      throw new ValidationError('clientElapsedSeconds must be a number');
    }
    const { sessions, breaks } = this.deps;

    return this.withUser(userId, async () => {
      let session = await sessions.getOwned(userId, sessionId);
      if (session.status === 'active') {
        session = this.isIdle(session)
          ? (await this.finalize(session, 'timeout')).session
          : await this.touch(session);
      }

      const now = this.nowIso();
      const intervals = await sessions.listIntervals(sessionId);
      const active = intervals.find(interval => interval.status === 'active');
      const pending = intervals.find(interval => interval.status === 'pending');
      const openBreak = (await breaks.listBySession(sessionId)).find(record => record.status === 'started');

      let activeInterval: SessionSyncState['activeInterval'] = null;
      let serverElapsed: number | null = null;
      if (active && active.startedAt) {
        const elapsedSeconds = secondsBetween(active.startedAt, now);
        activeInterval = {
          intervalId: active.intervalId,
          sequence: active.sequence,
          elapsedSeconds,
          remainingSeconds: Math.max(0, session.workIntervalMinutes * 60 - elapsedSeconds),
        };
        serverElapsed = elapsedSeconds;
      }

      let breakState: SessionSyncState['openBreak'] = null;
      if (openBreak) {
        const elapsedSeconds = secondsBetween(openBreak.startedAt, now);
        breakState = {
          breakId: openBreak.breakId,
          intervalId: openBreak.intervalId,
          elapsedSeconds,
          remainingSeconds: Math.max(0, session.breakDurationSeconds - elapsedSeconds),
        };
        serverElapsed = serverElapsed ?? elapsedSeconds;
      }

      const driftSeconds = clientElapsedSeconds !== undefined && serverElapsed !== null
        ? clientElapsedSeconds - serverElapsed
        : null;

      return {
        sessionId,
        status: session.status,
        endReason: session.endReason,
        serverTime: now,
        completedIntervals: session.completedIntervals,
        totalBreaks: session.totalBreaks,
        activeInterval,
        pendingIntervalId: pending ? pending.intervalId : null,
        openBreak: breakState,
        driftSeconds,
      };
    });
  }

  async getActiveSession(userId: string): Promise<Session | null> {
    await this.deps.users.getById(userId);
    return this.deps.sessions.getActiveSession(userId);
  }

  async listSessions(userId: string, options?: { limit?: number }): Promise<Session[]> {
    await this.deps.users.getById(userId);
    return this.deps.sessions.listByUser(userId, options);
  }

  async getSessionDetail(userId: string, sessionId: string): Promise<SessionDetail> {
    const { sessions, breaks } = this.deps;
    const session = await sessions.getOwned(userId, sessionId);
    const [intervals, sessionBreaks] = await Promise.all([
      sessions.listIntervals(sessionId),
      breaks.listBySession(sessionId),
    ]);
    return {
      session,
      intervals,
      breaks: sessionBreaks.sort((a, b) => a.startedAt.localeCompare(b.startedAt)),
    };
  }

  /**
   * End every active session that has been idle longer than the timeout.
   * One failing session is logged and does not stop the sweep.
   */
  async sweepInactiveSessions(): Promise<Session[]> {
    const { sessions } = this.deps;
    const ended: Session[] = [];

    for (const candidate of await sessions.listActive()) {
      if (!this.isIdle(candidate)) continue;
      try {
        const result = await this.withUser(candidate.userId, async () => {
          // Re-read under the lock; the user may have been active meanwhile
          const current = await sessions.findById(candidate.sessionId);
          if (!current || current.status !== 'active' || !this.isIdle(current)) {
            return null;
          }
          return this.finalize(current, 'timeout');
        });
        if (result) {
          ended.push(result.session);
        }
      } catch (error) {
        console.error(`[sessions] Failed to time out session ${candidate.sessionId}:`, error);
      }
    }

    if (ended.length > 0) {
      console.log(`[sessions] Timed out ${ended.length} inactive session(s)`);
    }
    return ended;
  }

  /**
   * Close out an active session: open intervals are skipped, open breaks
   * abandoned, work minutes totalled and session experience granted.
   * Callers hold the user's lock.
   */
  private async finalize(session: Session, reason: SessionEndReason): Promise<SessionEndResult> {
    const { users, sessions, breaks, activity, progression, events, locks } = this.deps;
    const now = this.nowIso();

    let totalWorkMinutes = 0;
    for (const interval of await sessions.listIntervals(session.sessionId)) {
      if (interval.status === 'pending' || interval.status === 'active') {
        await sessions.saveInterval({ ...interval, status: 'skipped', endedAt: now });
      } else if (interval.status === 'completed' && interval.startedAt && interval.endedAt) {
        totalWorkMinutes += Math.floor(secondsBetween(interval.startedAt, interval.endedAt) / 60);
      }
    }

    let terminalBreaks = 0;
    let compliantBreaks = 0;
    for (const record of await breaks.listBySession(session.sessionId)) {
      if (record.status === 'started') {
        await breaks.save({ ...record, status: 'abandoned', endedAt: now });
      } else if (this.deps.evaluator.isCompliant(record)) {
        compliantBreaks += 1;
      }
      terminalBreaks += 1;
    }

    const ended = await sessions.save({
      ...session,
      status: 'ended',
      endReason: reason,
      endedAt: now,
      totalWorkMinutes,
      updatedAt: now,
    });

    let experienceGained = 0;
    if (ended.completedIntervals > 0) {
      const rate = complianceRate(compliantBreaks, terminalBreaks);
      const sessionExperience =
        EXPERIENCE.sessionBase +
        Math.floor(rate * EXPERIENCE.sessionComplianceBonusMax) +
        Math.min(ended.completedIntervals * EXPERIENCE.sessionIntervalBonusPer, EXPERIENCE.sessionIntervalBonusMax);
      await progression.awardExperience(ended.userId, sessionExperience);
      experienceGained += sessionExperience;
    }

    await progression.recordMetric(ended.userId, 'session_count', 1);
    await progression.recordMetric(ended.userId, 'work_minutes', totalWorkMinutes);
    // A session running past midnight finishes the day it started on
    await this.settleStreak(await users.getById(ended.userId));
    const badges = await progression.evaluateBadges(ended.userId);
    experienceGained += badges.experienceGained;

    await activity.append(ended.userId, 'session_ended', {
      sessionId: ended.sessionId,
      reason,
      completedIntervals: ended.completedIntervals,
      totalWorkMinutes,
      experienceGained,
    });
    locks.outside(() => events.emit('session.ended', { userId: ended.userId, entityId: ended.sessionId, reason }));
    await this.enqueueRecompute(ended.userId, ended.startedAt);

    return {
      session: ended,
      alreadyEnded: false,
      experienceGained,
      badgesEarned: badges.awarded.map(award => award.badgeId),
    };
  }

  /**
   * An owned session that is still running. An idle one is timed out
   * first and reported as not active.
   */
  private async getLiveSession(userId: string, sessionId: string): Promise<Session> {
    const session = await this.deps.sessions.getOwned(userId, sessionId);
    if (session.status !== 'active') {
      throw new SessionNotActiveError(sessionId);
    }
    if (this.isIdle(session)) {
      await this.finalize(session, 'timeout');
      throw new SessionNotActiveError(sessionId);
    }
    return session;
  }

  private async createPendingInterval(session: Session, sequence: number): Promise<Interval> {
    const interval: Interval = {
      intervalId: this.deps.sessions.newIntervalId(),
      sessionId: session.sessionId,
      userId: session.userId,
      sequence,
      status: 'pending',
      createdAt: this.nowIso(),
    };
    return this.deps.sessions.saveInterval(interval);
  }

  private async touch(session: Session): Promise<Session> {
    const now = this.nowIso();
    return this.deps.sessions.save({ ...session, lastActivityAt: now, updatedAt: now });
  }

  /**
   * Free-tier users may start a limited number of intervals per calendar
   * day, counted in the user's or the server's time zone.
   */
  private async assertWithinDailyLimit(user: User): Promise<void> {
    if (user.tier !== UserTier.FREE) return;
    const { config, sessions } = this.deps;

    const timeZone = config.dailyLimitTimezone === 'user' ? user.timezone : config.serverTimezone;
    const today = getDayKey(this.deps.clock.now(), timeZone);

    let intervalsToday = 0;
    for (const session of await sessions.listByUser(user.userId)) {
      // Sessions that ended before today cannot hold today's intervals
      if (session.endedAt && getDayKey(session.endedAt, timeZone) < today) continue;
      for (const interval of await sessions.listIntervals(session.sessionId)) {
        if (interval.startedAt && getDayKey(interval.startedAt, timeZone) === today) {
          intervalsToday += 1;
        }
      }
    }

    if (intervalsToday >= config.freeDailyIntervalLimit) {
      throw new DailyLimitExceededError(intervalsToday, config.freeDailyIntervalLimit);
    }
  }

  private isIdle(session: Session): boolean {
    const idleMs = this.deps.clock.now().getTime() - new Date(session.lastActivityAt).getTime();
    return idleMs > this.deps.config.sessionTimeoutMinutes * 60_000;
  }

  private async enqueueRecompute(userId: string, startedAt: string): Promise<void> {
    const { users, recompute, locks } = this.deps;
    const user = await users.getById(userId);
    locks.outside(() => recompute.enqueue({ userId, day: getDayKey(startedAt, user.timezone) }));
  }

  private async settleStreak(user: User): Promise<void> {
    const today = getDayKey(this.deps.clock.now(), user.timezone);
    await this.deps.progression.settleStreak(user.userId, today);
  }

  private nowIso(): string {
    return this.deps.clock.now().toISOString();
  }

  private withUser<T>(userId: string, work: () => Promise<T>): Promise<T> {
    return this.deps.locks.withLock(userLockKey(userId), work);
  }
}
