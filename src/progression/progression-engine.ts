import { ComplianceEvaluator } from '../compliance/compliance-evaluator';
import { isBadgeEarned } from './badge-requirements';
import { ProgressionRepository } from '../repositories/progression.repository';
import { BadgeRepository } from '../repositories/badge.repository';
import { ChallengeRepository } from '../repositories/challenge.repository';
import { ActivityRepository, NewActivity } from '../repositories/activity.repository';
import { UserRepository } from '../repositories/user.repository';
import { DayKey } from '../models/common.model';
import {
  ExperienceAwardResult,
  ExperienceLedger,
  Leaderboard,
  LeaderboardEntry,
  LeaderboardMetric,
  StreakData,
  StreakUpdateResult,
  STREAK_MILESTONES,
  experienceToNextLevel,
  levelForExperience,
  levelTitle,
} from '../models/progression.model';
import { Badge, BadgeAward, BadgeEvaluationResult } from '../models/badge.model';
import {
  Challenge,
  ChallengeMetric,
  ChallengeParticipation,
  progressPercentage,
} from '../models/challenge.model';
import { ActivityFeedEntry } from '../models/activity.model';
import { EventBus, EventName, EventPayloads } from '../utils/events';
import { UserLockRegistry, userLockKey } from '../utils/user-lock';
import { AppConfig } from '../utils/config';
import { Clock, addDays, getDayKey, isDayKey } from '../utils/time';
import {
  ChallengeAlreadyJoinedError,
  ChallengeClosedError,
  ConcurrencyConflictError,
  ConflictError,
  TransientError,
  ValidationError,
} from '../utils/errors';

export interface ProgressSummary {
  userId: string;
  level: {
    current: number;
    title: string;
    totalExperience: number;
    experienceToNext: number;
  };
  streak: Pick<StreakData, 'currentStreak' | 'bestStreak' | 'lastQualifyingDay'>;
  badges: { earned: number; total: number; awards: (BadgeAward & { name: string })[] };
  challenges: {
    challenge: Challenge;
    participation: ChallengeParticipation;
    progressPercentage: number;
  }[];
  recentActivity: ActivityFeedEntry[];
}

export interface ProgressionEngine {
  updateStreak(userId: string, day: DayKey): Promise<StreakUpdateResult>;
  settleStreak(userId: string, today: DayKey): Promise<StreakUpdateResult[]>;
  settleAllStreaks(): Promise<number>;
  awardExperience(userId: string, points: number): Promise<ExperienceAwardResult>;
  evaluateBadges(userId: string): Promise<BadgeEvaluationResult>;
  joinChallenge(userId: string, challengeId: string): Promise<ChallengeParticipation>;
  updateChallengeProgress(
    userId: string,
    challengeId: string,
    delta: number
  ): Promise<ChallengeParticipation | null>;
  recordMetric(userId: string, metric: ChallengeMetric, delta: number): Promise<ChallengeParticipation[]>;
  getProgressSummary(userId: string): Promise<ProgressSummary>;
  getLeaderboard(metric: LeaderboardMetric, limit: number): Promise<Leaderboard>;
}

export interface ProgressionDeps {
  users: UserRepository;
  evaluator: ComplianceEvaluator;
  progression: ProgressionRepository;
  badges: BadgeRepository;
  challenges: ChallengeRepository;
  activity: ActivityRepository;
  events: EventBus;
  locks: UserLockRegistry;
  config: AppConfig;
  clock: Clock;
}

export class DefaultProgressionEngine implements ProgressionEngine {
  constructor(private deps: ProgressionDeps) {}

  /**
   * Evaluate the streak for a finished day. Runs at most once per day: a
   * second call for the same day, or for an earlier one, changes nothing.
   * A day with breaks below the threshold resets the current streak to 0.
   */
  async updateStreak(userId: string, day: DayKey): Promise<StreakUpdateResult> {
    if (!isDayKey(day)) {
      throw new ValidationError(`Invalid day: ${day}. Expected YYYY-MM-DD`);
    }
    const { evaluator, progression, config } = this.deps;

    const result = await this.withUser(userId, () =>
      this.retryOnConflict(`streak of ${userId}`, async (): Promise<StreakUpdateResult> => {
        const streak = await progression.getStreak(userId);
        const unchanged = { streak, changed: false, milestone: null };

        if (streak.lastEvaluatedDay && day <= streak.lastEvaluatedDay) {
          return unchanged;
        }

        const today = await evaluator.dailyStats(userId, day);
        if (today.totalBreaks === 0) {
          return unchanged;
        }

        const threshold = config.streakComplianceThreshold;
        let currentStreak = 0;
        let lastQualifyingDay = streak.lastQualifyingDay;
        if (today.complianceRate >= threshold) {
          const yesterdayKey = addDays(day, -1);
          const yesterday = await evaluator.dailyStats(userId, yesterdayKey);
          const yesterdayQualified =
            yesterday.totalBreaks > 0 &&
            yesterday.complianceRate >= threshold &&
            streak.lastQualifyingDay === yesterdayKey;
          currentStreak = yesterdayQualified ? streak.currentStreak + 1 : 1;
          lastQualifyingDay = day;
        }

        const saved = await progression.saveStreak({
          ...streak,
          currentStreak,
          bestStreak: Math.max(streak.bestStreak, currentStreak),
          lastQualifyingDay,
          lastEvaluatedDay: day,
        });

        const milestone = currentStreak > streak.currentStreak && STREAK_MILESTONES.includes(currentStreak)
          ? currentStreak
          : null;
        return { streak: saved, changed: true, milestone };
      })
    );

    if (result.changed && result.streak.lastQualifyingDay === day) {
      await this.recordMetric(userId, 'daily_streak', 1);
    }
    if (result.milestone !== null) {
      this.emit('streak.milestone', {
        userId,
        entityId: `streak:${userId}`,
        streak: result.milestone,
      });
    }
    if (result.changed) {
      await this.evaluateBadges(userId);
    }
    return result;
  }

  /**
   * Evaluate, oldest first, every finished day with breaks that has not
   * been evaluated yet. `today` itself is still open and is skipped.
   */
  async settleStreak(userId: string, today: DayKey): Promise<StreakUpdateResult[]> {
    if (!isDayKey(today)) {
      throw new ValidationError(`Invalid day: ${today}. Expected YYYY-MM-DD`);
    }
    const { evaluator, progression } = this.deps;

    return this.withUser(userId, async () => {
      const { lastEvaluatedDay } = await progression.getStreak(userId);
      const pending = (await evaluator.daysWithBreaks(userId)).filter(
        day => day < today && (lastEvaluatedDay === null || day > lastEvaluatedDay)
      );

      const results: StreakUpdateResult[] = [];
      for (const day of pending) {
        results.push(await this.updateStreak(userId, day));
      }
      return results;
    });
  }

  /**
   * Day-boundary job: settle every user's streak up to their local today.
   * Returns the number of days that changed a streak.
   */
  async settleAllStreaks(): Promise<number> {
    const { users, clock } = this.deps;
    let settled = 0;

    for (const user of await users.list()) {
      try {
        const results = await this.settleStreak(user.userId, getDayKey(clock.now(), user.timezone));
        settled += results.filter(result => result.changed).length;
      } catch (error) {
        console.error(`[progression] Failed to settle streak of ${user.userId}:`, error);
      }
    }

    if (settled > 0) {
      console.log(`[progression] Settled ${settled} streak day(s)`);
    }
    return settled;
  }

  /**
   * Add experience and recompute the level. Experience never decreases.
   */
  async awardExperience(userId: string, points: number): Promise<ExperienceAwardResult> {
    if (!Number.isInteger(points) || points < 0) {
      throw new ValidationError('Experience points must be a non-negative integer');
    }
    const { progression, activity } = this.deps;

    return this.withUser(userId, async () => {
      const result = await this.retryOnConflict(`ledger of ${userId}`, async () => {
        const ledger = await progression.getLedger(userId);
        if (points === 0) {
          return { ledger, leveledUp: false, previousLevel: ledger.level };
        }

        const totalExperience = ledger.totalExperience + points;
        const next: ExperienceLedger = {
          ...ledger,
          totalExperience,
          level: levelForExperience(totalExperience),
        };
        const saved = await progression.saveLedger(next);
        return { ledger: saved, leveledUp: saved.level > ledger.level, previousLevel: ledger.level };
      });

      if (result.leveledUp) {
        const { level } = result.ledger;
        await activity.append(userId, 'level_up', {
          level,
          previousLevel: result.previousLevel,
          title: levelTitle(level),
          experienceGained: points,
        });
        this.emit('level.up', {
          userId,
          entityId: `ledger:${userId}`,
          previousLevel: result.previousLevel,
          level,
        });
      }
      return result;
    });
  }

  /**
   * Award every active badge whose requirements the user now meets. Runs
   * under the user's lock and skips badges already held, so concurrent
   * evaluations award each badge once.
   */
  async evaluateBadges(userId: string): Promise<BadgeEvaluationResult> {
    const { evaluator, badges, activity } = this.deps;

    return this.withUser(userId, async () => {
      const [catalog, held, stats] = await Promise.all([
        badges.list({ activeOnly: true }),
        badges.listAwards(userId),
        evaluator.userStatistics(userId),
      ]);
      const heldIds = new Set(held.map(award => award.badgeId));

      const earned: { badge: Badge; award: BadgeAward }[] = [];
      for (const badge of catalog) {
        if (heldIds.has(badge.badgeId) || !isBadgeEarned(badge, stats)) continue;
        try {
          earned.push({ badge, award: await badges.createAward(userId, badge.badgeId) });
        } catch (error) {
          // Another process recorded it between our read and write
          if (error instanceof ConflictError) {
            console.warn(`[progression] Badge ${badge.badgeId} already awarded to ${userId}`);
            continue;
          }
          throw error;
        }
      }

      if (earned.length === 0) {
        return { awarded: [], experienceGained: 0 };
      }

      const feed: NewActivity[] = earned.map(({ badge }) => ({
        type: 'badge_earned',
        data: {
          badgeId: badge.badgeId,
          badgeName: badge.name,
          rarity: badge.rarity,
          experienceReward: badge.experienceReward,
        },
      }));
      await activity.appendMany(userId, feed);

      const experienceGained = earned.reduce((sum, { badge }) => sum + badge.experienceReward, 0);
      await this.awardExperience(userId, experienceGained);

      for (const { badge, award } of earned) {
        this.emit('badge.awarded', { userId, entityId: award.awardId, badgeName: badge.name });
      }

      return { awarded: earned.map(({ award }) => award), experienceGained };
    });
  }

  async joinChallenge(userId: string, challengeId: string): Promise<ChallengeParticipation> {
    const { challenges, clock } = this.deps;

    return this.withUser(userId, async () => {
      const challenge = await challenges.getById(challengeId);
      const now = clock.now();
      if (now.getTime() > new Date(challenge.endsAt).getTime()) {
        throw new ChallengeClosedError(challengeId);
      }
      if (await challenges.getParticipation(userId, challengeId)) {
        throw new ChallengeAlreadyJoinedError(challengeId);
      }

      return challenges.saveParticipation({
        userId,
        challengeId,
        progress: 0,
        joinedAt: now.toISOString(),
        updatedAt: now.toISOString(),
      });
    });
  }

  /**
   * Add progress, capped at the challenge target. Not joined: no-op, returns
   * null. Outside the challenge window or already complete: unchanged.
   */
  async updateChallengeProgress(
    userId: string,
    challengeId: string,
    delta: number
  ): Promise<ChallengeParticipation | null> {
    if (!Number.isFinite(delta) || delta < 0) {
      throw new ValidationError('Progress delta must be a non-negative number');
    }
    const { challenges, activity, clock } = this.deps;

    return this.withUser(userId, async () => {
      const participation = await challenges.getParticipation(userId, challengeId);
      if (!participation) {
        return null;
      }

      const challenge = await challenges.getById(challengeId);
      const now = clock.now();
      const open =
        now.getTime() >= new Date(challenge.startsAt).getTime() &&
        now.getTime() <= new Date(challenge.endsAt).getTime();
      if (!open || participation.completedAt || delta === 0) {
        return participation;
      }

      const progress = Math.min(challenge.targetValue, participation.progress + delta);
      const updated: ChallengeParticipation = {
        ...participation,
        progress,
        updatedAt: now.toISOString(),
      };

      const completes = progress >= challenge.targetValue;
      if (completes) {
        updated.completedAt = now.toISOString();
      }
      await challenges.saveParticipation(updated);

      if (completes) {
        await activity.append(userId, 'challenge_completed', {
          challengeId,
          challengeName: challenge.name,
          experienceReward: challenge.experienceReward,
        });
        await this.awardExperience(userId, challenge.experienceReward);
      }
      return updated;
    });
  }

  /**
   * Feed a measured amount into every joined challenge tracking that metric
   */
  async recordMetric(
    userId: string,
    metric: ChallengeMetric,
    delta: number
  ): Promise<ChallengeParticipation[]> {
    if (delta <= 0) return [];
    const { challenges } = this.deps;

    return this.withUser(userId, async () => {
      const participations = await challenges.listParticipationsByUser(userId);
      const updated: ChallengeParticipation[] = [];
      for (const participation of participations) {
        if (participation.completedAt) continue;
        const challenge = await challenges.getById(participation.challengeId);
        if (challenge.metric !== metric) continue;

        const result = await this.updateChallengeProgress(userId, challenge.challengeId, delta);
        if (result) updated.push(result);
      }
      return updated;
    });
  }

  async getProgressSummary(userId: string): Promise<ProgressSummary> {
    const { progression, badges, challenges, activity } = this.deps;

    const [ledger, streak, catalog, awards, participations, recentActivity] = await Promise.all([
      progression.getLedger(userId),
      progression.getStreak(userId),
      badges.list({ activeOnly: true }),
      badges.listAwards(userId),
      challenges.listParticipationsByUser(userId),
      activity.listRecent(userId, 10),
    ]);

    const badgeNames = new Map(catalog.map(badge => [badge.badgeId, badge.name]));
    const joined = await Promise.all(
      participations.map(async participation => {
        const challenge = await challenges.getById(participation.challengeId);
        return {
          challenge,
          participation,
          progressPercentage: progressPercentage(participation, challenge),
        };
      })
    );

    return {
      userId,
      level: {
        current: ledger.level,
        title: levelTitle(ledger.level),
        totalExperience: ledger.totalExperience,
        experienceToNext: experienceToNextLevel(ledger.totalExperience),
      },
      streak: {
        currentStreak: streak.currentStreak,
        bestStreak: streak.bestStreak,
        lastQualifyingDay: streak.lastQualifyingDay,
      },
      badges: {
        earned: awards.length,
        total: catalog.length,
        awards: awards.map(award => ({ ...award, name: badgeNames.get(award.badgeId) ?? award.badgeId })),
      },
      challenges: joined,
      recentActivity,
    };
  }

  /**
   * Rank every user by level, current streak or badge count. Ties fall
   * back to experience, best streak or username.
   */
  async getLeaderboard(metric: LeaderboardMetric, limit: number): Promise<Leaderboard> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit must be a positive integer');
    }
    const { users, progression, badges } = this.deps;

    const rows = await Promise.all(
      (await users.list()).map(async (user): Promise<Omit<LeaderboardEntry, 'rank'>> => {
        const [ledger, streak, awards] = await Promise.all([
          progression.getLedger(user.userId),
          progression.getStreak(user.userId),
          badges.listAwards(user.userId),
        ]);
        return {
          userId: user.userId,
          username: user.username,
          level: ledger.level,
          totalExperience: ledger.totalExperience,
          currentStreak: streak.currentStreak,
          bestStreak: streak.bestStreak,
          badges: awards.length,
        };
      })
    );

    const keys: Record<LeaderboardMetric, (row: Omit<LeaderboardEntry, 'rank'>) => number[]> = {
      level: row => [row.level, row.totalExperience],
      streak: row => [row.currentStreak, row.bestStreak],
      badges: row => [row.badges, row.totalExperience],
    };
    const key = keys[metric];
    rows.sort((a, b) => {
      const left = key(a);
      const right = key(b);
      for (let i = 0; i < left.length; i++) {
        if (left[i] !== right[i]) return right[i] - left[i];
      }
      return a.username.localeCompare(b.username);
    });

    return {
      metric,
      totalUsers: rows.length,
      entries: rows.slice(0, limit).map((row, index) => ({ rank: index + 1, ...row })),
    };
  }

  private withUser<T>(userId: string, work: () => Promise<T>): Promise<T> {
    return this.deps.locks.withLock(userLockKey(userId), work);
  }

  // Listeners run outside the caller's lock and queue for it like any request
  private emit<K extends EventName>(event: K, payload: EventPayloads[K]): void {
    this.deps.locks.outside(() => this.deps.events.emit(event, payload));
  }

  /**
   * A version conflict is retried once; a second one is reported as a
   * transient failure.
   */
  private async retryOnConflict<T>(what: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (!(error instanceof ConcurrencyConflictError)) throw error;
      console.warn(`[progression] Version conflict on ${what}, retrying`);
    }

    try {
      return await work();
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        throw new TransientError(`Could not update ${what}, please retry`, error);
      }
      throw error;
    }
  }
}
