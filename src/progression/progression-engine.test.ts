import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { DefaultProgressionEngine } from './progression-engine';
import { createHarness, Harness } from '../testing/harness';
import { BreakRepository } from '../repositories/break.repository';
import { SessionRepository } from '../repositories/session.repository';
import { ProgressionRepository } from '../repositories/progression.repository';
import { ActivityRepository } from '../repositories/activity.repository';
import { ExperienceLedger } from '../models/progression.model';
import { Challenge, ChallengeMetric } from '../models/challenge.model';
import {
  ChallengeAlreadyJoinedError,
  ChallengeClosedError,
  ConcurrencyConflictError,
  TransientError,
  ValidationError,
} from '../utils/errors';

let h: Harness;
let userId: string;
let breakSeq = 0;

async function addBreak(startedAt: string, compliant = true): Promise<void> {
  breakSeq += 1;
  await new BreakRepository(h.kv, h.clock).create({
    breakId: `break_${breakSeq}`,
    sessionId: 'session_1',
    intervalId: `interval_${breakSeq}`,
    userId,
    startedAt,
    durationSeconds: 30,
    lookedAtDistance: compliant,
    status: 'completed',
    completed: true,
    createdAt: startedAt,
  });
}

async function addEndedSession(startedAt: string): Promise<void> {
  const sessions = new SessionRepository(h.kv, h.clock);
  const session = {
    sessionId: sessions.newSessionId(),
    userId,
    startedAt,
    lastActivityAt: startedAt,
    workIntervalMinutes: 20,
    breakDurationSeconds: 20,
    completedIntervals: 1,
    totalBreaks: 0,
    totalWorkMinutes: 20,
    createdAt: startedAt,
    updatedAt: startedAt,
  };
  await sessions.create({ ...session, status: 'active' });
  await sessions.save({ ...session, status: 'ended', endReason: 'user', endedAt: startedAt });
}

async function createChallenge(overrides: Partial<{
  metric: ChallengeMetric;
  targetValue: number;
  startsAt: string;
  endsAt: string;
  experienceReward: number;
}> = {}): Promise<Challenge> {
  return h.challenges.create({
    name: 'Break week',
    metric: 'compliant_breaks',
    targetValue: 10,
    startsAt: '2026-03-01T00:00:00.000Z',
    endsAt: '2026-03-08T00:00:00.000Z',
    experienceReward: 30,
    ...overrides,
  });
}

beforeEach(async () => {
  h = await createHarness();
  userId = (await h.createUser()).userId;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('updateStreak', () => {
  it('counts consecutive qualifying days and resets on a failing one', async () => {
    const milestones = vi.fn();
    h.env.EVENTS.on('streak.milestone', milestones);

    await addBreak('2026-03-01T09:00:00.000Z');
    await addBreak('2026-03-02T09:00:00.000Z');
    await addBreak('2026-03-03T09:00:00.000Z');
    await addBreak('2026-03-04T09:00:00.000Z', false);

    const day1 = await h.progression.updateStreak(userId, '2026-03-01');
    const day2 = await h.progression.updateStreak(userId, '2026-03-02');
    const day3 = await h.progression.updateStreak(userId, '2026-03-03');
    expect([day1, day2, day3].map(r => r.streak.currentStreak)).toEqual([1, 2, 3]);
    expect(day3.milestone).toBe(3);
    expect(milestones).toHaveBeenCalledWith({ userId, entityId: `streak:${userId}`, streak: 3 });

    const day4 = await h.progression.updateStreak(userId, '2026-03-04');
    expect(day4.changed).toBe(true);
    expect(day4.streak.currentStreak).toBe(0);
    expect(day4.streak.bestStreak).toBe(3);
    expect(day4.streak.lastQualifyingDay).toBe('2026-03-03');
    expect(day4.milestone).toBeNull();
  });

  it('evaluates a day only once', async () => {
    await addBreak('2026-03-01T09:00:00.000Z');
    await h.progression.updateStreak(userId, '2026-03-01');

    const again = await h.progression.updateStreak(userId, '2026-03-01');
    expect(again.changed).toBe(false);
    expect(again.streak.currentStreak).toBe(1);
    expect(again.streak.version).toBe(1);
  });

  it('leaves the streak alone on a day without breaks', async () => {
    const result = await h.progression.updateStreak(userId, '2026-03-01');
    expect(result.changed).toBe(false);
    expect(result.streak.lastEvaluatedDay).toBeNull();
  });

  it('starts over after a gap', async () => {
    await addBreak('2026-03-01T09:00:00.000Z');
    await addBreak('2026-03-03T09:00:00.000Z');
    await h.progression.updateStreak(userId, '2026-03-01');
    await h.progression.updateStreak(userId, '2026-03-02');

    const result = await h.progression.updateStreak(userId, '2026-03-03');
    expect(result.streak.currentStreak).toBe(1);
    expect(result.streak.bestStreak).toBe(1);
  });

  it('ignores days before the last evaluated one', async () => {
    await addBreak('2026-03-01T09:00:00.000Z');
    await addBreak('2026-03-02T09:00:00.000Z');
    await h.progression.updateStreak(userId, '2026-03-02');

    const late = await h.progression.updateStreak(userId, '2026-03-01');
    expect(late.changed).toBe(false);
    expect(late.streak.lastEvaluatedDay).toBe('2026-03-02');
  });

  it('rejects malformed days', async () => {
    await expect(h.progression.updateStreak(userId, '03/01/2026')).rejects.toBeInstanceOf(ValidationError);
  });

  it('feeds daily streak challenges on a qualifying day', async () => {
    const challenge = await createChallenge({ metric: 'daily_streak', targetValue: 3 });
    await h.progression.joinChallenge(userId, challenge.challengeId);
    await addBreak('2026-03-01T09:00:00.000Z');

    await h.progression.updateStreak(userId, '2026-03-01');
    const participation = await h.challenges.getParticipation(userId, challenge.challengeId);
    expect(participation?.progress).toBe(1);
  });
});

describe('awardExperience', () => {
  it('raises the level when a threshold is crossed', async () => {
    const levelUps = vi.fn();
    h.env.EVENTS.on('level.up', levelUps);

    const first = await h.progression.awardExperience(userId, 60);
    expect(first.leveledUp).toBe(false);
    expect(first.ledger.level).toBe(1);

    const second = await h.progression.awardExperience(userId, 50);
    expect(second.leveledUp).toBe(true);
    expect(second.previousLevel).toBe(1);
    expect(second.ledger).toMatchObject({ totalExperience: 110, level: 2, version: 2 });
    expect(levelUps).toHaveBeenCalledWith({ userId, entityId: `ledger:${userId}`, previousLevel: 1, level: 2 });

    const feed = await new ActivityRepository(h.kv, h.clock).listRecent(userId);
    expect(feed[0].type).toBe('level_up');
    expect(feed[0].data).toEqual({ level: 2, previousLevel: 1, title: 'Blink Beginner', experienceGained: 50 });
  });

  it('only accepts non-negative whole points', async () => {
    await expect(h.progression.awardExperience(userId, -5)).rejects.toBeInstanceOf(ValidationError);
    await expect(h.progression.awardExperience(userId, 2.5)).rejects.toBeInstanceOf(ValidationError);
  });

  describe('version conflicts', () => {
    class ConflictingRepository extends ProgressionRepository {
      conflicts = 0;

      async saveLedger(ledger: ExperienceLedger): Promise<ExperienceLedger> {
        if (this.conflicts > 0) {
          this.conflicts -= 1;
          throw new ConcurrencyConflictError(`ledger:${ledger.userId}`);
        }
        return super.saveLedger(ledger);
      }
    }

    function engineWith(repository: ProgressionRepository) {
      return new DefaultProgressionEngine({
        users: h.users,
        evaluator: h.evaluator,
        progression: repository,
        badges: h.badges,
        challenges: h.challenges,
        activity: new ActivityRepository(h.kv, h.clock),
        events: h.env.EVENTS,
        locks: h.env.LOCKS,
        config: h.config,
        clock: h.clock,
      });
    }

    it('retries a conflicting write once', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const repository = new ConflictingRepository(h.kv, h.clock);
      repository.conflicts = 1;

      const result = await engineWith(repository).awardExperience(userId, 10);
      expect(result.ledger.totalExperience).toBe(10);
      expect(warn).toHaveBeenCalledWith(`[progression] Version conflict on ledger of ${userId}, retrying`);
    });

    it('gives up with a transient error on a second conflict', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const repository = new ConflictingRepository(h.kv, h.clock);
      repository.conflicts = 2;

      await expect(engineWith(repository).awardExperience(userId, 10)).rejects.toBeInstanceOf(TransientError);
      expect((await repository.getLedger(userId)).totalExperience).toBe(0);
    });
  });
});

describe('evaluateBadges', () => {
  it('awards newly earned badges with their experience', async () => {
    const awarded = vi.fn();
    h.env.EVENTS.on('badge.awarded', awarded);
    await addEndedSession('2026-03-02T08:00:00.000Z');
    await addBreak('2026-03-02T08:20:00.000Z');

    const result = await h.progression.evaluateBadges(userId);
    expect(result.awarded.map(a => a.badgeId).sort()).toEqual(['first-steps', 'perfect-day']);
    expect(result.experienceGained).toBe(100);
    expect(awarded).toHaveBeenCalledTimes(2);

    const ledger = await new ProgressionRepository(h.kv, h.clock).getLedger(userId);
    expect(ledger.totalExperience).toBe(100);
    expect(ledger.level).toBe(2);

    const feed = await new ActivityRepository(h.kv, h.clock).listRecent(userId);
    expect(feed.map(entry => entry.type)).toEqual(['level_up', 'badge_earned', 'badge_earned']);
  });

  it('awards each badge once', async () => {
    await addEndedSession('2026-03-02T08:00:00.000Z');

    await h.progression.evaluateBadges(userId);
    const again = await h.progression.evaluateBadges(userId);
    expect(again).toEqual({ awarded: [], experienceGained: 0 });
    expect(await h.badges.listAwards(userId)).toHaveLength(1);
  });

  it('awards once under concurrent evaluations', async () => {
    await addEndedSession('2026-03-02T08:00:00.000Z');

    const results = await Promise.all([
      h.progression.evaluateBadges(userId),
      h.progression.evaluateBadges(userId),
      h.progression.evaluateBadges(userId),
    ]);
    expect(results.reduce((sum, r) => sum + r.awarded.length, 0)).toBe(1);
    expect(await h.badges.hasAward(userId, 'first-steps')).toBe(true);
    expect((await new ProgressionRepository(h.kv, h.clock).getLedger(userId)).totalExperience).toBe(25);
  });

  it('skips inactive badges', async () => {
    const [firstSteps] = (await h.badges.list()).filter(b => b.badgeId === 'first-steps');
    await h.badges.upsert({ ...firstSteps, isActive: false });
    await addEndedSession('2026-03-02T08:00:00.000Z');

    expect((await h.progression.evaluateBadges(userId)).awarded).toEqual([]);
  });
});

describe('challenges', () => {
  it('caps progress at the target and rewards completion once', async () => {
    const challenge = await createChallenge();
    await h.progression.joinChallenge(userId, challenge.challengeId);

    const progress: number[] = [];
    for (let i = 0; i < 3; i++) {
      const p = await h.progression.updateChallengeProgress(userId, challenge.challengeId, 4);
      progress.push(p?.progress ?? -1);
    }
    expect(progress).toEqual([4, 8, 10]);

    const done = await h.challenges.getParticipation(userId, challenge.challengeId);
    expect(done?.completedAt).toBe('2026-03-02T09:00:00.000Z');

    const after = await h.progression.updateChallengeProgress(userId, challenge.challengeId, 4);
    expect(after?.progress).toBe(10);

    const ledger = await new ProgressionRepository(h.kv, h.clock).getLedger(userId);
    expect(ledger.totalExperience).toBe(30);
  });

  it('ignores progress for challenges the user has not joined', async () => {
    const challenge = await createChallenge();
    expect(await h.progression.updateChallengeProgress(userId, challenge.challengeId, 4)).toBeNull();
  });

  it('leaves progress unchanged outside the challenge window', async () => {
    const challenge = await createChallenge({
      startsAt: '2026-03-05T00:00:00.000Z',
      endsAt: '2026-03-12T00:00:00.000Z',
    });
    await h.progression.joinChallenge(userId, challenge.challengeId);

    const result = await h.progression.updateChallengeProgress(userId, challenge.challengeId, 4);
    expect(result?.progress).toBe(0);
  });

  it('rejects joining a closed challenge or joining twice', async () => {
    const closed = await createChallenge({
      startsAt: '2026-02-01T00:00:00.000Z',
      endsAt: '2026-02-08T00:00:00.000Z',
    });
    await expect(h.progression.joinChallenge(userId, closed.challengeId)).rejects.toBeInstanceOf(ChallengeClosedError);

    const open = await createChallenge();
    await h.progression.joinChallenge(userId, open.challengeId);
    await expect(h.progression.joinChallenge(userId, open.challengeId)).rejects.toBeInstanceOf(
      ChallengeAlreadyJoinedError
    );
  });

  it('rejects a negative delta', async () => {
    const challenge = await createChallenge();
    await expect(
      h.progression.updateChallengeProgress(userId, challenge.challengeId, -1)
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('routes metrics to matching challenges only', async () => {
    const breaks = await createChallenge({ metric: 'compliant_breaks' });
    const minutes = await createChallenge({ metric: 'work_minutes', targetValue: 100 });
    await h.progression.joinChallenge(userId, breaks.challengeId);
    await h.progression.joinChallenge(userId, minutes.challengeId);

    const updated = await h.progression.recordMetric(userId, 'work_minutes', 40);
    expect(updated.map(p => p.challengeId)).toEqual([minutes.challengeId]);
    expect((await h.challenges.getParticipation(userId, breaks.challengeId))?.progress).toBe(0);
  });
});

describe('getProgressSummary', () => {
  it('reports level, streak, badges and challenges', async () => {
    const challenge = await createChallenge();
    await h.progression.joinChallenge(userId, challenge.challengeId);
    await h.progression.updateChallengeProgress(userId, challenge.challengeId, 5);
    await h.progression.awardExperience(userId, 120);

    const summary = await h.progression.getProgressSummary(userId);
    expect(summary.level).toEqual({
      current: 2,
      title: 'Blink Beginner',
      totalExperience: 120,
      experienceToNext: 130,
    });
    expect(summary.streak).toEqual({ currentStreak: 0, bestStreak: 0, lastQualifyingDay: null });
    expect(summary.badges.earned).toBe(0);
    expect(summary.badges.total).toBe(14);
    expect(summary.challenges).toHaveLength(1);
    expect(summary.challenges[0].progressPercentage).toBe(50);
  });
});

describe('settleStreak', () => {
  it('evaluates unsettled days before today in order', async () => {
    await addBreak('2026-03-01T09:00:00.000Z');
    await addBreak('2026-03-02T09:00:00.000Z');
    await addBreak('2026-03-03T09:00:00.000Z');

    const results = await h.progression.settleStreak(userId, '2026-03-03');
    expect(results.map(r => r.streak.currentStreak)).toEqual([1, 2]);
    expect(results[1].streak.lastEvaluatedDay).toBe('2026-03-02');

    expect(await h.progression.settleStreak(userId, '2026-03-03')).toEqual([]);
  });

  it('awards streak badges once the streak reaches them', async () => {
    for (let day = 1; day <= 7; day++) {
      await addBreak(`2026-03-0${day}T09:00:00.000Z`);
    }

    await h.progression.settleStreak(userId, '2026-03-08');
    const awarded = (await h.badges.listAwards(userId)).map(award => award.badgeId);
    expect(awarded).toContain('week-warrior');
  });
});

describe('getLeaderboard', () => {
  it('orders by the chosen metric and breaks ties', async () => {
    const repository = new ProgressionRepository(h.kv, h.clock);
    const second = (await h.createUser({ username: 'bravo' })).userId;
    const third = (await h.createUser({ username: 'alpha' })).userId;

    await repository.saveStreak({ ...(await repository.getStreak(userId)), currentStreak: 2, bestStreak: 2 });
    await repository.saveStreak({ ...(await repository.getStreak(second)), currentStreak: 2, bestStreak: 6 });
    await h.progression.awardExperience(third, 300);

    const byStreak = await h.progression.getLeaderboard('streak', 10);
    expect(byStreak.entries.map(e => [e.rank, e.userId])).toEqual([
      [1, second],
      [2, userId],
      [3, third],
    ]);

    const byLevel = await h.progression.getLeaderboard('level', 2);
    expect(byLevel.totalUsers).toBe(3);
    // Equal experience falls back to the username
    expect(byLevel.entries.map(e => e.username)).toEqual(['alpha', 'bravo']);
    expect(byLevel.entries[0]).toMatchObject({ level: 3, totalExperience: 300 });
  });

  it('rejects a non-positive limit', async () => {
    await expect(h.progression.getLeaderboard('badges', 0)).rejects.toBeInstanceOf(ValidationError);
  });
});
