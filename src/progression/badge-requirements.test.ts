import { describe, it, expect } from 'vitest';
import { isBadgeEarned, meetsRequirement } from './badge-requirements';
import { UserStatistics } from '../models/stats.model';
import { Badge, badgeSchema } from '../models/badge.model';

function stats(overrides: Partial<UserStatistics> = {}): UserStatistics {
  return {
    totalSessions: 0,
    totalBreaks: 0,
    compliantBreaks: 0,
    complianceRate: 0,
    perfectDays: 0,
    consecutiveCompliantBreaks: 0,
    sessionsByHour: new Array<number>(24).fill(0),
    weekendSessions: 0,
    currentStreak: 0,
    bestStreak: 0,
    level: 1,
    ...overrides,
  };
}

function hours(counts: Record<number, number>): number[] {
  const buckets = new Array<number>(24).fill(0);
  for (const [hour, count] of Object.entries(counts)) {
    buckets[Number(hour)] = count;
  }
  return buckets;
}

describe('meetsRequirement', () => {
  it('compares counters against their threshold', () => {
    const s = stats({ totalSessions: 10, currentStreak: 6, bestStreak: 9, level: 3 });
    expect(meetsRequirement({ kind: 'total_sessions_at_least', value: 10 }, s)).toBe(true);
    expect(meetsRequirement({ kind: 'total_sessions_at_least', value: 11 }, s)).toBe(false);
    expect(meetsRequirement({ kind: 'streak_at_least', value: 7 }, s)).toBe(false);
    expect(meetsRequirement({ kind: 'best_streak_at_least', value: 7 }, s)).toBe(true);
    expect(meetsRequirement({ kind: 'level_at_least', value: 3 }, s)).toBe(true);
  });

  it('needs enough breaks before a compliance rate counts', () => {
    const requirement = { kind: 'compliance_rate_at_least' as const, value: 0.9, minBreaks: 10 };
    expect(meetsRequirement(requirement, stats({ totalBreaks: 3, complianceRate: 1 }))).toBe(false);
    expect(meetsRequirement(requirement, stats({ totalBreaks: 10, complianceRate: 0.9 }))).toBe(true);
    expect(meetsRequirement(requirement, stats({ totalBreaks: 10, complianceRate: 0.8 }))).toBe(false);
  });

  it('sums sessions inside an inclusive hour window', () => {
    const s = stats({ sessionsByHour: hours({ 4: 5, 5: 2, 9: 3, 10: 7 }) });
    expect(meetsRequirement({ kind: 'sessions_in_hours_at_least', fromHour: 5, toHour: 9, value: 5 }, s)).toBe(true);
    expect(meetsRequirement({ kind: 'sessions_in_hours_at_least', fromHour: 5, toHour: 9, value: 6 }, s)).toBe(false);
  });

  it('wraps an hour window past midnight', () => {
    const s = stats({ sessionsByHour: hours({ 23: 2, 0: 1, 1: 1, 12: 9 }) });
    expect(meetsRequirement({ kind: 'sessions_in_hours_at_least', fromHour: 22, toHour: 1, value: 4 }, s)).toBe(true);
    expect(meetsRequirement({ kind: 'sessions_in_hours_at_least', fromHour: 22, toHour: 1, value: 5 }, s)).toBe(false);
  });
});

describe('isBadgeEarned', () => {
  const badge: Badge = badgeSchema.parse({
    badgeId: 'steady-hand',
    name: 'Steady Hand',
    description: 'Ten compliant breaks in a row on a weekend habit',
    category: 'consistency',
    rarity: 'rare',
    experienceReward: 40,
    requirements: [
      { kind: 'consecutive_compliant_breaks_at_least', value: 10 },
      { kind: 'weekend_sessions_at_least', value: 2 },
    ],
  });

  it('requires every requirement', () => {
    expect(isBadgeEarned(badge, stats({ consecutiveCompliantBreaks: 10, weekendSessions: 2 }))).toBe(true);
    expect(isBadgeEarned(badge, stats({ consecutiveCompliantBreaks: 10, weekendSessions: 1 }))).toBe(false);
  });

  it('fills in schema defaults', () => {
    expect(badge.isActive).toBe(true);
    const parsed = badgeSchema.parse({
      ...badge,
      requirements: [{ kind: 'compliance_rate_at_least', value: 0.5 }],
    });
    expect(parsed.requirements[0]).toEqual({ kind: 'compliance_rate_at_least', value: 0.5, minBreaks: 1 });
  });

  it('rejects unknown requirement kinds', () => {
    expect(() =>
      badgeSchema.parse({ ...badge, requirements: [{ kind: 'vibes_at_least', value: 1 }] })
    ).toThrow();
  });
});
