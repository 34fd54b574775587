import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { StatsRecomputer } from './stats-recomputer';
import { ComplianceEvaluator } from './compliance-evaluator';
import { StatsRepository } from '../repositories/stats.repository';
import { BreakRepository } from '../repositories/break.repository';
import { createHarness, Harness } from '../testing/harness';
import { BreakRecord } from '../models/break.model';
import { DayKey } from '../models/common.model';
import { TransientError, ValidationError } from '../utils/errors';

/** Delegates to a real evaluator until told to fail. */
class FlakyEvaluator implements ComplianceEvaluator {
  failing = false;

  constructor(private inner: ComplianceEvaluator) {}

  isCompliant(record: BreakRecord) {
    return this.inner.isCompliant(record);
  }

  async dailyCompliance(userId: string, day: DayKey) {
    this.guard();
    return this.inner.dailyCompliance(userId, day);
  }

  async dailyStats(userId: string, day: DayKey) {
    this.guard();
    return this.inner.dailyStats(userId, day);
  }

  async periodSummary(userId: string, startDay: DayKey, endDay: DayKey) {
    this.guard();
    return this.inner.periodSummary(userId, startDay, endDay);
  }

  async weeklySummary(userId: string, anyDay: DayKey) {
    this.guard();
    return this.inner.weeklySummary(userId, anyDay);
  }

  async monthlySummary(userId: string, year: number, month: number) {
    this.guard();
    return this.inner.monthlySummary(userId, year, month);
  }

  async userStatistics(userId: string) {
    this.guard();
    return this.inner.userStatistics(userId);
  }

  async daysWithBreaks(userId: string) {
    this.guard();
    return this.inner.daysWithBreaks(userId);
  }

  private guard(): void {
    if (this.failing) {
      throw new Error('store unavailable');
    }
  }
}

let h: Harness;
let evaluator: FlakyEvaluator;
let stats: StatsRepository;
let recomputer: StatsRecomputer;
let userId: string;

beforeEach(async () => {
  h = await createHarness({ seedBadges: false });
  evaluator = new FlakyEvaluator(h.evaluator);
  stats = new StatsRepository(h.kv, h.clock);
  recomputer = new StatsRecomputer(evaluator, stats, h.clock);
  userId = (await h.createUser()).userId;

  await new BreakRepository(h.kv, h.clock).create({
    breakId: 'break_1',
    sessionId: 'session_1',
    intervalId: 'interval_1',
    userId,
    startedAt: '2026-03-02T09:20:00.000Z',
    durationSeconds: 25,
    lookedAtDistance: true,
    status: 'completed',
    completed: true,
    createdAt: '2026-03-02T09:20:00.000Z',
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('StatsRecomputer', () => {
  it('overwrites the cached day row from raw records', async () => {
    const row = await recomputer.recomputeDay(userId, '2026-03-02');
    expect(row.computedAt).toBe('2026-03-02T09:00:00.000Z');
    expect(row.compliantBreaks).toBe(1);

    h.clock.advanceMinutes(5);
    await recomputer.recomputeDay(userId, '2026-03-02');
    const stored = await stats.getDaily(userId, '2026-03-02');
    expect(stored?.computedAt).toBe('2026-03-02T09:05:00.000Z');
    expect(stored?.totalBreaks).toBe(1);
  });

  it('writes the day, week and month rows for a job', async () => {
    await recomputer.run({ userId, day: '2026-03-04' });

    expect((await stats.getDaily(userId, '2026-03-04'))?.totalBreaks).toBe(0);
    expect((await stats.getWeekly(userId, '2026-03-02'))?.totalBreaks).toBe(1);
    expect((await stats.getMonthly(userId, 2026, 3))?.compliantBreaks).toBe(1);
  });

  it('serves the cached row, flagged stale, when a recompute fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await recomputer.recomputeDay(userId, '2026-03-02');
    evaluator.failing = true;

    const row = await recomputer.readDailyStats(userId, '2026-03-02');
    expect(row.stale).toBe(true);
    expect(row.compliantBreaks).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('reports a transient failure when nothing is cached', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    evaluator.failing = true;

    const read = recomputer.readMonthlyStats(userId, 2026, 3);
    await expect(read).rejects.toBeInstanceOf(TransientError);
    await expect(read).rejects.toThrow(`Statistics for ${userId} in 2026-3 are temporarily unavailable`);
  });

  it('passes validation errors through', async () => {
    await expect(recomputer.readDailyStats(userId, 'yesterday')).rejects.toBeInstanceOf(ValidationError);
  });
});
