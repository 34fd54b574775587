import { ComplianceEvaluator } from './compliance-evaluator';
import { StatsRepository } from '../repositories/stats.repository';
import { Cached, DailyStats, WeeklyStats, MonthlyStats } from '../models/stats.model';
import { DayKey } from '../models/common.model';
import { Clock, startOfWeek } from '../utils/time';
import { NotFoundError, TransientError, ValidationError } from '../utils/errors';

export interface RecomputeJob {
  userId: string;
  day: DayKey;
}

/**
 * Rebuilds the cached aggregate rows from raw records. Every write replaces
 * the row, so running a job twice leaves the same result.
 */
export class StatsRecomputer {
  constructor(
    private evaluator: ComplianceEvaluator,
    private stats: StatsRepository,
    private clock: Clock
  ) {}

  async recomputeDay(userId: string, day: DayKey): Promise<Cached<DailyStats>> {
    const daily = await this.evaluator.dailyStats(userId, day);
    const row = { ...daily, computedAt: this.clock.now().toISOString() };
    await this.stats.putDaily(row);
    return row;
  }

  async recomputeWeek(userId: string, anyDay: DayKey): Promise<Cached<WeeklyStats>> {
    const weekly = await this.evaluator.weeklySummary(userId, anyDay);
    const row = { ...weekly, computedAt: this.clock.now().toISOString() };
    await this.stats.putWeekly(row);
    return row;
  }

  async recomputeMonth(userId: string, year: number, month: number): Promise<Cached<MonthlyStats>> {
    const monthly = await this.evaluator.monthlySummary(userId, year, month);
    const row = { ...monthly, computedAt: this.clock.now().toISOString() };
    await this.stats.putMonthly(row);
    return row;
  }

  /** Day, week and month rows touched by a change on the given day. */
  async run(job: RecomputeJob): Promise<void> {
    const [year, month] = job.day.split('-').map(Number);
    await this.recomputeDay(job.userId, job.day);
    await this.recomputeWeek(job.userId, job.day);
    await this.recomputeMonth(job.userId, year, month);
  }

  /**
   * Fresh daily stats, or the last stored row (flagged stale) when the
   * recompute fails.
   */
  async readDailyStats(userId: string, day: DayKey): Promise<Cached<DailyStats>> {
    return this.readThrough(
      `${userId} on ${day}`,
      () => this.recomputeDay(userId, day),
      () => this.stats.getDaily(userId, day)
    );
  }

  async readWeeklyStats(userId: string, anyDay: DayKey): Promise<Cached<WeeklyStats>> {
    return this.readThrough(
      `${userId} in week of ${anyDay}`,
      () => this.recomputeWeek(userId, anyDay),
      () => this.stats.getWeekly(userId, startOfWeek(anyDay))
    );
  }

  async readMonthlyStats(userId: string, year: number, month: number): Promise<Cached<MonthlyStats>> {
    return this.readThrough(
      `${userId} in ${year}-${month}`,
      () => this.recomputeMonth(userId, year, month),
      () => this.stats.getMonthly(userId, year, month)
    );
  }

  private async readThrough<T>(
    what: string,
    recompute: () => Promise<Cached<T>>,
    cached: () => Promise<Cached<T> | null>
  ): Promise<Cached<T>> {
    try {
      return await recompute();
    } catch (error) {
      if (error instanceof ValidationError || error instanceof NotFoundError) {
        throw error;
      }
      console.error(`[stats] Recompute failed for ${what}:`, error);

      const row = await cached();
      if (row) {
        return { ...row, stale: true };
      }
      throw new TransientError(`Statistics for ${what} are temporarily unavailable`, error);
    }
  }
}
