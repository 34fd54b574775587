// src/repositories/stats.repository.ts
import { BaseRepository } from './base';
import { Cached, DailyStats, WeeklyStats, MonthlyStats } from '../models/stats.model';
import { DayKey } from '../models/common.model';

// Cached aggregates, always overwritten by a full recompute:
// ├── stats_daily:{userId}:{day}
// ├── stats_weekly:{userId}:{weekStart}
// └── stats_monthly:{userId}:{yyyy-mm}

export class StatsRepository extends BaseRepository {
  private readonly DAILY_PREFIX = 'stats_daily:';
  private readonly WEEKLY_PREFIX = 'stats_weekly:';
  private readonly MONTHLY_PREFIX = 'stats_monthly:';

  async putDaily(stats: Cached<DailyStats>): Promise<void> {
    await this.kv.setJSON(`${this.DAILY_PREFIX}${stats.userId}:${stats.day}`, stats);
  }

  async getDaily(userId: string, day: DayKey): Promise<Cached<DailyStats> | null> {
    return this.kv.getJSON<Cached<DailyStats>>(`${this.DAILY_PREFIX}${userId}:${day}`);
  }

  async putWeekly(stats: Cached<WeeklyStats>): Promise<void> {
    await this.kv.setJSON(`${this.WEEKLY_PREFIX}${stats.userId}:${stats.weekStart}`, stats);
  }

  async getWeekly(userId: string, weekStart: DayKey): Promise<Cached<WeeklyStats> | null> {
    return this.kv.getJSON<Cached<WeeklyStats>>(`${this.WEEKLY_PREFIX}${userId}:${weekStart}`);
  }

  async putMonthly(stats: Cached<MonthlyStats>): Promise<void> {
    await this.kv.setJSON(`${this.MONTHLY_PREFIX}${stats.userId}:${this.monthKey(stats.year, stats.month)}`, stats);
  }

  async getMonthly(userId: string, year: number, month: number): Promise<Cached<MonthlyStats> | null> {
    return this.kv.getJSON<Cached<MonthlyStats>>(`${this.MONTHLY_PREFIX}${userId}:${this.monthKey(year, month)}`);
  }

  private monthKey(year: number, month: number): string {
    return `${year}-${month.toString().padStart(2, '0')}`;
  }
}
