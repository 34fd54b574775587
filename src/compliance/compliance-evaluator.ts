import { BreakRecord, MIN_COMPLIANT_BREAK_SECONDS } from '../models/break.model';
import { Session } from '../models/session.model';
import { DayKey } from '../models/common.model';
import {
  DailyStats,
  PeriodSummary,
  PeriodTotals,
  WeeklyStats,
  MonthlyStats,
  UserStatistics,
  addTotals,
  complianceRate,
  emptyTotals,
} from '../models/stats.model';
import { UserRepository } from '../repositories/user.repository';
import { SessionRepository } from '../repositories/session.repository';
import { BreakRepository } from '../repositories/break.repository';
import { ProgressionRepository } from '../repositories/progression.repository';
import { ValidationError } from '../utils/errors';
import {
  addDays,
  eachDay,
  getDayKey,
  getLocalHour,
  isDayKey,
  isWeekend,
  monthRange,
  startOfWeek,
} from '../utils/time';

/**
 * A break satisfies the 20-20-20 rule when it was finished, lasted at least
 * 20 seconds and the user looked into the distance.
 */
export function isCompliant(record: BreakRecord): boolean {
  return (
    record.completed &&
    record.durationSeconds >= MIN_COMPLIANT_BREAK_SECONDS &&
    record.lookedAtDistance
  );
}

/** Breaks still in progress do not count towards any statistic yet. */
export function isTerminal(record: BreakRecord): boolean {
  return record.status !== 'started';
}

export interface ComplianceEvaluator {
  isCompliant(record: BreakRecord): boolean;
  dailyCompliance(userId: string, day: DayKey): Promise<number>;
  dailyStats(userId: string, day: DayKey): Promise<DailyStats>;
  periodSummary(userId: string, startDay: DayKey, endDay: DayKey): Promise<PeriodSummary>;
  weeklySummary(userId: string, anyDay: DayKey): Promise<WeeklyStats>;
  monthlySummary(userId: string, year: number, month: number): Promise<MonthlyStats>;
  userStatistics(userId: string): Promise<UserStatistics>;
  daysWithBreaks(userId: string): Promise<DayKey[]>;
}

interface UserHistory {
  timezone: string;
  sessions: Session[];
  breaks: BreakRecord[];
}

/**
 * Derives every statistic from the raw session and break records on each
 * call; cached counters are never read.
 */
export class RecordComplianceEvaluator implements ComplianceEvaluator {
  constructor(
    private users: UserRepository,
    private sessions: SessionRepository,
    private breaks: BreakRepository,
    private progression: ProgressionRepository
  ) {}

  isCompliant(record: BreakRecord): boolean {
    return isCompliant(record);
  }

  async dailyCompliance(userId: string, day: DayKey): Promise<number> {
    const stats = await this.dailyStats(userId, day);
    return stats.complianceRate;
  }

  async dailyStats(userId: string, day: DayKey): Promise<DailyStats> {
    this.assertDay(day);
    const history = await this.loadHistory(userId);
    const totals = this.totalsByDay(history).get(day) ?? emptyTotals();
    return { userId, day, ...totals };
  }

  async periodSummary(userId: string, startDay: DayKey, endDay: DayKey): Promise<PeriodSummary> {
    this.assertDay(startDay);
    this.assertDay(endDay);
    if (endDay < startDay) {
      throw new ValidationError('Period end must not precede its start');
    }

    const history = await this.loadHistory(userId);
    const byDay = this.totalsByDay(history);

    let totals = emptyTotals();
    let activeDays = 0;
    const days: DailyStats[] = [];
    for (const day of eachDay(startDay, endDay)) {
      const dayTotals = byDay.get(day) ?? emptyTotals();
      if (dayTotals.totalSessions > 0 || dayTotals.totalBreaks > 0) {
        activeDays += 1;
      }
      totals = addTotals(totals, dayTotals);
      days.push({ userId, day, ...dayTotals });
    }

    return { userId, startDay, endDay, activeDays, days, ...totals };
  }

  async weeklySummary(userId: string, anyDay: DayKey): Promise<WeeklyStats> {
    this.assertDay(anyDay);
    const weekStart = startOfWeek(anyDay);
    const weekEnd = addDays(weekStart, 6);
    const { days: _days, startDay: _start, endDay: _end, ...summary } = await this.periodSummary(
      userId,
      weekStart,
      weekEnd
    );
    return { ...summary, weekStart, weekEnd };
  }

  async monthlySummary(userId: string, year: number, month: number): Promise<MonthlyStats> {
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new ValidationError('Invalid year or month');
    }
    const { start, end } = monthRange(year, month);
    const { days: _days, startDay: _start, endDay: _end, ...summary } = await this.periodSummary(
      userId,
      start,
      end
    );
    return { ...summary, year, month };
  }

  async userStatistics(userId: string): Promise<UserStatistics> {
    const history = await this.loadHistory(userId);
    const { timezone } = history;

    const endedSessions = history.sessions.filter(s => s.status === 'ended');
    const sessionsByHour: number[] = new Array<number>(24).fill(0);
    let weekendSessions = 0;
    for (const session of endedSessions) {
      sessionsByHour[getLocalHour(session.startedAt, timezone)] += 1;
      if (isWeekend(getDayKey(session.startedAt, timezone))) {
        weekendSessions += 1;
      }
    }

    const terminal = history.breaks.filter(isTerminal);
    const compliantBreaks = terminal.filter(isCompliant).length;

    // Perfect day: at least one break, every break compliant
    const dayCompliance = new Map<DayKey, boolean>();
    for (const record of terminal) {
      const day = getDayKey(record.startedAt, timezone);
      dayCompliance.set(day, (dayCompliance.get(day) ?? true) && isCompliant(record));
    }
    const perfectDays = [...dayCompliance.values()].filter(Boolean).length;

    // Run of compliant breaks ending at the latest completed one
    const completed = history.breaks.filter(b => b.completed);
    let consecutiveCompliantBreaks = 0;
    for (let i = completed.length - 1; i >= 0 && isCompliant(completed[i]); i--) {
      consecutiveCompliantBreaks += 1;
    }

    const [streak, ledger] = await Promise.all([
      this.progression.getStreak(userId),
      this.progression.getLedger(userId),
    ]);

    return {
      totalSessions: endedSessions.length,
      totalBreaks: terminal.length,
      compliantBreaks,
      complianceRate: complianceRate(compliantBreaks, terminal.length),
      perfectDays,
      consecutiveCompliantBreaks,
      sessionsByHour,
      weekendSessions,
      currentStreak: streak.currentStreak,
      bestStreak: streak.bestStreak,
      level: ledger.level,
    };
  }

  /**
   * Days, oldest first, holding at least one finished break
   */
  async daysWithBreaks(userId: string): Promise<DayKey[]> {
    const { timezone, breaks } = await this.loadHistory(userId);
    const days = new Set(breaks.filter(isTerminal).map(record => getDayKey(record.startedAt, timezone)));
    return [...days].sort();
  }

  private async loadHistory(userId: string): Promise<UserHistory> {
    const user = await this.users.getById(userId);
    const [sessions, breaks] = await Promise.all([
      this.sessions.listByUser(userId),
      this.breaks.listByUser(userId),
    ]);
    return { timezone: user.timezone, sessions, breaks };
  }

  /**
   * Sessions count on the day they started, breaks on the day they started;
   * every record lands on exactly one day.
   */
  private totalsByDay(history: UserHistory): Map<DayKey, PeriodTotals> {
    const byDay = new Map<DayKey, PeriodTotals>();
    const bucket = (day: DayKey): PeriodTotals => {
      let totals = byDay.get(day);
      if (!totals) {
        totals = emptyTotals();
        byDay.set(day, totals);
      }
      return totals;
    };

    for (const session of history.sessions) {
      const totals = bucket(getDayKey(session.startedAt, history.timezone));
      totals.totalSessions += 1;
      totals.totalWorkMinutes += session.totalWorkMinutes;
      totals.completedIntervals += session.completedIntervals;
    }

    for (const record of history.breaks) {
      if (!isTerminal(record)) continue;
      const totals = bucket(getDayKey(record.startedAt, history.timezone));
      totals.totalBreaks += 1;
      if (isCompliant(record)) {
        totals.compliantBreaks += 1;
      }
    }

    for (const totals of byDay.values()) {
      totals.complianceRate = complianceRate(totals.compliantBreaks, totals.totalBreaks);
    }
    return byDay;
  }

  private assertDay(day: string): void {
    if (!isDayKey(day)) {
      throw new ValidationError(`Invalid day: ${day}. Expected YYYY-MM-DD`);
    }
  }
}
