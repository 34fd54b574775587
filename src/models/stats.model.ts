import { DayKey, Timestamp } from './common.model';

export interface PeriodTotals {
  totalSessions: number;
  totalWorkMinutes: number;
  completedIntervals: number;
  totalBreaks: number;
  compliantBreaks: number;
  complianceRate: number; // compliantBreaks / totalBreaks, 0 when there are no breaks
}

export interface DailyStats extends PeriodTotals {
  userId: string;
  day: DayKey;
}

export interface PeriodSummary extends PeriodTotals {
  userId: string;
  startDay: DayKey;
  endDay: DayKey;
  activeDays: number;
  days: DailyStats[];
}

export interface WeeklyStats extends PeriodTotals {
  userId: string;
  weekStart: DayKey; // Monday
  weekEnd: DayKey;
  activeDays: number;
}

export interface MonthlyStats extends PeriodTotals {
  userId: string;
  year: number;
  month: number; // 1-12
  activeDays: number;
}

/** A stored aggregate row. */
export type Cached<T> = T & {
  computedAt: Timestamp;
  stale?: boolean; // served from cache after a failed recompute
};

/** Lifetime figures that badge requirements are checked against. */
export interface UserStatistics {
  totalSessions: number; // ended sessions
  totalBreaks: number;
  compliantBreaks: number;
  complianceRate: number;
  perfectDays: number;
  consecutiveCompliantBreaks: number;
  sessionsByHour: number[]; // 24 buckets, local start hour of ended sessions
  weekendSessions: number;
  currentStreak: number;
  bestStreak: number;
  level: number;
}

export function emptyTotals(): PeriodTotals {
  return {
    totalSessions: 0,
    totalWorkMinutes: 0,
    completedIntervals: 0,
    totalBreaks: 0,
    compliantBreaks: 0,
    complianceRate: 0,
  };
}

export function complianceRate(compliant: number, total: number): number {
  return total === 0 ? 0 : compliant / total;
}

export function addTotals(a: PeriodTotals, b: PeriodTotals): PeriodTotals {
  const totalBreaks = a.totalBreaks + b.totalBreaks;
  const compliantBreaks = a.compliantBreaks + b.compliantBreaks;
  return {
    totalSessions: a.totalSessions + b.totalSessions,
    totalWorkMinutes: a.totalWorkMinutes + b.totalWorkMinutes,
    completedIntervals: a.completedIntervals + b.completedIntervals,
    totalBreaks,
    compliantBreaks,
    complianceRate: complianceRate(compliantBreaks, totalBreaks),
  };
}
