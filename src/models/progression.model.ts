import { DayKey, Timestamp } from './common.model';

export interface StreakData {
  userId: string;
  currentStreak: number;
  bestStreak: number;
  lastQualifyingDay: DayKey | null;
  lastEvaluatedDay: DayKey | null;
  version: number;
  updatedAt: Timestamp;
}

export interface ExperienceLedger {
  userId: string;
  totalExperience: number;
  level: number;
  version: number;
  updatedAt: Timestamp;
}

// Experience needed to reach level n is LEVEL_THRESHOLDS[n - 1]
export const LEVEL_THRESHOLDS: readonly number[] = [
  0, 100, 250, 500, 1000, 2000, 3500, 5500, 8000, 11000, 15000,
];

export const LEVEL_TITLES: readonly string[] = [
  'Screen Squinter',
  'Blink Beginner',
  'Focus Finder',
  'Distance Gazer',
  'Break Keeper',
  'Rhythm Holder',
  'Eye Guardian',
  'Vision Veteran',
  'Horizon Watcher',
  'Clear Sighted',
  'Eye Health Legend',
];

export const EXPERIENCE = {
  compliantBreak: 5,
  sessionBase: 10,
  sessionComplianceBonusMax: 20,
  sessionIntervalBonusPer: 2,
  sessionIntervalBonusMax: 20,
} as const;

export const STREAK_MILESTONES: readonly number[] = [3, 7, 14, 30, 60, 100, 365];

export function levelForExperience(totalExperience: number): number {
  let level = 0;
  for (const threshold of LEVEL_THRESHOLDS) {
    if (totalExperience >= threshold) {
      level += 1;
    } else {
      break;
    }
  }
  return level;
}

/** Experience still needed for the next level; 0 at the top level. */
export function experienceToNextLevel(totalExperience: number): number {
  const level = levelForExperience(totalExperience);
  const next = LEVEL_THRESHOLDS[level];
  return next === undefined ? 0 : next - totalExperience;
}

export function levelTitle(level: number): string {
  return LEVEL_TITLES[Math.min(Math.max(level, 1), LEVEL_TITLES.length) - 1];
}

export interface ExperienceAwardResult {
  ledger: ExperienceLedger;
  leveledUp: boolean;
  previousLevel: number;
}

export interface StreakUpdateResult {
  streak: StreakData;
  changed: boolean;
  milestone: number | null;
}

export const LEADERBOARD_METRICS = ['level', 'streak', 'badges'] as const;
export type LeaderboardMetric = (typeof LEADERBOARD_METRICS)[number];

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  username: string;
  level: number;
  totalExperience: number;
  currentStreak: number;
  bestStreak: number;
  badges: number;
}

export interface Leaderboard {
  metric: LeaderboardMetric;
  totalUsers: number;
  entries: LeaderboardEntry[];
}
