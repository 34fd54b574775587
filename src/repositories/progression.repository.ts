// src/repositories/progression.repository.ts
import { BaseRepository } from './base';
import { StreakData, ExperienceLedger } from '../models/progression.model';

// Per-user counters, written with a version check:
// ├── streak:{userId}
// └── ledger:{userId}

export class ProgressionRepository extends BaseRepository {
  private readonly STREAK_PREFIX = 'streak:';
  private readonly LEDGER_PREFIX = 'ledger:';

  /**
   * Streak record; a zeroed one (version 0) when none is stored yet
   */
  async getStreak(userId: string): Promise<StreakData> {
    const stored = await this.kv.getJSON<StreakData>(`${this.STREAK_PREFIX}${userId}`);
    return stored ?? {
      userId,
      currentStreak: 0,
      bestStreak: 0,
      lastQualifyingDay: null,
      lastEvaluatedDay: null,
      version: 0,
      updatedAt: this.now(),
    };
  }

  async saveStreak(streak: StreakData): Promise<StreakData> {
    return this.saveVersioned(`${this.STREAK_PREFIX}${streak.userId}`, {
      ...streak,
      updatedAt: this.now(),
    });
  }

  async getLedger(userId: string): Promise<ExperienceLedger> {
    const stored = await this.kv.getJSON<ExperienceLedger>(`${this.LEDGER_PREFIX}${userId}`);
    return stored ?? {
      userId,
      totalExperience: 0,
      level: 1,
      version: 0,
      updatedAt: this.now(),
    };
  }

  async saveLedger(ledger: ExperienceLedger): Promise<ExperienceLedger> {
    return this.saveVersioned(`${this.LEDGER_PREFIX}${ledger.userId}`, {
      ...ledger,
      updatedAt: this.now(),
    });
  }
}
