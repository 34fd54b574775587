// src/repositories/badge.repository.ts
import { BaseRepository } from './base';
import { Badge, BadgeAward, badgeSchema } from '../models/badge.model';
import { ConflictError } from '../utils/errors';
import defaultBadges from '../data/default-badges.json';

// Badges:
// ├── badge:{badgeId}
// └── badge_award:{userId}:{badgeId}

export class BadgeRepository extends BaseRepository {
  private readonly BADGE_PREFIX = 'badge:';
  private readonly AWARD_PREFIX = 'badge_award:';

  async upsert(badge: Badge): Promise<Badge> {
    const parsed = badgeSchema.parse(badge);
    await this.kv.setJSON(`${this.BADGE_PREFIX}${parsed.badgeId}`, parsed);
    return parsed;
  }

  /**
   * Install the default catalog; existing badges are left untouched
   */
  async seedDefaults(): Promise<Badge[]> {
    const created: Badge[] = [];
    for (const raw of defaultBadges) {
      const badge = badgeSchema.parse(raw);
      if (!(await this.kv.exists(`${this.BADGE_PREFIX}${badge.badgeId}`))) {
        created.push(await this.upsert(badge));
      }
    }
    return created;
  }

  async list(options?: { activeOnly?: boolean }): Promise<Badge[]> {
    const keys = await this.kv.listKeys(this.BADGE_PREFIX);
    const badges = (await this.kv.getMany<Badge>(keys)).filter((b): b is Badge => b !== null);
    return options?.activeOnly ? badges.filter(b => b.isActive) : badges;
  }

  async listAwards(userId: string): Promise<BadgeAward[]> {
    const keys = await this.kv.listKeys(`${this.AWARD_PREFIX}${userId}:`);
    const awards = await this.kv.getMany<BadgeAward>(keys);
    return awards
      .filter((a): a is BadgeAward => a !== null)
      .sort((a, b) => a.awardedAt.localeCompare(b.awardedAt));
  }

  async hasAward(userId: string, badgeId: string): Promise<boolean> {
    return this.kv.exists(`${this.AWARD_PREFIX}${userId}:${badgeId}`);
  }

  /**
   * Record a badge award; a user can hold each badge once
   */
  async createAward(userId: string, badgeId: string): Promise<BadgeAward> {
    if (await this.hasAward(userId, badgeId)) {
      throw new ConflictError(`Badge ${badgeId} already awarded`, 'BADGE_ALREADY_AWARDED');
    }

    const award: BadgeAward = {
      awardId: this.generateId('award'),
      userId,
      badgeId,
      awardedAt: this.now(),
    };
    await this.kv.setJSON(`${this.AWARD_PREFIX}${userId}:${badgeId}`, award);
    return award;
  }
}
