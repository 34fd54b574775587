import { z } from 'zod';
import { Timestamp } from './common.model';

const count = z.number().int().nonnegative();

export const badgeRequirementSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('streak_at_least'), value: count }),
  z.object({ kind: z.literal('best_streak_at_least'), value: count }),
  z.object({ kind: z.literal('total_sessions_at_least'), value: count }),
  z.object({ kind: z.literal('compliant_breaks_at_least'), value: count }),
  z.object({ kind: z.literal('perfect_days_at_least'), value: count }),
  z.object({
    kind: z.literal('compliance_rate_at_least'),
    value: z.number().min(0).max(1),
    minBreaks: count.default(1),
  }),
  z.object({ kind: z.literal('consecutive_compliant_breaks_at_least'), value: count }),
  z.object({
    kind: z.literal('sessions_in_hours_at_least'),
    fromHour: z.number().int().min(0).max(23),
    toHour: z.number().int().min(0).max(23),
    value: count,
  }),
  z.object({ kind: z.literal('weekend_sessions_at_least'), value: count }),
  z.object({ kind: z.literal('level_at_least'), value: count }),
]);

export type BadgeRequirement = z.infer<typeof badgeRequirementSchema>;

export type BadgeRarity = 'common' | 'rare' | 'epic' | 'legendary';

export const badgeSchema = z.object({
  badgeId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string(),
  icon: z.string().optional(),
  rarity: z.enum(['common', 'rare', 'epic', 'legendary']),
  experienceReward: count,
  isActive: z.boolean().default(true),
  requirements: z.array(badgeRequirementSchema).min(1),
});

export type Badge = z.infer<typeof badgeSchema>;

export interface BadgeAward {
  awardId: string;
  userId: string;
  badgeId: string;
  awardedAt: Timestamp;
}

export interface BadgeEvaluationResult {
  awarded: BadgeAward[];
  experienceGained: number;
}
