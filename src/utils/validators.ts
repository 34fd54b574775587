import { z } from 'zod';
import { UserTier } from '../models/user.model';
import { LEADERBOARD_METRICS } from '../models/progression.model';
import { isDayKey, isValidTimeZone } from './time';

export const emailSchema = z.string().email();
export const usernameSchema = z.string().min(3).max(50);
export const idSchema = z.string().min(1);
export const timeZoneSchema = z.string().refine(isValidTimeZone, { message: 'Unknown time zone' });
export const dayKeySchema = z.string().refine(isDayKey, { message: 'Expected a YYYY-MM-DD day' });

const timerSettingsSchema = z
  .object({
    workIntervalMinutes: z.number().int().min(1).max(180),
    breakDurationSeconds: z.number().int().min(1).max(600),
  })
  .partial();

export const createUserSchema = z.object({
  email: emailSchema,
  username: usernameSchema,
  tier: z.nativeEnum(UserTier).optional(),
  timezone: timeZoneSchema.optional(),
  settings: timerSettingsSchema.optional(),
});

export const updateUserSettingsSchema = z.object({
  tier: z.nativeEnum(UserTier).optional(),
  timezone: timeZoneSchema.optional(),
  settings: timerSettingsSchema.optional(),
});

export const startBreakSchema = z.object({
  intervalId: idSchema,
});

export const completeBreakSchema = z.object({
  lookedAtDistance: z.boolean(),
  elapsedSeconds: z.number().nonnegative(),
});

export const syncStateSchema = z.object({
  clientElapsedSeconds: z.number().optional(),
});

export const createChallengeSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  metric: z.enum(['session_count', 'compliant_breaks', 'work_minutes', 'daily_streak']),
  targetValue: z.number().positive(),
  startsAt: z.string().datetime(),
  endsAt: z.string().datetime(),
  experienceReward: z.number().int().nonnegative().optional(),
});

export const challengeProgressSchema = z.object({
  delta: z.number().nonnegative(),
});

export const leaderboardQuerySchema = z.object({
  metric: z.enum(LEADERBOARD_METRICS).default('level'),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const periodQuerySchema = z.object({
  start: dayKeySchema,
  end: dayKeySchema,
});

// Generic validation function
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  return schema.parse(data);
}
