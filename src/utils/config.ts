import { z } from 'zod';
import { isValidTimeZone } from './time';

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  FREE_DAILY_INTERVAL_LIMIT: z.coerce.number().int().positive().default(12),
  STREAK_COMPLIANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(120),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  // Which calendar day the free-tier limit counts against
  DAILY_LIMIT_TIMEZONE: z.enum(['user', 'server']).default('user'),
  SERVER_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimeZone, { message: 'SERVER_TIMEZONE must be an IANA time zone' }),
});

export interface AppConfig {
  port: number;
  freeDailyIntervalLimit: number;
  streakComplianceThreshold: number;
  sessionTimeoutMinutes: number;
  sweepIntervalSeconds: number;
  dailyLimitTimezone: 'user' | 'server';
  serverTimezone: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    freeDailyIntervalLimit: values.FREE_DAILY_INTERVAL_LIMIT,
    streakComplianceThreshold: values.STREAK_COMPLIANCE_THRESHOLD,
    sessionTimeoutMinutes: values.SESSION_TIMEOUT_MINUTES,
    sweepIntervalSeconds: values.SWEEP_INTERVAL_SECONDS,
    dailyLimitTimezone: values.DAILY_LIMIT_TIMEZONE,
    serverTimezone: values.SERVER_TIMEZONE,
  };
}
