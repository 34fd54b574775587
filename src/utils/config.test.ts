import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      freeDailyIntervalLimit: 12,
      streakComplianceThreshold: 0.8,
      sessionTimeoutMinutes: 120,
      sweepIntervalSeconds: 300,
      dailyLimitTimezone: 'user',
      serverTimezone: 'UTC',
    });
  });

  it('coerces values from the environment', () => {
    const config = loadConfig({
      PORT: '3000',
      FREE_DAILY_INTERVAL_LIMIT: '4',
      STREAK_COMPLIANCE_THRESHOLD: '0.5',
      DAILY_LIMIT_TIMEZONE: 'server',
      SERVER_TIMEZONE: 'Europe/Berlin',
    });
    expect(config.port).toBe(3000);
    expect(config.freeDailyIntervalLimit).toBe(4);
    expect(config.streakComplianceThreshold).toBe(0.5);
    expect(config.dailyLimitTimezone).toBe('server');
    expect(config.serverTimezone).toBe('Europe/Berlin');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ STREAK_COMPLIANCE_THRESHOLD: '1.5' })).toThrow(/^Invalid configuration: /);
    expect(() => loadConfig({ SERVER_TIMEZONE: 'Nowhere/Land' })).toThrow(
      'Invalid configuration: SERVER_TIMEZONE: SERVER_TIMEZONE must be an IANA time zone'
    );
  });
});
