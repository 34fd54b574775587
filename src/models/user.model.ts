import { Timestamp } from './common.model';

export enum UserTier {
  FREE = 'free',
  PREMIUM = 'premium',
}

export interface TimerSettings {
  workIntervalMinutes: number;
  breakDurationSeconds: number;
}

export const DEFAULT_TIMER_SETTINGS: TimerSettings = {
  workIntervalMinutes: 20,
  breakDurationSeconds: 20,
};

export interface User {
  userId: string;
  email: string;
  username: string;
  tier: UserTier;
  timezone: string; // IANA name, e.g. Europe/Berlin
  settings: TimerSettings;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

export interface CreateUserInput {
  email: string;
  username: string;
  tier?: UserTier;
  timezone?: string;
  settings?: Partial<TimerSettings>;
}

export interface UpdateUserSettingsInput {
  tier?: UserTier;
  timezone?: string;
  settings?: Partial<TimerSettings>;
}
