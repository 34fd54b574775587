import { Timestamp } from './common.model';

export type BreakStatus = 'started' | 'completed' | 'abandoned';

export interface BreakRecord {
  breakId: string;
  sessionId: string;
  intervalId: string;
  userId: string;

  startedAt: Timestamp;
  endedAt?: Timestamp;

  durationSeconds: number;
  lookedAtDistance: boolean;

  status: BreakStatus;
  completed: boolean;

  createdAt: Timestamp;
}

export const MIN_COMPLIANT_BREAK_SECONDS = 20;

export interface CompleteBreakInput {
  lookedAtDistance: boolean;
  elapsedSeconds: number;
}

export interface BreakCompletionResult {
  breakRecord: BreakRecord;
  isCompliant: boolean;
  experienceGained: number;
  badgesEarned: string[];
}
