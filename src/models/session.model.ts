import { Timestamp } from './common.model';

export type SessionStatus = 'active' | 'ended';

export type SessionEndReason = 'user' | 'timeout';

export interface Session {
  sessionId: string;
  userId: string; // References User.userId

  // Timing
  startedAt: Timestamp;
  lastActivityAt: Timestamp;
  endedAt?: Timestamp;

  status: SessionStatus;
  endReason?: SessionEndReason;

  // Settings captured when the session started
  workIntervalMinutes: number;
  breakDurationSeconds: number;

  // Counters
  completedIntervals: number;
  totalBreaks: number;
  totalWorkMinutes: number; // finalized on end

  createdAt: Timestamp;
  updatedAt: Timestamp;
}

export type IntervalStatus = 'pending' | 'active' | 'completed' | 'skipped';

export interface Interval {
  intervalId: string;
  sessionId: string;
  userId: string;
  sequence: number; // 1-based within the session
  status: IntervalStatus;
  createdAt: Timestamp;
  startedAt?: Timestamp;
  endedAt?: Timestamp;
}

export interface SessionSyncState {
  sessionId: string;
  status: SessionStatus;
  endReason?: SessionEndReason;
  serverTime: Timestamp;
  completedIntervals: number;
  totalBreaks: number;
  activeInterval: {
    intervalId: string;
    sequence: number;
    elapsedSeconds: number;
    remainingSeconds: number;
  } | null;
  pendingIntervalId: string | null;
  openBreak: {
    breakId: string;
    intervalId: string;
    elapsedSeconds: number;
    remainingSeconds: number;
  } | null;
  // clientElapsedSeconds - serverElapsedSeconds, when the client reported one
  driftSeconds: number | null;
}

export interface SessionEndResult {
  session: Session;
  alreadyEnded: boolean;
  experienceGained: number;
  badgesEarned: string[];
}
