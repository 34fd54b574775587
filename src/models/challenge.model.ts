import { Timestamp } from './common.model';

export type ChallengeMetric = 'session_count' | 'compliant_breaks' | 'work_minutes' | 'daily_streak';

export interface Challenge {
  challengeId: string;
  name: string;
  description: string;
  metric: ChallengeMetric;
  targetValue: number;
  startsAt: Timestamp;
  endsAt: Timestamp;
  experienceReward: number;
  createdAt: Timestamp;
}

export interface CreateChallengeInput {
  name: string;
  description?: string;
  metric: ChallengeMetric;
  targetValue: number;
  startsAt: Timestamp;
  endsAt: Timestamp;
  experienceReward?: number;
}

export interface ChallengeParticipation {
  userId: string;
  challengeId: string;
  progress: number; // never exceeds the challenge target
  joinedAt: Timestamp;
  updatedAt: Timestamp;
  completedAt?: Timestamp;
}

export function progressPercentage(participation: ChallengeParticipation, challenge: Challenge): number {
  if (challenge.targetValue === 0) return 100;
  return Math.round((participation.progress / challenge.targetValue) * 100);
}
