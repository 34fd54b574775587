import { Timestamp } from './common.model';

export type ActivityType =
  | 'session_started'
  | 'session_ended'
  | 'break_completed'
  | 'badge_earned'
  | 'level_up'
  | 'challenge_completed';

export interface ActivityFeedEntry {
  entryId: string;
  userId: string;
  type: ActivityType;
  data: Record<string, string | number | boolean | null>;
  createdAt: Timestamp;
}
