import { Badge, BadgeRequirement } from '../models/badge.model';
import { UserStatistics } from '../models/stats.model';

function sessionsInHours(stats: UserStatistics, fromHour: number, toHour: number): number {
  let total = 0;
  for (let hour = 0; hour < 24; hour++) {
    // A window such as 22..2 wraps past midnight
    const inWindow = fromHour <= toHour
      ? hour >= fromHour && hour <= toHour
      : hour >= fromHour || hour <= toHour;
    if (inWindow) {
      total += stats.sessionsByHour[hour] ?? 0;
    }
  }
  return total;
}

export function meetsRequirement(requirement: BadgeRequirement, stats: UserStatistics): boolean {
  switch (requirement.kind) {
    case 'streak_at_least':
      return stats.currentStreak >= requirement.value;
    case 'best_streak_at_least':
      return stats.bestStreak >= requirement.value;
    case 'total_sessions_at_least':
      return stats.totalSessions >= requirement.value;
    case 'compliant_breaks_at_least':
      return stats.compliantBreaks >= requirement.value;
    case 'perfect_days_at_least':
      return stats.perfectDays >= requirement.value;
    case 'compliance_rate_at_least':
      return stats.totalBreaks >= requirement.minBreaks && stats.complianceRate >= requirement.value;
    case 'consecutive_compliant_breaks_at_least':
      return stats.consecutiveCompliantBreaks >= requirement.value;
    case 'sessions_in_hours_at_least':
      return sessionsInHours(stats, requirement.fromHour, requirement.toHour) >= requirement.value;
    case 'weekend_sessions_at_least':
      return stats.weekendSessions >= requirement.value;
    case 'level_at_least':
      return stats.level >= requirement.value;
  }
}

/** Every requirement of the badge holds. */
export function isBadgeEarned(badge: Badge, stats: UserStatistics): boolean {
  return badge.requirements.every(requirement => meetsRequirement(requirement, stats));
}
