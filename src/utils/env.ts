import { KVCache } from './kv-helpers';
import { AppConfig } from './config';
import { Clock, systemClock } from './time';
import { EventBus } from './events';
import { UserLockRegistry } from './user-lock';
import { UserRepository } from '../repositories/user.repository';
import { SessionRepository } from '../repositories/session.repository';
import { BreakRepository } from '../repositories/break.repository';
import { StatsRepository } from '../repositories/stats.repository';
import { ProgressionRepository } from '../repositories/progression.repository';
import { BadgeRepository } from '../repositories/badge.repository';
import { ChallengeRepository } from '../repositories/challenge.repository';
import { ActivityRepository } from '../repositories/activity.repository';
import { RecordComplianceEvaluator } from '../compliance/compliance-evaluator';
import { StatsRecomputer } from '../compliance/stats-recomputer';
import { RecomputeQueue } from '../compliance/recompute-queue';
import { DefaultProgressionEngine } from '../progression/progression-engine';
import { DefaultSessionTracker } from '../session/session-tracker';

/**
 * Bindings every handler receives as `c.env`.
 */
export interface Env {
  KV_CACHE: KVCache;
  CONFIG: AppConfig;
  CLOCK: Clock;
  EVENTS: EventBus;
  LOCKS: UserLockRegistry;
  RECOMPUTE: RecomputeQueue;
}

export interface EnvOptions {
  kvCache: KVCache;
  config: AppConfig;
  clock?: Clock;
  events?: EventBus;
}

export function createEnv(options: EnvOptions): Env {
  const clock = options.clock ?? systemClock;
  const partial = {
    KV_CACHE: options.kvCache,
    CONFIG: options.config,
    CLOCK: clock,
    EVENTS: options.events ?? new EventBus(),
    LOCKS: new UserLockRegistry(),
  };

  // The queue's worker needs repositories over the same store
  const recomputer = new StatsRecomputer(
    createEvaluator(partial.KV_CACHE, clock),
    new StatsRepository(partial.KV_CACHE, clock),
    clock
  );
  return { ...partial, RECOMPUTE: new RecomputeQueue(job => recomputer.run(job)) };
}

function createEvaluator(kv: KVCache, clock: Clock): RecordComplianceEvaluator {
  return new RecordComplianceEvaluator(
    new UserRepository(kv, clock),
    new SessionRepository(kv, clock),
    new BreakRepository(kv, clock),
    new ProgressionRepository(kv, clock)
  );
}

export function createServices(env: Env) {
  const kv = env.KV_CACHE;
  const clock = env.CLOCK;

  const users = new UserRepository(kv, clock);
  const sessions = new SessionRepository(kv, clock);
  const breaks = new BreakRepository(kv, clock);
  const badges = new BadgeRepository(kv, clock);
  const challenges = new ChallengeRepository(kv, clock);
  const activity = new ActivityRepository(kv, clock);
  const evaluator = createEvaluator(kv, clock);

  const progression = new DefaultProgressionEngine({
    users,
    evaluator,
    progression: new ProgressionRepository(kv, clock),
    badges,
    challenges,
    activity,
    events: env.EVENTS,
    locks: env.LOCKS,
    config: env.CONFIG,
    clock,
  });

  const tracker = new DefaultSessionTracker({
    users,
    sessions,
    breaks,
    activity,
    evaluator,
    progression,
    recompute: env.RECOMPUTE,
    events: env.EVENTS,
    locks: env.LOCKS,
    config: env.CONFIG,
    clock,
  });

  return {
    users,
    badges,
    challenges,
    evaluator,
    recomputer: new StatsRecomputer(evaluator, new StatsRepository(kv, clock), clock),
    progression,
    tracker,
  };
}

export type Services = ReturnType<typeof createServices>;
