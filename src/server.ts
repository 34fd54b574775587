import { serve } from '@hono/node-server';
import { createApp } from './app';
import { createEnv, createServices } from './utils/env';
import { loadConfig } from './utils/config';
import { MemoryKvCache } from './utils/memory-kv';

async function main(): Promise<void> {
  const config = loadConfig();
  const env = createEnv({ kvCache: new MemoryKvCache(), config });
  const { badges, tracker, progression } = createServices(env);

  const seeded = await badges.seedDefaults();
  console.log(`[server] Seeded ${seeded.length} default badge(s)`);

  env.EVENTS.on('session.ended', ({ userId, entityId, reason }) => {
    console.log(`[events] Session ${entityId} of ${userId} ended (${reason})`);
  });
  env.EVENTS.on('badge.awarded', ({ userId, badgeName }) => {
    console.log(`[events] ${userId} earned "${badgeName}"`);
  });
  env.EVENTS.on('level.up', ({ userId, previousLevel, level }) => {
    console.log(`[events] ${userId} reached level ${level} (was ${previousLevel})`);
  });
  env.EVENTS.on('streak.milestone', ({ userId, streak }) => {
    console.log(`[events] ${userId} reached a ${streak}-day streak`);
  });

  // Time out idle sessions, then close finished days for streaks
  const maintenance = setInterval(() => {
    tracker
      .sweepInactiveSessions()
      .then(() => progression.settleAllStreaks())
      .catch(error => {
        console.error('[server] Maintenance run failed:', error);
      });
  }, config.sweepIntervalSeconds * 1000);
  maintenance.unref();

  const app = createApp();
  serve({ fetch: (request) => app.fetch(request, env), port: config.port }, (info) => {
    console.log(`[server] Listening on http://localhost:${info.port}`);
  });
}

main().catch(error => {
  console.error('[server] Failed to start:', error);
  process.exit(1);
});
