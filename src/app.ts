import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { Env } from './utils/env';
import userApp from './user';
import sessionApp from './session';
import complianceApp from './compliance';
import progressionApp from './progression';

export function createApp(options: { accessLog?: boolean } = {}) {
  const app = new Hono<{ Bindings: Env }>();
  if (options.accessLog ?? true) {
    app.use('*', logger());
  }

  app.get('/health', (c) => c.json({ status: 'ok', time: c.env.CLOCK.now().toISOString() }));

  app.route('/', userApp);
  app.route('/', sessionApp);
  app.route('/', complianceApp);
  app.route('/', progressionApp);

  app.notFound((c) => c.json({ error: 'Route not found' }, 404));

  return app;
}
