import { Hono } from 'hono';
import { createServices, Env } from '../utils/env';
import { errorResponse, readBody } from '../utils/http';
import {
  completeBreakSchema,
  startBreakSchema,
  syncStateSchema,
  validate,
} from '../utils/validators';

// POST   /api/users/:userId/sessions                          → Start session
// GET    /api/users/:userId/sessions                          → List sessions
// GET    /api/users/:userId/sessions/active                   → Get active session
// GET    /api/users/:userId/sessions/:id                      → Session with intervals and breaks
// POST   /api/users/:userId/sessions/:id/intervals/begin      → Begin next interval
// POST   /api/users/:userId/intervals/:id/complete            → Complete interval
// POST   /api/users/:userId/intervals/:id/skip                → Skip interval
// POST   /api/users/:userId/sessions/:id/breaks               → Start break
// POST   /api/users/:userId/breaks/:id/complete               → Complete break
// POST   /api/users/:userId/breaks/:id/skip                   → Skip break
// POST   /api/users/:userId/sessions/:id/end                  → End session
// POST   /api/users/:userId/sessions/:id/sync                 → Server-side timer state

const app = new Hono<{ Bindings: Env }>();

/**
 * POST /api/users/:userId/sessions
 * Start a new session
 */
app.post('/api/users/:userId/sessions', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const result = await tracker.startSession(c.req.param('userId'));

    return c.json({
      success: true,
      message: 'Session started',
      data: result,
    }, 201);
  } catch (error) {
    return errorResponse(c, error, 'Failed to start session');
  }
});

/**
 * GET /api/users/:userId/sessions
 * List sessions, oldest first
 */
app.get('/api/users/:userId/sessions', async (c) => {
  try {
    const limitParam = c.req.query('limit');
    const limit = limitParam ? parseInt(limitParam, 10) : undefined;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return c.json({ error: 'limit must be a positive integer' }, 400);
    }

    const { tracker } = createServices(c.env);
    const sessions = await tracker.listSessions(c.req.param('userId'), { limit });

    return c.json({
      success: true,
      data: sessions,
      count: sessions.length,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to list sessions');
  }
});

/**
 * GET /api/users/:userId/sessions/active
 */
app.get('/api/users/:userId/sessions/active', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const session = await tracker.getActiveSession(c.req.param('userId'));

    if (!session) {
      return c.json({ error: 'No active session found' }, 404);
    }

    return c.json({
      success: true,
      data: session,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get active session');
  }
});

/**
 * GET /api/users/:userId/sessions/:id
 */
app.get('/api/users/:userId/sessions/:id', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const detail = await tracker.getSessionDetail(c.req.param('userId'), c.req.param('id'));

    return c.json({
      success: true,
      data: detail,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get session');
  }
});

/**
 * POST /api/users/:userId/sessions/:id/intervals/begin
 */
app.post('/api/users/:userId/sessions/:id/intervals/begin', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const interval = await tracker.beginInterval(c.req.param('userId'), c.req.param('id'));

    return c.json({
      success: true,
      data: interval,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to begin interval');
  }
});

/**
 * POST /api/users/:userId/intervals/:id/complete
 */
app.post('/api/users/:userId/intervals/:id/complete', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const result = await tracker.completeInterval(c.req.param('userId'), c.req.param('id'));

    return c.json({
      success: true,
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to complete interval');
  }
});

/**
 * POST /api/users/:userId/intervals/:id/skip
 */
app.post('/api/users/:userId/intervals/:id/skip', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const result = await tracker.skipInterval(c.req.param('userId'), c.req.param('id'));

    return c.json({
      success: true,
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to skip interval');
  }
});

/**
 * POST /api/users/:userId/sessions/:id/breaks
 * Start (or resume) the break after a completed interval
 */
app.post('/api/users/:userId/sessions/:id/breaks', async (c) => {
  try {
    const { intervalId } = validate(startBreakSchema, await readBody(c));

    const { tracker } = createServices(c.env);
    const record = await tracker.startBreak(c.req.param('userId'), c.req.param('id'), intervalId);

    return c.json({
      success: true,
      data: record,
    }, 201);
  } catch (error) {
    return errorResponse(c, error, 'Failed to start break');
  }
});

/**
 * POST /api/users/:userId/breaks/:id/complete
 */
app.post('/api/users/:userId/breaks/:id/complete', async (c) => {
  try {
    const input = validate(completeBreakSchema, await readBody(c));

    const { tracker } = createServices(c.env);
    const result = await tracker.completeBreak(c.req.param('userId'), c.req.param('id'), input);

    return c.json({
      success: true,
      message: result.isCompliant ? 'Break completed' : 'Break recorded as non-compliant',
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to complete break');
  }
});

/**
 * POST /api/users/:userId/breaks/:id/skip
 */
app.post('/api/users/:userId/breaks/:id/skip', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const record = await tracker.skipBreak(c.req.param('userId'), c.req.param('id'));

    return c.json({
      success: true,
      data: record,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to skip break');
  }
});

/**
 * POST /api/users/:userId/sessions/:id/end
 * Timeouts are decided by the server, so a client always ends as 'user'
 */
app.post('/api/users/:userId/sessions/:id/end', async (c) => {
  try {
    const { tracker } = createServices(c.env);
    const result = await tracker.endSession(c.req.param('userId'), c.req.param('id'), 'user');

    return c.json({
      success: true,
      message: result.alreadyEnded ? 'Session had already ended' : 'Session ended',
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to end session');
  }
});

/**
 * POST /api/users/:userId/sessions/:id/sync
 */
app.post('/api/users/:userId/sessions/:id/sync', async (c) => {
  try {
    const { clientElapsedSeconds } = validate(syncStateSchema, await readBody(c));

    const { tracker } = createServices(c.env);
    const state = await tracker.syncState(c.req.param('userId'), c.req.param('id'), clientElapsedSeconds);

    return c.json({
      success: true,
      data: state,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to sync session');
  }
});

export default app;
