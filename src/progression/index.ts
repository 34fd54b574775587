import { Hono } from 'hono';
import { createServices, Env } from '../utils/env';
import { errorResponse, readBody } from '../utils/http';
import {
  challengeProgressSchema,
  createChallengeSchema,
  dayKeySchema,
  leaderboardQuerySchema,
  validate,
} from '../utils/validators';

// GET    /api/users/:userId/progress                      → Level, streak, badges, challenges
// POST   /api/users/:userId/streak/:day                   → Evaluate streak for a finished day
// POST   /api/users/:userId/badges/evaluate               → Award newly earned badges
// GET    /api/badges                                      → Badge catalog
// GET    /api/leaderboard?metric&limit                    → Rank users by level, streak or badges
// GET    /api/challenges                                  → List challenges
// POST   /api/challenges                                  → Create challenge
// POST   /api/users/:userId/challenges/:id/join           → Join challenge
// POST   /api/users/:userId/challenges/:id/progress       → Add progress

const app = new Hono<{ Bindings: Env }>();

app.get('/api/users/:userId/progress', async (c) => {
  try {
    const { users, progression } = createServices(c.env);
    const userId = c.req.param('userId');
    await users.getById(userId);
    const summary = await progression.getProgressSummary(userId);

    return c.json({
      success: true,
      data: summary,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get progress');
  }
});

app.post('/api/users/:userId/streak/:day', async (c) => {
  try {
    const day = validate(dayKeySchema, c.req.param('day'));

    const { users, progression } = createServices(c.env);
    const userId = c.req.param('userId');
    await users.getById(userId);
    const result = await progression.updateStreak(userId, day);

    return c.json({
      success: true,
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to update streak');
  }
});

app.post('/api/users/:userId/badges/evaluate', async (c) => {
  try {
    const { users, progression } = createServices(c.env);
    const userId = c.req.param('userId');
    await users.getById(userId);
    const result = await progression.evaluateBadges(userId);

    return c.json({
      success: true,
      message: result.awarded.length > 0 ? `${result.awarded.length} badge(s) earned` : 'No new badges',
      data: result,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to evaluate badges');
  }
});

app.get('/api/badges', async (c) => {
  try {
    const { badges } = createServices(c.env);
    const catalog = await badges.list({ activeOnly: true });

    return c.json({
      success: true,
      data: catalog,
      count: catalog.length,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to list badges');
  }
});

app.get('/api/leaderboard', async (c) => {
  try {
    const { metric, limit } = validate(leaderboardQuerySchema, {
      metric: c.req.query('metric'),
      limit: c.req.query('limit'),
    });

    const { progression } = createServices(c.env);
    const leaderboard = await progression.getLeaderboard(metric, limit);

    return c.json({
      success: true,
      data: leaderboard,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get leaderboard');
  }
});

app.get('/api/challenges', async (c) => {
  try {
    const { challenges } = createServices(c.env);
    const list = await challenges.list();

    return c.json({
      success: true,
      data: list,
      count: list.length,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to list challenges');
  }
});

app.post('/api/challenges', async (c) => {
  try {
    const input = validate(createChallengeSchema, await readBody(c));

    const { challenges } = createServices(c.env);
    const challenge = await challenges.create(input);

    return c.json({
      success: true,
      message: 'Challenge created successfully',
      data: challenge,
    }, 201);
  } catch (error) {
    return errorResponse(c, error, 'Failed to create challenge');
  }
});

app.post('/api/users/:userId/challenges/:id/join', async (c) => {
  try {
    const { users, progression } = createServices(c.env);
    const userId = c.req.param('userId');
    await users.getById(userId);
    const participation = await progression.joinChallenge(userId, c.req.param('id'));

    return c.json({
      success: true,
      message: 'Joined challenge',
      data: participation,
    }, 201);
  } catch (error) {
    return errorResponse(c, error, 'Failed to join challenge');
  }
});

app.post('/api/users/:userId/challenges/:id/progress', async (c) => {
  try {
    const { delta } = validate(challengeProgressSchema, await readBody(c));

    const { progression } = createServices(c.env);
    const participation = await progression.updateChallengeProgress(
      c.req.param('userId'),
      c.req.param('id'),
      delta
    );

    if (!participation) {
      return c.json({ error: 'Not a participant of this challenge' }, 404);
    }

    return c.json({
      success: true,
      data: participation,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to update challenge progress');
  }
});

export default app;
