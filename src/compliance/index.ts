import { Hono } from 'hono';
import { createServices, Env } from '../utils/env';
import { errorResponse } from '../utils/http';
import { periodQuerySchema, validate } from '../utils/validators';

// GET    /api/users/:userId/compliance/daily/:day              → Daily stats
// GET    /api/users/:userId/compliance/summary?start&end       → Period summary
// GET    /api/users/:userId/compliance/weekly/:day             → Week containing the day
// GET    /api/users/:userId/compliance/monthly/:year/:month    → Calendar month
// GET    /api/users/:userId/compliance/statistics              → Lifetime statistics

const app = new Hono<{ Bindings: Env }>();

app.get('/api/users/:userId/compliance/daily/:day', async (c) => {
  try {
    const { recomputer } = createServices(c.env);
    const stats = await recomputer.readDailyStats(c.req.param('userId'), c.req.param('day'));

    return c.json({
      success: true,
      data: stats,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get daily statistics');
  }
});

app.get('/api/users/:userId/compliance/summary', async (c) => {
  try {
    const { start, end } = validate(periodQuerySchema, {
      start: c.req.query('start'),
      end: c.req.query('end'),
    });

    const { evaluator } = createServices(c.env);
    const summary = await evaluator.periodSummary(c.req.param('userId'), start, end);

    return c.json({
      success: true,
      data: summary,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get compliance summary');
  }
});

app.get('/api/users/:userId/compliance/weekly/:day', async (c) => {
  try {
    const { recomputer } = createServices(c.env);
    const stats = await recomputer.readWeeklyStats(c.req.param('userId'), c.req.param('day'));

    return c.json({
      success: true,
      data: stats,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get weekly statistics');
  }
});

app.get('/api/users/:userId/compliance/monthly/:year/:month', async (c) => {
  try {
    const year = parseInt(c.req.param('year'), 10);
    const month = parseInt(c.req.param('month'), 10);

    const { recomputer } = createServices(c.env);
    const stats = await recomputer.readMonthlyStats(c.req.param('userId'), year, month);

    return c.json({
      success: true,
      data: stats,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get monthly statistics');
  }
});

app.get('/api/users/:userId/compliance/statistics', async (c) => {
  try {
    const { evaluator } = createServices(c.env);
    const stats = await evaluator.userStatistics(c.req.param('userId'));

    return c.json({
      success: true,
      data: stats,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get statistics');
  }
});

export default app;
