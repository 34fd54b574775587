// src/user/index.ts
import { Hono } from 'hono';
import { UserRepository } from '../repositories/user.repository';
import { Env } from '../utils/env';
import { errorResponse, readBody } from '../utils/http';
import { createUserSchema, updateUserSettingsSchema, validate } from '../utils/validators';

// POST   /api/users                      → Create user
// GET    /api/users/:userId              → Get user
// PATCH  /api/users/:userId/settings     → Update tier, time zone, timer settings

const app = new Hono<{ Bindings: Env }>();

// Create a new user
app.post('/api/users', async (c) => {
  try {
    const input = validate(createUserSchema, await readBody(c));

    const userRepo = new UserRepository(c.env.KV_CACHE, c.env.CLOCK);
    const user = await userRepo.create(input);

    return c.json({
      success: true,
      message: 'User created successfully',
      data: user,
    }, 201);
  } catch (error) {
    return errorResponse(c, error, 'Failed to create user');
  }
});

// Get user by ID
app.get('/api/users/:userId', async (c) => {
  try {
    const userRepo = new UserRepository(c.env.KV_CACHE, c.env.CLOCK);
    const user = await userRepo.getById(c.req.param('userId'));

    return c.json({
      success: true,
      data: user,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to get user');
  }
});

// Update settings
app.patch('/api/users/:userId/settings', async (c) => {
  try {
    const input = validate(updateUserSettingsSchema, await readBody(c));

    const userRepo = new UserRepository(c.env.KV_CACHE, c.env.CLOCK);
    const user = await userRepo.updateSettings(c.req.param('userId'), input);

    return c.json({
      success: true,
      message: 'Settings updated successfully',
      data: user,
    });
  } catch (error) {
    return errorResponse(c, error, 'Failed to update settings');
  }
});

export default app;
