// src/repositories/user.repository.ts
import { BaseRepository } from './base';
import {
  User,
  CreateUserInput,
  UpdateUserSettingsInput,
  UserTier,
  DEFAULT_TIMER_SETTINGS,
} from '../models/user.model';
import { NotFoundError, ConflictError } from '../utils/errors';

// Users:
// ├── user:{userId}
// ├── email_idx:{email}
// └── username_idx:{username}

export class UserRepository extends BaseRepository {
  private readonly USER_PREFIX = 'user:';
  private readonly EMAIL_INDEX_PREFIX = 'email_idx:';
  private readonly USERNAME_INDEX_PREFIX = 'username_idx:';

  /**
   * Create a new user
   */
  async create(input: CreateUserInput): Promise<User> {
    const emailKey = `${this.EMAIL_INDEX_PREFIX}${input.email.toLowerCase()}`;
    if (await this.kv.exists(emailKey)) {
      throw new ConflictError('Email already exists', 'EMAIL_TAKEN');
    }

    const usernameKey = `${this.USERNAME_INDEX_PREFIX}${input.username.toLowerCase()}`;
    if (await this.kv.exists(usernameKey)) {
      throw new ConflictError('Username already exists', 'USERNAME_TAKEN');
    }

    const now = this.now();
    const userId = this.generateId('user');

    const user: User = {
      userId,
      email: input.email,
      username: input.username,
      tier: input.tier ?? UserTier.FREE,
      timezone: input.timezone ?? 'UTC',
      settings: { ...DEFAULT_TIMER_SETTINGS, ...input.settings },
      createdAt: now,
      updatedAt: now,
    };

    await this.kv.setJSON(`${this.USER_PREFIX}${userId}`, user);
    await this.kv.put(emailKey, userId);
    await this.kv.put(usernameKey, userId);

    return user;
  }

  /**
   * Get user by ID
   */
  async getById(userId: string): Promise<User> {
    const user = await this.kv.getJSON<User>(`${this.USER_PREFIX}${userId}`);
    if (!user) {
      throw new NotFoundError('User not found', 'USER_NOT_FOUND');
    }
    return user;
  }

  /**
   * Every registered user
   */
  async list(): Promise<User[]> {
    const keys = await this.kv.listKeys(this.USER_PREFIX);
    const users = await this.kv.getMany<User>(keys);
    return users.filter((u): u is User => u !== null);
  }

  /**
   * Update tier, time zone or timer settings
   */
  async updateSettings(userId: string, input: UpdateUserSettingsInput): Promise<User> {
    const user = await this.getById(userId);

    const updated: User = {
      ...user,
      tier: input.tier ?? user.tier,
      timezone: input.timezone ?? user.timezone,
      settings: { ...user.settings, ...input.settings },
      updatedAt: this.now(),
    };

    await this.kv.setJSON(`${this.USER_PREFIX}${userId}`, updated);
    return updated;
  }
}
