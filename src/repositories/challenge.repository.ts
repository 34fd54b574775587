// src/repositories/challenge.repository.ts
import { BaseRepository } from './base';
import { Challenge, CreateChallengeInput, ChallengeParticipation } from '../models/challenge.model';
import { NotFoundError, ValidationError } from '../utils/errors';

// Challenges:
// ├── challenge:{challengeId}
// ├── participation:{challengeId}:{userId}
// └── user_challenges:{userId}:{challengeId}

export class ChallengeRepository extends BaseRepository {
  private readonly CHALLENGE_PREFIX = 'challenge:';
  private readonly PARTICIPATION_PREFIX = 'participation:';
  private readonly USER_CHALLENGES_PREFIX = 'user_challenges:';

  async create(input: CreateChallengeInput): Promise<Challenge> {
    if (new Date(input.endsAt).getTime() <= new Date(input.startsAt).getTime()) {
      throw new ValidationError('Challenge must end after it starts');
    }

    const challenge: Challenge = {
      challengeId: this.generateId('challenge'),
      name: input.name,
      description: input.description ?? '',
      metric: input.metric,
      targetValue: input.targetValue,
      startsAt: new Date(input.startsAt).toISOString(),
      endsAt: new Date(input.endsAt).toISOString(),
      experienceReward: input.experienceReward ?? 0,
      createdAt: this.now(),
    };

    await this.kv.setJSON(`${this.CHALLENGE_PREFIX}${challenge.challengeId}`, challenge);
    return challenge;
  }

  async getById(challengeId: string): Promise<Challenge> {
    const challenge = await this.kv.getJSON<Challenge>(`${this.CHALLENGE_PREFIX}${challengeId}`);
    if (!challenge) {
      throw new NotFoundError('Challenge not found', 'CHALLENGE_NOT_FOUND');
    }
    return challenge;
  }

  async list(): Promise<Challenge[]> {
    const keys = await this.kv.listKeys(this.CHALLENGE_PREFIX);
    const challenges = await this.kv.getMany<Challenge>(keys);
    return challenges
      .filter((c): c is Challenge => c !== null)
      .sort((a, b) => a.startsAt.localeCompare(b.startsAt));
  }

  async getParticipation(userId: string, challengeId: string): Promise<ChallengeParticipation | null> {
    return this.kv.getJSON<ChallengeParticipation>(`${this.PARTICIPATION_PREFIX}${challengeId}:${userId}`);
  }

  async saveParticipation(participation: ChallengeParticipation): Promise<ChallengeParticipation> {
    const { userId, challengeId } = participation;
    await this.kv.setJSON(`${this.PARTICIPATION_PREFIX}${challengeId}:${userId}`, participation);
    await this.kv.put(`${this.USER_CHALLENGES_PREFIX}${userId}:${challengeId}`, challengeId);
    return participation;
  }

  async listParticipationsByUser(userId: string): Promise<ChallengeParticipation[]> {
    const keys = await this.kv.listKeys(`${this.USER_CHALLENGES_PREFIX}${userId}:`);
    const challengeIds = keys.map(key => key.split(':').pop() || '');
    const participations = await this.kv.getMany<ChallengeParticipation>(
      challengeIds.map(id => `${this.PARTICIPATION_PREFIX}${id}:${userId}`)
    );
    return participations.filter((p): p is ChallengeParticipation => p !== null);
  }
}
