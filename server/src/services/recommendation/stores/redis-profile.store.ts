/**
 * Redis-backed Profile Store
 * Profiles survive restarts and are shared across instances
 *
 * Keys:
 * - rec:profile:{userId}            JSON UserProfile
 * - rec:interactions:counts:{userId} hash "{venueId}:{type}" -> count
 * - rec:interactions:log:{userId}    list of JSON Interaction (append-only)
 */

import type { Redis as RedisClient } from 'ioredis';
import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import type { Interaction, InteractionCounts, InteractionSummary, UserProfile } from '../types.js';
import type { IProfileStore } from './profile-store.interface.js';

const PROFILE_PREFIX = 'rec:profile:';
// Sibling namespaces: neither prefix may be a prefix of the other
const COUNTS_PREFIX = 'rec:interactions:counts:';
const LOG_PREFIX = 'rec:interactions:log:';

export const profileKeys = {
  profile: (userId: string) => `${PROFILE_PREFIX}${userId}`,
  interactionCounts: (userId: string) => `${COUNTS_PREFIX}${userId}`,
  interactionLog: (userId: string) => `${LOG_PREFIX}${userId}`
};

const storedProfileSchema = z.object({
  userId: z.string(),
  preferredTags: z.array(z.string()),
  avoidedTags: z.array(z.string()),
  favoriteDistricts: z.array(z.string()),
  createdAt: z.number(),
  updatedAt: z.number()
});

const COUNT_FIELD = /^(\d+):(liked|disliked)$/;

export class RedisProfileStore implements IProfileStore {
  private redis: RedisClient;

  constructor(redisClient: RedisClient) {
    this.redis = redisClient;
    logger.info({ msg: '[RedisProfileStore] Initialized with shared Redis client' });
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    const raw = await this.redis.get(profileKeys.profile(userId));
    if (!raw) {
      return null;
    }

    const parsed = storedProfileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn({
        event: 'profile_corrupt',
        userId,
        issues: parsed.error.issues.length,
        msg: '[RedisProfileStore] Stored profile failed validation, treating as absent'
      });
      return null;
    }
    return parsed.data;
  }

  async getInteractionSummary(userId: string): Promise<InteractionSummary> {
    const fields = await this.redis.hgetall(profileKeys.interactionCounts(userId));
    const summary = new Map<number, InteractionCounts>();

    for (const [field, value] of Object.entries(fields)) {
      const match = COUNT_FIELD.exec(field);
      if (!match) continue;

      const venueId = Number(match[1]);
      const counts = summary.get(venueId) ?? { liked: 0, disliked: 0 };
      const count = Number(value);
      if (match[2] === 'liked') {
        counts.liked = count;
      } else {
        counts.disliked = count;
      }
      summary.set(venueId, counts);
    }

    return summary;
  }

  async appendInteraction(interaction: Interaction): Promise<void> {
    const { userId, venueId, type } = interaction;
    await this.redis.rpush(profileKeys.interactionLog(userId), JSON.stringify(interaction));
    await this.redis.hincrby(profileKeys.interactionCounts(userId), `${venueId}:${type}`, 1);

    logger.debug({ userId, venueId, type, msg: '[RedisProfileStore] Interaction appended' });
  }

  async saveProfile(profile: UserProfile): Promise<void> {
    await this.redis.set(profileKeys.profile(profile.userId), JSON.stringify(profile));
  }

  async isReady(): Promise<boolean> {
    return this.redis.status === 'ready';
  }
}
