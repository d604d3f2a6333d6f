/**
 * User Location Store
 * Last location a user shared, kept for SESSION_TTL_SECONDS so later
 * "near me" queries can reuse it.
 */

import type { Redis as RedisClient } from 'ioredis';
import { logger } from '../../lib/logger/structured-logger.js';
import type { GeoPoint } from '../../lib/geo/distance-calculator.js';
import { geoPointSchema } from '../recommendation/query/recommendation-query.schema.js';

const KEY_PREFIX = 'rec:location:';

export interface IUserLocationStore {
  get(userId: string): Promise<GeoPoint | null>;
  save(userId: string, point: GeoPoint): Promise<void>;
  clear(userId: string): Promise<void>;
  isReady(): Promise<boolean>;
}

export class InMemoryUserLocationStore implements IUserLocationStore {
  private locations = new Map<string, { point: GeoPoint; expiresAt: number }>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(userId: string): Promise<GeoPoint | null> {
    const entry = this.locations.get(userId);
    if (!entry) return null;

    // Expired entries are dropped on read
    if (entry.expiresAt <= this.now()) {
      this.locations.delete(userId);
      return null;
    }
    return entry.point;
  }

  async save(userId: string, point: GeoPoint): Promise<void> {
    this.locations.set(userId, { point, expiresAt: this.now() + this.ttlSeconds * 1000 });
  }

  async clear(userId: string): Promise<void> {
    this.locations.delete(userId);
  }

  async isReady(): Promise<boolean> {
    return true;
  }
}

export class RedisUserLocationStore implements IUserLocationStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly ttlSeconds: number
  ) {}

  async get(userId: string): Promise<GeoPoint | null> {
    const raw = await this.redis.get(`${KEY_PREFIX}${userId}`);
    if (!raw) return null;

    const parsed = geoPointSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  }

  async save(userId: string, point: GeoPoint): Promise<void> {
    await this.redis.setex(`${KEY_PREFIX}${userId}`, this.ttlSeconds, JSON.stringify(point));
  }

  async clear(userId: string): Promise<void> {
    await this.redis.del(`${KEY_PREFIX}${userId}`);
  }

  async isReady(): Promise<boolean> {
    return this.redis.status === 'ready';
  }
}

export type LocationSource = 'query' | 'request' | 'saved';

export interface ResolvedLocation {
  point: GeoPoint | null;
  source: LocationSource | null;
}

/**
 * Point for a geo/hybrid turn: the query's own point, then the location sent
 * with the request, then the saved one. A failing store counts as "no saved location".
 */
export async function resolveQueryLocation(
  queryPoint: GeoPoint | undefined,
  requestLocation: GeoPoint | undefined,
  store: IUserLocationStore,
  userId: string
): Promise<ResolvedLocation> {
  if (queryPoint) return { point: queryPoint, source: 'query' };
  if (requestLocation) return { point: requestLocation, source: 'request' };

  try {
    const saved = await store.get(userId);
    return saved ? { point: saved, source: 'saved' } : { point: null, source: null };
  } catch (error) {
    logger.warn({
      event: 'saved_location_unavailable',
      userId,
      error: error instanceof Error ? error.message : String(error)
    }, '[Session] Saved location lookup failed');
    return { point: null, source: null };
  }
}
