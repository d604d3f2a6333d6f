/**
 * Shared Redis Client Factory
 * One client per process, reused by the profile and session stores
 */

import { Redis, type Redis as RedisClient } from 'ioredis';
import { logger } from '../logger/structured-logger.js';
import { withTimeout } from '../reliability/timeout-guard.js';

let redisClientInstance: RedisClient | null = null;

export interface RedisClientOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
  enableOfflineQueue?: boolean;
}

function redactUrl(url: string): string {
  return url.replace(/:[^:@]+@/, ':****@');
}

/**
 * Get or create the shared Redis client
 * @returns Redis client, or null when the connection fails (callers fall back to in-memory stores)
 */
export async function getRedisClient(options: RedisClientOptions): Promise<RedisClient | null> {
  if (redisClientInstance) {
    return redisClientInstance;
  }

  const {
    url,
    maxRetriesPerRequest = 2,
    connectTimeout = 2000,
    commandTimeout = 2000,
    enableOfflineQueue = false
  } = options;

  const useTls = url.startsWith('rediss://');
  const redis = new Redis(url, {
    maxRetriesPerRequest,
    connectTimeout,
    commandTimeout,
    retryStrategy: (times: number) => {
      if (times > maxRetriesPerRequest) return null;
      return Math.min(times * 100, 500);
    },
    lazyConnect: true,
    enableOfflineQueue,
    enableReadyCheck: true,
    ...(useTls && { tls: {} })
  });

  redis.on('error', (err: Error) => {
    logger.warn({ event: 'redis_error', error: err.message }, '[Redis] Connection error');
  });

  try {
    await withTimeout(redis.connect(), connectTimeout, 'redis_connect');

    const pong = await redis.ping();
    if (pong !== 'PONG') {
      throw new Error(`Unexpected PING reply: ${pong}`);
    }

    logger.info({ event: 'redis_connected', redisUrl: redactUrl(url), useTls }, '[Redis] Shared client connected');
    redisClientInstance = redis;
    return redis;
  } catch (error) {
    logger.warn({
      event: 'redis_connection_failed',
      redisUrl: redactUrl(url),
      error: error instanceof Error ? error.message : String(error)
    }, '[Redis] Failed to connect, using in-memory stores');
    redis.disconnect();
    return null;
  }
}

/**
 * Close the Redis connection (for graceful shutdown)
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClientInstance) {
    await redisClientInstance.quit();
    logger.info({ event: 'redis_closed' }, '[Redis] Client connection closed');
    redisClientInstance = null;
  }
}
