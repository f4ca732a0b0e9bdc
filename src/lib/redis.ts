/**
 * Upstash Redis Client Configuration
 * Provides the embedding cache and the rate limiter's store
 */

import { Redis } from '@upstash/redis';

import type { EmbeddingCache } from '@/services/embedding.service.js';

export interface RedisConfig {
  url?: string | undefined;
  token?: string | undefined;
}

let redisInstance: Redis | null = null;

/**
 * Get the Redis client instance (lazy initialization)
 * Returns null when Upstash is not configured
 */
export function getRedis(config: RedisConfig): Redis | null {
  if (!config.url || !config.token) {
    return null;
  }
  if (redisInstance === null) {
    redisInstance = new Redis({ url: config.url, token: config.token });
  }
  return redisInstance;
}

/**
 * Cache helper with automatic JSON serialization
 */
export async function cacheGet<T>(redis: Redis, key: string): Promise<T | null> {
  return redis.get<T>(key);
}

/**
 * Cache helper with TTL
 */
export async function cacheSet<T>(
  redis: Redis,
  key: string,
  value: T,
  ttlSeconds: number
): Promise<void> {
  await redis.set(key, value, { ex: ttlSeconds });
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

/**
 * Embedding cache stored in Upstash Redis
 */
export function createRedisEmbeddingCache(redis: Redis): EmbeddingCache {
  return {
    async get(key: string): Promise<number[] | null> {
      const value = await cacheGet<unknown>(redis, key);
      return isVector(value) ? value : null;
    },

    async set(key: string, value: number[], ttlSeconds: number): Promise<void> {
      await cacheSet(redis, key, value, ttlSeconds);
    },
  };
}
