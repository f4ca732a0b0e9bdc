/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseConfig } from './supabase.js';
export {
  getRedis,
  cacheGet,
  cacheSet,
  createRedisEmbeddingCache,
} from './redis.js';
export type { RedisConfig } from './redis.js';
export { envSchema, parseEnv, loadEnv } from './env.js';
export type { Env } from './env.js';
export { formatComparison } from './format.js';
