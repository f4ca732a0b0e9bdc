/**
 * Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Ratelimit } from '@upstash/ratelimit';
import type { Redis } from '@upstash/redis';

import { createApp } from './api/app.js';
import {
  createAuthMiddleware,
  createSupabaseTokenVerifier,
} from './api/middleware/auth.js';
import {
  createRateLimitMiddleware,
  createUpstashRateLimiter,
  RATE_LIMITS,
} from './api/middleware/rateLimit.js';
import type { RateLimitScope } from './api/middleware/rateLimit.js';
import { createLearningEngine, createSupabaseStores } from './engine.js';
import {
  createRedisEmbeddingCache,
  createSupabaseAdmin,
  getRedis,
  loadEnv,
} from './lib/index.js';
import { createLLMClient, createOpenAIClient } from './orchestrator/index.js';
import { createOpenAIEmbeddingClient } from './services/index.js';

const env = loadEnv();

const supabase = createSupabaseAdmin({
  url: env.SUPABASE_URL,
  serviceKey: env.SUPABASE_SERVICE_KEY,
});

const openai = createOpenAIClient({
  apiKey: env.OPENAI_API_KEY,
  ...(env.OPENAI_BASE_URL !== undefined && { baseURL: env.OPENAI_BASE_URL }),
});

const redis = getRedis({
  url: env.UPSTASH_REDIS_URL,
  token: env.UPSTASH_REDIS_TOKEN,
});

const stores = createSupabaseStores(supabase);

const engine = createLearningEngine({
  stores,
  llm: createLLMClient(openai),
  embeddingClient: createOpenAIEmbeddingClient(openai),
  embeddingConfig: {
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
  },
  config: { judgmentModel: env.JUDGMENT_MODEL },
  ...(redis !== null && { embeddingCache: createRedisEmbeddingCache(redis) }),
});

function upstashLimit(client: Redis, scope: RateLimitScope) {
  const { limit, window } = RATE_LIMITS[scope];
  return createRateLimitMiddleware(
    createUpstashRateLimiter(
      new Ratelimit({
        redis: client,
        limiter: Ratelimit.slidingWindow(limit, `${window} s`),
        prefix: 'knowledge-loop:ratelimit',
      })
    ),
    { scope }
  );
}

const rateLimits =
  redis !== null
    ? { ask: upstashLimit(redis, 'ask'), learn: upstashLimit(redis, 'learn') }
    : undefined;

const app = createApp({
  services: engine,
  authMiddleware: createAuthMiddleware({
    verifyToken: createSupabaseTokenVerifier(supabase),
  }),
  allowedOrigins: env.ALLOWED_ORIGINS,
  health: {
    index: {
      model: engine.embeddingService.model,
      countChunks: stores.vectorIndexDb.countChunks,
    },
  },
  ...(rateLimits !== undefined && { rateLimits }),
});

console.error(`Server starting on port ${env.PORT}`);
if (redis === null) {
  console.error('Upstash not configured: embedding cache and rate limiting disabled');
}

serve({
  fetch: app.fetch,
  port: env.PORT,
});

export { app };
