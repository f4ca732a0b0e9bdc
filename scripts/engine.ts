/**
 * Engine bootstrap shared by the operational scripts
 */

import 'dotenv/config';

import { createLearningEngine, createSupabaseStores } from '../src/engine.js';
import type { LearningEngine } from '../src/engine.js';
import {
  createRedisEmbeddingCache,
  createSupabaseAdmin,
  getRedis,
  loadEnv,
} from '../src/lib/index.js';
import { createLLMClient, createOpenAIClient } from '../src/orchestrator/index.js';
import { createOpenAIEmbeddingClient } from '../src/services/index.js';

export function bootstrapEngine(): LearningEngine {
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

  return createLearningEngine({
    stores: createSupabaseStores(supabase),
    llm: createLLMClient(openai),
    embeddingClient: createOpenAIEmbeddingClient(openai),
    embeddingConfig: {
      model: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
    },
    config: { judgmentModel: env.JUDGMENT_MODEL },
    ...(redis !== null && { embeddingCache: createRedisEmbeddingCache(redis) }),
  });
}
