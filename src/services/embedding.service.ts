/**
 * EmbeddingService Implementation
 * Vector embedding generation for indexing and retrieval
 *
 * SCOPE: Generate vector embeddings for text content
 * Uses OpenAI text-embedding-3-small (or an OpenAI-compatible endpoint)
 *
 * GUARDRAILS:
 * - Validates input text is not empty
 * - One model per deployment: index writes and queries share this service,
 *   and every stored chunk records `model`
 * - Cache failures never fail an embedding call
 */

import { createHash } from 'crypto';

import type OpenAI from 'openai';

import type {
  EmbeddingConfig,
  EmbeddingResult,
  BatchEmbeddingResult,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  DEFAULT_EMBEDDING_CONFIG,
} from '@/types/index.js';

/**
 * Embedding client interface (abstraction over the OpenAI SDK)
 */
export interface EmbeddingServiceClient {
  createEmbedding: (
    text: string,
    config: EmbeddingConfig
  ) => Promise<EmbeddingResult>;
  createBatchEmbeddings: (
    texts: string[],
    config: EmbeddingConfig
  ) => Promise<BatchEmbeddingResult>;
}

/**
 * Optional vector cache (Upstash Redis in production)
 */
export interface EmbeddingCache {
  get: (key: string) => Promise<number[] | null>;
  set: (key: string, value: number[], ttlSeconds: number) => Promise<void>;
}

/**
 * EmbeddingService interface
 */
export interface EmbeddingService {
  /** Model every vector of this deployment is produced with */
  readonly model: string;

  /** Generate embedding for single text */
  generateEmbedding(text: string): Promise<Result<EmbeddingResult>>;

  /** Generate embeddings for multiple texts, in input order */
  generateBatchEmbeddings(
    texts: string[]
  ): Promise<Result<BatchEmbeddingResult>>;
}

/**
 * Cached query vectors live for a day
 */
const CACHE_TTL_SECONDS = 60 * 60 * 24;

/**
 * Create EmbeddingService instance
 */
export function createEmbeddingService(deps: {
  client: EmbeddingServiceClient;
  config?: EmbeddingConfig;
  cache?: EmbeddingCache;
}): EmbeddingService {
  const { client, cache } = deps;
  const config = deps.config ?? DEFAULT_EMBEDDING_CONFIG;

  function cacheKey(text: string): string {
    const digest = createHash('sha256').update(text).digest('hex');
    return `embedding:${config.model}:${config.dimensions}:${digest}`;
  }

  async function readCache(text: string): Promise<number[] | null> {
    if (cache === undefined) {
      return null;
    }
    try {
      return await cache.get(cacheKey(text));
    } catch (error) {
      console.error('Embedding cache read failed:', errorMessage(error));
      return null;
    }
  }

  async function writeCache(text: string, embedding: number[]): Promise<void> {
    if (cache === undefined) {
      return;
    }
    try {
      await cache.set(cacheKey(text), embedding, CACHE_TTL_SECONDS);
    } catch (error) {
      console.error('Embedding cache write failed:', errorMessage(error));
    }
  }

  return {
    model: config.model,

    async generateEmbedding(text: string): Promise<Result<EmbeddingResult>> {
      // Validate input
      const trimmed = text.trim();
      if (!trimmed) {
        return failure('VALIDATION_ERROR', 'Text cannot be empty');
      }

      const cached = await readCache(trimmed);
      if (cached !== null) {
        return success({ embedding: cached, model: config.model, tokenCount: 0 });
      }

      try {
        const result = await client.createEmbedding(trimmed, config);
        await writeCache(trimmed, result.embedding);
        return success(result);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to generate embedding: ${errorMessage(error)}`
        );
      }
    },

    async generateBatchEmbeddings(
      texts: string[]
    ): Promise<Result<BatchEmbeddingResult>> {
      const trimmed = texts.map((t) => t.trim());

      // Every slot must stay aligned with its chunk
      if (trimmed.length === 0 || trimmed.some((t) => t.length === 0)) {
        return failure(
          'VALIDATION_ERROR',
          'Texts must be a non-empty array of non-empty strings'
        );
      }

      try {
        const result = await client.createBatchEmbeddings(trimmed, config);
        if (result.embeddings.length !== trimmed.length) {
          return failure(
            'INTERNAL_ERROR',
            `Expected ${trimmed.length} embeddings, received ${result.embeddings.length}`
          );
        }
        return success(result);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to generate batch embeddings: ${errorMessage(error)}`
        );
      }
    },
  };
}

/**
 * Create an embedding client backed by the OpenAI SDK
 */
export function createOpenAIEmbeddingClient(
  openai: OpenAI
): EmbeddingServiceClient {
  async function callEmbeddingAPI(
    input: string | string[],
    config: EmbeddingConfig
  ): Promise<{ embeddings: number[][]; model: string; totalTokens: number }> {
    const response = await openai.embeddings.create({
      model: config.model,
      input,
      dimensions: config.dimensions,
    });

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return {
      embeddings: ordered.map((d) => d.embedding),
      model: response.model,
      totalTokens: response.usage.total_tokens,
    };
  }

  return {
    async createEmbedding(
      text: string,
      config: EmbeddingConfig
    ): Promise<EmbeddingResult> {
      const result = await callEmbeddingAPI(text, config);
      const first = result.embeddings[0];
      if (!first) {
        throw new Error('No embedding returned from API');
      }
      return {
        embedding: first,
        model: result.model,
        tokenCount: result.totalTokens,
      };
    },

    async createBatchEmbeddings(
      texts: string[],
      config: EmbeddingConfig
    ): Promise<BatchEmbeddingResult> {
      return callEmbeddingAPI(texts, config);
    },
  };
}
