/**
 * Engine Configuration
 * Tunables shared by retrieval, judgment and review
 */

import type { ChunkingOptions } from './chunk.js';
import type { JudgmentRetryPolicy } from './judgment.js';

export interface EngineConfig {
  /** Default number of distinct records returned by retrieval */
  topK: number;
  /** Neighbours fetched per requested record, before de-duplication */
  overfetchFactor: number;
  chunking: ChunkingOptions;
  /** Characters of description/resolution shown per comparator candidate */
  comparatorExcerptChars: number;
  /** Characters of resolution kept as lineage evidence */
  evidenceSnippetChars: number;
  judgmentModel: string;
  judgmentTemperature: number;
  judgmentRetry: JudgmentRetryPolicy;
  review: {
    minBodyChars: number;
    maxBodyChars: number;
  };
}

/**
 * Character budget per candidate field in the comparison prompt
 */
export const COMPARATOR_EXCERPT_CHARS = 300;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  topK: 5,
  overfetchFactor: 4,
  chunking: {
    chunkSize: 600,
    chunkOverlap: 100,
  },
  comparatorExcerptChars: COMPARATOR_EXCERPT_CHARS,
  evidenceSnippetChars: 200,
  judgmentModel: 'gpt-4o-mini',
  judgmentTemperature: 0.1,
  judgmentRetry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 4000,
    timeoutMs: 30000,
  },
  review: {
    minBodyChars: 40,
    maxBodyChars: 20000,
  },
};
