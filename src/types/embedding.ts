/**
 * Embedding Domain Types
 *
 * SCOPE: Vector embedding generation for retrieval
 */

/**
 * Embedding configuration
 */
export interface EmbeddingConfig {
  /** OpenAI embedding model to use */
  model: string;
  /** Vector dimensions */
  dimensions: number;
}

/**
 * Default embedding configuration
 */
export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: 'text-embedding-3-small',
  dimensions: 1536,
};

/**
 * Embedding result
 */
export interface EmbeddingResult {
  /** The embedding vector */
  embedding: number[];
  /** Model used to generate */
  model: string;
  /** Number of tokens in input */
  tokenCount: number;
}

/**
 * Batch embedding result
 */
export interface BatchEmbeddingResult {
  /** Embeddings in same order as input texts */
  embeddings: number[][];
  /** Model used */
  model: string;
  /** Total tokens processed */
  totalTokens: number;
}
