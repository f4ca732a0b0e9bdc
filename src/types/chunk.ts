/**
 * Chunk Types
 * Bounded text segments and their embeddings
 */

import type { SourceKind } from './source.js';

/**
 * Chunk produced by the chunking pipeline, before embedding
 */
export interface TextChunk {
  /** `${sourceKind}_${sourceId}_${chunkIndex}` */
  id: string;
  sourceKind: SourceKind;
  sourceId: string;
  /** 0-based position within the source */
  chunkIndex: number;
  /** Article version for article chunks, null otherwise */
  sourceVersion: number | null;
  text: string;
}

/**
 * Embedded chunk as stored in the index
 */
export interface Chunk extends TextChunk {
  embedding: number[];
  embeddingModel: string;
}

/**
 * Nearest-neighbour match returned by the index
 */
export interface ChunkMatch {
  chunk: TextChunk;
  /** Cosine distance, lower is closer */
  distance: number;
}

/**
 * Sliding-window options (characters)
 */
export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Chunk id for a source record position
 */
export function chunkId(
  sourceKind: SourceKind,
  sourceId: string,
  chunkIndex: number
): string {
  return `${sourceKind}_${sourceId}_${chunkIndex}`;
}
