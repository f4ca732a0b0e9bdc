/**
 * Retrieval Types
 */

import type { SourceKind } from './source.js';

/**
 * Parameters for a nearest-neighbour retrieval
 */
export interface RetrieveParams {
  query: string;
  /** Defaults to 'case' */
  kind?: SourceKind;
  /** Defaults to the engine's topK (5) */
  topK?: number;
  signal?: AbortSignal;
}

/**
 * Closest chunk of one distinct source record
 */
export interface RetrievalHit {
  sourceKind: SourceKind;
  sourceId: string;
  chunkId: string;
  chunkIndex: number;
  text: string;
  distance: number;
}

/**
 * Retrieved case enriched with the metadata the comparator needs
 * Ephemeral - built per query, never persisted
 */
export interface CandidateCase extends RetrievalHit {
  sourceKind: 'case';
  status: string;
  tier: string;
  module: string;
  category: string;
  description: string;
  resolution: string;
  kbArticleId: string | null;
  scriptId: string | null;
  scriptText: string | null;
  hasKbArticle: boolean;
  hasScript: boolean;
}
