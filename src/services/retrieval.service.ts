/**
 * RetrievalService Implementation
 * Nearest-neighbour retrieval over the embedding index
 *
 * SCOPE: Retrieval engine
 *
 * Owns: No tables (reads knowledge_chunks, support_cases, support_scripts)
 *
 * GUARDRAILS:
 * - The query is embedded with the same EmbeddingService that wrote the
 *   index, and the index is filtered to that model
 * - Results are de-duplicated by source record, closest chunk first
 * - An empty or unreachable index is RETRIEVAL_ERROR; zero matches is an
 *   empty success
 * - Never returns a partial or inconsistent result set
 * - Requires 'knowledge:read' (AI_ACTOR may retrieve)
 *
 * Dependencies: EmbeddingService, embedding index, case store
 */

import type {
  ActorContext,
  CandidateCase,
  ChunkMatch,
  EngineConfig,
  Result,
  RetrievalHit,
  RetrieveParams,
  SourceKind,
  SupportCase,
  SupportScript,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  hasPermission,
  PERMISSIONS,
  DEFAULT_ENGINE_CONFIG,
} from '@/types/index.js';

/**
 * `details.reason` of the RETRIEVAL_ERROR returned for an index with no chunks
 */
export const EMPTY_INDEX = 'empty_index';

/**
 * Minimal EmbeddingService interface
 */
export interface RetrievalEmbedding {
  readonly model: string;
  generateEmbedding: (
    text: string
  ) => Promise<Result<{ embedding: number[] }>>;
}

/**
 * Read side of the embedding index
 */
export interface RetrievalIndex {
  countChunks: (model: string) => Promise<number>;
  queryNearest: (params: {
    embedding: number[];
    sourceKind: SourceKind;
    model: string;
    limit: number;
  }) => Promise<ChunkMatch[]>;
}

/**
 * Case lookups used to enrich candidates
 */
export interface RetrievalCaseStore {
  getCase: (caseId: string) => Promise<SupportCase | null>;
  getScript: (scriptId: string) => Promise<SupportScript | null>;
}

/**
 * RetrievalService interface
 */
export interface RetrievalService {
  retrieve(
    actor: ActorContext,
    params: RetrieveParams
  ): Promise<Result<RetrievalHit[]>>;
  retrieveCandidates(
    actor: ActorContext,
    params: Omit<RetrieveParams, 'kind'>
  ): Promise<Result<CandidateCase[]>>;
}

/**
 * Keep the closest chunk per source record, preserving distance order
 */
export function dedupeBySource(matches: ChunkMatch[], topK: number): RetrievalHit[] {
  const ordered = [...matches].sort((a, b) => a.distance - b.distance);
  const seen = new Set<string>();
  const hits: RetrievalHit[] = [];

  for (const match of ordered) {
    if (seen.has(match.chunk.sourceId)) {
      continue;
    }
    seen.add(match.chunk.sourceId);
    hits.push({
      sourceKind: match.chunk.sourceKind,
      sourceId: match.chunk.sourceId,
      chunkId: match.chunk.id,
      chunkIndex: match.chunk.chunkIndex,
      text: match.chunk.text,
      distance: match.distance,
    });
    if (hits.length === topK) {
      break;
    }
  }

  return hits;
}

/**
 * Create RetrievalService instance
 */
export function createRetrievalService(deps: {
  embeddingService: RetrievalEmbedding;
  index: RetrievalIndex;
  caseStore: RetrievalCaseStore;
  config?: Pick<EngineConfig, 'topK' | 'overfetchFactor'>;
}): RetrievalService {
  const { embeddingService, index, caseStore } = deps;
  const config = deps.config ?? DEFAULT_ENGINE_CONFIG;

  function canRetrieve(actor: ActorContext): boolean {
    return actor.type === 'ai' || hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  function cancelled() {
    return failure('CANCELLED', 'Retrieval was cancelled');
  }

  async function retrieve(
    actor: ActorContext,
    params: RetrieveParams
  ): Promise<Result<RetrievalHit[]>> {
    if (!canRetrieve(actor)) {
      return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
    }

    const query = params.query.trim();
    if (!query) {
      return failure('VALIDATION_ERROR', 'Query cannot be empty');
    }

    const kind = params.kind ?? 'case';
    const topK = params.topK ?? config.topK;
    if (!Number.isInteger(topK) || topK < 1) {
      return failure('VALIDATION_ERROR', 'topK must be a positive integer', {
        topK,
      });
    }

    const { signal } = params;
    if (signal?.aborted) {
      return cancelled();
    }

    let chunkCount: number;
    try {
      chunkCount = await index.countChunks(embeddingService.model);
    } catch (error) {
      return failure(
        'RETRIEVAL_ERROR',
        `Embedding index unreachable: ${errorMessage(error)}`,
        { reason: 'unreachable' }
      );
    }
    if (chunkCount === 0) {
      return failure('RETRIEVAL_ERROR', 'Embedding index is empty', {
        reason: EMPTY_INDEX,
        model: embeddingService.model,
      });
    }

    const embedded = await embeddingService.generateEmbedding(query);
    if (!embedded.success) {
      return failure(
        'RETRIEVAL_ERROR',
        `Failed to embed query: ${embedded.error.message}`
      );
    }
    if (signal?.aborted) {
      return cancelled();
    }

    let matches: ChunkMatch[];
    try {
      matches = await index.queryNearest({
        embedding: embedded.data.embedding,
        sourceKind: kind,
        model: embeddingService.model,
        limit: topK * config.overfetchFactor,
      });
    } catch (error) {
      return failure(
        'RETRIEVAL_ERROR',
        `Embedding index query failed: ${errorMessage(error)}`
      );
    }

    const inconsistent = matches.find(
      (m) => m.chunk.sourceKind !== kind || !Number.isFinite(m.distance)
    );
    if (inconsistent !== undefined) {
      return failure('RETRIEVAL_ERROR', 'Embedding index returned an inconsistent result', {
        chunkId: inconsistent.chunk.id,
      });
    }

    if (signal?.aborted) {
      return cancelled();
    }

    return success(dedupeBySource(matches, topK));
  }

  return {
    retrieve,

    async retrieveCandidates(
      actor: ActorContext,
      params: Omit<RetrieveParams, 'kind'>
    ): Promise<Result<CandidateCase[]>> {
      const hits = await retrieve(actor, { ...params, kind: 'case' });
      if (!hits.success) {
        return hits;
      }

      const candidates: CandidateCase[] = [];
      try {
        for (const hit of hits.data) {
          const supportCase = await caseStore.getCase(hit.sourceId);
          // Chunks can outlive a deleted case until the next rebuild
          if (supportCase === null) {
            continue;
          }

          let scriptText: string | null = null;
          if (supportCase.scriptId !== null) {
            const script = await caseStore.getScript(supportCase.scriptId);
            scriptText = script?.body ?? null;
          }

          candidates.push({
            ...hit,
            sourceKind: 'case',
            status: supportCase.status,
            tier: supportCase.tier,
            module: supportCase.module,
            category: supportCase.category,
            description: supportCase.description,
            resolution: supportCase.resolution,
            kbArticleId: supportCase.kbArticleId,
            scriptId: supportCase.scriptId,
            scriptText,
            hasKbArticle: supportCase.kbArticleId !== null,
            hasScript: supportCase.scriptId !== null,
          });
        }
      } catch (error) {
        return failure(
          'RETRIEVAL_ERROR',
          `Failed to load case metadata: ${errorMessage(error)}`
        );
      }

      if (params.signal?.aborted) {
        return cancelled();
      }

      return success(candidates);
    },
  };
}
