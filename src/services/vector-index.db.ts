/**
 * Embedding Index Database Adapter
 * Implements VectorIndexDb interface using Supabase + pgvector
 *
 * Nearest-neighbour search and the per-source chunk swap run inside
 * Postgres functions (supabase/migrations), so each is one round trip
 * and one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  ChunkMatch,
  ReplaceChunksOutcome,
  ReplaceChunksParams,
  SourceKind,
} from '@/types/index.js';
import { SOURCE_KINDS } from '@/types/index.js';

import type { VectorIndexDb } from './indexing.service.js';

/**
 * Row returned by match_knowledge_chunks
 */
interface ChunkMatchRow {
  id: string;
  source_kind: string;
  source_id: string;
  chunk_index: number;
  source_version: number | null;
  content: string;
  distance: number;
}

/**
 * Row returned by replace_source_chunks
 */
interface ReplaceChunksRow {
  status: 'replaced' | 'stale';
  inserted: number | null;
  retired: number | null;
  current_version: number | null;
}

function toSourceKind(value: string): SourceKind {
  const kind = SOURCE_KINDS.find((k) => k === value);
  if (kind === undefined) {
    throw new Error(`Unknown chunk source kind: ${value}`);
  }
  return kind;
}

/**
 * Map database row to ChunkMatch
 */
function mapRowToMatch(row: ChunkMatchRow): ChunkMatch {
  return {
    chunk: {
      id: row.id,
      sourceKind: toSourceKind(row.source_kind),
      sourceId: row.source_id,
      chunkIndex: row.chunk_index,
      sourceVersion: row.source_version,
      text: row.content,
    },
    distance: Number(row.distance),
  };
}

/**
 * Create VectorIndexDb implementation using Supabase
 */
export function createVectorIndexDb(supabase: SupabaseClient): VectorIndexDb {
  return {
    async countChunks(model: string): Promise<number> {
      const { count, error } = await supabase
        .from('knowledge_chunks')
        .select('id', { count: 'exact', head: true })
        .eq('embedding_model', model);

      if (error !== null) {
        throw new Error(`Failed to count chunks: ${error.message}`);
      }
      return count ?? 0;
    },

    async queryNearest(params): Promise<ChunkMatch[]> {
      const { data, error } = await supabase.rpc('match_knowledge_chunks', {
        query_embedding: params.embedding,
        match_kind: params.sourceKind,
        match_model: params.model,
        match_count: params.limit,
      });

      if (error !== null) {
        throw new Error(`Failed to query nearest chunks: ${error.message}`);
      }
      return ((data ?? []) as ChunkMatchRow[]).map(mapRowToMatch);
    },

    async replaceSourceChunks(
      params: ReplaceChunksParams
    ): Promise<ReplaceChunksOutcome> {
      const { data, error } = await supabase.rpc('replace_source_chunks', {
        p_source_kind: params.sourceKind,
        p_source_id: params.sourceId,
        p_source_version: params.sourceVersion,
        p_chunks: params.chunks.map((c) => ({
          id: c.id,
          chunk_index: c.chunkIndex,
          content: c.text,
          embedding: c.embedding,
          embedding_model: c.embeddingModel,
        })),
      });

      if (error !== null) {
        throw new Error(`Failed to replace source chunks: ${error.message}`);
      }

      const row = data as ReplaceChunksRow;
      if (row.status === 'stale') {
        return { status: 'stale', currentVersion: row.current_version ?? 0 };
      }
      return {
        status: 'replaced',
        inserted: row.inserted ?? 0,
        retired: row.retired ?? 0,
      };
    },

    async deleteSourceChunks(
      sourceKind: SourceKind,
      sourceId: string
    ): Promise<number> {
      const { count, error } = await supabase
        .from('knowledge_chunks')
        .delete({ count: 'exact' })
        .eq('source_kind', sourceKind)
        .eq('source_id', sourceId);

      if (error !== null) {
        throw new Error(`Failed to delete source chunks: ${error.message}`);
      }
      return count ?? 0;
    },

    async listChunkIds(
      sourceKind: SourceKind,
      sourceId: string
    ): Promise<string[]> {
      const { data, error } = await supabase
        .from('knowledge_chunks')
        .select('id')
        .eq('source_kind', sourceKind)
        .eq('source_id', sourceId)
        .order('chunk_index', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list chunk ids: ${error.message}`);
      }
      return ((data ?? []) as Array<{ id: string }>).map((row) => row.id);
    },
  };
}
