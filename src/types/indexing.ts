/**
 * Indexing Types
 * Writes to the embedding index
 */

import type { Chunk } from './chunk.js';
import type { SourceKind } from './source.js';

/**
 * Replace every chunk of one source in a single transaction
 */
export interface ReplaceChunksParams {
  sourceKind: SourceKind;
  sourceId: string;
  /** Refused when the index holds a newer version of the source */
  sourceVersion: number | null;
  chunks: Chunk[];
}

export type ReplaceChunksOutcome =
  | { status: 'replaced'; inserted: number; retired: number }
  | { status: 'stale'; currentVersion: number };

/**
 * Result of indexing one case or script
 */
export interface SourceIndexReport {
  sourceKind: SourceKind;
  sourceId: string;
  chunkIds: string[];
  retired: number;
}

export interface RebuildFailure {
  sourceKind: SourceKind;
  sourceId: string;
  code: string;
  message: string;
}

/**
 * Result of a full index rebuild
 */
export interface RebuildReport {
  cases: number;
  scripts: number;
  articles: number;
  chunks: number;
  failures: RebuildFailure[];
}
