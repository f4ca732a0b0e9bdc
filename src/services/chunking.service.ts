/**
 * ChunkingService
 * Splits cases, scripts and articles into bounded, overlapping segments
 *
 * SCOPE: Chunking pipeline
 *
 * Owns: No tables (pure)
 *
 * GUARDRAILS:
 * - Chunk ids are a function of (sourceKind, sourceId, chunkIndex) only,
 *   so re-chunking the same source yields the same ids
 * - Empty sources produce no chunks
 */

import type {
  ChunkingOptions,
  KnowledgeArticle,
  SupportCase,
  SupportScript,
  TextChunk,
  SourceKind,
} from '@/types/index.js';
import { chunkId, DEFAULT_ENGINE_CONFIG } from '@/types/index.js';

/**
 * ChunkingService interface
 */
export interface ChunkingService {
  readonly options: ChunkingOptions;
  /** Character sliding window over trimmed text */
  chunkText(text: string): string[];
  chunkCase(supportCase: SupportCase): TextChunk[];
  chunkScript(script: SupportScript): TextChunk[];
  chunkArticle(
    article: Pick<KnowledgeArticle, 'articleId' | 'version' | 'title' | 'body' | 'steps'>
  ): TextChunk[];
}

/**
 * Text indexed for a case: what was asked, then how it was fixed
 */
export function caseIndexText(supportCase: SupportCase): string {
  return `Description: ${supportCase.description.trim()}\n\nResolution: ${supportCase.resolution.trim()}`.trim();
}

/**
 * Text indexed for an article: title, body, then numbered steps
 */
export function articleIndexText(
  article: Pick<KnowledgeArticle, 'title' | 'body' | 'steps'>
): string {
  const title = article.title.trim();
  const body = article.body.trim();
  const parts: string[] = [title ? `Title: ${title}\n\n${body}` : body];

  const steps = article.steps.map((s) => s.trim()).filter((s) => s.length > 0);
  if (steps.length > 0) {
    parts.push(`Steps:\n${steps.map((s, i) => `${i + 1}. ${s}`).join('\n')}`);
  }

  return parts.join('\n\n').trim();
}

/**
 * Create ChunkingService instance
 */
export function createChunkingService(
  options: ChunkingOptions = DEFAULT_ENGINE_CONFIG.chunking
): ChunkingService {
  const { chunkSize, chunkOverlap } = options;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (
    !Number.isInteger(chunkOverlap) ||
    chunkOverlap < 0 ||
    chunkOverlap >= chunkSize
  ) {
    throw new Error(
      `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
    );
  }

  function chunkText(text: string): string[] {
    const trimmed = text.trim();
    if (!trimmed) {
      return [];
    }
    if (trimmed.length <= chunkSize) {
      return [trimmed];
    }

    const parts: string[] = [];
    let start = 0;
    while (start < trimmed.length) {
      const end = start + chunkSize;
      parts.push(trimmed.slice(start, end));
      if (end >= trimmed.length) {
        break;
      }
      start = end - chunkOverlap;
    }
    return parts;
  }

  function toChunks(
    sourceKind: SourceKind,
    sourceId: string,
    sourceVersion: number | null,
    text: string
  ): TextChunk[] {
    return chunkText(text).map((part, index) => ({
      id: chunkId(sourceKind, sourceId, index),
      sourceKind,
      sourceId,
      chunkIndex: index,
      sourceVersion,
      text: part,
    }));
  }

  return {
    options: { chunkSize, chunkOverlap },
    chunkText,

    chunkCase(supportCase: SupportCase): TextChunk[] {
      return toChunks('case', supportCase.id, null, caseIndexText(supportCase));
    },

    chunkScript(script: SupportScript): TextChunk[] {
      return toChunks('script', script.id, null, script.body);
    },

    chunkArticle(article): TextChunk[] {
      return toChunks(
        'article',
        article.articleId,
        article.version,
        articleIndexText(article)
      );
    },
  };
}
