/**
 * IndexingService Implementation
 * Re-indexer: turns published articles, cases and scripts into embedded
 * chunks in the vector index
 *
 * SCOPE: Embedding index writes
 *
 * Owns: knowledge_chunks
 *
 * GUARDRAILS:
 * - A source's chunk set is replaced in one transaction; readers see the
 *   old set or the new set, never a mix
 * - Only the active version of an article is indexed; a stale replacement
 *   (older sourceVersion) is refused by the index
 * - Re-indexing is idempotent: chunk ids depend only on source and position
 * - Requires 'knowledge:publish'; AI_ACTOR cannot write the index
 *
 * Dependencies: ChunkingService, EmbeddingService, AuditService
 */

import type {
  ActorContext,
  AuditEvent,
  Chunk,
  ChunkMatch,
  KnowledgeArticle,
  PaginatedResult,
  PaginationParams,
  RebuildFailure,
  RebuildReport,
  ReindexReport,
  ReplaceChunksOutcome,
  ReplaceChunksParams,
  Result,
  SourceIndexReport,
  SourceKind,
  SupportCase,
  SupportScript,
  TextChunk,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  hasPermission,
  PERMISSIONS,
} from '@/types/index.js';

import type { ChunkingService } from './chunking.service.js';
import type { EmbeddingService } from './embedding.service.js';

// ─────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────

/**
 * Database abstraction interface for the embedding index
 */
export interface VectorIndexDb {
  countChunks: (model: string) => Promise<number>;
  queryNearest: (params: {
    embedding: number[];
    sourceKind: SourceKind;
    model: string;
    limit: number;
  }) => Promise<ChunkMatch[]>;
  replaceSourceChunks: (
    params: ReplaceChunksParams
  ) => Promise<ReplaceChunksOutcome>;
  deleteSourceChunks: (
    sourceKind: SourceKind,
    sourceId: string
  ) => Promise<number>;
  listChunkIds: (sourceKind: SourceKind, sourceId: string) => Promise<string[]>;
}

/**
 * Article reads the re-indexer needs
 */
export interface IndexingArticleSource {
  getArticleVersion: (
    articleId: string,
    version: number
  ) => Promise<KnowledgeArticle | null>;
  listActiveArticles: (
    params: PaginationParams
  ) => Promise<PaginatedResult<KnowledgeArticle>>;
}

/**
 * Case and script reads the re-indexer needs
 */
export interface IndexingCaseSource {
  getCase: (caseId: string) => Promise<SupportCase | null>;
  getScript: (scriptId: string) => Promise<SupportScript | null>;
  listCases: (params: PaginationParams) => Promise<PaginatedResult<SupportCase>>;
  listScripts: (
    params: PaginationParams
  ) => Promise<PaginatedResult<SupportScript>>;
}

/**
 * Minimal AuditService interface
 */
export interface IndexingServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * IndexingService interface
 */
export interface IndexingService {
  reindexArticle(
    actor: ActorContext,
    params: { articleId: string; version: number }
  ): Promise<Result<ReindexReport>>;
  indexSource(
    actor: ActorContext,
    sourceKind: Exclude<SourceKind, 'article'>,
    sourceId: string
  ): Promise<Result<SourceIndexReport>>;
  /** Retire every chunk of a source that left the corpus */
  removeSource(
    actor: ActorContext,
    sourceKind: SourceKind,
    sourceId: string
  ): Promise<Result<{ retired: number }>>;
  listSourceChunkIds(
    actor: ActorContext,
    sourceKind: SourceKind,
    sourceId: string
  ): Promise<Result<string[]>>;
  rebuildIndex(actor: ActorContext): Promise<Result<RebuildReport>>;
}

const REBUILD_PAGE_SIZE = 100;

/**
 * Walk every page of a keyset-paginated listing
 */
async function* pages<T>(
  list: (params: PaginationParams) => Promise<PaginatedResult<T>>
): AsyncGenerator<T[]> {
  let cursor: string | undefined;
  for (;;) {
    const params: PaginationParams = { limit: REBUILD_PAGE_SIZE };
    if (cursor !== undefined) {
      params.cursor = cursor;
    }
    const page = await list(params);
    yield page.items;
    if (!page.hasMore || page.nextCursor === undefined) {
      return;
    }
    cursor = page.nextCursor;
  }
}

/**
 * Create IndexingService instance
 */
export function createIndexingService(deps: {
  index: VectorIndexDb;
  chunking: ChunkingService;
  embeddingService: EmbeddingService;
  articles: IndexingArticleSource;
  cases: IndexingCaseSource;
  auditService: IndexingServiceAudit;
}): IndexingService {
  const { index, chunking, embeddingService, articles, cases, auditService } =
    deps;

  function canWriteIndex(actor: ActorContext): boolean {
    return actor.type !== 'ai' && hasPermission(actor, PERMISSIONS.KNOWLEDGE_PUBLISH);
  }

  /**
   * Embed and swap in the chunk set of one source
   */
  async function writeChunks(
    sourceKind: SourceKind,
    sourceId: string,
    sourceVersion: number | null,
    textChunks: TextChunk[]
  ): Promise<Result<{ chunkIds: string[]; retired: number }>> {
    let chunks: Chunk[] = [];

    if (textChunks.length > 0) {
      const embedded = await embeddingService.generateBatchEmbeddings(
        textChunks.map((c) => c.text)
      );
      if (!embedded.success) {
        return failure(
          'INDEX_WRITE_ERROR',
          `Failed to embed chunks: ${embedded.error.message}`,
          { sourceKind, sourceId }
        );
      }

      const vectors = embedded.data.embeddings;
      chunks = textChunks.flatMap((chunk, i) => {
        const embedding = vectors[i];
        return embedding !== undefined
          ? [{ ...chunk, embedding, embeddingModel: embeddingService.model }]
          : [];
      });
    }

    let outcome: ReplaceChunksOutcome;
    try {
      outcome = await index.replaceSourceChunks({
        sourceKind,
        sourceId,
        sourceVersion,
        chunks,
      });
    } catch (error) {
      return failure(
        'INDEX_WRITE_ERROR',
        `Failed to replace chunks: ${errorMessage(error)}`,
        { sourceKind, sourceId }
      );
    }

    if (outcome.status === 'stale') {
      return failure(
        'INVALID_STATE',
        `Index already holds version ${outcome.currentVersion} of ${sourceId}`,
        { sourceKind, sourceId, sourceVersion, currentVersion: outcome.currentVersion }
      );
    }

    return success({
      chunkIds: chunks.map((c) => c.id),
      retired: outcome.retired,
    });
  }

  async function indexArticle(
    article: KnowledgeArticle
  ): Promise<Result<ReindexReport>> {
    const written = await writeChunks(
      'article',
      article.articleId,
      article.version,
      chunking.chunkArticle(article)
    );
    if (!written.success) {
      return written;
    }
    return success({
      articleId: article.articleId,
      version: article.version,
      chunkIds: written.data.chunkIds,
      retired: written.data.retired,
    });
  }

  async function indexRecord(
    sourceKind: Exclude<SourceKind, 'article'>,
    record: SupportCase | SupportScript,
    textChunks: TextChunk[]
  ): Promise<Result<SourceIndexReport>> {
    const written = await writeChunks(sourceKind, record.id, null, textChunks);
    if (!written.success) {
      return written;
    }
    return success({
      sourceKind,
      sourceId: record.id,
      chunkIds: written.data.chunkIds,
      retired: written.data.retired,
    });
  }

  return {
    async reindexArticle(
      actor: ActorContext,
      params: { articleId: string; version: number }
    ): Promise<Result<ReindexReport>> {
      if (!canWriteIndex(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:publish permission');
      }

      const article = await articles.getArticleVersion(
        params.articleId,
        params.version
      );
      if (article === null) {
        return failure(
          'NOT_FOUND',
          `Article version not found: ${params.articleId} v${params.version}`
        );
      }
      if (article.status !== 'active') {
        return failure(
          'INVALID_STATE',
          `Cannot re-index ${article.status} version ${article.version} of ${article.articleId}`,
          { articleId: article.articleId, version: article.version }
        );
      }

      const report = await indexArticle(article);
      if (!report.success) {
        return report;
      }

      await auditService.log(actor, {
        action: 'knowledge.reindexed',
        resourceType: 'knowledge_article',
        resourceId: article.articleId,
        details: {
          version: article.version,
          chunkCount: report.data.chunkIds.length,
          retired: report.data.retired,
        },
      });

      return report;
    },

    async indexSource(
      actor: ActorContext,
      sourceKind: Exclude<SourceKind, 'article'>,
      sourceId: string
    ): Promise<Result<SourceIndexReport>> {
      if (!canWriteIndex(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:publish permission');
      }

      if (sourceKind === 'case') {
        const supportCase = await cases.getCase(sourceId);
        if (supportCase === null) {
          return failure('NOT_FOUND', `Case not found: ${sourceId}`);
        }
        return indexRecord('case', supportCase, chunking.chunkCase(supportCase));
      }

      const script = await cases.getScript(sourceId);
      if (script === null) {
        return failure('NOT_FOUND', `Script not found: ${sourceId}`);
      }
      return indexRecord('script', script, chunking.chunkScript(script));
    },

    async removeSource(
      actor: ActorContext,
      sourceKind: SourceKind,
      sourceId: string
    ): Promise<Result<{ retired: number }>> {
      if (!canWriteIndex(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:publish permission');
      }

      let retired: number;
      try {
        retired = await index.deleteSourceChunks(sourceKind, sourceId);
      } catch (error) {
        return failure(
          'INDEX_WRITE_ERROR',
          `Failed to remove chunks: ${errorMessage(error)}`,
          { sourceKind, sourceId }
        );
      }

      await auditService.log(actor, {
        action: 'knowledge.source_removed',
        resourceType: 'knowledge_chunks',
        resourceId: sourceId,
        details: { sourceKind, retired },
      });

      return success({ retired });
    },

    async listSourceChunkIds(
      actor: ActorContext,
      sourceKind: SourceKind,
      sourceId: string
    ): Promise<Result<string[]>> {
      if (actor.type !== 'ai' && !hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const ids = await index.listChunkIds(sourceKind, sourceId);
      return success(ids);
    },

    /**
     * Re-chunk and re-embed every case, script and active article
     * A failing source is reported and skipped
     */
    async rebuildIndex(actor: ActorContext): Promise<Result<RebuildReport>> {
      if (!canWriteIndex(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:publish permission');
      }

      const report: RebuildReport = {
        cases: 0,
        scripts: 0,
        articles: 0,
        chunks: 0,
        failures: [],
      };

      function record(
        sourceKind: SourceKind,
        sourceId: string,
        result: Result<{ chunkIds: string[] }>
      ): boolean {
        if (result.success) {
          report.chunks += result.data.chunkIds.length;
          return true;
        }
        const entry: RebuildFailure = {
          sourceKind,
          sourceId,
          code: result.error.code,
          message: result.error.message,
        };
        report.failures.push(entry);
        return false;
      }

      try {
        for await (const page of pages(cases.listCases)) {
          for (const supportCase of page) {
            const result = await indexRecord(
              'case',
              supportCase,
              chunking.chunkCase(supportCase)
            );
            if (record('case', supportCase.id, result)) {
              report.cases += 1;
            }
          }
        }

        for await (const page of pages(cases.listScripts)) {
          for (const script of page) {
            const result = await indexRecord(
              'script',
              script,
              chunking.chunkScript(script)
            );
            if (record('script', script.id, result)) {
              report.scripts += 1;
            }
          }
        }

        for await (const page of pages(articles.listActiveArticles)) {
          for (const article of page) {
            const result = await indexArticle(article);
            if (record('article', article.articleId, result)) {
              report.articles += 1;
            }
          }
        }
      } catch (error) {
        return failure(
          'INDEX_WRITE_ERROR',
          `Index rebuild aborted: ${errorMessage(error)}`,
          { cases: report.cases, scripts: report.scripts, articles: report.articles }
        );
      }

      await auditService.log(actor, {
        action: 'knowledge.index_rebuilt',
        resourceType: 'knowledge_chunks',
        details: {
          cases: report.cases,
          scripts: report.scripts,
          articles: report.articles,
          chunks: report.chunks,
          failures: report.failures.length,
        },
      });

      return success(report);
    },
  };
}
