/**
 * IndexingService Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createChunkingService } from '@/services/chunking.service.js';
import { createEmbeddingService } from '@/services/embedding.service.js';
import {
  createIndexingService,
  type IndexingService,
} from '@/services/indexing.service.js';
import { AI_ACTOR, success } from '@/types/index.js';

import {
  LEASE_RENEWAL_CASE,
  PAYMENT_CASE,
  PHOTO_UPLOAD_CASE,
  PHOTO_UPLOAD_SCRIPT,
  PUBLISHER,
  READER,
} from '../../fixtures/index.js';
import { createHashedEmbeddingClient, type HashedEmbeddingClient } from '../../helpers/fakes.js';
import { createInMemoryStores, type InMemoryStores } from '../../helpers/in-memory-stores.js';
import { TEST_EMBEDDING_CONFIG } from '../../helpers/test-engine.js';

describe('IndexingService', () => {
  let stores: InMemoryStores;
  let embeddingClient: HashedEmbeddingClient;
  let log: ReturnType<typeof vi.fn>;
  let service: IndexingService;

  async function publishVersion(version: number): Promise<void> {
    const outcome = await stores.knowledgeDb.publishArticleVersion({
      articleId: 'KB-001',
      version,
      expectedPriorVersion: version === 1 ? null : version - 1,
      title: `Uploading tenant photos v${version}`,
      body: 'Resize photos under 5 MB before uploading them to the tenant profile.',
      steps: ['Resize the photo', 'Upload again'],
      draftId: `draft-v${version}`,
      decisionId: `decision-v${version}`,
      lineage: [],
    });
    if (outcome.status !== 'published') {
      throw new Error('publish setup failed');
    }
  }

  beforeEach(() => {
    stores = createInMemoryStores({
      cases: [PHOTO_UPLOAD_CASE, LEASE_RENEWAL_CASE, PAYMENT_CASE],
      scripts: [PHOTO_UPLOAD_SCRIPT],
    });
    embeddingClient = createHashedEmbeddingClient();
    log = vi.fn().mockResolvedValue(success(undefined));

    service = createIndexingService({
      index: stores.vectorIndexDb,
      chunking: createChunkingService(),
      embeddingService: createEmbeddingService({
        client: embeddingClient,
        config: TEST_EMBEDDING_CONFIG,
      }),
      articles: stores.knowledgeDb,
      cases: stores.caseDb,
      auditService: { log },
    });
  });

  // ─────────────────────────────────────────────────────────────
  // indexSource
  // ─────────────────────────────────────────────────────────────

  describe('indexSource', () => {
    it('should refuse the AI actor and plain readers', async () => {
      const ai = await service.indexSource(AI_ACTOR, 'case', 'CS-12345');
      const reader = await service.indexSource(READER, 'case', 'CS-12345');

      expect(ai.success).toBe(false);
      expect(reader.success).toBe(false);
      if (!reader.success) {
        expect(reader.error.code).toBe('PERMISSION_DENIED');
      }
    });

    it('should embed a case into deterministic chunk ids', async () => {
      const result = await service.indexSource(PUBLISHER, 'case', 'CS-12345');

      expect(result).toEqual({
        success: true,
        data: {
          sourceKind: 'case',
          sourceId: 'CS-12345',
          chunkIds: ['case_CS-12345_0'],
          retired: 0,
        },
      });
      const stored = stores.state.chunks.get('case_CS-12345_0');
      expect(stored?.embeddingModel).toBe('test-embedding');
      expect(stored?.embedding).toHaveLength(256);
      expect(stored?.sourceVersion).toBeNull();
    });

    it('should replace the same chunk set when indexed again', async () => {
      await service.indexSource(PUBLISHER, 'case', 'CS-12345');

      const again = await service.indexSource(PUBLISHER, 'case', 'CS-12345');

      expect(again.success && again.data.retired).toBe(1);
      expect([...stores.state.chunks.keys()]).toEqual(['case_CS-12345_0']);
    });

    it('should index a script', async () => {
      const result = await service.indexSource(PUBLISHER, 'script', 'S-042');
      expect(result.success && result.data.chunkIds).toEqual(['script_S-042_0']);
    });

    it('should report a missing case', async () => {
      const result = await service.indexSource(PUBLISHER, 'case', 'CS-404');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
        expect(result.error.message).toBe('Case not found: CS-404');
      }
    });

    it('should leave the index untouched when embedding fails', async () => {
      embeddingClient.fail(new Error('quota exceeded'));

      const result = await service.indexSource(PUBLISHER, 'case', 'CS-12345');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INDEX_WRITE_ERROR');
        expect(result.error.message).toBe(
          'Failed to embed chunks: Failed to generate batch embeddings: quota exceeded'
        );
      }
      expect(stores.state.chunks.size).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // reindexArticle
  // ─────────────────────────────────────────────────────────────

  describe('reindexArticle', () => {
    it('should index the active version with its version number', async () => {
      await publishVersion(1);

      const result = await service.reindexArticle(PUBLISHER, {
        articleId: 'KB-001',
        version: 1,
      });

      expect(result).toEqual({
        success: true,
        data: { articleId: 'KB-001', version: 1, chunkIds: ['article_KB-001_0'], retired: 0 },
      });
      expect(stores.state.chunks.get('article_KB-001_0')?.sourceVersion).toBe(1);
      expect(stores.state.chunks.get('article_KB-001_0')?.text).toMatch(
        /^Title: Uploading tenant photos v1/
      );
      expect(log).toHaveBeenCalledWith(
        PUBLISHER,
        expect.objectContaining({
          action: 'knowledge.reindexed',
          details: { version: 1, chunkCount: 1, retired: 0 },
        })
      );
    });

    it('should refuse a superseded version', async () => {
      await publishVersion(1);
      await publishVersion(2);

      const result = await service.reindexArticle(PUBLISHER, {
        articleId: 'KB-001',
        version: 1,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATE');
        expect(result.error.message).toBe('Cannot re-index superseded version 1 of KB-001');
      }
    });

    it('should surface a stale replacement refused by the index', async () => {
      await publishVersion(1);
      vi.spyOn(stores.vectorIndexDb, 'replaceSourceChunks').mockResolvedValueOnce({
        status: 'stale',
        currentVersion: 3,
      });

      const result = await service.reindexArticle(PUBLISHER, {
        articleId: 'KB-001',
        version: 1,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATE');
        expect(result.error.message).toBe('Index already holds version 3 of KB-001');
      }
    });

    it('should report a missing version', async () => {
      const result = await service.reindexArticle(PUBLISHER, {
        articleId: 'KB-001',
        version: 4,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Article version not found: KB-001 v4');
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // removeSource / listSourceChunkIds
  // ─────────────────────────────────────────────────────────────

  describe('removeSource', () => {
    it('should retire every chunk of the source', async () => {
      await service.indexSource(PUBLISHER, 'case', 'CS-12345');
      await service.indexSource(PUBLISHER, 'case', 'CS-20001');

      const result = await service.removeSource(PUBLISHER, 'case', 'CS-12345');

      expect(result).toEqual({ success: true, data: { retired: 1 } });
      expect([...stores.state.chunks.keys()]).toEqual(['case_CS-20001_0']);
    });

    it('should list chunk ids for readers', async () => {
      await service.indexSource(PUBLISHER, 'script', 'S-042');

      const result = await service.listSourceChunkIds(AI_ACTOR, 'script', 'S-042');

      expect(result).toEqual({ success: true, data: ['script_S-042_0'] });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // rebuildIndex
  // ─────────────────────────────────────────────────────────────

  describe('rebuildIndex', () => {
    it('should index every case, script and active article', async () => {
      await publishVersion(1);
      await publishVersion(2);

      const result = await service.rebuildIndex(PUBLISHER);

      expect(result).toEqual({
        success: true,
        data: { cases: 3, scripts: 1, articles: 1, chunks: 5, failures: [] },
      });
      expect(stores.state.chunks.get('article_KB-001_0')?.sourceVersion).toBe(2);
      expect(log).toHaveBeenLastCalledWith(
        PUBLISHER,
        expect.objectContaining({ action: 'knowledge.index_rebuilt' })
      );
    });

    it('should report a failing source and continue', async () => {
      vi.spyOn(stores.vectorIndexDb, 'replaceSourceChunks').mockRejectedValueOnce(
        new Error('connection lost')
      );

      const result = await service.rebuildIndex(PUBLISHER);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.cases).toBe(2);
        expect(result.data.scripts).toBe(1);
        expect(result.data.failures).toEqual([
          {
            sourceKind: 'case',
            sourceId: 'CS-12345',
            code: 'INDEX_WRITE_ERROR',
            message: 'Failed to replace chunks: connection lost',
          },
        ]);
      }
    });

    it('should produce the same chunk ids on a second rebuild', async () => {
      await service.rebuildIndex(PUBLISHER);
      const first = [...stores.state.chunks.keys()].sort();

      await service.rebuildIndex(PUBLISHER);

      expect([...stores.state.chunks.keys()].sort()).toEqual(first);
    });
  });
});
