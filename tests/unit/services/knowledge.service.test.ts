/**
 * KnowledgeService Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  buildLineage,
  createKnowledgeService,
  type KnowledgeService,
} from '@/services/knowledge.service.js';
import type { Draft, NewReviewDecision, ReviewDecision } from '@/types/index.js';
import { AI_ACTOR, success } from '@/types/index.js';

import { makeDraft, PUBLISHER, READER, REVIEWER } from '../../fixtures/index.js';
import { createInMemoryStores, type InMemoryStores } from '../../helpers/in-memory-stores.js';

function approval(draftId: string, overrides?: Partial<NewReviewDecision>): NewReviewDecision {
  return {
    draftId,
    decision: 'approved',
    reasoning: 'Accurate',
    reviewerKind: 'automated',
    reviewerId: null,
    criteria: [],
    articleId: 'KB-100',
    assignedVersion: 1,
    expectedPriorVersion: null,
    supersedesDecisionId: null,
    reextractionRequested: false,
    ...overrides,
  };
}

describe('buildLineage', () => {
  it('should link a new article to its case, conversation, script and draft', () => {
    const draft = makeDraft({ id: 'draft-7' });
    const rows = buildLineage(draft, { ...approval('draft-7'), id: 'd-1', decidedAt: new Date() });

    expect(rows.map((r) => [r.sourceKind, r.sourceId, r.relationship])).toEqual([
      ['case', 'CS-12345', 'created_from'],
      ['conversation', 'CONV-777', 'derived_from_conversation'],
      ['script', 'S-042', 'references_script'],
      ['draft', 'draft-7', 'extracted_as'],
    ]);
    expect(rows[0]?.evidenceSnippet).toBe('Cleared the stale upload session');
  });

  it('should record the superseded version for an update', () => {
    const draft = makeDraft({
      id: 'draft-8',
      provenance: { caseId: 'CS-12345', conversationId: null, scriptId: null },
    });
    const rows = buildLineage(draft, {
      ...approval('draft-8', { assignedVersion: 3, expectedPriorVersion: 2 }),
      id: 'd-2',
      decidedAt: new Date(),
    });

    expect(rows.map((r) => [r.sourceKind, r.relationship, r.evidenceSnippet])).toEqual([
      ['case', 'updated_from', 'Cleared the stale upload session'],
      ['article', 'supersedes', 'Supersedes version 2'],
      ['draft', 'extracted_as', 'Fixing stuck tenant photo uploads'],
    ]);
  });
});

describe('KnowledgeService', () => {
  let stores: InMemoryStores;
  let log: ReturnType<typeof vi.fn>;
  let service: KnowledgeService;

  async function storeDraft(overrides?: Partial<Draft>): Promise<Draft> {
    const { id: _id, createdAt: _createdAt, ...fields } = makeDraft(overrides);
    const stored = await stores.draftDb.insertDraft(fields);
    if (stored === null) {
      throw new Error('draft setup failed');
    }
    return stored;
  }

  async function storeDecision(decision: NewReviewDecision): Promise<ReviewDecision> {
    const stored = await stores.reviewDb.insertDecision(decision);
    if (stored === null) {
      throw new Error('decision setup failed');
    }
    return stored;
  }

  beforeEach(() => {
    stores = createInMemoryStores();
    log = vi.fn().mockResolvedValue(success(undefined));
    service = createKnowledgeService({
      db: stores.knowledgeDb,
      decisions: stores.reviewDb,
      auditService: { log },
    });
  });

  // ─────────────────────────────────────────────────────────────
  // publish
  // ─────────────────────────────────────────────────────────────

  describe('publish', () => {
    it('should refuse the AI actor and reviewers without publish rights', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(approval(draft.id));

      const ai = await service.publish(AI_ACTOR, { draft, decision });
      const reviewer = await service.publish(REVIEWER, { draft, decision });

      expect(ai.success).toBe(false);
      if (!ai.success) {
        expect(ai.error.message).toBe('AI cannot publish knowledge');
      }
      expect(reviewer.success).toBe(false);
      if (!reviewer.success) {
        expect(reviewer.error.message).toBe('Missing knowledge:publish permission');
      }
    });

    it('should publish version 1 with its lineage', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(approval(draft.id));

      const result = await service.publish(PUBLISHER, { draft, decision });

      expect(result).toEqual({ success: true, data: { articleId: 'KB-100', version: 1 } });
      expect(stores.state.articles).toHaveLength(1);
      expect(stores.state.articles[0]).toMatchObject({
        articleId: 'KB-100',
        version: 1,
        status: 'active',
        title: draft.title,
        draftId: draft.id,
        decisionId: decision.id,
      });
      expect(stores.state.lineage).toHaveLength(4);
      expect(log).toHaveBeenCalledWith(
        PUBLISHER,
        expect.objectContaining({
          action: 'knowledge.published',
          resourceId: 'KB-100',
          details: {
            version: 1,
            draftId: draft.id,
            decisionId: decision.id,
            lineageRows: 4,
          },
        })
      );
    });

    it('should supersede the prior version on update', async () => {
      const first = await storeDraft();
      await service.publish(PUBLISHER, {
        draft: first,
        decision: await storeDecision(approval(first.id)),
      });
      const second = await storeDraft({ draftVersion: 2, targetArticleId: 'KB-100' });
      const decision = await storeDecision(
        approval(second.id, { assignedVersion: 2, expectedPriorVersion: 1 })
      );

      const result = await service.publish(PUBLISHER, { draft: second, decision });

      expect(result).toEqual({ success: true, data: { articleId: 'KB-100', version: 2 } });
      expect(stores.state.articles.map((a) => [a.version, a.status])).toEqual([
        [1, 'superseded'],
        [2, 'active'],
      ]);
    });

    it('should report a conflict when the active version moved', async () => {
      const first = await storeDraft();
      await service.publish(PUBLISHER, {
        draft: first,
        decision: await storeDecision(approval(first.id)),
      });
      const racing = await storeDraft({ draftVersion: 2 });
      const stale = await storeDecision(approval(racing.id));

      const result = await service.publish(PUBLISHER, { draft: racing, decision: stale });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PUBLISH_CONFLICT');
        expect(result.error.message).toBe('Active version of KB-100 changed since the decision');
        expect(result.error.details).toEqual({
          articleId: 'KB-100',
          expectedPriorVersion: null,
          currentVersion: 1,
        });
      }
      expect(stores.state.articles).toHaveLength(1);
    });

    it('should refuse a rejected decision', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(
        approval(draft.id, { decision: 'rejected', articleId: null, assignedVersion: null })
      );

      const result = await service.publish(PUBLISHER, { draft, decision });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATE');
        expect(result.error.message).toBe(`Draft ${draft.id} is not approved`);
      }
    });

    it('should refuse a decision that skips a version', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(approval(draft.id, { assignedVersion: 3 }));

      const result = await service.publish(PUBLISHER, { draft, decision });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Assigned version does not follow the prior version');
      }
    });

    it('should refuse a superseded decision', async () => {
      const draft = await storeDraft();
      const automated = await storeDecision(approval(draft.id));
      await storeDecision(
        approval(draft.id, {
          decision: 'rejected',
          reviewerKind: 'human',
          reviewerId: 'reviewer_1',
          articleId: null,
          assignedVersion: null,
          supersedesDecisionId: automated.id,
        })
      );

      const result = await service.publish(PUBLISHER, { draft, decision: automated });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Decision has been superseded');
      }
    });

    it('should refuse a decision for another draft', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(approval('draft-other'));

      const result = await service.publish(PUBLISHER, { draft, decision });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
    });

    it('should not publish the same draft twice', async () => {
      const draft = await storeDraft();
      const decision = await storeDecision(approval(draft.id));
      await service.publish(PUBLISHER, { draft, decision });

      const again = await service.publish(PUBLISHER, { draft, decision });

      expect(again.success).toBe(false);
      if (!again.success) {
        expect(again.error.code).toBe('ALREADY_EXISTS');
        expect(again.error.details).toEqual({ articleId: 'KB-100', version: 1 });
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // reads
  // ─────────────────────────────────────────────────────────────

  describe('reads', () => {
    beforeEach(async () => {
      const first = await storeDraft();
      await service.publish(PUBLISHER, {
        draft: first,
        decision: await storeDecision(approval(first.id)),
      });
      const second = await storeDraft({ draftVersion: 2, targetArticleId: 'KB-100' });
      await service.publish(PUBLISHER, {
        draft: second,
        decision: await storeDecision(
          approval(second.id, { assignedVersion: 2, expectedPriorVersion: 1 })
        ),
      });
    });

    it('should return the active version', async () => {
      const result = await service.getActiveArticle(AI_ACTOR, 'KB-100');
      expect(result.success && result.data.version).toBe(2);
    });

    it('should return a specific version', async () => {
      const result = await service.getArticleVersion(READER, 'KB-100', 1);
      expect(result.success && result.data.status).toBe('superseded');
    });

    it('should report a missing version', async () => {
      const result = await service.getArticleVersion(READER, 'KB-100', 9);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Article version not found: KB-100 v9');
      }
    });

    it('should list every version oldest first', async () => {
      const result = await service.getVersionHistory(READER, 'KB-100');
      expect(result.success && result.data.map((a) => a.version)).toEqual([1, 2]);
    });

    it('should filter lineage by version', async () => {
      const result = await service.getLineage(READER, 'KB-100', 2);
      expect(result.success && result.data.map((r) => r.relationship)).toEqual([
        'updated_from',
        'derived_from_conversation',
        'references_script',
        'supersedes',
        'extracted_as',
      ]);
    });

    it('should reconstruct provenance per version', async () => {
      const result = await service.getProvenance(READER, 'KB-100');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.map((p) => [p.version, p.status, p.lineage.length])).toEqual([
          [1, 'superseded', 4],
          [2, 'active', 5],
        ]);
        expect(result.data[1]?.decisions.map((d) => d.decision)).toEqual(['approved']);
      }
    });

    it('should report an unknown article', async () => {
      const result = await service.getProvenance(REVIEWER, 'KB-404');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
      }
    });
  });
});
