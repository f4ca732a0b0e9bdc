/**
 * DraftService Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  createDraftService,
  fallbackDraftContent,
  type DraftService,
} from '@/services/draft.service.js';
import type { JudgmentService } from '@/services/judgment.service.js';
import type { ReviewDecision } from '@/types/index.js';
import { AI_ACTOR, failure, success } from '@/types/index.js';

import {
  AGENT,
  makeArticle,
  makeCase,
  PHOTO_UPLOAD_CASE,
  READER,
  REVIEWER,
} from '../../fixtures/index.js';
import { createInMemoryStores, type InMemoryStores } from '../../helpers/in-memory-stores.js';

const JUDGED_DRAFT = {
  title: '  Fixing stuck tenant photo uploads ',
  body: ' Clear the stale upload session, then resize the photo under 5 MB. ',
  steps: ['Clear the stale upload session', '  ', ' Resize the photo '],
};

function rejection(draftId: string, overrides?: Partial<ReviewDecision>): ReviewDecision {
  return {
    id: 'decision-9',
    draftId,
    decision: 'rejected',
    reasoning: 'Steps omit the size limit',
    reviewerKind: 'human',
    reviewerId: 'reviewer_1',
    criteria: [],
    articleId: null,
    assignedVersion: null,
    expectedPriorVersion: null,
    supersedesDecisionId: null,
    reextractionRequested: true,
    decidedAt: new Date('2026-03-02T08:00:00.000Z'),
    ...overrides,
  };
}

describe('fallbackDraftContent', () => {
  it('should use the subject, resolution and documented steps', () => {
    const content = fallbackDraftContent(PHOTO_UPLOAD_CASE, [
      {
        id: 'steps-1',
        caseId: PHOTO_UPLOAD_CASE.id,
        stepsText: '1. Clear the upload session\n- Resize the photo\n\n',
        resolutionSummary: 'Fixed',
        createdAt: new Date(),
      },
    ]);

    expect(content).toEqual({
      title: 'Tenant profile photo upload fails',
      body: PHOTO_UPLOAD_CASE.resolution,
      steps: ['Clear the upload session', 'Resize the photo'],
    });
  });

  it('should prefer the case steps and fall back to the description for a title', () => {
    const content = fallbackDraftContent(
      makeCase({
        subject: ' ',
        description: 'Autopay ran twice\nsecond line',
        steps: [' Refund ', ''],
      }),
      []
    );

    expect(content.title).toBe('Autopay ran twice');
    expect(content.steps).toEqual(['Refund']);
  });

  it('should take the latest documented summary when the case has no resolution', () => {
    const steps = (resolutionSummary: string, n: number) => ({
      id: `steps-${n}`,
      caseId: 'CS-40001',
      stepsText: 'Resend the invite',
      resolutionSummary,
      createdAt: new Date(`2026-03-0${n}T09:00:00.000Z`),
    });

    const content = fallbackDraftContent(makeCase({ id: 'CS-40001', resolution: ' ' }), [
      steps('Resent the portal invite', 1),
      steps('Reset the invite link and resent it', 2),
      steps('  ', 3),
    ]);

    expect(content.body).toBe('Reset the invite link and resent it');
    expect(content.steps).toEqual(['Resend the invite', 'Resend the invite', 'Resend the invite']);
  });
});

describe('DraftService', () => {
  let stores: InMemoryStores;
  let judge: ReturnType<typeof vi.fn>;
  let log: ReturnType<typeof vi.fn>;
  let getActiveArticle: ReturnType<typeof vi.fn>;
  let getEffectiveDecision: ReturnType<typeof vi.fn>;
  let service: DraftService;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    stores = createInMemoryStores({ cases: [PHOTO_UPLOAD_CASE] });
    judge = vi.fn().mockResolvedValue(success(JUDGED_DRAFT));
    log = vi.fn().mockResolvedValue(success(undefined));
    getActiveArticle = vi.fn().mockResolvedValue(null);
    getEffectiveDecision = vi.fn().mockResolvedValue(null);
    const judgmentService: JudgmentService = { judge };

    service = createDraftService({
      db: stores.draftDb,
      sources: {
        getCase: stores.caseDb.getCase,
        listCaseSteps: stores.caseDb.listCaseSteps,
        getActiveArticle,
        getEffectiveDecision,
      },
      judgmentService,
      auditService: { log },
      config: { evidenceSnippetChars: 20 },
    });
  });

  // ─────────────────────────────────────────────────────────────
  // extractDraft
  // ─────────────────────────────────────────────────────────────

  describe('extractDraft', () => {
    it('should refuse the AI actor', async () => {
      const result = await service.extractDraft(AI_ACTOR, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('AI cannot create drafts');
      }
    });

    it('should require cases:write', async () => {
      const result = await service.extractDraft(READER, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PERMISSION_DENIED');
      }
    });

    it('should not extract for no_action', async () => {
      const result = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: {
          kind: 'no_action',
          reason: 'Covered',
          nearestArticleId: 'KB-001',
          failOpen: false,
        },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATE');
      }
      expect(judge).not.toHaveBeenCalled();
    });

    it('should create a first draft with provenance and trimmed content', async () => {
      const result = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({
          triggerCaseId: 'CS-12345',
          targetArticleId: null,
          targetArticleVersion: null,
          title: 'Fixing stuck tenant photo uploads',
          body: 'Clear the stale upload session, then resize the photo under 5 MB.',
          steps: ['Clear the stale upload session', 'Resize the photo'],
          draftVersion: 1,
          provenance: { caseId: 'CS-12345', conversationId: 'CONV-777', scriptId: 'S-042' },
          evidenceSnippet: 'Cleared the stale up',
          supersedesDraftId: null,
          extraction: 'judgment',
        });
      }
      expect(judge).toHaveBeenCalledWith(expect.objectContaining({ task: 'draft' }));
      expect(log).toHaveBeenCalledWith(
        AGENT,
        expect.objectContaining({
          action: 'draft.extracted',
          resourceType: 'knowledge_draft',
        })
      );
    });

    it('should return the existing draft on a repeated call', async () => {
      const first = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });
      const second = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(first.success && second.success).toBe(true);
      if (first.success && second.success) {
        expect(second.data.id).toBe(first.data.id);
      }
      expect(judge).toHaveBeenCalledTimes(1);
      expect(stores.state.drafts).toHaveLength(1);
    });

    it('should fail when the update target has no active version', async () => {
      const result = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: {
          kind: 'update_existing',
          targetArticleId: 'KB-404',
          targetVersion: 2,
          rationale: 'Extend',
        },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
        expect(result.error.message).toBe('Target article not found: KB-404');
      }
    });

    it('should record the target version for an update', async () => {
      getActiveArticle.mockResolvedValue(makeArticle({ version: 2 }));

      const result = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: {
          kind: 'update_existing',
          targetArticleId: 'KB-001',
          targetVersion: 2,
          rationale: 'Extend',
        },
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.targetArticleId).toBe('KB-001');
        expect(result.data.targetArticleVersion).toBe(2);
      }
    });

    it('should refuse a case with no resolution recorded anywhere', async () => {
      const result = await service.extractDraft(AGENT, {
        case: makeCase({ id: 'CS-40001', resolution: '' }),
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
        expect(result.error.message).toBe('Case CS-40001 has no resolution');
      }
    });

    it('should draft from a documented resolution summary', async () => {
      judge.mockResolvedValue(failure('JUDGMENT_UNAVAILABLE', 'down'));
      await stores.caseDb.addCaseSteps('CS-40001', {
        stepsText: '1. Clear the upload session',
        resolutionSummary: 'Cleared the stale upload session',
      });

      const result = await service.extractDraft(AGENT, {
        case: makeCase({ id: 'CS-40001', resolution: '' }),
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.body).toBe('Cleared the stale upload session');
        expect(result.data.steps).toEqual(['Clear the upload session']);
        expect(result.data.evidenceSnippet).toBe('Cleared the stale up');
      }
    });

    it('should fall back to case content when the judgment is unavailable', async () => {
      judge.mockResolvedValue(failure('JUDGMENT_UNAVAILABLE', 'down'));

      const result = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.extraction).toBe('fallback');
        expect(result.data.title).toBe('Tenant profile photo upload fails');
        expect(result.data.body).toBe(PHOTO_UPLOAD_CASE.resolution);
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // reextract
  // ─────────────────────────────────────────────────────────────

  describe('reextract', () => {
    async function firstDraftId(): Promise<string> {
      const created = await service.extractDraft(AGENT, {
        case: PHOTO_UPLOAD_CASE,
        outcome: { kind: 'create_new', rationale: 'New' },
      });
      if (!created.success) {
        throw new Error('draft setup failed');
      }
      return created.data.id;
    }

    it('should require knowledge:review', async () => {
      const result = await service.reextract(AGENT, { draftId: 'draft-1' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Missing knowledge:review permission');
      }
    });

    it('should refuse without a rejection that asked for it', async () => {
      const draftId = await firstDraftId();
      getEffectiveDecision.mockResolvedValue(
        rejection(draftId, { reextractionRequested: false })
      );

      const result = await service.reextract(REVIEWER, { draftId });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATE');
        expect(result.error.message).toBe(
          'Re-extraction needs a rejection that requested it'
        );
      }
    });

    it('should create the next draft version with the feedback', async () => {
      const draftId = await firstDraftId();
      getEffectiveDecision.mockResolvedValue(rejection(draftId));

      const result = await service.reextract(REVIEWER, {
        draftId,
        feedback: '  Mention the 5 MB limit  ',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.draftVersion).toBe(2);
        expect(result.data.supersedesDraftId).toBe(draftId);
        expect(result.data.provenance.caseId).toBe('CS-12345');
        expect(result.data.evidenceSnippet).toBe('Cleared the stale up');
      }
      const input = judge.mock.calls[1]?.[0]?.input;
      expect(input?.feedback).toBe('Mention the 5 MB limit');
      expect(log).toHaveBeenLastCalledWith(
        REVIEWER,
        expect.objectContaining({ action: 'draft.reextracted' })
      );
    });

    it('should use the rejection reasoning when no feedback is given', async () => {
      const draftId = await firstDraftId();
      getEffectiveDecision.mockResolvedValue(rejection(draftId));

      await service.reextract(REVIEWER, { draftId });

      expect(judge.mock.calls[1]?.[0]?.input?.feedback).toBe('Steps omit the size limit');
    });

    it('should only re-extract the latest draft of a case', async () => {
      const draftId = await firstDraftId();
      getEffectiveDecision.mockResolvedValue(rejection(draftId));
      const second = await service.reextract(REVIEWER, { draftId });
      expect(second.success).toBe(true);

      const again = await service.reextract(REVIEWER, { draftId });

      expect(again.success).toBe(false);
      if (!again.success) {
        expect(again.error.code).toBe('INVALID_STATE');
        expect(again.error.message).toBe(
          'Only the latest draft of a case can be re-extracted'
        );
      }
    });

    it('should report a missing draft', async () => {
      const result = await service.reextract(REVIEWER, { draftId: 'draft-missing' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // reads
  // ─────────────────────────────────────────────────────────────

  describe('reads', () => {
    it('should let the AI actor read drafts', async () => {
      const result = await service.listDraftsForCase(AI_ACTOR, 'CS-12345');
      expect(result).toEqual({ success: true, data: [] });
    });

    it('should report a missing draft', async () => {
      const result = await service.getDraft(READER, 'draft-missing');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Draft not found: draft-missing');
      }
    });
  });
});
