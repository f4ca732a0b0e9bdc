/**
 * DraftService Implementation
 * Draft extractor: turns a gap outcome and its case into a candidate article
 *
 * SCOPE: Drafts awaiting review
 *
 * Owns: knowledge_drafts
 *
 * GUARDRAILS:
 * - Drafts are immutable; a correction is a new draft with
 *   draftVersion + 1 that supersedes the previous one
 * - Extraction is idempotent per case: an existing draft is returned as is
 * - Re-extraction only follows a rejection that asked for it
 * - Provenance (case, conversation, script) is attached at creation
 * - AI_ACTOR cannot create drafts
 *
 * Dependencies: JudgmentService, AuditService
 */

import { z } from 'zod';

import type {
  ActorContext,
  AuditEvent,
  CaseStepsEntry,
  Draft,
  EngineConfig,
  ExtractDraftParams,
  KnowledgeArticle,
  NewDraft,
  ReextractParams,
  Result,
  ReviewDecision,
  SupportCase,
} from '@/types/index.js';
import {
  success,
  failure,
  hasPermission,
  PERMISSIONS,
  DEFAULT_ENGINE_CONFIG,
  effectiveResolution,
} from '@/types/index.js';
import { DRAFT_PROMPT } from '@/orchestrator/prompts.js';

import type { JudgmentService } from './judgment.service.js';

export const draftJudgmentSchema = z.object({
  title: z.string(),
  body: z.string(),
  steps: z.array(z.string()),
});

/**
 * Transcript characters shown to the judgment
 */
const TRANSCRIPT_CHARS = 4000;

const FALLBACK_TITLE_CHARS = 120;

/**
 * Database abstraction interface for DraftService
 */
export interface DraftServiceDb {
  /** Returns null when a draft with that (case, draftVersion) already exists */
  insertDraft: (draft: NewDraft) => Promise<Draft | null>;
  getDraft: (draftId: string) => Promise<Draft | null>;
  getLatestDraftForCase: (caseId: string) => Promise<Draft | null>;
  listDraftsForCase: (caseId: string) => Promise<Draft[]>;
}

/**
 * Reads from the rest of the engine
 */
export interface DraftServiceSources {
  getCase: (caseId: string) => Promise<SupportCase | null>;
  listCaseSteps: (caseId: string) => Promise<CaseStepsEntry[]>;
  getActiveArticle: (articleId: string) => Promise<KnowledgeArticle | null>;
  getEffectiveDecision: (draftId: string) => Promise<ReviewDecision | null>;
}

/**
 * Minimal AuditService interface
 */
export interface DraftServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * DraftService interface
 */
export interface DraftService {
  extractDraft(
    actor: ActorContext,
    params: ExtractDraftParams
  ): Promise<Result<Draft>>;
  reextract(actor: ActorContext, params: ReextractParams): Promise<Result<Draft>>;
  getDraft(actor: ActorContext, draftId: string): Promise<Result<Draft>>;
  listDraftsForCase(
    actor: ActorContext,
    caseId: string
  ): Promise<Result<Draft[]>>;
}

/**
 * Strip list markers from a documented step line
 */
function cleanStep(line: string): string {
  return line.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, '').trim();
}

/**
 * Deterministic draft used when the judgment is unavailable
 */
export function fallbackDraftContent(
  supportCase: SupportCase,
  caseSteps: CaseStepsEntry[]
): { title: string; body: string; steps: string[] } {
  const firstLine = supportCase.description.trim().split('\n')[0] ?? '';
  const title = (supportCase.subject.trim() || firstLine)
    .slice(0, FALLBACK_TITLE_CHARS)
    .trim();

  let steps = supportCase.steps.map((s) => s.trim()).filter((s) => s.length > 0);
  if (steps.length === 0) {
    steps = caseSteps
      .flatMap((entry) => entry.stepsText.split('\n'))
      .map(cleanStep)
      .filter((s) => s.length > 0);
  }

  return { title, body: effectiveResolution(supportCase, caseSteps), steps };
}

/**
 * Create DraftService instance
 */
export function createDraftService(deps: {
  db: DraftServiceDb;
  sources: DraftServiceSources;
  judgmentService: JudgmentService;
  auditService: DraftServiceAudit;
  config?: Pick<EngineConfig, 'evidenceSnippetChars'>;
}): DraftService {
  const { db, sources, judgmentService, auditService } = deps;
  const evidenceChars =
    deps.config?.evidenceSnippetChars ?? DEFAULT_ENGINE_CONFIG.evidenceSnippetChars;

  function canRead(actor: ActorContext): boolean {
    return actor.type === 'ai' || hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  async function synthesize(
    supportCase: SupportCase,
    caseSteps: CaseStepsEntry[],
    existingArticle: KnowledgeArticle | null,
    feedback: string | null
  ): Promise<{ title: string; body: string; steps: string[]; extraction: Draft['extraction'] }> {

    const judged = await judgmentService.judge({
      task: 'draft',
      system: DRAFT_PROMPT,
      input: {
        case: {
          id: supportCase.id,
          subject: supportCase.subject,
          description: supportCase.description,
          resolution: effectiveResolution(supportCase, caseSteps),
          steps: supportCase.steps,
        },
        caseSteps: caseSteps.map((e) => ({
          stepsText: e.stepsText,
          resolutionSummary: e.resolutionSummary,
        })),
        transcript: supportCase.transcript?.slice(0, TRANSCRIPT_CHARS) ?? null,
        existingArticle:
          existingArticle === null
            ? null
            : {
                articleId: existingArticle.articleId,
                version: existingArticle.version,
                title: existingArticle.title,
                body: existingArticle.body,
                steps: existingArticle.steps,
              },
        feedback,
      },
      schema: draftJudgmentSchema,
    });

    if (!judged.success) {
      console.error(
        `Draft synthesis for ${supportCase.id} fell back: ${judged.error.code}`
      );
      return { ...fallbackDraftContent(supportCase, caseSteps), extraction: 'fallback' };
    }

    return {
      title: judged.data.title.trim(),
      body: judged.data.body.trim(),
      steps: judged.data.steps.map((s) => s.trim()).filter((s) => s.length > 0),
      extraction: 'judgment',
    };
  }

  /**
   * Insert, or hand back the draft a concurrent call inserted first
   */
  async function insertOrLatest(draft: NewDraft): Promise<Result<Draft>> {
    const inserted = await db.insertDraft(draft);
    if (inserted !== null) {
      return success(inserted);
    }
    const latest = await db.getLatestDraftForCase(draft.triggerCaseId);
    if (latest === null) {
      return failure('INTERNAL_ERROR', 'Draft insert conflicted but no draft exists');
    }
    return success(latest);
  }

  return {
    async extractDraft(
      actor: ActorContext,
      params: ExtractDraftParams
    ): Promise<Result<Draft>> {
      if (actor.type === 'ai') {
        return failure('PERMISSION_DENIED', 'AI cannot create drafts');
      }
      if (!hasPermission(actor, PERMISSIONS.CASES_WRITE)) {
        return failure('PERMISSION_DENIED', 'Missing cases:write permission');
      }

      const { outcome } = params;
      const supportCase = params.case;

      if (outcome.kind === 'no_action') {
        return failure('INVALID_STATE', 'No draft is extracted for a no_action outcome', {
          caseId: supportCase.id,
        });
      }
      const caseSteps = await sources.listCaseSteps(supportCase.id);
      const resolution = effectiveResolution(supportCase, caseSteps);
      if (!resolution) {
        return failure('VALIDATION_ERROR', `Case ${supportCase.id} has no resolution`);
      }

      const existing = await db.getLatestDraftForCase(supportCase.id);
      if (existing !== null) {
        return success(existing);
      }

      let targetArticle: KnowledgeArticle | null = null;
      if (outcome.kind === 'update_existing') {
        targetArticle = await sources.getActiveArticle(outcome.targetArticleId);
        if (targetArticle === null) {
          return failure(
            'NOT_FOUND',
            `Target article not found: ${outcome.targetArticleId}`
          );
        }
      }

      const content = await synthesize(supportCase, caseSteps, targetArticle, null);

      const created = await insertOrLatest({
        triggerCaseId: supportCase.id,
        targetArticleId:
          outcome.kind === 'update_existing' ? outcome.targetArticleId : null,
        targetArticleVersion:
          outcome.kind === 'update_existing' ? outcome.targetVersion : null,
        ...content,
        draftVersion: 1,
        provenance: {
          caseId: supportCase.id,
          conversationId: supportCase.conversationId,
          scriptId: supportCase.scriptId,
        },
        evidenceSnippet: resolution.slice(0, evidenceChars),
        supersedesDraftId: null,
      });
      if (!created.success) {
        return created;
      }

      await auditService.log(actor, {
        action: 'draft.extracted',
        resourceType: 'knowledge_draft',
        resourceId: created.data.id,
        details: {
          caseId: supportCase.id,
          outcome: outcome.kind,
          draftVersion: created.data.draftVersion,
          extraction: created.data.extraction,
        },
      });

      return created;
    },

    async reextract(
      actor: ActorContext,
      params: ReextractParams
    ): Promise<Result<Draft>> {
      if (actor.type === 'ai') {
        return failure('PERMISSION_DENIED', 'AI cannot request re-extraction');
      }
      if (!hasPermission(actor, PERMISSIONS.KNOWLEDGE_REVIEW)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:review permission');
      }

      const draft = await db.getDraft(params.draftId);
      if (draft === null) {
        return failure('NOT_FOUND', `Draft not found: ${params.draftId}`);
      }

      const latest = await db.getLatestDraftForCase(draft.triggerCaseId);
      if (latest !== null && latest.id !== draft.id) {
        return failure('INVALID_STATE', 'Only the latest draft of a case can be re-extracted', {
          draftId: draft.id,
          latestDraftId: latest.id,
        });
      }

      const decision = await sources.getEffectiveDecision(draft.id);
      if (
        decision === null ||
        decision.decision !== 'rejected' ||
        !decision.reextractionRequested
      ) {
        return failure(
          'INVALID_STATE',
          'Re-extraction needs a rejection that requested it',
          { draftId: draft.id }
        );
      }

      const supportCase = await sources.getCase(draft.triggerCaseId);
      if (supportCase === null) {
        return failure('NOT_FOUND', `Case not found: ${draft.triggerCaseId}`);
      }

      let targetArticle: KnowledgeArticle | null = null;
      if (draft.targetArticleId !== null) {
        targetArticle = await sources.getActiveArticle(draft.targetArticleId);
        if (targetArticle === null) {
          return failure(
            'INVALID_STATE',
            `Target article has no active version: ${draft.targetArticleId}`
          );
        }
      }

      const feedback = params.feedback?.trim() || decision.reasoning;
      const caseSteps = await sources.listCaseSteps(supportCase.id);
      const content = await synthesize(supportCase, caseSteps, targetArticle, feedback);

      const created = await insertOrLatest({
        triggerCaseId: draft.triggerCaseId,
        targetArticleId: draft.targetArticleId,
        targetArticleVersion: targetArticle?.version ?? null,
        ...content,
        draftVersion: draft.draftVersion + 1,
        provenance: draft.provenance,
        evidenceSnippet: draft.evidenceSnippet,
        supersedesDraftId: draft.id,
      });
      if (!created.success) {
        return created;
      }

      await auditService.log(actor, {
        action: 'draft.reextracted',
        resourceType: 'knowledge_draft',
        resourceId: created.data.id,
        details: {
          caseId: draft.triggerCaseId,
          supersedesDraftId: draft.id,
          draftVersion: created.data.draftVersion,
          extraction: created.data.extraction,
        },
      });

      return created;
    },

    async getDraft(actor: ActorContext, draftId: string): Promise<Result<Draft>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const draft = await db.getDraft(draftId);
      if (draft === null) {
        return failure('NOT_FOUND', `Draft not found: ${draftId}`);
      }
      return success(draft);
    },

    async listDraftsForCase(
      actor: ActorContext,
      caseId: string
    ): Promise<Result<Draft[]>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const drafts = await db.listDraftsForCase(caseId);
      return success(drafts);
    },
  };
}
