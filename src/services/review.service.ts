/**
 * ReviewService Implementation
 * Review & versioning engine for drafts
 *
 * SCOPE: Review decisions (automated and human)
 *
 * Owns: review_decisions
 *
 * GUARDRAILS:
 * - Decisions are append-only; the effective decision of a draft is the
 *   latest one in its log (read-time projection)
 * - Exactly one automated decision per draft
 * - Deterministic acceptance criteria run before any judgment call and a
 *   failure is a normal rejected decision
 * - An unusable judgment is recorded as a rejection; a human override
 *   can reverse it
 * - The version an approval publishes into, and the active version it
 *   expects to replace, are fixed when the decision is recorded
 * - An update extracted against a version that is no longer active is
 *   never approved; it goes back for re-extraction
 * - AI_ACTOR cannot review
 *
 * Dependencies: JudgmentService, AuditService
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';

import type {
  AcceptanceCriterion,
  ActorContext,
  AuditEvent,
  CaseStepsEntry,
  CriterionResult,
  Draft,
  DraftStatus,
  EngineConfig,
  KnowledgeArticle,
  NewReviewDecision,
  OverrideParams,
  Result,
  ReviewDecision,
  SupportCase,
} from '@/types/index.js';
import {
  success,
  failure,
  hasPermission,
  getActorUserId,
  PERMISSIONS,
  DEFAULT_ENGINE_CONFIG,
  withEffectiveResolution,
} from '@/types/index.js';
import { REVIEW_PROMPT } from '@/orchestrator/prompts.js';

import type { JudgmentService } from './judgment.service.js';

export const reviewJudgmentSchema = z.object({
  verdict: z.enum(['approve', 'reject']),
  reasoning: z.string(),
  issues: z.array(z.string()).optional(),
});

// ─────────────────────────────────────────────────────────────
// Acceptance criteria
// ─────────────────────────────────────────────────────────────

const PLACEHOLDER = /\{\{[^}]*\}\}|\[(?:TODO|TBD)\]|<[A-Z][A-Z0-9_ ]*>|\bXXX\b/;

/**
 * Default deterministic checks applied to every draft
 */
export function defaultAcceptanceCriteria(
  bounds: EngineConfig['review'] = DEFAULT_ENGINE_CONFIG.review
): AcceptanceCriterion[] {
  return [
    {
      name: 'title_present',
      check: (draft) => (draft.title.trim() ? null : 'Title is empty'),
    },
    {
      name: 'body_present',
      check: (draft) => (draft.body.trim() ? null : 'Body is empty'),
    },
    {
      name: 'no_placeholders',
      check: (draft) => {
        const text = [draft.title, draft.body, ...draft.steps].join('\n');
        const match = PLACEHOLDER.exec(text);
        return match === null ? null : `Contains placeholder ${match[0]}`;
      },
    },
    {
      name: 'traceable',
      check: (draft) =>
        draft.provenance.caseId && draft.provenance.caseId === draft.triggerCaseId
          ? null
          : 'Provenance does not reference the triggering case',
    },
    {
      name: 'body_length',
      check: (draft) => {
        const length = draft.body.trim().length;
        if (length < bounds.minBodyChars) {
          return `Body is ${length} characters, minimum is ${bounds.minBodyChars}`;
        }
        if (length > bounds.maxBodyChars) {
          return `Body is ${length} characters, maximum is ${bounds.maxBodyChars}`;
        }
        return null;
      },
    },
  ];
}

export function runCriteria(
  criteria: AcceptanceCriterion[],
  draft: Draft
): CriterionResult[] {
  return criteria.map((criterion) => {
    const message = criterion.check(draft);
    return { name: criterion.name, passed: message === null, message };
  });
}

/**
 * Database abstraction interface for ReviewService
 */
export interface ReviewServiceDb {
  /** Returns null when the draft already has an automated decision */
  insertDecision: (decision: NewReviewDecision) => Promise<ReviewDecision | null>;
  getEffectiveDecision: (draftId: string) => Promise<ReviewDecision | null>;
  /** Oldest first */
  listDecisions: (draftId: string) => Promise<ReviewDecision[]>;
}

/**
 * Reads from the rest of the engine
 */
export interface ReviewServiceSources {
  getDraft: (draftId: string) => Promise<Draft | null>;
  getCase: (caseId: string) => Promise<SupportCase | null>;
  listCaseSteps: (caseId: string) => Promise<CaseStepsEntry[]>;
  getActiveArticle: (articleId: string) => Promise<KnowledgeArticle | null>;
  isDraftPublished: (draftId: string) => Promise<boolean>;
}

/**
 * Minimal AuditService interface
 */
export interface ReviewServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * ReviewService interface
 */
export interface ReviewService {
  review(actor: ActorContext, draft: Draft): Promise<Result<ReviewDecision>>;
  override(
    actor: ActorContext,
    params: OverrideParams
  ): Promise<Result<ReviewDecision>>;
  getEffectiveDecision(
    actor: ActorContext,
    draftId: string
  ): Promise<Result<ReviewDecision | null>>;
  getDecisionHistory(
    actor: ActorContext,
    draftId: string
  ): Promise<Result<ReviewDecision[]>>;
  getDraftStatus(actor: ActorContext, draftId: string): Promise<Result<DraftStatus>>;
}

type Versioning = Pick<
  NewReviewDecision,
  'articleId' | 'assignedVersion' | 'expectedPriorVersion'
>;

const UNVERSIONED: Versioning = {
  articleId: null,
  assignedVersion: null,
  expectedPriorVersion: null,
};

type VersionAssignment =
  | { kind: 'assigned'; versioning: Versioning }
  | { kind: 'missing'; articleId: string }
  | {
      kind: 'stale';
      articleId: string;
      extractedAgainst: number | null;
      activeVersion: number;
    };

function staleReasoning(stale: Extract<VersionAssignment, { kind: 'stale' }>): string {
  const against =
    stale.extractedAgainst === null ? 'no version' : `version ${stale.extractedAgainst}`;
  return `Draft was extracted against ${against} of ${stale.articleId} but version ${stale.activeVersion} is now active; re-extract from the current version`;
}

/**
 * Article id for a brand-new article
 */
export function generateArticleId(): string {
  return `KB-${nanoid(10)}`;
}

/**
 * Create ReviewService instance
 */
export function createReviewService(deps: {
  db: ReviewServiceDb;
  sources: ReviewServiceSources;
  judgmentService: JudgmentService;
  auditService: ReviewServiceAudit;
  criteria?: AcceptanceCriterion[];
  config?: Pick<EngineConfig, 'review'>;
  newArticleId?: () => string;
}): ReviewService {
  const { db, sources, judgmentService, auditService } = deps;
  const criteria =
    deps.criteria ??
    defaultAcceptanceCriteria(deps.config?.review ?? DEFAULT_ENGINE_CONFIG.review);
  const newArticleId = deps.newArticleId ?? generateArticleId;

  function canReview(actor: ActorContext): boolean {
    return actor.type !== 'ai' && hasPermission(actor, PERMISSIONS.KNOWLEDGE_REVIEW);
  }

  function canRead(actor: ActorContext): boolean {
    return actor.type === 'ai' || hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  /**
   * Fix the version an approval publishes into
   * An update is stale once its target moved past the version it was
   * extracted against
   */
  async function assignVersion(draft: Draft): Promise<VersionAssignment> {
    if (draft.targetArticleId === null) {
      return {
        kind: 'assigned',
        versioning: {
          articleId: newArticleId(),
          assignedVersion: 1,
          expectedPriorVersion: null,
        },
      };
    }

    const active = await sources.getActiveArticle(draft.targetArticleId);
    if (active === null) {
      return { kind: 'missing', articleId: draft.targetArticleId };
    }
    if (draft.targetArticleVersion !== active.version) {
      return {
        kind: 'stale',
        articleId: active.articleId,
        extractedAgainst: draft.targetArticleVersion,
        activeVersion: active.version,
      };
    }
    return {
      kind: 'assigned',
      versioning: {
        articleId: active.articleId,
        assignedVersion: active.version + 1,
        expectedPriorVersion: active.version,
      },
    };
  }

  /**
   * Judgment pass for a draft that met every criterion
   */
  async function judge(
    draft: Draft
  ): Promise<{ approved: boolean; reasoning: string }> {
    const stored = await sources.getCase(draft.triggerCaseId);
    const supportCase =
      stored === null
        ? null
        : withEffectiveResolution(stored, await sources.listCaseSteps(stored.id));
    const existing =
      draft.targetArticleId !== null
        ? await sources.getActiveArticle(draft.targetArticleId)
        : null;

    const judged = await judgmentService.judge({
      task: 'review',
      system: REVIEW_PROMPT,
      input: {
        draft: { title: draft.title, body: draft.body, steps: draft.steps },
        case:
          supportCase === null
            ? null
            : {
                id: supportCase.id,
                description: supportCase.description,
                resolution: supportCase.resolution,
              },
        existingArticle:
          existing === null
            ? null
            : {
                articleId: existing.articleId,
                version: existing.version,
                title: existing.title,
                body: existing.body,
              },
      },
      schema: reviewJudgmentSchema,
    });

    if (!judged.success) {
      return {
        approved: false,
        reasoning: `Automated review unavailable (${judged.error.code}); held for human review`,
      };
    }

    const { verdict, reasoning, issues } = judged.data;
    const detail =
      issues !== undefined && issues.length > 0 ? ` Issues: ${issues.join('; ')}` : '';
    return {
      approved: verdict === 'approve',
      reasoning: `${reasoning.trim()}${detail}`.trim(),
    };
  }

  return {
    async review(
      actor: ActorContext,
      draft: Draft
    ): Promise<Result<ReviewDecision>> {
      if (!canReview(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:review permission');
      }

      const existing = await db.getEffectiveDecision(draft.id);
      if (existing !== null) {
        return failure('INVALID_STATE', `Draft ${draft.id} has already been reviewed`, {
          decisionId: existing.id,
        });
      }

      const results = runCriteria(criteria, draft);
      const failed = results.filter((r) => !r.passed);

      let approved = false;
      let reasoning: string;
      let versioning = UNVERSIONED;
      let reextractionRequested = false;

      const assignment =
        draft.targetArticleId === null ? null : await assignVersion(draft);

      if (assignment?.kind === 'stale') {
        reasoning = staleReasoning(assignment);
        reextractionRequested = true;
      } else if (failed.length > 0) {
        reasoning = `Failed acceptance criteria: ${failed
          .map((r) => `${r.name} (${r.message ?? 'failed'})`)
          .join('; ')}`;
      } else {
        const verdict = await judge(draft);
        reasoning = verdict.reasoning;

        if (verdict.approved) {
          const assigned = assignment ?? (await assignVersion(draft));
          if (assigned.kind === 'assigned') {
            approved = true;
            versioning = assigned.versioning;
          } else {
            reasoning = `Target article ${assigned.articleId} has no active version`;
          }
        }
      }

      const decision = await db.insertDecision({
        draftId: draft.id,
        decision: approved ? 'approved' : 'rejected',
        reasoning,
        reviewerKind: 'automated',
        reviewerId: null,
        criteria: results,
        ...versioning,
        supersedesDecisionId: null,
        reextractionRequested,
      });
      if (decision === null) {
        return failure('INVALID_STATE', `Draft ${draft.id} has already been reviewed`);
      }

      await auditService.log(actor, {
        action: 'review.decided',
        resourceType: 'knowledge_draft',
        resourceId: draft.id,
        details: {
          decisionId: decision.id,
          decision: decision.decision,
          articleId: decision.articleId,
          assignedVersion: decision.assignedVersion,
        },
      });

      return success(decision);
    },

    async override(
      actor: ActorContext,
      params: OverrideParams
    ): Promise<Result<ReviewDecision>> {
      if (!canReview(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:review permission');
      }

      const reasoning = params.reasoning.trim();
      if (!reasoning) {
        return failure('VALIDATION_ERROR', 'An override needs reasoning');
      }
      const reextractionRequested = params.requestReextraction ?? false;
      if (reextractionRequested && params.decision !== 'rejected') {
        return failure(
          'VALIDATION_ERROR',
          'Re-extraction can only be requested with a rejection'
        );
      }

      const draft = await sources.getDraft(params.draftId);
      if (draft === null) {
        return failure('NOT_FOUND', `Draft not found: ${params.draftId}`);
      }
      if (await sources.isDraftPublished(draft.id)) {
        return failure('INVALID_STATE', `Draft ${draft.id} is already published`);
      }

      const current = await db.getEffectiveDecision(draft.id);

      let versioning = UNVERSIONED;
      if (params.decision === 'approved') {
        const assigned = await assignVersion(draft);
        if (assigned.kind === 'missing') {
          return failure(
            'INVALID_STATE',
            `Target article ${assigned.articleId} has no active version`
          );
        }
        if (assigned.kind === 'stale') {
          return failure('INVALID_STATE', staleReasoning(assigned), {
            articleId: assigned.articleId,
            extractedAgainst: assigned.extractedAgainst,
            activeVersion: assigned.activeVersion,
          });
        }
        versioning = assigned.versioning;
      }

      const decision = await db.insertDecision({
        draftId: draft.id,
        decision: params.decision,
        reasoning,
        reviewerKind: 'human',
        reviewerId: getActorUserId(actor),
        criteria: runCriteria(criteria, draft),
        ...versioning,
        supersedesDecisionId: current?.id ?? null,
        reextractionRequested,
      });
      if (decision === null) {
        return failure('INTERNAL_ERROR', 'Failed to record override');
      }

      await auditService.log(actor, {
        action: 'review.overridden',
        resourceType: 'knowledge_draft',
        resourceId: draft.id,
        details: {
          decisionId: decision.id,
          decision: decision.decision,
          supersedesDecisionId: decision.supersedesDecisionId,
          reextractionRequested,
        },
      });

      return success(decision);
    },

    async getEffectiveDecision(
      actor: ActorContext,
      draftId: string
    ): Promise<Result<ReviewDecision | null>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const decision = await db.getEffectiveDecision(draftId);
      return success(decision);
    },

    async getDecisionHistory(
      actor: ActorContext,
      draftId: string
    ): Promise<Result<ReviewDecision[]>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const decisions = await db.listDecisions(draftId);
      return success(decisions);
    },

    async getDraftStatus(
      actor: ActorContext,
      draftId: string
    ): Promise<Result<DraftStatus>> {
      if (!canRead(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      const draft = await sources.getDraft(draftId);
      if (draft === null) {
        return failure('NOT_FOUND', `Draft not found: ${draftId}`);
      }
      const decision = await db.getEffectiveDecision(draftId);
      return success(decision?.decision ?? 'pending');
    },
  };
}
