/**
 * LearningLoopService Implementation
 * Runs a resolved case through gap detection, drafting, review,
 * publishing and re-indexing
 *
 * SCOPE: Learning loop control flow
 *
 * Owns: No tables
 *
 * GUARDRAILS:
 * - Stops at no_action and at a rejection; both are normal outcomes
 * - Never re-indexes after a failed publish; the failure is surfaced
 * - The review decision is recorded before anything is published
 * - Triggering the loop requires 'cases:write'; the stages then run as
 *   the automated pipeline under the caller's request id
 * - A case without its own resolution learns from its latest documented
 *   resolution summary
 *
 * Dependencies: CaseService store, GapDetectorService, DraftService,
 * ReviewService, KnowledgeService, IndexingService, ComparatorService,
 * AuditService
 */

import type {
  ActorContext,
  AuditEvent,
  CaseStepsEntry,
  ComparisonResult,
  Draft,
  Failure,
  GapOutcome,
  LearningOutcome,
  LearningStage,
  PublishDraftOutcome,
  PublishedArticleRef,
  ReindexReport,
  Result,
  ReviewDecision,
  SupportCase,
} from '@/types/index.js';
import {
  success,
  failure,
  hasPermission,
  PERMISSIONS,
  SYSTEM_ACTOR,
  withEffectiveResolution,
} from '@/types/index.js';

import type { ComparatorService } from './comparator.service.js';
import type { DraftService } from './draft.service.js';
import type { GapDetectorService } from './gap-detector.service.js';
import type { IndexingService } from './indexing.service.js';
import type { KnowledgeService } from './knowledge.service.js';
import type { ReviewService } from './review.service.js';

/**
 * Case lookup with documented resolution steps
 */
export interface LearningLoopCases {
  getCase: (caseId: string) => Promise<SupportCase | null>;
  listCaseSteps: (caseId: string) => Promise<CaseStepsEntry[]>;
}

/**
 * Minimal AuditService interface
 */
export interface LearningLoopAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * LearningLoopService interface
 */
export interface LearningLoopService {
  answerQuestion(
    actor: ActorContext,
    question: string,
    options?: { topK?: number; signal?: AbortSignal }
  ): Promise<Result<ComparisonResult>>;
  learnFromCase(
    actor: ActorContext,
    caseId: string
  ): Promise<Result<LearningOutcome>>;
  publishDraft(
    actor: ActorContext,
    draftId: string
  ): Promise<Result<PublishDraftOutcome>>;
}

/**
 * Actor the automated stages run as
 */
function pipelineActor(actor: ActorContext): ActorContext {
  return { ...SYSTEM_ACTOR, requestId: actor.requestId };
}

/**
 * Create LearningLoopService instance
 */
export function createLearningLoopService(deps: {
  cases: LearningLoopCases;
  comparatorService: ComparatorService;
  gapDetectorService: GapDetectorService;
  draftService: DraftService;
  reviewService: ReviewService;
  knowledgeService: KnowledgeService;
  indexingService: IndexingService;
  auditService: LearningLoopAudit;
}): LearningLoopService {
  const {
    cases,
    comparatorService,
    gapDetectorService,
    draftService,
    reviewService,
    knowledgeService,
    indexingService,
    auditService,
  } = deps;

  async function stop(
    actor: ActorContext,
    outcome: LearningOutcome
  ): Promise<Result<LearningOutcome>> {
    await auditService.log(actor, {
      action: 'learning.stopped',
      resourceType: 'support_case',
      resourceId: outcome.caseId,
      details: {
        stage: outcome.stage,
        gap: outcome.gap.kind,
        draftId: outcome.draft?.id ?? null,
        decisionId: outcome.decision?.id ?? null,
        errorCode: outcome.error?.code ?? null,
      },
    });
    return success(outcome);
  }

  function outcomeOf(
    caseId: string,
    stage: LearningStage,
    gap: GapOutcome,
    parts: {
      draft?: Draft;
      decision?: ReviewDecision;
      published?: PublishedArticleRef;
      reindex?: ReindexReport;
      error?: Failure['error'];
    } = {}
  ): LearningOutcome {
    return {
      caseId,
      stage,
      gap,
      draft: parts.draft ?? null,
      decision: parts.decision ?? null,
      published: parts.published ?? null,
      reindex: parts.reindex ?? null,
      error: parts.error ?? null,
    };
  }

  return {
    answerQuestion(actor, question, options = {}) {
      return comparatorService.ask(actor, {
        question,
        ...(options.topK !== undefined && { topK: options.topK }),
        ...(options.signal !== undefined && { signal: options.signal }),
      });
    },

    async learnFromCase(
      actor: ActorContext,
      caseId: string
    ): Promise<Result<LearningOutcome>> {
      if (actor.type === 'ai') {
        return failure('PERMISSION_DENIED', 'AI cannot trigger learning');
      }
      if (!hasPermission(actor, PERMISSIONS.CASES_WRITE)) {
        return failure('PERMISSION_DENIED', 'Missing cases:write permission');
      }

      const stored = await cases.getCase(caseId);
      if (stored === null) {
        return failure('NOT_FOUND', `Case not found: ${caseId}`);
      }
      const supportCase = withEffectiveResolution(stored, await cases.listCaseSteps(caseId));
      if (!supportCase.resolution) {
        return failure('VALIDATION_ERROR', `Case ${caseId} is not resolved`);
      }

      const pipeline = pipelineActor(actor);

      const gap = await gapDetectorService.detect(pipeline, supportCase);
      if (!gap.success) {
        return gap;
      }
      if (gap.data.kind === 'no_action') {
        return stop(actor, outcomeOf(caseId, 'no_action', gap.data));
      }

      const draft = await draftService.extractDraft(pipeline, {
        case: supportCase,
        outcome: gap.data,
      });
      if (!draft.success) {
        return draft;
      }

      // A rerun picks up the decision an earlier run recorded
      const recorded = await reviewService.getEffectiveDecision(pipeline, draft.data.id);
      if (!recorded.success) {
        return recorded;
      }
      let decision: ReviewDecision;
      if (recorded.data !== null) {
        decision = recorded.data;
      } else {
        const reviewed = await reviewService.review(pipeline, draft.data);
        if (!reviewed.success) {
          return reviewed;
        }
        decision = reviewed.data;
      }

      if (decision.decision === 'rejected') {
        return stop(
          actor,
          outcomeOf(caseId, 'rejected', gap.data, { draft: draft.data, decision })
        );
      }

      const published = await knowledgeService.publish(pipeline, {
        decision,
        draft: draft.data,
      });
      if (!published.success) {
        return stop(
          actor,
          outcomeOf(caseId, 'publish_failed', gap.data, {
            draft: draft.data,
            decision,
            error: published.error,
          })
        );
      }

      const reindexed = await indexingService.reindexArticle(pipeline, published.data);
      if (!reindexed.success) {
        return stop(
          actor,
          outcomeOf(caseId, 'reindex_failed', gap.data, {
            draft: draft.data,
            decision,
            published: published.data,
            error: reindexed.error,
          })
        );
      }

      return success(
        outcomeOf(caseId, 'reindexed', gap.data, {
          draft: draft.data,
          decision,
          published: published.data,
          reindex: reindexed.data,
        })
      );
    },

    async publishDraft(
      actor: ActorContext,
      draftId: string
    ): Promise<Result<PublishDraftOutcome>> {
      const draft = await draftService.getDraft(actor, draftId);
      if (!draft.success) {
        return draft;
      }

      const decision = await reviewService.getEffectiveDecision(actor, draftId);
      if (!decision.success) {
        return decision;
      }
      if (decision.data === null) {
        return failure('INVALID_STATE', `Draft ${draftId} has not been reviewed`);
      }

      const published = await knowledgeService.publish(actor, {
        decision: decision.data,
        draft: draft.data,
      });
      if (!published.success) {
        return published;
      }

      const reindexed = await indexingService.reindexArticle(actor, published.data);
      return success({
        published: published.data,
        reindex: reindexed.success ? reindexed.data : null,
        error: reindexed.success ? null : reindexed.error,
      });
    },
  };
}
