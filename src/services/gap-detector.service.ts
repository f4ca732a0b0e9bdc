/**
 * GapDetectorService Implementation
 * Decides whether a resolved case adds knowledge the base lacks
 *
 * SCOPE: Gap detection
 *
 * Owns: No tables
 *
 * GUARDRAILS:
 * - Fails open: when the judgment cannot be used the outcome is
 *   no_action, flagged failOpen, so nothing is drafted from a guess
 * - update_existing always targets the active version seen here
 * - A GapPolicy may short-circuit the judgment
 *
 * Dependencies: RetrievalService, JudgmentService, article reads
 */

import { z } from 'zod';

import type {
  ActorContext,
  DetectGapParams,
  GapOutcome,
  GapPolicy,
  KnowledgeArticle,
  NearestArticle,
  Result,
  SupportCase,
} from '@/types/index.js';
import {
  success,
  failure,
  hasPermission,
  PERMISSIONS,
} from '@/types/index.js';
import { GAP_PROMPT } from '@/orchestrator/prompts.js';

import { caseIndexText } from './chunking.service.js';
import type { JudgmentService } from './judgment.service.js';
import { EMPTY_INDEX } from './retrieval.service.js';
import type { RetrievalService } from './retrieval.service.js';

export const gapJudgmentSchema = z.object({
  outcome: z.enum(['no_action', 'update_existing', 'create_new']),
  rationale: z.string(),
});

/**
 * Active article lookup
 */
export interface GapArticleSource {
  getActiveArticle: (articleId: string) => Promise<KnowledgeArticle | null>;
}

/**
 * GapDetectorService interface
 */
export interface GapDetectorService {
  findNearestArticle(
    actor: ActorContext,
    supportCase: SupportCase
  ): Promise<Result<NearestArticle | null>>;
  detectGap(
    actor: ActorContext,
    params: DetectGapParams
  ): Promise<Result<GapOutcome>>;
  detect(actor: ActorContext, supportCase: SupportCase): Promise<Result<GapOutcome>>;
}

function failOpen(reason: string, nearest: NearestArticle | null): GapOutcome {
  return {
    kind: 'no_action',
    reason,
    nearestArticleId: nearest?.article.articleId ?? null,
    failOpen: true,
  };
}

/**
 * Create GapDetectorService instance
 */
export function createGapDetectorService(deps: {
  judgmentService: JudgmentService;
  retrievalService: RetrievalService;
  articles: GapArticleSource;
  policy?: GapPolicy;
}): GapDetectorService {
  const { judgmentService, retrievalService, articles } = deps;
  const policy = deps.policy ?? {};

  function canDetect(actor: ActorContext): boolean {
    return actor.type !== 'ai' && hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  async function findNearestArticle(
    actor: ActorContext,
    supportCase: SupportCase
  ): Promise<Result<NearestArticle | null>> {
    const hits = await retrievalService.retrieve(actor, {
      query: caseIndexText(supportCase),
      kind: 'article',
      topK: 1,
    });

    if (!hits.success) {
      // Nothing indexed yet means nothing to be near
      if (hits.error.details?.['reason'] === EMPTY_INDEX) {
        return success(null);
      }
      return hits;
    }

    const hit = hits.data[0];
    if (hit === undefined) {
      return success(null);
    }

    const article = await articles.getActiveArticle(hit.sourceId);
    if (article === null) {
      return success(null);
    }
    return success({ article, distance: hit.distance });
  }

  async function detectGap(
    actor: ActorContext,
    params: DetectGapParams
  ): Promise<Result<GapOutcome>> {
    if (!canDetect(actor)) {
      return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
    }

    const supportCase = params.case;
    if (!supportCase.resolution.trim()) {
      return failure('VALIDATION_ERROR', `Case ${supportCase.id} has no resolution`);
    }

    const { nearest } = params;

    const preset = policy.preJudge?.(params) ?? null;
    if (preset !== null) {
      return success(preset);
    }

    const judged = await judgmentService.judge({
      task: 'gap',
      system: GAP_PROMPT,
      input: {
        case: {
          id: supportCase.id,
          description: supportCase.description,
          resolution: supportCase.resolution,
          steps: supportCase.steps,
        },
        nearestArticle:
          nearest === null
            ? null
            : {
                articleId: nearest.article.articleId,
                version: nearest.article.version,
                title: nearest.article.title,
                body: nearest.article.body,
                steps: nearest.article.steps,
                distance: nearest.distance,
              },
      },
      schema: gapJudgmentSchema,
    });

    if (!judged.success) {
      return success(
        failOpen(`Gap judgment unavailable (${judged.error.code})`, nearest)
      );
    }

    const { outcome, rationale } = judged.data;
    switch (outcome) {
      case 'no_action':
        return success({
          kind: 'no_action',
          reason: rationale,
          nearestArticleId: nearest?.article.articleId ?? null,
          failOpen: false,
        });
      case 'update_existing':
        if (nearest === null) {
          return success(
            failOpen('Gap judgment asked to update with no article to update', null)
          );
        }
        return success({
          kind: 'update_existing',
          targetArticleId: nearest.article.articleId,
          targetVersion: nearest.article.version,
          rationale,
        });
      case 'create_new':
        return success({ kind: 'create_new', rationale });
    }
  }

  return {
    findNearestArticle(actor, supportCase) {
      if (!canDetect(actor)) {
        return Promise.resolve(
          failure('PERMISSION_DENIED', 'Missing knowledge:read permission')
        );
      }
      return findNearestArticle(actor, supportCase);
    },

    detectGap,

    async detect(
      actor: ActorContext,
      supportCase: SupportCase
    ): Promise<Result<GapOutcome>> {
      if (!canDetect(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }

      const nearest = await findNearestArticle(actor, supportCase);
      if (!nearest.success) {
        if (nearest.error.code === 'VALIDATION_ERROR') {
          return nearest;
        }
        return success(
          failOpen(`Nearest article lookup failed (${nearest.error.code})`, null)
        );
      }

      return detectGap(actor, { case: supportCase, nearest: nearest.data });
    },
  };
}
