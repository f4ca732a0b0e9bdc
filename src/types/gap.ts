/**
 * Gap Detection Types
 */

import type { KnowledgeArticle } from './article.js';
import type { SupportCase } from './source.js';

/**
 * Nearest active article to a case, as found by retrieval
 */
export interface NearestArticle {
  article: KnowledgeArticle;
  distance: number;
}

export type GapOutcome =
  | {
      kind: 'no_action';
      reason: string;
      nearestArticleId: string | null;
      /** True when the judgment capability could not be used */
      failOpen: boolean;
    }
  | {
      kind: 'update_existing';
      targetArticleId: string;
      targetVersion: number;
      rationale: string;
    }
  | {
      kind: 'create_new';
      rationale: string;
    };

export type GapOutcomeKind = GapOutcome['kind'];

export interface DetectGapParams {
  case: SupportCase;
  nearest: NearestArticle | null;
}

/**
 * Deployment-tuned policy consulted before the judgment call
 * Returning an outcome short-circuits the judgment
 */
export interface GapPolicy {
  preJudge?: (params: DetectGapParams) => GapOutcome | null;
}
