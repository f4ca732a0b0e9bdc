/**
 * Learning Loop Types
 */

import type { PublishedArticleRef } from './article.js';
import type { Draft } from './draft.js';
import type { GapOutcome } from './gap.js';
import type { Failure } from './result.js';
import type { ReviewDecision } from './review.js';

/**
 * Last stage the loop reached for a resolved case
 */
export type LearningStage =
  | 'no_action'
  | 'rejected'
  | 'publish_failed'
  | 'reindex_failed'
  | 'reindexed';

export interface ReindexReport {
  articleId: string;
  version: number;
  chunkIds: string[];
  /** Chunks of the source that were retired by the replacement */
  retired: number;
}

export interface LearningOutcome {
  caseId: string;
  stage: LearningStage;
  gap: GapOutcome;
  draft: Draft | null;
  decision: ReviewDecision | null;
  published: PublishedArticleRef | null;
  reindex: ReindexReport | null;
  /** Failure that stopped the loop after a decision was recorded */
  error: Failure['error'] | null;
}

/**
 * Result of publishing a human-approved draft
 */
export interface PublishDraftOutcome {
  published: PublishedArticleRef;
  reindex: ReindexReport | null;
  /** Re-index failure; the publish itself stands */
  error: Failure['error'] | null;
}
