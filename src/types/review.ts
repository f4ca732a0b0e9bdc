/**
 * Review Types
 * Append-only review decisions over drafts
 */

import type { Draft } from './draft.js';

export type ReviewVerdict = 'approved' | 'rejected';

export type ReviewerKind = 'automated' | 'human';

/**
 * Read-time projection of a draft's review state
 */
export type DraftStatus = 'pending' | ReviewVerdict;

export interface CriterionResult {
  name: string;
  passed: boolean;
  message: string | null;
}

/**
 * A deterministic acceptance check. Returns a failure message or null.
 */
export interface AcceptanceCriterion {
  name: string;
  check: (draft: Draft) => string | null;
}

/**
 * Review decision. Never edited or deleted; a human override is a new
 * decision pointing at the one it supersedes.
 */
export interface ReviewDecision {
  id: string;
  draftId: string;
  decision: ReviewVerdict;
  reasoning: string;
  reviewerKind: ReviewerKind;
  reviewerId: string | null;
  criteria: CriterionResult[];
  /** Article the approved draft publishes into */
  articleId: string | null;
  assignedVersion: number | null;
  /** Active version the publish must still find; null for a new article */
  expectedPriorVersion: number | null;
  supersedesDecisionId: string | null;
  reextractionRequested: boolean;
  decidedAt: Date;
}

export type NewReviewDecision = Omit<ReviewDecision, 'id' | 'decidedAt'>;

export interface OverrideParams {
  draftId: string;
  decision: ReviewVerdict;
  reasoning: string;
  requestReextraction?: boolean;
}
