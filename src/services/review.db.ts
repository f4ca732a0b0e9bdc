/**
 * ReviewService Database Adapter
 * Implements ReviewServiceDb interface using Supabase
 *
 * review_decisions is insert-only; `seq` orders the log of each draft.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  CriterionResult,
  NewReviewDecision,
  ReviewDecision,
} from '@/types/index.js';

import type { ReviewServiceDb } from './review.service.js';

const UNIQUE_VIOLATION = '23505';

/**
 * Database row type for review_decisions
 */
interface ReviewDecisionRow {
  id: string;
  seq: number;
  draft_id: string;
  decision: string;
  reasoning: string;
  reviewer_kind: string;
  reviewer_id: string | null;
  criteria: CriterionResult[] | null;
  article_id: string | null;
  assigned_version: number | null;
  expected_prior_version: number | null;
  supersedes_decision_id: string | null;
  reextraction_requested: boolean;
  decided_at: string;
}

/**
 * Map database row to ReviewDecision entity
 */
function mapRowToDecision(row: ReviewDecisionRow): ReviewDecision {
  return {
    id: row.id,
    draftId: row.draft_id,
    decision: row.decision === 'approved' ? 'approved' : 'rejected',
    reasoning: row.reasoning,
    reviewerKind: row.reviewer_kind === 'human' ? 'human' : 'automated',
    reviewerId: row.reviewer_id,
    criteria: row.criteria ?? [],
    articleId: row.article_id,
    assignedVersion: row.assigned_version,
    expectedPriorVersion: row.expected_prior_version,
    supersedesDecisionId: row.supersedes_decision_id,
    reextractionRequested: row.reextraction_requested,
    decidedAt: new Date(row.decided_at),
  };
}

/**
 * Create ReviewServiceDb instance
 */
export function createReviewServiceDb(supabase: SupabaseClient): ReviewServiceDb {
  return {
    async insertDecision(
      decision: NewReviewDecision
    ): Promise<ReviewDecision | null> {
      const { data, error } = await supabase
        .from('review_decisions')
        .insert({
          draft_id: decision.draftId,
          decision: decision.decision,
          reasoning: decision.reasoning,
          reviewer_kind: decision.reviewerKind,
          reviewer_id: decision.reviewerId,
          criteria: decision.criteria,
          article_id: decision.articleId,
          assigned_version: decision.assignedVersion,
          expected_prior_version: decision.expectedPriorVersion,
          supersedes_decision_id: decision.supersedesDecisionId,
          reextraction_requested: decision.reextractionRequested,
        })
        .select()
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to insert review decision: ${error.message}`);
      }
      return mapRowToDecision(data as ReviewDecisionRow);
    },

    async getEffectiveDecision(draftId: string): Promise<ReviewDecision | null> {
      const { data, error } = await supabase
        .from('review_decisions')
        .select()
        .eq('draft_id', draftId)
        .order('seq', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get effective decision: ${error.message}`);
      }
      return data !== null ? mapRowToDecision(data as ReviewDecisionRow) : null;
    },

    async listDecisions(draftId: string): Promise<ReviewDecision[]> {
      const { data, error } = await supabase
        .from('review_decisions')
        .select()
        .eq('draft_id', draftId)
        .order('seq', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list review decisions: ${error.message}`);
      }
      return ((data ?? []) as ReviewDecisionRow[]).map(mapRowToDecision);
    },
  };
}
