/**
 * Comparator Types
 */

import type { ActorContext } from './auth.js';
import type { Failure } from './result.js';
import type { CandidateCase } from './retrieval.js';

/**
 * Why a comparison ended without a winner
 */
export type NoMatchReason =
  | 'no_candidates'
  | 'judged_no_match'
  | 'invalid_response'
  | 'judgment_unavailable'
  | 'retrieval_error';

export interface ComparisonWinner {
  /** Position of the winner in `candidates` */
  index: number;
  candidate: CandidateCase;
  rationale: string;
}

export interface RankedCandidate {
  rank: number;
  index: number;
  candidate: CandidateCase;
  rationale: string;
}

/**
 * Outcome of a comparison
 *
 * Invariant: `noMatch` is true exactly when `winner` is null.
 * `candidates` always holds every record that was considered.
 */
export interface ComparisonResult {
  question: string;
  winner: ComparisonWinner | null;
  candidates: CandidateCase[];
  /** Best to worst; the winner, when present, is first */
  ranked: RankedCandidate[];
  noMatch: boolean;
  reason: NoMatchReason | null;
  /** Upstream failure that was absorbed into a no-match answer */
  error?: Failure['error'];
}

/**
 * Context handed to every hook stage
 */
export interface HookContext {
  /** Question as it was asked, before any incoming stage ran */
  originalQuestion: string;
  requestId: string;
  actorType: ActorContext['type'];
}

/**
 * A named, pure transform over a payload
 */
export interface HookStage<T> {
  name: string;
  run: (payload: T, context: HookContext) => T;
}

export interface ComparatorHooks {
  /** Applied to the question before retrieval */
  incoming?: HookStage<string>[];
  /** Applied to the final result before it is returned */
  outgoing?: HookStage<ComparisonResult>[];
}
