/**
 * ComparatorService Implementation
 * Picks the single best-matching past case for a new question
 *
 * SCOPE: Comparator agent
 *
 * Owns: No tables
 *
 * GUARDRAILS:
 * - Empty candidate list never reaches the judgment capability
 * - The judgment's answer is validated; anything unusable becomes an
 *   explicit no-match, never an exception
 * - noMatch is true exactly when winner is null, including after the
 *   outgoing hook stages have run
 * - Requires 'knowledge:read' (AI_ACTOR may compare)
 *
 * Dependencies: RetrievalService, JudgmentService
 */

import { z } from 'zod';

import type {
  ActorContext,
  CandidateCase,
  ComparatorHooks,
  ComparisonResult,
  Failure,
  HookContext,
  HookStage,
  NoMatchReason,
  RankedCandidate,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  hasPermission,
  PERMISSIONS,
  COMPARATOR_EXCERPT_CHARS,
  JUDGMENT_ERROR_CODES,
} from '@/types/index.js';
import { COMPARE_PROMPT } from '@/orchestrator/prompts.js';

import type { JudgmentService } from './judgment.service.js';
import type { RetrievalService } from './retrieval.service.js';

// ─────────────────────────────────────────────────────────────
// Judgment response schema
// ─────────────────────────────────────────────────────────────

const rankingSchema = z.object({
  index: z.number().int(),
  rank: z.number().int().positive(),
  rationale: z.string().optional(),
});

export const comparisonJudgmentSchema = z.discriminatedUnion('decision', [
  z.object({
    decision: z.literal('match'),
    winnerIndex: z.number().int(),
    rationale: z.string(),
    rankings: z.array(rankingSchema).optional(),
  }),
  z.object({
    decision: z.literal('no_match'),
    rationale: z.string().optional(),
  }),
]);

export type ComparisonJudgment = z.infer<typeof comparisonJudgmentSchema>;

export interface CompareParams {
  question: string;
  candidates: CandidateCase[];
  signal?: AbortSignal;
}

export interface AskParams {
  question: string;
  topK?: number;
  signal?: AbortSignal;
}

/**
 * ComparatorService interface
 */
export interface ComparatorService {
  compare(
    actor: ActorContext,
    params: CompareParams
  ): Promise<Result<ComparisonResult>>;
  ask(actor: ActorContext, params: AskParams): Promise<Result<ComparisonResult>>;
}

/**
 * Candidate as shown to the judgment
 */
export function toComparatorPayload(
  candidate: CandidateCase,
  index: number,
  excerptChars: number = COMPARATOR_EXCERPT_CHARS
): Record<string, unknown> {
  return {
    index,
    caseId: candidate.sourceId,
    status: candidate.status,
    tier: candidate.tier,
    module: candidate.module,
    category: candidate.category,
    description: candidate.description.slice(0, excerptChars),
    resolution: candidate.resolution.slice(0, excerptChars),
    hasKbArticle: candidate.hasKbArticle,
    hasScript: candidate.hasScript,
  };
}

function noMatch(
  question: string,
  candidates: CandidateCase[],
  reason: NoMatchReason,
  error?: Failure['error']
): ComparisonResult {
  const result: ComparisonResult = {
    question,
    winner: null,
    candidates,
    ranked: [],
    noMatch: true,
    reason,
  };
  if (error !== undefined) {
    result.error = error;
  }
  return result;
}

/**
 * Restore noMatch <=> winner === null
 * A winner that is not the candidate at its index becomes a no-match
 */
export function normalizeComparison(result: ComparisonResult): ComparisonResult {
  const { winner } = result;
  if (winner === null) {
    return {
      ...result,
      noMatch: true,
      reason: result.reason ?? 'judged_no_match',
    };
  }

  const listed = result.candidates[winner.index];
  if (
    listed === undefined ||
    listed.sourceId !== winner.candidate.sourceId ||
    listed.chunkId !== winner.candidate.chunkId
  ) {
    return {
      ...result,
      winner: null,
      ranked: [],
      noMatch: true,
      reason: 'invalid_response',
      error: {
        code: JUDGMENT_ERROR_CODES.MALFORMED,
        message: `Winner ${winner.candidate.sourceId} is not candidate ${winner.index}`,
      },
    };
  }
  return { ...result, noMatch: false, reason: null };
}

/**
 * Valid, de-duplicated rankings best to worst, winner first
 */
function buildRanking(
  judgment: Extract<ComparisonJudgment, { decision: 'match' }>,
  candidates: CandidateCase[],
  winnerIndex: number
): RankedCandidate[] {
  const ordered = [...(judgment.rankings ?? [])].sort((a, b) => a.rank - b.rank);
  const seen = new Set<number>([winnerIndex]);
  const rest: Array<{ index: number; candidate: CandidateCase; rationale: string }> = [];

  for (const entry of ordered) {
    const candidate = candidates[entry.index];
    if (candidate === undefined || seen.has(entry.index)) {
      continue;
    }
    seen.add(entry.index);
    rest.push({
      index: entry.index,
      candidate,
      rationale: entry.rationale?.trim() ?? '',
    });
  }

  const winner = candidates[winnerIndex];
  if (winner === undefined) {
    return [];
  }

  return [
    { index: winnerIndex, candidate: winner, rationale: judgment.rationale.trim() },
    ...rest,
  ].map((entry, i) => ({ rank: i + 1, ...entry }));
}

/**
 * Create ComparatorService instance
 */
export function createComparatorService(deps: {
  judgmentService: JudgmentService;
  retrievalService: RetrievalService;
  hooks?: ComparatorHooks;
  excerptChars?: number;
}): ComparatorService {
  const { judgmentService, retrievalService } = deps;
  const incoming = deps.hooks?.incoming ?? [];
  const outgoing = deps.hooks?.outgoing ?? [];
  const excerptChars = deps.excerptChars ?? COMPARATOR_EXCERPT_CHARS;

  function canCompare(actor: ActorContext): boolean {
    return actor.type === 'ai' || hasPermission(actor, PERMISSIONS.KNOWLEDGE_READ);
  }

  function runStages<T>(
    stages: HookStage<T>[],
    payload: T,
    context: HookContext
  ): Result<T> {
    let current = payload;
    for (const stage of stages) {
      try {
        current = stage.run(current, context);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Hook stage "${stage.name}" failed: ${errorMessage(error)}`,
          { stage: stage.name }
        );
      }
    }
    return success(current);
  }

  function finish(
    result: ComparisonResult,
    context: HookContext
  ): Result<ComparisonResult> {
    const staged = runStages(outgoing, result, context);
    if (!staged.success) {
      return staged;
    }
    return success(normalizeComparison(staged.data));
  }

  /**
   * Comparison without hook stages
   */
  async function judgeCandidates(
    question: string,
    candidates: CandidateCase[],
    signal: AbortSignal | undefined
  ): Promise<Result<ComparisonResult>> {
    if (candidates.length === 0) {
      return success(noMatch(question, [], 'no_candidates'));
    }

    const judged = await judgmentService.judge({
      task: 'compare',
      system: COMPARE_PROMPT,
      input: {
        question,
        candidates: candidates.map((c, i) => toComparatorPayload(c, i, excerptChars)),
      },
      schema: comparisonJudgmentSchema,
      ...(signal !== undefined && { signal }),
    });

    if (!judged.success) {
      if (judged.error.code === 'CANCELLED') {
        return judged;
      }
      const reason: NoMatchReason =
        judged.error.code === JUDGMENT_ERROR_CODES.MALFORMED
          ? 'invalid_response'
          : 'judgment_unavailable';
      return success(noMatch(question, candidates, reason, judged.error));
    }

    const judgment = judged.data;
    if (judgment.decision === 'no_match') {
      return success(noMatch(question, candidates, 'judged_no_match'));
    }

    const winner = candidates[judgment.winnerIndex];
    const rationale = judgment.rationale.trim();
    if (winner === undefined || !rationale) {
      return success(
        noMatch(question, candidates, 'invalid_response', {
          code: JUDGMENT_ERROR_CODES.MALFORMED,
          message:
            winner === undefined
              ? `Winner index ${judgment.winnerIndex} is out of range`
              : 'Winner has no rationale',
        })
      );
    }

    return success({
      question,
      winner: { index: judgment.winnerIndex, candidate: winner, rationale },
      candidates,
      ranked: buildRanking(judgment, candidates, judgment.winnerIndex),
      noMatch: false,
      reason: null,
    });
  }

  return {
    async compare(
      actor: ActorContext,
      params: CompareParams
    ): Promise<Result<ComparisonResult>> {
      if (!canCompare(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }

      const question = params.question.trim();
      if (!question) {
        return failure('VALIDATION_ERROR', 'Question cannot be empty');
      }

      const context: HookContext = {
        originalQuestion: params.question,
        requestId: actor.requestId,
        actorType: actor.type,
      };

      const result = await judgeCandidates(question, params.candidates, params.signal);
      if (!result.success) {
        return result;
      }
      return finish(result.data, context);
    },

    async ask(
      actor: ActorContext,
      params: AskParams
    ): Promise<Result<ComparisonResult>> {
      if (!canCompare(actor)) {
        return failure('PERMISSION_DENIED', 'Missing knowledge:read permission');
      }
      if (!params.question.trim()) {
        return failure('VALIDATION_ERROR', 'Question cannot be empty');
      }

      const context: HookContext = {
        originalQuestion: params.question,
        requestId: actor.requestId,
        actorType: actor.type,
      };

      const staged = runStages(incoming, params.question.trim(), context);
      if (!staged.success) {
        return staged;
      }
      const question = staged.data.trim();
      if (!question) {
        return failure('VALIDATION_ERROR', 'Question is empty after incoming hooks');
      }

      const retrieved = await retrievalService.retrieveCandidates(actor, {
        query: question,
        ...(params.topK !== undefined && { topK: params.topK }),
        ...(params.signal !== undefined && { signal: params.signal }),
      });

      if (!retrieved.success) {
        const code = retrieved.error.code;
        if (
          code === 'CANCELLED' ||
          code === 'VALIDATION_ERROR' ||
          code === 'PERMISSION_DENIED'
        ) {
          return retrieved;
        }
        return finish(noMatch(question, [], 'retrieval_error', retrieved.error), context);
      }

      const result = await judgeCandidates(question, retrieved.data, params.signal);
      if (!result.success) {
        return result;
      }
      return finish(result.data, context);
    },
  };
}
