/**
 * Judgment Types
 * Structured decisions requested from the language model
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Component asking for the judgment - used for prompts and diagnostics
 */
export type JudgmentTask = 'compare' | 'gap' | 'draft' | 'review';

/**
 * A structured prompt plus the schema its answer must satisfy
 */
export interface JudgmentRequest<T> {
  task: JudgmentTask;
  system: string;
  /** Serialized to JSON as the user message */
  input: Record<string, unknown>;
  schema: ZodType<T, ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

/**
 * Retry policy applied to every judgment call
 */
export interface JudgmentRetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Backoff before the 2nd attempt; doubles each attempt */
  baseDelayMs: number;
  /** Backoff cap */
  maxDelayMs: number;
  /** Hard timeout per attempt */
  timeoutMs: number;
}

export const JUDGMENT_ERROR_CODES = {
  TIMEOUT: 'JUDGMENT_TIMEOUT',
  MALFORMED: 'JUDGMENT_MALFORMED',
  UNAVAILABLE: 'JUDGMENT_UNAVAILABLE',
} as const;
