/**
 * JudgmentService Implementation
 * Structured decisions from the language model
 *
 * SCOPE: Judgment capability shared by the comparator, gap detector,
 * draft extractor and reviewer
 *
 * GUARDRAILS:
 * - Model output is untrusted: it is parsed and validated against the
 *   caller's zod schema before anything acts on it
 * - Every attempt has a hard timeout; attempts are bounded with capped
 *   exponential backoff between them
 * - Cancellation is never retried
 *
 * Dependencies: LLMClient
 */

import type {
  JudgmentRequest,
  JudgmentRetryPolicy,
  LLMClient,
  LLMResponse,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  errorMessage,
  DEFAULT_ENGINE_CONFIG,
  JUDGMENT_ERROR_CODES,
} from '@/types/index.js';

/**
 * JudgmentService interface
 */
export interface JudgmentService {
  judge<T>(request: JudgmentRequest<T>): Promise<Result<T>>;
}

type AttemptOutcome =
  | { kind: 'response'; response: LLMResponse }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

const FENCED = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\s*```$/;

/**
 * Remove a Markdown code fence wrapped around a model response
 */
export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  const match = FENCED.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

/**
 * Backoff before attempt `attempt + 1` (1-based)
 */
export function backoffDelay(
  policy: JudgmentRetryPolicy,
  attempt: number
): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create JudgmentService instance
 */
export function createJudgmentService(deps: {
  llm: LLMClient;
  model?: string;
  temperature?: number;
  retry?: JudgmentRetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}): JudgmentService {
  const { llm } = deps;
  const model = deps.model ?? DEFAULT_ENGINE_CONFIG.judgmentModel;
  const temperature = deps.temperature ?? DEFAULT_ENGINE_CONFIG.judgmentTemperature;
  const retry = deps.retry ?? DEFAULT_ENGINE_CONFIG.judgmentRetry;
  const sleep = deps.sleep ?? defaultSleep;

  /**
   * One completion bounded by the timeout and the caller's signal
   */
  async function attempt<T>(request: JudgmentRequest<T>): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const parent = request.signal;
    let onAbort: (() => void) | undefined;

    const call: Promise<AttemptOutcome> = llm
      .complete({
        model,
        temperature,
        json: true,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: JSON.stringify(request.input) },
        ],
        signal: controller.signal,
      })
      .then(
        (response): AttemptOutcome => ({ kind: 'response', response }),
        (error: unknown): AttemptOutcome => ({ kind: 'error', error })
      );

    let expire: () => void = () => undefined;
    const timeout = new Promise<AttemptOutcome>((resolve) => {
      expire = () => resolve({ kind: 'timeout' });
    });
    const timer = setTimeout(() => expire(), retry.timeoutMs);

    const cancelled = new Promise<AttemptOutcome>((resolve) => {
      if (parent === undefined) {
        return;
      }
      if (parent.aborted) {
        resolve({ kind: 'cancelled' });
        return;
      }
      onAbort = () => resolve({ kind: 'cancelled' });
      parent.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const outcome = await Promise.race([call, timeout, cancelled]);
      if (outcome.kind !== 'response') {
        controller.abort();
      }
      return outcome;
    } finally {
      clearTimeout(timer);
      if (parent !== undefined && onAbort !== undefined) {
        parent.removeEventListener('abort', onAbort);
      }
    }
  }

  function parse<T>(request: JudgmentRequest<T>, content: string): Result<T> {
    let raw: unknown;
    try {
      raw = JSON.parse(stripCodeFences(content));
    } catch (error) {
      return failure(
        JUDGMENT_ERROR_CODES.MALFORMED,
        `Judgment response is not JSON: ${errorMessage(error)}`,
        { task: request.task }
      );
    }

    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      return failure(
        JUDGMENT_ERROR_CODES.MALFORMED,
        'Judgment response does not match the expected shape',
        { task: request.task, issues: parsed.error.issues.map((i) => i.message) }
      );
    }
    return success(parsed.data);
  }

  return {
    async judge<T>(request: JudgmentRequest<T>): Promise<Result<T>> {
      let last: Result<T> = failure(
        JUDGMENT_ERROR_CODES.UNAVAILABLE,
        'Judgment was not attempted'
      );

      for (let n = 1; n <= retry.maxAttempts; n++) {
        if (request.signal?.aborted) {
          return failure('CANCELLED', 'Judgment was cancelled');
        }

        const outcome = await attempt(request);
        switch (outcome.kind) {
          case 'cancelled':
            return failure('CANCELLED', 'Judgment was cancelled');
          case 'timeout':
            last = failure(
              JUDGMENT_ERROR_CODES.TIMEOUT,
              `Judgment timed out after ${retry.timeoutMs}ms`,
              { task: request.task, attempt: n }
            );
            break;
          case 'error':
            if (request.signal?.aborted) {
              return failure('CANCELLED', 'Judgment was cancelled');
            }
            last = failure(
              JUDGMENT_ERROR_CODES.UNAVAILABLE,
              `Judgment call failed: ${errorMessage(outcome.error)}`,
              { task: request.task, attempt: n }
            );
            break;
          case 'response':
            last = parse(request, outcome.response.content);
            if (last.success) {
              return last;
            }
            break;
        }

        if (!last.success) {
          console.error(
            `Judgment ${request.task} attempt ${n}/${retry.maxAttempts} failed: ${last.error.code}`
          );
        }

        if (n < retry.maxAttempts) {
          await sleep(backoffDelay(retry, n));
        }
      }

      return last;
    },
  };
}
