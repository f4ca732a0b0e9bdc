/**
 * Fake model clients
 * Deterministic embedding and scripted judgment, no network
 */

import type { EmbeddingServiceClient } from '@/services/index.js';
import {
  COMPARE_PROMPT,
  DRAFT_PROMPT,
  GAP_PROMPT,
  REVIEW_PROMPT,
} from '@/orchestrator/prompts.js';
import type {
  JudgmentTask,
  LLMClient,
  LLMRequest,
  LLMResponse,
} from '@/types/index.js';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'their', 'from', 'was', 'are',
  'description', 'resolution', 'title', 'steps', 'cannot', 'can', 'not',
]);

function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(
    (t) => t.length >= 3 && !STOP_WORDS.has(t)
  );
}

function bucketOf(token: string, dimensions: number): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % dimensions;
}

/**
 * Bag-of-words vector: texts sharing words land close together
 */
export function hashedEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    const bucket = bucketOf(token, dimensions);
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }
  return vector;
}

export interface HashedEmbeddingClient extends EmbeddingServiceClient {
  calls: { single: number; batch: number };
  /** Make every following call throw */
  fail: (error: Error | null) => void;
}

export function createHashedEmbeddingClient(): HashedEmbeddingClient {
  const calls = { single: 0, batch: 0 };
  let failure: Error | null = null;

  return {
    calls,
    fail(error) {
      failure = error;
    },
    async createEmbedding(text, config) {
      calls.single++;
      if (failure !== null) {
        throw failure;
      }
      return {
        embedding: hashedEmbedding(text, config.dimensions),
        model: config.model,
        tokenCount: tokenize(text).length,
      };
    },
    async createBatchEmbeddings(texts, config) {
      calls.batch++;
      if (failure !== null) {
        throw failure;
      }
      return {
        embeddings: texts.map((t) => hashedEmbedding(t, config.dimensions)),
        model: config.model,
        totalTokens: texts.reduce((n, t) => n + tokenize(t).length, 0),
      };
    },
  };
}

const PROMPT_TASKS = new Map<string, JudgmentTask>([
  [COMPARE_PROMPT, 'compare'],
  [GAP_PROMPT, 'gap'],
  [DRAFT_PROMPT, 'draft'],
  [REVIEW_PROMPT, 'review'],
]);

/**
 * Reply to one judgment call: an object is sent as JSON, a string verbatim,
 * an Error is thrown by the client
 */
export type ScriptedReply = Record<string, unknown> | string | Error;

export type ScriptedHandler = (
  input: Record<string, unknown>,
  request: LLMRequest
) => ScriptedReply | Promise<ScriptedReply>;

export interface ScriptedLLM extends LLMClient {
  calls: { task: JudgmentTask; input: Record<string, unknown> }[];
  on: (task: JudgmentTask, handler: ScriptedHandler) => void;
  callsFor: (task: JudgmentTask) => Record<string, unknown>[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * LLM whose answers are scripted per judgment task
 * A task without a handler fails like an unreachable provider
 */
export function createScriptedLLM(
  handlers: Partial<Record<JudgmentTask, ScriptedHandler>> = {}
): ScriptedLLM {
  const table = new Map<JudgmentTask, ScriptedHandler>(
    Object.entries(handlers).flatMap(([task, handler]) => {
      const known = [...PROMPT_TASKS.values()].find((t) => t === task);
      return known !== undefined && handler !== undefined
        ? [[known, handler] as const]
        : [];
    })
  );
  const calls: ScriptedLLM['calls'] = [];

  return {
    calls,
    on(task, handler) {
      table.set(task, handler);
    },
    callsFor(task) {
      return calls.filter((c) => c.task === task).map((c) => c.input);
    },
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const system = request.messages.find((m) => m.role === 'system')?.content ?? '';
      const user = request.messages.find((m) => m.role === 'user')?.content ?? '{}';
      const task = PROMPT_TASKS.get(system);
      if (task === undefined) {
        throw new Error('Unknown judgment prompt');
      }

      const parsed: unknown = JSON.parse(user);
      const input = isRecord(parsed) ? parsed : {};
      calls.push({ task, input });

      const handler = table.get(task);
      if (handler === undefined) {
        throw new Error(`No scripted reply for ${task}`);
      }
      const reply = await handler(input, request);
      if (reply instanceof Error) {
        throw reply;
      }

      return {
        id: `completion-${calls.length}`,
        model: request.model,
        content: typeof reply === 'string' ? reply : JSON.stringify(reply),
        finish_reason: 'stop',
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      };
    },
  };
}
