/**
 * LLM Client Exports
 *
 * Uses the OpenAI-compatible API via the 'openai' package.
 * Any provider exposing that API works through OPENAI_BASE_URL.
 */

export { createOpenAIClient, createLLMClient } from './llm-client.js';
export type { OpenAIClientConfig } from './llm-client.js';
export {
  COMPARE_PROMPT,
  GAP_PROMPT,
  DRAFT_PROMPT,
  REVIEW_PROMPT,
} from './prompts.js';
