/**
 * LLM Types
 * Chat-completion shapes the judgment capability is built on
 */

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  max_tokens?: number;
  /** Ask the provider for a JSON object response */
  json?: boolean;
  signal?: AbortSignal;
}

export interface LLMResponse {
  id: string;
  model: string;
  content: string;
  finish_reason: 'stop' | 'length' | 'content_filter' | 'tool_calls' | null;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * LLM client interface (abstraction over the OpenAI SDK)
 */
export interface LLMClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
