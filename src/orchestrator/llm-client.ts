/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK (or any OpenAI-compatible endpoint) for the
 * judgment capability. Non-streaming only: every judgment is one JSON
 * object.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type {
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
} from '@/types/index.js';

/**
 * OpenAI client configuration options
 */
export interface OpenAIClientConfig {
  /** API key (required) */
  apiKey: string;

  /** Base URL override for OpenAI-compatible providers */
  baseURL?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Create the OpenAI SDK client shared by completions and embeddings
 */
export function createOpenAIClient(config: OpenAIClientConfig): OpenAI {
  // Validate API key
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  return new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseURL !== undefined && { baseURL: config.baseURL }),
    timeout: config.timeout ?? 120000,
    // Retries are owned by the judgment service's policy
    maxRetries: 0,
  });
}

/**
 * Convert our LLMMessage to OpenAI's ChatCompletionMessageParam
 */
function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

function toFinishReason(
  reason: string | null | undefined
): LLMResponse['finish_reason'] {
  switch (reason) {
    case 'stop':
    case 'length':
    case 'content_filter':
    case 'tool_calls':
      return reason;
    case 'function_call':
      return 'tool_calls';
    default:
      return null;
  }
}

/**
 * Create an LLM client backed by the OpenAI SDK
 */
export function createLLMClient(openai: OpenAI): LLMClient {
  return {
    /**
     * Send a non-streaming chat completion request
     */
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toOpenAIMessage),
          ...(request.max_tokens !== undefined && {
            max_tokens: request.max_tokens,
          }),
          ...(request.temperature !== undefined && {
            temperature: request.temperature,
          }),
          ...(request.json === true && {
            response_format: { type: 'json_object' as const },
          }),
          stream: false,
        },
        request.signal !== undefined ? { signal: request.signal } : {}
      );

      const choice = response.choices[0];

      return {
        id: response.id,
        model: response.model,
        content: choice?.message.content ?? '',
        finish_reason: toFinishReason(choice?.finish_reason),
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },
  };
}
