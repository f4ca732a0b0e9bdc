/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { LearningEngine } from '@/engine.js';
import type { ActorContext } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ContentfulStatusCode> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  ALREADY_EXISTS: 409,
  INVALID_STATE: 409,
  PUBLISH_CONFLICT: 409,
  RATE_LIMITED: 429,
  CANCELLED: 408,
  RETRIEVAL_ERROR: 503,
  JUDGMENT_UNAVAILABLE: 503,
  JUDGMENT_TIMEOUT: 504,
  JUDGMENT_MALFORMED: 502,
  INDEX_WRITE_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code] ?? 500;
}

/**
 * Services the routes call into
 */
export type ApiServices = Pick<
  LearningEngine,
  | 'caseService'
  | 'retrievalService'
  | 'draftService'
  | 'reviewService'
  | 'knowledgeService'
  | 'learningLoopService'
  | 'auditService'
>;
