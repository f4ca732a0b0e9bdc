/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || c.get('actor').requestId;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Parse and validate a JSON body
 * Returns the parsed body, or the error response to send back
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  requestId: string
): Promise<{ ok: true; body: z.output<S> } | { ok: false; response: Response }> {
  let rawBody: unknown;
  try {
    rawBody = await c.req.json();
  } catch {
    return {
      ok: false,
      response: c.json(
        {
          error: {
            code: 'INVALID_JSON',
            message: 'Invalid JSON body',
            requestId,
          },
        },
        400
      ),
    };
  }

  const validation = schema.safeParse(rawBody);
  if (!validation.success) {
    return {
      ok: false,
      response: c.json(
        {
          error: {
            code: 'VALIDATION_ERROR',
            message: validation.error.issues[0]?.message ?? 'Validation error',
            requestId,
          },
        },
        400
      ),
    };
  }

  return { ok: true, body: validation.data };
}
