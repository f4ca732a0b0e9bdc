/**
 * Draft Routes
 * Human review: overrides, re-extraction and publishing approved drafts
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type {
  DraftService,
  LearningLoopService,
  ReviewService,
} from '@/services/index.js';

import {
  errorResponse,
  getRequestId,
  parseJsonBody,
  successResponse,
} from '../utils/response.js';

interface DraftRoutesDeps {
  draftService: Pick<DraftService, 'getDraft' | 'reextract'>;
  reviewService: Pick<
    ReviewService,
    'override' | 'getDecisionHistory' | 'getDraftStatus'
  >;
  learningLoopService: Pick<LearningLoopService, 'publishDraft'>;
}

// Zod Schemas
const overrideSchema = z.object({
  decision: z.enum(['approved', 'rejected']),
  reasoning: z
    .string()
    .trim()
    .min(1, 'reasoning is required and must be a non-empty string'),
  requestReextraction: z.boolean().optional(),
});

const reextractSchema = z.object({
  feedback: z.string().trim().min(1).optional(),
});

/**
 * Create draft routes
 */
export function createDraftRoutes(deps: DraftRoutesDeps): Hono {
  const { draftService, reviewService, learningLoopService } = deps;
  const app = new Hono();

  /**
   * GET /drafts/:draftId
   * Draft with its current review status
   */
  app.get('/drafts/:draftId', async (c) => {
    const actor = c.get('actor');
    const requestId = getRequestId(c);
    const draftId = c.req.param('draftId');

    const draft = await draftService.getDraft(actor, draftId);
    if (!draft.success) {
      return errorResponse(c, draft.error, requestId);
    }
    const status = await reviewService.getDraftStatus(actor, draftId);
    if (!status.success) {
      return errorResponse(c, status.error, requestId);
    }
    return successResponse(c, { ...draft.data, status: status.data }, requestId);
  });

  /**
   * GET /drafts/:draftId/decisions
   * Review log, oldest first
   */
  app.get('/drafts/:draftId/decisions', async (c) => {
    const requestId = getRequestId(c);
    const result = await reviewService.getDecisionHistory(
      c.get('actor'),
      c.req.param('draftId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  /**
   * POST /drafts/:draftId/override
   * Record a human decision that supersedes the current one
   */
  app.post('/drafts/:draftId/override', async (c) => {
    const requestId = getRequestId(c);
    const parsed = await parseJsonBody(c, overrideSchema, requestId);
    if (!parsed.ok) {
      return parsed.response;
    }

    const { decision, reasoning, requestReextraction } = parsed.body;
    const result = await reviewService.override(c.get('actor'), {
      draftId: c.req.param('draftId'),
      decision,
      reasoning,
      ...(requestReextraction !== undefined && { requestReextraction }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /drafts/:draftId/reextract
   * New draft version from reviewer feedback
   */
  app.post('/drafts/:draftId/reextract', async (c) => {
    const requestId = getRequestId(c);
    const parsed = await parseJsonBody(c, reextractSchema, requestId);
    if (!parsed.ok) {
      return parsed.response;
    }

    const result = await draftService.reextract(c.get('actor'), {
      draftId: c.req.param('draftId'),
      ...(parsed.body.feedback !== undefined && { feedback: parsed.body.feedback }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /drafts/:draftId/publish
   * Publish a draft whose effective decision is an approval
   */
  app.post('/drafts/:draftId/publish', async (c) => {
    const requestId = getRequestId(c);
    const result = await learningLoopService.publishDraft(
      c.get('actor'),
      c.req.param('draftId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  return app;
}
