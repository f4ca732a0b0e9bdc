/**
 * Case Routes
 * Resolution documentation and the learning trigger
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type {
  CaseService,
  DraftService,
  LearningLoopService,
} from '@/services/index.js';

import {
  errorResponse,
  getRequestId,
  parseJsonBody,
  successResponse,
} from '../utils/response.js';

interface CaseRoutesDeps {
  caseService: Pick<CaseService, 'getCase' | 'recordResolution' | 'listCaseSteps'>;
  draftService: Pick<DraftService, 'listDraftsForCase'>;
  learningLoopService: Pick<LearningLoopService, 'learnFromCase'>;
}

const resolutionSchema = z.object({
  stepsText: z.string().default(''),
  resolutionSummary: z.string().default(''),
});

/**
 * Create case routes
 */
export function createCaseRoutes(deps: CaseRoutesDeps): Hono {
  const { caseService, draftService, learningLoopService } = deps;
  const app = new Hono();

  /**
   * GET /cases/:caseId
   */
  app.get('/cases/:caseId', async (c) => {
    const requestId = getRequestId(c);
    const result = await caseService.getCase(c.get('actor'), c.req.param('caseId'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /cases/:caseId/steps
   * Documented resolutions, oldest first
   */
  app.get('/cases/:caseId/steps', async (c) => {
    const requestId = getRequestId(c);
    const result = await caseService.listCaseSteps(
      c.get('actor'),
      c.req.param('caseId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  /**
   * POST /cases/:caseId/resolution
   * Document how a case was resolved
   */
  app.post('/cases/:caseId/resolution', async (c) => {
    const requestId = getRequestId(c);
    const parsed = await parseJsonBody(c, resolutionSchema, requestId);
    if (!parsed.ok) {
      return parsed.response;
    }

    const result = await caseService.recordResolution(
      c.get('actor'),
      c.req.param('caseId'),
      parsed.body
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /cases/:caseId/learn
   * Run gap detection, extraction, review, publish and re-index
   */
  app.post('/cases/:caseId/learn', async (c) => {
    const requestId = getRequestId(c);
    const result = await learningLoopService.learnFromCase(
      c.get('actor'),
      c.req.param('caseId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /cases/:caseId/drafts
   * Drafts extracted from the case, oldest first
   */
  app.get('/cases/:caseId/drafts', async (c) => {
    const requestId = getRequestId(c);
    const result = await draftService.listDraftsForCase(
      c.get('actor'),
      c.req.param('caseId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  return app;
}
