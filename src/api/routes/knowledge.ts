/**
 * Knowledge Routes
 * Question answering, index search and published article reads
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type {
  KnowledgeService,
  LearningLoopService,
  RetrievalService,
} from '@/services/index.js';

import {
  errorResponse,
  getRequestId,
  parseJsonBody,
  successResponse,
} from '../utils/response.js';

/**
 * Max records a caller may ask for
 */
const MAX_TOP_K = 20;

interface KnowledgeRoutesDeps {
  learningLoopService: Pick<LearningLoopService, 'answerQuestion'>;
  retrievalService: Pick<RetrievalService, 'retrieve'>;
  knowledgeService: Pick<
    KnowledgeService,
    | 'getActiveArticle'
    | 'getArticleVersion'
    | 'getVersionHistory'
    | 'getLineage'
    | 'getProvenance'
  >;
}

// Zod Schemas
const askSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'question is required and must be a non-empty string'),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

const searchSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query is required and must be a non-empty string'),
  kind: z.enum(['case', 'script', 'article']).default('case'),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

const versionSchema = z.coerce.number().int().min(1);

/**
 * Create knowledge routes
 */
export function createKnowledgeRoutes(deps: KnowledgeRoutesDeps): Hono {
  const { learningLoopService, retrievalService, knowledgeService } = deps;
  const app = new Hono();

  /**
   * POST /knowledge/ask
   * Answer a question with the best matching past case
   */
  app.post('/knowledge/ask', async (c) => {
    const actor = c.get('actor');
    const requestId = getRequestId(c);

    const parsed = await parseJsonBody(c, askSchema, requestId);
    if (!parsed.ok) {
      return parsed.response;
    }

    const result = await learningLoopService.answerQuestion(
      actor,
      parsed.body.question,
      {
        signal: c.req.raw.signal,
        ...(parsed.body.topK !== undefined && { topK: parsed.body.topK }),
      }
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /knowledge/search
   * Nearest records of one kind, without a judgment
   */
  app.post('/knowledge/search', async (c) => {
    const actor = c.get('actor');
    const requestId = getRequestId(c);

    const parsed = await parseJsonBody(c, searchSchema, requestId);
    if (!parsed.ok) {
      return parsed.response;
    }

    const { query, kind, topK } = parsed.body;
    const result = await retrievalService.retrieve(actor, {
      query,
      kind,
      signal: c.req.raw.signal,
      ...(topK !== undefined && { topK }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  /**
   * GET /knowledge/:articleId
   * Active version of an article
   */
  app.get('/knowledge/:articleId', async (c) => {
    const requestId = getRequestId(c);
    const result = await knowledgeService.getActiveArticle(
      c.get('actor'),
      c.req.param('articleId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /knowledge/:articleId/versions
   * Every version, oldest first
   */
  app.get('/knowledge/:articleId/versions', async (c) => {
    const requestId = getRequestId(c);
    const result = await knowledgeService.getVersionHistory(
      c.get('actor'),
      c.req.param('articleId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  /**
   * GET /knowledge/:articleId/versions/:version
   */
  app.get('/knowledge/:articleId/versions/:version', async (c) => {
    const requestId = getRequestId(c);
    const version = versionSchema.safeParse(c.req.param('version'));
    if (!version.success) {
      return c.json(
        {
          error: {
            code: 'VALIDATION_ERROR',
            message: 'version must be a positive integer',
            requestId,
          },
        },
        400
      );
    }

    const result = await knowledgeService.getArticleVersion(
      c.get('actor'),
      c.req.param('articleId'),
      version.data
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /knowledge/:articleId/lineage
   * Lineage of one version (?version=N) or of the whole article
   */
  app.get('/knowledge/:articleId/lineage', async (c) => {
    const requestId = getRequestId(c);
    const rawVersion = c.req.query('version');

    let version: number | undefined;
    if (rawVersion !== undefined) {
      const parsed = versionSchema.safeParse(rawVersion);
      if (!parsed.success) {
        return c.json(
          {
            error: {
              code: 'VALIDATION_ERROR',
              message: 'version must be a positive integer',
              requestId,
            },
          },
          400
        );
      }
      version = parsed.data;
    }

    const result = await knowledgeService.getLineage(
      c.get('actor'),
      c.req.param('articleId'),
      version
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  /**
   * GET /knowledge/:articleId/provenance
   * Per version: lineage plus the review log of its draft
   */
  app.get('/knowledge/:articleId/provenance', async (c) => {
    const requestId = getRequestId(c);
    const result = await knowledgeService.getProvenance(
      c.get('actor'),
      c.req.param('articleId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  return app;
}
