/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { createPublicMiddleware } from './middleware/auth.js';
import type { RateLimitScope } from './middleware/rateLimit.js';
import { createAuditRoutes } from './routes/audit.js';
import { createCaseRoutes } from './routes/cases.js';
import { createDraftRoutes } from './routes/drafts.js';
import { createHealthRoutes } from './routes/health.js';
import { createKnowledgeRoutes } from './routes/knowledge.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  authMiddleware: MiddlewareHandler;
  /** Per-scope limits for routes that call the language model */
  rateLimits?: Partial<Record<RateLimitScope, MiddlewareHandler>>;
  allowedOrigins?: string[];
  health?: Parameters<typeof createHealthRoutes>[0];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, authMiddleware, rateLimits, allowedOrigins, health } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route('/api/v1', createHealthRoutes(health));

  // Protected routes
  for (const prefix of ['knowledge', 'cases', 'drafts', 'audit']) {
    app.use(`/api/v1/${prefix}/*`, authMiddleware);
  }

  if (rateLimits?.ask) {
    app.use('/api/v1/knowledge/ask', rateLimits.ask);
  }
  if (rateLimits?.learn) {
    app.use('/api/v1/cases/:caseId/learn', rateLimits.learn);
    app.use('/api/v1/drafts/:draftId/reextract', rateLimits.learn);
  }

  app.route(
    '/api/v1',
    createKnowledgeRoutes({
      learningLoopService: services.learningLoopService,
      retrievalService: services.retrievalService,
      knowledgeService: services.knowledgeService,
    })
  );
  app.route(
    '/api/v1',
    createCaseRoutes({
      caseService: services.caseService,
      draftService: services.draftService,
      learningLoopService: services.learningLoopService,
    })
  );
  app.route(
    '/api/v1',
    createDraftRoutes({
      draftService: services.draftService,
      reviewService: services.reviewService,
      learningLoopService: services.learningLoopService,
    })
  );
  app.route('/api/v1', createAuditRoutes({ auditService: services.auditService }));

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') || 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    const requestId = c.get('requestId') || 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
