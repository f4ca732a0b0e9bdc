/**
 * Audit Routes
 */

import { Hono } from 'hono';

import type { AuditService } from '@/services/index.js';

import { errorResponse, getRequestId, successResponse } from '../utils/response.js';

interface AuditRoutesDeps {
  auditService: Pick<AuditService, 'getResourceHistory'>;
}

export function createAuditRoutes(deps: AuditRoutesDeps): Hono {
  const { auditService } = deps;
  const app = new Hono();

  /**
   * GET /audit/:resourceType/:resourceId
   * Audit trail of one resource, newest first
   */
  app.get('/audit/:resourceType/:resourceId', async (c) => {
    const requestId = getRequestId(c);
    const result = await auditService.getResourceHistory(
      c.get('actor'),
      c.req.param('resourceType'),
      c.req.param('resourceId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { items: result.data }, requestId);
  });

  return app;
}
