/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

interface HealthRoutesDeps {
  /** Reports how many chunks the index holds for the deployed model */
  index?: {
    model: string;
    countChunks: (model: string) => Promise<number>;
  };
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps = {}): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', async (c) => {
    const base = {
      timestamp: new Date().toISOString(),
      version: 'v1',
    };

    if (!deps.index) {
      return c.json({ status: 'ok', ...base });
    }

    try {
      const chunks = await deps.index.countChunks(deps.index.model);
      return c.json({
        status: chunks > 0 ? 'ok' : 'degraded',
        ...base,
        index: { model: deps.index.model, chunks },
      });
    } catch (err) {
      console.error('Health check failed:', err);
      return c.json({ status: 'unavailable', ...base }, 503);
    }
  });

  return app;
}
