/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

export const SERVICE_NAME = 'user-profile-core';

/**
 * Create health check routes
 */
export function createHealthRoutes(): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Liveness only - does not touch the database
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
