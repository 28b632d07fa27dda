/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { UserService } from '../services/index.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createHealthRoutes } from './routes/health.js';
import { createUserRoutes } from './routes/users.js';
import type { ErrorResponse } from './types.js';

/**
 * App configuration
 */
export interface AppConfig {
  userService: UserService;
  allowedOrigins?: string[];
  logRequests?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { userService, allowedOrigins, logRequests = true } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', createRequestIdMiddleware());
  if (logRequests) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      exposeHeaders: ['x-request-id'],
    })
  );

  app.route('/api/v1', createHealthRoutes());
  app.route('/api/v1', createUserRoutes({ userService }));

  // 404 handler
  app.notFound((c) => {
    const body: ErrorResponse = {
      error: 'Endpoint not found',
      code: 'NOT_FOUND',
      requestId: c.get('requestId'),
    };
    return c.json(body, 404);
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    const body: ErrorResponse = {
      error: 'An unexpected error occurred',
      code: 'INTERNAL_ERROR',
      requestId: c.get('requestId'),
    };
    return c.json(body, 500);
  });

  return app;
}
