/**
 * User Routes
 * Endpoints for creating, reading, updating, deleting and listing profiles
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type {
  PageEnvelope,
  PageParams,
  Result,
  UserResponse,
} from '../../types/index.js';
import { MAX_PAGE_SIZE, failure, success } from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * User service interface (minimal for routes)
 */
interface UserServiceDep {
  createUser: (input: unknown) => Promise<Result<UserResponse>>;
  getUser: (userId: string) => Promise<Result<UserResponse>>;
  updateUser: (
    userId: string,
    input: unknown
  ) => Promise<Result<UserResponse>>;
  deleteUser: (userId: string) => Promise<Result<void>>;
  listUsers: (
    params: Partial<PageParams>
  ) => Promise<Result<PageEnvelope<UserResponse>>>;
}

interface UserRoutesDeps {
  userService: UserServiceDep;
}

// Zod Schemas
const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

/**
 * Parse the JSON body; malformed JSON is a validation error, not an empty draft
 */
async function readJsonBody(c: Context): Promise<Result<unknown>> {
  try {
    const body: unknown = await c.req.json();
    return success(body);
  } catch {
    return failure('VALIDATION_ERROR', 'Request body must be valid JSON');
  }
}

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  /**
   * POST /users
   * Create a profile
   */
  app.post('/users', async (c) => {
    const requestId = c.get('requestId');

    const body = await readJsonBody(c);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userService.createUser(body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * GET /users
   * List profiles page by page
   */
  app.get('/users', async (c) => {
    const requestId = c.get('requestId');

    const query = listQuerySchema.safeParse({
      page: c.req.query('page'),
      size: c.req.query('size'),
    });
    if (!query.success) {
      const issue = query.error.issues[0];
      const message =
        issue !== undefined
          ? `${issue.path.join('.')}: ${issue.message}`
          : 'Invalid pagination parameters';
      return errorResponse(
        c,
        failure('VALIDATION_ERROR', message).error,
        requestId
      );
    }

    const result = await userService.listUsers({
      ...(query.data.page !== undefined && { page: query.data.page }),
      ...(query.data.size !== undefined && { size: query.data.size }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /users/:id
   * Get one profile
   */
  app.get('/users/:id', async (c) => {
    const requestId = c.get('requestId');

    const result = await userService.getUser(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * PATCH /users/:id
   * Partially update a profile
   */
  app.patch('/users/:id', async (c) => {
    const requestId = c.get('requestId');

    const body = await readJsonBody(c);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await userService.updateUser(c.req.param('id'), body.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * DELETE /users/:id
   * Delete a profile
   */
  app.delete('/users/:id', async (c) => {
    const requestId = c.get('requestId');

    const result = await userService.deleteUser(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return c.body(null, 204);
  });

  return app;
}
