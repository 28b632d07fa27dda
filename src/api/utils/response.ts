/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ServiceError } from '../../types/index.js';
import { toErrorEnvelope } from '../../types/index.js';
import type { ErrorResponse, SuccessResponse } from '../types.js';
import { getErrorStatus } from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  const body: ErrorResponse = {
    ...toErrorEnvelope(error),
    code: error.code,
    requestId,
  };
  if (error.issues !== undefined) {
    body.issues = error.issues;
  }

  return c.json(body, getErrorStatus(error.code));
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
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId },
  };
  return c.json(body, status);
}
