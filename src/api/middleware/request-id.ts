/**
 * Request ID Middleware
 * Reuses an incoming x-request-id header or mints a new one
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return `req_${nanoid(12)}`;
}

export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && incoming !== '' ? incoming : generateRequestId();

    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
