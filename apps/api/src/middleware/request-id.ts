import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../types/context.js';

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

function acceptRequestId(value: string | undefined): string | null {
  if (!value || value.length > MAX_REQUEST_ID_LENGTH || !REQUEST_ID_PATTERN.test(value)) {
    return null;
  }
  return value;
}

/**
 * Request ID middleware
 * Reuses a well-formed upstream id (load balancer, client) or generates one, then
 * exposes it on the context and the response for log correlation.
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const requestId =
    acceptRequestId(c.req.header('x-request-id')) ??
    acceptRequestId(c.req.header('x-correlation-id')) ??
    randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
