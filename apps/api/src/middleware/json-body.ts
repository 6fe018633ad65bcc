import type { Context, Next } from 'hono';
import { ProfileValidationError } from '@userprofile/core';
import type { AppBindings } from '../types/context.js';

// Same rule as Hono's json validator, so every body let through here is parsed there
const JSON_CONTENT_TYPE = /^application\/([a-z-.]+\+)?json(;\s*[a-zA-Z0-9-]+=([^;]+))*$/;

/**
 * Reject bodies that cannot reach schema validation.
 *
 * Hono's json validator treats a non-JSON content type as an empty object and
 * answers malformed JSON with a bare 400; both become normalized 422 failures here.
 * The parsed body stays cached on the request for the validator that follows.
 */
export async function requireJsonBody(c: Context<AppBindings>, next: Next) {
  const contentType = c.req.header('content-type');

  if (!contentType || !JSON_CONTENT_TYPE.test(contentType)) {
    throw new ProfileValidationError({
      source: 'body',
      message: 'Request body must be sent as application/json',
    });
  }

  try {
    await c.req.json();
  } catch (error) {
    throw new ProfileValidationError(
      { source: 'body', message: 'Malformed JSON in request body' },
      { cause: error }
    );
  }

  await next();
}
