/**
 * Maps thrown errors to responses. Every error body has a `detail` member;
 * validation failures carry the normalized record list, everything else a message.
 */

import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ProfileNotFoundError, ProfileValidationError } from '@userprofile/core';
import type { Logger } from '@userprofile/observability';
import type { AppBindings } from '../types/context.js';

export function createErrorHandler(logger: Logger): ErrorHandler<AppBindings> {
  return (err, c) => {
    const requestId = c.get('requestId');

    if (err instanceof ProfileValidationError) {
      logger.debug({ requestId, errors: err.errors }, 'profile.validation_failed');
      return c.json({ detail: err.errors }, 422);
    }

    if (err instanceof ProfileNotFoundError) {
      return c.json({ detail: err.message }, 404);
    }

    if (err instanceof HTTPException) {
      return c.json({ detail: err.message }, err.status);
    }

    logger.error({ err, requestId }, 'request.failed');
    return c.json({ detail: 'Internal Server Error' }, 500);
  };
}

export function notFoundHandler(c: Context<AppBindings>) {
  return c.json({ detail: 'Not Found' }, 404);
}
