import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@userprofile/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Log one line per completed request. Runs after {@link requestIdMiddleware}.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const startedAt = performance.now();

    await next();

    logger.info(
      {
        requestId: c.get('requestId'),
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      'request.completed'
    );
  };
}
