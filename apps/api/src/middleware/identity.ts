import type { MiddlewareHandler } from 'hono';
import type { IdentityResolver } from '../lib/identity-provider.js';
import type { AppBindings } from '../types/context.js';

/**
 * Resolve the caller once per request and store it as `userId`.
 * A missing identity is not rejected here; profile routes answer 404 for it.
 */
export function identityMiddleware(resolver: IdentityResolver): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    c.set('userId', await resolver.resolve(c));
    await next();
  };
}
