import { Hono } from 'hono';
import type { ProfileService } from '@userprofile/core';
import type { Logger } from '@userprofile/observability';
import { createErrorHandler, notFoundHandler } from './lib/error-handler.js';
import type { IdentityResolver } from './lib/identity-provider.js';
import { identityMiddleware } from './middleware/identity.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { healthRoute } from './routes/health.js';
import { createProfileRoute } from './routes/user/profile.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  profileService: ProfileService;
  identityResolver: IdentityResolver;
  logger: Logger;
}

export function createApp({ profileService, identityResolver, logger }: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLogger(logger));

  app.onError(createErrorHandler(logger));
  app.notFound(notFoundHandler);

  app.route('/health', healthRoute);

  const user = new Hono<AppBindings>();
  user.use('*', identityMiddleware(identityResolver));
  user.route('/profile', createProfileRoute({ profileService, logger }));

  app.route('/user', user);

  return app;
}
