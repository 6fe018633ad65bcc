/**
 * Profile endpoints for the calling user
 *
 * - GET /user/profile: current profile
 * - PUT /user/profile: partial update, any subset of name/email/age/bio
 *
 * Errors are thrown and rendered by the app error handler: 404 for a caller
 * without a profile, 422 with normalized records for any bad input.
 */

import { Hono } from 'hono';
import type { Context, MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { UpdateProfileSchema } from '@userprofile/types';
import {
  ProfileNotFoundError,
  ProfileValidationError,
  collectRuleViolations,
  presentFields,
} from '@userprofile/core';
import type { ProfileService } from '@userprofile/core';
import type { Logger } from '@userprofile/observability';
import { requireJsonBody } from '../../middleware/json-body.js';
import type { AppBindings } from '../../types/context.js';

export interface ProfileRouteDependencies {
  profileService: ProfileService;
  logger: Logger;
}

function requireUserId(c: Context<AppBindings>): string {
  const userId = c.get('userId');
  if (!userId) {
    throw new ProfileNotFoundError(null);
  }
  return userId;
}

// Rule violations of the well-typed fields are reported alongside the type errors
const updateProfileValidator = zValidator('json', UpdateProfileSchema, async (result, c) => {
  if (!result.success) {
    const body: unknown = await c.req.json();
    throw new ProfileValidationError({
      source: 'transport',
      issues: result.error.issues,
      violations: collectRuleViolations(body),
    });
  }
});

export function createProfileRoute({ profileService, logger }: ProfileRouteDependencies) {
  const profileRoute = new Hono<AppBindings>();

  // Only orders 404 before 422 for unknown callers. The lookup under the user
  // lock inside updateProfile is the one the update relies on.
  const requireProfile: MiddlewareHandler<AppBindings> = async (c, next) => {
    await profileService.getProfile({ userId: requireUserId(c) });
    await next();
  };

  /**
   * GET /user/profile - Get the caller's profile
   */
  profileRoute.get('/', async (c) => {
    const profile = await profileService.getProfile({ userId: requireUserId(c) });
    return c.json(profile);
  });

  /**
   * PUT /user/profile - Apply a partial update to the caller's profile
   */
  profileRoute.put('/', requireProfile, requireJsonBody, updateProfileValidator, async (c) => {
    const userId = requireUserId(c);
    const changes = c.req.valid('json');

    const profile = await profileService.updateProfile({ userId, changes });

    logger.info(
      { requestId: c.get('requestId'), userId, fields: presentFields(changes) },
      'profile.updated'
    );
    return c.json(profile);
  });

  return profileRoute;
}
