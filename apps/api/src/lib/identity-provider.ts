/**
 * Caller identity resolution.
 *
 * Authentication is not part of this service: the production resolver names a
 * fixed user. A real deployment swaps in session or token verification behind the
 * same interface.
 */

import type { Context } from 'hono';
import type { AppBindings } from '../types/context.js';

export const DEFAULT_IDENTITY = 'user1';

export interface IdentityResolver {
  /**
   * @returns the caller's user id, or null when the request names nobody
   */
  resolve(c: Context<AppBindings>): string | null | Promise<string | null>;
}

export class FixedIdentityResolver implements IdentityResolver {
  constructor(private readonly userId: string = DEFAULT_IDENTITY) {}

  resolve(): string {
    return this.userId;
  }
}
