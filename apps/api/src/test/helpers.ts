/**
 * HTTP test helpers
 * Builds an isolated app and sends requests to it without opening a socket
 */

import type { Env, Hono } from 'hono';
import { InMemoryProfileRepository } from '@userprofile/core';
import type { Profile } from '@userprofile/types';
import { createApp } from '../app.js';
import { createServices } from '../services/index.js';
import { StaticIdentityResolver, createSilentLogger } from './mocks.js';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 *
 * Objects are sent as JSON; strings are sent as-is so tests can post broken bodies.
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  const request = new Request(`http://localhost${path}`, init);
  return app.fetch(request);
}

export interface TestAppOptions {
  userId?: string | null;
  seed?: Record<string, Profile>;
}

/**
 * App wired to a fresh in-memory store and a static caller identity
 */
export function createTestApp(options: TestAppOptions = {}) {
  const { userId = 'user1', seed } = options;
  const services = createServices(new InMemoryProfileRepository(seed));
  const app = createApp({
    profileService: services.profileService,
    identityResolver: new StaticIdentityResolver(userId),
    logger: createSilentLogger(),
  });

  return { app, ...services };
}
