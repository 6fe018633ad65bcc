import { z } from 'zod';
import { DEFAULT_IDENTITY } from './lib/identity-provider.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PROFILE_USER_ID: z.string().min(1).default(DEFAULT_IDENTITY),
});

export type ApiConfig = {
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  profileUserId: string;
};

/**
 * Read API settings from the environment.
 *
 * Empty variables count as unset. Throws naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = EnvSchema.safeParse(raw);

  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return {
    port: result.data.PORT,
    host: result.data.HOST,
    logLevel: result.data.LOG_LEVEL,
    profileUserId: result.data.PROFILE_USER_ID,
  };
}
