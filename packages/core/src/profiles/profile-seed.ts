import type { Profile } from '@userprofile/types';

/**
 * Profiles loaded into a fresh in-memory repository, keyed by user id.
 */
export const DEFAULT_PROFILE_SEED: Readonly<Record<string, Profile>> = {
  user1: {
    name: 'Alice',
    email: 'alice@example.com',
    age: 29,
    bio: 'Backend developer.',
  },
  user2: {
    name: 'Bob',
    email: 'bob@example.com',
    age: 42,
    bio: 'DevOps engineer.',
  },
};
