/**
 * Profile Repository
 *
 * Data access layer for profile records. No business logic: callers validate
 * before writing.
 */

import { ProfileSchema } from '@userprofile/types';
import type { Profile } from '@userprofile/types';
import { ProfileNotFoundError } from './profile-errors.js';
import { DEFAULT_PROFILE_SEED } from './profile-seed.js';

export interface ProfileRepository {
  findByUserId(userId: string): Promise<Profile | null>;
  /**
   * Overwrite an existing profile. Profiles are never created through this call.
   */
  replace(userId: string, profile: Profile): Promise<Profile>;
}

/**
 * Volatile store living as long as the instance. Records are copied on the way in
 * and out so callers never hold a reference to stored state.
 */
export class InMemoryProfileRepository implements ProfileRepository {
  private readonly profiles = new Map<string, Profile>();

  constructor(seed: Readonly<Record<string, Profile>> = DEFAULT_PROFILE_SEED) {
    for (const [userId, profile] of Object.entries(seed)) {
      this.profiles.set(userId, ProfileSchema.parse(profile));
    }
  }

  async findByUserId(userId: string): Promise<Profile | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async replace(userId: string, profile: Profile): Promise<Profile> {
    if (!this.profiles.has(userId)) {
      throw new ProfileNotFoundError(userId);
    }

    this.profiles.set(userId, { ...profile });
    return { ...profile };
  }
}
