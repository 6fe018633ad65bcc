/**
 * Profile Service
 *
 * Business logic layer for profile operations.
 * Looks profiles up, validates partial updates and merges them into the store.
 */

import type { Profile } from '@userprofile/types';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { ProfileRepository } from './profile-repository.js';
import { ProfileNotFoundError, ProfileValidationError } from './profile-errors.js';
import { mergeProfileUpdate } from './profile-merge.js';
import { validateProfileUpdate } from './update-validator.js';
import type { GetProfileParams, UpdateProfileParams } from './profile-types.js';

export class ProfileService {
  private profileRepo: ProfileRepository;
  private locks = new KeyedMutex();

  constructor(profileRepo: ProfileRepository) {
    this.profileRepo = profileRepo;
  }

  /**
   * Get a user's profile
   *
   * @throws ProfileNotFoundError if the user has no profile
   */
  async getProfile(params: GetProfileParams): Promise<Profile> {
    const profile = await this.profileRepo.findByUserId(params.userId);

    if (!profile) {
      throw new ProfileNotFoundError(params.userId);
    }

    return profile;
  }

  /**
   * Apply a partial update
   *
   * Fields absent from `changes` keep their stored value. Nothing is written
   * unless every present field passes validation.
   *
   * @returns The merged profile
   * @throws ProfileNotFoundError if the user has no profile
   * @throws ProfileValidationError if any present field breaks a rule
   */
  async updateProfile(params: UpdateProfileParams): Promise<Profile> {
    const { userId, changes } = params;

    // Lookup, validate, merge and write back as one step per user
    return this.locks.runExclusive(userId, async () => {
      const current = await this.getProfile({ userId });

      const result = validateProfileUpdate(changes);
      if (!result.success) {
        throw new ProfileValidationError({ source: 'rules', violations: result.violations });
      }

      const merged = mergeProfileUpdate(current, result.data);
      if (merged === current) {
        return current;
      }

      return this.profileRepo.replace(userId, merged);
    });
  }
}
