import { PROFILE_FIELDS } from '@userprofile/types';
import type { Profile, ProfileField, UpdateProfileInput } from '@userprofile/types';

/**
 * Names of the fields an update sets, in declaration order.
 */
export function presentFields(update: UpdateProfileInput): ProfileField[] {
  return PROFILE_FIELDS.filter((field) => update[field] !== undefined);
}

/**
 * Field-by-field overwrite of `profile` with the fields present in `update`.
 * Returns the same object when nothing is present.
 */
export function mergeProfileUpdate(profile: Profile, update: UpdateProfileInput): Profile {
  if (presentFields(update).length === 0) {
    return profile;
  }

  return {
    name: update.name ?? profile.name,
    email: update.email ?? profile.email,
    age: update.age ?? profile.age,
    bio: update.bio !== undefined ? update.bio : profile.bio,
  };
}
