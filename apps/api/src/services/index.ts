/**
 * Service Registry
 *
 * Creates service instances with their dependencies. Each call builds an
 * independent store, so tests and servers never share profile state.
 */

import { InMemoryProfileRepository, ProfileService } from '@userprofile/core';
import type { ProfileRepository } from '@userprofile/core';

export interface Services {
  profileRepository: ProfileRepository;
  profileService: ProfileService;
}

export function createServices(
  profileRepository: ProfileRepository = new InMemoryProfileRepository()
): Services {
  return {
    profileRepository,
    profileService: new ProfileService(profileRepository),
  };
}
