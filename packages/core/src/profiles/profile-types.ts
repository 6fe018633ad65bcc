/**
 * Profile Domain Types
 *
 * Type definitions for profile service operations.
 */

import type { UpdateProfileInput } from '@userprofile/types';

/**
 * Parameters for getting a profile
 */
export interface GetProfileParams {
  userId: string;
}

/**
 * Parameters for updating a profile
 */
export interface UpdateProfileParams {
  userId: string;
  changes: UpdateProfileInput;
}
