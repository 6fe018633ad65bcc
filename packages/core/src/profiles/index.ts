/**
 * Profiles Domain
 *
 * Exports profile repository, service, validators, errors, and types.
 */

export { InMemoryProfileRepository } from './profile-repository.js';
export type { ProfileRepository } from './profile-repository.js';
export { DEFAULT_PROFILE_SEED } from './profile-seed.js';

export { ProfileService } from './profile-service.js';

export { ProfileError, ProfileNotFoundError, ProfileValidationError } from './profile-errors.js';

export {
  MAX_AGE,
  MIN_AGE,
  fieldValidators,
  validateAge,
  validateEmail,
  validateText,
} from './field-validators.js';
export type { FieldCheck, FieldValidator, FieldValidatorMap } from './field-validators.js';

export { collectRuleViolations, validateProfileUpdate } from './update-validator.js';
export type { FieldViolation, UpdateValidationResult } from './update-validator.js';

export { BODY_LOCATION, normalizeValidationFailure } from './validation-errors.js';
export type { ValidationErrorDetail, ValidationFailure } from './validation-errors.js';

export { mergeProfileUpdate, presentFields } from './profile-merge.js';

export type { GetProfileParams, UpdateProfileParams } from './profile-types.js';
