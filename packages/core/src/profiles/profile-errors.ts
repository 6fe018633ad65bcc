/**
 * Profile Domain Errors
 *
 * Custom error classes for profile lookups and rejected updates.
 */

import { normalizeValidationFailure } from './validation-errors.js';
import type { ValidationErrorDetail, ValidationFailure } from './validation-errors.js';

export class ProfileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProfileNotFoundError extends ProfileError {
  constructor(readonly userId: string | null) {
    super('User profile not found');
  }
}

/**
 * Raised for any bad input. The records are always produced by
 * {@link normalizeValidationFailure}, so callers see one encoding.
 */
export class ProfileValidationError extends ProfileError {
  readonly errors: ValidationErrorDetail[];

  constructor(failure: ValidationFailure, options?: ErrorOptions) {
    const errors = normalizeValidationFailure(failure);
    super(
      `Validation failed: ${errors.map((e) => `${e.loc.join('.')}: ${e.msg}`).join(', ')}`,
      options
    );
    this.errors = errors;
  }
}
