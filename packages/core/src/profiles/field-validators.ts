/**
 * Field Validators
 *
 * Pure constraint checks for individual profile attributes. Each validator only
 * sees a value that is present in the update; absent fields are never checked.
 */

import { z } from 'zod';
import type { ProfileField, UpdateProfileInput } from '@userprofile/types';

export const MIN_AGE = 18;
export const MAX_AGE = 120;

export type FieldCheck = { ok: true } | { ok: false; message: string; kind: string };

export type FieldValidator<T> = (value: T) => FieldCheck;

export type FieldValidatorMap = {
  [K in ProfileField]: FieldValidator<NonNullable<UpdateProfileInput[K]>>;
};

const EmailSchema = z.string().email();

const OK: FieldCheck = { ok: true };

export function validateAge(value: number): FieldCheck {
  if (!Number.isInteger(value)) {
    return { ok: false, message: 'value is not a valid integer', kind: 'type_error.integer' };
  }

  if (value < MIN_AGE || value > MAX_AGE) {
    return {
      ok: false,
      message: `age must be between ${MIN_AGE} and ${MAX_AGE}`,
      kind: 'value_error',
    };
  }

  return OK;
}

export function validateEmail(value: string): FieldCheck {
  if (!EmailSchema.safeParse(value).success) {
    return { ok: false, message: 'value is not a valid email address', kind: 'value_error.email' };
  }

  return OK;
}

export function validateText(_value: string): FieldCheck {
  return OK;
}

export const fieldValidators: FieldValidatorMap = {
  name: validateText,
  email: validateEmail,
  age: validateAge,
  bio: validateText,
};
