/**
 * Update Validator
 *
 * Runs the field validator of every present field and collects all violations
 * before deciding the outcome, so a single request surfaces the complete set.
 */

import { PROFILE_FIELDS, UpdateProfileSchema } from '@userprofile/types';
import type { ProfileField, UpdateProfileInput } from '@userprofile/types';
import { fieldValidators } from './field-validators.js';
import type { FieldValidatorMap } from './field-validators.js';

export interface FieldViolation {
  field: ProfileField;
  message: string;
  kind: string;
}

export type UpdateValidationResult =
  | { success: true; data: UpdateProfileInput }
  | { success: false; violations: FieldViolation[] };

function checkField<K extends ProfileField>(
  validators: FieldValidatorMap,
  field: K,
  value: UpdateProfileInput[K],
  violations: FieldViolation[]
): void {
  // undefined means absent; null is only accepted for bio and carries no rule
  if (value === undefined || value === null) {
    return;
  }

  const check = validators[field](value);
  if (!check.ok) {
    violations.push({ field, message: check.message, kind: check.kind });
  }
}

export function validateProfileUpdate(
  update: UpdateProfileInput,
  validators: FieldValidatorMap = fieldValidators
): UpdateValidationResult {
  const violations: FieldViolation[] = [];

  for (const field of PROFILE_FIELDS) {
    checkField(validators, field, update[field], violations);
  }

  if (violations.length > 0) {
    return { success: false, violations };
  }

  return { success: true, data: update };
}

/**
 * Rule violations among the fields of a raw body that have the right type.
 *
 * Used when the body as a whole fails the update schema, so that type errors and
 * rule violations in the same request are reported together. Fields with the
 * wrong type and unknown keys are left to the schema issues.
 */
export function collectRuleViolations(
  body: unknown,
  validators: FieldValidatorMap = fieldValidators
): FieldViolation[] {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return [];
  }

  const entries = new Map<string, unknown>(Object.entries(body));
  const wellTyped = Object.fromEntries(
    PROFILE_FIELDS.filter(
      (field) =>
        entries.has(field) && UpdateProfileSchema.shape[field].safeParse(entries.get(field)).success
    ).map((field) => [field, entries.get(field)])
  );

  const parsed = UpdateProfileSchema.safeParse(wellTyped);
  if (!parsed.success) {
    return [];
  }

  const result = validateProfileUpdate(parsed.data, validators);
  return result.success ? [] : result.violations;
}
