/**
 * Validation error normalization
 *
 * Every validation failure, whatever produced it, leaves the service as a list of
 * {@link ValidationErrorDetail} records built here.
 */

import type { ZodIssue } from 'zod';
import { PROFILE_FIELDS } from '@userprofile/types';
import type { FieldViolation } from './update-validator.js';

export const BODY_LOCATION = 'body';

export interface ValidationErrorDetail {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

export type ValidationFailure =
  /**
   * Body parsed as JSON but does not match the update schema. `violations` holds
   * the rule violations of the fields that did have the right type.
   */
  | { source: 'transport'; issues: readonly ZodIssue[]; violations?: readonly FieldViolation[] }
  /** Body is missing, not JSON, or sent without a JSON content type */
  | { source: 'body'; message: string }
  /** Body is well-formed but breaks a field rule */
  | { source: 'rules'; violations: readonly FieldViolation[] };

function fromZodIssue(issue: ZodIssue): ValidationErrorDetail[] {
  const loc = [BODY_LOCATION, ...issue.path];

  switch (issue.code) {
    case 'invalid_type':
      return [{ loc, msg: issue.message, type: `type_error.${issue.expected}` }];
    case 'unrecognized_keys':
      return issue.keys.map((key) => ({
        loc: [...loc, key],
        msg: 'extra fields not permitted',
        type: 'value_error.extra',
      }));
    default:
      return [{ loc, msg: issue.message, type: `value_error.${issue.code}` }];
  }
}

function fromViolation(violation: FieldViolation): ValidationErrorDetail {
  return {
    loc: [BODY_LOCATION, violation.field],
    msg: violation.message,
    type: violation.kind,
  };
}

const FIELD_RANK = new Map<string | number, number>(
  PROFILE_FIELDS.map((field, index) => [field, index])
);

function fieldRank(detail: ValidationErrorDetail): number {
  const key = detail.loc[1];
  return (key === undefined ? undefined : FIELD_RANK.get(key)) ?? PROFILE_FIELDS.length;
}

// Stable: records for the same rank keep their relative order
function sortByField(details: ValidationErrorDetail[]): ValidationErrorDetail[] {
  return [...details].sort((a, b) => fieldRank(a) - fieldRank(b));
}

export function normalizeValidationFailure(failure: ValidationFailure): ValidationErrorDetail[] {
  switch (failure.source) {
    case 'transport':
      return sortByField([
        ...failure.issues.flatMap(fromZodIssue),
        ...(failure.violations ?? []).map(fromViolation),
      ]);
    case 'body':
      return [{ loc: [BODY_LOCATION], msg: failure.message, type: 'value_error.jsondecode' }];
    case 'rules':
      return failure.violations.map(fromViolation);
  }
}
