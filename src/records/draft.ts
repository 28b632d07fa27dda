/**
 * Draft Reading Helpers
 * Turn untrusted input into per-field checks the record shapes compose
 */

import type {
  FieldCheck,
  FieldIssue,
  ProfileField,
  Result,
  UserProfileDraft,
} from '../types/index.js';
import { reject, success, validationFailure } from '../types/index.js';

const FIELD_LABELS: Record<ProfileField, string> = {
  email: 'Email',
  nickname: 'Nickname',
  firstName: 'First name',
  lastName: 'Last name',
  bio: 'Bio',
  profilePictureUrl: 'Profile picture URL',
  linkedinProfileUrl: 'LinkedIn profile URL',
  githubProfileUrl: 'GitHub profile URL',
  role: 'Role',
  password: 'Password',
};

function isDraft(input: unknown): input is UserProfileDraft {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Accept any plain object as a draft; anything else is a record-level issue
 */
export function readDraft(input: unknown): Result<UserProfileDraft> {
  if (!isDraft(input)) {
    return validationFailure([
      {
        kind: 'INVALID_INPUT',
        field: null,
        message: 'Profile data must be an object.',
      },
    ]);
  }
  return success(input);
}

/**
 * Absent in the presence-check sense: missing, null or the empty string
 */
export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Read an optional string field; null and undefined both read as undefined
 */
export function readOptional(
  draft: UserProfileDraft,
  field: ProfileField
): FieldCheck<string | undefined> {
  const value = draft[field];
  if (value === undefined || value === null) {
    return success(undefined);
  }
  if (typeof value !== 'string') {
    return reject(`${FIELD_LABELS[field]} must be a string.`);
  }
  return success(value);
}

/**
 * Read a mandatory string field
 */
export function readRequired(
  draft: UserProfileDraft,
  field: ProfileField
): FieldCheck<string> {
  const check = readOptional(draft, field);
  if (!check.success) {
    return check;
  }
  if (check.data === undefined) {
    return reject(`${FIELD_LABELS[field]} is required.`, 'FIELD_REQUIRED');
  }
  return success(check.data);
}

/**
 * Feed a successful check into the next validator
 */
export function chain<A, B>(
  check: FieldCheck<A>,
  next: (value: A) => FieldCheck<B>
): FieldCheck<B> {
  return check.success ? next(check.data) : check;
}

/**
 * Run a validator only when a value was read
 */
export function whenPresent<T>(
  validate: (value: string) => FieldCheck<T>
): (value: string | undefined) => FieldCheck<T | undefined> {
  return (value) => (value === undefined ? success(undefined) : validate(value));
}

/**
 * Collect the rejections of a set of checks, in the order given
 */
export function collectIssues(
  checks: ReadonlyArray<readonly [ProfileField, FieldCheck<unknown>]>
): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const [field, check] of checks) {
    if (!check.success) {
      issues.push({ kind: check.kind, field, message: check.message });
    }
  }
  return issues;
}
