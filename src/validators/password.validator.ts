/**
 * Password Validator
 *
 * Rules are checked in a fixed order and the first violation is reported:
 * length, uppercase, lowercase, digit.
 */

import type { FieldCheck } from '../types/index.js';
import { reject, success } from '../types/index.js';

const MIN_PASSWORD_LENGTH = 8;

const PASSWORD_RULES: ReadonlyArray<{ test: (value: string) => boolean; message: string }> = [
  {
    test: (value) => [...value].length >= MIN_PASSWORD_LENGTH,
    message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters.`,
  },
  {
    test: (value) => /\p{Lu}/u.test(value),
    message: 'Password must contain at least one uppercase letter.',
  },
  {
    test: (value) => /\p{Ll}/u.test(value),
    message: 'Password must contain at least one lowercase letter.',
  },
  {
    test: (value) => /\p{Nd}/u.test(value),
    message: 'Password must contain at least one digit.',
  },
];

export function validatePassword(password: string): FieldCheck<string> {
  const violated = PASSWORD_RULES.find((rule) => !rule.test(password));
  if (violated !== undefined) {
    return reject(violated.message);
  }
  return success(password);
}
