/**
 * URL Field Validators
 * Format checks only - no network access
 */

import type { FieldCheck, Optional } from '../types/index.js';
import { reject, success } from '../types/index.js';

const GENERIC_URL_PATTERN = /^https?:\/\/[^\s/$.?#].[^\s]*$/;
const GITHUB_URL_PATTERN = /^https?:\/\/(?:www\.)?github\.com\/[A-Za-z0-9_-]+\/?$/;
const LINKEDIN_URL_PATTERN =
  /^https?:\/\/(?:www\.)?linkedin\.com\/in\/[A-Za-z0-9_%-]+\/?$/;

function matchOptional<T extends Optional<string>>(
  value: T,
  pattern: RegExp,
  message: string
): FieldCheck<T> {
  if (value === null || value === undefined) {
    return success(value);
  }
  if (!pattern.test(value)) {
    return reject(message);
  }
  return success(value);
}

/**
 * Any http(s) URL without embedded whitespace
 */
export function validateGenericUrl<T extends Optional<string>>(
  url: T
): FieldCheck<T> {
  return matchOptional(url, GENERIC_URL_PATTERN, 'Invalid URL format.');
}

/**
 * GitHub profile URL: exactly one path segment, the username
 */
export function validateGithubUrl<T extends Optional<string>>(
  url: T
): FieldCheck<T> {
  return matchOptional(
    url,
    GITHUB_URL_PATTERN,
    'Invalid GitHub profile URL. The correct format is: https://github.com/<username>.'
  );
}

/**
 * LinkedIn profile URL under /in/
 */
export function validateLinkedinUrl<T extends Optional<string>>(
  url: T
): FieldCheck<T> {
  return matchOptional(
    url,
    LINKEDIN_URL_PATTERN,
    'Invalid LinkedIn profile URL. The correct format is: https://www.linkedin.com/in/<username>.'
  );
}
