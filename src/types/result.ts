/**
 * Result Pattern Implementation
 *
 * Validators, record shapes and services return Result<T> - they never throw
 * for expected failures.
 */

import type { ValidationIssue } from './validation.js';

/**
 * Error codes surfaced to callers
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR'
  | 'CONFIG_ERROR';

export interface ServiceError {
  code: ErrorCode;
  message: string;
  issues?: ValidationIssue[];
}

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: ServiceError;
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: ErrorCode,
  message: string,
  issues?: ValidationIssue[]
): Failure {
  const error: ServiceError = { code, message };
  if (issues !== undefined) {
    error.issues = issues;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Failure carrying every issue found in one validation pass
 */
export function validationFailure(
  issues: ValidationIssue[],
  message = 'Invalid user profile data'
): Failure {
  return failure('VALIDATION_ERROR', message, issues);
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}
