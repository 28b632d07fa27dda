/**
 * Validation Types
 * Issue taxonomy, field check results and the error envelope
 */

import type { ProfileField } from './user.js';
import type { ServiceError, Success } from './result.js';

/**
 * Issues attributable to exactly one field
 */
export type FieldIssueKind =
  | 'FIELD_FORMAT'
  | 'FIELD_REQUIRED'
  | 'UNRECOGNIZED_ROLE'
  | 'COLLABORATOR_ERROR';

/**
 * Issues about the draft as a whole
 */
export type RecordIssueKind = 'RECORD_EMPTY' | 'INVALID_INPUT';

export interface FieldIssue {
  kind: FieldIssueKind;
  field: ProfileField;
  message: string;
}

export interface RecordIssue {
  kind: RecordIssueKind;
  field: null;
  message: string;
}

export type ValidationIssue = FieldIssue | RecordIssue;

/**
 * Rejection returned by a single field validator
 */
export interface FieldRejection {
  success: false;
  kind: FieldIssueKind;
  message: string;
}

export type FieldCheck<T> = Success<T> | FieldRejection;

export type Optional<T> = T | null | undefined;

/**
 * Helper function to create a field rejection
 */
export function reject(
  message: string,
  kind: FieldIssueKind = 'FIELD_FORMAT'
): FieldRejection {
  return { success: false, kind, message };
}

/**
 * Error envelope carried to the request boundary
 */
export interface ErrorEnvelope {
  error: string;
  details?: string;
}

/**
 * Render a service error as an error envelope
 * Issues become "field: message" pairs joined by "; "
 */
export function toErrorEnvelope(error: ServiceError): ErrorEnvelope {
  const envelope: ErrorEnvelope = { error: error.message };
  if (error.issues !== undefined && error.issues.length > 0) {
    envelope.details = error.issues
      .map((issue) =>
        issue.field === null ? issue.message : `${issue.field}: ${issue.message}`
      )
      .join('; ');
  }
  return envelope;
}
