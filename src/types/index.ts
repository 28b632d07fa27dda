/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ServiceError, ErrorCode } from './result.js';
export {
  success,
  failure,
  validationFailure,
  isSuccess,
  isFailure,
} from './result.js';
export type { PageParams, PageEnvelope } from './pagination.js';
export {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  normalizePageParams,
  pageRange,
  toPageEnvelope,
} from './pagination.js';
export type {
  UserRole,
  ProfileField,
  UpdateField,
  UserProfileDraft,
  UserProfile,
  UserProfileRecord,
  UserProfileUpdate,
  RecordIdentity,
  UserResponse,
  StoredUser,
} from './user.js';
export { USER_ROLES, PROFILE_FIELDS, UPDATE_FIELDS, isUserRole } from './user.js';
export type {
  FieldIssueKind,
  RecordIssueKind,
  FieldIssue,
  RecordIssue,
  ValidationIssue,
  FieldRejection,
  FieldCheck,
  Optional,
  ErrorEnvelope,
} from './validation.js';
export { reject, toErrorEnvelope } from './validation.js';
