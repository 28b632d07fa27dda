/**
 * OutwardRecord
 * Projection of a profile into the shape returned to clients
 */

import type {
  RecordIdentity,
  UserProfile,
  UserResponse,
} from '../types/index.js';

/**
 * Fields are picked one by one, so a password on the source never leaks
 */
export function toOutwardRecord(
  record: UserProfile,
  identity: RecordIdentity
): UserResponse {
  return {
    id: identity.id,
    email: record.email,
    nickname: record.nickname,
    firstName: record.firstName,
    lastName: record.lastName,
    bio: record.bio,
    profilePictureUrl: record.profilePictureUrl,
    linkedinProfileUrl: record.linkedinProfileUrl,
    githubProfileUrl: record.githubProfileUrl,
    role: record.role,
    isProfessional: identity.isProfessional ?? false,
  };
}
