/**
 * User Profile Types
 *
 * SCOPE: Profile fields, roles, create/update/outward record shapes
 * NOT IN SCOPE: Sessions, credential storage format
 */

/**
 * Closed set of user roles
 */
export const USER_ROLES = [
  'ANONYMOUS',
  'AUTHENTICATED',
  'MODERATOR',
  'ADMIN',
] as const;

export type UserRole = (typeof USER_ROLES)[number];

/**
 * Every field a profile draft may carry, in validation order
 */
export const PROFILE_FIELDS = [
  'email',
  'nickname',
  'firstName',
  'lastName',
  'bio',
  'profilePictureUrl',
  'linkedinProfileUrl',
  'githubProfileUrl',
  'role',
  'password',
] as const;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

/**
 * Fields accepted by a partial update (password changes go elsewhere)
 */
export const UPDATE_FIELDS = [
  'email',
  'nickname',
  'firstName',
  'lastName',
  'bio',
  'profilePictureUrl',
  'linkedinProfileUrl',
  'githubProfileUrl',
  'role',
] as const satisfies readonly ProfileField[];

export type UpdateField = (typeof UPDATE_FIELDS)[number];

/**
 * Raw, unvalidated input for a create or update
 * Values are untrusted; null and undefined both mean "absent"
 */
export type UserProfileDraft = Partial<Record<ProfileField, unknown>>;

/**
 * Profile fields shared by every validated shape
 */
export interface UserProfile {
  email: string;
  nickname: string;
  firstName: string | null;
  lastName: string | null;
  bio: string | null;
  profilePictureUrl: string | null;
  linkedinProfileUrl: string | null;
  githubProfileUrl: string | null;
  role: UserRole;
}

/**
 * Normalized create record
 * password is the validated plaintext, handed to the hasher and nowhere else
 */
export interface UserProfileRecord extends UserProfile {
  password: string;
}

/**
 * Normalized partial update
 * Only fields present in the draft appear as keys
 */
export interface UserProfileUpdate {
  email?: string;
  nickname?: string;
  firstName?: string;
  lastName?: string;
  bio?: string;
  profilePictureUrl?: string;
  linkedinProfileUrl?: string;
  githubProfileUrl?: string;
  role?: UserRole;
}

/**
 * Server-assigned identity of a stored profile
 */
export interface RecordIdentity {
  id: string;
  isProfessional?: boolean | null | undefined; // Unknown defaults to false
}

/**
 * Outward representation returned to clients - never carries a password
 */
export interface UserResponse extends UserProfile {
  id: string;
  isProfessional: boolean;
}

/**
 * Profile as held by persistence
 */
export interface StoredUser extends UserProfile {
  id: string;
  isProfessional: boolean | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Type guard for role values
 */
export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}
