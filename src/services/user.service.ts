/**
 * UserService Implementation
 *
 * SCOPE: Creating, reading, updating, deleting and listing user profiles
 * NOT IN SCOPE: Authentication, sessions, email uniqueness checks
 *
 * Dependencies: UserServiceDb (persistence), PasswordHasher,
 * NicknameGenerator
 *
 * GUARDRAILS:
 * - Drafts are validated before any collaborator is touched
 * - The plaintext password goes to the hasher only, never to the db
 * - Result pattern required (no thrown errors)
 */

import {
  toOutwardRecord,
  validateCreateRecord,
  validateUpdateRecord,
} from '../records/index.js';
import type {
  PageEnvelope,
  PageParams,
  Result,
  StoredUser,
  UserProfile,
  UserProfileUpdate,
  UserResponse,
} from '../types/index.js';
import {
  failure,
  normalizePageParams,
  success,
  toPageEnvelope,
} from '../types/index.js';

import { createNicknameResolver } from './nickname.service.js';
import type { NicknameGenerator } from './nickname.service.js';
import type { PasswordHasher } from './password.hasher.js';

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  getUser: (userId: string) => Promise<StoredUser | null>;
  createUser: (params: {
    profile: UserProfile;
    passwordHash: string;
  }) => Promise<StoredUser>;
  updateUser: (
    userId: string,
    updates: UserProfileUpdate
  ) => Promise<StoredUser | null>;
  deleteUser: (userId: string) => Promise<boolean>;
  listUsers: (
    params: PageParams
  ) => Promise<{ items: StoredUser[]; total: number }>;
}

/**
 * UserService interface
 */
export interface UserService {
  createUser(input: unknown): Promise<Result<UserResponse>>;
  getUser(userId: string): Promise<Result<UserResponse>>;
  updateUser(userId: string, input: unknown): Promise<Result<UserResponse>>;
  deleteUser(userId: string): Promise<Result<void>>;
  listUsers(
    params: Partial<PageParams>
  ): Promise<Result<PageEnvelope<UserResponse>>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function isBlankId(userId: string): boolean {
  return userId.trim() === '';
}

function toResponse(user: StoredUser): UserResponse {
  return toOutwardRecord(user, {
    id: user.id,
    isProfessional: user.isProfessional,
  });
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  passwordHasher: PasswordHasher;
  nicknameGenerator: NicknameGenerator;
}): UserService {
  const { db, passwordHasher, nicknameGenerator } = deps;
  const nicknames = createNicknameResolver({ generate: nicknameGenerator });

  return {
    /**
     * Validate a create draft, hash its password and store the profile
     */
    async createUser(input: unknown): Promise<Result<UserResponse>> {
      const validation = validateCreateRecord(input, { nicknames });
      if (!validation.success) {
        return validation;
      }
      const { password, ...profile } = validation.data;

      let passwordHash: string;
      try {
        passwordHash = await passwordHasher.hash(password);
      } catch (error) {
        console.error('Password hashing failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to secure password');
      }

      try {
        const user = await db.createUser({ profile, passwordHash });
        return success(toResponse(user));
      } catch (error) {
        console.error('User creation failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to create user');
      }
    },

    /**
     * Get user by ID
     */
    async getUser(userId: string): Promise<Result<UserResponse>> {
      if (isBlankId(userId)) {
        return failure('VALIDATION_ERROR', 'User ID is required');
      }

      try {
        const user = await db.getUser(userId);
        if (user === null) {
          return failure('NOT_FOUND', 'User not found');
        }
        return success(toResponse(user));
      } catch (error) {
        console.error('User lookup failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to get user');
      }
    },

    /**
     * Apply a partial update
     * An empty or malformed update is reported before the user is looked up
     */
    async updateUser(
      userId: string,
      input: unknown
    ): Promise<Result<UserResponse>> {
      if (isBlankId(userId)) {
        return failure('VALIDATION_ERROR', 'User ID is required');
      }

      const validation = validateUpdateRecord(input);
      if (!validation.success) {
        return validation;
      }

      try {
        const existing = await db.getUser(userId);
        if (existing === null) {
          return failure('NOT_FOUND', 'User not found');
        }
        const user = await db.updateUser(userId, validation.data);
        if (user === null) {
          return failure('NOT_FOUND', 'User not found');
        }
        return success(toResponse(user));
      } catch (error) {
        console.error('User update failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to update user');
      }
    },

    /**
     * Delete user by ID
     */
    async deleteUser(userId: string): Promise<Result<void>> {
      if (isBlankId(userId)) {
        return failure('VALIDATION_ERROR', 'User ID is required');
      }

      try {
        const deleted = await db.deleteUser(userId);
        if (!deleted) {
          return failure('NOT_FOUND', 'User not found');
        }
        return success(undefined);
      } catch (error) {
        console.error('User deletion failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to delete user');
      }
    },

    /**
     * List users one page at a time
     */
    async listUsers(
      params: Partial<PageParams>
    ): Promise<Result<PageEnvelope<UserResponse>>> {
      const page = normalizePageParams(params);

      try {
        const { items, total } = await db.listUsers(page);
        return success(toPageEnvelope(items.map(toResponse), total, page));
      } catch (error) {
        console.error('User listing failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to list users');
      }
    },
  };
}
