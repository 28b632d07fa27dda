/**
 * UserService Database Adapter
 * Implements UserServiceDb interface using Supabase
 *
 * hashed_password is written on insert and never selected back.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  PageParams,
  StoredUser,
  UserProfile,
  UserProfileUpdate,
} from '../types/index.js';
import { isUserRole, pageRange } from '../types/index.js';

import type { UserServiceDb } from './user.service.js';

/**
 * Database row type
 */
interface UserRow {
  id: string;
  email: string;
  nickname: string;
  first_name: string | null;
  last_name: string | null;
  bio: string | null;
  profile_picture_url: string | null;
  linkedin_profile_url: string | null;
  github_profile_url: string | null;
  role: string;
  is_professional: boolean | null;
  created_at: string;
  updated_at: string;
}

const USER_COLUMNS = [
  'id',
  'email',
  'nickname',
  'first_name',
  'last_name',
  'bio',
  'profile_picture_url',
  'linkedin_profile_url',
  'github_profile_url',
  'role',
  'is_professional',
  'created_at',
  'updated_at',
].join(', ');

/**
 * Map database row to StoredUser entity
 */
function mapRowToUser(row: UserRow): StoredUser {
  if (!isUserRole(row.role)) {
    throw new Error(`Unknown role "${row.role}" on user ${row.id}`);
  }
  return {
    id: row.id,
    email: row.email,
    nickname: row.nickname,
    firstName: row.first_name,
    lastName: row.last_name,
    bio: row.bio,
    profilePictureUrl: row.profile_picture_url,
    linkedinProfileUrl: row.linkedin_profile_url,
    githubProfileUrl: row.github_profile_url,
    role: row.role,
    isProfessional: row.is_professional,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapProfileToRow(profile: UserProfile): Record<string, unknown> {
  return {
    email: profile.email,
    nickname: profile.nickname,
    first_name: profile.firstName,
    last_name: profile.lastName,
    bio: profile.bio,
    profile_picture_url: profile.profilePictureUrl,
    linkedin_profile_url: profile.linkedinProfileUrl,
    github_profile_url: profile.githubProfileUrl,
    role: profile.role,
  };
}

function mapUpdateToRow(updates: UserProfileUpdate): Record<string, unknown> {
  const updateData: Record<string, unknown> = {};

  if (updates.email !== undefined) {
    updateData.email = updates.email;
  }
  if (updates.nickname !== undefined) {
    updateData.nickname = updates.nickname;
  }
  if (updates.firstName !== undefined) {
    updateData.first_name = updates.firstName;
  }
  if (updates.lastName !== undefined) {
    updateData.last_name = updates.lastName;
  }
  if (updates.bio !== undefined) {
    updateData.bio = updates.bio;
  }
  if (updates.profilePictureUrl !== undefined) {
    updateData.profile_picture_url = updates.profilePictureUrl;
  }
  if (updates.linkedinProfileUrl !== undefined) {
    updateData.linkedin_profile_url = updates.linkedinProfileUrl;
  }
  if (updates.githubProfileUrl !== undefined) {
    updateData.github_profile_url = updates.githubProfileUrl;
  }
  if (updates.role !== undefined) {
    updateData.role = updates.role;
  }
  updateData.updated_at = new Date().toISOString();

  return updateData;
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  return {
    /**
     * Get user by ID
     */
    async getUser(userId: string): Promise<StoredUser | null> {
      const { data, error } = await supabase
        .from('users')
        .select(USER_COLUMNS)
        .eq('id', userId)
        .single();

      if (error !== null) {
        if (error.code === 'PGRST116') {
          // No rows returned
          return null;
        }
        throw new Error(`Failed to get user: ${error.message}`);
      }

      return mapRowToUser(data as unknown as UserRow);
    },

    /**
     * Create a new user
     */
    async createUser(params: {
      profile: UserProfile;
      passwordHash: string;
    }): Promise<StoredUser> {
      const { data, error } = await supabase
        .from('users')
        .insert({
          ...mapProfileToRow(params.profile),
          hashed_password: params.passwordHash,
        })
        .select(USER_COLUMNS)
        .single();

      if (error !== null) {
        throw new Error(`Failed to create user: ${error.message}`);
      }

      return mapRowToUser(data as unknown as UserRow);
    },

    /**
     * Update profile fields present in the update
     */
    async updateUser(
      userId: string,
      updates: UserProfileUpdate
    ): Promise<StoredUser | null> {
      const { data, error } = await supabase
        .from('users')
        .update(mapUpdateToRow(updates))
        .eq('id', userId)
        .select(USER_COLUMNS)
        .single();

      if (error !== null) {
        if (error.code === 'PGRST116') {
          // Row removed before the update landed
          return null;
        }
        throw new Error(`Failed to update user: ${error.message}`);
      }

      return mapRowToUser(data as unknown as UserRow);
    },

    /**
     * Delete user, reporting whether a row was removed
     */
    async deleteUser(userId: string): Promise<boolean> {
      const { data, error } = await supabase
        .from('users')
        .delete()
        .eq('id', userId)
        .select('id');

      if (error !== null) {
        throw new Error(`Failed to delete user: ${error.message}`);
      }

      return (data ?? []).length > 0;
    },

    /**
     * List users ordered by creation time
     */
    async listUsers(
      params: PageParams
    ): Promise<{ items: StoredUser[]; total: number }> {
      const { from, to } = pageRange(params);
      const { data, error, count } = await supabase
        .from('users')
        .select(USER_COLUMNS, { count: 'exact' })
        .order('created_at', { ascending: true })
        .range(from, to);

      if (error !== null) {
        throw new Error(`Failed to list users: ${error.message}`);
      }

      return {
        items: (data as unknown as UserRow[]).map(mapRowToUser),
        total: count ?? 0,
      };
    },
  };
}
