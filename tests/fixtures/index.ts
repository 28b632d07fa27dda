/**
 * Test Fixtures
 * Reusable profile data for consistent testing
 */

import type {
  StoredUser,
  UserProfileRecord,
  UserResponse,
} from '@/types/index.js';

export const validCreateDraft = {
  email: 'john.doe@example.com',
  nickname: 'john_doe123',
  firstName: 'John',
  lastName: 'Doe',
  bio: 'Builds web applications.',
  profilePictureUrl: 'https://example.com/profiles/john.jpg',
  linkedinProfileUrl: 'https://linkedin.com/in/johndoe',
  githubProfileUrl: 'https://github.com/johndoe',
  role: 'AUTHENTICATED',
  password: 'Secure1234',
};

export const validRecord: UserProfileRecord = {
  email: 'john.doe@example.com',
  nickname: 'john_doe123',
  firstName: 'John',
  lastName: 'Doe',
  bio: 'Builds web applications.',
  profilePictureUrl: 'https://example.com/profiles/john.jpg',
  linkedinProfileUrl: 'https://linkedin.com/in/johndoe',
  githubProfileUrl: 'https://github.com/johndoe',
  role: 'AUTHENTICATED',
  password: 'Secure1234',
};

export const storedUser: StoredUser = {
  id: 'user_test123',
  email: 'john.doe@example.com',
  nickname: 'john_doe123',
  firstName: 'John',
  lastName: 'Doe',
  bio: 'Builds web applications.',
  profilePictureUrl: 'https://example.com/profiles/john.jpg',
  linkedinProfileUrl: 'https://linkedin.com/in/johndoe',
  githubProfileUrl: 'https://github.com/johndoe',
  role: 'AUTHENTICATED',
  isProfessional: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-15T10:00:00Z'),
};

export const userResponse: UserResponse = {
  id: 'user_test123',
  email: 'john.doe@example.com',
  nickname: 'john_doe123',
  firstName: 'John',
  lastName: 'Doe',
  bio: 'Builds web applications.',
  profilePictureUrl: 'https://example.com/profiles/john.jpg',
  linkedinProfileUrl: 'https://linkedin.com/in/johndoe',
  githubProfileUrl: 'https://github.com/johndoe',
  role: 'AUTHENTICATED',
  isProfessional: false,
};
