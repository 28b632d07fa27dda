/**
 * Password Hasher
 * Credential-hashing collaborator backed by bcrypt
 */

import bcrypt from 'bcrypt';

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
}

export const DEFAULT_BCRYPT_ROUNDS = 12;

export function createBcryptHasher(
  rounds: number = DEFAULT_BCRYPT_ROUNDS
): PasswordHasher {
  return {
    async hash(plaintext: string): Promise<string> {
      return bcrypt.hash(plaintext, rounds);
    },
  };
}
