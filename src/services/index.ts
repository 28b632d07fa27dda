/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 */

// UserService
export type { UserService, UserServiceDb } from './user.service.js';
export { createUserService } from './user.service.js';
export { createUserServiceDb } from './user.db.js';

// Nickname resolution
export type {
  NicknameGenerator,
  NicknameResolver,
} from './nickname.service.js';
export { createNicknameResolver } from './nickname.service.js';
export type { NicknameWords } from './nickname.generator.js';
export {
  createWordListNicknameGenerator,
  loadNicknameWords,
} from './nickname.generator.js';

// Credential hashing
export type { PasswordHasher } from './password.hasher.js';
export {
  createBcryptHasher,
  DEFAULT_BCRYPT_ROUNDS,
} from './password.hasher.js';
