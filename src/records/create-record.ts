/**
 * CreateRecord
 *
 * Validates a draft for account creation. Email, password and role are
 * required; a missing nickname is generated before its pattern check. Every
 * field is checked and all issues are returned together.
 */

import type { NicknameResolver } from '../services/nickname.service.js';
import type { Result, UserProfileRecord } from '../types/index.js';
import { success, validationFailure } from '../types/index.js';
import {
  parseRole,
  validateEmail,
  validateGenericUrl,
  validateGithubUrl,
  validateLinkedinUrl,
  validateNickname,
  validatePassword,
} from '../validators/index.js';

import {
  chain,
  collectIssues,
  readDraft,
  readOptional,
  readRequired,
} from './draft.js';

export interface CreateRecordDeps {
  nicknames: NicknameResolver;
}

export function validateCreateRecord(
  input: unknown,
  deps: CreateRecordDeps
): Result<UserProfileRecord> {
  const read = readDraft(input);
  if (!read.success) {
    return read;
  }
  const draft = read.data;

  const email = chain(readRequired(draft, 'email'), validateEmail);
  const nickname = chain(
    chain(readOptional(draft, 'nickname'), (raw) => deps.nicknames.resolve(raw)),
    validateNickname
  );
  const firstName = readOptional(draft, 'firstName');
  const lastName = readOptional(draft, 'lastName');
  const bio = readOptional(draft, 'bio');
  const profilePictureUrl = chain(
    readOptional(draft, 'profilePictureUrl'),
    validateGenericUrl
  );
  const linkedinProfileUrl = chain(
    readOptional(draft, 'linkedinProfileUrl'),
    validateLinkedinUrl
  );
  const githubProfileUrl = chain(
    readOptional(draft, 'githubProfileUrl'),
    validateGithubUrl
  );
  const role = chain(readRequired(draft, 'role'), parseRole);
  const password = chain(readRequired(draft, 'password'), validatePassword);

  if (
    !email.success ||
    !nickname.success ||
    !firstName.success ||
    !lastName.success ||
    !bio.success ||
    !profilePictureUrl.success ||
    !linkedinProfileUrl.success ||
    !githubProfileUrl.success ||
    !role.success ||
    !password.success
  ) {
    return validationFailure(
      collectIssues([
        ['email', email],
        ['nickname', nickname],
        ['firstName', firstName],
        ['lastName', lastName],
        ['bio', bio],
        ['profilePictureUrl', profilePictureUrl],
        ['linkedinProfileUrl', linkedinProfileUrl],
        ['githubProfileUrl', githubProfileUrl],
        ['role', role],
        ['password', password],
      ])
    );
  }

  return success({
    email: email.data,
    nickname: nickname.data,
    firstName: firstName.data ?? null,
    lastName: lastName.data ?? null,
    bio: bio.data ?? null,
    profilePictureUrl: profilePictureUrl.data ?? null,
    linkedinProfileUrl: linkedinProfileUrl.data ?? null,
    githubProfileUrl: githubProfileUrl.data ?? null,
    role: role.data,
    password: password.data,
  });
}
