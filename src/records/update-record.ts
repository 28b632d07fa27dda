/**
 * UpdateRecord
 *
 * Validates a partial update. An update with no present field is rejected
 * with a single RECORD_EMPTY issue before any field validator runs; otherwise
 * only present fields are validated and only they appear in the output.
 */

import type { Result, UserProfileUpdate } from '../types/index.js';
import { UPDATE_FIELDS, success, validationFailure } from '../types/index.js';
import {
  parseRole,
  validateEmail,
  validateGenericUrl,
  validateGithubUrl,
  validateLinkedinUrl,
  validateNickname,
} from '../validators/index.js';

import {
  chain,
  collectIssues,
  isBlank,
  readDraft,
  readOptional,
  whenPresent,
} from './draft.js';

export const EMPTY_UPDATE_MESSAGE =
  'At least one field must be provided for update';

export function validateUpdateRecord(input: unknown): Result<UserProfileUpdate> {
  const read = readDraft(input);
  if (!read.success) {
    return read;
  }
  const draft = read.data;

  if (UPDATE_FIELDS.every((field) => isBlank(draft[field]))) {
    return validationFailure(
      [{ kind: 'RECORD_EMPTY', field: null, message: EMPTY_UPDATE_MESSAGE }],
      EMPTY_UPDATE_MESSAGE
    );
  }

  const email = chain(readOptional(draft, 'email'), whenPresent(validateEmail));
  const nickname = chain(readOptional(draft, 'nickname'), validateNickname);
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
  const role = chain(readOptional(draft, 'role'), whenPresent(parseRole));

  if (
    !email.success ||
    !nickname.success ||
    !firstName.success ||
    !lastName.success ||
    !bio.success ||
    !profilePictureUrl.success ||
    !linkedinProfileUrl.success ||
    !githubProfileUrl.success ||
    !role.success
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
      ])
    );
  }

  return success({
    ...(email.data !== undefined && { email: email.data }),
    ...(nickname.data !== undefined && { nickname: nickname.data }),
    ...(firstName.data !== undefined && { firstName: firstName.data }),
    ...(lastName.data !== undefined && { lastName: lastName.data }),
    ...(bio.data !== undefined && { bio: bio.data }),
    ...(profilePictureUrl.data !== undefined && {
      profilePictureUrl: profilePictureUrl.data,
    }),
    ...(linkedinProfileUrl.data !== undefined && {
      linkedinProfileUrl: linkedinProfileUrl.data,
    }),
    ...(githubProfileUrl.data !== undefined && {
      githubProfileUrl: githubProfileUrl.data,
    }),
    ...(role.data !== undefined && { role: role.data }),
  });
}
