/**
 * Nickname Validator
 */

import type { FieldCheck, Optional } from '../types/index.js';
import { reject, success } from '../types/index.js';

const MIN_NICKNAME_LENGTH = 3;
// Letters and digits of any script, connector punctuation such as '_', and '-'
const NICKNAME_PATTERN = /^[\p{L}\p{M}\p{Nd}\p{Pc}-]+$/u;

/**
 * Absent nicknames pass unchanged; present ones need 3+ letters, digits, underscores or hyphens
 */
export function validateNickname<T extends Optional<string>>(
  nickname: T
): FieldCheck<T> {
  if (nickname === null || nickname === undefined) {
    return success(nickname);
  }
  if ([...nickname].length < MIN_NICKNAME_LENGTH) {
    return reject(
      `Nickname must be at least ${MIN_NICKNAME_LENGTH} characters.`
    );
  }
  if (!NICKNAME_PATTERN.test(nickname)) {
    return reject(
      'Nickname may only contain letters, digits, underscores and hyphens.'
    );
  }
  return success(nickname);
}
