/**
 * Password Validator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { validatePassword } from '@/validators/index.js';

const LENGTH = 'Password must be at least 8 characters.';
const UPPER = 'Password must contain at least one uppercase letter.';
const LOWER = 'Password must contain at least one lowercase letter.';
const DIGIT = 'Password must contain at least one digit.';

describe('validatePassword', () => {
  it.each(['Secure1234', 'aB3defgh', 'Passw0rd!', 'Ünïcode9x'])(
    'should accept %s unchanged',
    (password) => {
      expect(validatePassword(password)).toEqual({
        success: true,
        data: password,
      });
    }
  );

  it.each([
    ['Sh0rt', LENGTH],
    ['alllowercase1', UPPER],
    ['ALLUPPER123', LOWER],
    ['NoDigitsHere', DIGIT],
  ])('should reject %s with the matching rule', (password, message) => {
    expect(validatePassword(password)).toEqual({
      success: false,
      kind: 'FIELD_FORMAT',
      message,
    });
  });

  describe('rule order', () => {
    it('should report length before anything else', () => {
      // Violates every rule at once
      const result = validatePassword('!!!');
      expect(result.success).toBe(false);
      expect(!result.success && result.message).toBe(LENGTH);
    });

    it('should report uppercase before lowercase and digit', () => {
      // No uppercase, no digit
      const result = validatePassword('abcdefgh');
      expect(!result.success && result.message).toBe(UPPER);
    });

    it('should report lowercase before digit', () => {
      // No lowercase, no digit
      const result = validatePassword('ABCDEFGH');
      expect(!result.success && result.message).toBe(LOWER);
    });
  });

  it('should count characters, not UTF-16 units, for length', () => {
    // 7 characters, one of them outside the BMP
    const result = validatePassword('Ab1def😀');
    expect(!result.success && result.message).toBe(LENGTH);
  });
});
