/**
 * Email Validator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { validateEmail } from '@/validators/index.js';

describe('validateEmail', () => {
  it('should accept a well-formed address unchanged', () => {
    expect(validateEmail('john.doe@example.com')).toEqual({
      success: true,
      data: 'john.doe@example.com',
    });
  });

  it('should trim and lower-case the domain only', () => {
    expect(validateEmail('  Alice.Smith@Example.COM ')).toEqual({
      success: true,
      data: 'Alice.Smith@example.com',
    });
  });

  it('should be stable when re-applied', () => {
    const first = validateEmail('Bob@Mail.Example.org');
    expect(first.success).toBe(true);
    if (first.success) {
      expect(validateEmail(first.data)).toEqual(first);
    }
  });

  it.each(['not-an-email', 'john.doe@', '@example.com', 'john doe@example.com', ''])(
    'should reject %j',
    (email) => {
      expect(validateEmail(email)).toEqual({
        success: false,
        kind: 'FIELD_FORMAT',
        message: 'Invalid email address.',
      });
    }
  );
});
