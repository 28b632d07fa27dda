/**
 * URL Validator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  validateGenericUrl,
  validateGithubUrl,
  validateLinkedinUrl,
} from '@/validators/index.js';

const GITHUB_MESSAGE =
  'Invalid GitHub profile URL. The correct format is: https://github.com/<username>.';
const LINKEDIN_MESSAGE =
  'Invalid LinkedIn profile URL. The correct format is: https://www.linkedin.com/in/<username>.';

describe('validateGenericUrl', () => {
  it.each([
    'https://example.com/profiles/john.jpg',
    'http://cdn.example.org/a?size=2#top',
    'https://localhost:8080/avatar.png',
  ])('should accept %s unchanged', (url) => {
    expect(validateGenericUrl(url)).toEqual({ success: true, data: url });
  });

  it.each([
    'example.com/john.jpg',
    'ftp://example.com/john.jpg',
    'https://exa mple.com/john.jpg',
    'https://.example.com',
    'https:///example.com',
    '',
  ])('should reject %j', (url) => {
    expect(validateGenericUrl(url)).toEqual({
      success: false,
      kind: 'FIELD_FORMAT',
      message: 'Invalid URL format.',
    });
  });

  it('should pass absent values through without checking', () => {
    expect(validateGenericUrl(undefined)).toEqual({
      success: true,
      data: undefined,
    });
    expect(validateGenericUrl(null)).toEqual({ success: true, data: null });
  });
});

describe('validateGithubUrl', () => {
  it.each([
    'https://github.com/alice',
    'http://github.com/alice/',
    'https://www.github.com/alice_B-9',
  ])('should accept %s', (url) => {
    expect(validateGithubUrl(url)).toEqual({ success: true, data: url });
  });

  it.each([
    'https://github.com/alice/repo',
    'https://github.com/',
    'https://gitlab.com/alice',
    'https://github.com/al ice',
    'github.com/alice',
  ])('should reject %s', (url) => {
    expect(validateGithubUrl(url)).toEqual({
      success: false,
      kind: 'FIELD_FORMAT',
      message: GITHUB_MESSAGE,
    });
  });

  it('should pass absent values through', () => {
    expect(validateGithubUrl(undefined).success).toBe(true);
  });
});

describe('validateLinkedinUrl', () => {
  it.each([
    'https://www.linkedin.com/in/john-doe',
    'https://linkedin.com/in/johndoe/',
    'http://linkedin.com/in/j%C3%A9r%C3%B4me',
  ])('should accept %s', (url) => {
    expect(validateLinkedinUrl(url)).toEqual({ success: true, data: url });
  });

  it.each([
    'https://linkedin.com/john-doe',
    'https://www.linkedin.com/company/acme',
    'https://linkedin.com/in/john/extra',
    'https://linkedin.com/in/',
  ])('should reject %s', (url) => {
    expect(validateLinkedinUrl(url)).toEqual({
      success: false,
      kind: 'FIELD_FORMAT',
      message: LINKEDIN_MESSAGE,
    });
  });

  it('should pass absent values through', () => {
    expect(validateLinkedinUrl(null)).toEqual({ success: true, data: null });
  });
});
