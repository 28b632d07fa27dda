/**
 * Word-List Nickname Generator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  createWordListNicknameGenerator,
  loadNicknameWords,
} from '@/services/index.js';
import { validateNickname } from '@/validators/index.js';

describe('loadNicknameWords', () => {
  it('should load the bundled word list', () => {
    const words = loadNicknameWords();

    expect(words.adjectives.length).toBeGreaterThan(0);
    expect(words.animals.length).toBeGreaterThan(0);
  });
});

describe('createWordListNicknameGenerator', () => {
  it('should join an adjective, an animal and a 3-digit suffix', () => {
    const generate = createWordListNicknameGenerator({
      adjectives: ['brave'],
      animals: ['otter'],
    });

    expect(generate()).toMatch(/^brave_otter_\d{3}$/);
  });

  it('should produce nicknames that pass the nickname validator', () => {
    const generate = createWordListNicknameGenerator();

    for (let i = 0; i < 20; i++) {
      expect(validateNickname(generate()).success).toBe(true);
    }
  });
});
