/**
 * Word-List Nickname Generator
 * Produces names like "brave_otter_042" from data/nickname-words.json
 */

import { readFileSync } from 'node:fs';

import { customAlphabet } from 'nanoid';
import { z } from 'zod';

import type { NicknameGenerator } from './nickname.service.js';

const wordSchema = z.string().regex(/^[a-z]+$/, 'Words must be lowercase letters');

const nicknameWordsSchema = z.object({
  adjectives: z.array(wordSchema).nonempty(),
  animals: z.array(wordSchema).nonempty(),
});

export type NicknameWords = z.infer<typeof nicknameWordsSchema>;

const DEFAULT_WORDS_FILE = new URL(
  '../../data/nickname-words.json',
  import.meta.url
);

const numericSuffix = customAlphabet('0123456789', 3);

/**
 * Load and check a word list file
 */
export function loadNicknameWords(file: URL = DEFAULT_WORDS_FILE): NicknameWords {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return nicknameWordsSchema.parse(raw);
}

function pick(words: [string, ...string[]]): string {
  return words[Math.floor(Math.random() * words.length)] ?? words[0];
}

/**
 * Create a generator drawing from the given (or bundled) word list
 */
export function createWordListNicknameGenerator(
  words: NicknameWords = loadNicknameWords()
): NicknameGenerator {
  return () => `${pick(words.adjectives)}_${pick(words.animals)}_${numericSuffix()}`;
}
