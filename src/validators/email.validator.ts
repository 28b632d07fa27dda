/**
 * Email Validator
 * Syntax check plus normalization: trimmed, domain lower-cased
 */

import { z } from 'zod';

import type { FieldCheck } from '../types/index.js';
import { reject, success } from '../types/index.js';

const emailSchema = z.string().trim().email();

export function validateEmail(email: string): FieldCheck<string> {
  const parsed = emailSchema.safeParse(email);
  if (!parsed.success) {
    return reject('Invalid email address.');
  }

  const at = parsed.data.lastIndexOf('@');
  const local = parsed.data.slice(0, at);
  const domain = parsed.data.slice(at + 1).toLowerCase();
  return success(`${local}@${domain}`);
}
