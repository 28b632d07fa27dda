/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { config } from 'dotenv';
import { afterEach, vi } from 'vitest';

// Load test environment variables (optional - won't fail if not present)
config({ path: '.env.test' });

afterEach(() => {
  // Undo console spies and other vi.spyOn replacements
  vi.restoreAllMocks();
});
