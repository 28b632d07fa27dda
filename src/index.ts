/**
 * Application Entry Point
 *
 * Loads configuration, wires the user service to its collaborators and
 * starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { createSupabaseAdmin, loadConfig } from './lib/index.js';
import {
  createBcryptHasher,
  createUserService,
  createUserServiceDb,
  createWordListNicknameGenerator,
} from './services/index.js';

const loaded = loadConfig();
if (!loaded.success) {
  console.error(loaded.error.message);
  process.exit(1);
}
const config = loaded.data;

// Wire collaborators
const supabase = createSupabaseAdmin(config);
const userService = createUserService({
  db: createUserServiceDb(supabase),
  passwordHasher: createBcryptHasher(config.bcryptRounds),
  nicknameGenerator: createWordListNicknameGenerator(),
});

const app = createApp({
  userService,
  allowedOrigins: config.allowedOrigins,
  logRequests: config.logRequests,
});

console.error(`Server starting on port ${config.port}`);
console.error(`Supabase URL: ${config.supabaseUrl}`);

serve({
  fetch: app.fetch,
  port: config.port,
});

export { app };
