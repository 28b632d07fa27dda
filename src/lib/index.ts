/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createSupabaseAdmin } from './supabase.js';
