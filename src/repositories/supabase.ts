import type { PostgrestError } from '@supabase/supabase-js';
import { ConflictError, createError } from '../errors/appErrors';
import { logger } from '../utils/logger';

const UNIQUE_VIOLATION = '23505';

/**
 * Turns a PostgREST error into an AppError, logging the database detail
 * that the client never sees.
 */
export function databaseError(error: PostgrestError | null, message: string, conflictMessage?: string): Error {
  if (error?.code === UNIQUE_VIOLATION && conflictMessage) {
    return new ConflictError(conflictMessage);
  }
  logger.error(message, { code: error?.code, detail: error?.message });
  return createError(message, 500);
}

/** Strips characters with a meaning in PostgREST filter strings. */
export function sanitizeSearch(term: string): string {
  return term.replace(/[%,()*\\]/g, ' ').trim();
}
