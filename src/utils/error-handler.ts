import type { Context } from 'hono';
import { ERROR_STATUS_MAP, StatEngineError } from '../errors.js';

/**
 * Shared route error handler: StatEngineError → JSON body with the status
 * of its kind; anything else → 500 with a generic message.
 */
export function handleRouteError(
  c: Context,
  err: unknown,
  fallbackMessage = 'Internal server error',
): Response {
  if (StatEngineError.isStatEngineError(err)) {
    return c.json(err.body, ERROR_STATUS_MAP[err.kind]);
  }
  return c.json({ error: 'internal_error', message: fallbackMessage }, 500);
}
