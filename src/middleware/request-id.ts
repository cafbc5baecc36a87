import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

/**
 * Echoes the caller's X-Request-Id, or assigns a fresh UUID, on every response.
 * The request logger reads it back from the response headers.
 */
export const requestId = () =>
  createMiddleware(async (c, next) => {
    const id = c.req.header('x-request-id') ?? randomUUID();
    c.header('X-Request-Id', id);
    await next();
  });
