import { createMiddleware } from 'hono/factory';
import { propagation, context } from '@opentelemetry/api';
import { startSanitizedSpan, addSanitizedAttributes } from '../utils/span-sanitizer.js';

/**
 * Request tracing: W3C traceparent propagation plus a `stats.request` span.
 *
 * An incoming traceparent/tracestate becomes the parent context, so resolve
 * and subsystem spans created by the handler join the caller's trace. The
 * response carries the span's own traceparent.
 */
export function createTracing() {
  return createMiddleware(async (c, next) => {
    const start = Date.now();

    const carrier: Record<string, string> = {};
    const incoming = c.req.header('traceparent');
    if (incoming) carrier['traceparent'] = incoming;
    const tracestate = c.req.header('tracestate');
    if (tracestate) carrier['tracestate'] = tracestate;
    const parentCtx = propagation.extract(context.active(), carrier);

    await context.with(parentCtx, () =>
      startSanitizedSpan(
        'stats.request',
        { method: c.req.method, url: c.req.path },
        async (span) => {
          const ctx = span.spanContext();
          const flags = ctx.traceFlags.toString(16).padStart(2, '0');
          c.header('traceparent', `00-${ctx.traceId}-${ctx.spanId}-${flags}`);

          await next();

          addSanitizedAttributes(span, 'stats.request', {
            status_code: c.res.status,
            duration_ms: Date.now() - start,
          });
        },
      ),
    );
  });
}
