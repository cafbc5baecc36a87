/**
 * Span Sanitizer: allowlisted OpenTelemetry spans.
 *
 * Each span name has an attribute allowlist; anything else is stripped.
 * Actor ids never reach a span in clear: `actor_id` is replaced by
 * `actor_hash` (SHA-256 truncated to 12 chars).
 *
 * No SDK is started here. Without a registered tracer provider the API
 * hands out no-op spans, so hosts opt in by installing their own.
 */
import { createHash } from 'node:crypto';
import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'stat-aggregation-engine';

let _tracer: ReturnType<typeof trace.getTracer> | null = null;
function getTracer() {
  if (!_tracer) _tracer = trace.getTracer(TRACER_NAME);
  return _tracer;
}

export type SpanAttributeValue = string | number | boolean;

export function hashForSpan(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

const SPAN_ALLOWLISTS: Record<string, ReadonlySet<string>> = {
  'stats.request': new Set(['method', 'url', 'status_code', 'duration_ms']),
  'stats.resolve': new Set([
    'actor_hash',
    'actor_version',
    'subsystem_count',
    'cache_outcome',
    'dimension_count',
    'diagnostic_count',
    'duration_ms',
  ]),
  'stats.subsystem.contribute': new Set([
    'actor_hash',
    'system_id',
    'priority',
    'outcome',
    'contribution_count',
    'duration_ms',
  ]),
};

/** Raw attribute → hashed attribute. */
const HASH_FIELDS: Record<string, string> = {
  actor_id: 'actor_hash',
};

/**
 * Keep only allowlisted attributes with span-compatible values, hashing
 * identity fields. Unknown span names yield an empty object.
 */
export function sanitizeAttributes(
  spanName: string,
  attrs: Record<string, unknown>,
): Record<string, SpanAttributeValue> {
  const allowlist = SPAN_ALLOWLISTS[spanName];
  if (!allowlist) return {};

  const sanitized: Record<string, SpanAttributeValue> = {};

  for (const [key, value] of Object.entries(attrs)) {
    const hashTarget = HASH_FIELDS[key];
    if (hashTarget && allowlist.has(hashTarget)) {
      if (typeof value === 'string') sanitized[hashTarget] = hashForSpan(value);
      continue;
    }

    if (!allowlist.has(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/** For attributes only known after the span starts. */
export function addSanitizedAttributes(
  span: Span,
  spanName: string,
  attrs: Record<string, unknown>,
): void {
  span.setAttributes(sanitizeAttributes(spanName, attrs));
}

/**
 * Run `fn` inside an active span whose attributes pass the allowlist.
 * The span ends when `fn` settles; a rejection marks it ERROR and is rethrown.
 */
export async function startSanitizedSpan<T>(
  spanName: string,
  attrs: Record<string, unknown>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeAttributes(spanName, attrs);

  return tracer.startActiveSpan(spanName, async (span) => {
    span.setAttributes(sanitized);
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(err instanceof Error ? err : new Error(message));
      throw err;
    } finally {
      span.end();
    }
  });
}
