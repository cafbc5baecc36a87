/**
 * StatEngineError: structured error hierarchy for the stat aggregation engine.
 *
 * Extends native Error so `.stack` survives into logs, while carrying a
 * machine-readable `kind` and a structured `body` for callers and the HTTP
 * surface. Catch handlers match with `instanceof` or the static guard.
 *
 * Kinds:
 * - validation: malformed contribution, caps or configuration
 * - processing: bucket fold or cap merge failure (Strict cap conflict,
 *   every subsystem failed)
 * - registry: duplicate or unknown subsystem id
 * - cache: snapshot store unavailable (callers degrade to direct compute)
 */
import type { ErrorResponse } from './types.js';

export type StatEngineErrorKind = 'validation' | 'processing' | 'registry' | 'cache';

/**
 * Error body: the base ErrorResponse plus any diagnostic fields the thrower
 * attaches (dimension, systemId, violations, ...).
 */
export type StatEngineErrorBody = ErrorResponse & Record<string, unknown>;

export class StatEngineError extends Error {
  readonly kind: StatEngineErrorKind;
  readonly body: StatEngineErrorBody;

  constructor(kind: StatEngineErrorKind, body: StatEngineErrorBody, options?: { cause?: unknown }) {
    super(body.message, options);
    this.name = 'StatEngineError';
    this.kind = kind;
    this.body = body;

    // Keep instanceof working for subclasses of a built-in
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name}(${this.kind}): ${this.body.error}: ${this.body.message}`;
  }

  static isStatEngineError(err: unknown): err is StatEngineError {
    return err instanceof StatEngineError;
  }
}

export class ValidationError extends StatEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('validation', { error: 'validation_error', message, ...details });
    this.name = 'ValidationError';
  }
}

export class ProcessingError extends StatEngineError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('processing', { error: 'processing_error', message, ...details }, options);
    this.name = 'ProcessingError';
  }
}

export class RegistryError extends StatEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('registry', { error: 'registry_error', message, ...details });
    this.name = 'RegistryError';
  }
}

export class CacheError extends StatEngineError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('cache', { error: 'cache_error', message, ...details }, options);
    this.name = 'CacheError';
  }
}

/**
 * HTTP status per error kind, used by the route error handler.
 *
 * - validation → 400: caller sent something malformed
 * - registry   → 409: conflicts with the current registry state
 * - processing → 422: input was well-formed but could not be resolved
 * - cache      → 503: backing store unavailable
 */
export type ErrorStatus = 400 | 409 | 422 | 503;

export const ERROR_STATUS_MAP: Readonly<Record<StatEngineErrorKind, ErrorStatus>> = {
  validation: 400,
  registry: 409,
  processing: 422,
  cache: 503,
} as const;

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
