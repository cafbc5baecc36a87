/**
 * JSON codec for snapshots.
 *
 * JSON has no Infinity or NaN, and an unbounded cap is routine (a dimension
 * capped only from below has max = +Infinity). Non-finite numbers travel as the
 * strings "Infinity", "-Infinity" and "NaN". Decoding validates the full shape
 * with zod, so a corrupt or foreign value in the store reads as a miss instead
 * of leaking a malformed snapshot.
 */
import { z } from 'zod';
import type { Snapshot } from '../types/stats.js';

const NON_FINITE = {
  Infinity: Number.POSITIVE_INFINITY,
  '-Infinity': Number.NEGATIVE_INFINITY,
  NaN: Number.NaN,
} as const;

/** Number as it appears on the wire. */
export type WireNumber = number | keyof typeof NON_FINITE;

export function encodeNumber(value: number): WireNumber {
  if (Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return 'NaN';
  return value > 0 ? 'Infinity' : '-Infinity';
}

const WireNumberSchema = z.union([
  z.number(),
  z.enum(['Infinity', '-Infinity', 'NaN']).transform((s) => NON_FINITE[s]),
]);

const DiagnosticSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('INVALID_CONTRIBUTION'),
    dimension: z.string(),
    source: z.string(),
    reason: z.string(),
  }),
  z.object({
    type: z.literal('UNKNOWN_BUCKET'),
    dimension: z.string(),
    source: z.string(),
    bucket: z.string(),
  }),
  z.object({
    type: z.literal('CAP_CONFLICT'),
    dimension: z.string(),
    message: z.string(),
    unclamped: z.literal(true),
  }),
  z.object({ type: z.literal('SUBSYSTEM_FAILURE'), systemId: z.string(), message: z.string() }),
  z.object({ type: z.literal('SUBSYSTEM_TIMEOUT'), systemId: z.string(), timeoutMs: z.number() }),
  z.object({ type: z.literal('CACHE_UNAVAILABLE'), message: z.string() }),
]);

const SnapshotSchema = z.object({
  actorId: z.string(),
  version: z.number(),
  primary: z.record(WireNumberSchema),
  derived: z.record(WireNumberSchema),
  capsUsed: z.record(z.object({ min: WireNumberSchema, max: WireNumberSchema })),
  subsystemsProcessed: z.array(z.string()),
  diagnostics: z.array(DiagnosticSchema),
  processingTimeMs: z.number().optional(),
  createdAt: z.string(),
});

/** JSON-safe form of a snapshot. */
export interface WireSnapshot {
  actorId: string;
  version: number;
  primary: Record<string, WireNumber>;
  derived: Record<string, WireNumber>;
  capsUsed: Record<string, { min: WireNumber; max: WireNumber }>;
  subsystemsProcessed: string[];
  diagnostics: Snapshot['diagnostics'];
  processingTimeMs?: number;
  createdAt: string;
}

function encodeValues(values: Readonly<Record<string, number>>): Record<string, WireNumber> {
  return Object.fromEntries(Object.entries(values).map(([k, v]) => [k, encodeNumber(v)]));
}

export function toWireSnapshot(snapshot: Snapshot): WireSnapshot {
  return {
    actorId: snapshot.actorId,
    version: snapshot.version,
    primary: encodeValues(snapshot.primary),
    derived: encodeValues(snapshot.derived),
    capsUsed: Object.fromEntries(
      Object.entries(snapshot.capsUsed).map(([dimension, caps]) => [
        dimension,
        { min: encodeNumber(caps.min), max: encodeNumber(caps.max) },
      ]),
    ),
    subsystemsProcessed: [...snapshot.subsystemsProcessed],
    diagnostics: snapshot.diagnostics,
    ...(snapshot.processingTimeMs !== undefined ? { processingTimeMs: snapshot.processingTimeMs } : {}),
    createdAt: snapshot.createdAt,
  };
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(toWireSnapshot(snapshot));
}

/**
 * Parse a stored snapshot. Null when the text is not JSON or does not have
 * the snapshot shape.
 */
export function deserializeSnapshot(raw: string): Snapshot | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = SnapshotSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
