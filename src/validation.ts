/**
 * Request parameter checks for the HTTP surface.
 */

const ACTOR_ID_RE = /^[A-Za-z0-9_.:-]+$/;

/** Longest actor id accepted in a path or body. */
export const ACTOR_ID_MAX_LENGTH = 256;

/**
 * Actor ids in paths: letters, digits and `_ . : -`, at most
 * ACTOR_ID_MAX_LENGTH characters. Rejects `/` so a path cannot escape its route.
 */
export function isValidActorId(value: string): boolean {
  return value.length > 0 && value.length <= ACTOR_ID_MAX_LENGTH && ACTOR_ID_RE.test(value);
}
