/**
 * Result type for operations that fail in expected ways, without throwing.
 * Resolution and manifest selection return it; the host decides whether to throw.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Deployment target a system set is selected for, e.g. "client" or "server".
 */
export type Target = string;

/** Normalize anything thrown into an `Error`. */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
