import type { TriviaError } from "./errors";

/**
 * Outcome of an engine operation. Failures are values, not throws:
 * callers branch on `ok` and read `value` or `error`.
 */
export type Result<T, E = TriviaError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function Err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
