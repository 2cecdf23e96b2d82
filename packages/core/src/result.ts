/**
 * Supervisor operations never throw across the API boundary; they return one
 * of these instead.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Run `fn` on a success value. Errors from either side are unioned.
 */
export function andThen<T, U, E, F>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.ok ? fn(result.value) : result;
}

/** Normalize whatever was thrown. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
