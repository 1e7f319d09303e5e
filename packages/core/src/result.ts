/**
 * Result type shared by every codegraph package.
 * Failures that a caller is expected to handle travel as values;
 * only fatal conditions (a broken graph sink) are thrown.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Normalize anything caught into an Error.
 */
export function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}

/**
 * Run a throwing function and capture its outcome.
 * The optional mapper turns the caught Error into a domain error.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error>;
export function tryCatch<T, E>(fn: () => T, mapError: (error: Error) => E): Result<T, E>;
export function tryCatch<T, E>(
  fn: () => T,
  mapError?: (error: Error) => E
): Result<T, E | Error> {
  try {
    return Ok(fn());
  } catch (e) {
    const error = toError(e);
    return Err(mapError ? mapError(error) : error);
  }
}
