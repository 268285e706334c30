/**
 * Result values for operations whose failures are expected outcomes
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run `fn` and capture a thrown value as a failed result
 * @param fn - Computation to run
 * @param wrap - Converts the thrown value into the error type
 */
export function attempt<T, E>(fn: () => T, wrap: (cause: unknown) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (cause) {
    return err(wrap(cause));
  }
}
