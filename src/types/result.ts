/**
 * Result type for expected failures (bad format tokens, unknown titles,
 * unreadable job documents). Throw only for programmer errors.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Apply `fn` to each item in order, collecting the values. Stops at and
 * returns the first failure.
 */
export function collect<T, U, E>(
  items: Iterable<T>,
  fn: (item: T) => Result<U, E>,
): Result<U[], E> {
  const values: U[] = [];
  for (const item of items) {
    const result = fn(item);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
}
