/**
 * Result type for functional error handling
 *
 * Build steps, loaders and lookups that can fail return a Result instead of
 * throwing.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

/**
 * Collect a list of results, keeping every error instead of the first one.
 */
export const partition = <T, E>(
  results: readonly Result<T, readonly E[]>[]
): Result<T[], E[]> => {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(...result.error);
    }
  }
  return errors.length > 0 ? error(errors) : ok(values);
};
