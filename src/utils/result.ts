/**
 * Helper functions for working with Result<T, E> types.
 *
 * @module result
 */

import { Result, Ok as OkType, Err as ErrType } from '../types/result';

/**
 * Create a successful Result containing a value.
 *
 * @example
 * ```typescript
 * const result = Ok('foo');
 * // result: Ok<string> = { ok: true, value: 'foo' }
 * ```
 */
export function Ok<T>(value: T): OkType<T> {
  return { ok: true, value };
}

/**
 * Create a failed Result containing an error.
 */
export function Err<E>(error: E): ErrType<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is OkType<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrType<E> {
  return result.ok === false;
}

/**
 * Collapse a Result into a plain value, taking the value of an Ok and
 * mapping an Err through `onErr`.
 *
 * @example
 * ```typescript
 * unwrapOrElse(Err({ recovered: 123 }), (failure) => failure.recovered); // 123
 * ```
 */
export function unwrapOrElse<T, E, U>(
  result: Result<T, E>,
  onErr: (error: E) => U
): T | U {
  return isOk(result) ? result.value : onErr(result.error);
}
