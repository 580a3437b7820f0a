/**
 * Outcome types for intercepted calls.
 *
 * @module result
 */

/** The generator returned without reporting anything. */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * At least one report reached the capture sink, or a thrown error was
 * routed to recovery. `error` is usually a CapturedFailure.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * What Interceptor.attempt() hands back instead of a bare value, so callers
 * can tell a recovered result from a clean one. Narrow it on `ok`.
 *
 * @example
 * ```typescript
 * const outcome = new Interceptor(unserialize, () => null).attempt(['[1,2']);
 * if (!outcome.ok) {
 *   console.warn(`${outcome.error.count} report(s), last: ${outcome.error.report.message}`);
 * }
 * ```
 */
export type Result<T, E> = Ok<T> | Err<E>;
