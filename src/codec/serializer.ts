/**
 * JSON value codec that reports failures through the error reporter.
 *
 * Both functions return `false` instead of throwing, which makes them
 * natural generators for maybe():
 *
 * ```typescript
 * maybe(unserialize, cached, () => fetchFresh());
 * ```
 *
 * @module serializer
 */

import { reportError } from '../reporting/ErrorReporter';
import { Severity } from '../types/report';

/**
 * Serialize `value` to JSON text.
 *
 * @returns The JSON text, or false (after a Severity.Warning report) for
 * values JSON cannot hold
 */
export function serialize(value: unknown): string | false {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    // BigInt values and cyclic structures
    const reason = error instanceof Error ? error.message : String(error);
    reportError(Severity.Warning, `serialize(): ${reason}`);
    return false;
  }

  if (text === undefined) {
    reportError(
      Severity.Warning,
      `serialize(): Unable to serialize a value of type ${typeof value}`
    );
    return false;
  }

  return text;
}

/**
 * Parse JSON text produced by serialize().
 *
 * @returns The decoded value, or false (after a Severity.Notice report) for
 * malformed input
 */
export function unserialize(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    reportError(
      Severity.Notice,
      `unserialize(): Malformed input of ${Buffer.byteLength(text, 'utf8')} bytes`
    );
    return false;
  }
}
