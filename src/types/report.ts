/**
 * Report domain types shared by the error reporter and the interceptor.
 *
 * @module report
 */

/**
 * Severity codes for reported errors.
 *
 * The numeric values are bit flags so that they can be combined into masks.
 *
 * @example
 * ```typescript
 * reportError(Severity.Notice, 'unserialize(): Malformed input of 3 bytes');
 * ```
 */
export enum Severity {
  /**
   * Fatal error raised by library code.
   */
  Error = 1,

  /**
   * Non-fatal problem; execution continues.
   */
  Warning = 2,

  /**
   * Something that could indicate an error but may be part of normal operation.
   */
  Notice = 8,

  /**
   * Fatal error raised through triggerError().
   */
  UserError = 256,

  UserWarning = 512,

  UserNotice = 1024,

  /**
   * Use of a feature that will stop working in a future release.
   */
  Deprecated = 8192,
}

/**
 * Severities that may be passed to triggerError().
 */
export type UserSeverity =
  | Severity.UserError
  | Severity.UserWarning
  | Severity.UserNotice;

/**
 * Where a report originated.
 */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
}

/**
 * Free-form data attached to a report.
 */
export type ReportContext = Readonly<Record<string, unknown>>;

/**
 * Optional details accepted by reportError() and triggerError().
 */
export interface ReportDetails {
  readonly location?: SourceLocation;
  readonly context?: ReportContext;
}

/**
 * A single reported error, as seen by handlers and recovery functions.
 */
export interface ErrorReport {
  readonly severity: Severity;
  readonly message: string;

  /**
   * Origin of the report, when the reporting code supplied one.
   */
  readonly location?: SourceLocation;

  /**
   * Extra data; an empty object when the reporting code supplied none.
   */
  readonly context: ReportContext;
}

/**
 * Handler installed with setErrorHandler().
 *
 * Returning `false` passes the event on to default handling (display and,
 * for fatal severities, an UnhandledReportError). Any other return value
 * marks it handled.
 *
 * @example
 * ```typescript
 * const handler: ReportHandler = (severity, message) => {
 *   collected.push(message);
 *   return true;
 * };
 * ```
 */
export type ReportHandler = (
  severity: Severity,
  message: string,
  location: SourceLocation | undefined,
  context: ReportContext
) => boolean | void;

/**
 * Fallback invoked with the details of a report; its return value replaces
 * the generator's.
 */
export type RecoveryFunction<R> = (
  severity: Severity,
  message: string,
  location: SourceLocation | undefined,
  context: ReportContext
) => R;

/**
 * The operation an interceptor attempts.
 */
export type GeneratorFunction<A extends unknown[], T> = (...args: A) => T;

/**
 * Any callable, as far as runtime validation is concerned.
 */
export type Callable = (...args: unknown[]) => unknown;

/**
 * Error side of Interceptor.attempt(): what recovery produced for the last
 * report, the report itself, and how many reports were captured.
 */
export interface CapturedFailure<R> {
  readonly recovered: R;
  readonly report: ErrorReport;
  readonly count: number;
}
