/**
 * Per-invocation tracker for reports raised while a generator runs.
 *
 * Wraps a recovery function and exposes `sink`, a ReportHandler that hands
 * each report to the recovery function and remembers what it returned.
 * A record lives for exactly one Interceptor call.
 *
 * @module CaptureRecord
 */

import {
  CapturedFailure,
  ErrorReport,
  RecoveryFunction,
  ReportContext,
  Severity,
  SourceLocation,
} from '../types/report';

export class CaptureRecord<R> {
  private captured: { value: R; report: ErrorReport } | undefined = undefined;
  private count = 0;

  /**
   * Errors thrown by the recovery function, so that callers can tell them
   * apart from errors thrown by the generator.
   */
  private readonly recoveryErrors = new Set<unknown>();

  constructor(private readonly recovery: RecoveryFunction<R>) {}

  /**
   * Handler entry point. Every report replaces the previously captured
   * value, so the last report wins.
   */
  readonly sink = (
    severity: Severity,
    message: string,
    location?: SourceLocation,
    context: ReportContext = {}
  ): true => {
    this.capture(severity, message, location, context);
    return true;
  };

  /**
   * Run the recovery function for one report and record the outcome.
   * An error thrown by the recovery function leaves the record untouched
   * and is rethrown.
   */
  capture(
    severity: Severity,
    message: string,
    location?: SourceLocation,
    context: ReportContext = {}
  ): CapturedFailure<R> {
    let value: R;
    try {
      value = this.recovery(severity, message, location, context);
    } catch (error) {
      this.recoveryErrors.add(error);
      throw error;
    }

    const report: ErrorReport = { severity, message, location, context };
    this.captured = { value, report };
    this.count += 1;

    return { recovered: value, report, count: this.count };
  }

  isInvoked(): boolean {
    return this.captured !== undefined;
  }

  /**
   * Value returned by the recovery function for the last report, or
   * undefined if the sink never ran.
   */
  getCapturedValue(): R | undefined {
    return this.captured?.value;
  }

  getLastReport(): ErrorReport | undefined {
    return this.captured?.report;
  }

  getInvocationCount(): number {
    return this.count;
  }

  /**
   * Outcome of the invocation so far, or undefined while nothing has been
   * captured.
   */
  toFailure(): CapturedFailure<R> | undefined {
    if (this.captured === undefined) {
      return undefined;
    }
    return {
      recovered: this.captured.value,
      report: this.captured.report,
      count: this.count,
    };
  }

  isRecoveryError(error: unknown): boolean {
    return this.recoveryErrors.has(error);
  }
}
