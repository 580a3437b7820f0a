import { ZodError } from 'zod';
import { ErrorReport } from '../types/report';

/**
 * Thrown synchronously when an operation is handed an unusable argument.
 * Never routed through the error reporter.
 */
export class InvalidArgumentError extends Error {
  public readonly code = 'INVALID_ARGUMENT';

  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }

  /**
   * Convert a failed schema parse of `parameter` into an InvalidArgumentError.
   */
  static fromZodError(parameter: string, error: ZodError): InvalidArgumentError {
    const message = error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    return new InvalidArgumentError(parameter, message);
  }
}

/**
 * Thrown by reportError() when a fatal report is not handled.
 */
export class UnhandledReportError extends Error {
  public readonly code = 'UNHANDLED_REPORT';

  constructor(public readonly report: ErrorReport) {
    super(report.message);
    this.name = 'UnhandledReportError';
  }
}
