/**
 * Process-wide error reporter.
 *
 * Library code reports non-fatal problems here instead of throwing. Callers
 * decide what happens to them by installing a handler; with no handler the
 * report is displayed on the console and, for fatal severities, escalated
 * to an UnhandledReportError.
 *
 * Handlers form a stack. setErrorHandler() pushes, restoreErrorHandler()
 * pops, and withErrorHandler() puts back the stack it started from, so a
 * scope can neither leak handlers installed inside it nor lose handlers
 * popped inside it.
 *
 * @module ErrorReporter
 */

import { InvalidArgumentError, UnhandledReportError } from '../errors';
import {
  ErrorReport,
  ReportDetails,
  ReportHandler,
  Severity,
  UserSeverity,
} from '../types/report';
import { ReporterConfig, ReporterConfigSchema } from './config';

const SEVERITY_LABELS: Record<Severity, string> = {
  [Severity.Error]: 'Error',
  [Severity.Warning]: 'Warning',
  [Severity.Notice]: 'Notice',
  [Severity.UserError]: 'User Error',
  [Severity.UserWarning]: 'User Warning',
  [Severity.UserNotice]: 'User Notice',
  [Severity.Deprecated]: 'Deprecated',
};

const USER_SEVERITIES: ReadonlySet<Severity> = new Set([
  Severity.UserError,
  Severity.UserWarning,
  Severity.UserNotice,
]);

let handlers: ReportHandler[] = [];
let suppressionDepth = 0;
// Handlers below this index are masked: while a handler runs, reports it
// makes reach only handlers installed after it, else default handling.
let floor = 0;
let config: ReporterConfig = ReporterConfigSchema.parse({});

export function severityLabel(severity: Severity): string {
  return SEVERITY_LABELS[severity];
}

export function isFatal(severity: Severity): boolean {
  return severity === Severity.Error || severity === Severity.UserError;
}

/**
 * Install `handler` as the active error handler.
 *
 * @returns The previously active handler, or undefined if there was none
 */
export function setErrorHandler(
  handler: ReportHandler
): ReportHandler | undefined {
  const previous = getErrorHandler();
  handlers.push(handler);
  return previous;
}

/**
 * Reinstate the handler that was active before the last setErrorHandler().
 * Calling it with no handler installed is a no-op.
 */
export function restoreErrorHandler(): true {
  handlers.pop();
  return true;
}

export function getErrorHandler(): ReportHandler | undefined {
  return handlers.length > 0 ? handlers[handlers.length - 1] : undefined;
}

/**
 * Run `fn` with `handler` installed, and put the handler stack back exactly
 * as it was once `fn` returns or throws.
 *
 * @example
 * ```typescript
 * const messages: string[] = [];
 * withErrorHandler((_, message) => { messages.push(message); }, () => {
 *   unserialize('{');
 * });
 * ```
 */
export function withErrorHandler<T>(handler: ReportHandler, fn: () => T): T {
  const saved = handlers.slice();
  handlers.push(handler);
  try {
    return fn();
  } finally {
    handlers = saved;
  }
}

/**
 * Run `fn` with every installed handler masked, as if it ran inside the
 * active handler: its reports reach only handlers it installs itself, else
 * default handling.
 */
export function withHandlersMasked<T>(fn: () => T): T {
  const savedFloor = floor;
  floor = handlers.length;
  try {
    return fn();
  } finally {
    floor = savedFloor;
  }
}

/**
 * Run `fn` with default display turned off. Installed handlers still see
 * every report.
 */
export function suppressed<T>(fn: () => T): T {
  suppressionDepth += 1;
  try {
    return fn();
  } finally {
    suppressionDepth -= 1;
  }
}

export function isSuppressed(): boolean {
  return suppressionDepth > 0;
}

/**
 * Report an error through the active handler.
 *
 * @returns true if a handler took the report, false if it fell through to
 * default handling
 * @throws UnhandledReportError for a fatal severity nobody handled
 */
export function reportError(
  severity: Severity,
  message: string,
  details: ReportDetails = {}
): boolean {
  const report: ErrorReport = {
    severity,
    message,
    location: details.location,
    context: details.context ?? {},
  };

  const index = handlers.length - 1;
  const handler = index >= floor ? handlers[index] : undefined;
  if (handler !== undefined) {
    const outcome = withHandlersMasked(() =>
      handler(severity, message, report.location, report.context)
    );
    if (outcome !== false) {
      return true;
    }
  }

  if (!isSuppressed() && config.display) {
    display(report);
  }

  if (isFatal(severity)) {
    throw new UnhandledReportError(report);
  }

  return false;
}

/**
 * Report an error on behalf of application code.
 *
 * @throws InvalidArgumentError if `severity` is not one of the User* codes
 */
export function triggerError(
  message: string,
  severity: UserSeverity = Severity.UserNotice,
  details: ReportDetails = {}
): boolean {
  if (!USER_SEVERITIES.has(severity)) {
    throw new InvalidArgumentError(
      'severity',
      `Invalid severity ${severity}, must be one of UserError, UserWarning or UserNotice`
    );
  }
  return reportError(severity, message, details);
}

export function formatReport(report: ErrorReport): string {
  const where = report.location
    ? ` in ${report.location.file} on line ${report.location.line}`
    : '';
  return `${config.prefix} ${severityLabel(report.severity)}: ${report.message}${where}`;
}

function display(report: ErrorReport): void {
  if (isFatal(report.severity)) {
    console.error(formatReport(report));
  } else {
    console.warn(formatReport(report));
  }
}

export function configureReporter(
  overrides: Partial<ReporterConfig>
): ReporterConfig {
  const parsed = ReporterConfigSchema.safeParse({ ...config, ...overrides });
  if (!parsed.success) {
    throw InvalidArgumentError.fromZodError('config', parsed.error);
  }
  config = parsed.data;
  return config;
}

export function getReporterConfig(): ReporterConfig {
  return config;
}

/**
 * Drop every installed handler, leave suppressed mode and restore the
 * default configuration.
 */
export function resetReporter(): void {
  handlers = [];
  suppressionDepth = 0;
  floor = 0;
  config = ReporterConfigSchema.parse({});
}
