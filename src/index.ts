export { maybe } from './interceptor/maybe';
export { Interceptor } from './interceptor/Interceptor';
export { CaptureRecord } from './interceptor/CaptureRecord';
export { isCallable } from './interceptor/validation';
export type { InterceptorOptions } from './interceptor/options';
export { InterceptorOptionsSchema } from './interceptor/options';

export {
  configureReporter,
  formatReport,
  getErrorHandler,
  getReporterConfig,
  isFatal,
  isSuppressed,
  reportError,
  resetReporter,
  restoreErrorHandler,
  setErrorHandler,
  severityLabel,
  suppressed,
  triggerError,
  withErrorHandler,
  withHandlersMasked,
} from './reporting/ErrorReporter';
export type { ReporterConfig } from './reporting/config';
export { ReporterConfigSchema } from './reporting/config';

export { serialize, unserialize } from './codec/serializer';

export { InvalidArgumentError, UnhandledReportError } from './errors';

export { Severity } from './types/report';
export type {
  Callable,
  CapturedFailure,
  ErrorReport,
  GeneratorFunction,
  RecoveryFunction,
  ReportContext,
  ReportDetails,
  ReportHandler,
  SourceLocation,
  UserSeverity,
} from './types/report';
export type { Result, Ok, Err } from './types/result';
export { Ok as ok, Err as err, isOk, isErr, unwrapOrElse } from './utils/result';
