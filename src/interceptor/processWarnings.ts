import { reportError } from '../reporting/ErrorReporter';
import { Severity } from '../types/report';

/**
 * Run `fn` with process.emitWarning() turned into Severity.Warning reports.
 * Node's 'warning' event is not emitted for these; the original
 * process.emitWarning is put back once `fn` returns or throws.
 */
export function withProcessWarnings<T>(fn: () => T): T {
  const original = process.emitWarning;

  process.emitWarning = (warning: string | Error, ...rest: unknown[]): void => {
    const message = typeof warning === 'string' ? warning : warning.message;
    const { name, code } = describeWarning(warning, rest);
    reportError(Severity.Warning, message, {
      context: code === undefined ? { name } : { name, code },
    });
  };

  try {
    return fn();
  } finally {
    process.emitWarning = original;
  }
}

/**
 * Pull the warning type and code out of the forms emitWarning() accepts:
 * `(warning, type?, code?, ctor?)` and `(warning, { type?, code? })`.
 */
function describeWarning(
  warning: string | Error,
  rest: unknown[]
): { name: string; code?: string } {
  const [second, third] = rest;
  const fallback = typeof warning === 'string' ? 'Warning' : warning.name;

  if (typeof second === 'string') {
    return {
      name: second,
      code: typeof third === 'string' ? third : undefined,
    };
  }

  if (typeof second === 'object' && second !== null) {
    const name =
      'type' in second && typeof second.type === 'string'
        ? second.type
        : fallback;
    const code =
      'code' in second && typeof second.code === 'string'
        ? second.code
        : undefined;
    return { name, code };
  }

  return { name: fallback };
}
