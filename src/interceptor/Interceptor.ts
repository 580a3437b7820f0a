/**
 * Interceptor: call a generator with error reports redirected to a recovery
 * function.
 *
 * For the duration of one call the interceptor installs a fresh
 * CaptureRecord as the active error handler and turns default display off.
 * If the generator reports anything, the recovery function's value replaces
 * the generator's return value.
 *
 * @module Interceptor
 */

import { ZodError } from 'zod';
import { InvalidArgumentError } from '../errors';
import {
  suppressed,
  withErrorHandler,
  withHandlersMasked,
} from '../reporting/ErrorReporter';
import { Result } from '../types/result';
import {
  CapturedFailure,
  GeneratorFunction,
  RecoveryFunction,
  Severity,
} from '../types/report';
import { Err, Ok, isErr, unwrapOrElse } from '../utils/result';
import { CaptureRecord } from './CaptureRecord';
import { InterceptorOptions, InterceptorOptionsSchema } from './options';
import { withProcessWarnings } from './processWarnings';
import { assertGenerator, assertRecovery } from './validation';

/**
 * Interceptor for a single generator / recovery pair.
 *
 * @example
 * ```typescript
 * const safeParse = new Interceptor(unserialize, () => null);
 *
 * safeParse.invoke(['{"a":1}']); // { a: 1 }
 * safeParse.invoke(['{"a":']); // null, and nothing is printed
 * ```
 */
export class Interceptor<A extends unknown[], T, R> {
  private generator: GeneratorFunction<A, T>;
  private recovery: RecoveryFunction<R>;
  private readonly options: InterceptorOptions;

  /**
   * @throws InvalidArgumentError if either function is not callable or the
   * options are invalid
   */
  constructor(
    generator: GeneratorFunction<A, T>,
    recovery: RecoveryFunction<R>,
    options: Partial<InterceptorOptions> = {}
  ) {
    assertGenerator(generator);
    assertRecovery(recovery);
    this.generator = generator;
    this.recovery = recovery;
    this.options = parseOptions(options);
  }

  getGenerator(): GeneratorFunction<A, T> {
    return this.generator;
  }

  setGenerator(generator: GeneratorFunction<A, T>): this {
    assertGenerator(generator);
    this.generator = generator;
    return this;
  }

  getRecovery(): RecoveryFunction<R> {
    return this.recovery;
  }

  setRecovery(recovery: RecoveryFunction<R>): this {
    assertRecovery(recovery);
    this.recovery = recovery;
    return this;
  }

  getOptions(): InterceptorOptions {
    return this.options;
  }

  /**
   * Call the generator with `args`. A generator without parameters may be
   * invoked with no arguments at all.
   *
   * @returns The recovery function's value for the last report if anything
   * was reported, otherwise the generator's return value
   */
  invoke(this: Interceptor<[], T, R>): T | R;
  invoke(args: A): T | R;
  invoke(args?: A): T | R {
    return unwrapOrElse(this.execute(args), (failure) => failure.recovered);
  }

  /**
   * Call the generator with `args`, keeping track of whether it reported.
   *
   * @returns Ok with the generator's value, or Err with the recovered value,
   * the last report and the number of reports
   */
  attempt(this: Interceptor<[], T, R>): Result<T, CapturedFailure<R>>;
  attempt(args: A): Result<T, CapturedFailure<R>>;
  attempt(args?: A): Result<T, CapturedFailure<R>> {
    return this.execute(args);
  }

  private execute(args: A | undefined): Result<T, CapturedFailure<R>> {
    const record = new CaptureRecord(this.recovery);

    return suppressed(() => {
      const outcome = withErrorHandler(record.sink, () => this.run(args, record));

      if (isErr(outcome)) {
        // Recovery runs as it would from the sink: suppressed, with the
        // handlers outside the call masked.
        const error = outcome.error;
        return Err(
          withHandlersMasked(() =>
            record.capture(Severity.Error, describeThrown(error), undefined, {
              error,
            })
          )
        );
      }

      const failure = record.toFailure();
      return failure ? Err(failure) : outcome;
    });
  }

  /**
   * Err carries a value thrown by the generator when catchThrown is on.
   */
  private run(args: A | undefined, record: CaptureRecord<R>): Result<T, unknown> {
    const call = (): T =>
      args === undefined ? callWithoutArguments(this.generator) : this.generator(...args);
    try {
      return Ok(
        this.options.captureProcessWarnings ? withProcessWarnings(call) : call()
      );
    } catch (error) {
      if (!this.options.catchThrown || record.isRecoveryError(error)) {
        throw error;
      }
      return Err(error);
    }
  }
}

function callWithoutArguments<T>(generator: () => T): T {
  return generator();
}

function parseOptions(options: Partial<InterceptorOptions>): InterceptorOptions {
  try {
    return InterceptorOptionsSchema.parse(options);
  } catch (e) {
    if (e instanceof ZodError) {
      throw InvalidArgumentError.fromZodError('options', e);
    }
    throw e;
  }
}

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
