import { InvalidArgumentError } from '../errors';
import { RecoveryFunction } from '../types/report';
import { Interceptor } from './Interceptor';
import { assertGenerator, assertRecovery } from './validation';

/**
 * Call `generator` with any arguments in between, falling back to the last
 * argument, a recovery function, if the generator reports an error.
 *
 * @throws InvalidArgumentError if fewer than two arguments are given or
 * either end is not callable
 *
 * @example
 * ```typescript
 * maybe(unserialize, '{"port":8080}', () => ({})); // { port: 8080 }
 * maybe(unserialize, 'port=8080', () => ({})); // {}
 *
 * maybe(
 *   () => unserialize(text),
 *   (severity, message) => {
 *     console.warn(`config ignored: ${message}`);
 *     return defaults;
 *   }
 * );
 * ```
 */
export function maybe<A extends unknown[], T, R>(
  generator: (...args: A) => T,
  ...rest: [...A, RecoveryFunction<R>]
): T | R;
export function maybe(generator: unknown, ...rest: unknown[]): unknown {
  if (rest.length === 0) {
    throw new InvalidArgumentError(
      'recovery',
      'Both a generator and a recovery function need to be specified'
    );
  }

  const args = rest.slice(0, -1);
  const recovery = rest[rest.length - 1];

  assertGenerator(generator);
  assertRecovery(recovery);

  return new Interceptor(generator, recovery).invoke(args);
}
