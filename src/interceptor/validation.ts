import { InvalidArgumentError } from '../errors';
import { Callable } from '../types/report';

export function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

// Untyped callers can hand in anything, so both ends are checked at run time.
export function assertGenerator(generator: unknown): asserts generator is Callable {
  if (!isCallable(generator)) {
    throw new InvalidArgumentError(
      'generator',
      'Invalid generator given, needs to be callable'
    );
  }
}

export function assertRecovery(recovery: unknown): asserts recovery is Callable {
  if (!isCallable(recovery)) {
    throw new InvalidArgumentError(
      'recovery',
      'Invalid recovery function given, needs to be callable'
    );
  }
}
