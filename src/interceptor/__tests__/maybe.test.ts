import { maybe } from '../maybe';
import { InvalidArgumentError } from '../../errors';
import {
  getErrorHandler,
  reportError,
  resetReporter,
} from '../../reporting/ErrorReporter';
import { Severity } from '../../types/report';
import { unserialize } from '../../codec/serializer';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('maybe', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    resetReporter();
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the decoded value of valid input', () => {
    const recovery = jest.fn(() => {
      throw new Error('recovery should not run');
    });

    expect(maybe(unserialize, '"foo"', recovery)).toBe('foo');
    expect(recovery).not.toHaveBeenCalled();
  });

  it('should return the recovery value for malformed input', () => {
    expect(maybe(unserialize, 'foo', () => 123)).toBe(123);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should hand the severity and message to the recovery function', () => {
    let seen: [Severity, string] | undefined;

    const result = maybe(unserialize, 'foo', (severity, message) => {
      seen = [severity, message];
      return 123;
    });

    expect(result).toBe(123);
    expect(seen).toEqual([Severity.Notice, 'unserialize(): Malformed input of 3 bytes']);
  });

  it('should work with a closure and no arguments', () => {
    const serialized = '"foo"';

    const result = maybe(
      () => unserialize(serialized),
      () => {
        throw new Error('recovery should not run');
      }
    );

    expect(result).toBe('foo');
  });

  it('should return the recovery value for a failing closure', () => {
    const serialized = 'bar';

    const result = maybe(
      () => unserialize(serialized),
      () => 'foo'
    );

    expect(result).toBe('foo');
  });

  it('should pass the arguments between generator and recovery', () => {
    const result = maybe(
      (a: number, b: number, c: number) => a * b + c,
      2,
      3,
      4,
      () => 0
    );

    expect(result).toBe(10);
  });

  it('should leave the error handler register untouched', () => {
    maybe(unserialize, 'foo', () => 123);
    maybe(unserialize, '"foo"', () => 123);

    expect(getErrorHandler()).toBeUndefined();
  });

  it('should propagate recovery errors', () => {
    expect(() =>
      maybe(
        () => reportError(Severity.UserWarning, 'careful'),
        () => {
          throw new RangeError('recovery failed');
        }
      )
    ).toThrow(RangeError);
    expect(getErrorHandler()).toBeUndefined();
  });

  it('should reject a generator that is not callable', () => {
    const thrown = thrownBy(() =>
      Reflect.apply(maybe, undefined, ['foo', () => false])
    );

    expect(thrown).toBeInstanceOf(InvalidArgumentError);
    expect(thrown).toMatchObject({ parameter: 'generator' });
  });

  it('should reject a recovery function that is not callable', () => {
    const thrown = thrownBy(() =>
      Reflect.apply(maybe, undefined, [() => 'foo', 'foo'])
    );

    expect(thrown).toBeInstanceOf(InvalidArgumentError);
    expect(thrown).toMatchObject({
      parameter: 'recovery',
      message: 'Invalid recovery function given, needs to be callable',
    });
  });

  it('should reject a call without a recovery function', () => {
    const thrown = thrownBy(() => Reflect.apply(maybe, undefined, [() => 'foo']));

    expect(thrown).toBeInstanceOf(InvalidArgumentError);
    expect(thrown).toMatchObject({
      parameter: 'recovery',
      message: 'Both a generator and a recovery function need to be specified',
    });
  });

  it('should treat an explicit undefined recovery as not callable', () => {
    const thrown = thrownBy(() =>
      Reflect.apply(maybe, undefined, [() => 'foo', undefined])
    );

    expect(thrown).toBeInstanceOf(InvalidArgumentError);
    expect(thrown).toMatchObject({
      parameter: 'recovery',
      message: 'Invalid recovery function given, needs to be callable',
    });
  });
});
