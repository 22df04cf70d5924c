import { joinErrors } from './util';
class InvalidArgumentError extends Error {
  name = 'InvalidArgumentError';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
class UnsubscriptionError extends Error {
  name = 'UnsubscriptionError';
  errors: unknown[];
  constructor(errors: unknown[], options?: ErrorOptions) {
    const flattenedErrors = flattenUnsubscriptionErrors(errors);
    super(
      `Failed to unsubscribe. ${flattenedErrors.length} error${flattenedErrors.length === 1 ? ' was' : 's were'} caught.${joinErrors(flattenedErrors)}`,
      { cause: options?.cause !== undefined ? { errors, originalCause: options.cause } : { errors } },
    );
    this.errors = flattenedErrors;
  }
}
function flattenUnsubscriptionErrors(errors: unknown[]): unknown[] {
  const flattened: unknown[] = [];
  for (let i = 0; i < errors.length; i++) {
    const error = errors[i];
    if (error instanceof UnsubscriptionError) {
      flattened.push(...error.errors);
    } else {
      flattened.push(error);
    }
  }
  return flattened;
}
class TaskFailureError extends Error {
  name = 'TaskFailureError';
  constructor(public errors: unknown[], options?: ErrorOptions) {
    super(`${errors.length} scheduled task${errors.length === 1 ? '' : 's'} failed while resuming.${joinErrors(errors)}`, {
      cause: options?.cause !== undefined ? { errors, originalCause: options.cause } : { errors },
    });
  }
}
class UnreachableCodeError extends Error {
  name = 'UnreachableCodeError';
  constructor(options?: ErrorOptions) {
    super('Unreachable code was executed', options);
  }
}
function assertUnreachable(value: never): never {
  throw new UnreachableCodeError({
    cause: {
      value,
    },
  });
}
function assertArgument(shouldBeTrue: boolean, message: string, value: unknown): asserts shouldBeTrue is true {
  if (!shouldBeTrue) {
    throw new InvalidArgumentError(message, { cause: { value } });
  }
}
function assertNonNegativeInteger(value: number, name: string): void {
  assertArgument(Number.isInteger(value) && value >= 0, `Expected ${name} to be a non-negative integer.`, value);
}
function assertPositiveInteger(value: number, name: string): void {
  assertArgument(Number.isInteger(value) && value > 0, `Expected ${name} to be a positive integer.`, value);
}
function assertFunction(value: unknown, name: string): void {
  assertArgument(typeof value === 'function', `Expected ${name} to be a function.`, value);
}
export {
  InvalidArgumentError,
  UnsubscriptionError,
  TaskFailureError,
  UnreachableCodeError,
  assertUnreachable,
  assertArgument,
  assertNonNegativeInteger,
  assertPositiveInteger,
  assertFunction,
};
