import { Maybe, None, Some } from './maybe';
import type { ObserverLike } from './observer';
function joinErrors(errors: unknown[]): string {
  const lastPrefixLength = `  [#${errors.length}] `.length;
  const multilineErrorPrefix = '\n' + Array(lastPrefixLength + 1).join(' ');
  return errors
    .map((error, index) => {
      const prefix_ = `  [#${index + 1}] `;
      const prefix = '\n' + Array(lastPrefixLength - prefix_.length + 1).join(' ') + prefix_;
      const displayedError = String((error instanceof Error && error.stack) || error);
      return prefix + displayedError.split(/\r\n|\r|\n/).join(multilineErrorPrefix);
    })
    .join('');
}
function removeOnce<T>(array: T[], item: T): boolean {
  const index = array.indexOf(item);
  if (index === -1) {
    return false;
  }
  array.splice(index, 1);
  return true;
}
function noop(): void {}
function identity<T>(value: T): T {
  return value;
}
function constant<T>(value: T): () => T {
  return () => value;
}
function isEqual(a: unknown, b: unknown): boolean {
  return a === b;
}
function isTruthy(value: unknown): boolean {
  return !!value;
}
// Trailing undefined values are significant, so the count is kept apart from
// the values themselves.
interface Packed<T extends unknown[]> {
  readonly n: number;
  readonly values: T;
}
function pack<T extends unknown[]>(...values: T): Packed<T> {
  return { n: values.length, values };
}
function unpack<T extends unknown[]>(packed: Packed<T>): T {
  return packed.values;
}
function runGuarded<A extends unknown[], R>(observer: ObserverLike<never>, fn: (...args: A) => R, ...args: A): Maybe<R> {
  let result: R;
  try {
    result = fn(...args);
  } catch (error) {
    observer.onError(error);
    return None;
  }
  return Some(result);
}
function pipe<T>(value: T): T;
function pipe<T, R>(value: T, f1: (value: T) => R): R;
function pipe<T, A, R>(value: T, f1: (value: T) => A, f2: (value: A) => R): R;
function pipe<T, A, B, R>(value: T, f1: (value: T) => A, f2: (value: A) => B, f3: (value: B) => R): R;
function pipe<T, A, B, C, R>(value: T, f1: (value: T) => A, f2: (value: A) => B, f3: (value: B) => C, f4: (value: C) => R): R;
function pipe<T, A, B, C, D, R>(value: T, f1: (value: T) => A, f2: (value: A) => B, f3: (value: B) => C, f4: (value: C) => D, f5: (value: D) => R): R;
function pipe<T, A, B, C, D, E, R>(
  value: T,
  f1: (value: T) => A,
  f2: (value: A) => B,
  f3: (value: B) => C,
  f4: (value: C) => D,
  f5: (value: D) => E,
  f6: (value: E) => R,
): R;
function pipe<T, A, B, C, D, E, F, R>(
  value: T,
  f1: (value: T) => A,
  f2: (value: A) => B,
  f3: (value: B) => C,
  f4: (value: C) => D,
  f5: (value: D) => E,
  f6: (value: E) => F,
  f7: (value: F) => R,
): R;
function pipe<T, A, B, C, D, E, F, G, R>(
  value: T,
  f1: (value: T) => A,
  f2: (value: A) => B,
  f3: (value: B) => C,
  f4: (value: C) => D,
  f5: (value: D) => E,
  f6: (value: E) => F,
  f7: (value: F) => G,
  f8: (value: G) => R,
): R;
function pipe(value: unknown, ...fns: ((value: unknown) => unknown)[]): unknown {
  return fns.reduce((acc, fn) => fn(acc), value);
}
export { joinErrors, removeOnce, noop, identity, constant, isEqual, isTruthy, type Packed, pack, unpack, runGuarded, pipe };
