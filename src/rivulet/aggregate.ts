import { assertFunction } from './errors';
import { isSome } from './maybe';
import { Observable, Operator, operate } from './observable';
import { reduce } from './transform';
import { runGuarded } from './util';
function count<T>(predicate?: (value: T, index: number) => boolean): Operator<T, number> {
  if (predicate !== undefined) {
    assertFunction(predicate, 'predicate');
  }
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      let total = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (!predicate) {
              total++;
              return;
            }
            const matches = runGuarded(subscriber, predicate, value, index++);
            if (isSome(matches) && matches.$m_value) {
              total++;
            }
          },
          onCompleted() {
            subscriber.onNext(total);
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function sum(): Operator<number, number> {
  return reduce((total: number, value: number) => total + value, 0);
}
function average(): Operator<number, number> {
  return (source) =>
    Observable((subscriber) => {
      let total = 0;
      let n = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: number) {
            total += value;
            n++;
          },
          onCompleted() {
            if (n > 0) {
              subscriber.onNext(total / n);
            }
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function min(): Operator<number, number> {
  return reduce((smallest: number, value: number) => Math.min(smallest, value));
}
function max(): Operator<number, number> {
  return reduce((largest: number, value: number) => Math.max(largest, value));
}
// Emits false and completes at the first value failing the predicate.
function all<T>(predicate?: (value: T, index: number) => boolean): Operator<T, boolean> {
  if (predicate !== undefined) {
    assertFunction(predicate, 'predicate');
  }
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (!predicate) {
              if (!value) {
                subscriber.onNext(false);
                subscriber.onCompleted();
              }
              return;
            }
            const passes = runGuarded(subscriber, predicate, value, index++);
            if (isSome(passes) && !passes.$m_value) {
              subscriber.onNext(false);
              subscriber.onCompleted();
            }
          },
          onCompleted() {
            subscriber.onNext(true);
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function contains<T>(needle: T): Operator<T, boolean> {
  return (source) =>
    Observable((subscriber) => {
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (value === needle) {
              subscriber.onNext(true);
              subscriber.onCompleted();
            }
          },
          onCompleted() {
            subscriber.onNext(false);
            subscriber.onCompleted();
          },
        }),
      );
    });
}
export { count, sum, average, min, max, all, contains };
