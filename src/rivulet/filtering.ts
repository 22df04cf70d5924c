import { assertFunction, assertNonNegativeInteger } from './errors';
import { Maybe, None, Some, isSome } from './maybe';
import { IdentityOperator, Observable, Operator, empty, operate } from './observable';
import { Subscription } from './subscription';
import { isEqual, isTruthy, runGuarded } from './util';
function filter<T, S extends T>(predicate: (value: T, index: number) => value is S): Operator<T, S>;
function filter<T>(predicate: (value: T, index: number) => boolean): Operator<T, T>;
function filter<T>(predicate: (value: T, index: number) => boolean): Operator<T, T> {
  assertFunction(predicate, 'predicate');
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const passThrough = runGuarded(subscriber, predicate, value, index++);
            if (isSome(passThrough) && passThrough.$m_value) {
              subscriber.onNext(value);
            }
          },
        }),
      );
    });
}
function reject<T>(predicate: (value: T, index: number) => boolean): Operator<T, T> {
  assertFunction(predicate, 'predicate');
  return filter((value: T, index: number) => !predicate(value, index));
}
function compact(): IdentityOperator {
  return <T>(source: Observable<T>) => filter<T>(isTruthy)(source);
}
function distinct(): IdentityOperator {
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      const seen = new Set<T>();
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (seen.has(value)) {
              return;
            }
            seen.add(value);
            subscriber.onNext(value);
          },
        }),
      );
    });
}
function distinctUntilChanged(): IdentityOperator;
function distinctUntilChanged<T>(comparator: (previous: T, current: T) => boolean): Operator<T, T>;
function distinctUntilChanged<T>(comparator: (previous: T, current: T) => boolean = isEqual): Operator<T, T> {
  assertFunction(comparator, 'comparator');
  return (source) =>
    Observable((subscriber) => {
      let previous: Maybe<T> = None;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const last = previous;
            if (isSome(last)) {
              const isSame = runGuarded(subscriber, comparator, last.$m_value, value);
              if (!isSome(isSame) || isSame.$m_value) {
                return;
              }
            }
            previous = Some(value);
            subscriber.onNext(value);
          },
        }),
      );
    });
}
function find<T, S extends T>(predicate: (value: T, index: number) => value is S): Operator<T, S>;
function find<T>(predicate: (value: T, index: number) => boolean): Operator<T, T>;
function find<T>(predicate: (value: T, index: number) => boolean): Operator<T, T> {
  assertFunction(predicate, 'predicate');
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const found = runGuarded(subscriber, predicate, value, index++);
            if (isSome(found) && found.$m_value) {
              subscriber.onNext(value);
              subscriber.onCompleted();
            }
          },
        }),
      );
    });
}
function first(): IdentityOperator {
  return take(1);
}
function last(): IdentityOperator {
  return takeLast(1);
}
function elementAt(index: number): IdentityOperator {
  assertNonNegativeInteger(index, 'index');
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let i = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (i++ === index) {
              subscriber.onNext(value);
              subscriber.onCompleted();
            }
          },
        }),
      );
    });
}
function takeWhile<T>(predicate: (value: T, index: number) => boolean): Operator<T, T> {
  assertFunction(predicate, 'predicate');
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const passThrough = runGuarded(subscriber, predicate, value, index++);
            if (!isSome(passThrough)) {
              return;
            }
            if (passThrough.$m_value) {
              subscriber.onNext(value);
            } else {
              subscriber.onCompleted();
            }
          },
        }),
      );
    });
}
function skipWhile<T>(predicate: (value: T, index: number) => boolean): Operator<T, T> {
  assertFunction(predicate, 'predicate');
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      let skipping = true;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (skipping) {
              const skip = runGuarded(subscriber, predicate, value, index++);
              if (!isSome(skip) || skip.$m_value) {
                return;
              }
              skipping = false;
            }
            subscriber.onNext(value);
          },
        }),
      );
    });
}
function take(amount = 1): IdentityOperator {
  assertNonNegativeInteger(amount, 'amount');
  if (amount === 0) {
    return () => empty();
  }
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let count = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            count++;
            subscriber.onNext(value);
            if (count >= amount) {
              subscriber.onCompleted();
            }
          },
        }),
      );
    });
}
function skip(amount = 1): IdentityOperator {
  assertNonNegativeInteger(amount, 'amount');
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let skipped = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (skipped < amount) {
              skipped++;
              return;
            }
            subscriber.onNext(value);
          },
        }),
      );
    });
}
function takeLast(amount: number): IdentityOperator {
  assertNonNegativeInteger(amount, 'amount');
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      const buffer: T[] = [];
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (amount === 0) {
              return;
            }
            if (buffer.length >= amount) {
              buffer.shift();
            }
            buffer.push(value);
          },
          onCompleted() {
            for (let i = 0; i < buffer.length && !subscriber.stopped; i++) {
              subscriber.onNext(buffer[i]);
            }
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function skipLast(amount: number): IdentityOperator {
  assertNonNegativeInteger(amount, 'amount');
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      const buffer: T[] = [];
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            buffer.push(value);
            if (buffer.length > amount) {
              subscriber.onNext(buffer[0]);
              buffer.shift();
            }
          },
        }),
      );
    });
}
// Any event of the notifier completes the stream.
function takeUntil(notifier: Observable<unknown>): IdentityOperator {
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      const complete = (): void => {
        subscriber.onCompleted();
      };
      subscriber.add(notifier.subscribe(operate(subscriber, { onNext: complete, onError: complete, onCompleted: complete })));
      return source.subscribe(subscriber);
    });
}
// Values are dropped until the notifier produces its first event. Terminal
// events of the source always go through.
function skipUntil(notifier: Observable<unknown>): IdentityOperator {
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let triggered = false;
      let notifierSubscription: Subscription | undefined;
      const trigger = (): void => {
        triggered = true;
        notifierSubscription?.unsubscribe();
      };
      notifierSubscription = notifier.subscribe(operate(subscriber, { onNext: trigger, onError: trigger, onCompleted: trigger }));
      if (triggered) {
        notifierSubscription.unsubscribe();
      }
      subscriber.add(notifierSubscription);
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (triggered) {
              subscriber.onNext(value);
            }
          },
        }),
      );
    });
}
export {
  filter,
  reject,
  compact,
  distinct,
  distinctUntilChanged,
  find,
  first,
  last,
  elementAt,
  takeWhile,
  skipWhile,
  take,
  skip,
  takeLast,
  skipLast,
  takeUntil,
  skipUntil,
};
