import { config } from './config';
import { assertArgument, assertFunction, assertNonNegativeInteger } from './errors';
import { isSome } from './maybe';
import { IdentityOperator, Observable, Operator, isObservable, operate, pushArrayItems } from './observable';
import { Subscription } from './subscription';
import { runGuarded } from './util';
type ErrorHandler<R> = (error: unknown) => Observable<R> | void;
// Without a continuation the stream completes silently. A handler that returns
// no observable lets the error through, and one that throws forwards its own.
function catchError(): IdentityOperator;
function catchError<R>(handlerOrObservable: ErrorHandler<R> | Observable<R>): <T>(source: Observable<T>) => Observable<T | R>;
function catchError<R>(handlerOrObservable?: ErrorHandler<R> | Observable<R>): <T>(source: Observable<T>) => Observable<T | R> {
  assertArgument(
    handlerOrObservable === undefined || typeof handlerOrObservable === 'function' || isObservable(handlerOrObservable),
    'Expected an error handler or an observable.',
    handlerOrObservable,
  );
  return <T>(source: Observable<T>) =>
    Observable<T | R>((subscriber) =>
      source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            subscriber.onNext(value);
          },
          onError(error) {
            if (handlerOrObservable === undefined) {
              subscriber.onCompleted();
              return;
            }
            if (isObservable(handlerOrObservable)) {
              subscriber.add(handlerOrObservable.subscribe(subscriber));
              return;
            }
            const result = runGuarded(subscriber, handlerOrObservable, error);
            if (!isSome(result)) {
              return;
            }
            const continuation = result.$m_value;
            if (!isObservable(continuation)) {
              subscriber.onError(error);
              return;
            }
            subscriber.add(continuation.subscribe(subscriber));
          },
        }),
      ),
    );
}
// Resubscribes to the source after each error until count retries have
// failed. Without a count it retries forever.
function retry(count?: number): IdentityOperator {
  if (count !== undefined) {
    assertNonNegativeInteger(count, 'count');
  }
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let failures = 0;
      const subscribeToSource = (): void => {
        let attempt: Subscription | undefined = undefined;
        attempt = source.subscribe(
          operate(subscriber, {
            onNext(value: T) {
              subscriber.onNext(value);
            },
            onError(error) {
              if (attempt) {
                subscriber.remove(attempt);
              }
              failures++;
              if (count !== undefined && failures > count) {
                subscriber.onError(error);
                return;
              }
              subscribeToSource();
            },
          }),
        );
        subscriber.add(attempt);
      };
      subscribeToSource();
    });
}
// A hook that throws turns the event into an error.
function tap<T>(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void): Operator<T, T> {
  if (onNext !== undefined) {
    assertFunction(onNext, 'onNext');
  }
  if (onError !== undefined) {
    assertFunction(onError, 'onError');
  }
  if (onCompleted !== undefined) {
    assertFunction(onCompleted, 'onCompleted');
  }
  return (source) =>
    Observable((subscriber) =>
      source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (!onNext || isSome(runGuarded(subscriber, onNext, value))) {
              subscriber.onNext(value);
            }
          },
          onError(error) {
            if (!onError || isSome(runGuarded(subscriber, onError, error))) {
              subscriber.onError(error);
            }
          },
          onCompleted() {
            if (!onCompleted || isSome(runGuarded(subscriber, onCompleted))) {
              subscriber.onCompleted();
            }
          },
        }),
      ),
    );
}
function defaultIfEmpty<D>(...values: D[]): <T>(source: Observable<T>) => Observable<T | D> {
  return <T>(source: Observable<T>) =>
    Observable<T | D>((subscriber) => {
      let empty = true;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            empty = false;
            subscriber.onNext(value);
          },
          onCompleted() {
            if (empty) {
              pushArrayItems(values, subscriber);
            }
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function ignoreElements(): <T>(source: Observable<T>) => Observable<never> {
  return <T>(source: Observable<T>) =>
    Observable<never>((subscriber) =>
      source.subscribe(
        operate(subscriber, {
          onNext(_value: T) {},
        }),
      ),
    );
}
function startWith<D>(...values: D[]): <T>(source: Observable<T>) => Observable<T | D> {
  return <T>(source: Observable<T>) =>
    Observable<T | D>((subscriber) => {
      pushArrayItems(values, subscriber);
      return source.subscribe(subscriber);
    });
}
// Subscribes and writes every event to the configured log sink.
function dump<T>(name?: string, formatter: (value: T) => string = String): (source: Observable<T>) => Subscription {
  assertFunction(formatter, 'formatter');
  const prefix = name ? `${name} ` : '';
  return (source) =>
    source.subscribe(
      (value) => {
        config.log(`${prefix}onNext: ${formatter(value)}`);
      },
      (error) => {
        config.log(`${prefix}onError: ${String(error)}`);
      },
      () => {
        config.log(`${prefix}onCompleted`);
      },
    );
}
export { type ErrorHandler, catchError, retry, tap, defaultIfEmpty, ignoreElements, startWith, dump };
