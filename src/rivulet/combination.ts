import { assertFunction } from './errors';
import { Maybe, None, Some, getOrUndefined, isNone, isSome } from './maybe';
import { Observable, Operator, empty, operate } from './observable';
import { Subscription } from './subscription';
import { map } from './transform';
import { runGuarded } from './util';
type ObservableInputs<T extends unknown[]> = { [K in keyof T]: Observable<T[K]> };
function concat<T extends unknown[]>(sources: ObservableInputs<T>): Observable<T[number]>;
function concat<T>(sources: readonly Observable<T>[]): Observable<T> {
  return Observable((subscriber) => {
    const subscribeAt = (index: number): void => {
      if (index >= sources.length) {
        subscriber.onCompleted();
        return;
      }
      subscriber.add(
        sources[index].subscribe(
          operate(subscriber, {
            onNext(value: T) {
              subscriber.onNext(value);
            },
            onCompleted() {
              subscribeAt(index + 1);
            },
          }),
        ),
      );
    };
    subscribeAt(0);
  });
}
function merge<T extends unknown[]>(sources: ObservableInputs<T>): Observable<T[number]>;
function merge<T>(sources: readonly Observable<T>[]): Observable<T> {
  if (sources.length === 0) {
    return empty();
  }
  return Observable((subscriber) => {
    let completed = 0;
    for (let i = 0; i < sources.length && !subscriber.stopped; i++) {
      subscriber.add(
        sources[i].subscribe(
          operate(subscriber, {
            onNext(value: T) {
              subscriber.onNext(value);
            },
            onCompleted() {
              if (++completed === sources.length) {
                subscriber.onCompleted();
              }
            },
          }),
        ),
      );
    }
  });
}
function combineLatest<T extends unknown[]>(sources: ObservableInputs<T>): Observable<T>;
function combineLatest<T extends unknown[], R>(sources: ObservableInputs<T>, combinator: (...values: T) => R): Observable<R>;
function combineLatest(sources: readonly Observable<unknown>[], combinator?: (...values: unknown[]) => unknown): Observable<unknown> {
  if (combinator !== undefined) {
    assertFunction(combinator, 'combinator');
  }
  if (sources.length === 0) {
    return empty();
  }
  return Observable((subscriber) => {
    const latest: Maybe<unknown>[] = sources.map(() => None);
    let responded = 0;
    let completed = 0;
    for (let i = 0; i < sources.length && !subscriber.stopped; i++) {
      subscriber.add(
        sources[i].subscribe(
          operate(subscriber, {
            onNext(value: unknown) {
              if (isNone(latest[i])) {
                responded++;
              }
              latest[i] = Some(value);
              if (responded !== sources.length) {
                return;
              }
              const values = latest.map(getOrUndefined);
              if (!combinator) {
                subscriber.onNext(values);
                return;
              }
              const combined = runGuarded(subscriber, combinator, ...values);
              if (isSome(combined)) {
                subscriber.onNext(combined.$m_value);
              }
            },
            onCompleted() {
              if (++completed === sources.length) {
                subscriber.onCompleted();
              }
            },
          }),
        ),
      );
    }
  });
}
// Completes as soon as a completed source has nothing left in its buffer, so
// the shortest source bounds the output.
function zip<T extends unknown[]>(sources: ObservableInputs<T>): Observable<T>;
function zip(sources: readonly Observable<unknown>[]): Observable<unknown[]> {
  if (sources.length === 0) {
    return empty();
  }
  return Observable((subscriber) => {
    const buffers: unknown[][] = sources.map(() => []);
    const completed: boolean[] = sources.map(() => false);
    const isExhausted = (index: number): boolean => completed[index] && buffers[index].length === 0;
    for (let i = 0; i < sources.length && !subscriber.stopped; i++) {
      subscriber.add(
        sources[i].subscribe(
          operate(subscriber, {
            onNext(value: unknown) {
              buffers[i].push(value);
              if (buffers.some((buffer) => buffer.length === 0)) {
                return;
              }
              subscriber.onNext(buffers.map((buffer) => buffer.shift()));
              if (buffers.some((_, index) => isExhausted(index))) {
                subscriber.onCompleted();
              }
            },
            onCompleted() {
              completed[i] = true;
              if (isExhausted(i) || completed.every(Boolean)) {
                subscriber.onCompleted();
              }
            },
          }),
        ),
      );
    }
  });
}
// The first source to produce any event wins and the others are dropped.
function amb<T extends unknown[]>(sources: ObservableInputs<T>): Observable<T[number]>;
function amb<T>(sources: readonly Observable<T>[]): Observable<T> {
  if (sources.length === 0) {
    return empty();
  }
  if (sources.length === 1) {
    return sources[0];
  }
  return Observable((subscriber) => {
    let winner = -1;
    const subscriptions: Subscription[] = [];
    for (let i = 0; i < sources.length && winner === -1 && !subscriber.stopped; i++) {
      const isWinner = (): boolean => {
        if (winner === -1) {
          winner = i;
          for (let j = 0; j < subscriptions.length; j++) {
            if (j !== i) {
              subscriptions[j].unsubscribe();
            }
          }
        }
        return winner === i;
      };
      const subscription = sources[i].subscribe(
        operate(subscriber, {
          onNext(value: T) {
            if (isWinner()) {
              subscriber.onNext(value);
            }
          },
          onError(error) {
            if (isWinner()) {
              subscriber.onError(error);
            }
          },
          onCompleted() {
            if (isWinner()) {
              subscriber.onCompleted();
            }
          },
        }),
      );
      subscriptions.push(subscription);
      subscriber.add(subscription);
    }
  });
}
type Latest<U extends unknown[]> = { [K in keyof U]: U[K] | undefined };
// Side sources never gate emission and their errors are ignored.
function withLatest<U extends unknown[]>(...others: ObservableInputs<U>): <T>(source: Observable<T>) => Observable<[T, ...Latest<U>]>;
function withLatest(...others: Observable<unknown>[]): (source: Observable<unknown>) => Observable<unknown[]> {
  return (source) =>
    Observable((subscriber) => {
      const latest: unknown[] = others.map(() => undefined);
      for (let i = 0; i < others.length && !subscriber.stopped; i++) {
        subscriber.add(
          others[i].subscribe(
            operate(subscriber, {
              onNext(value: unknown) {
                latest[i] = value;
              },
              onError() {},
              onCompleted() {},
            }),
          ),
        );
      }
      return source.subscribe(
        operate(subscriber, {
          onNext(value: unknown) {
            subscriber.onNext([value, ...latest]);
          },
        }),
      );
    });
}
// Only the most recent inner observable is live. The stream completes once
// the outer source and the live inner observable have both completed.
function switchLatest(): <T>(source: Observable<Observable<T>>) => Observable<T> {
  return <T>(source: Observable<Observable<T>>) =>
    Observable<T>((subscriber) => {
      let outerCompleted = false;
      let innerActive = false;
      let innerId = 0;
      let innerSubscription: Subscription | undefined;
      subscriber.add(() => {
        innerSubscription?.unsubscribe();
      });
      return source.subscribe(
        operate(subscriber, {
          onNext(inner: Observable<T>) {
            innerSubscription?.unsubscribe();
            const id = ++innerId;
            innerActive = true;
            innerSubscription = inner.subscribe(
              operate(subscriber, {
                onNext(value: T) {
                  subscriber.onNext(value);
                },
                onCompleted() {
                  if (id !== innerId) {
                    return;
                  }
                  innerActive = false;
                  if (outerCompleted) {
                    subscriber.onCompleted();
                  }
                },
              }),
            );
          },
          onCompleted() {
            outerCompleted = true;
            if (!innerActive) {
              subscriber.onCompleted();
            }
          },
        }),
      );
    });
}
// The outer source counts as one pending producer until it completes.
function flatten(): <T>(source: Observable<Observable<T>>) => Observable<T> {
  return <T>(source: Observable<Observable<T>>) =>
    Observable<T>((subscriber) => {
      let remaining = 1;
      const release = (): void => {
        if (--remaining === 0) {
          subscriber.onCompleted();
        }
      };
      return source.subscribe(
        operate(subscriber, {
          onNext(inner: Observable<T>) {
            remaining++;
            subscriber.add(
              inner.subscribe(
                operate(subscriber, {
                  onNext(value: T) {
                    subscriber.onNext(value);
                  },
                  onCompleted: release,
                }),
              ),
            );
          },
          onCompleted: release,
        }),
      );
    });
}
function flatMap<T, R>(project: (value: T, index: number) => Observable<R>): Operator<T, R> {
  assertFunction(project, 'project');
  const flattenInner = flatten();
  return (source) => flattenInner(map(project)(source));
}
function flatMapLatest<T, R>(project: (value: T, index: number) => Observable<R>): Operator<T, R> {
  assertFunction(project, 'project');
  const switchInner = switchLatest();
  return (source) => switchInner(map(project)(source));
}
export { type ObservableInputs, concat, merge, combineLatest, zip, amb, withLatest, switchLatest, flatten, flatMap, flatMapLatest };
