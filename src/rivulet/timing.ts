import { assertArgument, assertPositiveInteger } from './errors';
import { Maybe, None, Some, isSome } from './maybe';
import { IdentityOperator, Observable, operate } from './observable';
import type { Scheduler } from './scheduler';
import { Subscription } from './subscription';
import { constant, runGuarded } from './util';
function assertTime(time: number): void {
  assertArgument(Number.isFinite(time) && time >= 0, 'Expected the time to be a non-negative finite number.', time);
}
// Each kind of event is debounced on its own. A pending event of one kind
// never cancels a pending event of another kind.
function debounce(time: number, scheduler: Scheduler): IdentityOperator {
  assertTime(time);
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let pendingNext: Subscription | undefined;
      let pendingError: Subscription | undefined;
      let pendingCompleted: Subscription | undefined;
      subscriber.add(() => {
        pendingNext?.unsubscribe();
        pendingError?.unsubscribe();
        pendingCompleted?.unsubscribe();
      });
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            pendingNext?.unsubscribe();
            pendingNext = scheduler.schedule(() => {
              subscriber.onNext(value);
            }, time);
          },
          onError(error) {
            pendingError?.unsubscribe();
            pendingError = scheduler.schedule(() => {
              subscriber.onError(error);
            }, time);
          },
          onCompleted() {
            pendingCompleted?.unsubscribe();
            pendingCompleted = scheduler.schedule(() => {
              subscriber.onCompleted();
            }, time);
          },
        }),
      );
    });
}
// Every event, terminal ones included, is shifted by the delay. A function
// delay is computed again for each event.
function delay(time: number | (() => number), scheduler: Scheduler): IdentityOperator {
  if (typeof time === 'number') {
    assertTime(time);
  }
  const getTime = typeof time === 'number' ? constant(time) : time;
  assertArgument(typeof getTime === 'function', 'Expected the delay to be a number or a function.', time);
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      const later = (action: () => void): void => {
        const duration = runGuarded(subscriber, getTime);
        if (!isSome(duration)) {
          return;
        }
        let ran = false;
        let scheduled: Subscription | undefined = undefined;
        scheduled = scheduler.schedule(() => {
          ran = true;
          if (scheduled) {
            subscriber.remove(scheduled);
          }
          action();
        }, duration.$m_value);
        // An immediate scheduler has already run the action.
        if (!ran) {
          subscriber.add(scheduled);
        }
      };
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            later(() => {
              subscriber.onNext(value);
            });
          },
          onError(error) {
            later(() => {
              subscriber.onError(error);
            });
          },
          onCompleted() {
            later(() => {
              subscriber.onCompleted();
            });
          },
        }),
      );
    });
}
// Completion of the source is ignored. The stream completes with the sampler.
function sample(sampler: Observable<unknown>): IdentityOperator {
  return <T>(source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let latest: Maybe<T> = None;
      subscriber.add(
        source.subscribe(
          operate(subscriber, {
            onNext(value: T) {
              latest = Some(value);
            },
            onCompleted() {},
          }),
        ),
      );
      return sampler.subscribe(
        operate(subscriber, {
          onNext() {
            const current = latest;
            if (isSome(current)) {
              subscriber.onNext(current.$m_value);
            }
          },
        }),
      );
    });
}
// Whatever is buffered when the source terminates is flushed first.
function buffer(size: number): <T>(source: Observable<T>) => Observable<T[]> {
  assertPositiveInteger(size, 'size');
  return <T>(source: Observable<T>) =>
    Observable<T[]>((subscriber) => {
      let values: T[] = [];
      const flush = (): void => {
        if (values.length === 0) {
          return;
        }
        const flushed = values;
        values = [];
        subscriber.onNext(flushed);
      };
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            values.push(value);
            if (values.length >= size) {
              flush();
            }
          },
          onError(error) {
            flush();
            subscriber.onError(error);
          },
          onCompleted() {
            flush();
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function window(size: number): <T>(source: Observable<T>) => Observable<T[]> {
  assertPositiveInteger(size, 'size');
  return <T>(source: Observable<T>) =>
    Observable<T[]>((subscriber) => {
      const values: T[] = [];
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            values.push(value);
            if (values.length > size) {
              values.shift();
            }
            if (values.length === size) {
              subscriber.onNext(values.slice());
            }
          },
        }),
      );
    });
}
export { debounce, delay, sample, buffer, window };
