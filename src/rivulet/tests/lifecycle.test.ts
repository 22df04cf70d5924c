import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { concat } from '../combination';
import { configure, resetConfig } from '../config';
import { catchError, defaultIfEmpty, dump, ignoreElements, retry, startWith, tap } from '../lifecycle';
import { $$Observable, Observable, empty, of, throwError } from '../observable';
import { ObserverLike, isObserverLike } from '../observer';
import { Subscription } from '../subscription';
import { pipe } from '../util';
import { record } from './record';
describe('lifecycle operators', () => {
  const onUnhandledError = jest.fn();
  beforeEach(() => {
    onUnhandledError.mockClear();
    configure({ onUnhandledError });
  });
  afterEach(() => {
    resetConfig();
  });
  describe('catchError', () => {
    const failure = new Error('source failed');
    test('completes quietly without a continuation', () => {
      expect(record(pipe(throwError(failure), catchError())).events).toEqual([['completed']]);
    });
    test('continues with an observable', () => {
      const source = concat([of(1), throwError(failure)]);
      expect(record(pipe(source, catchError(of(9)))).events).toEqual([['next', 1], ['next', 9], ['completed']]);
    });
    test('continues with what the handler returns', () => {
      const recovered = pipe(
        throwError(failure),
        catchError((error: unknown) => of(error === failure ? 'recovered' : 'other')),
      );
      expect(record(recovered).events).toEqual([['next', 'recovered'], ['completed']]);
    });
    test('lets the error through when the handler returns nothing', () => {
      expect(record(pipe(throwError(failure), catchError(() => {}))).events).toEqual([['error', failure]]);
      expect(onUnhandledError).not.toHaveBeenCalled();
    });
    test('forwards the error of a throwing handler', () => {
      const second = new Error('handler failed');
      const rethrown = pipe(
        throwError(failure),
        catchError(() => {
          throw second;
        }),
      );
      expect(record(rethrown).events).toEqual([['error', second]]);
    });
  });
  describe('retry', () => {
    const failure = new Error('attempt failed');
    test('gives up after the given number of retries', () => {
      let attempts = 0;
      const flaky = Observable<number>((subscriber) => {
        attempts++;
        subscriber.onNext(attempts);
        subscriber.onError(failure);
      });
      expect(record(pipe(flaky, retry(2))).events).toEqual([['next', 1], ['next', 2], ['next', 3], ['error', failure]]);
      expect(attempts).toBe(3);
      expect(onUnhandledError).not.toHaveBeenCalled();
    });
    test('retries until the source succeeds', () => {
      let attempts = 0;
      const eventually = Observable<string>((subscriber) => {
        attempts++;
        if (attempts < 3) {
          subscriber.onError(failure);
          return;
        }
        subscriber.onNext('ok');
        subscriber.onCompleted();
      });
      expect(record(pipe(eventually, retry())).events).toEqual([['next', 'ok'], ['completed']]);
      expect(attempts).toBe(3);
    });
    test('lets go of every failed attempt', () => {
      const observers: Array<ObserverLike<number>> = [];
      const release = jest.fn();
      const source: Observable<number> = {
        [$$Observable]: undefined,
        subscribe(observer?: ObserverLike<number> | ((value: number) => void)): Subscription {
          if (isObserverLike(observer)) {
            observers.push(observer);
          }
          return Subscription(release);
        },
      };
      const { events, subscription } = record(pipe(source, retry()));
      for (let i = 0; i < 50; i++) {
        observers[i].onError(failure);
      }
      expect(observers).toHaveLength(51);
      subscription.unsubscribe();
      expect(release).toHaveBeenCalledTimes(1);
      expect(events).toEqual([]);
    });
    test('retry(0) forwards the first error', () => {
      expect(record(pipe(throwError(failure), retry(0))).events).toEqual([['error', failure]]);
    });
  });
  describe('tap', () => {
    test('sees every event before it is forwarded', () => {
      const calls: string[] = [];
      const tapped = pipe(
        of(1, 2),
        tap(
          (value: number) => calls.push(`tap ${value}`),
          undefined,
          () => calls.push('tap completed'),
        ),
      );
      tapped.subscribe(
        (value) => calls.push(`next ${value}`),
        undefined,
        () => calls.push('completed'),
      );
      expect(calls).toEqual(['tap 1', 'next 1', 'tap 2', 'next 2', 'tap completed', 'completed']);
    });
    test('a throwing hook turns the event into an error', () => {
      const failure = new Error('hook failed');
      const tapped = pipe(
        of(1, 2),
        tap(() => {
          throw failure;
        }),
      );
      expect(record(tapped).events).toEqual([['error', failure]]);
    });
  });
  test('defaultIfEmpty', () => {
    expect(record(pipe(empty(), defaultIfEmpty(0))).events).toEqual([['next', 0], ['completed']]);
    expect(record(pipe(of(1), defaultIfEmpty(0))).events).toEqual([['next', 1], ['completed']]);
  });
  test('ignoreElements', () => {
    expect(record(pipe(of(1, 2), ignoreElements())).events).toEqual([['completed']]);
  });
  test('startWith', () => {
    expect(record(pipe(of(1, 2), startWith(0))).events).toEqual([['next', 0], ['next', 1], ['next', 2], ['completed']]);
  });
  describe('dump', () => {
    test('logs every event with the given name', () => {
      const log = jest.fn<(message: string) => void>();
      configure({ log });
      pipe(of(1, 2), dump('nums'));
      expect(log.mock.calls).toEqual([['nums onNext: 1'], ['nums onNext: 2'], ['nums onCompleted']]);
    });
    test('logs errors and formats values', () => {
      const log = jest.fn<(message: string) => void>();
      configure({ log });
      dump()(throwError(new Error('bad')));
      pipe(
        of([1, 2]),
        dump('pairs', (pair: number[]) => pair.join('+')),
      );
      expect(log.mock.calls).toEqual([['onError: Error: bad'], ['pairs onNext: 1+2'], ['pairs onCompleted']]);
    });
  });
});
