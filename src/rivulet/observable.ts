import { reportUnhandledError } from './config';
import { InvalidArgumentError, assertArgument, assertFunction, assertNonNegativeInteger } from './errors';
import { ObserverLike, Observer, isObserverLike } from './observer';
import type { Scheduler } from './scheduler';
import { Subscription, TeardownLogic } from './subscription';
const $$Observable = Symbol('Observable');
interface Subscriber<T> extends ObserverLike<T> {
  readonly stopped: boolean;
  add(teardown: TeardownLogic): void;
  remove(subscription: Subscription): void;
}
type SubscribeFunction<T> = (subscriber: Subscriber<T>) => TeardownLogic | void;
interface Observable<T> {
  [$$Observable]: undefined;
  subscribe(observer: ObserverLike<T>): Subscription;
  subscribe(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void): Subscription;
}
interface Operator<T, R> {
  (source: Observable<T>): Observable<R>;
}
interface IdentityOperator {
  <T>(source: Observable<T>): Observable<T>;
}
class SubscriberImplementation<T> implements Subscriber<T> {
  private $p_stopped = false;
  private $p_destination: ObserverLike<T>;
  private $p_subscription: Subscription;
  constructor(destination: ObserverLike<T>, subscription: Subscription) {
    this.$p_destination = destination;
    this.$p_subscription = subscription;
  }
  get stopped(): boolean {
    return this.$p_stopped || this.$p_subscription.unsubscribed || this.$p_destination.stopped === true;
  }
  add(teardown: TeardownLogic): void {
    this.$p_subscription.add(teardown);
  }
  remove(subscription: Subscription): void {
    this.$p_subscription.remove(subscription);
  }
  onNext(value: T): void {
    if (this.stopped) {
      return;
    }
    this.$p_destination.onNext(value);
  }
  onError(error: unknown): void {
    if (this.stopped) {
      return;
    }
    this.$p_stopped = true;
    try {
      this.$p_destination.onError(error);
    } finally {
      this.$p_subscription.unsubscribe();
    }
  }
  onCompleted(): void {
    if (this.stopped) {
      return;
    }
    this.$p_stopped = true;
    try {
      this.$p_destination.onCompleted();
    } finally {
      this.$p_subscription.unsubscribe();
    }
  }
}
class ObservableImplementation<T> implements Observable<T> {
  [$$Observable]: undefined = undefined;
  private $p_subscribe: SubscribeFunction<T>;
  constructor(subscribe: SubscribeFunction<T>) {
    this.$p_subscribe = subscribe;
  }
  subscribe(observer: ObserverLike<T>): Subscription;
  subscribe(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void): Subscription;
  subscribe(observerOrNext?: ObserverLike<T> | ((value: T) => void), onError?: (error: unknown) => void, onCompleted?: () => void): Subscription {
    const destination = isObserverLike(observerOrNext) ? observerOrNext : Observer(observerOrNext, onError, onCompleted);
    const subscription = Subscription();
    const subscriber = new SubscriberImplementation(destination, subscription);
    if (subscriber.stopped) {
      return subscription;
    }
    let teardown: TeardownLogic | void = undefined;
    try {
      const subscribe = this.$p_subscribe;
      teardown = subscribe(subscriber);
    } catch (error) {
      if (subscriber.stopped) {
        reportUnhandledError(error);
      } else {
        subscriber.onError(error);
      }
    }
    if (teardown) {
      subscription.add(teardown);
    }
    return subscription;
  }
}
function Observable<T>(subscribe: SubscribeFunction<T>): Observable<T> {
  assertFunction(subscribe, 'subscribe');
  return new ObservableImplementation(subscribe);
}
function isObservable(value: unknown): value is Observable<unknown> {
  return typeof value === 'object' && value !== null && $$Observable in value;
}
interface OperateCallbacks<T> {
  onNext: (value: T) => void;
  onError?: (error: unknown) => void;
  onCompleted?: () => void;
}
// The returned observer stops as soon as the downstream subscriber does, which
// lets synchronous upstream producers notice early termination.
function operate<T>(subscriber: Subscriber<never>, callbacks: OperateCallbacks<T>): ObserverLike<T> {
  const { onNext, onError, onCompleted } = callbacks;
  return {
    get stopped(): boolean {
      return subscriber.stopped;
    },
    onNext,
    onError:
      onError ??
      ((error) => {
        subscriber.onError(error);
      }),
    onCompleted:
      onCompleted ??
      (() => {
        subscriber.onCompleted();
      }),
  };
}
function pushArrayItems<T>(values: ArrayLike<T>, subscriber: Subscriber<T>): void {
  for (let i = 0; !subscriber.stopped && i < values.length; i++) {
    subscriber.onNext(values[i]);
  }
}
function empty(): Observable<never> {
  return Observable((subscriber) => {
    subscriber.onCompleted();
  });
}
function never(): Observable<never> {
  return Observable(() => {});
}
function throwError(error: unknown): Observable<never> {
  return Observable((subscriber) => {
    subscriber.onError(error);
  });
}
function of<T extends unknown[]>(...values: T): Observable<T[number]> {
  return Observable((subscriber) => {
    pushArrayItems(values, subscriber);
    subscriber.onCompleted();
  });
}
function fromRange(start: number, stop?: number, step = 1): Observable<number> {
  const first = stop === undefined ? 1 : start;
  const last = stop === undefined ? start : stop;
  assertArgument(Number.isFinite(first) && Number.isFinite(last), 'Expected the range bounds to be finite numbers.', { start, stop });
  assertArgument(Number.isFinite(step) && step !== 0, 'Expected the range step to be a non-zero finite number.', step);
  return Observable((subscriber) => {
    for (let i = first; !subscriber.stopped && (step > 0 ? i <= last : i >= last); i += step) {
      subscriber.onNext(i);
    }
    subscriber.onCompleted();
  });
}
type Traversal<C, K, V> = (collection: C) => Iterable<readonly [K, V]>;
function isIterable(value: unknown): value is Iterable<unknown> {
  return value != null && typeof Reflect.get(Object(value), Symbol.iterator) === 'function';
}
function* indexedEntries<V>(collection: ArrayLike<V>): Generator<readonly [number, V], void, undefined> {
  for (let i = 0; i < collection.length; i++) {
    yield [i, collection[i]];
  }
}
function keyedEntries<K, V>(collection: ReadonlyMap<K, V>): Iterable<readonly [K, V]>;
function keyedEntries<V>(collection: { readonly [key: string]: V }): Iterable<readonly [string, V]>;
function keyedEntries(collection: ReadonlyMap<unknown, unknown> | { readonly [key: string]: unknown }): Iterable<readonly [unknown, unknown]> {
  return collection instanceof Map ? collection.entries() : Object.entries(collection);
}
function fromIterable<V>(collection: Iterable<V>): Observable<V>;
function fromIterable<C, K, V>(collection: C, traverse: Traversal<C, K, V>, includeKeys: true): Observable<readonly [V, K]>;
function fromIterable<C, K, V>(collection: C, traverse: Traversal<C, K, V>, includeKeys?: false): Observable<V>;
function fromIterable(collection: unknown, traverse?: Traversal<unknown, unknown, unknown>, includeKeys = false): Observable<unknown> {
  if (!traverse) {
    if (!isIterable(collection)) {
      throw new InvalidArgumentError('Expected an iterable collection.', { cause: { value: collection } });
    }
    return Observable((subscriber) => {
      for (const value of collection) {
        if (subscriber.stopped) {
          return;
        }
        subscriber.onNext(value);
      }
      subscriber.onCompleted();
    });
  }
  assertFunction(traverse, 'traverse');
  return Observable((subscriber) => {
    for (const [key, value] of traverse(collection)) {
      if (subscriber.stopped) {
        return;
      }
      subscriber.onNext(includeKeys ? [value, key] : value);
    }
    subscriber.onCompleted();
  });
}
function fromGenerator<T>(generator: Iterator<T, unknown, undefined> | (() => Iterator<T, unknown, undefined>), scheduler: Scheduler): Observable<T> {
  assertArgument(
    typeof generator === 'function' || (typeof generator === 'object' && generator !== null && typeof Reflect.get(generator, 'next') === 'function'),
    'Expected a generator or a generator function.',
    generator,
  );
  return Observable((subscriber) => {
    const iterator = typeof generator === 'function' ? generator() : generator;
    return scheduler.schedule(function* () {
      while (!subscriber.stopped) {
        let result: IteratorResult<T, unknown>;
        try {
          result = iterator.next();
        } catch (error) {
          subscriber.onError(error);
          return;
        }
        if (result.done) {
          subscriber.onCompleted();
          return;
        }
        subscriber.onNext(result.value);
        yield;
      }
    });
  });
}
function defer<T>(factory: () => Observable<T>): Observable<T> {
  assertFunction(factory, 'factory');
  return Observable((subscriber) => factory().subscribe(subscriber));
}
function replicate<T>(value: T, count?: number): Observable<T> {
  if (count !== undefined) {
    assertNonNegativeInteger(count, 'count');
  }
  return Observable((subscriber) => {
    for (let i = 0; !subscriber.stopped && (count === undefined || i < count); i++) {
      subscriber.onNext(value);
    }
    subscriber.onCompleted();
  });
}
export {
  $$Observable,
  type Subscriber,
  type SubscribeFunction,
  Observable,
  isObservable,
  type Operator,
  type IdentityOperator,
  type OperateCallbacks,
  operate,
  pushArrayItems,
  empty,
  never,
  throwError,
  of,
  fromRange,
  type Traversal,
  indexedEntries,
  keyedEntries,
  fromIterable,
  fromGenerator,
  defer,
  replicate,
};
