import { assertFunction } from './errors';
import { Maybe, None, Some, isNone, isSome } from './maybe';
import { Observable, Operator, operate } from './observable';
import { Packed, pack as packValues, runGuarded, unpack as unpackValues } from './util';
function map<T, R>(project: (value: T, index: number) => R): Operator<T, R> {
  assertFunction(project, 'project');
  return (source) =>
    Observable((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const result = runGuarded(subscriber, project, value, index++);
            if (isSome(result)) {
              subscriber.onNext(result.$m_value);
            }
          },
        }),
      );
    });
}
function scan<T>(accumulator: (accumulated: T, value: T) => T): Operator<T, T>;
function scan<T, S>(accumulator: (accumulated: S, value: T) => S, seed: S): Operator<T, S>;
function scan(accumulator: (accumulated: unknown, value: unknown) => unknown, ...seed: [unknown] | []): Operator<unknown, unknown> {
  assertFunction(accumulator, 'accumulator');
  return (source) =>
    Observable((subscriber) => {
      let accumulated: Maybe<unknown> = seed.length === 0 ? None : Some(seed[0]);
      return source.subscribe(
        operate(subscriber, {
          onNext(value: unknown) {
            const current = accumulated;
            if (isNone(current)) {
              accumulated = Some(value);
              subscriber.onNext(value);
              return;
            }
            const result = runGuarded(subscriber, accumulator, current.$m_value, value);
            if (isSome(result)) {
              accumulated = result;
              subscriber.onNext(result.$m_value);
            }
          },
        }),
      );
    });
}
function reduce<T>(accumulator: (accumulated: T, value: T) => T): Operator<T, T>;
function reduce<T, S>(accumulator: (accumulated: S, value: T) => S, seed: S): Operator<T, S>;
function reduce(accumulator: (accumulated: unknown, value: unknown) => unknown, ...seed: [unknown] | []): Operator<unknown, unknown> {
  assertFunction(accumulator, 'accumulator');
  return (source) =>
    Observable((subscriber) => {
      let accumulated: Maybe<unknown> = seed.length === 0 ? None : Some(seed[0]);
      return source.subscribe(
        operate(subscriber, {
          onNext(value: unknown) {
            const current = accumulated;
            if (isNone(current)) {
              accumulated = Some(value);
              return;
            }
            const result = runGuarded(subscriber, accumulator, current.$m_value, value);
            if (isSome(result)) {
              accumulated = result;
            }
          },
          onCompleted() {
            const current = accumulated;
            if (isSome(current)) {
              subscriber.onNext(current.$m_value);
            }
            subscriber.onCompleted();
          },
        }),
      );
    });
}
function readKey(value: unknown, key: PropertyKey): unknown {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    throw new TypeError(`Cannot read property ${String(key)} of ${value === null ? 'null' : typeof value}`);
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}
function pluck<T, K1 extends keyof T>(key1: K1): Operator<T, T[K1]>;
function pluck<T, K1 extends keyof T, K2 extends keyof T[K1]>(key1: K1, key2: K2): Operator<T, T[K1][K2]>;
function pluck<T, K1 extends keyof T, K2 extends keyof T[K1], K3 extends keyof T[K1][K2]>(key1: K1, key2: K2, key3: K3): Operator<T, T[K1][K2][K3]>;
function pluck(...keys: PropertyKey[]): Operator<unknown, unknown>;
function pluck(...keys: PropertyKey[]): Operator<unknown, unknown> {
  return map((value: unknown) => keys.reduce(readKey, value));
}
function pack(): <T extends unknown[]>(source: Observable<T>) => Observable<Packed<T>> {
  return <T extends unknown[]>(source: Observable<T>) => map((values: T) => packValues(...values))(source);
}
function unpack(): <T extends unknown[]>(source: Observable<Packed<T>>) => Observable<T> {
  return <T extends unknown[]>(source: Observable<Packed<T>>) => map((packed: Packed<T>) => unpackValues(packed))(source);
}
function unwrap(): <T>(source: Observable<readonly T[]>) => Observable<T> {
  return <T>(source: Observable<readonly T[]>) =>
    Observable<T>((subscriber) =>
      source.subscribe(
        operate(subscriber, {
          onNext(values: readonly T[]) {
            for (let i = 0; i < values.length && !subscriber.stopped; i++) {
              subscriber.onNext(values[i]);
            }
          },
        }),
      ),
    );
}
function partition<T, S extends T>(predicate: (value: T, index: number) => value is S): (source: Observable<T>) => [Observable<S>, Observable<Exclude<T, S>>];
function partition<T>(predicate: (value: T, index: number) => boolean): (source: Observable<T>) => [Observable<T>, Observable<T>];
function partition<T>(predicate: (value: T, index: number) => boolean): (source: Observable<T>) => [Observable<T>, Observable<T>] {
  assertFunction(predicate, 'predicate');
  const select = (expected: boolean) => (source: Observable<T>) =>
    Observable<T>((subscriber) => {
      let index = 0;
      return source.subscribe(
        operate(subscriber, {
          onNext(value: T) {
            const result = runGuarded(subscriber, predicate, value, index++);
            if (isSome(result) && Boolean(result.$m_value) === expected) {
              subscriber.onNext(value);
            }
          },
        }),
      );
    });
  return (source) => [select(true)(source), select(false)(source)];
}
export { map, scan, reduce, pluck, pack, unpack, unwrap, partition };
