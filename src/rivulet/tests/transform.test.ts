import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { configure, resetConfig } from '../config';
import { InvalidArgumentError } from '../errors';
import { filter } from '../filtering';
import { Observable, empty, of } from '../observable';
import { map, pack, partition, pluck, reduce, scan, unpack, unwrap } from '../transform';
import { pipe } from '../util';
import { record, valuesOf } from './record';
describe('transform operators', () => {
  const onUnhandledError = jest.fn();
  beforeEach(() => {
    onUnhandledError.mockClear();
    configure({ onUnhandledError });
  });
  afterEach(() => {
    resetConfig();
  });
  test('map then filter', () => {
    const doubled = pipe(
      of(1, 2, 3),
      map((value: number) => value * 2),
      filter((value: number) => value > 2),
    );
    expect(record(doubled).events).toEqual([['next', 4], ['next', 6], ['completed']]);
  });
  test('map passes the index of each value', () => {
    const labelled = pipe(
      of('a', 'b'),
      map((value: string, index: number) => `${index}:${value}`),
    );
    expect(valuesOf(record(labelled).events)).toEqual(['0:a', '1:b']);
  });
  test('a throwing projection errors the stream and stops the source', () => {
    const failure = new Error('projection failed');
    const seen: number[] = [];
    const projected = pipe(
      of(1, 2, 3),
      map((value: number) => {
        seen.push(value);
        if (value === 2) {
          throw failure;
        }
        return value;
      }),
    );
    expect(record(projected).events).toEqual([['next', 1], ['error', failure]]);
    expect(seen).toEqual([1, 2]);
    expect(onUnhandledError).not.toHaveBeenCalled();
  });
  test('rejects a projection that is not a function', () => {
    expect(() => Reflect.apply(map, undefined, ['nope'])).toThrow(InvalidArgumentError);
  });
  test('scan emits every intermediate state', () => {
    expect(valuesOf(record(pipe(of(1, 2, 3), scan((total: number, value: number) => total + value))).events)).toEqual([1, 3, 6]);
    expect(valuesOf(record(pipe(of(1, 2, 3), scan((text: string, value: number) => text + value, '>'))).events)).toEqual([
      '>1',
      '>12',
      '>123',
    ]);
  });
  test('reduce emits the final state on completion', () => {
    const add = (total: number, value: number): number => total + value;
    expect(record(pipe(of(1, 2, 3), reduce(add))).events).toEqual([['next', 6], ['completed']]);
    expect(record(reduce(add)(empty())).events).toEqual([['completed']]);
    expect(record(reduce(add, 10)(empty())).events).toEqual([['next', 10], ['completed']]);
  });
  test('pluck follows a path of keys', () => {
    const source = of({ a: { b: 1 } }, { a: { b: 2 } });
    expect(valuesOf(record(pluck('a', 'b')(source)).events)).toEqual([1, 2]);
  });
  test('pluck errors when a step of the path is null', () => {
    const source: Observable<unknown> = of({ a: { b: 1 } }, { a: null }, { a: { b: 3 } });
    const { events } = record(pluck('a', 'b')(source));
    expect(events).toEqual([
      ['next', 1],
      ['error', new TypeError('Cannot read property b of null')],
    ]);
  });
  test('pack and unpack keep trailing undefined values', () => {
    const source = of<[[number, undefined]]>([1, undefined]);
    const packed = record(pipe(source, pack()));
    expect(packed.events).toEqual([['next', { n: 2, values: [1, undefined] }], ['completed']]);
    expect(valuesOf(record(pipe(source, pack(), unpack())).events)).toEqual([[1, undefined]]);
  });
  test('unwrap emits the items of each array', () => {
    expect(valuesOf(record(pipe(of([1, 2], [3]), unwrap())).events)).toEqual([1, 2, 3]);
  });
  test('partition splits a stream in two', () => {
    const [even, odd] = partition((value: number) => value % 2 === 0)(of(1, 2, 3, 4));
    expect(record(even).events).toEqual([['next', 2], ['next', 4], ['completed']]);
    expect(record(odd).events).toEqual([['next', 1], ['next', 3], ['completed']]);
  });
});
