export { type RivuletConfig, config, configure, resetConfig, reportUnhandledError } from './config';
export { InvalidArgumentError, UnsubscriptionError, TaskFailureError, UnreachableCodeError, assertUnreachable } from './errors';
export { MaybeType, Some, isSome, None, isNone, type Maybe, getOrUndefined } from './maybe';
export { $$Subscription, type TeardownLogic, Subscription, isSubscription, closedSubscription } from './subscription';
export { type ObserverLike, $$Observer, Observer, isObserver, isObserverLike } from './observer';
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
} from './observable';
export { type TaskYield, type TaskBody, type TaskAction, TaskStepType, type TaskStep, Task } from './task';
export { type TimerHandle, TimerQueue } from './timerQueue';
export { type Scheduler, ImmediateScheduler, TimeoutScheduler, CooperativeScheduler } from './scheduler';
export { Subject, AsyncSubject, BehaviorSubject, ReplaySubject, isSubject } from './subject';
export { map, scan, reduce, pluck, pack, unpack, unwrap, partition } from './transform';
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
} from './filtering';
export { count, sum, average, min, max, all, contains } from './aggregate';
export { type ObservableInputs, concat, merge, combineLatest, zip, amb, withLatest, switchLatest, flatten, flatMap, flatMapLatest } from './combination';
export { debounce, delay, sample, buffer, window } from './timing';
export { type ErrorHandler, catchError, retry, tap, defaultIfEmpty, ignoreElements, startWith, dump } from './lifecycle';
export { type Packed, identity, constant, noop, isEqual, pipe, runGuarded } from './util';
