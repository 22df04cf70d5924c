import { reportUnhandledError } from './config';
import { assertPositiveInteger, assertUnreachable } from './errors';
import { Maybe, None, Some, isSome, getOrUndefined } from './maybe';
import { $$Observable, Observable } from './observable';
import { Observer, ObserverLike, isObserverLike } from './observer';
import { Subscription, closedSubscription } from './subscription';
import { removeOnce } from './util';
const enum TerminalType {
  Error = 'Error',
  Completed = 'Completed',
}
interface TerminalError {
  readonly type: TerminalType.Error;
  readonly error: unknown;
}
interface TerminalCompleted {
  readonly type: TerminalType.Completed;
}
type Terminal = TerminalError | TerminalCompleted;
const TerminalCompleted: TerminalCompleted = { type: TerminalType.Completed };
interface Subject<T> extends Observable<T>, ObserverLike<T> {
  readonly stopped: boolean;
  readonly observed: boolean;
}
interface BehaviorSubject<T> extends Subject<T> {
  getValue(): T | undefined;
}
// What a subject remembers of the values pushed into it, and what it hands to
// an observer at subscribe time.
interface ReplayStrategy<T> {
  // Returns false when the value must not reach live observers yet.
  $m_record(value: T): boolean;
  $m_beforeCompleted(): Maybe<T>;
  $m_replay(observer: ObserverLike<T>, terminal: Terminal | null): void;
}
function replayTerminal(observer: ObserverLike<unknown>, terminal: Terminal | null): void {
  if (!terminal) {
    return;
  }
  switch (terminal.type) {
    case TerminalType.Error: {
      observer.onError(terminal.error);
      break;
    }
    case TerminalType.Completed: {
      observer.onCompleted();
      break;
    }
    default: {
      assertUnreachable(terminal);
    }
  }
}
class PlainStrategy<T> implements ReplayStrategy<T> {
  $m_record(): boolean {
    return true;
  }
  $m_beforeCompleted(): Maybe<T> {
    return None;
  }
  $m_replay(observer: ObserverLike<T>, terminal: Terminal | null): void {
    replayTerminal(observer, terminal);
  }
}
class AsyncStrategy<T> implements ReplayStrategy<T> {
  private $p_last: Maybe<T> = None;
  $m_record(value: T): boolean {
    this.$p_last = Some(value);
    return false;
  }
  $m_beforeCompleted(): Maybe<T> {
    return this.$p_last;
  }
  $m_replay(observer: ObserverLike<T>, terminal: Terminal | null): void {
    if (terminal && terminal.type === TerminalType.Completed && isSome(this.$p_last)) {
      observer.onNext(this.$p_last.$m_value);
    }
    replayTerminal(observer, terminal);
  }
}
class BehaviorStrategy<T> implements ReplayStrategy<T> {
  constructor(public $m_current: Maybe<T>) {}
  $m_record(value: T): boolean {
    this.$m_current = Some(value);
    return true;
  }
  $m_beforeCompleted(): Maybe<T> {
    return None;
  }
  $m_replay(observer: ObserverLike<T>, terminal: Terminal | null): void {
    if ((!terminal || terminal.type === TerminalType.Completed) && isSome(this.$m_current)) {
      observer.onNext(this.$m_current.$m_value);
    }
    replayTerminal(observer, terminal);
  }
}
class BufferStrategy<T> implements ReplayStrategy<T> {
  private $p_buffer: T[] = [];
  constructor(private $p_bufferSize: number) {}
  $m_record(value: T): boolean {
    this.$p_buffer.push(value);
    if (this.$p_buffer.length > this.$p_bufferSize) {
      this.$p_buffer.shift();
    }
    return true;
  }
  $m_beforeCompleted(): Maybe<T> {
    return None;
  }
  $m_replay(observer: ObserverLike<T>, terminal: Terminal | null): void {
    const buffer = this.$p_buffer.slice();
    for (let i = 0; i < buffer.length && observer.stopped !== true; i++) {
      observer.onNext(buffer[i]);
    }
    replayTerminal(observer, terminal);
  }
}
interface ObserverInfo<T> {
  $m_observer: ObserverLike<T>;
  $m_didRemove: boolean;
}
class SubjectImplementation<T> implements Subject<T> {
  [$$Observable]: undefined = undefined;
  protected $p_strategy: ReplayStrategy<T>;
  private $p_observerInfos: ObserverInfo<T>[] = [];
  private $p_terminal: Terminal | null = null;
  constructor(strategy: ReplayStrategy<T>) {
    this.$p_strategy = strategy;
  }
  get stopped(): boolean {
    return this.$p_terminal !== null;
  }
  get observed(): boolean {
    return this.$p_observerInfos.length > 0;
  }
  subscribe(observer: ObserverLike<T>): Subscription;
  subscribe(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void): Subscription;
  subscribe(observerOrNext?: ObserverLike<T> | ((value: T) => void), onError?: (error: unknown) => void, onCompleted?: () => void): Subscription {
    const observer = isObserverLike(observerOrNext) ? observerOrNext : Observer(observerOrNext, onError, onCompleted);
    if (this.$p_terminal) {
      this.$p_strategy.$m_replay(observer, this.$p_terminal);
      return closedSubscription;
    }
    this.$p_strategy.$m_replay(observer, null);
    if (observer.stopped === true || this.$p_terminal) {
      return closedSubscription;
    }
    const observerInfo: ObserverInfo<T> = { $m_observer: observer, $m_didRemove: false };
    const observerInfos = this.$p_observerInfos;
    observerInfos.push(observerInfo);
    return Subscription(() => {
      observerInfo.$m_didRemove = true;
      removeOnce(observerInfos, observerInfo);
    });
  }
  onNext(value: T): void {
    if (this.$p_terminal || !this.$p_strategy.$m_record(value)) {
      return;
    }
    this.$p_distribute(this.$p_observerInfos.slice(), (observer) => {
      observer.onNext(value);
    });
  }
  onError(error: unknown): void {
    if (this.$p_terminal) {
      return;
    }
    this.$p_terminal = { type: TerminalType.Error, error };
    this.$p_distribute(this.$p_takeObserverInfos(), (observer) => {
      observer.onError(error);
    });
  }
  onCompleted(): void {
    if (this.$p_terminal) {
      return;
    }
    this.$p_terminal = TerminalCompleted;
    const observerInfos = this.$p_takeObserverInfos();
    const last = this.$p_strategy.$m_beforeCompleted();
    if (isSome(last)) {
      this.$p_distribute(observerInfos, (observer) => {
        observer.onNext(last.$m_value);
      });
    }
    this.$p_distribute(observerInfos, (observer) => {
      observer.onCompleted();
    });
  }
  private $p_takeObserverInfos(): ObserverInfo<T>[] {
    const observerInfos = this.$p_observerInfos;
    this.$p_observerInfos = [];
    return observerInfos;
  }
  // Observers registered during a distribution only see later events.
  private $p_distribute(observerInfos: ObserverInfo<T>[], deliver: (observer: ObserverLike<T>) => void): void {
    for (let i = observerInfos.length - 1; i >= 0; i--) {
      const observerInfo = observerInfos[i];
      if (observerInfo.$m_didRemove) {
        continue;
      }
      const observer = observerInfo.$m_observer;
      if (observer.stopped === true) {
        observerInfo.$m_didRemove = true;
        removeOnce(this.$p_observerInfos, observerInfo);
        continue;
      }
      try {
        deliver(observer);
      } catch (error) {
        reportUnhandledError(error);
      }
    }
  }
}
class BehaviorSubjectImplementation<T> extends SubjectImplementation<T> implements BehaviorSubject<T> {
  private $p_behavior: BehaviorStrategy<T>;
  constructor(strategy: BehaviorStrategy<T>) {
    super(strategy);
    this.$p_behavior = strategy;
  }
  getValue(): T | undefined {
    return getOrUndefined(this.$p_behavior.$m_current);
  }
}
function Subject<T>(): Subject<T> {
  return new SubjectImplementation<T>(new PlainStrategy());
}
function AsyncSubject<T>(): Subject<T> {
  return new SubjectImplementation<T>(new AsyncStrategy());
}
function BehaviorSubject<T>(...initial: [value: T] | []): BehaviorSubject<T> {
  return new BehaviorSubjectImplementation(new BehaviorStrategy<T>(initial.length === 0 ? None : Some(initial[0])));
}
function ReplaySubject<T>(bufferSize = Infinity): Subject<T> {
  if (bufferSize !== Infinity) {
    assertPositiveInteger(bufferSize, 'bufferSize');
  }
  return new SubjectImplementation<T>(new BufferStrategy(bufferSize));
}
function isSubject(value: unknown): value is Subject<unknown> {
  return value instanceof SubjectImplementation;
}
export { Subject, AsyncSubject, BehaviorSubject, ReplaySubject, isSubject };
