import { reportUnhandledError } from './config';
import { noop } from './util';
interface ObserverLike<T> {
  readonly stopped?: boolean;
  onNext(value: T): void;
  onError(error: unknown): void;
  onCompleted(): void;
}
const $$Observer = Symbol('Observer');
interface Observer<T> extends ObserverLike<T> {
  readonly stopped: boolean;
  [$$Observer]: undefined;
}
class ObserverImplementation<T> implements Observer<T> {
  private $p_stopped = false;
  private $p_onNext: (value: T) => void;
  private $p_onError: (error: unknown) => void;
  private $p_onCompleted: () => void;
  [$$Observer]: undefined = undefined;
  constructor(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void) {
    this.$p_onNext = onNext ?? noop;
    this.$p_onError = onError ?? reportUnhandledError;
    this.$p_onCompleted = onCompleted ?? noop;
  }
  get stopped(): boolean {
    return this.$p_stopped;
  }
  onNext(value: T): void {
    if (this.$p_stopped) {
      return;
    }
    const onNext = this.$p_onNext;
    onNext(value);
  }
  onError(error: unknown): void {
    if (this.$p_stopped) {
      return;
    }
    this.$p_stopped = true;
    const onError = this.$p_onError;
    onError(error);
  }
  onCompleted(): void {
    if (this.$p_stopped) {
      return;
    }
    this.$p_stopped = true;
    const onCompleted = this.$p_onCompleted;
    onCompleted();
  }
}
function Observer<T>(onNext?: (value: T) => void, onError?: (error: unknown) => void, onCompleted?: () => void): Observer<T> {
  return new ObserverImplementation(onNext, onError, onCompleted);
}
function isObserver(value: unknown): value is Observer<unknown> {
  return typeof value === 'object' && value !== null && $$Observer in value;
}
function isObserverLike(value: unknown): value is ObserverLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'onNext' in value &&
    typeof value.onNext === 'function' &&
    'onError' in value &&
    typeof value.onError === 'function' &&
    'onCompleted' in value &&
    typeof value.onCompleted === 'function'
  );
}
export { type ObserverLike, $$Observer, Observer, isObserver, isObserverLike };
