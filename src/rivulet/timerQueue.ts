type TimerHandle = number;
interface TimerQueue {
  readonly size: number;
  callDelayed(delay: number, action: () => void): TimerHandle;
  cancel(handle: TimerHandle): void;
}
class TimerQueueImplementation implements TimerQueue {
  private $p_lastHandle = 0;
  private $p_timeouts = new Map<TimerHandle, ReturnType<typeof setTimeout>>();
  get size(): number {
    return this.$p_timeouts.size;
  }
  callDelayed(delay: number, action: () => void): TimerHandle {
    const handle = ++this.$p_lastHandle;
    const timeout = setTimeout(() => {
      this.$p_timeouts.delete(handle);
      action();
    }, delay);
    this.$p_timeouts.set(handle, timeout);
    return handle;
  }
  cancel(handle: TimerHandle): void {
    const timeout = this.$p_timeouts.get(handle);
    if (timeout === undefined) {
      return;
    }
    this.$p_timeouts.delete(handle);
    clearTimeout(timeout);
  }
}
function TimerQueue(): TimerQueue {
  return new TimerQueueImplementation();
}
export { type TimerHandle, TimerQueue };
