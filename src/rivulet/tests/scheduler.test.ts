import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { configure, resetConfig } from '../config';
import { InvalidArgumentError, TaskFailureError } from '../errors';
import { CooperativeScheduler, ImmediateScheduler, TimeoutScheduler } from '../scheduler';
describe('ImmediateScheduler', () => {
  test('runs an action before schedule returns', () => {
    const action = jest.fn<() => void>();
    const subscription = new ImmediateScheduler().schedule(action);
    expect(action).toHaveBeenCalledTimes(1);
    expect(subscription.unsubscribed).toBe(true);
  });
  test('drives a task to its end ignoring sleeps', () => {
    const steps: number[] = [];
    new ImmediateScheduler().schedule(function* () {
      steps.push(1);
      yield 100;
      steps.push(2);
      yield 100;
      steps.push(3);
    });
    expect(steps).toEqual([1, 2, 3]);
  });
  test('throws what the task throws', () => {
    const failure = new Error('immediate failure');
    expect(() =>
      new ImmediateScheduler().schedule(() => {
        throw failure;
      }),
    ).toThrow(failure);
  });
});
describe('CooperativeScheduler', () => {
  test('runs a task once its due time is reached', () => {
    const scheduler = new CooperativeScheduler();
    const ranAt: number[] = [];
    scheduler.schedule(() => {
      ranAt.push(scheduler.currentTime);
    }, 10);
    scheduler.update(5);
    expect(ranAt).toEqual([]);
    scheduler.update(5);
    expect(ranAt).toEqual([10]);
    expect(scheduler.isEmpty()).toBe(true);
  });
  test('resumes a task after the time it yields', () => {
    const scheduler = new CooperativeScheduler();
    const steps: string[] = [];
    scheduler.schedule(function* () {
      steps.push(`start@${scheduler.currentTime}`);
      yield 3;
      steps.push(`end@${scheduler.currentTime}`);
    });
    scheduler.update();
    scheduler.update(2);
    expect(steps).toEqual(['start@0']);
    scheduler.update(1);
    expect(steps).toEqual(['start@0', 'end@3']);
    expect(scheduler.isEmpty()).toBe(true);
  });
  test('an overdue task resumes on the following update', () => {
    const scheduler = new CooperativeScheduler();
    const steps: number[] = [];
    scheduler.schedule(function* () {
      for (;;) {
        steps.push(scheduler.currentTime);
        yield 2;
      }
    });
    scheduler.update(10);
    scheduler.update(1);
    scheduler.update(1);
    expect(steps).toEqual([10, 11, 12]);
  });
  test('starts from the given time', () => {
    const scheduler = new CooperativeScheduler(100);
    const action = jest.fn<() => void>();
    scheduler.schedule(action, 5);
    scheduler.update(4);
    expect(action).not.toHaveBeenCalled();
    scheduler.update(1);
    expect(action).toHaveBeenCalledTimes(1);
    expect(scheduler.currentTime).toBe(105);
  });
  test('a task scheduled during an update runs in the same update once due', () => {
    const scheduler = new CooperativeScheduler();
    const calls: string[] = [];
    scheduler.schedule(() => {
      calls.push('outer');
      scheduler.schedule(() => {
        calls.push('inner');
      });
      scheduler.schedule(() => {
        calls.push('later');
      }, 1);
    });
    scheduler.update();
    expect(calls).toEqual(['outer', 'inner']);
    scheduler.update(1);
    expect(calls).toEqual(['outer', 'inner', 'later']);
    expect(scheduler.isEmpty()).toBe(true);
  });
  test('a task cancelling an earlier one does not skip the next', () => {
    const scheduler = new CooperativeScheduler();
    const calls: string[] = [];
    const looping = scheduler.schedule(function* () {
      for (;;) {
        calls.push('loop');
        yield;
      }
    });
    scheduler.schedule(() => {
      calls.push('cancel');
      looping.unsubscribe();
    });
    scheduler.schedule(() => {
      calls.push('last');
    });
    scheduler.update();
    expect(calls).toEqual(['loop', 'cancel', 'last']);
    expect(scheduler.isEmpty()).toBe(true);
  });
  test('a failing task is removed while the other due tasks still run', () => {
    const scheduler = new CooperativeScheduler();
    const failure = new Error('task failed');
    const after = jest.fn<() => void>();
    scheduler.schedule(() => {
      throw failure;
    });
    scheduler.schedule(after);
    expect(() => scheduler.update()).toThrow(failure);
    expect(after).toHaveBeenCalledTimes(1);
    expect(scheduler.isEmpty()).toBe(true);
  });
  test('several failures are thrown together', () => {
    const scheduler = new CooperativeScheduler();
    const first = new Error('first');
    const second = new Error('second');
    scheduler.schedule(() => {
      throw first;
    });
    scheduler.schedule(() => {
      throw second;
    });
    let caught: unknown;
    try {
      scheduler.update();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TaskFailureError);
    expect(caught instanceof TaskFailureError && caught.errors).toEqual([first, second]);
  });
  test('unschedule and unsubscribe cancel a pending task', () => {
    const scheduler = new CooperativeScheduler();
    const first = jest.fn<() => void>();
    const second = jest.fn<() => void>();
    const firstSubscription = scheduler.schedule(first, 1);
    const secondSubscription = scheduler.schedule(second, 1);
    scheduler.unschedule(firstSubscription);
    secondSubscription.unsubscribe();
    expect(scheduler.isEmpty()).toBe(true);
    scheduler.update(1);
    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
  });
  test('rejects a negative delay', () => {
    expect(() => new CooperativeScheduler().schedule(() => {}, -1)).toThrow(InvalidArgumentError);
    expect(() => new CooperativeScheduler().update(-1)).toThrow(InvalidArgumentError);
  });
});
describe('TimeoutScheduler', () => {
  const onUnhandledError = jest.fn();
  beforeEach(() => {
    jest.useFakeTimers();
    onUnhandledError.mockClear();
    configure({ onUnhandledError });
  });
  afterEach(() => {
    jest.useRealTimers();
    resetConfig();
  });
  test('runs an action after its delay', () => {
    const scheduler = new TimeoutScheduler();
    const action = jest.fn<() => void>();
    const subscription = scheduler.schedule(action, 100);
    jest.advanceTimersByTime(99);
    expect(action).not.toHaveBeenCalled();
    jest.advanceTimersByTime(1);
    expect(action).toHaveBeenCalledTimes(1);
    expect(subscription.unsubscribed).toBe(true);
    expect(scheduler.timerQueue.size).toBe(0);
  });
  test('uses the configured default delay', () => {
    configure({ defaultTimeoutDelay: 20 });
    const scheduler = new TimeoutScheduler();
    const action = jest.fn<() => void>();
    scheduler.schedule(action);
    jest.advanceTimersByTime(19);
    expect(action).not.toHaveBeenCalled();
    jest.advanceTimersByTime(1);
    expect(action).toHaveBeenCalledTimes(1);
  });
  test('resumes a sleeping task through the timer queue', () => {
    const scheduler = new TimeoutScheduler(0);
    const steps: string[] = [];
    scheduler.schedule(function* () {
      steps.push('start');
      yield 50;
      steps.push('end');
    });
    jest.advanceTimersByTime(0);
    expect(steps).toEqual(['start']);
    jest.advanceTimersByTime(49);
    expect(steps).toEqual(['start']);
    jest.advanceTimersByTime(1);
    expect(steps).toEqual(['start', 'end']);
  });
  test('unschedule cancels the pending timer', () => {
    const scheduler = new TimeoutScheduler();
    const action = jest.fn<() => void>();
    const subscription = scheduler.schedule(action, 10);
    expect(scheduler.timerQueue.size).toBe(1);
    scheduler.unschedule(subscription);
    expect(scheduler.timerQueue.size).toBe(0);
    jest.advanceTimersByTime(10);
    expect(action).not.toHaveBeenCalled();
  });
  test('reports a failing task', () => {
    const scheduler = new TimeoutScheduler();
    const failure = new Error('timer task failed');
    scheduler.schedule(() => {
      throw failure;
    }, 5);
    jest.advanceTimersByTime(5);
    expect(onUnhandledError.mock.calls).toEqual([[failure]]);
  });
});
