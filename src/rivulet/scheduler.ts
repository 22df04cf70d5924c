import { config, reportUnhandledError } from './config';
import { TaskFailureError, assertArgument, assertUnreachable } from './errors';
import { Subscription, closedSubscription } from './subscription';
import { Task, TaskAction, TaskStepType } from './task';
import { TimerHandle, TimerQueue } from './timerQueue';
interface Scheduler {
  schedule(action: TaskAction, delay?: number): Subscription;
  unschedule(subscription: Subscription): void;
}
function assertDelay(delay: number): void {
  assertArgument(Number.isFinite(delay) && delay >= 0, 'Expected the delay to be a non-negative finite number.', delay);
}
// Runs everything synchronously. Sleeps requested by a task are ignored, so a
// task is driven to its end before schedule returns.
class ImmediateScheduler implements Scheduler {
  schedule(action: TaskAction): Subscription {
    const task = Task(action);
    for (;;) {
      const step = task.resume();
      switch (step.type) {
        case TaskStepType.Pending: {
          break;
        }
        case TaskStepType.Finished: {
          return closedSubscription;
        }
        case TaskStepType.Error: {
          throw step.error;
        }
        default: {
          assertUnreachable(step);
        }
      }
    }
  }
  unschedule(): void {}
}
class TimeoutScheduler implements Scheduler {
  readonly defaultDelay: number;
  readonly timerQueue: TimerQueue;
  private $p_subscriptions = new Set<Subscription>();
  constructor(defaultDelay = config.defaultTimeoutDelay, timerQueue = TimerQueue()) {
    assertDelay(defaultDelay);
    this.defaultDelay = defaultDelay;
    this.timerQueue = timerQueue;
  }
  schedule(action: TaskAction, delay = this.defaultDelay): Subscription {
    assertDelay(delay);
    const { timerQueue } = this;
    const task = Task(action);
    let handle: TimerHandle | undefined;
    const subscription = Subscription(() => {
      this.$p_subscriptions.delete(subscription);
      if (handle !== undefined) {
        timerQueue.cancel(handle);
        handle = undefined;
      }
    });
    const run = (): void => {
      handle = undefined;
      const step = task.resume();
      switch (step.type) {
        case TaskStepType.Pending: {
          if (!subscription.unsubscribed) {
            handle = timerQueue.callDelayed(step.delay, run);
          }
          break;
        }
        case TaskStepType.Finished: {
          subscription.unsubscribe();
          break;
        }
        case TaskStepType.Error: {
          subscription.unsubscribe();
          reportUnhandledError(step.error);
          break;
        }
        default: {
          assertUnreachable(step);
        }
      }
    };
    this.$p_subscriptions.add(subscription);
    handle = timerQueue.callDelayed(delay, run);
    return subscription;
  }
  unschedule(subscription: Subscription): void {
    if (this.$p_subscriptions.has(subscription)) {
      subscription.unsubscribe();
    }
  }
}
interface CooperativeTask {
  readonly $m_task: Task;
  readonly $m_subscription: Subscription;
  $m_due: number;
}
class CooperativeScheduler implements Scheduler {
  private $p_tasks: CooperativeTask[] = [];
  // Position of the task being resumed by update, -1 outside of one.
  private $p_taskIndex = -1;
  private $p_currentTime: number;
  constructor(currentTime = 0) {
    assertArgument(Number.isFinite(currentTime), 'Expected the start time to be a finite number.', currentTime);
    this.$p_currentTime = currentTime;
  }
  get currentTime(): number {
    return this.$p_currentTime;
  }
  schedule(action: TaskAction, delay = 0): Subscription {
    assertDelay(delay);
    const cooperativeTask: CooperativeTask = {
      $m_task: Task(action),
      $m_subscription: Subscription(() => {
        this.$p_remove(cooperativeTask);
      }),
      $m_due: this.$p_currentTime + delay,
    };
    this.$p_tasks.push(cooperativeTask);
    return cooperativeTask.$m_subscription;
  }
  unschedule(subscription: Subscription): void {
    if (this.$p_tasks.some((cooperativeTask) => cooperativeTask.$m_subscription === subscription)) {
      subscription.unsubscribe();
    }
  }
  update(delta = 0): void {
    assertDelay(delta);
    this.$p_currentTime += delta;
    const errors: unknown[] = [];
    const tasks = this.$p_tasks;
    // Tasks scheduled while this update runs are resumed by it too once due.
    try {
      for (this.$p_taskIndex = 0; this.$p_taskIndex < tasks.length; this.$p_taskIndex++) {
        const cooperativeTask = tasks[this.$p_taskIndex];
        if (this.$p_currentTime < cooperativeTask.$m_due) {
          continue;
        }
        const step = cooperativeTask.$m_task.resume();
        switch (step.type) {
          case TaskStepType.Pending: {
            cooperativeTask.$m_due = Math.max(cooperativeTask.$m_due + step.delay, this.$p_currentTime);
            break;
          }
          case TaskStepType.Finished: {
            cooperativeTask.$m_subscription.unsubscribe();
            break;
          }
          case TaskStepType.Error: {
            cooperativeTask.$m_subscription.unsubscribe();
            errors.push(step.error);
            break;
          }
          default: {
            assertUnreachable(step);
          }
        }
      }
    } finally {
      this.$p_taskIndex = -1;
    }
    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new TaskFailureError(errors);
    }
  }
  isEmpty(): boolean {
    return this.$p_tasks.length === 0;
  }
  private $p_remove(cooperativeTask: CooperativeTask): void {
    const index = this.$p_tasks.indexOf(cooperativeTask);
    if (index === -1) {
      return;
    }
    this.$p_tasks.splice(index, 1);
    if (index <= this.$p_taskIndex) {
      this.$p_taskIndex--;
    }
  }
}
export { type Scheduler, ImmediateScheduler, TimeoutScheduler, CooperativeScheduler };
