// A task body yields the number of time units it wants to sleep before being
// resumed again. Yielding nothing means it is ready again immediately.
type TaskYield = number | undefined | void;
type TaskBody = Iterator<TaskYield, unknown, undefined>;
type TaskAction = () => TaskBody | void;
const enum TaskStepType {
  Pending = 'Pending',
  Finished = 'Finished',
  Error = 'Error',
}
interface TaskPending {
  readonly type: TaskStepType.Pending;
  readonly delay: number;
}
interface TaskFinished {
  readonly type: TaskStepType.Finished;
}
interface TaskError {
  readonly type: TaskStepType.Error;
  readonly error: unknown;
}
type TaskStep = TaskPending | TaskFinished | TaskError;
const TaskFinished: TaskFinished = { type: TaskStepType.Finished };
interface Task {
  readonly finished: boolean;
  resume(): TaskStep;
}
function isTaskBody(value: unknown): value is TaskBody {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'next') === 'function';
}
function toDelay(yielded: TaskYield): number {
  return typeof yielded === 'number' && yielded > 0 ? yielded : 0;
}
class TaskImplementation implements Task {
  private $p_action: TaskAction | null;
  private $p_body: TaskBody | null = null;
  private $p_finished = false;
  constructor(action: TaskAction) {
    this.$p_action = action;
  }
  get finished(): boolean {
    return this.$p_finished;
  }
  resume(): TaskStep {
    if (this.$p_finished) {
      return TaskFinished;
    }
    const action = this.$p_action;
    if (action) {
      this.$p_action = null;
      let result: unknown;
      try {
        result = action();
      } catch (error) {
        return this.$p_fail(error);
      }
      if (!isTaskBody(result)) {
        this.$p_finished = true;
        return TaskFinished;
      }
      this.$p_body = result;
    }
    const body = this.$p_body;
    if (!body) {
      this.$p_finished = true;
      return TaskFinished;
    }
    let iteration: IteratorResult<TaskYield, unknown>;
    try {
      iteration = body.next();
    } catch (error) {
      return this.$p_fail(error);
    }
    if (iteration.done) {
      this.$p_finished = true;
      this.$p_body = null;
      return TaskFinished;
    }
    return { type: TaskStepType.Pending, delay: toDelay(iteration.value) };
  }
  private $p_fail(error: unknown): TaskError {
    this.$p_finished = true;
    this.$p_body = null;
    return { type: TaskStepType.Error, error };
  }
}
function Task(action: TaskAction): Task {
  return new TaskImplementation(action);
}
export { type TaskYield, type TaskBody, type TaskAction, TaskStepType, type TaskStep, Task };
