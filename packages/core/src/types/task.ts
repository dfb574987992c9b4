export const TaskType = {
  Todo: 'todo',
  Deadline: 'deadline',
  Event: 'event',
} as const;

export type TaskType = (typeof TaskType)[keyof typeof TaskType];

interface BaseTask {
  readonly description: string;
  /** Flipped in place by mark/unmark */
  isDone: boolean;
}

export interface TodoTask extends BaseTask {
  readonly $type: typeof TaskType.Todo;
}

export interface DeadlineTask extends BaseTask {
  readonly $type: typeof TaskType.Deadline;
  readonly by: string; // free text, not a date
}

export interface EventTask extends BaseTask {
  readonly $type: typeof TaskType.Event;
  readonly from: string;
  readonly to: string;
}

export type Task = TodoTask | DeadlineTask | EventTask;
