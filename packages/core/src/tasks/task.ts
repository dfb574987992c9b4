/**
 * Task constructors and the one-line string form used by every listing.
 */

import { TaskType } from '../types/task.js';
import type { Task, TodoTask, DeadlineTask, EventTask } from '../types/task.js';

const MARKERS: Record<TaskType, string> = {
  [TaskType.Todo]: 'T',
  [TaskType.Deadline]: 'D',
  [TaskType.Event]: 'E',
};

export function createTodo(description: string): TodoTask {
  return { $type: TaskType.Todo, description, isDone: false };
}

export function createDeadline(description: string, by: string): DeadlineTask {
  return { $type: TaskType.Deadline, description, by, isDone: false };
}

export function createEvent(description: string, from: string, to: string): EventTask {
  return { $type: TaskType.Event, description, from, to, isDone: false };
}

export function taskMarker(task: Task): string {
  return MARKERS[task.$type];
}

/** `[D][X] return book (by: Sunday)` */
export function formatTask(task: Task): string {
  const head = `[${taskMarker(task)}][${task.isDone ? 'X' : ' '}] ${task.description}`;
  switch (task.$type) {
    case TaskType.Todo: return head;
    case TaskType.Deadline: return `${head} (by: ${task.by})`;
    case TaskType.Event: return `${head} (from: ${task.from} to: ${task.to})`;
  }
}
