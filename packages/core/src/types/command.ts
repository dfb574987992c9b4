/**
 * Commands as a discriminated union.
 * Each value is fully resolved by the parser; the executor never re-parses.
 */

import type { TodoTask, DeadlineTask, EventTask } from './task.js';

export interface ByeCmd {
  readonly $type: 'bye';
}

export interface ListCmd {
  readonly $type: 'list';
}

export interface FindCmd {
  readonly $type: 'find';
  readonly keyword: string;
}

/** index is 1-based, as typed by the user */
export interface MarkCmd {
  readonly $type: 'mark';
  readonly index: number;
}

export interface UnmarkCmd {
  readonly $type: 'unmark';
  readonly index: number;
}

export interface DeleteCmd {
  readonly $type: 'delete';
  readonly index: number;
}

export interface AddTodoCmd {
  readonly $type: 'add-todo';
  readonly task: TodoTask;
}

export interface AddDeadlineCmd {
  readonly $type: 'add-deadline';
  readonly task: DeadlineTask;
}

export interface AddEventCmd {
  readonly $type: 'add-event';
  readonly task: EventTask;
}

export type Command =
  | ByeCmd
  | ListCmd
  | FindCmd
  | MarkCmd
  | UnmarkCmd
  | DeleteCmd
  | AddTodoCmd
  | AddDeadlineCmd
  | AddEventCmd;
