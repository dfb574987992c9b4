/**
 * Applies a parsed Command to the task list and reports through the sink.
 * Out-of-bounds indices are reported here and never thrown.
 */

import type { Command } from '../types/command.js';
import type { Task } from '../types/task.js';
import type { ExecutionResult } from '../types/results.js';
import type { OutputSink } from '../types/output.js';
import type { TaskList } from '../collection/task-list.js';
import { formatTask } from '../tasks/task.js';
import * as msg from './messages.js';

const SUCCESS: ExecutionResult = { type: 'success' };

function printBlock(sink: OutputSink, lines: string[]): void {
  sink.print(msg.DIVIDER);
  for (const line of lines) sink.print(line);
  sink.print(msg.DIVIDER);
}

function outOfBounds(sink: OutputSink, index: number): ExecutionResult {
  sink.error(msg.OUT_OF_BOUNDS);
  return { type: 'out-of-bounds', index };
}

function numbered(tasks: readonly Task[]): string[] {
  return tasks.map((t, i) => `${i + 1}.${formatTask(t)}`);
}

function setDone(tasks: TaskList, sink: OutputSink, index: number, done: boolean): ExecutionResult {
  const task = tasks.setDone(index - 1, done);
  if (!task) return outOfBounds(sink, index);
  printBlock(sink, [done ? msg.MARKED_DONE : msg.MARKED_NOT_DONE, formatTask(task)]);
  return SUCCESS;
}

function add(tasks: TaskList, sink: OutputSink, task: Task): ExecutionResult {
  const count = tasks.add(task);
  printBlock(sink, [msg.ADDED, `  ${formatTask(task)}`, msg.taskCount(count)]);
  return SUCCESS;
}

export function executeCommand(command: Command, tasks: TaskList, sink: OutputSink): ExecutionResult {
  switch (command.$type) {
    case 'bye':
      printBlock(sink, [msg.FAREWELL]);
      return { type: 'exit' };
    case 'list': {
      const all = tasks.toArray();
      printBlock(sink, all.length === 0 ? [msg.LIST_EMPTY] : [msg.LIST_HEADER, ...numbered(all)]);
      return SUCCESS;
    }
    case 'find': {
      const matches = tasks.find(command.keyword);
      printBlock(sink, matches.length === 0 ? [msg.FIND_EMPTY] : [msg.FIND_HEADER, ...numbered(matches)]);
      return SUCCESS;
    }
    case 'mark':
      return setDone(tasks, sink, command.index, true);
    case 'unmark':
      return setDone(tasks, sink, command.index, false);
    case 'delete': {
      const removed = tasks.remove(command.index - 1);
      if (!removed) return outOfBounds(sink, command.index);
      printBlock(sink, [msg.REMOVED, `  ${formatTask(removed)}`, msg.taskCount(tasks.size)]);
      return SUCCESS;
    }
    case 'add-todo':
    case 'add-deadline':
    case 'add-event':
      return add(tasks, sink, command.task);
  }
}
