/**
 * Loads the task list at startup and writes it back verbatim at shutdown.
 */

import { asc } from 'drizzle-orm';
import type { TaskmateDb } from '../db.js';
import { tasks } from '../schema/index.js';
import { TaskType } from '../types/task.js';
import type { Task } from '../types/task.js';
import { TaskList } from '../collection/task-list.js';
import { createTodo, createDeadline, createEvent } from '../tasks/task.js';

type TaskRow = typeof tasks.$inferSelect;
type NewTaskRow = typeof tasks.$inferInsert;

function rowToTask(row: TaskRow): Task {
  const task = buildTask(row);
  task.isDone = row.isDone;
  return task;
}

function buildTask(row: TaskRow): Task {
  switch (row.type) {
    case TaskType.Todo: return createTodo(row.description);
    case TaskType.Deadline: return createDeadline(row.description, row.by ?? '');
    case TaskType.Event: return createEvent(row.description, row.from ?? '', row.to ?? '');
  }
}

function taskToRow(task: Task, position: number): NewTaskRow {
  const base = { position, type: task.$type, description: task.description, isDone: task.isDone };
  switch (task.$type) {
    case TaskType.Todo: return base;
    case TaskType.Deadline: return { ...base, by: task.by };
    case TaskType.Event: return { ...base, from: task.from, to: task.to };
  }
}

export function loadTasks(db: TaskmateDb): TaskList {
  const rows = db.select().from(tasks).orderBy(asc(tasks.position)).all();
  return new TaskList(rows.map(rowToTask));
}

/** Replace everything stored with the list as it is now */
export function saveTasks(db: TaskmateDb, list: TaskList): void {
  const rows = list.toArray().map(taskToRow);
  db.transaction((tx) => {
    tx.delete(tasks).run();
    if (rows.length > 0) tx.insert(tasks).values(rows).run();
  });
}
